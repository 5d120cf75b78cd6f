/**
 * Command tree, handler and execution-context types.
 */

import type { ArgGroup, ArgumentDef } from "./argument.js";
import type { ResolvedValues } from "./values.js";

/** A finalized, immutable command node. */
export interface CommandNode {
  readonly name: string;
  readonly aliases: readonly string[];
  readonly description: string;
  readonly version?: string;
  readonly hidden: boolean;
  readonly arguments: readonly ArgumentDef[];
  readonly groups: readonly ArgGroup[];
  readonly children: readonly CommandNode[];
}

/** Minimal logging surface handed to handlers. */
export interface HandlerLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export interface ExecutionContext {
  /** Working directory at dispatch time */
  readonly cwd: string;
  /** Raw argument vector, program name excluded */
  readonly argv: readonly string[];
  /** Command names from the root to the dispatched node */
  readonly path: readonly string[];
  readonly definition: Definition;
  readonly invocationId: string;
  readonly logger: HandlerLogger;
}

/** Exit code, or nothing for success. */
export type HandlerResult = number | void | Promise<number | void>;

export type CommandHandler = (values: ResolvedValues, context: ExecutionContext) => HandlerResult;

/**
 * A finalized command tree. Read-only and safe to share across parse calls.
 */
export interface Definition {
  readonly root: CommandNode;

  /** Find a node by command names below the root (aliases accepted). */
  find(path: readonly string[]): CommandNode | undefined;

  /** Command names from the root to `node`, root included. */
  pathOf(node: CommandNode): readonly string[];

  /** Own arguments plus every ancestor's global arguments. */
  visibleArguments(node: CommandNode): readonly ArgumentDef[];

  visibleGroups(node: CommandNode): readonly ArgGroup[];

  handlerFor(node: CommandNode): CommandHandler | undefined;
}
