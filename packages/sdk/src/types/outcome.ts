/**
 * Results of parsing and running an argument vector.
 */

import type { HandlerError, UsageError, ValueError } from "../errors/base.js";
import type { CommandNode } from "./command.js";
import type { MatchResult, ResolvedValues } from "./values.js";

/** Help or version output was requested. Not an error. */
export interface DisplayRequest {
  readonly kind: "help" | "version";
  /** Command names from the root to the level that asked for it */
  readonly path: readonly string[];
  readonly node: CommandNode;
}

export type ParseFailure = UsageError | ValueError;

export type ParseOutcome =
  | {
      readonly kind: "matched";
      readonly path: readonly string[];
      readonly nodes: readonly CommandNode[];
      readonly values: ResolvedValues;
      readonly match: MatchResult;
    }
  | { readonly kind: "display"; readonly request: DisplayRequest }
  | { readonly kind: "error"; readonly error: ParseFailure };

export type RunOutcome =
  | { readonly kind: "completed"; readonly path: readonly string[]; readonly exitCode: number }
  | { readonly kind: "display"; readonly request: DisplayRequest; readonly exitCode: number }
  | { readonly kind: "error"; readonly error: ParseFailure; readonly exitCode: number }
  | { readonly kind: "failed"; readonly error: HandlerError; readonly exitCode: number };
