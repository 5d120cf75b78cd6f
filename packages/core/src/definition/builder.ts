/**
 * CommandBuilder — mutable, order-free construction of a command tree.
 *
 * Nothing is checked while building. All well-formedness checks run once
 * in finalize(), which returns either the immutable definition or every
 * problem it found.
 */

import { DefinitionBuildError } from "@argloom/sdk";
import type {
  AccumulationPolicy,
  ArgumentAction,
  Arity,
  CommandHandler,
  ValueKind,
} from "@argloom/sdk";
import { finalizeDefinition } from "./finalize.js";
import type { CompiledDefinition, FinalizeOptions, FinalizeResult } from "./finalize.js";

export interface ArgumentOptions {
  name: string;
  description?: string;
  positional?: boolean;
  short?: string;
  /** Long flag name; defaults to `name` for flags, `false` for none */
  long?: string | false;
  shortAliases?: readonly string[];
  aliases?: readonly string[];
  arity?: Arity;
  kind?: ValueKind;
  action?: ArgumentAction;
  default?: string | readonly string[];
  missingValue?: string;
  env?: string;
  configKey?: string;
  required?: boolean;
  conflictsWith?: readonly string[];
  requires?: readonly string[];
  group?: string;
  accumulation?: AccumulationPolicy;
  repeatable?: boolean;
  global?: boolean;
  trailing?: boolean;
  hidden?: boolean;
  valueName?: string;
}

export type ArgumentShorthand = Omit<ArgumentOptions, "name">;

export interface GroupOptions {
  id: string;
  members?: readonly string[];
  required?: boolean;
  multiple?: boolean;
  conflictsWith?: readonly string[];
}

/** Everything recorded by a builder, read by finalize(). */
export interface CommandSpec {
  readonly name: string;
  readonly aliases: readonly string[];
  readonly description: string;
  readonly version?: string;
  readonly propagateVersion: boolean;
  readonly hidden: boolean;
  readonly helpFlag: boolean;
  readonly helpSubcommand: boolean;
  readonly argRequiredElseHelp: boolean;
  readonly arguments: readonly ArgumentOptions[];
  readonly groups: readonly GroupOptions[];
  readonly children: readonly CommandBuilder[];
  readonly handler?: CommandHandler;
}

export const arity = {
  none: (): Arity => ({ kind: "fixed", count: 0 }),
  exactly: (count: number): Arity => ({ kind: "fixed", count }),
  between: (min: number, max: number): Arity => ({ kind: "range", min, max }),
  optional: (): Arity => ({ kind: "range", min: 0, max: 1 }),
  atLeast: (min: number): Arity => ({ kind: "rest", min }),
};

export class CommandBuilder {
  private readonly aliases: string[] = [];
  private readonly args: ArgumentOptions[] = [];
  private readonly groupOptions: GroupOptions[] = [];
  private readonly children: CommandBuilder[] = [];
  private text = "";
  private versionText?: string;
  private versionPropagates = false;
  private isHidden = false;
  private helpFlag = true;
  private helpSubcommand = true;
  private helpWhenEmpty = false;
  private run?: CommandHandler;

  constructor(public readonly name: string) {}

  description(text: string): this {
    this.text = text;
    return this;
  }

  alias(...names: string[]): this {
    this.aliases.push(...names);
    return this;
  }

  version(version: string): this {
    this.versionText = version;
    return this;
  }

  /** Accept --version on every subcommand, not only the root. */
  propagateVersion(): this {
    this.versionPropagates = true;
    return this;
  }

  hidden(): this {
    this.isHidden = true;
    return this;
  }

  disableHelpFlag(): this {
    this.helpFlag = false;
    return this;
  }

  disableHelpSubcommand(): this {
    this.helpSubcommand = false;
    return this;
  }

  /** Print this command's help when it is given no arguments at all. */
  argRequiredElseHelp(): this {
    this.helpWhenEmpty = true;
    return this;
  }

  argument(options: ArgumentOptions): this {
    this.args.push(options);
    return this;
  }

  /** Presence-only boolean flag (`--verbose`). */
  flag(name: string, options: ArgumentShorthand = {}): this {
    return this.argument({ kind: { type: "bool" }, ...options, name });
  }

  /** Flag taking one value (`--port 8080`) unless `arity` says otherwise. */
  option(name: string, options: ArgumentShorthand = {}): this {
    return this.argument({ ...options, name });
  }

  positional(name: string, options: ArgumentShorthand = {}): this {
    return this.argument({ ...options, name, positional: true });
  }

  /** Occurrence counter (`-vvv` → 3). */
  count(name: string, options: ArgumentShorthand = {}): this {
    return this.argument({ ...options, name, action: "count" });
  }

  group(options: GroupOptions): this {
    this.groupOptions.push(options);
    return this;
  }

  subcommand(name: string, configure: (command: CommandBuilder) => void): this {
    const child = new CommandBuilder(name);
    configure(child);
    this.children.push(child);
    return this;
  }

  addSubcommand(child: CommandBuilder): this {
    this.children.push(child);
    return this;
  }

  handler(handler: CommandHandler): this {
    this.run = handler;
    return this;
  }

  /** @internal Snapshot read by finalize() */
  toSpec(): CommandSpec {
    return {
      name: this.name,
      aliases: [...this.aliases],
      description: this.text,
      version: this.versionText,
      propagateVersion: this.versionPropagates,
      hidden: this.isHidden,
      helpFlag: this.helpFlag,
      helpSubcommand: this.helpSubcommand,
      argRequiredElseHelp: this.helpWhenEmpty,
      arguments: [...this.args],
      groups: [...this.groupOptions],
      children: [...this.children],
      handler: this.run,
    };
  }

  finalize(options: FinalizeOptions = {}): FinalizeResult {
    return finalizeDefinition(this, options);
  }

  /** finalize(), throwing one DefinitionBuildError with every problem. */
  finalizeOrThrow(options: FinalizeOptions = {}): CompiledDefinition {
    const result = this.finalize(options);
    if (!result.valid) throw new DefinitionBuildError(result.errors);
    return result.definition;
  }
}

export function createCommand(name: string): CommandBuilder {
  return new CommandBuilder(name);
}
