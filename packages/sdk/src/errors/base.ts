/**
 * Error hierarchy for the command engine.
 */

import type { ValueSource } from "../types/values.js";
import { ErrorCode, type ErrorCodeValue } from "./codes.js";

export class ArgloomError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ArgloomError";
  }
}

// ─── Definition time ───

export type BuildErrorKind =
  | "DuplicateName"
  | "DanglingGroupReference"
  | "DanglingArgumentReference"
  | "ImpossibleConstraint"
  | "UnknownValueKind"
  | "InvalidArity"
  | "InvalidDefault"
  | "InvalidDefinition"
  | "CyclicDefinition"
  | "UnregisteredHandlerForLeaf";

/** One problem found while finalizing a command tree. */
export interface BuildError {
  readonly kind: BuildErrorKind;
  /** Space-joined command path of the node the problem belongs to */
  readonly path: string;
  readonly message: string;
}

/**
 * Every problem found by finalize(), reported at once.
 */
export class DefinitionBuildError extends ArgloomError {
  constructor(public readonly errors: readonly BuildError[]) {
    const count = errors.length === 1 ? "1 problem" : `${errors.length} problems`;
    const lines = errors.map((e) => `  - [${e.path}] ${e.kind}: ${e.message}`);
    super(`Invalid command definition (${count}):\n${lines.join("\n")}`, ErrorCode.DEFINITION_INVALID);
    this.name = "DefinitionBuildError";
  }
}

// ─── Parse time ───

export type UsageErrorKind =
  | "UnknownArgument"
  | "MissingRequiredArgument"
  | "ArgumentConflict"
  | "WrongArity"
  | "InvalidSubcommand"
  | "MissingSubcommand";

const USAGE_CODES: Record<UsageErrorKind, ErrorCodeValue> = {
  UnknownArgument: ErrorCode.UNKNOWN_ARGUMENT,
  MissingRequiredArgument: ErrorCode.MISSING_REQUIRED_ARGUMENT,
  ArgumentConflict: ErrorCode.ARGUMENT_CONFLICT,
  WrongArity: ErrorCode.WRONG_ARITY,
  InvalidSubcommand: ErrorCode.INVALID_SUBCOMMAND,
  MissingSubcommand: ErrorCode.MISSING_SUBCOMMAND,
};

export interface UsageErrorDetails {
  /** Command names from the root to the node where the error was found */
  path: readonly string[];
  /** Canonical names of the arguments involved */
  arguments?: readonly string[];
  /** Closest known spelling, for "did you mean" output */
  suggestion?: string;
  group?: string;
}

export class UsageError extends ArgloomError {
  public readonly path: readonly string[];
  public readonly arguments: readonly string[];
  public readonly suggestion?: string;
  public readonly group?: string;

  constructor(
    public readonly kind: UsageErrorKind,
    message: string,
    details: UsageErrorDetails,
  ) {
    const hint = details.suggestion ? ` (did you mean "${details.suggestion}"?)` : "";
    super(`${message}${hint}`, USAGE_CODES[kind]);
    this.name = "UsageError";
    this.path = details.path;
    this.arguments = details.arguments ?? [];
    this.suggestion = details.suggestion;
    this.group = details.group;
  }
}

export type ValueErrorKind = "InvalidValue" | "OutOfRange" | "UnknownEnumVariant";

const VALUE_CODES: Record<ValueErrorKind, ErrorCodeValue> = {
  InvalidValue: ErrorCode.INVALID_VALUE,
  OutOfRange: ErrorCode.OUT_OF_RANGE,
  UnknownEnumVariant: ErrorCode.UNKNOWN_ENUM_VARIANT,
};

const SOURCE_LABELS: Record<ValueSource, string> = {
  commandLine: "command line",
  environment: "environment",
  configFile: "config file",
  default: "default value",
};

export interface ValueErrorContext {
  /** Canonical argument name */
  argument?: string;
  /** Spelling shown to the user (`--port`, `<key>`) */
  label?: string;
  source?: ValueSource;
}

/**
 * A literal that could not be converted. Parsers create it without context;
 * the resolver attaches the argument and source.
 */
export class ValueError extends ArgloomError {
  public readonly argument?: string;
  public readonly label?: string;
  public readonly source?: ValueSource;

  constructor(
    public readonly kind: ValueErrorKind,
    public readonly literal: string,
    public readonly expected: string,
    context: ValueErrorContext = {},
  ) {
    super(formatValueError(kind, literal, expected, context), VALUE_CODES[kind]);
    this.name = "ValueError";
    this.argument = context.argument;
    this.label = context.label;
    this.source = context.source;
  }

  withContext(context: ValueErrorContext): ValueError {
    return new ValueError(this.kind, this.literal, this.expected, {
      argument: context.argument ?? this.argument,
      label: context.label ?? this.label,
      source: context.source ?? this.source,
    });
  }
}

function formatValueError(
  kind: ValueErrorKind,
  literal: string,
  expected: string,
  context: ValueErrorContext,
): string {
  const head =
    kind === "OutOfRange"
      ? `Value "${literal}" is out of range`
      : kind === "UnknownEnumVariant"
        ? `Unknown variant "${literal}"`
        : `Invalid value "${literal}"`;
  const target = context.label ? ` for ${context.label}` : "";
  const origin =
    context.source && context.source !== "commandLine" ? ` (from ${SOURCE_LABELS[context.source]})` : "";
  return `${head}${target}${origin}: expected ${expected}`;
}

// ─── Dispatch time ───

/**
 * A handler threw or rejected after successful routing.
 */
export class HandlerError extends ArgloomError {
  constructor(
    public readonly path: readonly string[],
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Command "${path.join(" ")}" failed: ${reason}`, ErrorCode.HANDLER_FAILED, { cause });
    this.name = "HandlerError";
  }
}
