// Types
export type {
  Arity,
  ValueKind,
  ValueKindType,
  AccumulationPolicy,
  ArgumentAction,
  ArgumentDef,
  ArgGroup,
} from "./types/argument.js";

export type {
  CommandNode,
  CommandHandler,
  HandlerResult,
  HandlerLogger,
  ExecutionContext,
  Definition,
} from "./types/command.js";

export type {
  Token,
  LongFlagToken,
  ShortFlagToken,
  PositionalToken,
  TerminatorToken,
  ShortFlagShape,
  ShortFlagLookup,
} from "./types/token.js";

export type {
  ValueSource,
  RawOccurrence,
  MatchResult,
  ResolvedValue,
  ResolvedValues,
} from "./types/values.js";
export { VALUE_SOURCE_PRIORITY } from "./types/values.js";

export type { ConfigValue, ConfigMapping, EnvironmentSnapshot, ParseSources } from "./types/config.js";
export type { ParseResult, ValueParser } from "./types/parser.js";
export type { DisplayRequest, ParseFailure, ParseOutcome, RunOutcome } from "./types/outcome.js";

// Errors
export {
  ArgloomError,
  DefinitionBuildError,
  UsageError,
  ValueError,
  HandlerError,
} from "./errors/base.js";
export type {
  BuildError,
  BuildErrorKind,
  UsageErrorKind,
  UsageErrorDetails,
  ValueErrorKind,
  ValueErrorContext,
} from "./errors/base.js";

export { ErrorCode, ExitCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";
