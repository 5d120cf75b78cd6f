/**
 * Machine-readable error codes.
 */

export const ErrorCode = {
  DEFINITION_INVALID: "DEFINITION_INVALID",

  UNKNOWN_ARGUMENT: "UNKNOWN_ARGUMENT",
  MISSING_REQUIRED_ARGUMENT: "MISSING_REQUIRED_ARGUMENT",
  ARGUMENT_CONFLICT: "ARGUMENT_CONFLICT",
  WRONG_ARITY: "WRONG_ARITY",
  INVALID_SUBCOMMAND: "INVALID_SUBCOMMAND",
  MISSING_SUBCOMMAND: "MISSING_SUBCOMMAND",

  INVALID_VALUE: "INVALID_VALUE",
  OUT_OF_RANGE: "OUT_OF_RANGE",
  UNKNOWN_ENUM_VARIANT: "UNKNOWN_ENUM_VARIANT",

  HANDLER_FAILED: "HANDLER_FAILED",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Exit codes the caller is expected to use. */
export const ExitCode = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;
