export { CommandBuilder, createCommand, arity } from "./builder.js";
export type { ArgumentOptions, ArgumentShorthand, CommandSpec, GroupOptions } from "./builder.js";
export { finalizeDefinition } from "./finalize.js";
export type {
  CompiledDefinition,
  CompiledGroup,
  CompiledNode,
  FinalizeOptions,
  FinalizeResult,
} from "./finalize.js";
export {
  minValues,
  maxValues,
  isPresenceOnly,
  isMultiValued,
  isVariableArity,
  displayName,
  flagSpellings,
  describeKind,
} from "./arguments.js";
