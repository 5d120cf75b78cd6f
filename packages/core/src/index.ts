// Engine
export { createEngine } from "./engine/index.js";
export type { Engine, EngineOptions } from "./engine/index.js";

// Definition
export {
  CommandBuilder,
  createCommand,
  arity,
  finalizeDefinition,
  displayName,
  flagSpellings,
  describeKind,
  isMultiValued,
  isPresenceOnly,
} from "./definition/index.js";
export type {
  ArgumentOptions,
  ArgumentShorthand,
  CommandSpec,
  GroupOptions,
  CompiledDefinition,
  CompiledGroup,
  CompiledNode,
  FinalizeOptions,
  FinalizeResult,
} from "./definition/index.js";

// Tokenizer
export { tokenize, NO_SHORT_FLAGS } from "./tokenizer/index.js";

// Value parsers
export {
  createParserRegistry,
  parseBoolean,
  parseString,
  parsePath,
  enumParser,
  listParser,
  keyValueParser,
} from "./parsers/index.js";
export type { ParserRegistry, KeyValuePair } from "./parsers/index.js";

// Pipeline stages
export { matchArguments } from "./matcher/index.js";
export type { MatchOutcome } from "./matcher/index.js";
export { resolveValues, configPath, ResolvedValueSet } from "./resolution/index.js";
export { validateConstraints } from "./validation/index.js";
export { createRouter } from "./routing/index.js";
export type { Route, Router, DispatchOptions } from "./routing/index.js";
