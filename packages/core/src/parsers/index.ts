export { createParserRegistry } from "./registry.js";
export type { ParserRegistry } from "./registry.js";
export {
  parseBoolean,
  parseString,
  parsePath,
  enumParser,
  listParser,
  keyValueParser,
} from "./builtin.js";
export type { KeyValuePair } from "./builtin.js";
