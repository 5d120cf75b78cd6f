export { resolveValues, configPath } from "./precedence.js";
export { ResolvedValueSet } from "./resolved-values.js";
