export { createLogger } from "./logger/index.js";
export type { Logger, LogLevel, LogContext, LoggerOptions } from "./logger/index.js";

export { generateId } from "./utils/uuid.js";
export { validateInput } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export { ConfigValueSchema, ConfigMappingSchema, EnvironmentSchema } from "./utils/config-schema.js";

export { editDistance, closestMatch, MAX_SUGGESTION_DISTANCE } from "./utils/edit-distance.js";
