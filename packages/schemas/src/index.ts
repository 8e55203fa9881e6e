export type * from "./types.js";
export { WorldDefinitionSchema } from "./world.schema.js";
export { ToolInputSchemas } from "./tool-input.schema.js";
export {
  validateWorldDefinitionData,
  isWorldDefinition,
  validateToolInput,
} from "./validator.js";
export type { ValidationResult } from "./validator.js";
export { TimeoutError, withTimeout } from "./timeout.js";
export { WorldIntegrityError, ConfigError } from "./errors.js";
export { ConsoleLogger, silentLogger, isLogLevel, LOG_LEVELS } from "./logger.js";
