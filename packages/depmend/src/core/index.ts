// Errors
export {
  EngineError,
  IOFailureError,
  TimeoutError,
  CancelledError,
  ConfigError,
  AssistantError,
  getErrorMessage,
} from "./errors.js";
export type { EngineErrorCode } from "./errors.js";

// Bounded tasks
export { runBounded, throwIfCancelled } from "./timeout.js";
export type { TaskBounds } from "./timeout.js";

// Files
export { mapInBatches } from "./batch.js";
export { discoverFiles, readTextFile, looksBinary } from "./files.js";
export type { TextFileRead, ReadLimits } from "./files.js";

// Schema
export type { Config } from "./schema.js";
export { configSchema, defaultConfig, isValidGlobPattern } from "./schema.js";

// Loader
export {
  CONFIG_FILE_NAME,
  findConfigFile,
  loadConfig,
  toEngineConfig,
  validateConfig,
  withOverrides,
} from "./loader.js";
export type { EngineConfig, ConfigOverrides, LoadConfigResult } from "./loader.js";
