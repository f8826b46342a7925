/**
 * @fanout/core
 * Core utilities shared by fanout services
 */

// Config
export {
  loadBaseConfig,
  getBaseConfig,
  resetBaseConfig,
  type BaseConfig,
  type BaseEnv,
  type ResearchSettings,
} from "./config.js";

// Logger
export {
  logger,
  type LogLevel,
  type LogFormat,
  type LogContext,
  type LogEntry,
  type LogHandler,
} from "./logger.js";

// Errors
export {
  FanoutError,
  ConfigError,
  ValidationError,
  ClassificationError,
  StorageError,
  type StorageErrorReason,
  CapabilityError,
  isFanoutError,
  isStorageError,
  isRetryableError,
  errorMessage,
} from "./errors.js";
