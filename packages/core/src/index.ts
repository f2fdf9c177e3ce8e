/**
 * @deepsearch/core
 * Core utilities for the deep-search workspaces
 */

// Config
export {
  loadBaseConfig,
  getBaseConfig,
  resetBaseConfig,
  requireEnv,
  getEnv,
  MAX_SEARCH_RESULTS,
  type BaseConfig,
  type BaseEnv,
} from "./config.js";

// Logger
export {
  logger,
  type LogLevel,
  type LogFormat,
  type LogContext,
  type LogEntry,
  type LogHandler,
  type ChildLogger,
} from "./logger.js";

// Errors
export {
  DeepSearchError,
  ConfigError,
  AgentError,
  MaxTurnsExceededError,
  SearchError,
  ExtractionError,
  NetworkError,
  ValidationError,
  isDeepSearchError,
  isRetryableError,
  wrapError,
} from "./errors.js";
