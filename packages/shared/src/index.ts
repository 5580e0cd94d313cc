/**
 * faultline - Shared Package
 * Types, validation, errors and logging
 * @module @faultline/shared
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Validation
export * from './validation/index.js';

// Logging
export {
  Logger,
  createLogger,
  createServiceLogger,
  createFileOutput,
  formatPretty,
  setLogOutput,
  isTestEnvironment,
  isLogLevel,
  logger,
  type LogLevel,
  type LogMeta,
  type LogEntry,
  type LogOutput,
  type LoggerConfig,
} from './logging/logger.js';
