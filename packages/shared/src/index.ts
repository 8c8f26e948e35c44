/**
 * Strata - Shared Package
 * Types, validation, errors, configuration, logging, and utilities
 * @module @strata/shared
 */

// Types
export * from './types/index';

// Errors
export * from './errors/index';

// Validation
export * from './validation/index';

// Configuration
export * from './config/index';

// Logging
export {
  Logger,
  createLogger,
  createServiceLogger,
  isLogLevel,
  isTestEnvironment,
  logger,
} from './logging/logger';

export type { LogLevel, LogMeta, LogEntry, LoggerConfig } from './logging/logger';

// Utilities
export {
  generateUUID,
  isValidUUID,
  sleep,
  parseDuration,
  isPlainObject,
} from './utils/index';
