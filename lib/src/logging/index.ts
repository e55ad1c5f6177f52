/**
 * Logging Module
 */

export {
  LogLevel,
  LogLevelName,
  LogLevelSchema,
  LogLevelNameSchema,
  type LogEntry,
  LogFormat,
  LogFormatSchema,
  LoggerConfigSchema,
  type LoggerConfig,
  createDefaultLoggerConfig,
  LogColors,
  LogLevelColors,
  parseLogLevel,
  shouldLog,
  formatError,
} from './types.js';

export {
  Logger,
  createLogger,
  createRootLogger,
  createSilentLogger,
} from './logger.js';
