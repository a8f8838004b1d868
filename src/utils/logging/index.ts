/**
 * Logging exports
 */

export { createLogger, logger, resolveLogLevel, type LoggerOptions, type LogLevel } from './logger.js';
export { createStructuredLogger, type StructuredLoggerOptions } from './structured-logger.js';
