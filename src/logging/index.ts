/**
 * Logging Module
 *
 * Structured JSON logging for the library's own diagnostics and the
 * logging sink.
 */

export {
  type LogLevel,
  type LogMetadata,
  type LogContext,
  type ErrorInfo,
  type LogEntry,
  type Logger,
  type LogOutput,
  type LoggerOptions,
  LOG_LEVELS,
  isLogLevel,
  createLogger,
} from './logger.js';
