/**
 * Logging Module
 *
 * Structured JSON logging shared by the tracing components.
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
  createLogger,
  isLogLevel,
} from './logger.js';
