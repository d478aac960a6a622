/**
 * Shared logger system for the Chronicle SDK
 *
 * This module provides a structured logging system with:
 * - Multiple log levels (debug, info, warn, error, silent)
 * - TraceID support for following one request across retries
 * - Bound context through child loggers
 * - Pluggable sinks, with JSON and human-readable console output by default
 */

export {
  LogLevel,
  Logger,
  createLogger,
  parseLogLevel,
  type LogEntry,
  type LogSink,
  type LoggerConfig,
} from './logger'
export {
  generateTraceId,
  createTraceContext,
  attemptSpan,
  type TraceContext,
} from './trace'
