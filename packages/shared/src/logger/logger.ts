/**
 * Structured logger with TraceID support
 */

import type { TraceContext } from './trace'

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  SILENT = 'silent',
}

/**
 * Log level priority for filtering
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.SILENT]: Number.POSITIVE_INFINITY,
}

/**
 * Log entry structure
 */
export interface LogEntry {
  level: LogLevel
  message: string
  timestamp: string
  traceId?: string
  spanId?: string
  context?: Record<string, unknown>
  error?: {
    name: string
    message: string
    stack?: string
  }
}

/**
 * Receives every entry that passes the level filter
 */
export type LogSink = (entry: LogEntry) => void

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel
  enableJson: boolean
  /** Replaces console output when set */
  sink?: LogSink
}

/**
 * Logger class with TraceID support and bound context
 */
export class Logger {
  private config: LoggerConfig
  private traceContext?: TraceContext
  private bindings: Record<string, unknown>

  constructor(config: Partial<LoggerConfig> = {}, bindings: Record<string, unknown> = {}) {
    this.config = {
      level: config.level ?? LogLevel.INFO,
      enableJson: config.enableJson ?? false,
      sink: config.sink,
    }
    this.bindings = bindings
  }

  get level(): LogLevel {
    return this.config.level
  }

  /**
   * Set trace context for all subsequent logs
   */
  setTraceContext(context: TraceContext): void {
    this.traceContext = context
  }

  /**
   * Clear trace context
   */
  clearTraceContext(): void {
    this.traceContext = undefined
  }

  /**
   * Create a child logger sharing this configuration, with extra bound context
   */
  child(bindings: Record<string, unknown>, traceContext?: TraceContext): Logger {
    const childLogger = new Logger(this.config, { ...this.bindings, ...bindings })
    const trace = traceContext ?? this.traceContext
    if (trace) {
      childLogger.setTraceContext(trace)
    }
    return childLogger
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context)
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context)
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context)
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(
      LogLevel.ERROR,
      message,
      context,
      error
        ? {
            name: error.name,
            message: error.message,
            stack: error.stack,
          }
        : undefined
    )
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.level]
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: LogEntry['error']
  ): void {
    if (!this.isLevelEnabled(level)) {
      return
    }

    const merged = { ...this.bindings, ...context }
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      traceId: this.traceContext?.traceId,
      spanId: this.traceContext?.spanId,
      context: Object.keys(merged).length > 0 ? merged : undefined,
      error,
    }

    if (this.config.sink) {
      this.config.sink(entry)
      return
    }
    this.writeToConsole(entry)
  }

  /**
   * Write log entry to console
   */
  private writeToConsole(entry: LogEntry): void {
    if (this.config.enableJson) {
      console.log(JSON.stringify(entry))
      return
    }

    const { level, message, timestamp, traceId, spanId, context } = entry
    const contextStr = context ? ` ${JSON.stringify(context)}` : ''
    const traceStr = traceId ? ` [trace:${spanId ?? traceId}]` : ''

    const coloredMessage = this.colorizeLog(
      level,
      `[${timestamp}] ${level.toUpperCase()}:${traceStr} ${message}${contextStr}`
    )

    console.log(coloredMessage)
  }

  /**
   * Add color to log messages (for terminal output)
   */
  private colorizeLog(level: LogLevel, message: string): string {
    const colors: Record<LogLevel, string> = {
      [LogLevel.DEBUG]: '\x1b[36m', // Cyan
      [LogLevel.INFO]: '\x1b[32m', // Green
      [LogLevel.WARN]: '\x1b[33m', // Yellow
      [LogLevel.ERROR]: '\x1b[31m', // Red
      [LogLevel.SILENT]: '',
    }
    const reset = '\x1b[0m'
    return `${colors[level]}${message}${reset}`
  }
}

/**
 * Parse a log level name, case-insensitively. Unknown names mean silent.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG
    case 'INFO':
      return LogLevel.INFO
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN
    case 'ERROR':
      return LogLevel.ERROR
    default:
      return LogLevel.SILENT
  }
}

export function createLogger(config?: Partial<LoggerConfig>): Logger {
  return new Logger(config)
}
