/**
 * Structured Logging
 *
 * Levelled console logging with timestamps and structured context.
 * The minimum level comes from configuration (see services/config).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  context?: Record<string, unknown>
  error?: {
    name: string
    message: string
    stack?: string
  }
}

export interface LoggerConfig {
  minLevel: LogLevel
  enableConsole: boolean
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: 'info',
  enableConsole: true
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value)
}

/**
 * JSON.stringify replacer: amounts are bigints
 */
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value
}

class Logger {
  private config: LoggerConfig

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config }
  }

  /**
   * Configure the logger
   */
  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.minLevel]
  }

  private formatContext(context?: Record<string, unknown>): string {
    if (!context || Object.keys(context).length === 0) {
      return ''
    }
    return ' ' + JSON.stringify(context, jsonReplacer)
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack
      }
    }

    return entry
  }

  private logToConsole(entry: LogEntry): void {
    if (!this.config.enableConsole) return

    const prefix = `[${entry.timestamp.slice(11, 19)}]`
    const contextStr = this.formatContext(entry.context)

    switch (entry.level) {
      case 'debug':
        console.debug(`${prefix} DEBUG: ${entry.message}${contextStr}`)
        break
      case 'info':
        console.info(`${prefix} INFO: ${entry.message}${contextStr}`)
        break
      case 'warn':
        console.warn(`${prefix} WARN: ${entry.message}${contextStr}`)
        if (entry.error) {
          console.warn(entry.error.stack || entry.error.message)
        }
        break
      case 'error':
        console.error(`${prefix} ERROR: ${entry.message}${contextStr}`)
        if (entry.error) {
          console.error(entry.error.stack || entry.error.message)
        }
        break
    }
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (!this.shouldLog(level)) return

    const entry = this.createEntry(level, message, context, error)
    this.logToConsole(entry)
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context)
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context)
  }

  warn(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.log('warn', message, context, error)
  }

  error(message: string, error?: Error | unknown, context?: Record<string, unknown>): void {
    const errorObj = error instanceof Error ? error : undefined
    const errorContext = error && !(error instanceof Error)
      ? { ...context, errorValue: String(error) }
      : context

    this.log('error', message, errorContext, errorObj)
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): ChildLogger {
    return new ChildLogger(this, context)
  }
}

/**
 * Child logger that includes parent context
 */
class ChildLogger {
  private parent: Logger
  private baseContext: Record<string, unknown>

  constructor(parent: Logger, baseContext: Record<string, unknown>) {
    this.parent = parent
    this.baseContext = baseContext
  }

  private mergeContext(context?: Record<string, unknown>): Record<string, unknown> {
    return { ...this.baseContext, ...context }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.parent.debug(message, this.mergeContext(context))
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.parent.info(message, this.mergeContext(context))
  }

  warn(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.parent.warn(message, this.mergeContext(context), error)
  }

  error(message: string, error?: Error | unknown, context?: Record<string, unknown>): void {
    this.parent.error(message, error, this.mergeContext(context))
  }
}

/**
 * Shared logger. Starts at the level loadConfig would choose when no level
 * is configured; configureFromEnv applies the configured one.
 */
export const logger = new Logger({
  minLevel: process.env.NODE_ENV === 'production' ? 'info' : 'debug'
})

export { Logger, ChildLogger }

export const feeLogger = logger.child({ module: 'fees' })
