/**
 * @shelfcrawl/logger
 *
 * Structured logging for the crawler and its supporting packages.
 *
 * - JSON lines in production, colored single-line output elsewhere
 * - Log levels: debug, info, warn, error, fatal
 * - Child loggers extend the component path (`harvester:pipeline:stage`)
 *   and inherit default context
 *
 * Environment variables:
 * - LOG_LEVEL: minimum level. Default: info
 * - LOG_FORMAT: json | pretty. Default: json when NODE_ENV=production
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export type LogFormat = 'json' | 'pretty'

export interface LogContext {
  [key: string]: unknown
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: {
    name: string
    message: string
    stack?: string
  }
  [key: string]: unknown
}

/** Receives every entry that passes the level filter, already formatted. */
export type LogWriter = (level: LogLevel, line: string, entry: LogEntry) => void

export interface LoggerOptions {
  /** Overrides LOG_LEVEL */
  level?: LogLevel
  /** Overrides LOG_FORMAT */
  format?: LogFormat
  /** Defaults to the console method matching the level */
  write?: LogWriter
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value)
}

function levelFromEnv(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase()
  return isLogLevel(level) ? level : 'info'
}

function formatFromEnv(): LogFormat {
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

export function serializeError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    }
  }

  return {
    name: 'UnknownError',
    message: String(error),
  }
}

export function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

export function formatPretty(entry: LogEntry): string {
  const { timestamp, level, service, component, message, error, ...meta } = entry
  const color = LOG_COLORS[level]
  const levelStr = level.toUpperCase().padEnd(5)
  const componentPath = component ? `${service}:${component}` : service

  const metaStr = Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''
  const errorStr = error ? `\n  ${DIM}${error.stack ?? error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET} ${message}${metaStr}${errorStr}`
}

const consoleWriter: LogWriter = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line)
      break
    case 'info':
      console.info(line)
      break
    case 'warn':
      console.warn(line)
      break
    case 'error':
    case 'fatal':
      console.error(line)
      break
  }
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Create a child logger. A string extends the component path; an object only
   * adds default context.
   */
  child(componentOrContext: string | LogContext, defaultContext?: LogContext): ILogger
}

export class Logger implements ILogger {
  constructor(
    private readonly service: string,
    private readonly component: string | undefined = undefined,
    private readonly defaultContext: LogContext = {},
    private readonly options: LoggerOptions = {}
  ) {}

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    const minLevel = this.options.level ?? levelFromEnv()
    if (LOG_LEVELS[level] < LOG_LEVELS[minLevel]) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...this.defaultContext,
      ...meta,
    }

    if (this.component) {
      entry.component = this.component
    }

    if (error !== undefined) {
      entry.error = serializeError(error)
    }

    const format = this.options.format ?? formatFromEnv()
    const line = format === 'json' ? formatJson(entry) : formatPretty(entry)
    const write = this.options.write ?? consoleWriter
    write(level, line, entry)
  }

  debug(message: string, meta?: LogContext): void {
    this.log('debug', message, meta)
  }

  info(message: string, meta?: LogContext): void {
    this.log('info', message, meta)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.log('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.log('error', message, meta, error)
  }

  fatal(message: string, meta?: LogContext, error?: unknown): void {
    this.log('fatal', message, meta, error)
  }

  child(componentOrContext: string | LogContext, defaultContext: LogContext = {}): ILogger {
    if (typeof componentOrContext !== 'string') {
      return new Logger(
        this.service,
        this.component,
        { ...this.defaultContext, ...componentOrContext },
        this.options
      )
    }

    const component = this.component ? `${this.component}:${componentOrContext}` : componentOrContext
    return new Logger(this.service, component, { ...this.defaultContext, ...defaultContext }, this.options)
  }
}

/**
 * Create a logger for a service.
 *
 * @example
 * ```ts
 * const logger = createLogger('harvester')
 * const stageLog = logger.child('pipeline', { stage: 'categories' })
 * stageLog.info('Stage complete', { inputs: 12, outputs: 148 })
 * ```
 */
export function createLogger(service: string, options: LoggerOptions = {}): ILogger {
  return new Logger(service, undefined, {}, options)
}

/** Logger that drops everything. */
export const silentLogger: ILogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  fatal: () => undefined,
  child: () => silentLogger,
}
