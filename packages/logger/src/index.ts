/**
 * @rarity-lens/logger
 *
 * Structured logging shared by every Rarity Lens workspace.
 *
 * - JSON lines in production, colored single-line output in development
 * - ISO 8601 timestamps
 * - Levels: debug, info, warn, error, fatal
 * - Child loggers that extend the component path and inherited context
 * - requestId correlation through AsyncLocalStorage (see request-context.ts)
 * - Redaction of secret-looking metadata keys
 *
 * Environment variables (read on every write unless overridden by options):
 * - LOG_LEVEL: debug | info | warn | error | fatal. Default: info
 * - LOG_FORMAT: json | pretty. Default: json in production, pretty otherwise
 */

import { getRequestContext } from './request-context'

export {
  getRequestContext,
  resolveRequestId,
  runWithRequestContext,
  type RequestContext,
} from './request-context'

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
  requestId?: string
  message: string
  error?: {
    name: string
    message: string
    stack?: string
  }
  [key: string]: unknown
}

export type LogSink = (level: LogLevel, line: string) => void

export interface LoggerOptions {
  level?: LogLevel
  format?: LogFormat
  /** Replaces console output; used by tests and by anything piping logs elsewhere */
  sink?: LogSink
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

const REDACTED = '[REDACTED]'
const SENSITIVE_KEY = /password|secret|token|authorization|cookie|api[-_]?key/i

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value)
}

function envLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase()
  return isLogLevel(level) ? level : 'info'
}

function envFormat(): LogFormat {
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

function formatError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack }
  }
  return { name: 'UnknownError', message: String(error) }
}

export function redact(meta: LogContext): LogContext {
  const result: LogContext = {}
  for (const [key, value] of Object.entries(meta)) {
    if (SENSITIVE_KEY.test(key)) {
      result[key] = REDACTED
    } else if (value && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date)) {
      result[key] = redact(Object.fromEntries(Object.entries(value)))
    } else {
      result[key] = value
    }
  }
  return result
}

export function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

export function formatPretty(entry: LogEntry): string {
  const { timestamp, level, service, component, requestId, message, error, ...meta } = entry
  const color = LOG_COLORS[level]
  const levelStr = level.toUpperCase().padEnd(5)
  const componentPath = component ? `${service}:${component}` : service
  const requestStr = requestId ? ` ${DIM}(${requestId})${RESET}` : ''
  const metaStr = Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''
  const errorStr = error ? `\n  ${DIM}${error.stack || error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET}${requestStr} ${message}${metaStr}${errorStr}`
}

function consoleSink(level: LogLevel, line: string): void {
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
   * Child logger whose component is appended to this one's
   * (`api` + `cache` logs as `api:cache`).
   */
  child(component: string, defaultContext?: LogContext): ILogger
}

export class Logger implements ILogger {
  constructor(
    private readonly service: string,
    private readonly component: string | undefined = undefined,
    private readonly defaultContext: LogContext = {},
    private readonly options: LoggerOptions = {}
  ) {}

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    const minimum = this.options.level ?? envLevel()
    if (LOG_LEVELS[level] < LOG_LEVELS[minimum]) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...redact({ ...this.defaultContext, ...meta }),
    }

    if (this.component) {
      entry.component = this.component
    }

    const requestId = getRequestContext()?.requestId
    if (requestId) {
      entry.requestId = requestId
    }

    if (error !== undefined) {
      entry.error = formatError(error)
    }

    const format = this.options.format ?? envFormat()
    const line = format === 'json' ? formatJson(entry) : formatPretty(entry)
    const sink = this.options.sink ?? consoleSink
    sink(level, line)
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

  child(component: string, defaultContext: LogContext = {}): ILogger {
    const path = this.component ? `${this.component}:${component}` : component
    return new Logger(this.service, path, { ...this.defaultContext, ...defaultContext }, this.options)
  }
}

/**
 * Create the root logger for a service.
 *
 * @example
 * ```ts
 * const logger = createLogger('api')
 * logger.child('cache').info('Cache store opened', { driver: 'sqlite' })
 * ```
 */
export function createLogger(service: string, options: LoggerOptions = {}): ILogger {
  return new Logger(service, undefined, {}, options)
}
