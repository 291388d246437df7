/**
 * @rowharvest/logger
 *
 * Structured logging for the harvester and its tools.
 *
 * Features:
 * - JSON-formatted output for production (machine-parseable)
 * - Colored output for development (human-readable)
 * - ISO 8601 timestamps
 * - Log levels: debug, info, warn, error, fatal
 * - Child loggers with inherited context
 * - Optional redaction of credential-like fields
 *
 * Environment variables:
 * - LOG_LEVEL: Minimum log level (debug, info, warn, error, fatal). Default: info
 * - LOG_FORMAT: Output format (json, pretty). Default: json in production, pretty in development
 * - LOG_REDACT: Set to "true" to redact sensitive fields. Default: false
 * - NODE_ENV: Used to determine defaults
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface LogContext {
  [key: string]: unknown
}

interface LogEntry {
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

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
  fatal: '\x1b[35m', // Magenta
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

const REDACTED = '[REDACTED]'

/**
 * Keys whose values never reach the output when redaction is on.
 * Matched case-insensitively against every top-level context key.
 */
const SENSITIVE_KEYS = new Set([
  'authorization',
  'cookie',
  'cookies',
  'password',
  'secret',
  'token',
  'apikey',
  'storagestate',
])

let levelOverride: LogLevel | null = null
let redactionOverride: boolean | null = null

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS
}

function getLogLevel(): LogLevel {
  if (levelOverride) {
    return levelOverride
  }
  const level = process.env.LOG_LEVEL?.toLowerCase()
  if (isLogLevel(level)) {
    return level
  }
  return 'info'
}

function getLogFormat(): 'json' | 'pretty' {
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  // Default: pretty in development, json in production
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

function isRedactionEnabled(): boolean {
  if (redactionOverride !== null) {
    return redactionOverride
  }
  return process.env.LOG_REDACT === 'true'
}

/**
 * Force a minimum level regardless of LOG_LEVEL (tests, CLI --verbose).
 * Pass null to fall back to the environment again.
 */
export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level
}

/**
 * Toggle redaction regardless of LOG_REDACT.
 * Pass null to fall back to the environment again.
 */
export function setRedactionEnabled(enabled: boolean | null): void {
  redactionOverride = enabled
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[getLogLevel()]
}

function formatError(error: unknown): LogEntry['error'] | undefined {
  if (!error) return undefined

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

function redact(context: LogContext): LogContext {
  const out: LogContext = {}
  for (const [key, value] of Object.entries(context)) {
    out[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTED : value
  }
  return out
}

function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

function formatPretty(entry: LogEntry): string {
  const color = LOG_COLORS[entry.level]
  const levelStr = entry.level.toUpperCase().padEnd(5)

  // Build component path
  const componentPath = entry.component
    ? `${entry.service}:${entry.component}`
    : entry.service

  // Extract known fields
  const { timestamp, level: _level, service: _service, component: _component, message, error, ...meta } = entry

  const metaStr =
    Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''

  const errorStr = error ? `\n  ${DIM}${error.stack || error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET} ${message}${metaStr}${errorStr}`
}

function output(entry: LogEntry): void {
  const format = getLogFormat()
  const formatted = format === 'json' ? formatJson(entry) : formatPretty(entry)

  switch (entry.level) {
    case 'debug':
      console.debug(formatted)
      break
    case 'info':
      console.info(formatted)
      break
    case 'warn':
      console.warn(formatted)
      break
    case 'error':
    case 'fatal':
      console.error(formatted)
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
   * Create a child logger
   * @param componentOrContext - Component name (string) or context object
   * @param defaultContext - Optional default context (only used when first arg is a string)
   */
  child(componentOrContext: string | LogContext, defaultContext?: LogContext): ILogger
}

export class Logger implements ILogger {
  private readonly service: string
  private readonly component?: string
  private readonly defaultContext: LogContext

  constructor(service: string, component?: string, defaultContext: LogContext = {}) {
    this.service = service
    this.component = component
    this.defaultContext = defaultContext
  }

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (!shouldLog(level)) return

    const errorData = error ? formatError(error) : undefined
    const context = { ...this.defaultContext, ...meta }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...(isRedactionEnabled() ? redact(context) : context),
    }

    if (this.component) {
      entry.component = this.component
    }

    if (errorData) {
      entry.error = errorData
    }

    output(entry)
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
    if (typeof componentOrContext === 'object') {
      return new Logger(this.service, this.component, {
        ...this.defaultContext,
        ...componentOrContext,
      })
    }
    const newComponent = this.component
      ? `${this.component}:${componentOrContext}`
      : componentOrContext
    return new Logger(this.service, newComponent, {
      ...this.defaultContext,
      ...defaultContext,
    })
  }
}

/**
 * A logger that drops everything. Handy as a default in library code
 * and as a stand-in in tests.
 */
export const silentLogger: ILogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  fatal: () => {},
  child: () => silentLogger,
}

/**
 * Create a logger for a service
 *
 * @param service - The service name (e.g., 'harvester', 'cli')
 *
 * @example
 * ```ts
 * import { createLogger } from '@rowharvest/logger'
 *
 * const logger = createLogger('harvester')
 * logger.info('Run started', { urls: 12 })
 *
 * const fetchLogger = logger.child('fetch')
 * fetchLogger.warn('Fetch failed', { statusCode: 404 })
 * ```
 */
export function createLogger(service: string): ILogger {
  return new Logger(service)
}
