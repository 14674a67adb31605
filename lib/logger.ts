/**
 * Secure logging utilities
 * Prevents sensitive information from being logged in production
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

const isProduction = process.env.NODE_ENV === 'production'

function parseLevel(value: string | undefined): LogLevel {
  const level = value?.toLowerCase()
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error' || level === 'silent') {
    return level
  }
  return process.env.NODE_ENV === 'test' ? 'warn' : 'info'
}

let currentLevel: LogLevel = parseLevel(process.env.LOG_LEVEL)

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel]
}

const sensitiveKeys = [
  'password',
  'secret',
  'token',
  'key',
  'auth',
  'credential',
  'api_key',
  'access_key',
  'secret_key',
]

/**
 * Sanitize data before logging
 */
export function sanitizeForLogging(data: unknown): unknown {
  if (typeof data !== 'object' || data === null) {
    return data
  }

  if (Array.isArray(data)) {
    return data.map(sanitizeForLogging)
  }

  if (data instanceof Error) {
    return { message: data.message, name: data.name }
  }

  const sanitized: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(data)) {
    const lowerKey = key.toLowerCase()
    const isSensitive = sensitiveKeys.some(sk => lowerKey.includes(sk))

    if (isSensitive && isProduction) {
      sanitized[key] = '[REDACTED]'
    } else if (typeof value === 'object' && value !== null) {
      sanitized[key] = sanitizeForLogging(value)
    } else {
      sanitized[key] = value
    }
  }

  return sanitized
}

function prepare(args: unknown[]): unknown[] {
  return isProduction ? args.map(sanitizeForLogging) : args
}

export interface Logger {
  debug: (...args: unknown[]) => void
  log: (...args: unknown[]) => void
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (message: string, error?: unknown) => void
}

function createLogger(prefix?: string): Logger {
  const withPrefix = (args: unknown[]): unknown[] => {
    if (!prefix) return args
    const [first, ...rest] = args
    return typeof first === 'string' ? [`${prefix} ${first}`, ...rest] : [prefix, ...args]
  }

  return {
    debug: (...args: unknown[]) => {
      if (enabled('debug')) console.debug(...prepare(withPrefix(args)))
    },

    log: (...args: unknown[]) => {
      if (enabled('info')) console.log(...prepare(withPrefix(args)))
    },

    info: (...args: unknown[]) => {
      if (enabled('info')) console.info(...prepare(withPrefix(args)))
    },

    warn: (...args: unknown[]) => {
      if (enabled('warn')) console.warn(...prepare(withPrefix(args)))
    },

    error: (message: string, error?: unknown) => {
      if (!enabled('error')) return
      const text = prefix ? `${prefix} ${message}` : message
      if (error === undefined) {
        console.error(text)
      } else if (!isProduction) {
        console.error(text, error)
      } else {
        // In production, only log error messages, not full error objects
        console.error(text, sanitizeForLogging(error))
      }
    },
  }
}

/**
 * Safe logger that redacts sensitive information in production
 */
export const logger = createLogger()

/** Logger whose lines start with a component tag, e.g. `[SYNC]`. */
export function scopedLogger(tag: string): Logger {
  return createLogger(`[${tag}]`)
}
