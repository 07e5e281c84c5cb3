/**
 * Logging
 *
 * Minimal leveled logger over the console. Components take a Logger so hosts
 * can route output elsewhere or silence it in tests.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

type ConsoleSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>

export function createConsoleLogger(
  level: LogLevel = 'info',
  options: { prefix?: string; sink?: ConsoleSink } = {},
): Logger {
  const threshold = LOG_LEVELS.indexOf(level)
  const prefix = options.prefix ?? '[recurrence]'
  const sink = options.sink ?? console

  function write(at: Exclude<LogLevel, 'silent'>, message: string, context?: Record<string, unknown>) {
    if (LOG_LEVELS.indexOf(at) < threshold) return
    if (context !== undefined) sink[at](`${prefix} ${message}`, context)
    else sink[at](`${prefix} ${message}`)
  }

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  }
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
}
