/**
 * Engine Configuration
 */

import { type Instant, type LocalTime, currentInstant, isValidTimeZone, parseTime, systemTimeZone } from './time-date'
import { type LogLevel, type Logger, createConsoleLogger, isLogLevel } from './logger'
import { ValidationError } from './errors'

export type EngineConfig = {
  /** IANA zone for habits without a rule; defaults to the system zone */
  timeZone?: string
  /** Daily cut-off before which habits are not replenished, `HH:MM` */
  replenishmentTime?: string
  logLevel?: LogLevel
  logger?: Logger
  now?: () => Instant
}

export type ResolvedConfig = {
  timeZone: string
  replenishmentTime: LocalTime
  logger: Logger
  now: () => Instant
}

export const DEFAULT_REPLENISHMENT_TIME = '06:00'

/**
 * Fills defaults and validates. Throws ValidationError on an unknown zone,
 * a malformed cut-off or an unknown log level.
 */
export function resolveConfig(config: EngineConfig = {}): ResolvedConfig {
  const timeZone = config.timeZone ?? systemTimeZone()
  if (!isValidTimeZone(timeZone)) {
    throw new ValidationError(`Invalid timezone: '${timeZone}'`)
  }

  const time = parseTime(config.replenishmentTime ?? DEFAULT_REPLENISHMENT_TIME)
  if (!time.ok) {
    throw new ValidationError(`Invalid replenishmentTime: '${config.replenishmentTime ?? ''}'`)
  }

  const level = config.logLevel ?? 'warn'
  if (!isLogLevel(level)) {
    throw new ValidationError(`Invalid logLevel: '${String(level)}'`)
  }

  return {
    timeZone,
    replenishmentTime: time.value,
    logger: config.logger ?? createConsoleLogger(level),
    now: config.now ?? currentInstant,
  }
}

/**
 * Reads RECURRENCE_TIMEZONE, RECURRENCE_REPLENISHMENT_TIME and
 * RECURRENCE_LOG_LEVEL. Unset or empty variables are left out.
 */
export function configFromEnv(env: Record<string, string | undefined> = process.env): EngineConfig {
  const config: EngineConfig = {}

  const timeZone = env['RECURRENCE_TIMEZONE']
  if (timeZone) config.timeZone = timeZone

  const replenishmentTime = env['RECURRENCE_REPLENISHMENT_TIME']
  if (replenishmentTime) config.replenishmentTime = replenishmentTime

  const level = env['RECURRENCE_LOG_LEVEL']
  if (level) {
    if (!isLogLevel(level)) throw new ValidationError(`Invalid RECURRENCE_LOG_LEVEL: '${level}'`)
    config.logLevel = level
  }

  return config
}
