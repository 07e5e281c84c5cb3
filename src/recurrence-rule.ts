/**
 * Recurrence Rule
 *
 * Immutable description of how a task or habit repeats. Construction
 * normalizes the input (interval floor, sorted weekdays, day-of-month clamp)
 * and rejects shapes the evaluator cannot answer for.
 */

import {
  type Instant,
  type WeekdayNumber,
  SHORT_WEEKDAY_NAMES,
  isWeekdayNumber,
  parseTime,
  hourOf,
  minuteOf,
  systemTimeZone,
} from './time-date'
import { type Result, Ok, Err, unwrap } from './result'

export { InvalidRuleError } from './errors'
import { InvalidRuleError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type Frequency = 'daily' | 'weekly' | 'monthly' | 'yearly' | 'custom'

export const FREQUENCIES: readonly Frequency[] = ['daily', 'weekly', 'monthly', 'yearly', 'custom']

export type RepeatMode = 'fromOriginalDate' | 'fromCompletionDate'

export const REPEAT_MODES: readonly RepeatMode[] = ['fromOriginalDate', 'fromCompletionDate']

export type PreferredTime = {
  readonly hour: number
  readonly minute: number
}

export type RecurrenceRule = {
  readonly frequency: Frequency
  readonly interval: number
  readonly daysOfWeek: readonly WeekdayNumber[] | null
  readonly dayOfMonth: number | null
  readonly repeatMode: RepeatMode
  readonly recreateIfIncomplete: boolean
  readonly maxOccurrences: number | null
  readonly endDate: Instant | null
  readonly preferredTime: PreferredTime | null
  /** IANA zone used for every day/week/month boundary of this rule */
  readonly timeZone: string
}

export type RecurrenceRuleInput = {
  frequency: Frequency
  interval?: number
  daysOfWeek?: Iterable<number> | null
  dayOfMonth?: number | null
  repeatMode?: RepeatMode
  recreateIfIncomplete?: boolean
  maxOccurrences?: number | null
  endDate?: Instant | null
  /** `{ hour, minute }` or an `HH:MM` string */
  preferredTime?: PreferredTime | string | null
  timeZone?: string
}

type RuleOptions = Omit<RecurrenceRuleInput, 'frequency'>

/** Days of month above this are pulled back so every month has the day. */
export const MAX_MONTHLY_DAY = 28

// ============================================================================
// Guards
// ============================================================================

export function isFrequency(value: string): value is Frequency {
  return (FREQUENCIES as readonly string[]).includes(value)
}

export function isRepeatMode(value: string): value is RepeatMode {
  return (REPEAT_MODES as readonly string[]).includes(value)
}

// ============================================================================
// Validation
// ============================================================================

export function ruleProblems(rule: RecurrenceRule): string[] {
  const problems: string[] = []

  if (!Number.isInteger(rule.interval) || rule.interval < 1) {
    problems.push(`interval must be a positive integer, got ${rule.interval}`)
  }

  if (rule.daysOfWeek != null && !rule.daysOfWeek.every(isWeekdayNumber)) {
    problems.push('daysOfWeek entries must be 1 (Sunday) through 7 (Saturday)')
  }

  if (rule.frequency === 'weekly' && (rule.daysOfWeek == null || rule.daysOfWeek.length === 0)) {
    problems.push('weekly rules require at least one day of the week')
  }

  if (rule.dayOfMonth != null && (!Number.isInteger(rule.dayOfMonth) || rule.dayOfMonth < 1 || rule.dayOfMonth > 31)) {
    problems.push(`dayOfMonth must be 1-31, got ${rule.dayOfMonth}`)
  }

  if (rule.maxOccurrences != null && (!Number.isInteger(rule.maxOccurrences) || rule.maxOccurrences < 1)) {
    problems.push(`maxOccurrences must be a positive integer, got ${rule.maxOccurrences}`)
  }

  const time = rule.preferredTime
  if (time != null) {
    const hourOk = Number.isInteger(time.hour) && time.hour >= 0 && time.hour <= 23
    const minuteOk = Number.isInteger(time.minute) && time.minute >= 0 && time.minute <= 59
    if (!hourOk || !minuteOk) problems.push(`preferredTime out of range: ${time.hour}:${time.minute}`)
  }

  return problems
}

export function isValidRule(rule: RecurrenceRule): boolean {
  return ruleProblems(rule).length === 0
}

// ============================================================================
// Construction
// ============================================================================

function normalizePreferredTime(value: PreferredTime | string | null | undefined): Result<PreferredTime | null, InvalidRuleError> {
  if (value == null) return Ok(null)
  if (typeof value !== 'string') return Ok({ hour: value.hour, minute: value.minute })

  const parsed = parseTime(value)
  if (!parsed.ok) return Err(new InvalidRuleError(`Invalid preferredTime: '${value}'`))
  return Ok({ hour: hourOf(parsed.value), minute: minuteOf(parsed.value) })
}

export function createRecurrenceRule(input: RecurrenceRuleInput): Result<RecurrenceRule, InvalidRuleError> {
  if (!isFrequency(input.frequency)) {
    return Err(new InvalidRuleError(`Unknown frequency: '${String(input.frequency)}'`))
  }

  const time = normalizePreferredTime(input.preferredTime)
  if (!time.ok) return time

  const days = input.daysOfWeek != null ? [...new Set(input.daysOfWeek)].sort((a, b) => a - b) : null
  if (days != null && !days.every(isWeekdayNumber)) {
    return Err(new InvalidRuleError('daysOfWeek entries must be 1 (Sunday) through 7 (Saturday)'))
  }

  const dayOfMonth = input.dayOfMonth != null && input.dayOfMonth > MAX_MONTHLY_DAY
    ? MAX_MONTHLY_DAY
    : input.dayOfMonth ?? null

  const rule: RecurrenceRule = {
    frequency: input.frequency,
    interval: Math.max(1, Math.floor(input.interval ?? 1)),
    daysOfWeek: days != null ? Object.freeze(days.filter(isWeekdayNumber)) : null,
    dayOfMonth,
    repeatMode: input.repeatMode ?? 'fromOriginalDate',
    recreateIfIncomplete: input.recreateIfIncomplete ?? true,
    maxOccurrences: input.maxOccurrences ?? null,
    endDate: input.endDate ?? null,
    preferredTime: time.value != null ? Object.freeze(time.value) : null,
    timeZone: input.timeZone ?? systemTimeZone(),
  }

  const problems = ruleProblems(rule)
  if (problems.length > 0) return Err(new InvalidRuleError(problems.join('; ')))

  return Ok(Object.freeze(rule))
}

// ============================================================================
// Rule Constructors
// ============================================================================

export function dailyRule(options: RuleOptions = {}): RecurrenceRule {
  return unwrap(createRecurrenceRule({ ...options, frequency: 'daily' }))
}

export function weeklyRule(daysOfWeek: Iterable<number>, options: RuleOptions = {}): RecurrenceRule {
  return unwrap(createRecurrenceRule({ ...options, frequency: 'weekly', daysOfWeek }))
}

export function monthlyRule(dayOfMonth: number, options: RuleOptions = {}): RecurrenceRule {
  return unwrap(createRecurrenceRule({ ...options, frequency: 'monthly', dayOfMonth }))
}

export function yearlyRule(options: RuleOptions = {}): RecurrenceRule {
  return unwrap(createRecurrenceRule({ ...options, frequency: 'yearly' }))
}

export function customRule(interval: number, options: RuleOptions = {}): RecurrenceRule {
  return unwrap(createRecurrenceRule({ ...options, frequency: 'custom', interval }))
}

/** Monday through Friday */
export function weekdaysRule(options: RuleOptions = {}): RecurrenceRule {
  return weeklyRule([2, 3, 4, 5, 6], options)
}

/** Saturday and Sunday */
export function weekendsRule(options: RuleOptions = {}): RecurrenceRule {
  return weeklyRule([1, 7], options)
}

// ============================================================================
// Display
// ============================================================================

function ordinal(day: number): string {
  if (day % 100 >= 11 && day % 100 <= 13) return `${day}th`
  switch (day % 10) {
    case 1: return `${day}st`
    case 2: return `${day}nd`
    case 3: return `${day}rd`
    default: return `${day}th`
  }
}

function formatPreferredTime(time: PreferredTime): string {
  return `${String(time.hour).padStart(2, '0')}:${String(time.minute).padStart(2, '0')}`
}

export function describeRule(rule: RecurrenceRule): string {
  const n = rule.interval
  let text: string

  switch (rule.frequency) {
    case 'daily':
      text = n === 1 ? 'Daily' : `Every ${n} days`
      break
    case 'weekly': {
      const names = (rule.daysOfWeek ?? []).map(d => SHORT_WEEKDAY_NAMES[d - 1])
      const prefix = n === 1 ? 'Weekly' : `Every ${n} weeks`
      text = names.length > 0 ? `${prefix} on ${names.join(', ')}` : prefix
      break
    }
    case 'monthly': {
      const prefix = n === 1 ? 'Monthly' : `Every ${n} months`
      text = rule.dayOfMonth != null ? `${prefix} on the ${ordinal(rule.dayOfMonth)}` : prefix
      break
    }
    case 'yearly':
      text = n === 1 ? 'Yearly' : `Every ${n} years`
      break
    case 'custom':
      text = `Every ${n} ${n === 1 ? 'day' : 'days'} (custom)`
      break
  }

  if (rule.preferredTime) text += ` at ${formatPreferredTime(rule.preferredTime)}`
  if (rule.repeatMode === 'fromCompletionDate') text += ' after completion'
  return text
}
