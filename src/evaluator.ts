/**
 * Recurrence Rule Evaluator
 *
 * Pure functions that turn a rule and an anchor instant into future
 * occurrences. All calendar math runs on the wall clock of the rule's zone,
 * so "every day at 09:00" stays at 09:00 across DST changes.
 *
 * endDate and maxOccurrences are series policy and live in occurrence-policy.
 */

import {
  type Instant,
  type LocalDate,
  addDays,
  addMonths,
  dateOf,
  dayOf,
  daysBetween,
  daysInMonth,
  fromZoned,
  makeDateTime,
  makeTime,
  monthOf,
  monthsBetween,
  resolveTimeZone,
  startOfWeek,
  timeOf,
  toZoned,
  weekdayOf,
  yearOf,
} from './time-date'
import { type RecurrenceRule, isValidRule } from './recurrence-rule'

// ============================================================================
// Next Date (local calendar)
// ============================================================================

function nextLocalDate(rule: RecurrenceRule, from: LocalDate): LocalDate | null {
  const n = rule.interval

  switch (rule.frequency) {
    case 'daily':
    case 'custom':
      return addDays(from, n)

    case 'weekly': {
      const days = rule.daysOfWeek ?? []
      const first = days[0]
      if (first === undefined) return null

      const current = weekdayOf(from)
      const later = days.find(d => d > current)
      if (later !== undefined) return addDays(from, later - current)
      return addDays(from, 7 * n + (first - current))
    }

    case 'monthly':
      return addMonths(from, n, rule.dayOfMonth ?? dayOf(from))

    case 'yearly':
      return addMonths(from, 12 * n)
  }
}

// ============================================================================
// Occurrences
// ============================================================================

/**
 * First occurrence strictly after `after`, or null when the rule is invalid.
 */
export function nextOccurrence(rule: RecurrenceRule, after: Instant): Instant | null {
  if (!isValidRule(rule)) return null

  const zone = resolveTimeZone(rule.timeZone)
  const local = toZoned(after, zone)
  const date = nextLocalDate(rule, dateOf(local))
  if (date === null) return null

  const time = rule.preferredTime
    ? makeTime(rule.preferredTime.hour, rule.preferredTime.minute, 0)
    : timeOf(local)

  return fromZoned(makeDateTime(date, time), zone)
}

/**
 * Up to `limit` consecutive occurrences after `from`, ascending.
 */
export function occurrences(rule: RecurrenceRule, from: Instant, limit: number): Instant[] {
  const result: Instant[] = []
  let cursor = from

  while (result.length < limit) {
    const next = nextOccurrence(rule, cursor)
    if (next === null || next <= cursor) break
    result.push(next)
    cursor = next
  }

  return result
}

/** Occurrences after `from` and no later than `until`. */
export function occurrencesBetween(
  rule: RecurrenceRule,
  from: Instant,
  until: Instant,
  limit = 1000,
): Instant[] {
  const result: Instant[] = []
  let cursor = from

  while (result.length < limit) {
    const next = nextOccurrence(rule, cursor)
    if (next === null || next <= cursor || next > until) break
    result.push(next)
    cursor = next
  }

  return result
}

// ============================================================================
// Schedule Membership
// ============================================================================

/**
 * Whether `date` is a due day for a series whose first day is `anchorDate`.
 * Both dates are calendar days in the rule's zone. Days before the anchor are
 * never scheduled.
 */
export function isScheduledOn(rule: RecurrenceRule, date: LocalDate, anchorDate: LocalDate): boolean {
  if (!isValidRule(rule)) return false
  if (daysBetween(anchorDate, date) < 0) return false

  const n = rule.interval

  switch (rule.frequency) {
    case 'daily':
    case 'custom':
      return daysBetween(anchorDate, date) % n === 0

    case 'weekly': {
      const days = rule.daysOfWeek ?? []
      if (!days.includes(weekdayOf(date))) return false
      const weeks = daysBetween(startOfWeek(anchorDate), startOfWeek(date)) / 7
      return weeks % n === 0
    }

    case 'monthly': {
      const months = monthsBetween(anchorDate, date)
      if (months % n !== 0) return false
      const wanted = rule.dayOfMonth ?? dayOf(anchorDate)
      return dayOf(date) === Math.min(wanted, daysInMonth(yearOf(date), monthOf(date)))
    }

    case 'yearly': {
      const years = yearOf(date) - yearOf(anchorDate)
      if (years % n !== 0) return false
      if (monthOf(date) !== monthOf(anchorDate)) return false
      return dayOf(date) === Math.min(dayOf(anchorDate), daysInMonth(yearOf(date), monthOf(date)))
    }
  }
}

/**
 * Expected due days per week. A habit without a rule is daily.
 */
export function expectedPerWeek(rule: RecurrenceRule | null): number {
  if (rule === null) return 7

  switch (rule.frequency) {
    case 'daily':
    case 'custom':
      return 7 / rule.interval
    case 'weekly':
      return (rule.daysOfWeek?.length ?? 0) / rule.interval
    case 'monthly':
      return 12 / 52 / rule.interval
    case 'yearly':
      return 1 / 52 / rule.interval
  }
}
