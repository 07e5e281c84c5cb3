/**
 * Series Policy
 *
 * Applies end dates, occurrence caps and repeat modes on top of the pure
 * evaluator.
 */

import { type Instant, localDateIn, resolveTimeZone } from './time-date'
import type { RecurrenceRule } from './recurrence-rule'
import type { Task } from './domain-types'
import { nextOccurrence, occurrences } from './evaluator'

/** Upper bound on catch-up steps for a long-overdue series. */
const MAX_CATCH_UP_STEPS = 10_000

export function isBeforeEndDate(rule: RecurrenceRule, occurrence: Instant): boolean {
  return rule.endDate === null || occurrence < rule.endDate
}

/** True once the series has produced `maxOccurrences` instances. */
export function hasReachedMaxOccurrences(rule: RecurrenceRule, occurrenceIndex: number): boolean {
  return rule.maxOccurrences !== null && occurrenceIndex >= rule.maxOccurrences
}

export function nextPermittedOccurrence(rule: RecurrenceRule, after: Instant): Instant | null {
  const next = nextOccurrence(rule, after)
  return next !== null && isBeforeEndDate(rule, next) ? next : null
}

export function permittedOccurrences(rule: RecurrenceRule, from: Instant, limit: number): Instant[] {
  const all = occurrences(rule, from, limit)
  const cut = all.findIndex(o => !isBeforeEndDate(rule, o))
  return cut === -1 ? all : all.slice(0, cut)
}

// ============================================================================
// Repeat Modes
// ============================================================================

export type SeriesTask = Pick<Task, 'dueDate' | 'createdAt' | 'isCompleted' | 'completedAt'>

/** The instant the next occurrence is computed from. */
export function resolveSeriesAnchor(task: SeriesTask, rule: RecurrenceRule, now: Instant): Instant {
  if (rule.repeatMode === 'fromCompletionDate') {
    return task.isCompleted && task.completedAt !== null ? task.completedAt : now
  }
  return task.dueDate ?? task.createdAt
}

/**
 * Calendar occurrence following `task` in its series, ignoring end date and
 * cap. Under fromOriginalDate a late completion skips the occurrences whose
 * day has already passed.
 */
export function nextOccurrenceForTask(task: SeriesTask, rule: RecurrenceRule, now: Instant): Instant | null {
  let next = nextOccurrence(rule, resolveSeriesAnchor(task, rule, now))

  if (rule.repeatMode === 'fromCompletionDate' || !task.isCompleted || task.completedAt === null) {
    return next
  }

  const zone = resolveTimeZone(rule.timeZone)
  const completedDay = localDateIn(task.completedAt, zone)

  for (let steps = 0; next !== null && localDateIn(next, zone) <= completedDay; steps++) {
    if (steps >= MAX_CATCH_UP_STEPS) return null
    next = nextOccurrence(rule, next)
  }

  return next
}
