/**
 * Habit Replenishment
 *
 * A habit is a single long-lived record. Each due day it gets a fresh
 * "current instance" window: due-today state, notification flag and snooze
 * are reset and subtasks are unchecked. A window opens at most once per
 * calendar day and only after the previous one was completed or skipped.
 */

import {
  type Instant,
  type LocalDate,
  type LocalTime,
  addDays,
  fromZoned,
  localDateIn,
  makeDateTime,
  resolveTimeZone,
} from './time-date'
import type { Adapter } from './adapter'
import type { Habit, HabitSkipEntry } from './domain-types'
import type { EventChannel } from './events'
import type { Logger } from './logger'
import { NotFoundError } from './errors'
import { isScheduledOn } from './evaluator'

// ============================================================================
// Types
// ============================================================================

export type ReplenishmentReason =
  | 'replenish'
  | 'beforeCutoff'
  | 'alreadyReplenished'
  | 'previousIncomplete'
  | 'notScheduled'

export type ReplenishmentDecision = {
  replenish: boolean
  reason: ReplenishmentReason
  /** Calendar day the decision was made for, in the habit's zone */
  today: LocalDate
}

export type ReplenishmentOptions = {
  /** Zone for habits without a rule */
  fallbackZone: string
  cutoffTime: LocalTime
}

export type ReplenishedHabit = {
  habitId: string
  instanceDate: LocalDate
}

export type ProcessReplenishmentsResult = {
  replenished: ReplenishedHabit[]
  evaluated: number
}

export type ReplenishmentServiceDeps = {
  adapter: Adapter
  events: EventChannel
  logger: Logger
  now: () => Instant
  timeZone: string
  replenishmentTime: LocalTime
}

export type ReplenishmentService = {
  processReplenishments(now?: Instant): Promise<ProcessReplenishmentsResult>
  replenishHabit(habitId: string, now?: Instant): Promise<Habit>
  evaluate(habitId: string, now?: Instant): Promise<ReplenishmentDecision>
}

// ============================================================================
// Cut-off Window
// ============================================================================

/** The instant today's window may open, for the calendar day of `now` in `zone`. */
export function replenishmentCutoff(now: Instant, zone: string, cutoffTime: LocalTime): Instant {
  const tz = resolveTimeZone(zone)
  return fromZoned(makeDateTime(localDateIn(now, tz), cutoffTime), tz)
}

/** The first cut-off strictly after `now`. */
export function nextReplenishmentCutoff(now: Instant, zone: string, cutoffTime: LocalTime): Instant {
  const tz = resolveTimeZone(zone)
  const today = replenishmentCutoff(now, tz, cutoffTime)
  if (now < today) return today
  return fromZoned(makeDateTime(addDays(localDateIn(now, tz), 1), cutoffTime), tz)
}

// ============================================================================
// Decision
// ============================================================================

export function habitZone(habit: Habit, fallbackZone: string): string {
  return resolveTimeZone(habit.recurrenceRule?.timeZone ?? fallbackZone)
}

/**
 * Whether `habit` should open a new window at `now`. Gates run in order:
 * cut-off, already open today, previous window settled, scheduled today.
 */
export function evaluateReplenishment(
  habit: Habit,
  skips: readonly HabitSkipEntry[],
  now: Instant,
  options: ReplenishmentOptions,
): ReplenishmentDecision {
  const zone = habitZone(habit, options.fallbackZone)
  const today = localDateIn(now, zone)
  const decide = (reason: ReplenishmentReason) => ({ replenish: reason === 'replenish', reason, today })

  if (now < replenishmentCutoff(now, zone, options.cutoffTime)) return decide('beforeCutoff')

  const previous = habit.currentInstanceDate
  if (previous === today) return decide('alreadyReplenished')

  if (previous !== null) {
    const completed = habit.lastCompletedDate !== null && localDateIn(habit.lastCompletedDate, zone) >= previous
    const skipped = skips.some((s) => localDateIn(s.skippedAt, zone) >= previous)
    if (!completed && !skipped) return decide('previousIncomplete')
  }

  const rule = habit.recurrenceRule
  if (rule !== null && !isScheduledOn(rule, today, localDateIn(habit.createdAt, zone))) {
    return decide('notScheduled')
  }

  return decide('replenish')
}

// ============================================================================
// Service
// ============================================================================

export function createReplenishmentService(deps: ReplenishmentServiceDeps): ReplenishmentService {
  const { adapter, events, logger } = deps
  const options: ReplenishmentOptions = { fallbackZone: deps.timeZone, cutoffTime: deps.replenishmentTime }

  async function applyReplenishment(habit: Habit, instanceDate: LocalDate, now: Instant): Promise<void> {
    await adapter.updateHabit(habit.id, {
      currentInstanceDate: instanceDate,
      notificationFired: false,
      snoozedUntil: null,
      modifiedAt: now,
    })
    await adapter.setHabitSubtasksCompleted(habit.id, false)
  }

  async function skipsSinceWindow(habit: Habit): Promise<HabitSkipEntry[]> {
    return habit.currentInstanceDate === null ? [] : adapter.getHabitSkips(habit.id)
  }

  async function processReplenishments(now?: Instant): Promise<ProcessReplenishmentsResult> {
    const at = now ?? deps.now()

    const result = await adapter.transaction(async () => {
      const habits = await adapter.getAllHabits()
      const replenished: ReplenishedHabit[] = []

      for (const habit of habits) {
        const decision = evaluateReplenishment(habit, await skipsSinceWindow(habit), at, options)
        if (!decision.replenish) {
          logger.debug('Habit not replenished', { habitId: habit.id, reason: decision.reason })
          continue
        }
        await applyReplenishment(habit, decision.today, at)
        replenished.push({ habitId: habit.id, instanceDate: decision.today })
      }

      return { replenished, evaluated: habits.length }
    })

    if (result.replenished.length > 0) {
      logger.info('Replenished habits', { count: result.replenished.length })
    }

    for (const r of result.replenished) {
      events.emit('habitReplenished', r)
    }

    return result
  }

  async function replenishHabit(habitId: string, now?: Instant): Promise<Habit> {
    const at = now ?? deps.now()

    const updated = await adapter.transaction(async () => {
      const habit = await adapter.getHabit(habitId)
      if (!habit) throw new NotFoundError(`Habit '${habitId}' not found`)
      await applyReplenishment(habit, localDateIn(at, habitZone(habit, deps.timeZone)), at)
      const after = await adapter.getHabit(habitId)
      if (!after) throw new NotFoundError(`Habit '${habitId}' not found`)
      return after
    })

    if (updated.currentInstanceDate !== null) {
      events.emit('habitReplenished', { habitId, instanceDate: updated.currentInstanceDate })
    }

    return updated
  }

  async function evaluate(habitId: string, now?: Instant): Promise<ReplenishmentDecision> {
    const habit = await adapter.getHabit(habitId)
    if (!habit) throw new NotFoundError(`Habit '${habitId}' not found`)
    return evaluateReplenishment(habit, await skipsSinceWindow(habit), now ?? deps.now(), options)
  }

  return { processReplenishments, replenishHabit, evaluate }
}
