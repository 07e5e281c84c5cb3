/**
 * Habit Log
 *
 * Records completions and skips and keeps the habit's streak counters and
 * last-completed date in step with the history.
 */

import { randomUUID } from 'node:crypto'
import { type Instant, localDateIn } from './time-date'
import type { Adapter } from './adapter'
import type { Habit, HabitCompletionEntry, HabitSkipEntry, Mood, SkipReason } from './domain-types'
import type { Logger } from './logger'
import { type Result, Ok, Err } from './result'
import { DuplicateCompletionError, NotFoundError } from './errors'
import { habitZone } from './habit-replenishment'
import { buildHabitHistory, currentStreak, longestStreak } from './streak-analytics'

export type CompletionInput = {
  at?: Instant
  notes?: string
  mood?: Mood | null
}

export type SkipInput = {
  reason: SkipReason
  at?: Instant
  notes?: string
}

export type HabitLogHistory = {
  completions: HabitCompletionEntry[]
  skips: HabitSkipEntry[]
}

export type HabitLogDeps = {
  adapter: Adapter
  logger: Logger
  now: () => Instant
  timeZone: string
  generateId?: () => string
}

export type HabitLog = {
  logCompletion(habitId: string, input?: CompletionInput): Promise<Result<HabitCompletionEntry, DuplicateCompletionError>>
  logSkip(habitId: string, input: SkipInput): Promise<HabitSkipEntry>
  removeCompletion(habitId: string, completionId: string): Promise<void>
  getHistory(habitId: string): Promise<HabitLogHistory>
}

export function createHabitLog(deps: HabitLogDeps): HabitLog {
  const { adapter, logger } = deps
  const generateId = deps.generateId ?? randomUUID

  async function requireHabit(habitId: string): Promise<Habit> {
    const habit = await adapter.getHabit(habitId)
    if (!habit) throw new NotFoundError(`Habit '${habitId}' not found`)
    return habit
  }

  /** Recomputes derived fields from the full stored history. */
  async function refreshCounters(habit: Habit, at: Instant): Promise<void> {
    const completions = await adapter.getHabitCompletions(habit.id)
    const skips = await adapter.getHabitSkips(habit.id)
    const clock = deps.now()
    const history = buildHabitHistory(habit, completions, skips, at > clock ? at : clock, deps.timeZone)
    const last = completions[completions.length - 1]

    await adapter.updateHabit(habit.id, {
      lastCompletedDate: last?.completedAt ?? null,
      currentStreak: currentStreak(history),
      longestStreak: Math.max(habit.longestStreak, longestStreak(history)),
      modifiedAt: at,
    })
  }

  async function logCompletion(
    habitId: string,
    input: CompletionInput = {},
  ): Promise<Result<HabitCompletionEntry, DuplicateCompletionError>> {
    const at = input.at ?? deps.now()

    return adapter.transaction(async () => {
      const habit = await requireHabit(habitId)
      const zone = habitZone(habit, deps.timeZone)
      const day = localDateIn(at, zone)

      const existing = await adapter.getHabitCompletions(habitId)
      if (existing.some((c) => localDateIn(c.completedAt, zone) === day)) {
        return Err(new DuplicateCompletionError(`Habit '${habitId}' is already completed on ${day}`))
      }

      const entry: HabitCompletionEntry = {
        id: generateId(),
        habitId,
        completedAt: at,
        notes: input.notes ?? '',
        mood: input.mood ?? null,
      }
      await adapter.createHabitCompletion(entry)
      await refreshCounters(habit, at)
      logger.debug('Habit completion logged', { habitId, day })
      return Ok(entry)
    })
  }

  async function logSkip(habitId: string, input: SkipInput): Promise<HabitSkipEntry> {
    const at = input.at ?? deps.now()

    return adapter.transaction(async () => {
      const habit = await requireHabit(habitId)
      const entry: HabitSkipEntry = {
        id: generateId(),
        habitId,
        skippedAt: at,
        reason: input.reason,
        notes: input.notes ?? '',
      }
      await adapter.createHabitSkip(entry)
      await refreshCounters(habit, at)
      logger.debug('Habit skip logged', { habitId, reason: input.reason })
      return entry
    })
  }

  async function removeCompletion(habitId: string, completionId: string): Promise<void> {
    await adapter.transaction(async () => {
      const habit = await requireHabit(habitId)
      const completions = await adapter.getHabitCompletions(habitId)
      if (!completions.some((c) => c.id === completionId)) {
        throw new NotFoundError(`Completion '${completionId}' not found for habit '${habitId}'`)
      }
      await adapter.deleteHabitCompletion(completionId)
      // longest streak is rebuilt from history after an undo
      await refreshCounters({ ...habit, longestStreak: 0 }, deps.now())
    })
  }

  async function getHistory(habitId: string): Promise<HabitLogHistory> {
    await requireHabit(habitId)
    return {
      completions: await adapter.getHabitCompletions(habitId),
      skips: await adapter.getHabitSkips(habitId),
    }
  }

  return { logCompletion, logSkip, removeCompletion, getHistory }
}
