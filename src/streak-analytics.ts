/**
 * Streak & Consistency Analytics
 *
 * Read-only views over a habit's completion and skip history. Every function
 * works on calendar days already converted to the habit's zone; use
 * `buildHabitHistory` to get there from stored entries.
 */

import {
  type Instant,
  type LocalDate,
  addDays,
  daysBetween,
  localDateIn,
  resolveTimeZone,
} from './time-date'
import type { RecurrenceRule } from './recurrence-rule'
import {
  type Habit,
  type HabitCompletionEntry,
  type HabitSkipEntry,
  type Mood,
  type SkipReason,
  moodScore,
  preservesStreak,
} from './domain-types'
import { expectedPerWeek, isScheduledOn } from './evaluator'

// ============================================================================
// Types
// ============================================================================

export type HabitHistory = {
  rule: RecurrenceRule | null
  /** First day of the series (creation day) */
  anchorDate: LocalDate
  today: LocalDate
  completions: readonly { date: LocalDate; mood: Mood | null }[]
  skips: readonly { date: LocalDate; reason: SkipReason }[]
}

export type MomentumLevel = 'accelerating' | 'strong' | 'steady' | 'slowing' | 'stagnant'

export type Momentum = {
  /** Completions in the last 7 days divided by the expected count */
  ratio: number
  level: MomentumLevel
}

export type MilestoneKind = 'week' | 'multiWeek' | 'month' | 'extended' | 'century' | 'exceptional' | 'year'

export type MilestoneProgress = {
  current: number
  next: number
  progress: number
  kind: MilestoneKind
}

export type Trend = 'increasing' | 'decreasing' | 'stable' | 'insufficientData'

export type ProgressMetrics = {
  completionRate: number
  currentStreak: number
  longestStreak: number
  totalCompletions: number
  averageMood: number
  consistency: number
  momentum: Momentum
}

export const MILESTONES: readonly number[] = [7, 14, 21, 30, 50, 75, 100, 150, 200, 365]

const TREND_THRESHOLD = 0.05

// ============================================================================
// History
// ============================================================================

/**
 * Converts stored entries to calendar days in the rule's zone, or in
 * `fallbackZone` when the habit has no rule.
 */
export function buildHabitHistory(
  habit: Habit,
  completions: readonly HabitCompletionEntry[],
  skips: readonly HabitSkipEntry[],
  now: Instant,
  fallbackZone: string,
): HabitHistory {
  const zone = resolveTimeZone(habit.recurrenceRule?.timeZone ?? fallbackZone)
  return {
    rule: habit.recurrenceRule,
    anchorDate: localDateIn(habit.createdAt, zone),
    today: localDateIn(now, zone),
    completions: completions.map((c) => ({ date: localDateIn(c.completedAt, zone), mood: c.mood })),
    skips: skips.map((s) => ({ date: localDateIn(s.skippedAt, zone), reason: s.reason })),
  }
}

function isDue(history: HabitHistory, date: LocalDate): boolean {
  if (history.rule === null) return daysBetween(history.anchorDate, date) >= 0
  return isScheduledOn(history.rule, date, history.anchorDate)
}

function completedDays(history: HabitHistory): Set<LocalDate> {
  return new Set(history.completions.map((c) => c.date))
}

function preservedDays(history: HabitHistory): Set<LocalDate> {
  return new Set(history.skips.filter((s) => preservesStreak(s.reason)).map((s) => s.date))
}

// ============================================================================
// Streaks
// ============================================================================

/**
 * Consecutive scheduled days with a completion, counted back from today.
 * Preserving skips are stepped over; today does not break the run until it
 * has passed.
 */
export function currentStreak(history: HabitHistory): number {
  const completed = completedDays(history)
  const preserved = preservedDays(history)
  let streak = 0

  for (let day = history.today; day >= history.anchorDate; day = addDays(day, -1)) {
    if (!isDue(history, day)) continue
    if (completed.has(day)) {
      streak++
    } else if (preserved.has(day) || day === history.today) {
      continue
    } else {
      break
    }
  }

  return streak
}

export function longestStreak(history: HabitHistory): number {
  const completed = completedDays(history)
  const preserved = preservedDays(history)
  let run = 0
  let best = 0

  for (let day = history.anchorDate; day <= history.today; day = addDays(day, 1)) {
    if (!isDue(history, day)) continue
    if (completed.has(day)) {
      run++
      best = Math.max(best, run)
    } else if (!preserved.has(day) && day !== history.today) {
      run = 0
    }
  }

  return best
}

// ============================================================================
// Consistency & Momentum
// ============================================================================

/**
 * 1 − (standard deviation ÷ mean) of the gaps between distinct completion
 * days, floored at 0. Fewer than two days score 0.
 */
export function consistencyScore(days: readonly LocalDate[]): number {
  const sorted = [...new Set(days)].sort()
  if (sorted.length < 2) return 0

  const gaps: number[] = []
  for (let i = 1; i < sorted.length; i++) {
    const prev = sorted[i - 1]
    const cur = sorted[i]
    if (prev !== undefined && cur !== undefined) gaps.push(daysBetween(prev, cur))
  }

  const mean = gaps.reduce((a, b) => a + b, 0) / gaps.length
  if (mean === 0) return 0
  const variance = gaps.reduce((a, g) => a + (g - mean) ** 2, 0) / gaps.length
  return Math.max(0, 1 - Math.sqrt(variance) / mean)
}

function momentumLevel(ratio: number): MomentumLevel {
  if (ratio >= 1) return 'accelerating'
  if (ratio >= 0.8) return 'strong'
  if (ratio >= 0.6) return 'steady'
  if (ratio >= 0.3) return 'slowing'
  return 'stagnant'
}

export function momentum(history: HabitHistory): Momentum {
  const recent = [...completedDays(history)].filter((d) => {
    const age = daysBetween(d, history.today)
    return age >= 0 && age <= 6
  }).length

  const expected = expectedPerWeek(history.rule)
  const ratio = expected > 0 ? recent / expected : 0
  return { ratio, level: momentumLevel(ratio) }
}

// ============================================================================
// Milestones
// ============================================================================

export function milestoneKind(days: number): MilestoneKind {
  if (days <= 7) return 'week'
  if (days <= 21) return 'multiWeek'
  if (days <= 30) return 'month'
  if (days <= 75) return 'extended'
  if (days <= 100) return 'century'
  if (days < 365) return 'exceptional'
  return 'year'
}

export function milestoneProgress(streak: number): MilestoneProgress {
  const next = MILESTONES.find((m) => streak < m)
  if (next === undefined) {
    return { current: streak, next: streak + 1, progress: 1, kind: 'exceptional' }
  }
  return { current: streak, next, progress: streak / next, kind: milestoneKind(next) }
}

// ============================================================================
// Rates & Trends
// ============================================================================

type Window = { start: LocalDate; end: LocalDate }

function windowRate(history: HabitHistory, window: Window): { due: number; done: number } {
  const completed = completedDays(history)
  let due = 0
  let done = 0
  for (let day = window.start; day <= window.end; day = addDays(day, 1)) {
    if (!isDue(history, day)) continue
    due++
    if (completed.has(day)) done++
  }
  return { due, done }
}

/** Share of due days in the last `days` days (today included) that were completed. */
export function completionRate(history: HabitHistory, days: number): number {
  const { due, done } = windowRate(history, { start: addDays(history.today, 1 - days), end: history.today })
  return due > 0 ? done / due : 0
}

/** Compares the last `days` days with the `days` before them. */
export function completionTrend(history: HabitHistory, days: number): Trend {
  const current = completionRate(history, days)
  const previousEnd = addDays(history.today, -days)
  const previous = windowRate(history, { start: addDays(previousEnd, 1 - days), end: previousEnd })
  if (previous.due === 0) return 'insufficientData'

  const previousRate = previous.done / previous.due
  if (current > previousRate + TREND_THRESHOLD) return 'increasing'
  if (current < previousRate - TREND_THRESHOLD) return 'decreasing'
  return 'stable'
}

export function progressMetrics(history: HabitHistory, days: number): ProgressMetrics {
  const windowStart = addDays(history.today, 1 - days)
  const recent = history.completions.filter((c) => c.date >= windowStart && c.date <= history.today)
  const moods = recent.flatMap((c) => (c.mood !== null ? [moodScore(c.mood)] : []))

  return {
    completionRate: completionRate(history, days),
    currentStreak: currentStreak(history),
    longestStreak: longestStreak(history),
    totalCompletions: recent.length,
    averageMood: moods.length > 0 ? moods.reduce((a, b) => a + b, 0) / moods.length : 3,
    consistency: consistencyScore(recent.map((c) => c.date)),
    momentum: momentum(history),
  }
}
