/**
 * Canonical Domain Types
 *
 * Single source of truth for the records the engine reads and writes. Both
 * stores return these shapes; domain modules import from here rather than
 * defining their own copies.
 */

import type { Instant, LocalDate } from './time-date'
import type { RecurrenceRule } from './recurrence-rule'

// ============================================================================
// Enumerations
// ============================================================================

export type Priority = 'none' | 'low' | 'medium' | 'high'

export const PRIORITIES: readonly Priority[] = ['none', 'low', 'medium', 'high']

export type Mood = 'veryBad' | 'bad' | 'neutral' | 'good' | 'veryGood'

export const MOODS: readonly Mood[] = ['veryBad', 'bad', 'neutral', 'good', 'veryGood']

export type SkipReason =
  | 'vacation'
  | 'sick'
  | 'emergency'
  | 'noTime'
  | 'forgotTo'
  | 'notMotivated'
  | 'other'

export const SKIP_REASONS: readonly SkipReason[] = [
  'vacation', 'sick', 'emergency', 'noTime', 'forgotTo', 'notMotivated', 'other',
]

const STREAK_PRESERVING: ReadonlySet<SkipReason> = new Set(['vacation', 'sick', 'emergency'])

/** Vacation, sick and emergency skips keep a streak alive. */
export function preservesStreak(reason: SkipReason): boolean {
  return STREAK_PRESERVING.has(reason)
}

/** 1 (veryBad) through 5 (veryGood) */
export function moodScore(mood: Mood): number {
  return MOODS.indexOf(mood) + 1
}

export function isPriority(value: string): value is Priority {
  return (PRIORITIES as readonly string[]).includes(value)
}

export function isMood(value: string): value is Mood {
  return (MOODS as readonly string[]).includes(value)
}

export function isSkipReason(value: string): value is SkipReason {
  return (SKIP_REASONS as readonly string[]).includes(value)
}

// ============================================================================
// Tasks
// ============================================================================

export type Task = {
  id: string
  title: string
  description: string
  priority: Priority
  createdAt: Instant
  dueDate: Instant | null
  isCompleted: boolean
  completedAt: Instant | null
  recurrenceRule: RecurrenceRule | null
  /** 1-based position in its recurring series */
  occurrenceIndex: number
  tagIds: string[]
  /** Relative reminder carried onto later instances */
  reminderOffsetMinutes: number | null
}

export type Tag = {
  id: string
  name: string
}

/**
 * Durable "next occurrence is due but not yet materialized" record. Holds a
 * snapshot of the source task so it survives the task's deletion.
 */
export type PendingRecurrence = {
  id: string
  scheduledDate: Instant
  sourceTaskId: string
  title: string
  description: string
  priority: Priority
  recurrenceRule: RecurrenceRule
  tagIds: string[]
  occurrenceIndex: number
  reminderOffsetMinutes: number | null
  createdAt: Instant
}

// ============================================================================
// Habits
// ============================================================================

export type Habit = {
  id: string
  title: string
  description: string
  createdAt: Instant
  modifiedAt: Instant
  recurrenceRule: RecurrenceRule | null
  /** Calendar day of the open window; null before the first replenishment */
  currentInstanceDate: LocalDate | null
  notificationFired: boolean
  snoozedUntil: Instant | null
  lastCompletedDate: Instant | null
  currentStreak: number
  longestStreak: number
}

export type HabitCompletionEntry = {
  id: string
  habitId: string
  completedAt: Instant
  notes: string
  mood: Mood | null
}

export type HabitSkipEntry = {
  id: string
  habitId: string
  skippedAt: Instant
  reason: SkipReason
  notes: string
}

export type HabitSubtask = {
  id: string
  habitId: string
  title: string
  isCompleted: boolean
  position: number
}
