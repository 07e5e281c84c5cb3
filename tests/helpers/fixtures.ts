/**
 * Shared builders for tests: branded values through the real parsers,
 * default-filled records, a settable clock and predictable ids.
 */
import { unwrap } from '../../src/result';
import {
  parseDate,
  parseInstant,
  parseTime,
  type Instant,
  type LocalDate,
  type LocalTime,
} from '../../src/time-date';
import type { Habit, PendingRecurrence, Task } from '../../src/domain-types';
import { dailyRule } from '../../src/recurrence-rule';

export function at(iso: string): Instant {
  return unwrap(parseInstant(iso));
}

export function day(iso: string): LocalDate {
  return unwrap(parseDate(iso));
}

export function clockTime(hhmm: string): LocalTime {
  return unwrap(parseTime(hhmm));
}

export function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 'task-1',
    title: 'Water the plants',
    description: '',
    priority: 'none',
    createdAt: at('2025-01-01T08:00:00Z'),
    dueDate: null,
    isCompleted: false,
    completedAt: null,
    recurrenceRule: null,
    occurrenceIndex: 1,
    tagIds: [],
    reminderOffsetMinutes: null,
    ...overrides,
  };
}

export function makeHabit(overrides: Partial<Habit> = {}): Habit {
  return {
    id: 'habit-1',
    title: 'Stretch',
    description: '',
    createdAt: at('2025-01-06T08:00:00Z'),
    modifiedAt: at('2025-01-06T08:00:00Z'),
    recurrenceRule: null,
    currentInstanceDate: null,
    notificationFired: false,
    snoozedUntil: null,
    lastCompletedDate: null,
    currentStreak: 0,
    longestStreak: 0,
    ...overrides,
  };
}

export function makeTicket(overrides: Partial<PendingRecurrence> = {}): PendingRecurrence {
  return {
    id: 'ticket-1',
    scheduledDate: at('2025-01-07T09:00:00Z'),
    sourceTaskId: 'task-1',
    title: 'Water the plants',
    description: '',
    priority: 'none',
    recurrenceRule: dailyRule({ timeZone: 'UTC' }),
    tagIds: [],
    occurrenceIndex: 2,
    reminderOffsetMinutes: null,
    createdAt: at('2025-01-06T10:00:00Z'),
    ...overrides,
  };
}

export type TestClock = {
  now: () => Instant;
  set(iso: string): void;
};

export function createTestClock(start: string): TestClock {
  let current = at(start);
  return {
    now: () => current,
    set(iso: string) {
      current = at(iso);
    },
  };
}

export function sequentialIds(prefix: string): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}
