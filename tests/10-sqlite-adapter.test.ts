/**
 * Segment 10: SQLite Adapter Tests
 *
 * The SQLite adapter is the production implementation of the adapter
 * interface. It must satisfy the laws from Segment 5 plus schema,
 * constraint-mapping and column-decoding requirements.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import {
  createSqliteAdapter,
  type SqliteAdapter,
  DuplicateKeyError,
  ForeignKeyError,
  InvalidDataError,
  NotFoundError,
} from '../src/sqlite-adapter';
import { dailyRule, weeklyRule } from '../src/recurrence-rule';
import { at, day, makeHabit, makeTask, makeTicket } from './helpers/fixtures';

let adapter: SqliteAdapter;

beforeEach(async () => {
  adapter = await createSqliteAdapter(':memory:');
});

afterEach(async () => {
  await adapter.close();
});

// ============================================================================
// 1. SCHEMA
// ============================================================================

describe('Schema', () => {
  it('creates every table', async () => {
    expect(await adapter.listTables()).toEqual([
      'habit',
      'habit_completion',
      'habit_skip',
      'habit_subtask',
      'pending_recurrence',
      'schema_version',
      'tag',
      'task',
    ]);
  });

  it('records the schema version', async () => {
    expect(await adapter.getSchemaVersion()).toBe(1);
  });

  it('flattens rules into columns', async () => {
    const columns = await adapter.getTableColumns('pending_recurrence');
    expect(columns).toContain('rule_frequency');
    expect(columns).toContain('rule_days_of_week');
    expect(columns).toContain('rule_time_zone');
  });
});

// ============================================================================
// 2. ROUND TRIPS
// ============================================================================

describe('Round trips', () => {
  it('stores a task with every rule field set', async () => {
    const rule = weeklyRule([2, 4, 6], {
      interval: 2,
      repeatMode: 'fromCompletionDate',
      recreateIfIncomplete: false,
      maxOccurrences: 10,
      endDate: at('2025-06-01T00:00:00Z'),
      preferredTime: '07:30',
      timeZone: 'Europe/Berlin',
    });
    const task = makeTask({
      priority: 'high',
      dueDate: at('2025-01-08T06:30:00Z'),
      recurrenceRule: rule,
      occurrenceIndex: 4,
      tagIds: ['tag-a', 'tag-b'],
      reminderOffsetMinutes: 30,
    });

    await adapter.createTask(task);
    expect(await adapter.getTask('task-1')).toEqual(task);
  });

  it('stores a task without a rule', async () => {
    await adapter.createTask(makeTask());
    expect((await adapter.getTask('task-1'))?.recurrenceRule).toBeNull();
  });

  it('stores a ticket', async () => {
    const ticket = makeTicket({ tagIds: ['tag-a'], reminderOffsetMinutes: 5 });
    await adapter.createPendingRecurrence(ticket);
    expect(await adapter.getPendingRecurrence('ticket-1')).toEqual(ticket);
  });

  it('stores a habit and its instance state', async () => {
    const habit = makeHabit({
      recurrenceRule: dailyRule({ timeZone: 'UTC' }),
      currentInstanceDate: day('2025-01-07'),
      notificationFired: true,
      snoozedUntil: at('2025-01-07T10:00:00Z'),
      lastCompletedDate: at('2025-01-06T19:00:00Z'),
      currentStreak: 2,
      longestStreak: 5,
    });

    await adapter.createHabit(habit);
    expect(await adapter.getHabit('habit-1')).toEqual(habit);
  });

  it('merges partial updates', async () => {
    await adapter.createHabit(makeHabit());
    await adapter.updateHabit('habit-1', { currentInstanceDate: day('2025-01-08'), currentStreak: 3 });

    const habit = await adapter.getHabit('habit-1');
    expect(habit?.currentInstanceDate).toBe('2025-01-08');
    expect(habit?.currentStreak).toBe(3);
    expect(habit?.title).toBe('Stretch');
  });

  it('clears a rule on update', async () => {
    await adapter.createTask(makeTask({ recurrenceRule: dailyRule({ timeZone: 'UTC' }) }));
    await adapter.updateTask('task-1', { recurrenceRule: null });
    expect((await adapter.getTask('task-1'))?.recurrenceRule).toBeNull();
  });

  it('stores log entries', async () => {
    await adapter.createHabit(makeHabit());
    const completion = { id: 'c1', habitId: 'habit-1', completedAt: at('2025-01-06T09:00:00Z'), notes: 'easy', mood: 'veryGood' as const };
    const skipEntry = { id: 's1', habitId: 'habit-1', skippedAt: at('2025-01-07T09:00:00Z'), reason: 'emergency' as const, notes: '' };
    await adapter.createHabitCompletion(completion);
    await adapter.createHabitSkip(skipEntry);

    expect(await adapter.getHabitCompletions('habit-1')).toEqual([completion]);
    expect(await adapter.getHabitSkips('habit-1')).toEqual([skipEntry]);
  });
});

// ============================================================================
// 3. QUERIES
// ============================================================================

describe('Queries', () => {
  it('returns due tickets ascending by scheduled date', async () => {
    await adapter.createPendingRecurrence(makeTicket({ id: 'late', occurrenceIndex: 3, scheduledDate: at('2025-01-08T09:00:00Z') }));
    await adapter.createPendingRecurrence(makeTicket({ id: 'early', occurrenceIndex: 2, scheduledDate: at('2025-01-07T09:00:00Z') }));
    await adapter.createPendingRecurrence(makeTicket({ id: 'future', occurrenceIndex: 4, scheduledDate: at('2025-01-09T09:00:00Z') }));

    const due = await adapter.getDuePendingRecurrences(at('2025-01-08T09:00:00Z'));
    expect(due.map((t) => t.id)).toEqual(['early', 'late']);
  });

  it('looks up a ticket by occurrence', async () => {
    await adapter.createPendingRecurrence(makeTicket());
    expect((await adapter.getPendingRecurrenceByOccurrence('task-1', 2))?.id).toBe('ticket-1');
    expect(await adapter.getPendingRecurrenceByOccurrence('task-1', 5)).toBeNull();
  });

  it('returns tags in request order', async () => {
    await adapter.createTag({ id: 'a', name: 'alpha' });
    await adapter.createTag({ id: 'b', name: 'beta' });
    expect((await adapter.getTagsByIds(['b', 'zzz', 'a'])).map((t) => t.id)).toEqual(['b', 'a']);
    expect(await adapter.getTagsByIds([])).toEqual([]);
  });

  it('counts changed subtasks', async () => {
    await adapter.createHabit(makeHabit());
    await adapter.createHabitSubtask({ id: 'a', habitId: 'habit-1', title: 'One', isCompleted: true, position: 0 });
    await adapter.createHabitSubtask({ id: 'b', habitId: 'habit-1', title: 'Two', isCompleted: true, position: 1 });

    expect(await adapter.setHabitSubtasksCompleted('habit-1', false)).toBe(2);
    expect((await adapter.getHabitSubtasks('habit-1')).map((s) => s.isCompleted)).toEqual([false, false]);
  });
});

// ============================================================================
// 4. CONSTRAINTS
// ============================================================================

describe('Constraint mapping', () => {
  it('maps a duplicate id to DuplicateKeyError', async () => {
    await adapter.createTask(makeTask());
    await expect(adapter.createTask(makeTask())).rejects.toThrow(DuplicateKeyError);
  });

  it('maps a duplicate occurrence to DuplicateKeyError', async () => {
    await adapter.createPendingRecurrence(makeTicket({ id: 'a' }));
    await expect(adapter.createPendingRecurrence(makeTicket({ id: 'b' }))).rejects.toThrow(DuplicateKeyError);
  });

  it('maps a duplicate tag name to DuplicateKeyError', async () => {
    await adapter.createTag({ id: 'a', name: 'home' });
    await expect(adapter.createTag({ id: 'b', name: 'home' })).rejects.toThrow(DuplicateKeyError);
  });

  it('maps a missing habit to ForeignKeyError', async () => {
    await expect(
      adapter.createHabitCompletion({ id: 'c1', habitId: 'ghost', completedAt: at('2025-01-06T09:00:00Z'), notes: '', mood: null }),
    ).rejects.toThrow(ForeignKeyError);
  });

  it('maps a CHECK failure to InvalidDataError', async () => {
    await expect(adapter.createTask(makeTask({ occurrenceIndex: 0 }))).rejects.toThrow(InvalidDataError);
  });

  it('keeps tickets whose source task was deleted', async () => {
    await adapter.createTask(makeTask());
    await adapter.createPendingRecurrence(makeTicket());
    await adapter.deleteTask('task-1');
    expect(await adapter.getPendingRecurrence('ticket-1')).not.toBeNull();
  });

  it('cascades a habit delete', async () => {
    await adapter.createHabit(makeHabit());
    await adapter.createHabitCompletion({ id: 'c1', habitId: 'habit-1', completedAt: at('2025-01-06T09:00:00Z'), notes: '', mood: null });
    await adapter.createHabitSubtask({ id: 'st', habitId: 'habit-1', title: 'One', isCompleted: false, position: 0 });

    await adapter.deleteHabit('habit-1');

    expect(await adapter.getHabitCompletions('habit-1')).toEqual([]);
    expect(await adapter.getHabitSubtasks('habit-1')).toEqual([]);
  });

  it('throws NotFoundError for missing rows', async () => {
    await expect(adapter.deleteTask('ghost')).rejects.toThrow(NotFoundError);
    await expect(adapter.deletePendingRecurrence('ghost')).rejects.toThrow(NotFoundError);
    await expect(adapter.updateHabit('ghost', {})).rejects.toThrow(NotFoundError);
    await expect(adapter.deleteHabitCompletion('ghost')).rejects.toThrow(NotFoundError);
  });
});

// ============================================================================
// 5. TRANSACTIONS
// ============================================================================

describe('Transactions', () => {
  it('reports an open transaction', async () => {
    expect(await adapter.inTransaction()).toBe(false);
    const inside = await adapter.transaction(() => adapter.inTransaction());
    expect(inside).toBe(true);
    expect(await adapter.inTransaction()).toBe(false);
  });

  it('rolls back on error', async () => {
    await expect(
      adapter.transaction(async () => {
        await adapter.createTask(makeTask());
        throw new Error('abort');
      }),
    ).rejects.toThrow('abort');
    expect(await adapter.getTask('task-1')).toBeNull();
  });

  it('joins nested transactions to the outer one', async () => {
    await expect(
      adapter.transaction(async () => {
        await adapter.transaction(async () => {
          await adapter.createTask(makeTask());
        });
        throw new Error('outer');
      }),
    ).rejects.toThrow('outer');
    expect(await adapter.getTask('task-1')).toBeNull();
  });
});

// ============================================================================
// 6. PERSISTENCE & DECODING
// ============================================================================

describe('File-backed store', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'recurrence-engine-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('keeps data across reopen without re-seeding the version', async () => {
    const file = join(dir, 'store.db');
    const first = await createSqliteAdapter(file);
    await first.createTask(makeTask());
    await first.close();

    const second = await createSqliteAdapter(file);
    expect((await second.getTask('task-1'))?.title).toBe('Water the plants');
    expect(await second.getSchemaVersion()).toBe(1);
    await second.close();
  });

  it('rejects rows it cannot decode', async () => {
    const file = join(dir, 'store.db');
    const store = await createSqliteAdapter(file);
    await store.createTask(makeTask({ recurrenceRule: dailyRule({ timeZone: 'UTC' }) }));
    await store.close();

    const raw = new Database(file);
    raw.prepare("UPDATE task SET rule_frequency = 'hourly' WHERE id = 'task-1'").run();
    raw.close();

    const reopened = await createSqliteAdapter(file);
    await expect(reopened.getTask('task-1')).rejects.toThrow(InvalidDataError);
    await reopened.close();
  });
});
