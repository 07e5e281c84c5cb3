/**
 * Segment 06: Deferred Recurrence Scheduler Tests
 *
 * Ticket creation on completion, the fixed order of scheduling checks,
 * ticket processing and cancellation.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createMockAdapter, type Adapter } from '../src/adapter';
import { createEventChannel, type EventChannel } from '../src/events';
import { silentLogger } from '../src/logger';
import {
  createRecurrenceScheduler,
  materializeTicket,
  type RecurrenceScheduler,
} from '../src/recurrence-scheduler';
import { dailyRule, weeklyRule, type RecurrenceRule } from '../src/recurrence-rule';
import type { Task } from '../src/domain-types';
import {
  at,
  createTestClock,
  makeTask,
  makeTicket,
  sequentialIds,
  type TestClock,
} from './helpers/fixtures';

const mwf = weeklyRule([2, 4, 6], { timeZone: 'UTC' });

function completedTask(overrides: Partial<Task> = {}): Task {
  return makeTask({
    recurrenceRule: mwf,
    dueDate: at('2025-01-08T09:00:00Z'),
    isCompleted: true,
    completedAt: at('2025-01-08T09:30:00Z'),
    ...overrides,
  });
}

let adapter: Adapter;
let events: EventChannel;
let clock: TestClock;
let scheduler: RecurrenceScheduler;

function buildScheduler(store: Adapter): RecurrenceScheduler {
  return createRecurrenceScheduler({
    adapter: store,
    events,
    logger: silentLogger,
    now: clock.now,
    generateId: sequentialIds('ticket'),
  });
}

beforeEach(() => {
  adapter = createMockAdapter();
  events = createEventChannel();
  clock = createTestClock('2025-01-08T10:00:00Z');
  scheduler = buildScheduler(adapter);
});

// ============================================================================
// 1. SCHEDULING
// ============================================================================

describe('schedulePendingRecurrence', () => {
  it('records a ticket for the next occurrence', async () => {
    const result = await scheduler.schedulePendingRecurrence(completedTask({ tagIds: ['tag-home'], priority: 'high' }));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({
      id: 'ticket-1',
      scheduledDate: '2025-01-10T09:00:00Z',
      sourceTaskId: 'task-1',
      title: 'Water the plants',
      description: '',
      priority: 'high',
      recurrenceRule: mwf,
      tagIds: ['tag-home'],
      occurrenceIndex: 2,
      reminderOffsetMinutes: null,
      createdAt: '2025-01-08T10:00:00Z',
    });
    expect(await adapter.getPendingRecurrence('ticket-1')).toEqual(result.value);
  });

  it('does not create the next task immediately', async () => {
    await scheduler.schedulePendingRecurrence(completedTask());
    expect(await adapter.getAllTasks()).toEqual([]);
  });

  it('emits pendingRecurrenceCreated', async () => {
    const handler = vi.fn();
    events.on('pendingRecurrenceCreated', handler);

    await scheduler.schedulePendingRecurrence(completedTask());

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({
      ticketId: 'ticket-1',
      sourceTaskId: 'task-1',
      scheduledDate: '2025-01-10T09:00:00Z',
    });
  });

  it('returns the existing ticket when the occurrence is already pending', async () => {
    const handler = vi.fn();
    events.on('pendingRecurrenceCreated', handler);

    const first = await scheduler.schedulePendingRecurrence(completedTask());
    const second = await scheduler.schedulePendingRecurrence(completedTask());

    expect(first.ok && first.value.id).toBe('ticket-1');
    expect(second.ok && second.value.id).toBe('ticket-1');
    expect(await scheduler.pendingCount()).toBe(1);
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('schedules a materialized occurrence again when the source is completed twice', async () => {
    await scheduler.schedulePendingRecurrence(completedTask());
    await scheduler.processPendingRecurrences(at('2025-01-10T09:00:00Z'));

    const again = await scheduler.schedulePendingRecurrence(completedTask());

    expect(again.ok && again.value.id).toBe('ticket-2');
    expect(again.ok && again.value.occurrenceIndex).toBe(2);
    expect((await adapter.getAllTasks()).map((t) => t.id)).toEqual(['ticket-1']);
  });

  it('records without publishing', async () => {
    const handler = vi.fn();
    events.on('pendingRecurrenceCreated', handler);

    const first = await scheduler.recordPendingRecurrence(completedTask());
    const second = await scheduler.recordPendingRecurrence(completedTask());

    expect(first.ok && first.value.created).toBe(true);
    expect(second.ok && second.value.created).toBe(false);
    expect(second.ok && second.value.ticket.id).toBe('ticket-1');
    expect(handler).not.toHaveBeenCalled();

    if (first.ok) scheduler.publishPendingRecurrence(first.value.ticket);
    expect(handler).toHaveBeenCalledWith({
      ticketId: 'ticket-1',
      sourceTaskId: 'task-1',
      scheduledDate: '2025-01-10T09:00:00Z',
    });
  });

  it('skips occurrences already behind a late completion', async () => {
    const result = await scheduler.schedulePendingRecurrence(
      completedTask({ completedAt: at('2025-01-10T17:00:00Z') }),
    );
    expect(result.ok && result.value.scheduledDate).toBe('2025-01-13T09:00:00Z');
  });

  it('schedules an open task when the rule recreates incomplete tasks', async () => {
    const result = await scheduler.schedulePendingRecurrence(
      completedTask({ isCompleted: false, completedAt: null }),
    );
    expect(result.ok && result.value.scheduledDate).toBe('2025-01-10T09:00:00Z');
  });
});

// ============================================================================
// 2. CHECK ORDER
// ============================================================================

describe('Scheduling checks', () => {
  async function expectCode(task: Task, code: string): Promise<void> {
    const result = await scheduler.schedulePendingRecurrence(task);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe(code);
    expect(await scheduler.pendingCount()).toBe(0);
  }

  it('fails without a rule', async () => {
    await expectCode(completedTask({ recurrenceRule: null }), 'NO_RECURRENCE_RULE');
  });

  it('fails on an invalid rule', async () => {
    const broken: RecurrenceRule = { ...mwf, daysOfWeek: [] };
    await expectCode(completedTask({ recurrenceRule: broken }), 'INVALID_RULE');
  });

  it('fails once the occurrence cap is reached', async () => {
    const capped = dailyRule({ timeZone: 'UTC', maxOccurrences: 3 });
    await expectCode(completedTask({ recurrenceRule: capped, occurrenceIndex: 3 }), 'OCCURRENCE_LIMIT_REACHED');
  });

  it('allows the last instance below the cap', async () => {
    const capped = dailyRule({ timeZone: 'UTC', maxOccurrences: 3 });
    const result = await scheduler.schedulePendingRecurrence(completedTask({ recurrenceRule: capped, occurrenceIndex: 2 }));
    expect(result.ok && result.value.occurrenceIndex).toBe(3);
  });

  it('reports the cap before the end date', async () => {
    const both = dailyRule({ timeZone: 'UTC', maxOccurrences: 2, endDate: at('2025-01-01T00:00:00Z') });
    await expectCode(completedTask({ recurrenceRule: both, occurrenceIndex: 2 }), 'OCCURRENCE_LIMIT_REACHED');
  });

  it('fails when the rule yields nothing further', async () => {
    await expectCode(
      completedTask({ recurrenceRule: dailyRule({ timeZone: 'UTC' }), completedAt: at('2100-01-01T00:00:00Z') }),
      'NO_NEXT_OCCURRENCE',
    );
  });

  it('fails when the next occurrence is not before the end date', async () => {
    const ending = dailyRule({ timeZone: 'UTC', endDate: at('2025-01-09T09:00:00Z') });
    await expectCode(completedTask({ recurrenceRule: ending }), 'END_DATE_PASSED');
  });

  it('reports the end date before an incomplete task', async () => {
    const rule = dailyRule({ timeZone: 'UTC', endDate: at('2025-01-09T09:00:00Z'), recreateIfIncomplete: false });
    await expectCode(completedTask({ recurrenceRule: rule, isCompleted: false, completedAt: null }), 'END_DATE_PASSED');
  });

  it('fails for an open task when the rule does not recreate', async () => {
    const rule = dailyRule({ timeZone: 'UTC', recreateIfIncomplete: false });
    await expectCode(completedTask({ recurrenceRule: rule, isCompleted: false, completedAt: null }), 'INCOMPLETE_NOT_ALLOWED');
  });
});

// ============================================================================
// 3. PROCESSING
// ============================================================================

describe('processPendingRecurrences', () => {
  it('leaves tickets that are not yet due', async () => {
    await scheduler.schedulePendingRecurrence(completedTask());

    const result = await scheduler.processPendingRecurrences(at('2025-01-10T08:59:59Z'));

    expect(result).toEqual({ created: [], consumed: 0, skipped: 0 });
    expect(await scheduler.pendingCount()).toBe(1);
  });

  it('turns a due ticket into a task and deletes the ticket', async () => {
    await scheduler.schedulePendingRecurrence(completedTask());

    const result = await scheduler.processPendingRecurrences(at('2025-01-10T09:00:00Z'));

    expect(result.consumed).toBe(1);
    expect(result.skipped).toBe(0);
    expect(result.created).toEqual([
      {
        id: 'ticket-1',
        title: 'Water the plants',
        description: '',
        priority: 'none',
        createdAt: '2025-01-10T09:00:00Z',
        dueDate: '2025-01-10T09:00:00Z',
        isCompleted: false,
        completedAt: null,
        recurrenceRule: mwf,
        occurrenceIndex: 2,
        tagIds: [],
        reminderOffsetMinutes: null,
      },
    ]);
    expect(await adapter.getTask('ticket-1')).toEqual(result.created[0]);
    expect(await scheduler.pendingCount()).toBe(0);
  });

  it('uses the clock when no instant is passed', async () => {
    await scheduler.schedulePendingRecurrence(completedTask());
    clock.set('2025-01-11T00:00:00Z');

    const result = await scheduler.processPendingRecurrences();
    expect(result.created.map((t) => t.createdAt)).toEqual(['2025-01-11T00:00:00Z']);
  });

  it('creates nothing on a second pass', async () => {
    await scheduler.schedulePendingRecurrence(completedTask());
    await scheduler.processPendingRecurrences(at('2025-01-10T09:00:00Z'));

    const again = await scheduler.processPendingRecurrences(at('2025-01-10T09:00:00Z'));

    expect(again).toEqual({ created: [], consumed: 0, skipped: 0 });
    expect(await adapter.getAllTasks()).toHaveLength(1);
  });

  it('consumes a ticket whose task already exists without duplicating it', async () => {
    await adapter.createPendingRecurrence(makeTicket());
    await adapter.createTask(makeTask({ id: 'ticket-1', title: 'Already here' }));

    const result = await scheduler.processPendingRecurrences(at('2025-01-07T09:00:00Z'));

    expect(result).toEqual({ created: [], consumed: 1, skipped: 1 });
    expect((await adapter.getTask('ticket-1'))?.title).toBe('Already here');
    expect(await scheduler.pendingCount()).toBe(0);
  });

  it('drops tags that were deleted while the ticket waited', async () => {
    await adapter.createTag({ id: 'tag-home', name: 'home' });
    await adapter.createPendingRecurrence(makeTicket({ tagIds: ['tag-home', 'tag-gone'] }));

    const result = await scheduler.processPendingRecurrences(at('2025-01-07T09:00:00Z'));

    expect(result.created[0]?.tagIds).toEqual(['tag-home']);
  });

  it('processes tickets in scheduled order', async () => {
    await adapter.createPendingRecurrence(makeTicket({ id: 'b', occurrenceIndex: 3, scheduledDate: at('2025-01-07T12:00:00Z') }));
    await adapter.createPendingRecurrence(makeTicket({ id: 'a', occurrenceIndex: 2, scheduledDate: at('2025-01-07T08:00:00Z') }));

    const result = await scheduler.processPendingRecurrences(at('2025-01-08T00:00:00Z'));
    expect(result.created.map((t) => t.id)).toEqual(['a', 'b']);
  });

  it('emits taskChanged for each created task after the pass', async () => {
    const seen: string[] = [];
    events.on('taskChanged', ({ taskId }) => seen.push(taskId));
    await adapter.createPendingRecurrence(makeTicket({ id: 'a', occurrenceIndex: 2 }));
    await adapter.createPendingRecurrence(makeTicket({ id: 'b', occurrenceIndex: 3 }));

    await scheduler.processPendingRecurrences(at('2025-01-08T00:00:00Z'));
    expect(seen).toEqual(['a', 'b']);
  });

  it('rolls back the whole pass when a write fails', async () => {
    let creates = 0;
    const flaky: Adapter = {
      ...adapter,
      async createTask(task) {
        creates++;
        if (creates === 2) throw new Error('disk full');
        await adapter.createTask(task);
      },
    };
    const handler = vi.fn();
    events.on('taskChanged', handler);
    await adapter.createPendingRecurrence(makeTicket({ id: 'a', occurrenceIndex: 2 }));
    await adapter.createPendingRecurrence(makeTicket({ id: 'b', occurrenceIndex: 3, scheduledDate: at('2025-01-07T10:00:00Z') }));

    await expect(buildScheduler(flaky).processPendingRecurrences(at('2025-01-08T00:00:00Z'))).rejects.toThrow('disk full');

    expect(await adapter.getAllTasks()).toEqual([]);
    expect((await adapter.getPendingRecurrences()).map((t) => t.id)).toEqual(['a', 'b']);
    expect(handler).not.toHaveBeenCalled();
  });
});

// ============================================================================
// 4. QUERIES & CANCELLATION
// ============================================================================

describe('Queries and cancellation', () => {
  beforeEach(async () => {
    await adapter.createPendingRecurrence(makeTicket({ id: 'a', sourceTaskId: 'task-1', occurrenceIndex: 2, scheduledDate: at('2025-01-07T09:00:00Z') }));
    await adapter.createPendingRecurrence(makeTicket({ id: 'b', sourceTaskId: 'task-1', occurrenceIndex: 3, scheduledDate: at('2025-01-09T09:00:00Z') }));
    await adapter.createPendingRecurrence(makeTicket({ id: 'c', sourceTaskId: 'task-2', occurrenceIndex: 2, scheduledDate: at('2025-01-12T09:00:00Z') }));
  });

  it('counts pending and ready tickets', async () => {
    expect(await scheduler.pendingCount()).toBe(3);
    expect(await scheduler.readyCount()).toBe(1);
    expect(await scheduler.readyCount(at('2025-01-09T09:00:00Z'))).toBe(2);
  });

  it('lists ready tickets ascending', async () => {
    const ready = await scheduler.getReadyPendingRecurrences(at('2025-01-20T00:00:00Z'));
    expect(ready.map((t) => t.id)).toEqual(['a', 'b', 'c']);
  });

  it('cancels every ticket of one source task', async () => {
    expect(await scheduler.cancelPendingRecurrence('task-1')).toBe(2);
    expect((await scheduler.getPendingRecurrences()).map((t) => t.id)).toEqual(['c']);
  });

  it('returns 0 when the task has no tickets', async () => {
    expect(await scheduler.cancelPendingRecurrence('task-9')).toBe(0);
  });

  it('cancels everything', async () => {
    expect(await scheduler.cancelAll()).toBe(3);
    expect(await scheduler.pendingCount()).toBe(0);
  });
});

describe('materializeTicket', () => {
  it('copies the ticket into an open task due on the scheduled date', () => {
    const task = materializeTicket(
      makeTicket({ tagIds: ['x', 'y'], reminderOffsetMinutes: 15 }),
      ['y'],
      at('2025-01-07T09:05:00Z'),
    );

    expect(task.id).toBe('ticket-1');
    expect(task.dueDate).toBe('2025-01-07T09:00:00Z');
    expect(task.createdAt).toBe('2025-01-07T09:05:00Z');
    expect(task.tagIds).toEqual(['y']);
    expect(task.reminderOffsetMinutes).toBe(15);
    expect(task.isCompleted).toBe(false);
  });
});
