/**
 * Deferred Recurrence Scheduler
 *
 * Completing a recurring task does not create its successor. It records a
 * ticket (PendingRecurrence) for the next occurrence; a later processing pass
 * turns due tickets into tasks. The created task reuses the ticket id, so a
 * ticket is consumed at most once even if a pass is repeated.
 */

import { randomUUID } from 'node:crypto'
import type { Instant } from './time-date'
import type { Adapter } from './adapter'
import type { PendingRecurrence, Task } from './domain-types'
import type { EventChannel } from './events'
import type { Logger } from './logger'
import { type Result, Ok, Err } from './result'
import { type RecurrenceRule, ruleProblems } from './recurrence-rule'
import { hasReachedMaxOccurrences, isBeforeEndDate, nextOccurrenceForTask } from './occurrence-policy'
import {
  type SchedulingError,
  NoRecurrenceRuleError,
  InvalidRuleError,
  OccurrenceLimitReachedError,
  NoNextOccurrenceError,
  EndDatePassedError,
  IncompleteNotAllowedError,
} from './errors'

// ============================================================================
// Types
// ============================================================================

export type SchedulerDeps = {
  adapter: Adapter
  events: EventChannel
  logger: Logger
  now: () => Instant
  generateId?: () => string
}

export type ProcessRecurrencesResult = {
  /** Tasks inserted by this pass, in ticket order */
  created: Task[]
  /** Tickets deleted, including ones whose task already existed */
  consumed: number
  /** Tickets whose task was already present */
  skipped: number
}

/** A ticket and whether this call inserted it. */
export type RecordedTicket = {
  ticket: PendingRecurrence
  created: boolean
}

export type RecurrenceScheduler = {
  schedulePendingRecurrence(task: Task): Promise<Result<PendingRecurrence, SchedulingError>>
  /**
   * Store half of schedulePendingRecurrence: checks and inserts without
   * publishing, so a caller can run it inside its own transaction and publish
   * once that commits.
   */
  recordPendingRecurrence(task: Task): Promise<Result<RecordedTicket, SchedulingError>>
  publishPendingRecurrence(ticket: PendingRecurrence): void
  processPendingRecurrences(now?: Instant): Promise<ProcessRecurrencesResult>
  cancelPendingRecurrence(sourceTaskId: string): Promise<number>
  cancelAll(): Promise<number>
  getPendingRecurrences(): Promise<PendingRecurrence[]>
  getReadyPendingRecurrences(now?: Instant): Promise<PendingRecurrence[]>
  pendingCount(): Promise<number>
  readyCount(now?: Instant): Promise<number>
}

// ============================================================================
// Ticket → Task
// ============================================================================

/** Builds the task a ticket stands for. Tags that no longer exist are dropped. */
export function materializeTicket(ticket: PendingRecurrence, existingTagIds: readonly string[], createdAt: Instant): Task {
  const live = new Set(existingTagIds)
  return {
    id: ticket.id,
    title: ticket.title,
    description: ticket.description,
    priority: ticket.priority,
    createdAt,
    dueDate: ticket.scheduledDate,
    isCompleted: false,
    completedAt: null,
    recurrenceRule: ticket.recurrenceRule,
    occurrenceIndex: ticket.occurrenceIndex,
    tagIds: ticket.tagIds.filter((id) => live.has(id)),
    reminderOffsetMinutes: ticket.reminderOffsetMinutes,
  }
}

// ============================================================================
// Scheduler
// ============================================================================

export function createRecurrenceScheduler(deps: SchedulerDeps): RecurrenceScheduler {
  const { adapter, events, logger } = deps
  const generateId = deps.generateId ?? randomUUID

  /**
   * Checks run in a fixed order and the first failure is returned with the
   * store untouched.
   */
  function checkSchedulable(task: Task, now: Instant): Result<{ rule: RecurrenceRule; next: Instant }, SchedulingError> {
    const rule = task.recurrenceRule
    if (rule === null) {
      return Err(new NoRecurrenceRuleError(`Task '${task.id}' has no recurrence rule`))
    }

    const problems = ruleProblems(rule)
    if (problems.length > 0) {
      return Err(new InvalidRuleError(`Task '${task.id}' has an invalid rule: ${problems.join('; ')}`))
    }

    if (hasReachedMaxOccurrences(rule, task.occurrenceIndex)) {
      return Err(new OccurrenceLimitReachedError(
        `Task '${task.id}' is occurrence ${task.occurrenceIndex} of ${rule.maxOccurrences ?? 0}`,
      ))
    }

    const next = nextOccurrenceForTask(task, rule, now)
    if (next === null) {
      return Err(new NoNextOccurrenceError(`Rule of task '${task.id}' yields no further occurrence`))
    }

    if (!isBeforeEndDate(rule, next)) {
      return Err(new EndDatePassedError(
        `Next occurrence ${next} of task '${task.id}' is not before end date ${rule.endDate ?? ''}`,
      ))
    }

    if (!task.isCompleted && !rule.recreateIfIncomplete) {
      return Err(new IncompleteNotAllowedError(`Task '${task.id}' is incomplete and its rule does not recreate`))
    }

    return Ok({ rule, next })
  }

  /**
   * A ticket already pending for the same occurrence is returned as is. Only
   * pending tickets are consulted: once a ticket has become a task, completing
   * the source task again (after a host re-opened it) schedules the same
   * occurrence a second time. Hosts that re-open a completed task should
   * detach or cancel its series first.
   */
  async function recordPendingRecurrence(task: Task): Promise<Result<RecordedTicket, SchedulingError>> {
    const now = deps.now()
    const checked = checkSchedulable(task, now)
    if (!checked.ok) {
      logger.debug('Recurrence not scheduled', { taskId: task.id, code: checked.error.code })
      return checked
    }

    const { rule, next } = checked.value
    const occurrenceIndex = task.occurrenceIndex + 1
    const existing = await adapter.getPendingRecurrenceByOccurrence(task.id, occurrenceIndex)
    if (existing) return Ok({ ticket: existing, created: false })

    const ticket: PendingRecurrence = {
      id: generateId(),
      scheduledDate: next,
      sourceTaskId: task.id,
      title: task.title,
      description: task.description,
      priority: task.priority,
      recurrenceRule: rule,
      tagIds: [...task.tagIds],
      occurrenceIndex,
      reminderOffsetMinutes: task.reminderOffsetMinutes,
      createdAt: now,
    }

    await adapter.createPendingRecurrence(ticket)
    logger.info('Pending recurrence created', {
      ticketId: ticket.id,
      sourceTaskId: task.id,
      scheduledDate: ticket.scheduledDate,
    })

    return Ok({ ticket, created: true })
  }

  function publishPendingRecurrence(ticket: PendingRecurrence): void {
    events.emit('pendingRecurrenceCreated', {
      ticketId: ticket.id,
      sourceTaskId: ticket.sourceTaskId,
      scheduledDate: ticket.scheduledDate,
    })
  }

  async function schedulePendingRecurrence(task: Task): Promise<Result<PendingRecurrence, SchedulingError>> {
    const recorded = await adapter.transaction(() => recordPendingRecurrence(task))
    if (!recorded.ok) return recorded
    if (recorded.value.created) publishPendingRecurrence(recorded.value.ticket)
    return Ok(recorded.value.ticket)
  }

  async function processPendingRecurrences(now?: Instant): Promise<ProcessRecurrencesResult> {
    const asOf = now ?? deps.now()

    const result = await adapter.transaction(async () => {
      const due = await adapter.getDuePendingRecurrences(asOf)
      const created: Task[] = []
      let skipped = 0

      for (const ticket of due) {
        const already = await adapter.getTask(ticket.id)
        if (already === null) {
          const tags = await adapter.getTagsByIds(ticket.tagIds)
          const task = materializeTicket(ticket, tags.map((t) => t.id), asOf)
          await adapter.createTask(task)
          created.push(task)
        } else {
          skipped++
          logger.warn('Ticket already materialized; consuming it', { ticketId: ticket.id })
        }
        await adapter.deletePendingRecurrence(ticket.id)
      }

      return { created, consumed: due.length, skipped }
    })

    if (result.consumed > 0) {
      logger.info('Processed pending recurrences', { created: result.created.length, consumed: result.consumed })
    }

    for (const task of result.created) {
      events.emit('taskChanged', { taskId: task.id })
    }

    return result
  }

  async function cancelPendingRecurrence(sourceTaskId: string): Promise<number> {
    return adapter.transaction(async () => {
      const tickets = await adapter.getPendingRecurrencesBySourceTask(sourceTaskId)
      for (const ticket of tickets) {
        await adapter.deletePendingRecurrence(ticket.id)
      }
      return tickets.length
    })
  }

  async function cancelAll(): Promise<number> {
    return adapter.transaction(async () => {
      const tickets = await adapter.getPendingRecurrences()
      for (const ticket of tickets) {
        await adapter.deletePendingRecurrence(ticket.id)
      }
      return tickets.length
    })
  }

  async function getReadyPendingRecurrences(now?: Instant): Promise<PendingRecurrence[]> {
    return adapter.getDuePendingRecurrences(now ?? deps.now())
  }

  return {
    schedulePendingRecurrence,
    recordPendingRecurrence,
    publishPendingRecurrence,
    processPendingRecurrences,
    cancelPendingRecurrence,
    cancelAll,
    getPendingRecurrences: () => adapter.getPendingRecurrences(),
    getReadyPendingRecurrences,
    pendingCount: async () => (await adapter.getPendingRecurrences()).length,
    readyCount: async (now) => (await getReadyPendingRecurrences(now)).length,
  }
}
