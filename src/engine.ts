/**
 * Recurrence Engine
 *
 * Wires the scheduler, replenishment service, habit log and analytics around
 * one store and one event channel. This is the inbound surface a host calls
 * on task completion and when the app becomes active.
 */

import type { Instant } from './time-date'
import type { Adapter } from './adapter'
import type { Habit, HabitCompletionEntry, HabitSkipEntry, PendingRecurrence, Task } from './domain-types'
import { type EngineConfig, resolveConfig } from './config'
import { type EngineEventName, type EventHandler, createEventChannel } from './events'
import { type Result, Ok } from './result'
import { type DuplicateCompletionError, type SchedulingError, NotFoundError, ValidationError } from './errors'
import {
  type ProcessRecurrencesResult,
  type RecordedTicket,
  createRecurrenceScheduler,
} from './recurrence-scheduler'
import {
  type ProcessReplenishmentsResult,
  type ReplenishmentDecision,
  createReplenishmentService,
} from './habit-replenishment'
import { type CompletionInput, type HabitLogHistory, type SkipInput, createHabitLog } from './habit-log'
import {
  type MilestoneProgress,
  type ProgressMetrics,
  buildHabitHistory,
  milestoneProgress,
  progressMetrics,
} from './streak-analytics'

// ============================================================================
// Types
// ============================================================================

export type RecurrenceEngineConfig = EngineConfig & {
  adapter: Adapter
  generateId?: () => string
}

export type ForegroundResult = {
  recurrences: ProcessRecurrencesResult
  replenishments: ProcessReplenishmentsResult
}

export type HabitAnalytics = ProgressMetrics & {
  milestone: MilestoneProgress
}

export type RecurrenceEngine = {
  on<K extends EngineEventName>(event: K, handler: EventHandler<K>): () => void

  // Tasks
  onTaskCompleted(task: Task): Promise<Result<PendingRecurrence, SchedulingError>>
  completeTask(taskId: string, at?: Instant): Promise<Result<PendingRecurrence | null, SchedulingError>>
  detachRecurrence(taskId: string): Promise<number>
  processPendingRecurrences(now?: Instant): Promise<ProcessRecurrencesResult>
  cancelPendingRecurrence(sourceTaskId: string): Promise<number>
  cancelAllPendingRecurrences(): Promise<number>
  getPendingRecurrences(): Promise<PendingRecurrence[]>
  getReadyPendingRecurrences(now?: Instant): Promise<PendingRecurrence[]>
  pendingCount(): Promise<number>
  readyCount(now?: Instant): Promise<number>

  // Habits
  processReplenishments(now?: Instant): Promise<ProcessReplenishmentsResult>
  replenishHabit(habitId: string, now?: Instant): Promise<Habit>
  evaluateReplenishment(habitId: string, now?: Instant): Promise<ReplenishmentDecision>
  logCompletion(habitId: string, input?: CompletionInput): Promise<Result<HabitCompletionEntry, DuplicateCompletionError>>
  logSkip(habitId: string, input: SkipInput): Promise<HabitSkipEntry>
  removeCompletion(habitId: string, completionId: string): Promise<void>
  getHabitHistory(habitId: string): Promise<HabitLogHistory>
  getHabitAnalytics(habitId: string, days: number, now?: Instant): Promise<HabitAnalytics>

  // Triggers
  onAppForegrounded(now?: Instant): Promise<ForegroundResult>
}

// ============================================================================
// Factory
// ============================================================================

export function createRecurrenceEngine(config: RecurrenceEngineConfig): RecurrenceEngine {
  if (!config.adapter) {
    throw new ValidationError('Adapter is required')
  }

  const { timeZone, replenishmentTime, logger, now } = resolveConfig(config)
  const { adapter } = config
  const events = createEventChannel(logger)

  const scheduler = createRecurrenceScheduler({
    adapter, events, logger, now,
    ...(config.generateId ? { generateId: config.generateId } : {}),
  })
  const replenishment = createReplenishmentService({ adapter, events, logger, now, timeZone, replenishmentTime })
  const habitLog = createHabitLog({
    adapter, logger, now, timeZone,
    ...(config.generateId ? { generateId: config.generateId } : {}),
  })

  /**
   * Marks the task complete and records its next occurrence in one
   * transaction; events go out after commit. A store failure leaves the task
   * open. A policy refusal (limit reached, end date passed) is not a failure:
   * the completion stands and the refusal is returned.
   */
  async function completeTask(
    taskId: string,
    at?: Instant,
  ): Promise<Result<PendingRecurrence | null, SchedulingError>> {
    const outcome = await adapter.transaction(async () => {
      const task = await adapter.getTask(taskId)
      if (!task) throw new NotFoundError(`Task '${taskId}' not found`)
      if (task.isCompleted) return null

      const completedAt = at ?? now()
      await adapter.updateTask(taskId, { isCompleted: true, completedAt })

      let scheduled: Result<RecordedTicket | null, SchedulingError> = Ok(null)
      if (task.recurrenceRule !== null) {
        scheduled = await scheduler.recordPendingRecurrence({ ...task, isCompleted: true, completedAt })
      }
      return scheduled
    })

    if (outcome === null) return Ok(null)
    events.emit('taskChanged', { taskId })

    if (!outcome.ok) return outcome
    const recorded = outcome.value
    if (recorded === null) return Ok(null)
    if (recorded.created) scheduler.publishPendingRecurrence(recorded.ticket)
    return Ok(recorded.ticket)
  }

  async function detachRecurrence(taskId: string): Promise<number> {
    const cancelled = await adapter.transaction(async () => {
      const task = await adapter.getTask(taskId)
      if (!task) throw new NotFoundError(`Task '${taskId}' not found`)
      await adapter.updateTask(taskId, { recurrenceRule: null })
      return scheduler.cancelPendingRecurrence(taskId)
    })
    events.emit('taskChanged', { taskId })
    return cancelled
  }

  async function getHabitAnalytics(habitId: string, days: number, at?: Instant): Promise<HabitAnalytics> {
    const habit = await adapter.getHabit(habitId)
    if (!habit) throw new NotFoundError(`Habit '${habitId}' not found`)

    const history = buildHabitHistory(
      habit,
      await adapter.getHabitCompletions(habitId),
      await adapter.getHabitSkips(habitId),
      at ?? now(),
      timeZone,
    )
    const metrics = progressMetrics(history, days)
    return { ...metrics, milestone: milestoneProgress(metrics.currentStreak) }
  }

  async function onAppForegrounded(at?: Instant): Promise<ForegroundResult> {
    const instant = at ?? now()
    logger.debug('Foreground pass', { at: instant })
    const recurrences = await scheduler.processPendingRecurrences(instant)
    const replenishments = await replenishment.processReplenishments(instant)
    return { recurrences, replenishments }
  }

  return {
    on: (event, handler) => events.on(event, handler),

    onTaskCompleted: (task) => scheduler.schedulePendingRecurrence(task),
    completeTask,
    detachRecurrence,
    processPendingRecurrences: (at) => scheduler.processPendingRecurrences(at),
    cancelPendingRecurrence: (sourceTaskId) => scheduler.cancelPendingRecurrence(sourceTaskId),
    cancelAllPendingRecurrences: () => scheduler.cancelAll(),
    getPendingRecurrences: () => scheduler.getPendingRecurrences(),
    getReadyPendingRecurrences: (at) => scheduler.getReadyPendingRecurrences(at),
    pendingCount: () => scheduler.pendingCount(),
    readyCount: (at) => scheduler.readyCount(at),

    processReplenishments: (at) => replenishment.processReplenishments(at),
    replenishHabit: (habitId, at) => replenishment.replenishHabit(habitId, at),
    evaluateReplenishment: (habitId, at) => replenishment.evaluate(habitId, at),
    logCompletion: (habitId, input) => habitLog.logCompletion(habitId, input),
    logSkip: (habitId, input) => habitLog.logSkip(habitId, input),
    removeCompletion: (habitId, completionId) => habitLog.removeCompletion(habitId, completionId),
    getHabitHistory: (habitId) => habitLog.getHistory(habitId),
    getHabitAnalytics,

    onAppForegrounded,
  }
}
