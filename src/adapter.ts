/**
 * Adapter
 *
 * Domain-oriented persistence interface + in-memory mock implementation.
 * All methods are async so synchronous (better-sqlite3) and asynchronous
 * stores share one contract.
 */

import type { Instant } from './time-date'
import type {
  Task, Tag, PendingRecurrence, Habit,
  HabitCompletionEntry, HabitSkipEntry, HabitSubtask,
} from './domain-types'
import { DuplicateKeyError, NotFoundError, ForeignKeyError } from './errors'

export type {
  Task, Tag, PendingRecurrence, Habit,
  HabitCompletionEntry, HabitSkipEntry, HabitSubtask,
} from './domain-types'

// Re-export errors for store implementations
export { DuplicateKeyError, NotFoundError, ForeignKeyError, InvalidDataError } from './errors'

// ============================================================================
// Adapter Interface
// ============================================================================

export type TaskChanges = Partial<Omit<Task, 'id'>>
export type HabitChanges = Partial<Omit<Habit, 'id'>>

export interface Adapter {
  /** Runs `fn` atomically; nested calls join the outer transaction. */
  transaction<T>(fn: () => Promise<T>): Promise<T>

  // Task
  createTask(task: Task): Promise<void>
  getTask(id: string): Promise<Task | null>
  getAllTasks(): Promise<Task[]>
  updateTask(id: string, changes: TaskChanges): Promise<void>
  deleteTask(id: string): Promise<void>

  // Tag
  createTag(tag: Tag): Promise<void>
  getTagsByIds(ids: readonly string[]): Promise<Tag[]>
  getAllTags(): Promise<Tag[]>
  deleteTag(id: string): Promise<void>

  // Pending Recurrence
  createPendingRecurrence(ticket: PendingRecurrence): Promise<void>
  getPendingRecurrence(id: string): Promise<PendingRecurrence | null>
  /** All tickets, ascending by scheduledDate */
  getPendingRecurrences(): Promise<PendingRecurrence[]>
  /** Tickets with scheduledDate <= asOf, ascending by scheduledDate */
  getDuePendingRecurrences(asOf: Instant): Promise<PendingRecurrence[]>
  getPendingRecurrencesBySourceTask(sourceTaskId: string): Promise<PendingRecurrence[]>
  getPendingRecurrenceByOccurrence(sourceTaskId: string, occurrenceIndex: number): Promise<PendingRecurrence | null>
  deletePendingRecurrence(id: string): Promise<void>

  // Habit
  createHabit(habit: Habit): Promise<void>
  getHabit(id: string): Promise<Habit | null>
  getAllHabits(): Promise<Habit[]>
  updateHabit(id: string, changes: HabitChanges): Promise<void>
  deleteHabit(id: string): Promise<void>

  // Habit Log
  createHabitCompletion(entry: HabitCompletionEntry): Promise<void>
  /** Ascending by completedAt */
  getHabitCompletions(habitId: string): Promise<HabitCompletionEntry[]>
  deleteHabitCompletion(id: string): Promise<void>
  createHabitSkip(entry: HabitSkipEntry): Promise<void>
  /** Ascending by skippedAt */
  getHabitSkips(habitId: string): Promise<HabitSkipEntry[]>

  // Habit Subtask
  createHabitSubtask(subtask: HabitSubtask): Promise<void>
  /** Ascending by position */
  getHabitSubtasks(habitId: string): Promise<HabitSubtask[]>
  setHabitSubtasksCompleted(habitId: string, isCompleted: boolean): Promise<number>

  // Lifecycle (optional; persistent adapters may implement)
  close?(): Promise<void>
}

// ============================================================================
// Mock Adapter
// ============================================================================

export function createMockAdapter(): Adapter {
  // ---- State ----
  const state = {
    tasks: new Map<string, Task>(),
    tags: new Map<string, Tag>(),
    tickets: new Map<string, PendingRecurrence>(),
    habits: new Map<string, Habit>(),
    completions: new Map<string, HabitCompletionEntry>(),
    skips: new Map<string, HabitSkipEntry>(),
    subtasks: new Map<string, HabitSubtask>(),
  }

  // ---- Transaction ----
  let txDepth = 0
  let snapshot: typeof state | null = null

  function restoreState(snap: typeof state) {
    Object.assign(state, snap)
  }

  // ---- Helpers ----
  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  function byScheduledDate(a: PendingRecurrence, b: PendingRecurrence): number {
    if (a.scheduledDate !== b.scheduledDate) return a.scheduledDate < b.scheduledDate ? -1 : 1
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
  }

  function requireHabit(habitId: string, what: string) {
    if (!state.habits.has(habitId)) {
      throw new ForeignKeyError(`Habit '${habitId}' does not exist for ${what}`)
    }
  }

  // ---- Adapter implementation ----
  const adapter: Adapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      const isOutermost = txDepth === 0
      if (isOutermost) {
        snapshot = clone(state)
      }
      txDepth++
      try {
        const result = await fn()
        txDepth--
        if (txDepth === 0) snapshot = null
        return result
      } catch (e) {
        txDepth--
        if (txDepth === 0 && snapshot) {
          restoreState(snapshot)
          snapshot = null
        }
        throw e
      }
    },

    // ================================================================
    // Task
    // ================================================================
    async createTask(task) {
      if (state.tasks.has(task.id)) {
        throw new DuplicateKeyError(`Task '${task.id}' already exists`)
      }
      state.tasks.set(task.id, clone(task))
    },

    async getTask(id) {
      const t = state.tasks.get(id)
      return t ? clone(t) : null
    },

    async getAllTasks() {
      return [...state.tasks.values()]
        .sort((a, b) => (a.createdAt < b.createdAt ? -1 : a.createdAt > b.createdAt ? 1 : 0))
        .map(clone)
    },

    async updateTask(id, changes) {
      const existing = state.tasks.get(id)
      if (!existing) throw new NotFoundError(`Task '${id}' not found`)
      state.tasks.set(id, { ...existing, ...clone(changes) })
    },

    async deleteTask(id) {
      if (!state.tasks.delete(id)) throw new NotFoundError(`Task '${id}' not found`)
    },

    // ================================================================
    // Tag
    // ================================================================
    async createTag(tag) {
      if (state.tags.has(tag.id)) {
        throw new DuplicateKeyError(`Tag '${tag.id}' already exists`)
      }
      for (const t of state.tags.values()) {
        if (t.name === tag.name) throw new DuplicateKeyError(`Tag name '${tag.name}' already exists`)
      }
      state.tags.set(tag.id, clone(tag))
    },

    async getTagsByIds(ids) {
      const result: Tag[] = []
      for (const id of ids) {
        const t = state.tags.get(id)
        if (t) result.push(clone(t))
      }
      return result
    },

    async getAllTags() {
      return [...state.tags.values()].map(clone)
    },

    async deleteTag(id) {
      if (!state.tags.delete(id)) throw new NotFoundError(`Tag '${id}' not found`)
    },

    // ================================================================
    // Pending Recurrence
    // ================================================================
    async createPendingRecurrence(ticket) {
      if (state.tickets.has(ticket.id)) {
        throw new DuplicateKeyError(`Pending recurrence '${ticket.id}' already exists`)
      }
      for (const t of state.tickets.values()) {
        if (t.sourceTaskId === ticket.sourceTaskId && t.occurrenceIndex === ticket.occurrenceIndex) {
          throw new DuplicateKeyError(
            `Occurrence ${ticket.occurrenceIndex} of task '${ticket.sourceTaskId}' is already pending`,
          )
        }
      }
      state.tickets.set(ticket.id, clone(ticket))
    },

    async getPendingRecurrence(id) {
      const t = state.tickets.get(id)
      return t ? clone(t) : null
    },

    async getPendingRecurrences() {
      return [...state.tickets.values()].sort(byScheduledDate).map(clone)
    },

    async getDuePendingRecurrences(asOf) {
      return [...state.tickets.values()]
        .filter((t) => t.scheduledDate <= asOf)
        .sort(byScheduledDate)
        .map(clone)
    },

    async getPendingRecurrencesBySourceTask(sourceTaskId) {
      return [...state.tickets.values()]
        .filter((t) => t.sourceTaskId === sourceTaskId)
        .sort(byScheduledDate)
        .map(clone)
    },

    async getPendingRecurrenceByOccurrence(sourceTaskId, occurrenceIndex) {
      for (const t of state.tickets.values()) {
        if (t.sourceTaskId === sourceTaskId && t.occurrenceIndex === occurrenceIndex) return clone(t)
      }
      return null
    },

    async deletePendingRecurrence(id) {
      if (!state.tickets.delete(id)) throw new NotFoundError(`Pending recurrence '${id}' not found`)
    },

    // ================================================================
    // Habit
    // ================================================================
    async createHabit(habit) {
      if (state.habits.has(habit.id)) {
        throw new DuplicateKeyError(`Habit '${habit.id}' already exists`)
      }
      state.habits.set(habit.id, clone(habit))
    },

    async getHabit(id) {
      const h = state.habits.get(id)
      return h ? clone(h) : null
    },

    async getAllHabits() {
      return [...state.habits.values()]
        .sort((a, b) => (a.createdAt < b.createdAt ? -1 : a.createdAt > b.createdAt ? 1 : 0))
        .map(clone)
    },

    async updateHabit(id, changes) {
      const existing = state.habits.get(id)
      if (!existing) throw new NotFoundError(`Habit '${id}' not found`)
      state.habits.set(id, { ...existing, ...clone(changes) })
    },

    async deleteHabit(id) {
      if (!state.habits.has(id)) throw new NotFoundError(`Habit '${id}' not found`)
      // CASCADE: log entries and subtasks
      for (const [cid, c] of state.completions) {
        if (c.habitId === id) state.completions.delete(cid)
      }
      for (const [sid, s] of state.skips) {
        if (s.habitId === id) state.skips.delete(sid)
      }
      for (const [tid, t] of state.subtasks) {
        if (t.habitId === id) state.subtasks.delete(tid)
      }
      state.habits.delete(id)
    },

    // ================================================================
    // Habit Log
    // ================================================================
    async createHabitCompletion(entry) {
      requireHabit(entry.habitId, `completion '${entry.id}'`)
      if (state.completions.has(entry.id)) {
        throw new DuplicateKeyError(`Habit completion '${entry.id}' already exists`)
      }
      state.completions.set(entry.id, clone(entry))
    },

    async getHabitCompletions(habitId) {
      return [...state.completions.values()]
        .filter((c) => c.habitId === habitId)
        .sort((a, b) => (a.completedAt < b.completedAt ? -1 : a.completedAt > b.completedAt ? 1 : 0))
        .map(clone)
    },

    async deleteHabitCompletion(id) {
      if (!state.completions.delete(id)) throw new NotFoundError(`Habit completion '${id}' not found`)
    },

    async createHabitSkip(entry) {
      requireHabit(entry.habitId, `skip '${entry.id}'`)
      if (state.skips.has(entry.id)) {
        throw new DuplicateKeyError(`Habit skip '${entry.id}' already exists`)
      }
      state.skips.set(entry.id, clone(entry))
    },

    async getHabitSkips(habitId) {
      return [...state.skips.values()]
        .filter((s) => s.habitId === habitId)
        .sort((a, b) => (a.skippedAt < b.skippedAt ? -1 : a.skippedAt > b.skippedAt ? 1 : 0))
        .map(clone)
    },

    // ================================================================
    // Habit Subtask
    // ================================================================
    async createHabitSubtask(subtask) {
      requireHabit(subtask.habitId, `subtask '${subtask.id}'`)
      if (state.subtasks.has(subtask.id)) {
        throw new DuplicateKeyError(`Habit subtask '${subtask.id}' already exists`)
      }
      state.subtasks.set(subtask.id, clone(subtask))
    },

    async getHabitSubtasks(habitId) {
      return [...state.subtasks.values()]
        .filter((s) => s.habitId === habitId)
        .sort((a, b) => a.position - b.position)
        .map(clone)
    },

    async setHabitSubtasksCompleted(habitId, isCompleted) {
      let changed = 0
      for (const [id, s] of state.subtasks) {
        if (s.habitId === habitId && s.isCompleted !== isCompleted) {
          state.subtasks.set(id, { ...s, isCompleted })
          changed++
        }
      }
      return changed
    },
  }

  return adapter
}
