/**
 * SQLite Adapter
 *
 * Production implementation of the store using better-sqlite3. Recurrence
 * rules are flattened into `rule_*` columns on every table that carries one;
 * list-valued fields are stored as JSON text.
 */
import Database from 'better-sqlite3'
import type {
  Adapter, Task, Tag, PendingRecurrence, Habit,
  HabitCompletionEntry, HabitSkipEntry, HabitSubtask,
} from './adapter'
import { DuplicateKeyError, ForeignKeyError, InvalidDataError, NotFoundError } from './adapter'
import { type Instant, type LocalDate, type WeekdayNumber, isWeekdayNumber, parseDate, parseInstant } from './time-date'
import { type RecurrenceRule, isFrequency, isRepeatMode } from './recurrence-rule'
import { type Mood, type Priority, type SkipReason, isMood, isPriority, isSkipReason } from './domain-types'

export { DuplicateKeyError, ForeignKeyError, InvalidDataError, NotFoundError }

// ============================================================================
// Extended type for SQLite-specific introspection methods
// ============================================================================

export type SqliteExtras = {
  listTables(): Promise<string[]>
  getTableColumns(table: string): Promise<string[]>
  inTransaction(): Promise<boolean>
  getSchemaVersion(): Promise<number>
  close(): Promise<void>
}

export type SqliteAdapter = Adapter & SqliteExtras

const SCHEMA_VERSION = 1

// ============================================================================
// Schema DDL
// ============================================================================

const RULE_COLUMNS = `
    rule_frequency TEXT,
    rule_interval INTEGER,
    rule_days_of_week TEXT,
    rule_day_of_month INTEGER,
    rule_repeat_mode TEXT,
    rule_recreate_if_incomplete INTEGER,
    rule_max_occurrences INTEGER,
    rule_end_date TEXT,
    rule_preferred_hour INTEGER,
    rule_preferred_minute INTEGER,
    rule_time_zone TEXT`

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS task (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    priority TEXT NOT NULL DEFAULT 'none' CHECK (priority IN ('none', 'low', 'medium', 'high')),
    created_at TEXT NOT NULL,
    due_date TEXT,
    is_completed INTEGER NOT NULL DEFAULT 0,
    completed_at TEXT,
    occurrence_index INTEGER NOT NULL DEFAULT 1 CHECK (occurrence_index >= 1),
    tag_ids TEXT NOT NULL DEFAULT '[]',
    reminder_offset_minutes INTEGER,${RULE_COLUMNS}
  );

  CREATE TABLE IF NOT EXISTS tag (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL UNIQUE
  );

  -- source_task_id is a back-reference only; the source task may be deleted
  CREATE TABLE IF NOT EXISTS pending_recurrence (
    id TEXT PRIMARY KEY,
    scheduled_date TEXT NOT NULL,
    source_task_id TEXT NOT NULL,
    title TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    priority TEXT NOT NULL DEFAULT 'none' CHECK (priority IN ('none', 'low', 'medium', 'high')),
    tag_ids TEXT NOT NULL DEFAULT '[]',
    occurrence_index INTEGER NOT NULL CHECK (occurrence_index >= 1),
    reminder_offset_minutes INTEGER,
    created_at TEXT NOT NULL,${RULE_COLUMNS},
    UNIQUE(source_task_id, occurrence_index)
  );
  CREATE INDEX IF NOT EXISTS idx_pending_recurrence_scheduled ON pending_recurrence(scheduled_date);
  CREATE INDEX IF NOT EXISTS idx_pending_recurrence_source ON pending_recurrence(source_task_id);

  CREATE TABLE IF NOT EXISTS habit (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL,
    modified_at TEXT NOT NULL,
    current_instance_date TEXT,
    notification_fired INTEGER NOT NULL DEFAULT 0,
    snoozed_until TEXT,
    last_completed_date TEXT,
    current_streak INTEGER NOT NULL DEFAULT 0 CHECK (current_streak >= 0),
    longest_streak INTEGER NOT NULL DEFAULT 0 CHECK (longest_streak >= 0),${RULE_COLUMNS}
  );

  CREATE TABLE IF NOT EXISTS habit_completion (
    id TEXT PRIMARY KEY,
    habit_id TEXT NOT NULL REFERENCES habit(id) ON DELETE CASCADE,
    completed_at TEXT NOT NULL,
    notes TEXT NOT NULL DEFAULT '',
    mood TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_habit_completion_habit ON habit_completion(habit_id, completed_at);

  CREATE TABLE IF NOT EXISTS habit_skip (
    id TEXT PRIMARY KEY,
    habit_id TEXT NOT NULL REFERENCES habit(id) ON DELETE CASCADE,
    skipped_at TEXT NOT NULL,
    reason TEXT NOT NULL,
    notes TEXT NOT NULL DEFAULT ''
  );
  CREATE INDEX IF NOT EXISTS idx_habit_skip_habit ON habit_skip(habit_id, skipped_at);

  CREATE TABLE IF NOT EXISTS habit_subtask (
    id TEXT PRIMARY KEY,
    habit_id TEXT NOT NULL REFERENCES habit(id) ON DELETE CASCADE,
    title TEXT NOT NULL,
    is_completed INTEGER NOT NULL DEFAULT 0,
    position INTEGER NOT NULL DEFAULT 0
  );
  CREATE INDEX IF NOT EXISTS idx_habit_subtask_habit ON habit_subtask(habit_id);
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  const msg = e instanceof Error ? e.message : String(e)
  if (/UNIQUE constraint/i.test(msg)) throw new DuplicateKeyError(msg)
  if (/FOREIGN KEY constraint/i.test(msg)) throw new ForeignKeyError(msg)
  if (/CHECK constraint/i.test(msg)) throw new InvalidDataError(msg)
  throw e
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type RuleRow = {
  rule_frequency: string | null
  rule_interval: number | null
  rule_days_of_week: string | null
  rule_day_of_month: number | null
  rule_repeat_mode: string | null
  rule_recreate_if_incomplete: number | null
  rule_max_occurrences: number | null
  rule_end_date: string | null
  rule_preferred_hour: number | null
  rule_preferred_minute: number | null
  rule_time_zone: string | null
}

type TaskRow = RuleRow & {
  id: string
  title: string
  description: string
  priority: string
  created_at: string
  due_date: string | null
  is_completed: number
  completed_at: string | null
  occurrence_index: number
  tag_ids: string
  reminder_offset_minutes: number | null
}

type TicketRow = RuleRow & {
  id: string
  scheduled_date: string
  source_task_id: string
  title: string
  description: string
  priority: string
  tag_ids: string
  occurrence_index: number
  reminder_offset_minutes: number | null
  created_at: string
}

type HabitRow = RuleRow & {
  id: string
  title: string
  description: string
  created_at: string
  modified_at: string
  current_instance_date: string | null
  notification_fired: number
  snoozed_until: string | null
  last_completed_date: string | null
  current_streak: number
  longest_streak: number
}

type TagRow = {
  id: string
  name: string
}

type HabitCompletionRow = {
  id: string
  habit_id: string
  completed_at: string
  notes: string
  mood: string | null
}

type HabitSkipRow = {
  id: string
  habit_id: string
  skipped_at: string
  reason: string
  notes: string
}

type HabitSubtaskRow = {
  id: string
  habit_id: string
  title: string
  is_completed: number
  position: number
}

type SchemaVersionRow = {
  v: number | null
}

// ============================================================================
// Column Decoding
// ============================================================================

function instantColumn(value: string, column: string): Instant {
  const parsed = parseInstant(value)
  if (!parsed.ok) throw new InvalidDataError(`Column ${column}: ${parsed.error.message}`)
  return parsed.value
}

function optionalInstant(value: string | null, column: string): Instant | null {
  return value === null ? null : instantColumn(value, column)
}

function optionalDate(value: string | null, column: string): LocalDate | null {
  if (value === null) return null
  const parsed = parseDate(value)
  if (!parsed.ok) throw new InvalidDataError(`Column ${column}: ${parsed.error.message}`)
  return parsed.value
}

function priorityColumn(value: string): Priority {
  if (!isPriority(value)) throw new InvalidDataError(`Unknown priority '${value}'`)
  return value
}

function moodColumn(value: string | null): Mood | null {
  if (value === null) return null
  if (!isMood(value)) throw new InvalidDataError(`Unknown mood '${value}'`)
  return value
}

function skipReasonColumn(value: string): SkipReason {
  if (!isSkipReason(value)) throw new InvalidDataError(`Unknown skip reason '${value}'`)
  return value
}

function jsonArray(text: string, column: string): unknown[] {
  let value: unknown
  try {
    value = JSON.parse(text)
  } catch (e) {
    throw new InvalidDataError(`Column ${column} is not JSON: ${e instanceof Error ? e.message : String(e)}`)
  }
  if (!Array.isArray(value)) throw new InvalidDataError(`Column ${column} is not a JSON array`)
  return value
}

function stringList(text: string, column: string): string[] {
  return jsonArray(text, column).filter((v): v is string => typeof v === 'string')
}

function weekdayList(text: string): WeekdayNumber[] {
  const values = jsonArray(text, 'rule_days_of_week')
  const days: WeekdayNumber[] = []
  for (const v of values) {
    if (typeof v !== 'number' || !isWeekdayNumber(v)) {
      throw new InvalidDataError(`Invalid weekday in rule_days_of_week: ${JSON.stringify(v)}`)
    }
    days.push(v)
  }
  return days
}

// ============================================================================
// Row → Domain Mappers
// ============================================================================

function toRule(row: RuleRow): RecurrenceRule | null {
  const frequency = row.rule_frequency
  if (frequency === null) return null
  if (!isFrequency(frequency)) throw new InvalidDataError(`Unknown rule frequency '${frequency}'`)

  const repeatMode = row.rule_repeat_mode ?? 'fromOriginalDate'
  if (!isRepeatMode(repeatMode)) throw new InvalidDataError(`Unknown repeat mode '${repeatMode}'`)

  return {
    frequency,
    interval: row.rule_interval ?? 1,
    daysOfWeek: row.rule_days_of_week != null ? weekdayList(row.rule_days_of_week) : null,
    dayOfMonth: row.rule_day_of_month,
    repeatMode,
    recreateIfIncomplete: row.rule_recreate_if_incomplete !== 0,
    maxOccurrences: row.rule_max_occurrences,
    endDate: optionalInstant(row.rule_end_date, 'rule_end_date'),
    preferredTime: row.rule_preferred_hour != null && row.rule_preferred_minute != null
      ? { hour: row.rule_preferred_hour, minute: row.rule_preferred_minute }
      : null,
    timeZone: row.rule_time_zone ?? 'UTC',
  }
}

function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    priority: priorityColumn(row.priority),
    createdAt: instantColumn(row.created_at, 'task.created_at'),
    dueDate: optionalInstant(row.due_date, 'task.due_date'),
    isCompleted: row.is_completed === 1,
    completedAt: optionalInstant(row.completed_at, 'task.completed_at'),
    recurrenceRule: toRule(row),
    occurrenceIndex: row.occurrence_index,
    tagIds: stringList(row.tag_ids, 'task.tag_ids'),
    reminderOffsetMinutes: row.reminder_offset_minutes,
  }
}

function toTicket(row: TicketRow): PendingRecurrence {
  const rule = toRule(row)
  if (rule === null) throw new InvalidDataError(`Pending recurrence '${row.id}' has no rule`)
  return {
    id: row.id,
    scheduledDate: instantColumn(row.scheduled_date, 'pending_recurrence.scheduled_date'),
    sourceTaskId: row.source_task_id,
    title: row.title,
    description: row.description,
    priority: priorityColumn(row.priority),
    recurrenceRule: rule,
    tagIds: stringList(row.tag_ids, 'pending_recurrence.tag_ids'),
    occurrenceIndex: row.occurrence_index,
    reminderOffsetMinutes: row.reminder_offset_minutes,
    createdAt: instantColumn(row.created_at, 'pending_recurrence.created_at'),
  }
}

function toHabit(row: HabitRow): Habit {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    createdAt: instantColumn(row.created_at, 'habit.created_at'),
    modifiedAt: instantColumn(row.modified_at, 'habit.modified_at'),
    recurrenceRule: toRule(row),
    currentInstanceDate: optionalDate(row.current_instance_date, 'habit.current_instance_date'),
    notificationFired: row.notification_fired === 1,
    snoozedUntil: optionalInstant(row.snoozed_until, 'habit.snoozed_until'),
    lastCompletedDate: optionalInstant(row.last_completed_date, 'habit.last_completed_date'),
    currentStreak: row.current_streak,
    longestStreak: row.longest_streak,
  }
}

function toCompletion(row: HabitCompletionRow): HabitCompletionEntry {
  return {
    id: row.id,
    habitId: row.habit_id,
    completedAt: instantColumn(row.completed_at, 'habit_completion.completed_at'),
    notes: row.notes,
    mood: moodColumn(row.mood),
  }
}

function toSkip(row: HabitSkipRow): HabitSkipEntry {
  return {
    id: row.id,
    habitId: row.habit_id,
    skippedAt: instantColumn(row.skipped_at, 'habit_skip.skipped_at'),
    reason: skipReasonColumn(row.reason),
    notes: row.notes,
  }
}

function toSubtask(row: HabitSubtaskRow): HabitSubtask {
  return {
    id: row.id,
    habitId: row.habit_id,
    title: row.title,
    isCompleted: row.is_completed === 1,
    position: row.position,
  }
}

// ============================================================================
// Domain → Row Parameters
// ============================================================================

function ruleParams(rule: RecurrenceRule | null): RuleRow {
  return {
    rule_frequency: rule?.frequency ?? null,
    rule_interval: rule?.interval ?? null,
    rule_days_of_week: rule?.daysOfWeek != null ? JSON.stringify(rule.daysOfWeek) : null,
    rule_day_of_month: rule?.dayOfMonth ?? null,
    rule_repeat_mode: rule?.repeatMode ?? null,
    rule_recreate_if_incomplete: rule ? (rule.recreateIfIncomplete ? 1 : 0) : null,
    rule_max_occurrences: rule?.maxOccurrences ?? null,
    rule_end_date: rule?.endDate ?? null,
    rule_preferred_hour: rule?.preferredTime?.hour ?? null,
    rule_preferred_minute: rule?.preferredTime?.minute ?? null,
    rule_time_zone: rule?.timeZone ?? null,
  }
}

const RULE_NAMES = [
  'rule_frequency', 'rule_interval', 'rule_days_of_week', 'rule_day_of_month',
  'rule_repeat_mode', 'rule_recreate_if_incomplete', 'rule_max_occurrences',
  'rule_end_date', 'rule_preferred_hour', 'rule_preferred_minute', 'rule_time_zone',
]

function taskParams(task: Task): TaskRow {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    priority: task.priority,
    created_at: task.createdAt,
    due_date: task.dueDate,
    is_completed: task.isCompleted ? 1 : 0,
    completed_at: task.completedAt,
    occurrence_index: task.occurrenceIndex,
    tag_ids: JSON.stringify(task.tagIds),
    reminder_offset_minutes: task.reminderOffsetMinutes,
    ...ruleParams(task.recurrenceRule),
  }
}

function habitParams(habit: Habit): HabitRow {
  return {
    id: habit.id,
    title: habit.title,
    description: habit.description,
    created_at: habit.createdAt,
    modified_at: habit.modifiedAt,
    current_instance_date: habit.currentInstanceDate,
    notification_fired: habit.notificationFired ? 1 : 0,
    snoozed_until: habit.snoozedUntil,
    last_completed_date: habit.lastCompletedDate,
    current_streak: habit.currentStreak,
    longest_streak: habit.longestStreak,
    ...ruleParams(habit.recurrenceRule),
  }
}

function insertSql(table: string, columns: readonly string[]): string {
  return `INSERT INTO ${table} (${columns.join(', ')}) VALUES (${columns.map((c) => '@' + c).join(', ')})`
}

function updateSql(table: string, columns: readonly string[]): string {
  const sets = columns.filter((c) => c !== 'id').map((c) => `${c} = @${c}`)
  return `UPDATE ${table} SET ${sets.join(', ')} WHERE id = @id`
}

const TASK_COLUMNS = [
  'id', 'title', 'description', 'priority', 'created_at', 'due_date', 'is_completed',
  'completed_at', 'occurrence_index', 'tag_ids', 'reminder_offset_minutes', ...RULE_NAMES,
]

const TICKET_COLUMNS = [
  'id', 'scheduled_date', 'source_task_id', 'title', 'description', 'priority', 'tag_ids',
  'occurrence_index', 'reminder_offset_minutes', 'created_at', ...RULE_NAMES,
]

const HABIT_COLUMNS = [
  'id', 'title', 'description', 'created_at', 'modified_at', 'current_instance_date',
  'notification_fired', 'snoozed_until', 'last_completed_date', 'current_streak',
  'longest_streak', ...RULE_NAMES,
]

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter(path: string): Promise<SqliteAdapter> {
  const db = new Database(path)
  db.exec('PRAGMA foreign_keys = ON')
  db.exec(SCHEMA_SQL)

  const ver = db.prepare('SELECT MAX(version) as v FROM schema_version').get() as SchemaVersionRow | undefined
  if (ver?.v == null) {
    db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
      SCHEMA_VERSION, new Date().toISOString(),
    )
  }

  let _inTx = false

  function taskRow(id: string): TaskRow | undefined {
    return db.prepare('SELECT * FROM task WHERE id = ?').get(id) as TaskRow | undefined
  }

  function habitRow(id: string): HabitRow | undefined {
    return db.prepare('SELECT * FROM habit WHERE id = ?').get(id) as HabitRow | undefined
  }

  const adapter: SqliteAdapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (_inTx) return await fn()
      _inTx = true
      db.exec('BEGIN IMMEDIATE')
      try {
        const result = await fn()
        db.exec('COMMIT')
        return result
      } catch (e) {
        db.exec('ROLLBACK')
        throw e
      } finally {
        _inTx = false
      }
    },

    // ================================================================
    // Task
    // ================================================================
    async createTask(task) {
      safe(() => db.prepare(insertSql('task', TASK_COLUMNS)).run(taskParams(task)))
    },

    async getTask(id) {
      const row = taskRow(id)
      return row ? toTask(row) : null
    },

    async getAllTasks() {
      const rows = db.prepare('SELECT * FROM task ORDER BY created_at, id').all() as TaskRow[]
      return rows.map(toTask)
    },

    async updateTask(id, changes) {
      const existing = taskRow(id)
      if (!existing) throw new NotFoundError(`Task '${id}' not found`)
      const merged: Task = { ...toTask(existing), ...changes, id }
      safe(() => db.prepare(updateSql('task', TASK_COLUMNS)).run(taskParams(merged)))
    },

    async deleteTask(id) {
      const info = safe(() => db.prepare('DELETE FROM task WHERE id = ?').run(id))
      if (info.changes === 0) throw new NotFoundError(`Task '${id}' not found`)
    },

    // ================================================================
    // Tag
    // ================================================================
    async createTag(tag) {
      safe(() => db.prepare('INSERT INTO tag (id, name) VALUES (?, ?)').run(tag.id, tag.name))
    },

    async getTagsByIds(ids) {
      if (ids.length === 0) return []
      const placeholders = ids.map(() => '?').join(', ')
      const rows = db.prepare(`SELECT * FROM tag WHERE id IN (${placeholders})`).all(...ids) as TagRow[]
      const byId = new Map(rows.map((r) => [r.id, r]))
      const result: Tag[] = []
      for (const id of ids) {
        const row = byId.get(id)
        if (row) result.push({ id: row.id, name: row.name })
      }
      return result
    },

    async getAllTags() {
      const rows = db.prepare('SELECT * FROM tag ORDER BY name').all() as TagRow[]
      return rows.map((r) => ({ id: r.id, name: r.name }))
    },

    async deleteTag(id) {
      const info = safe(() => db.prepare('DELETE FROM tag WHERE id = ?').run(id))
      if (info.changes === 0) throw new NotFoundError(`Tag '${id}' not found`)
    },

    // ================================================================
    // Pending Recurrence
    // ================================================================
    async createPendingRecurrence(ticket) {
      safe(() =>
        db.prepare(insertSql('pending_recurrence', TICKET_COLUMNS)).run({
          id: ticket.id,
          scheduled_date: ticket.scheduledDate,
          source_task_id: ticket.sourceTaskId,
          title: ticket.title,
          description: ticket.description,
          priority: ticket.priority,
          tag_ids: JSON.stringify(ticket.tagIds),
          occurrence_index: ticket.occurrenceIndex,
          reminder_offset_minutes: ticket.reminderOffsetMinutes,
          created_at: ticket.createdAt,
          ...ruleParams(ticket.recurrenceRule),
        }),
      )
    },

    async getPendingRecurrence(id) {
      const row = db.prepare('SELECT * FROM pending_recurrence WHERE id = ?').get(id) as TicketRow | undefined
      return row ? toTicket(row) : null
    },

    async getPendingRecurrences() {
      const rows = db.prepare(
        'SELECT * FROM pending_recurrence ORDER BY scheduled_date, id',
      ).all() as TicketRow[]
      return rows.map(toTicket)
    },

    async getDuePendingRecurrences(asOf) {
      const rows = db.prepare(
        'SELECT * FROM pending_recurrence WHERE scheduled_date <= ? ORDER BY scheduled_date, id',
      ).all(asOf) as TicketRow[]
      return rows.map(toTicket)
    },

    async getPendingRecurrencesBySourceTask(sourceTaskId) {
      const rows = db.prepare(
        'SELECT * FROM pending_recurrence WHERE source_task_id = ? ORDER BY scheduled_date, id',
      ).all(sourceTaskId) as TicketRow[]
      return rows.map(toTicket)
    },

    async getPendingRecurrenceByOccurrence(sourceTaskId, occurrenceIndex) {
      const row = db.prepare(
        'SELECT * FROM pending_recurrence WHERE source_task_id = ? AND occurrence_index = ?',
      ).get(sourceTaskId, occurrenceIndex) as TicketRow | undefined
      return row ? toTicket(row) : null
    },

    async deletePendingRecurrence(id) {
      const info = safe(() => db.prepare('DELETE FROM pending_recurrence WHERE id = ?').run(id))
      if (info.changes === 0) throw new NotFoundError(`Pending recurrence '${id}' not found`)
    },

    // ================================================================
    // Habit
    // ================================================================
    async createHabit(habit) {
      safe(() => db.prepare(insertSql('habit', HABIT_COLUMNS)).run(habitParams(habit)))
    },

    async getHabit(id) {
      const row = habitRow(id)
      return row ? toHabit(row) : null
    },

    async getAllHabits() {
      const rows = db.prepare('SELECT * FROM habit ORDER BY created_at, id').all() as HabitRow[]
      return rows.map(toHabit)
    },

    async updateHabit(id, changes) {
      const existing = habitRow(id)
      if (!existing) throw new NotFoundError(`Habit '${id}' not found`)
      const merged: Habit = { ...toHabit(existing), ...changes, id }
      safe(() => db.prepare(updateSql('habit', HABIT_COLUMNS)).run(habitParams(merged)))
    },

    async deleteHabit(id) {
      const info = safe(() => db.prepare('DELETE FROM habit WHERE id = ?').run(id))
      if (info.changes === 0) throw new NotFoundError(`Habit '${id}' not found`)
    },

    // ================================================================
    // Habit Log
    // ================================================================
    async createHabitCompletion(entry) {
      safe(() =>
        db.prepare(
          'INSERT INTO habit_completion (id, habit_id, completed_at, notes, mood) VALUES (?, ?, ?, ?, ?)',
        ).run(entry.id, entry.habitId, entry.completedAt, entry.notes, entry.mood),
      )
    },

    async getHabitCompletions(habitId) {
      const rows = db.prepare(
        'SELECT * FROM habit_completion WHERE habit_id = ? ORDER BY completed_at, id',
      ).all(habitId) as HabitCompletionRow[]
      return rows.map(toCompletion)
    },

    async deleteHabitCompletion(id) {
      const info = safe(() => db.prepare('DELETE FROM habit_completion WHERE id = ?').run(id))
      if (info.changes === 0) throw new NotFoundError(`Habit completion '${id}' not found`)
    },

    async createHabitSkip(entry) {
      safe(() =>
        db.prepare(
          'INSERT INTO habit_skip (id, habit_id, skipped_at, reason, notes) VALUES (?, ?, ?, ?, ?)',
        ).run(entry.id, entry.habitId, entry.skippedAt, entry.reason, entry.notes),
      )
    },

    async getHabitSkips(habitId) {
      const rows = db.prepare(
        'SELECT * FROM habit_skip WHERE habit_id = ? ORDER BY skipped_at, id',
      ).all(habitId) as HabitSkipRow[]
      return rows.map(toSkip)
    },

    // ================================================================
    // Habit Subtask
    // ================================================================
    async createHabitSubtask(subtask) {
      safe(() =>
        db.prepare(
          'INSERT INTO habit_subtask (id, habit_id, title, is_completed, position) VALUES (?, ?, ?, ?, ?)',
        ).run(subtask.id, subtask.habitId, subtask.title, subtask.isCompleted ? 1 : 0, subtask.position),
      )
    },

    async getHabitSubtasks(habitId) {
      const rows = db.prepare(
        'SELECT * FROM habit_subtask WHERE habit_id = ? ORDER BY position, id',
      ).all(habitId) as HabitSubtaskRow[]
      return rows.map(toSubtask)
    },

    async setHabitSubtasksCompleted(habitId, isCompleted) {
      const flag = isCompleted ? 1 : 0
      const info = safe(() =>
        db.prepare(
          'UPDATE habit_subtask SET is_completed = ? WHERE habit_id = ? AND is_completed != ?',
        ).run(flag, habitId, flag),
      )
      return info.changes
    },

    // ================================================================
    // Lifecycle & Introspection
    // ================================================================
    async close() {
      db.close()
    },

    async listTables() {
      const rows = db.prepare(
        "SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name",
      ).all() as { name: string }[]
      return rows.map((r) => r.name)
    },

    async getTableColumns(table: string) {
      const rows = db.prepare(`PRAGMA table_info("${table}")`).all() as { name: string }[]
      return rows.map((r) => r.name)
    },

    async inTransaction() {
      return _inTx
    },

    async getSchemaVersion() {
      const row = db.prepare('SELECT MAX(version) as v FROM schema_version').get() as SchemaVersionRow | undefined
      return row?.v ?? 0
    },
  }

  return adapter
}
