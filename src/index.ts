/**
 * recurrence-engine
 *
 * Public API exports
 */

// Error system (canonical source: base class, codes, all error classes)
export {
  RecurrenceEngineError, RecurrenceErrorCode,
  DuplicateKeyError, NotFoundError, ForeignKeyError, InvalidDataError,
  ValidationError, InvalidRuleError, ParseError,
  NoRecurrenceRuleError, OccurrenceLimitReachedError, NoNextOccurrenceError,
  EndDatePassedError, IncompleteNotAllowedError, DuplicateCompletionError,
} from './errors'
export type { RecurrenceErrorCode as RecurrenceErrorCodeType, SchedulingError } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, unwrap } from './result'

// Time & Date
export type { LocalDate, LocalTime, LocalDateTime, Instant, WeekdayNumber } from './time-date'
export {
  WEEKDAY_NUMBERS, SHORT_WEEKDAY_NAMES,
  isLeapYear, daysInMonth,
  parseDate, parseTime, parseInstant,
  makeDate, makeTime, makeDateTime,
  yearOf, monthOf, dayOf, hourOf, minuteOf, secondOf, dateOf, timeOf,
  addDays, daysBetween, addMonths, addYears, monthsBetween,
  weekdayOf, startOfWeek, isWeekdayNumber,
  compareInstants, minInstant,
  instantFromMs, instantToMs, currentInstant, addMinutesToInstant,
  isValidTimeZone, systemTimeZone, resolveTimeZone, toZoned, fromZoned, localDateIn,
} from './time-date'

// Recurrence rules
export type {
  Frequency, RepeatMode, PreferredTime, RecurrenceRule, RecurrenceRuleInput,
} from './recurrence-rule'
export {
  FREQUENCIES, REPEAT_MODES, MAX_MONTHLY_DAY,
  isFrequency, isRepeatMode, ruleProblems, isValidRule, createRecurrenceRule,
  dailyRule, weeklyRule, monthlyRule, yearlyRule, customRule, weekdaysRule, weekendsRule,
  describeRule,
} from './recurrence-rule'

// Evaluation & series policy
export {
  nextOccurrence, occurrences, occurrencesBetween, isScheduledOn, expectedPerWeek,
} from './evaluator'
export type { SeriesTask } from './occurrence-policy'
export {
  isBeforeEndDate, hasReachedMaxOccurrences, nextPermittedOccurrence, permittedOccurrences,
  resolveSeriesAnchor, nextOccurrenceForTask,
} from './occurrence-policy'

// Domain types
export type {
  Priority, Mood, SkipReason,
  Task, Tag, PendingRecurrence, Habit,
  HabitCompletionEntry, HabitSkipEntry, HabitSubtask,
} from './domain-types'
export {
  PRIORITIES, MOODS, SKIP_REASONS,
  preservesStreak, moodScore, isPriority, isMood, isSkipReason,
} from './domain-types'

// Adapters
export type { Adapter, TaskChanges, HabitChanges } from './adapter'
export { createMockAdapter } from './adapter'
export type { SqliteAdapter, SqliteExtras } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'

// Events & logging
export type { EngineEvents, EngineEventName, EventHandler, EventChannel } from './events'
export { createEventChannel } from './events'
export type { Logger, LogLevel } from './logger'
export { LOG_LEVELS, isLogLevel, createConsoleLogger, silentLogger } from './logger'

// Configuration
export type { EngineConfig, ResolvedConfig } from './config'
export { DEFAULT_REPLENISHMENT_TIME, resolveConfig, configFromEnv } from './config'

// Scheduler
export type {
  SchedulerDeps, ProcessRecurrencesResult, RecordedTicket, RecurrenceScheduler,
} from './recurrence-scheduler'
export { createRecurrenceScheduler, materializeTicket } from './recurrence-scheduler'

// Habits
export type {
  ReplenishmentReason, ReplenishmentDecision, ReplenishmentOptions, ReplenishedHabit,
  ProcessReplenishmentsResult, ReplenishmentServiceDeps, ReplenishmentService,
} from './habit-replenishment'
export {
  replenishmentCutoff, nextReplenishmentCutoff, habitZone, evaluateReplenishment,
  createReplenishmentService,
} from './habit-replenishment'
export type { CompletionInput, SkipInput, HabitLogHistory, HabitLogDeps, HabitLog } from './habit-log'
export { createHabitLog } from './habit-log'

// Analytics
export type {
  HabitHistory, MomentumLevel, Momentum, MilestoneKind, MilestoneProgress, Trend, ProgressMetrics,
} from './streak-analytics'
export {
  MILESTONES, buildHabitHistory, currentStreak, longestStreak, consistencyScore, momentum,
  milestoneKind, milestoneProgress, completionRate, completionTrend, progressMetrics,
} from './streak-analytics'

// Engine
export type {
  RecurrenceEngineConfig, ForegroundResult, HabitAnalytics, RecurrenceEngine,
} from './engine'
export { createRecurrenceEngine } from './engine'
