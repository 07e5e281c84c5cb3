/**
 * Consolidated error system for the recurrence engine.
 *
 * All error classes extend RecurrenceEngineError, which carries a typed error code.
 * Modules re-export the classes they throw so existing import paths continue to work.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const RecurrenceErrorCode = {
  // Store layer
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  NOT_FOUND: 'NOT_FOUND',
  FOREIGN_KEY: 'FOREIGN_KEY',
  INVALID_DATA: 'INVALID_DATA',

  // Validation
  VALIDATION: 'VALIDATION',
  INVALID_RULE: 'INVALID_RULE',
  PARSE_ERROR: 'PARSE_ERROR',

  // Scheduling policy
  NO_RECURRENCE_RULE: 'NO_RECURRENCE_RULE',
  OCCURRENCE_LIMIT_REACHED: 'OCCURRENCE_LIMIT_REACHED',
  NO_NEXT_OCCURRENCE: 'NO_NEXT_OCCURRENCE',
  END_DATE_PASSED: 'END_DATE_PASSED',
  INCOMPLETE_NOT_ALLOWED: 'INCOMPLETE_NOT_ALLOWED',

  // Habit log
  DUPLICATE_COMPLETION: 'DUPLICATE_COMPLETION',
} as const

export type RecurrenceErrorCode = (typeof RecurrenceErrorCode)[keyof typeof RecurrenceErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class RecurrenceEngineError extends Error {
  readonly code: RecurrenceErrorCode

  constructor(code: RecurrenceErrorCode, message: string) {
    super(message)
    this.name = 'RecurrenceEngineError'
    this.code = code
  }
}

// ============================================================================
// Store Errors
// ============================================================================

export class DuplicateKeyError extends RecurrenceEngineError {
  constructor(message: string) {
    super(RecurrenceErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}

export class NotFoundError extends RecurrenceEngineError {
  constructor(message: string) {
    super(RecurrenceErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class ForeignKeyError extends RecurrenceEngineError {
  constructor(message: string) {
    super(RecurrenceErrorCode.FOREIGN_KEY, message)
    this.name = 'ForeignKeyError'
  }
}

export class InvalidDataError extends RecurrenceEngineError {
  constructor(message: string) {
    super(RecurrenceErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

export class ValidationError extends RecurrenceEngineError {
  constructor(message: string) {
    super(RecurrenceErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

export class InvalidRuleError extends RecurrenceEngineError {
  constructor(message: string) {
    super(RecurrenceErrorCode.INVALID_RULE, message)
    this.name = 'InvalidRuleError'
  }
}

export class ParseError extends RecurrenceEngineError {
  constructor(message: string) {
    super(RecurrenceErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Scheduling Policy Errors
// ============================================================================

export class NoRecurrenceRuleError extends RecurrenceEngineError {
  constructor(message: string) {
    super(RecurrenceErrorCode.NO_RECURRENCE_RULE, message)
    this.name = 'NoRecurrenceRuleError'
  }
}

export class OccurrenceLimitReachedError extends RecurrenceEngineError {
  constructor(message: string) {
    super(RecurrenceErrorCode.OCCURRENCE_LIMIT_REACHED, message)
    this.name = 'OccurrenceLimitReachedError'
  }
}

export class NoNextOccurrenceError extends RecurrenceEngineError {
  constructor(message: string) {
    super(RecurrenceErrorCode.NO_NEXT_OCCURRENCE, message)
    this.name = 'NoNextOccurrenceError'
  }
}

export class EndDatePassedError extends RecurrenceEngineError {
  constructor(message: string) {
    super(RecurrenceErrorCode.END_DATE_PASSED, message)
    this.name = 'EndDatePassedError'
  }
}

export class IncompleteNotAllowedError extends RecurrenceEngineError {
  constructor(message: string) {
    super(RecurrenceErrorCode.INCOMPLETE_NOT_ALLOWED, message)
    this.name = 'IncompleteNotAllowedError'
  }
}

/** Union of everything `schedulePendingRecurrence` can return as a failure. */
export type SchedulingError =
  | NoRecurrenceRuleError
  | InvalidRuleError
  | OccurrenceLimitReachedError
  | NoNextOccurrenceError
  | EndDatePassedError
  | IncompleteNotAllowedError

// ============================================================================
// Habit Log Errors
// ============================================================================

export class DuplicateCompletionError extends RecurrenceEngineError {
  constructor(message: string) {
    super(RecurrenceErrorCode.DUPLICATE_COMPLETION, message)
    this.name = 'DuplicateCompletionError'
  }
}
