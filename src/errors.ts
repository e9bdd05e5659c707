/**
 * Error system for the reminder engine.
 *
 * Every error class extends ReminderError, which carries a typed error code.
 * Expected outcomes (an unrecognised phrase, an exhausted rule) are returned as
 * values; these classes are only thrown for configuration and storage faults.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const ReminderErrorCode = {
  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',

  // Recurrence
  EXHAUSTED: 'EXHAUSTED',
  INVALID_RULE: 'INVALID_RULE',

  // Configuration
  INVALID_CONFIG: 'INVALID_CONFIG',

  // Storage
  INVALID_DATA: 'INVALID_DATA',
} as const

export type ReminderErrorCode = (typeof ReminderErrorCode)[keyof typeof ReminderErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class ReminderError extends Error {
  readonly code: ReminderErrorCode

  constructor(code: ReminderErrorCode, message: string) {
    super(message)
    this.name = 'ReminderError'
    this.code = code
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends ReminderError {
  constructor(message: string) {
    super(ReminderErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Recurrence Errors
// ============================================================================

/** No next occurrence inside the bounded search window. */
export class ExhaustedError extends ReminderError {
  constructor(message: string) {
    super(ReminderErrorCode.EXHAUSTED, message)
    this.name = 'ExhaustedError'
  }
}

/** Rule kind or value outside the detector's closed vocabulary. */
export class InvalidRuleError extends ReminderError {
  constructor(message: string) {
    super(ReminderErrorCode.INVALID_RULE, message)
    this.name = 'InvalidRuleError'
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class InvalidConfigError extends ReminderError {
  constructor(message: string) {
    super(ReminderErrorCode.INVALID_CONFIG, message)
    this.name = 'InvalidConfigError'
  }
}

// ============================================================================
// Storage Errors
// ============================================================================

export class InvalidDataError extends ReminderError {
  constructor(message: string) {
    super(ReminderErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}
