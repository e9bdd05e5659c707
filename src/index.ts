/**
 * Japanese reminder engine
 *
 * Public API exports
 */

// Error system
export {
  ReminderError, ReminderErrorCode,
  ParseError, ExhaustedError, InvalidRuleError, InvalidConfigError,
  InvalidDataError,
} from './errors'
export type { ReminderErrorCode as ReminderErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { LocalDate, LocalTime, LocalDateTime, Weekday } from './time-date'
export {
  parseDate, parseDateTime, makeDate, makeTime, makeDateTime,
  addDays, addMinutes, addElapsedMinutes, dayOfWeek,
  fromEpochMs, toEpochMs, isValidTimeZone,
} from './time-date'

// Resolution
export type { ReferenceInstant } from './reference-instant'
export { referenceInstant, referenceFromLocal } from './reference-instant'
export { normalizeDigits } from './normalize'
export type { ClockTime } from './time-of-day'
export { extractTimeOfDay } from './time-of-day'
export { resolveTemporal, evaluateTemporal, TEMPORAL_RULES } from './temporal-resolver'
export type { DetectedRecurrence } from './recurrence-detector'
export { detectRecurrence, evaluateRecurrence, RECURRENCE_RULES } from './recurrence-detector'
export { extractContent } from './content-extractor'
export type { MaskedText } from './protected-words'
export { maskProtected } from './protected-words'
export type { ParseResult } from './resolve'
export { resolve } from './resolve'
export type { RuleVerdict } from './rules'

// Recurrence
export type { RecurrenceKind, RecurrenceRule, OrdinalWeekday, AdvanceResult } from './recurrence'
export { advance, RECURRENCE_KINDS, parseOrdinalWeekday, formatOrdinalWeekday } from './recurrence'

// Fallback
export type { FallbackDelegate } from './fallback'
export { mergeFallback } from './fallback'

// Storage
export type { Reminder, NewReminder, ReminderStore, UserReminderQuery } from './adapter'
export { createMemoryStore } from './adapter'
export type { SqliteReminderStore } from './sqlite-adapter'
export { createSqliteStore } from './sqlite-adapter'

// Scheduling & intake
export type { ReminderNotifier, DeliveryOutcome, ReminderScheduler, SchedulerOptions, TickReport } from './scheduler'
export { createReminderScheduler, SNOOZE_PRESETS } from './scheduler'
export type { Interpretation, ReminderIntake, IntakeOptions } from './intake'
export { createReminderIntake, SPECIAL_COMMANDS } from './intake'

// Formatting
export { formatRemaining, formatRepeatLabel, parseDateTimeInput } from './format'

// Configuration & logging
export type { ReminderConfig } from './config'
export { loadConfig, loadConfigFromEnvironment } from './config'
export type { Logger, LogLevel } from './logger'
export { createConsoleLogger, silentLogger } from './logger'
