/**
 * Recurrence
 *
 * Recurrence rule types and the next-occurrence calculator. `advance` is a
 * pure function of the fired occurrence and its rule: it never reads the
 * clock, so the scheduler can call it for many reminders at once.
 */

import {
  type LocalDate,
  type LocalDateTime,
  type LocalTime,
  type Weekday,
  addDays,
  addDaysToDateTime,
  dateOf,
  daysInMonth,
  isWeekend,
  makeDate,
  makeDateTime,
  monthOf,
  nextWeekdayOnOrAfter,
  shiftMonth,
  timeOf,
  yearOf,
} from './time-date'
import { type Result, Ok, Err } from './result'
import { ExhaustedError, InvalidRuleError } from './errors'
import { parseWeekdayToken, weekdayToken } from './vocabulary'

export { ExhaustedError, InvalidRuleError } from './errors'

// ============================================================================
// Types
// ============================================================================

export const RECURRENCE_KINDS = ['none', 'daily', 'weekly', 'monthly', 'biweekly', 'weekdays'] as const

export type RecurrenceKind = (typeof RECURRENCE_KINDS)[number]

export type RecurrenceRule = {
  kind: RecurrenceKind
  /** Day-of-month digits or ordinal-weekday token for monthly, weekday token for (bi)weekly. */
  value: string | null
}

/** Parsed form of a monthly value such as 第1,3火曜日の前日. */
export type OrdinalWeekday = {
  ordinals: number[]
  weekday: Weekday
  dayBefore: boolean
}

export type AdvanceResult = Result<LocalDateTime, ExhaustedError | InvalidRuleError>

/** Months examined by the ordinal search: the current one and the two after it. */
export const ORDINAL_SEARCH_MONTHS = 3

const DAY_BEFORE_MARKER = 'の前日'

// ============================================================================
// Rule Values
// ============================================================================

export function isRecurrenceKind(kind: string): kind is RecurrenceKind {
  return (RECURRENCE_KINDS as readonly string[]).includes(kind)
}

export function parseOrdinalWeekday(value: string): OrdinalWeekday | null {
  const match = /^第(\d+(?:,\d+)*)([月火水木金土日])曜日(の前日)?$/.exec(value)
  if (!match) return null

  const weekday = parseWeekdayToken(match[2] ?? '')
  if (!weekday) return null

  const ordinals = (match[1] ?? '').split(',').map(Number)
  if (ordinals.some((n) => n < 1 || n > 5)) return null

  return { ordinals, weekday, dayBefore: match[3] !== undefined }
}

export function formatOrdinalWeekday(spec: OrdinalWeekday): string {
  const marker = spec.dayBefore ? DAY_BEFORE_MARKER : ''
  return `第${spec.ordinals.join(',')}${weekdayToken(spec.weekday)}${marker}`
}

/** Day-of-month of a monthly digit value, or null when the value is not one. */
export function parseMonthDay(value: string): number | null {
  if (!/^\d{1,2}$/.test(value)) return null
  const day = Number(value)
  return day >= 1 && day <= 31 ? day : null
}

// ============================================================================
// Calendar Helpers
// ============================================================================

/** `day` in the given month, pulled back to the month's last day when it does not exist there. */
export function clampToMonth(year: number, month: number, day: number): LocalDate {
  return makeDate(year, month, Math.min(day, daysInMonth(year, month)))
}

/**
 * The nth `weekday` of a month: first day of the month, forward to the first
 * matching weekday, then n-1 weeks. Null when that spills into the next month.
 */
export function nthWeekdayOfMonth(year: number, month: number, n: number, weekday: Weekday): LocalDate | null {
  const first = nextWeekdayOnOrAfter(makeDate(year, month, 1), weekday)
  const target = addDays(first, (n - 1) * 7)
  return monthOf(target) === month ? target : null
}

/**
 * Earliest ordinal-weekday occurrence strictly after `after`, at clock time
 * `time`, searching the month of `after` and the two following months.
 */
export function nextOrdinalWeekday(spec: OrdinalWeekday, after: LocalDateTime, time: LocalTime): LocalDateTime | null {
  const base = dateOf(after)
  let best: LocalDateTime | null = null

  for (let i = 0; i < ORDINAL_SEARCH_MONTHS; i++) {
    const { year, month } = shiftMonth(yearOf(base), monthOf(base), i)
    for (const n of spec.ordinals) {
      const date = nthWeekdayOfMonth(year, month, n, spec.weekday)
      if (date === null) continue
      const candidate = makeDateTime(spec.dayBefore ? addDays(date, -1) : date, time)
      if (candidate > after && (best === null || candidate < best)) best = candidate
    }
  }

  return best
}

// ============================================================================
// Next Occurrence
// ============================================================================

/**
 * Next occurrence after `occurrence` under `rule`. Err means the reminder
 * has no further occurrence and must be deactivated.
 */
export function advance(occurrence: LocalDateTime, rule: RecurrenceRule): AdvanceResult {
  switch (rule.kind) {
    case 'daily':
      return Ok(addDaysToDateTime(occurrence, 1))
    case 'weekly':
      return Ok(addDaysToDateTime(occurrence, 7))
    case 'biweekly':
      return Ok(addDaysToDateTime(occurrence, 14))
    case 'weekdays':
      return Ok(nextWeekdayDateTime(occurrence))
    case 'monthly':
      return advanceMonthly(occurrence, rule.value)
    case 'none':
      return Err(new InvalidRuleError('A non-recurring reminder has no next occurrence'))
  }
}

function nextWeekdayDateTime(occurrence: LocalDateTime): LocalDateTime {
  let date = addDays(dateOf(occurrence), 1)
  while (isWeekend(date)) {
    date = addDays(date, 1)
  }
  return makeDateTime(date, timeOf(occurrence))
}

function advanceMonthly(occurrence: LocalDateTime, value: string | null): AdvanceResult {
  if (value === null) {
    return Err(new InvalidRuleError('Monthly rule is missing its value'))
  }

  const day = parseMonthDay(value)
  if (day !== null) {
    const date = dateOf(occurrence)
    const next = shiftMonth(yearOf(date), monthOf(date), 1)
    return Ok(makeDateTime(clampToMonth(next.year, next.month, day), timeOf(occurrence)))
  }

  const spec = parseOrdinalWeekday(value)
  if (spec === null) {
    return Err(new InvalidRuleError(`Unrecognised monthly value: '${value}'`))
  }

  const next = nextOrdinalWeekday(spec, occurrence, timeOf(occurrence))
  if (next === null) {
    return Err(new ExhaustedError(`No '${value}' within ${ORDINAL_SEARCH_MONTHS} months after ${occurrence}`))
  }
  return Ok(next)
}
