/**
 * Time & Date Utilities
 *
 * Wall-clock calendar arithmetic for the configured time zone. Dates and
 * date-times are branded ISO strings so they sort lexicographically, and all
 * day arithmetic goes through the Julian Day Number to stay clear of
 * month-length edge cases. Zone conversion uses Intl.DateTimeFormat only.
 */

import { type Result, Ok, Err } from './result'
import { ParseError } from './errors'

export { ParseError } from './errors'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol
declare const __localDateTime: unique symbol

/** YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** HH:MM:SS */
export type LocalTime = string & { readonly [__localTime]: true }

/** YYYY-MM-DDTHH:MM:SS, wall-clock in the configured zone */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

export type Weekday = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun'

// ============================================================================
// Helpers
// ============================================================================

function pad2(n: number): string {
  return String(n).padStart(2, '0')
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

/** Month shifted by `n` months, with year carry. Months are 1-based. */
export function shiftMonth(year: number, month: number, n: number): { year: number; month: number } {
  const index = year * 12 + (month - 1) + n
  return { year: Math.floor(index / 12), month: (index % 12) + 1 }
}

/**
 * Last calendar day of a month, taken as the first day of the following
 * month minus one day.
 */
export function lastDayOfMonth(year: number, month: number): LocalDate {
  const next = shiftMonth(year, month, 1)
  return addDays(makeDate(next.year, next.month, 1), -1)
}

export function daysInMonth(year: number, month: number): number {
  return dayOf(lastDayOfMonth(year, month))
}

// ============================================================================
// Julian Day Number
// ============================================================================

function toJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function fromJDN(jdn: number): { year: number; month: number; day: number } {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor((146097 * b) / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor((1461 * d) / 4)
  const m = Math.floor((5 * e + 2) / 153)
  return {
    year: 100 * b + d - 4800 + Math.floor(m / 10),
    month: m + 3 - 12 * Math.floor(m / 10),
    day: e - Math.floor((153 * m + 2) / 5) + 1,
  }
}

function jdnOf(date: LocalDate): number {
  return toJDN(yearOf(date), monthOf(date), dayOf(date))
}

// ============================================================================
// Construction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${String(year).padStart(4, '0')}-${pad2(month)}-${pad2(day)}` as LocalDate
}

export function makeTime(hour: number, minute: number, second?: number): LocalTime {
  return `${pad2(hour)}:${pad2(minute)}:${pad2(second ?? 0)}` as LocalTime
}

export function makeDateTime(date: LocalDate, time: LocalTime): LocalDateTime {
  return `${date}T${time}` as LocalDateTime
}

/** Date at a given clock time, seconds zeroed. */
export function atTime(date: LocalDate, hour: number, minute: number): LocalDateTime {
  return makeDateTime(date, makeTime(hour, minute))
}

// ============================================================================
// Component Extraction
// ============================================================================

export function yearOf(date: LocalDate): number {
  return parseInt(date.substring(0, 4), 10)
}

export function monthOf(date: LocalDate): number {
  return parseInt(date.substring(5, 7), 10)
}

export function dayOf(date: LocalDate): number {
  return parseInt(date.substring(8, 10), 10)
}

export function hourOf(time: LocalTime): number {
  return parseInt(time.substring(0, 2), 10)
}

export function minuteOf(time: LocalTime): number {
  return parseInt(time.substring(3, 5), 10)
}

export function secondOf(time: LocalTime): number {
  return parseInt(time.substring(6, 8), 10)
}

export function dateOf(dt: LocalDateTime): LocalDate {
  return dt.substring(0, 10) as LocalDate
}

export function timeOf(dt: LocalDateTime): LocalTime {
  return dt.substring(11) as LocalTime
}

// ============================================================================
// Parsing
// ============================================================================

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])
  if (!isValidDate(year, month, day)) return Err(new ParseError(`No such calendar date: '${str}'`))

  return Ok(makeDate(year, month, day))
}

export function parseDateTime(str: string): Result<LocalDateTime, ParseError> {
  const match = /^(\d{4}-\d{2}-\d{2})T(\d{2}):(\d{2})(?::(\d{2}))?$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid datetime format: '${str}'`))

  const date = parseDate(match[1] ?? '')
  if (!date.ok) return Err(date.error)

  const hour = Number(match[2])
  const minute = Number(match[3])
  const second = match[4] ? Number(match[4]) : 0
  if (hour > 23 || minute > 59 || second > 59) {
    return Err(new ParseError(`Invalid time in datetime: '${str}'`))
  }

  return Ok(makeDateTime(date.value, makeTime(hour, minute, second)))
}

export function isValidDate(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false
  if (month < 1 || month > 12) return false
  return day >= 1 && day <= daysInMonth(year, month)
}

// ============================================================================
// Arithmetic
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  const { year, month, day } = fromJDN(jdnOf(date) + n)
  return makeDate(year, month, day)
}

export function daysBetween(a: LocalDate, b: LocalDate): number {
  return jdnOf(b) - jdnOf(a)
}

/** Same wall-clock time, `n` calendar days later. */
export function addDaysToDateTime(dt: LocalDateTime, n: number): LocalDateTime {
  return makeDateTime(addDays(dateOf(dt), n), timeOf(dt))
}

/** Wall-clock minute arithmetic; ignores zone offset changes. */
export function addMinutes(dt: LocalDateTime, n: number): LocalDateTime {
  const time = timeOf(dt)
  const total = hourOf(time) * 60 + minuteOf(time) + n
  const dayDelta = Math.floor(total / 1440)
  const inDay = total - dayDelta * 1440

  return makeDateTime(
    dayDelta === 0 ? dateOf(dt) : addDays(dateOf(dt), dayDelta),
    makeTime(Math.floor(inDay / 60), inDay % 60, secondOf(time))
  )
}

// ============================================================================
// Day-of-Week
// ============================================================================

const WEEKDAYS: Weekday[] = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']

export function dayOfWeek(date: LocalDate): Weekday {
  // JDN 0 fell on a Monday
  return WEEKDAYS[((jdnOf(date) % 7) + 7) % 7] ?? 'mon'
}

export function weekdayToIndex(w: Weekday): number {
  return WEEKDAYS.indexOf(w)
}

export function indexToWeekday(i: number): Weekday {
  return WEEKDAYS[((i % 7) + 7) % 7] ?? 'mon'
}

export function isWeekend(date: LocalDate): boolean {
  const w = dayOfWeek(date)
  return w === 'sat' || w === 'sun'
}

/** Monday of the week containing `date`. */
export function startOfWeek(date: LocalDate): LocalDate {
  return addDays(date, -weekdayToIndex(dayOfWeek(date)))
}

/** First date on or after `date` that falls on `weekday`. */
export function nextWeekdayOnOrAfter(date: LocalDate, weekday: Weekday): LocalDate {
  const ahead = (weekdayToIndex(weekday) - weekdayToIndex(dayOfWeek(date)) + 7) % 7
  return addDays(date, ahead)
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDateTimes(a: LocalDateTime, b: LocalDateTime): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function isAfter(a: LocalDateTime, b: LocalDateTime): boolean {
  return a > b
}

// ============================================================================
// Time Zone Conversion
// ============================================================================

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone }).format()
    return true
  } catch {
    return false
  }
}

/** Wall-clock reading of an absolute instant in `timeZone`. */
export function fromEpochMs(ms: number, timeZone: string): LocalDateTime {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  }).formatToParts(new Date(ms))

  const get = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type)
    return part ? parseInt(part.value, 10) : 0
  }

  const hour = get('hour') === 24 ? 0 : get('hour')
  return makeDateTime(makeDate(get('year'), get('month'), get('day')), makeTime(hour, get('minute'), get('second')))
}

/** Treat the wall-clock string as if it were UTC. */
function naiveMs(dt: LocalDateTime): number {
  const d = dateOf(dt)
  const t = timeOf(dt)
  return Date.UTC(yearOf(d), monthOf(d) - 1, dayOf(d), hourOf(t), minuteOf(t), secondOf(t))
}

function offsetMinutesAt(ms: number, timeZone: string): number {
  return (naiveMs(fromEpochMs(ms, timeZone)) - Math.floor(ms / 1000) * 1000) / 60000
}

/**
 * Absolute instant of a wall-clock time in `timeZone`. A time inside a
 * spring-forward gap maps to the instant just after the gap.
 */
export function toEpochMs(dt: LocalDateTime, timeZone: string): number {
  const local = naiveMs(dt)
  let guess = local - offsetMinutesAt(local, timeZone) * 60000
  // Second pass settles guesses that landed on the other side of a transition
  guess = local - offsetMinutesAt(guess, timeZone) * 60000
  return guess
}

/** Latest instant whose wall-clock reading keeps a four-digit year in every zone. */
export const MAX_EPOCH_MS = Date.UTC(9999, 11, 30)

/** Absolute-timeline minute arithmetic, read back as wall-clock in `timeZone`. */
export function addElapsedMinutes(dt: LocalDateTime, minutes: number, timeZone: string): LocalDateTime {
  return fromEpochMs(toEpochMs(dt, timeZone) + minutes * 60000, timeZone)
}
