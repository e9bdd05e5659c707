/**
 * Recurrence Detector
 *
 * Recognises recurring phrases and computes the rule's first occurrence
 * strictly after now. Ordinal rules come first: 毎月第3火曜 must not be read
 * as a weekly 火曜 rule or a monthly day-3 rule.
 */

import {
  type LocalDate,
  type LocalDateTime,
  type LocalTime,
  type Weekday,
  addDays,
  addDaysToDateTime,
  dayOfWeek,
  isWeekend,
  makeDateTime,
  makeTime,
  monthOf,
  nextWeekdayOnOrAfter,
  shiftMonth,
  yearOf,
} from './time-date'
import type { ReferenceInstant } from './reference-instant'
import { extractTimeOfDay } from './time-of-day'
import { weekdayFromKanji, weekdayToken } from './vocabulary'
import {
  type RecurrenceRule,
  type OrdinalWeekday,
  clampToMonth,
  formatOrdinalWeekday,
  nextOrdinalWeekday,
} from './recurrence'
import {
  type CompiledRule,
  type RuleContext,
  type RuleVerdict,
  createRuleContext,
  defineRule,
  regexRule,
  runRules,
} from './rules'

export type DetectedRecurrence = {
  rule: RecurrenceRule
  /** First occurrence strictly after now. */
  occurrence: LocalDateTime
}

const DEFAULT_HOUR = 9

const DAILY_DEFAULT_HOURS: Record<string, number> = {
  朝: 8,
  晩: 20,
  夜: 20,
  夕: 17,
  日: 9,
}

// ============================================================================
// Helpers
// ============================================================================

function clockOrDefault(ctx: RuleContext, defaultHour: number): LocalTime {
  const clock = extractTimeOfDay(ctx.text)
  return clock ? makeTime(clock.hour, clock.minute) : makeTime(defaultHour, 0)
}

/** `date` at `time`, pushed by `stepDays` until strictly after now. */
function firstAfterNow(date: LocalDate, time: LocalTime, stepDays: number, ctx: RuleContext): LocalDateTime {
  let occurrence = makeDateTime(date, time)
  while (occurrence <= ctx.now.local) {
    occurrence = addDaysToDateTime(occurrence, stepDays)
  }
  return occurrence
}

function firstWeekly(weekday: Weekday, ctx: RuleContext): LocalDateTime {
  return firstAfterNow(nextWeekdayOnOrAfter(ctx.today, weekday), clockOrDefault(ctx, DEFAULT_HOUR), 7, ctx)
}

/** 第1,第3 / 第1・3 / 第1、3 → [1, 3]; null when any ordinal falls outside 1–5. */
function parseOrdinalList(raw: string): number[] | null {
  const ordinals = [...new Set((raw.match(/\d+/g) ?? []).map(Number))].sort((a, b) => a - b)
  if (ordinals.length === 0 || ordinals.some((n) => n < 1 || n > 5)) return null
  return ordinals
}

function ordinalRule(name: string, pattern: RegExp, dayBefore: boolean): CompiledRule<DetectedRecurrence> {
  return regexRule(name, pattern, (m, ctx) => {
    const ordinals = parseOrdinalList(m[1] ?? '')
    const weekday = weekdayFromKanji(m[2] ?? '')
    if (ordinals === null || weekday === null) return null

    const spec: OrdinalWeekday = { ordinals, weekday, dayBefore }
    const occurrence = nextOrdinalWeekday(spec, ctx.now.local, clockOrDefault(ctx, DEFAULT_HOUR))
    if (occurrence === null) return null

    return { rule: { kind: 'monthly', value: formatOrdinalWeekday(spec) }, occurrence }
  })
}

// ============================================================================
// Rules
// ============================================================================

const ORDINAL_LIST_RE = '第(\\d+(?:\\s*[,、・，]\\s*第?\\d+)*)\\s*([月火水木金土日])曜日?'

const ordinalDayBefore = ordinalRule('ordinalDayBefore', new RegExp(`毎月.*?${ORDINAL_LIST_RE}の前日`), true)

const ordinalWeekday = ordinalRule('ordinalWeekday', new RegExp(`毎月.*?${ORDINAL_LIST_RE}`), false)

const monthlyDay = regexRule<DetectedRecurrence>('monthlyDay', /毎月の?(\d{1,2})日/, (m, ctx) => {
  const day = Number(m[1])
  if (day < 1 || day > 31) return null

  const time = clockOrDefault(ctx, DEFAULT_HOUR)
  const year = yearOf(ctx.today)
  const month = monthOf(ctx.today)
  let occurrence = makeDateTime(clampToMonth(year, month, day), time)
  if (occurrence <= ctx.now.local) {
    const next = shiftMonth(year, month, 1)
    occurrence = makeDateTime(clampToMonth(next.year, next.month, day), time)
  }

  return { rule: { kind: 'monthly', value: String(day) }, occurrence }
})

const biweekly = regexRule<DetectedRecurrence>('biweekly', /隔週の?([月火水木金土日])曜日?/, (m, ctx) => {
  const weekday = weekdayFromKanji(m[1] ?? '')
  if (weekday === null) return null
  return { rule: { kind: 'biweekly', value: weekdayToken(weekday) }, occurrence: firstWeekly(weekday, ctx) }
})

const weekly = regexRule<DetectedRecurrence>('weekly', /毎週?の?([月火水木金土日])曜日?/, (m, ctx) => {
  const weekday = weekdayFromKanji(m[1] ?? '')
  if (weekday === null) return null
  return { rule: { kind: 'weekly', value: weekdayToken(weekday) }, occurrence: firstWeekly(weekday, ctx) }
})

const everyWeek = regexRule<DetectedRecurrence>('everyWeek', /毎週/, (_m, ctx) => {
  const weekday = dayOfWeek(ctx.today)
  return { rule: { kind: 'weekly', value: weekdayToken(weekday) }, occurrence: firstWeekly(weekday, ctx) }
})

const daily = defineRule<RegExpExecArray, DetectedRecurrence>({
  name: 'daily',
  // 平日毎朝 is a weekdays rule
  match: (ctx) => (ctx.text.includes('平日') ? null : /毎(朝|晩|夜|夕|日)/.exec(ctx.text)),
  compute: (m, ctx) => {
    const time = clockOrDefault(ctx, DAILY_DEFAULT_HOURS[m[1] ?? '日'] ?? DEFAULT_HOUR)
    return { rule: { kind: 'daily', value: null }, occurrence: firstAfterNow(ctx.today, time, 1, ctx) }
  },
})

const weekdays = regexRule<DetectedRecurrence>('weekdays', /平日/, (_m, ctx) => {
  const time = clockOrDefault(ctx, DEFAULT_HOUR)
  let date = ctx.today
  while (isWeekend(date) || makeDateTime(date, time) <= ctx.now.local) {
    date = addDays(date, 1)
  }
  return { rule: { kind: 'weekdays', value: null }, occurrence: makeDateTime(date, time) }
})

/** Recurrence rules in priority order. */
export const RECURRENCE_RULES: readonly CompiledRule<DetectedRecurrence>[] = [
  ordinalDayBefore,
  ordinalWeekday,
  monthlyDay,
  biweekly,
  weekly,
  everyWeek,
  daily,
  weekdays,
]

// ============================================================================
// Entry Points
// ============================================================================

export function evaluateRecurrence(text: string, now: ReferenceInstant): RuleVerdict<DetectedRecurrence> {
  return runRules(RECURRENCE_RULES, createRuleContext(text, now))
}

/** Rule and first occurrence for a normalized recurring phrase, or null. */
export function detectRecurrence(text: string, now: ReferenceInstant): DetectedRecurrence | null {
  const verdict = evaluateRecurrence(text, now)
  return verdict.status === 'resolved' ? verdict.value : null
}
