/**
 * Temporal Pattern Resolver
 *
 * Single-shot phrases → absolute occurrence. Rule families are checked in a
 * fixed priority order because one phrase can satisfy several of them
 * (明日 is also a day number, 来月末 also contains 月末).
 */

import {
  type LocalDate,
  type LocalDateTime,
  MAX_EPOCH_MS,
  addDays,
  addMinutes,
  atTime,
  dateOf,
  dayOfWeek,
  fromEpochMs,
  hourOf,
  isValidDate,
  lastDayOfMonth,
  makeDate,
  monthOf,
  nextWeekdayOnOrAfter,
  shiftMonth,
  startOfWeek,
  timeOf,
  toEpochMs,
  weekdayToIndex,
  yearOf,
} from './time-date'
import type { ReferenceInstant } from './reference-instant'
import { extractTimeOfDay } from './time-of-day'
import {
  MONTH_OFFSET,
  MONTH_QUALIFIER_RE,
  NAMED_DAYS,
  WEEKDAY_RE,
  WEEK_OFFSET,
  WEEK_QUALIFIER_RE,
  weekdayFromKanji,
} from './vocabulary'
import {
  type CompiledRule,
  type RuleContext,
  type RuleVerdict,
  createRuleContext,
  defineRule,
  regexRule,
  runRules,
} from './rules'

/** Clock hour used when a dated phrase states no time. */
export const DEFAULT_HOUR = 9

const UNIT_MINUTES: Record<string, number> = {
  週間: 7 * 1440,
  日: 1440,
  時間: 60,
  分: 1,
}

// ============================================================================
// Clock Helpers
// ============================================================================

/** Start of the hour after the current one. */
export function nextFullHour(now: LocalDateTime): LocalDateTime {
  return addMinutes(atTime(dateOf(now), hourOf(timeOf(now)), 0), 60)
}

/** `date` at the phrase's clock time, or at `defaultHour` when it states none. */
export function onDate(date: LocalDate, ctx: RuleContext, defaultHour = DEFAULT_HOUR): LocalDateTime {
  const clock = extractTimeOfDay(ctx.text)
  return clock ? atTime(date, clock.hour, clock.minute) : atTime(date, defaultHour, 0)
}

/** Like onDate, but a same-day reference without a clock time falls to the next full hour. */
function onDateOrNextHour(date: LocalDate, ctx: RuleContext): LocalDateTime {
  if (date === ctx.today && extractTimeOfDay(ctx.text) === null) return nextFullHour(ctx.now.local)
  return onDate(date, ctx)
}

// ============================================================================
// Rule Families
// ============================================================================

const relativeOffset = regexRule<LocalDateTime>(
  'relativeOffset',
  /((?:\d+\s*(?:週間|時間|日|分)\s*半?\s*)+)(?:後|経ったら|たったら)/,
  (m, ctx) => {
    let minutes = 0
    for (const part of (m[1] ?? '').matchAll(/(\d+)\s*(週間|時間|日|分)\s*(半)?/g)) {
      const unit = UNIT_MINUTES[part[2] ?? ''] ?? 0
      minutes += Number(part[1]) * unit + (part[3] ? unit / 2 : 0)
    }
    const target = toEpochMs(ctx.now.local, ctx.now.timeZone) + minutes * 60000
    if (!(target <= MAX_EPOCH_MS)) return null
    return fromEpochMs(target, ctx.now.timeZone)
  }
)

const namedDay = defineRule<number, LocalDateTime>({
  name: 'namedDay',
  match: (ctx) => {
    for (const [word, offset] of NAMED_DAYS) {
      if (ctx.text.includes(word)) return offset
    }
    return null
  },
  compute: (offset, ctx) => onDateOrNextHour(addDays(ctx.today, offset), ctx),
})

const weekend = regexRule<LocalDateTime>('weekend', /(来週末|今週末|週末)/, (m, ctx) => {
  const weekday = dayOfWeek(ctx.today)
  const thisWeekend =
    weekday === 'sat' || weekday === 'sun' ? ctx.today : nextWeekdayOnOrAfter(ctx.today, 'sat')
  if (m[1] !== '来週末') return onDateOrNextHour(thisWeekend, ctx)

  const saturday = weekday === 'sun' ? addDays(ctx.today, -1) : nextWeekdayOnOrAfter(ctx.today, 'sat')
  return onDate(addDays(saturday, 7), ctx)
})

const monthBoundary = regexRule<LocalDateTime>(
  'monthBoundary',
  new RegExp(`${MONTH_QUALIFIER_RE}の?(末|最終日|初日|頭|初め)|(月末)`),
  (m, ctx) => {
    const offset = MONTH_OFFSET[m[1] ?? '今月'] ?? 0
    const { year, month } = shiftMonth(yearOf(ctx.today), monthOf(ctx.today), offset)
    const isEnd = m[3] !== undefined || m[2] === '末' || m[2] === '最終日'
    return onDate(isEnd ? lastDayOfMonth(year, month) : makeDate(year, month, 1), ctx)
  }
)

const dayOfQualifiedMonth = regexRule<LocalDateTime>(
  'dayOfQualifiedMonth',
  new RegExp(`${MONTH_QUALIFIER_RE}の?(\\d{1,2})日`),
  (m, ctx) => {
    const offset = MONTH_OFFSET[m[1] ?? '今月'] ?? 0
    const { year, month } = shiftMonth(yearOf(ctx.today), monthOf(ctx.today), offset)
    const day = Number(m[2])
    if (!isValidDate(year, month, day)) return null
    return onDate(makeDate(year, month, day), ctx)
  }
)

const weekdayReference = regexRule<LocalDateTime>(
  'weekdayReference',
  new RegExp(`(?:${WEEK_QUALIFIER_RE}の?|(次)の?)?${WEEKDAY_RE}`),
  (m, ctx) => {
    const weekday = weekdayFromKanji(m[3] ?? '')
    if (weekday === null) return null
    const target = weekdayToIndex(weekday)

    if (m[1] !== undefined) {
      const weeks = WEEK_OFFSET[m[1]] ?? 0
      return onDate(addDays(startOfWeek(ctx.today), weeks * 7 + target), ctx)
    }

    const ahead = (target - weekdayToIndex(dayOfWeek(ctx.today)) + 7) % 7
    if (m[2] !== undefined) {
      // 次の: strictly after today
      return onDate(addDays(ctx.today, ahead === 0 ? 7 : ahead), ctx)
    }

    const occurrence = onDate(addDays(ctx.today, ahead), ctx)
    return occurrence < ctx.now.local ? onDate(addDays(ctx.today, ahead + 7), ctx) : occurrence
  }
)

const monthAndDay = regexRule<LocalDateTime>(
  'monthAndDay',
  /(?:(\d{4})\s*年\s*)?(\d{1,2})\s*月\s*(\d{1,2})\s*日/,
  (m, ctx) => {
    const month = Number(m[2])
    const day = Number(m[3])

    if (m[1] !== undefined) {
      const year = Number(m[1])
      return isValidDate(year, month, day) ? onDate(makeDate(year, month, day), ctx) : null
    }

    const year = yearOf(ctx.today)
    if (!isValidDate(year, month, day)) return null
    const occurrence = onDate(makeDate(year, month, day), ctx)
    if (occurrence >= ctx.now.local) return occurrence

    if (!isValidDate(year + 1, month, day)) return null
    return onDate(makeDate(year + 1, month, day), ctx)
  }
)

const timeOfDayOnly = defineRule({
  name: 'timeOfDayOnly',
  match: (ctx) => extractTimeOfDay(ctx.text),
  compute: (clock, ctx): LocalDateTime => {
    const today = atTime(ctx.today, clock.hour, clock.minute)
    return today < ctx.now.local ? atTime(addDays(ctx.today, 1), clock.hour, clock.minute) : today
  },
})

/** Rule families in priority order. */
export const TEMPORAL_RULES: readonly CompiledRule<LocalDateTime>[] = [
  relativeOffset,
  namedDay,
  weekend,
  monthBoundary,
  dayOfQualifiedMonth,
  weekdayReference,
  monthAndDay,
  timeOfDayOnly,
]

// ============================================================================
// Entry Points
// ============================================================================

/** Verdict of the first rule family that recognised the phrase. */
export function evaluateTemporal(text: string, now: ReferenceInstant): RuleVerdict<LocalDateTime> {
  return runRules(TEMPORAL_RULES, createRuleContext(text, now))
}

/** Occurrence for a normalized single-shot phrase, or null for no match. */
export function resolveTemporal(text: string, now: ReferenceInstant): LocalDateTime | null {
  const verdict = evaluateTemporal(text, now)
  return verdict.status === 'resolved' ? verdict.value : null
}
