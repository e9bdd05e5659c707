/**
 * Vocabulary
 *
 * Closed word sets shared by the resolver, the recurrence detector and the
 * content extractor. Anything a rule value may contain is defined here.
 */

import type { Weekday } from './time-date'

// ============================================================================
// Weekdays
// ============================================================================

export const WEEKDAY_KANJI = ['月', '火', '水', '木', '金', '土', '日'] as const

export type WeekdayKanji = (typeof WEEKDAY_KANJI)[number]

const KANJI_TO_WEEKDAY: Record<WeekdayKanji, Weekday> = {
  月: 'mon',
  火: 'tue',
  水: 'wed',
  木: 'thu',
  金: 'fri',
  土: 'sat',
  日: 'sun',
}

const WEEKDAY_TO_KANJI: Record<Weekday, WeekdayKanji> = {
  mon: '月',
  tue: '火',
  wed: '水',
  thu: '木',
  fri: '金',
  sat: '土',
  sun: '日',
}

export function isWeekdayKanji(ch: string): ch is WeekdayKanji {
  return (WEEKDAY_KANJI as readonly string[]).includes(ch)
}

export function weekdayFromKanji(ch: string): Weekday | null {
  return isWeekdayKanji(ch) ? KANJI_TO_WEEKDAY[ch] : null
}

/** Rule-value token for a weekday, e.g. 'fri' → '金曜日'. */
export function weekdayToken(weekday: Weekday): string {
  return `${WEEKDAY_TO_KANJI[weekday]}曜日`
}

/** Inverse of weekdayToken; accepts 金, 金曜 and 金曜日. */
export function parseWeekdayToken(token: string): Weekday | null {
  const match = /^([月火水木金土日])(?:曜日?)?$/.exec(token)
  return match ? weekdayFromKanji(match[1] ?? '') : null
}

// ============================================================================
// Regex Fragments
// ============================================================================

/** Weekday reference. Requires 曜 so a bare 月 or 日 never reads as a weekday. */
export const WEEKDAY_RE = '([月火水木金土日])曜日?'

/** Month qualifier, longest first: 再来月 contains 来月. */
export const MONTH_QUALIFIER_RE = '(再来月|来月|今月)'

/** Week qualifier, longest first: 再来週 contains 来週. */
export const WEEK_QUALIFIER_RE = '(再来週|来週|今週)'

export const MONTH_OFFSET: Record<string, number> = { 今月: 0, 来月: 1, 再来月: 2 }

export const WEEK_OFFSET: Record<string, number> = { 今週: 0, 来週: 1, 再来週: 2 }

// ============================================================================
// Named Days
// ============================================================================

/** Ordered so that no entry is masked by a shorter one it contains. */
export const NAMED_DAYS: ReadonlyArray<readonly [word: string, offset: number]> = [
  ['明々後日', 3],
  ['明明後日', 3],
  ['しあさって', 3],
  ['明後日', 2],
  ['あさって', 2],
  ['明日', 1],
  ['あした', 1],
  ['あす', 1],
  ['今日', 0],
  ['きょう', 0],
]

// ============================================================================
// Time-of-Day Words
// ============================================================================

/** Vague period words and their default hours, longest/most specific first. */
export const PERIOD_WORDS: ReadonlyArray<readonly [word: string, hour: number]> = [
  ['午後', 14],
  ['夕方', 17],
  ['朝', 8],
  ['昼', 12],
  ['晩', 20],
  ['夜', 20],
]

/** Context words that push a bare 1–11 o'clock into the afternoon. */
export const PM_CONTEXT_RE = /午後|夕方|夕|晩|(?<!深)夜(?!中)/

/** Context words that pin a bare hour to the morning. */
export const AM_MARKER_RE = /午前|朝|深夜|夜中|未明|明け方/

// ============================================================================
// Protect List
// ============================================================================

/**
 * Compound words containing a temporal substring. The content extractor
 * never strips inside these.
 */
export const PROTECTED_WORDS: readonly string[] = [
  '毎日新聞',
  '朝日新聞',
  '朝ごはん',
  '朝ご飯',
  '朝食',
  '朝礼',
  '朝日',
  '朝顔',
  '昼ごはん',
  '昼ご飯',
  '昼休み',
  '昼食',
  '昼寝',
  '夕ごはん',
  '夕ご飯',
  '夕食',
  '夕飯',
  '晩ごはん',
  '晩ご飯',
  '夜食',
  '夜勤',
  '夜景',
  '明日香',
  '日曜大工',
  '週末婚',
]
