/**
 * Time-of-Day Extraction
 *
 * Pulls a clock time out of a normalized phrase. The checks run in a fixed
 * order and the first hit wins: a precise word must never be masked by a
 * generic one that happens to be part of it (正午 before 昼, 深夜 before 夜).
 */

import { AM_MARKER_RE, PERIOD_WORDS, PM_CONTEXT_RE } from './vocabulary'

export type ClockTime = {
  hour: number
  minute: number
}

type ClockCheck = {
  name: string
  find: (text: string) => ClockTime | null
}

function clock(hour: number, minute: number): ClockTime | null {
  if (!Number.isInteger(hour) || !Number.isInteger(minute)) return null
  if (hour < 0 || hour > 23 || minute < 0 || minute > 59) return null
  return { hour, minute }
}

/**
 * A bare 1–11 o'clock next to an afternoon/evening word reads as PM,
 * unless the phrase also carries a morning marker.
 */
export function applyPmContext(hour: number, text: string): number {
  if (hour < 1 || hour > 11) return hour
  if (!PM_CONTEXT_RE.test(text) || AM_MARKER_RE.test(text)) return hour
  return hour + 12
}

// ============================================================================
// Ordered Checks
// ============================================================================

const CLOCK_CHECKS: ClockCheck[] = [
  {
    name: 'noon',
    find: (text) => (text.includes('正午') ? clock(12, 0) : null),
  },
  {
    name: 'lateNight',
    find: (text) => (/(?:深夜|夜中)(?!\s*\d)/.test(text) ? clock(23, 0) : null),
  },
  {
    name: 'meridiem',
    find: (text) => {
      const m = /(午前|午後)\s*(\d{1,2})\s*(?:時(?!間)\s*(?:(半)|(\d{1,2})\s*分)?|[:：]\s*(\d{2}))/.exec(text)
      if (!m) return null
      let hour = Number(m[2])
      const minute = m[3] ? 30 : Number(m[4] ?? m[5] ?? 0)
      if (m[1] === '午後' && hour < 12) hour += 12
      if (m[1] === '午前' && hour === 12) hour = 0
      return clock(hour, minute)
    },
  },
  {
    name: 'hourAndHalf',
    find: (text) => {
      const m = /(\d{1,2})\s*時半/.exec(text)
      return m ? clock(applyPmContext(Number(m[1]), text), 30) : null
    },
  },
  {
    name: 'hourMinute',
    find: (text) => {
      const colon = /(\d{1,2})\s*[:：]\s*(\d{2})/.exec(text)
      if (colon) return clock(applyPmContext(Number(colon[1]), text), Number(colon[2]))
      const kanji = /(\d{1,2})\s*時(?!間)\s*(?:(\d{1,2})\s*分)?/.exec(text)
      if (kanji) return clock(applyPmContext(Number(kanji[1]), text), Number(kanji[2] ?? 0))
      return null
    },
  },
  {
    name: 'period',
    find: (text) => {
      for (const [word, hour] of PERIOD_WORDS) {
        if (text.includes(word)) return clock(hour, 0)
      }
      return null
    },
  },
]

export const CLOCK_CHECK_ORDER: readonly string[] = CLOCK_CHECKS.map((c) => c.name)

/** First clock time found by the ordered checks, or null. */
export function extractTimeOfDay(text: string): ClockTime | null {
  for (const check of CLOCK_CHECKS) {
    const found = check.find(text)
    if (found) return found
  }
  return null
}
