/**
 * Segment 07: Next-Occurrence Calculator Tests
 */

import { describe, it, expect } from 'vitest'
import {
  advance,
  clampToMonth,
  nthWeekdayOfMonth,
  parseOrdinalWeekday,
  formatOrdinalWeekday,
  parseMonthDay,
  isRecurrenceKind,
  type RecurrenceRule,
} from '../src/recurrence'
import type { LocalDateTime } from '../src/time-date'

const dt = (s: string) => s as LocalDateTime

function next(occurrence: string, rule: RecurrenceRule): string {
  const result = advance(dt(occurrence), rule)
  if (!result.ok) throw new Error(`unexpected ${result.error.code}`)
  return result.value
}

describe('advance', () => {
  describe('fixed intervals', () => {
    it('adds a day for daily', () => {
      expect(next('2024-07-01T08:00:00', { kind: 'daily', value: null })).toBe('2024-07-02T08:00:00')
    })

    it('adds a week for weekly', () => {
      expect(next('2024-07-05T18:00:00', { kind: 'weekly', value: '金曜日' })).toBe('2024-07-12T18:00:00')
    })

    it('adds two weeks for biweekly', () => {
      expect(next('2024-07-03T09:00:00', { kind: 'biweekly', value: '水曜日' })).toBe('2024-07-17T09:00:00')
    })

    it('skips the weekend for weekdays', () => {
      expect(next('2024-07-05T18:00:00', { kind: 'weekdays', value: null })).toBe('2024-07-08T18:00:00')
    })

    it('moves one day midweek for weekdays', () => {
      expect(next('2024-07-02T08:00:00', { kind: 'weekdays', value: null })).toBe('2024-07-03T08:00:00')
    })
  })

  describe('monthly day', () => {
    const rule: RecurrenceRule = { kind: 'monthly', value: '31' }

    it('clamps January 31 to the end of a leap February', () => {
      expect(next('2024-01-31T09:00:00', rule)).toBe('2024-02-29T09:00:00')
    })

    it('returns to day 31 after a clamped month', () => {
      expect(next('2024-02-29T09:00:00', rule)).toBe('2024-03-31T09:00:00')
    })

    it('clamps to February 28 in a common year', () => {
      expect(next('2023-01-31T09:00:00', rule)).toBe('2023-02-28T09:00:00')
    })

    it('carries into the next year', () => {
      expect(next('2024-12-15T07:30:00', { kind: 'monthly', value: '15' })).toBe('2025-01-15T07:30:00')
    })
  })

  describe('monthly ordinal weekday', () => {
    it('finds the same ordinal next month', () => {
      expect(next('2024-07-16T09:00:00', { kind: 'monthly', value: '第3火曜日' })).toBe('2024-08-20T09:00:00')
    })

    it('takes the earliest candidate across ordinals', () => {
      expect(next('2024-07-15T09:00:00', { kind: 'monthly', value: '第1,3火曜日の前日' })).toBe('2024-08-05T09:00:00')
    })

    it('reports exhaustion when no candidate falls in the search window', () => {
      const result = advance(dt('2024-03-30T09:00:00'), { kind: 'monthly', value: '第5土曜日' })
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.code).toBe('EXHAUSTED')
    })
  })

  describe('invalid rules', () => {
    it('rejects none', () => {
      const result = advance(dt('2024-07-01T09:00:00'), { kind: 'none', value: null })
      expect(!result.ok && result.error.code).toBe('INVALID_RULE')
    })

    it('rejects a monthly rule without a value', () => {
      const result = advance(dt('2024-07-01T09:00:00'), { kind: 'monthly', value: null })
      expect(!result.ok && result.error.code).toBe('INVALID_RULE')
    })

    it('rejects an unrecognised monthly value', () => {
      const result = advance(dt('2024-07-01T09:00:00'), { kind: 'monthly', value: '月末' })
      expect(!result.ok && result.error.code).toBe('INVALID_RULE')
    })
  })
})

describe('rule values', () => {
  it('parses an ordinal weekday value', () => {
    expect(parseOrdinalWeekday('第1,3火曜日の前日')).toEqual({ ordinals: [1, 3], weekday: 'tue', dayBefore: true })
  })

  it('rejects ordinals outside 1 to 5', () => {
    expect(parseOrdinalWeekday('第6火曜日')).toBeNull()
  })

  it('formats an ordinal weekday value', () => {
    expect(formatOrdinalWeekday({ ordinals: [2], weekday: 'fri', dayBefore: false })).toBe('第2金曜日')
  })

  it('parses day-of-month digits', () => {
    expect(parseMonthDay('25')).toBe(25)
    expect(parseMonthDay('32')).toBeNull()
    expect(parseMonthDay('第3火曜日')).toBeNull()
  })

  it('recognises the rule kinds', () => {
    expect(isRecurrenceKind('biweekly')).toBe(true)
    expect(isRecurrenceKind('yearly')).toBe(false)
  })
})

describe('calendar helpers', () => {
  it('clamps a day to the month length', () => {
    expect(clampToMonth(2023, 2, 31)).toBe('2023-02-28')
    expect(clampToMonth(2024, 4, 15)).toBe('2024-04-15')
  })

  it('finds a fifth weekday when the month has one', () => {
    expect(nthWeekdayOfMonth(2024, 2, 5, 'thu')).toBe('2024-02-29')
  })

  it('returns null when the nth weekday spills into the next month', () => {
    expect(nthWeekdayOfMonth(2024, 2, 5, 'fri')).toBeNull()
  })
})
