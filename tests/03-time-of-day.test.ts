/**
 * Segment 03: Time-of-Day Extraction Tests
 *
 * Order of the checks matters: precise words first, vague period words last.
 */

import { describe, it, expect } from 'vitest'
import { extractTimeOfDay, applyPmContext, CLOCK_CHECK_ORDER } from '../src/time-of-day'

describe('extractTimeOfDay', () => {
  describe('explicit clock times', () => {
    it('reads H時', () => {
      expect(extractTimeOfDay('明日18時に歯医者')).toEqual({ hour: 18, minute: 0 })
    })

    it('reads H時M分', () => {
      expect(extractTimeOfDay('9時15分に会議')).toEqual({ hour: 9, minute: 15 })
    })

    it('reads H:MM', () => {
      expect(extractTimeOfDay('10:30から面談')).toEqual({ hour: 10, minute: 30 })
    })

    it('reads H時半', () => {
      expect(extractTimeOfDay('7時半に起きる')).toEqual({ hour: 7, minute: 30 })
    })

    it('never reads H時間 as a clock time', () => {
      expect(extractTimeOfDay('3時間後')).toBeNull()
    })

    it('rejects an out-of-range hour', () => {
      expect(extractTimeOfDay('25時')).toBeNull()
    })
  })

  describe('meridiem', () => {
    it('moves 午後 hours into the afternoon', () => {
      expect(extractTimeOfDay('午後3時半')).toEqual({ hour: 15, minute: 30 })
    })

    it('keeps 午前 hours', () => {
      expect(extractTimeOfDay('午前9時')).toEqual({ hour: 9, minute: 0 })
    })

    it('reads 午前12時 as midnight', () => {
      expect(extractTimeOfDay('午前12時')).toEqual({ hour: 0, minute: 0 })
    })
  })

  describe('PM heuristic', () => {
    it('reads a bare hour next to 夜 as PM', () => {
      expect(extractTimeOfDay('夜9時')).toEqual({ hour: 21, minute: 0 })
    })

    it('reads a bare hour next to 夕方 as PM', () => {
      expect(extractTimeOfDay('夕方5時')).toEqual({ hour: 17, minute: 0 })
    })

    it('leaves morning hours alone', () => {
      expect(extractTimeOfDay('朝7時')).toEqual({ hour: 7, minute: 0 })
    })

    it('does not treat 深夜 as PM context', () => {
      expect(extractTimeOfDay('深夜2時')).toEqual({ hour: 2, minute: 0 })
    })

    it('skips hours outside 1 to 11', () => {
      expect(applyPmContext(12, '夜')).toBe(12)
      expect(applyPmContext(0, '夜')).toBe(0)
    })

    it('yields to a morning marker', () => {
      expect(applyPmContext(8, '朝と夜')).toBe(8)
    })
  })

  describe('period words', () => {
    it('maps 正午 to noon', () => {
      expect(extractTimeOfDay('正午にランチ')).toEqual({ hour: 12, minute: 0 })
    })

    it('maps a bare 深夜 to 23:00', () => {
      expect(extractTimeOfDay('深夜にバックアップ')).toEqual({ hour: 23, minute: 0 })
    })

    it('maps 夕方 to 17:00', () => {
      expect(extractTimeOfDay('夕方に散歩')).toEqual({ hour: 17, minute: 0 })
    })

    it('maps 朝 to 08:00', () => {
      expect(extractTimeOfDay('朝に薬')).toEqual({ hour: 8, minute: 0 })
    })

    it('maps 晩 to 20:00', () => {
      expect(extractTimeOfDay('晩に電話')).toEqual({ hour: 20, minute: 0 })
    })

    it('prefers an explicit hour over a period word', () => {
      expect(extractTimeOfDay('朝6時')).toEqual({ hour: 6, minute: 0 })
    })
  })

  it('returns null without any time expression', () => {
    expect(extractTimeOfDay('牛乳を買う')).toBeNull()
  })

  it('runs its checks in a fixed order', () => {
    expect(CLOCK_CHECK_ORDER).toEqual(['noon', 'lateNight', 'meridiem', 'hourAndHalf', 'hourMinute', 'period'])
  })
})
