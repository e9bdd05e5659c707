/**
 * Segment 06: Content Extractor Tests
 */

import { describe, it, expect } from 'vitest'
import { extractContent } from '../src/content-extractor'
import { maskProtected } from '../src/protected-words'

describe('extractContent', () => {
  describe('strips temporal expressions and their particles', () => {
    it('removes a named day and a clock time', () => {
      expect(extractContent('明日18時に歯医者')).toBe('歯医者')
    })

    it('removes a weekly recurrence', () => {
      expect(extractContent('毎週金曜18時にゴミ出し')).toBe('ゴミ出し')
    })

    it('removes a monthly day', () => {
      expect(extractContent('毎月31日に家賃')).toBe('家賃')
    })

    it('removes an ordinal weekday with the day-before marker', () => {
      expect(extractContent('毎月第1,3火曜の前日に準備')).toBe('準備')
    })

    it('removes a relative offset', () => {
      expect(extractContent('3日後に返却')).toBe('返却')
    })

    it('removes a week-qualified weekday and から', () => {
      expect(extractContent('来週の水曜10時から会議')).toBe('会議')
    })

    it('removes 今夜 together with the hour', () => {
      expect(extractContent('今夜9時にジム')).toBe('ジム')
    })

    it('accepts full-width digits', () => {
      expect(extractContent('１８時に会議')).toBe('会議')
    })

    it('drops a comma after the removed span', () => {
      expect(extractContent('明日、歯医者')).toBe('歯医者')
    })
  })

  describe('particle handling', () => {
    it('drops the particle before a span that ends the phrase', () => {
      expect(extractContent('歯医者は明日')).toBe('歯医者')
    })

    it('keeps the particle before a span inside the phrase', () => {
      expect(extractContent('歯医者に明日行く')).toBe('歯医者に行く')
    })

    it('keeps a single space where the phrase had spaces', () => {
      expect(extractContent('MTG 明日 準備')).toBe('MTG 準備')
    })
  })

  describe('protect list', () => {
    it('never strips inside a protected compound', () => {
      expect(extractContent('毎日新聞を読む')).toBe('毎日新聞を読む')
    })

    it('keeps 朝ごはん while removing 明日', () => {
      expect(extractContent('朝ごはんを明日作る')).toBe('朝ごはんを作る')
    })

    it('keeps 昼休み', () => {
      expect(extractContent('明日の昼休みに電話')).toBe('昼休みに電話')
    })

    it('leaves private-use characters already in the phrase alone', () => {
      expect(extractContent('\uE000メモ')).toBe('\uE000メモ')
      expect(extractContent('\uE000朝食を明日作る')).toBe('\uE000朝食を作る')
    })
  })

  describe('maskProtected', () => {
    it('parks protected words and puts them back', () => {
      const mask = maskProtected('明日香と朝食')
      expect(mask.text).toBe('\uE000と\uE001')
      expect(mask.restore(mask.text)).toBe('明日香と朝食')
    })

    it('parks the longest compound first', () => {
      expect(maskProtected('朝日新聞').text).toBe('\uE000')
    })

    it('skips placeholders that already occur in the text', () => {
      const mask = maskProtected('\uE000毎日新聞')
      expect(mask.text).toBe('\uE000\uE001')
      expect(mask.restore('\uE000\uE001')).toBe('\uE000毎日新聞')
    })

    it('returns text without protected words unchanged', () => {
      const mask = maskProtected('明日の会議')
      expect(mask.text).toBe('明日の会議')
      expect(mask.restore('\uE000')).toBe('\uE000')
    })
  })

  describe('never returns an empty string', () => {
    it('falls back to the original text', () => {
      expect(extractContent('明日')).toBe('明日')
    })

    it('returns text without temporal content unchanged', () => {
      expect(extractContent('牛乳を買う')).toBe('牛乳を買う')
    })
  })
})
