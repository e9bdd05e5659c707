/**
 * Content Extractor
 *
 * Reduces a phrase to what the reminder is about by cutting out every
 * temporal and recurrence expression along with the particles that attached
 * them to the sentence. Works on the original text, so digit classes accept
 * both ASCII and full-width forms.
 */

import { maskProtected } from './protected-words'

const D = '[0-9０-９]'
const WEEKDAY = '[月火水木金土日]曜日?'

/** Marks a removed span until particle cleanup runs. */
const GAP = '\u0001'

/** Removal order mirrors rule priority: longer, more specific spans first. */
const STRIP_PATTERNS: readonly RegExp[] = [
  // Relative offsets
  new RegExp(`(?:${D}+\\s*(?:週間|時間|日|分)\\s*半?\\s*)+(?:後|経ったら|たったら)`, 'g'),
  // Recurrence
  new RegExp(`毎月の?第${D}+(?:\\s*[,、・，]\\s*第?${D}+)*\\s*${WEEKDAY}(?:の前日)?`, 'g'),
  new RegExp(`第${D}+(?:\\s*[,、・，]\\s*第?${D}+)*\\s*${WEEKDAY}(?:の前日)?`, 'g'),
  new RegExp(`毎月の?${D}{1,2}日`, 'g'),
  new RegExp(`(?:隔週|毎週?)の?${WEEKDAY}`, 'g'),
  /毎月|毎週|隔週|平日|毎朝|毎晩|毎夜|毎夕|毎日/g,
  // Calendar references
  /来週末|今週末|週末/g,
  /(?:再来月|来月|今月)の?(?:末|最終日|初日|頭|初め)|月末/g,
  new RegExp(`(?:再来月|来月|今月)の?${D}{1,2}日`, 'g'),
  new RegExp(`(?:(?:再来週|来週|今週)の?|次の?)?${WEEKDAY}`, 'g'),
  new RegExp(`(?:${D}{4}\\s*年\\s*)?${D}{1,2}\\s*月\\s*${D}{1,2}\\s*日`, 'g'),
  /明々後日|明明後日|しあさって|明後日|あさって|明日|あした|あす|今日|きょう/g,
  // Clock times and period words
  new RegExp(`(?:午前|午後)?\\s*${D}{1,2}\\s*(?:時(?!間)\\s*(?:半|${D}{1,2}\\s*分)?|[:：]\\s*${D}{2})(?:頃|ごろ)?`, 'g'),
  /(?:今夜|今晩|今朝|正午|深夜|夜中|午前|午後|夕方|朝|昼|晩|夜)(?:頃|ごろ)?/g,
]

const LEADING_PARTICLE = '(?:には|から|まで|を|は|に|の|で|って|、|,|，|。|\\s)'
const TRAILING_PARTICLE = '(?:までには|までに|には|から|まで|に|の|で|は|って|、|,|，|\\s|頃|ごろ)'

const PARTICLES_AROUND_GAP = new RegExp(`(${LEADING_PARTICLE}*)${GAP}${TRAILING_PARTICLE}*`, 'g')

/** Nothing but further gaps and particles left after a removed span. */
const ONLY_GAPS_LEFT = new RegExp(`^(?:${GAP}|${TRAILING_PARTICLE})*$`)

const EDGE_PUNCTUATION = /^[\s、,，。]+|[\s、,，。]+$/g

/**
 * Reminder content of a phrase. Returns the input unchanged when nothing
 * would be left after removal.
 */
export function extractContent(original: string): string {
  const mask = maskProtected(original)
  let text = mask.text
  for (const pattern of STRIP_PATTERNS) {
    text = text.replace(pattern, GAP)
  }

  // A particle before a removed span stays unless the span ends the phrase:
  // 歯医者に明日行く → 歯医者に行く, but 歯医者は明日 → 歯医者
  const joined = text.replace(PARTICLES_AROUND_GAP, (span: string, leading: string, offset: number, whole: string) => {
    const atEnd = ONLY_GAPS_LEFT.test(whole.slice(offset + span.length))
    const joiner = /\s/.test(span) ? ' ' : ''
    return atEnd ? joiner : leading + joiner
  })

  const content = mask.restore(joined.replace(/\s+/g, ' ').replace(EDGE_PUNCTUATION, ''))
  return content.length > 0 ? content : original
}
