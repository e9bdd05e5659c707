/**
 * Resolve
 *
 * Phrase → ParseResult. The phrase is normalized once and its protected
 * compounds masked; recurrence rules are tried before single-shot rules, and
 * a recurrence rule that recognises the phrase but cannot place it ends
 * resolution there.
 */

import type { LocalDateTime } from './time-date'
import type { ReferenceInstant } from './reference-instant'
import type { RecurrenceRule } from './recurrence'
import { normalizeDigits } from './normalize'
import { evaluateRecurrence } from './recurrence-detector'
import { evaluateTemporal } from './temporal-resolver'
import { extractContent } from './content-extractor'
import { maskProtected } from './protected-words'

export type ParseResult = {
  /** Never empty. */
  content: string
  occurrence: LocalDateTime
  /** Null for a single-shot reminder. */
  rule: RecurrenceRule | null
}

export function resolve(phrase: string, now: ReferenceInstant): ParseResult | null {
  // 毎日新聞 is not a daily rule, 朝食 is not a morning
  const { text } = maskProtected(normalizeDigits(phrase))

  const recurring = evaluateRecurrence(text, now)
  if (recurring.status === 'resolved') {
    return {
      content: extractContent(phrase),
      occurrence: recurring.value.occurrence,
      rule: recurring.value.rule,
    }
  }
  if (recurring.status === 'rejected') return null

  const single = evaluateTemporal(text, now)
  if (single.status !== 'resolved') return null

  return { content: extractContent(phrase), occurrence: single.value, rule: null }
}
