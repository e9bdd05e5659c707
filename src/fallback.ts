/**
 * Fallback Delegate
 *
 * Interface to an external resolver consulted only after the rule tables
 * return no match. Its timestamp is merged with locally extracted content.
 */

import type { LocalDateTime } from './time-date'
import type { ReferenceInstant } from './reference-instant'
import type { ParseResult } from './resolve'
import { extractContent } from './content-extractor'

export interface FallbackDelegate {
  /** Wall-clock occurrence in the configured zone, or null when the delegate cannot place the phrase either. */
  tryExternalResolve(phrase: string, now: ReferenceInstant): Promise<LocalDateTime | null>
}

/** Single-shot result for a delegate-supplied occurrence. */
export function mergeFallback(phrase: string, occurrence: LocalDateTime): ParseResult {
  return { content: extractContent(phrase), occurrence, rule: null }
}
