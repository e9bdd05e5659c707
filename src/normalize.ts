/**
 * Text Normalizer
 *
 * Canonicalizes digit glyphs before any pattern matching.
 */

const FULL_WIDTH_DIGIT = /[０-９]/g
const FULL_WIDTH_ZERO = '０'.charCodeAt(0)

/** Full-width numerals become ASCII digits; every other character is left alone. */
export function normalizeDigits(text: string): string {
  return text.replace(FULL_WIDTH_DIGIT, (ch) => String(ch.charCodeAt(0) - FULL_WIDTH_ZERO))
}
