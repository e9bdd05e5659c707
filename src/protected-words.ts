/**
 * Protected Words
 *
 * Compounds such as 朝食 or 毎日新聞 contain temporal substrings but name
 * things, not times. They are parked behind private-use placeholders while
 * rules run, then put back.
 */

import { PROTECTED_WORDS } from './vocabulary'

const PLACEHOLDER_BASE = 0xe000

// Longest first so 朝日新聞 is parked before 朝日
const PROTECTED_BY_LENGTH = [...PROTECTED_WORDS].sort((a, b) => b.length - a.length)

export type MaskedText = {
  text: string
  /** Puts back the words this mask parked; other code points pass through. */
  restore: (text: string) => string
}

/**
 * Replaces each protected word in `text` with a placeholder code point that
 * does not already occur in `text`.
 */
export function maskProtected(text: string): MaskedText {
  const parked: Array<readonly [mark: string, word: string]> = []
  let masked = text
  let code = PLACEHOLDER_BASE

  for (const word of PROTECTED_BY_LENGTH) {
    if (!masked.includes(word)) continue
    while (text.includes(String.fromCharCode(code))) code++
    const mark = String.fromCharCode(code++)
    masked = masked.split(word).join(mark)
    parked.push([mark, word])
  }

  return {
    text: masked,
    restore: (s) => parked.reduce((acc, [mark, word]) => acc.split(mark).join(word), s),
  }
}
