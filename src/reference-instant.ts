/**
 * Reference Instant
 *
 * The fixed "now" a resolution call works against. It is captured once per
 * call and never re-read, which keeps resolution deterministic.
 */

import { type LocalDateTime, fromEpochMs } from './time-date'

export type ReferenceInstant = {
  /** Wall-clock reading of now in `timeZone`. */
  readonly local: LocalDateTime
  readonly timeZone: string
}

/** Reference instant for an absolute moment, read in `timeZone`. */
export function referenceInstant(at: Date | number, timeZone: string): ReferenceInstant {
  const ms = typeof at === 'number' ? at : at.getTime()
  return { local: fromEpochMs(ms, timeZone), timeZone }
}

/** Reference instant from a wall-clock reading already in `timeZone`. */
export function referenceFromLocal(local: LocalDateTime, timeZone: string): ReferenceInstant {
  return { local, timeZone }
}
