/**
 * Intake
 *
 * Front door for a message typed into the reminder channel: list commands,
 * then the rule tables, then the optional fallback delegate.
 */

import type { ParseResult } from './resolve'
import { resolve } from './resolve'
import { type ReferenceInstant, referenceInstant } from './reference-instant'
import { type FallbackDelegate, mergeFallback } from './fallback'
import { type Logger, describeError, silentLogger } from './logger'

export type IntakeCommand = 'list'

/** Channel messages that are commands rather than reminder phrases. */
export const SPECIAL_COMMANDS: Readonly<Record<string, IntakeCommand>> = {
  一覧: 'list',
  リスト: 'list',
  確認: 'list',
}

export type Interpretation =
  | { command: IntakeCommand }
  | { source: 'rules' | 'fallback'; result: ParseResult }

export type IntakeOptions = {
  timeZone: string
  fallback?: FallbackDelegate
  /** Epoch milliseconds. */
  clock?: () => number
  logger?: Logger
}

export type ReminderIntake = {
  /** Null when neither the rules nor the delegate can place the phrase. */
  interpret(message: string): Promise<Interpretation | null>
}

export function createReminderIntake(options: IntakeOptions): ReminderIntake {
  const clock = options.clock ?? Date.now
  const log = options.logger ?? silentLogger
  const fallbackLog = log.child('fallback')

  async function viaFallback(phrase: string, now: ReferenceInstant): Promise<ParseResult | null> {
    if (!options.fallback) return null
    try {
      const occurrence = await options.fallback.tryExternalResolve(phrase, now)
      if (occurrence === null) {
        fallbackLog.info(`No resolution for '${phrase}'`)
        return null
      }
      fallbackLog.info(`Resolved '${phrase}' → ${occurrence}`)
      return mergeFallback(phrase, occurrence)
    } catch (err) {
      fallbackLog.error(`Delegate failed for '${phrase}': ${describeError(err)}`)
      return null
    }
  }

  return {
    async interpret(message) {
      const phrase = message.trim()
      if (phrase.length === 0) return null

      const command = SPECIAL_COMMANDS[phrase]
      if (command !== undefined) return { command }

      const now = referenceInstant(clock(), options.timeZone)
      const result = resolve(phrase, now)
      if (result !== null) {
        log.debug(`Rules resolved '${phrase}' → ${result.occurrence}`)
        return { source: 'rules', result }
      }

      const delegated = await viaFallback(phrase, now)
      return delegated ? { source: 'fallback', result: delegated } : null
    },
  }
}
