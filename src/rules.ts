/**
 * Phrase Rules
 *
 * A rule is a (match, compute) pair. Rules are evaluated in table order and
 * the first rule whose match fires owns the phrase: if its compute cannot
 * produce a value (an impossible calendar date, an ordinal that never
 * occurs) the phrase is rejected rather than handed to a lower-priority rule.
 */

import { type LocalDate, dateOf } from './time-date'
import type { ReferenceInstant } from './reference-instant'

// ============================================================================
// Types
// ============================================================================

export type RuleContext = {
  /** Normalized phrase. */
  readonly text: string
  readonly now: ReferenceInstant
  readonly today: LocalDate
}

export type PhraseRule<M, R> = {
  name: string
  match: (ctx: RuleContext) => M | null
  compute: (match: M, ctx: RuleContext) => R | null
}

export type RuleVerdict<R> =
  | { status: 'unmatched' }
  | { status: 'rejected'; rule: string }
  | { status: 'resolved'; rule: string; value: R }

/** A rule with its match type erased, so rules of different shapes share one table. */
export type CompiledRule<R> = {
  readonly name: string
  apply: (ctx: RuleContext) => RuleVerdict<R>
}

// ============================================================================
// Construction
// ============================================================================

export function defineRule<M, R>(rule: PhraseRule<M, R>): CompiledRule<R> {
  return {
    name: rule.name,
    apply(ctx) {
      const match = rule.match(ctx)
      if (match === null) return { status: 'unmatched' }
      const value = rule.compute(match, ctx)
      if (value === null) return { status: 'rejected', rule: rule.name }
      return { status: 'resolved', rule: rule.name, value }
    },
  }
}

/** Rule whose match is a single regular expression over the normalized text. */
export function regexRule<R>(
  name: string,
  pattern: RegExp,
  compute: (match: RegExpExecArray, ctx: RuleContext) => R | null
): CompiledRule<R> {
  return defineRule({ name, match: (ctx) => pattern.exec(ctx.text), compute })
}

export function createRuleContext(text: string, now: ReferenceInstant): RuleContext {
  return { text, now, today: dateOf(now.local) }
}

// ============================================================================
// Evaluation
// ============================================================================

export function runRules<R>(rules: readonly CompiledRule<R>[], ctx: RuleContext): RuleVerdict<R> {
  for (const rule of rules) {
    const verdict = rule.apply(ctx)
    if (verdict.status !== 'unmatched') return verdict
  }
  return { status: 'unmatched' }
}
