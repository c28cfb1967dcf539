/**
 * Rules
 *
 * A rule binds a value to targeting plus a rollout. Evaluation visits
 * rules by descending specificity; rules of equal specificity keep their
 * declaration order.
 *
 * @module flags/rule
 */

import { assertRollout } from './bucketing'
import type { EvaluationContext } from './context'
import { InvalidArgumentError } from './errors'
import {
  baseSpecificity,
  extensionSpecificity,
  targeting,
  type Targeting,
  type TargetingSpec,
} from './targeting'

export interface Rule<T, C extends EvaluationContext = EvaluationContext> {
  readonly value: T
  readonly targeting: Targeting<C>
  /** Percentage in [0, 100] */
  readonly rollout: number
  /** Stable id hex strings always included */
  readonly allowlist: ReadonlySet<string>
  readonly note?: string
}

export interface RuleSpec<C extends EvaluationContext = EvaluationContext> extends TargetingSpec<C> {
  rollout?: number
  allowlist?: Iterable<string>
  note?: string
}

/**
 * Build a rule.
 *
 * @example
 * rule(true, { platforms: ['IOS'], rollout: 25, note: 'iOS ramp' })
 */
export function rule<T, C extends EvaluationContext = EvaluationContext>(value: T, spec: RuleSpec<C> = {}): Rule<T, C> {
  const target = targeting(spec)
  const extension = extensionSpecificity(target)
  if (!Number.isSafeInteger(extension) || extension < 0) {
    throw new InvalidArgumentError('Custom predicate specificity must be a non-negative integer', { specificity: extension })
  }
  return Object.freeze({
    value,
    targeting: target,
    rollout: assertRollout(spec.rollout ?? 100),
    allowlist: new Set(spec.allowlist ?? []),
    note: spec.note,
  })
}

// ============================================================================
// Ordering
// ============================================================================

/**
 * A rule with its position and computed specificity.
 */
export interface RankedRule<T, C extends EvaluationContext = EvaluationContext> {
  readonly rule: Rule<T, C>
  /** Declaration index */
  readonly index: number
  readonly baseSpecificity: number
  readonly extensionSpecificity: number
  readonly specificity: number
}

/**
 * Evaluation order: specificity descending, then declaration order.
 */
export function rankRules<T, C extends EvaluationContext>(rules: readonly Rule<T, C>[]): readonly RankedRule<T, C>[] {
  const ranked = rules.map((r, index) => {
    const base = baseSpecificity(r.targeting)
    const extension = extensionSpecificity(r.targeting)
    return Object.freeze({
      rule: r,
      index,
      baseSpecificity: base,
      extensionSpecificity: extension,
      specificity: base + extension,
    })
  })
  ranked.sort((a, b) => b.specificity - a.specificity || a.index - b.index)
  return Object.freeze(ranked)
}
