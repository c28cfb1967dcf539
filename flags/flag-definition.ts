/**
 * Flag definitions
 *
 * A FlagDefinition is the full behaviour of one feature inside one
 * configuration: default value, active switch, salt, allowlist and rules.
 * Definitions are frozen; a changed flag is a new definition.
 *
 * @module flags/flag-definition
 */

import { bucketFor, rolloutInclusion, type InclusionReason } from './bucketing'
import type { EvaluationContext } from './context'
import { InvalidArgumentError, TypeMismatchError } from './errors'
import type { Feature } from './feature'
import { rankRules, type RankedRule, type Rule } from './rule'
import { matches } from './targeting'

export const DEFAULT_SALT = 'v1'

export interface FlagDefinition<T, C extends EvaluationContext = EvaluationContext> {
  readonly feature: Feature<T>
  readonly defaultValue: T
  readonly isActive: boolean
  readonly salt: string
  /** Stable ids included by every rule regardless of bucket */
  readonly allowlist: ReadonlySet<string>
  /** Declaration order */
  readonly rules: readonly Rule<T, C>[]
  /** Evaluation order */
  readonly ranked: readonly RankedRule<T, C>[]
}

export interface FlagSpec<T, C extends EvaluationContext = EvaluationContext> {
  default: T
  rules?: readonly Rule<T, C>[]
  isActive?: boolean
  salt?: string
  allowlist?: Iterable<string>
}

/**
 * Build a definition for a feature. Values are checked against the
 * feature's value guard.
 *
 * @example
 * const def = defineFlag(applePay, {
 *   default: false,
 *   rules: [rule(true, { platforms: ['IOS'] })],
 * })
 */
export function defineFlag<T, C extends EvaluationContext = EvaluationContext>(
  feature: Feature<T>,
  spec: FlagSpec<T, C>
): FlagDefinition<T, C> {
  const salt = spec.salt ?? DEFAULT_SALT
  if (salt.trim().length === 0) {
    throw new InvalidArgumentError(`Salt for '${feature.id}' must not be blank`, { featureId: feature.id })
  }
  if (!feature.isValue(spec.default)) {
    throw new TypeMismatchError(feature.id, feature.kind, spec.default)
  }
  const rules = Object.freeze([...(spec.rules ?? [])])
  for (const r of rules) {
    if (!feature.isValue(r.value)) {
      throw new TypeMismatchError(feature.id, feature.kind, r.value)
    }
  }

  return Object.freeze({
    feature,
    defaultValue: spec.default,
    isActive: spec.isActive ?? true,
    salt,
    allowlist: new Set(spec.allowlist ?? []),
    rules,
    ranked: rankRules(rules),
  })
}

// ============================================================================
// Rule scan
// ============================================================================

export interface TraceMatch<T, C extends EvaluationContext = EvaluationContext> {
  readonly ranked: RankedRule<T, C>
  readonly inclusion?: InclusionReason
}

export interface EvaluationTrace<T, C extends EvaluationContext = EvaluationContext> {
  readonly value: T
  /** Rule whose value was returned */
  readonly matched?: TraceMatch<T, C>
  /** First rule whose targeting matched but whose rollout excluded the caller */
  readonly skippedByRollout?: TraceMatch<T, C>
  /** Set once any rule's targeting matched */
  readonly bucket?: number
}

/**
 * Scan rules in evaluation order. Ignores the active switch; callers check
 * it first. The bucket is computed at most once, on the first targeting hit.
 */
export function evaluateTrace<T, C extends EvaluationContext>(
  definition: FlagDefinition<T, C>,
  context: C
): EvaluationTrace<T, C> {
  let bucket: number | undefined
  let skippedByRollout: TraceMatch<T, C> | undefined

  for (const ranked of definition.ranked) {
    if (!matches(ranked.rule.targeting, context)) continue

    bucket ??= bucketFor(context.stableId, definition.feature.key, definition.salt)
    const allowlist = definition.allowlist.size === 0
      ? ranked.rule.allowlist
      : new Set([...definition.allowlist, ...ranked.rule.allowlist])
    const inclusion = rolloutInclusion(ranked.rule.rollout, allowlist, context.stableId, bucket)

    if (inclusion) {
      return { value: ranked.rule.value, matched: { ranked, inclusion }, skippedByRollout, bucket }
    }
    skippedByRollout ??= { ranked }
  }

  return { value: definition.defaultValue, skippedByRollout, bucket }
}
