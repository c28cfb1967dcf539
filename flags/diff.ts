/**
 * Configuration diff
 *
 * @module flags/diff
 */

import { canonicalJson } from '../lib/safe-stringify'
import type { AnyFlagDefinition, Configuration, ConfigurationMetadata } from './configuration'
import type { EvaluationContext } from './context'
import { compareFeatureIds, type FeatureId } from './identity'
import type { Rule } from './rule'
import { formatRange } from './version'

export interface ConfigurationDiff {
  readonly before: ConfigurationMetadata
  readonly after: ConfigurationMetadata
  readonly added: readonly FeatureId[]
  readonly removed: readonly FeatureId[]
  /** Present in both with a different default, active switch or rule list */
  readonly changed: readonly FeatureId[]
}

function describeRule<C extends EvaluationContext>(r: Rule<unknown, C>): Record<string, unknown> {
  return {
    value: r.value,
    rollout: r.rollout,
    allowlist: [...r.allowlist].sort(),
    note: r.note ?? null,
    locales: [...r.targeting.locales].sort(),
    platforms: [...r.targeting.platforms].sort(),
    versions: formatRange(r.targeting.versionRange),
    axes: Object.fromEntries([...r.targeting.axes].map(([id, values]) => [id, [...values].sort()])),
  }
}

function sameRules<C extends EvaluationContext>(a: AnyFlagDefinition<C>, b: AnyFlagDefinition<C>): boolean {
  if (a.rules.length !== b.rules.length) return false
  return a.rules.every((left, i) => {
    const right = b.rules[i]
    return right !== undefined &&
      left.targeting.predicate === right.targeting.predicate &&
      canonicalJson(describeRule(left)) === canonicalJson(describeRule(right))
  })
}

export function definitionsEqual<C extends EvaluationContext>(a: AnyFlagDefinition<C>, b: AnyFlagDefinition<C>): boolean {
  if (a === b) return true
  return a.isActive === b.isActive &&
    canonicalJson(a.defaultValue) === canonicalJson(b.defaultValue) &&
    sameRules(a, b)
}

/**
 * Added, removed and changed features between two configurations, each
 * sorted by identity.
 */
export function diffConfigurations<C extends EvaluationContext>(
  before: Configuration<C>,
  after: Configuration<C>
): ConfigurationDiff {
  const added: FeatureId[] = []
  const removed: FeatureId[] = []
  const changed: FeatureId[] = []

  for (const [id, definition] of after.flags) {
    const previous = before.flags.get(id)
    if (!previous) {
      added.push(id)
    } else if (!definitionsEqual(previous, definition)) {
      changed.push(id)
    }
  }
  for (const id of before.flags.keys()) {
    if (!after.flags.has(id)) removed.push(id)
  }

  return {
    before: before.metadata,
    after: after.metadata,
    added: added.sort(compareFeatureIds),
    removed: removed.sort(compareFeatureIds),
    changed: changed.sort(compareFeatureIds),
  }
}

export function isEmptyDiff(diff: ConfigurationDiff): boolean {
  return diff.added.length === 0 && diff.removed.length === 0 && diff.changed.length === 0
}
