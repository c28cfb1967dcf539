/**
 * Targeting
 *
 * The match criteria of a rule. Categories are ANDed; values within a
 * category are ORed. An empty category matches anything.
 *
 * @module flags/targeting
 */

import type { EvaluationContext } from './context'
import { InvalidArgumentError } from './errors'
import { UNBOUNDED, hasBounds, rangeContains, type VersionRange } from './version'

// ============================================================================
// Custom predicates
// ============================================================================

/**
 * Application-supplied matching logic. The engine only calls these two
 * methods; it never inspects the predicate.
 */
export interface CustomPredicate<C extends EvaluationContext = EvaluationContext> {
  matches(context: C): boolean
  /** Non-negative integer added to the rule's specificity */
  specificity(): number
}

/**
 * Wrap a function as a predicate.
 *
 * @example
 * const beta = predicate<AppContext>(ctx => ctx.betaOptIn === true, 1)
 */
export function predicate<C extends EvaluationContext>(
  matches: (context: C) => boolean,
  specificity = 1
): CustomPredicate<C> {
  return { matches, specificity: () => specificity }
}

// ============================================================================
// Targeting
// ============================================================================

export interface Targeting<C extends EvaluationContext = EvaluationContext> {
  readonly locales: ReadonlySet<string>
  readonly platforms: ReadonlySet<string>
  readonly versionRange: VersionRange
  /** axis id -> allowed values */
  readonly axes: ReadonlyMap<string, ReadonlySet<string>>
  readonly predicate?: CustomPredicate<C>
}

export interface TargetingSpec<C extends EvaluationContext = EvaluationContext> {
  locales?: Iterable<string>
  platforms?: Iterable<string>
  versions?: VersionRange
  axes?: Record<string, Iterable<string>>
  predicate?: CustomPredicate<C>
}

/**
 * Build targeting from a spec. Throws when an axis constraint names no
 * values, since it could never match.
 */
export function targeting<C extends EvaluationContext = EvaluationContext>(
  spec: TargetingSpec<C> = {}
): Targeting<C> {
  const axes = new Map<string, ReadonlySet<string>>()
  for (const [axisId, values] of Object.entries(spec.axes ?? {})) {
    const allowed = new Set(values)
    if (allowed.size === 0) {
      throw new InvalidArgumentError(`Axis constraint '${axisId}' allows no values`, { axisId })
    }
    axes.set(axisId, allowed)
  }

  return Object.freeze({
    locales: new Set(spec.locales ?? []),
    platforms: new Set(spec.platforms ?? []),
    versionRange: spec.versions ?? UNBOUNDED,
    axes,
    predicate: spec.predicate,
  })
}

// ============================================================================
// Matching
// ============================================================================

function memberOf(allowed: ReadonlySet<string>, value: string | undefined): boolean {
  if (allowed.size === 0) return true
  return value !== undefined && allowed.has(value)
}

function axesMatch(constraints: ReadonlyMap<string, ReadonlySet<string>>, context: EvaluationContext): boolean {
  for (const [axisId, allowed] of constraints) {
    const present = context.axes?.get(axisId)
    if (!present) return false
    let hit = false
    for (const value of present) {
      if (allowed.has(value)) {
        hit = true
        break
      }
    }
    if (!hit) return false
  }
  return true
}

export function matches<C extends EvaluationContext>(target: Targeting<C>, context: C): boolean {
  if (!memberOf(target.locales, context.locale)) return false
  if (!memberOf(target.platforms, context.platform)) return false
  if (hasBounds(target.versionRange)) {
    if (!context.appVersion || !rangeContains(target.versionRange, context.appVersion)) return false
  }
  if (!axesMatch(target.axes, context)) return false
  if (target.predicate && !target.predicate.matches(context)) return false
  return true
}

// ============================================================================
// Specificity
// ============================================================================

/**
 * Specificity of the built-in criteria. An unbounded version range counts
 * zero whether it was written explicitly or left out.
 */
export function baseSpecificity<C extends EvaluationContext>(target: Targeting<C>): number {
  return (
    (target.locales.size > 0 ? 1 : 0) +
    (target.platforms.size > 0 ? 1 : 0) +
    (hasBounds(target.versionRange) ? 1 : 0) +
    target.axes.size
  )
}

export function extensionSpecificity<C extends EvaluationContext>(target: Targeting<C>): number {
  return target.predicate?.specificity() ?? 0
}

export function specificity<C extends EvaluationContext>(target: Targeting<C>): number {
  return baseSpecificity(target) + extensionSpecificity(target)
}
