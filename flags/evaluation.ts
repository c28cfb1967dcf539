/**
 * Flag Evaluation
 *
 * Resolves a feature against a context and a registry snapshot.
 *
 *   registry disabled -> default   (registry-disabled)
 *   flag inactive     -> default   (inactive)
 *   rule scan         -> rule value (rule)
 *   nothing included  -> default   (default)
 *
 * Evaluation never fails for a context that matches nothing. The only
 * thrown error is FlagNotFoundError, for a feature the snapshot lacks.
 *
 * @module flags/evaluation
 */

import { performance } from 'node:perf_hooks'
import { canonicalJson } from '../lib/safe-stringify'
import { bucketInfo, type BucketInfo, type InclusionReason } from './bucketing'
import type { EvaluationContext } from './context'
import { TypeMismatchError } from './errors'
import type { Feature } from './feature'
import { evaluateTrace, type TraceMatch } from './flag-definition'
import type { EvaluationSnapshot, EvaluationSource } from './registry'
import type { RankedRule } from './rule'
import { notify, type DecisionKind, type EvaluationMode } from './telemetry'
import { formatRange, type VersionRange } from './version'

// ============================================================================
// DIAGNOSTICS TYPES
// ============================================================================

/**
 * Rule as reported in diagnostics.
 */
export interface RuleExplanation {
  /** Position in declaration order */
  index: number
  note?: string
  rollout: number
  locales: string[]
  platforms: string[]
  versionRange: VersionRange
  axes: Record<string, string[]>
  baseSpecificity: number
  extensionSpecificity: number
  totalSpecificity: number
}

export interface RuleMatch {
  rule: RuleExplanation
  bucket: BucketInfo
  /** Present when the rule was applied */
  inclusion?: InclusionReason
}

export type Decision =
  | { kind: 'registry-disabled' }
  | { kind: 'inactive' }
  | { kind: 'rule'; matched: RuleMatch; skippedByRollout?: RuleMatch }
  | { kind: 'default'; skippedByRollout?: RuleMatch }

export interface EvaluationDiagnostics<T> {
  namespaceId: string
  featureKey: string
  configVersion?: string
  mode: EvaluationMode
  durationMs: number
  value: T
  decision: Decision
}

// ============================================================================
// Explanation helpers
// ============================================================================

function explainRule<C extends EvaluationContext>(ranked: RankedRule<unknown, C>): RuleExplanation {
  const target = ranked.rule.targeting
  return {
    index: ranked.index,
    note: ranked.rule.note,
    rollout: ranked.rule.rollout,
    locales: [...target.locales],
    platforms: [...target.platforms],
    versionRange: target.versionRange,
    axes: Object.fromEntries([...target.axes].map(([id, values]) => [id, [...values]])),
    baseSpecificity: ranked.baseSpecificity,
    extensionSpecificity: ranked.extensionSpecificity,
    totalSpecificity: ranked.specificity,
  }
}

function toRuleMatch<C extends EvaluationContext>(
  match: TraceMatch<unknown, C>,
  bucket: number,
  featureKey: string,
  salt: string
): RuleMatch {
  return {
    rule: explainRule(match.ranked),
    bucket: bucketInfo(featureKey, salt, bucket, match.ranked.rule.rollout),
    inclusion: match.inclusion,
  }
}

/**
 * One-line human readable summary of a decision.
 */
export function describeDecision(decision: Decision): string {
  switch (decision.kind) {
    case 'registry-disabled':
      return 'registry disabled; returned default'
    case 'inactive':
      return 'flag inactive; returned default'
    case 'rule': {
      const { rule, bucket, inclusion } = decision.matched
      const label = rule.note ? `'${rule.note}'` : `#${rule.index}`
      const range = rule.versionRange.kind === 'unbounded' ? '' : ` versions ${formatRange(rule.versionRange)}`
      return `rule ${label}${range} matched (specificity ${rule.totalSpecificity}, bucket ${bucket.bucket}, via ${inclusion ?? 'rollout'})`
    }
    case 'default':
      return decision.skippedByRollout
        ? `no rule applied; rule #${decision.skippedByRollout.rule.index} excluded by rollout (bucket ${decision.skippedByRollout.bucket.bucket})`
        : 'no rule matched; returned default'
  }
}

// ============================================================================
// Core
// ============================================================================

function decide<C extends EvaluationContext>(
  snapshot: EvaluationSnapshot<C>,
  feature: Feature<unknown>,
  context: C
): { value: unknown; decision: Decision } {
  const definition = snapshot.flag(feature)

  if (snapshot.isAllDisabled) {
    return { value: definition.defaultValue, decision: { kind: 'registry-disabled' } }
  }
  if (!definition.isActive) {
    return { value: definition.defaultValue, decision: { kind: 'inactive' } }
  }

  const trace = evaluateTrace(definition, context)
  const bucket = trace.bucket ?? 0
  const skipped = trace.skippedByRollout
    ? toRuleMatch(trace.skippedByRollout, bucket, feature.key, definition.salt)
    : undefined

  if (trace.matched) {
    return {
      value: trace.value,
      decision: {
        kind: 'rule',
        matched: toRuleMatch(trace.matched, bucket, feature.key, definition.salt),
        skippedByRollout: skipped,
      },
    }
  }
  return { value: trace.value, decision: { kind: 'default', skippedByRollout: skipped } }
}

function run<T, C extends EvaluationContext>(
  feature: Feature<T>,
  context: C,
  source: EvaluationSource<C>,
  mode: EvaluationMode
): EvaluationDiagnostics<T> {
  const snapshot = source.snapshot()
  const started = performance.now()
  const { value, decision } = decide(snapshot, feature, context)
  const durationMs = performance.now() - started

  if (!feature.isValue(value)) {
    throw new TypeMismatchError(feature.id, feature.kind, value)
  }

  const diagnostics: EvaluationDiagnostics<T> = {
    namespaceId: snapshot.namespaceId,
    featureKey: feature.key,
    configVersion: snapshot.configuration.metadata.version,
    mode,
    durationMs,
    value,
    decision,
  }

  const { hooks } = snapshot
  if (mode === 'explain') {
    hooks.logger.debug('Explained evaluation', {
      namespaceId: diagnostics.namespaceId,
      featureKey: diagnostics.featureKey,
      version: diagnostics.configVersion,
      decision: describeDecision(decision),
    })
  }

  notify(hooks, 'recordEvaluation', () => hooks.metrics.recordEvaluation?.({
    namespaceId: diagnostics.namespaceId,
    featureKey: diagnostics.featureKey,
    mode,
    durationMs,
    decision: decisionKind(decision),
    configVersion: diagnostics.configVersion,
    bucket: decision.kind === 'rule' ? decision.matched.bucket.bucket : decision.kind === 'default' ? decision.skippedByRollout?.bucket.bucket : undefined,
    matchedRuleSpecificity: decision.kind === 'rule' ? decision.matched.rule.totalSpecificity : undefined,
  }))

  return diagnostics
}

export function decisionKind(decision: Decision): DecisionKind {
  return decision.kind
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Evaluate a feature.
 *
 * @example
 * const enabled = evaluate(applePay, { platform: 'IOS', stableId: stableId('user-1') }, checkout.registry)
 */
export function evaluate<T, C extends EvaluationContext>(feature: Feature<T>, context: C, source: EvaluationSource<C>): T {
  return run(feature, context, source, 'normal').value
}

/**
 * Evaluate and return the full decision trace.
 */
export function explain<T, C extends EvaluationContext>(
  feature: Feature<T>,
  context: C,
  source: EvaluationSource<C>
): EvaluationDiagnostics<T> {
  return run(feature, context, source, 'explain')
}

// ============================================================================
// Shadow evaluation
// ============================================================================

export interface ShadowMismatch<T> {
  featureKey: string
  /** What differed: the value, the decision kind, or both */
  kinds: Array<'value' | 'decision'>
  baseline: EvaluationDiagnostics<T>
  candidate: EvaluationDiagnostics<T>
}

export interface ShadowOptions<T, C extends EvaluationContext> {
  baseline: EvaluationSource<C>
  candidate: EvaluationSource<C>
  onMismatch?: (mismatch: ShadowMismatch<T>) => void
  /** Evaluate the candidate even while the baseline registry is disabled */
  evaluateCandidateWhenBaselineDisabled?: boolean
}

/**
 * Return the baseline value while evaluating a candidate configuration on
 * the side. Candidate failures are logged and never reach the caller.
 */
export function evaluateWithShadow<T, C extends EvaluationContext>(
  feature: Feature<T>,
  context: C,
  options: ShadowOptions<T, C>
): T {
  const baselineSnapshot = options.baseline.snapshot()
  const fixed: EvaluationSource<C> = { snapshot: () => baselineSnapshot }
  const baseline = run(feature, context, fixed, 'normal')

  if (baselineSnapshot.isAllDisabled && !options.evaluateCandidateWhenBaselineDisabled) {
    return baseline.value
  }

  const logger = baselineSnapshot.hooks.logger
  let candidate: EvaluationDiagnostics<T>
  try {
    candidate = run(feature, context, options.candidate, 'shadow')
  } catch (error) {
    logger.warn('Shadow evaluation failed', {
      featureKey: feature.key,
      error: error instanceof Error ? error.message : String(error),
    })
    return baseline.value
  }

  const kinds: Array<'value' | 'decision'> = []
  if (canonicalJson(baseline.value) !== canonicalJson(candidate.value)) {
    kinds.push('value')
  }
  if (baseline.decision.kind !== candidate.decision.kind) {
    kinds.push('decision')
  }

  if (kinds.length > 0) {
    logger.warn('Shadow mismatch', {
      featureKey: feature.key,
      kinds,
      baseline: describeDecision(baseline.decision),
      candidate: describeDecision(candidate.decision),
    })
    if (options.onMismatch) {
      const onMismatch = options.onMismatch
      const mismatch: ShadowMismatch<T> = { featureKey: feature.key, kinds, baseline, candidate }
      notify(baselineSnapshot.hooks, 'onMismatch', () => onMismatch(mismatch))
    }
  }

  return baseline.value
}
