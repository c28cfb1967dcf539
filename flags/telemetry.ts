/**
 * Registry hooks
 *
 * Logging and metrics observers attached to a registry. Hooks see every
 * evaluation and lifecycle change but never influence a result: a hook
 * that throws is reported through the logger and evaluation continues.
 *
 * @module flags/telemetry
 */

import { silentLogger, type Logger } from '../lib/logger'

export type EvaluationMode = 'normal' | 'explain' | 'shadow'

export type DecisionKind = 'registry-disabled' | 'inactive' | 'rule' | 'default'

export interface EvaluationMetric {
  namespaceId: string
  featureKey: string
  mode: EvaluationMode
  durationMs: number
  decision: DecisionKind
  configVersion?: string
  bucket?: number
  matchedRuleSpecificity?: number
}

export interface ConfigLoadMetric {
  namespaceId: string
  featureCount: number
  version?: string
}

export interface ConfigRollbackMetric {
  namespaceId: string
  steps: number
  success: boolean
  version?: string
}

export interface MetricsCollector {
  recordEvaluation?(metric: EvaluationMetric): void
  recordConfigLoad?(metric: ConfigLoadMetric): void
  recordConfigRollback?(metric: ConfigRollbackMetric): void
}

export interface RegistryHooks {
  readonly logger: Logger
  readonly metrics: MetricsCollector
}

export const NO_HOOKS: RegistryHooks = Object.freeze({ logger: silentLogger, metrics: {} })

export function createHooks(hooks: Partial<RegistryHooks> = {}): RegistryHooks {
  return Object.freeze({
    logger: hooks.logger ?? NO_HOOKS.logger,
    metrics: hooks.metrics ?? NO_HOOKS.metrics,
  })
}

/**
 * Run a hook, reporting rather than propagating its failure.
 */
export function notify(hooks: RegistryHooks, hook: string, call: () => void): void {
  try {
    call()
  } catch (error) {
    hooks.logger.warn('Telemetry hook failed', {
      hook,
      error: error instanceof Error ? error.message : String(error),
    })
  }
}

// ============================================================================
// In-memory collector
// ============================================================================

/**
 * Collector that keeps everything it receives. Bounded by `limit` per
 * metric type, oldest dropped first.
 */
export class InMemoryMetrics implements MetricsCollector {
  readonly evaluations: EvaluationMetric[] = []
  readonly loads: ConfigLoadMetric[] = []
  readonly rollbacks: ConfigRollbackMetric[] = []

  constructor(private readonly limit = 1000) {}

  private push<M>(list: M[], metric: M): void {
    list.push(metric)
    if (list.length > this.limit) list.shift()
  }

  recordEvaluation(metric: EvaluationMetric): void {
    this.push(this.evaluations, metric)
  }

  recordConfigLoad(metric: ConfigLoadMetric): void {
    this.push(this.loads, metric)
  }

  recordConfigRollback(metric: ConfigRollbackMetric): void {
    this.push(this.rollbacks, metric)
  }

  /**
   * Count of evaluations per decision kind.
   */
  decisionCounts(): Record<DecisionKind, number> {
    const counts: Record<DecisionKind, number> = { 'registry-disabled': 0, inactive: 0, rule: 0, default: 0 }
    for (const metric of this.evaluations) counts[metric.decision]++
    return counts
  }

  clear(): void {
    this.evaluations.length = 0
    this.loads.length = 0
    this.rollbacks.length = 0
  }
}
