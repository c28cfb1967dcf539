/**
 * Namespace registry
 *
 * Holds the current configuration of one namespace, a bounded history for
 * rollback, the kill switch and test overrides.
 *
 * Every mutation is synchronous and publishes its result by replacing a
 * single field with a new frozen value, so a reader holding a snapshot
 * keeps a complete configuration no matter what is loaded afterwards.
 *
 * @module flags/registry
 */

import {
  emptyConfiguration,
  patchConfiguration,
  type AnyFlagDefinition,
  type Configuration,
} from './configuration'
import type { EvaluationContext } from './context'
import { FlagNotFoundError, InvalidArgumentError, TypeMismatchError } from './errors'
import type { Feature } from './feature'
import { defineFlag } from './flag-definition'
import type { FeatureId } from './identity'
import { rule } from './rule'
import { NO_HOOKS, notify, type RegistryHooks } from './telemetry'

export const DEFAULT_HISTORY_LIMIT = 10

export interface RegistryOptions<C extends EvaluationContext = EvaluationContext> {
  /** Initial configuration; the registry starts empty without one */
  configuration?: Configuration<C>
  historyLimit?: number
  hooks?: RegistryHooks
}

/**
 * Immutable view used for one evaluation.
 */
export interface EvaluationSnapshot<C extends EvaluationContext = EvaluationContext> {
  readonly namespaceId: string
  readonly configuration: Configuration<C>
  readonly isAllDisabled: boolean
  readonly hooks: RegistryHooks
  /** Throws FlagNotFoundError when the feature is absent */
  flag(feature: Feature<unknown>): AnyFlagDefinition<C>
}

/**
 * Anything evaluation can read from.
 */
export interface EvaluationSource<C extends EvaluationContext = EvaluationContext> {
  snapshot(): EvaluationSnapshot<C>
}

type Overrides = ReadonlyMap<FeatureId, readonly unknown[]>

/**
 * An active definition whose only rule is the override, unconstrained at
 * 100%. Default and salt come from the configured definition, so the kill
 * switch still resolves to the configured default.
 */
function overrideDefinition<C extends EvaluationContext>(
  definition: AnyFlagDefinition<C>,
  value: unknown
): AnyFlagDefinition<C> {
  return defineFlag<unknown, C>(definition.feature, {
    default: definition.defaultValue,
    salt: definition.salt,
    isActive: true,
    rules: [rule<unknown, C>(value, { note: 'override' })],
  })
}

function createSnapshot<C extends EvaluationContext>(
  namespaceId: string,
  configuration: Configuration<C>,
  isAllDisabled: boolean,
  hooks: RegistryHooks,
  overrides: Overrides
): EvaluationSnapshot<C> {
  const snapshot: EvaluationSnapshot<C> = Object.freeze({
    namespaceId,
    configuration,
    isAllDisabled,
    hooks,
    flag(feature: Feature<unknown>): AnyFlagDefinition<C> {
      const definition = configuration.flags.get(feature.id)
      if (!definition) {
        throw new FlagNotFoundError(namespaceId, feature.key)
      }
      const stack = overrides.get(feature.id)
      if (stack && stack.length > 0) {
        return overrideDefinition(definition, stack[stack.length - 1])
      }
      return definition
    },
  })
  return snapshot
}

export class NamespaceRegistry<C extends EvaluationContext = EvaluationContext> implements EvaluationSource<C> {
  readonly namespaceId: string
  readonly historyLimit: number
  private current: Configuration<C>
  private past: readonly Configuration<C>[] = Object.freeze([])
  private allDisabled = false
  private currentHooks: RegistryHooks
  private overrides: Overrides = new Map()

  constructor(namespaceId: string, options: RegistryOptions<C> = {}) {
    const historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT
    if (!Number.isSafeInteger(historyLimit) || historyLimit < 0) {
      throw new InvalidArgumentError('History limit must be a non-negative integer', { historyLimit })
    }
    this.namespaceId = namespaceId
    this.historyLimit = historyLimit
    this.current = options.configuration ?? emptyConfiguration<C>()
    this.currentHooks = options.hooks ?? NO_HOOKS
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  get configuration(): Configuration<C> {
    return this.current
  }

  get history(): readonly Configuration<C>[] {
    return this.past
  }

  get isAllDisabled(): boolean {
    return this.allDisabled
  }

  get hooks(): RegistryHooks {
    return this.currentHooks
  }

  /**
   * Definition currently in effect for a feature, overrides included.
   */
  flag(feature: Feature<unknown>): AnyFlagDefinition<C> {
    return this.snapshot().flag(feature)
  }

  snapshot(): EvaluationSnapshot<C> {
    return createSnapshot(this.namespaceId, this.current, this.allDisabled, this.currentHooks, this.overrides)
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Make `configuration` current. The previous configuration joins the
   * history; the oldest entries beyond the limit are dropped.
   */
  load(configuration: Configuration<C>): void {
    const previous = this.current
    const past = [...this.past, previous]
    this.past = Object.freeze(past.slice(Math.max(0, past.length - this.historyLimit)))
    this.current = configuration

    this.currentHooks.logger.info('Configuration loaded', {
      namespaceId: this.namespaceId,
      version: configuration.metadata.version,
      featureCount: configuration.flags.size,
    })
    notify(this.currentHooks, 'recordConfigLoad', () => this.currentHooks.metrics.recordConfigLoad?.({
      namespaceId: this.namespaceId,
      featureCount: configuration.flags.size,
      version: configuration.metadata.version,
    }))
  }

  /**
   * Restore the configuration `steps` loads back. Returns false, changing
   * nothing, when the history is shorter than `steps`. Throws for
   * `steps` < 1.
   */
  rollback(steps = 1): boolean {
    if (!Number.isSafeInteger(steps) || steps < 1) {
      throw new InvalidArgumentError('Rollback steps must be a positive integer', { steps })
    }

    const past = this.past
    if (past.length < steps) {
      this.currentHooks.logger.debug('Rollback refused', {
        namespaceId: this.namespaceId,
        steps,
        available: past.length,
      })
      return false
    }

    const targetIndex = past.length - steps
    const target = past[targetIndex]
    this.current = target
    this.past = Object.freeze(past.slice(0, targetIndex))

    this.currentHooks.logger.info('Configuration rolled back', {
      namespaceId: this.namespaceId,
      steps,
      version: target.metadata.version,
    })
    notify(this.currentHooks, 'recordConfigRollback', () => this.currentHooks.metrics.recordConfigRollback?.({
      namespaceId: this.namespaceId,
      steps,
      success: true,
      version: target.metadata.version,
    }))
    return true
  }

  /**
   * Replace one definition in the current configuration. Does not touch
   * history.
   */
  updateDefinition(definition: AnyFlagDefinition<C>): void {
    this.current = patchConfiguration(this.current, { upsert: [definition] })
  }

  // ==========================================================================
  // Kill switch
  // ==========================================================================

  disableAll(): void {
    this.allDisabled = true
    this.currentHooks.logger.warn('All flags disabled', { namespaceId: this.namespaceId })
  }

  enableAll(): void {
    this.allDisabled = false
    this.currentHooks.logger.info('Flags re-enabled', { namespaceId: this.namespaceId })
  }

  setHooks(hooks: RegistryHooks): void {
    this.currentHooks = hooks
  }

  // ==========================================================================
  // Overrides
  // ==========================================================================

  /**
   * Force a value for a feature until the matching clearOverride. Overrides
   * stack; the most recent one wins. The feature must be configured, and
   * the kill switch still returns its configured default.
   */
  setOverride<T>(feature: Feature<T>, value: T): void {
    if (!feature.isValue(value)) {
      throw new TypeMismatchError(feature.id, feature.kind, value)
    }
    const next = new Map(this.overrides)
    next.set(feature.id, Object.freeze([...(this.overrides.get(feature.id) ?? []), value]))
    this.overrides = next
  }

  clearOverride(feature: Feature<unknown>): void {
    const stack = this.overrides.get(feature.id)
    if (!stack) return
    const next = new Map(this.overrides)
    if (stack.length <= 1) {
      next.delete(feature.id)
    } else {
      next.set(feature.id, Object.freeze(stack.slice(0, -1)))
    }
    this.overrides = next
  }

  hasOverride(feature: Feature<unknown>): boolean {
    return this.overrides.has(feature.id)
  }
}
