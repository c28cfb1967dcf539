/**
 * Namespaces
 *
 * A namespace owns a registry, an axis catalog and the definitions its
 * code declares. All definitions are built in one call when the namespace
 * is created, so no evaluation can observe a partially registered set.
 *
 * @example
 * ```typescript
 * const catalog = new AxisCatalog('checkout')
 * const environment = catalog.define('environment', 'Environment', ['dev', 'prod'])
 * const f = declareFeatures('checkout')
 * const applePay = f.boolean('applePay')
 *
 * const checkout = defineNamespace({
 *   id: 'checkout',
 *   catalog,
 *   flags: [
 *     defineFlag(applePay, {
 *       default: false,
 *       rules: [rule(true, { platforms: ['IOS'], axes: { environment: ['prod'] } })],
 *     }),
 *   ],
 * })
 *
 * checkout.evaluate(applePay, { platform: 'IOS', axes: catalog.values().set(environment, 'prod').build() })
 * ```
 *
 * @module flags/namespace
 */

import { createLogger } from '../lib/logger'
import { getEngineConfig } from '../lib/config'
import { AxisCatalog } from './axis'
import { createConfiguration, type AnyFlagDefinition, type Configuration, type ConfigurationMetadata } from './configuration'
import type { EvaluationContext } from './context'
import { AxisConflictError, InvalidArgumentError } from './errors'
import { evaluate, explain, type EvaluationDiagnostics } from './evaluation'
import type { Feature } from './feature'
import { NamespaceRegistry, type EvaluationSnapshot, type EvaluationSource } from './registry'
import { createHooks, type RegistryHooks } from './telemetry'

export interface NamespaceOptions<C extends EvaluationContext = EvaluationContext> {
  id: string
  flags: Iterable<AnyFlagDefinition<C>>
  catalog?: AxisCatalog
  metadata?: ConfigurationMetadata
  historyLimit?: number
  hooks?: Partial<RegistryHooks>
}

export class Namespace<C extends EvaluationContext = EvaluationContext> implements EvaluationSource<C> {
  readonly id: string
  readonly catalog: AxisCatalog
  readonly registry: NamespaceRegistry<C>
  /** The configuration the code declares */
  readonly declared: Configuration<C>
  private readonly featuresById: ReadonlyMap<string, Feature<unknown>>

  constructor(options: NamespaceOptions<C>) {
    if (options.id.trim().length === 0) {
      throw new InvalidArgumentError('Namespace id must not be blank')
    }
    const config = getEngineConfig()
    this.id = options.id
    this.catalog = options.catalog ?? new AxisCatalog(options.id)
    if (this.catalog.scope !== options.id) {
      throw new AxisConflictError(
        `Axis catalog '${this.catalog.scope}' cannot be shared with namespace '${options.id}'`,
        { scope: this.catalog.scope, namespaceId: options.id }
      )
    }

    const definitions = [...options.flags]
    for (const definition of definitions) {
      if (definition.feature.namespaceId !== options.id) {
        throw new InvalidArgumentError(
          `Feature '${definition.feature.id}' belongs to namespace '${definition.feature.namespaceId}'`,
          { namespaceId: options.id, featureId: definition.feature.id }
        )
      }
      for (const r of definition.rules) {
        for (const axisId of r.targeting.axes.keys()) {
          if (!this.catalog.byId(axisId)) {
            throw new AxisConflictError(
              `Rule on '${definition.feature.id}' targets axis '${axisId}' missing from '${this.catalog.scope}'`,
              { scope: this.catalog.scope, axisId }
            )
          }
        }
      }
    }

    this.declared = createConfiguration(definitions, options.metadata ?? { source: 'declared' })
    this.featuresById = new Map(definitions.map((d): [string, Feature<unknown>] => [d.feature.id, d.feature]))

    const hooks = createHooks({
      logger: options.hooks?.logger ?? createLogger(`flags:${options.id}`, { level: config.logLevel }),
      metrics: options.hooks?.metrics,
    })
    this.registry = new NamespaceRegistry<C>(options.id, {
      configuration: this.declared,
      historyLimit: options.historyLimit ?? config.historyLimit,
      hooks,
    })
  }

  /**
   * Declared feature by encoded identity.
   */
  feature(id: string): Feature<unknown> | undefined {
    return this.featuresById.get(id)
  }

  features(): Feature<unknown>[] {
    return [...this.featuresById.values()]
  }

  snapshot(): EvaluationSnapshot<C> {
    return this.registry.snapshot()
  }

  evaluate<T>(feature: Feature<T>, context: C): T {
    return evaluate(feature, context, this.registry)
  }

  explain<T>(feature: Feature<T>, context: C): EvaluationDiagnostics<T> {
    return explain(feature, context, this.registry)
  }
}

export function defineNamespace<C extends EvaluationContext = EvaluationContext>(options: NamespaceOptions<C>): Namespace<C> {
  return new Namespace(options)
}
