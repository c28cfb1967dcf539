/**
 * Snapshot loader
 *
 * Feeds JSON snapshots and patches into a namespace registry. A rejected
 * payload leaves the registry on its last good configuration and is
 * reported through the logger.
 *
 * @example
 * ```typescript
 * const loader = new SnapshotLoader(checkout)
 * const outcome = loader.load(payload)
 * if (!outcome.ok) alert(formatParseError(outcome.error))
 * ```
 *
 * @module serialization/loader
 */

import type { Logger } from '../lib/logger'
import { patchConfiguration, type Configuration } from '../flags/configuration'
import type { EvaluationContext } from '../flags/context'
import { diffConfigurations, type ConfigurationDiff } from '../flags/diff'
import type { Namespace } from '../flags/namespace'
import { formatParseError, type ParseError, type ParseResult } from '../flags/result'
import {
  decodeConfiguration,
  decodePatch,
  requireDeclaredFlags,
  type SnapshotLoadOptions,
  type SnapshotWarning,
} from './codec'

export interface SnapshotLoaderOptions extends SnapshotLoadOptions {
  /** Defaults to a child of the namespace registry's logger */
  logger?: Logger
}

export type LoadOutcome<C extends EvaluationContext = EvaluationContext> =
  | { ok: true; configuration: Configuration<C>; diff: ConfigurationDiff; warnings: SnapshotWarning[] }
  | { ok: false; error: ParseError; warnings: SnapshotWarning[] }

export class SnapshotLoader<C extends EvaluationContext = EvaluationContext> {
  private readonly logger: Logger
  private failure: ParseError | undefined

  constructor(
    private readonly namespace: Namespace<C>,
    private readonly options: SnapshotLoaderOptions = {}
  ) {
    this.logger = options.logger ?? namespace.registry.hooks.logger.child('loader')
  }

  /**
   * Error from the most recent rejected payload, cleared by the next
   * successful one.
   */
  get lastError(): ParseError | undefined {
    return this.failure
  }

  /**
   * Decode a full snapshot and make it current.
   */
  load(json: string): LoadOutcome<C> {
    const warnings: SnapshotWarning[] = []
    const decoded = decodeConfiguration(json, this.namespace, this.decodeOptions(warnings))
    return this.publish(decoded, warnings, 'snapshot')
  }

  /**
   * Decode a patch and apply it on top of the current configuration. The
   * result must still define every declared feature, under the same
   * `missingDeclaredFlags` policy as a full snapshot.
   */
  applyPatch(json: string): LoadOutcome<C> {
    const warnings: SnapshotWarning[] = []
    const options = this.decodeOptions(warnings)
    const decoded = decodePatch(json, this.namespace, options)
    if (!decoded.ok) {
      return this.publish(decoded, warnings, 'patch')
    }
    const patched = patchConfiguration(this.namespace.registry.configuration, decoded.value)
    return this.publish(requireDeclaredFlags(patched, this.namespace, options), warnings, 'patch')
  }

  private decodeOptions(warnings: SnapshotWarning[]): SnapshotLoadOptions {
    return {
      unknownFeatureKeys: this.options.unknownFeatureKeys,
      missingDeclaredFlags: this.options.missingDeclaredFlags,
      onWarning: warning => {
        warnings.push(warning)
        this.logger.warn(warning.message, { namespaceId: this.namespace.id, kind: warning.kind, key: warning.key })
        this.options.onWarning?.(warning)
      },
    }
  }

  private publish(
    decoded: ParseResult<Configuration<C>>,
    warnings: SnapshotWarning[],
    payload: 'snapshot' | 'patch'
  ): LoadOutcome<C> {
    if (!decoded.ok) {
      this.failure = decoded.error
      this.logger.warn(`Rejected ${payload}; keeping last good configuration`, {
        namespaceId: this.namespace.id,
        error: formatParseError(decoded.error),
      })
      return { ok: false, error: decoded.error, warnings }
    }

    const registry = this.namespace.registry
    const diff = diffConfigurations(registry.configuration, decoded.value)
    registry.load(decoded.value)
    this.failure = undefined
    return { ok: true, configuration: decoded.value, diff, warnings }
  }
}
