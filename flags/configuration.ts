/**
 * Configurations
 *
 * An immutable set of flag definitions plus metadata. A registry swaps
 * whole configurations; nothing edits one in place.
 *
 * @module flags/configuration
 */

import type { EvaluationContext } from './context'
import { DuplicateFeatureError } from './errors'
import type { FlagDefinition } from './flag-definition'
import { compareFeatureIds, type FeatureId } from './identity'

export interface ConfigurationMetadata {
  /** Opaque caller-supplied version, reported in diagnostics only */
  readonly version?: string
  readonly generatedAtEpochMillis?: number
  readonly source?: string
}

// Definitions of different value types share one map, so values are unknown here
// and narrowed by the feature's guard at evaluation time.
export type AnyFlagDefinition<C extends EvaluationContext = EvaluationContext> = FlagDefinition<unknown, C>

export interface Configuration<C extends EvaluationContext = EvaluationContext> {
  readonly flags: ReadonlyMap<FeatureId, AnyFlagDefinition<C>>
  readonly metadata: ConfigurationMetadata
}

/**
 * Frozen read-only view over a map that only the view can reach.
 */
function readonlyView<K, V>(map: Map<K, V>): ReadonlyMap<K, V> {
  const view: ReadonlyMap<K, V> = {
    get size() {
      return map.size
    },
    get: key => map.get(key),
    has: key => map.has(key),
    forEach: (callback, thisArg) => map.forEach((value, key) => callback.call(thisArg, value, key, view)),
    entries: () => map.entries(),
    keys: () => map.keys(),
    values: () => map.values(),
    [Symbol.iterator]: () => map[Symbol.iterator](),
  }
  return Object.freeze(view)
}

/**
 * Build a configuration. Throws DuplicateFeatureError if two definitions
 * share a feature identity.
 */
export function createConfiguration<C extends EvaluationContext = EvaluationContext>(
  definitions: Iterable<AnyFlagDefinition<C>>,
  metadata: ConfigurationMetadata = {}
): Configuration<C> {
  const flags = new Map<FeatureId, AnyFlagDefinition<C>>()
  for (const definition of definitions) {
    if (flags.has(definition.feature.id)) {
      throw new DuplicateFeatureError(definition.feature.id)
    }
    flags.set(definition.feature.id, definition)
  }
  return Object.freeze({ flags: readonlyView(flags), metadata: Object.freeze({ ...metadata }) })
}

export function emptyConfiguration<C extends EvaluationContext = EvaluationContext>(): Configuration<C> {
  return createConfiguration<C>([])
}

export function withMetadata<C extends EvaluationContext>(
  configuration: Configuration<C>,
  metadata: ConfigurationMetadata
): Configuration<C> {
  return createConfiguration(configuration.flags.values(), metadata)
}

/**
 * Feature ids in lexicographic order.
 */
export function featureIds<C extends EvaluationContext>(configuration: Configuration<C>): FeatureId[] {
  return [...configuration.flags.keys()].sort(compareFeatureIds)
}

// ============================================================================
// Patches
// ============================================================================

export interface ConfigurationPatch<C extends EvaluationContext = EvaluationContext> {
  /** Definitions to add or replace */
  readonly upsert?: readonly AnyFlagDefinition<C>[]
  /** Features to drop */
  readonly remove?: readonly FeatureId[]
  /** Replaces the base metadata when given */
  readonly metadata?: ConfigurationMetadata
}

/**
 * New configuration with the patch applied. Removals run before upserts,
 * so a feature in both lists ends up with the upserted definition.
 */
export function patchConfiguration<C extends EvaluationContext>(
  base: Configuration<C>,
  patch: ConfigurationPatch<C>
): Configuration<C> {
  const flags = new Map(base.flags)
  for (const id of patch.remove ?? []) {
    flags.delete(id)
  }
  const upserted = new Set<FeatureId>()
  for (const definition of patch.upsert ?? []) {
    if (upserted.has(definition.feature.id)) {
      throw new DuplicateFeatureError(definition.feature.id)
    }
    upserted.add(definition.feature.id)
    flags.set(definition.feature.id, definition)
  }
  return createConfiguration(flags.values(), patch.metadata ?? base.metadata)
}
