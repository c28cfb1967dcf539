/**
 * Axes
 *
 * An axis is a named custom targeting dimension ("environment", "tier")
 * backed by a fixed set of values. Axes live in a catalog owned by one
 * namespace; nothing is registered process-wide, so two namespaces can
 * use the same axis id without seeing each other.
 *
 * @module flags/axis
 */

import { AxisConflictError, InvalidArgumentError } from './errors'

export interface Axis<V extends string = string> {
  /** Stable id used in targeting and on the wire */
  readonly id: string
  /** Name of the backing value set */
  readonly type: string
  readonly values: readonly V[]
}

/**
 * Values a context carries per axis id.
 */
export type AxisValues = ReadonlyMap<string, ReadonlySet<string>>

export const NO_AXIS_VALUES: AxisValues = new Map()

function sameValues(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i])
}

// ============================================================================
// Catalog
// ============================================================================

export class AxisCatalog {
  private readonly byIdMap = new Map<string, Axis>()
  private readonly byTypeMap = new Map<string, Axis>()

  constructor(readonly scope: string) {}

  /**
   * Create and register an axis.
   *
   * @example
   * const environment = catalog.define('environment', 'Environment', ['dev', 'staging', 'prod'])
   */
  define<V extends string>(id: string, type: string, values: readonly V[]): Axis<V> {
    if (id.trim().length === 0) {
      throw new InvalidArgumentError('Axis id must not be blank', { scope: this.scope })
    }
    if (values.length === 0) {
      throw new InvalidArgumentError(`Axis '${id}' must declare at least one value`, { scope: this.scope })
    }
    if (new Set(values).size !== values.length) {
      throw new InvalidArgumentError(`Axis '${id}' declares duplicate values`, { scope: this.scope, values })
    }
    const axis: Axis<V> = Object.freeze({ id, type, values: Object.freeze([...values]) })
    this.register(axis)
    return axis
  }

  /**
   * Register an axis. Registering an identical axis again is a no-op; an id
   * reused with another backing type, or a type reused under another id, is
   * an AxisConflictError.
   */
  register(axis: Axis): void {
    const existing = this.byIdMap.get(axis.id)
    if (existing) {
      if (existing.type !== axis.type || !sameValues(existing.values, axis.values)) {
        throw new AxisConflictError(
          `Axis id '${axis.id}' is already registered with type '${existing.type}' in '${this.scope}'`,
          { scope: this.scope, axisId: axis.id, existingType: existing.type, type: axis.type }
        )
      }
      return
    }

    const sameType = this.byTypeMap.get(axis.type)
    if (sameType) {
      throw new AxisConflictError(
        `Axis type '${axis.type}' is already registered under id '${sameType.id}' in '${this.scope}'`,
        { scope: this.scope, axisId: axis.id, existingId: sameType.id, type: axis.type }
      )
    }

    this.byIdMap.set(axis.id, axis)
    this.byTypeMap.set(axis.type, axis)
  }

  byId(id: string): Axis | undefined {
    return this.byIdMap.get(id)
  }

  byType(type: string): Axis | undefined {
    return this.byTypeMap.get(type)
  }

  has(axis: Axis): boolean {
    const existing = this.byIdMap.get(axis.id)
    return existing !== undefined && existing.type === axis.type && sameValues(existing.values, axis.values)
  }

  list(): Axis[] {
    return [...this.byIdMap.values()]
  }

  /**
   * Start building context axis values checked against this catalog.
   */
  values(): AxisValuesBuilder {
    return new AxisValuesBuilder(this)
  }
}

// ============================================================================
// Context values
// ============================================================================

export class AxisValuesBuilder {
  private readonly entries = new Map<string, Set<string>>()

  constructor(private readonly catalog: AxisCatalog) {}

  /**
   * Add values for an axis. The axis must be registered in this builder's
   * catalog.
   */
  set<V extends string>(axis: Axis<V>, ...values: V[]): this {
    if (!this.catalog.has(axis)) {
      throw new AxisConflictError(
        `Axis '${axis.id}' is not registered in '${this.catalog.scope}'`,
        { scope: this.catalog.scope, axisId: axis.id }
      )
    }
    const bucket = this.entries.get(axis.id) ?? new Set<string>()
    for (const value of values) {
      if (!axis.values.includes(value)) {
        throw new InvalidArgumentError(`'${value}' is not a value of axis '${axis.id}'`, { axisId: axis.id, value })
      }
      bucket.add(value)
    }
    this.entries.set(axis.id, bucket)
    return this
  }

  build(): AxisValues {
    return new Map([...this.entries].map(([id, values]): [string, ReadonlySet<string>] => [id, new Set(values)]))
  }
}
