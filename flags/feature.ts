/**
 * Feature handles
 *
 * A Feature is the typed key an application evaluates. It carries the
 * encoded identity and a runtime guard for its value type, which is how
 * configurations loaded from the wire are checked against the code that
 * declared them.
 *
 * @module flags/feature
 */

import { InvalidArgumentError } from './errors'
import { featureId, type FeatureId } from './identity'

export type ValueKind = 'boolean' | 'string' | 'int' | 'double' | 'enum' | 'json'

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }

export type JsonObject = { [key: string]: JsonValue }

export interface Feature<T> {
  readonly id: FeatureId
  readonly namespaceId: string
  readonly key: string
  readonly kind: ValueKind
  /** Allowed values for enum features */
  readonly enumValues?: readonly string[]
  isValue(value: unknown): value is T
}

export type FeatureValue<F> = F extends Feature<infer T> ? T : never

// ============================================================================
// Value guards
// ============================================================================

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true
    case 'number':
      return Number.isFinite(value)
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue)
      return Object.values(value).every(isJsonValue)
    default:
      return false
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && isJsonValue(value)
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean'
}

function isString(value: unknown): value is string {
  return typeof value === 'string'
}

function isInt(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value)
}

function isDouble(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}

// ============================================================================
// Declaration
// ============================================================================

export interface FeatureFactory {
  readonly namespaceId: string
  boolean(key: string): Feature<boolean>
  string(key: string): Feature<string>
  int(key: string): Feature<number>
  double(key: string): Feature<number>
  enumeration<V extends string>(key: string, values: readonly V[]): Feature<V>
  json<T extends JsonObject = JsonObject>(key: string, guard?: (value: JsonObject) => value is T): Feature<T>
}

function feature<T>(namespaceId: string, key: string, kind: ValueKind, isValue: (value: unknown) => value is T, enumValues?: readonly string[]): Feature<T> {
  return Object.freeze({
    id: featureId(namespaceId, key),
    namespaceId,
    key,
    kind,
    enumValues,
    isValue,
  })
}

/**
 * Feature factories bound to one namespace.
 *
 * @example
 * const f = declareFeatures('checkout')
 * const applePay = f.boolean('applePay')
 * const theme = f.enumeration('theme', ['light', 'dark'])
 */
export function declareFeatures(namespaceId: string): FeatureFactory {
  return {
    namespaceId,
    boolean: key => feature(namespaceId, key, 'boolean', isBoolean),
    string: key => feature(namespaceId, key, 'string', isString),
    int: key => feature(namespaceId, key, 'int', isInt),
    double: key => feature(namespaceId, key, 'double', isDouble),
    enumeration<V extends string>(key: string, values: readonly V[]): Feature<V> {
      if (values.length === 0) {
        throw new InvalidArgumentError(`Enum feature '${key}' must declare at least one value`, { key })
      }
      const allowed: readonly string[] = Object.freeze([...values])
      const isMember = (value: unknown): value is V => values.some(v => v === value)
      return feature(namespaceId, key, 'enum', isMember, allowed)
    },
    json<T extends JsonObject = JsonObject>(key: string, guard?: (value: JsonObject) => value is T): Feature<T> {
      const isShape = (value: unknown): value is T => isJsonObject(value) && (guard ? guard(value) : true)
      return feature(namespaceId, key, 'json', isShape)
    },
  }
}
