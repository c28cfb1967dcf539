/**
 * Feature identity
 *
 * A feature is identified by `feature::<namespace>::<key>`. The encoded
 * string is the map key inside a Configuration and the `key` field on the
 * wire, so it is validated once at declaration and never rebuilt.
 *
 * @module flags/identity
 */

import { InvalidIdentifierError } from './errors'
import { fail, ok, type ParseResult } from './result'

declare const __brand: unique symbol

type Brand<T, B extends string> = T & { readonly [__brand]: B }

/**
 * Canonical encoded feature identity.
 *
 * @example
 * const id: FeatureId = featureId('checkout', 'applePay')
 * // => 'feature::checkout::applePay'
 */
export type FeatureId = Brand<string, 'FeatureId'>

export const FEATURE_ID_PREFIX = 'feature'
export const FEATURE_ID_SEPARATOR = '::'

function checkPart(part: string, label: string, input: string): string | undefined {
  if (part.trim().length === 0) return `${label} must not be blank`
  // a lone ':' at an edge would merge with the separator: 'a:' + 'b' vs 'a' + ':b'
  if (part.includes(':')) return `${label} must not contain ':'`
  if (part !== part.trim()) return `${label} must not have surrounding whitespace in '${input}'`
  return undefined
}

function isFeatureId(value: string): value is FeatureId {
  return parseFeatureId(value).ok
}

/**
 * Build a feature identity. Throws InvalidIdentifierError for blank parts
 * and parts containing ':'.
 */
export function featureId(namespaceSeed: string, key: string): FeatureId {
  const problem = checkPart(namespaceSeed, 'namespace', namespaceSeed) ?? checkPart(key, 'key', key)
  if (problem) {
    throw new InvalidIdentifierError(`Invalid feature identity: ${problem}`, `${namespaceSeed}/${key}`)
  }
  const encoded = [FEATURE_ID_PREFIX, namespaceSeed, key].join(FEATURE_ID_SEPARATOR)
  if (!isFeatureId(encoded)) {
    throw new InvalidIdentifierError('Invalid feature identity', encoded)
  }
  return encoded
}

export interface FeatureIdParts {
  namespaceSeed: string
  key: string
}

/**
 * Decode an encoded identity.
 */
export function parseFeatureId(input: string): ParseResult<FeatureIdParts> {
  const parts = input.split(FEATURE_ID_SEPARATOR)
  if (parts.length !== 3 || parts[0] !== FEATURE_ID_PREFIX) {
    return fail({
      kind: 'invalid-snapshot',
      path: 'key',
      expected: `${FEATURE_ID_PREFIX}${FEATURE_ID_SEPARATOR}<namespace>${FEATURE_ID_SEPARATOR}<key>`,
      message: `Malformed feature identity '${input}'`,
    })
  }
  const [, namespaceSeed = '', key = ''] = parts
  const problem = checkPart(namespaceSeed, 'namespace', input) ?? checkPart(key, 'key', input)
  if (problem) {
    return fail({ kind: 'invalid-snapshot', path: 'key', expected: 'non-blank parts without colons', message: problem })
  }
  return ok({ namespaceSeed, key })
}

/**
 * Lexicographic order on the encoded form.
 */
export function compareFeatureIds(a: FeatureId, b: FeatureId): number {
  return a < b ? -1 : a > b ? 1 : 0
}
