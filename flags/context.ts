/**
 * Evaluation context and stable identifiers
 *
 * @module flags/context
 */

import type { AxisValues } from './axis'
import { InvalidIdentifierError } from './errors'
import { fail, ok, type ParseResult } from './result'
import type { Version } from './version'

declare const __brand: unique symbol

/**
 * Lower-case hex form of a caller's persistent user or device id. This is
 * the bucketing input, so it must not change between evaluations.
 */
export type StableId = string & { readonly [__brand]: 'StableId' }

const HEX_PATTERN = /^[0-9a-f]+$/

function isStableId(value: string): value is StableId {
  return HEX_PATTERN.test(value)
}

/**
 * Derive a stable id from an arbitrary identifier: lower-cased, then
 * hex-encoded as UTF-8.
 *
 * @example
 * stableId('User-1') // => '757365722d31'
 */
export function stableId(input: string): StableId {
  if (input.trim().length === 0) {
    throw new InvalidIdentifierError('Stable id must not be blank', input)
  }
  const hex = Buffer.from(input.toLowerCase(), 'utf8').toString('hex')
  if (!isStableId(hex)) {
    throw new InvalidIdentifierError('Stable id did not encode to hex', input)
  }
  return hex
}

/**
 * Accept an already-encoded hex id (case-insensitive).
 */
export function parseStableIdHex(input: string): ParseResult<StableId> {
  const hex = input.trim().toLowerCase()
  if (!isStableId(hex)) {
    return fail({ kind: 'invalid-hex-id', input, message: `'${input}' is not a hex identifier` })
  }
  return ok(hex)
}

export function stableIdFromHex(input: string): StableId {
  const parsed = parseStableIdHex(input)
  if (!parsed.ok) {
    throw new InvalidIdentifierError(parsed.error.message, input)
  }
  return parsed.value
}

// ============================================================================
// Context
// ============================================================================

/**
 * What an evaluation knows about the caller. Every field is optional;
 * a rule that constrains a field the context lacks does not match.
 * Applications extend this interface and read the extra fields from
 * custom predicates.
 */
export interface EvaluationContext {
  readonly locale?: string
  readonly platform?: string
  readonly appVersion?: Version
  readonly stableId?: StableId
  readonly axes?: AxisValues
}
