/**
 * Structural errors
 *
 * Thrown for wiring defects: evaluating a feature that is not in the
 * snapshot, conflicting axis registrations, malformed identifiers,
 * duplicate features and out-of-range arguments. Boundary input problems
 * are never thrown; they travel as ParseResult values (see ./result).
 *
 * @module flags/errors
 */

import { safeSerialize } from '../lib/safe-stringify'
import type { ParseError } from './result'

// =============================================================================
// Types
// =============================================================================

export type FlagErrorCode =
  | 'FLAG_NOT_FOUND'
  | 'AXIS_CONFLICT'
  | 'INVALID_IDENTIFIER'
  | 'INVALID_ARGUMENT'
  | 'DUPLICATE_FEATURE'
  | 'TYPE_MISMATCH'
  | 'NOT_SERIALIZABLE'
  | 'PARSE_FAILURE'

export interface FlagErrorOptions {
  code: FlagErrorCode
  message: string
  details?: Record<string, unknown>
  cause?: Error
}

// =============================================================================
// FlagError Base Class
// =============================================================================

export class FlagError extends Error {
  public readonly code: FlagErrorCode
  public readonly details?: Record<string, unknown>

  constructor(options: FlagErrorOptions) {
    super(options.message)
    this.name = 'FlagError'
    this.code = options.code
    this.details = options.details
    if (options.cause) {
      this.cause = options.cause
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      name: this.name,
      code: this.code,
      message: this.message,
    }
    if (this.details !== undefined) {
      json.details = safeSerialize(this.details)
    }
    return json
  }
}

// =============================================================================
// Specialized Errors
// =============================================================================

export class FlagNotFoundError extends FlagError {
  public readonly featureKey: string
  public readonly namespaceId: string

  constructor(namespaceId: string, featureKey: string) {
    super({
      code: 'FLAG_NOT_FOUND',
      message: `Flag '${featureKey}' is not registered in namespace '${namespaceId}'`,
      details: { namespaceId, featureKey },
    })
    this.name = 'FlagNotFoundError'
    this.namespaceId = namespaceId
    this.featureKey = featureKey
  }
}

export class AxisConflictError extends FlagError {
  constructor(message: string, details: Record<string, unknown>) {
    super({ code: 'AXIS_CONFLICT', message, details })
    this.name = 'AxisConflictError'
  }
}

export class InvalidIdentifierError extends FlagError {
  constructor(message: string, input: string) {
    super({ code: 'INVALID_IDENTIFIER', message, details: { input } })
    this.name = 'InvalidIdentifierError'
  }
}

export class InvalidArgumentError extends FlagError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: 'INVALID_ARGUMENT', message, details })
    this.name = 'InvalidArgumentError'
  }
}

export class DuplicateFeatureError extends FlagError {
  constructor(featureId: string) {
    super({
      code: 'DUPLICATE_FEATURE',
      message: `Feature '${featureId}' is defined more than once`,
      details: { featureId },
    })
    this.name = 'DuplicateFeatureError'
  }
}

export class TypeMismatchError extends FlagError {
  constructor(featureId: string, expected: string, actual: unknown) {
    super({
      code: 'TYPE_MISMATCH',
      message: `Feature '${featureId}' expects a ${expected} value`,
      details: { featureId, expected, actual },
    })
    this.name = 'TypeMismatchError'
  }
}

export class NotSerializableError extends FlagError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: 'NOT_SERIALIZABLE', message, details })
    this.name = 'NotSerializableError'
  }
}

/**
 * Raised when a caller unwraps a failed ParseResult.
 */
export class ParseFailureError extends FlagError {
  public readonly error: ParseError

  constructor(error: ParseError) {
    super({ code: 'PARSE_FAILURE', message: error.message, details: { ...error } })
    this.name = 'ParseFailureError'
    this.error = error
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isFlagError(error: unknown): error is FlagError {
  return error instanceof FlagError
}
