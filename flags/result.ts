/**
 * Boundary results
 *
 * Everything that turns outside input into engine values (version strings,
 * hex identifiers, JSON snapshots) returns a ParseResult. Failures carry
 * the offending path and what was expected so callers can report them.
 *
 * @module flags/result
 */

import { ParseFailureError } from './errors'

// ============================================================================
// Errors
// ============================================================================

export type ParseError =
  | { kind: 'invalid-json'; message: string }
  | { kind: 'invalid-snapshot'; path: string; expected: string; message: string }
  | { kind: 'invalid-version'; path?: string; input: string; message: string }
  | { kind: 'invalid-rollout'; path?: string; value: number; message: string }
  | { kind: 'invalid-hex-id'; path?: string; input: string; message: string }
  | { kind: 'invalid-axis'; path: string; axisId: string; value?: string; message: string }
  | { kind: 'feature-not-found'; path?: string; key: string; message: string }
  | { kind: 'type-mismatch'; path: string; expected: string; actual: string; message: string }
  | { kind: 'missing-flag'; key: string; message: string }

export type ParseErrorKind = ParseError['kind']

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ParseError }

// ============================================================================
// Constructors
// ============================================================================

export function ok<T>(value: T): ParseResult<T> {
  return { ok: true, value }
}

export function fail<T = never>(error: ParseError): ParseResult<T> {
  return { ok: false, error }
}

// ============================================================================
// Combinators
// ============================================================================

export function mapResult<T, R>(result: ParseResult<T>, transform: (value: T) => R): ParseResult<R> {
  return result.ok ? ok(transform(result.value)) : result
}

export function flatMapResult<T, R>(
  result: ParseResult<T>,
  transform: (value: T) => ParseResult<R>
): ParseResult<R> {
  return result.ok ? transform(result.value) : result
}

export function getOrElse<T>(result: ParseResult<T>, onFailure: (error: ParseError) => T): T {
  return result.ok ? result.value : onFailure(result.error)
}

/**
 * Unwrap a result, throwing ParseFailureError on failure. For call sites
 * where the input is a literal the program itself supplies.
 */
export function getOrThrow<T>(result: ParseResult<T>): T {
  if (!result.ok) {
    throw new ParseFailureError(result.error)
  }
  return result.value
}

/**
 * Collect results in order, stopping at the first failure.
 */
export function collectResults<T>(results: Iterable<ParseResult<T>>): ParseResult<T[]> {
  const values: T[] = []
  for (const result of results) {
    if (!result.ok) return result
    values.push(result.value)
  }
  return ok(values)
}

/**
 * One-line description of a parse error for logs.
 */
export function formatParseError(error: ParseError): string {
  const path = 'path' in error && error.path ? ` at ${error.path}` : ''
  return `${error.kind}${path}: ${error.message}`
}
