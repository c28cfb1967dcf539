/**
 * Versions and version ranges
 *
 * Versions are (major, minor, patch) triples of non-negative integers,
 * ordered component-wise. Ranges are inclusive at both ends.
 *
 * @module flags/version
 */

import { InvalidArgumentError } from './errors'
import { fail, getOrThrow, ok, type ParseResult } from './result'

// ============================================================================
// Version
// ============================================================================

export interface Version {
  readonly major: number
  readonly minor: number
  readonly patch: number
}

function isComponent(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0
}

/**
 * Build a version from components. Throws for negative or fractional parts.
 */
export function version(major: number, minor = 0, patch = 0): Version {
  if (!isComponent(major) || !isComponent(minor) || !isComponent(patch)) {
    throw new InvalidArgumentError('Version components must be non-negative integers', { major, minor, patch })
  }
  return Object.freeze({ major, minor, patch })
}

const COMPONENT_PATTERN = /^\d+$/

/**
 * Parse a dotted version string. One to three components; missing
 * components are zero. "1", "1.2" and "1.2.3" are valid; "", "1..2",
 * "-1.0.0", "1.2.3.4" and "1.x" are not.
 */
export function parseVersion(input: string): ParseResult<Version> {
  const invalid = (message: string): ParseResult<Version> =>
    fail({ kind: 'invalid-version', input, message })

  if (input.trim().length === 0) {
    return invalid('Version must not be blank')
  }

  const parts = input.split('.')
  if (parts.length > 3) {
    return invalid(`Version '${input}' has more than three components`)
  }

  const components: number[] = []
  for (const part of parts) {
    if (part.length === 0) {
      return invalid(`Version '${input}' has an empty component`)
    }
    if (!COMPONENT_PATTERN.test(part)) {
      return invalid(`Version component '${part}' is not a non-negative integer`)
    }
    const value = Number(part)
    if (!Number.isSafeInteger(value)) {
      return invalid(`Version component '${part}' is out of range`)
    }
    components.push(value)
  }

  const [major = 0, minor = 0, patch = 0] = components
  return ok(version(major, minor, patch))
}

/**
 * Parse a version literal supplied by the program itself.
 */
export function versionOf(input: string): Version {
  return getOrThrow(parseVersion(input))
}

export function compareVersions(a: Version, b: Version): number {
  if (a.major !== b.major) return a.major < b.major ? -1 : 1
  if (a.minor !== b.minor) return a.minor < b.minor ? -1 : 1
  if (a.patch !== b.patch) return a.patch < b.patch ? -1 : 1
  return 0
}

export function formatVersion(v: Version): string {
  return `${v.major}.${v.minor}.${v.patch}`
}

// ============================================================================
// VersionRange
// ============================================================================

export type VersionRange =
  | { readonly kind: 'unbounded' }
  | { readonly kind: 'left-bound'; readonly min: Version }
  | { readonly kind: 'right-bound'; readonly max: Version }
  | { readonly kind: 'fully-bound'; readonly min: Version; readonly max: Version }

export const UNBOUNDED: VersionRange = Object.freeze({ kind: 'unbounded' })

export function atLeast(min: Version): VersionRange {
  return Object.freeze({ kind: 'left-bound', min })
}

export function atMost(max: Version): VersionRange {
  return Object.freeze({ kind: 'right-bound', max })
}

/**
 * Inclusive range. Throws when min is greater than max.
 */
export function between(min: Version, max: Version): VersionRange {
  if (compareVersions(min, max) > 0) {
    throw new InvalidArgumentError(
      `Version range minimum ${formatVersion(min)} is greater than maximum ${formatVersion(max)}`,
      { min: formatVersion(min), max: formatVersion(max) }
    )
  }
  return Object.freeze({ kind: 'fully-bound', min, max })
}

/**
 * False only for the unbounded range.
 */
export function hasBounds(range: VersionRange): boolean {
  return range.kind !== 'unbounded'
}

export function rangeContains(range: VersionRange, v: Version): boolean {
  switch (range.kind) {
    case 'unbounded':
      return true
    case 'left-bound':
      return compareVersions(v, range.min) >= 0
    case 'right-bound':
      return compareVersions(v, range.max) <= 0
    case 'fully-bound':
      return compareVersions(v, range.min) >= 0 && compareVersions(v, range.max) <= 0
  }
}

export function formatRange(range: VersionRange): string {
  switch (range.kind) {
    case 'unbounded':
      return '*'
    case 'left-bound':
      return `>=${formatVersion(range.min)}`
    case 'right-bound':
      return `<=${formatVersion(range.max)}`
    case 'fully-bound':
      return `${formatVersion(range.min)} - ${formatVersion(range.max)}`
  }
}
