/**
 * Snapshot codec
 *
 * JSON <-> Configuration for one namespace. Decoding is strict: malformed
 * input becomes a ParseError, never a coerced value and never a thrown
 * exception. Decoded definitions are bound to the namespace's declared
 * features and axis catalog.
 *
 * @module serialization/codec
 */

import type { ZodError, ZodIssue } from 'zod'
import { getEngineConfig } from '../lib/config'
import { parseJson } from '../lib/safe-stringify'
import type { AxisCatalog } from '../flags/axis'
import { isValidRollout } from '../flags/bucketing'
import {
  createConfiguration,
  featureIds,
  type AnyFlagDefinition,
  type Configuration,
  type ConfigurationMetadata,
  type ConfigurationPatch,
} from '../flags/configuration'
import { parseStableIdHex, type EvaluationContext } from '../flags/context'
import { NotSerializableError } from '../flags/errors'
import { isJsonObject, type Feature, type ValueKind } from '../flags/feature'
import { defineFlag } from '../flags/flag-definition'
import type { FeatureId } from '../flags/identity'
import { fail, ok, type ParseError, type ParseResult } from '../flags/result'
import { rule, type Rule } from '../flags/rule'
import {
  UNBOUNDED,
  atLeast,
  atMost,
  between,
  compareVersions,
  formatVersion,
  parseVersion,
  type Version,
  type VersionRange,
} from '../flags/version'
import {
  PatchSchema,
  SnapshotSchema,
  type WireFlag,
  type WireFlagValue,
  type WireRule,
  type WireSnapshotInput,
  type WireValueType,
  type WireVersionRange,
} from './schema'

// ============================================================================
// Options
// ============================================================================

export interface SnapshotWarning {
  kind: 'unknown-feature-key' | 'missing-declared-flag'
  key: string
  message: string
}

export interface SnapshotLoadOptions {
  /** Default: 'fail', or 'skip' when strictSnapshots is off in engine config */
  unknownFeatureKeys?: 'fail' | 'skip'
  /** Default: 'reject' */
  missingDeclaredFlags?: 'reject' | 'fill-from-declared-defaults'
  onWarning?: (warning: SnapshotWarning) => void
}

/**
 * What the codec needs from a namespace.
 */
export interface FeatureScope<C extends EvaluationContext = EvaluationContext> {
  readonly id: string
  readonly catalog: AxisCatalog
  readonly declared: Configuration<C>
  feature(id: string): Feature<unknown> | undefined
}

interface ResolvedOptions {
  unknownFeatureKeys: 'fail' | 'skip'
  missingDeclaredFlags: 'reject' | 'fill-from-declared-defaults'
  warn: (warning: SnapshotWarning) => void
}

function resolveOptions(options: SnapshotLoadOptions = {}): ResolvedOptions {
  return {
    unknownFeatureKeys: options.unknownFeatureKeys ?? (getEngineConfig().strictSnapshots ? 'fail' : 'skip'),
    missingDeclaredFlags: options.missingDeclaredFlags ?? 'reject',
    warn: options.onWarning ?? (() => undefined),
  }
}

// ============================================================================
// Zod issues
// ============================================================================

function formatPath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>((acc, part) => (
    typeof part === 'number' ? `${acc}[${part}]` : acc ? `${acc}.${part}` : part
  ), '')
}

function expectedFor(issue: ZodIssue): string {
  switch (issue.code) {
    case 'invalid_type':
      return issue.expected
    case 'invalid_union_discriminator':
      return issue.options.map(String).join(' | ')
    case 'invalid_literal':
      return String(issue.expected)
    case 'unrecognized_keys':
      return 'no additional keys'
    case 'too_small':
      return `minimum ${String(issue.minimum)}`
    default:
      return issue.code
  }
}

function fromZodError(error: ZodError): ParseError {
  const issue = error.issues[0]
  if (!issue) {
    return { kind: 'invalid-snapshot', path: '', expected: 'valid snapshot', message: error.message }
  }
  return {
    kind: 'invalid-snapshot',
    path: formatPath(issue.path),
    expected: expectedFor(issue),
    message: issue.message,
  }
}

// ============================================================================
// Decoding
// ============================================================================

const WIRE_TYPES: Record<ValueKind, WireValueType> = {
  boolean: 'BOOLEAN',
  string: 'STRING',
  int: 'INT',
  double: 'DOUBLE',
  enum: 'ENUM',
  json: 'JSON',
}

function describeKind(feature: Feature<unknown>): string {
  return feature.kind === 'enum' && feature.enumValues
    ? `one of ${feature.enumValues.join(', ')}`
    : feature.kind
}

function decodeValue(wire: WireFlagValue, feature: Feature<unknown>, path: string): ParseResult<unknown> {
  const expected = WIRE_TYPES[feature.kind]
  if (wire.type !== expected) {
    return fail({
      kind: 'type-mismatch',
      path: `${path}.type`,
      expected,
      actual: wire.type,
      message: `Feature '${feature.key}' holds ${feature.kind} values, got ${wire.type}`,
    })
  }
  if (!feature.isValue(wire.value)) {
    return fail({
      kind: 'type-mismatch',
      path: `${path}.value`,
      expected: describeKind(feature),
      actual: JSON.stringify(wire.value),
      message: `Value ${JSON.stringify(wire.value)} is not valid for '${feature.key}'`,
    })
  }
  return ok(wire.value)
}

function decodeVersion(input: string, path: string): ParseResult<Version> {
  const parsed = parseVersion(input)
  if (!parsed.ok) {
    return fail({ kind: 'invalid-version', path, input, message: parsed.error.message })
  }
  return parsed
}

function decodeRange(wire: WireVersionRange | undefined, path: string): ParseResult<VersionRange> {
  if (!wire) return ok(UNBOUNDED)
  switch (wire.type) {
    case 'UNBOUNDED':
      return ok(UNBOUNDED)
    case 'MIN_BOUND': {
      const min = decodeVersion(wire.min, `${path}.min`)
      return min.ok ? ok(atLeast(min.value)) : min
    }
    case 'MAX_BOUND': {
      const max = decodeVersion(wire.max, `${path}.max`)
      return max.ok ? ok(atMost(max.value)) : max
    }
    case 'MIN_AND_MAX_BOUND': {
      const min = decodeVersion(wire.min, `${path}.min`)
      if (!min.ok) return min
      const max = decodeVersion(wire.max, `${path}.max`)
      if (!max.ok) return max
      if (compareVersions(min.value, max.value) > 0) {
        return fail({
          kind: 'invalid-snapshot',
          path,
          expected: 'min <= max',
          message: `Range minimum ${wire.min} is greater than maximum ${wire.max}`,
        })
      }
      return ok(between(min.value, max.value))
    }
  }
}

function decodeAllowlist(entries: readonly string[], path: string): ParseResult<string[]> {
  const ids: string[] = []
  for (const [i, entry] of entries.entries()) {
    const parsed = parseStableIdHex(entry)
    if (!parsed.ok) {
      return fail({ kind: 'invalid-hex-id', path: `${path}[${i}]`, input: entry, message: parsed.error.message })
    }
    ids.push(parsed.value)
  }
  return ok(ids)
}

function decodeAxes(
  axes: Record<string, string[]>,
  catalog: AxisCatalog,
  path: string
): ParseResult<Record<string, string[]>> {
  for (const [axisId, values] of Object.entries(axes)) {
    const axisPath = `${path}.${axisId}`
    const axis = catalog.byId(axisId)
    if (!axis) {
      return fail({ kind: 'invalid-axis', path: axisPath, axisId, message: `Unknown axis '${axisId}' in '${catalog.scope}'` })
    }
    if (values.length === 0) {
      return fail({ kind: 'invalid-axis', path: axisPath, axisId, message: `Axis '${axisId}' constraint allows no values` })
    }
    for (const value of values) {
      if (!axis.values.includes(value)) {
        return fail({ kind: 'invalid-axis', path: axisPath, axisId, value, message: `'${value}' is not a value of axis '${axisId}'` })
      }
    }
  }
  return ok(axes)
}

function decodeRule<C extends EvaluationContext>(
  wire: WireRule,
  feature: Feature<unknown>,
  catalog: AxisCatalog,
  path: string
): ParseResult<Rule<unknown, C>> {
  const value = decodeValue(wire.value, feature, `${path}.value`)
  if (!value.ok) return value
  if (!isValidRollout(wire.rampUp)) {
    return fail({
      kind: 'invalid-rollout',
      path: `${path}.rampUp`,
      value: wire.rampUp,
      message: `Rollout must be between 0 and 100, got ${wire.rampUp}`,
    })
  }
  const allowlist = decodeAllowlist(wire.rampUpAllowlist, `${path}.rampUpAllowlist`)
  if (!allowlist.ok) return allowlist
  const versions = decodeRange(wire.versionRange, `${path}.versionRange`)
  if (!versions.ok) return versions
  const axes = decodeAxes(wire.axes, catalog, `${path}.axes`)
  if (!axes.ok) return axes

  return ok(rule<unknown, C>(value.value, {
    rollout: wire.rampUp,
    allowlist: allowlist.value,
    note: wire.note,
    locales: wire.locales,
    platforms: wire.platforms,
    versions: versions.value,
    axes: axes.value,
  }))
}

function decodeFlag<C extends EvaluationContext>(
  wire: WireFlag,
  feature: Feature<unknown>,
  catalog: AxisCatalog,
  path: string
): ParseResult<AnyFlagDefinition<C>> {
  if (wire.salt.trim().length === 0) {
    return fail({ kind: 'invalid-snapshot', path: `${path}.salt`, expected: 'non-blank salt', message: 'Salt must not be blank' })
  }
  const defaultValue = decodeValue(wire.defaultValue, feature, `${path}.defaultValue`)
  if (!defaultValue.ok) return defaultValue
  const allowlist = decodeAllowlist(wire.rampUpAllowlist, `${path}.rampUpAllowlist`)
  if (!allowlist.ok) return allowlist

  const rules: Rule<unknown, C>[] = []
  for (const [i, wireRule] of wire.rules.entries()) {
    const decoded = decodeRule<C>(wireRule, feature, catalog, `${path}.rules[${i}]`)
    if (!decoded.ok) return decoded
    rules.push(decoded.value)
  }

  return ok(defineFlag<unknown, C>(feature, {
    default: defaultValue.value,
    rules,
    isActive: wire.isActive,
    salt: wire.salt,
    allowlist: allowlist.value,
  }))
}

/**
 * Decode flags, resolving keys against the scope. Unknown keys fail or are
 * skipped with a warning.
 */
function decodeFlags<C extends EvaluationContext>(
  flags: readonly WireFlag[],
  scope: FeatureScope<C>,
  options: ResolvedOptions
): ParseResult<AnyFlagDefinition<C>[]> {
  const definitions: AnyFlagDefinition<C>[] = []
  const seen = new Set<string>()

  for (const [i, wire] of flags.entries()) {
    const path = `flags[${i}]`
    const feature = scope.feature(wire.key)
    if (!feature) {
      if (options.unknownFeatureKeys === 'skip') {
        options.warn({
          kind: 'unknown-feature-key',
          key: wire.key,
          message: `Skipped unknown feature '${wire.key}' in namespace '${scope.id}'`,
        })
        continue
      }
      return fail({
        kind: 'feature-not-found',
        path: `${path}.key`,
        key: wire.key,
        message: `Feature '${wire.key}' is not declared in namespace '${scope.id}'`,
      })
    }
    if (seen.has(feature.id)) {
      return fail({ kind: 'invalid-snapshot', path: `${path}.key`, expected: 'unique feature keys', message: `Feature '${wire.key}' appears more than once` })
    }
    seen.add(feature.id)

    const decoded = decodeFlag<C>(wire, feature, scope.catalog, path)
    if (!decoded.ok) return decoded
    definitions.push(decoded.value)
  }

  return ok(definitions)
}

/**
 * Decode an already-parsed snapshot object.
 */
export function decodeSnapshot<C extends EvaluationContext>(
  data: unknown,
  scope: FeatureScope<C>,
  options?: SnapshotLoadOptions
): ParseResult<Configuration<C>> {
  const resolved = resolveOptions(options)
  const parsed = SnapshotSchema.safeParse(data)
  if (!parsed.success) {
    return fail(fromZodError(parsed.error))
  }

  const decoded = decodeFlags(parsed.data.flags, scope, resolved)
  if (!decoded.ok) return decoded
  return requireDeclaredFlags(createConfiguration(decoded.value, parsed.data.meta ?? {}), scope, options)
}

/**
 * Check that every declared feature has a definition. Under
 * `fill-from-declared-defaults` the gaps are filled from the declared
 * configuration with a warning each; otherwise the first gap, in identity
 * order, fails with `missing-flag`.
 */
export function requireDeclaredFlags<C extends EvaluationContext>(
  configuration: Configuration<C>,
  scope: FeatureScope<C>,
  options?: SnapshotLoadOptions
): ParseResult<Configuration<C>> {
  const resolved = resolveOptions(options)
  const filled: AnyFlagDefinition<C>[] = []
  for (const id of featureIds(scope.declared)) {
    if (configuration.flags.has(id)) continue
    const declared = scope.declared.flags.get(id)
    if (resolved.missingDeclaredFlags === 'reject' || !declared) {
      return fail({ kind: 'missing-flag', key: id, message: `Snapshot has no definition for declared feature '${id}'` })
    }
    resolved.warn({
      kind: 'missing-declared-flag',
      key: id,
      message: `Filled '${id}' from declared defaults`,
    })
    filled.push(declared)
  }

  if (filled.length === 0) return ok(configuration)
  return ok(createConfiguration([...configuration.flags.values(), ...filled], configuration.metadata))
}

/**
 * Decode a JSON snapshot string.
 *
 * @example
 * const result = decodeConfiguration(payload, checkout)
 * if (result.ok) checkout.registry.load(result.value)
 */
export function decodeConfiguration<C extends EvaluationContext>(
  json: string,
  scope: FeatureScope<C>,
  options?: SnapshotLoadOptions
): ParseResult<Configuration<C>> {
  const parsed = parseJson(json)
  if (!parsed.ok) {
    return fail({ kind: 'invalid-json', message: parsed.error.message })
  }
  return decodeSnapshot(parsed.value, scope, options)
}

/**
 * Decode a JSON patch: `{ meta?, flags: [...], removeKeys: [...] }`.
 */
export function decodePatch<C extends EvaluationContext>(
  json: string,
  scope: FeatureScope<C>,
  options?: SnapshotLoadOptions
): ParseResult<ConfigurationPatch<C>> {
  const resolved = resolveOptions(options)
  const raw = parseJson(json)
  if (!raw.ok) {
    return fail({ kind: 'invalid-json', message: raw.error.message })
  }
  const parsed = PatchSchema.safeParse(raw.value)
  if (!parsed.success) {
    return fail(fromZodError(parsed.error))
  }

  const upsert = decodeFlags(parsed.data.flags, scope, resolved)
  if (!upsert.ok) return upsert

  const remove: FeatureId[] = []
  for (const [i, key] of parsed.data.removeKeys.entries()) {
    const feature = scope.feature(key)
    if (feature) {
      remove.push(feature.id)
      continue
    }
    if (resolved.unknownFeatureKeys === 'skip') {
      resolved.warn({ kind: 'unknown-feature-key', key, message: `Skipped removal of unknown feature '${key}'` })
      continue
    }
    return fail({
      kind: 'feature-not-found',
      path: `removeKeys[${i}]`,
      key,
      message: `Feature '${key}' is not declared in namespace '${scope.id}'`,
    })
  }

  return ok({ upsert: upsert.value, remove, metadata: parsed.data.meta })
}

// ============================================================================
// Encoding
// ============================================================================

function encodeValue(value: unknown, feature: Feature<unknown>): WireFlagValue {
  switch (feature.kind) {
    case 'boolean':
      if (typeof value === 'boolean') return { type: 'BOOLEAN', value }
      break
    case 'string':
      if (typeof value === 'string') return { type: 'STRING', value }
      break
    case 'int':
      if (typeof value === 'number' && Number.isSafeInteger(value)) return { type: 'INT', value }
      break
    case 'double':
      if (typeof value === 'number' && Number.isFinite(value)) return { type: 'DOUBLE', value }
      break
    case 'enum':
      if (typeof value === 'string') return { type: 'ENUM', value }
      break
    case 'json':
      if (isJsonObject(value)) return { type: 'JSON', value }
      break
  }
  throw new NotSerializableError(`Value for '${feature.id}' is not a ${feature.kind}`, { featureId: feature.id })
}

function encodeRange(range: VersionRange): WireVersionRange | undefined {
  switch (range.kind) {
    case 'unbounded':
      return undefined
    case 'left-bound':
      return { type: 'MIN_BOUND', min: formatVersion(range.min) }
    case 'right-bound':
      return { type: 'MAX_BOUND', max: formatVersion(range.max) }
    case 'fully-bound':
      return { type: 'MIN_AND_MAX_BOUND', min: formatVersion(range.min), max: formatVersion(range.max) }
  }
}

function encodeRule<C extends EvaluationContext>(r: Rule<unknown, C>, feature: Feature<unknown>): WireRule {
  if (r.targeting.predicate) {
    throw new NotSerializableError(`Rule on '${feature.id}' uses a custom predicate, which has no wire form`, {
      featureId: feature.id,
      note: r.note,
    })
  }
  const versionRange = encodeRange(r.targeting.versionRange)
  return {
    value: encodeValue(r.value, feature),
    rampUp: r.rollout,
    rampUpAllowlist: [...r.allowlist],
    ...(r.note !== undefined ? { note: r.note } : {}),
    locales: [...r.targeting.locales],
    platforms: [...r.targeting.platforms],
    ...(versionRange ? { versionRange } : {}),
    axes: Object.fromEntries([...r.targeting.axes].map(([id, values]) => [id, [...values]])),
  }
}

function encodeMetadata(metadata: ConfigurationMetadata): ConfigurationMetadata | undefined {
  const meta: { version?: string; generatedAtEpochMillis?: number; source?: string } = {}
  if (metadata.version !== undefined) meta.version = metadata.version
  if (metadata.generatedAtEpochMillis !== undefined) meta.generatedAtEpochMillis = metadata.generatedAtEpochMillis
  if (metadata.source !== undefined) meta.source = metadata.source
  return Object.keys(meta).length > 0 ? meta : undefined
}

/**
 * Wire object for a configuration. Flags are ordered by identity; rules
 * keep declaration order. Throws NotSerializableError for rules with
 * custom predicates.
 */
export function toWireSnapshot<C extends EvaluationContext>(configuration: Configuration<C>): WireSnapshotInput {
  const flags = featureIds(configuration).flatMap(id => {
    const definition = configuration.flags.get(id)
    if (!definition) return []
    const { feature } = definition
    return [{
      key: feature.id,
      defaultValue: encodeValue(definition.defaultValue, feature),
      salt: definition.salt,
      isActive: definition.isActive,
      rampUpAllowlist: [...definition.allowlist],
      rules: definition.rules.map(r => encodeRule(r, feature)),
    }]
  })
  const meta = encodeMetadata(configuration.metadata)
  return meta ? { meta, flags } : { flags }
}

export function encodeConfiguration<C extends EvaluationContext>(
  configuration: Configuration<C>,
  options: { pretty?: boolean } = {}
): string {
  return JSON.stringify(toWireSnapshot(configuration), null, options.pretty ? 2 : undefined)
}
