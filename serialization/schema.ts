/**
 * Wire schema for configuration snapshots and patches
 *
 * Structural validation only. Range checks, version strings, hex ids,
 * axis membership and value types against declared features happen in
 * the codec, where they map to specific ParseError kinds.
 *
 * @module serialization/schema
 */

import { z } from 'zod'

// ============================================================================
// Values
// ============================================================================

const jsonValue: z.ZodType<unknown> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)])
)

export const FlagValueSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('BOOLEAN'), value: z.boolean() }).strict(),
  z.object({ type: z.literal('STRING'), value: z.string() }).strict(),
  z.object({ type: z.literal('INT'), value: z.number().int() }).strict(),
  z.object({ type: z.literal('DOUBLE'), value: z.number() }).strict(),
  z.object({ type: z.literal('ENUM'), value: z.string() }).strict(),
  z.object({ type: z.literal('JSON'), value: z.record(jsonValue) }).strict(),
])

export type WireFlagValue = z.infer<typeof FlagValueSchema>

export type WireValueType = WireFlagValue['type']

// ============================================================================
// Version ranges
// ============================================================================

export const VersionRangeSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('UNBOUNDED') }).strict(),
  z.object({ type: z.literal('MIN_BOUND'), min: z.string() }).strict(),
  z.object({ type: z.literal('MAX_BOUND'), max: z.string() }).strict(),
  z.object({ type: z.literal('MIN_AND_MAX_BOUND'), min: z.string(), max: z.string() }).strict(),
])

export type WireVersionRange = z.infer<typeof VersionRangeSchema>

// ============================================================================
// Rules and flags
// ============================================================================

export const RuleSchema = z.object({
  value: FlagValueSchema,
  rampUp: z.number().default(100),
  rampUpAllowlist: z.array(z.string()).default([]),
  note: z.string().optional(),
  locales: z.array(z.string()).default([]),
  platforms: z.array(z.string()).default([]),
  versionRange: VersionRangeSchema.optional(),
  axes: z.record(z.array(z.string())).default({}),
}).strict()

export type WireRule = z.infer<typeof RuleSchema>

export const FlagSchema = z.object({
  key: z.string(),
  defaultValue: FlagValueSchema,
  salt: z.string().min(1).default('v1'),
  isActive: z.boolean().default(true),
  rampUpAllowlist: z.array(z.string()).default([]),
  rules: z.array(RuleSchema).default([]),
}).strict()

export type WireFlag = z.infer<typeof FlagSchema>

export const MetadataSchema = z.object({
  version: z.string().optional(),
  generatedAtEpochMillis: z.number().int().nonnegative().optional(),
  source: z.string().optional(),
}).strict()

export const SnapshotSchema = z.object({
  meta: MetadataSchema.optional(),
  flags: z.array(FlagSchema),
}).strict()

export type WireSnapshot = z.infer<typeof SnapshotSchema>

export const PatchSchema = z.object({
  meta: MetadataSchema.optional(),
  flags: z.array(FlagSchema).default([]),
  removeKeys: z.array(z.string()).default([]),
}).strict()

export type WirePatch = z.infer<typeof PatchSchema>

/**
 * Wire encoding before defaults are applied. What encoders produce.
 */
export type WireSnapshotInput = z.input<typeof SnapshotSchema>
