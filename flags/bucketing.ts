/**
 * Rollout bucketing
 *
 * Assigns a stable id to one of 10,000 buckets per (salt, feature key).
 * The assignment is part of the public contract: changing the digest, the
 * input layout or the byte reduction moves every user to a new bucket.
 *
 *   input  = `${salt}:${featureKey}:${stableIdHex}`
 *   digest = SHA-256(input as UTF-8)
 *   bucket = uint32_be(digest[0..4]) % 10000
 *
 * @module flags/bucketing
 */

import { createHash } from 'node:crypto'
import type { StableId } from './context'
import { InvalidArgumentError } from './errors'

export const BUCKET_RESOLUTION = 10_000

/** Bucket used when the context carries no stable id. */
export const MISSING_STABLE_ID_BUCKET = BUCKET_RESOLUTION - 1

/**
 * Deterministic bucket in [0, 9999]. A new hash context is created for
 * every call.
 */
export function bucket(stableId: StableId, featureKey: string, salt: string): number {
  const digest = createHash('sha256').update(`${salt}:${featureKey}:${stableId}`, 'utf8').digest()
  return digest.readUInt32BE(0) % BUCKET_RESOLUTION
}

export function bucketFor(stableId: StableId | undefined, featureKey: string, salt: string): number {
  return stableId === undefined ? MISSING_STABLE_ID_BUCKET : bucket(stableId, featureKey, salt)
}

/**
 * Rollout percentage to basis points, floored. Float noise below 1e-9 is
 * discarded first so that 0.29% is 29 and not 28.
 */
export function thresholdBasisPoints(rollout: number): number {
  return Math.floor(rollout * 100 + 1e-9)
}

export function isValidRollout(rollout: number): boolean {
  return Number.isFinite(rollout) && rollout >= 0 && rollout <= 100
}

export function assertRollout(rollout: number): number {
  if (!isValidRollout(rollout)) {
    throw new InvalidArgumentError(`Rollout must be between 0 and 100, got ${rollout}`, { rollout })
  }
  return rollout
}

/**
 * Percentage inclusion only; allowlists are handled by rolloutInclusion.
 */
export function isInRampUp(rollout: number, bucketValue: number): boolean {
  if (rollout <= 0) return false
  if (rollout >= 100) return true
  return bucketValue < thresholdBasisPoints(rollout)
}

export type InclusionReason = 'allowlist' | 'rollout'

/**
 * Why a stable id is inside a rollout, or undefined when it is not.
 * The allowlist wins regardless of bucket or percentage.
 */
export function rolloutInclusion(
  rollout: number,
  allowlist: ReadonlySet<string>,
  stableId: StableId | undefined,
  bucketValue: number
): InclusionReason | undefined {
  if (stableId !== undefined && allowlist.has(stableId)) return 'allowlist'
  if (isInRampUp(rollout, bucketValue)) return 'rollout'
  return undefined
}

/**
 * Bucket details reported in explain output.
 */
export interface BucketInfo {
  featureKey: string
  salt: string
  bucket: number
  rollout: number
  thresholdBasisPoints: number
  inRollout: boolean
}

export function bucketInfo(featureKey: string, salt: string, bucketValue: number, rollout: number): BucketInfo {
  return {
    featureKey,
    salt,
    bucket: bucketValue,
    rollout,
    thresholdBasisPoints: thresholdBasisPoints(rollout),
    inRollout: isInRampUp(rollout, bucketValue),
  }
}
