/**
 * flagwise - feature flag evaluation for Node.js
 *
 * - flags/          Evaluation engine: features, rules, bucketing, registries
 * - serialization/  JSON snapshot codec and loader
 * - lib/            Logger, engine configuration, safe JSON helpers
 *
 * @example
 * ```typescript
 * import { defineNamespace, declareFeatures, defineFlag, SnapshotLoader } from 'flagwise'
 *
 * const f = declareFeatures('checkout')
 * const applePay = f.boolean('applePay')
 * const checkout = defineNamespace({ id: 'checkout', flags: [defineFlag(applePay, { default: false })] })
 *
 * const loader = new SnapshotLoader(checkout)
 * loader.load(remotePayload)
 * ```
 */

export * from './flags'

export {
  encodeConfiguration,
  toWireSnapshot,
  decodeConfiguration,
  decodeSnapshot,
  decodePatch,
  requireDeclaredFlags,
  type FeatureScope,
  type SnapshotLoadOptions,
  type SnapshotWarning,
} from './serialization/codec'

export { SnapshotLoader, type LoadOutcome, type SnapshotLoaderOptions } from './serialization/loader'

export type { WireFlag, WireFlagValue, WireRule, WireSnapshot, WirePatch, WireVersionRange } from './serialization/schema'

export { Logger, createLogger, silentLogger, isLogLevel, LOG_LEVELS, type LogData, type LogLevel, type LoggerOptions } from './lib/logger'

export {
  defaultEngineConfig,
  loadEngineConfig,
  getEngineConfig,
  setEngineConfig,
  type EngineConfig,
} from './lib/config'

export { safeStringify, canonicalJson } from './lib/safe-stringify'
