/**
 * Flag evaluation engine
 *
 * Typed features, targeting rules, deterministic percentage rollouts and
 * per-namespace registries with atomic load, rollback and a kill switch.
 *
 * @example Declaring and evaluating
 * ```typescript
 * const f = declareFeatures('checkout')
 * const applePay = f.boolean('applePay')
 *
 * const checkout = defineNamespace({
 *   id: 'checkout',
 *   flags: [
 *     defineFlag(applePay, {
 *       default: false,
 *       rules: [
 *         rule(true, { platforms: ['IOS'] }),
 *         rule(true, { platforms: ['ANDROID'], rollout: 50 }),
 *       ],
 *     }),
 *   ],
 * })
 *
 * checkout.evaluate(applePay, { platform: 'ANDROID', stableId: stableId('user-1') })
 * ```
 *
 * @example Kill switch and rollback
 * ```typescript
 * checkout.registry.disableAll()   // every flag returns its default
 * checkout.registry.enableAll()
 * checkout.registry.rollback()     // false when there is nothing to roll back to
 * ```
 *
 * @module flags
 */

// =============================================================================
// Identity and values
// =============================================================================

export {
  FEATURE_ID_PREFIX,
  FEATURE_ID_SEPARATOR,
  featureId,
  parseFeatureId,
  compareFeatureIds,
  type FeatureId,
  type FeatureIdParts,
} from './identity'

export {
  declareFeatures,
  isJsonValue,
  isJsonObject,
  type Feature,
  type FeatureFactory,
  type FeatureValue,
  type JsonObject,
  type JsonValue,
  type ValueKind,
} from './feature'

export {
  version,
  parseVersion,
  versionOf,
  compareVersions,
  formatVersion,
  UNBOUNDED,
  atLeast,
  atMost,
  between,
  hasBounds,
  rangeContains,
  formatRange,
  type Version,
  type VersionRange,
} from './version'

// =============================================================================
// Context and targeting
// =============================================================================

export {
  AxisCatalog,
  AxisValuesBuilder,
  NO_AXIS_VALUES,
  type Axis,
  type AxisValues,
} from './axis'

export {
  stableId,
  stableIdFromHex,
  parseStableIdHex,
  type EvaluationContext,
  type StableId,
} from './context'

export {
  predicate,
  targeting,
  matches,
  baseSpecificity,
  extensionSpecificity,
  specificity,
  type CustomPredicate,
  type Targeting,
  type TargetingSpec,
} from './targeting'

// =============================================================================
// Bucketing
// =============================================================================

export {
  BUCKET_RESOLUTION,
  MISSING_STABLE_ID_BUCKET,
  bucket,
  bucketFor,
  thresholdBasisPoints,
  isValidRollout,
  isInRampUp,
  rolloutInclusion,
  bucketInfo,
  type BucketInfo,
  type InclusionReason,
} from './bucketing'

// =============================================================================
// Definitions and configurations
// =============================================================================

export { rule, rankRules, type Rule, type RuleSpec, type RankedRule } from './rule'

export {
  DEFAULT_SALT,
  defineFlag,
  evaluateTrace,
  type FlagDefinition,
  type FlagSpec,
  type EvaluationTrace,
  type TraceMatch,
} from './flag-definition'

export {
  createConfiguration,
  emptyConfiguration,
  withMetadata,
  featureIds,
  patchConfiguration,
  type AnyFlagDefinition,
  type Configuration,
  type ConfigurationMetadata,
  type ConfigurationPatch,
} from './configuration'

export { diffConfigurations, definitionsEqual, isEmptyDiff, type ConfigurationDiff } from './diff'

// =============================================================================
// Registry and evaluation
// =============================================================================

export {
  DEFAULT_HISTORY_LIMIT,
  NamespaceRegistry,
  type RegistryOptions,
  type EvaluationSnapshot,
  type EvaluationSource,
} from './registry'

export {
  evaluate,
  explain,
  evaluateWithShadow,
  describeDecision,
  decisionKind,
  type Decision,
  type EvaluationDiagnostics,
  type RuleExplanation,
  type RuleMatch,
  type ShadowMismatch,
  type ShadowOptions,
} from './evaluation'

export { Namespace, defineNamespace, type NamespaceOptions } from './namespace'

export {
  NO_HOOKS,
  createHooks,
  InMemoryMetrics,
  type ConfigLoadMetric,
  type ConfigRollbackMetric,
  type DecisionKind,
  type EvaluationMetric,
  type EvaluationMode,
  type MetricsCollector,
  type RegistryHooks,
} from './telemetry'

// =============================================================================
// Errors and results
// =============================================================================

export {
  FlagError,
  FlagNotFoundError,
  AxisConflictError,
  InvalidIdentifierError,
  InvalidArgumentError,
  DuplicateFeatureError,
  TypeMismatchError,
  NotSerializableError,
  ParseFailureError,
  isFlagError,
  type FlagErrorCode,
} from './errors'

export {
  ok,
  fail,
  mapResult,
  flatMapResult,
  getOrElse,
  getOrThrow,
  collectResults,
  formatParseError,
  type ParseError,
  type ParseErrorKind,
  type ParseResult,
} from './result'
