export {
  CardinalityTracker,
  type CardinalityResult,
  type CardinalityTrackerOptions,
  type Confidence,
  type TrackerSnapshot,
} from './cardinality-tracker.ts';
export {
  CardinalityError,
  InvalidErrorRateError,
  InvalidPrecisionError,
  InvalidSketchDataError,
  PrecisionMismatchError,
  type CardinalityErrorKind,
} from './errors.ts';
export {
  ENV_PREFIX,
  countDistinctConfigSchema,
  countDistinctOptions,
  parseCountDistinctConfig,
  type CountDistinctConfig,
} from './config.ts';
export {
  countDistinct,
  type CountDistinctResult,
  type GroupCount,
} from './count-distinct.ts';
export {
  DEFAULT_SEED,
  canonicalString,
  xxhash64Hasher,
  type Hashable,
  type Hasher,
} from './hash.ts';
export {LogLogBeta, type LogLogBetaOptions} from './loglog-beta.ts';
export {
  MAX_PRECISION,
  MIN_PRECISION,
  maxRank,
  precisionForErrorRate,
  registerCount,
  registerWidth,
  standardError,
} from './precision.ts';
export {RegisterArray} from './register-array.ts';
export type {LogLogBetaJSON} from './serialization.ts';
