/**
 * @opendata-mqa/core - Metadata quality assessment engine
 */

// Version
export const VERSION = '0.1.0'

// Types
export type {
  MetadataRecord,
  Distribution,
  TemporalCoverage,
  ContactPoint,
  Publisher,
} from './types/record.js'
export type {
  AssessmentResult,
  BatchSummary,
  DefectRecord,
  DimensionName,
  DimensionScore,
  IndicatorId,
  IndicatorResult,
  Rating,
} from './types/assessment.js'

// Input boundary
export {
  MetadataRecordSchema,
  DistributionSchema,
  parseMetadataRecord,
  safeParseMetadataRecord,
  type SafeParseRecordResult,
} from './records/schema.js'

// Scoring
export {
  AssessmentEngine,
  DIMENSIONS,
  DIMENSION_NAMES,
  MAX_TOTAL_SCORE,
  RATING_BANDS,
  RATING_LABELS,
  RATINGS,
  assertRuleTableConsistency,
  evaluateIndicator,
  scoreDimension,
  ratingLabel,
  resolveRating,
  award,
  deny,
  partial,
  type AssessmentEngineOptions,
  type DimensionDefinition,
  type DistributionIndicator,
  type EvaluationContext,
  type IndicatorDefinition,
  type RatingBand,
  type RatingLocale,
  type RecordIndicator,
  type Verdict,
} from './scoring/index.js'

// Batch
export {
  runBatch,
  summarizeBatch,
  DEFAULT_BATCH_CONCURRENCY,
  type BatchEntry,
  type BatchOptions,
  type BatchReport,
  type DefectEntry,
} from './batch/index.js'

// Reachability
export {
  createHttpReachabilityOracle,
  probeUrl,
  probeUrls,
  DEFAULT_REACHABILITY_TIMEOUT_MS,
  type HttpReachabilityOracleOptions,
  type ReachabilityOracle,
  type ReachabilityResult,
} from './reachability/index.js'

// Vocabularies and field checks
export {
  canonicalFormat,
  classifyProfile,
  isVocabularyAccessRight,
  isVocabularyLicense,
  type ProfileConformance,
} from './vocabularies/index.js'
export {
  HIDDEN_NULLS,
  isAbsoluteUrl,
  isBlank,
  isValidEmail,
  parseMetadataDate,
  parseMetadataPeriod,
  presentValue,
  presentValues,
  type MetadataPeriod,
} from './validation/field-validators.js'
export { classifySpatial, type SpatialClassification } from './validation/spatial.js'

// Errors
export {
  MqaError,
  ScoringInvariantError,
  ValidationError,
  NetworkError,
  ConfigurationError,
  wrapError,
  getErrorMessage,
  isMqaError,
} from './errors/index.js'

// Logging
export {
  createLogger,
  logger,
  silentLogger,
  LogLevel,
  MemoryLogAggregator,
  getLogAggregator,
  setLogAggregator,
  type Logger,
  type LogEntry,
  type LogAggregator,
} from './utils/logger.js'
