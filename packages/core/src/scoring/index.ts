/**
 * Scoring Module
 *
 * Rule table, dimension aggregation, rating resolution and the engine
 * that ties them together.
 */

export { AssessmentEngine, type AssessmentEngineOptions } from './AssessmentEngine.js'
export {
  DIMENSIONS,
  DIMENSION_NAMES,
  MAX_TOTAL_SCORE,
  assertRuleTableConsistency,
  evaluateIndicator,
  scoreDimension,
} from './dimensions.js'
export {
  RATING_BANDS,
  RATING_LABELS,
  RATINGS,
  ratingLabel,
  resolveRating,
  type RatingBand,
  type RatingLocale,
} from './rating.js'
export {
  FINDABILITY_INDICATORS,
  ACCESSIBILITY_INDICATORS,
  INTEROPERABILITY_INDICATORS,
  REUSABILITY_INDICATORS,
  CONTEXT_INDICATORS,
} from './indicators/index.js'
export {
  award,
  deny,
  partial,
  type DimensionDefinition,
  type DistributionIndicator,
  type EvaluationContext,
  type IndicatorDefinition,
  type RecordIndicator,
  type Verdict,
} from './types.js'
