/**
 * Rule table types
 */

import type { DimensionName, IndicatorId } from '../types/assessment.js'
import type { Distribution, MetadataRecord } from '../types/record.js'
import type { ReachabilityResult } from '../reachability/types.js'

/**
 * Everything an indicator may consult. Reachability observations are
 * gathered before scoring so evaluation itself stays synchronous.
 */
export interface EvaluationContext {
  readonly record: MetadataRecord
  /** Observations keyed by download URL */
  readonly reachability: ReadonlyMap<string, ReachabilityResult>
  readonly reachabilityEnabled: boolean
}

/**
 * Points awarded by one evaluation, with the reason
 */
export interface Verdict {
  points: number
  rationale: string
}

interface IndicatorMetadata {
  readonly id: IndicatorId
  readonly name: string
  /** DCAT property inspected */
  readonly field: string
  readonly maxPoints: number
}

/**
 * Indicator judged once per record
 */
export interface RecordIndicator extends IndicatorMetadata {
  readonly scope: 'record'
  evaluate(context: EvaluationContext, maxPoints: number): Verdict
}

/**
 * Indicator judged per distribution; the best distribution is kept
 */
export interface DistributionIndicator extends IndicatorMetadata {
  readonly scope: 'distribution'
  evaluate(distribution: Distribution, context: EvaluationContext, maxPoints: number): Verdict
}

export type IndicatorDefinition = RecordIndicator | DistributionIndicator

export interface DimensionDefinition {
  readonly name: DimensionName
  readonly maxPoints: number
  readonly indicators: readonly IndicatorDefinition[]
}

/** Full points */
export function award(maxPoints: number, rationale: string): Verdict {
  return { points: maxPoints, rationale }
}

/** Zero points */
export function deny(rationale: string): Verdict {
  return { points: 0, rationale }
}

/** Half points, rounded down */
export function partial(maxPoints: number, rationale: string): Verdict {
  return { points: Math.floor(maxPoints / 2), rationale }
}
