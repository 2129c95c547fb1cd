/**
 * Dimension rule table and aggregation
 *
 * Indicators are evaluated in table order and their points summed. An
 * indicator awarding points outside its range, or a dimension summing past
 * its maximum, is a rule table defect and raises ScoringInvariantError.
 */

import { ScoringInvariantError } from '../errors/index.js'
import type { DimensionName, DimensionScore, IndicatorResult } from '../types/assessment.js'
import {
  ACCESSIBILITY_INDICATORS,
  CONTEXT_INDICATORS,
  FINDABILITY_INDICATORS,
  INTEROPERABILITY_INDICATORS,
  REUSABILITY_INDICATORS,
} from './indicators/index.js'
import type { DimensionDefinition, EvaluationContext, IndicatorDefinition, Verdict } from './types.js'

/** Highest attainable total score */
export const MAX_TOTAL_SCORE = 405

/**
 * The FAIR+Context rule table, in reporting order
 */
export const DIMENSIONS: readonly DimensionDefinition[] = [
  { name: 'Findability', maxPoints: 100, indicators: FINDABILITY_INDICATORS },
  { name: 'Accessibility', maxPoints: 100, indicators: ACCESSIBILITY_INDICATORS },
  { name: 'Interoperability', maxPoints: 110, indicators: INTEROPERABILITY_INDICATORS },
  { name: 'Reusability', maxPoints: 75, indicators: REUSABILITY_INDICATORS },
  { name: 'Context', maxPoints: 20, indicators: CONTEXT_INDICATORS },
]

export const DIMENSION_NAMES: readonly DimensionName[] = [
  'Findability',
  'Accessibility',
  'Interoperability',
  'Reusability',
  'Context',
]

/**
 * Check that indicator maxima add up to each dimension maximum and the
 * dimension maxima to MAX_TOTAL_SCORE
 *
 * @throws ScoringInvariantError describing the first mismatch
 */
export function assertRuleTableConsistency(
  dimensions: readonly DimensionDefinition[] = DIMENSIONS
): void {
  const seen = new Set<string>()
  let total = 0

  for (const dimension of dimensions) {
    let sum = 0
    for (const indicator of dimension.indicators) {
      if (!Number.isInteger(indicator.maxPoints) || indicator.maxPoints <= 0) {
        throw new ScoringInvariantError(
          `Indicator ${indicator.id} has invalid maximum ${indicator.maxPoints}`,
          { context: { dimension: dimension.name, indicator: indicator.id } }
        )
      }
      if (seen.has(indicator.id)) {
        throw new ScoringInvariantError(`Indicator ${indicator.id} appears more than once`, {
          context: { dimension: dimension.name, indicator: indicator.id },
        })
      }
      seen.add(indicator.id)
      sum += indicator.maxPoints
    }

    if (sum !== dimension.maxPoints) {
      throw new ScoringInvariantError(
        `${dimension.name} indicators sum to ${sum}, expected ${dimension.maxPoints}`,
        { context: { dimension: dimension.name, sum, maxPoints: dimension.maxPoints } }
      )
    }
    total += dimension.maxPoints
  }

  if (total !== MAX_TOTAL_SCORE) {
    throw new ScoringInvariantError(
      `Dimension maxima sum to ${total}, expected ${MAX_TOTAL_SCORE}`,
      { context: { total } }
    )
  }
}

function bestDistributionVerdict(
  indicator: Extract<IndicatorDefinition, { scope: 'distribution' }>,
  context: EvaluationContext
): { verdict: Verdict; distributionIndex?: number } {
  const distributions = context.record.distributions ?? []
  let best: { verdict: Verdict; distributionIndex?: number } | undefined

  for (const [index, distribution] of distributions.entries()) {
    const verdict = indicator.evaluate(distribution, context, indicator.maxPoints)
    if (best === undefined || verdict.points > best.verdict.points) {
      best = { verdict, distributionIndex: index }
    }
  }

  return best ?? { verdict: { points: 0, rationale: 'No distributions' } }
}

/**
 * Evaluate one indicator and validate the points it awarded
 *
 * @throws ScoringInvariantError when points fall outside [0, maxPoints]
 */
export function evaluateIndicator(
  indicator: IndicatorDefinition,
  dimension: DimensionName,
  context: EvaluationContext
): IndicatorResult {
  const { verdict, distributionIndex } =
    indicator.scope === 'record'
      ? { verdict: indicator.evaluate(context, indicator.maxPoints), distributionIndex: undefined }
      : bestDistributionVerdict(indicator, context)

  if (
    !Number.isFinite(verdict.points) ||
    verdict.points < 0 ||
    verdict.points > indicator.maxPoints
  ) {
    throw new ScoringInvariantError(
      `Indicator ${indicator.id} awarded ${verdict.points} points, outside [0, ${indicator.maxPoints}]`,
      {
        recordId: context.record.id,
        context: { dimension, indicator: indicator.id, points: verdict.points },
      }
    )
  }

  return {
    indicator: indicator.id,
    name: indicator.name,
    field: indicator.field,
    dimension,
    maxPoints: indicator.maxPoints,
    points: verdict.points,
    passed: verdict.points === indicator.maxPoints,
    rationale: verdict.rationale,
    ...(distributionIndex === undefined ? {} : { distributionIndex }),
  }
}

/**
 * Evaluate every indicator of a dimension and sum the points
 *
 * @throws ScoringInvariantError when an indicator or the sum leaves its range
 */
export function scoreDimension(
  definition: DimensionDefinition,
  context: EvaluationContext
): DimensionScore {
  const indicators = definition.indicators.map((indicator) =>
    evaluateIndicator(indicator, definition.name, context)
  )
  const value = indicators.reduce((sum, result) => sum + result.points, 0)

  if (value > definition.maxPoints) {
    throw new ScoringInvariantError(
      `${definition.name} scored ${value}, above its maximum of ${definition.maxPoints}`,
      {
        recordId: context.record.id,
        context: { dimension: definition.name, value, maxPoints: definition.maxPoints },
      }
    )
  }

  return { dimension: definition.name, value, maxPoints: definition.maxPoints, indicators }
}
