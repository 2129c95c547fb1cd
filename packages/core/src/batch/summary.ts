/**
 * Batch summary statistics
 */

import type {
  AssessmentResult,
  BatchSummary,
  DimensionName,
  IndicatorId,
  Rating,
} from '../types/assessment.js'
import { DIMENSION_NAMES } from '../scoring/dimensions.js'
import type { BatchEntry } from './types.js'

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0
  return values.reduce((sum, value) => sum + value, 0) / values.length
}

/**
 * Median; the mean of the two middle values for even lengths
 */
export function median(values: readonly number[]): number {
  if (values.length === 0) return 0
  const sorted = [...values].sort((a, b) => a - b)
  const middle = Math.floor(sorted.length / 2)
  const upper = sorted[middle] ?? 0
  if (sorted.length % 2 === 1) return upper
  const lower = sorted[middle - 1] ?? 0
  return (lower + upper) / 2
}

function emptyRatingCounts(): Record<Rating, number> {
  return { Poor: 0, Sufficient: 0, Good: 0, Excellent: 0 }
}

function dimensionMeans(results: readonly AssessmentResult[]): Record<DimensionName, number> {
  const means: Record<DimensionName, number> = {
    Findability: 0,
    Accessibility: 0,
    Interoperability: 0,
    Reusability: 0,
    Context: 0,
  }
  for (const name of DIMENSION_NAMES) {
    const values = results.map(
      (result) => result.dimensions.find((dimension) => dimension.dimension === name)?.value ?? 0
    )
    means[name] = mean(values)
  }
  return means
}

function indicatorPassRates(
  results: readonly AssessmentResult[]
): Partial<Record<IndicatorId, number>> {
  const passes = new Map<IndicatorId, number>()
  for (const result of results) {
    for (const dimension of result.dimensions) {
      for (const indicator of dimension.indicators) {
        const count = passes.get(indicator.indicator) ?? 0
        passes.set(indicator.indicator, indicator.passed ? count + 1 : count)
      }
    }
  }

  const rates: Partial<Record<IndicatorId, number>> = {}
  for (const [indicator, count] of passes) {
    rates[indicator] = count / results.length
  }
  return rates
}

/**
 * Summarize the entries of a batch run
 *
 * @param total - Records submitted, including any never started
 */
export function summarizeBatch(entries: readonly BatchEntry[], total: number): BatchSummary {
  const results: AssessmentResult[] = []
  const defectRecords: { recordId: string; message: string }[] = []
  const ratingCounts = emptyRatingCounts()

  for (const entry of entries) {
    if (entry.status === 'assessed') {
      results.push(entry.result)
      ratingCounts[entry.result.rating]++
    } else {
      defectRecords.push({ recordId: entry.recordId, message: entry.message })
    }
  }

  const scores = results.map((result) => result.totalScore)
  const hasResults = results.length > 0

  return {
    total,
    assessed: results.length,
    defects: defectRecords.length,
    skipped: Math.max(0, total - entries.length),
    ratingCounts,
    meanScore: hasResults ? mean(scores) : null,
    medianScore: hasResults ? median(scores) : null,
    dimensionMeans: hasResults ? dimensionMeans(results) : null,
    indicatorPassRates: hasResults ? indicatorPassRates(results) : {},
    defectRecords,
  }
}
