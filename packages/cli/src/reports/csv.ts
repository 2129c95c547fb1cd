/**
 * CSV rendering for score reports
 */

import {
  DIMENSION_NAMES,
  RATINGS,
  ratingLabel,
  type AssessmentResult,
  type BatchSummary,
  type RatingLocale,
} from '@opendata-mqa/core'

/**
 * Quote a field when it contains a delimiter, quote or line break
 */
export function escapeCSV(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

export function toCSV(header: readonly string[], rows: readonly (readonly string[])[]): string {
  return [header, ...rows].map((row) => row.map(escapeCSV).join(',')).join('\n') + '\n'
}

export const SCORE_COLUMNS = [
  'id',
  'title',
  'total_score',
  'rating',
  ...DIMENSION_NAMES.map((name) => `${name.toLowerCase()}_score`),
]

/**
 * One row per assessed record, dimensions in rule table order
 */
export function scoresToCSV(
  results: readonly AssessmentResult[],
  locale: RatingLocale = 'en'
): string {
  const rows = results.map((result) => [
    result.recordId,
    result.title ?? '',
    String(result.totalScore),
    ratingLabel(result.rating, locale),
    ...DIMENSION_NAMES.map((name) =>
      String(result.dimensions.find((dimension) => dimension.dimension === name)?.value ?? 0)
    ),
  ])
  return toCSV(SCORE_COLUMNS, rows)
}

/**
 * Record count per rating, best rating first
 */
export function ratingsSummaryToCSV(summary: BatchSummary, locale: RatingLocale = 'en'): string {
  const rows = [...RATINGS]
    .reverse()
    .map((rating) => [ratingLabel(rating, locale), String(summary.ratingCounts[rating])])
  return toCSV(['rating', 'count'], rows)
}
