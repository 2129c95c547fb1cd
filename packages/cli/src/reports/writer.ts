/**
 * Report files written after a batch run
 */

import { mkdir, writeFile } from 'fs/promises'
import { join } from 'path'
import type { BatchReport, RatingLocale } from '@opendata-mqa/core'
import { ratingsSummaryToCSV, scoresToCSV } from './csv.js'

export interface WriteReportsOptions {
  /** Assessed records whose full indicator detail is written */
  detail?: number
  locale?: RatingLocale
  /** Time used in the timestamped file name */
  now?: Date
}

export interface WrittenReports {
  scores: string
  latestScores: string
  ratingsSummary: string
  batchSummary: string
  detailedResults: string
}

/**
 * `YYYYMMDD_HHMMSS` in UTC
 */
export function reportTimestamp(date: Date): string {
  const iso = date.toISOString()
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`
}

/**
 * Write score CSVs and JSON summaries into the results directory
 */
export async function writeReports(
  resultsDir: string,
  report: BatchReport,
  options: WriteReportsOptions = {}
): Promise<WrittenReports> {
  const locale = options.locale ?? 'en'
  await mkdir(resultsDir, { recursive: true })

  const paths: WrittenReports = {
    scores: join(resultsDir, `mqa_scores_${reportTimestamp(options.now ?? new Date())}.csv`),
    latestScores: join(resultsDir, 'mqa_scores.csv'),
    ratingsSummary: join(resultsDir, 'ratings_summary.csv'),
    batchSummary: join(resultsDir, 'batch_summary.json'),
    detailedResults: join(resultsDir, 'detailed_results.json'),
  }

  const scores = scoresToCSV(report.results, locale)
  const detailed = report.results.slice(0, Math.max(0, options.detail ?? 1))

  await Promise.all([
    writeFile(paths.scores, scores),
    writeFile(paths.latestScores, scores),
    writeFile(paths.ratingsSummary, ratingsSummaryToCSV(report.summary, locale)),
    writeFile(
      paths.batchSummary,
      JSON.stringify({ ...report.summary, cancelled: report.cancelled }, null, 2)
    ),
    writeFile(paths.detailedResults, JSON.stringify(detailed, null, 2)),
  ])

  return paths
}
