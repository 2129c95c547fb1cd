/**
 * Terminal output for batch summaries and the rule table
 */

import chalk from 'chalk'
import Table from 'cli-table3'
import {
  DIMENSION_NAMES,
  RATINGS,
  ratingLabel,
  type BatchSummary,
  type DimensionDefinition,
  type Rating,
  type RatingLocale,
} from '@opendata-mqa/core'

export const RATING_COLORS: Record<Rating, (text: string) => string> = {
  Excellent: chalk.green,
  Good: chalk.cyan,
  Sufficient: chalk.yellow,
  Poor: chalk.red,
}

function formatScore(value: number | null): string {
  return value === null ? '-' : value.toFixed(1)
}

/**
 * Batch summary: counts, score statistics, rating distribution and
 * dimension means
 */
export function formatBatchSummary(summary: BatchSummary, locale: RatingLocale = 'en'): string {
  const lines: string[] = []

  lines.push('')
  lines.push(chalk.bold.blue('=== Metadata Quality Assessment ==='))
  lines.push('')
  lines.push(
    `${chalk.bold('Records:')} ${summary.total} | ${chalk.bold('Assessed:')} ${summary.assessed} | ` +
      `${chalk.bold('Defects:')} ${summary.defects} | ${chalk.bold('Skipped:')} ${summary.skipped}`
  )
  lines.push(
    `${chalk.bold('Mean score:')} ${formatScore(summary.meanScore)} | ` +
      `${chalk.bold('Median score:')} ${formatScore(summary.medianScore)}`
  )
  lines.push('')

  const ratings = new Table({
    head: [chalk.bold('Rating'), chalk.bold('Records'), chalk.bold('Share')],
    colWidths: [16, 10, 10],
  })
  for (const rating of [...RATINGS].reverse()) {
    const count = summary.ratingCounts[rating]
    const share = summary.assessed > 0 ? `${((count / summary.assessed) * 100).toFixed(1)}%` : '-'
    ratings.push([RATING_COLORS[rating](ratingLabel(rating, locale)), String(count), share])
  }
  lines.push(ratings.toString())

  if (summary.dimensionMeans !== null) {
    const means = summary.dimensionMeans
    const dimensions = new Table({
      head: [chalk.bold('Dimension'), chalk.bold('Mean')],
      colWidths: [20, 10],
    })
    for (const name of DIMENSION_NAMES) {
      dimensions.push([name, means[name].toFixed(1)])
    }
    lines.push('')
    lines.push(dimensions.toString())
  }

  if (summary.defectRecords.length > 0) {
    lines.push('')
    lines.push(chalk.red('Defects:'))
    for (const defect of summary.defectRecords) {
      lines.push(`  ${chalk.red('•')} ${defect.recordId}: ${defect.message}`)
    }
  }

  lines.push('')
  return lines.join('\n')
}

/**
 * Indicator rule table, one row per indicator
 */
export function formatRuleTable(dimensions: readonly DimensionDefinition[]): string {
  const table = new Table({
    head: [
      chalk.bold('Dimension'),
      chalk.bold('Indicator'),
      chalk.bold('Field'),
      chalk.bold('Scope'),
      chalk.bold('Points'),
    ],
  })

  let total = 0
  for (const dimension of dimensions) {
    for (const indicator of dimension.indicators) {
      table.push([
        dimension.name,
        indicator.id,
        indicator.field,
        indicator.scope,
        String(indicator.maxPoints),
      ])
    }
    table.push([chalk.dim(dimension.name), chalk.dim('subtotal'), '', '', chalk.bold(String(dimension.maxPoints))])
    total += dimension.maxPoints
  }
  table.push([chalk.bold('Total'), '', '', '', chalk.bold(String(total))])

  return table.toString()
}
