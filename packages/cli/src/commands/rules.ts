/**
 * Rules Command
 *
 * Prints the indicator rule table.
 */

import { Command } from 'commander'
import { DIMENSIONS, MAX_TOTAL_SCORE, RATING_BANDS, ratingLabel } from '@opendata-mqa/core'
import { formatRuleTable } from '../reports/formatters.js'
import { parseLocale } from '../utils/options.js'

export interface RulesOptions {
  json?: boolean
  locale?: 'en' | 'de'
}

/**
 * Rule table as plain data
 */
export function describeRules(locale: 'en' | 'de' = 'en') {
  return {
    maxTotalScore: MAX_TOTAL_SCORE,
    dimensions: DIMENSIONS.map((dimension) => ({
      name: dimension.name,
      maxPoints: dimension.maxPoints,
      indicators: dimension.indicators.map((indicator) => ({
        id: indicator.id,
        name: indicator.name,
        field: indicator.field,
        scope: indicator.scope,
        maxPoints: indicator.maxPoints,
      })),
    })),
    ratings: RATING_BANDS.map((band) => ({
      rating: ratingLabel(band.rating, locale),
      max: band.max,
    })),
  }
}

export function runRules(options: RulesOptions = {}): void {
  if (options.json) {
    console.log(JSON.stringify(describeRules(options.locale), null, 2))
    return
  }

  console.log(formatRuleTable(DIMENSIONS))
  const bands = RATING_BANDS.map(
    (band) => `${ratingLabel(band.rating, options.locale)} ≤ ${band.max}`
  ).join(' < ')
  console.log(`Ratings: ${bands}`)
}

/**
 * Create rules command
 */
export function createRulesCommand(): Command {
  return new Command('rules')
    .description('Print the indicator rule table')
    .option('-j, --json', 'Output as JSON')
    .option('--locale <locale>', 'Rating labels: en or de', parseLocale, 'en')
    .action((opts: RulesOptions) => {
      runRules(opts)
    })
}

export default createRulesCommand
