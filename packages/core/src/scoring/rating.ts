/**
 * Rating resolver
 *
 * Bands are closed at their upper bound: a score of exactly 120 is Poor,
 * 120.5 is Sufficient.
 */

import { ScoringInvariantError } from '../errors/index.js'
import type { Rating } from '../types/assessment.js'
import { MAX_TOTAL_SCORE } from './dimensions.js'

export interface RatingBand {
  readonly rating: Rating
  /** Inclusive upper bound */
  readonly max: number
}

export const RATING_BANDS: readonly RatingBand[] = [
  { rating: 'Poor', max: 120 },
  { rating: 'Sufficient', max: 220 },
  { rating: 'Good', max: 350 },
  { rating: 'Excellent', max: MAX_TOTAL_SCORE },
]

export const RATINGS: readonly Rating[] = RATING_BANDS.map((band) => band.rating)

export type RatingLocale = 'en' | 'de'

/** Display labels, German as used on the data portal */
export const RATING_LABELS: Readonly<Record<Rating, Readonly<Record<RatingLocale, string>>>> = {
  Poor: { en: 'Poor', de: 'Mangelhaft' },
  Sufficient: { en: 'Sufficient', de: 'Ausreichend' },
  Good: { en: 'Good', de: 'Gut' },
  Excellent: { en: 'Excellent', de: 'Ausgezeichnet' },
}

export function ratingLabel(rating: Rating, locale: RatingLocale = 'en'): string {
  return RATING_LABELS[rating][locale]
}

/**
 * Map a total score to its rating
 *
 * @throws ScoringInvariantError for non-finite scores or scores outside [0, 405]
 */
export function resolveRating(score: number): Rating {
  if (!Number.isFinite(score) || score < 0 || score > MAX_TOTAL_SCORE) {
    throw new ScoringInvariantError(
      `Score ${score} is outside the rating scale [0, ${MAX_TOTAL_SCORE}]`,
      { context: { score } }
    )
  }

  for (const band of RATING_BANDS) {
    if (score <= band.max) return band.rating
  }
  return 'Excellent'
}
