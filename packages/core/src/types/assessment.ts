/**
 * Value objects produced by the assessment engine
 */

export type DimensionName =
  | 'Findability'
  | 'Accessibility'
  | 'Interoperability'
  | 'Reusability'
  | 'Context'

export type Rating = 'Poor' | 'Sufficient' | 'Good' | 'Excellent'

export type IndicatorId =
  | 'keywords'
  | 'categories'
  | 'spatial-coverage'
  | 'temporal-coverage'
  | 'access-url'
  | 'download-url'
  | 'download-url-reachable'
  | 'format'
  | 'media-type'
  | 'format-vocabulary'
  | 'non-proprietary'
  | 'machine-readable'
  | 'dcat-ap-de-conformity'
  | 'license'
  | 'license-vocabulary'
  | 'access-rights'
  | 'access-rights-vocabulary'
  | 'contact-point'
  | 'publisher'
  | 'usage-terms'
  | 'byte-size'
  | 'release-date'
  | 'modification-date'

/**
 * Outcome of a single indicator check
 */
export interface IndicatorResult {
  readonly indicator: IndicatorId
  readonly name: string
  /** DCAT property the indicator inspects */
  readonly field: string
  readonly dimension: DimensionName
  readonly maxPoints: number
  readonly points: number
  /** True only when the full points were awarded */
  readonly passed: boolean
  readonly rationale: string
  /** Distribution that produced the kept result (distribution-scoped indicators) */
  readonly distributionIndex?: number
}

export interface DimensionScore {
  readonly dimension: DimensionName
  readonly value: number
  readonly maxPoints: number
  readonly indicators: readonly IndicatorResult[]
}

export interface AssessmentResult {
  readonly recordId: string
  readonly title?: string
  /** Always the five dimensions, in rule-table order */
  readonly dimensions: readonly DimensionScore[]
  readonly totalScore: number
  readonly rating: Rating
}

export interface DefectRecord {
  readonly recordId: string
  readonly message: string
}

/**
 * Aggregate statistics over one batch run
 */
export interface BatchSummary {
  /** Records submitted */
  readonly total: number
  readonly assessed: number
  /** Records whose scoring hit a rule table defect */
  readonly defects: number
  /** Records never started because the run was cancelled */
  readonly skipped: number
  readonly ratingCounts: Readonly<Record<Rating, number>>
  readonly meanScore: number | null
  readonly medianScore: number | null
  readonly dimensionMeans: Readonly<Record<DimensionName, number>> | null
  /** Share of assessed records passing each indicator (0-1) */
  readonly indicatorPassRates: Readonly<Partial<Record<IndicatorId, number>>>
  readonly defectRecords: readonly DefectRecord[]
}
