/**
 * Batch run types
 */

import type { AssessmentResult, BatchSummary } from '../types/assessment.js'

/**
 * Outcome for one submitted record, at its input position
 */
export type BatchEntry =
  | {
      readonly status: 'assessed'
      readonly index: number
      readonly recordId: string
      readonly result: AssessmentResult
    }
  | {
      readonly status: 'defect'
      readonly index: number
      readonly recordId: string
      /** Error code, e.g. SCORING_INVARIANT_VIOLATION */
      readonly code: string
      readonly message: string
    }

export type DefectEntry = Extract<BatchEntry, { status: 'defect' }>

export interface BatchOptions {
  /** Records scored at once (default 4) */
  concurrency?: number
  /** Aborting stops scheduling new records */
  signal?: AbortSignal
  /** Called after each record finishes */
  onProgress?: (completed: number, total: number, entry: BatchEntry) => void
  /** Called for each record that hit a defect */
  onDefect?: (entry: DefectEntry) => void
}

export interface BatchReport {
  /** Finished records in input order; skipped records have no entry */
  readonly entries: readonly BatchEntry[]
  /** Assessed results in input order */
  readonly results: readonly AssessmentResult[]
  readonly summary: BatchSummary
  /** True when the signal aborted before every record started */
  readonly cancelled: boolean
}
