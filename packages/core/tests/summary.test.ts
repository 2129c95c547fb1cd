/**
 * Batch summary tests
 */

import { describe, it, expect } from 'vitest'
import { mean, median, summarizeBatch } from '../src/batch/summary.js'
import type { BatchEntry } from '../src/batch/types.js'
import { AssessmentEngine } from '../src/scoring/AssessmentEngine.js'
import { emptyRecord, partialRecord } from './fixtures/records.js'

describe('mean and median', () => {
  it('should be zero for no values', () => {
    expect(mean([])).toBe(0)
    expect(median([])).toBe(0)
  })

  it('should take the middle value of odd-length input', () => {
    expect(median([3, 1, 2])).toBe(2)
  })

  it('should average the two middle values of even-length input', () => {
    expect(median([4, 1, 3, 2])).toBe(2.5)
    expect(mean([4, 1, 3, 2])).toBe(2.5)
  })
})

describe('summarizeBatch', () => {
  const engine = new AssessmentEngine()
  const entries: BatchEntry[] = [
    { status: 'assessed', index: 0, recordId: 'street-trees', result: engine.score(partialRecord()) },
    { status: 'assessed', index: 1, recordId: 'empty', result: engine.score(emptyRecord()) },
    {
      status: 'defect',
      index: 2,
      recordId: 'broken',
      code: 'SCORING_INVARIANT_VIOLATION',
      message: 'Context scored 25, above its maximum of 20',
    },
  ]

  it('should count outcomes', () => {
    const summary = summarizeBatch(entries, 4)

    expect(summary.total).toBe(4)
    expect(summary.assessed).toBe(2)
    expect(summary.defects).toBe(1)
    expect(summary.skipped).toBe(1)
    expect(summary.ratingCounts).toEqual({ Poor: 1, Sufficient: 0, Good: 1, Excellent: 0 })
    expect(summary.defectRecords).toEqual([
      { recordId: 'broken', message: 'Context scored 25, above its maximum of 20' },
    ])
  })

  it('should compute score statistics over assessed records only', () => {
    const summary = summarizeBatch(entries, 3)

    expect(summary.meanScore).toBe(142.5)
    expect(summary.medianScore).toBe(142.5)
    expect(summary.dimensionMeans).toEqual({
      Findability: 30,
      Accessibility: 25,
      Interoperability: 40,
      Reusability: 37.5,
      Context: 10,
    })
  })

  it('should compute indicator pass rates', () => {
    const rates = summarizeBatch(entries, 3).indicatorPassRates

    expect(rates.keywords).toBe(0.5)
    expect(rates['spatial-coverage']).toBe(0)
    expect(Object.keys(rates)).toHaveLength(23)
  })

  it('should report null statistics when nothing was assessed', () => {
    const summary = summarizeBatch([], 0)

    expect(summary.meanScore).toBeNull()
    expect(summary.medianScore).toBeNull()
    expect(summary.dimensionMeans).toBeNull()
    expect(summary.indicatorPassRates).toEqual({})
  })
})
