/**
 * Batch runner tests
 */

import { describe, it, expect, vi } from 'vitest'
import { runBatch } from '../src/batch/BatchRunner.js'
import type { DefectEntry } from '../src/batch/types.js'
import { ConfigurationError } from '../src/errors/index.js'
import { AssessmentEngine } from '../src/scoring/AssessmentEngine.js'
import { DIMENSIONS } from '../src/scoring/dimensions.js'
import { usageTerms } from '../src/scoring/indicators/index.js'
import type { DimensionDefinition, RecordIndicator } from '../src/scoring/types.js'
import type { ReachabilityOracle } from '../src/reachability/types.js'
import type { AssessmentResult, IndicatorId } from '../src/types/assessment.js'
import {
  COMPLETE_DOWNLOAD_URL,
  completeDistribution,
  completeRecord,
  emptyRecord,
  partialRecord,
} from './fixtures/records.js'

/**
 * Rule table whose usage-terms indicator misbehaves for the record with id `bad`
 */
function faultyDimensions(
  evaluate: RecordIndicator['evaluate']
): readonly DimensionDefinition[] {
  const faulty: RecordIndicator = { ...usageTerms, evaluate }
  return DIMENSIONS.map((dimension) =>
    dimension.name === 'Context'
      ? {
          ...dimension,
          indicators: dimension.indicators.map((entry) =>
            entry.id === 'usage-terms' ? faulty : entry
          ),
        }
      : dimension
  )
}

function pointsFor(result: AssessmentResult | undefined, id: IndicatorId): number | undefined {
  return result?.dimensions
    .flatMap((dimension) => dimension.indicators)
    .find((entry) => entry.indicator === id)?.points
}

describe('runBatch', () => {
  it('should keep input order when later records finish first', async () => {
    const oracle: ReachabilityOracle = {
      check: () =>
        new Promise((resolve) => setTimeout(() => resolve({ reachable: true, status: 200 }), 30)),
    }
    const engine = new AssessmentEngine({ oracle })

    const report = await runBatch(engine, [completeRecord(), partialRecord(), emptyRecord()], {
      concurrency: 3,
    })

    expect(report.entries.map((entry) => entry.recordId)).toEqual([
      'air-quality',
      'street-trees',
      'empty',
    ])
    expect(report.results.map((result) => result.totalScore)).toEqual([405, 285, 0])
    expect(report.cancelled).toBe(false)
  })

  it('should record a rule table defect and continue', async () => {
    const engine = new AssessmentEngine({
      dimensions: faultyDimensions(({ record }, maxPoints) => ({
        points: record.id === 'bad' ? 99 : maxPoints,
        rationale: 'fixed',
      })),
    })
    const onDefect = vi.fn<(entry: DefectEntry) => void>()

    const report = await runBatch(engine, [partialRecord(), partialRecord({ id: 'bad' })], {
      onDefect,
    })

    expect(report.entries).toHaveLength(2)
    expect(report.entries[0]?.status).toBe('assessed')
    expect(report.entries[1]).toEqual({
      status: 'defect',
      index: 1,
      recordId: 'bad',
      code: 'SCORING_INVARIANT_VIOLATION',
      message: 'Indicator usage-terms awarded 99 points, outside [0, 5]',
    })
    expect(onDefect).toHaveBeenCalledTimes(1)
    expect(report.summary.assessed).toBe(1)
    expect(report.summary.defects).toBe(1)
  })

  it('should wrap unexpected errors', async () => {
    const engine = new AssessmentEngine({
      dimensions: faultyDimensions(() => {
        throw new Error('kaput')
      }),
    })

    const report = await runBatch(engine, [partialRecord()])

    expect(report.entries[0]).toMatchObject({
      status: 'defect',
      code: 'SCORING_FAILED',
      message: 'Scoring failed: kaput',
    })
  })

  it('should contain a reachability timeout to the record that hit it', async () => {
    const oracle: ReachabilityOracle = {
      check: (url) =>
        url === COMPLETE_DOWNLOAD_URL
          ? new Promise(() => undefined)
          : Promise.resolve({ reachable: true, status: 200 }),
    }
    const engine = new AssessmentEngine({ oracle, reachabilityTimeoutMs: 20 })
    const second = completeRecord({
      id: 'second',
      distributions: [completeDistribution({ downloadUrl: 'https://data.example.org/second.csv' })],
    })

    const report = await runBatch(engine, [completeRecord(), second], { concurrency: 1 })

    expect(report.entries.map((entry) => entry.status)).toEqual(['assessed', 'assessed'])
    const [hung, next] = report.results
    expect(pointsFor(hung, 'download-url-reachable')).toBe(0)
    expect(pointsFor(hung, 'download-url')).toBe(20)
    expect(hung?.totalScore).toBe(375)
    expect(next?.totalScore).toBe(405)
    expect(report.summary.defects).toBe(0)
  })

  it('should keep going when a callback throws', async () => {
    const onProgress = vi.fn(() => {
      throw new Error('display closed')
    })

    const report = await runBatch(new AssessmentEngine(), [partialRecord(), emptyRecord()], {
      concurrency: 1,
      onProgress,
    })

    expect(onProgress).toHaveBeenCalledTimes(2)
    expect(report.entries.map((entry) => entry.status)).toEqual(['assessed', 'assessed'])
    expect(report.cancelled).toBe(false)
  })

  it('should stop scheduling records once aborted', async () => {
    const controller = new AbortController()
    const onProgress = vi.fn(() => controller.abort())

    const report = await runBatch(
      new AssessmentEngine(),
      [partialRecord(), partialRecord({ id: 'second' }), partialRecord({ id: 'third' })],
      { concurrency: 1, signal: controller.signal, onProgress }
    )

    expect(onProgress).toHaveBeenCalledTimes(1)
    expect(report.entries.map((entry) => entry.recordId)).toEqual(['street-trees'])
    expect(report.cancelled).toBe(true)
    expect(report.summary.total).toBe(3)
    expect(report.summary.skipped).toBe(2)
  })

  it('should score nothing when already aborted', async () => {
    const controller = new AbortController()
    controller.abort()

    const report = await runBatch(new AssessmentEngine(), [partialRecord()], {
      signal: controller.signal,
    })

    expect(report.entries).toEqual([])
    expect(report.cancelled).toBe(true)
    expect(report.summary.skipped).toBe(1)
  })

  it('should report progress for every record', async () => {
    const onProgress = vi.fn()
    await runBatch(new AssessmentEngine(), [partialRecord(), emptyRecord()], { onProgress })

    expect(onProgress).toHaveBeenCalledTimes(2)
    expect(onProgress).toHaveBeenLastCalledWith(2, 2, expect.objectContaining({ status: 'assessed' }))
  })

  it('should handle an empty batch', async () => {
    const report = await runBatch(new AssessmentEngine(), [])

    expect(report.entries).toEqual([])
    expect(report.cancelled).toBe(false)
    expect(report.summary.total).toBe(0)
    expect(report.summary.meanScore).toBeNull()
  })

  it('should reject invalid concurrency', async () => {
    await expect(runBatch(new AssessmentEngine(), [], { concurrency: 0 })).rejects.toThrow(
      ConfigurationError
    )
    await expect(runBatch(new AssessmentEngine(), [], { concurrency: 1.5 })).rejects.toThrow(
      'concurrency must be a positive integer, got 1.5'
    )
  })
})
