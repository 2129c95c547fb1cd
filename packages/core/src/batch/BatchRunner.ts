/**
 * Batch Runner
 *
 * Scores many records with a bounded number in flight. Each outcome is
 * written into the slot of its input position, so entries keep input
 * order whatever order the probes finish in. A defect in one record is
 * recorded and the batch continues.
 */

import { ConfigurationError, getErrorMessage, wrapError } from '../errors/index.js'
import type { AssessmentEngine } from '../scoring/AssessmentEngine.js'
import type { AssessmentResult } from '../types/assessment.js'
import type { MetadataRecord } from '../types/record.js'
import { createLogger } from '../utils/logger.js'
import { summarizeBatch } from './summary.js'
import type { BatchEntry, BatchOptions, BatchReport } from './types.js'

const log = createLogger('BatchRunner')

export const DEFAULT_BATCH_CONCURRENCY = 4

async function assessOne(
  engine: AssessmentEngine,
  record: MetadataRecord,
  index: number
): Promise<BatchEntry> {
  try {
    const result = await engine.assess(record)
    return { status: 'assessed', index, recordId: record.id, result }
  } catch (error) {
    const wrapped = wrapError(error, `Scoring failed: ${getErrorMessage(error)}`, {
      code: 'SCORING_FAILED',
      context: { recordId: record.id },
    })
    log.warn('Record scoring defect', {
      recordId: record.id,
      code: wrapped.code,
      error: wrapped.message,
    })
    return {
      status: 'defect',
      index,
      recordId: record.id,
      code: wrapped.code,
      message: wrapped.message,
    }
  }
}

function notify(hook: string, callback: () => void): void {
  try {
    callback()
  } catch (error) {
    log.warn(`Batch ${hook} callback failed`, { error: getErrorMessage(error) })
  }
}

/**
 * Score records with an engine
 *
 * A throwing `onProgress` or `onDefect` callback is logged and does not
 * stop the batch.
 *
 * @example
 * ```typescript
 * const report = await runBatch(engine, records, {
 *   concurrency: 8,
 *   onProgress: (done, total) => spinner.text = `Scored ${done}/${total}`,
 * })
 * console.log(report.summary.ratingCounts)
 * ```
 *
 * @throws ConfigurationError when concurrency is not a positive integer
 */
export async function runBatch(
  engine: AssessmentEngine,
  records: readonly MetadataRecord[],
  options: BatchOptions = {}
): Promise<BatchReport> {
  const concurrency = options.concurrency ?? DEFAULT_BATCH_CONCURRENCY
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigurationError(`concurrency must be a positive integer, got ${concurrency}`, {
      context: { concurrency },
    })
  }

  const total = records.length
  const slots: (BatchEntry | undefined)[] = new Array<BatchEntry | undefined>(total).fill(undefined)
  let next = 0
  let completed = 0

  const worker = async (): Promise<void> => {
    while (next < total && !options.signal?.aborted) {
      const index = next++
      const record = records[index]
      if (record === undefined) continue

      const entry = await assessOne(engine, record, index)
      slots[index] = entry
      completed++

      const { onDefect, onProgress } = options
      if (entry.status === 'defect' && onDefect) notify('onDefect', () => onDefect(entry))
      if (onProgress) notify('onProgress', () => onProgress(completed, total, entry))
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, total) }, () => worker())
  await Promise.all(workers)

  const entries = slots.filter((entry): entry is BatchEntry => entry !== undefined)
  const results: AssessmentResult[] = []
  for (const entry of entries) {
    if (entry.status === 'assessed') results.push(entry.result)
  }

  const cancelled = entries.length < total
  if (cancelled) {
    log.info('Batch cancelled', { completed: entries.length, total })
  }

  return {
    entries,
    results,
    summary: summarizeBatch(entries, total),
    cancelled,
  }
}
