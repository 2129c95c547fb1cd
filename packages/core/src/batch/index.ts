export { runBatch, DEFAULT_BATCH_CONCURRENCY } from './BatchRunner.js'
export { summarizeBatch, mean, median } from './summary.js'
export type { BatchEntry, BatchOptions, BatchReport, DefectEntry } from './types.js'
