/**
 * @opendata-mqa/cli - CKAN catalog loading, assessment runs and reports
 */

export * from './commands/index.js'
export {
  resolveRunConfig,
  RunConfigSchema,
  ENV_KEYS,
  DEFAULT_CKAN_URL,
  DEFAULT_CONCURRENCY,
  DEFAULT_DATA_DIR,
  DEFAULT_RESULTS_DIR,
  DEFAULT_TIMEOUT_MS,
  type RunConfig,
  type RunConfigInput,
} from './config.js'
export {
  fetchCatalog,
  findLatestSnapshot,
  loadCatalogFile,
  saveSnapshot,
  snapshotFileName,
  type FetchCatalogOptions,
} from './ckan/client.js'
export {
  normalizeCatalog,
  normalizeCkanPackage,
  extractPackages,
  toMetadataRecord,
  type NormalizedCatalog,
  type NormalizeResult,
  type RejectedPackage,
} from './ckan/normalize.js'
export { escapeCSV, toCSV, scoresToCSV, ratingsSummaryToCSV } from './reports/csv.js'
export { writeReports, reportTimestamp, type WrittenReports } from './reports/writer.js'
export { formatBatchSummary, formatRuleTable } from './reports/formatters.js'
