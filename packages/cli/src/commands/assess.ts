/**
 * Assess Command
 *
 * Loads CKAN catalog metadata, scores every record and writes reports.
 *
 * Usage:
 *   opendata-mqa assess                      # newest snapshot, else fetch
 *   opendata-mqa assess --fetch              # fetch a fresh snapshot
 *   opendata-mqa assess --input catalog.json
 *   opendata-mqa assess --check-urls --timeout 3000
 */

import { Command } from 'commander'
import chalk from 'chalk'
import ora, { type Ora } from 'ora'
import {
  AssessmentEngine,
  ConfigurationError,
  createHttpReachabilityOracle,
  presentValue,
  runBatch,
  type MetadataRecord,
  type RatingLocale,
  type ReachabilityOracle,
} from '@opendata-mqa/core'
import { resolveRunConfig, type RunConfig } from '../config.js'
import { fetchCatalog, findLatestSnapshot, loadCatalogFile, saveSnapshot } from '../ckan/client.js'
import { normalizeCatalog } from '../ckan/normalize.js'
import { formatBatchSummary } from '../reports/formatters.js'
import { writeReports } from '../reports/writer.js'
import { parseLocale, parseNonNegativeInt, parsePositiveInt } from '../utils/options.js'
import { sanitizeError } from '../utils/sanitize.js'

export interface AssessOptions {
  input?: string
  fetch?: boolean
  ckanUrl?: string
  dataDir?: string
  resultsDir?: string
  sample?: number
  checkUrls?: boolean
  timeout?: number
  concurrency?: number
  /** Conformance profile assumed for records that declare none */
  profile?: string
  detail?: number
  json?: boolean
  locale?: RatingLocale
}

/**
 * Collaborators replaced in tests
 */
export interface AssessDependencies {
  fetch?: typeof fetch
  oracle?: ReachabilityOracle
  env?: NodeJS.ProcessEnv
  now?: Date
}

async function loadPackages(
  options: AssessOptions,
  config: RunConfig,
  spinner: Ora,
  deps: AssessDependencies
): Promise<unknown[]> {
  if (options.input) {
    spinner.text = `Loading ${options.input}...`
    return loadCatalogFile(options.input)
  }

  if (!options.fetch) {
    const snapshot = await findLatestSnapshot(config.dataDir)
    if (snapshot !== undefined) {
      spinner.text = `Loading snapshot ${snapshot}...`
      return loadCatalogFile(snapshot)
    }
    spinner.text = 'No snapshot found, fetching catalog...'
  }

  const packages = await fetchCatalog({
    url: config.ckanUrl,
    pageSize: config.pageSize,
    pageDelayMs: config.pageDelayMs,
    fetch: deps.fetch,
    onPage: (offset, received) => {
      spinner.text = `Fetching catalog... (${offset + received} packages)`
    },
  })
  const path = await saveSnapshot(config.dataDir, packages, deps.now)
  spinner.text = `Saved snapshot ${path}`
  return packages
}

function withAssumedProfile(
  records: readonly MetadataRecord[],
  profile: string | undefined
): MetadataRecord[] {
  if (profile === undefined) return [...records]
  return records.map((record) =>
    presentValue(record.conformsTo) === undefined ? { ...record, conformsTo: profile } : record
  )
}

/**
 * Run an assessment
 *
 * @returns Exit code: 1 when any record hit a scoring defect
 */
export async function runAssess(
  options: AssessOptions,
  deps: AssessDependencies = {}
): Promise<number> {
  const config = resolveRunConfig(
    {
      ckanUrl: options.ckanUrl,
      dataDir: options.dataDir,
      resultsDir: options.resultsDir,
      timeoutMs: options.timeout,
      concurrency: options.concurrency,
    },
    deps.env
  )
  const locale = options.locale ?? 'en'
  const spinner = ora()
  spinner.start('Loading catalog metadata...')

  const packages = await loadPackages(options, config, spinner, deps)

  const { records: normalized, rejected } = normalizeCatalog(packages)

  const sampled =
    options.sample !== undefined && options.sample > 0
      ? normalized.slice(0, options.sample)
      : normalized
  const records = withAssumedProfile(sampled, presentValue(options.profile))

  const oracle = options.checkUrls
    ? (deps.oracle ?? createHttpReachabilityOracle({ fetch: deps.fetch }))
    : undefined
  const engine = new AssessmentEngine({ oracle, reachabilityTimeoutMs: config.timeoutMs })

  const controller = new AbortController()
  const onInterrupt = (): void => controller.abort()
  process.once('SIGINT', onInterrupt)

  spinner.text = `Scoring ${records.length} records...`
  const report = await runBatch(engine, records, {
    concurrency: config.concurrency,
    signal: controller.signal,
    onProgress: (completed, total) => {
      spinner.text = `Scoring records... (${completed}/${total})`
    },
  }).finally(() => {
    process.removeListener('SIGINT', onInterrupt)
  })

  const paths = await writeReports(config.resultsDir, report, {
    detail: options.detail,
    locale,
    now: deps.now,
  })

  if (options.json) {
    spinner.stop()
    console.log(
      JSON.stringify(
        { summary: report.summary, cancelled: report.cancelled, rejected, reports: paths },
        null,
        2
      )
    )
  } else {
    if (report.cancelled) {
      spinner.warn(chalk.yellow(`Cancelled after ${report.entries.length} records`))
    } else if (report.summary.defects > 0) {
      spinner.warn(chalk.yellow(`Scored with ${report.summary.defects} defect(s)`))
    } else {
      spinner.succeed(chalk.green(`Scored ${report.summary.assessed} records`))
    }

    console.log(formatBatchSummary(report.summary, locale))

    if (rejected.length > 0) {
      console.log(chalk.yellow(`Rejected ${rejected.length} package(s):`))
      for (const rejection of rejected) {
        const label = rejection.packageName ?? `#${rejection.index}`
        console.log(`  ${chalk.yellow('•')} ${label}: ${rejection.reason}`)
      }
      console.log()
    }

    console.log(chalk.dim(`Results saved to ${config.resultsDir}`))
  }

  return report.summary.defects > 0 ? 1 : 0
}

/**
 * Create assess command
 */
export function createAssessCommand(): Command {
  return new Command('assess')
    .description('Score CKAN catalog metadata and write quality reports')
    .option('-i, --input <file>', 'Catalog JSON file (package array or CKAN API response)')
    .option('-f, --fetch', 'Fetch a fresh catalog snapshot from the CKAN API')
    .option('--ckan-url <url>', 'CKAN package listing endpoint')
    .option('-d, --data-dir <dir>', 'Directory for raw catalog snapshots')
    .option('-r, --results-dir <dir>', 'Directory for reports')
    .option('-s, --sample <n>', 'Score only the first n records', parsePositiveInt)
    .option('--check-urls', 'Probe download URLs for reachability')
    .option('--timeout <ms>', 'Reachability probe timeout in milliseconds', parsePositiveInt)
    .option('-c, --concurrency <n>', 'Records scored at once', parsePositiveInt)
    .option('--profile <uri>', 'Conformance profile assumed for records that declare none')
    .option('--detail <n>', 'Records with full indicator detail in the JSON report', parseNonNegativeInt, 1)
    .option('-j, --json', 'Print the summary as JSON')
    .option('--locale <locale>', 'Rating labels: en or de', parseLocale, 'en')
    .action(async (opts: AssessOptions) => {
      try {
        if (opts.input && opts.fetch) {
          throw new ConfigurationError('--input and --fetch cannot be combined')
        }
        const code = await runAssess(opts)
        if (code !== 0) process.exit(code)
      } catch (error) {
        if (opts.json) {
          console.error(JSON.stringify({ error: sanitizeError(error) }))
        } else {
          console.error(chalk.red('Assessment failed:'), sanitizeError(error))
        }
        process.exit(1)
      }
    })
}

export default createAssessCommand
