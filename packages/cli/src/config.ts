/**
 * CLI Configuration
 *
 * Run configuration is merged from command options over environment
 * variables over defaults, then validated as a whole.
 */

import { z } from 'zod'
import { ConfigurationError } from '@opendata-mqa/core'

/** Berlin open data portal package listing */
export const DEFAULT_CKAN_URL =
  'https://datenregister.berlin.de/api/3/action/current_package_list_with_resources'

export const DEFAULT_DATA_DIR = 'data'
export const DEFAULT_RESULTS_DIR = 'results'
export const DEFAULT_TIMEOUT_MS = 5000
export const DEFAULT_CONCURRENCY = 4
export const DEFAULT_PAGE_SIZE = 500
export const DEFAULT_PAGE_DELAY_MS = 2000

/**
 * Environment variables read by the CLI
 */
export const ENV_KEYS = {
  ckanUrl: 'MQA_CKAN_URL',
  timeoutMs: 'MQA_TIMEOUT_MS',
  concurrency: 'MQA_CONCURRENCY',
  dataDir: 'MQA_DATA_DIR',
  resultsDir: 'MQA_RESULTS_DIR',
} as const

const positiveInt = z.coerce.number().int().positive()

export const RunConfigSchema = z.object({
  ckanUrl: z.string().url(),
  dataDir: z.string().min(1),
  resultsDir: z.string().min(1),
  timeoutMs: positiveInt,
  concurrency: positiveInt.max(64),
  pageSize: positiveInt.max(1000),
  pageDelayMs: z.coerce.number().int().nonnegative(),
})

export type RunConfig = z.infer<typeof RunConfigSchema>

/**
 * Values as they arrive from commander or the environment
 */
export type RunConfigInput = Partial<Record<keyof RunConfig, string | number | undefined>>

function fromEnv(env: NodeJS.ProcessEnv): RunConfigInput {
  return {
    ckanUrl: env[ENV_KEYS.ckanUrl],
    timeoutMs: env[ENV_KEYS.timeoutMs],
    concurrency: env[ENV_KEYS.concurrency],
    dataDir: env[ENV_KEYS.dataDir],
    resultsDir: env[ENV_KEYS.resultsDir],
  }
}

function pick<T>(...values: (T | undefined)[]): T | undefined {
  return values.find((value) => value !== undefined && value !== '')
}

/**
 * Resolve the run configuration
 *
 * @param options - Command-line values; undefined entries fall through
 * @param env - Environment (defaults to process.env)
 * @throws ConfigurationError naming the first invalid field
 */
export function resolveRunConfig(
  options: RunConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): RunConfig {
  const environment = fromEnv(env)
  const merged = {
    ckanUrl: pick(options.ckanUrl, environment.ckanUrl, DEFAULT_CKAN_URL),
    dataDir: pick(options.dataDir, environment.dataDir, DEFAULT_DATA_DIR),
    resultsDir: pick(options.resultsDir, environment.resultsDir, DEFAULT_RESULTS_DIR),
    timeoutMs: pick(options.timeoutMs, environment.timeoutMs, DEFAULT_TIMEOUT_MS),
    concurrency: pick(options.concurrency, environment.concurrency, DEFAULT_CONCURRENCY),
    pageSize: pick(options.pageSize, DEFAULT_PAGE_SIZE),
    pageDelayMs: pick(options.pageDelayMs, DEFAULT_PAGE_DELAY_MS),
  }

  const parsed = RunConfigSchema.safeParse(merged)
  if (!parsed.success) {
    const [issue] = parsed.error.issues
    const field = issue?.path.join('.') ?? 'config'
    throw new ConfigurationError(`Invalid ${field}: ${issue?.message ?? 'invalid value'}`, {
      cause: parsed.error,
      context: { field },
    })
  }
  return parsed.data
}
