/**
 * CKAN catalog access
 *
 * Pages through the action API with limit/offset, and reads or writes raw
 * catalog snapshots. Failures surface as NetworkError; there is no retry.
 */

import { mkdir, readFile, readdir, writeFile } from 'fs/promises'
import { join } from 'path'
import { setTimeout as sleep } from 'timers/promises'
import {
  NetworkError,
  ValidationError,
  createLogger,
  getErrorMessage,
} from '@opendata-mqa/core'
import { DEFAULT_PAGE_DELAY_MS, DEFAULT_PAGE_SIZE } from '../config.js'
import { CkanEnvelopeSchema } from './schema.js'
import { extractPackages } from './normalize.js'

const log = createLogger('CkanClient')

export interface FetchCatalogOptions {
  /** Package listing endpoint */
  url: string
  pageSize?: number
  /** Pause between page requests */
  pageDelayMs?: number
  /** Fetch implementation (defaults to the global fetch) */
  fetch?: typeof fetch
  signal?: AbortSignal
  onPage?: (offset: number, received: number) => void
}

async function fetchPage(
  fetchImpl: typeof fetch,
  url: URL,
  signal: AbortSignal | undefined
): Promise<unknown[]> {
  let response: Response
  try {
    response = await fetchImpl(url, { headers: { Accept: 'application/json' }, signal })
  } catch (error) {
    throw new NetworkError(`Catalog request failed: ${getErrorMessage(error)}`, {
      cause: error,
      url: url.toString(),
    })
  }

  if (!response.ok) {
    throw new NetworkError(`Catalog request failed with HTTP ${response.status}`, {
      url: url.toString(),
      statusCode: response.status,
    })
  }

  let body: unknown
  try {
    body = await response.json()
  } catch (error) {
    throw new NetworkError('Catalog response is not valid JSON', {
      cause: error,
      url: url.toString(),
      statusCode: response.status,
    })
  }

  const envelope = CkanEnvelopeSchema.safeParse(body)
  if (!envelope.success || envelope.data.success === false) {
    throw new NetworkError('Catalog response is not a successful CKAN action result', {
      url: url.toString(),
      statusCode: response.status,
    })
  }
  return envelope.data.result
}

/**
 * Fetch every package from a CKAN listing endpoint
 *
 * Stops at the first empty or short page.
 *
 * @throws NetworkError on transport failures, HTTP errors or bad payloads
 */
export async function fetchCatalog(options: FetchCatalogOptions): Promise<unknown[]> {
  const fetchImpl = options.fetch ?? fetch
  const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE
  const pageDelayMs = options.pageDelayMs ?? DEFAULT_PAGE_DELAY_MS
  const packages: unknown[] = []

  for (let offset = 0; ; offset += pageSize) {
    const url = new URL(options.url)
    url.searchParams.set('limit', String(pageSize))
    url.searchParams.set('offset', String(offset))

    log.debug('Fetching catalog page', { offset, pageSize })
    const page = await fetchPage(fetchImpl, url, options.signal)
    packages.push(...page)
    options.onPage?.(offset, page.length)

    if (page.length < pageSize) break
    if (pageDelayMs > 0) await sleep(pageDelayMs, undefined, { signal: options.signal })
  }

  return packages
}

const SNAPSHOT_PATTERN = /^ckan_metadata_\d{8}\.json$/

/**
 * Snapshot file name for a date, e.g. `ckan_metadata_20240315.json`
 */
export function snapshotFileName(date: Date = new Date()): string {
  const stamp = date.toISOString().slice(0, 10).replace(/-/g, '')
  return `ckan_metadata_${stamp}.json`
}

/**
 * Write the raw packages to the data directory
 *
 * @returns Path of the written snapshot
 */
export async function saveSnapshot(
  dataDir: string,
  packages: readonly unknown[],
  date: Date = new Date()
): Promise<string> {
  await mkdir(dataDir, { recursive: true })
  const path = join(dataDir, snapshotFileName(date))
  await writeFile(path, JSON.stringify(packages, null, 2))
  return path
}

function isMissingDirectory(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Newest snapshot in the data directory, by the date in its name
 */
export async function findLatestSnapshot(dataDir: string): Promise<string | undefined> {
  let names: string[]
  try {
    names = await readdir(dataDir)
  } catch (error) {
    if (isMissingDirectory(error)) return undefined
    throw error
  }

  const latest = names.filter((name) => SNAPSHOT_PATTERN.test(name)).sort().at(-1)
  return latest === undefined ? undefined : join(dataDir, latest)
}

/**
 * Read the package list from a JSON file (array or action API response)
 *
 * @throws ValidationError when the file is not JSON or has neither shape
 */
export async function loadCatalogFile(path: string): Promise<unknown[]> {
  const content = await readFile(path, 'utf-8')
  let payload: unknown
  try {
    payload = JSON.parse(content)
  } catch (error) {
    throw new ValidationError(`${path} is not valid JSON`, { cause: error })
  }
  return extractPackages(payload)
}
