/**
 * HTTP reachability oracle
 *
 * Sends a HEAD request bounded by `AbortSignal.timeout`, retrying once as
 * GET when the server does not allow HEAD. A URL is reachable when the
 * final status is below 400. No retry or backoff beyond that.
 */

import { getErrorMessage } from '../errors/index.js'
import { createLogger } from '../utils/logger.js'
import type { ReachabilityOracle, ReachabilityResult } from './types.js'

const log = createLogger('HttpReachabilityOracle')

/** Statuses that mean "HEAD not supported" rather than "missing" */
const HEAD_UNSUPPORTED = new Set([405, 501])

export interface HttpReachabilityOracleOptions {
  /** Fetch implementation (defaults to the global fetch) */
  fetch?: typeof fetch
  /** User-Agent header sent with each probe */
  userAgent?: string
}

export const DEFAULT_USER_AGENT = 'opendata-mqa/0.1 (metadata quality assessment)'

/**
 * Create an oracle that probes URLs over HTTP
 *
 * @example
 * ```typescript
 * const engine = new AssessmentEngine({ oracle: createHttpReachabilityOracle() })
 * const result = await engine.assess(record)
 * ```
 */
export function createHttpReachabilityOracle(
  options: HttpReachabilityOracleOptions = {}
): ReachabilityOracle {
  const fetchImpl = options.fetch ?? fetch
  const headers = { 'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT }

  const request = async (url: string, method: 'HEAD' | 'GET', timeoutMs: number) => {
    const response = await fetchImpl(url, {
      method,
      headers,
      redirect: 'follow',
      signal: AbortSignal.timeout(timeoutMs),
    })
    if (method === 'GET' && response.body) {
      try {
        await response.body.cancel()
      } catch (error) {
        log.debug('Failed to discard response body', { url, error: getErrorMessage(error) })
      }
    }
    return response.status
  }

  return {
    async check(url: string, timeoutMs: number): Promise<ReachabilityResult> {
      try {
        let status = await request(url, 'HEAD', timeoutMs)
        if (HEAD_UNSUPPORTED.has(status)) {
          log.debug('HEAD not supported, retrying with GET', { url, status })
          status = await request(url, 'GET', timeoutMs)
        }
        return status < 400
          ? { reachable: true, status }
          : { reachable: false, status, error: `HTTP ${status}` }
      } catch (error) {
        return { reachable: false, error: getErrorMessage(error) }
      }
    },
  }
}
