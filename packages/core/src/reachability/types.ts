/**
 * Reachability oracle contract
 */

/**
 * Observation for one URL
 */
export interface ReachabilityResult {
  reachable: boolean
  /** HTTP status when a response was received */
  status?: number
  /** Why the URL was judged unreachable */
  error?: string
}

/**
 * Answers whether a URL is reachable. Implementations resolve rather than
 * reject for network failures; a rejection is also treated as unreachable.
 */
export interface ReachabilityOracle {
  check(url: string, timeoutMs: number): Promise<ReachabilityResult>
}

/** Default per-probe timeout */
export const DEFAULT_REACHABILITY_TIMEOUT_MS = 5000
