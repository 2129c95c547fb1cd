/**
 * Bounded reachability probes
 */

import { getErrorMessage } from '../errors/index.js'
import type { ReachabilityOracle, ReachabilityResult } from './types.js'

/**
 * Ask the oracle about one URL, never waiting longer than `timeoutMs`.
 * Rejections, synchronous throws and timeouts resolve to unreachable.
 */
export async function probeUrl(
  oracle: ReachabilityOracle,
  url: string,
  timeoutMs: number
): Promise<ReachabilityResult> {
  let timer: ReturnType<typeof setTimeout> | undefined

  const timeout = new Promise<ReachabilityResult>((resolve) => {
    timer = setTimeout(
      () => resolve({ reachable: false, error: `Timed out after ${timeoutMs}ms` }),
      timeoutMs
    )
  })

  const check = (async (): Promise<ReachabilityResult> => {
    try {
      return await oracle.check(url, timeoutMs)
    } catch (error) {
      return { reachable: false, error: getErrorMessage(error) }
    }
  })()

  try {
    return await Promise.race([check, timeout])
  } finally {
    clearTimeout(timer)
  }
}

/**
 * Probe each distinct URL once, concurrently
 */
export async function probeUrls(
  oracle: ReachabilityOracle,
  urls: Iterable<string>,
  timeoutMs: number
): Promise<Map<string, ReachabilityResult>> {
  const distinct = [...new Set(urls)]
  const results = await Promise.all(distinct.map((url) => probeUrl(oracle, url, timeoutMs)))

  const observations = new Map<string, ReachabilityResult>()
  distinct.forEach((url, index) => {
    const result = results[index]
    if (result) observations.set(url, result)
  })
  return observations
}
