export {
  DEFAULT_REACHABILITY_TIMEOUT_MS,
  type ReachabilityOracle,
  type ReachabilityResult,
} from './types.js'
export { probeUrl, probeUrls } from './probe.js'
export {
  createHttpReachabilityOracle,
  DEFAULT_USER_AGENT,
  type HttpReachabilityOracleOptions,
} from './http-oracle.js'
