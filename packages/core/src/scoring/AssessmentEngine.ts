/**
 * Assessment Engine
 *
 * Scores metadata records against the FAIR+Context rule table. Scoring is
 * deterministic: the same record and reachability observations always
 * produce the same result. `assess` gathers observations through the
 * configured oracle first; `score` takes them as given.
 */

import { ConfigurationError } from '../errors/index.js'
import { probeUrls } from '../reachability/probe.js'
import {
  DEFAULT_REACHABILITY_TIMEOUT_MS,
  type ReachabilityOracle,
  type ReachabilityResult,
} from '../reachability/types.js'
import type { AssessmentResult } from '../types/assessment.js'
import type { MetadataRecord } from '../types/record.js'
import { createLogger, type Logger } from '../utils/logger.js'
import { validDownloadUrl } from './indicators/accessibility.js'
import { assertRuleTableConsistency, DIMENSIONS, scoreDimension } from './dimensions.js'
import { resolveRating } from './rating.js'
import type { DimensionDefinition, EvaluationContext } from './types.js'

export interface AssessmentEngineOptions {
  /** Probes download URLs; without one the reachability indicator scores zero */
  oracle?: ReachabilityOracle
  /** Upper bound for each probe */
  reachabilityTimeoutMs?: number
  /** Alternative rule table, checked for consistency on construction */
  dimensions?: readonly DimensionDefinition[]
  logger?: Logger
}

/**
 * @example
 * ```typescript
 * const engine = new AssessmentEngine({ oracle: createHttpReachabilityOracle() })
 * const result = await engine.assess(record)
 * console.log(`${result.recordId}: ${result.totalScore} (${result.rating})`)
 * ```
 */
export class AssessmentEngine {
  readonly dimensions: readonly DimensionDefinition[]
  readonly reachabilityTimeoutMs: number
  private readonly oracle?: ReachabilityOracle
  private readonly log: Logger

  /**
   * @throws ScoringInvariantError when the rule table is inconsistent
   * @throws ConfigurationError when the timeout is not a positive number
   */
  constructor(options: AssessmentEngineOptions = {}) {
    this.dimensions = options.dimensions ?? DIMENSIONS
    assertRuleTableConsistency(this.dimensions)

    const timeout = options.reachabilityTimeoutMs ?? DEFAULT_REACHABILITY_TIMEOUT_MS
    if (!Number.isFinite(timeout) || timeout <= 0) {
      throw new ConfigurationError(`reachabilityTimeoutMs must be positive, got ${timeout}`, {
        context: { reachabilityTimeoutMs: timeout },
      })
    }
    this.reachabilityTimeoutMs = timeout
    this.oracle = options.oracle
    this.log = options.logger ?? createLogger('AssessmentEngine')
  }

  /** Whether `assess` probes download URLs */
  get reachabilityEnabled(): boolean {
    return this.oracle !== undefined
  }

  /**
   * Score a record synchronously against the given observations. Passing
   * no observations disables the reachability indicator.
   *
   * @throws ScoringInvariantError on a rule table defect
   */
  score(
    record: MetadataRecord,
    reachability?: ReadonlyMap<string, ReachabilityResult>
  ): AssessmentResult {
    const context: EvaluationContext = {
      record,
      reachability: reachability ?? new Map(),
      reachabilityEnabled: reachability !== undefined,
    }

    const dimensions = this.dimensions.map((definition) => scoreDimension(definition, context))
    const totalScore = dimensions.reduce((sum, dimension) => sum + dimension.value, 0)

    return {
      recordId: record.id,
      ...(record.title === undefined ? {} : { title: record.title }),
      dimensions,
      totalScore,
      rating: resolveRating(totalScore),
    }
  }

  /**
   * Probe each distinct valid download URL, then score
   *
   * @throws ScoringInvariantError on a rule table defect
   */
  async assess(record: MetadataRecord): Promise<AssessmentResult> {
    if (this.oracle === undefined) {
      return this.score(record)
    }

    const urls = this.downloadUrls(record)
    const observations = await probeUrls(this.oracle, urls, this.reachabilityTimeoutMs)

    for (const [url, observation] of observations) {
      if (!observation.reachable) {
        this.log.debug('Download URL unreachable', {
          recordId: record.id,
          url,
          status: observation.status,
          error: observation.error,
        })
      }
    }

    return this.score(record, observations)
  }

  /**
   * Distinct syntactically valid download URLs of a record
   */
  downloadUrls(record: MetadataRecord): string[] {
    const urls = new Set<string>()
    for (const distribution of record.distributions ?? []) {
      const url = validDownloadUrl(distribution)
      if (url !== undefined) urls.add(url)
    }
    return [...urls]
  }
}
