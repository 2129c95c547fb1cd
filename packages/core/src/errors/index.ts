/**
 * Error Classes Module
 *
 * @example
 * ```typescript
 * import { ScoringInvariantError, getErrorMessage } from '@opendata-mqa/core'
 *
 * try {
 *   engine.score(record)
 * } catch (error) {
 *   if (error instanceof ScoringInvariantError) {
 *     console.error(`Rule table defect for ${error.recordId}: ${getErrorMessage(error)}`)
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  MqaError,
  ScoringInvariantError,
  ValidationError,
  NetworkError,
  ConfigurationError,
  wrapError,
  getErrorMessage,
  isMqaError,
} from './MqaError.js'
