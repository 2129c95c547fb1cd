/**
 * Assessment Error Classes
 *
 * Error classes with cause chaining. Only structural invariant violations
 * (ScoringInvariantError) are raised while scoring; absent or malformed
 * metadata is reported through indicator rationales instead.
 */

/**
 * Base error class for all assessment errors.
 * Preserves cause chain and provides structured error information.
 */
export class MqaError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Additional context about the error */
  readonly context?: Record<string, unknown>

  constructor(
    message: string,
    options?: {
      code?: string
      cause?: unknown
      context?: Record<string, unknown>
    }
  ) {
    super(message, { cause: options?.cause })
    this.name = 'MqaError'
    this.code = options?.code ?? 'MQA_ERROR'
    this.context = options?.context

    Error.captureStackTrace?.(this, this.constructor)
  }

  /**
   * Get the full error chain as an array
   */
  getErrorChain(): Error[] {
    const chain: Error[] = [this]
    let current: unknown = this.cause

    while (current instanceof Error) {
      chain.push(current)
      current = current.cause
    }

    return chain
  }

  /**
   * Format error with full context for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
      stack: this.stack,
    }
  }
}

/**
 * Rule table defect: a dimension sum above its maximum, an indicator awarding
 * points outside its range, or a total outside the rating scale.
 */
export class ScoringInvariantError extends MqaError {
  /** Record being scored when the violation was detected */
  readonly recordId?: string

  constructor(
    message: string,
    options?: {
      cause?: unknown
      recordId?: string
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'SCORING_INVARIANT_VIOLATION',
      cause: options?.cause,
      context: {
        ...options?.context,
        recordId: options?.recordId,
      },
    })
    this.name = 'ScoringInvariantError'
    this.recordId = options?.recordId
  }
}

/**
 * Input that cannot be turned into a MetadataRecord
 */
export class ValidationError extends MqaError {
  /** Path of the field that failed validation */
  readonly field?: string

  constructor(
    message: string,
    options?: {
      cause?: unknown
      field?: string
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'VALIDATION_ERROR',
      cause: options?.cause,
      context: {
        ...options?.context,
        field: options?.field,
      },
    })
    this.name = 'ValidationError'
    this.field = options?.field
  }
}

/**
 * Network-related errors (catalog API failures)
 */
export class NetworkError extends MqaError {
  /** HTTP status code if a response was received */
  readonly statusCode?: number

  constructor(
    message: string,
    options?: {
      cause?: unknown
      url?: string
      statusCode?: number
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'NETWORK_ERROR',
      cause: options?.cause,
      context: {
        ...options?.context,
        url: options?.url,
        statusCode: options?.statusCode,
      },
    })
    this.name = 'NetworkError'
    this.statusCode = options?.statusCode
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends MqaError {
  constructor(
    message: string,
    options?: {
      cause?: unknown
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      cause: options?.cause,
      context: options?.context,
    })
    this.name = 'ConfigurationError'
  }
}

/**
 * Wrap an unknown error in an MqaError if not already one
 */
export function wrapError(
  error: unknown,
  message: string,
  options?: {
    code?: string
    context?: Record<string, unknown>
  }
): MqaError {
  if (error instanceof MqaError) {
    return error
  }

  return new MqaError(message, {
    code: options?.code,
    cause: error,
    context: options?.context,
  })
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  if (typeof error === 'string') {
    return error
  }
  return 'Unknown error'
}

/**
 * Check if error is an MqaError
 */
export function isMqaError(error: unknown): error is MqaError {
  return error instanceof MqaError
}
