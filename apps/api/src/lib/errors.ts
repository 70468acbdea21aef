/**
 * Error Classification and Structured Error Handling
 *
 * Domain failures raised by the scraper, fetcher and cache, plus the
 * classifier the HTTP layer uses to turn any thrown value into a response.
 */

import { ZodError } from 'zod'

export type ErrorCategory =
  | 'validation' // Client sent invalid data (4xx)
  | 'extraction' // Source page could not be turned into an Item
  | 'external' // Upstream fetch failed
  | 'timeout' // Upstream fetch timed out
  | 'storage' // Cache store I/O failed
  | 'aborted' // Client went away mid-request
  | 'internal' // Unexpected internal errors (500)

export const ERROR_CODES = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',

  PARSE_FAILURE: 'PARSE_FAILURE',
  NODE_NOT_FOUND: 'NODE_NOT_FOUND',
  UNBALANCED_TRAIT_DATA: 'UNBALANCED_TRAIT_DATA',

  FETCH_FAILURE: 'FETCH_FAILURE',
  FETCH_TIMEOUT: 'FETCH_TIMEOUT',

  STORE_FAILURE: 'STORE_FAILURE',

  REQUEST_ABORTED: 'REQUEST_ABORTED',

  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

/**
 * Base class for every failure the lookup pipeline raises on purpose.
 * The message is the failure's description and is safe to show to callers.
 */
export abstract class RarityLensError extends Error {
  abstract readonly code: ErrorCode
  abstract readonly category: ErrorCategory
  abstract readonly statusCode: number
  readonly isRetryable: boolean = false

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** The source document was empty or not HTML. */
export class ParseFailureError extends RarityLensError {
  readonly code = ERROR_CODES.PARSE_FAILURE
  readonly category = 'extraction'
  readonly statusCode = 500
}

/** A required single-node query matched nothing (or matched a node with no text). */
export class NodeNotFoundError extends RarityLensError {
  readonly code = ERROR_CODES.NODE_NOT_FOUND
  readonly category = 'extraction'
  readonly statusCode = 500

  constructor(readonly selector: string, detail = 'could not find the HTML node') {
    super(`${detail}: ${selector}`)
  }
}

export class UnbalancedTraitDataError extends RarityLensError {
  readonly code = ERROR_CODES.UNBALANCED_TRAIT_DATA
  readonly category = 'extraction'
  readonly statusCode = 500

  constructor(readonly counts: { titles: number; percentages: number; tiers: number }) {
    super(
      `rarity nodes found are unbalanced (titles=${counts.titles}, percentages=${counts.percentages}, tiers=${counts.tiers})`
    )
  }
}

export type FetchFailureStatus = 'error' | 'timeout' | 'blocked' | 'too_large' | 'aborted'

export class FetchFailureError extends RarityLensError {
  readonly code: ErrorCode
  readonly category: ErrorCategory
  readonly statusCode: number
  override readonly isRetryable = true

  constructor(
    message: string,
    readonly status: FetchFailureStatus,
    readonly upstreamStatusCode?: number
  ) {
    super(message)
    const timedOut = status === 'timeout'
    this.code = timedOut ? ERROR_CODES.FETCH_TIMEOUT : ERROR_CODES.FETCH_FAILURE
    this.category = timedOut ? 'timeout' : 'external'
    this.statusCode = timedOut ? 504 : 502
  }
}

export class StoreFailureError extends RarityLensError {
  readonly code = ERROR_CODES.STORE_FAILURE
  readonly category = 'storage'
  readonly statusCode = 500
}

/** The caller disconnected before the lookup finished; nothing was cached. */
export class RequestAbortedError extends RarityLensError {
  readonly code = ERROR_CODES.REQUEST_ABORTED
  readonly category = 'aborted'
  // nginx convention for "client closed request"
  readonly statusCode = 499
}

/**
 * Structured error information for logging and responses
 */
export interface ClassifiedError {
  category: ErrorCategory
  code: ErrorCode
  message: string
  statusCode: number
  isOperational: boolean
  isRetryable: boolean
  details?: Record<string, unknown>
  originalError?: Error
}

export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof RarityLensError) {
    return {
      category: error.category,
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
      isOperational: true,
      isRetryable: error.isRetryable,
      originalError: error,
    }
  }

  if (error instanceof ZodError) {
    return {
      category: 'validation',
      code: ERROR_CODES.VALIDATION_FAILED,
      message: 'Validation failed',
      statusCode: 400,
      isOperational: true,
      isRetryable: false,
      details: {
        issues: error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
          code: issue.code,
        })),
      },
      originalError: error,
    }
  }

  if (error instanceof Error) {
    return {
      category: 'internal',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      statusCode: 500,
      isOperational: false,
      isRetryable: false,
      originalError: error,
    }
  }

  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: String(error),
    statusCode: 500,
    isOperational: false,
    isRetryable: false,
  }
}

export function formatErrorForLog(classified: ClassifiedError): Record<string, unknown> {
  return {
    error_category: classified.category,
    error_code: classified.code,
    error_message: classified.message,
    error_status_code: classified.statusCode,
    error_is_operational: classified.isOperational,
    error_is_retryable: classified.isRetryable,
    ...(classified.details && { error_details: classified.details }),
    ...(classified.originalError && {
      error_stack: classified.originalError.stack,
      error_name: classified.originalError.name,
    }),
  }
}

/**
 * Message sent to the client. Operational failures carry their own
 * description; anything unexpected gets a generic line so internals never leak.
 */
export function getClientMessage(classified: ClassifiedError): string {
  if (classified.isOperational) {
    return classified.message
  }
  return 'An unexpected error occurred'
}
