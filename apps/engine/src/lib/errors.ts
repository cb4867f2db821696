/**
 * Error taxonomy and classification
 *
 * Engine errors carry a stable `code` and a `category`. Boundaries log through
 * `formatErrorForLog(classifyError(err))` so every failure has the same shape
 * whatever was thrown.
 */

import { ZodError } from 'zod'
import type { SourceErrorKind } from '../types.js'

export type ErrorCategory =
  | 'validation' // Caller sent an invalid request
  | 'source' // An adapter failed
  | 'parse' // A listing could not be normalized
  | 'retrieval' // No confident knowledge match
  | 'configuration' // Wiring or environment is wrong
  | 'aborted' // Caller cancelled
  | 'external' // Network or backend failure
  | 'timeout'
  | 'internal'

export const ERROR_CODES = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',

  SOURCE_TIMEOUT: 'SOURCE_TIMEOUT',
  SOURCE_BLOCKED: 'SOURCE_BLOCKED',
  SOURCE_PARSE_FAILURE: 'SOURCE_PARSE_FAILURE',
  SOURCE_UNAVAILABLE: 'SOURCE_UNAVAILABLE',

  PRICE_UNPARSABLE: 'PRICE_UNPARSABLE',
  PRICE_NOT_POSITIVE: 'PRICE_NOT_POSITIVE',
  TITLE_EMPTY: 'TITLE_EMPTY',

  RETRIEVAL_MISS: 'RETRIEVAL_MISS',

  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',

  SEARCH_ABORTED: 'SEARCH_ABORTED',

  NETWORK_ERROR: 'NETWORK_ERROR',
  EXTERNAL_TIMEOUT: 'EXTERNAL_TIMEOUT',
  OPERATION_TIMEOUT: 'OPERATION_TIMEOUT',

  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export class EngineError extends Error {
  readonly code: ErrorCode
  readonly category: ErrorCategory

  constructor(code: ErrorCode, category: ErrorCategory, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'EngineError'
    this.code = code
    this.category = category
  }
}

const SOURCE_CODES: Record<SourceErrorKind, ErrorCode> = {
  timeout: ERROR_CODES.SOURCE_TIMEOUT,
  blocked: ERROR_CODES.SOURCE_BLOCKED,
  parse_failure: ERROR_CODES.SOURCE_PARSE_FAILURE,
  unavailable: ERROR_CODES.SOURCE_UNAVAILABLE,
}

/** An adapter failed. Always recovered into `failedSources`. */
export class SourceError extends EngineError {
  readonly kind: SourceErrorKind
  readonly sourceId: string

  constructor(sourceId: string, kind: SourceErrorKind, message: string, options?: { cause?: unknown }) {
    super(SOURCE_CODES[kind], 'source', message, options)
    this.name = 'SourceError'
    this.kind = kind
    this.sourceId = sourceId
  }
}

/** A listing's price or title could not be normalized. The listing is dropped. */
export class ParseError extends EngineError {
  readonly field: 'price' | 'title'
  readonly input: string

  constructor(
    code: typeof ERROR_CODES.PRICE_UNPARSABLE | typeof ERROR_CODES.PRICE_NOT_POSITIVE | typeof ERROR_CODES.TITLE_EMPTY,
    field: 'price' | 'title',
    input: string
  ) {
    super(code, 'parse', `Cannot parse ${field}: "${input}"`)
    this.name = 'ParseError'
    this.field = field
    this.input = input
  }
}

/** No knowledge entry cleared a confidence threshold. The insight is omitted. */
export class RetrievalMiss extends EngineError {
  readonly stage: string

  constructor(stage: string, message: string) {
    super(ERROR_CODES.RETRIEVAL_MISS, 'retrieval', message)
    this.name = 'RetrievalMiss'
    this.stage = stage
  }
}

/** Missing capability wiring or a bad setting. Fatal at startup. */
export class ConfigurationError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.CONFIGURATION_ERROR, 'configuration', message, options)
    this.name = 'ConfigurationError'
  }
}

export interface ValidationIssue {
  path: string
  message: string
}

/** The caller's request failed validation. */
export class RequestValidationError extends EngineError {
  readonly issues: ValidationIssue[]

  constructor(issues: ValidationIssue[]) {
    super(
      ERROR_CODES.VALIDATION_FAILED,
      'validation',
      `Invalid search request: ${issues.map((i) => `${i.path || 'request'}: ${i.message}`).join('; ')}`
    )
    this.name = 'RequestValidationError'
    this.issues = issues
  }

  static fromZod(error: ZodError): RequestValidationError {
    return new RequestValidationError(
      error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    )
  }
}

/** The caller cancelled the search. */
export class SearchAbortedError extends EngineError {
  constructor(message = 'Search aborted') {
    super(ERROR_CODES.SEARCH_ABORTED, 'aborted', message)
    this.name = 'SearchAbortedError'
  }
}

export function isAbortError(error: unknown): boolean {
  return (
    error instanceof SearchAbortedError ||
    (error instanceof Error && error.name === 'AbortError')
  )
}

// =============================================================================
// Classification
// =============================================================================

export interface ClassifiedError {
  category: ErrorCategory
  code: string
  message: string
  isOperational: boolean // Expected failures vs bugs
  isRetryable: boolean
  details?: Record<string, unknown>
  originalError?: Error
}

const NETWORK_ERROR_CODES = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
]

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') return error.code
  if (error.cause instanceof Error) return errorCode(error.cause)
  return undefined
}

function httpStatus(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number') return error.status
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode
  return undefined
}

function isTimeoutMessage(message: string): boolean {
  const lower = message.toLowerCase()
  return lower.includes('timeout') || lower.includes('timed out')
}

/**
 * Classify any thrown value into a structured form.
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof EngineError) {
    const details: Record<string, unknown> = {}
    if (error instanceof SourceError) {
      details.sourceId = error.sourceId
      details.kind = error.kind
    } else if (error instanceof RequestValidationError) {
      details.issues = error.issues
    } else if (error instanceof ParseError) {
      details.field = error.field
      details.input = error.input
    }
    return {
      category: error.category,
      code: error.code,
      message: error.message,
      isOperational: error.category !== 'internal',
      isRetryable: error.category === 'source' || error.category === 'external' || error.category === 'timeout',
      ...(Object.keys(details).length > 0 ? { details } : {}),
      originalError: error,
    }
  }

  if (error instanceof ZodError) {
    return {
      category: 'validation',
      code: ERROR_CODES.VALIDATION_FAILED,
      message: 'Validation failed',
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
    if (error.name === 'AbortError') {
      return {
        category: 'aborted',
        code: ERROR_CODES.SEARCH_ABORTED,
        message: error.message,
        isOperational: true,
        isRetryable: false,
        originalError: error,
      }
    }

    const code = errorCode(error)
    if (code && NETWORK_ERROR_CODES.includes(code)) {
      const isTimeout = code === 'ETIMEDOUT' || code === 'UND_ERR_CONNECT_TIMEOUT'
      return {
        category: isTimeout ? 'timeout' : 'external',
        code: isTimeout ? ERROR_CODES.EXTERNAL_TIMEOUT : ERROR_CODES.NETWORK_ERROR,
        message: `Network error: ${code}`,
        isOperational: true,
        isRetryable: true,
        details: { errorCode: code },
        originalError: error,
      }
    }

    if (isTimeoutMessage(error.message)) {
      return {
        category: 'timeout',
        code: ERROR_CODES.OPERATION_TIMEOUT,
        message: error.message,
        isOperational: true,
        isRetryable: true,
        originalError: error,
      }
    }

    return {
      category: 'internal',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      isOperational: false,
      isRetryable: false,
      originalError: error,
    }
  }

  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: String(error),
    isOperational: false,
    isRetryable: false,
  }
}

/**
 * Map a failure thrown by an adapter onto a source error kind.
 */
export function classifySourceFailure(error: unknown): SourceErrorKind {
  if (error instanceof SourceError) return error.kind
  if (!(error instanceof Error)) return 'unavailable'

  const status = httpStatus(error)
  if (status === 401 || status === 403 || status === 429) return 'blocked'
  if (error instanceof SyntaxError || error instanceof ParseError) return 'parse_failure'

  const classified = classifyError(error)
  if (classified.category === 'timeout' || classified.category === 'aborted') return 'timeout'
  return 'unavailable'
}

/**
 * Flatten a classified error for structured logs.
 */
export function formatErrorForLog(classified: ClassifiedError): Record<string, unknown> {
  return {
    error_category: classified.category,
    error_code: classified.code,
    error_message: classified.message,
    error_is_operational: classified.isOperational,
    error_is_retryable: classified.isRetryable,
    ...(classified.details && { error_details: classified.details }),
    ...(classified.originalError && {
      error_stack: classified.originalError.stack,
      error_name: classified.originalError.name,
    }),
  }
}
