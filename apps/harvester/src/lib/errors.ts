/**
 * Error Classification
 *
 * Maps anything thrown below the HTTP layer to a category, an HTTP status
 * and a message that is safe to show to callers.
 */

import { ZodError } from 'zod'
import {
  BatchFailedError,
  FetchError,
  InvalidQueryError,
  ParseError,
} from '../scraper/errors.js'

export type ErrorCategory =
  | 'validation' // Caller sent invalid input (400)
  | 'not_found' // Unknown route (404)
  | 'upstream' // Every source failed (502)
  | 'external' // Network failures talking to a source
  | 'timeout'
  | 'internal' // Bugs (500)

export interface ClassifiedError {
  category: ErrorCategory
  code: string
  message: string
  statusCode: number
  isOperational: boolean // Expected errors vs bugs
  isRetryable: boolean
  details?: Record<string, unknown>
  originalError?: Error
}

export const ERROR_CODES = {
  // Validation
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  INVALID_QUERY: 'INVALID_QUERY',

  // Not Found
  NOT_FOUND: 'NOT_FOUND',

  // Upstream
  ALL_SOURCES_FAILED: 'ALL_SOURCES_FAILED',
  SOURCE_REJECTED: 'SOURCE_REJECTED',
  SOURCE_MALFORMED: 'SOURCE_MALFORMED',

  // External
  NETWORK_ERROR: 'NETWORK_ERROR',
  EXTERNAL_TIMEOUT: 'EXTERNAL_TIMEOUT',

  // Timeout
  OPERATION_TIMEOUT: 'OPERATION_TIMEOUT',
  OPERATION_CANCELLED: 'OPERATION_CANCELLED',

  // Internal
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

const NETWORK_ERROR_CODES = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
]

export function classifyError(error: unknown): ClassifiedError {
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

  if (error instanceof InvalidQueryError) {
    return {
      category: 'validation',
      code: ERROR_CODES.INVALID_QUERY,
      message: error.message,
      statusCode: 400,
      isOperational: true,
      isRetryable: false,
      originalError: error,
    }
  }

  if (error instanceof BatchFailedError) {
    return {
      category: 'upstream',
      code: ERROR_CODES.ALL_SOURCES_FAILED,
      message: error.message,
      statusCode: 502,
      isOperational: true,
      isRetryable: true,
      details: { failures: error.failures.length },
      originalError: error,
    }
  }

  if (error instanceof FetchError) {
    return classifyFetchError(error)
  }

  if (error instanceof ParseError) {
    return {
      category: 'upstream',
      code: ERROR_CODES.SOURCE_MALFORMED,
      message: error.message,
      statusCode: 502,
      isOperational: true,
      isRetryable: false,
      details: { source: error.source },
      originalError: error,
    }
  }

  if (error instanceof Error) {
    const classified = classifyByStatus(error) ?? classifyNetworkError(error)
    if (classified) {
      return classified
    }

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

function classifyFetchError(error: FetchError): ClassifiedError {
  const details = { attempts: error.attempts, statusCode: error.statusCode }
  switch (error.kind) {
    case 'cancelled':
      return {
        category: 'timeout',
        code: ERROR_CODES.OPERATION_CANCELLED,
        message: error.message,
        statusCode: 504,
        isOperational: true,
        isRetryable: true,
        details,
        originalError: error,
      }
    case 'rejected':
      return {
        category: 'upstream',
        code: ERROR_CODES.SOURCE_REJECTED,
        message: error.message,
        statusCode: 502,
        isOperational: true,
        isRetryable: false,
        details,
        originalError: error,
      }
    case 'exhausted':
      return {
        category: 'external',
        code: ERROR_CODES.NETWORK_ERROR,
        message: error.message,
        statusCode: 502,
        isOperational: true,
        isRetryable: true,
        details,
        originalError: error,
      }
  }
}

function numericProp(error: Error, key: 'status' | 'statusCode'): number | undefined {
  if (!(key in error)) return undefined
  const value: unknown = Reflect.get(error, key)
  return typeof value === 'number' ? value : undefined
}

function stringCode(error: Error): string | undefined {
  if (!('code' in error)) return undefined
  return typeof error.code === 'string' ? error.code : undefined
}

/**
 * Errors carrying an HTTP status (body-parser, http-errors).
 */
function classifyByStatus(error: Error): ClassifiedError | null {
  const status = numericProp(error, 'status') ?? numericProp(error, 'statusCode')
  if (!status) return null

  if (status === 404) {
    return {
      category: 'not_found',
      code: ERROR_CODES.NOT_FOUND,
      message: error.message,
      statusCode: 404,
      isOperational: true,
      isRetryable: false,
      originalError: error,
    }
  }
  if (status >= 400 && status < 500) {
    return {
      category: 'validation',
      code: ERROR_CODES.VALIDATION_FAILED,
      message: error.message,
      statusCode: 400,
      isOperational: true,
      isRetryable: false,
      originalError: error,
    }
  }
  return null
}

function classifyNetworkError(error: Error): ClassifiedError | null {
  const code = stringCode(error)

  if (code && NETWORK_ERROR_CODES.includes(code)) {
    const isTimeout = code === 'ETIMEDOUT'
    return {
      category: isTimeout ? 'timeout' : 'external',
      code: isTimeout ? ERROR_CODES.EXTERNAL_TIMEOUT : ERROR_CODES.NETWORK_ERROR,
      message: `Network error: ${code}`,
      statusCode: 503,
      isOperational: true,
      isRetryable: true,
      details: { errorCode: code },
      originalError: error,
    }
  }

  const message = error.message.toLowerCase()
  if (message.includes('timeout') || message.includes('timed out')) {
    return {
      category: 'timeout',
      code: ERROR_CODES.OPERATION_TIMEOUT,
      message: error.message,
      statusCode: 504,
      isOperational: true,
      isRetryable: true,
      originalError: error,
    }
  }

  return null
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

const SAFE_MESSAGES: Record<string, string> = {
  VALIDATION_FAILED: 'Please check your input and try again',
  NOT_FOUND: 'The requested resource was not found',
  ALL_SOURCES_FAILED: 'No source could be searched. Please try again later',
  SOURCE_REJECTED: 'A source refused the request',
  SOURCE_MALFORMED: 'A source returned an unreadable page',
  NETWORK_ERROR: 'Network error occurred. Please try again',
  EXTERNAL_TIMEOUT: 'Request timed out. Please try again',
  OPERATION_TIMEOUT: 'Operation timed out. Please try again',
  OPERATION_CANCELLED: 'The search was cancelled',
  UNEXPECTED_ERROR: 'An unexpected error occurred',
}

/**
 * Caller-facing message. Invalid query messages describe the caller's own
 * input and pass through unchanged.
 */
export function getSafeMessage(classified: ClassifiedError): string {
  if (classified.code === ERROR_CODES.INVALID_QUERY) {
    return classified.message
  }
  return SAFE_MESSAGES[classified.code] ?? 'An error occurred'
}
