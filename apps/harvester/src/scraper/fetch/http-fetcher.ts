/**
 * HTTP Fetcher Implementation
 *
 * Uses the native fetch API. One policy object owns retries and backoff so
 * callers never loop on their own.
 */

import type { ILogger } from '@linktrawl/logger'
import { noopLogger } from '@linktrawl/logger'
import { FetchError } from '../errors.js'
import type { FetchRequest, FetchResponse, Fetcher, RetryPolicy } from '../types.js'
import {
  DEFAULT_FETCH_HEADERS,
  DEFAULT_MAX_BODY_BYTES,
  DEFAULT_RETRY_POLICY,
  DEFAULT_TIMEOUT_MS,
} from '../types.js'
import { AbortedError, sleep } from '../utils/async.js'
import { sanitizeUrl } from '../../config/structured-log.js'

export interface HttpFetcherOptions {
  retryPolicy?: RetryPolicy
  /** Defaults to globalThis.fetch, resolved at call time */
  fetchImpl?: typeof fetch
  defaultTimeoutMs?: number
  defaultMaxSizeBytes?: number
  logger?: ILogger
}

/**
 * Result of one attempt. Retryable outcomes are reported, not thrown.
 */
type AttemptOutcome =
  | { kind: 'ok'; statusCode: number; body: string }
  | { kind: 'retryable'; cause: Error; statusCode?: number }
  | { kind: 'rejected'; cause: Error; statusCode?: number }

/**
 * Wait before the attempt following `attempt` (1-based).
 */
export function computeBackoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(
    policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1),
    policy.maxDelayMs
  )
}

export function isRetryableStatus(policy: RetryPolicy, statusCode: number): boolean {
  return statusCode >= 500 || policy.retryableStatusCodes.includes(statusCode)
}

export class HttpFetcher implements Fetcher {
  private readonly retryPolicy: RetryPolicy
  private readonly fetchImpl?: typeof fetch
  private readonly defaultTimeoutMs: number
  private readonly defaultMaxSizeBytes: number
  private readonly log: ILogger

  constructor(options: HttpFetcherOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.fetchImpl = options.fetchImpl
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS
    this.defaultMaxSizeBytes = options.defaultMaxSizeBytes ?? DEFAULT_MAX_BODY_BYTES
    this.log = options.logger ?? noopLogger
  }

  async fetch(request: FetchRequest): Promise<FetchResponse> {
    const startTime = Date.now()
    const maxAttempts = Math.max(1, this.retryPolicy.maxAttempts)
    let lastCause: Error | undefined
    let lastStatus: number | undefined

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (request.signal?.aborted) {
        throw this.cancelled(request, attempt - 1, lastCause)
      }

      const outcome = await this.fetchOnce(request)

      if (outcome.kind === 'ok') {
        return {
          url: request.url,
          statusCode: outcome.statusCode,
          body: outcome.body,
          attempts: attempt,
          durationMs: Date.now() - startTime,
        }
      }

      if (request.signal?.aborted) {
        throw this.cancelled(request, attempt, outcome.cause)
      }

      if (outcome.kind === 'rejected') {
        throw new FetchError('rejected', outcome.cause.message, {
          url: request.url,
          attempts: attempt,
          statusCode: outcome.statusCode,
          lastCause: outcome.cause,
        })
      }

      lastCause = outcome.cause
      lastStatus = outcome.statusCode

      if (attempt < maxAttempts) {
        const delay = computeBackoffDelay(this.retryPolicy, attempt)
        this.log.debug('Retrying fetch', {
          ...sanitizeUrl(request.url),
          attempt,
          delayMs: delay,
          statusCode: outcome.statusCode,
          cause: outcome.cause.message,
        })
        try {
          await sleep(delay, request.signal)
        } catch (error) {
          if (error instanceof AbortedError) {
            throw this.cancelled(request, attempt, lastCause)
          }
          throw error
        }
      }
    }

    this.log.warn('Fetch attempts exhausted', {
      ...sanitizeUrl(request.url),
      attempts: maxAttempts,
      statusCode: lastStatus,
      cause: lastCause?.message,
    })

    throw new FetchError(
      'exhausted',
      `Gave up after ${maxAttempts} attempts: ${lastCause?.message ?? 'unknown error'}`,
      {
        url: request.url,
        attempts: maxAttempts,
        statusCode: lastStatus,
        lastCause,
      }
    )
  }

  /**
   * Single attempt. Builds its own RequestInit so nothing leaks between retries.
   */
  private async fetchOnce(request: FetchRequest): Promise<AttemptOutcome> {
    const timeoutMs = request.timeoutMs ?? this.defaultTimeoutMs
    const maxSizeBytes = request.maxSizeBytes ?? this.defaultMaxSizeBytes
    const controller = new AbortController()
    let timedOut = false
    const timeoutId = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, timeoutMs)
    const onCallerAbort = () => controller.abort()
    request.signal?.addEventListener('abort', onCallerAbort, { once: true })

    const fetchImpl = this.fetchImpl ?? globalThis.fetch

    try {
      const response = await fetchImpl(request.url, {
        method: request.method ?? 'GET',
        headers: { ...DEFAULT_FETCH_HEADERS, ...request.headers },
        body: request.body,
        signal: controller.signal,
        redirect: 'follow',
      })

      if (!response.ok) {
        await response.body?.cancel()
        const cause = new Error(`HTTP ${response.status}: ${response.statusText}`)
        return isRetryableStatus(this.retryPolicy, response.status)
          ? { kind: 'retryable', cause, statusCode: response.status }
          : { kind: 'rejected', cause, statusCode: response.status }
      }

      const contentLength = response.headers.get('content-length')
      if (contentLength && parseInt(contentLength, 10) > maxSizeBytes) {
        await response.body?.cancel()
        return {
          kind: 'rejected',
          cause: new Error(`Response too large: ${contentLength} bytes`),
          statusCode: response.status,
        }
      }

      const body = await this.readBodyWithLimit(response, maxSizeBytes)
      if (body === null) {
        return {
          kind: 'rejected',
          cause: new Error('Response exceeded size limit'),
          statusCode: response.status,
        }
      }

      return { kind: 'ok', statusCode: response.status, body }
    } catch (error) {
      if (timedOut) {
        return { kind: 'retryable', cause: new Error(`Request timed out after ${timeoutMs}ms`) }
      }
      return {
        kind: 'retryable',
        cause: error instanceof Error ? error : new Error(String(error)),
      }
    } finally {
      clearTimeout(timeoutId)
      request.signal?.removeEventListener('abort', onCallerAbort)
    }
  }

  /**
   * Returns null once the body grows past maxBytes.
   */
  private async readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
    const reader = response.body?.getReader()
    if (!reader) {
      return ''
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > maxBytes) {
          await reader.cancel()
          return null
        }

        chunks.push(value)
      }

      return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
    } finally {
      reader.releaseLock()
    }
  }

  private cancelled(request: FetchRequest, attempts: number, lastCause?: Error): FetchError {
    return new FetchError('cancelled', 'Fetch cancelled', {
      url: request.url,
      attempts,
      lastCause,
    })
  }
}
