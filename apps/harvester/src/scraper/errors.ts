/**
 * Search pipeline error taxonomy.
 *
 * Per-document failures are collected, never thrown past the orchestrator,
 * unless every document in a batch failed.
 */

export type FetchErrorKind = 'exhausted' | 'rejected' | 'cancelled'

export interface FetchErrorDetails {
  url: string
  attempts: number
  statusCode?: number
  lastCause?: unknown
}

export class FetchError extends Error {
  readonly kind: FetchErrorKind
  readonly url: string
  readonly attempts: number
  readonly statusCode?: number
  readonly lastCause?: unknown

  constructor(kind: FetchErrorKind, message: string, details: FetchErrorDetails) {
    super(message)
    this.name = 'FetchError'
    this.kind = kind
    this.url = details.url
    this.attempts = details.attempts
    this.statusCode = details.statusCode
    this.lastCause = details.lastCause
  }

  get exhausted(): boolean {
    return this.kind === 'exhausted'
  }
}

export class ParseError extends Error {
  readonly reason = 'malformed' as const

  constructor(
    readonly source: string,
    readonly target: string,
    cause: unknown
  ) {
    super(
      `Malformed document from ${source}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    )
    this.name = 'ParseError'
  }
}

export class InvalidQueryError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidQueryError'
  }
}

export interface DocumentFailure {
  source: string
  target: string
  error: FetchError | ParseError
}

/**
 * Thrown only when every document of a batch failed.
 */
export class BatchFailedError extends Error {
  constructor(readonly failures: DocumentFailure[]) {
    super(
      `All ${failures.length} documents failed: ` +
        failures.map((f) => `${f.source} ${f.target}: ${describeCause(f.error)}`).join('; ')
    )
    this.name = 'BatchFailedError'
  }
}

/**
 * Last cause of a failure, unwrapping exhausted fetches.
 */
export function describeCause(error: FetchError | ParseError): string {
  if (error instanceof FetchError && error.lastCause !== undefined) {
    return error.lastCause instanceof Error ? error.lastCause.message : String(error.lastCause)
  }
  return error.message
}
