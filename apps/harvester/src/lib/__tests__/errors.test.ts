import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import { classifyError, ERROR_CODES, formatErrorForLog, getSafeMessage } from '../errors.js'
import { BatchFailedError, FetchError, InvalidQueryError, ParseError } from '../../scraper/errors.js'

function withProps(message: string, props: Record<string, unknown>): Error {
  return Object.assign(new Error(message), props)
}

describe('classifyError', () => {
  it('maps zod issues to a validation failure', () => {
    const result = z.object({ kw: z.string() }).safeParse({})
    if (result.success) throw new Error('expected a parse failure')

    const classified = classifyError(result.error)

    expect(classified.statusCode).toBe(400)
    expect(classified.code).toBe(ERROR_CODES.VALIDATION_FAILED)
    expect(classified.details).toEqual({
      issues: [{ path: 'kw', message: 'Required', code: 'invalid_type' }],
    })
  })

  it('passes invalid query messages through to callers', () => {
    const classified = classifyError(new InvalidQueryError("Unknown source 'nope'"))

    expect(classified.statusCode).toBe(400)
    expect(getSafeMessage(classified)).toBe("Unknown source 'nope'")
  })

  it('maps a fully failed batch to 502', () => {
    const failure = {
      source: 'telegram',
      target: 'https://t.me/s/chan?q=x',
      error: new FetchError('exhausted', 'Gave up', { url: 'https://t.me/s/chan?q=x', attempts: 3 }),
    }
    const classified = classifyError(new BatchFailedError([failure]))

    expect(classified).toMatchObject({
      category: 'upstream',
      code: 'ALL_SOURCES_FAILED',
      statusCode: 502,
      isRetryable: true,
      details: { failures: 1 },
    })
    expect(getSafeMessage(classified)).toBe('No source could be searched. Please try again later')
  })

  it('distinguishes fetch error kinds', () => {
    const details = { url: 'https://t.me/s/chan', attempts: 1 }

    expect(classifyError(new FetchError('cancelled', 'Fetch cancelled', details)).code).toBe(
      'OPERATION_CANCELLED'
    )
    expect(classifyError(new FetchError('rejected', 'HTTP 403: Forbidden', { ...details, statusCode: 403 }))).toMatchObject({
      code: 'SOURCE_REJECTED',
      statusCode: 502,
      details: { attempts: 1, statusCode: 403 },
    })
    expect(classifyError(new FetchError('exhausted', 'Gave up', details)).code).toBe('NETWORK_ERROR')
  })

  it('maps parse errors to a malformed source', () => {
    const classified = classifyError(new ParseError('telegram', 'https://t.me/s/chan', new Error('bad')))

    expect(classified.code).toBe('SOURCE_MALFORMED')
    expect(classified.details).toEqual({ source: 'telegram' })
  })

  it('reads http statuses off framework errors', () => {
    expect(classifyError(withProps('Unexpected token', { status: 400 })).code).toBe('VALIDATION_FAILED')
    expect(classifyError(withProps('Gone', { statusCode: 404 })).statusCode).toBe(404)
  })

  it('recognizes network codes and timeouts', () => {
    expect(classifyError(withProps('connect failed', { code: 'ECONNREFUSED' }))).toMatchObject({
      code: 'NETWORK_ERROR',
      statusCode: 503,
      message: 'Network error: ECONNREFUSED',
    })
    expect(classifyError(withProps('socket', { code: 'ETIMEDOUT' })).code).toBe('EXTERNAL_TIMEOUT')
    expect(classifyError(new Error('Request timed out after 10ms')).code).toBe('OPERATION_TIMEOUT')
  })

  it('treats anything else as unexpected', () => {
    const classified = classifyError(new Error('kaput'))

    expect(classified).toMatchObject({ code: 'UNEXPECTED_ERROR', statusCode: 500, isOperational: false })
    expect(getSafeMessage(classified)).toBe('An unexpected error occurred')
    expect(classifyError('plain string').message).toBe('plain string')
  })
})

describe('formatErrorForLog', () => {
  it('flattens the classification into log fields', () => {
    const error = new InvalidQueryError('keyword must not be empty')
    const fields = formatErrorForLog(classifyError(error))

    expect(fields).toMatchObject({
      error_category: 'validation',
      error_code: 'INVALID_QUERY',
      error_message: 'keyword must not be empty',
      error_status_code: 400,
      error_is_operational: true,
      error_is_retryable: false,
      error_name: 'InvalidQueryError',
    })
    expect(fields).not.toHaveProperty('error_details')
  })
})
