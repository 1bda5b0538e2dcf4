/**
 * Response envelope shared by every API route: `code` 0 means success,
 * otherwise it carries the HTTP status.
 */

export interface Envelope<T> {
  code: number
  message: string
  data?: T
}

export function success<T>(data: T): Envelope<T> {
  return { code: 0, message: 'success', data }
}

export function failure<T>(statusCode: number, message: string, data?: T): Envelope<T> {
  return data === undefined ? { code: statusCode, message } : { code: statusCode, message, data }
}
