/**
 * HTTP Request Logger Middleware
 *
 * One structured entry per request, written when the response finishes.
 * Event name: http.request.end
 */

import type { Request, Response, NextFunction, ErrorRequestHandler, RequestHandler } from 'express'
import type { ILogger } from '@linktrawl/logger'
import { classifyError, formatErrorForLog } from '../../lib/errors.js'

const SKIP_PATHS = new Set(['/health', '/favicon.ico'])

function calculateLatencyMs(startTime: bigint): number {
  const latencyNs = process.hrtime.bigint() - startTime
  return Math.round((Number(latencyNs) / 1_000_000) * 100) / 100
}

export function requestLoggerMiddleware(log: ILogger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (SKIP_PATHS.has(req.path)) {
      return next()
    }

    const startTime = process.hrtime.bigint()

    res.on('finish', () => {
      const logEntry = {
        event_name: 'http.request.end',
        http: {
          method: req.method,
          path: req.path,
          status_code: res.statusCode,
          latency_ms: calculateLatencyMs(startTime),
        },
      }

      if (res.statusCode >= 500) {
        log.error('Request completed with error', logEntry)
      } else if (res.statusCode >= 400) {
        log.warn('Request completed with client error', logEntry)
      } else {
        log.info('Request completed', logEntry)
      }
    })

    next()
  }
}

/**
 * Logs the classified error, then hands it to the final handler.
 */
export function errorLoggerMiddleware(log: ILogger): ErrorRequestHandler {
  return (err: unknown, req: Request, _res: Response, next: NextFunction): void => {
    const classified = classifyError(err)
    const entry = {
      event_name: 'http.request.error',
      http: { method: req.method, path: req.path },
      ...formatErrorForLog(classified),
    }

    if (classified.isOperational) {
      log.warn('Request failed', entry)
    } else {
      log.error('Unhandled error', entry)
    }

    next(err)
  }
}
