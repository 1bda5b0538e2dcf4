/**
 * Structured logging helpers for search batches.
 *
 * Query strings can carry access codes (`?pwd=`), so URLs are logged as
 * host + path + hash only.
 */

import { createHash } from 'crypto'
import type { ILogger, LogContext } from '@linktrawl/logger'

export function sanitizeUrl(url?: string | null): {
  urlHost?: string
  urlPath?: string
  urlHash?: string
} {
  if (!url) return {}
  try {
    const parsed = new URL(url)
    return {
      urlHost: parsed.host,
      urlPath: parsed.pathname,
      urlHash: hashValue(`${parsed.host}${parsed.pathname}`),
    }
  } catch {
    return { urlHash: hashValue(url) }
  }
}

export function hashValue(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16)
}

/**
 * Emit a named event. The name doubles as the message so log search can key on it.
 */
export function logEvent(
  log: ILogger,
  level: 'debug' | 'info' | 'warn' | 'error',
  eventName: string,
  payload: LogContext = {},
  error?: unknown
): void {
  const meta = { event_name: eventName, ...compact(payload) }
  switch (level) {
    case 'debug':
      log.debug(eventName, meta)
      break
    case 'info':
      log.info(eventName, meta)
      break
    case 'warn':
      log.warn(eventName, meta, error)
      break
    case 'error':
      log.error(eventName, meta, error)
      break
  }
}

function compact(meta: LogContext): LogContext {
  const out: LogContext = {}
  for (const [key, value] of Object.entries(meta)) {
    if (value !== undefined) {
      out[key] = value
    }
  }
  return out
}
