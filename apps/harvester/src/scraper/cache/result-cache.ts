/**
 * In-process TTL cache for finalized search results.
 *
 * Entries expire individually on read. On top of that the whole cache is
 * wiped on a fixed interval; there is no per-key LRU.
 */

import type { ILogger } from '@linktrawl/logger'
import { noopLogger } from '@linktrawl/logger'

export interface CacheEntry<T> {
  key: string
  value: T
  storedAt: number
  ttlMs: number
}

export interface ResultCacheOptions {
  ttlMs: number
  /** Wholesale clear period; 0 disables the timer */
  clearIntervalMs?: number
  now?: () => number
  logger?: ILogger
}

export class ResultCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>()
  private readonly ttlMs: number
  private readonly clearIntervalMs: number
  private readonly now: () => number
  private readonly log: ILogger
  private timer?: NodeJS.Timeout

  constructor(options: ResultCacheOptions) {
    if (!(options.ttlMs > 0)) {
      throw new Error(`Cache ttlMs must be positive, got ${options.ttlMs}`)
    }
    this.ttlMs = options.ttlMs
    this.clearIntervalMs = options.clearIntervalMs ?? 0
    this.now = options.now ?? Date.now
    this.log = options.logger ?? noopLogger
  }

  /**
   * Hit only while `now − storedAt < ttl`. Stale entries are removed.
   */
  get(key: string): T | undefined {
    const entry = this.entries.get(key)
    if (!entry) return undefined

    if (this.now() - entry.storedAt >= entry.ttlMs) {
      this.entries.delete(key)
      return undefined
    }
    return entry.value
  }

  store(key: string, value: T, ttlMs: number = this.ttlMs): void {
    this.entries.set(key, { key, value, storedAt: this.now(), ttlMs })
  }

  clear(): void {
    const cleared = this.entries.size
    this.entries.clear()
    if (cleared > 0) {
      this.log.debug('Cache cleared', { entries: cleared })
    }
  }

  size(): number {
    return this.entries.size
  }

  start(): void {
    if (this.timer || this.clearIntervalMs <= 0) return
    this.timer = setInterval(() => this.clear(), this.clearIntervalMs)
    this.timer.unref()
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = undefined
    }
  }
}
