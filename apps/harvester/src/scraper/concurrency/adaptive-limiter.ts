/**
 * Adaptive concurrency limiter.
 *
 * A semaphore whose capacity moves by `step` inside [min, max]: every
 * interval the mean latency of recently finished tasks is compared to a
 * threshold; slow → shrink, otherwise grow.
 */

import type { ILogger } from '@linktrawl/logger'
import { noopLogger } from '@linktrawl/logger'
import { AbortedError } from '../utils/async.js'

export interface AdaptiveLimiterOptions {
  min: number
  max: number
  initial: number
  step: number
  latencyThresholdMs: number
  intervalMs: number
  /** Most recent samples kept between adjustments */
  sampleWindow: number
}

export const DEFAULT_LIMITER_OPTIONS: AdaptiveLimiterOptions = {
  min: 2,
  max: 16,
  initial: 8,
  step: 1,
  latencyThresholdMs: 3000,
  intervalMs: 5000,
  sampleWindow: 50,
}

export type Release = () => void

export interface LimiterSnapshot {
  limit: number
  inFlight: number
  waiting: number
}

export class AdaptiveConcurrencyLimiter {
  private readonly options: AdaptiveLimiterOptions
  private readonly waiters: Array<() => void> = []
  private readonly samples: number[] = []
  private readonly log: ILogger
  private currentLimit: number
  private active = 0
  private timer?: NodeJS.Timeout

  constructor(options: Partial<AdaptiveLimiterOptions> = {}, logger: ILogger = noopLogger) {
    const merged = { ...DEFAULT_LIMITER_OPTIONS, ...options }
    const min = Math.max(1, Math.floor(merged.min))
    const max = Math.max(min, Math.floor(merged.max))
    this.options = {
      ...merged,
      min,
      max,
      step: Math.max(1, Math.floor(merged.step)),
      sampleWindow: Math.max(1, Math.floor(merged.sampleWindow)),
    }
    this.currentLimit = this.clamp(Math.floor(merged.initial))
    this.log = logger
  }

  get limit(): number {
    return this.currentLimit
  }

  snapshot(): LimiterSnapshot {
    return { limit: this.currentLimit, inFlight: this.active, waiting: this.waiters.length }
  }

  /**
   * Wait for a slot. The returned release is idempotent.
   */
  async acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) {
      throw new AbortedError('Aborted while waiting for a concurrency slot')
    }

    if (this.active < this.currentLimit && this.waiters.length === 0) {
      this.active += 1
      return this.createRelease()
    }

    return await new Promise<Release>((resolve, reject) => {
      const onAbort = () => {
        this.removeWaiter(notify)
        reject(new AbortedError('Aborted while waiting for a concurrency slot'))
      }

      const notify = () => {
        signal?.removeEventListener('abort', onAbort)
        this.active += 1
        resolve(this.createRelease())
      }

      signal?.addEventListener('abort', onAbort, { once: true })
      this.waiters.push(notify)
    })
  }

  /**
   * Acquire, run, record latency, release; release happens even if the task throws.
   */
  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal)
    const startedAt = Date.now()
    try {
      return await task()
    } finally {
      this.recordLatency(Date.now() - startedAt)
      release()
    }
  }

  recordLatency(ms: number): void {
    this.samples.push(ms)
    if (this.samples.length > this.options.sampleWindow) {
      this.samples.splice(0, this.samples.length - this.options.sampleWindow)
    }
  }

  /**
   * One adjustment step. No samples → no change. Returns the new limit.
   */
  adjust(): number {
    if (this.samples.length === 0) {
      return this.currentLimit
    }

    const mean = this.samples.reduce((sum, ms) => sum + ms, 0) / this.samples.length
    this.samples.length = 0

    const previous = this.currentLimit
    const next =
      mean > this.options.latencyThresholdMs
        ? this.clamp(previous - this.options.step)
        : this.clamp(previous + this.options.step)

    if (next !== previous) {
      this.currentLimit = next
      this.log.debug('Concurrency limit adjusted', {
        from: previous,
        to: next,
        meanLatencyMs: Math.round(mean),
      })
      this.drain()
    }

    return this.currentLimit
  }

  start(): void {
    if (this.timer) return
    this.timer = setInterval(() => this.adjust(), this.options.intervalMs)
    this.timer.unref()
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = undefined
    }
  }

  private clamp(value: number): number {
    return Math.min(this.options.max, Math.max(this.options.min, value))
  }

  private createRelease(): Release {
    let released = false
    return () => {
      if (released) return
      released = true
      this.active -= 1
      this.drain()
    }
  }

  private drain(): void {
    while (this.active < this.currentLimit) {
      const next = this.waiters.shift()
      if (!next) return
      next()
    }
  }

  private removeWaiter(waiter: () => void): void {
    const idx = this.waiters.indexOf(waiter)
    if (idx >= 0) {
      this.waiters.splice(idx, 1)
    }
  }
}
