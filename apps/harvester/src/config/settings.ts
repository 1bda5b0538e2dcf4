/**
 * Harvester settings, parsed from the environment.
 *
 * Invalid values fail startup with the zod issues instead of falling back
 * silently.
 */

import { z } from 'zod'
import type { ILogger } from '@linktrawl/logger'
import { classifyError, formatErrorForLog } from '../lib/errors.js'
import { PROVIDER_TYPES } from '../scraper/types.js'
import type { ProviderType } from '../scraper/types.js'

const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value

const positiveInt = (fallback: number) =>
  z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(fallback))

const csv = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  )

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === '') return fallback
      return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase())
    })

const envSchema = z
  .object({
    PORT: positiveInt(8888),
    CHANNELS: csv.transform((channels) => (channels.length > 0 ? channels : ['tgsearchers2'])),
    CACHE_ENABLED: flag(true),
    /** Minutes */
    CACHE_TTL: positiveInt(60),
    /** Minutes */
    CACHE_CLEAR_INTERVAL: positiveInt(120),
    FETCH_TIMEOUT_MS: positiveInt(10_000),
    FETCH_MAX_ATTEMPTS: positiveInt(3),
    FETCH_INITIAL_DELAY_MS: positiveInt(500),
    FETCH_MAX_DELAY_MS: positiveInt(5000),
    FETCH_MAX_BODY_BYTES: positiveInt(5 * 1024 * 1024),
    CONCURRENCY_MIN: positiveInt(2),
    CONCURRENCY_MAX: positiveInt(16),
    CONCURRENCY: positiveInt(8),
    CONCURRENCY_LATENCY_THRESHOLD_MS: positiveInt(3000),
    CONCURRENCY_ADJUST_INTERVAL_MS: positiveInt(5000),
    BATCH_DEADLINE_MS: positiveInt(20_000),
    SEARCH_MAX_TARGETS: positiveInt(64),
    DENIED_PROVIDERS: csv.pipe(z.array(z.enum(PROVIDER_TYPES))),
    PROVIDER_TABLE_PATH: z.preprocess(blankAsUndefined, z.string().trim().optional()),
  })
  .refine((env) => env.CONCURRENCY_MIN <= env.CONCURRENCY_MAX, {
    message: 'CONCURRENCY_MIN must not exceed CONCURRENCY_MAX',
    path: ['CONCURRENCY_MIN'],
  })

export interface Settings {
  port: number
  channels: string[]
  cache: {
    enabled: boolean
    ttlMs: number
    clearIntervalMs: number
  }
  fetch: {
    timeoutMs: number
    maxAttempts: number
    initialDelayMs: number
    maxDelayMs: number
    maxBodyBytes: number
  }
  concurrency: {
    min: number
    max: number
    initial: number
    latencyThresholdMs: number
    intervalMs: number
  }
  search: {
    batchDeadlineMs: number
    maxTargets: number
  }
  deniedProviders: ProviderType[]
  providerTablePath?: string
}

const MINUTE_MS = 60_000

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.parse(env)

  return {
    port: parsed.PORT,
    channels: parsed.CHANNELS,
    cache: {
      enabled: parsed.CACHE_ENABLED,
      ttlMs: parsed.CACHE_TTL * MINUTE_MS,
      clearIntervalMs: parsed.CACHE_CLEAR_INTERVAL * MINUTE_MS,
    },
    fetch: {
      timeoutMs: parsed.FETCH_TIMEOUT_MS,
      maxAttempts: parsed.FETCH_MAX_ATTEMPTS,
      initialDelayMs: parsed.FETCH_INITIAL_DELAY_MS,
      maxDelayMs: parsed.FETCH_MAX_DELAY_MS,
      maxBodyBytes: parsed.FETCH_MAX_BODY_BYTES,
    },
    concurrency: {
      min: parsed.CONCURRENCY_MIN,
      max: parsed.CONCURRENCY_MAX,
      initial: Math.min(Math.max(parsed.CONCURRENCY, parsed.CONCURRENCY_MIN), parsed.CONCURRENCY_MAX),
      latencyThresholdMs: parsed.CONCURRENCY_LATENCY_THRESHOLD_MS,
      intervalMs: parsed.CONCURRENCY_ADJUST_INTERVAL_MS,
    },
    search: {
      batchDeadlineMs: parsed.BATCH_DEADLINE_MS,
      maxTargets: parsed.SEARCH_MAX_TARGETS,
    },
    deniedProviders: parsed.DENIED_PROVIDERS,
    providerTablePath: parsed.PROVIDER_TABLE_PATH,
  }
}

/**
 * Startup variant: logs the classified zod issues and exits on invalid
 * configuration.
 */
export function loadSettingsOrExit(
  log: ILogger,
  env: NodeJS.ProcessEnv = process.env,
  exit: (code: number) => never = process.exit
): Settings {
  try {
    return loadSettings(env)
  } catch (error) {
    log.error('Invalid configuration', formatErrorForLog(classifyError(error)))
    return exit(1)
  }
}
