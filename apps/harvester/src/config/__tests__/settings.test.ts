import { describe, it, expect, vi } from 'vitest'
import { ZodError } from 'zod'
import type { ILogger } from '@linktrawl/logger'
import { loadSettings, loadSettingsOrExit } from '../settings.js'

describe('loadSettings', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadSettings({})).toEqual({
      port: 8888,
      channels: ['tgsearchers2'],
      cache: { enabled: true, ttlMs: 3_600_000, clearIntervalMs: 7_200_000 },
      fetch: {
        timeoutMs: 10_000,
        maxAttempts: 3,
        initialDelayMs: 500,
        maxDelayMs: 5000,
        maxBodyBytes: 5_242_880,
      },
      concurrency: { min: 2, max: 16, initial: 8, latencyThresholdMs: 3000, intervalMs: 5000 },
      search: { batchDeadlineMs: 20_000, maxTargets: 64 },
      deniedProviders: [],
      providerTablePath: undefined,
    })
  })

  it('reads overrides', () => {
    const settings = loadSettings({
      PORT: '9000',
      CHANNELS: ' alpha, beta ,,',
      CACHE_ENABLED: 'off',
      CACHE_TTL: '5',
      DENIED_PROVIDERS: 'magnet, ed2k',
      PROVIDER_TABLE_PATH: ' /etc/providers.json ',
    })

    expect(settings.port).toBe(9000)
    expect(settings.channels).toEqual(['alpha', 'beta'])
    expect(settings.cache.enabled).toBe(false)
    expect(settings.cache.ttlMs).toBe(300_000)
    expect(settings.deniedProviders).toEqual(['magnet', 'ed2k'])
    expect(settings.providerTablePath).toBe('/etc/providers.json')
  })

  it('treats blank values as unset', () => {
    const settings = loadSettings({ PORT: '', CACHE_ENABLED: ' ', CHANNELS: '' })

    expect(settings.port).toBe(8888)
    expect(settings.cache.enabled).toBe(true)
    expect(settings.channels).toEqual(['tgsearchers2'])
  })

  it('clamps the initial concurrency into its bounds', () => {
    expect(loadSettings({ CONCURRENCY: '100' }).concurrency.initial).toBe(16)
    expect(loadSettings({ CONCURRENCY: '1' }).concurrency.initial).toBe(2)
  })

  it('rejects invalid values', () => {
    expect(() => loadSettings({ PORT: 'abc' })).toThrow(ZodError)
    expect(() => loadSettings({ DENIED_PROVIDERS: 'dropbox' })).toThrow(ZodError)
    expect(() => loadSettings({ CONCURRENCY_MIN: '8', CONCURRENCY_MAX: '4' })).toThrow(
      'CONCURRENCY_MIN must not exceed CONCURRENCY_MAX'
    )
  })
})

describe('loadSettingsOrExit', () => {
  function spyLogger(): ILogger {
    const logger: ILogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      fatal: vi.fn(),
      child: () => logger,
    }
    return logger
  }

  const exit = (code: number): never => {
    throw new Error(`exit ${code}`)
  }

  it('returns settings when the environment is valid', () => {
    const log = spyLogger()

    expect(loadSettingsOrExit(log, { PORT: '9000' }, exit).port).toBe(9000)
    expect(log.error).not.toHaveBeenCalled()
  })

  it('logs the classified issues and exits with 1', () => {
    const log = spyLogger()

    expect(() => loadSettingsOrExit(log, { PORT: 'abc' }, exit)).toThrow('exit 1')
    expect(log.error).toHaveBeenCalledWith(
      'Invalid configuration',
      expect.objectContaining({
        error_code: 'VALIDATION_FAILED',
        error_details: {
          issues: [expect.objectContaining({ path: 'PORT', code: 'invalid_type' })],
        },
      })
    )
  })
})
