/**
 * Harvester entry point
 *
 * Wires settings, provider table, fetcher, limiter, cache and sources into
 * the search orchestrator and serves it over HTTP.
 */

// Load environment variables first - this MUST be the first import
import './env.js'

import { loadSettingsOrExit } from './config/settings.js'
import { loggers, rootLogger } from './config/logger.js'
import { registerBuiltinSources } from './scraper/adapters/index.js'
import { AdaptiveConcurrencyLimiter } from './scraper/concurrency/adaptive-limiter.js'
import { ResultCache } from './scraper/cache/result-cache.js'
import { loadProviderTable } from './scraper/extract/providers.js'
import { HttpFetcher } from './scraper/fetch/http-fetcher.js'
import { SearchOrchestrator } from './scraper/orchestrator.js'
import { getSourceRegistry } from './scraper/registry.js'
import { DEFAULT_RETRY_POLICY } from './scraper/types.js'
import type { ResourceResult } from './scraper/types.js'
import { createApp } from './server/app.js'

const log = loggers.server

const settings = loadSettingsOrExit(log)
const providers = loadProviderTable(settings.providerTablePath)

const registry = getSourceRegistry()
registerBuiltinSources(registry, { channels: settings.channels })

const fetcher = new HttpFetcher({
  retryPolicy: {
    ...DEFAULT_RETRY_POLICY,
    maxAttempts: settings.fetch.maxAttempts,
    initialDelayMs: settings.fetch.initialDelayMs,
    maxDelayMs: settings.fetch.maxDelayMs,
  },
  defaultTimeoutMs: settings.fetch.timeoutMs,
  defaultMaxSizeBytes: settings.fetch.maxBodyBytes,
  logger: loggers.fetch,
})

const limiter = new AdaptiveConcurrencyLimiter(
  {
    min: settings.concurrency.min,
    max: settings.concurrency.max,
    initial: settings.concurrency.initial,
    latencyThresholdMs: settings.concurrency.latencyThresholdMs,
    intervalMs: settings.concurrency.intervalMs,
  },
  loggers.concurrency
)

const cache = settings.cache.enabled
  ? new ResultCache<ResourceResult[]>({
      ttlMs: settings.cache.ttlMs,
      clearIntervalMs: settings.cache.clearIntervalMs,
      logger: loggers.cache,
    })
  : undefined

const orchestrator = new SearchOrchestrator({
  fetcher,
  registry,
  providers,
  limiter,
  cache,
  defaults: {
    batchDeadlineMs: settings.search.batchDeadlineMs,
    maxTargets: settings.search.maxTargets,
    fetchTimeoutMs: settings.fetch.timeoutMs,
    deniedTypes: settings.deniedProviders,
  },
  logger: loggers.search,
})

limiter.start()
cache?.start()

const app = createApp({ orchestrator, registry, logger: rootLogger })

const server = app.listen(settings.port, () => {
  log.info('Harvester listening', {
    port: settings.port,
    sources: registry.list().map((adapter) => adapter.id),
    channels: settings.channels,
    providers: providers.types(),
    cacheEnabled: settings.cache.enabled,
  })
})

let isShuttingDown = false

function shutdown(signal: string): void {
  if (isShuttingDown) return
  isShuttingDown = true

  log.info('Shutting down', { signal })
  limiter.stop()
  cache?.stop()

  server.close((error) => {
    if (error) {
      log.error('Error during shutdown', {}, error)
      process.exit(1)
    }
    log.info('Shutdown complete')
    process.exit(0)
  })
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
