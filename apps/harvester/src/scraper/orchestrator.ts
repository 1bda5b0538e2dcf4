/**
 * Search Orchestrator
 *
 * One search call: cache lookup, fan-out over every target page under the
 * adaptive limiter, per-document extraction, cross-document merge, cache
 * write. A failing page never aborts the batch; only a batch in which every
 * page failed is an error.
 */

import type { ILogger } from '@linktrawl/logger'
import { noopLogger } from '@linktrawl/logger'
import type { AdaptiveConcurrencyLimiter } from './concurrency/adaptive-limiter.js'
import type { ResultCache } from './cache/result-cache.js'
import { buildSearchCacheKey, normalizeKeyword } from './cache/cache-key.js'
import { extractLinkRecords } from './extract/document.js'
import type { ProviderTable } from './extract/providers.js'
import {
  BatchFailedError,
  FetchError,
  InvalidQueryError,
  ParseError,
  describeCause,
} from './errors.js'
import type { DocumentFailure } from './errors.js'
import { mergeResults } from './process/dedupe.js'
import { rankResults } from './process/ranking.js'
import type {
  Fetcher,
  ProviderType,
  ResourceResult,
  SearchTarget,
  SourceAdapter,
  SourceEntry,
  SourceRegistry,
  TargetScope,
} from './types.js'
import { PROVIDER_TYPES } from './types.js'
import { logEvent, sanitizeUrl } from '../config/structured-log.js'

export interface SearchQuery {
  keyword: string
  /** Source ids; all registered sources when omitted */
  sources?: string[]
  /** Channel override for channel-based sources */
  channels?: string[]
  /** When set, every other provider type is denied */
  enabledTypes?: ProviderType[]
  deniedTypes?: ProviderType[]
  /** Cap on target pages fetched */
  maxTargets?: number
  maxResults?: number
  forceRefresh?: boolean
  /** Require every keyword term in title or content. Default true */
  filterByKeyword?: boolean
  deadlineMs?: number
}

export interface SearchStats {
  targets: number
  succeeded: number
  failed: number
  cancelled: number
  durationMs: number
}

export interface SearchOutcome {
  results: ResourceResult[]
  fromCache: boolean
  timedOut: boolean
  failures: DocumentFailure[]
  stats: SearchStats
}

export interface OrchestratorDefaults {
  batchDeadlineMs: number
  maxTargets: number
  fetchTimeoutMs: number
  /** Denied for every query, on top of per-query toggles */
  deniedTypes: ProviderType[]
}

export interface SearchOrchestratorDeps {
  fetcher: Fetcher
  registry: SourceRegistry
  providers: ProviderTable
  limiter: AdaptiveConcurrencyLimiter
  /** Omit to disable caching */
  cache?: ResultCache<ResourceResult[]>
  defaults?: Partial<OrchestratorDefaults>
  logger?: ILogger
  /** Clock for freshness ranking. Defaults to Date.now */
  now?: () => number
}

const DEFAULTS: OrchestratorDefaults = {
  batchDeadlineMs: 20_000,
  maxTargets: 64,
  fetchTimeoutMs: 10_000,
  deniedTypes: [],
}

type TargetOutcome =
  | { status: 'ok'; index: number; results: ResourceResult[] }
  | { status: 'failed'; index: number; failure: DocumentFailure }
  | { status: 'cancelled'; index: number }

interface PlannedTarget {
  index: number
  adapter: SourceAdapter
  target: SearchTarget
}

export function matchesKeyword(result: ResourceResult, keyword: string): boolean {
  const terms = normalizeKeyword(keyword).split(' ').filter(Boolean)
  const haystack = `${result.title}\n${result.content}`.toLowerCase()
  return terms.every((term) => haystack.includes(term))
}

export class SearchOrchestrator {
  private readonly defaults: OrchestratorDefaults
  private readonly log: ILogger

  constructor(private readonly deps: SearchOrchestratorDeps) {
    this.defaults = { ...DEFAULTS, ...deps.defaults }
    this.log = deps.logger ?? noopLogger
  }

  async search(query: SearchQuery): Promise<SearchOutcome> {
    const startedAt = Date.now()
    const keyword = query.keyword.trim()
    if (!keyword) {
      throw new InvalidQueryError('keyword must not be empty')
    }

    const adapters = this.selectAdapters(query.sources)
    const deniedTypes = this.resolveDeniedTypes(query)
    const maxTargets = query.maxTargets ?? this.defaults.maxTargets
    const filterByKeyword = query.filterByKeyword ?? true
    const cacheKey = buildSearchCacheKey({
      keyword,
      sources: adapters.map((a) => a.id),
      channels: query.channels,
      deniedTypes,
      maxTargets,
      filterByKeyword,
    })

    if (this.deps.cache && !query.forceRefresh) {
      const cached = this.deps.cache.get(cacheKey)
      if (cached) {
        logEvent(this.log, 'debug', 'SEARCH_CACHE_HIT', { cacheKey, results: cached.length })
        return {
          results: this.limitResults(cached, query.maxResults),
          fromCache: true,
          timedOut: false,
          failures: [],
          stats: { targets: 0, succeeded: 0, failed: 0, cancelled: 0, durationMs: Date.now() - startedAt },
        }
      }
    }

    const planned = this.planTargets(adapters, keyword, { channels: query.channels }, maxTargets)
    const { outcomes, timedOut } = await this.runBatch(
      planned,
      keyword,
      deniedTypes,
      query.deadlineMs ?? this.defaults.batchDeadlineMs
    )

    const succeeded = outcomes.filter((o) => o.status === 'ok')
    const failures = outcomes.flatMap((o) => (o.status === 'failed' ? [o.failure] : []))
    const cancelled = planned.length - succeeded.length - failures.length
    const stats: SearchStats = {
      targets: planned.length,
      succeeded: succeeded.length,
      failed: failures.length,
      cancelled,
      durationMs: Date.now() - startedAt,
    }

    if (planned.length > 0 && failures.length === planned.length) {
      logEvent(this.log, 'error', 'SEARCH_BATCH_FAILED', { ...stats })
      throw new BatchFailedError(failures)
    }

    const merged = mergeResults(
      succeeded.flatMap((o) => o.results),
      { providers: this.deps.providers }
    )
    const results = rankResults(
      merged
        .filter((result) => result.links.length > 0)
        .filter((result) => !filterByKeyword || matchesKeyword(result, keyword)),
      (this.deps.now ?? Date.now)()
    )

    if (this.deps.cache && !timedOut) {
      this.deps.cache.store(cacheKey, results)
    }

    logEvent(this.log, 'info', 'SEARCH_BATCH_COMPLETED', {
      ...stats,
      results: results.length,
      timedOut,
    })

    return {
      results: this.limitResults(results, query.maxResults),
      fromCache: false,
      timedOut,
      failures,
      stats,
    }
  }

  private selectAdapters(sources: string[] | undefined): SourceAdapter[] {
    if (!sources || sources.length === 0) {
      return this.deps.registry.list()
    }

    const selected: SourceAdapter[] = []
    for (const id of new Set(sources)) {
      const adapter = this.deps.registry.get(id)
      if (!adapter) {
        throw new InvalidQueryError(`Unknown source '${id}'`)
      }
      selected.push(adapter)
    }
    return selected
  }

  private resolveDeniedTypes(query: SearchQuery): ProviderType[] {
    const denied = new Set<ProviderType>([...this.defaults.deniedTypes, ...(query.deniedTypes ?? [])])
    if (query.enabledTypes && query.enabledTypes.length > 0) {
      const enabled = new Set(query.enabledTypes)
      for (const type of PROVIDER_TYPES) {
        if (!enabled.has(type)) denied.add(type)
      }
    }
    return [...denied].sort()
  }

  private planTargets(
    adapters: SourceAdapter[],
    keyword: string,
    scope: TargetScope,
    maxTargets: number
  ): PlannedTarget[] {
    const planned: PlannedTarget[] = []
    for (const adapter of adapters) {
      for (const target of adapter.buildTargets(keyword, scope)) {
        if (planned.length >= maxTargets) return planned
        planned.push({ index: planned.length, adapter, target })
      }
    }
    return planned
  }

  /**
   * Runs every target; settles when all are done or the deadline passes,
   * whichever comes first. Never rejects.
   */
  private async runBatch(
    planned: PlannedTarget[],
    keyword: string,
    deniedTypes: ProviderType[],
    deadlineMs: number
  ): Promise<{ outcomes: TargetOutcome[]; timedOut: boolean }> {
    const controller = new AbortController()
    const outcomes: TargetOutcome[] = []
    let timedOut = false
    let deadlineTimer: NodeJS.Timeout | undefined

    const all = Promise.all(
      planned.map(async (item) => {
        const outcome = await this.runTarget(item, keyword, deniedTypes, controller.signal)
        if (!timedOut) {
          outcomes.push(outcome)
        }
      })
    )

    const deadline = new Promise<void>((resolve) => {
      deadlineTimer = setTimeout(() => {
        timedOut = true
        controller.abort()
        resolve()
      }, deadlineMs)
    })

    try {
      await Promise.race([all, deadline])
    } finally {
      clearTimeout(deadlineTimer)
    }

    if (timedOut) {
      logEvent(this.log, 'warn', 'SEARCH_BATCH_DEADLINE', {
        deadlineMs,
        completed: outcomes.length,
        pending: planned.length - outcomes.length,
      })
    }

    return {
      outcomes: [...outcomes].sort((a, b) => a.index - b.index),
      timedOut,
    }
  }

  private async runTarget(
    item: PlannedTarget,
    keyword: string,
    deniedTypes: ProviderType[],
    signal: AbortSignal
  ): Promise<TargetOutcome> {
    const { adapter, target, index } = item

    try {
      const results = await this.deps.limiter.run(async () => {
        const response = await this.deps.fetcher.fetch({
          url: target.url,
          method: target.method,
          headers: target.headers,
          body: target.body,
          timeoutMs: this.defaults.fetchTimeoutMs,
          signal,
        })
        return this.extractResults(adapter, target, response.body, keyword, deniedTypes)
      }, signal)
      return { status: 'ok', index, results }
    } catch (error) {
      if (signal.aborted) {
        return { status: 'cancelled', index }
      }

      const failure: DocumentFailure = {
        source: adapter.id,
        target: target.url,
        error: error instanceof FetchError || error instanceof ParseError
          ? error
          : new ParseError(adapter.id, target.url, error),
      }
      logEvent(
        this.log,
        'warn',
        'SEARCH_TARGET_FAILED',
        { source: adapter.id, ...sanitizeUrl(target.url), cause: describeCause(failure.error) }
      )
      return { status: 'failed', index, failure }
    }
  }

  private extractResults(
    adapter: SourceAdapter,
    target: SearchTarget,
    body: string,
    keyword: string,
    deniedTypes: ProviderType[]
  ): ResourceResult[] {
    let entries: SourceEntry[]
    try {
      entries = adapter.parse(body, target, {
        keyword,
        logger: this.log.child(adapter.id),
      })
    } catch (error) {
      throw new ParseError(adapter.id, target.url, error)
    }

    const results: ResourceResult[] = []
    for (const entry of entries) {
      const links = extractLinkRecords(entry.text, this.deps.providers, { deniedTypes })
      if (links.length === 0) continue
      results.push({
        id: entry.id,
        source: adapter.id,
        title: entry.title,
        content: entry.content,
        timestamp: entry.timestamp,
        links,
      })
    }
    return results
  }

  private limitResults(results: ResourceResult[], maxResults: number | undefined): ResourceResult[] {
    return maxResults !== undefined && maxResults >= 0 ? results.slice(0, maxResults) : [...results]
  }
}
