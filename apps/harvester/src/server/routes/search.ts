import { Router } from 'express'
import type { Request, Response, NextFunction, Router as RouterType } from 'express'
import { z } from 'zod'
import type { ILogger } from '@linktrawl/logger'
import { FetchError, describeCause } from '../../scraper/errors.js'
import type { DocumentFailure } from '../../scraper/errors.js'
import type { SearchOrchestrator, SearchOutcome } from '../../scraper/orchestrator.js'
import { countMergedLinks, mergeResultsByType } from '../../scraper/process/merge-by-type.js'
import type { MergedLinksByType } from '../../scraper/process/merge-by-type.js'
import { PROVIDER_TYPES } from '../../scraper/types.js'
import type { ResourceResult } from '../../scraper/types.js'
import { success } from '../envelope.js'

// ============================================================================
// Request schema
// ============================================================================

/**
 * Query strings give csv; JSON bodies give arrays. Both end up as a trimmed
 * list without empty items, or undefined.
 */
function splitList(value: unknown): unknown {
  if (value === undefined || value === null) return undefined
  const raw: unknown[] = Array.isArray(value) ? value : [value]
  const items = raw.flatMap((item) =>
    typeof item === 'string'
      ? item.split(',').map((part) => part.trim()).filter(Boolean)
      : [item]
  )
  return items.length > 0 ? items : undefined
}

function parseFlag(value: unknown): unknown {
  if (typeof value !== 'string') return value
  const normalized = value.trim().toLowerCase()
  if (normalized === '') return undefined
  if (['true', '1', 'yes'].includes(normalized)) return true
  if (['false', '0', 'no'].includes(normalized)) return false
  return value
}

function blankAsUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value
}

export const RESULT_MODES = ['results', 'merge', 'all'] as const
export type ResultMode = (typeof RESULT_MODES)[number]

export const searchRequestSchema = z.object({
  kw: z.string({ required_error: 'kw is required' }).trim().min(1, 'kw is required'),
  channels: z.preprocess(splitList, z.array(z.string()).optional()),
  cloud_types: z.preprocess(splitList, z.array(z.enum(PROVIDER_TYPES)).optional()),
  res: z.preprocess(blankAsUndefined, z.enum(RESULT_MODES).default('merge')),
  refresh: z.preprocess(parseFlag, z.boolean().default(false)),
  max_results: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().max(1000).optional()),
  filter: z.preprocess(parseFlag, z.boolean().default(true)),
})

export type SearchRequest = z.infer<typeof searchRequestSchema>

// ============================================================================
// Response shaping
// ============================================================================

interface SearchResultView {
  message_id: string
  source: string
  title: string
  content: string
  datetime: string
  links: Array<{ type: string; url: string; password: string }>
}

interface FailureView {
  source: string
  url: string
  kind: string
  error: string
}

export interface SearchResponseData {
  total: number
  results?: SearchResultView[]
  merged_by_type?: MergedLinksByType
  timed_out: boolean
  from_cache: boolean
  failures: FailureView[]
}

function toResultView(result: ResourceResult): SearchResultView {
  return {
    message_id: result.id,
    source: result.source,
    title: result.title,
    content: result.content,
    datetime: result.timestamp,
    links: result.links.map((link) => ({
      type: link.providerType,
      url: link.url,
      password: link.password ?? '',
    })),
  }
}

function toFailureView(failure: DocumentFailure): FailureView {
  return {
    source: failure.source,
    url: failure.target,
    kind: failure.error instanceof FetchError ? failure.error.kind : failure.error.reason,
    error: describeCause(failure.error),
  }
}

/**
 * `linkKeyword` narrows merged links to those whose own title matches.
 */
export function buildSearchResponse(
  outcome: SearchOutcome,
  mode: ResultMode,
  linkKeyword?: string
): SearchResponseData {
  const mergeOptions = { keyword: linkKeyword }
  const base = {
    timed_out: outcome.timedOut,
    from_cache: outcome.fromCache,
    failures: outcome.failures.map(toFailureView),
  }

  if (mode === 'merge') {
    const merged = mergeResultsByType(outcome.results, mergeOptions)
    return { total: countMergedLinks(merged), merged_by_type: merged, ...base }
  }

  const results = outcome.results.map(toResultView)
  if (mode === 'results') {
    return { total: results.length, results, ...base }
  }
  return {
    total: results.length,
    results,
    merged_by_type: mergeResultsByType(outcome.results, mergeOptions),
    ...base,
  }
}

// ============================================================================
// Router
// ============================================================================

export function createSearchRouter(orchestrator: SearchOrchestrator, log: ILogger): RouterType {
  const router: RouterType = Router()

  async function handleSearch(input: unknown, res: Response): Promise<void> {
    const request = searchRequestSchema.parse(input)

    const outcome = await orchestrator.search({
      keyword: request.kw,
      channels: request.channels,
      enabledTypes: request.cloud_types,
      forceRefresh: request.refresh,
      maxResults: request.max_results,
      filterByKeyword: request.filter,
    })

    log.debug('Search served', {
      mode: request.res,
      results: outcome.results.length,
      fromCache: outcome.fromCache,
      timedOut: outcome.timedOut,
    })

    res.json(success(buildSearchResponse(outcome, request.res, request.filter ? request.kw : undefined)))
  }

  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    handleSearch(req.query, res).catch(next)
  })

  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    handleSearch(req.body, res).catch(next)
  })

  return router
}
