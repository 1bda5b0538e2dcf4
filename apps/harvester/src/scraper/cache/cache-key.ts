import { createHash } from 'crypto'
import type { ProviderType } from '../types.js'

export interface CacheKeyParts {
  keyword: string
  sources: readonly string[]
  channels?: readonly string[]
  deniedTypes: readonly ProviderType[]
  maxTargets: number
  filterByKeyword: boolean
}

export function normalizeKeyword(keyword: string): string {
  return keyword.trim().toLowerCase().replace(/\s+/g, ' ')
}

/**
 * Same query identity → same key, regardless of list order or keyword spacing/case.
 */
export function buildSearchCacheKey(parts: CacheKeyParts): string {
  const identity = JSON.stringify({
    kw: normalizeKeyword(parts.keyword),
    sources: [...new Set(parts.sources)].sort(),
    channels: [...new Set(parts.channels ?? [])].sort(),
    denied: [...new Set(parts.deniedTypes)].sort(),
    targets: parts.maxTargets,
    filter: parts.filterByKeyword,
  })
  return `search:${createHash('sha256').update(identity).digest('hex').slice(0, 32)}`
}
