/**
 * Link and result deduplication.
 *
 * Links collapse on canonical URL with first-seen metadata winning.
 * Results collapse on id, keeping the more complete record.
 */

import type { LinkRecord, ResourceResult } from '../types.js'
import type { ProviderTable } from '../extract/providers.js'
import { canonicalizeLinkUrl } from '../utils/url.js'

export interface DedupeLinksOptions {
  /** Supplies per-provider trailing-slash and credential-param rules */
  providers?: ProviderTable
}

export function canonicalLinkKey(record: LinkRecord, providers?: ProviderTable): string {
  const rule = providers?.get(record.providerType)
  return canonicalizeLinkUrl(record.url, {
    trailingSlash: rule?.trailingSlash,
    dropParams: rule?.credentialParams,
  })
}

/**
 * Unique by canonical URL, input order kept. Records whose canonical URL
 * is empty are rejected. Idempotent.
 */
export function dedupeLinks(
  records: readonly LinkRecord[],
  options: DedupeLinksOptions = {}
): LinkRecord[] {
  const seen = new Set<string>()
  const unique: LinkRecord[] = []

  for (const record of records) {
    const key = canonicalLinkKey(record, options.providers)
    if (!key || seen.has(key)) continue
    seen.add(key)
    unique.push(key === record.url ? record : { ...record, url: key })
  }

  return unique
}

/**
 * Higher is more complete: links first, then content, then title.
 */
export function completenessScore(result: ResourceResult): number {
  return (
    result.links.length * 100 +
    (result.content.trim() ? 10 : 0) +
    (result.title.trim() ? 1 : 0)
  )
}

/**
 * Merge results sharing an id. The more complete one wins (the earlier one
 * on ties) and the link sets are unioned with the winner's links first.
 */
export function mergeResults(
  results: readonly ResourceResult[],
  options: DedupeLinksOptions = {}
): ResourceResult[] {
  const byId = new Map<string, ResourceResult>()

  for (const result of results) {
    const existing = byId.get(result.id)
    if (!existing) {
      byId.set(result.id, result)
      continue
    }

    const [winner, loser] =
      completenessScore(result) > completenessScore(existing)
        ? [result, existing]
        : [existing, result]

    byId.set(result.id, {
      ...winner,
      links: dedupeLinks([...winner.links, ...loser.links], options),
    })
  }

  return [...byId.values()]
}
