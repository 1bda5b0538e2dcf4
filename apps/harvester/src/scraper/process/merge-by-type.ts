/**
 * Groups the links of a result set by provider type.
 *
 * A URL appears once across all groups. When several results carry it, the
 * newest result supplies password, note and datetime; the position is that
 * of its first appearance.
 */

import { normalizeKeyword } from '../cache/cache-key.js'
import { extractLinkTitles, findLinkTitle } from '../extract/link-titles.js'
import type { ProviderType, ResourceResult } from '../types.js'

export interface MergedLink {
  url: string
  password: string
  /** Title of the link inside its post, else the post title */
  note: string
  datetime: string
  source: string
}

export type MergedLinksByType = Partial<Record<ProviderType, MergedLink[]>>

export interface MergeByTypeOptions {
  /** Keep only links whose note holds every term */
  keyword?: string
}

export function mergeResultsByType(
  results: readonly ResourceResult[],
  options: MergeByTypeOptions = {}
): MergedLinksByType {
  const terms = options.keyword ? normalizeKeyword(options.keyword).split(' ').filter(Boolean) : []
  const order: Array<{ url: string; type: ProviderType }> = []
  const byUrl = new Map<string, MergedLink>()

  for (const result of results) {
    const titles = extractLinkTitles(result.content)
    for (const link of result.links) {
      const note = findLinkTitle(titles, link.url) ?? result.title
      const lowered = note.toLowerCase()
      if (!terms.every((term) => lowered.includes(term))) continue

      const candidate: MergedLink = {
        url: link.url,
        password: link.password ?? '',
        note,
        datetime: result.timestamp,
        source: result.source,
      }

      const existing = byUrl.get(link.url)
      if (!existing) {
        byUrl.set(link.url, candidate)
        order.push({ url: link.url, type: link.providerType })
      } else if (Date.parse(candidate.datetime) > Date.parse(existing.datetime)) {
        byUrl.set(link.url, candidate)
      }
    }
  }

  const grouped: MergedLinksByType = {}
  for (const { url, type } of order) {
    const merged = byUrl.get(url)
    if (!merged) continue
    const bucket = grouped[type] ?? []
    bucket.push(merged)
    grouped[type] = bucket
  }
  return grouped
}

export function countMergedLinks(grouped: MergedLinksByType): number {
  return Object.values(grouped).reduce((sum, links) => sum + (links?.length ?? 0), 0)
}
