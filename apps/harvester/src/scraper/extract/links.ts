/**
 * Link extraction.
 *
 * Scans raw text with every provider pattern and returns positioned
 * candidates, ordered by position, with no two candidates overlapping.
 */

import type { CandidateLink, ProviderRule, ProviderType } from '../types.js'
import type { ProviderTable } from './providers.js'
import { matchesCredentialRule } from './providers.js'
import { getQueryParam } from '../utils/url.js'

export interface ExtractLinksOptions {
  /** Links of these types are dropped here, before association */
  deniedTypes?: ReadonlySet<ProviderType> | readonly ProviderType[]
}

/** Trailing characters that are never part of a share URL */
const TRAILING_PUNCTUATION = new Set([
  '.', ',', ';', ':', '!', '?', ')', ']', '}', '>', '<', '(', '[', '{', '"', "'", '`', '&', '|',
  '。', '，', '；', '：', '！', '？', '）', '】', '》', '」', '』', '、', '…', '“', '”', '‘', '’',
])

/** Leftovers of HTML entities glued to the end of a URL */
const TRAILING_ENTITY = /&(?:amp|nbsp|quot|lt|gt|#\d+|#x[0-9a-f]+);?$/i

export function trimLinkArtifacts(raw: string): string {
  let url = raw
  let changed = true
  while (changed && url.length > 0) {
    changed = false
    const entity = TRAILING_ENTITY.exec(url)
    if (entity) {
      url = url.slice(0, entity.index)
      changed = true
      continue
    }
    const last = url[url.length - 1]
    if (TRAILING_PUNCTUATION.has(last) && !isEd2kTerminator(url)) {
      url = url.slice(0, -1)
      changed = true
    }
  }
  return url
}

/** ed2k links legitimately end in `|/` */
function isEd2kTerminator(url: string): boolean {
  return url.startsWith('ed2k://') && url.endsWith('|')
}

export function extractLinks(
  text: string,
  providers: ProviderTable,
  options: ExtractLinksOptions = {}
): CandidateLink[] {
  const denied = new Set(options.deniedTypes ?? [])
  const matches: CandidateLink[] = []

  for (const rule of providers.rules) {
    if (denied.has(rule.type)) continue

    const pattern = new RegExp(rule.pattern.source, withGlobal(rule.pattern.flags))
    for (const match of text.matchAll(pattern)) {
      const start = match.index ?? 0
      const url = trimLinkArtifacts(match[0])
      if (!url) continue

      const candidate: CandidateLink = {
        type: rule.type,
        url,
        start,
        end: start + url.length,
      }
      const inline = findInlineCredential(url, rule)
      if (inline) {
        candidate.inlineCredential = inline
      }
      matches.push(candidate)
    }
  }

  return removeOverlaps(matches)
}

/**
 * Earliest start wins; at equal start the longer match wins.
 */
function removeOverlaps(candidates: CandidateLink[]): CandidateLink[] {
  const sorted = [...candidates].sort(
    (a, b) =>
      a.start - b.start ||
      b.end - a.end ||
      a.type.localeCompare(b.type)
  )

  const kept: CandidateLink[] = []
  let lastEnd = -1
  for (const candidate of sorted) {
    if (candidate.start < lastEnd) continue
    kept.push(candidate)
    lastEnd = candidate.end
  }
  return kept
}

export function findInlineCredential(url: string, rule: ProviderRule): string | undefined {
  for (const param of rule.credentialParams) {
    const value = getQueryParam(url, param)?.trim()
    if (value && matchesCredentialRule(value, rule.credential)) {
      return value
    }
  }
  return undefined
}

function withGlobal(flags: string): string {
  return flags.includes('g') ? flags : `${flags}g`
}
