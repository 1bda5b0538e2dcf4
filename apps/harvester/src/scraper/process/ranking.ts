/**
 * Result ranking.
 *
 * Score = freshness bucket + title priority keyword. Higher first; equal
 * scores fall back to newest first, then id.
 */

import type { ResourceResult } from '../types.js'

const DAY_MS = 24 * 60 * 60 * 1000

/** Upper age bound in days, score for that bucket */
const FRESHNESS_BUCKETS: ReadonlyArray<readonly [number, number]> = [
  [1, 500],
  [3, 400],
  [7, 300],
  [30, 200],
  [90, 100],
  [365, 50],
]
const STALE_SCORE = 20

/** Earlier entries weigh more */
export const PRIORITY_KEYWORDS = ['合集', '系列', '全', '完', '最新', '附', 'complete'] as const
const PRIORITY_STEP = 70

/**
 * Zero for an unparseable timestamp. Future timestamps count as fresh.
 */
export function freshnessScore(timestamp: string, now: number): number {
  const at = Date.parse(timestamp)
  if (Number.isNaN(at)) return 0
  const ageDays = (now - at) / DAY_MS
  for (const [maxDays, score] of FRESHNESS_BUCKETS) {
    if (ageDays <= maxDays) return score
  }
  return STALE_SCORE
}

/**
 * Weight of the first priority keyword found in the title, case-insensitive.
 */
export function keywordPriority(title: string): number {
  const lower = title.toLowerCase()
  const index = PRIORITY_KEYWORDS.findIndex((keyword) => lower.includes(keyword))
  return index === -1 ? 0 : (PRIORITY_KEYWORDS.length - index) * PRIORITY_STEP
}

export function rankScore(result: ResourceResult, now: number): number {
  return freshnessScore(result.timestamp, now) + keywordPriority(result.title)
}

/**
 * Newest first; id breaks ties so equal timestamps still sort the same way.
 */
export function compareResults(a: ResourceResult, b: ResourceResult): number {
  const byTime = Date.parse(b.timestamp) - Date.parse(a.timestamp)
  if (byTime !== 0 && !Number.isNaN(byTime)) return byTime
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

/**
 * New array, best first. Scores are computed once per result.
 */
export function rankResults(results: readonly ResourceResult[], now: number): ResourceResult[] {
  return results
    .map((result) => ({ result, score: rankScore(result, now) }))
    .sort((a, b) => b.score - a.score || compareResults(a.result, b.result))
    .map(({ result }) => result)
}
