/**
 * Link ↔ access-code association.
 *
 * For each link without an inline credential whose provider accepts text
 * hints, every credential at or after the link's end is scored:
 *
 *   score = base − distance
 *         + proximityBonus    if distance < nearThreshold
 *         + contextBonus      if a context keyword is within contextWindow of the credential
 *         − boundaryPenalty   if another link starts between the link and the credential
 *
 * The best positive score wins (ties: smaller distance, then earlier start,
 * then smaller value). Inputs are sorted before scoring, so any permutation
 * of the same links and credentials yields the same pairing.
 */

import type { AssociatedLink, CandidateCredential, CandidateLink } from '../types.js'
import type { ProviderTable } from './providers.js'
import { matchesCredentialRule } from './providers.js'

export interface AssociationWeights {
  base: number
  proximityBonus: number
  nearThreshold: number
  contextBonus: number
  contextWindow: number
  boundaryPenalty: number
}

export const DEFAULT_ASSOCIATION_WEIGHTS: AssociationWeights = {
  base: 100,
  proximityBonus: 50,
  nearThreshold: 30,
  contextBonus: 30,
  contextWindow: 12,
  boundaryPenalty: 200,
}

export const DEFAULT_CONTEXT_KEYWORDS = ['提取码', '提取密码', '访问码', '密码', 'pwd', 'password'] as const

export interface AssociateInput {
  text: string
  links: readonly CandidateLink[]
  credentials: readonly CandidateCredential[]
  providers: ProviderTable
  weights?: Partial<AssociationWeights>
  contextKeywords?: readonly string[]
}

export interface ScoredCandidate {
  credential: CandidateCredential
  distance: number
  score: number
}

export function compareLinks(a: CandidateLink, b: CandidateLink): number {
  return a.start - b.start || a.end - b.end || compareStrings(a.url, b.url) || compareStrings(a.type, b.type)
}

export function compareCredentials(a: CandidateCredential, b: CandidateCredential): number {
  return (
    a.start - b.start ||
    a.end - b.end ||
    compareStrings(a.value, b.value) ||
    compareStrings(a.keyword, b.keyword)
  )
}

/** Code-unit order; locale-independent */
function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

function hasContextKeyword(
  text: string,
  credential: CandidateCredential,
  window: number,
  keywords: readonly string[]
): boolean {
  const from = Math.max(0, credential.start - window)
  const to = Math.min(text.length, credential.end + window)
  const slice = text.slice(from, to).toLowerCase()
  return keywords.some((keyword) => slice.includes(keyword.toLowerCase()))
}

/**
 * Score one credential for one link. Callers guarantee `credential.start >= link.end`.
 */
export function scoreCandidate(
  link: CandidateLink,
  credential: CandidateCredential,
  otherLinks: readonly CandidateLink[],
  text: string,
  weights: AssociationWeights,
  contextKeywords: readonly string[]
): ScoredCandidate {
  const distance = credential.start - link.end
  let score = weights.base - distance

  if (distance < weights.nearThreshold) {
    score += weights.proximityBonus
  }

  if (hasContextKeyword(text, credential, weights.contextWindow, contextKeywords)) {
    score += weights.contextBonus
  }

  const crossesBoundary = otherLinks.some(
    (other) => other !== link && other.start > link.end && other.start < credential.start
  )
  if (crossesBoundary) {
    score -= weights.boundaryPenalty
  }

  return { credential, distance, score }
}

function isBetter(candidate: ScoredCandidate, best: ScoredCandidate | undefined): boolean {
  if (!best) return true
  if (candidate.score !== best.score) return candidate.score > best.score
  if (candidate.distance !== best.distance) return candidate.distance < best.distance
  return compareCredentials(candidate.credential, best.credential) < 0
}

export function associate(input: AssociateInput): AssociatedLink[] {
  const weights: AssociationWeights = { ...DEFAULT_ASSOCIATION_WEIGHTS, ...input.weights }
  const contextKeywords = input.contextKeywords ?? DEFAULT_CONTEXT_KEYWORDS
  const links = [...input.links].sort(compareLinks)
  const credentials = [...input.credentials].sort(compareCredentials)

  return links.map((link): AssociatedLink => {
    if (link.inlineCredential) {
      return { link, password: link.inlineCredential, origin: 'inline' }
    }

    const rule = input.providers.get(link.type)
    if (!rule || !rule.requiresExplicitHint) {
      return { link, origin: 'none' }
    }

    let best: ScoredCandidate | undefined
    for (const credential of credentials) {
      if (credential.start < link.end) continue
      if (!matchesCredentialRule(credential.value, rule.credential)) continue

      const scored = scoreCandidate(link, credential, links, input.text, weights, contextKeywords)
      if (scored.score > 0 && isBetter(scored, best)) {
        best = scored
      }
    }

    return best
      ? { link, password: best.credential.value, origin: 'associated' }
      : { link, origin: 'none' }
  })
}
