/**
 * Search Pipeline Core Types
 *
 * Shared shapes for fetching, link/credential extraction, association,
 * results and source adapters.
 */

import type { ILogger } from '@linktrawl/logger'

// ═══════════════════════════════════════════════════════════════════════════════
// Provider Types
// ═══════════════════════════════════════════════════════════════════════════════

export const PROVIDER_TYPES = [
  'baidu',
  'quark',
  'aliyun',
  'tianyi',
  'uc',
  'mobile',
  '115',
  'pikpak',
  'xunlei',
  '123',
  'magnet',
  'ed2k',
] as const

/**
 * Cloud-storage service a link belongs to.
 */
export type ProviderType = (typeof PROVIDER_TYPES)[number]

export type TrailingSlashPolicy = 'strip' | 'keep'

/**
 * Shape an access code must have for a provider.
 * `charClass` is the body of a regex character class, e.g. `A-Za-z0-9`.
 */
export interface CredentialRule {
  charClass: string
  minLength: number
  maxLength: number
}

/**
 * Compiled provider table entry.
 */
export interface ProviderRule {
  type: ProviderType
  /** Global regex; cloned before every scan */
  pattern: RegExp
  /** Query parameters that carry an access code inside the URL itself */
  credentialParams: readonly string[]
  credential: CredentialRule
  /** Only these providers may receive a credential found in surrounding text */
  requiresExplicitHint: boolean
  trailingSlash: TrailingSlashPolicy
}

// ═══════════════════════════════════════════════════════════════════════════════
// Extraction Types
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Positioned link match. `end` is exclusive.
 */
export interface CandidateLink {
  type: ProviderType
  url: string
  start: number
  end: number
  inlineCredential?: string
}

/**
 * Positioned access-code match. Offsets cover the token only.
 */
export interface CandidateCredential {
  value: string
  start: number
  end: number
  keyword: string
}

export type LinkOrigin = 'inline' | 'associated' | 'none'

export interface AssociatedLink {
  link: CandidateLink
  password?: string
  origin: LinkOrigin
}

/**
 * Finalized link. `url` is canonical.
 */
export interface LinkRecord {
  url: string
  providerType: ProviderType
  password?: string
  origin: LinkOrigin
}

// ═══════════════════════════════════════════════════════════════════════════════
// Result Types
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One search hit. Links are unique by canonical url.
 */
export interface ResourceResult {
  id: string
  source: string
  title: string
  content: string
  /** ISO 8601 */
  timestamp: string
  links: LinkRecord[]
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetch Types
// ═══════════════════════════════════════════════════════════════════════════════

export type HttpMethod = 'GET' | 'POST'

export interface FetchRequest {
  url: string
  method?: HttpMethod
  headers?: Record<string, string>
  body?: string
  /** Per-attempt timeout */
  timeoutMs?: number
  maxSizeBytes?: number
  /** Cancels the current attempt and any pending backoff */
  signal?: AbortSignal
}

export interface FetchResponse {
  url: string
  statusCode: number
  body: string
  attempts: number
  durationMs: number
}

/**
 * Resolves with the body or rejects with a FetchError.
 */
export interface Fetcher {
  fetch(request: FetchRequest): Promise<FetchResponse>
}

export interface RetryPolicy {
  maxAttempts: number
  initialDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
  /** Retried in addition to every status >= 500 */
  retryableStatusCodes: number[]
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 5000,
  backoffMultiplier: 2,
  retryableStatusCodes: [408, 429],
}

export const DEFAULT_FETCH_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8',
  'Accept-Language': 'zh-CN,zh;q=0.9,en;q=0.8',
}

export const DEFAULT_TIMEOUT_MS = 10_000
export const DEFAULT_MAX_BODY_BYTES = 5 * 1024 * 1024

// ═══════════════════════════════════════════════════════════════════════════════
// Source Adapter Types
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One page an adapter wants fetched for a keyword.
 */
export interface SearchTarget {
  source: string
  url: string
  method?: HttpMethod
  headers?: Record<string, string>
  body?: string
  /** Adapter-specific label, e.g. the channel name */
  label?: string
}

/**
 * A logical resource found on a fetched page, before link extraction.
 * `text` is what the extractor scans; it may hold more than `content`.
 */
export interface SourceEntry {
  id: string
  title: string
  content: string
  timestamp: string
  text: string
}

export interface SourceAdapterContext {
  keyword: string
  logger: ILogger
}

/**
 * Per-query narrowing of what an adapter fetches. Adapters ignore the
 * fields that do not apply to them.
 */
export interface TargetScope {
  /** Replaces the configured channel list for channel-based sources */
  channels?: readonly string[]
}

export interface SourceAdapter {
  readonly id: string
  readonly name: string
  buildTargets(keyword: string, scope?: TargetScope): SearchTarget[]
  /** May throw on malformed pages; the orchestrator isolates the failure */
  parse(body: string, target: SearchTarget, ctx: SourceAdapterContext): SourceEntry[]
}

export interface SourceRegistry {
  register(adapter: SourceAdapter): void
  get(id: string): SourceAdapter | undefined
  list(): SourceAdapter[]
  size(): number
}
