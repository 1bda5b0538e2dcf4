/**
 * URL Canonicalization Utilities
 *
 * Canonical form is the identity of a share link. Rules for http(s):
 * 1. Case-fold scheme and hostname
 * 2. Remove tracking parameters: utm_*, fbclid, gclid, ref, source, campaign
 * 3. Remove credential parameters (the password travels separately)
 * 4. Remove empty query parameters
 * 5. Sort remaining params
 * 6. Remove fragment
 * 7. Remove trailing slashes (except root) unless the provider keeps them
 *
 * Other schemes (magnet, ed2k) are trimmed and get a lower-case scheme.
 * Canonicalization is idempotent; unusable input yields ''.
 */

import type { TrailingSlashPolicy } from '../types.js'

const TRACKING_PARAMS = new Set([
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
  'fbclid',
  'gclid',
  'ref',
  'source',
  'campaign',
])

export interface CanonicalizeOptions {
  trailingSlash?: TrailingSlashPolicy
  /** Extra params to drop, e.g. pwd */
  dropParams?: readonly string[]
}

export function canonicalizeLinkUrl(url: string, options: CanonicalizeOptions = {}): string {
  const trimmed = url.trim()
  if (!trimmed) return ''

  if (!/^https?:\/\//i.test(trimmed)) {
    return canonicalizeOpaque(trimmed)
  }

  let parsed: URL
  try {
    parsed = new URL(trimmed)
  } catch {
    return ''
  }

  if (!parsed.hostname) return ''

  const drop = new Set(options.dropParams ?? [])
  const keysToDelete: string[] = []
  for (const [key, value] of parsed.searchParams.entries()) {
    if (TRACKING_PARAMS.has(key) || key.startsWith('utm_') || drop.has(key) || value === '') {
      keysToDelete.push(key)
    }
  }
  for (const key of keysToDelete) {
    parsed.searchParams.delete(key)
  }

  parsed.searchParams.sort()
  parsed.hash = ''

  if ((options.trailingSlash ?? 'strip') === 'strip' && parsed.pathname !== '/') {
    parsed.pathname = parsed.pathname.replace(/\/+$/, '') || '/'
  }

  return parsed.toString()
}

function canonicalizeOpaque(url: string): string {
  const match = /^([a-z][a-z0-9+.-]*):/i.exec(url)
  if (!match) return ''
  return `${match[1].toLowerCase()}${url.slice(match[1].length)}`
}

/**
 * Read a query parameter from an http(s) URL without throwing.
 */
export function getQueryParam(url: string, name: string): string | undefined {
  if (!/^https?:\/\//i.test(url)) return undefined
  try {
    return new URL(url).searchParams.get(name) ?? undefined
  } catch {
    return undefined
  }
}
