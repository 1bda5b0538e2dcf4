/**
 * Access-code resolution.
 *
 * Finds `<keyword><separator><token>` occurrences in free text. The token
 * is the whole alphanumeric run after the separator; a run outside the
 * allowed length is discarded rather than cut down.
 */

import type { CandidateCredential, CredentialRule } from '../types.js'

export const DEFAULT_CREDENTIAL_KEYWORDS = [
  '提取密码',
  '提取码',
  '访问码',
  '密码',
  '口令',
  'password',
  'passcode',
  'pwd',
  'code',
] as const

export const DEFAULT_CREDENTIAL_RULE: CredentialRule = {
  charClass: 'A-Za-z0-9',
  minLength: 4,
  maxLength: 8,
}

export interface ResolveCredentialsOptions {
  keywords?: readonly string[]
  rule?: CredentialRule
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function keywordAlternative(keyword: string): string {
  const escaped = escapeRegExp(keyword)
  // Latin keywords must not sit inside a longer word ("barcode", "pwdx")
  return /^[A-Za-z]/.test(keyword) ? `(?<![A-Za-z])${escaped}(?![A-Za-z])` : escaped
}

export function buildCredentialPattern(keywords: readonly string[], rule: CredentialRule): RegExp {
  const alternatives = [...keywords]
    .sort((a, b) => b.length - a.length || a.localeCompare(b))
    .map(keywordAlternative)
    .join('|')

  return new RegExp(`(${alternatives})[^\\S\\r\\n]*[:：=]?[^\\S\\r\\n]*([${rule.charClass}]+)`, 'gi')
}

export function resolveCredentials(
  text: string,
  options: ResolveCredentialsOptions = {}
): CandidateCredential[] {
  const rule = options.rule ?? DEFAULT_CREDENTIAL_RULE
  const pattern = buildCredentialPattern(options.keywords ?? DEFAULT_CREDENTIAL_KEYWORDS, rule)
  const credentials: CandidateCredential[] = []

  for (const match of text.matchAll(pattern)) {
    const keyword = match[1]
    const token = match[2]
    if (keyword === undefined || token === undefined) continue
    if (token.length < rule.minLength || token.length > rule.maxLength) continue

    const start = (match.index ?? 0) + match[0].length - token.length
    credentials.push({
      value: token,
      start,
      end: start + token.length,
      keyword,
    })
  }

  return credentials
}
