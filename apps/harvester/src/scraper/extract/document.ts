/**
 * Per-document extraction: links + credentials → associated, canonical,
 * deduplicated LinkRecords. Pure; safe to run on many documents at once.
 */

import type {
  AssociatedLink,
  CandidateCredential,
  CandidateLink,
  CredentialRule,
  LinkRecord,
  ProviderType,
} from '../types.js'
import type { AssociationWeights } from './associate.js'
import { associate } from './associate.js'
import { resolveCredentials } from './credentials.js'
import { extractLinks } from './links.js'
import type { ProviderTable } from './providers.js'
import { canonicalizeLinkUrl } from '../utils/url.js'
import { dedupeLinks } from '../process/dedupe.js'

export interface ExtractRecordsOptions {
  deniedTypes?: ReadonlySet<ProviderType> | readonly ProviderType[]
  weights?: Partial<AssociationWeights>
}

/**
 * Credentials inside a link's own span (`?pwd=` in the URL) are already
 * handled as inline credentials and must not be offered to other links.
 */
export function withoutLinkSpans(
  credentials: readonly CandidateCredential[],
  links: readonly CandidateLink[]
): CandidateCredential[] {
  return credentials.filter(
    (credential) => !links.some((link) => credential.start < link.end && credential.end > link.start)
  )
}

/**
 * Resolve once per distinct credential rule among the providers of `links`,
 * so every provider sees tokens cut by its own character class and length.
 * Ordered by position.
 */
export function resolveCredentialsForLinks(
  text: string,
  links: readonly CandidateLink[],
  providers: ProviderTable
): CandidateCredential[] {
  const rules = new Map<string, CredentialRule>()
  for (const link of links) {
    const rule = providers.get(link.type)?.credential
    if (rule) {
      rules.set(`${rule.charClass}|${rule.minLength}|${rule.maxLength}`, rule)
    }
  }

  const byKey = new Map<string, CandidateCredential>()
  for (const rule of rules.values()) {
    for (const credential of resolveCredentials(text, { rule })) {
      const key = `${credential.start}:${credential.end}`
      if (!byKey.has(key)) byKey.set(key, credential)
    }
  }

  return [...byKey.values()].sort((a, b) => a.start - b.start || a.end - b.end)
}

export function toLinkRecord(associated: AssociatedLink, providers: ProviderTable): LinkRecord {
  const rule = providers.get(associated.link.type)
  const record: LinkRecord = {
    url: canonicalizeLinkUrl(associated.link.url, {
      trailingSlash: rule?.trailingSlash,
      dropParams: rule?.credentialParams,
    }),
    providerType: associated.link.type,
    origin: associated.origin,
  }
  if (associated.password) {
    record.password = associated.password
  }
  return record
}

export function extractLinkRecords(
  text: string,
  providers: ProviderTable,
  options: ExtractRecordsOptions = {}
): LinkRecord[] {
  const links = extractLinks(text, providers, { deniedTypes: options.deniedTypes })
  if (links.length === 0) return []

  const credentials = withoutLinkSpans(resolveCredentialsForLinks(text, links, providers), links)
  const associated = associate({
    text,
    links,
    credentials,
    providers,
    weights: options.weights,
  })

  return dedupeLinks(
    associated.map((entry) => toLinkRecord(entry, providers)),
    { providers }
  )
}
