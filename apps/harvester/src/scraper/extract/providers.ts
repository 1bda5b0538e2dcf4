/**
 * Provider pattern table.
 *
 * Per-site knowledge lives in data (config/providers.json), not code. The
 * extraction functions accept any table built with createProviderTable().
 */

import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { z } from 'zod'
import { PROVIDER_TYPES } from '../types.js'
import type { CredentialRule, ProviderRule, ProviderType } from '../types.js'

const credentialRuleSchema = z
  .object({
    charClass: z.string().min(1),
    minLength: z.number().int().positive(),
    maxLength: z.number().int().positive(),
  })
  .refine((rule) => rule.minLength <= rule.maxLength, {
    message: 'minLength must not exceed maxLength',
  })

const providerEntrySchema = z.object({
  type: z.enum(PROVIDER_TYPES),
  pattern: z.string().min(1),
  credentialParams: z.array(z.string().min(1)).default([]),
  credential: credentialRuleSchema,
  requiresExplicitHint: z.boolean(),
  trailingSlash: z.enum(['strip', 'keep']).default('strip'),
})

export const DEFAULT_PROVIDER_TABLE_PATH = fileURLToPath(
  new URL('../../../config/providers.json', import.meta.url)
)

export class ProviderTable {
  private readonly byType: Map<ProviderType, ProviderRule>

  constructor(readonly rules: readonly ProviderRule[]) {
    this.byType = new Map(rules.map((rule) => [rule.type, rule]))
  }

  get(type: ProviderType): ProviderRule | undefined {
    return this.byType.get(type)
  }

  types(): ProviderType[] {
    return this.rules.map((rule) => rule.type)
  }
}

/**
 * Validate and compile entries. Duplicate types and invalid regexes throw.
 */
export function createProviderTable(entries: readonly unknown[]): ProviderTable {
  const parsed = z.array(providerEntrySchema).parse(entries)
  const seen = new Set<ProviderType>()

  const rules = parsed.map((entry): ProviderRule => {
    if (seen.has(entry.type)) {
      throw new Error(`Duplicate provider type '${entry.type}' in provider table`)
    }
    seen.add(entry.type)

    return {
      type: entry.type,
      pattern: new RegExp(entry.pattern, 'g'),
      credentialParams: entry.credentialParams,
      credential: entry.credential,
      requiresExplicitHint: entry.requiresExplicitHint,
      trailingSlash: entry.trailingSlash,
    }
  })

  return new ProviderTable(rules)
}

export function loadProviderTable(path: string = DEFAULT_PROVIDER_TABLE_PATH): ProviderTable {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'))
  if (!Array.isArray(raw)) {
    throw new Error(`Provider table at ${path} must be a JSON array`)
  }
  return createProviderTable(raw)
}

/**
 * Full-string check of a credential value against a provider rule.
 */
export function matchesCredentialRule(value: string, rule: CredentialRule): boolean {
  if (value.length < rule.minLength || value.length > rule.maxLength) {
    return false
  }
  return new RegExp(`^[${rule.charClass}]+$`).test(value)
}
