import { describe, it, expect } from 'vitest'
import { buildSearchCacheKey, normalizeKeyword } from '../cache-key.js'
import type { CacheKeyParts } from '../cache-key.js'

const base: CacheKeyParts = {
  keyword: 'Wandering Earth',
  sources: ['telegram', 'pages'],
  deniedTypes: ['magnet', 'ed2k'],
  maxTargets: 64,
  filterByKeyword: true,
}

describe('normalizeKeyword', () => {
  it('trims, lowercases and collapses whitespace', () => {
    expect(normalizeKeyword('  Wandering \t Earth ')).toBe('wandering earth')
  })
})

describe('buildSearchCacheKey', () => {
  it('is a prefixed 32-char hash', () => {
    expect(buildSearchCacheKey(base)).toMatch(/^search:[0-9a-f]{32}$/)
  })

  it('ignores keyword case and spacing and list order', () => {
    const variant: CacheKeyParts = {
      ...base,
      keyword: ' wandering   EARTH',
      sources: ['pages', 'telegram', 'pages'],
      deniedTypes: ['ed2k', 'magnet'],
    }

    expect(buildSearchCacheKey(variant)).toBe(buildSearchCacheKey(base))
  })

  it('changes with anything that changes the result set', () => {
    const key = buildSearchCacheKey(base)

    expect(buildSearchCacheKey({ ...base, filterByKeyword: false })).not.toBe(key)
    expect(buildSearchCacheKey({ ...base, maxTargets: 8 })).not.toBe(key)
    expect(buildSearchCacheKey({ ...base, deniedTypes: [] })).not.toBe(key)
    expect(buildSearchCacheKey({ ...base, channels: ['other'] })).not.toBe(key)
  })
})
