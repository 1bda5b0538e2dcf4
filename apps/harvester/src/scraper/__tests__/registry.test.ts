import { describe, it, expect, beforeEach } from 'vitest'
import { InMemorySourceRegistry, getSourceRegistry, resetSourceRegistry } from '../registry.js'
import { registerBuiltinSources, TELEGRAM_SOURCE_ID } from '../adapters/index.js'
import type { SourceAdapter } from '../types.js'

function adapter(id: string): SourceAdapter {
  return { id, name: id, buildTargets: () => [], parse: () => [] }
}

describe('InMemorySourceRegistry', () => {
  it('lists adapters in registration order', () => {
    const registry = new InMemorySourceRegistry()
    registry.register(adapter('b'))
    registry.register(adapter('a'))

    expect(registry.list().map((a) => a.id)).toEqual(['b', 'a'])
    expect(registry.get('a')?.id).toBe('a')
    expect(registry.get('missing')).toBeUndefined()
    expect(registry.size()).toBe(2)
  })

  it('refuses duplicate ids', () => {
    const registry = new InMemorySourceRegistry()
    registry.register(adapter('a'))

    expect(() => registry.register(adapter('a'))).toThrow("Source with ID 'a' is already registered")
  })
})

describe('global registry', () => {
  beforeEach(() => {
    resetSourceRegistry()
  })

  it('is shared until reset', () => {
    getSourceRegistry().register(adapter('a'))
    expect(getSourceRegistry().size()).toBe(1)

    resetSourceRegistry()
    expect(getSourceRegistry().size()).toBe(0)
  })
})

describe('registerBuiltinSources', () => {
  it('registers telegram when channels are configured', () => {
    const registry = new InMemorySourceRegistry()
    registerBuiltinSources(registry, { channels: ['alpha'] })

    expect(registry.list().map((a) => a.id)).toEqual([TELEGRAM_SOURCE_ID])
  })

  it('registers nothing without channels', () => {
    const registry = new InMemorySourceRegistry()
    registerBuiltinSources(registry, { channels: [] })

    expect(registry.size()).toBe(0)
  })
})
