/**
 * Source Registry
 *
 * Sources are registered explicitly at startup; there is no auto-discovery.
 * The orchestrator only talks to the SourceRegistry interface.
 */

import type { SourceAdapter, SourceRegistry } from './types.js'

export class InMemorySourceRegistry implements SourceRegistry {
  private readonly adapters = new Map<string, SourceAdapter>()

  /**
   * @throws Error if a source with the same id is already registered
   */
  register(adapter: SourceAdapter): void {
    if (this.adapters.has(adapter.id)) {
      throw new Error(`Source with ID '${adapter.id}' is already registered`)
    }
    this.adapters.set(adapter.id, adapter)
  }

  get(id: string): SourceAdapter | undefined {
    return this.adapters.get(id)
  }

  /** Registration order */
  list(): SourceAdapter[] {
    return Array.from(this.adapters.values())
  }

  size(): number {
    return this.adapters.size
  }
}

let globalRegistry: InMemorySourceRegistry | null = null

export function getSourceRegistry(): InMemorySourceRegistry {
  if (!globalRegistry) {
    globalRegistry = new InMemorySourceRegistry()
  }
  return globalRegistry
}

/**
 * Reset the global registry (for testing).
 */
export function resetSourceRegistry(): void {
  globalRegistry = null
}
