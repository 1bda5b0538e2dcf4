/**
 * Source Registration
 *
 * Built-in sources are registered here explicitly at startup.
 */

import type { SourceRegistry } from '../types.js'
import { createTelegramAdapter } from './telegram/adapter.js'

export interface BuiltinSourceConfig {
  channels: readonly string[]
}

export function registerBuiltinSources(registry: SourceRegistry, config: BuiltinSourceConfig): void {
  if (config.channels.length > 0) {
    registry.register(createTelegramAdapter(config.channels))
  }
}

export { createTelegramAdapter, TELEGRAM_SOURCE_ID } from './telegram/adapter.js'
