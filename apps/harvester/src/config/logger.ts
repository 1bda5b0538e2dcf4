/**
 * Harvester Logger Configuration
 *
 * Pre-configured loggers for harvester components
 */

import { createLogger } from '@linktrawl/logger'

export const rootLogger = createLogger('harvester')

export const loggers = {
  server: rootLogger.child('server'),
  fetch: rootLogger.child('fetch'),
  search: rootLogger.child('search'),
  cache: rootLogger.child('cache'),
  concurrency: rootLogger.child('concurrency'),
}
