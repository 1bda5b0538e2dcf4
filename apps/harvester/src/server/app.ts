/**
 * Express App Configuration (without server startup)
 *
 * Exported as a factory so tests can mount it under supertest with a fake
 * orchestrator. `listen()` lives in index.ts.
 */

import express from 'express'
import type { Express, Request, Response, NextFunction } from 'express'
import helmet from 'helmet'
import type { ILogger } from '@linktrawl/logger'
import { noopLogger } from '@linktrawl/logger'
import { classifyError, ERROR_CODES, getSafeMessage } from '../lib/errors.js'
import type { SearchOrchestrator } from '../scraper/orchestrator.js'
import type { SourceRegistry } from '../scraper/types.js'
import { failure } from './envelope.js'
import { errorLoggerMiddleware, requestLoggerMiddleware } from './middleware/request-logger.js'
import { createSearchRouter } from './routes/search.js'

export interface AppDependencies {
  orchestrator: SearchOrchestrator
  registry: SourceRegistry
  logger?: ILogger
  /** Injected for deterministic uptime in tests */
  now?: () => number
}

export function createApp(deps: AppDependencies): Express {
  const log = deps.logger ?? noopLogger
  const now = deps.now ?? Date.now
  const startedAt = now()

  const app: Express = express()

  app.use(helmet())
  app.use(requestLoggerMiddleware(log))
  app.use(express.json())

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      sources: deps.registry.list().map((adapter) => adapter.id),
      uptimeSeconds: Math.floor((now() - startedAt) / 1000),
    })
  })

  app.use('/api/search', createSearchRouter(deps.orchestrator, log.child('search-route')))

  app.use((req: Request, res: Response) => {
    res.status(404).json(failure(404, `Route ${req.method} ${req.path} not found`))
  })

  app.use(errorLoggerMiddleware(log))

  // Final error handler - never exposes stack traces or internal messages
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const classified = classifyError(err)
    const data: Record<string, unknown> = { error_code: classified.code }

    if (classified.code === ERROR_CODES.VALIDATION_FAILED && classified.details?.issues) {
      data.validation_errors = classified.details.issues
    }

    res.status(classified.statusCode).json(failure(classified.statusCode, getSafeMessage(classified), data))
  })

  return app
}
