/**
 * Express App Configuration (without server startup)
 *
 * createApp() wires the routes around injected dependencies so tests can
 * drive it through supertest with fakes. index.ts owns listen/shutdown.
 */

import express, { type Express } from 'express'
import cors from 'cors'
import helmet from 'helmet'
import type { ILogger } from '@rarity-lens/logger'
import type { CacheStore } from './cache'
import { requestContextMiddleware } from './middleware/request-context'
import { createErrorHandler, createRequestLogger } from './middleware/request-logger'
import { createItemsRouter } from './routes/items'
import type { ItemLookupService } from './services/item-lookup'

export interface AppDeps {
  lookupService: ItemLookupService
  cache: Pick<CacheStore, 'driver'>
  logger: ILogger
  /** Allowed CORS origins; empty allows any origin */
  corsOrigins?: string[]
}

export function createApp({ lookupService, cache, logger, corsOrigins = [] }: AppDeps): Express {
  const app = express()

  app.disable('x-powered-by')
  app.use(helmet())
  app.use(requestContextMiddleware)
  app.use(createRequestLogger(logger))

  app.use(
    cors({
      origin: corsOrigins.length > 0 ? corsOrigins : true,
      exposedHeaders: ['X-Cache', 'X-Request-Id'],
    })
  )

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      cache: { driver: cache.driver },
    })
  })

  app.use('/api', createItemsRouter(lookupService))

  app.use(createErrorHandler(logger))

  return app
}
