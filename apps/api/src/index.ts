// Load environment variables first, before any other imports
import './env'

import type { Server } from 'http'
import { createApp } from './app'
import { createCacheStore } from './cache'
import { loadConfig } from './config'
import { logger, loggers } from './config/logger'
import { HttpFetcher } from './scraper/fetch/http-fetcher'
import { DEFAULT_RETRY_POLICY } from './scraper/types'
import { ItemLookupService } from './services/item-lookup'

const log = loggers.server

const config = loadConfig()
const cache = createCacheStore(config, loggers.cache)

const fetcher = new HttpFetcher({
  timeoutMs: config.fetch.timeoutMs,
  retryPolicy: { ...DEFAULT_RETRY_POLICY, maxAttempts: config.fetch.maxAttempts },
})

const lookupService = new ItemLookupService({
  cache,
  fetcher,
  sourceBaseUrl: config.sourceBaseUrl,
  fetchTimeoutMs: config.fetch.timeoutMs,
  logger: loggers.lookup,
})

const app = createApp({ lookupService, cache, logger, corsOrigins: config.corsOrigins })

const onListening = () => {
  log.info('API server started', {
    host: config.listen.host ?? '(all interfaces)',
    port: config.listen.port,
    cacheDriver: cache.driver,
    sourceBaseUrl: config.sourceBaseUrl,
  })
}

const server: Server = config.listen.host
  ? app.listen(config.listen.port, config.listen.host, onListening)
  : app.listen(config.listen.port, onListening)

let isShuttingDown = false

const shutdown = async (signal: string) => {
  if (isShuttingDown) {
    log.warn('Shutdown already in progress')
    return
  }
  isShuttingDown = true

  const shutdownStart = Date.now()
  log.info('Starting graceful shutdown', { signal })

  try {
    // 1. Stop accepting new connections
    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err)
        else resolve()
      })
    })
    log.info('HTTP server closed')

    // 2. Close the cache store
    await cache.close()
    log.info('Cache store closed', { driver: cache.driver })

    log.info('Graceful shutdown complete', { durationMs: Date.now() - shutdownStart })
    process.exit(0)
  } catch (error) {
    log.error('Error during shutdown', {}, error)
    process.exit(1)
  }
}

process.on('SIGTERM', () => void shutdown('SIGTERM'))
process.on('SIGINT', () => void shutdown('SIGINT'))
