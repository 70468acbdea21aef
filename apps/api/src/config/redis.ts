import Redis from 'ioredis'
import type { ILogger } from '@rarity-lens/logger'

/**
 * Redis client for the shared cache driver.
 *
 * Requests fail after a couple of retries instead of queueing forever, so
 * an outage surfaces as a StoreFailure on the request that hit it.
 */
export function createRedisClient(redisUrl: string, log: ILogger): Redis {
  const client = new Redis(redisUrl, {
    maxRetriesPerRequest: 2,
    enableReadyCheck: true,
  })

  // Mask the password before logging the target
  const target = redisUrl.replace(/\/\/([^:@/]*):[^@]+@/, '//$1:***@')

  client.on('error', (err: Error) => {
    log.error('Redis connection error', { target }, err)
  })

  client.on('connect', () => {
    log.info('Redis connected', { target })
  })

  return client
}
