import type { ILogger } from '@rarity-lens/logger'
import type { AppConfig } from '../config'
import { createRedisClient } from '../config/redis'
import { RedisCacheStore } from './redis-store'
import { SqliteCacheStore } from './sqlite-store'
import type { CacheStore } from './types'

export { fingerprint, fingerprintHex } from './fingerprint'
export { RedisCacheStore, redisCacheKey, type RedisCacheClient } from './redis-store'
export { SqliteCacheStore } from './sqlite-store'
export { CACHE_NAMESPACE, type CacheDriver, type CacheStore, type CacheStoreOptions } from './types'

/**
 * Open the cache store selected by CACHE_DRIVER.
 */
export function createCacheStore(config: Pick<AppConfig, 'dbPath' | 'cache'>, log: ILogger): CacheStore {
  const { driver, ttlSeconds, redisUrl } = config.cache

  if (driver === 'redis') {
    if (!redisUrl) {
      throw new Error('REDIS_URL is required when CACHE_DRIVER=redis')
    }
    log.info('Opening Redis cache store', { ttlSeconds })
    return new RedisCacheStore(createRedisClient(redisUrl, log), { ttlSeconds })
  }

  log.info('Opening SQLite cache store', { dbPath: config.dbPath, ttlSeconds })
  return SqliteCacheStore.open(config.dbPath, { ttlSeconds })
}
