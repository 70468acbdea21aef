/**
 * Redis-backed cache store
 *
 * Lets several API instances share one cache. Keys are
 * `RarityCache:<hex fingerprint>`; GET and SET are single commands, so each
 * read and write is atomic on the server.
 */

import { StoreFailureError } from '../lib/errors'
import { CACHE_NAMESPACE, type CacheStore, type CacheStoreOptions } from './types'

/**
 * The slice of an ioredis client this store uses.
 */
export interface RedisCacheClient {
  getBuffer(key: string): Promise<Buffer | null>
  set(key: string, value: Buffer): Promise<unknown>
  set(key: string, value: Buffer, mode: 'EX', seconds: number): Promise<unknown>
  quit(): Promise<unknown>
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function redisCacheKey(fingerprint: Buffer): string {
  return `${CACHE_NAMESPACE}:${fingerprint.toString('hex')}`
}

export class RedisCacheStore implements CacheStore {
  readonly driver = 'redis'

  private readonly ttlSeconds: number

  constructor(
    private readonly client: RedisCacheClient,
    options: CacheStoreOptions = {}
  ) {
    this.ttlSeconds = options.ttlSeconds ?? 0
  }

  async get(fingerprint: Buffer): Promise<Buffer | null> {
    try {
      return await this.client.getBuffer(redisCacheKey(fingerprint))
    } catch (error) {
      throw new StoreFailureError(`cache read failed: ${describe(error)}`, { cause: error })
    }
  }

  async put(fingerprint: Buffer, value: Buffer): Promise<void> {
    const key = redisCacheKey(fingerprint)
    try {
      if (this.ttlSeconds > 0) {
        await this.client.set(key, value, 'EX', this.ttlSeconds)
      } else {
        await this.client.set(key, value)
      }
    } catch (error) {
      throw new StoreFailureError(`cache write failed: ${describe(error)}`, { cause: error })
    }
  }

  async close(): Promise<void> {
    await this.client.quit()
  }
}
