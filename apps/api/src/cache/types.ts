/**
 * Cache Store contract
 *
 * Maps an item fingerprint to the serialized Item bytes. Single-key reads
 * and writes are atomic; nothing spans fetch + parse + store, so two
 * concurrent misses may both write and the later write wins.
 */

export const CACHE_NAMESPACE = 'RarityCache'

export type CacheDriver = 'sqlite' | 'redis'

export interface CacheStore {
  readonly driver: CacheDriver

  /** Stored bytes, or null on a miss (never an error) */
  get(fingerprint: Buffer): Promise<Buffer | null>

  /** Upsert; overwrites any previous value unconditionally */
  put(fingerprint: Buffer, value: Buffer): Promise<void>

  close(): Promise<void>
}

export interface CacheStoreOptions {
  /** Entries older than this read as misses. 0 keeps entries forever. */
  ttlSeconds?: number
}
