/**
 * Item Lookup Service
 *
 * Read-through cache in front of the scraper. For one (collection, id):
 *
 *   1. probe the cache by fingerprint; a hit returns the stored bytes as-is
 *   2. on a miss, fetch the item-details page
 *   3. extract the Item and serialize it
 *   4. store the bytes under the same fingerprint and return them
 *
 * The order never changes, and nothing is written unless extraction
 * produced a complete Item for a request that is still connected.
 */

import type { ILogger } from '@rarity-lens/logger'
import { fingerprint, type CacheStore } from '../cache'
import { FetchFailureError, RequestAbortedError } from '../lib/errors'
import { extractItem, serializeItem } from '../scraper/extract'
import type { PageFetcher } from '../scraper/types'

export interface ItemLookupRequest {
  collection: string
  id: number
  /** Fires when the caller goes away; abandons the fetch and skips the write */
  signal?: AbortSignal
}

export interface ItemLookupResult {
  body: Buffer
  cache: 'hit' | 'miss'
}

export interface ItemLookupDeps {
  cache: CacheStore
  fetcher: PageFetcher
  sourceBaseUrl: string
  fetchTimeoutMs?: number
  logger: ILogger
}

/**
 * `https://<host>/Item-details?collection=<collection>&id=<id>`
 */
export function buildItemUrl(sourceBaseUrl: string, collection: string, id: number): string {
  const base = sourceBaseUrl.replace(/\/+$/, '')
  return `${base}/Item-details?collection=${encodeURIComponent(collection)}&id=${id}`
}

export class ItemLookupService {
  private readonly log: ILogger

  constructor(private readonly deps: ItemLookupDeps) {
    this.log = deps.logger
  }

  async lookup({ collection, id, signal }: ItemLookupRequest): Promise<ItemLookupResult> {
    const key = fingerprint(collection, id)

    const cached = await this.deps.cache.get(key)
    if (cached) {
      this.log.debug('Cache hit', { collection, id })
      return { body: cached, cache: 'hit' }
    }

    const url = buildItemUrl(this.deps.sourceBaseUrl, collection, id)
    const result = await this.deps.fetcher.fetch(url, {
      timeoutMs: this.deps.fetchTimeoutMs,
      signal,
    })

    if (result.status === 'aborted' || signal?.aborted) {
      throw new RequestAbortedError(`lookup for ${collection}/${id} aborted before completion`)
    }

    if (result.status !== 'ok' || result.html === undefined) {
      this.log.warn('Item page fetch failed', {
        collection,
        id,
        status: result.status,
        statusCode: result.statusCode,
        durationMs: result.durationMs,
      })
      throw new FetchFailureError(
        result.error ?? `fetch failed with status ${result.status}`,
        result.status === 'ok' ? 'error' : result.status,
        result.statusCode
      )
    }

    const item = extractItem(result.html)
    const body = serializeItem(item)

    // The caller may have left while we parsed; a dropped request never writes
    if (signal?.aborted) {
      throw new RequestAbortedError(`lookup for ${collection}/${id} aborted before completion`)
    }

    await this.deps.cache.put(key, body)

    this.log.info('Item extracted and cached', {
      collection,
      id,
      traitCount: Object.keys(item.traits).length,
      fetchDurationMs: result.durationMs,
    })

    return { body, cache: 'miss' }
  }
}
