import { describe, it, expect, beforeEach } from 'vitest'
import { captureLogger, ITEM_PAGE, MemoryCacheStore, StubFetcher } from '../../__tests__/fakes'
import { fingerprintHex } from '../../cache'
import {
  FetchFailureError,
  NodeNotFoundError,
  RequestAbortedError,
  StoreFailureError,
} from '../../lib/errors'
import { extractItem, serializeItem } from '../../scraper/extract'
import { buildItemUrl, ItemLookupService } from '../item-lookup'

const SOURCE = 'https://rarity.test'

describe('buildItemUrl', () => {
  it('builds the item-details URL', () => {
    expect(buildItemUrl(SOURCE, 'apes', 7)).toBe('https://rarity.test/Item-details?collection=apes&id=7')
  })

  it('encodes the collection and drops trailing slashes from the base', () => {
    expect(buildItemUrl('https://rarity.test//', 'bored apes&co', 0)).toBe(
      'https://rarity.test/Item-details?collection=bored%20apes%26co&id=0'
    )
  })
})

describe('ItemLookupService', () => {
  let cache: MemoryCacheStore
  let fetcher: StubFetcher
  let service: ItemLookupService

  function build(): ItemLookupService {
    return new ItemLookupService({
      cache,
      fetcher,
      sourceBaseUrl: SOURCE,
      fetchTimeoutMs: 2500,
      logger: captureLogger().logger,
    })
  }

  beforeEach(() => {
    cache = new MemoryCacheStore()
    fetcher = StubFetcher.ok(ITEM_PAGE)
    service = build()
  })

  it('fetches, extracts and stores on a miss', async () => {
    const result = await service.lookup({ collection: 'apes', id: 7 })

    expect(result.cache).toBe('miss')
    expect(result.body.equals(serializeItem(extractItem(ITEM_PAGE)))).toBe(true)
    expect(fetcher.calls).toHaveLength(1)
    expect(fetcher.calls[0].url).toBe('https://rarity.test/Item-details?collection=apes&id=7')
    expect(fetcher.calls[0].options?.timeoutMs).toBe(2500)
    expect(cache.entries.get(fingerprintHex('apes', 7))?.equals(result.body)).toBe(true)
  })

  it('serves a hit from the cache without fetching', async () => {
    const first = await service.lookup({ collection: 'apes', id: 7 })
    const second = await service.lookup({ collection: 'apes', id: 7 })

    expect(second.cache).toBe('hit')
    expect(second.body.equals(first.body)).toBe(true)
    expect(fetcher.calls).toHaveLength(1)
    expect(cache.puts).toBe(1)
  })

  it('returns stored bytes verbatim', async () => {
    cache.entries.set(fingerprintHex('apes', 7), Buffer.from('{"stored":true}'))

    const result = await service.lookup({ collection: 'apes', id: 7 })

    expect(result).toEqual({ body: Buffer.from('{"stored":true}'), cache: 'hit' })
    expect(fetcher.calls).toHaveLength(0)
  })

  it('keys entries per collection', async () => {
    await service.lookup({ collection: 'apes', id: 7 })
    await service.lookup({ collection: 'cats', id: 7 })

    expect(fetcher.calls).toHaveLength(2)
    expect(cache.entries.size).toBe(2)
  })

  it('raises FetchFailureError and writes nothing when the fetch fails', async () => {
    fetcher.respond = async () => ({
      status: 'error',
      statusCode: 500,
      durationMs: 3,
      error: 'HTTP 500: Internal Server Error',
    })

    const lookup = service.lookup({ collection: 'apes', id: 7 })

    await expect(lookup).rejects.toBeInstanceOf(FetchFailureError)
    await expect(lookup).rejects.toMatchObject({
      message: 'HTTP 500: Internal Server Error',
      status: 'error',
      upstreamStatusCode: 500,
      statusCode: 502,
    })
    expect(cache.puts).toBe(0)
  })

  it('maps a fetch timeout to a 504 failure', async () => {
    fetcher.respond = async () => ({
      status: 'timeout',
      durationMs: 2500,
      error: 'Request timed out after 2500ms',
    })

    await expect(service.lookup({ collection: 'apes', id: 7 })).rejects.toMatchObject({
      code: 'FETCH_TIMEOUT',
      statusCode: 504,
    })
  })

  it('writes nothing when extraction fails', async () => {
    fetcher = StubFetcher.ok('<html><body><p>Item not found</p></body></html>')
    service = build()

    await expect(service.lookup({ collection: 'apes', id: 7 })).rejects.toBeInstanceOf(
      NodeNotFoundError
    )
    expect(cache.puts).toBe(0)
  })

  it('does not fetch when the cache read fails', async () => {
    cache.failReads = new StoreFailureError('cache read failed: disk I/O error')

    await expect(service.lookup({ collection: 'apes', id: 7 })).rejects.toThrow(
      'cache read failed: disk I/O error'
    )
    expect(fetcher.calls).toHaveLength(0)
  })

  it('propagates cache write failures', async () => {
    cache.failWrites = new StoreFailureError('cache write failed: database is locked')

    await expect(service.lookup({ collection: 'apes', id: 7 })).rejects.toBeInstanceOf(
      StoreFailureError
    )
  })

  it('passes the caller signal to the fetcher', async () => {
    const controller = new AbortController()
    await service.lookup({ collection: 'apes', id: 7, signal: controller.signal })
    expect(fetcher.calls[0].options?.signal).toBe(controller.signal)
  })

  it('writes nothing when the fetcher reports an abort', async () => {
    fetcher.respond = async () => ({ status: 'aborted', durationMs: 1, error: 'Request aborted by caller' })

    await expect(service.lookup({ collection: 'apes', id: 7 })).rejects.toBeInstanceOf(
      RequestAbortedError
    )
    expect(cache.puts).toBe(0)
  })

  it('writes nothing when the caller leaves after the page arrived', async () => {
    const controller = new AbortController()
    fetcher.respond = async () => {
      controller.abort()
      return { status: 'ok', statusCode: 200, html: ITEM_PAGE, durationMs: 1 }
    }

    await expect(
      service.lookup({ collection: 'apes', id: 7, signal: controller.signal })
    ).rejects.toThrow('lookup for apes/7 aborted before completion')
    expect(cache.puts).toBe(0)
  })
})
