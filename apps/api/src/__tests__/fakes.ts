import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { createLogger, type ILogger, type LogLevel } from '@rarity-lens/logger'
import type { CacheStore } from '../cache'
import type { FetchOptions, FetchResult, PageFetcher } from '../scraper/types'

export const ITEM_PAGE = readFileSync(
  fileURLToPath(new URL('../scraper/__tests__/fixtures/item-details.html', import.meta.url)),
  'utf8'
)

/** Map-backed cache that counts calls and can be told to fail */
export class MemoryCacheStore implements CacheStore {
  readonly driver = 'sqlite'
  readonly entries = new Map<string, Buffer>()
  gets = 0
  puts = 0
  failReads: Error | null = null
  failWrites: Error | null = null

  async get(fingerprint: Buffer): Promise<Buffer | null> {
    this.gets += 1
    if (this.failReads) throw this.failReads
    return this.entries.get(fingerprint.toString('hex')) ?? null
  }

  async put(fingerprint: Buffer, value: Buffer): Promise<void> {
    this.puts += 1
    if (this.failWrites) throw this.failWrites
    this.entries.set(fingerprint.toString('hex'), value)
  }

  async close(): Promise<void> {}
}

/** Fetcher that answers every URL with a fixed result */
export class StubFetcher implements PageFetcher {
  readonly calls: Array<{ url: string; options?: FetchOptions }> = []

  constructor(public respond: (url: string, options?: FetchOptions) => Promise<FetchResult>) {}

  static ok(html: string): StubFetcher {
    return new StubFetcher(async () => ({ status: 'ok', statusCode: 200, html, durationMs: 1 }))
  }

  async fetch(url: string, options?: FetchOptions): Promise<FetchResult> {
    this.calls.push({ url, options })
    return this.respond(url, options)
  }
}

export interface CapturedLog {
  level: LogLevel
  entry: Record<string, unknown>
}

/** Logger that keeps parsed JSON lines instead of printing them */
export function captureLogger(): { logger: ILogger; lines: CapturedLog[] } {
  const lines: CapturedLog[] = []
  const logger = createLogger('test', {
    level: 'debug',
    format: 'json',
    sink: (level, line) => {
      const parsed: unknown = JSON.parse(line)
      if (typeof parsed === 'object' && parsed !== null) {
        lines.push({ level, entry: Object.fromEntries(Object.entries(parsed)) })
      }
    },
  })
  return { logger, lines }
}
