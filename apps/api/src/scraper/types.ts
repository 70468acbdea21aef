/**
 * Scraper Core Types
 *
 * The Item record produced from one item-details page, and the contract
 * of the outbound page fetcher.
 */

/**
 * One categorical attribute and its rarity within the collection.
 */
export interface Trait {
  readonly type: string
  readonly name: string
  readonly tier: string
  /** Share of the collection carrying this trait value, 0-100 */
  readonly percentage: number
}

/**
 * Rarity profile of one collectible at fetch time.
 *
 * `rank`, `total` and `score` are -1 when the page did not carry a
 * recognizable value for them.
 */
export interface Item {
  readonly name: string
  readonly rank: number
  readonly total: number
  readonly score: number
  readonly traits: Readonly<Record<string, Trait>>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetcher
// ═══════════════════════════════════════════════════════════════════════════════

export type FetchStatus = 'ok' | 'error' | 'timeout' | 'blocked' | 'too_large' | 'aborted'

export interface FetchResult {
  status: FetchStatus
  statusCode?: number
  html?: string
  durationMs: number
  error?: string
}

export interface FetchOptions {
  timeoutMs?: number
  maxSizeBytes?: number
  headers?: Record<string, string>
  /** Aborts the in-flight request and any pending retry */
  signal?: AbortSignal
}

export interface RetryPolicy {
  maxAttempts: number
  initialDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
  retryableStatusCodes: number[]
}

/**
 * Anything that can turn a URL into page HTML. The lookup service only
 * depends on this, so tests swap in an in-process fake.
 */
export interface PageFetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>
}

export const DEFAULT_FETCH_OPTIONS = {
  timeoutMs: 15000,
  maxSizeBytes: 5 * 1024 * 1024,
} as const

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 2,
  initialDelayMs: 500,
  maxDelayMs: 4000,
  backoffMultiplier: 2,
  retryableStatusCodes: [429, 500, 502, 503, 504],
}

export const DEFAULT_FETCH_HEADERS: Record<string, string> = {
  'User-Agent': 'RarityLens/0.1 (+item rarity lookup)',
  Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
}
