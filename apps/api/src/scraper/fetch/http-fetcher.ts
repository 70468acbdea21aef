/**
 * HTTP Fetcher
 *
 * Retrieves item-details pages with native fetch. Owns every HTTP-level
 * concern (timeouts, non-2xx statuses, captcha pages, oversized bodies,
 * retries with exponential backoff) and reports them as a FetchResult
 * status, never by throwing.
 */

import type { FetchOptions, FetchResult, PageFetcher, RetryPolicy } from '../types'
import { DEFAULT_FETCH_HEADERS, DEFAULT_FETCH_OPTIONS, DEFAULT_RETRY_POLICY } from '../types'

export interface HttpFetcherOptions {
  retryPolicy?: RetryPolicy
  timeoutMs?: number
  maxSizeBytes?: number
}

const BLOCK_INDICATORS = [
  'captcha',
  'recaptcha',
  'hcaptcha',
  'challenge-form',
  'challenge-running',
  'cf-browser-verification',
  'please verify you are a human',
  'access denied',
]

export class HttpFetcher implements PageFetcher {
  private readonly retryPolicy: RetryPolicy
  private readonly timeoutMs: number
  private readonly maxSizeBytes: number

  constructor(options: HttpFetcherOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_OPTIONS.timeoutMs
    this.maxSizeBytes = options.maxSizeBytes ?? DEFAULT_FETCH_OPTIONS.maxSizeBytes
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const startTime = Date.now()
    const timeoutMs = options.timeoutMs ?? this.timeoutMs
    const maxSizeBytes = options.maxSizeBytes ?? this.maxSizeBytes
    const headers = { ...DEFAULT_FETCH_HEADERS, ...(options.headers ?? {}) }
    const { signal } = options

    let lastError = 'Unknown error after retries'

    for (let attempt = 1; attempt <= this.retryPolicy.maxAttempts; attempt++) {
      if (signal?.aborted) {
        return this.aborted(startTime)
      }

      let result: FetchResult
      try {
        result = await this.fetchOnce(url, headers, { timeoutMs, maxSizeBytes, signal }, startTime)
      } catch (error) {
        // Network-level failure (DNS, reset, refused); retried like a 5xx
        lastError = error instanceof Error ? error.message : String(error)
        if (attempt < this.retryPolicy.maxAttempts) {
          await this.sleep(this.backoffDelay(attempt), signal)
          continue
        }
        break
      }

      const retryable =
        result.status === 'error' &&
        result.statusCode !== undefined &&
        this.retryPolicy.retryableStatusCodes.includes(result.statusCode)

      if (retryable && attempt < this.retryPolicy.maxAttempts) {
        await this.sleep(this.backoffDelay(attempt), signal)
        continue
      }

      return result
    }

    if (signal?.aborted) {
      return this.aborted(startTime)
    }

    return {
      status: 'error',
      durationMs: Date.now() - startTime,
      error: lastError,
    }
  }

  private async fetchOnce(
    url: string,
    headers: Record<string, string>,
    opts: { timeoutMs: number; maxSizeBytes: number; signal?: AbortSignal },
    startTime: number
  ): Promise<FetchResult> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), opts.timeoutMs)
    const onCallerAbort = () => controller.abort()
    opts.signal?.addEventListener('abort', onCallerAbort, { once: true })

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      if (response.status === 403 || response.status === 503) {
        const text = await response.text()
        if (this.looksLikeBlockedPage(text)) {
          return {
            status: 'blocked',
            statusCode: response.status,
            durationMs: Date.now() - startTime,
            error: 'Request blocked (captcha or access denied)',
          }
        }
      }

      if (!response.ok) {
        return {
          status: 'error',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `HTTP ${response.status}: ${response.statusText}`,
        }
      }

      const contentLength = response.headers.get('content-length')
      if (contentLength && Number.parseInt(contentLength, 10) > opts.maxSizeBytes) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `Response too large: ${contentLength} bytes`,
        }
      }

      const html = await this.readBodyWithLimit(response, opts.maxSizeBytes)
      if (html === null) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: 'Response exceeded size limit',
        }
      }

      return {
        status: 'ok',
        statusCode: response.status,
        html,
        durationMs: Date.now() - startTime,
      }
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        if (opts.signal?.aborted) {
          return this.aborted(startTime)
        }
        return {
          status: 'timeout',
          durationMs: Date.now() - startTime,
          error: `Request timed out after ${opts.timeoutMs}ms`,
        }
      }
      throw error
    } finally {
      clearTimeout(timeoutId)
      opts.signal?.removeEventListener('abort', onCallerAbort)
    }
  }

  /**
   * Returns null once the body passes maxBytes.
   */
  private async readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
    const reader = response.body?.getReader()
    if (!reader) {
      return ''
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > maxBytes) {
          await reader.cancel()
          return null
        }

        chunks.push(value)
      }

      return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
    } finally {
      reader.releaseLock()
    }
  }

  private looksLikeBlockedPage(html: string): boolean {
    const lowerHtml = html.toLowerCase()
    return BLOCK_INDICATORS.some((indicator) => lowerHtml.includes(indicator))
  }

  private backoffDelay(attempt: number): number {
    return Math.min(
      this.retryPolicy.initialDelayMs * Math.pow(this.retryPolicy.backoffMultiplier, attempt - 1),
      this.retryPolicy.maxDelayMs
    )
  }

  private aborted(startTime: number): FetchResult {
    return {
      status: 'aborted',
      durationMs: Date.now() - startTime,
      error: 'Request aborted by caller',
    }
  }

  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve()
        return
      }
      const timer = setTimeout(done, ms)
      function done() {
        clearTimeout(timer)
        signal?.removeEventListener('abort', done)
        resolve()
      }
      signal?.addEventListener('abort', done, { once: true })
    })
  }
}
