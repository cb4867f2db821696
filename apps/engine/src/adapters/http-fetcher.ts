/**
 * HTTP Fetcher
 *
 * Fetches a search page with native fetch under a per-request timeout that is
 * linked to the caller's signal. Failures surface as SourceError so the
 * orchestrator records the right kind:
 * - 401/403/429, or a 503 that looks like a challenge page → blocked
 * - per-request timeout → timeout
 * - other non-2xx, oversized bodies, network errors → unavailable
 *
 * Caller cancellation is rethrown untouched.
 */

import { abortReason, throwIfAborted } from '../lib/abort.js'
import { SourceError } from '../lib/errors.js'

export const DEFAULT_FETCH_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent': 'PriceLensBot/0.1 (+https://pricelens.invalid/bot)',
  Accept: 'text/html,application/xhtml+xml',
  'Accept-Language': 'en-US,en;q=0.9',
}

export interface FetchPageOptions {
  signal?: AbortSignal
  timeoutMs?: number
  headers?: Record<string, string>
}

export interface HttpFetcherOptions {
  timeoutMs?: number
  maxSizeBytes?: number
  fetch?: typeof fetch
}

const BLOCKED_STATUS = new Set([401, 403, 429])
const BLOCK_MARKERS = [/captcha/i, /access denied/i, /are you a robot/i, /unusual traffic/i, /cf-challenge/i]

export class HttpFetcher {
  private readonly timeoutMs: number
  private readonly maxSizeBytes: number
  private readonly fetchFn: typeof fetch

  constructor(private readonly sourceId: string, options: HttpFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 10_000
    this.maxSizeBytes = options.maxSizeBytes ?? 5 * 1024 * 1024
    this.fetchFn = options.fetch ?? ((input, init) => globalThis.fetch(input, init))
  }

  async fetchHtml(url: string, options: FetchPageOptions = {}): Promise<string> {
    const { signal } = options
    throwIfAborted(signal)

    const timeoutMs = options.timeoutMs ?? this.timeoutMs
    const controller = new AbortController()
    let timedOut = false
    const timer = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, timeoutMs)
    const onCallerAbort = () => controller.abort(signal ? abortReason(signal) : undefined)
    signal?.addEventListener('abort', onCallerAbort, { once: true })

    try {
      const response = await this.fetchFn(url, {
        method: 'GET',
        headers: { ...DEFAULT_FETCH_HEADERS, ...options.headers },
        signal: controller.signal,
        redirect: 'follow',
      })

      if (BLOCKED_STATUS.has(response.status)) {
        throw new SourceError(this.sourceId, 'blocked', `HTTP ${response.status} from ${new URL(url).host}`)
      }

      const contentLength = Number(response.headers.get('content-length') ?? Number.NaN)
      if (Number.isFinite(contentLength) && contentLength > this.maxSizeBytes) {
        throw new SourceError(this.sourceId, 'unavailable', `Response too large: ${contentLength} bytes`)
      }

      const body = await response.text()

      if (response.status === 503 && this.looksBlocked(body)) {
        throw new SourceError(this.sourceId, 'blocked', 'Request challenged (captcha or access denied)')
      }
      if (!response.ok) {
        throw new SourceError(this.sourceId, 'unavailable', `HTTP ${response.status}: ${response.statusText}`)
      }
      if (Buffer.byteLength(body) > this.maxSizeBytes) {
        throw new SourceError(this.sourceId, 'unavailable', 'Response exceeded size limit')
      }

      return body
    } catch (error) {
      if (signal?.aborted) throw abortReason(signal)
      if (timedOut) {
        throw new SourceError(this.sourceId, 'timeout', `Request timed out after ${timeoutMs}ms`, { cause: error })
      }
      if (error instanceof SourceError) throw error
      throw new SourceError(
        this.sourceId,
        'unavailable',
        error instanceof Error ? error.message : 'Request failed',
        { cause: error }
      )
    } finally {
      clearTimeout(timer)
      signal?.removeEventListener('abort', onCallerAbort)
    }
  }

  private looksBlocked(body: string): boolean {
    return BLOCK_MARKERS.some((marker) => marker.test(body))
  }
}
