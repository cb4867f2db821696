/**
 * Result cache
 *
 * Memoizes result sets per fingerprint with at most one concurrent
 * computation per fingerprint:
 * - in-process: concurrent callers join one in-flight computation
 * - across processes: the backend's set-if-absent lock; callers that lose
 *   poll for the stored entry until it appears or the lock lapses
 *
 * Expiry is measured from `fetchedAt`. Partial result sets live for
 * `partialTtlMs` at most.
 */

import { silentLogger, type ILogger } from '@pricelens/logger'
import { raceAbort, sleep, throwIfAborted } from '../lib/abort.js'
import { SearchAbortedError } from '../lib/errors.js'
import type { ResultSet } from '../types.js'
import type { CacheBackend, CacheEntry } from './types.js'

export interface CacheConfig {
  ttlMs: number
  partialTtlMs: number
  /** How long a compute lock survives a crashed owner */
  lockTtlMs: number
  pollIntervalMs: number
}

export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  ttlMs: 15 * 60_000,
  partialTtlMs: 2 * 60_000,
  lockTtlMs: 30_000,
  pollIntervalMs: 250,
}

export type ComputeFn = (signal: AbortSignal) => Promise<ResultSet>

export interface GetOrComputeOptions {
  ttlMs?: number
  signal?: AbortSignal
}

export interface ResultCacheOptions {
  config?: Partial<CacheConfig>
  logger?: ILogger
  now?: () => number
}

interface Flight {
  promise: Promise<ResultSet>
  controller: AbortController
  waiters: number
  settled: boolean
}

export class ResultCache {
  readonly config: CacheConfig
  private readonly log: ILogger
  private readonly now: () => number
  private readonly inflight = new Map<string, Flight>()
  private computations = 0

  constructor(
    private readonly backend: CacheBackend,
    options: ResultCacheOptions = {}
  ) {
    this.config = { ...DEFAULT_CACHE_CONFIG, ...options.config }
    this.log = options.logger ?? silentLogger
    this.now = options.now ?? (() => Date.now())
  }

  /** Number of compute functions this instance has started */
  get computeCount(): number {
    return this.computations
  }

  get inflightCount(): number {
    return this.inflight.size
  }

  effectiveTtl(resultSet: ResultSet, ttlMs = this.config.ttlMs): number {
    return resultSet.partial ? Math.min(ttlMs, this.config.partialTtlMs) : ttlMs
  }

  isFresh(entry: CacheEntry): boolean {
    const fetchedAt = Date.parse(entry.resultSet.fetchedAt)
    return Number.isFinite(fetchedAt) && this.now() < fetchedAt + entry.ttlMs
  }

  /**
   * The stored result set when present and unexpired.
   */
  async get(fingerprint: string): Promise<ResultSet | undefined> {
    const entry = await this.backend.get(fingerprint)
    if (!entry) return undefined
    if (!this.isFresh(entry)) {
      await this.backend.delete(fingerprint)
      return undefined
    }
    return entry.resultSet
  }

  async invalidate(fingerprint: string): Promise<void> {
    await this.backend.delete(fingerprint)
    this.log.info('Cache invalidated', { fingerprint })
  }

  /**
   * Return the cached result set or compute it once. Each caller may abort
   * on its own; the computation is aborted only when every caller has left,
   * and an aborted computation stores nothing.
   */
  async getOrCompute(fingerprint: string, compute: ComputeFn, options: GetOrComputeOptions = {}): Promise<ResultSet> {
    throwIfAborted(options.signal)

    let flight = this.inflight.get(fingerprint)
    if (flight) {
      this.log.debug('Joining in-flight computation', { fingerprint, waiters: flight.waiters })
    } else {
      flight = this.startFlight(fingerprint, compute, options.ttlMs ?? this.config.ttlMs)
    }

    return this.join(fingerprint, flight, options.signal)
  }

  private startFlight(fingerprint: string, compute: ComputeFn, ttlMs: number): Flight {
    const controller = new AbortController()
    const flight: Flight = {
      promise: this.run(fingerprint, compute, ttlMs, controller.signal),
      controller,
      waiters: 0,
      settled: false,
    }
    this.inflight.set(fingerprint, flight)

    const settle = () => {
      flight.settled = true
      if (this.inflight.get(fingerprint) === flight) {
        this.inflight.delete(fingerprint)
      }
    }
    void flight.promise.then(settle, settle)

    return flight
  }

  private async run(fingerprint: string, compute: ComputeFn, ttlMs: number, signal: AbortSignal): Promise<ResultSet> {
    for (;;) {
      const cached = await this.get(fingerprint)
      if (cached) {
        this.log.debug('Cache hit', { fingerprint })
        return cached
      }
      throwIfAborted(signal)

      const token = await this.backend.acquireLock(fingerprint, this.config.lockTtlMs)
      if (token === null) {
        this.log.debug('Another process is computing, polling', { fingerprint })
        await sleep(this.config.pollIntervalMs, signal)
        continue
      }

      try {
        // A peer may have stored between our read and our lock
        const raced = await this.get(fingerprint)
        if (raced) return raced

        this.computations++
        const resultSet = await compute(signal)
        throwIfAborted(signal)

        await this.store(fingerprint, resultSet, ttlMs)
        return resultSet
      } finally {
        await this.backend.releaseLock(fingerprint, token)
      }
    }
  }

  private async store(fingerprint: string, resultSet: ResultSet, ttlMs: number): Promise<void> {
    const effective = this.effectiveTtl(resultSet, ttlMs)
    const remaining = Date.parse(resultSet.fetchedAt) + effective - this.now()
    if (!(remaining > 0)) {
      this.log.debug('Result expired before it could be stored', { fingerprint })
      return
    }

    await this.backend.set(fingerprint, { resultSet, ttlMs: effective }, remaining)
    this.log.debug('Cache stored', {
      fingerprint,
      backend: this.backend.name,
      ttlMs: effective,
      partial: resultSet.partial,
    })
  }

  private async join(fingerprint: string, flight: Flight, signal?: AbortSignal): Promise<ResultSet> {
    flight.waiters++
    try {
      return await raceAbort(flight.promise, signal)
    } finally {
      flight.waiters--
      if (flight.waiters === 0 && !flight.settled) {
        this.log.debug('Every caller left, aborting computation', { fingerprint })
        flight.controller.abort(new SearchAbortedError())
        if (this.inflight.get(fingerprint) === flight) {
          this.inflight.delete(fingerprint)
        }
      }
    }
  }
}
