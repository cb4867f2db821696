/**
 * Rate/Concurrency Governor
 *
 * Bounds simultaneous in-flight source calls (one global ceiling) and paces
 * calls per source with a sliding window:
 * - at least `minSpacingMs` between consecutive calls to a source
 * - at most `maxPerWindow` calls to a source within `windowMs`
 *
 * Per-source state sits behind a per-source mutex, so different sources only
 * ever contend on the global ceiling.
 */

import { silentLogger, type ILogger } from '@pricelens/logger'
import { abortReason, raceAbort, sleep, throwIfAborted } from '../lib/abort.js'
import { SearchAbortedError } from '../lib/errors.js'

export interface SourceRateLimit {
  minSpacingMs: number
  maxPerWindow: number
  windowMs: number
}

export interface GovernorConfig {
  maxConcurrency: number
  defaultLimit: SourceRateLimit
  sourceOverrides: Record<string, Partial<SourceRateLimit>>
}

export const DEFAULT_RATE_LIMIT: SourceRateLimit = {
  minSpacingMs: 1000,
  maxPerWindow: 30,
  windowMs: 60_000,
}

export const DEFAULT_GOVERNOR_CONFIG: GovernorConfig = {
  maxConcurrency: 8,
  defaultLimit: DEFAULT_RATE_LIMIT,
  sourceOverrides: {},
}

export interface Permit {
  readonly id: number
  readonly sourceId: string
  readonly acquiredAt: number
}

export interface SourceGovernorState {
  sourceId: string
  limit: SourceRateLimit
  lastCallAt: number | null
  callsInWindow: number
  waiting: number
  globalInFlight: number
}

interface SourceTiming {
  lastCallAt: number | null
  /** Call timestamps inside the current window, oldest first */
  calls: number[]
  waiting: number
  /** Tail of the per-source mutex chain */
  tail: Promise<void>
}

interface SlotWaiter {
  grant(): void
}

export interface GovernorOptions {
  logger?: ILogger
  now?: () => number
}

export class Governor {
  readonly config: GovernorConfig
  private readonly log: ILogger
  private readonly now: () => number
  private readonly sources = new Map<string, SourceTiming>()
  private readonly slotQueue: SlotWaiter[] = []
  private readonly active = new Set<number>()
  private inFlight = 0
  private nextPermitId = 1

  constructor(config: Partial<GovernorConfig> = {}, options: GovernorOptions = {}) {
    this.config = {
      ...DEFAULT_GOVERNOR_CONFIG,
      ...config,
      defaultLimit: { ...DEFAULT_RATE_LIMIT, ...config.defaultLimit },
    }
    if (!Number.isInteger(this.config.maxConcurrency) || this.config.maxConcurrency < 1) {
      throw new RangeError(`maxConcurrency must be a positive integer, got ${this.config.maxConcurrency}`)
    }
    this.log = options.logger ?? silentLogger
    this.now = options.now ?? (() => Date.now())
  }

  limitFor(sourceId: string): SourceRateLimit {
    return { ...this.config.defaultLimit, ...this.config.sourceOverrides[sourceId] }
  }

  /**
   * Wait for a global slot and the source's pacing window. Rejects without
   * consuming a slot when the signal aborts first.
   */
  async acquire(sourceId: string, signal?: AbortSignal): Promise<Permit> {
    throwIfAborted(signal)
    const timing = this.timingFor(sourceId)
    const limit = this.limitFor(sourceId)

    timing.waiting++
    try {
      return await this.withSourceLock(timing, signal, async () => {
        await this.waitForWindow(sourceId, timing, limit, signal)
        await this.acquireSlot(signal)

        const now = this.now()
        timing.lastCallAt = now
        timing.calls.push(now)

        const permit: Permit = { id: this.nextPermitId++, sourceId, acquiredAt: now }
        this.active.add(permit.id)
        return permit
      })
    } finally {
      timing.waiting--
    }
  }

  /**
   * Free the permit's global slot. Releasing twice is a no-op.
   */
  release(permit: Permit): void {
    if (!this.active.delete(permit.id)) return

    const next = this.slotQueue.shift()
    if (next) {
      // Slot passes straight to the next waiter; inFlight is unchanged
      next.grant()
    } else {
      this.inFlight--
    }
  }

  /**
   * Run `fn` under a permit; the permit is released on every exit path.
   */
  async withPermit<T>(sourceId: string, fn: (permit: Permit) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const permit = await this.acquire(sourceId, signal)
    try {
      return await fn(permit)
    } finally {
      this.release(permit)
    }
  }

  getState(sourceId: string): SourceGovernorState {
    const timing = this.sources.get(sourceId)
    const limit = this.limitFor(sourceId)
    const windowStart = this.now() - limit.windowMs
    return {
      sourceId,
      limit,
      lastCallAt: timing?.lastCallAt ?? null,
      callsInWindow: timing ? timing.calls.filter((at) => at > windowStart).length : 0,
      waiting: timing?.waiting ?? 0,
      globalInFlight: this.inFlight,
    }
  }

  private timingFor(sourceId: string): SourceTiming {
    let timing = this.sources.get(sourceId)
    if (!timing) {
      timing = { lastCallAt: null, calls: [], waiting: 0, tail: Promise.resolve() }
      this.sources.set(sourceId, timing)
    }
    return timing
  }

  private async withSourceLock<T>(timing: SourceTiming, signal: AbortSignal | undefined, fn: () => Promise<T>): Promise<T> {
    const previous = timing.tail
    let unlock: () => void = () => {}
    const current = new Promise<void>((resolve) => {
      unlock = resolve
    })
    timing.tail = previous.then(() => current)

    try {
      await raceAbort(previous, signal)
      return await fn()
    } finally {
      unlock()
    }
  }

  private async waitForWindow(
    sourceId: string,
    timing: SourceTiming,
    limit: SourceRateLimit,
    signal?: AbortSignal
  ): Promise<void> {
    for (;;) {
      const now = this.now()
      const windowStart = now - limit.windowMs
      while (timing.calls.length > 0 && timing.calls[0] <= windowStart) {
        timing.calls.shift()
      }

      let waitMs = 0
      if (timing.lastCallAt !== null) {
        waitMs = Math.max(waitMs, timing.lastCallAt + limit.minSpacingMs - now)
      }
      if (timing.calls.length >= limit.maxPerWindow) {
        waitMs = Math.max(waitMs, timing.calls[0] + limit.windowMs - now)
      }

      if (waitMs <= 0) return

      this.log.debug('Pacing source', { sourceId, waitMs, callsInWindow: timing.calls.length })
      await sleep(waitMs, signal)
    }
  }

  private acquireSlot(signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal)
    if (this.inFlight < this.config.maxConcurrency && this.slotQueue.length === 0) {
      this.inFlight++
      return Promise.resolve()
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.slotQueue.indexOf(waiter)
        if (index >= 0) this.slotQueue.splice(index, 1)
        reject(signal ? abortReason(signal) : new SearchAbortedError())
      }
      const waiter: SlotWaiter = {
        grant: () => {
          signal?.removeEventListener('abort', onAbort)
          resolve()
        },
      }
      signal?.addEventListener('abort', onAbort, { once: true })
      this.slotQueue.push(waiter)
    })
  }
}
