import { randomUUID } from 'node:crypto'
import type { CacheBackend, CacheEntry } from './types.js'

interface Expiring<T> {
  value: T
  expiresAt: number
}

/**
 * Process-local backend. Expired keys are dropped when read, and every write
 * sweeps the rest so the maps only hold live keys.
 */
export class MemoryCacheBackend implements CacheBackend {
  readonly name = 'memory'
  private readonly entries = new Map<string, Expiring<CacheEntry>>()
  private readonly locks = new Map<string, Expiring<string>>()

  constructor(private readonly now: () => number = () => Date.now()) {}

  async get(key: string): Promise<CacheEntry | undefined> {
    return this.live(this.entries, key)
  }

  async set(key: string, entry: CacheEntry, ttlMs: number): Promise<void> {
    this.sweep(this.entries)
    this.entries.set(key, { value: entry, expiresAt: this.now() + ttlMs })
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key)
  }

  async acquireLock(key: string, ttlMs: number): Promise<string | null> {
    this.sweep(this.locks)
    if (this.live(this.locks, key) !== undefined) {
      return null
    }
    const token = randomUUID()
    this.locks.set(key, { value: token, expiresAt: this.now() + ttlMs })
    return token
  }

  async releaseLock(key: string, token: string): Promise<void> {
    if (this.live(this.locks, key) === token) {
      this.locks.delete(key)
    }
  }

  size(): number {
    return this.entries.size
  }

  private sweep<T>(map: Map<string, Expiring<T>>): void {
    const now = this.now()
    for (const [key, item] of map) {
      if (item.expiresAt <= now) map.delete(key)
    }
  }

  private live<T>(map: Map<string, Expiring<T>>, key: string): T | undefined {
    const item = map.get(key)
    if (!item) return undefined
    if (item.expiresAt <= this.now()) {
      map.delete(key)
      return undefined
    }
    return item.value
  }
}
