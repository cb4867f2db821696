import type { ResultSet } from '../types.js'

export interface CacheEntry {
  resultSet: ResultSet
  /** Lifetime measured from resultSet.fetchedAt */
  ttlMs: number
}

/**
 * Key-value store with TTL and an atomic set-if-absent lock.
 */
export interface CacheBackend {
  readonly name: string
  get(key: string): Promise<CacheEntry | undefined>
  set(key: string, entry: CacheEntry, ttlMs: number): Promise<void>
  delete(key: string): Promise<void>
  /** Returns an owner token, or null when someone else holds the lock */
  acquireLock(key: string, ttlMs: number): Promise<string | null>
  /** Releases only if `token` still owns the lock */
  releaseLock(key: string, token: string): Promise<void>
}
