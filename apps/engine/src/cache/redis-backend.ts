/**
 * Redis cache backend
 *
 * Entries are JSON under `<prefix>result:<fingerprint>` with a PX expiry; the
 * compute lock is `SET NX PX` with compare-and-delete release.
 */

import { acquireRedisLock, releaseRedisLock } from '@pricelens/redis'
import { silentLogger, type ILogger } from '@pricelens/logger'
import { deserializeEntry, serializeEntry } from './serialization.js'
import type { CacheBackend, CacheEntry } from './types.js'

/**
 * The ioredis commands this backend uses. An ioredis client satisfies it.
 */
export interface RedisCacheClient {
  get(key: string): Promise<string | null>
  set(key: string, value: string, millisecondsToken: 'PX', milliseconds: number): Promise<'OK' | null>
  set(key: string, value: string, millisecondsToken: 'PX', milliseconds: number, nx: 'NX'): Promise<'OK' | null>
  del(key: string): Promise<number>
  eval(script: string, numkeys: number, ...args: string[]): Promise<unknown>
}

export interface RedisBackendOptions {
  keyPrefix?: string
  logger?: ILogger
}

export class RedisCacheBackend implements CacheBackend {
  readonly name = 'redis'
  private readonly prefix: string
  private readonly log: ILogger

  constructor(
    private readonly redis: RedisCacheClient,
    options: RedisBackendOptions = {}
  ) {
    this.prefix = options.keyPrefix ?? 'pricelens:'
    this.log = options.logger ?? silentLogger
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    const raw = await this.redis.get(this.resultKey(key))
    if (raw === null) return undefined

    const entry = deserializeEntry(raw)
    if (!entry) {
      this.log.warn('Discarding unreadable cache entry', { key })
    }
    return entry
  }

  async set(key: string, entry: CacheEntry, ttlMs: number): Promise<void> {
    await this.redis.set(this.resultKey(key), serializeEntry(entry), 'PX', Math.max(1, Math.ceil(ttlMs)))
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(this.resultKey(key))
  }

  async acquireLock(key: string, ttlMs: number): Promise<string | null> {
    const handle = await acquireRedisLock(this.redis, this.lockKey(key), ttlMs)
    return handle?.token ?? null
  }

  async releaseLock(key: string, token: string): Promise<void> {
    const released = await releaseRedisLock(this.redis, { key: this.lockKey(key), token })
    if (!released) {
      this.log.debug('Lock already lapsed', { key })
    }
  }

  private resultKey(fingerprint: string): string {
    return `${this.prefix}result:${fingerprint}`
  }

  private lockKey(fingerprint: string): string {
    return `${this.prefix}lock:${fingerprint}`
  }
}
