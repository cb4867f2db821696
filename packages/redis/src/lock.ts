import { randomUUID } from 'node:crypto'

const RELEASE_LUA = `
  if redis.call("get", KEYS[1]) == ARGV[1] then
    return redis.call("del", KEYS[1])
  else
    return 0
  end
`

export const DEFAULT_LOCK_TTL_MS = 30_000

/**
 * The slice of the ioredis client the lock helpers need. An ioredis `Redis`
 * satisfies it; tests pass an in-memory fake.
 */
export interface LockClient {
  set(key: string, value: string, millisecondsToken: 'PX', milliseconds: number, nx: 'NX'): Promise<'OK' | null>
  eval(script: string, numkeys: number, ...args: string[]): Promise<unknown>
}

export interface RedisLockHandle {
  key: string
  token: string
}

/**
 * Acquire a lock with an owner token and TTL.
 * Returns null if the lock is already held.
 */
export async function acquireRedisLock(
  redis: LockClient,
  key: string,
  ttlMs = DEFAULT_LOCK_TTL_MS
): Promise<RedisLockHandle | null> {
  const token = randomUUID()
  const result = await redis.set(key, token, 'PX', ttlMs, 'NX')
  if (result !== 'OK') {
    return null
  }
  return { key, token }
}

/**
 * Release a lock only if the token matches the current owner.
 */
export async function releaseRedisLock(redis: LockClient, handle: RedisLockHandle): Promise<boolean> {
  const result = await redis.eval(RELEASE_LUA, 1, handle.key, handle.token)
  return Number(result) === 1
}
