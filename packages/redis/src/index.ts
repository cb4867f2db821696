/**
 * @pricelens/redis - Shared Redis connection utilities
 *
 * One place that turns environment variables into ioredis options, so the
 * cache backend and any tooling connect the same way.
 */

import { Redis, type RedisOptions } from 'ioredis'
import { createLogger } from '@pricelens/logger'

const log = createLogger('redis')

export interface RedisConfig {
  host: string
  port: number
  password: string | undefined
  redisUrl: string | undefined
}

/**
 * Parse Redis configuration from environment variables.
 *
 * Supports two modes:
 * - REDIS_URL: full URL (e.g., redis://:password@host:port), parsed into components
 * - REDIS_HOST/PORT/PASSWORD: individual variables
 */
export function parseRedisConfig(env: NodeJS.ProcessEnv = process.env): RedisConfig {
  const redisUrl = env.REDIS_URL

  if (redisUrl) {
    try {
      const url = new URL(redisUrl)
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        password: url.password || undefined,
        redisUrl,
      }
    } catch (error) {
      log.warn('Failed to parse REDIS_URL, falling back to REDIS_HOST/PORT', {}, error)
    }
  }

  return {
    host: env.REDIS_HOST || 'localhost',
    port: parseInt(env.REDIS_PORT || '6379', 10),
    password: env.REDIS_PASSWORD || undefined,
    redisUrl: undefined,
  }
}

/**
 * Connection info for logging, password masked.
 */
export function describeRedisConfig(config: RedisConfig): string {
  return config.redisUrl
    ? config.redisUrl.replace(/\/\/([^:@/]*):[^@]+@/, '//$1:***@')
    : `${config.host}:${config.port}`
}

const RECONNECT_ERRORS = [
  'READONLY',
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
]

/**
 * ioredis options with keepalive, bounded retries and reconnect-on-error.
 *
 * After 20 attempts the retry delay is capped at 30s and logged at most once
 * per minute.
 */
export function buildRedisOptions(config: RedisConfig = parseRedisConfig()): RedisOptions {
  const info = describeRedisConfig(config)
  let consecutiveFailures = 0
  let lastCircuitBreakerLog = 0

  return {
    host: config.host,
    port: config.port,
    password: config.password,
    maxRetriesPerRequest: 3,
    keepAlive: 10000,
    connectTimeout: 10000,
    commandTimeout: 5000,
    enableOfflineQueue: true,
    lazyConnect: true,

    retryStrategy(times: number) {
      consecutiveFailures = times

      if (times > 20) {
        const now = Date.now()
        if (now - lastCircuitBreakerLog > 60000) {
          lastCircuitBreakerLog = now
          log.error('Circuit breaker: prolonged outage', { attempts: times, connection: info })
        }
        return 30000
      }

      const delay = Math.min(times * 500, 30000)
      log.info('Reconnecting', { attempt: times, delayMs: delay })
      return delay
    },

    reconnectOnError(err: Error) {
      if (RECONNECT_ERRORS.some((code) => err.message.includes(code))) {
        if (consecutiveFailures <= 20) {
          log.warn('Reconnecting due to error', { reason: err.message })
        }
        return true
      }
      return false
    },
  }
}

/**
 * Create a dedicated Redis client. The connection opens on first command.
 */
export function createRedisClient(config: RedisConfig = parseRedisConfig()): Redis {
  const client = new Redis(buildRedisOptions(config))
  const info = describeRedisConfig(config)

  client.on('error', (err: Error) => {
    log.error('Connection error', { connection: info }, err)
  })
  client.on('connect', () => {
    log.info('Connected', { connection: info })
  })

  return client
}

export {
  acquireRedisLock,
  releaseRedisLock,
  DEFAULT_LOCK_TTL_MS,
  type LockClient,
  type RedisLockHandle,
} from './lock.js'

export { Redis }
export type { RedisOptions }
