import { describe, it, expect } from 'vitest'
import type { ResultSet } from '../../types.js'
import { MemoryCacheBackend } from '../memory-backend.js'

const resultSet: ResultSet = {
  fingerprint: 'fp',
  clusters: [],
  fetchedAt: '2026-01-15T12:00:00.000Z',
  partial: false,
  failedSources: [],
  succeededSources: [],
  outcome: 'no_results',
}

describe('MemoryCacheBackend', () => {
  it('expires entries once their TTL has passed', async () => {
    let now = 1000
    const backend = new MemoryCacheBackend(() => now)
    await backend.set('fp', { resultSet, ttlMs: 500 }, 500)

    now = 1499
    expect(await backend.get('fp')).toEqual({ resultSet, ttlMs: 500 })

    now = 1500
    expect(await backend.get('fp')).toBeUndefined()
    expect(backend.size()).toBe(0)
  })

  it('drops expired entries for other keys on the next write', async () => {
    let now = 0
    const backend = new MemoryCacheBackend(() => now)
    for (let i = 0; i < 1000; i++) {
      await backend.set(`fp-${i}`, { resultSet, ttlMs: 100 }, 100)
    }
    await backend.set('long-lived', { resultSet, ttlMs: 10_000 }, 10_000)

    now = 100
    await backend.set('fresh', { resultSet, ttlMs: 100 }, 100)

    expect(backend.size()).toBe(2)
    expect(await backend.get('long-lived')).toEqual({ resultSet, ttlMs: 10_000 })
  })

  it('grants a lock to one holder until released or lapsed', async () => {
    let now = 0
    const backend = new MemoryCacheBackend(() => now)

    const token = await backend.acquireLock('fp', 100)
    expect(token).toEqual(expect.any(String))
    expect(await backend.acquireLock('fp', 100)).toBeNull()

    await backend.releaseLock('fp', 'someone-else')
    expect(await backend.acquireLock('fp', 100)).toBeNull()

    now = 100
    expect(await backend.acquireLock('fp', 100)).toEqual(expect.any(String))
  })

  it('frees the lock for its owner', async () => {
    const backend = new MemoryCacheBackend()
    const token = await backend.acquireLock('fp', 10_000)

    await backend.releaseLock('fp', token ?? '')

    expect(await backend.acquireLock('fp', 10_000)).toEqual(expect.any(String))
  })
})
