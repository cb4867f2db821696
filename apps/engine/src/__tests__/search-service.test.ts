import { describe, it, expect, beforeAll } from 'vitest'
import { MemoryCacheBackend } from '../cache/memory-backend.js'
import { ResultCache } from '../cache/result-cache.js'
import { Governor } from '../governor/governor.js'
import { ConfigurationError, RequestValidationError, SearchAbortedError } from '../lib/errors.js'
import { ResultNormalizer } from '../normalizer/index.js'
import { HashingEmbedder } from '../retrieval/embedder.js'
import { InsightEngine } from '../retrieval/insight-engine.js'
import { loadKnowledgeBase, type InMemoryKnowledgeStore } from '../retrieval/knowledge-store.js'
import { createSearchService, parseSearchRequest } from '../search-service.js'
import type { Insight, InsightKind, SourceAdapter } from '../types.js'
import { failing, hanging, rawListing, returning, stubAdapter } from './stub-adapters.js'

let store: InMemoryKnowledgeStore

beforeAll(async () => {
  store = await loadKnowledgeBase(new HashingEmbedder())
})

function build(adapters: SourceAdapter[], options: { insights?: boolean } = {}) {
  const normalizer = new ResultNormalizer()
  return createSearchService({
    adapters,
    cache: new ResultCache(new MemoryCacheBackend()),
    governor: new Governor({ defaultLimit: { minSpacingMs: 0, maxPerWindow: 100, windowMs: 1000 } }),
    normalizer,
    ...(options.insights === false ? {} : { insights: new InsightEngine(store, { normalizer }) }),
    orchestrator: { deadlineMs: 50 },
  })
}

function insightOf<K extends InsightKind>(insights: Insight[], kind: K): Extract<Insight, { kind: K }> | undefined {
  return insights.find((insight): insight is Extract<Insight, { kind: K }> => insight.kind === kind)
}

describe('SearchService', () => {
  it('merges sources into one cluster, records the timed-out source and adds insights', async () => {
    const alpha = stubAdapter(
      'alpha',
      returning([rawListing('alpha', 'Apple iPhone 16 Pro 128GB Natural Titanium - Unlocked', '$999.00')])
    )
    const beta = stubAdapter('beta', returning([rawListing('beta', 'iPhone 16 Pro (128GB, Natural Titanium)', '$1,049.00')]))
    const gamma = stubAdapter('gamma', hanging())
    const service = build([alpha, beta, gamma])

    const response = await service.search({ query: 'iPhone 16 Pro, 128GB', region: 'US' })

    const { resultSet } = response
    expect(resultSet.clusters).toHaveLength(1)
    const [cluster] = resultSet.clusters
    expect(cluster.displayName).toBe('iPhone 16 Pro (128GB, Natural Titanium)')
    expect(cluster.listings.map((listing) => listing.price)).toEqual([999, 1049])
    expect(cluster.listings.map((listing) => listing.sourceId)).toEqual(['alpha', 'beta'])
    expect(cluster.listings.every((listing) => listing.currency === 'USD')).toBe(true)

    expect(response.partial).toBe(true)
    expect(resultSet.outcome).toBe('partial')
    expect(resultSet.failedSources).toEqual(['gamma'])
    expect(resultSet.succeededSources).toEqual(['alpha', 'beta'])

    expect(response.insights.map((insight) => insight.kind)).toEqual(['price_analysis', 'recommendation', 'market_trend'])
    expect(insightOf(response.insights, 'price_analysis')?.data).toEqual({
      min: 999,
      max: 1049,
      avg: 1024,
      count: 2,
      currency: 'USD',
      classification: 'great_deal',
      referenceRange: { min: 999, max: 1599, avg: 1200 },
    })
    expect(insightOf(response.insights, 'recommendation')?.data.alternatives).toEqual([
      'iPhone 16',
      'iPhone 15 Pro',
      'Samsung Galaxy S24 Ultra',
      'Google Pixel 9 Pro',
    ])
    expect(insightOf(response.insights, 'market_trend')?.data.entryId).toBe('apple-iphone-16-pro')
  })

  it('serves a repeated request from the cache', async () => {
    const alpha = stubAdapter('alpha', returning([rawListing('alpha', 'Sony WH-1000XM5 Headphones', '$329.00')]))
    const service = build([alpha], { insights: false })

    const first = await service.search({ query: 'Sony WH-1000XM5', region: 'US' })
    const second = await service.search({ query: '  sony wh-1000xm5 ', region: 'us', maxResults: 5 })

    expect(alpha.calls).toBe(1)
    expect(second.resultSet.fingerprint).toBe(first.resultSet.fingerprint)
    expect(second.insights).toEqual([])
  })

  it('runs one fetch for concurrent identical requests', async () => {
    const alpha = stubAdapter('alpha', returning([rawListing('alpha', 'Sony WH-1000XM5 Headphones', '$329.00')], 20))
    const service = build([alpha], { insights: false })

    const [first, second] = await Promise.all([
      service.search({ query: 'Sony WH-1000XM5', region: 'US' }),
      service.search({ query: 'SONY WH-1000XM5', region: 'US' }),
    ])

    expect(alpha.calls).toBe(1)
    expect(second.resultSet).toBe(first.resultSet)
  })

  it('applies maxResults as a view over the cached result set', async () => {
    const alpha = stubAdapter(
      'alpha',
      returning([
        rawListing('alpha', 'Apple iPhone 16 Pro 128GB', '$999.00'),
        rawListing('alpha', 'Sony WH-1000XM5 Headphones', '$329.00'),
      ])
    )
    const service = build([alpha], { insights: false })

    const narrow = await service.search({ query: 'iPhone 16 Pro', region: 'US', maxResults: 1 })
    const wide = await service.search({ query: 'iPhone 16 Pro', region: 'US', maxResults: 10 })

    expect(narrow.resultSet.clusters).toHaveLength(1)
    expect(narrow.resultSet.clusters[0].displayName).toBe('Apple iPhone 16 Pro 128GB')
    expect(wide.resultSet.clusters).toHaveLength(2)
    expect(alpha.calls).toBe(1)
  })

  it('recomputes after refresh and invalidate', async () => {
    const alpha = stubAdapter('alpha', returning([rawListing('alpha', 'Sony WH-1000XM5 Headphones', '$329.00')]))
    const service = build([alpha], { insights: false })
    const request = { query: 'Sony WH-1000XM5', region: 'US' }

    await service.search(request)
    await service.refresh(request)
    expect(alpha.calls).toBe(2)

    await service.invalidate(request)
    await service.search(request)
    expect(alpha.calls).toBe(3)
  })

  it('reports total failure when every source fails', async () => {
    const service = build([stubAdapter('alpha', failing(new Error('boom'))), stubAdapter('beta', hanging())], {
      insights: false,
    })

    const response = await service.search({ query: 'iPhone 16 Pro', region: 'US' })

    expect(response.resultSet.outcome).toBe('total_failure')
    expect(response.resultSet.clusters).toEqual([])
    expect(response.resultSet.failedSources).toEqual(['alpha', 'beta'])
    expect(response.partial).toBe(true)
  })

  it('rejects invalid requests without calling any source', async () => {
    const alpha = stubAdapter('alpha', returning([]))
    const service = build([alpha])

    await expect(service.search({ query: '   ', region: 'US' })).rejects.toBeInstanceOf(RequestValidationError)
    await expect(service.search({ query: 'tv', region: 'USA' })).rejects.toBeInstanceOf(RequestValidationError)
    await expect(service.search({ query: 'tv', region: 'US', maxResults: 0 })).rejects.toBeInstanceOf(
      RequestValidationError
    )
    await expect(service.search({ query: 'x'.repeat(201), region: 'US' })).rejects.toBeInstanceOf(
      RequestValidationError
    )
    expect(alpha.calls).toBe(0)
  })

  it('rejects with the caller abort reason and stores nothing', async () => {
    const alpha = stubAdapter('alpha', hanging())
    const service = build([alpha])
    const controller = new AbortController()
    const reason = new SearchAbortedError()

    const pending = service.search({ query: 'iPhone 16 Pro', region: 'US' }, { signal: controller.signal })
    setTimeout(() => controller.abort(reason), 10)

    await expect(pending).rejects.toBe(reason)
  })
})

describe('parseSearchRequest', () => {
  it('upper-cases the region, applies defaults and freezes the request', () => {
    const request = parseSearchRequest({ query: ' iPhone 16 ', region: 'gb' })

    expect(request).toEqual({ query: 'iPhone 16', region: 'GB', maxResults: 20, filters: {} })
    expect(Object.isFrozen(request)).toBe(true)
    expect(Object.isFrozen(request.filters)).toBe(true)
  })

  it('names each invalid field', () => {
    let thrown: unknown
    try {
      parseSearchRequest({ query: '', region: 'U1', maxResults: 101 })
    } catch (error) {
      thrown = error
    }

    expect(thrown).toBeInstanceOf(RequestValidationError)
    expect(thrown).toMatchObject({
      issues: [
        { path: 'query', message: 'Query must not be empty' },
        { path: 'region', message: 'Region must be a two-letter code' },
        { path: 'maxResults', message: 'Number must be less than or equal to 100' },
      ],
    })
  })
})

describe('createSearchService', () => {
  const cache = () => new ResultCache(new MemoryCacheBackend())

  it('requires at least one adapter', () => {
    expect(() => createSearchService({ adapters: [], cache: cache() })).toThrow(ConfigurationError)
  })

  it('rejects duplicate adapter ids', () => {
    const adapters = [stubAdapter('alpha', returning([])), stubAdapter('alpha', returning([]))]
    expect(() => createSearchService({ adapters, cache: cache() })).toThrow(ConfigurationError)
  })
})
