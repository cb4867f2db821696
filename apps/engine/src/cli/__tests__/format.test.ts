import { describe, it, expect } from 'vitest'
import { formatResponse } from '../format.js'
import type { CanonicalListing, SearchResponse } from '../../types.js'

function listing(price: number, sourceId: string): CanonicalListing {
  return {
    productName: 'iPhone 16 Pro 128GB',
    normalizedName: 'iphone 16 pro 128gb',
    price,
    currency: 'USD',
    sourceId,
    url: `https://${sourceId}.example/p/1`,
    matchClusterId: 'c1',
  }
}

function response(overrides: Partial<SearchResponse['resultSet']> = {}): SearchResponse {
  const resultSet = {
    fingerprint: 'fp',
    clusters: [{ id: 'c1', displayName: 'iPhone 16 Pro 128GB', score: 0.9, listings: [listing(999, 'alpha'), listing(1049, 'beta')] }],
    fetchedAt: '2026-01-15T12:00:00.000Z',
    partial: true,
    failedSources: ['gamma'],
    succeededSources: ['alpha', 'beta'],
    outcome: 'partial' as const,
    ...overrides,
  }
  return {
    resultSet,
    partial: resultSet.partial,
    insights: [
      {
        kind: 'market_trend',
        title: 'Market trend: iPhone 16 Pro',
        content: 'Prices hold for six months.',
        supportingEntries: ['apple-iphone-16-pro'],
        data: { entryId: 'apple-iphone-16-pro', score: 0.7 },
      },
    ],
  }
}

describe('formatResponse', () => {
  it('lists clusters, failed sources and insights', () => {
    expect(formatResponse('iPhone 16 Pro', 'US', response()).split('\n')).toEqual([
      'Results for "iPhone 16 Pro" in US (partial)',
      '',
      '1. iPhone 16 Pro 128GB  999.00-1049.00 USD  (2 listings)',
      '   999.00 USD  alpha  https://alpha.example/p/1',
      '   1049.00 USD  beta  https://beta.example/p/1',
      '',
      'Failed sources: gamma',
      '',
      '[Market trend: iPhone 16 Pro]',
      'Prices hold for six months.',
    ])
  })

  it('says so when nothing matched', () => {
    const text = formatResponse('tv', 'US', response({ clusters: [], failedSources: [], outcome: 'no_results' }))

    expect(text.split('\n').slice(0, 3)).toEqual(['Results for "tv" in US (no results)', '', 'No matching listings.'])
  })
})
