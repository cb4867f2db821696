import type { Embedder } from '../embedder.js'
import type { KnowledgeEntryInput } from '../knowledge-store.js'
import type { CanonicalListing, MatchCluster, ResultSet } from '../../types.js'

/**
 * Every text embeds to the same unit vector, so an entry's score is the
 * cosine between [1, 0] and its stored embedding.
 */
export class FixedEmbedder implements Embedder {
  readonly dimensions = 2
  readonly texts: string[] = []

  async embed(text: string): Promise<number[]> {
    this.texts.push(text)
    return [1, 0]
  }
}

/** A 2-d embedding whose cosine with [1, 0] is `score` */
export function scoredEmbedding(score: number): number[] {
  return [score, Math.sqrt(1 - score * score)]
}

export function knowledgeEntry(overrides: Partial<KnowledgeEntryInput> & { id: string }): KnowledgeEntryInput {
  return {
    productName: overrides.id,
    category: 'smartphone',
    brand: 'Apple',
    specifications: {},
    currency: 'USD',
    priceRange: { min: 100, max: 200, avg: 150 },
    alternatives: [],
    marketInsights: '',
    lastUpdated: '2026-01-01T00:00:00.000Z',
    ...overrides,
  }
}

export function listing(price: number, overrides: Partial<CanonicalListing> = {}): CanonicalListing {
  return {
    productName: 'iPhone 16 Pro',
    normalizedName: 'iphone 16 pro',
    price,
    currency: 'USD',
    sourceId: 'alpha',
    url: `https://alpha.example/${price}`,
    matchClusterId: 'cl_test',
    ...overrides,
  }
}

export function cluster(displayName: string, listings: CanonicalListing[]): MatchCluster {
  return { id: 'cl_test', displayName, score: 0.9, listings }
}

export function resultSetWith(clusters: MatchCluster[]): ResultSet {
  return {
    fingerprint: 'fp',
    clusters,
    fetchedAt: '2026-01-15T12:00:00.000Z',
    partial: false,
    failedSources: [],
    succeededSources: ['alpha'],
    outcome: clusters.length > 0 ? 'complete' : 'no_results',
  }
}
