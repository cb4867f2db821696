/**
 * Shared engine types.
 *
 * Everything that crosses a component boundary is declared here: the request,
 * the adapter contract, listings before and after normalization, result sets,
 * knowledge entries and insights.
 */

import type { ILogger } from '@pricelens/logger'

// =============================================================================
// Requests
// =============================================================================

/** Filter keys the engine understands. Other keys are carried but ignored. */
export type KnownFilterKey = 'sources' | 'excludeSources' | 'minPrice' | 'maxPrice'

export interface SearchRequest {
  readonly query: string
  /** Two-letter region code, upper-case */
  readonly region: string
  readonly maxResults: number
  readonly filters: Readonly<Record<string, string>>
}

// =============================================================================
// Adapter contract
// =============================================================================

export type SourceErrorKind = 'timeout' | 'blocked' | 'parse_failure' | 'unavailable'

export interface RawListing {
  sourceId: string
  title: string
  priceText: string
  url: string
  /** Opaque to the engine except for currency, rating, availability and seller */
  rawAttributes: Record<string, unknown>
}

export interface AdapterContext {
  /** Aborted on deadline or caller cancellation */
  signal: AbortSignal
  logger: ILogger
}

/**
 * A price source. Adapters are stateless functions of (query, region): they
 * resolve with raw listings or reject with a SourceError.
 */
export interface SourceAdapter {
  readonly id: string
  supports(region: string): boolean
  /** Higher runs first. Defaults to 0. */
  priority?(region: string): number
  search(query: string, region: string, ctx: AdapterContext): Promise<RawListing[]>
}

export interface SourceFailure {
  sourceId: string
  kind: SourceErrorKind
  message: string
}

export interface FetchOutcome {
  listings: RawListing[]
  partial: boolean
  failedSources: string[]
  succeededSources: string[]
  failures: SourceFailure[]
}

// =============================================================================
// Normalized results
// =============================================================================

export interface CanonicalListing {
  /** Trimmed human-readable title */
  readonly productName: string
  /** Matching key: lower-case, boilerplate stripped */
  readonly normalizedName: string
  readonly price: number
  /** ISO 4217 */
  readonly currency: string
  readonly sourceId: string
  readonly url: string
  readonly rating?: number
  readonly availability?: string
  readonly seller?: string
  readonly matchClusterId: string
}

export interface MatchCluster {
  readonly id: string
  readonly displayName: string
  /** Best similarity of any member to the query, 0..1 */
  readonly score: number
  readonly listings: readonly CanonicalListing[]
}

export type ResultOutcome = 'complete' | 'partial' | 'no_results' | 'total_failure'

export interface ResultSet {
  readonly fingerprint: string
  readonly clusters: readonly MatchCluster[]
  /** ISO timestamp */
  readonly fetchedAt: string
  readonly partial: boolean
  readonly failedSources: readonly string[]
  readonly succeededSources: readonly string[]
  readonly outcome: ResultOutcome
}

// =============================================================================
// Knowledge and insights
// =============================================================================

export interface PriceRange {
  min: number
  max: number
  avg: number
}

export interface KnowledgeEntry {
  id: string
  productName: string
  category: string
  brand: string
  specifications: Record<string, string>
  features: string[]
  /** ISO 4217 currency of priceRange */
  currency: string
  priceRange: PriceRange
  alternatives: string[]
  marketInsights: string
  reviewsSummary: string
  embedding: number[]
  lastUpdated: string
}

export interface ScoredEntry {
  entry: KnowledgeEntry
  score: number
}

export type DealClassification = 'great_deal' | 'fair' | 'above_market'

export interface PriceAnalysisData {
  min: number
  max: number
  avg: number
  count: number
  currency: string
  classification?: DealClassification
  referenceRange?: PriceRange
}

export interface RecommendationData {
  alternatives: string[]
}

export interface MarketTrendData {
  entryId: string
  score: number
}

interface InsightBase {
  title: string
  content: string
  /** Knowledge entry ids the insight draws on */
  supportingEntries: string[]
}

export type Insight =
  | (InsightBase & { kind: 'price_analysis'; data: PriceAnalysisData })
  | (InsightBase & { kind: 'recommendation'; data: RecommendationData })
  | (InsightBase & { kind: 'market_trend'; data: MarketTrendData })

export type InsightKind = Insight['kind']

// =============================================================================
// Produced API
// =============================================================================

export interface SearchResponse {
  resultSet: ResultSet
  insights: Insight[]
  partial: boolean
}

export interface SearchOptions {
  signal?: AbortSignal
}
