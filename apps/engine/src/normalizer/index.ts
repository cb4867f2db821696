/**
 * Result Normalizer & Matcher
 *
 * Raw listings → canonical listings → clusters → ranked, fingerprinted ResultSet.
 * Each stage lives in its own module; this class wires them with one config.
 */

import { silentLogger, type ILogger } from '@pricelens/logger'
import { ERROR_CODES, ParseError } from '../lib/errors.js'
import type {
  CanonicalListing,
  MatchCluster,
  RawListing,
  ResultOutcome,
  ResultSet,
  SearchRequest,
} from '../types.js'
import { clusterBySimilarity, clusterId } from './cluster.js'
import { DEFAULT_MATCHING_CONFIG, type MatchingConfig } from './config.js'
import { computeFingerprint } from './fingerprint.js'
import { parsePrice, parseRating } from './price.js'
import { compareListings, rankClusters, type PriceConversion, type RankedListing } from './rank.js'
import { titleSimilarity } from './text-similarity.js'
import { displayTitle, normalizeTitle } from './title.js'

export type ParsedListing = Omit<CanonicalListing, 'matchClusterId'>

export interface SourceSummary {
  failedSources: readonly string[]
  succeededSources: readonly string[]
}

export interface NormalizerOptions {
  config?: Partial<MatchingConfig>
  logger?: ILogger
  now?: () => Date
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined
}

function optionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : undefined
}

/** Same source, same url and same product; an empty url only matches by name */
function listingKey(listing: { sourceId: string; url: string; normalizedName: string }): string {
  return `${listing.sourceId}\n${listing.url}\n${listing.normalizedName}`
}

export function resolveOutcome(clusterCount: number, sources: SourceSummary): ResultOutcome {
  if (clusterCount > 0) {
    return sources.failedSources.length > 0 ? 'partial' : 'complete'
  }
  if (sources.failedSources.length === 0) return 'no_results'
  return sources.succeededSources.length === 0 ? 'total_failure' : 'partial'
}

export class ResultNormalizer {
  readonly config: MatchingConfig
  private readonly boilerplate: ReadonlySet<string>
  private readonly variantTokens: ReadonlySet<string>
  private readonly conversion?: PriceConversion
  private readonly log: ILogger
  private readonly now: () => Date

  constructor(options: NormalizerOptions = {}) {
    this.config = { ...DEFAULT_MATCHING_CONFIG, ...options.config }
    this.boilerplate = new Set(this.config.boilerplate)
    this.variantTokens = new Set(this.config.variantTokens)
    if (this.config.rankingCurrency) {
      this.conversion = { currency: this.config.rankingCurrency, rates: this.config.exchangeRates }
    }
    this.log = options.logger ?? silentLogger
    this.now = options.now ?? (() => new Date())
  }

  normalizeName(title: string): string {
    return normalizeTitle(title, this.boilerplate)
  }

  compareListings(a: RankedListing, b: RankedListing): number {
    return compareListings(a, b, this.conversion)
  }

  /** Similarity of two normalized names */
  similarity(name1: string, name2: string): number {
    return titleSimilarity(name1, name2, this.config, this.variantTokens)
  }

  /**
   * Parse one raw listing. Throws ParseError when the price or title is unusable.
   */
  parseListing(raw: RawListing, region: string): ParsedListing {
    const price = parsePrice(raw.priceText, {
      region,
      currencyHint: optionalString(raw.rawAttributes.currency),
    })

    const normalizedName = this.normalizeName(raw.title)
    if (!normalizedName) {
      throw new ParseError(ERROR_CODES.TITLE_EMPTY, 'title', raw.title)
    }

    const rating = parseRating(raw.rawAttributes.rating)
    const availability = optionalString(raw.rawAttributes.availability)
    const seller = optionalString(raw.rawAttributes.seller)

    return {
      productName: displayTitle(raw.title),
      normalizedName,
      price: price.amount,
      currency: price.currency,
      sourceId: raw.sourceId,
      url: raw.url,
      ...(rating !== undefined ? { rating } : {}),
      ...(availability ? { availability } : {}),
      ...(seller ? { seller } : {}),
    }
  }

  /**
   * Parse every listing, dropping (and logging) the ones that fail, then apply
   * price filters and keep the cheapest copy of any listing repeated by one source.
   */
  parseAll(rawListings: readonly RawListing[], request: SearchRequest): ParsedListing[] {
    const minPrice = optionalNumber(request.filters.minPrice)
    const maxPrice = optionalNumber(request.filters.maxPrice)
    const byKey = new Map<string, ParsedListing>()
    let dropped = 0

    for (const raw of rawListings) {
      let listing: ParsedListing
      try {
        listing = this.parseListing(raw, request.region)
      } catch (error) {
        if (!(error instanceof ParseError)) throw error
        dropped++
        this.log.debug('Listing dropped', {
          sourceId: raw.sourceId,
          url: raw.url,
          code: error.code,
          input: error.input,
        })
        continue
      }

      if ((minPrice !== undefined && listing.price < minPrice) || (maxPrice !== undefined && listing.price > maxPrice)) {
        continue
      }

      const key = listingKey(listing)
      const existing = byKey.get(key)
      if (!existing || this.compareListings(listing, existing) < 0) {
        byKey.set(key, listing)
      }
    }

    if (dropped > 0) {
      this.log.info('Unparsable listings dropped', { dropped, total: rawListings.length })
    }

    return [...byKey.values()].sort((a, b) => this.compareListings(a, b))
  }

  /**
   * Cluster parsed listings and score each cluster against the query.
   */
  buildClusters(listings: readonly ParsedListing[], query: string): MatchCluster[] {
    const normalizedQuery = this.normalizeName(query)
    const relevance = new Map<string, number>()
    for (const listing of listings) {
      relevance.set(listingKey(listing), normalizedQuery ? this.similarity(normalizedQuery, listing.normalizedName) : 0)
    }

    const groups = clusterBySimilarity(
      listings,
      (a, b) => this.similarity(a.normalizedName, b.normalizedName),
      this.config.clusterThreshold
    )

    return rankClusters(
      groups.map((group) => {
        const id = clusterId(group.map(listingKey))
        const members = group
          .map((listing): CanonicalListing => Object.freeze({ ...listing, matchClusterId: id }))
          .sort((a, b) => this.compareListings(a, b))

        // Most relevant member names the cluster; members are price-ordered so ties go to the cheapest
        let representative = members[0]
        let score = -1
        for (const member of members) {
          const memberScore = relevance.get(listingKey(member)) ?? 0
          if (memberScore > score) {
            score = memberScore
            representative = member
          }
        }

        return Object.freeze({
          id,
          displayName: representative.productName,
          score,
          listings: Object.freeze(members),
        })
      }),
      this.conversion
    )
  }

  /**
   * normalize(rawListings, request) → ResultSet
   */
  normalize(
    rawListings: readonly RawListing[],
    request: SearchRequest,
    sources: SourceSummary = { failedSources: [], succeededSources: [] }
  ): ResultSet {
    const parsed = this.parseAll(rawListings, request)
    const clusters = this.buildClusters(parsed, request.query)
    const failedSources = [...sources.failedSources].sort()

    const resultSet: ResultSet = {
      fingerprint: computeFingerprint(request),
      clusters: Object.freeze(clusters),
      fetchedAt: this.now().toISOString(),
      partial: failedSources.length > 0,
      failedSources: Object.freeze(failedSources),
      succeededSources: Object.freeze([...sources.succeededSources].sort()),
      outcome: resolveOutcome(clusters.length, sources),
    }

    this.log.debug('Result set assembled', {
      fingerprint: resultSet.fingerprint,
      listings: parsed.length,
      clusters: clusters.length,
      outcome: resultSet.outcome,
    })

    return Object.freeze(resultSet)
  }
}

export { DEFAULT_MATCHING_CONFIG, type MatchingConfig } from './config.js'
export { computeFingerprint, normalizeQuery } from './fingerprint.js'
export { parsePrice, parseRating, regionCurrency } from './price.js'
