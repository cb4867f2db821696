/**
 * Retrieval/Insight Engine
 *
 * enhance(request, resultSet) → Insight[]
 *
 * Stages run independently against the same knowledge matches. A stage with
 * nothing to say throws RetrievalMiss (logged at debug); any other stage
 * failure is logged and skipped. Only caller cancellation escapes.
 */

import { silentLogger, type ILogger } from '@pricelens/logger'
import { throwIfAborted } from '../lib/abort.js'
import { classifyError, formatErrorForLog, RetrievalMiss } from '../lib/errors.js'
import { ResultNormalizer } from '../normalizer/index.js'
import type {
  CanonicalListing,
  DealClassification,
  Insight,
  InsightKind,
  MatchCluster,
  PriceRange,
  ResultSet,
  ScoredEntry,
  SearchRequest,
} from '../types.js'
import { resolveRetrievalConfig, type DealBands, type RetrievalConfig } from './config.js'
import type { KnowledgeStore } from './knowledge-store.js'
import { QueryEnhancer } from './query-enhancer.js'

export interface InsightEngineOptions {
  config?: Partial<RetrievalConfig>
  /** Decides whether an alternative is already among the clusters */
  normalizer?: ResultNormalizer
  logger?: ILogger
}

interface StageContext {
  request: SearchRequest
  resultSet: ResultSet
  matches: ScoredEntry[]
}

function roundCents(amount: number): number {
  return Math.round(amount * 100) / 100
}

function formatAmount(amount: number): string {
  return amount.toFixed(2)
}

/**
 * Most frequent currency; ties go to the alphabetically first code.
 */
export function dominantCurrency(listings: readonly CanonicalListing[]): string | undefined {
  const counts = new Map<string, number>()
  for (const listing of listings) {
    counts.set(listing.currency, (counts.get(listing.currency) ?? 0) + 1)
  }

  let best: string | undefined
  let bestCount = 0
  for (const [currency, count] of [...counts].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    if (count > bestCount) {
      best = currency
      bestCount = count
    }
  }
  return best
}

export function classifyDeal(lowestPrice: number, range: PriceRange, bands: DealBands): DealClassification {
  if (lowestPrice <= range.min * bands.greatDeal) return 'great_deal'
  if (lowestPrice <= range.avg * bands.fair) return 'fair'
  return 'above_market'
}

const DEAL_SENTENCES: Record<DealClassification, (productName: string, range: PriceRange) => string> = {
  great_deal: (name, range) => `The lowest price is at or below the usual low of ${formatAmount(range.min)} for ${name}.`,
  fair: (name, range) => `The lowest price is close to the typical ${formatAmount(range.avg)} for ${name}.`,
  above_market: (name, range) => `The lowest price is above the typical ${formatAmount(range.avg)} for ${name}.`,
}

export class InsightEngine {
  readonly config: RetrievalConfig
  private readonly enhancer: QueryEnhancer
  private readonly normalizer: ResultNormalizer
  private readonly log: ILogger

  constructor(
    private readonly store: KnowledgeStore,
    options: InsightEngineOptions = {}
  ) {
    this.config = resolveRetrievalConfig(options.config)
    this.log = options.logger ?? silentLogger
    this.enhancer = new QueryEnhancer(store, { config: this.config, logger: this.log })
    this.normalizer = options.normalizer ?? new ResultNormalizer()
  }

  async enhance(request: SearchRequest, resultSet: ResultSet, signal?: AbortSignal): Promise<Insight[]> {
    throwIfAborted(signal)

    let matches: ScoredEntry[] = []
    try {
      matches = (await this.enhancer.enhance(request.query, signal)).matches
    } catch (error) {
      throwIfAborted(signal)
      this.log.warn('Knowledge lookup failed, continuing without matches', {
        query: request.query,
        ...formatErrorForLog(classifyError(error)),
      })
    }
    throwIfAborted(signal)

    const context: StageContext = { request, resultSet, matches }
    const stages: Array<[InsightKind, (ctx: StageContext) => Insight]> = [
      ['price_analysis', (ctx) => this.priceAnalysis(ctx)],
      ['recommendation', (ctx) => this.recommendations(ctx)],
      ['market_trend', (ctx) => this.marketTrend(ctx)],
    ]

    const insights: Insight[] = []
    for (const [kind, stage] of stages) {
      if (!this.config.stages[kind]) continue
      try {
        insights.push(stage(context))
      } catch (error) {
        if (error instanceof RetrievalMiss) {
          this.log.debug('Insight omitted', { kind, reason: error.message })
        } else {
          this.log.warn('Insight stage failed', { kind, ...formatErrorForLog(classifyError(error)) })
        }
      }
    }

    return insights
  }

  /**
   * Observed price stats over every listing in the result set, in its dominant
   * currency. The verdict compares the top cluster's lowest price with the best
   * confident match's range when the currencies agree.
   */
  priceAnalysis({ resultSet, matches }: StageContext): Insight {
    const listings = resultSet.clusters.flatMap((cluster) => cluster.listings)
    const currency = dominantCurrency(listings)
    if (!currency) {
      throw new RetrievalMiss('price_analysis', 'No listings to analyse')
    }

    const inCurrency = (cluster: MatchCluster) => cluster.listings.filter((listing) => listing.currency === currency)
    const priced = resultSet.clusters.filter((cluster) => inCurrency(cluster).length > 0)
    const prices = priced.flatMap((cluster) => inCurrency(cluster).map((listing) => listing.price))

    const min = Math.min(...prices)
    const max = Math.max(...prices)
    const avg = roundCents(prices.reduce((sum, price) => sum + price, 0) / prices.length)
    const subject = priced.length === 1 ? `for ${priced[0].displayName}` : `across ${priced.length} products`

    const lines = [
      `${prices.length} ${prices.length === 1 ? 'listing' : 'listings'} ${subject}, from ${formatAmount(min)} to ${formatAmount(max)} ${currency} (average ${formatAmount(avg)}).`,
    ]

    const reference = matches[0]
    if (reference && reference.score >= this.config.confidentScore && reference.entry.currency === currency) {
      const range = reference.entry.priceRange
      const topPrices = inCurrency(resultSet.clusters[0]).map((listing) => listing.price)
      const lowest = topPrices.length > 0 ? Math.min(...topPrices) : min
      const classification = classifyDeal(lowest, range, this.config.dealBands)
      lines.push(DEAL_SENTENCES[classification](reference.entry.productName, range))

      return {
        kind: 'price_analysis',
        title: 'Price analysis',
        content: lines.join(' '),
        supportingEntries: [reference.entry.id],
        data: { min, max, avg, count: prices.length, currency, classification, referenceRange: { ...range } },
      }
    }

    return {
      kind: 'price_analysis',
      title: 'Price analysis',
      content: lines.join(' '),
      supportingEntries: [],
      data: { min, max, avg, count: prices.length, currency },
    }
  }

  /**
   * Alternatives of every confident match that are not already on the page.
   */
  recommendations({ resultSet, matches }: StageContext): Insight {
    const confident = matches.filter((match) => match.score >= this.config.confidentScore)
    if (confident.length === 0) {
      throw new RetrievalMiss('recommendation', 'No confident knowledge match')
    }

    const clusterNames = resultSet.clusters.map((cluster) => this.normalizer.normalizeName(cluster.displayName))
    const threshold = this.normalizer.config.clusterThreshold
    const seen = new Set<string>()
    const alternatives: string[] = []

    for (const { entry } of confident) {
      for (const alternative of entry.alternatives) {
        const key = this.normalizer.normalizeName(alternative)
        if (!key || seen.has(key)) continue
        seen.add(key)
        if (clusterNames.some((name) => this.normalizer.similarity(key, name) > threshold)) continue
        alternatives.push(alternative)
      }
    }

    const picked = alternatives.slice(0, this.config.maxAlternatives)
    if (picked.length === 0) {
      throw new RetrievalMiss('recommendation', 'Every alternative is already in the results')
    }

    const lines = picked.map((alternative) => {
      const known = this.store.findByName(alternative)
      return known
        ? `- ${alternative} (${known.priceRange.min} to ${known.priceRange.max} ${known.currency})`
        : `- ${alternative}`
    })

    return {
      kind: 'recommendation',
      title: 'You might also consider',
      content: lines.join('\n'),
      supportingEntries: confident.map((match) => match.entry.id),
      data: { alternatives: picked },
    }
  }

  marketTrend({ matches }: StageContext): Insight {
    const top = matches[0]
    if (!top || top.score < this.config.marketScore) {
      throw new RetrievalMiss('market_trend', 'No match clears the market confidence threshold')
    }
    if (!top.entry.marketInsights.trim()) {
      throw new RetrievalMiss('market_trend', `No market insights recorded for ${top.entry.id}`)
    }

    return {
      kind: 'market_trend',
      title: `Market trend: ${top.entry.productName}`,
      content: top.entry.marketInsights,
      supportingEntries: [top.entry.id],
      data: { entryId: top.entry.id, score: top.score },
    }
  }
}
