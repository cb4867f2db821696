import type { InsightKind } from '../types.js'

export interface DealBands {
  /** Lowest observed price at or below `range.min × greatDeal` is a great deal */
  greatDeal: number
  /** Otherwise at or below `range.avg × fair` is fair; anything above is above market */
  fair: number
}

export interface RetrievalConfig {
  topK: number
  /** Matches scoring below this are discarded */
  minScore: number
  /** The best first-pass match must reach this to expand the query */
  expandThreshold: number
  /** Matches at or above this feed classification and recommendations */
  confidentScore: number
  /** The top match must reach this for a market trend insight */
  marketScore: number
  dealBands: DealBands
  maxAlternatives: number
  stages: Record<InsightKind, boolean>
}

export const DEFAULT_RETRIEVAL_CONFIG: RetrievalConfig = {
  topK: 3,
  minScore: 0.05,
  expandThreshold: 0.3,
  confidentScore: 0.55,
  marketScore: 0.65,
  dealBands: { greatDeal: 1.0, fair: 1.05 },
  maxAlternatives: 5,
  stages: { price_analysis: true, recommendation: true, market_trend: true },
}

export function resolveRetrievalConfig(config: Partial<RetrievalConfig> = {}): RetrievalConfig {
  return {
    ...DEFAULT_RETRIEVAL_CONFIG,
    ...config,
    dealBands: { ...DEFAULT_RETRIEVAL_CONFIG.dealBands, ...config.dealBands },
    stages: { ...DEFAULT_RETRIEVAL_CONFIG.stages, ...config.stages },
  }
}
