import { DEFAULT_BOILERPLATE } from './title.js'

export interface MatchingConfig {
  /** Pairs scoring above this similarity join one cluster */
  clusterThreshold: number
  tokenWeight: number
  editWeight: number
  variantPenalty: number
  conflictPenalty: number
  boilerplate: readonly string[]
  variantTokens: readonly string[]
  /** Convert prices into this ISO code before ranking; unset ranks each currency on its own */
  rankingCurrency?: string
  /** Value of one unit of each code in `rankingCurrency` */
  exchangeRates: Readonly<Record<string, number>>
}

export const DEFAULT_VARIANT_TOKENS: readonly string[] = [
  'pro',
  'max',
  'plus',
  'ultra',
  'mini',
  'lite',
  'air',
  'se',
  'fe',
]

export const DEFAULT_MATCHING_CONFIG: MatchingConfig = {
  clusterThreshold: 0.65,
  tokenWeight: 0.6,
  editWeight: 0.4,
  variantPenalty: 0.5,
  conflictPenalty: 0.3,
  boilerplate: DEFAULT_BOILERPLATE,
  variantTokens: DEFAULT_VARIANT_TOKENS,
  exchangeRates: {},
}
