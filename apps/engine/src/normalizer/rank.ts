import type { CanonicalListing, MatchCluster } from '../types.js'

export type RankedListing = Pick<
  CanonicalListing,
  'price' | 'currency' | 'sourceId' | 'url' | 'normalizedName' | 'productName' | 'seller'
>

/**
 * Rates into one ranking currency: `rates[code]` is what one unit of `code`
 * is worth in `currency`.
 */
export interface PriceConversion {
  currency: string
  rates: Readonly<Record<string, number>>
}

export interface ComparablePrice {
  /** '' once the amount is in the ranking currency, otherwise the listing's own code */
  currency: string
  amount: number
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

export function comparablePrice(
  listing: Pick<CanonicalListing, 'price' | 'currency'>,
  conversion?: PriceConversion
): ComparablePrice {
  if (conversion) {
    if (listing.currency === conversion.currency) return { currency: '', amount: listing.price }
    const rate = conversion.rates[listing.currency]
    if (rate !== undefined) return { currency: '', amount: listing.price * rate }
  }
  return { currency: listing.currency, amount: listing.price }
}

/**
 * Amounts are only compared within one currency. Prices that cannot be brought
 * into the ranking currency sort after those that can, grouped by code.
 */
export function comparePrices(a: ComparablePrice, b: ComparablePrice): number {
  return compareStrings(a.currency, b.currency) || a.amount - b.amount
}

/** Price ascending, then source id, url, name and seller. */
export function compareListings(a: RankedListing, b: RankedListing, conversion?: PriceConversion): number {
  return (
    comparePrices(comparablePrice(a, conversion), comparablePrice(b, conversion)) ||
    compareStrings(a.sourceId, b.sourceId) ||
    compareStrings(a.url, b.url) ||
    compareStrings(a.normalizedName, b.normalizedName) ||
    compareStrings(a.productName, b.productName) ||
    compareStrings(a.seller ?? '', b.seller ?? '')
  )
}

function lowestPrice(cluster: MatchCluster, conversion?: PriceConversion): ComparablePrice {
  return cluster.listings
    .map((listing) => comparablePrice(listing, conversion))
    .reduce((lowest, price) => (comparePrices(price, lowest) < 0 ? price : lowest))
}

function lowestSourceId(cluster: MatchCluster): string {
  return cluster.listings.map((listing) => listing.sourceId).sort(compareStrings)[0] ?? ''
}

/**
 * Best match first, cheapest among equals second, then lowest source id.
 * The cluster id settles anything still tied so the order never depends on input order.
 */
export function compareClusters(a: MatchCluster, b: MatchCluster, conversion?: PriceConversion): number {
  return (
    b.score - a.score ||
    comparePrices(lowestPrice(a, conversion), lowestPrice(b, conversion)) ||
    compareStrings(lowestSourceId(a), lowestSourceId(b)) ||
    compareStrings(a.id, b.id)
  )
}

export function rankClusters(clusters: readonly MatchCluster[], conversion?: PriceConversion): MatchCluster[] {
  return [...clusters].sort((a, b) => compareClusters(a, b, conversion))
}
