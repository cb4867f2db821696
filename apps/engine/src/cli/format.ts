import type { MatchCluster, SearchResponse } from '../types.js'

function amount(value: number): string {
  return value.toFixed(2)
}

function priceSpan(cluster: MatchCluster): string {
  const first = cluster.listings[0]
  if (!first) return ''
  const prices = cluster.listings.filter((listing) => listing.currency === first.currency).map((listing) => listing.price)
  const min = Math.min(...prices)
  const max = Math.max(...prices)
  return min === max ? `${amount(min)} ${first.currency}` : `${amount(min)}-${amount(max)} ${first.currency}`
}

/**
 * Plain-text rendering of a search response for the terminal.
 */
export function formatResponse(query: string, region: string, response: SearchResponse): string {
  const { resultSet, insights } = response
  const lines = [`Results for "${query}" in ${region} (${resultSet.outcome.replace('_', ' ')})`]

  if (resultSet.clusters.length === 0) {
    lines.push('', 'No matching listings.')
  }

  resultSet.clusters.forEach((cluster, index) => {
    const count = cluster.listings.length
    lines.push('', `${index + 1}. ${cluster.displayName}  ${priceSpan(cluster)}  (${count} ${count === 1 ? 'listing' : 'listings'})`)
    for (const listing of cluster.listings) {
      lines.push(`   ${amount(listing.price)} ${listing.currency}  ${listing.sourceId}  ${listing.url}`)
    }
  })

  if (resultSet.failedSources.length > 0) {
    lines.push('', `Failed sources: ${resultSet.failedSources.join(', ')}`)
  }

  for (const insight of insights) {
    lines.push('', `[${insight.title}]`, insight.content)
  }

  return lines.join('\n')
}
