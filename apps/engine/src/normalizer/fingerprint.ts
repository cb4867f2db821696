import { createHash } from 'node:crypto'
import { tokenizeTitle } from './title.js'

/**
 * Query text as it takes part in fingerprints and relevance scoring:
 * lower-case tokens, punctuation dropped, single spaces.
 */
export function normalizeQuery(query: string): string {
  return tokenizeTitle(query).join(' ')
}

/**
 * Content-addressed cache key for a logical request.
 *
 * sha256 over the normalized query, the region and the filters sorted by key.
 * maxResults is left out: it only limits how much of a result set is shown.
 */
export function computeFingerprint(request: {
  query: string
  region: string
  filters: Readonly<Record<string, string>>
}): string {
  const filters = Object.entries(request.filters)
    .map(([key, value]): [string, string] => [key, value.trim()])
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))

  const payload = JSON.stringify([normalizeQuery(request.query), request.region.toUpperCase(), filters])
  return createHash('sha256').update(payload).digest('hex')
}
