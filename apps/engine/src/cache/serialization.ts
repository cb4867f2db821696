import { z } from 'zod'
import type { CacheEntry } from './types.js'

const listingSchema = z.object({
  productName: z.string(),
  normalizedName: z.string(),
  price: z.number().positive(),
  currency: z.string().length(3),
  sourceId: z.string(),
  url: z.string(),
  rating: z.number().optional(),
  availability: z.string().optional(),
  seller: z.string().optional(),
  matchClusterId: z.string(),
})

const clusterSchema = z.object({
  id: z.string(),
  displayName: z.string(),
  score: z.number(),
  listings: z.array(listingSchema),
})

const entrySchema = z.object({
  ttlMs: z.number().int().positive(),
  resultSet: z.object({
    fingerprint: z.string(),
    clusters: z.array(clusterSchema),
    fetchedAt: z.string().datetime(),
    partial: z.boolean(),
    failedSources: z.array(z.string()),
    succeededSources: z.array(z.string()),
    outcome: z.enum(['complete', 'partial', 'no_results', 'total_failure']),
  }),
})

export function serializeEntry(entry: CacheEntry): string {
  return JSON.stringify(entry)
}

/**
 * Parse a stored entry. Returns undefined for anything that does not match
 * the current shape, so stale formats read as a miss.
 */
export function deserializeEntry(raw: string): CacheEntry | undefined {
  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch {
    return undefined
  }
  const parsed = entrySchema.safeParse(json)
  return parsed.success ? parsed.data : undefined
}
