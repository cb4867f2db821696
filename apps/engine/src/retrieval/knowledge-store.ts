/**
 * Knowledge Store
 *
 * Product knowledge entries with embeddings, searchable by cosine similarity.
 * Entries are append-only for the life of the process. The seed set ships as
 * JSON in apps/engine/data/knowledge-base.json.
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { silentLogger, type ILogger } from '@pricelens/logger'
import { ConfigurationError } from '../lib/errors.js'
import { tokenizeTitle } from '../normalizer/title.js'
import type { KnowledgeEntry, ScoredEntry } from '../types.js'
import type { Embedder } from './embedder.js'
import { VectorIndex } from './vector-index.js'

export interface KnowledgeStore {
  embed(text: string): Promise<number[]>
  /** Top `k` entries by similarity to `embedding`, best first */
  lookupBySimilarity(embedding: readonly number[], k: number): Promise<ScoredEntry[]>
  get(id: string): KnowledgeEntry | undefined
  /** Exact name lookup, ignoring case, punctuation and a leading brand */
  findByName(name: string): KnowledgeEntry | undefined
}

export const DEFAULT_KNOWLEDGE_BASE_URL = new URL('../../data/knowledge-base.json', import.meta.url)

const priceRangeSchema = z
  .object({
    min: z.number().nonnegative(),
    max: z.number().nonnegative(),
    avg: z.number().nonnegative(),
  })
  .refine((range) => range.min <= range.avg && range.avg <= range.max, {
    message: 'priceRange must satisfy min <= avg <= max',
  })

export const knowledgeEntrySchema = z.object({
  id: z.string().min(1),
  productName: z.string().min(1),
  category: z.string(),
  brand: z.string(),
  specifications: z.record(z.string()).default({}),
  features: z.array(z.string()).default([]),
  currency: z.string().length(3).default('USD'),
  priceRange: priceRangeSchema,
  alternatives: z.array(z.string()).default([]),
  marketInsights: z.string().default(''),
  reviewsSummary: z.string().default(''),
  embedding: z.array(z.number()).optional(),
  lastUpdated: z.string().datetime(),
})

export type KnowledgeEntryInput = z.input<typeof knowledgeEntrySchema>

/**
 * The text an entry is embedded from: identity first, then specifications.
 */
export function buildKnowledgeText(entry: Pick<KnowledgeEntry, 'productName' | 'brand' | 'category' | 'specifications'>): string {
  return [entry.productName, entry.brand, entry.category, ...Object.values(entry.specifications)]
    .filter((part) => part.length > 0)
    .join('\n')
}

function nameKey(name: string): string {
  return tokenizeTitle(name).join(' ')
}

export interface KnowledgeStoreOptions {
  logger?: ILogger
}

export class InMemoryKnowledgeStore implements KnowledgeStore {
  private readonly entries = new Map<string, KnowledgeEntry>()
  private readonly byName = new Map<string, string>()
  private readonly index: VectorIndex
  private readonly log: ILogger

  constructor(
    private readonly embedder: Embedder,
    options: KnowledgeStoreOptions = {}
  ) {
    this.index = new VectorIndex(embedder.dimensions)
    this.log = options.logger ?? silentLogger
  }

  get size(): number {
    return this.entries.size
  }

  embed(text: string): Promise<number[]> {
    return this.embedder.embed(text)
  }

  /**
   * Validate and append an entry, embedding it unless it carries a vector of
   * the right dimension. Ids are never replaced.
   */
  async add(input: KnowledgeEntryInput): Promise<KnowledgeEntry> {
    const parsed = knowledgeEntrySchema.parse(input)
    if (this.entries.has(parsed.id)) {
      throw new ConfigurationError(`Duplicate knowledge entry id: ${parsed.id}`)
    }

    const embedding =
      parsed.embedding && parsed.embedding.length === this.embedder.dimensions
        ? parsed.embedding
        : await this.embedder.embed(buildKnowledgeText(parsed))

    const entry: KnowledgeEntry = Object.freeze({ ...parsed, embedding })
    this.entries.set(entry.id, entry)
    this.index.add(entry.id, embedding)

    for (const key of this.nameKeys(entry)) {
      if (!this.byName.has(key)) this.byName.set(key, entry.id)
    }

    this.log.debug('Knowledge entry added', { id: entry.id })
    return entry
  }

  async lookupBySimilarity(embedding: readonly number[], k: number): Promise<ScoredEntry[]> {
    const results: ScoredEntry[] = []
    for (const match of this.index.search(embedding, k)) {
      const entry = this.entries.get(match.id)
      if (entry) results.push({ entry, score: match.score })
    }
    return results
  }

  get(id: string): KnowledgeEntry | undefined {
    return this.entries.get(id)
  }

  /** The product name with and without its brand prefix */
  private nameKeys(entry: KnowledgeEntry): string[] {
    const key = nameKey(entry.productName)
    const brand = nameKey(entry.brand)
    if (!brand) return [key]
    if (!key.startsWith(`${brand} `)) return [key, `${brand} ${key}`]

    const bare = key.slice(brand.length + 1)
    return /\p{L}/u.test(bare) ? [key, bare] : [key]
  }

  findByName(name: string): KnowledgeEntry | undefined {
    const id = this.byName.get(nameKey(name))
    return id === undefined ? undefined : this.entries.get(id)
  }
}

export interface LoadKnowledgeBaseOptions extends KnowledgeStoreOptions {
  source?: URL | string
}

/**
 * Build a store from a JSON array of entries. Unreadable or invalid files
 * raise ConfigurationError.
 */
export async function loadKnowledgeBase(
  embedder: Embedder,
  options: LoadKnowledgeBaseOptions = {}
): Promise<InMemoryKnowledgeStore> {
  const source = options.source ?? DEFAULT_KNOWLEDGE_BASE_URL
  const store = new InMemoryKnowledgeStore(embedder, options)

  let json: unknown
  try {
    json = JSON.parse(await readFile(source, 'utf8'))
  } catch (error) {
    throw new ConfigurationError(`Cannot read knowledge base at ${source.toString()}`, { cause: error })
  }

  const parsed = z.array(knowledgeEntrySchema).safeParse(json)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new ConfigurationError(
      `Invalid knowledge base at ${source.toString()}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown issue'}`,
      { cause: parsed.error }
    )
  }

  for (const entry of parsed.data) {
    await store.add(entry)
  }

  options.logger?.info('Knowledge base loaded', { entries: store.size, dimensions: embedder.dimensions })
  return store
}
