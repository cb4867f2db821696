/**
 * Query enhancement
 *
 * 1. embed the query and take the top-K knowledge entries
 * 2. if the best one is a clear match, append its brand, category and
 *    specification values to the query
 * 3. re-score the union of both candidate lists by the mean of their
 *    similarity to the original and to the expanded text
 *
 * The expanded text only steers retrieval; it never reaches the sources.
 */

import { silentLogger, type ILogger } from '@pricelens/logger'
import { throwIfAborted } from '../lib/abort.js'
import { tokenizeTitle } from '../normalizer/title.js'
import type { KnowledgeEntry, ScoredEntry } from '../types.js'
import { resolveRetrievalConfig, type RetrievalConfig } from './config.js'
import type { KnowledgeStore } from './knowledge-store.js'
import { cosineSimilarity } from './vector-index.js'

export interface EnhancedQuery {
  original: string
  expandedText: string
  /** Knowledge entry the expansion came from */
  anchorId?: string
  /** Best first, all at or above minScore */
  matches: ScoredEntry[]
}

export interface QueryEnhancerOptions {
  config?: Partial<RetrievalConfig>
  logger?: ILogger
}

function compareScored(a: ScoredEntry, b: ScoredEntry): number {
  if (a.score !== b.score) return b.score - a.score
  return a.entry.id < b.entry.id ? -1 : a.entry.id > b.entry.id ? 1 : 0
}

/**
 * Brand, category and specification values the query does not already cover.
 */
export function expansionTerms(query: string, entry: KnowledgeEntry): string[] {
  const queryTokens = new Set(tokenizeTitle(query))
  const terms: string[] = []
  for (const term of [entry.brand, entry.category, ...Object.values(entry.specifications)]) {
    const tokens = tokenizeTitle(term)
    if (tokens.length === 0 || tokens.every((token) => queryTokens.has(token))) continue
    if (!terms.includes(term)) terms.push(term)
  }
  return terms
}

export class QueryEnhancer {
  readonly config: RetrievalConfig
  private readonly log: ILogger

  constructor(
    private readonly store: KnowledgeStore,
    options: QueryEnhancerOptions = {}
  ) {
    this.config = resolveRetrievalConfig(options.config)
    this.log = options.logger ?? silentLogger
  }

  async enhance(query: string, signal?: AbortSignal): Promise<EnhancedQuery> {
    const { topK, minScore, expandThreshold } = this.config

    const queryVector = await this.store.embed(query)
    throwIfAborted(signal)
    const first = (await this.store.lookupBySimilarity(queryVector, topK)).sort(compareScored)

    const anchor = first[0]
    if (!anchor || anchor.score < expandThreshold) {
      this.log.debug('No confident knowledge match, query not expanded', {
        query,
        bestScore: anchor?.score ?? 0,
      })
      return { original: query, expandedText: query, matches: first.filter((match) => match.score >= minScore) }
    }

    const terms = expansionTerms(query, anchor.entry)
    const expandedText = [query, ...terms].join(' ')
    const expandedVector = await this.store.embed(expandedText)
    throwIfAborted(signal)
    const second = await this.store.lookupBySimilarity(expandedVector, topK)

    const candidates = new Map<string, KnowledgeEntry>()
    for (const { entry } of [...first, ...second]) candidates.set(entry.id, entry)

    const matches = [...candidates.values()]
      .map(
        (entry): ScoredEntry => ({
          entry,
          score:
            (cosineSimilarity(queryVector, entry.embedding) + cosineSimilarity(expandedVector, entry.embedding)) / 2,
        })
      )
      .filter((match) => match.score >= minScore)
      .sort(compareScored)
      .slice(0, topK)

    this.log.debug('Query expanded', {
      query,
      anchorId: anchor.entry.id,
      addedTerms: terms.length,
      topScore: matches[0]?.score ?? 0,
    })

    return { original: query, expandedText, anchorId: anchor.entry.id, matches }
  }
}
