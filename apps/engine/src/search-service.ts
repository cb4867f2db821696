/**
 * Search Service
 *
 * request → cache (hit short-circuits) → orchestrator → normalizer → cache
 * store → insight engine → response
 *
 * Cached result sets are stored whole; `maxResults` only trims the clusters
 * a caller sees.
 */

import { z } from 'zod'
import { silentLogger, type ILogger } from '@pricelens/logger'
import type { ResultCache } from './cache/result-cache.js'
import { Governor } from './governor/governor.js'
import { throwIfAborted } from './lib/abort.js'
import {
  ConfigurationError,
  RequestValidationError,
  classifyError,
  formatErrorForLog,
  isAbortError,
} from './lib/errors.js'
import { ResultNormalizer, computeFingerprint } from './normalizer/index.js'
import { FetchOrchestrator, type OrchestratorConfig } from './orchestrator/fetch-orchestrator.js'
import { AdapterRegistry } from './orchestrator/registry.js'
import type { InsightEngine } from './retrieval/insight-engine.js'
import type { ResultSet, SearchOptions, SearchRequest, SearchResponse, SourceAdapter } from './types.js'

export const MAX_QUERY_LENGTH = 200
export const DEFAULT_MAX_RESULTS = 20

export const searchRequestSchema = z.object({
  query: z.string().trim().min(1, 'Query must not be empty').max(MAX_QUERY_LENGTH),
  region: z
    .string()
    .trim()
    .regex(/^[A-Za-z]{2}$/, 'Region must be a two-letter code')
    .transform((region) => region.toUpperCase()),
  maxResults: z.number().int().min(1).max(100).default(DEFAULT_MAX_RESULTS),
  filters: z.record(z.string()).default({}),
})

export type SearchRequestInput = z.input<typeof searchRequestSchema>

/**
 * Validate and freeze a request.
 * @throws RequestValidationError
 */
export function parseSearchRequest(input: unknown): SearchRequest {
  const parsed = searchRequestSchema.safeParse(input)
  if (!parsed.success) {
    throw RequestValidationError.fromZod(parsed.error)
  }
  const { query, region, maxResults, filters } = parsed.data
  return Object.freeze({ query, region, maxResults, filters: Object.freeze({ ...filters }) })
}

export interface SearchServiceDeps {
  adapters: AdapterRegistry | readonly SourceAdapter[]
  cache: ResultCache
  governor?: Governor
  normalizer?: ResultNormalizer
  /** Without one, responses carry no insights */
  insights?: InsightEngine
  orchestrator?: Partial<OrchestratorConfig>
  logger?: ILogger
  orchestratorLogger?: ILogger
  adapterLogger?: ILogger
}

function assertAdapterContract(adapter: SourceAdapter): void {
  if (typeof adapter.id !== 'string' || adapter.id.trim() === '') {
    throw new ConfigurationError('Every adapter needs a non-empty id')
  }
  if (typeof adapter.supports !== 'function' || typeof adapter.search !== 'function') {
    throw new ConfigurationError(`Adapter '${adapter.id}' must implement supports() and search()`)
  }
}

/**
 * Wire a search service.
 * @throws ConfigurationError when no adapters are registered or one breaks the adapter contract
 */
export function createSearchService(deps: SearchServiceDeps): SearchService {
  const registry = deps.adapters instanceof AdapterRegistry ? deps.adapters : new AdapterRegistry(deps.adapters)
  if (registry.size() === 0) {
    throw new ConfigurationError('No source adapters registered')
  }
  for (const id of registry.list()) {
    const adapter = registry.get(id)
    if (adapter) assertAdapterContract(adapter)
  }

  const log = deps.logger ?? silentLogger
  const governor = deps.governor ?? new Governor({}, { logger: log.child('governor') })
  const orchestrator = new FetchOrchestrator(registry, governor, {
    config: deps.orchestrator,
    logger: deps.orchestratorLogger ?? log.child('orchestrator'),
    adapterLogger: deps.adapterLogger,
  })

  return new SearchService(
    orchestrator,
    deps.normalizer ?? new ResultNormalizer({ logger: log.child('normalizer') }),
    deps.cache,
    deps.insights,
    log
  )
}

function limitClusters(resultSet: ResultSet, maxResults: number): ResultSet {
  if (resultSet.clusters.length <= maxResults) return resultSet
  return Object.freeze({ ...resultSet, clusters: Object.freeze(resultSet.clusters.slice(0, maxResults)) })
}

export class SearchService {
  constructor(
    private readonly orchestrator: FetchOrchestrator,
    private readonly normalizer: ResultNormalizer,
    private readonly cache: ResultCache,
    private readonly insights: InsightEngine | undefined,
    private readonly log: ILogger
  ) {}

  async search(input: SearchRequestInput, options: SearchOptions = {}): Promise<SearchResponse> {
    const request = parseSearchRequest(input)
    const { signal } = options
    const fingerprint = computeFingerprint(request)
    const startedAt = Date.now()

    try {
      throwIfAborted(signal)
      const stored = await this.cache.getOrCompute(fingerprint, (computeSignal) => this.compute(request, computeSignal), {
        signal,
      })
      throwIfAborted(signal)

      const resultSet = limitClusters(stored, request.maxResults)
      const insights = this.insights ? await this.insights.enhance(request, resultSet, signal) : []

      this.log.info('Search completed', {
        fingerprint,
        region: request.region,
        clusters: resultSet.clusters.length,
        insights: insights.length,
        outcome: resultSet.outcome,
        failedSources: resultSet.failedSources,
        durationMs: Date.now() - startedAt,
      })

      return { resultSet, insights, partial: resultSet.partial }
    } catch (error) {
      if (isAbortError(error)) {
        this.log.debug('Search aborted', { fingerprint })
      } else {
        this.log.error('Search failed', { fingerprint, ...formatErrorForLog(classifyError(error)) }, error)
      }
      throw error
    }
  }

  /** Drop any cached result set for the request, then search again. */
  async refresh(input: SearchRequestInput, options: SearchOptions = {}): Promise<SearchResponse> {
    await this.invalidate(input)
    return this.search(input, options)
  }

  async invalidate(input: SearchRequestInput): Promise<void> {
    await this.cache.invalidate(computeFingerprint(parseSearchRequest(input)))
  }

  private async compute(request: SearchRequest, signal: AbortSignal): Promise<ResultSet> {
    const outcome = await this.orchestrator.fetch(request, signal)
    return this.normalizer.normalize(outcome.listings, request, outcome)
  }
}
