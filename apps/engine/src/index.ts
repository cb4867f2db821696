/**
 * @pricelens/engine
 *
 * Aggregates listings from rate-limited price sources into one ranked,
 * cached result set and enriches it with knowledge-base insights.
 */

export * from './types.js'

export { bootstrapEngine, type BootstrapOptions, type Engine } from './bootstrap.js'
export {
  createSearchService,
  parseSearchRequest,
  searchRequestSchema,
  SearchService,
  type SearchRequestInput,
  type SearchServiceDeps,
} from './search-service.js'

export { loadEngineConfig, type EngineConfig, type CacheBackendKind } from './config/settings.js'
export { loggers } from './config/logger.js'

export {
  EngineError,
  SourceError,
  ParseError,
  RetrievalMiss,
  ConfigurationError,
  RequestValidationError,
  SearchAbortedError,
  ERROR_CODES,
  classifyError,
  formatErrorForLog,
  type ErrorCode,
  type ErrorCategory,
  type ClassifiedError,
} from './lib/errors.js'

export { Governor, type GovernorConfig, type Permit, type SourceRateLimit } from './governor/governor.js'
export { FetchOrchestrator, type OrchestratorConfig } from './orchestrator/fetch-orchestrator.js'
export { AdapterRegistry } from './orchestrator/registry.js'
export { ResultNormalizer, computeFingerprint, type MatchingConfig } from './normalizer/index.js'

export { ResultCache, type CacheConfig } from './cache/result-cache.js'
export { MemoryCacheBackend } from './cache/memory-backend.js'
export { RedisCacheBackend, type RedisCacheClient } from './cache/redis-backend.js'
export type { CacheBackend, CacheEntry } from './cache/types.js'

export { HashingEmbedder, type Embedder } from './retrieval/embedder.js'
export { InMemoryKnowledgeStore, loadKnowledgeBase, type KnowledgeStore } from './retrieval/knowledge-store.js'
export { InsightEngine } from './retrieval/insight-engine.js'
export type { RetrievalConfig, DealBands } from './retrieval/config.js'

export { createSiteAdapters, HtmlListingAdapter, HttpFetcher, type SiteManifest } from './adapters/index.js'
