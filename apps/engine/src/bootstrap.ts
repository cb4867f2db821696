/**
 * Process wiring
 *
 * Builds a SearchService from EngineConfig: bundled site adapters, the
 * hashing embedder over the JSON knowledge base, and the configured cache
 * backend.
 */

import { createRedisClient } from '@pricelens/redis'
import { createSiteAdapters } from './adapters/index.js'
import { MemoryCacheBackend } from './cache/memory-backend.js'
import { RedisCacheBackend } from './cache/redis-backend.js'
import { ResultCache } from './cache/result-cache.js'
import type { CacheBackend } from './cache/types.js'
import { loggers } from './config/logger.js'
import { loadEngineConfig, type EngineConfig } from './config/settings.js'
import { Governor } from './governor/governor.js'
import { ResultNormalizer } from './normalizer/index.js'
import { HashingEmbedder } from './retrieval/embedder.js'
import { InsightEngine } from './retrieval/insight-engine.js'
import { loadKnowledgeBase } from './retrieval/knowledge-store.js'
import { createSearchService, type SearchService } from './search-service.js'
import type { SourceAdapter } from './types.js'

export interface BootstrapOptions {
  config?: EngineConfig
  adapters?: readonly SourceAdapter[]
}

export interface Engine {
  service: SearchService
  config: EngineConfig
  /** Close connections the engine opened */
  close(): Promise<void>
}

export async function bootstrapEngine(options: BootstrapOptions = {}): Promise<Engine> {
  const config = options.config ?? loadEngineConfig()
  const closers: Array<() => Promise<void>> = []

  let backend: CacheBackend
  if (config.cacheBackend.kind === 'redis') {
    const redis = createRedisClient()
    closers.push(async () => {
      await redis.quit()
    })
    backend = new RedisCacheBackend(redis, { keyPrefix: config.cacheBackend.keyPrefix, logger: loggers.cache })
  } else {
    backend = new MemoryCacheBackend()
  }

  const normalizer = new ResultNormalizer({ config: config.matching, logger: loggers.normalizer })
  const store = await loadKnowledgeBase(new HashingEmbedder(), {
    source: config.knowledgeBasePath,
    logger: loggers.retrieval,
  })

  const service = createSearchService({
    adapters: options.adapters ?? createSiteAdapters(),
    cache: new ResultCache(backend, { config: config.cache, logger: loggers.cache }),
    governor: new Governor(config.governor, { logger: loggers.governor }),
    normalizer,
    insights: new InsightEngine(store, { config: config.retrieval, normalizer, logger: loggers.retrieval }),
    orchestrator: config.orchestrator,
    logger: loggers.service,
    orchestratorLogger: loggers.orchestrator,
    adapterLogger: loggers.adapters,
  })

  loggers.service.info('Engine ready', {
    cacheBackend: backend.name,
    knowledgeEntries: store.size,
    deadlineMs: config.orchestrator.deadlineMs,
  })

  return {
    service,
    config,
    close: async () => {
      for (const close of closers) {
        await close()
      }
    },
  }
}
