/**
 * Engine settings
 *
 * Every tunable comes from the environment with a default. Values are coerced
 * and range-checked by zod; anything invalid is a ConfigurationError naming
 * the variable.
 *
 * PRICELENS_SOURCE_OVERRIDES takes JSON keyed by source id, e.g.
 *   {"ebay": {"minSpacingMs": 2000, "maxPerWindow": 10}}
 *
 * PRICELENS_EXCHANGE_RATES takes JSON keyed by ISO code, each the value of one
 * unit in PRICELENS_RANKING_CURRENCY, e.g. {"EUR": 1.08, "GBP": 1.27}
 */

import { z } from 'zod'
import { DEFAULT_CACHE_CONFIG, type CacheConfig } from '../cache/result-cache.js'
import { DEFAULT_GOVERNOR_CONFIG, DEFAULT_RATE_LIMIT, type GovernorConfig } from '../governor/governor.js'
import { ConfigurationError } from '../lib/errors.js'
import { DEFAULT_MATCHING_CONFIG, type MatchingConfig } from '../normalizer/config.js'
import { DEFAULT_ORCHESTRATOR_CONFIG, type OrchestratorConfig } from '../orchestrator/fetch-orchestrator.js'
import { DEFAULT_RETRIEVAL_CONFIG, type RetrievalConfig } from '../retrieval/config.js'
import type { InsightKind } from '../types.js'

export type CacheBackendKind = 'memory' | 'redis'

export interface EngineConfig {
  governor: GovernorConfig
  orchestrator: OrchestratorConfig
  cache: CacheConfig
  cacheBackend: { kind: CacheBackendKind; keyPrefix: string }
  matching: MatchingConfig
  retrieval: RetrievalConfig
  /** Knowledge base JSON file; the bundled one when unset */
  knowledgeBasePath?: string
}

const INSIGHT_KINDS = ['price_analysis', 'recommendation', 'market_trend'] as const satisfies readonly InsightKind[]

function blankAsUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value
}

function integer(fallback: number, min: number) {
  return z.preprocess(blankAsUndefined, z.coerce.number().int().min(min).default(fallback))
}

function ratio(fallback: number, max = 1) {
  return z.preprocess(blankAsUndefined, z.coerce.number().min(0).max(max).default(fallback))
}

function idList(value: unknown): unknown {
  const present = blankAsUndefined(value)
  if (typeof present !== 'string') return present
  return present
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
}

function json(value: unknown): unknown {
  const present = blankAsUndefined(value)
  if (typeof present !== 'string') return present
  try {
    return JSON.parse(present)
  } catch {
    // Left as a string so the schema reports it
    return present
  }
}

const rateLimitOverride = z
  .object({
    minSpacingMs: z.number().int().min(0),
    maxPerWindow: z.number().int().min(1),
    windowMs: z.number().int().min(1),
  })
  .partial()
  .strict()

const currencyCode = z
  .string()
  .trim()
  .regex(/^[A-Za-z]{3}$/, 'Expected a three-letter currency code')
  .transform((code) => code.toUpperCase())

const envSchema = z.object({
  PRICELENS_MAX_CONCURRENCY: integer(DEFAULT_GOVERNOR_CONFIG.maxConcurrency, 1),
  PRICELENS_SOURCE_MIN_SPACING_MS: integer(DEFAULT_RATE_LIMIT.minSpacingMs, 0),
  PRICELENS_SOURCE_MAX_PER_WINDOW: integer(DEFAULT_RATE_LIMIT.maxPerWindow, 1),
  PRICELENS_SOURCE_WINDOW_MS: integer(DEFAULT_RATE_LIMIT.windowMs, 1),
  PRICELENS_SOURCE_OVERRIDES: z.preprocess(json, z.record(rateLimitOverride).default({})),

  PRICELENS_DEADLINE_MS: integer(DEFAULT_ORCHESTRATOR_CONFIG.deadlineMs, 1),

  PRICELENS_CACHE_BACKEND: z.preprocess(blankAsUndefined, z.enum(['memory', 'redis']).default('memory')),
  PRICELENS_CACHE_KEY_PREFIX: z.preprocess(blankAsUndefined, z.string().default('pricelens:')),
  PRICELENS_CACHE_TTL_MS: integer(DEFAULT_CACHE_CONFIG.ttlMs, 1),
  PRICELENS_CACHE_PARTIAL_TTL_MS: integer(DEFAULT_CACHE_CONFIG.partialTtlMs, 1),
  PRICELENS_CACHE_LOCK_TTL_MS: integer(DEFAULT_CACHE_CONFIG.lockTtlMs, 1),
  PRICELENS_CACHE_POLL_INTERVAL_MS: integer(DEFAULT_CACHE_CONFIG.pollIntervalMs, 1),

  PRICELENS_CLUSTER_THRESHOLD: ratio(DEFAULT_MATCHING_CONFIG.clusterThreshold),
  PRICELENS_MATCH_TOKEN_WEIGHT: ratio(DEFAULT_MATCHING_CONFIG.tokenWeight),
  PRICELENS_MATCH_EDIT_WEIGHT: ratio(DEFAULT_MATCHING_CONFIG.editWeight),
  PRICELENS_MATCH_VARIANT_PENALTY: ratio(DEFAULT_MATCHING_CONFIG.variantPenalty),
  PRICELENS_MATCH_CONFLICT_PENALTY: ratio(DEFAULT_MATCHING_CONFIG.conflictPenalty),
  PRICELENS_RANKING_CURRENCY: z.preprocess(blankAsUndefined, currencyCode.optional()),
  PRICELENS_EXCHANGE_RATES: z.preprocess(
    json,
    z.record(z.string().regex(/^[A-Z]{3}$/, 'Expected an upper-case currency code'), z.number().positive()).default({})
  ),

  PRICELENS_RETRIEVAL_TOP_K: integer(DEFAULT_RETRIEVAL_CONFIG.topK, 1),
  PRICELENS_RETRIEVAL_MIN_SCORE: ratio(DEFAULT_RETRIEVAL_CONFIG.minScore),
  PRICELENS_RETRIEVAL_EXPAND_THRESHOLD: ratio(DEFAULT_RETRIEVAL_CONFIG.expandThreshold),
  PRICELENS_RETRIEVAL_CONFIDENT_SCORE: ratio(DEFAULT_RETRIEVAL_CONFIG.confidentScore),
  PRICELENS_RETRIEVAL_MARKET_SCORE: ratio(DEFAULT_RETRIEVAL_CONFIG.marketScore),
  PRICELENS_MAX_ALTERNATIVES: integer(DEFAULT_RETRIEVAL_CONFIG.maxAlternatives, 0),
  PRICELENS_DEAL_GREAT_FACTOR: ratio(DEFAULT_RETRIEVAL_CONFIG.dealBands.greatDeal, 10),
  PRICELENS_DEAL_FAIR_FACTOR: ratio(DEFAULT_RETRIEVAL_CONFIG.dealBands.fair, 10),
  PRICELENS_INSIGHT_STAGES: z.preprocess(idList, z.array(z.enum(INSIGHT_KINDS)).default([...INSIGHT_KINDS])),

  PRICELENS_KNOWLEDGE_BASE: z.preprocess(blankAsUndefined, z.string().optional()),
})

/**
 * Read engine settings from the environment.
 * @throws ConfigurationError when any variable is invalid
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigurationError(`Invalid engine configuration: ${problems.join('; ')}`, { cause: parsed.error })
  }
  const vars = parsed.data

  if (vars.PRICELENS_DEAL_GREAT_FACTOR > vars.PRICELENS_DEAL_FAIR_FACTOR) {
    throw new ConfigurationError(
      'Invalid engine configuration: PRICELENS_DEAL_GREAT_FACTOR must not exceed PRICELENS_DEAL_FAIR_FACTOR'
    )
  }

  if (Object.keys(vars.PRICELENS_EXCHANGE_RATES).length > 0 && !vars.PRICELENS_RANKING_CURRENCY) {
    throw new ConfigurationError(
      'Invalid engine configuration: PRICELENS_EXCHANGE_RATES needs PRICELENS_RANKING_CURRENCY'
    )
  }

  const enabled = new Set<InsightKind>(vars.PRICELENS_INSIGHT_STAGES)

  return {
    governor: {
      maxConcurrency: vars.PRICELENS_MAX_CONCURRENCY,
      defaultLimit: {
        minSpacingMs: vars.PRICELENS_SOURCE_MIN_SPACING_MS,
        maxPerWindow: vars.PRICELENS_SOURCE_MAX_PER_WINDOW,
        windowMs: vars.PRICELENS_SOURCE_WINDOW_MS,
      },
      sourceOverrides: vars.PRICELENS_SOURCE_OVERRIDES,
    },
    orchestrator: { deadlineMs: vars.PRICELENS_DEADLINE_MS },
    cache: {
      ttlMs: vars.PRICELENS_CACHE_TTL_MS,
      partialTtlMs: vars.PRICELENS_CACHE_PARTIAL_TTL_MS,
      lockTtlMs: vars.PRICELENS_CACHE_LOCK_TTL_MS,
      pollIntervalMs: vars.PRICELENS_CACHE_POLL_INTERVAL_MS,
    },
    cacheBackend: { kind: vars.PRICELENS_CACHE_BACKEND, keyPrefix: vars.PRICELENS_CACHE_KEY_PREFIX },
    matching: {
      ...DEFAULT_MATCHING_CONFIG,
      clusterThreshold: vars.PRICELENS_CLUSTER_THRESHOLD,
      tokenWeight: vars.PRICELENS_MATCH_TOKEN_WEIGHT,
      editWeight: vars.PRICELENS_MATCH_EDIT_WEIGHT,
      variantPenalty: vars.PRICELENS_MATCH_VARIANT_PENALTY,
      conflictPenalty: vars.PRICELENS_MATCH_CONFLICT_PENALTY,
      exchangeRates: vars.PRICELENS_EXCHANGE_RATES,
      ...(vars.PRICELENS_RANKING_CURRENCY ? { rankingCurrency: vars.PRICELENS_RANKING_CURRENCY } : {}),
    },
    retrieval: {
      topK: vars.PRICELENS_RETRIEVAL_TOP_K,
      minScore: vars.PRICELENS_RETRIEVAL_MIN_SCORE,
      expandThreshold: vars.PRICELENS_RETRIEVAL_EXPAND_THRESHOLD,
      confidentScore: vars.PRICELENS_RETRIEVAL_CONFIDENT_SCORE,
      marketScore: vars.PRICELENS_RETRIEVAL_MARKET_SCORE,
      maxAlternatives: vars.PRICELENS_MAX_ALTERNATIVES,
      dealBands: { greatDeal: vars.PRICELENS_DEAL_GREAT_FACTOR, fair: vars.PRICELENS_DEAL_FAIR_FACTOR },
      stages: {
        price_analysis: enabled.has('price_analysis'),
        recommendation: enabled.has('recommendation'),
        market_trend: enabled.has('market_trend'),
      },
    },
    ...(vars.PRICELENS_KNOWLEDGE_BASE ? { knowledgeBasePath: vars.PRICELENS_KNOWLEDGE_BASE } : {}),
  }
}
