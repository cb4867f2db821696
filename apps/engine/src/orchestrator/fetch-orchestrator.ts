/**
 * Fetch Orchestrator
 *
 * Fans one request out to every applicable adapter under the governor and
 * joins them under a single deadline. One adapter's failure never aborts its
 * siblings; the deadline cancels only the calls still pending.
 */

import { silentLogger, type ILogger } from '@pricelens/logger'
import { raceAbort } from '../lib/abort.js'
import {
  ERROR_CODES,
  EngineError,
  SearchAbortedError,
  classifyError,
  classifySourceFailure,
  formatErrorForLog,
} from '../lib/errors.js'
import type { Governor } from '../governor/governor.js'
import type { FetchOutcome, RawListing, SearchRequest, SourceAdapter, SourceFailure } from '../types.js'
import type { AdapterRegistry } from './registry.js'

export interface OrchestratorConfig {
  /** Global deadline for one run, measured from its start */
  deadlineMs: number
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  deadlineMs: 8000,
}

export interface OrchestratorOptions {
  config?: Partial<OrchestratorConfig>
  logger?: ILogger
  /** Parent of the per-source loggers handed to adapters; defaults to `logger` */
  adapterLogger?: ILogger
}

type AdapterResult =
  | { ok: true; sourceId: string; listings: RawListing[] }
  | { ok: false; failure: SourceFailure }

function isRawListing(value: unknown): value is RawListing {
  return (
    typeof value === 'object' &&
    value !== null &&
    'title' in value &&
    typeof value.title === 'string' &&
    'priceText' in value &&
    typeof value.priceText === 'string' &&
    'url' in value &&
    typeof value.url === 'string' &&
    'rawAttributes' in value &&
    typeof value.rawAttributes === 'object' &&
    value.rawAttributes !== null
  )
}

export class FetchOrchestrator {
  readonly config: OrchestratorConfig
  private readonly log: ILogger
  private readonly adapterLog: ILogger

  constructor(
    private readonly registry: AdapterRegistry,
    private readonly governor: Governor,
    options: OrchestratorOptions = {}
  ) {
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...options.config }
    this.log = options.logger ?? silentLogger
    this.adapterLog = options.adapterLogger ?? this.log
  }

  /**
   * Run every applicable adapter for the request.
   *
   * Resolves once each adapter has completed, failed or been cancelled.
   * Rejects with SearchAbortedError when the caller's signal aborts.
   */
  async fetch(request: SearchRequest, signal?: AbortSignal): Promise<FetchOutcome> {
    if (signal?.aborted) throw new SearchAbortedError()

    const { adapters, rejected } = this.registry.select(request.region, request.filters)
    const selectionFailures = rejected.map(({ adapterId, error }): SourceFailure => {
      const classified = classifyError(error)
      this.adapterLog.child(adapterId).warn('Source rejected during selection', {
        sourceId: adapterId,
        region: request.region,
        ...formatErrorForLog(classified),
      })
      return { sourceId: adapterId, kind: 'unavailable', message: classified.message }
    })
    const startedAt = Date.now()
    const run = new AbortController()
    let deadlineHit = false

    const timer = setTimeout(() => {
      deadlineHit = true
      run.abort(
        new EngineError(
          ERROR_CODES.OPERATION_TIMEOUT,
          'timeout',
          `Deadline of ${this.config.deadlineMs}ms exceeded`
        )
      )
    }, this.config.deadlineMs)
    const onCallerAbort = () => run.abort(new SearchAbortedError())
    signal?.addEventListener('abort', onCallerAbort, { once: true })

    this.log.debug('Fetch started', {
      region: request.region,
      sources: adapters.map((adapter) => adapter.id),
      deadlineMs: this.config.deadlineMs,
    })

    try {
      const results = await Promise.all(
        adapters.map((adapter) => this.runAdapter(adapter, request, run.signal, () => deadlineHit))
      )

      if (signal?.aborted) {
        throw new SearchAbortedError()
      }

      const listings: RawListing[] = []
      const succeededSources: string[] = []
      const failures: SourceFailure[] = [...selectionFailures]
      for (const result of results) {
        if (result.ok) {
          succeededSources.push(result.sourceId)
          listings.push(...result.listings)
        } else {
          failures.push(result.failure)
        }
      }

      const failedSources = failures.map((failure) => failure.sourceId)
      this.log.info('Fetch finished', {
        region: request.region,
        listings: listings.length,
        succeededSources,
        failedSources,
        durationMs: Date.now() - startedAt,
      })

      return {
        listings,
        partial: failedSources.length > 0,
        failedSources,
        succeededSources,
        failures,
      }
    } finally {
      clearTimeout(timer)
      signal?.removeEventListener('abort', onCallerAbort)
    }
  }

  private async runAdapter(
    adapter: SourceAdapter,
    request: SearchRequest,
    signal: AbortSignal,
    deadlineHit: () => boolean
  ): Promise<AdapterResult> {
    const log = this.adapterLog.child(adapter.id)
    try {
      const output = await this.governor.withPermit(
        adapter.id,
        () => raceAbort(adapter.search(request.query, request.region, { signal, logger: log }), signal),
        signal
      )

      if (!Array.isArray(output)) {
        throw new SyntaxError(`Adapter ${adapter.id} returned ${typeof output} instead of listings`)
      }
      const listings = output.filter(isRawListing).map((listing) => ({ ...listing, sourceId: adapter.id }))
      if (listings.length < output.length) {
        log.debug('Malformed listings dropped', {
          sourceId: adapter.id,
          dropped: output.length - listings.length,
          total: output.length,
        })
      }
      return { ok: true, sourceId: adapter.id, listings }
    } catch (error) {
      const kind = deadlineHit() ? 'timeout' : classifySourceFailure(error)
      const classified = classifyError(error)
      if (signal.aborted && !deadlineHit()) {
        log.debug('Source cancelled', { sourceId: adapter.id })
      } else {
        log.warn('Source failed', { sourceId: adapter.id, kind, ...formatErrorForLog(classified) })
      }
      return {
        ok: false,
        failure: { sourceId: adapter.id, kind, message: classified.message },
      }
    }
  }
}
