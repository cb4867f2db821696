#!/usr/bin/env tsx
/**
 * PriceLens CLI
 *
 * Usage:
 *   npm run search -- --query "iPhone 16 Pro" --region US [--max 10] [--json]
 *
 * Exit codes: 0 results found, 1 no results or every source failed, 2 bad usage.
 */

import '../config/env.js'

import { bootstrapEngine } from '../bootstrap.js'
import { loggers } from '../config/logger.js'
import { loadEngineConfig } from '../config/settings.js'
import { classifyError, formatErrorForLog, RequestValidationError, SearchAbortedError } from '../lib/errors.js'
import { formatResponse } from './format.js'
import { parseFlags, UsageError, USAGE, type CliOptions } from './parse-flags.js'

const log = loggers.cli

async function run(opts: CliOptions): Promise<number> {
  const config = loadEngineConfig()
  const engine = await bootstrapEngine({
    config: opts.deadlineMs ? { ...config, orchestrator: { ...config.orchestrator, deadlineMs: opts.deadlineMs } } : config,
  })

  const controller = new AbortController()
  const onInterrupt = () => controller.abort(new SearchAbortedError('Interrupted'))
  process.once('SIGINT', onInterrupt)

  try {
    const request = { query: opts.query, region: opts.region, maxResults: opts.maxResults, filters: opts.filters }
    const response = opts.refresh
      ? await engine.service.refresh(request, { signal: controller.signal })
      : await engine.service.search(request, { signal: controller.signal })

    console.log(opts.json ? JSON.stringify(response, null, 2) : formatResponse(request.query, opts.region, response))
    return response.resultSet.clusters.length > 0 ? 0 : 1
  } catch (error) {
    if (error instanceof RequestValidationError) {
      console.error(`Error: ${error.message}`)
      return 2
    }
    throw error
  } finally {
    process.off('SIGINT', onInterrupt)
    await engine.close()
  }
}

async function main(): Promise<void> {
  let opts: CliOptions
  try {
    opts = parseFlags(process.argv.slice(2))
  } catch (error) {
    if (!(error instanceof UsageError)) throw error
    console.error(`Error: ${error.message}`)
    console.error(USAGE)
    process.exit(2)
  }

  if (opts.help) {
    console.log(USAGE)
    process.exit(0)
  }

  process.exit(await run(opts))
}

main().catch((error: unknown) => {
  log.fatal('Search failed', formatErrorForLog(classifyError(error)), error)
  process.exit(1)
})
