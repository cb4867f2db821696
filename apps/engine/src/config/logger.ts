/**
 * Engine Logger Configuration
 *
 * Pre-configured loggers for engine components
 */

import { createLogger } from '@pricelens/logger'

// Root logger for the engine
export const logger = createLogger('engine')

export const loggers = {
  service: logger.child('service'),
  orchestrator: logger.child('orchestrator'),
  governor: logger.child('governor'),
  normalizer: logger.child('normalizer'),
  cache: logger.child('cache'),
  retrieval: logger.child('retrieval'),
  adapters: logger.child('adapters'),
  cli: logger.child('cli'),
}
