/**
 * Environment loader - import first, before any module reads process.env
 *
 * Loads apps/engine/.env.local in development. Production injects its
 * variables directly.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  config({ path: fileURLToPath(new URL('../../.env.local', import.meta.url)) })
}
