/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/harvester/.env.local outside production; production injects
 * env vars directly.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'

if (process.env.NODE_ENV !== 'production') {
  const here = dirname(fileURLToPath(import.meta.url))
  config({ path: resolve(here, '..', '.env.local') })
}
