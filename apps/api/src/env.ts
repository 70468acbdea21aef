/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/api/.env.local in development. Production injects env vars
 * directly, so dotenv is skipped there.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'

if (process.env.NODE_ENV !== 'production') {
  const __dirname = dirname(fileURLToPath(import.meta.url))
  config({ path: resolve(__dirname, '..', '.env.local') })
}
