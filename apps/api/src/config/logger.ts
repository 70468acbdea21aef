/**
 * API Logger Configuration
 *
 * Pre-configured loggers for API components
 */

import { createLogger } from '@rarity-lens/logger'

export const logger = createLogger('api')

export const loggers = {
  server: logger.child('server'),
  scraper: logger.child('scraper'),
  cache: logger.child('cache'),
  lookup: logger.child('lookup'),
}
