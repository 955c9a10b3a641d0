/**
 * Cache configuration
 */

import { homedir } from 'node:os'
import { join } from 'pathe'
import { env } from 'std-env'

/** Default freshness window for a cached corpus */
export const DEFAULT_TTL = 24 * 60 * 60 * 1000

/**
 * Root directory for cached corpora.
 * SEARCH_DOCS_CACHE_DIR wins, then XDG_CACHE_HOME, then ~/.cache
 */
export function getCacheRoot(): string {
  return env.SEARCH_DOCS_CACHE_DIR
    || env.XDG_CACHE_HOME
    || join(homedir(), '.cache')
}
