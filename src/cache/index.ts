/**
 * Cache module - single-file corpus snapshots with TTL invalidation
 */

// Config
export { DEFAULT_TTL, getCacheRoot } from './config.ts'

// Storage operations
export {
  clearCorpus,
  createCorpusStore,
  describeCorpus,
  ensureCacheDir,
  getCorpusAge,
  isStale,
  resolveCorpus,
  writeCorpus,
} from './store.ts'

// Types
export type {
  Clock,
  CorpusInfo,
  CorpusStatus,
  CorpusStore,
  CorpusStoreOptions,
  ResolveCorpusOptions,
  ResolvedCorpus,
} from './types.ts'
