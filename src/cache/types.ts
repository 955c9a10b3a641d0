/**
 * Cache types
 */

/** Returns the current time in epoch milliseconds */
export type Clock = () => number

export interface CorpusStore {
  /** Absolute path of the cached corpus file */
  path: string
  /** Max age in ms before a refetch */
  ttl: number
  clock: Clock
}

export interface CorpusStoreOptions {
  cacheRoot?: string
  ttl?: number
  clock?: Clock
}

export type CorpusStatus
  = | { type: 'download', url: string }
    | { type: 'downloaded', path: string, bytes: number }
    | { type: 'cache-hit', path: string, ageMs: number }

export interface ResolveCorpusOptions {
  /** Skip the freshness check and always download */
  force?: boolean
  onStatus?: (status: CorpusStatus) => void
}

export interface ResolvedCorpus {
  path: string
  fetched: boolean
}

export interface CorpusInfo {
  path: string
  exists: boolean
  ageMs: number | null
  stale: boolean
}
