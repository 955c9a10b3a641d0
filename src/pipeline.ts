/**
 * Resolve cache -> segment -> match, in one sequential pass
 */

import type { CorpusStatus } from './cache'
import type { Clock } from './cache/types'
import type { CorpusSource } from './corpus'
import { createReadStream } from 'node:fs'
import { createInterface } from 'node:readline'
import { createCorpusStore, resolveCorpus } from './cache'
import { DEFAULT_SOURCE, matchStream, normalizeKeywords, segmentStream } from './corpus'
import { StorageError, UsageError } from './core/errors'

export interface SearchDocsOptions {
  keywords: string[]
  source?: CorpusSource
  cacheRoot?: string
  ttl?: number
  /** Re-download even when the cache is fresh */
  force?: boolean
  clock?: Clock
  onStatus?: (status: CorpusStatus) => void
}

export interface SearchResult {
  /** Matching page URLs in corpus discovery order */
  urls: string[]
  /** Path of the corpus snapshot that was searched */
  corpusPath: string
  fetched: boolean
}

/** Stream a file line by line without loading it whole */
export function readLines(path: string): AsyncIterable<string> {
  return createInterface({
    input: createReadStream(path, { encoding: 'utf-8' }),
    crlfDelay: Number.POSITIVE_INFINITY,
  })
}

export async function searchDocs(options: SearchDocsOptions): Promise<SearchResult> {
  const { source = DEFAULT_SOURCE, force = false, onStatus } = options
  if (normalizeKeywords(options.keywords).length === 0)
    throw new UsageError('At least one keyword required')

  const store = createCorpusStore(source, options)
  const { path, fetched } = await resolveCorpus(store, source, { force, onStatus })

  const pages = segmentStream(readLines(path), { host: source.host })
  const urls = await matchStream(pages, options.keywords).catch((err: unknown) => {
    throw new StorageError('read', path, { cause: err })
  })

  return { urls, corpusPath: path, fetched }
}
