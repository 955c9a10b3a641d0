/**
 * Corpus types
 */

export interface CorpusSource {
  /** Short display name */
  name: string
  /** URL of the flat-text dump */
  url: string
  /** Docsite host that page URLs are resolved against */
  host: string
  /** Directory under the cache root */
  cacheDir: string
  /** Cached file name */
  fileName: string
}

export interface Page {
  url: string
  /** Lines from the header up to, not including, the next boundary */
  content: string[]
  /** Discovery order within the corpus, starting at 0 */
  order: number
}

export interface SegmentOptions {
  /** Docsite host page URLs must point at (defaults to the dbt docs host) */
  host?: string
}

export type SegmenterState = 'seeking' | 'header-pending' | 'resolving-url' | 'in-page'
