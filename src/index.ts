export type { Clock, CorpusInfo, CorpusStatus, CorpusStore, CorpusStoreOptions, ResolvedCorpus } from './cache/index.ts'
export { clearCorpus, createCorpusStore, DEFAULT_TTL, describeCorpus, getCacheRoot, isStale, resolveCorpus } from './cache/index.ts'

export type { CorpusSource, Page, SegmentOptions } from './corpus/index.ts'
export { dbtDocs, DEFAULT_SOURCE, fetchCorpus, match, matchStream, normalizeKeywords, PageSegmenter, segment, segmentLines, segmentStream } from './corpus/index.ts'

export { FetchError, SearchDocsError, StorageError, UsageError } from './core/errors.ts'

export type { SearchDocsOptions, SearchResult } from './pipeline.ts'
export { readLines, searchDocs } from './pipeline.ts'
