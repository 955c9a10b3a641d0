/**
 * Corpus fetching, segmentation and matching
 */

export { $fetch, fetchCorpus } from './fetch.ts'
export { match, matchStream, normalizeKeywords, pageMatches } from './match.ts'
export { createUrlResolver, PageSegmenter, segment, segmentLines, segmentStream, splitLines } from './segment.ts'
export { dbtDocs, DEFAULT_SOURCE } from './sources.ts'

export type { CorpusSource, Page, SegmenterState, SegmentOptions } from './types.ts'
