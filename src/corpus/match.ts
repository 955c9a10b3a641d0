/**
 * Keyword matching over segmented pages
 *
 * OR semantics: one hit on any keyword qualifies a page. A page stops being
 * scanned at its first hit. Results keep first-match discovery order and never
 * repeat a URL, even when the corpus resolves the same URL twice.
 */

import type { Page } from './types'

/** Lower-case, drop empties, dedupe */
export function normalizeKeywords(keywords: Iterable<string>): string[] {
  const out = new Set<string>()
  for (const kw of keywords) {
    if (kw)
      out.add(kw.toLowerCase())
  }
  return [...out]
}

export function pageMatches(page: Page, keywords: string[]): boolean {
  for (const line of page.content) {
    const lower = line.toLowerCase()
    if (keywords.some(kw => lower.includes(kw)))
      return true
  }
  return false
}

function collect(page: Page, keywords: string[], seen: Set<string>, urls: string[]): void {
  if (seen.has(page.url) || !pageMatches(page, keywords))
    return
  seen.add(page.url)
  urls.push(page.url)
}

export function match(pages: Iterable<Page>, keywords: Iterable<string>): string[] {
  const kws = normalizeKeywords(keywords)
  const seen = new Set<string>()
  const urls: string[] = []
  if (kws.length === 0)
    return urls
  for (const page of pages)
    collect(page, kws, seen, urls)
  return urls
}

export async function matchStream(pages: AsyncIterable<Page>, keywords: Iterable<string>): Promise<string[]> {
  const kws = normalizeKeywords(keywords)
  const seen = new Set<string>()
  const urls: string[] = []
  if (kws.length === 0)
    return urls
  for await (const page of pages)
    collect(page, kws, seen, urls)
  return urls
}
