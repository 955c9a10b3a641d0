/**
 * Page segmentation for llms-full.txt style dumps
 *
 * Grammar:
 *   ---                        boundary
 *   ### Title                  header, must follow the boundary
 *   ...(https://<host>/path)   first docsite URL after the header names the page
 *   ...                        page content until the next boundary
 */

import type { Page, SegmenterState, SegmentOptions } from './types'
import { DEFAULT_SOURCE } from './sources'

const BOUNDARY = '---'
const HEADER_PREFIX = '### '

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Build a resolver returning the first docsite URL on a line.
 * A parenthesized link target anywhere on the line beats a bare URL.
 */
export function createUrlResolver(host: string): (line: string) => string | null {
  const base = `https://${escapeRegExp(host)}/`
  const parenRe = new RegExp(`\\((${base}[^)]+)\\)`)
  const bareRe = new RegExp(`${base}[^\\s\\])]+`)

  return (line) => {
    if (!line.includes(host))
      return null
    const paren = parenRe.exec(line)
    if (paren?.[1])
      return paren[1]
    return bareRe.exec(line)?.[0] ?? null
  }
}

/**
 * Line-driven state machine. Feed lines with `push`, collect pages as they close,
 * then call `end` to flush the last one.
 */
export class PageSegmenter {
  private state: SegmenterState = 'seeking'
  private pending: string[] = []
  private url = ''
  private count = 0
  private readonly resolveUrl: (line: string) => string | null

  constructor(options: SegmentOptions = {}) {
    this.resolveUrl = createUrlResolver(options.host ?? DEFAULT_SOURCE.host)
  }

  get currentState(): SegmenterState {
    return this.state
  }

  /** Returns the page finalized by this line, if any */
  push(line: string): Page | null {
    if (line === BOUNDARY) {
      const page = this.state === 'in-page' ? this.finalize() : null
      this.reset('header-pending')
      return page
    }

    switch (this.state) {
      case 'seeking':
        break
      case 'header-pending':
        if (line.startsWith(HEADER_PREFIX)) {
          this.pending = [line]
          this.state = 'resolving-url'
        }
        // header must be the first non-blank line after the boundary; anything else resets to seeking
        else if (line.trim() !== '') {
          this.state = 'seeking'
        }
        break
      case 'resolving-url': {
        this.pending.push(line)
        const url = this.resolveUrl(line)
        if (url) {
          this.url = url
          this.state = 'in-page'
        }
        break
      }
      case 'in-page':
        this.pending.push(line)
        break
    }
    return null
  }

  /** Flush at end of input. An unresolved run is dropped. */
  end(): Page | null {
    const page = this.state === 'in-page' ? this.finalize() : null
    this.reset('seeking')
    return page
  }

  private finalize(): Page {
    return { url: this.url, content: this.pending, order: this.count++ }
  }

  private reset(state: SegmenterState): void {
    this.state = state
    this.pending = []
    this.url = ''
  }
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/)
}

export function* segmentLines(lines: Iterable<string>, options?: SegmentOptions): Generator<Page> {
  const segmenter = new PageSegmenter(options)
  for (const line of lines) {
    const page = segmenter.push(line)
    if (page)
      yield page
  }
  const last = segmenter.end()
  if (last)
    yield last
}

export async function* segmentStream(lines: AsyncIterable<string>, options?: SegmentOptions): AsyncGenerator<Page> {
  const segmenter = new PageSegmenter(options)
  for await (const line of lines) {
    const page = segmenter.push(line)
    if (page)
      yield page
  }
  const last = segmenter.end()
  if (last)
    yield last
}

/**
 * Split a whole corpus into pages, in discovery order
 */
export function segment(corpusText: string, options?: SegmentOptions): Page[] {
  return [...segmentLines(splitLines(corpusText), options)]
}
