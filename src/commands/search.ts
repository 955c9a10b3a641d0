import type { CorpusStatus } from '../cache'
import type { CorpusSource } from '../corpus'
import { defineCommand, renderUsage } from 'citty'
import { clearCorpus, createCorpusStore, describeCorpus } from '../cache'
import { collectKeywords, findUnknownFlag } from '../cli-helpers'
import { DEFAULT_SOURCE } from '../corpus'
import { SearchDocsError, UsageError } from '../core/errors'
import { formatAge, formatDuration, pluralize } from '../core/formatting'
import { logger } from '../core/logger'
import { searchDocs } from '../pipeline'
import { version } from '../version'

export interface SearchOptions {
  keywords: string[]
  fresh?: boolean
  source?: CorpusSource
  cacheRoot?: string
}

export function reportStatus(status: CorpusStatus): void {
  switch (status.type) {
    case 'download':
      logger.step(`Downloading docs from ${status.url}...`)
      break
    case 'downloaded':
      logger.info(`Cached at: ${status.path}`)
      break
    case 'cache-hit':
      logger.info(`Using cached docs (${formatAge(status.ageMs)})`)
      break
  }
}

/**
 * Run a search, writing matched URLs to stdout and everything else to stderr
 */
export async function searchCommand(opts: SearchOptions): Promise<string[]> {
  const start = performance.now()
  logger.step(`Searching for: ${opts.keywords.join(' ')}`)
  const { urls } = await searchDocs({
    keywords: opts.keywords,
    force: opts.fresh,
    source: opts.source,
    cacheRoot: opts.cacheRoot,
    onStatus: reportStatus,
  })

  if (urls.length === 0) {
    logger.warn('No matches found.')
    return urls
  }

  process.stdout.write(`${urls.join('\n')}\n`)
  const elapsed = formatDuration(performance.now() - start)
  logger.success(`Found ${pluralize(urls.length, 'matching page')} (${elapsed})`)
  return urls
}

export function infoCommand(source: CorpusSource = DEFAULT_SOURCE, cacheRoot?: string): void {
  const info = describeCorpus(createCorpusStore(source, { cacheRoot }))
  if (!info.exists) {
    logger.info(`No cached ${source.name} docs (would be stored at ${info.path})`)
    return
  }
  const state = info.stale ? 'stale' : 'fresh'
  logger.info(`${info.path}\n${formatAge(info.ageMs ?? 0)} · ${state}`)
}

export function clearCacheCommand(source: CorpusSource = DEFAULT_SOURCE, cacheRoot?: string): void {
  const store = createCorpusStore(source, { cacheRoot })
  if (clearCorpus(store))
    logger.success(`Removed ${store.path}`)
  else
    logger.info('Cache is clean — nothing to remove')
}

export const searchArgs = {
  keyword: {
    type: 'positional' as const,
    description: 'Keyword(s) to search for, matched case-insensitively as substrings',
    required: false,
  },
  fresh: {
    type: 'boolean' as const,
    alias: 'f',
    description: 'Force fresh download (ignore cache)',
    default: false,
  },
  info: {
    type: 'boolean' as const,
    description: 'Show cache location and freshness, then exit',
    default: false,
  },
  'clear-cache': {
    type: 'boolean' as const,
    description: 'Remove the cached docs, then exit',
    default: false,
  },
}

export const searchCommandDef = defineCommand({
  meta: {
    name: 'search-docs',
    version,
    description: 'Search dbt documentation for keywords and return matching page URLs.\n\nExamples:\n  search-docs semantic_model\n  search-docs metric dimension\n  search-docs \'incremental strategy\'',
  },
  args: searchArgs,
  async run({ args, rawArgs, cmd }) {
    try {
      const unknown = findUnknownFlag(rawArgs, searchArgs)
      if (unknown)
        throw new UsageError(`Unknown option: ${unknown}`)

      if (args.info)
        return infoCommand()
      if (args['clear-cache'])
        return clearCacheCommand()

      const keywords = collectKeywords(args.keyword, args._)
      if (keywords.length === 0)
        throw new UsageError('At least one keyword required')

      await searchCommand({ keywords, fresh: args.fresh })
    }
    catch (err) {
      if (!(err instanceof SearchDocsError))
        throw err
      if (err instanceof UsageError)
        console.error(`${await renderUsage(cmd)}\n`)
      logger.error(err.message)
      process.exit(1)
    }
  },
})
