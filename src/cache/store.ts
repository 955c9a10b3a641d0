/**
 * Corpus snapshot storage with mtime-based invalidation
 */

import type { CorpusSource } from '../corpus/types'
import type { CorpusInfo, CorpusStore, CorpusStoreOptions, ResolveCorpusOptions, ResolvedCorpus } from './types'
import { existsSync, mkdirSync, renameSync, rmSync, statSync, writeFileSync } from 'node:fs'
import { dirname, join } from 'pathe'
import { fetchCorpus } from '../corpus/fetch'
import { StorageError } from '../core/errors'
import { DEFAULT_TTL, getCacheRoot } from './config'

/**
 * Build the store for a source: <cacheRoot>/<source.cacheDir>/<source.fileName>
 */
export function createCorpusStore(source: CorpusSource, options: CorpusStoreOptions = {}): CorpusStore {
  const root = options.cacheRoot ?? getCacheRoot()
  return {
    path: join(root, source.cacheDir, source.fileName),
    ttl: options.ttl ?? DEFAULT_TTL,
    clock: options.clock ?? Date.now,
  }
}

/** Age of the cached file in ms, or null when there is none */
export function getCorpusAge(store: CorpusStore): number | null {
  if (!existsSync(store.path))
    return null
  return store.clock() - statSync(store.path).mtimeMs
}

export function isStale(store: CorpusStore, force = false): boolean {
  if (force)
    return true
  const age = getCorpusAge(store)
  return age === null || age > store.ttl
}

/**
 * Ensure cache directories exist
 */
export function ensureCacheDir(store: CorpusStore): void {
  const dir = dirname(store.path)
  try {
    mkdirSync(dir, { recursive: true, mode: 0o700 })
  }
  catch (err) {
    throw new StorageError('create cache directory', dir, { cause: err })
  }
}

/**
 * Write corpus text next to the target and rename it into place,
 * so a failed write never replaces a good snapshot.
 */
export function writeCorpus(store: CorpusStore, content: string): void {
  const tmpPath = `${store.path}.${process.pid}.tmp`
  try {
    writeFileSync(tmpPath, content, { mode: 0o600 })
    renameSync(tmpPath, store.path)
  }
  catch (err) {
    rmSync(tmpPath, { force: true })
    throw new StorageError('write', store.path, { cause: err })
  }
}

/**
 * Return a path to a usable corpus, downloading it when stale or forced
 */
export async function resolveCorpus(
  store: CorpusStore,
  source: CorpusSource,
  options: ResolveCorpusOptions = {},
): Promise<ResolvedCorpus> {
  const { force = false, onStatus } = options
  ensureCacheDir(store)

  if (!isStale(store, force)) {
    onStatus?.({ type: 'cache-hit', path: store.path, ageMs: getCorpusAge(store) ?? 0 })
    return { path: store.path, fetched: false }
  }

  onStatus?.({ type: 'download', url: source.url })
  const content = await fetchCorpus(source.url)
  writeCorpus(store, content)
  onStatus?.({ type: 'downloaded', path: store.path, bytes: Buffer.byteLength(content) })
  return { path: store.path, fetched: true }
}

/**
 * Remove the cached corpus. Returns false when nothing was cached.
 */
export function clearCorpus(store: CorpusStore): boolean {
  if (!existsSync(store.path))
    return false
  try {
    rmSync(store.path)
  }
  catch (err) {
    throw new StorageError('remove', store.path, { cause: err })
  }
  return true
}

export function describeCorpus(store: CorpusStore): CorpusInfo {
  const ageMs = getCorpusAge(store)
  return {
    path: store.path,
    exists: ageMs !== null,
    ageMs,
    stale: ageMs === null || ageMs > store.ttl,
  }
}
