import type { CorpusSource } from '../../src/corpus/types'
import { existsSync, mkdirSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'pathe'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

const mockFetch = vi.fn()

class MockHttpError extends Error {
  status?: number
}

vi.mock('ofetch', () => ({
  ofetch: { create: () => mockFetch },
  FetchError: MockHttpError,
}))

// Must import after vi.mock
const { clearCorpus, createCorpusStore, DEFAULT_TTL, describeCorpus, isStale, resolveCorpus } = await import('../../src/cache')
const { FetchError, StorageError } = await import('../../src/core/errors')

const TEST_DIR = join(tmpdir(), 'search-docs-test-cache-store')

const source: CorpusSource = {
  name: 'test',
  url: 'https://docs.example.org/llms-full.txt',
  host: 'docs.example.org',
  cacheDir: 'test-docs',
  fileName: 'llms-full.txt',
}

const CACHE_FILE = join(TEST_DIR, 'test-docs', 'llms-full.txt')

/** Clock running `offset` ms ahead of real time */
function clockAhead(offset: number) {
  return () => Date.now() + offset
}

function seedCache(content = 'cached') {
  mkdirSync(join(TEST_DIR, 'test-docs'), { recursive: true })
  writeFileSync(CACHE_FILE, content)
}

describe('cache/store', () => {
  beforeEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true })
    mockFetch.mockReset()
  })

  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true })
  })

  describe('createCorpusStore', () => {
    it('places the file under <root>/<cacheDir>/<fileName>', () => {
      const store = createCorpusStore(source, { cacheRoot: TEST_DIR })
      expect(store.path).toBe(CACHE_FILE)
      expect(store.ttl).toBe(DEFAULT_TTL)
    })

    it('defaults the ttl to 24h', () => {
      expect(DEFAULT_TTL).toBe(86_400_000)
    })
  })

  describe('isStale', () => {
    it('is stale when the file is missing', () => {
      expect(isStale(createCorpusStore(source, { cacheRoot: TEST_DIR }))).toBe(true)
    })

    it('is fresh within the ttl and stale past it', () => {
      seedCache()
      expect(isStale(createCorpusStore(source, { cacheRoot: TEST_DIR, clock: clockAhead(0) }))).toBe(false)
      expect(isStale(createCorpusStore(source, { cacheRoot: TEST_DIR, clock: clockAhead(DEFAULT_TTL - 60_000) }))).toBe(false)
      expect(isStale(createCorpusStore(source, { cacheRoot: TEST_DIR, clock: clockAhead(DEFAULT_TTL + 60_000) }))).toBe(true)
    })

    it('is always stale when forced', () => {
      seedCache()
      expect(isStale(createCorpusStore(source, { cacheRoot: TEST_DIR }), true)).toBe(true)
    })
  })

  describe('resolveCorpus', () => {
    it('downloads once, then serves from cache within the ttl', async () => {
      mockFetch.mockResolvedValue('corpus text')
      const store = createCorpusStore(source, { cacheRoot: TEST_DIR })

      const first = await resolveCorpus(store, source)
      const second = await resolveCorpus(store, source)

      expect(first).toEqual({ path: CACHE_FILE, fetched: true })
      expect(second).toEqual({ path: CACHE_FILE, fetched: false })
      expect(mockFetch).toHaveBeenCalledTimes(1)
      expect(mockFetch).toHaveBeenCalledWith(source.url, { responseType: 'text' })
      expect(readFileSync(CACHE_FILE, 'utf-8')).toBe('corpus text')
    })

    it('refetches once the ttl has passed', async () => {
      mockFetch.mockResolvedValueOnce('old').mockResolvedValueOnce('new')
      await resolveCorpus(createCorpusStore(source, { cacheRoot: TEST_DIR }), source)

      const later = createCorpusStore(source, { cacheRoot: TEST_DIR, clock: clockAhead(DEFAULT_TTL + 1000) })
      const result = await resolveCorpus(later, source)

      expect(result.fetched).toBe(true)
      expect(readFileSync(CACHE_FILE, 'utf-8')).toBe('new')
    })

    it('refetches a fresh cache when forced', async () => {
      mockFetch.mockResolvedValueOnce('old').mockResolvedValueOnce('new')
      const store = createCorpusStore(source, { cacheRoot: TEST_DIR })
      await resolveCorpus(store, source)
      await resolveCorpus(store, source, { force: true })

      expect(mockFetch).toHaveBeenCalledTimes(2)
      expect(readFileSync(CACHE_FILE, 'utf-8')).toBe('new')
    })

    it('reports download and cache-hit status', async () => {
      mockFetch.mockResolvedValue('abc')
      const store = createCorpusStore(source, { cacheRoot: TEST_DIR })
      const statuses: string[] = []
      const onStatus = (s: { type: string }) => {
        statuses.push(s.type)
      }

      await resolveCorpus(store, source, { onStatus })
      await resolveCorpus(store, source, { onStatus })

      expect(statuses).toEqual(['download', 'downloaded', 'cache-hit'])
    })

    it('keeps the existing file intact when the fetch fails', async () => {
      seedCache('good snapshot')
      mockFetch.mockRejectedValue(Object.assign(new MockHttpError('Not Found'), { status: 404 }))

      const store = createCorpusStore(source, { cacheRoot: TEST_DIR })
      const err = await resolveCorpus(store, source, { force: true }).catch((e: unknown) => e)

      expect(err).toBeInstanceOf(FetchError)
      expect(err).toMatchObject({ url: source.url, status: 404 })
      expect(readFileSync(CACHE_FILE, 'utf-8')).toBe('good snapshot')
      expect(readdirSync(join(TEST_DIR, 'test-docs'))).toEqual(['llms-full.txt'])
    })

    it('reports network failures without a status', async () => {
      mockFetch.mockRejectedValue(new TypeError('fetch failed'))
      const store = createCorpusStore(source, { cacheRoot: TEST_DIR })

      await expect(resolveCorpus(store, source)).rejects.toThrow(`Failed to download ${source.url} (network error)`)
      expect(existsSync(CACHE_FILE)).toBe(false)
    })

    it('raises StorageError when the cache dir cannot be created', async () => {
      mkdirSync(TEST_DIR, { recursive: true })
      // a file where the directory should be
      writeFileSync(join(TEST_DIR, 'test-docs'), 'in the way')
      const store = createCorpusStore(source, { cacheRoot: TEST_DIR })

      await expect(resolveCorpus(store, source)).rejects.toBeInstanceOf(StorageError)
      expect(mockFetch).not.toHaveBeenCalled()
    })

    it('raises StorageError and removes the temp file when the rename fails', async () => {
      // a directory where the snapshot should be, so renameSync fails
      mkdirSync(CACHE_FILE, { recursive: true })
      writeFileSync(join(CACHE_FILE, 'keep'), 'x')
      mockFetch.mockResolvedValue('fresh text')
      const store = createCorpusStore(source, { cacheRoot: TEST_DIR })

      const err = await resolveCorpus(store, source, { force: true }).catch((e: unknown) => e)
      expect(err).toBeInstanceOf(StorageError)
      expect(err).toMatchObject({ path: CACHE_FILE })
      expect(mockFetch).toHaveBeenCalledTimes(1)
      expect(readdirSync(join(TEST_DIR, 'test-docs'))).toEqual(['llms-full.txt'])
      expect(readdirSync(CACHE_FILE)).toEqual(['keep'])
    })
  })

  describe('clearCorpus', () => {
    it('removes the cached file', () => {
      seedCache()
      const store = createCorpusStore(source, { cacheRoot: TEST_DIR })

      expect(clearCorpus(store)).toBe(true)
      expect(existsSync(CACHE_FILE)).toBe(false)
      expect(clearCorpus(store)).toBe(false)
    })
  })

  describe('describeCorpus', () => {
    it('reports a missing cache as stale', () => {
      expect(describeCorpus(createCorpusStore(source, { cacheRoot: TEST_DIR }))).toEqual({
        path: CACHE_FILE,
        exists: false,
        ageMs: null,
        stale: true,
      })
    })

    it('reports age against the injected clock', () => {
      seedCache()
      const info = describeCorpus(createCorpusStore(source, { cacheRoot: TEST_DIR, clock: clockAhead(2 * DEFAULT_TTL) }))

      expect(info.exists).toBe(true)
      expect(info.stale).toBe(true)
      expect(info.ageMs).toBeGreaterThan(DEFAULT_TTL)
    })
  })
})
