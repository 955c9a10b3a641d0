/**
 * Corpus download
 */

import { FetchError as HttpError, ofetch } from 'ofetch'
import { FetchError } from '../core/errors'
import { version } from '../version'

const USER_AGENT = `search-docs/${version}`

export const $fetch = ofetch.create({
  headers: { 'User-Agent': USER_AGENT },
  retry: 0,
})

/**
 * Single GET of the full corpus. No timeout and no retries.
 */
export async function fetchCorpus(url: string): Promise<string> {
  try {
    return await $fetch(url, { responseType: 'text' })
  }
  catch (err) {
    const status = err instanceof HttpError ? err.status : undefined
    throw new FetchError(url, status, { cause: err })
  }
}
