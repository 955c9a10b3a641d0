/**
 * Error taxonomy for the search pipeline
 */

export class SearchDocsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Bad invocation: missing keyword or unknown flag. Raised before any cache or network work. */
export class UsageError extends SearchDocsError {}

/** Remote corpus could not be downloaded */
export class FetchError extends SearchDocsError {
  readonly url: string
  readonly status?: number

  constructor(url: string, status?: number, options?: { cause?: unknown }) {
    const reason = status ? `HTTP ${status}` : 'network error'
    super(`Failed to download ${url} (${reason})`, options)
    this.url = url
    this.status = status
  }
}

/** Cache directory or file could not be created or written */
export class StorageError extends SearchDocsError {
  readonly path: string

  constructor(action: string, path: string, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : ''
    super(`Failed to ${action} ${path}${detail}`, options)
    this.path = path
  }
}
