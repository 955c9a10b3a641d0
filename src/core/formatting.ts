export function formatDuration(ms: number): string {
  if (ms < 1000)
    return `${Math.round(ms)}ms`
  return `${(ms / 1000).toFixed(1)}s`
}

/** Human age of a cached file, e.g. "3h old" */
export function formatAge(ms: number): string {
  const mins = Math.floor(ms / 60000)
  const hours = Math.floor(ms / 3600000)
  const days = Math.floor(ms / 86400000)
  if (mins < 1)
    return 'just now'
  if (mins < 60)
    return `${mins}m old`
  if (hours < 24)
    return `${hours}h old`
  return `${days}d old`
}

export function pluralize(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`
}
