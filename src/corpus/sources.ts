import type { CorpusSource } from './types'

export const dbtDocs: CorpusSource = {
  name: 'dbt',
  url: 'https://docs.getdbt.com/llms-full.txt',
  host: 'docs.getdbt.com',
  cacheDir: 'dbt-docs',
  fileName: 'llms-full.txt',
}

export const DEFAULT_SOURCE = dbtDocs
