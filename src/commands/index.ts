export { clearCacheCommand, infoCommand, reportStatus, searchArgs, searchCommand, searchCommandDef } from './search.ts'
export type { SearchOptions } from './search.ts'
