/**
 * Shared CLI helpers used by the command definition and the main CLI entry.
 */

interface FlagDef {
  type?: string
  alias?: string | string[]
}

/**
 * First flag in argv that the command does not declare, if any.
 * Parsing stops at `--`.
 */
export function findUnknownFlag(rawArgs: string[], args: Record<string, FlagDef>): string | undefined {
  const known = new Set(['--help', '-h'])
  for (const [name, def] of Object.entries(args)) {
    if (def.type === 'positional')
      continue
    known.add(`--${name}`)
    if (def.type === 'boolean')
      known.add(`--no-${name}`)
    const aliases = typeof def.alias === 'string' ? [def.alias] : def.alias ?? []
    for (const alias of aliases)
      known.add(alias.length === 1 ? `-${alias}` : `--${alias}`)
  }

  for (const arg of rawArgs) {
    if (arg === '--')
      return undefined
    if (!arg.startsWith('-') || arg === '-')
      continue
    if (!known.has(arg.split('=')[0] ?? arg))
      return arg
  }
  return undefined
}

/** Collect keywords from the first positional plus the rest of argv */
export function collectKeywords(first: string | undefined, rest: string[]): string[] {
  return [...new Set([first, ...rest])]
    .filter((kw): kw is string => !!kw)
}
