import { InvalidInputError } from '@backend/errors'

export type OptionKind = 'value' | 'flag'

export type OptionSpec = Record<string, OptionKind>

export interface ParsedOptions {
  values: Record<string, string>
  flags: Record<string, boolean>
}

const toCamelCase = (name: string) => name.replace(/-([a-z])/g, (_, c: string) => c.toUpperCase())

/**
 * Parse `--kebab-case value`, `--kebab-case=value` and bare `--flag`
 * arguments against the options a command accepts. Keys come back in
 * camelCase. Values may start with a dash, so negative longitudes work.
 */
export function parseOptions(argv: string[], spec: OptionSpec): ParsedOptions {
  const values: Record<string, string> = {}
  const flags: Record<string, boolean> = {}
  const issues: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? ''

    if (!arg.startsWith('--')) {
      issues.push(`unexpected argument '${arg}'`)
      continue
    }

    const [name = '', inline] = arg.slice(2).split(/=(.*)/s)
    const key = toCamelCase(name)
    const kind = spec[key]

    if (!kind) {
      issues.push(`unknown option --${name}`)
      continue
    }

    if (kind === 'flag') {
      if (inline !== undefined) issues.push(`--${name} does not take a value`)
      flags[key] = true
      continue
    }

    const value = inline ?? argv[++i]
    if (value === undefined) {
      issues.push(`--${name} expects a value`)
      continue
    }
    values[key] = value
  }

  if (issues.length > 0) {
    throw new InvalidInputError('Invalid command-line arguments', issues)
  }

  return { values, flags }
}
