// Flags that take a value when written as `--flag value`
const VALUE_FLAGS = new Set(['from', 'to', 'export', 'compare', 'concurrency', 'checks'])

export interface ParsedArgs {
  flags: Record<string, string | boolean>
  positional: string[]
}

/**
 * `--key=value`, `--key value` and bare `--flag`. A value never starts with
 * `--`; everything else is positional. `--flag=false` turns a switch off.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {}
  const positional: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (!arg.startsWith('--')) {
      positional.push(arg)
      continue
    }
    const eq = arg.indexOf('=')
    if (eq !== -1) {
      const name = arg.slice(2, eq)
      const value = arg.slice(eq + 1)
      // Switches also take an explicit `=true` / `=false`
      flags[name] = !VALUE_FLAGS.has(name) && (value === 'true' || value === 'false') ? value === 'true' : value
      continue
    }
    const next = argv[i + 1]
    if (next !== undefined && !next.startsWith('--') && VALUE_FLAGS.has(arg.slice(2))) {
      flags[arg.slice(2)] = next
      i++
    } else {
      flags[arg.slice(2)] = true
    }
  }
  return { flags, positional }
}
