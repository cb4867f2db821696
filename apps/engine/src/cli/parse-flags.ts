/**
 * `pricelens search` argument parsing
 *
 * Accepts `--flag value` and `--flag=value`. Throws UsageError instead of
 * exiting so the caller picks the exit code.
 */

export const USAGE = `
Usage: pricelens search --query <text> [options]

Options:
  --query <text>          Product to search for (required)
  --region <code>         Two-letter region code (default: US)
  --max <n>               Maximum clusters to show, 1-100 (default: 10)
  --sources <ids>         Comma-separated source ids to include
  --exclude-sources <ids> Comma-separated source ids to skip
  --min-price <amount>    Drop listings below this price
  --max-price <amount>    Drop listings above this price
  --deadline-ms <ms>      Overall fetch deadline
  --refresh               Ignore any cached result
  --json                  Print the response as JSON
  --help                  Show this help
`

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

export interface CliOptions {
  query: string
  region: string
  maxResults: number
  filters: Record<string, string>
  deadlineMs?: number
  refresh: boolean
  json: boolean
  help: boolean
}

const VALUE_FLAGS = new Set([
  '--query',
  '--region',
  '--max',
  '--sources',
  '--exclude-sources',
  '--min-price',
  '--max-price',
  '--deadline-ms',
])

function positiveInteger(flag: string, value: string, max = Number.MAX_SAFE_INTEGER): number {
  const parsed = Number(value)
  if (!/^\d+$/.test(value) || parsed < 1 || parsed > max) {
    throw new UsageError(`${flag} must be an integer between 1 and ${max}, got "${value}"`)
  }
  return parsed
}

function price(flag: string, value: string): string {
  if (!/^\d+(?:\.\d+)?$/.test(value)) {
    throw new UsageError(`${flag} must be a number, got "${value}"`)
  }
  return value
}

function idList(value: string): string {
  return value
    .split(',')
    .map((id) => id.trim())
    .filter(Boolean)
    .join(',')
}

export function parseFlags(argv: readonly string[]): CliOptions {
  const [command, ...rest] = argv
  if (command === '--help' || command === '-h') {
    return { query: '', region: 'US', maxResults: 10, filters: {}, refresh: false, json: false, help: true }
  }
  if (command !== 'search') {
    throw new UsageError(command ? `Unknown command: ${command}` : 'Missing command')
  }

  const opts: CliOptions = {
    query: '',
    region: 'US',
    maxResults: 10,
    filters: {},
    refresh: false,
    json: false,
    help: false,
  }

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i]
    const eq = arg.indexOf('=')
    const flag = arg.startsWith('--') && eq > 0 ? arg.slice(0, eq) : arg

    let value = ''
    if (VALUE_FLAGS.has(flag)) {
      const next = eq > 0 && flag !== arg ? arg.slice(eq + 1) : rest[++i]
      if (next === undefined || (flag === arg && next.startsWith('--'))) {
        throw new UsageError(`${flag} needs a value`)
      }
      value = next.trim()
    }

    switch (flag) {
      case '--query':
        opts.query = value
        break
      case '--region':
        opts.region = value.toUpperCase()
        break
      case '--max':
        opts.maxResults = positiveInteger(flag, value, 100)
        break
      case '--sources':
        opts.filters.sources = idList(value)
        break
      case '--exclude-sources':
        opts.filters.excludeSources = idList(value)
        break
      case '--min-price':
        opts.filters.minPrice = price(flag, value)
        break
      case '--max-price':
        opts.filters.maxPrice = price(flag, value)
        break
      case '--deadline-ms':
        opts.deadlineMs = positiveInteger(flag, value)
        break
      case '--refresh':
        opts.refresh = true
        break
      case '--json':
        opts.json = true
        break
      case '--help':
      case '-h':
        opts.help = true
        break
      default:
        throw new UsageError(`Unknown argument: ${arg}`)
    }
  }

  if (!opts.help && !opts.query) {
    throw new UsageError('--query is required')
  }

  return opts
}
