import { parseNumberArg, requireValue } from '../../../packages/common/src/args'
import { ConfigError } from '../../../packages/common/src/errors'
import type { Verb } from '../../../packages/crash-store/src/predicate'

export type OutputFormat = 'json' | 'table'

export interface CrashQuery {
  queryString: Verb
  parameters: string[]
}

export interface ClientArgs {
  server: string
  /** Null only when `help` is set. */
  query: CrashQuery | null
  stream: boolean
  format: OutputFormat
  /** Crashes printed; the count always covers the whole result. */
  limit: number
  timeoutMs: number
  help: boolean
}

export const DEFAULT_SERVER = '127.0.0.1:50051'
export const DEFAULT_LIMIT = 10
export const DEFAULT_TIMEOUT_MS = 10000

const QUERY_FLAGS: Record<string, { verb: Verb; values: number }> = {
  '--all': { verb: 'get_all', values: 0 },
  '--borough': { verb: 'get_by_borough', values: 1 },
  '--street': { verb: 'get_by_street', values: 1 },
  '--dates': { verb: 'get_by_date_range', values: 2 },
  '--injuries': { verb: 'get_crashes_with_injuries', values: 1 },
  '--fatalities': { verb: 'get_crashes_with_fatalities', values: 1 },
  '--time': { verb: 'get_by_time', values: 1 },
}

const parseFormat = (value: string): OutputFormat => {
  if (value === 'json' || value === 'table') {
    return value
  }
  throw new ConfigError(`Invalid value for --format: ${value} (expected json or table)`)
}

const parsePositive = (value: string, flag: string): number => {
  const parsed = parseNumberArg(value, flag)
  if (parsed < 1) {
    throw new ConfigError(`${flag} must be at least 1, got ${parsed}`)
  }
  return parsed
}

/**
 * Maps command-line flags to one query. The server address falls back to
 * CRASHGRID_SERVER, then to the default coordinator address.
 * @throws ConfigError for an unknown flag, a missing value, or anything but
 * exactly one query flag.
 */
export const parseClientArgs = (
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): ClientArgs => {
  const args: ClientArgs = {
    server: env.CRASHGRID_SERVER ?? DEFAULT_SERVER,
    query: null,
    stream: false,
    format: 'json',
    limit: DEFAULT_LIMIT,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    help: false,
  }
  const queryFlags: string[] = []

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i]
    const queryFlag = Object.hasOwn(QUERY_FLAGS, arg) ? QUERY_FLAGS[arg] : undefined
    if (queryFlag) {
      const parameters: string[] = []
      for (let n = 1; n <= queryFlag.values; n += 1) {
        parameters.push(requireValue(argv[i + n], arg))
      }
      i += queryFlag.values
      queryFlags.push(arg)
      args.query = { queryString: queryFlag.verb, parameters }
      continue
    }

    switch (arg) {
      case '--server':
        args.server = requireValue(argv[i + 1], arg)
        i += 1
        break
      case '--stream':
        args.stream = true
        break
      case '--format':
        args.format = parseFormat(requireValue(argv[i + 1], arg))
        i += 1
        break
      case '--limit':
        args.limit = parsePositive(requireValue(argv[i + 1], arg), arg)
        i += 1
        break
      case '--timeout-ms':
        args.timeoutMs = parsePositive(requireValue(argv[i + 1], arg), arg)
        i += 1
        break
      case '--help':
      case '-h':
        args.help = true
        break
      default:
        throw new ConfigError(`Unknown argument: ${arg}`)
    }
  }

  if (queryFlags.length > 1) {
    throw new ConfigError(`Only one query flag may be given, got ${queryFlags.join(', ')}`)
  }
  if (queryFlags.length === 0 && !args.help) {
    throw new ConfigError(`One query flag is required: ${Object.keys(QUERY_FLAGS).join(', ')}`)
  }
  return args
}
