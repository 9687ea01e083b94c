import { ConfigError } from './errors'

/**
 * Returns the value following a flag.
 * @throws ConfigError when the flag is the last argument or the value is empty.
 */
export const requireValue = (value: string | undefined, flag: string): string => {
  if (!value) {
    throw new ConfigError(`Missing value for ${flag}`)
  }
  return value
}

export const parseNumberArg = (value: string, flag: string): number => {
  const parsed = Number.parseInt(value, 10)
  if (Number.isNaN(parsed) || String(parsed) !== value.trim()) {
    throw new ConfigError(`Invalid numeric value for ${flag}: ${value}`)
  }
  return parsed
}

/**
 * Options shared by the worker and coordinator entry points.
 */
export interface ProcessArgs {
  configPath: string
  id: string | null
  address: string | null
  help: boolean
}

export const DEFAULT_CONFIG_PATH = 'config/cluster.yaml'

/**
 * Parses `--config`, `--id` and `--address`. The config path falls back to
 * CRASHGRID_CONFIG, then to config/cluster.yaml.
 */
export const parseProcessArgs = (
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): ProcessArgs => {
  const args: ProcessArgs = {
    configPath: env.CRASHGRID_CONFIG ?? DEFAULT_CONFIG_PATH,
    id: null,
    address: null,
    help: false,
  }

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i]
    switch (arg) {
      case '--config':
        args.configPath = requireValue(argv[i + 1], arg)
        i += 1
        break
      case '--id':
        args.id = requireValue(argv[i + 1], arg).toUpperCase()
        i += 1
        break
      case '--address':
        args.address = requireValue(argv[i + 1], arg)
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

  return args
}
