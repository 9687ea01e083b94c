/* eslint-disable no-console */
import { requireValue } from '../../../packages/common/src/args'
import { ConfigError } from '../../../packages/common/src/errors'
import { createLogger } from '../../../packages/common/src/logger'
import { partitionCrashFile } from '../../../packages/crash-store/src/partition'
import { SHARD_ORDER } from '../../../packages/proto/src/types'

const usage = `Usage: partition-data [options]

Options:
  --input <path>      Raw crash CSV (default: data/raw/sample-crashes.csv)
  --output <dir>      Directory for the shard files (default: data/shards)
  --help              Show this help
`

interface PartitionArgs {
  input: string
  output: string
  help: boolean
}

const parseArgs = (argv: string[]): PartitionArgs => {
  const args: PartitionArgs = {
    input: 'data/raw/sample-crashes.csv',
    output: 'data/shards',
    help: false,
  }
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i]
    switch (arg) {
      case '--input':
        args.input = requireValue(argv[i + 1], arg)
        i += 1
        break
      case '--output':
        args.output = requireValue(argv[i + 1], arg)
        i += 1
        break
      case '--help':
      case '-h':
        args.help = true
        break
      default:
        throw new ConfigError(`Unknown argument: ${arg}\n\n${usage}`)
    }
  }
  return args
}

const main = async (): Promise<void> => {
  const args = parseArgs(process.argv.slice(2))
  if (args.help) {
    console.log(usage)
    return
  }

  const logger = createLogger('partition')
  logger.info(`partitioning ${args.input} into ${args.output}`)
  const result = partitionCrashFile({ inputFile: args.input, outputDir: args.output })
  for (const borough of SHARD_ORDER) {
    logger.info(`${borough}: ${result.counts[borough]} row(s) -> ${result.files[borough]}`)
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error)
  console.error(message)
  process.exitCode = 1
})
