/* eslint-disable no-console */
import { parseProcessArgs } from '../../../packages/common/src/args'
import { findWorker, loadClusterConfig } from '../../../packages/common/src/config'
import { ConfigError } from '../../../packages/common/src/errors'
import { stopOnSignals } from '../../../packages/common/src/grpc-server'
import { createLogger } from '../../../packages/common/src/logger'
import { startWorkerService } from './worker-service'

const usage = `Usage: worker --id <B..E> [options]

Options:
  --config <path>     Cluster config (default: $CRASHGRID_CONFIG or config/cluster.yaml)
  --id <id>           Worker process id from the cluster config
  --address <addr>    Override the configured listen address
  --help              Show this help
`

const main = async (): Promise<void> => {
  const args = parseProcessArgs(process.argv.slice(2))
  if (args.help) {
    console.log(usage)
    return
  }
  if (args.id == null) {
    throw new ConfigError(`Missing --id\n\n${usage}`)
  }

  const config = loadClusterConfig(args.configPath)
  const workerConfig = findWorker(config, args.id)
  const logger = createLogger(`worker ${workerConfig.id}`)
  const handle = await startWorkerService(workerConfig, logger, {
    address: args.address ?? undefined,
    pageSize: config.coordinator.streamPageSize,
  })
  logger.info(`serving ${handle.worker.shards.join(', ')}`)
  stopOnSignals(handle.server, logger)
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error)
  console.error(message)
  process.exitCode = 1
})
