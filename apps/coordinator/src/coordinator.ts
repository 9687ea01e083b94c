/* eslint-disable no-console */
import { parseProcessArgs } from '../../../packages/common/src/args'
import { loadClusterConfig } from '../../../packages/common/src/config'
import { ConfigError } from '../../../packages/common/src/errors'
import { stopOnSignals } from '../../../packages/common/src/grpc-server'
import { createLogger } from '../../../packages/common/src/logger'
import { startCoordinatorService } from './coordinator-service'

const usage = `Usage: coordinator [options]

Options:
  --config <path>     Cluster config (default: $CRASHGRID_CONFIG or config/cluster.yaml)
  --id <id>           Coordinator id; must match the cluster config
  --address <addr>    Override the configured listen address
  --help              Show this help
`

const main = async (): Promise<void> => {
  const args = parseProcessArgs(process.argv.slice(2))
  if (args.help) {
    console.log(usage)
    return
  }

  const config = loadClusterConfig(args.configPath)
  if (args.id != null && args.id !== config.coordinator.id) {
    throw new ConfigError(`--id ${args.id} does not match coordinator id ${config.coordinator.id}`)
  }

  const logger = createLogger(`coordinator ${config.coordinator.id}`)
  const handle = await startCoordinatorService(config, logger, {
    address: args.address ?? undefined,
  })
  stopOnSignals(handle.server, logger, () => handle.gateway.close())
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error)
  console.error(message)
  process.exitCode = 1
})
