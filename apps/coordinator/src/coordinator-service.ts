import type { ClusterConfig } from '../../../packages/common/src/config'
import { startGrpcServer } from '../../../packages/common/src/grpc-server'
import type { RunningServer } from '../../../packages/common/src/grpc-server'
import type { Logger } from '../../../packages/common/src/logger'
import { addCrashQueryService } from '../../../packages/proto/src/server'
import type { CrashQueryHandler } from '../../../packages/proto/src/server'
import { QueryEngine } from './query-engine'
import { RoutingTable } from './routing'
import { GrpcWorkerGateway } from './worker-gateway'
import type { WorkerGateway } from './worker-gateway'

/**
 * Exposes the query engine as CrashQueryService. The inbound call's
 * deadline and cancellation flow into every worker dispatch.
 */
export const createCoordinatorHandler = (engine: QueryEngine): CrashQueryHandler => ({
  query: (request, context) => engine.query(request, context),
  stream: (request, context) => engine.stream(request, context),
  send: (message) => engine.send(message),
})

export interface CoordinatorServiceOptions {
  /** Overrides the configured listen address. */
  address?: string
  /** Defaults to gRPC clients for the configured workers. */
  gateway?: WorkerGateway
  maxBindAttempts?: number
}

export interface CoordinatorHandle {
  engine: QueryEngine
  gateway: WorkerGateway
  server: RunningServer
  /** Stops the server and closes worker connections. */
  stop: () => Promise<void>
}

export const startCoordinatorService = async (
  config: ClusterConfig,
  logger: Logger,
  options: CoordinatorServiceOptions = {}
): Promise<CoordinatorHandle> => {
  const routing = RoutingTable.fromConfig(config)
  const gateway = options.gateway ?? new GrpcWorkerGateway(routing.workers())
  const engine = new QueryEngine({
    id: config.coordinator.id,
    routing,
    gateway,
    workerTimeoutMs: config.coordinator.workerTimeoutMs,
    pageSize: config.coordinator.streamPageSize,
    logger,
  })

  const handler = createCoordinatorHandler(engine)
  const server = await startGrpcServer({
    address: options.address ?? config.coordinator.address,
    logger,
    maxBindAttempts: options.maxBindAttempts,
    register: (grpcServer) => addCrashQueryService(grpcServer, handler, logger),
  })

  for (const route of routing.workers()) {
    logger.info(`worker ${route.workerId} at ${route.address}`)
  }

  return {
    engine,
    gateway,
    server,
    stop: async () => {
      await server.stop()
      gateway.close()
    },
  }
}
