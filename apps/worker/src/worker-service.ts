import type { WorkerConfig } from '../../../packages/common/src/config'
import { startGrpcServer } from '../../../packages/common/src/grpc-server'
import type { RunningServer } from '../../../packages/common/src/grpc-server'
import type { Logger } from '../../../packages/common/src/logger'
import { RecordStore } from '../../../packages/crash-store/src/record-store'
import { paginateResponse } from '../../../packages/proto/src/paging'
import { addCrashQueryService } from '../../../packages/proto/src/server'
import type { CrashQueryHandler } from '../../../packages/proto/src/server'
import { ShardWorker } from './shard-worker'

/**
 * Serves a worker's shards over CrashQueryService. Scans run synchronously
 * on the event loop.
 */
export const createWorkerHandler = (
  worker: ShardWorker,
  logger: Logger,
  pageSize?: number
): CrashQueryHandler => ({
  query: async (request) => worker.execute(request),
  stream: async (request) => {
    const response = worker.execute(request)
    logger.debug(`${request.queryId}: streaming ${response.results.length} result(s)`)
    return paginateResponse(response, pageSize)
  },
  send: async (message) => worker.receive(message),
})

export interface WorkerServiceOptions {
  /** Overrides the configured listen address. */
  address?: string
  pageSize?: number
  maxBindAttempts?: number
}

export interface WorkerHandle {
  worker: ShardWorker
  server: RunningServer
}

/**
 * Loads every shard assigned to the worker, then starts serving. A shard
 * that fails to load aborts startup before the server binds.
 */
export const startWorkerService = async (
  config: WorkerConfig,
  logger: Logger,
  options: WorkerServiceOptions = {}
): Promise<WorkerHandle> => {
  const stores = config.shards.map((shard) => {
    const store = RecordStore.load(shard.file, shard.borough)
    logger.info(`loaded ${store.size} record(s) for ${shard.borough} from ${shard.file}`)
    return store
  })

  const worker = new ShardWorker({ id: config.id, stores, logger })
  const handler = createWorkerHandler(worker, logger, options.pageSize)
  const server = await startGrpcServer({
    address: options.address ?? config.address,
    logger,
    maxBindAttempts: options.maxBindAttempts,
    register: (grpcServer) => addCrashQueryService(grpcServer, handler, logger),
  })
  return { worker, server }
}
