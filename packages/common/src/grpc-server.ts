import { setTimeout as delay } from 'node:timers/promises'
import * as grpc from '@grpc/grpc-js'
import type { Logger } from './logger'

const BIND_RETRY_BASE_MS = 1000
const BIND_RETRY_MAX_MS = 15000
const SHUTDOWN_TIMEOUT_MS = 5000

export interface GrpcServerOptions {
  address: string
  register: (server: grpc.Server) => void
  logger: Logger
  /** Bind attempts before giving up; 1 disables retrying. */
  maxBindAttempts?: number
  serverOptions?: grpc.ServerOptions
}

export interface RunningServer {
  server: grpc.Server
  /** Bound port; differs from the requested one when binding port 0. */
  port: number
  /** "host:port" clients can dial. */
  address: string
  stop: () => Promise<void>
}

const hostOf = (address: string): string => {
  const index = address.lastIndexOf(':')
  return index === -1 ? address : address.slice(0, index)
}

const bind = (server: grpc.Server, address: string): Promise<number> =>
  new Promise((resolve, reject) => {
    server.bindAsync(address, grpc.ServerCredentials.createInsecure(), (error, port) => {
      if (error) {
        reject(error)
        return
      }
      resolve(port)
    })
  })

/**
 * Shuts the server down gracefully, forcing it after five seconds.
 */
export const stopGrpcServer = (server: grpc.Server): Promise<void> =>
  new Promise((resolve, reject) => {
    let settled = false
    const timeout = setTimeout(() => {
      if (settled) {
        return
      }
      settled = true
      server.forceShutdown()
      resolve()
    }, SHUTDOWN_TIMEOUT_MS)

    server.tryShutdown((error) => {
      if (settled) {
        return
      }
      settled = true
      clearTimeout(timeout)
      if (error) {
        server.forceShutdown()
        reject(error)
        return
      }
      resolve()
    })
  })

/**
 * Creates a server, registers services on it and binds it, retrying with
 * exponential backoff while the address is unavailable.
 * @throws The last bind error once `maxBindAttempts` is exhausted.
 */
export const startGrpcServer = async (options: GrpcServerOptions): Promise<RunningServer> => {
  const maxAttempts = options.maxBindAttempts ?? Number.POSITIVE_INFINITY
  let retryDelayMs = BIND_RETRY_BASE_MS

  for (let attempt = 1; ; attempt += 1) {
    const server = new grpc.Server(options.serverOptions)
    options.register(server)
    try {
      const port = await bind(server, options.address)
      const address = `${hostOf(options.address)}:${port}`
      options.logger.info(`listening on ${address}`)
      return { server, port, address, stop: () => stopGrpcServer(server) }
    } catch (error) {
      server.forceShutdown()
      if (attempt >= maxAttempts) {
        throw error
      }
      const reason = error instanceof Error ? error.message : String(error)
      options.logger.warn(`failed to bind ${options.address}: ${reason}; retrying in ${retryDelayMs}ms`)
      await delay(retryDelayMs)
      retryDelayMs = Math.min(retryDelayMs * 2, BIND_RETRY_MAX_MS)
    }
  }
}

/**
 * Stops the server on SIGINT or SIGTERM, runs `cleanup`, then exits.
 */
export const stopOnSignals = (
  running: RunningServer,
  logger: Logger,
  cleanup: () => void = () => {}
): void => {
  let shuttingDown = false

  const handleSignal = (signal: NodeJS.Signals): void => {
    if (shuttingDown) {
      return
    }
    shuttingDown = true
    logger.info(`received ${signal}, shutting down`)
    running.stop().then(
      () => {
        cleanup()
        logger.info('stopped')
        process.exit(0)
      },
      (error: unknown) => {
        logger.error('shutdown failed:', error)
        process.exit(1)
      }
    )
  }

  process.on('SIGINT', () => handleSignal('SIGINT'))
  process.on('SIGTERM', () => handleSignal('SIGTERM'))
}
