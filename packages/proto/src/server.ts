import { once } from 'node:events'
import * as grpc from '@grpc/grpc-js'
import {
  DeliveryError,
  TransportError,
  WireFormatError,
  createServiceError,
} from '../../common/src/errors'
import type { Logger } from '../../common/src/logger'
import { loadCrashQueryService } from './service'
import type { DataMessage, QueryRequest, QueryResponse, StreamChunk } from './types'
import { fromWireDataMessage, fromWireQueryRequest, toWireQueryResponse } from './wire'

/**
 * Deadline and cancellation of the inbound call, passed to handlers so they
 * can bound their own downstream calls.
 */
export interface CrashCallContext {
  deadline: grpc.Deadline
  signal: AbortSignal
}

/**
 * What a process serving CrashQueryService implements. Rejected queries are
 * answered in-band (`success=false`); a thrown error becomes a gRPC status.
 */
export interface CrashQueryHandler {
  query: (request: QueryRequest, context: CrashCallContext) => Promise<QueryResponse>
  stream: (request: QueryRequest, context: CrashCallContext) => Promise<StreamChunk[]>
  send: (message: DataMessage) => Promise<void>
}

const statusOf = (error: unknown): grpc.status => {
  if (error instanceof DeliveryError || error instanceof TransportError) {
    return error.code
  }
  if (error instanceof WireFormatError) {
    return grpc.status.INVALID_ARGUMENT
  }
  return grpc.status.INTERNAL
}

const toServiceError = (error: unknown): grpc.ServiceError => {
  const message = error instanceof Error ? error.message : String(error)
  return createServiceError(message, statusOf(error))
}

interface InboundCall {
  getDeadline: () => grpc.Deadline
  on: (event: 'cancelled', listener: () => void) => unknown
}

const contextOf = (call: InboundCall): CrashCallContext => {
  const controller = new AbortController()
  call.on('cancelled', () => controller.abort())
  return { deadline: call.getDeadline(), signal: controller.signal }
}

const writeWithBackpressure = async (
  stream: grpc.ServerWritableStream<unknown, object>,
  chunk: StreamChunk
): Promise<void> => {
  if (!stream.write({ ...chunk })) {
    await once(stream, 'drain')
  }
}

/**
 * Adapts a handler to the untyped implementation @grpc/grpc-js registers
 * against the runtime-loaded service definition.
 */
export const createCrashQueryService = (
  handler: CrashQueryHandler,
  logger: Logger
): grpc.UntypedServiceImplementation => ({
  QueryData: (call: grpc.ServerUnaryCall<unknown, object>, callback: grpc.sendUnaryData<object>) => {
    const run = async (): Promise<object> => {
      const request = fromWireQueryRequest(call.request)
      logger.debug(
        `QueryData ${request.queryId}: ${request.queryString} [${request.parameters.join(', ')}]`
      )
      return toWireQueryResponse(await handler.query(request, contextOf(call)))
    }
    run().then(
      (response) => callback(null, response),
      (error: unknown) => {
        logger.error('QueryData failed:', error)
        callback(toServiceError(error))
      }
    )
  },

  SendData: (call: grpc.ServerUnaryCall<unknown, object>, callback: grpc.sendUnaryData<object>) => {
    const run = async (): Promise<void> => {
      await handler.send(fromWireDataMessage(call.request))
    }
    run().then(
      () => callback(null, {}),
      (error: unknown) => {
        logger.warn(`SendData rejected: ${error instanceof Error ? error.message : String(error)}`)
        callback(toServiceError(error))
      }
    )
  },

  StreamData: (call: grpc.ServerWritableStream<unknown, object>) => {
    const context = contextOf(call)
    const run = async (): Promise<void> => {
      try {
        const request = fromWireQueryRequest(call.request)
        const chunks = await handler.stream(request, context)
        for (const chunk of chunks) {
          if (context.signal.aborted) {
            return
          }
          await writeWithBackpressure(call, chunk)
        }
        call.end()
      } catch (error: unknown) {
        logger.error('StreamData failed:', error)
        call.destroy(toServiceError(error))
      }
    }
    void run()
  },
})

/**
 * Registers CrashQueryService on a server.
 */
export const addCrashQueryService = (
  server: grpc.Server,
  handler: CrashQueryHandler,
  logger: Logger
): void => {
  server.addService(loadCrashQueryService(), createCrashQueryService(handler, logger))
}
