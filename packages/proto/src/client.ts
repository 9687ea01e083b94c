import * as grpc from '@grpc/grpc-js'
import { TransportError } from '../../common/src/errors'
import { crashQueryMethod } from './service'
import type { DataMessage, QueryRequest, QueryResponse, StreamChunk } from './types'
import {
  fromWireQueryResponse,
  fromWireStreamChunk,
  toWireQueryRequest,
} from './wire'

/**
 * Per-call options. The deadline propagates to the server as a gRPC
 * deadline; aborting the signal cancels the call.
 */
export interface CrashCallOptions {
  deadline?: grpc.Deadline
  signal?: AbortSignal
}

const toCallOptions = (options: CrashCallOptions): grpc.CallOptions => {
  return options.deadline == null ? {} : { deadline: options.deadline }
}

const toTransportError = (address: string, error: grpc.ServiceError): TransportError => {
  return new TransportError(`${address}: ${error.details || error.message}`, error.code)
}

const bindAbort = (signal: AbortSignal | undefined, call: { cancel: () => void }): (() => void) => {
  if (signal == null) {
    return () => {}
  }
  if (signal.aborted) {
    call.cancel()
    return () => {}
  }
  const onAbort = (): void => call.cancel()
  signal.addEventListener('abort', onAbort, { once: true })
  return () => signal.removeEventListener('abort', onAbort)
}

/**
 * Typed client for CrashQueryService, used by the CLI against the
 * coordinator and by the coordinator against its workers.
 */
export class CrashQueryClient {
  private readonly client: grpc.Client

  public constructor(
    public readonly address: string,
    channelCredentials: grpc.ChannelCredentials = grpc.credentials.createInsecure(),
    clientOptions: Partial<grpc.ClientOptions> = {}
  ) {
    this.client = new grpc.Client(address, channelCredentials, clientOptions)
  }

  /**
   * Resolves once the channel is connected.
   * @throws TransportError when the server cannot be reached within `timeoutMs`.
   */
  public waitForReady(timeoutMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
      this.client.waitForReady(new Date(Date.now() + timeoutMs), (error) => {
        if (error) {
          reject(
            new TransportError(`${this.address}: ${error.message}`, grpc.status.UNAVAILABLE)
          )
          return
        }
        resolve()
      })
    })
  }

  public queryData(request: QueryRequest, options: CrashCallOptions = {}): Promise<QueryResponse> {
    const method = crashQueryMethod('QueryData')
    return new Promise((resolve, reject) => {
      let unbind = (): void => {}
      const call = this.client.makeUnaryRequest<object, object>(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        toWireQueryRequest(request),
        new grpc.Metadata(),
        toCallOptions(options),
        (error, response) => {
          unbind()
          if (error) {
            reject(toTransportError(this.address, error))
            return
          }
          try {
            resolve(fromWireQueryResponse(response))
          } catch (decodeError) {
            reject(decodeError)
          }
        }
      )
      unbind = bindAbort(options.signal, call)
    })
  }

  public sendData(message: DataMessage, options: CrashCallOptions = {}): Promise<void> {
    const method = crashQueryMethod('SendData')
    return new Promise((resolve, reject) => {
      let unbind = (): void => {}
      const call = this.client.makeUnaryRequest<object, object>(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        { ...message },
        new grpc.Metadata(),
        toCallOptions(options),
        (error) => {
          unbind()
          if (error) {
            reject(toTransportError(this.address, error))
            return
          }
          resolve()
        }
      )
      unbind = bindAbort(options.signal, call)
    })
  }

  /**
   * Streams result chunks in server order. Leaving the loop early cancels
   * the call.
   */
  public async *streamData(
    request: QueryRequest,
    options: CrashCallOptions = {}
  ): AsyncGenerator<StreamChunk> {
    const method = crashQueryMethod('StreamData')
    const call = this.client.makeServerStreamRequest<object, object>(
      method.path,
      method.requestSerialize,
      method.responseDeserialize,
      toWireQueryRequest(request),
      new grpc.Metadata(),
      toCallOptions(options)
    )
    const unbind = bindAbort(options.signal, call)
    let completed = false

    try {
      for await (const message of call) {
        yield fromWireStreamChunk(message)
      }
      completed = true
    } catch (error) {
      if (isServiceError(error)) {
        throw toTransportError(this.address, error)
      }
      throw error
    } finally {
      unbind()
      if (!completed) {
        call.cancel()
      }
    }
  }

  public close(): void {
    this.client.close()
  }
}

const isServiceError = (error: unknown): error is grpc.ServiceError => {
  return error instanceof Error && 'code' in error && typeof error.code === 'number'
}
