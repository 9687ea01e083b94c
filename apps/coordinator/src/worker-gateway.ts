import * as grpc from '@grpc/grpc-js'
import { CrashQueryClient } from '../../../packages/proto/src/client'
import type { DataMessage, QueryRequest, QueryResponse } from '../../../packages/proto/src/types'
import type { WorkerRoute } from './routing'

export interface WorkerCallOptions {
  deadline: Date
  signal: AbortSignal
}

/**
 * How the coordinator reaches its workers. The gRPC implementation is used
 * in production; tests substitute an in-process fake.
 */
export interface WorkerGateway {
  query: (
    workerId: string,
    request: QueryRequest,
    options: WorkerCallOptions
  ) => Promise<QueryResponse>
  send: (workerId: string, message: DataMessage, options: WorkerCallOptions) => Promise<void>
  close: () => void
}

/**
 * One CrashQueryClient per worker, created on first use and reused across
 * queries.
 */
export class GrpcWorkerGateway implements WorkerGateway {
  private readonly clients = new Map<string, CrashQueryClient>()
  private readonly routes: ReadonlyMap<string, WorkerRoute>

  public constructor(
    routes: readonly WorkerRoute[],
    private readonly channelCredentials: grpc.ChannelCredentials = grpc.credentials.createInsecure()
  ) {
    this.routes = new Map(routes.map((route) => [route.workerId, route]))
  }

  public async query(
    workerId: string,
    request: QueryRequest,
    options: WorkerCallOptions
  ): Promise<QueryResponse> {
    return this.client(workerId).queryData(request, options)
  }

  public async send(workerId: string, message: DataMessage, options: WorkerCallOptions): Promise<void> {
    return this.client(workerId).sendData(message, options)
  }

  public close(): void {
    for (const client of this.clients.values()) {
      client.close()
    }
    this.clients.clear()
  }

  private client(workerId: string): CrashQueryClient {
    const existing = this.clients.get(workerId)
    if (existing) {
      return existing
    }
    const route = this.routes.get(workerId)
    if (route == null) {
      throw new Error(`no route to worker ${workerId}`)
    }
    const client = new CrashQueryClient(route.address, this.channelCredentials)
    this.clients.set(workerId, client)
    return client
  }
}
