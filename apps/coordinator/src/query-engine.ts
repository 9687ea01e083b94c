import * as grpc from '@grpc/grpc-js'
import {
  DeliveryError,
  QueryError,
  WorkerUnavailableError,
  errorMessage,
} from '../../../packages/common/src/errors'
import type { Logger } from '../../../packages/common/src/logger'
import { compilePredicate } from '../../../packages/crash-store/src/predicate'
import { MessageInbox, previewPayload } from '../../../packages/proto/src/inbox'
import { DEFAULT_PAGE_SIZE, paginateResponse } from '../../../packages/proto/src/paging'
import {
  TimingRecorder,
  encodeTimingText,
  mergeTimingReports,
} from '../../../packages/proto/src/timing'
import { SHARD_ORDER } from '../../../packages/proto/src/types'
import type {
  DataMessage,
  QueryRequest,
  QueryResponse,
  ResultEntry,
  StreamChunk,
  TimingReport,
} from '../../../packages/proto/src/types'
import type { DispatchTarget, RoutingTable } from './routing'
import type { WorkerGateway } from './worker-gateway'

export interface QueryEngineOptions {
  /** Coordinator process id, used for its own timings and SendData. */
  id: string
  routing: RoutingTable
  gateway: WorkerGateway
  workerTimeoutMs: number
  pageSize?: number
  logger: Logger
  now?: () => number
}

export interface QueryOptions {
  /** Caller deadline; each worker call gets the earlier of this and the worker timeout. */
  deadline?: grpc.Deadline
  /** Aborting stops waiting and returns what has arrived so far. */
  signal?: AbortSignal
}

type DispatchOutcome =
  | { target: DispatchTarget; status: 'ok'; response: QueryResponse }
  | { target: DispatchTarget; status: 'failed'; error: WorkerUnavailableError }
  | { target: DispatchTarget; status: 'cancelled' }

type FailedOutcome = Extract<DispatchOutcome, { status: 'failed' }>

const deadlineMs = (deadline: grpc.Deadline | undefined): number => {
  if (deadline == null) {
    return Number.POSITIVE_INFINITY
  }
  return deadline instanceof Date ? deadline.getTime() : deadline
}

const shardRank = (shard: string): number => {
  const index = SHARD_ORDER.findIndex((borough) => borough === shard)
  return index === -1 ? SHARD_ORDER.length : index
}

/**
 * Concatenates worker results and orders them by shard. The sort is stable,
 * so entries of one shard keep their scan order.
 */
const mergeResults = (outcomes: readonly DispatchOutcome[]): ResultEntry[] => {
  const results: ResultEntry[] = []
  for (const outcome of outcomes) {
    if (outcome.status === 'ok') {
      results.push(...outcome.response.results)
    }
  }
  return results.sort((a, b) => shardRank(a.shard) - shardRank(b.shard))
}

const countShards = (outcomes: readonly DispatchOutcome[]): number =>
  outcomes.reduce((total, outcome) => total + outcome.target.shards.length, 0)

const describeOutcomes = (outcomes: readonly DispatchOutcome[], resultCount: number): string => {
  const failed = outcomes.filter((outcome): outcome is FailedOutcome => outcome.status === 'failed')
  const pending = outcomes.filter((outcome) => outcome.status === 'cancelled')
  const answered = countShards(outcomes.filter((outcome) => outcome.status === 'ok'))
  const total = countShards(outcomes)

  if (failed.length === 0 && pending.length === 0) {
    return `${resultCount} result(s) from ${total} shard(s)`
  }

  const parts: string[] = []
  if (failed.length > 0) {
    const names = failed.map(
      (outcome) => `${outcome.target.shards.join(', ')} (${outcome.error.message})`
    )
    parts.push(`shard(s) unavailable: ${names.join('; ')}`)
  }
  if (pending.length > 0) {
    const names = pending.flatMap((outcome) => outcome.target.shards)
    parts.push(`query cancelled with shard(s) pending: ${names.join(', ')}`)
  }
  parts.push(`${resultCount} result(s) from ${answered} of ${total} shard(s)`)
  return parts.join('; ')
}

/**
 * Fans a query out to the workers owning the target shards and merges
 * their answers into one response.
 */
export class QueryEngine {
  public readonly id: string
  private readonly routing: RoutingTable
  private readonly gateway: WorkerGateway
  private readonly workerTimeoutMs: number
  private readonly pageSize: number
  private readonly logger: Logger
  private readonly now: () => number
  private readonly received = new MessageInbox()

  public constructor(options: QueryEngineOptions) {
    this.id = options.id
    this.routing = options.routing
    this.gateway = options.gateway
    this.workerTimeoutMs = options.workerTimeoutMs
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE
    this.logger = options.logger
    this.now = options.now ?? (() => performance.now())
  }

  /**
   * Validates the query, dispatches it to every target worker concurrently
   * and merges the answers in shard order. A worker that fails or times out
   * leaves its shards out of the result and marks the response unsuccessful.
   */
  public async query(request: QueryRequest, options: QueryOptions = {}): Promise<QueryResponse> {
    const timing = new TimingRecorder(this.id, this.now)

    try {
      compilePredicate(request.queryString, request.parameters)
    } catch (error) {
      if (!(error instanceof QueryError)) {
        throw error
      }
      this.logger.warn(`${request.queryId}: rejected: ${error.message}`)
      timing.mark('Total_Processing')
      return this.respond(request, false, error.message, [], timing.report())
    }

    const targets = this.routing.resolveTargets(request.queryString, request.parameters)
    const outcomes = await Promise.all(
      targets.map((target) => this.dispatch(target, request, options))
    )
    timing.mark('Downstream_Queries')

    const results = timing.measure('Merge', () => mergeResults(outcomes))
    timing.mark('Total_Processing')

    const workerTimings: TimingReport[] = []
    for (const outcome of outcomes) {
      if (outcome.status === 'ok') {
        workerTimings.push(outcome.response.timings)
      } else if (outcome.status === 'failed') {
        this.logger.warn(`${request.queryId}: ${outcome.error.message}`)
      }
    }

    const success = outcomes.every((outcome) => outcome.status === 'ok')
    return this.respond(
      request,
      success,
      describeOutcomes(outcomes, results.length),
      results,
      mergeTimingReports(...workerTimings, timing.report())
    )
  }

  /**
   * Runs the query pipeline and pages the merged result.
   */
  public async stream(request: QueryRequest, options: QueryOptions = {}): Promise<StreamChunk[]> {
    return paginateResponse(await this.query(request, options), this.pageSize)
  }

  /**
   * Delivers a DataMessage: kept locally when addressed to the coordinator,
   * forwarded when addressed to a known worker.
   * @throws DeliveryError with NOT_FOUND for an unknown destination, or
   * UNAVAILABLE when the worker cannot be reached.
   */
  public async send(message: DataMessage): Promise<void> {
    const destination = message.destination.trim().toUpperCase()
    if (destination === this.id) {
      this.received.accept(message)
      this.logger.info(
        `received ${message.messageId} from ${message.source} ` +
          `(${message.data.length} bytes): ${previewPayload(message.data)}`
      )
      return
    }

    if (this.routing.worker(destination) == null) {
      throw new DeliveryError(
        `unknown destination ${message.destination}`,
        grpc.status.NOT_FOUND
      )
    }

    try {
      await this.gateway.send(destination, message, {
        deadline: new Date(Date.now() + this.workerTimeoutMs),
        signal: AbortSignal.timeout(this.workerTimeoutMs),
      })
    } catch (error) {
      throw new DeliveryError(
        `worker ${destination} unreachable: ${errorMessage(error)}`,
        grpc.status.UNAVAILABLE
      )
    }
    this.logger.debug(`forwarded ${message.messageId} to worker ${destination}`)
  }

  /** Messages addressed to the coordinator, newest first. */
  public inbox(): readonly DataMessage[] {
    return this.received.list()
  }

  private dispatch(
    target: DispatchTarget,
    request: QueryRequest,
    options: QueryOptions
  ): Promise<DispatchOutcome> {
    const budgetMs = Math.max(
      0,
      Math.min(deadlineMs(options.deadline) - Date.now(), this.workerTimeoutMs)
    )
    const controller = new AbortController()
    const signal = options.signal

    return new Promise((resolve) => {
      let settled = false
      let timer: ReturnType<typeof setTimeout> | undefined

      const finish = (outcome: DispatchOutcome): void => {
        if (settled) {
          return
        }
        settled = true
        clearTimeout(timer)
        signal?.removeEventListener('abort', onAbort)
        if (outcome.status !== 'ok') {
          controller.abort()
        }
        resolve(outcome)
      }
      const unavailable = (reason: string): DispatchOutcome => ({
        target,
        status: 'failed',
        error: new WorkerUnavailableError(target.workerId, reason),
      })
      const onAbort = (): void => finish({ target, status: 'cancelled' })

      if (signal?.aborted) {
        onAbort()
        return
      }
      signal?.addEventListener('abort', onAbort, { once: true })
      timer = setTimeout(() => finish(unavailable(`no response within ${budgetMs}ms`)), budgetMs)

      const downstream: QueryRequest = { ...request, shards: [...target.shards] }
      void this.gateway
        .query(target.workerId, downstream, {
          deadline: new Date(Date.now() + budgetMs),
          signal: controller.signal,
        })
        .then(
          (response) =>
            finish(
              response.success
                ? { target, status: 'ok', response }
                : unavailable(response.message)
            ),
          (error: unknown) => finish(unavailable(errorMessage(error)))
        )
    })
  }

  private respond(
    request: QueryRequest,
    success: boolean,
    message: string,
    results: ResultEntry[],
    timings: TimingReport
  ): QueryResponse {
    return {
      queryId: request.queryId,
      success,
      message,
      results,
      timings,
      timingData: encodeTimingText(timings),
    }
  }
}
