import * as grpc from '@grpc/grpc-js'
import { DeliveryError, QueryError } from '../../../packages/common/src/errors'
import type { Logger } from '../../../packages/common/src/logger'
import { compilePredicate } from '../../../packages/crash-store/src/predicate'
import type { Predicate } from '../../../packages/crash-store/src/predicate'
import { shardSlug } from '../../../packages/crash-store/src/record'
import type { RecordStore } from '../../../packages/crash-store/src/record-store'
import { MessageInbox, previewPayload } from '../../../packages/proto/src/inbox'
import { TimingRecorder, encodeTimingText } from '../../../packages/proto/src/timing'
import { describeCrash, stringValue } from '../../../packages/proto/src/typed-value'
import { SHARD_ORDER } from '../../../packages/proto/src/types'
import type {
  DataMessage,
  QueryRequest,
  QueryResponse,
  ResultEntry,
} from '../../../packages/proto/src/types'

export interface ShardWorkerOptions {
  id: string
  stores: RecordStore[]
  logger: Logger
  now?: () => number
}

const shardRank = (store: RecordStore): number => SHARD_ORDER.indexOf(store.borough)

/**
 * Executes queries against the shards one worker process owns.
 */
export class ShardWorker {
  public readonly id: string
  private readonly stores: RecordStore[]
  private readonly logger: Logger
  private readonly now: () => number
  private readonly received = new MessageInbox()

  public constructor(options: ShardWorkerOptions) {
    this.id = options.id
    this.stores = [...options.stores].sort((a, b) => shardRank(a) - shardRank(b))
    this.logger = options.logger
    this.now = options.now ?? (() => performance.now())
  }

  public get shards(): string[] {
    return this.stores.map((store) => store.borough)
  }

  /**
   * Scans the requested shards, or every owned shard when the request names
   * none. Shards this worker does not own are skipped.
   */
  public execute(request: QueryRequest): QueryResponse {
    const timing = new TimingRecorder(this.id, this.now)

    let predicate: Predicate
    try {
      predicate = compilePredicate(request.queryString, request.parameters)
    } catch (error) {
      if (!(error instanceof QueryError)) {
        throw error
      }
      timing.mark('Total_Processing')
      return this.respond(request, false, error.message, [], timing)
    }

    const wanted = new Set(request.shards.map((shard) => shard.trim().toUpperCase()))
    const targets = this.stores.filter((store) => wanted.size === 0 || wanted.has(store.borough))

    const results: ResultEntry[] = []
    let scanSeconds = 0
    for (const store of targets) {
      const scan = store.scan(predicate)
      scanSeconds += scan.elapsedSeconds
      scan.records.forEach((record, index) => {
        results.push({
          key: `${shardSlug(store.borough)}-${scan.rows[index]}`,
          value: stringValue(describeCrash(record)),
          shard: store.borough,
          record,
        })
      })
    }
    timing.record('Scan', scanSeconds)
    timing.mark('Total_Processing')

    const scanned = targets.map((store) => store.borough).join(', ') || 'no owned shard'
    this.logger.debug(`${request.queryId}: ${results.length} match(es) in ${scanned}`)
    return this.respond(request, true, `${results.length} result(s) from ${scanned}`, results, timing)
  }

  /**
   * Accepts a DataMessage addressed to this worker.
   * @throws DeliveryError with FAILED_PRECONDITION for another destination.
   */
  public receive(message: DataMessage): void {
    if (message.destination.trim().toUpperCase() !== this.id) {
      throw new DeliveryError(
        `process ${this.id} cannot accept a message for ${message.destination}`,
        grpc.status.FAILED_PRECONDITION
      )
    }

    this.received.accept(message)
    this.logger.info(
      `received ${message.messageId} from ${message.source} ` +
        `(${message.data.length} bytes): ${previewPayload(message.data)}`
    )
  }

  /** Received messages, newest first. */
  public inbox(): readonly DataMessage[] {
    return this.received.list()
  }

  private respond(
    request: QueryRequest,
    success: boolean,
    message: string,
    results: ResultEntry[],
    timing: TimingRecorder
  ): QueryResponse {
    const timings = timing.report()
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
