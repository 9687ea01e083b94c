/**
 * Boroughs a crash record can classify to. `OTHER` collects blank and
 * unmatched borough values.
 */
export type Borough = 'BROOKLYN' | 'QUEENS' | 'BRONX' | 'STATEN ISLAND' | 'OTHER'

/**
 * Shard order used when merging results: results are always emitted in this
 * borough order regardless of which worker replies first.
 */
export const SHARD_ORDER: readonly Borough[] = [
  'BROOKLYN',
  'QUEENS',
  'BRONX',
  'STATEN ISLAND',
  'OTHER',
]

/**
 * A single crash incident as loaded from a shard file.
 */
export interface CrashRecord {
  crashDate: string
  crashTime: string
  /** Raw borough value from the source file (may be blank). */
  borough: string
  zipCode: string
  latitude: number | null
  longitude: number | null
  location: string
  onStreetName: string
  crossStreetName: string
  offStreetName: string
  personsInjured: number
  personsKilled: number
  pedestrians: number
}

/**
 * Exactly one of four scalar kinds.
 */
export type TypedValue =
  | { kind: 'string'; value: string }
  | { kind: 'int'; value: number }
  | { kind: 'double'; value: number }
  | { kind: 'bool'; value: boolean }

export interface ResultEntry {
  key: string
  value: TypedValue
  /** Shard the entry was read from; empty for synthetic entries. */
  shard: string
  record?: CrashRecord
}

/**
 * Process id -> operation name -> elapsed seconds.
 */
export type TimingReport = Record<string, Record<string, number>>

export interface QueryRequest {
  queryId: string
  queryString: string
  parameters: string[]
  /** Shards a worker should scan; empty means all shards it owns. */
  shards: string[]
}

export interface QueryResponse {
  queryId: string
  success: boolean
  message: string
  results: ResultEntry[]
  timings: TimingReport
  /** Legacy text rendering of `timings`. */
  timingData: string
}

export interface DataMessage {
  messageId: string
  source: string
  destination: string
  data: Buffer
}

export interface StreamChunk {
  chunkId: string
  data: Buffer
  isLast: boolean
}

/**
 * Closing summary carried by the last page of a streamed result.
 */
export interface StreamSummary {
  success: boolean
  message: string
  timings: TimingReport
}

/**
 * JSON document carried in `StreamChunk.data`.
 */
export interface StreamPage {
  queryId: string
  page: number
  results: ResultEntry[]
  summary?: StreamSummary
}
