import { WireFormatError } from '../../common/src/errors'
import type {
  CrashRecord,
  DataMessage,
  QueryRequest,
  QueryResponse,
  ResultEntry,
  StreamChunk,
  TimingReport,
  TypedValue,
} from './types'

/*
 * Plain objects in the shape @grpc/proto-loader serializes and deserializes
 * (camelCase fields, int64 as decimal strings, oneof name in `kind`).
 */

export interface WireTypedValue {
  kind?: string
  stringValue?: string
  intValue?: string
  doubleValue?: number
  boolValue?: boolean
}

export interface WireCrashRecord {
  crashDate: string
  crashTime: string
  borough: string
  zipCode: string
  hasCoordinates: boolean
  latitude: number
  longitude: number
  location: string
  onStreetName: string
  crossStreetName: string
  offStreetName: string
  personsInjured: number
  personsKilled: number
  pedestrians: number
}

export interface WireResultEntry {
  key: string
  value: WireTypedValue
  shard: string
  record?: WireCrashRecord
}

export interface WireProcessTiming {
  processId: string
  operations: { operation: string; seconds: number }[]
}

export interface WireQueryResponse {
  queryId: string
  success: boolean
  message: string
  results: WireResultEntry[]
  timingData: string
  timings: WireProcessTiming[]
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null
}

const requireObject = (value: unknown, what: string): Record<string, unknown> => {
  if (!isRecord(value)) {
    throw new WireFormatError(`${what} is not an object`)
  }
  return value
}

// proto3 omits default values unless `defaults` is set, so absent fields fall
// back to the proto3 zero value.
const readString = (source: Record<string, unknown>, field: string): string => {
  const value = source[field]
  if (value == null) {
    return ''
  }
  if (typeof value !== 'string') {
    throw new WireFormatError(`Field ${field} must be a string`)
  }
  return value
}

const readNumber = (source: Record<string, unknown>, field: string): number => {
  const value = source[field]
  if (value == null) {
    return 0
  }
  const parsed = typeof value === 'string' ? Number(value) : value
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    throw new WireFormatError(`Field ${field} must be a number`)
  }
  return parsed
}

const readBoolean = (source: Record<string, unknown>, field: string): boolean => {
  const value = source[field]
  if (value == null) {
    return false
  }
  if (typeof value !== 'boolean') {
    throw new WireFormatError(`Field ${field} must be a boolean`)
  }
  return value
}

const readArray = (source: Record<string, unknown>, field: string): unknown[] => {
  const value = source[field]
  if (value == null) {
    return []
  }
  if (!Array.isArray(value)) {
    throw new WireFormatError(`Field ${field} must be a list`)
  }
  return value
}

const readBytes = (source: Record<string, unknown>, field: string): Buffer => {
  const value = source[field]
  if (value == null) {
    return Buffer.alloc(0)
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value)
  }
  if (typeof value === 'string') {
    return Buffer.from(value, 'base64')
  }
  throw new WireFormatError(`Field ${field} must be bytes`)
}

export const toWireTypedValue = (typed: TypedValue): WireTypedValue => {
  switch (typed.kind) {
    case 'string':
      return { stringValue: typed.value }
    case 'int':
      return { intValue: typed.value.toString() }
    case 'double':
      return { doubleValue: typed.value }
    case 'bool':
      return { boolValue: typed.value }
  }
}

const VARIANTS = ['stringValue', 'intValue', 'doubleValue', 'boolValue'] as const

export const fromWireTypedValue = (value: unknown): TypedValue => {
  const source = requireObject(value, 'Typed value')
  const kind =
    typeof source.kind === 'string'
      ? source.kind
      : VARIANTS.find((variant) => source[variant] != null)

  switch (kind) {
    case 'stringValue':
      return { kind: 'string', value: readString(source, 'stringValue') }
    case 'intValue': {
      const parsed = readNumber(source, 'intValue')
      if (!Number.isSafeInteger(parsed)) {
        throw new WireFormatError(`Integer value out of range: ${String(source.intValue)}`)
      }
      return { kind: 'int', value: parsed }
    }
    case 'doubleValue':
      return { kind: 'double', value: readNumber(source, 'doubleValue') }
    case 'boolValue':
      return { kind: 'bool', value: readBoolean(source, 'boolValue') }
    default:
      throw new WireFormatError('Typed value has no populated variant')
  }
}

export const toWireCrashRecord = (record: CrashRecord): WireCrashRecord => {
  const hasCoordinates = record.latitude !== null && record.longitude !== null
  return {
    crashDate: record.crashDate,
    crashTime: record.crashTime,
    borough: record.borough,
    zipCode: record.zipCode,
    hasCoordinates,
    latitude: record.latitude ?? 0,
    longitude: record.longitude ?? 0,
    location: record.location,
    onStreetName: record.onStreetName,
    crossStreetName: record.crossStreetName,
    offStreetName: record.offStreetName,
    personsInjured: record.personsInjured,
    personsKilled: record.personsKilled,
    pedestrians: record.pedestrians,
  }
}

export const fromWireCrashRecord = (value: unknown): CrashRecord => {
  const source = requireObject(value, 'Crash record')
  const hasCoordinates = readBoolean(source, 'hasCoordinates')
  return {
    crashDate: readString(source, 'crashDate'),
    crashTime: readString(source, 'crashTime'),
    borough: readString(source, 'borough'),
    zipCode: readString(source, 'zipCode'),
    latitude: hasCoordinates ? readNumber(source, 'latitude') : null,
    longitude: hasCoordinates ? readNumber(source, 'longitude') : null,
    location: readString(source, 'location'),
    onStreetName: readString(source, 'onStreetName'),
    crossStreetName: readString(source, 'crossStreetName'),
    offStreetName: readString(source, 'offStreetName'),
    personsInjured: readNumber(source, 'personsInjured'),
    personsKilled: readNumber(source, 'personsKilled'),
    pedestrians: readNumber(source, 'pedestrians'),
  }
}

export const toWireResultEntry = (entry: ResultEntry): WireResultEntry => {
  const wire: WireResultEntry = {
    key: entry.key,
    value: toWireTypedValue(entry.value),
    shard: entry.shard,
  }
  if (entry.record) {
    wire.record = toWireCrashRecord(entry.record)
  }
  return wire
}

export const fromWireResultEntry = (value: unknown): ResultEntry => {
  const source = requireObject(value, 'Result entry')
  const entry: ResultEntry = {
    key: readString(source, 'key'),
    value: fromWireTypedValue(source.value),
    shard: readString(source, 'shard'),
  }
  if (source.record != null) {
    entry.record = fromWireCrashRecord(source.record)
  }
  return entry
}

export const toWireTimings = (report: TimingReport): WireProcessTiming[] =>
  Object.entries(report).map(([processId, operations]) => ({
    processId,
    operations: Object.entries(operations).map(([operation, seconds]) => ({ operation, seconds })),
  }))

export const fromWireTimings = (value: unknown): TimingReport => {
  const report: TimingReport = {}
  const list = Array.isArray(value) ? value : value == null ? [] : null
  if (list == null) {
    throw new WireFormatError('Timings must be a list')
  }
  for (const item of list) {
    const processTiming = requireObject(item, 'Process timing')
    const operations = (report[readString(processTiming, 'processId')] ??= {})
    for (const op of readArray(processTiming, 'operations')) {
      const operation = requireObject(op, 'Operation timing')
      operations[readString(operation, 'operation')] = readNumber(operation, 'seconds')
    }
  }
  return report
}

export const toWireQueryRequest = (request: QueryRequest): QueryRequest => ({
  queryId: request.queryId,
  queryString: request.queryString,
  parameters: [...request.parameters],
  shards: [...request.shards],
})

export const fromWireQueryRequest = (value: unknown): QueryRequest => {
  const source = requireObject(value, 'Query request')
  const asStrings = (field: string): string[] =>
    readArray(source, field).map((item) => {
      if (typeof item !== 'string') {
        throw new WireFormatError(`Field ${field} must contain strings`)
      }
      return item
    })

  return {
    queryId: readString(source, 'queryId'),
    queryString: readString(source, 'queryString'),
    parameters: asStrings('parameters'),
    shards: asStrings('shards'),
  }
}

export const toWireQueryResponse = (response: QueryResponse): WireQueryResponse => ({
  queryId: response.queryId,
  success: response.success,
  message: response.message,
  results: response.results.map(toWireResultEntry),
  timingData: response.timingData,
  timings: toWireTimings(response.timings),
})

export const fromWireQueryResponse = (value: unknown): QueryResponse => {
  const source = requireObject(value, 'Query response')
  return {
    queryId: readString(source, 'queryId'),
    success: readBoolean(source, 'success'),
    message: readString(source, 'message'),
    results: readArray(source, 'results').map(fromWireResultEntry),
    timings: fromWireTimings(source.timings),
    timingData: readString(source, 'timingData'),
  }
}

export const fromWireDataMessage = (value: unknown): DataMessage => {
  const source = requireObject(value, 'Data message')
  return {
    messageId: readString(source, 'messageId'),
    source: readString(source, 'source'),
    destination: readString(source, 'destination'),
    data: readBytes(source, 'data'),
  }
}

export const fromWireStreamChunk = (value: unknown): StreamChunk => {
  const source = requireObject(value, 'Stream chunk')
  return {
    chunkId: readString(source, 'chunkId'),
    data: readBytes(source, 'data'),
    isLast: readBoolean(source, 'isLast'),
  }
}

export { requireObject, readString, readNumber, readBoolean, readArray }
