import { timingOf } from '../../../packages/proto/src/timing'
import { formatTypedValue } from '../../../packages/proto/src/typed-value'
import type { QueryResponse, ResultEntry, TimingReport } from '../../../packages/proto/src/types'

export const COORDINATOR_ID = 'A'

export interface ClientReport {
  response: QueryResponse
  /** Client-side round trip. */
  elapsedSeconds: number
  limit: number
}

/**
 * Round trip minus the coordinator's own processing time, or null when the
 * response carries no coordinator timing.
 */
export const networkOverheadSeconds = (
  response: QueryResponse,
  elapsedSeconds: number
): number | null => {
  const processing = timingOf(response.timings, COORDINATOR_ID, 'Total_Processing')
  return processing == null ? null : Math.max(0, elapsedSeconds - processing)
}

const streetOf = (entry: ResultEntry): string => {
  const record = entry.record
  if (record == null) {
    return ''
  }
  return record.onStreetName || record.crossStreetName || record.offStreetName
}

const crashJson = (entry: ResultEntry): Record<string, unknown> => {
  if (entry.record == null) {
    return { key: entry.key, shard: entry.shard, value: formatTypedValue(entry.value) }
  }
  return { key: entry.key, shard: entry.shard, ...entry.record }
}

export const formatJson = (report: ClientReport): string => {
  const { response } = report
  return JSON.stringify(
    {
      queryId: response.queryId,
      success: response.success,
      message: response.message,
      elapsedSeconds: report.elapsedSeconds,
      networkOverheadSeconds: networkOverheadSeconds(response, report.elapsedSeconds),
      count: response.results.length,
      crashes: response.results.slice(0, report.limit).map(crashJson),
      timings: response.timings,
    },
    null,
    2
  )
}

const renderTable = (header: string[], rows: string[][]): string[] => {
  const widths = header.map((cell, column) =>
    Math.max(cell.length, ...rows.map((row) => row[column].length))
  )
  return [header, ...rows].map((row) =>
    row
      .map((cell, column) => cell.padEnd(widths[column]))
      .join('  ')
      .trimEnd()
  )
}

const crashRow = (entry: ResultEntry): string[] => {
  const record = entry.record
  if (record == null) {
    return [entry.key, '-', '-', entry.shard, formatTypedValue(entry.value), '-', '-']
  }
  return [
    entry.key,
    record.crashDate,
    record.crashTime,
    record.borough || '-',
    streetOf(entry) || '-',
    String(record.personsInjured),
    String(record.personsKilled),
  ]
}

const timingRows = (timings: TimingReport): string[][] =>
  Object.keys(timings)
    .sort()
    .flatMap((processId) =>
      Object.entries(timings[processId]).map(([operation, seconds]) => [
        processId,
        operation,
        seconds.toFixed(6),
      ])
    )

export const formatTable = (report: ClientReport): string => {
  const { response, elapsedSeconds, limit } = report
  const overhead = networkOverheadSeconds(response, elapsedSeconds)
  const count = response.results.length

  const lines = [
    `${response.success ? 'OK' : 'FAILED'}: ${response.message}`,
    `query ${response.queryId}: ${count} result(s) in ${elapsedSeconds.toFixed(3)}s` +
      (overhead == null ? '' : ` (network overhead ${overhead.toFixed(3)}s)`),
  ]

  if (count > 0) {
    lines.push(
      '',
      ...renderTable(
        ['KEY', 'DATE', 'TIME', 'BOROUGH', 'STREET', 'INJURED', 'KILLED'],
        response.results.slice(0, limit).map(crashRow)
      )
    )
    if (count > limit) {
      lines.push(`... ${count - limit} more`)
    }
  }

  const timing = timingRows(response.timings)
  if (timing.length > 0) {
    lines.push('', ...renderTable(['PROCESS', 'OPERATION', 'SECONDS'], timing))
  }
  return lines.join('\n')
}
