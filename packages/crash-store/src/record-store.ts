import { IngestionError } from '../../common/src/errors'
import type { Borough, CrashRecord } from '../../proto/src/types'
import { cellOf, readCrashTable } from './crash-table'
import type { CrashTable } from './crash-table'
import type { CsvRow } from './csv'
import type { Predicate } from './predicate'
import { classifyBorough } from './record'

const COUNT = /^\d+$/

export interface ScanResult {
  records: CrashRecord[]
  /** Zero-based file row of each matching record. */
  rows: number[]
  elapsedSeconds: number
}

type CountColumn = 'NUMBER_OF_PERSONS_INJURED' | 'NUMBER_OF_PERSONS_KILLED' | 'NUMBER_OF_PEDESTRIANS'

const parseCount = (table: CrashTable, row: CsvRow, column: CountColumn): number => {
  const value = cellOf(table, row, column)
  if (value === '') {
    return 0
  }
  if (!COUNT.test(value)) {
    throw new IngestionError(
      `${column} must be a non-negative integer, got "${value}"`,
      table.path,
      row.line
    )
  }
  return Number.parseInt(value, 10)
}

const parseCoordinate = (
  table: CrashTable,
  row: CsvRow,
  column: 'LATITUDE' | 'LONGITUDE'
): number | null => {
  const value = cellOf(table, row, column)
  if (value === '') {
    return null
  }
  const parsed = Number(value)
  if (!Number.isFinite(parsed)) {
    throw new IngestionError(`${column} must be a number, got "${value}"`, table.path, row.line)
  }
  return parsed
}

const toCrashRecord = (table: CrashTable, row: CsvRow): CrashRecord => {
  const latitude = parseCoordinate(table, row, 'LATITUDE')
  const longitude = parseCoordinate(table, row, 'LONGITUDE')
  const located = latitude != null && longitude != null
  return {
    crashDate: cellOf(table, row, 'CRASH_DATE'),
    crashTime: cellOf(table, row, 'CRASH_TIME'),
    borough: cellOf(table, row, 'BOROUGH'),
    zipCode: cellOf(table, row, 'ZIP_CODE'),
    latitude: located ? latitude : null,
    longitude: located ? longitude : null,
    location: cellOf(table, row, 'LOCATION'),
    onStreetName: cellOf(table, row, 'ON_STREET_NAME'),
    crossStreetName: cellOf(table, row, 'CROSS_STREET_NAME'),
    offStreetName: cellOf(table, row, 'OFF_STREET_NAME'),
    personsInjured: parseCount(table, row, 'NUMBER_OF_PERSONS_INJURED'),
    personsKilled: parseCount(table, row, 'NUMBER_OF_PERSONS_KILLED'),
    pedestrians: parseCount(table, row, 'NUMBER_OF_PEDESTRIANS'),
  }
}

/**
 * The records of one shard, held in memory in file order.
 *
 * Scans are full linear passes; there is no secondary index. The store is
 * never mutated after `load`, so concurrent scans need no locking.
 */
export class RecordStore {
  private constructor(
    public readonly borough: Borough,
    public readonly path: string,
    private readonly records: readonly CrashRecord[],
    private readonly now: () => number
  ) {}

  /**
   * Loads a shard file.
   * @throws IngestionError when the file is unreadable or malformed, or when
   * a row's borough does not classify to `borough`.
   */
  public static load(
    path: string,
    borough: Borough,
    now: () => number = () => performance.now()
  ): RecordStore {
    const table = readCrashTable(path)
    return RecordStore.fromTable(table, borough, now)
  }

  public static fromTable(
    table: CrashTable,
    borough: Borough,
    now: () => number = () => performance.now()
  ): RecordStore {
    const records = table.rows.map((row) => {
      const record = toCrashRecord(table, row)
      const classified = classifyBorough(record.borough)
      if (classified !== borough) {
        throw new IngestionError(
          `row borough "${record.borough}" classifies to ${classified}, not ${borough}`,
          table.path,
          row.line
        )
      }
      return Object.freeze(record)
    })
    return new RecordStore(borough, table.path, records, now)
  }

  public get size(): number {
    return this.records.length
  }

  /**
   * Returns matching records in file order with the scan duration.
   */
  public scan(predicate: Predicate): ScanResult {
    const startedAt = this.now()
    const records: CrashRecord[] = []
    const rows: number[] = []
    this.records.forEach((record, row) => {
      if (predicate(record)) {
        records.push(record)
        rows.push(row)
      }
    })
    return { records, rows, elapsedSeconds: (this.now() - startedAt) / 1000 }
  }
}
