import fs from 'node:fs'
import { IngestionError } from '../../common/src/errors'
import { CRASH_COLUMNS, REQUIRED_COLUMNS, normalizeColumnName } from './record'
import type { CrashColumn } from './record'
import { CsvSyntaxError, parseCsv } from './csv'
import type { CsvRow } from './csv'

/**
 * A crash CSV with its header resolved to known columns.
 */
export interface CrashTable {
  path: string
  columns: ReadonlyMap<CrashColumn, number>
  rows: CsvRow[]
}

const isCrashColumn = (name: string): name is CrashColumn =>
  CRASH_COLUMNS.some((column) => column === name)

/**
 * Parses crash CSV text. Unknown header columns are ignored.
 * @throws IngestionError for a missing header, a missing required column or
 * a row whose cell count differs from the header's.
 */
export const parseCrashTable = (text: string, path: string): CrashTable => {
  let parsed: CsvRow[]
  try {
    parsed = parseCsv(text)
  } catch (error) {
    if (error instanceof CsvSyntaxError) {
      throw new IngestionError(error.message, path, error.line)
    }
    throw error
  }

  const [header, ...rows] = parsed
  if (header == null) {
    throw new IngestionError('missing header row', path)
  }

  const columns = new Map<CrashColumn, number>()
  header.cells.forEach((cell, index) => {
    const name = normalizeColumnName(cell)
    if (isCrashColumn(name) && !columns.has(name)) {
      columns.set(name, index)
    }
  })

  const missing = REQUIRED_COLUMNS.filter((column) => !columns.has(column))
  if (missing.length > 0) {
    throw new IngestionError(`missing column(s) ${missing.join(', ')}`, path, header.line)
  }

  for (const row of rows) {
    if (row.cells.length !== header.cells.length) {
      throw new IngestionError(
        `expected ${header.cells.length} cells, found ${row.cells.length}`,
        path,
        row.line
      )
    }
  }

  return { path, columns, rows }
}

/**
 * @throws IngestionError when the file cannot be read.
 */
export const readCrashTable = (path: string): CrashTable => {
  let text: string
  try {
    text = fs.readFileSync(path, 'utf8')
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new IngestionError(`cannot read file (${reason})`, path)
  }
  return parseCrashTable(text, path)
}

/**
 * Trimmed cell value, or '' when the table has no such column.
 */
export const cellOf = (table: CrashTable, row: CsvRow, column: CrashColumn): string => {
  const index = table.columns.get(column)
  return index == null ? '' : (row.cells[index] ?? '').trim()
}
