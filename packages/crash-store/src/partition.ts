import fs from 'node:fs'
import path from 'node:path'
import { IngestionError } from '../../common/src/errors'
import { SHARD_ORDER } from '../../proto/src/types'
import type { Borough } from '../../proto/src/types'
import { cellOf, readCrashTable } from './crash-table'
import { formatCsv } from './csv'
import { CRASH_COLUMNS, classifyBorough, shardFileName } from './record'

export interface PartitionOptions {
  inputFile: string
  outputDir: string
}

export interface PartitionResult {
  /** Rows written per shard. */
  counts: Record<Borough, number>
  /** Shard file path per shard. */
  files: Record<Borough, string>
}

const emptyByBorough = <T>(create: (borough: Borough) => T): Record<Borough, T> => ({
  BROOKLYN: create('BROOKLYN'),
  QUEENS: create('QUEENS'),
  BRONX: create('BRONX'),
  'STATEN ISLAND': create('STATEN ISLAND'),
  OTHER: create('OTHER'),
})

/**
 * Splits a raw crash CSV into one shard file per borough, each with the
 * fixed column set. Every shard file is written, header only when no row
 * classifies to it.
 * @throws IngestionError when the input is unreadable or malformed, or the
 * output directory cannot be written.
 */
export const partitionCrashFile = (options: PartitionOptions): PartitionResult => {
  const table = readCrashTable(options.inputFile)
  const rows = emptyByBorough<string[][]>(() => [[...CRASH_COLUMNS]])

  for (const row of table.rows) {
    const borough = classifyBorough(cellOf(table, row, 'BOROUGH'))
    rows[borough].push(CRASH_COLUMNS.map((column) => cellOf(table, row, column)))
  }

  const files = emptyByBorough((borough) => path.join(options.outputDir, shardFileName(borough)))
  try {
    fs.mkdirSync(options.outputDir, { recursive: true })
    for (const borough of SHARD_ORDER) {
      fs.writeFileSync(files[borough], formatCsv(rows[borough]), 'utf8')
    }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new IngestionError(`cannot write shard files (${reason})`, options.outputDir)
  }

  return {
    counts: emptyByBorough((borough) => rows[borough].length - 1),
    files,
  }
}
