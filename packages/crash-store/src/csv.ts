/**
 * A parsed CSV row and the 1-based line it starts on.
 */
export interface CsvRow {
  line: number
  cells: string[]
}

/**
 * Thrown for an unterminated quoted cell; carries the line the cell
 * started on.
 */
export class CsvSyntaxError extends Error {
  public constructor(
    message: string,
    public readonly line: number
  ) {
    super(message)
    this.name = 'CsvSyntaxError'
  }
}

/**
 * Parses comma-separated text with double-quoted cells (`""` escapes a
 * quote, quoted cells may span lines). A leading BOM is dropped and blank
 * lines are skipped.
 */
export const parseCsv = (text: string): CsvRow[] => {
  const source = text.startsWith('\ufeff') ? text.slice(1) : text
  const rows: CsvRow[] = []
  let cells: string[] = []
  let cell = ''
  let quoted = false
  let line = 1
  let rowLine = 1
  let quoteLine = 1

  const endRow = (): void => {
    cells.push(cell)
    if (cells.length > 1 || cells[0] !== '') {
      rows.push({ line: rowLine, cells })
    }
    cells = []
    cell = ''
  }

  for (let i = 0; i < source.length; i += 1) {
    const char = source[i]

    if (quoted) {
      if (char === '"') {
        if (source[i + 1] === '"') {
          cell += '"'
          i += 1
        } else {
          quoted = false
        }
      } else {
        if (char === '\n') {
          line += 1
        }
        cell += char
      }
      continue
    }

    switch (char) {
      case '"':
        quoted = true
        quoteLine = line
        break
      case ',':
        cells.push(cell)
        cell = ''
        break
      case '\r':
        break
      case '\n':
        endRow()
        line += 1
        rowLine = line
        break
      default:
        cell += char
    }
  }

  if (quoted) {
    throw new CsvSyntaxError('unterminated quoted cell', quoteLine)
  }
  if (cell !== '' || cells.length > 0) {
    endRow()
  }

  return rows
}

export const escapeCell = (value: string): string => {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

/**
 * Renders rows as CSV text with `\n` line endings and a trailing newline.
 */
export const formatCsv = (rows: readonly (readonly string[])[]): string =>
  rows.map((row) => `${row.map(escapeCell).join(',')}\n`).join('')
