import type { TimingReport } from './types'

const OPERATION_COLUMN_WIDTH = 20
const PROCESS_MARKER = /^\s*\[Process\s+([A-Z])\]\s*$/
const OPERATION_LINE = /^\s*([A-Za-z_]+)\s*:\s*([0-9.]+)\s*seconds/

/**
 * Collects per-operation timings for one request inside one process.
 * Built fresh per request and discarded with the response.
 */
export class TimingRecorder {
  private readonly startedAt: number
  private readonly operations: Record<string, number> = {}

  public constructor(
    public readonly processId: string,
    private readonly now: () => number = () => performance.now()
  ) {
    this.startedAt = now()
  }

  /**
   * Records the seconds elapsed since the recorder was created.
   */
  public mark(operation: string): number {
    const seconds = (this.now() - this.startedAt) / 1000
    this.operations[operation] = seconds
    return seconds
  }

  /**
   * Records an externally measured duration.
   */
  public record(operation: string, seconds: number): void {
    this.operations[operation] = seconds
  }

  /**
   * Runs `fn` and records its duration under `operation`.
   */
  public measure<T>(operation: string, fn: () => T): T {
    const start = this.now()
    const result = fn()
    this.operations[operation] = (this.now() - start) / 1000
    return result
  }

  public report(): TimingReport {
    return { [this.processId]: { ...this.operations } }
  }
}

/**
 * Merges timing reports keyed by process id. Durations reported twice for
 * the same process and operation are added up.
 */
export const mergeTimingReports = (...reports: TimingReport[]): TimingReport => {
  const merged: TimingReport = {}
  for (const report of reports) {
    for (const [processId, operations] of Object.entries(report)) {
      const target = (merged[processId] ??= {})
      for (const [operation, seconds] of Object.entries(operations)) {
        target[operation] = (target[operation] ?? 0) + seconds
      }
    }
  }
  return merged
}

/**
 * Renders the legacy `[Process X]` text block. Processes are emitted in id
 * order, operations in recording order.
 */
export const encodeTimingText = (report: TimingReport): string => {
  const lines: string[] = []
  for (const processId of Object.keys(report).sort()) {
    lines.push(`  [Process ${processId}]\n`)
    for (const [operation, seconds] of Object.entries(report[processId])) {
      lines.push(`    ${operation.padEnd(OPERATION_COLUMN_WIDTH)}: ${seconds.toFixed(6)} seconds\n`)
    }
  }
  return lines.join('')
}

/**
 * Parses the legacy text block back into a timing report. Lines that match
 * neither a process marker nor an operation line are ignored, as are
 * operation lines that appear before the first marker.
 */
export const decodeTimingText = (text: string): TimingReport => {
  const report: TimingReport = {}
  let current: Record<string, number> | null = null

  for (const line of text.split('\n')) {
    const marker = PROCESS_MARKER.exec(line)
    if (marker) {
      current = report[marker[1]] ??= {}
      continue
    }

    const operation = OPERATION_LINE.exec(line)
    if (operation && current) {
      const seconds = Number.parseFloat(operation[2])
      if (Number.isFinite(seconds)) {
        current[operation[1]] = seconds
      }
    }
  }

  return report
}

/**
 * Reads one duration out of a report, or null when it was not recorded.
 */
export const timingOf = (
  report: TimingReport,
  processId: string,
  operation: string
): number | null => report[processId]?.[operation] ?? null
