import { describe, expect, it } from 'vitest'
import {
  TimingRecorder,
  decodeTimingText,
  encodeTimingText,
  mergeTimingReports,
  timingOf,
} from './timing'

describe('TimingRecorder', () => {
  it('marks seconds since creation under its process id', () => {
    const ticks = [100, 350, 600, 1100]
    const recorder = new TimingRecorder('B', () => ticks.shift() ?? 0)

    recorder.mark('Scan')
    const value = recorder.measure('Filter', () => 42)
    recorder.record('Extra', 0.5)

    expect(value).toBe(42)
    expect(recorder.report()).toEqual({ B: { Scan: 0.25, Filter: 0.5, Extra: 0.5 } })
  })
})

describe('mergeTimingReports', () => {
  it('keeps processes apart and adds up repeated operations', () => {
    const merged = mergeTimingReports(
      { B: { Scan: 0.1 } },
      { C: { Scan: 0.2 } },
      { B: { Scan: 0.3, Total_Processing: 0.5 } }
    )

    expect(merged.C).toEqual({ Scan: 0.2 })
    expect(merged.B.Scan).toBeCloseTo(0.4)
    expect(merged.B.Total_Processing).toBe(0.5)
  })
})

describe('timing text', () => {
  it('renders the legacy block in process order', () => {
    const text = encodeTimingText({
      C: { Scan: 0.0025 },
      A: { Downstream_Queries: 0.5, Total_Processing: 1.25 },
    })

    expect(text).toBe(
      '  [Process A]\n' +
        '    Downstream_Queries  : 0.500000 seconds\n' +
        '    Total_Processing    : 1.250000 seconds\n' +
        '  [Process C]\n' +
        '    Scan                : 0.002500 seconds\n'
    )
  })

  it('parses what it renders', () => {
    const report = { A: { Merge: 0.000125 }, E: { Scan: 0.75, Total_Processing: 0.8 } }
    expect(decodeTimingText(encodeTimingText(report))).toEqual(report)
  })

  it('ignores unknown lines and operations before the first marker', () => {
    const report = decodeTimingText(
      [
        'Scan: 9.0 seconds',
        'Timing report',
        '[Process B]',
        'Scan: 0.5 seconds',
        '  garbage',
        '    Total_Processing:1.5 seconds',
        '[Process D]',
      ].join('\n')
    )

    expect(report).toEqual({ B: { Scan: 0.5, Total_Processing: 1.5 }, D: {} })
  })

  it('reads single durations', () => {
    const report = { A: { Merge: 0.25 } }
    expect(timingOf(report, 'A', 'Merge')).toBe(0.25)
    expect(timingOf(report, 'A', 'Scan')).toBeNull()
    expect(timingOf(report, 'B', 'Merge')).toBeNull()
  })
})
