import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { IngestionError } from '../../common/src/errors'
import { compilePredicate } from './predicate'
import { RecordStore } from './record-store'

const HEADER =
  'CRASH_DATE,CRASH_TIME,BOROUGH,ZIP_CODE,LATITUDE,LONGITUDE,LOCATION,ON_STREET_NAME,' +
  'CROSS_STREET_NAME,OFF_STREET_NAME,NUMBER_OF_PERSONS_INJURED,NUMBER_OF_PERSONS_KILLED,' +
  'NUMBER_OF_PEDESTRIANS'

describe('RecordStore', () => {
  let dir: string

  const writeShard = (name: string, ...rows: string[]): string => {
    const file = path.join(dir, name)
    fs.writeFileSync(file, [HEADER, ...rows].join('\n') + '\n')
    return file
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'crash-store-'))
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('loads records in file order', () => {
    const file = writeShard(
      'bronx_crashes.csv',
      '04/22/2023,23:05,BRONX,10451,40.82,-73.923,"(40.82, -73.923)",GRAND CONCOURSE,,,3,1,1',
      '04/23/2023,7:15,bronx,10452,,,,,,100 EAST 170 STREET,0,0,'
    )

    const store = RecordStore.load(file, 'BRONX')

    expect(store.size).toBe(2)
    expect(store.borough).toBe('BRONX')
    expect(store.path).toBe(file)
    const { records } = store.scan(compilePredicate('get_all', []))
    expect(records).toEqual([
      {
        crashDate: '04/22/2023',
        crashTime: '23:05',
        borough: 'BRONX',
        zipCode: '10451',
        latitude: 40.82,
        longitude: -73.923,
        location: '(40.82, -73.923)',
        onStreetName: 'GRAND CONCOURSE',
        crossStreetName: '',
        offStreetName: '',
        personsInjured: 3,
        personsKilled: 1,
        pedestrians: 1,
      },
      {
        crashDate: '04/23/2023',
        crashTime: '7:15',
        borough: 'bronx',
        zipCode: '10452',
        latitude: null,
        longitude: null,
        location: '',
        onStreetName: '',
        crossStreetName: '',
        offStreetName: '100 EAST 170 STREET',
        personsInjured: 0,
        personsKilled: 0,
        pedestrians: 0,
      },
    ])
  })

  it('times each scan with the injected clock', () => {
    const file = writeShard('queens_crashes.csv', '03/03/2023,12:10,QUEENS,,,,,,,,1,0,0')
    const ticks = [1000, 1250]
    const store = RecordStore.load(file, 'QUEENS', () => ticks.shift() ?? 0)

    const result = store.scan(compilePredicate('get_crashes_with_injuries', ['2']))

    expect(result.records).toEqual([])
    expect(result.rows).toEqual([])
    expect(result.elapsedSeconds).toBeCloseTo(0.25)
  })

  it('drops a coordinate pair with one half missing', () => {
    const file = writeShard('other_crashes.csv', '06/18/2023,8:30,,,40.7,,,,,,0,0,0')
    const [record] = RecordStore.load(file, 'OTHER').scan(() => true).records
    expect(record.latitude).toBeNull()
    expect(record.longitude).toBeNull()
  })

  it('rejects a row from another borough', () => {
    const file = writeShard('brooklyn_crashes.csv', '01/05/2023,8:30,QUEENS,,,,,,,,0,0,0')
    expect(() => RecordStore.load(file, 'BROOKLYN')).toThrowError(
      `${file}:2: row borough "QUEENS" classifies to QUEENS, not BROOKLYN`
    )
  })

  it('rejects malformed files', () => {
    const badCount = writeShard('bad-count.csv', '01/05/2023,8:30,BROOKLYN,,,,,,,,two,0,0')
    expect(() => RecordStore.load(badCount, 'BROOKLYN')).toThrowError(IngestionError)

    const shortRow = writeShard('short-row.csv', '01/05/2023,8:30,BROOKLYN')
    expect(() => RecordStore.load(shortRow, 'BROOKLYN')).toThrowError(
      `${shortRow}:2: expected 13 cells, found 3`
    )

    const noHeader = path.join(dir, 'empty.csv')
    fs.writeFileSync(noHeader, '')
    expect(() => RecordStore.load(noHeader, 'BROOKLYN')).toThrowError(
      `${noHeader}: missing header row`
    )

    expect(() => RecordStore.load(path.join(dir, 'missing.csv'), 'BROOKLYN')).toThrowError(
      IngestionError
    )
  })

  it('requires the count and borough columns', () => {
    const file = path.join(dir, 'partial.csv')
    fs.writeFileSync(file, 'CRASH_DATE,CRASH_TIME,BOROUGH\n01/05/2023,8:30,BROOKLYN\n')
    expect(() => RecordStore.load(file, 'BROOKLYN')).toThrowError(
      `${file}:1: missing column(s) NUMBER_OF_PERSONS_INJURED, NUMBER_OF_PERSONS_KILLED`
    )
  })
})
