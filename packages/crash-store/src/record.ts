import type { Borough } from '../../proto/src/types'

/**
 * Column set of every shard file, in file order.
 */
export const CRASH_COLUMNS = [
  'CRASH_DATE',
  'CRASH_TIME',
  'BOROUGH',
  'ZIP_CODE',
  'LATITUDE',
  'LONGITUDE',
  'LOCATION',
  'ON_STREET_NAME',
  'CROSS_STREET_NAME',
  'OFF_STREET_NAME',
  'NUMBER_OF_PERSONS_INJURED',
  'NUMBER_OF_PERSONS_KILLED',
  'NUMBER_OF_PEDESTRIANS',
] as const

export type CrashColumn = (typeof CRASH_COLUMNS)[number]

/** Columns a crash file must have; the rest default to blank. */
export const REQUIRED_COLUMNS: readonly CrashColumn[] = [
  'CRASH_DATE',
  'CRASH_TIME',
  'BOROUGH',
  'NUMBER_OF_PERSONS_INJURED',
  'NUMBER_OF_PERSONS_KILLED',
]

const NAMED_BOROUGHS: readonly Borough[] = ['BROOKLYN', 'QUEENS', 'BRONX', 'STATEN ISLAND']

/**
 * Classifies a raw borough value. Blank and unrecognized values go to OTHER.
 */
export const classifyBorough = (raw: string): Borough => {
  const normalized = raw.trim().toUpperCase()
  return NAMED_BOROUGHS.find((borough) => borough === normalized) ?? 'OTHER'
}

const SHARD_SLUGS: Record<Borough, string> = {
  BROOKLYN: 'brooklyn',
  QUEENS: 'queens',
  BRONX: 'bronx',
  'STATEN ISLAND': 'staten_island',
  OTHER: 'other',
}

export const shardSlug = (borough: Borough): string => SHARD_SLUGS[borough]

/** e.g. `staten_island_crashes.csv` */
export const shardFileName = (borough: Borough): string => `${SHARD_SLUGS[borough]}_crashes.csv`

/**
 * Normalizes a header cell so that `CRASH DATE` and `crash_date` both
 * resolve to `CRASH_DATE`.
 */
export const normalizeColumnName = (name: string): string =>
  name.trim().toUpperCase().replace(/\s+/g, '_')

