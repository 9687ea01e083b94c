import {
  ArityError,
  InvalidParameterError,
  UnknownVerbError,
} from '../../common/src/errors'
import type { Borough, CrashRecord } from '../../proto/src/types'
import { classifyBorough } from './record'

export type Predicate = (record: CrashRecord) => boolean

/**
 * Query verbs and their parameter count.
 */
export const VERB_ARITY = {
  get_all: 0,
  get_by_borough: 1,
  get_by_street: 1,
  get_by_date_range: 2,
  get_crashes_with_injuries: 1,
  get_crashes_with_fatalities: 1,
  get_by_time: 1,
} as const

export type Verb = keyof typeof VERB_ARITY

export const isVerb = (value: string): value is Verb => Object.hasOwn(VERB_ARITY, value)

const DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/
const COUNT = /^\d+$/

const matchNothing: Predicate = () => false

/**
 * Parses `MM/DD/YYYY` into a sortable YYYYMMDD number, or null when the
 * text is not a calendar date.
 */
export const parseCrashDate = (text: string): number | null => {
  const match = DATE.exec(text.trim())
  if (!match) {
    return null
  }
  const month = Number(match[1])
  const day = Number(match[2])
  const year = Number(match[3])
  const date = new Date(Date.UTC(year, month - 1, day))
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null
  }
  return year * 10000 + month * 100 + day
}

/**
 * Maps a `get_by_borough` parameter to the shard it selects. `UNKNOWN` is
 * an alias of `OTHER`; any other unrecognized name selects nothing.
 */
export const resolveBoroughParameter = (parameter: string): Borough | null => {
  const normalized = parameter.trim().toUpperCase()
  if (normalized === 'OTHER' || normalized === 'UNKNOWN') {
    return 'OTHER'
  }
  const classified = classifyBorough(normalized)
  return classified === 'OTHER' ? null : classified
}

const requireDate = (parameter: string, name: string): number => {
  const parsed = parseCrashDate(parameter)
  if (parsed == null) {
    throw new InvalidParameterError(`${name} must be a date as MM/DD/YYYY, got "${parameter}"`)
  }
  return parsed
}

const requireThreshold = (parameter: string, verb: Verb): number => {
  const trimmed = parameter.trim()
  if (!COUNT.test(trimmed)) {
    throw new InvalidParameterError(
      `${verb} threshold must be a non-negative integer, got "${parameter}"`
    )
  }
  return Number.parseInt(trimmed, 10)
}

/**
 * Compiles a verb and its positional parameters into a record test.
 * @throws UnknownVerbError, ArityError or InvalidParameterError.
 */
export const compilePredicate = (queryString: string, parameters: readonly string[]): Predicate => {
  if (!isVerb(queryString)) {
    throw new UnknownVerbError(queryString)
  }
  const expected = VERB_ARITY[queryString]
  if (parameters.length !== expected) {
    throw new ArityError(queryString, expected, parameters.length)
  }

  switch (queryString) {
    case 'get_all':
      return () => true

    case 'get_by_borough': {
      const borough = resolveBoroughParameter(parameters[0])
      if (borough == null) {
        return matchNothing
      }
      return (record) => classifyBorough(record.borough) === borough
    }

    case 'get_by_street': {
      const needle = parameters[0].trim().toUpperCase()
      return (record) =>
        [record.onStreetName, record.crossStreetName, record.offStreetName].some((street) =>
          street.toUpperCase().includes(needle)
        )
    }

    case 'get_by_date_range': {
      const start = requireDate(parameters[0], 'start date')
      const end = requireDate(parameters[1], 'end date')
      if (start > end) {
        return matchNothing
      }
      return (record) => {
        const date = parseCrashDate(record.crashDate)
        return date != null && date >= start && date <= end
      }
    }

    case 'get_crashes_with_injuries': {
      const threshold = requireThreshold(parameters[0], queryString)
      return (record) => record.personsInjured >= threshold
    }

    case 'get_crashes_with_fatalities': {
      const threshold = requireThreshold(parameters[0], queryString)
      return (record) => record.personsKilled >= threshold
    }

    case 'get_by_time': {
      const time = parameters[0].trim()
      return (record) => record.crashTime === time
    }
  }
}
