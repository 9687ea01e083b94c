import type { CrashRecord, TypedValue } from './types'

export const stringValue = (value: string): TypedValue => ({ kind: 'string', value })

/**
 * @throws When the value is not a safe integer.
 */
export const intValue = (value: number): TypedValue => {
  if (!Number.isSafeInteger(value)) {
    throw new Error(`Integer value out of range: ${value}`)
  }
  return { kind: 'int', value }
}

export const doubleValue = (value: number): TypedValue => ({ kind: 'double', value })

export const boolValue = (value: boolean): TypedValue => ({ kind: 'bool', value })

/**
 * Renders a typed value for display, whatever its kind.
 */
export const formatTypedValue = (typed: TypedValue): string => {
  switch (typed.kind) {
    case 'string':
      return typed.value
    case 'int':
      return typed.value.toString()
    case 'double':
      return typed.value.toString()
    case 'bool':
      return typed.value ? 'true' : 'false'
  }
}

/**
 * Display string historically carried as a result entry's value.
 */
export const describeCrash = (record: CrashRecord): string =>
  `Date: ${record.crashDate}, Time: ${record.crashTime}, Borough: ${record.borough}, ` +
  `Injured: ${record.personsInjured}, Killed: ${record.personsKilled}`
