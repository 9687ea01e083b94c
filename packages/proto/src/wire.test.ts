import { describe, expect, it } from 'vitest'
import { WireFormatError } from '../../common/src/errors'
import type { CrashRecord, QueryResponse } from './types'
import {
  fromWireCrashRecord,
  fromWireDataMessage,
  fromWireQueryRequest,
  fromWireQueryResponse,
  fromWireTypedValue,
  toWireCrashRecord,
  toWireQueryResponse,
  toWireTypedValue,
} from './wire'

const record: CrashRecord = {
  crashDate: '05/09/2023',
  crashTime: '6:55',
  borough: 'STATEN ISLAND',
  zipCode: '10314',
  latitude: 40.607,
  longitude: -74.162,
  location: '(40.607, -74.162)',
  onStreetName: 'RICHMOND AVENUE',
  crossStreetName: '',
  offStreetName: '',
  personsInjured: 0,
  personsKilled: 0,
  pedestrians: 0,
}

describe('typed values', () => {
  it('encodes each kind into its oneof field', () => {
    expect(toWireTypedValue({ kind: 'string', value: 'x' })).toEqual({ stringValue: 'x' })
    expect(toWireTypedValue({ kind: 'int', value: 42 })).toEqual({ intValue: '42' })
    expect(toWireTypedValue({ kind: 'double', value: 1.5 })).toEqual({ doubleValue: 1.5 })
    expect(toWireTypedValue({ kind: 'bool', value: false })).toEqual({ boolValue: false })
  })

  it('decodes by the oneof discriminant, or by the populated field', () => {
    expect(fromWireTypedValue({ kind: 'intValue', intValue: '42', stringValue: '' })).toEqual({
      kind: 'int',
      value: 42,
    })
    expect(fromWireTypedValue({ doubleValue: 2.5 })).toEqual({ kind: 'double', value: 2.5 })
    expect(fromWireTypedValue({ kind: 'boolValue', boolValue: true })).toEqual({
      kind: 'bool',
      value: true,
    })
  })

  it('rejects empty and out-of-range values', () => {
    expect(() => fromWireTypedValue({})).toThrowError('Typed value has no populated variant')
    expect(() => fromWireTypedValue({ kind: 'intValue', intValue: '9007199254740993' })).toThrowError(
      WireFormatError
    )
    expect(() => fromWireTypedValue('text')).toThrowError('Typed value is not an object')
  })
})

describe('crash records', () => {
  it('carries coordinates behind a presence flag', () => {
    const wire = toWireCrashRecord({ ...record, latitude: null, longitude: null })
    expect(wire.hasCoordinates).toBe(false)
    expect(wire.latitude).toBe(0)
    expect(fromWireCrashRecord(wire)).toEqual({ ...record, latitude: null, longitude: null })
    expect(fromWireCrashRecord(toWireCrashRecord(record))).toEqual(record)
  })
})

describe('requests and responses', () => {
  it('fills proto3 defaults for absent fields', () => {
    expect(fromWireQueryRequest({ queryString: 'get_all' })).toEqual({
      queryId: '',
      queryString: 'get_all',
      parameters: [],
      shards: [],
    })
  })

  it('rejects non-string parameters', () => {
    expect(() => fromWireQueryRequest({ parameters: [1] })).toThrowError(
      'Field parameters must contain strings'
    )
  })

  it('decodes what it encodes', () => {
    const response: QueryResponse = {
      queryId: 'q-1',
      success: false,
      message: 'shard(s) unavailable: BRONX',
      results: [
        { key: 'staten_island-0', value: { kind: 'string', value: 'x' }, shard: 'STATEN ISLAND', record },
        { key: 'total', value: { kind: 'int', value: 7 }, shard: '' },
      ],
      timings: { A: { Merge: 0.5 } },
      timingData: '  [Process A]\n    Merge               : 0.500000 seconds\n',
    }

    expect(fromWireQueryResponse(toWireQueryResponse(response))).toEqual(response)
  })

  it('accepts base64 text for bytes', () => {
    const message = fromWireDataMessage({
      messageId: 'm-1',
      source: 'A',
      destination: 'B',
      data: Buffer.from('hello').toString('base64'),
    })
    expect(message.data.toString('utf8')).toBe('hello')
  })
})
