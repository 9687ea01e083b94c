import { describe, expect, it } from 'vitest'
import { WireFormatError } from '../../common/src/errors'
import { assembleStream, decodeStreamPage, paginateResponse } from './paging'
import type { QueryResponse, ResultEntry } from './types'

const entry = (index: number): ResultEntry => ({
  key: `queens-${index}`,
  value: { kind: 'string', value: `crash ${index}` },
  shard: 'QUEENS',
})

const buildResponse = (count: number): QueryResponse => ({
  queryId: 'q-7',
  success: true,
  message: `${count} result(s) from 5 shard(s)`,
  results: Array.from({ length: count }, (_, index) => entry(index)),
  timings: { A: { Total_Processing: 0.25 }, C: { Scan: 0.125 } },
  timingData:
    '  [Process A]\n' +
    '    Total_Processing    : 0.250000 seconds\n' +
    '  [Process C]\n' +
    '    Scan                : 0.125000 seconds\n',
})

describe('paginateResponse', () => {
  it('pages results in order with the summary on the last page only', () => {
    const chunks = paginateResponse(buildResponse(5), 2)

    expect(chunks.map((chunk) => [chunk.chunkId, chunk.isLast])).toEqual([
      ['q-7-0', false],
      ['q-7-1', false],
      ['q-7-2', true],
    ])
    const first = decodeStreamPage(chunks[0].data)
    expect(first.results.map((result) => result.key)).toEqual(['queens-0', 'queens-1'])
    expect(first.summary).toBeUndefined()
    expect(decodeStreamPage(chunks[2].data).summary).toEqual({
      success: true,
      message: '5 result(s) from 5 shard(s)',
      timings: { A: { Total_Processing: 0.25 }, C: { Scan: 0.125 } },
    })
  })

  it('emits a single last chunk for an empty result', () => {
    const chunks = paginateResponse(buildResponse(0))
    expect(chunks).toHaveLength(1)
    expect(chunks[0].isLast).toBe(true)
  })

  it('rejects a page size below one', () => {
    expect(() => paginateResponse(buildResponse(1), 0)).toThrowError(RangeError)
  })
})

describe('assembleStream', () => {
  it('rebuilds the unary response', async () => {
    const response = buildResponse(5)
    await expect(assembleStream(paginateResponse(response, 2))).resolves.toEqual(response)
  })

  it('fails when the stream stops before the last chunk', async () => {
    const chunks = paginateResponse(buildResponse(5), 2).slice(0, 2)
    await expect(assembleStream(chunks)).rejects.toThrowError(WireFormatError)
  })

  it('fails on a chunk that is not a JSON page', () => {
    expect(() => decodeStreamPage(Buffer.from('not json'))).toThrowError(
      'Stream chunk does not contain a JSON page'
    )
  })
})
