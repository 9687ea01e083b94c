import { WireFormatError } from '../../common/src/errors'
import { encodeTimingText } from './timing'
import type { QueryResponse, StreamChunk, StreamPage } from './types'
import {
  fromWireResultEntry,
  fromWireTimings,
  readArray,
  readBoolean,
  readNumber,
  readString,
  requireObject,
  toWireResultEntry,
  toWireTimings,
} from './wire'

export const DEFAULT_PAGE_SIZE = 100

const encodePage = (page: StreamPage): Buffer => {
  const body = {
    queryId: page.queryId,
    page: page.page,
    results: page.results.map(toWireResultEntry),
    summary: page.summary && {
      success: page.summary.success,
      message: page.summary.message,
      timings: toWireTimings(page.summary.timings),
    },
  }
  return Buffer.from(JSON.stringify(body), 'utf8')
}

/**
 * Splits a merged response into ordered stream chunks of at most `pageSize`
 * entries. An empty result still produces one (last) chunk so the caller
 * always receives the summary.
 */
export const paginateResponse = (
  response: QueryResponse,
  pageSize: number = DEFAULT_PAGE_SIZE
): StreamChunk[] => {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`)
  }

  const pageCount = Math.max(1, Math.ceil(response.results.length / pageSize))
  const chunks: StreamChunk[] = []

  for (let page = 0; page < pageCount; page += 1) {
    const isLast = page === pageCount - 1
    const data = encodePage({
      queryId: response.queryId,
      page,
      results: response.results.slice(page * pageSize, (page + 1) * pageSize),
      summary: isLast
        ? { success: response.success, message: response.message, timings: response.timings }
        : undefined,
    })
    chunks.push({ chunkId: `${response.queryId}-${page}`, data, isLast })
  }

  return chunks
}

/**
 * Decodes the JSON page carried by a stream chunk.
 */
export const decodeStreamPage = (data: Buffer): StreamPage => {
  let parsed: unknown
  try {
    parsed = JSON.parse(data.toString('utf8'))
  } catch {
    throw new WireFormatError('Stream chunk does not contain a JSON page')
  }

  const source = requireObject(parsed, 'Stream page')
  const page: StreamPage = {
    queryId: readString(source, 'queryId'),
    page: readNumber(source, 'page'),
    results: readArray(source, 'results').map(fromWireResultEntry),
  }

  if (source.summary != null) {
    const summary = requireObject(source.summary, 'Stream summary')
    page.summary = {
      success: readBoolean(summary, 'success'),
      message: readString(summary, 'message'),
      timings: fromWireTimings(summary.timings),
    }
  }

  return page
}

/**
 * Reassembles streamed chunks into a single response.
 * @throws WireFormatError when the stream ends before the last chunk.
 */
export const assembleStream = async (
  chunks: AsyncIterable<StreamChunk> | Iterable<StreamChunk>
): Promise<QueryResponse> => {
  const response: QueryResponse = {
    queryId: '',
    success: false,
    message: '',
    results: [],
    timings: {},
    timingData: '',
  }

  for await (const chunk of chunks) {
    const page = decodeStreamPage(chunk.data)
    response.queryId = page.queryId
    response.results.push(...page.results)

    if (chunk.isLast) {
      if (page.summary == null) {
        throw new WireFormatError(`Last chunk ${chunk.chunkId} carries no summary`)
      }
      response.success = page.summary.success
      response.message = page.summary.message
      response.timings = page.summary.timings
      response.timingData = encodeTimingText(page.summary.timings)
      return response
    }
  }

  throw new WireFormatError('Stream ended before the last chunk')
}
