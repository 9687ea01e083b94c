/* eslint-disable no-console */
import { randomUUID } from 'node:crypto'
import { CrashQueryClient } from '../../../packages/proto/src/client'
import { assembleStream } from '../../../packages/proto/src/paging'
import type { QueryRequest, QueryResponse } from '../../../packages/proto/src/types'
import { formatJson, formatTable } from './output'
import { parseClientArgs } from './query-args'
import type { ClientArgs, CrashQuery } from './query-args'

const usage = `Usage: crash-client <query> [options]

Queries (exactly one):
  --all                       Every crash
  --borough <name>            Crashes in one borough (OTHER or UNKNOWN for the rest)
  --street <name>             Crashes on, across or off a street
  --dates <start> <end>       Crashes between two MM/DD/YYYY dates, inclusive
  --injuries <n>              Crashes with at least n persons injured
  --fatalities <n>            Crashes with at least n persons killed
  --time <hh:mm>              Crashes at a time of day

Options:
  --server <addr>             Coordinator address (default: $CRASHGRID_SERVER or 127.0.0.1:50051)
  --stream                    Receive the result in pages
  --format <json|table>       Output format (default: json)
  --limit <n>                 Crashes to print (default: 10)
  --timeout-ms <ms>           Call deadline (default: 10000)
  --help                      Show this help
`

const run = async (
  client: CrashQueryClient,
  args: ClientArgs,
  query: CrashQuery,
  signal: AbortSignal
): Promise<QueryResponse> => {
  const request: QueryRequest = {
    queryId: randomUUID(),
    queryString: query.queryString,
    parameters: query.parameters,
    shards: [],
  }
  const options = { deadline: new Date(Date.now() + args.timeoutMs), signal }
  return args.stream
    ? assembleStream(client.streamData(request, options))
    : client.queryData(request, options)
}

const main = async (): Promise<void> => {
  const args = parseClientArgs(process.argv.slice(2))
  if (args.help || args.query == null) {
    console.log(usage)
    return
  }

  const controller = new AbortController()
  process.once('SIGINT', () => controller.abort())

  const client = new CrashQueryClient(args.server)
  try {
    const startedAt = performance.now()
    const response = await run(client, args, args.query, controller.signal)
    const report = {
      response,
      elapsedSeconds: (performance.now() - startedAt) / 1000,
      limit: args.limit,
    }
    console.log(args.format === 'table' ? formatTable(report) : formatJson(report))
    if (!response.success) {
      process.exitCode = 1
    }
  } finally {
    client.close()
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error)
  console.error(message)
  process.exitCode = 1
})
