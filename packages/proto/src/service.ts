import { fileURLToPath } from 'node:url'
import * as protoLoader from '@grpc/proto-loader'

export const CRASH_QUERY_SERVICE = 'crash.v1.CrashQueryService'

export const CRASH_PROTO_PATH = fileURLToPath(
  new URL('../proto/crash/v1/crash.proto', import.meta.url)
)

const LOADER_OPTIONS: protoLoader.Options = {
  keepCase: false,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
}

/**
 * Method names served by CrashQueryService, as declared in crash.proto.
 */
export type CrashQueryMethod = 'QueryData' | 'SendData' | 'StreamData'

let cachedDefinition: protoLoader.ServiceDefinition | null = null

/**
 * Loads the CrashQueryService definition from crash.proto at run time.
 * The definition is parsed once per process.
 * @throws When the proto file does not declare the service.
 */
export const loadCrashQueryService = (): protoLoader.ServiceDefinition => {
  if (cachedDefinition) {
    return cachedDefinition
  }

  const packageDefinition = protoLoader.loadSync(CRASH_PROTO_PATH, LOADER_OPTIONS)
  const definition = packageDefinition[CRASH_QUERY_SERVICE]
  if (definition == null || 'format' in definition) {
    throw new Error(`${CRASH_QUERY_SERVICE} not found in ${CRASH_PROTO_PATH}`)
  }

  cachedDefinition = definition
  return definition
}

/**
 * Returns the method definition (path and codecs) for one RPC.
 */
export const crashQueryMethod = (method: CrashQueryMethod): protoLoader.MethodDefinition<object, object> => {
  const definition = loadCrashQueryService()[method]
  if (definition == null) {
    throw new Error(`${CRASH_QUERY_SERVICE}/${method} not found`)
  }
  return definition
}
