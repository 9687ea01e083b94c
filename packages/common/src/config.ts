import fs from 'node:fs'
import path from 'node:path'
import * as yaml from 'js-yaml'
import { SHARD_ORDER } from '../../proto/src/types'
import type { Borough } from '../../proto/src/types'
import { ConfigError } from './errors'

export const DEFAULT_WORKER_TIMEOUT_MS = 5000
export const DEFAULT_STREAM_PAGE_SIZE = 100

const PROCESS_ID = /^[A-Z]$/

/**
 * One shard file assigned to a worker.
 */
export interface ShardConfig {
  borough: Borough
  /** Absolute path, resolved against the config file's directory. */
  file: string
}

export interface WorkerConfig {
  id: string
  /** gRPC address, e.g. "127.0.0.1:50052". */
  address: string
  shards: ShardConfig[]
}

export interface CoordinatorConfig {
  id: string
  address: string
  /** Upper bound for one worker call, in milliseconds. */
  workerTimeoutMs: number
  /** Result entries per StreamData chunk. */
  streamPageSize: number
}

export interface ClusterConfig {
  coordinator: CoordinatorConfig
  workers: WorkerConfig[]
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

const isBorough = (value: string): value is Borough => {
  return SHARD_ORDER.some((borough) => borough === value)
}

const requireString = (source: Record<string, unknown>, field: string, where: string): string => {
  const value = source[field]
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`${where}.${field} must be a non-empty string`)
  }
  return value.trim()
}

const optionalPositiveInt = (
  source: Record<string, unknown>,
  field: string,
  where: string,
  fallback: number
): number => {
  const value = source[field]
  if (value == null) {
    return fallback
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${where}.${field} must be a positive integer`)
  }
  return value
}

const requireProcessId = (source: Record<string, unknown>, where: string): string => {
  const id = requireString(source, 'id', where)
  if (!PROCESS_ID.test(id)) {
    throw new ConfigError(`${where}.id must be a single upper-case letter, got "${id}"`)
  }
  return id
}

const parseShard = (value: unknown, where: string, baseDir: string): ShardConfig => {
  if (!isRecord(value)) {
    throw new ConfigError(`${where} must be a mapping`)
  }
  const borough = requireString(value, 'borough', where).toUpperCase()
  if (!isBorough(borough)) {
    throw new ConfigError(`${where}.borough must be one of ${SHARD_ORDER.join(', ')}, got "${borough}"`)
  }
  return { borough, file: path.resolve(baseDir, requireString(value, 'file', where)) }
}

const parseWorker = (value: unknown, where: string, baseDir: string): WorkerConfig => {
  if (!isRecord(value)) {
    throw new ConfigError(`${where} must be a mapping`)
  }
  const shards = value.shards
  if (!Array.isArray(shards) || shards.length === 0) {
    throw new ConfigError(`${where}.shards must list at least one shard`)
  }
  return {
    id: requireProcessId(value, where),
    address: requireString(value, 'address', where),
    shards: shards.map((shard, index) => parseShard(shard, `${where}.shards[${index}]`, baseDir)),
  }
}

/**
 * Validates a parsed YAML document into a cluster config.
 * @param baseDir Directory shard file paths are resolved against.
 * @throws ConfigError on a missing field, a duplicate process id, or a
 * borough that is unowned or owned twice.
 */
export const parseClusterConfig = (raw: unknown, baseDir: string): ClusterConfig => {
  if (!isRecord(raw)) {
    throw new ConfigError('cluster config must be a mapping')
  }
  if (!isRecord(raw.coordinator)) {
    throw new ConfigError('coordinator must be a mapping')
  }
  if (!Array.isArray(raw.workers) || raw.workers.length === 0) {
    throw new ConfigError('workers must list at least one worker')
  }

  const coordinator: CoordinatorConfig = {
    id: requireProcessId(raw.coordinator, 'coordinator'),
    address: requireString(raw.coordinator, 'address', 'coordinator'),
    workerTimeoutMs: optionalPositiveInt(
      raw.coordinator,
      'workerTimeoutMs',
      'coordinator',
      DEFAULT_WORKER_TIMEOUT_MS
    ),
    streamPageSize: optionalPositiveInt(
      raw.coordinator,
      'streamPageSize',
      'coordinator',
      DEFAULT_STREAM_PAGE_SIZE
    ),
  }
  const workers = raw.workers.map((worker, index) =>
    parseWorker(worker, `workers[${index}]`, baseDir)
  )

  const ids = new Set([coordinator.id])
  const owners = new Map<Borough, string>()
  for (const worker of workers) {
    if (ids.has(worker.id)) {
      throw new ConfigError(`duplicate process id ${worker.id}`)
    }
    ids.add(worker.id)
    for (const shard of worker.shards) {
      const owner = owners.get(shard.borough)
      if (owner != null) {
        throw new ConfigError(
          `borough ${shard.borough} is owned by both worker ${owner} and worker ${worker.id}`
        )
      }
      owners.set(shard.borough, worker.id)
    }
  }

  const unowned = SHARD_ORDER.filter((borough) => !owners.has(borough))
  if (unowned.length > 0) {
    throw new ConfigError(`no worker owns ${unowned.join(', ')}`)
  }

  return { coordinator, workers }
}

/**
 * Reads and validates the cluster YAML file.
 * @throws ConfigError when the file cannot be read or is invalid.
 */
export const loadClusterConfig = (configPath: string): ClusterConfig => {
  const resolved = path.resolve(configPath)
  let content: string
  try {
    content = fs.readFileSync(resolved, 'utf8')
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`cannot read cluster config ${resolved}: ${reason}`)
  }

  let raw: unknown
  try {
    raw = yaml.load(content)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`invalid YAML in ${resolved}: ${reason}`)
  }

  return parseClusterConfig(raw, path.dirname(resolved))
}

/**
 * @throws ConfigError when no worker has the given id.
 */
export const findWorker = (config: ClusterConfig, id: string): WorkerConfig => {
  const worker = config.workers.find((candidate) => candidate.id === id)
  if (worker == null) {
    const known = config.workers.map((candidate) => candidate.id).join(', ')
    throw new ConfigError(`unknown worker id ${id} (configured: ${known})`)
  }
  return worker
}
