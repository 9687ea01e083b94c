import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { describe, expect, it } from 'vitest'
import { ConfigError } from './errors'
import { findWorker, loadClusterConfig, parseClusterConfig } from './config'

const buildRaw = () => ({
  coordinator: { id: 'A', address: '127.0.0.1:50051', workerTimeoutMs: 2000 },
  workers: [
    { id: 'B', address: '127.0.0.1:50052', shards: [{ borough: 'BROOKLYN', file: 'b.csv' }] },
    { id: 'C', address: '127.0.0.1:50053', shards: [{ borough: 'QUEENS', file: 'c.csv' }] },
    { id: 'D', address: '127.0.0.1:50054', shards: [{ borough: 'BRONX', file: 'd.csv' }] },
    {
      id: 'E',
      address: '127.0.0.1:50055',
      shards: [
        { borough: 'staten island', file: 'shards/e.csv' },
        { borough: 'OTHER', file: '/data/other.csv' },
      ],
    },
  ],
})

describe('parseClusterConfig', () => {
  it('applies defaults and resolves shard files against the base directory', () => {
    const config = parseClusterConfig(buildRaw(), '/etc/crashgrid')

    expect(config.coordinator).toEqual({
      id: 'A',
      address: '127.0.0.1:50051',
      workerTimeoutMs: 2000,
      streamPageSize: 100,
    })
    expect(findWorker(config, 'E').shards).toEqual([
      { borough: 'STATEN ISLAND', file: path.resolve('/etc/crashgrid', 'shards/e.csv') },
      { borough: 'OTHER', file: path.resolve('/data/other.csv') },
    ])
  })

  it('rejects a borough owned twice', () => {
    const raw = buildRaw()
    raw.workers[1].shards.push({ borough: 'BROOKLYN', file: 'again.csv' })
    expect(() => parseClusterConfig(raw, '/')).toThrowError(
      'borough BROOKLYN is owned by both worker B and worker C'
    )
  })

  it('rejects an unowned borough', () => {
    const raw = buildRaw()
    raw.workers = raw.workers.slice(0, 3)
    expect(() => parseClusterConfig(raw, '/')).toThrowError('no worker owns STATEN ISLAND, OTHER')
  })

  it('rejects duplicate and malformed process ids', () => {
    const duplicate = buildRaw()
    duplicate.workers[0].id = 'A'
    expect(() => parseClusterConfig(duplicate, '/')).toThrowError('duplicate process id A')

    const malformed = buildRaw()
    malformed.workers[0].id = 'worker-b'
    expect(() => parseClusterConfig(malformed, '/')).toThrowError(ConfigError)
  })

  it('rejects unknown boroughs and bad timeouts', () => {
    const borough = buildRaw()
    borough.workers[0].shards[0].borough = 'MANHATTAN'
    expect(() => parseClusterConfig(borough, '/')).toThrowError(
      'workers[0].shards[0].borough must be one of BROOKLYN, QUEENS, BRONX, STATEN ISLAND, OTHER, got "MANHATTAN"'
    )

    const timeout = buildRaw()
    timeout.coordinator.workerTimeoutMs = 0
    expect(() => parseClusterConfig(timeout, '/')).toThrowError(
      'coordinator.workerTimeoutMs must be a positive integer'
    )
  })

  it('names an unknown worker id', () => {
    expect(() => findWorker(parseClusterConfig(buildRaw(), '/'), 'F')).toThrowError(
      'unknown worker id F (configured: B, C, D, E)'
    )
  })
})

describe('loadClusterConfig', () => {
  it('reads YAML relative to the config file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cluster-config-'))
    const file = path.join(dir, 'cluster.yaml')
    fs.writeFileSync(
      file,
      [
        'coordinator:',
        '  id: A',
        '  address: 127.0.0.1:50051',
        '  streamPageSize: 25',
        'workers:',
        '  - id: B',
        '    address: 127.0.0.1:50052',
        '    shards:',
        '      - { borough: BROOKLYN, file: data/brooklyn.csv }',
        '      - { borough: QUEENS, file: data/queens.csv }',
        '      - { borough: BRONX, file: data/bronx.csv }',
        '      - { borough: STATEN ISLAND, file: data/staten_island.csv }',
        '      - { borough: OTHER, file: data/other.csv }',
        '',
      ].join('\n')
    )

    try {
      const config = loadClusterConfig(file)
      expect(config.coordinator.workerTimeoutMs).toBe(5000)
      expect(config.coordinator.streamPageSize).toBe(25)
      expect(config.workers[0].shards[4].file).toBe(path.join(dir, 'data', 'other.csv'))
    } finally {
      fs.rmSync(dir, { recursive: true, force: true })
    }
  })

  it('reports unreadable files and invalid YAML as config errors', () => {
    expect(() => loadClusterConfig('/nonexistent/cluster.yaml')).toThrowError(ConfigError)

    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cluster-config-'))
    const file = path.join(dir, 'broken.yaml')
    fs.writeFileSync(file, 'coordinator: [unclosed\n')
    try {
      expect(() => loadClusterConfig(file)).toThrowError(/^invalid YAML in /)
    } finally {
      fs.rmSync(dir, { recursive: true, force: true })
    }
  })

  it('accepts the shipped cluster config', () => {
    const file = fileURLToPath(new URL('../../../config/cluster.yaml', import.meta.url))
    const config = loadClusterConfig(file)

    expect(config.coordinator).toEqual({
      id: 'A',
      address: '127.0.0.1:50051',
      workerTimeoutMs: 5000,
      streamPageSize: 100,
    })
    expect(config.workers.map((worker) => [worker.id, worker.shards.map((shard) => shard.borough)])).toEqual([
      ['B', ['BROOKLYN']],
      ['C', ['QUEENS']],
      ['D', ['BRONX']],
      ['E', ['STATEN ISLAND', 'OTHER']],
    ])
    expect(config.workers[0].shards[0].file).toBe(
      path.resolve(path.dirname(file), '../data/shards/brooklyn_crashes.csv')
    )
  })
})
