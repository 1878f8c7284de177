import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import { ResultStore, cacheKey, isUsable, parseRecord } from './store.js'
import { CacheCorruptionError } from '../../engine/errors.js'
import type { TrialResult, TrialSpec } from '../../../src/types/common.js'

const spec: TrialSpec = {
  cloud: 'selectel',
  infra: { cpu: 4, ram_gb: 16 },
  config: { policy: 'allkeys-lru' }
}

const success: TrialResult = {
  metrics: { ops_per_sec: 90000 },
  timings: { benchmark_s: 60 },
  error: null
}

const failure: TrialResult = {
  metrics: {},
  timings: { provision_s: 12 },
  error: { kind: 'BenchmarkExecutionError', message: 'exit code 1' }
}

describe('ResultStore', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cloudtune-results-'))
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  const openStore = () => new ResultStore({ service: 'redis', primaryMetric: 'ops_per_sec', resultsDir: dir })

  it('should return an appended usable record', async () => {
    const store = openStore()
    await store.append(spec, success, { mode: 'full', trial: 0 })

    const hit = await store.lookup(cacheKey(spec))
    expect(hit?.metrics.ops_per_sec).toBe(90000)
    expect(hit?.mode).toBe('full')
    expect(hit?.trial).toBe(0)
  })

  it('should survive a restart', async () => {
    await openStore().append(spec, success)

    const reopened = openStore()
    const hit = await reopened.lookup(cacheKey(spec))
    expect(hit?.metrics).toEqual({ ops_per_sec: 90000 })
    expect(await reopened.count()).toBe(1)
  })

  it('should match keys regardless of key order', async () => {
    const store = openStore()
    await store.append(spec, success)

    const reordered = cacheKey({
      config: { policy: 'allkeys-lru' },
      infra: { ram_gb: 16, cpu: 4 },
      cloud: 'selectel'
    })
    expect(reordered).toBe(cacheKey(spec))
    expect(await store.lookup(reordered)).not.toBeNull()
  })

  it('should never return failed records', async () => {
    const store = openStore()
    await store.append(spec, failure)

    expect(await store.lookup(cacheKey(spec))).toBeNull()
    expect(await store.count()).toBe(1)
  })

  it('should never return records with a non-positive primary metric', async () => {
    const store = openStore()
    await store.append(spec, { metrics: { ops_per_sec: 0 }, timings: {}, error: null })

    expect(await store.lookup(cacheKey(spec))).toBeNull()
  })

  it('should keep serving an older success after a later failure', async () => {
    const store = openStore()
    await store.append(spec, success)
    await store.append(spec, failure)

    const hit = await store.lookup(cacheKey(spec))
    expect(hit?.metrics.ops_per_sec).toBe(90000)
    expect(await store.count()).toBe(2)
  })

  it('should prefer the latest usable duplicate', async () => {
    const store = openStore()
    await store.append(spec, success)
    await store.append(spec, { ...success, metrics: { ops_per_sec: 95000 } })

    const hit = await store.lookup(cacheKey(spec))
    expect(hit?.metrics.ops_per_sec).toBe(95000)
  })

  it('should skip malformed lines and keep them on rewrite', async () => {
    const store = openStore()
    await store.append(spec, success)
    await fs.appendFile(store.filePath, '{"service":"redis","cloud":"sel\n')

    const reopened = openStore()
    expect(await reopened.count()).toBe(1)
    expect(console.warn).toHaveBeenCalledTimes(1)

    await reopened.append({ ...spec, infra: { cpu: 8, ram_gb: 16 } }, success)
    const lines = (await fs.readFile(store.filePath, 'utf-8')).trim().split('\n')
    expect(lines).toHaveLength(3)
    expect(lines[1]).toBe('{"service":"redis","cloud":"sel')
  })

  it('should not fail the append when an export hook throws', async () => {
    const store = openStore()
    const hook = vi.fn().mockRejectedValue(new Error('disk full'))
    store.onAppend(hook)

    const record = await store.append(spec, success)
    expect(record.metrics.ops_per_sec).toBe(90000)
    expect(hook).toHaveBeenCalledTimes(1)
    expect(console.warn).toHaveBeenCalled()
  })

  it('should filter records by cloud and usability', async () => {
    const store = openStore()
    await store.append(spec, success)
    await store.append({ ...spec, cloud: 'timeweb' }, success)
    await store.append({ ...spec, infra: { cpu: 2, ram_gb: 4 } }, failure)

    expect(await store.records({ cloud: 'selectel' })).toHaveLength(2)
    expect(await store.records({ cloud: 'selectel', successfulOnly: true })).toHaveLength(1)
  })

  it('should leave no temp files behind', async () => {
    const store = openStore()
    await store.append(spec, success)
    expect(await fs.readdir(dir)).toEqual(['redis.jsonl'])
  })
})

describe('parseRecord', () => {
  it('should reject unknown clouds', () => {
    expect(() => parseRecord({
      service: 'redis',
      cloud: 'nowhere',
      infra: { cpu: 2, ram_gb: 4 },
      config: {},
      metrics: {},
      timings: {},
      timestamp: '2024-01-01T00:00:00.000Z'
    }, 3)).toThrow(CacheCorruptionError)
  })

  it('should convert free-form errors into error objects', () => {
    const record = parseRecord({
      service: 'redis',
      cloud: 'timeweb',
      infra: { cpu: 2, ram_gb: 4 },
      config: {},
      metrics: {},
      timings: {},
      error: 'timeout',
      timestamp: '2024-01-01T00:00:00.000Z'
    }, 1)
    expect(record.error).toEqual({ kind: 'Error', message: 'timeout' })
  })
})

describe('isUsable', () => {
  it('should require a null error and a positive primary metric', () => {
    expect(isUsable(success, 'ops_per_sec')).toBe(true)
    expect(isUsable(failure, 'ops_per_sec')).toBe(false)
    expect(isUsable({ metrics: { ops_per_sec: -1 }, error: null }, 'ops_per_sec')).toBe(false)
    expect(isUsable({ metrics: {}, error: null }, 'ops_per_sec')).toBe(false)
  })
})
