import { describe, it, expect } from 'vitest'
import { redisTarget } from './redis.js'
import { postgresTarget } from './postgres.js'
import { minioTarget, effectiveParity } from './minio.js'
import { meilisearchTarget } from './meilisearch.js'
import { DefaultTargetRegistry, checkTarget, getTarget, listTargets } from './registry.js'
import { enabledVar } from './types.js'
import type { ServiceTarget } from './types.js'
import { ParseError, InvalidParameterSpaceError } from '../engine/errors.js'
import { getCloudProfile } from '../services/pricing/clouds.js'
import type { Endpoints, WorkloadSpec } from '../../src/types/common.js'

const endpoints: Endpoints = {
  serviceHost: '10.0.0.10',
  benchmarkHost: '203.0.113.5',
  nodeHosts: ['10.0.0.10']
}

const workload: WorkloadSpec = { duration_s: 60, clients: 50, threads: 4 }

describe('Target registry', () => {
  it('should list every built-in target', () => {
    expect(listTargets().map(target => target.name)).toEqual(['redis', 'postgres', 'minio', 'meilisearch'])
  })

  it('should reject unknown services', () => {
    expect(() => getTarget('mongodb')).toThrow(InvalidParameterSpaceError)
    expect(() => getTarget('mongodb')).toThrow('Unknown service: mongodb')
  })

  it('should accept all built-in declarations', () => {
    for (const target of listTargets()) {
      expect(checkTarget(target)).toEqual([])
    }
  })

  it('should switch each service on through its own terraform variable', () => {
    const profile = getCloudProfile('selectel')
    for (const target of listTargets()) {
      expect(target.terraformVars(target.defaultInfra(profile), profile)[enabledVar(target.name)]).toBe(true)
    }
  })

  it('should reject a config parameter named like an infrastructure field', () => {
    const broken: ServiceTarget = {
      ...redisTarget,
      name: 'broken',
      configSpace: [{ name: 'cpu', distribution: { type: 'categorical', choices: [1, 2] } }]
    }
    expect(checkTarget(broken)).toEqual(['config parameter cpu collides with an infrastructure field'])
    expect(() => new DefaultTargetRegistry([broken])).toThrow(InvalidParameterSpaceError)
  })

  it('should reject a primary metric that is not declared', () => {
    const broken: ServiceTarget = { ...redisTarget, primaryMetric: 'throughput' }
    expect(checkTarget(broken)).toEqual(['metric throughput is not declared'])
  })
})

describe('redis target', () => {
  const output = [
    'ALL STATS',
    'Type         Ops/sec     Hits/sec   Misses/sec    Avg. Latency     p50 Latency     p99 Latency   p99.9 Latency       KB/sec',
    'Sets        18000.12          ---          ---         2.10000         1.90300         5.11900         9.21500      5100.00',
    'Gets        72000.48     71000.00      1000.48         2.20000         2.00700         5.27900         9.98300     18000.00',
    'Totals      90000.60     71000.00      1000.48         2.18000         1.99900         5.24700         9.85500     23100.00'
  ].join('\n')

  it('should parse the Totals line', () => {
    expect(redisTarget.parseOutput(output)).toEqual({
      ops_per_sec: 90000.6,
      avg_latency_ms: 2.18,
      p50_latency_ms: 1.999,
      p99_latency_ms: 5.247,
      p999_latency_ms: 9.855,
      kb_per_sec: 23100
    })
  })

  it('should raise ParseError without a Totals line', () => {
    expect(() => redisTarget.parseOutput('Connection refused')).toThrow(ParseError)
  })

  it('should size maxmemory from RAM and enable threaded reads', () => {
    const rendered = redisTarget.renderConfig(
      { maxmemory_policy: 'volatile-lru', io_threads: 4, persistence: 'rdb' },
      { cpu: 4, ram_gb: 16 }
    )
    expect(rendered.content.split('\n')).toEqual([
      'maxmemory 12288mb',
      'maxmemory-policy volatile-lru',
      'io-threads 4',
      'io-threads-do-reads yes',
      'appendonly no',
      'save 900 1 300 10',
      ''
    ])
  })

  it('should build the memtier command', () => {
    const command = redisTarget.benchmarkCommand(endpoints, workload, { cpu: 2, ram_gb: 4 })
    expect(command).toContain('--server=10.0.0.10')
    expect(command).toContain('--ratio=1:4')
    expect(command).toContain('--test-time=60')
  })
})

describe('postgres target', () => {
  it('should parse tps, latency and failures', () => {
    const output = [
      'number of failed transactions: 0 (0.000%)',
      'latency average = 8.123 ms',
      'initial connection time = 12.300 ms',
      'tps = 6155.4321 (without initial connection time)'
    ].join('\n')

    expect(postgresTarget.parseOutput(output)).toEqual({
      tps: 6155.4321,
      latency_avg_ms: 8.123,
      failed_transactions: 0
    })
  })

  it('should render memory settings as shares of RAM', () => {
    const rendered = postgresTarget.renderConfig(postgresTarget.defaultConfig, { cpu: 4, ram_gb: 16 })
    const lines = rendered.content.split('\n')
    expect(lines).toContain('shared_buffers = 4096MB')
    expect(lines).toContain('effective_cache_size = 12288MB')
    expect(lines).toContain('max_parallel_workers = 8')
  })

  it('should pin the cloud default disk type', () => {
    expect(postgresTarget.defaultInfra(getCloudProfile('timeweb')).disk_type).toBe('nvme')
    expect(postgresTarget.infraSpace.disk_type).toBe('default')
  })
})

describe('minio target', () => {
  const output = [
    'Operation: DELETE, 5%, Concurrency: 20, Ran 29s.',
    ' * Throughput: 12.00 obj/s',
    'Operation: GET, 60%, Concurrency: 20, Ran 29s.',
    ' * Throughput: 305.61 MiB/s, 305.61 obj/s',
    'Operation: PUT, 10%, Concurrency: 20, Ran 29s.',
    ' * Throughput: 51.20 MiB/s, 51.20 obj/s',
    'Cluster Total: 356.81 MiB/s, 495.81 obj/s over 30s.'
  ].join('\n')

  it('should parse warp throughput', () => {
    expect(minioTarget.parseOutput(output)).toEqual({
      total_mib_s: 356.81,
      total_obj_s: 495.81,
      get_mib_s: 305.61,
      get_obj_s: 305.61,
      put_mib_s: 51.2,
      put_obj_s: 51.2
    })
  })

  it('should only apply parity the erasure set can hold', () => {
    expect(effectiveParity(2, 4)).toBe(2)
    expect(effectiveParity(2, 3)).toBe(0)
    expect(effectiveParity(1, 1)).toBe(0)
    expect(effectiveParity(0, 8)).toBe(0)
  })

  it('should render environment settings', () => {
    const rendered = minioTarget.renderConfig(
      { api_requests_max: 512, storage_class_parity: 2, compression: 'on' },
      { cpu: 4, ram_gb: 8, nodes: 2, drives: 2 }
    )
    expect(rendered.content).toBe(
      'MINIO_COMPRESSION_ENABLE=on\nMINIO_API_REQUESTS_MAX=512\nMINIO_STORAGE_CLASS_STANDARD=EC:2\n'
    )
  })

  it('should target every node', () => {
    const command = minioTarget.benchmarkCommand(
      { ...endpoints, nodeHosts: ['10.0.0.11', '10.0.0.12'] },
      workload,
      { cpu: 2, ram_gb: 4 }
    )
    expect(command).toContain('--host=10.0.0.11:9000,10.0.0.12:9000')
  })
})

describe('meilisearch target', () => {
  const summary = JSON.stringify({
    metrics: {
      http_reqs: { count: 1000, rate: 16.5 },
      search_latency_ms: { med: 10, 'p(95)': 25.5, 'p(99)': 40 },
      search_errors: { count: 5 }
    }
  })

  it('should parse the k6 summary after noise', () => {
    expect(meilisearchTarget.parseOutput(`WARN[0000] thresholds crossed\n${summary}\n\u0000`)).toEqual({
      qps: 16.5,
      p50_ms: 10,
      p95_ms: 25.5,
      p99_ms: 40,
      error_rate: 0.005
    })
  })

  it('should raise ParseError without a request rate', () => {
    expect(() => meilisearchTarget.parseOutput('{"metrics": {}}')).toThrow('k6 summary has no http_reqs rate')
  })

  it('should take indexing_time from the prepare phase', () => {
    const metric = meilisearchTarget.metrics.find(m => m.name === 'indexing_time')
    expect(metric?.fromTiming).toBe('prepare_s')
  })

  it('should leave thread count to the server when set to auto', () => {
    const rendered = meilisearchTarget.renderConfig(
      { max_indexing_memory_mb: 512, max_indexing_threads: 0 },
      { cpu: 2, ram_gb: 4 }
    )
    expect(rendered.content).toBe('MEILI_MAX_INDEXING_MEMORY=512Mb\n')
  })

  it('should write the k6 script before running it', () => {
    const command = meilisearchTarget.benchmarkCommand(endpoints, workload, { cpu: 2, ram_gb: 4 })
    expect(command.startsWith("cat > /tmp/cloudtune_search.js << 'CLOUDTUNE_EOF'\n")).toBe(true)
    expect(command).toContain('/indexes/products/search')
    expect(command).toContain('-e MEILI_URL=http://10.0.0.10:7700')
  })

  it('should chain the summary read on the k6 exit status', () => {
    const command = meilisearchTarget.benchmarkCommand(endpoints, workload, { cpu: 2, ram_gb: 4 })
    const lines = command.split('\n')
    expect(lines[lines.length - 2]).toBe('rm -f /tmp/cloudtune_k6_summary.json')
    expect(lines[lines.length - 1].endsWith('>/dev/null && cat /tmp/cloudtune_k6_summary.json')).toBe(true)
  })
})
