import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import {
  buildReport,
  exportMarkdown,
  markdownExporter,
  markdownPath,
  renderBest,
  renderMarkdown,
  renderTable,
  summarizeConfig,
  summarizeInfra
} from './report.js'
import { ResultStore } from './store.js'
import { getCloudProfile } from '../pricing/clouds.js'
import { redisTarget } from '../../targets/redis.js'
import type { ResultRecord } from '../../../src/types/common.js'

const selectel = getCloudProfile('selectel')

const record = (overrides: Partial<ResultRecord> = {}): ResultRecord => ({
  service: 'redis',
  cloud: 'selectel',
  mode: 'full',
  infra: { topology: 'single', nodes: 1, cpu: 4, ram_gb: 16 },
  config: { maxmemory_policy: 'allkeys-lru' },
  metrics: { ops_per_sec: 90000, p99_latency_ms: 2.25, avg_latency_ms: 1.1 },
  timings: {},
  timestamp: '2026-01-01T00:00:00.000Z',
  ...overrides
})

const small = record({
  infra: { topology: 'single', nodes: 1, cpu: 2, ram_gb: 4 },
  metrics: { ops_per_sec: 50000, p99_latency_ms: 1.5, avg_latency_ms: 0.8 }
})

describe('summaries', () => {
  it('should describe node shape and disks', () => {
    expect(summarizeInfra(small.infra)).toBe('single 1x 2cpu/4GB')
    expect(summarizeInfra({ nodes: 4, cpu: 2, ram_gb: 4, drives: 2, disk_size_gb: 100, disk_type: 'ssd' }))
      .toBe('4x 2cpu/4GB 2x100GB ssd')
  })

  it('should list config values in order', () => {
    expect(summarizeConfig({ io_threads: 2, persistence: 'none' })).toBe('io_threads=2, persistence=none')
    expect(summarizeConfig({})).toBe('-')
  })
})

describe('buildReport', () => {
  const report = buildReport(redisTarget, selectel, [
    small,
    record(),
    record({ metrics: {}, error: { kind: 'ParseError', message: 'no Totals line' } }),
    record({ cloud: 'timeweb' })
  ])

  it('should keep usable records for the cloud, best primary metric first', () => {
    expect(report.rows.map(row => row.infra)).toEqual(['single 1x 4cpu/16GB', 'single 1x 2cpu/4GB'])
    expect(report.rows.map(row => row.index)).toEqual([1, 2])
  })

  it('should price each row per month', () => {
    // 4*655 + 16*238 + 50*39 and 2*655 + 4*238 + 50*39
    expect(report.rows.map(row => row.monthlyCost)).toEqual([8378, 4212])
  })

  it('should pick the best row per metric respecting direction', () => {
    const best = Object.fromEntries(report.best.map(entry => [entry.metric.name, entry.value]))
    expect(best.ops_per_sec).toBe(90000)
    expect(best.p99_latency_ms).toBe(1.5)
    expect(best.avg_latency_ms).toBe(0.8)
    expect(best.cost_efficiency).toBeCloseTo(50000 / 4212, 10)
  })

  it('should render best lines with units', () => {
    expect(renderBest(report)[1]).toBe('Best by p99_latency_ms: 1.50 ms [single 1x 2cpu/4GB; maxmemory_policy=allkeys-lru]')
  })

  it('should render a table with one line per row', () => {
    const table = renderTable(report)
    expect(table).toContain('single 1x 4cpu/16GB')
    expect(table).toContain('8378')
    expect(table).toContain('Cost/mo (₽)')
  })
})

describe('renderMarkdown', () => {
  it('should write a header, one row and the best list', () => {
    const report = buildReport(redisTarget, selectel, [record()])
    const lines = renderMarkdown(report, new Date('2026-01-02T03:04:05.000Z')).split('\n')

    expect(lines[0]).toBe('# redis benchmark results - selectel')
    expect(lines[2]).toBe('Generated: 2026-01-02T03:04:05.000Z')
    expect(lines[6]).toBe(
      '| # | Mode | Infra | Config | ops_per_sec (ops/s) | p99_latency_ms (ms) | avg_latency_ms (ms) | cost_efficiency (ops/s/₽/mo) | Cost/mo (₽) |'
    )
    expect(lines[7]).toBe('|--:|---|---|---|--:|--:|--:|--:|--:|')
    expect(lines[8]).toBe('| 1 | full | single 1x 4cpu/16GB | maxmemory_policy=allkeys-lru | 90000 | 2.25 | 1.10 | 10.74 | 8378 |')
    expect(lines).toContain('- **ops_per_sec:** 90000 ops/s (single 1x 4cpu/16GB; `maxmemory_policy=allkeys-lru`)')
  })
})

describe('markdown export', () => {
  let dir: string
  let store: ResultStore

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cloudtune-report-'))
    store = new ResultStore({ service: 'redis', primaryMetric: 'ops_per_sec', resultsDir: dir })
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('should name the file after service and cloud', () => {
    expect(markdownPath('/data', 'redis', 'selectel')).toBe(path.join('/data', 'RESULTS_REDIS_SELECTEL.md'))
  })

  it('should skip the export when nothing is usable', async () => {
    expect(await exportMarkdown(store, redisTarget, selectel)).toBeNull()
  })

  it('should refresh the report after each append', async () => {
    store.onAppend(markdownExporter(redisTarget, selectel))

    await store.append(
      { cloud: 'selectel', infra: record().infra, config: record().config },
      testUtils.createTrialResult()
    )

    const content = await fs.readFile(path.join(dir, 'RESULTS_REDIS_SELECTEL.md'), 'utf-8')
    expect(content.split('\n')[8]).toBe('| 1 | - | single 1x 4cpu/16GB | maxmemory_policy=allkeys-lru | 90000 | - | - | 10.74 | 8378 |')
  })
})
