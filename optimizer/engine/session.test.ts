import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { Mock } from 'vitest'
import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import { OptimizationSession } from './session.js'
import type { DeploymentLifecycle, SessionOptions } from './session.js'
import { TrialOrchestrator } from './trial_orchestrator.js'
import type { TrialRunner } from './trial_orchestrator.js'
import { SpaceResolver } from './space_resolver.js'
import { SearchDriver } from './search_driver.js'
import { RandomOracle } from './oracles/random_oracle.js'
import { StudyStorageError } from './errors.js'
import { StudyStore } from '../services/study/store.js'
import { ResultStore } from '../services/results/store.js'
import { getCloudProfile } from '../services/pricing/clouds.js'
import { redisTarget } from '../targets/redis.js'

const selectel = getCloudProfile('selectel')
const endpoints = { serviceHost: '10.0.0.10', benchmarkHost: '203.0.113.5', nodeHosts: ['10.0.0.10'] }

describe('OptimizationSession', () => {
  let dir: string
  let store: StudyStore
  let results: ResultStore
  let ensure: Mock<DeploymentLifecycle['ensure']>
  let teardown: Mock<DeploymentLifecycle['teardown']>
  let run: Mock<TrialRunner['run']>

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cloudtune-session-'))
    store = new StudyStore(':memory:')
    store.initialize()
    results = new ResultStore({ service: 'redis', primaryMetric: 'ops_per_sec', resultsDir: dir })
    ensure = vi.fn<DeploymentLifecycle['ensure']>().mockResolvedValue({ endpoints, timings: {} })
    teardown = vi.fn<DeploymentLifecycle['teardown']>().mockResolvedValue(undefined)
    run = vi.fn<TrialRunner['run']>().mockResolvedValue(testUtils.createTrialResult())
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(async () => {
    store.close()
    await fs.rm(dir, { recursive: true, force: true })
  })

  const createSession = async (overrides: Partial<SessionOptions> = {}) => {
    const driver = await SearchDriver.open(
      store,
      new RandomOracle(7),
      { service: 'redis', cloud: 'selectel', mode: 'full', metric: 'ops_per_sec' },
      'maximize'
    )
    const resolver = new SpaceResolver({ target: redisTarget, profile: selectel, mode: 'full' })
    const broker = { ensure, teardown }
    const orchestrator = new TrialOrchestrator({
      target: redisTarget,
      profile: selectel,
      mode: 'full',
      metric: 'ops_per_sec',
      resolver,
      results,
      broker,
      executor: { run },
      workload: { duration_s: 60, clients: 50, threads: 4 }
    })
    return new OptimizationSession({ driver, orchestrator, resolver, results, broker, trials: 3, ...overrides })
  }

  it('should run every trial and tear the deployment down once', async () => {
    const summary = await (await createSession()).run()

    expect(summary.attempted).toBe(3)
    expect(summary.scored + summary.cacheHits).toBe(3)
    expect(summary.pruned).toBe(0)
    expect(summary.best?.value).toBe(90000)
    expect(teardown).toHaveBeenCalledTimes(1)
  })

  it('should count pruned trials and keep going', async () => {
    run.mockResolvedValue(testUtils.createTrialResult({
      metrics: {},
      error: { kind: 'BenchmarkExecutionError', message: 'exit code 1' }
    }))

    const summary = await (await createSession({ trials: 2 })).run()

    expect(summary.attempted).toBe(2)
    expect(summary.pruned).toBe(2)
    expect(summary.best).toBeNull()
  })

  it('should warm-start from cached results that fit the space', async () => {
    await results.append(
      {
        cloud: 'selectel',
        infra: { topology: 'single', nodes: 1, cpu: 4, ram_gb: 16 },
        config: { maxmemory_policy: 'allkeys-lru', io_threads: 2, persistence: 'none' }
      },
      testUtils.createTrialResult({ metrics: { ops_per_sec: 120000 } })
    )
    await results.append(
      { cloud: 'timeweb', infra: { cpu: 4, ram_gb: 16 }, config: {} },
      testUtils.createTrialResult()
    )

    const summary = await (await createSession({ trials: 0 })).run()

    expect(summary.seeded).toBe(1)
    expect(summary.best?.value).toBe(120000)
    expect(summary.best?.params.ram_gb_cpu4).toBe(16)
  })

  it('should tear down when a fatal error stops the loop', async () => {
    ensure.mockRejectedValue(new StudyStorageError('disk full'))

    await expect((await createSession()).run()).rejects.toThrow('disk full')
    expect(teardown).toHaveBeenCalledTimes(1)
  })

  it('should keep the loop error when the oracle fails to close', async () => {
    vi.spyOn(RandomOracle.prototype, 'close').mockRejectedValue(new Error('bridge exited with code 1'))
    ensure.mockRejectedValue(new StudyStorageError('disk full'))

    await expect((await createSession()).run()).rejects.toThrow('disk full')
    expect(teardown).toHaveBeenCalledTimes(1)
    expect(console.warn).toHaveBeenCalledWith('⚠️ Search oracle did not close cleanly', {
      message: 'Search oracle did not close cleanly',
      context: { study: expect.any(Number), error: 'Oracle failed to close oracle: bridge exited with code 1' }
    })
  })

  it('should keep the deployment with noDestroy', async () => {
    await (await createSession({ trials: 1, noDestroy: true })).run()
    expect(teardown).not.toHaveBeenCalled()
  })

  it('should stop before the next trial once aborted', async () => {
    const controller = new AbortController()
    controller.abort()

    await expect((await createSession({ signal: controller.signal })).run()).rejects.toThrow()
    expect(ensure).not.toHaveBeenCalled()
    expect(teardown).toHaveBeenCalledTimes(1)
  })
})
