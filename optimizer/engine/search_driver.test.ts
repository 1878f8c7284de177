import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { SearchDriver, dependentName } from './search_driver.js'
import { StudyStore } from '../services/study/store.js'
import type { StudyIdentity } from '../services/study/store.js'
import { RandomOracle } from './oracles/random_oracle.js'
import type { SearchOracle } from './oracles/types.js'
import { InvalidParameterSpaceError, StudyStorageError } from './errors.js'

const identity: StudyIdentity = { service: 'redis', cloud: 'selectel', mode: 'infra', metric: 'ops_per_sec' }

function fixedOracle(value: number | string): SearchOracle {
  return {
    name: 'fixed',
    open: vi.fn().mockResolvedValue(undefined),
    suggest: vi.fn().mockResolvedValue(value),
    report: vi.fn().mockResolvedValue(undefined),
    learn: vi.fn().mockResolvedValue(undefined),
    close: vi.fn().mockResolvedValue(undefined)
  }
}

describe('SearchDriver', () => {
  let store: StudyStore

  beforeEach(() => {
    store = new StudyStore(':memory:')
    store.initialize()
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    store.close()
  })

  it('should name dependent parameters after the parent value', () => {
    expect(dependentName('ram_gb', 'cpu', 16)).toBe('ram_gb_cpu16')
  })

  it('should resume a study and replay its completed trials', async () => {
    const first = await SearchDriver.open(store, new RandomOracle(), identity, 'maximize')
    const handle = await first.ask()
    await handle.suggestCategorical('cpu', [2, 4, 8])
    await first.tell(handle, { state: 'complete', value: 1000 }, 'key-a')

    const oracle = new RandomOracle()
    const open = vi.spyOn(oracle, 'open')
    const resumed = await SearchDriver.open(store, oracle, identity, 'maximize')

    expect(resumed.study.id).toBe(first.study.id)
    expect(open).toHaveBeenCalledWith('maximize', [
      {
        params: { cpu: handle.params.cpu },
        distributions: { cpu: { type: 'categorical', choices: [2, 4, 8] } },
        value: 1000
      }
    ])
  })

  it('should refuse to resume with a different direction', async () => {
    await SearchDriver.open(store, new RandomOracle(), identity, 'maximize')
    await expect(SearchDriver.open(store, new RandomOracle(), identity, 'minimize'))
      .rejects.toThrow(InvalidParameterSpaceError)
  })

  it('should only sample from the filtered dependent choices', async () => {
    const driver = await SearchDriver.open(store, new RandomOracle(5), identity, 'maximize')

    for (let i = 0; i < 10; i++) {
      const handle = await driver.ask()
      const ram = await handle.suggestDependent('ram_gb', 'cpu', 16, [32])
      expect(ram).toBe(32)
      expect(handle.distributions).toEqual({ ram_gb_cpu16: { type: 'categorical', choices: [32] } })
      await driver.tell(handle, { state: 'complete', value: i + 1 })
    }
  })

  it('should treat a redefined value set as fatal', async () => {
    const driver = await SearchDriver.open(store, new RandomOracle(), identity, 'maximize')
    const a = await driver.ask()
    await a.suggestCategorical('ram_gb', [4, 8, 16, 32])
    await driver.tell(a, { state: 'complete', value: 1 })

    const b = await driver.ask()
    await expect(b.suggestCategorical('ram_gb', [32])).rejects.toThrow(InvalidParameterSpaceError)
  })

  it('should reject an empty choice list before asking the oracle', async () => {
    const oracle = fixedOracle(4)
    const driver = await SearchDriver.open(store, oracle, identity, 'maximize')
    const handle = await driver.ask()

    await expect(handle.suggestCategorical('ram_gb_cpu32', [])).rejects.toThrow(InvalidParameterSpaceError)
    expect(oracle.suggest).not.toHaveBeenCalled()
  })

  it('should reject oracle answers outside the distribution', async () => {
    const driver = await SearchDriver.open(store, fixedOracle(64), identity, 'maximize')
    const handle = await driver.ask()

    await expect(handle.suggestCategorical('cpu', [2, 4])).rejects.toThrow(StudyStorageError)
  })

  it('should wrap oracle crashes as storage errors', async () => {
    const oracle = fixedOracle(4)
    vi.mocked(oracle.suggest).mockRejectedValue(new Error('bridge died'))
    const driver = await SearchDriver.open(store, oracle, identity, 'maximize')
    const handle = await driver.ask()

    await expect(handle.suggestInt('io_threads', 1, 4)).rejects.toThrow('Oracle failed to suggest: bridge died')
  })

  it('should close the oracle when it fails to start', async () => {
    const oracle = fixedOracle(4)
    vi.mocked(oracle.open).mockRejectedValue(new Error('optuna is not installed'))

    await expect(SearchDriver.open(store, oracle, identity, 'maximize'))
      .rejects.toThrow('Oracle failed to open oracle: optuna is not installed')
    expect(oracle.close).toHaveBeenCalledTimes(1)
  })

  it('should store each distribution once per study', async () => {
    const register = vi.spyOn(store, 'registerDistribution')
    const driver = await SearchDriver.open(store, fixedOracle(4), identity, 'maximize')

    for (let i = 0; i < 3; i++) {
      const handle = await driver.ask()
      await handle.suggestCategorical('cpu', [2, 4])
      await driver.tell(handle, { state: 'complete', value: i + 1 })
    }

    expect(register).toHaveBeenCalledTimes(1)
  })

  it('should return the same value when a trial asks twice', async () => {
    const oracle = fixedOracle(4)
    const driver = await SearchDriver.open(store, oracle, identity, 'maximize')
    const handle = await driver.ask()

    expect(await handle.suggestCategorical('cpu', [2, 4])).toBe(4)
    expect(await handle.suggestCategorical('cpu', [2, 4])).toBe(4)
    expect(oracle.suggest).toHaveBeenCalledTimes(1)
  })

  it('should fail trials left running by a crashed process', async () => {
    const first = await SearchDriver.open(store, new RandomOracle(), identity, 'maximize')
    await first.ask()

    const resumed = await SearchDriver.open(store, new RandomOracle(), identity, 'maximize')
    const [trial] = resumed.trials()
    expect(trial.state).toBe('fail')
  })

  it('should record pruned trials with their reason and report them', async () => {
    const oracle = fixedOracle(2)
    const driver = await SearchDriver.open(store, oracle, identity, 'maximize')
    const handle = await driver.ask()
    await handle.suggestCategorical('cpu', [2, 4])

    await driver.tell(handle, { state: 'pruned', reason: 'ProvisioningError: quota exceeded' })

    const [trial] = driver.trials()
    expect(trial.state).toBe('pruned')
    expect(trial.note).toBe('ProvisioningError: quota exceeded')
    expect(oracle.report).toHaveBeenCalledWith(0, { state: 'pruned', reason: 'ProvisioningError: quota exceeded' })
  })

  it('should warm start from history once per cache key', async () => {
    const oracle = fixedOracle(2)
    const driver = await SearchDriver.open(store, oracle, identity, 'maximize')
    const entry = {
      params: { cpu: 4 },
      distributions: { cpu: { type: 'categorical' as const, choices: [2, 4] } },
      value: 500,
      cacheKey: 'key-b'
    }

    expect(await driver.seedHistory([entry])).toBe(1)
    expect(await driver.seedHistory([entry])).toBe(0)
    expect(oracle.learn).toHaveBeenCalledTimes(1)
    expect(driver.trials()[0].note).toBe('history')
  })

  it('should pick the best trial according to direction', async () => {
    const driver = await SearchDriver.open(store, fixedOracle(2), { ...identity, metric: 'p99_latency_ms' }, 'minimize')
    for (const value of [3.2, 1.1, 2.5]) {
      const handle = await driver.ask()
      await driver.tell(handle, { state: 'complete', value })
    }

    expect(driver.bestTrial()?.value).toBe(1.1)
  })
})
