import { describe, it, expect } from 'vitest'
import { RandomOracle, sampleFrom } from './random_oracle.js'

describe('RandomOracle', () => {
  it('should be deterministic for a seed, trial and name', async () => {
    const a = new RandomOracle(7)
    const b = new RandomOracle(7)
    const distribution = { type: 'categorical' as const, choices: [2, 4, 8, 16] }

    const first = await a.suggest(3, 'cpu', distribution)
    const second = await b.suggest(3, 'cpu', distribution)

    expect(first).toBe(second)
    expect(distribution.choices).toContain(first)
  })

  it('should only ever return offered choices', async () => {
    const oracle = new RandomOracle(1)
    for (let trial = 0; trial < 50; trial++) {
      expect(await oracle.suggest(trial, 'ram_gb_cpu16', { type: 'categorical', choices: [32] })).toBe(32)
    }
  })

  it('should keep integers on the step grid and inside bounds', async () => {
    const oracle = new RandomOracle(3)
    for (let trial = 0; trial < 50; trial++) {
      const value = await oracle.suggest(trial, 'workers', { type: 'int', low: 2, high: 10, step: 2 })
      expect(typeof value).toBe('number')
      expect([2, 4, 6, 8, 10]).toContain(value)
    }
  })
})

describe('sampleFrom', () => {
  it('should map the unit interval onto categorical choices', () => {
    const distribution = { type: 'categorical' as const, choices: ['a', 'b', 'c', 'd'] }
    expect(sampleFrom(distribution, 0)).toBe('a')
    expect(sampleFrom(distribution, 0.5)).toBe('c')
    expect(sampleFrom(distribution, 0.999)).toBe('d')
  })

  it('should snap floats to a step', () => {
    expect(sampleFrom({ type: 'float', low: 1, high: 2, step: 0.5 }, 0.6)).toBe(1.5)
  })

  it('should stay within bounds on a log scale', () => {
    expect(sampleFrom({ type: 'int', low: 16, high: 1024, log: true }, 0)).toBe(16)
    expect(sampleFrom({ type: 'int', low: 16, high: 1024, log: true }, 0.5)).toBe(128)
  })
})
