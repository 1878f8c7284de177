import { describe, it, expect } from 'vitest'
import { processEnvMappings, setNestedValue, mergeDeep, transforms } from './env-config.js'

describe('env-config', () => {
  it('should set nested values creating intermediate objects', () => {
    const target: Record<string, unknown> = {}
    setNestedValue(target, ['oracle', 'seed'], 7)
    expect(target).toEqual({ oracle: { seed: 7 } })
  })

  it('should only map variables that are set', () => {
    const config = processEnvMappings(
      [
        { envVar: 'CT_SEED', configPath: ['oracle', 'seed'], transform: transforms.int },
        { envVar: 'CT_SAMPLER', configPath: ['oracle', 'sampler'] },
        { envVar: 'CT_STRICT', configPath: ['ssh', 'strict'], transform: transforms.boolean }
      ],
      { CT_SEED: '42', CT_STRICT: 'yes' }
    )

    expect(config).toEqual({ oracle: { seed: 42 }, ssh: { strict: true } })
  })

  it('should merge records and replace scalars and arrays', () => {
    const merged = mergeDeep(
      { a: { x: 1, y: 2 }, list: [1, 2], keep: 'v' },
      { a: { y: 3 }, list: [9] }
    )
    expect(merged).toEqual({ a: { x: 1, y: 3 }, list: [9], keep: 'v' })
  })
})
