import { describe, expect, it } from 'vitest'

import { readRuntimeOptions } from '../src/config/runtimeOptions'

describe('readRuntimeOptions', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(readRuntimeOptions({})).toEqual({
      fps: 60,
      maxTicks: 0,
      logEvery: 60,
      censusDirectory: '.',
      render: true,
      columns: 60,
      rows: 30,
      world: {},
    })
  })

  it('reads loop settings and world overrides', () => {
    const options = readRuntimeOptions({
      SIM_FPS: '30',
      SIM_MAX_TICKS: '500',
      SIM_LOG_EVERY: '10',
      SIM_CENSUS_DIR: '/tmp/census',
      SIM_RENDER: '0',
      SIM_COLUMNS: '80',
      SIM_ROWS: '40',
      SIM_WORLD_SIZE: '50',
      SIM_CREATURES: '12',
      SIM_FOOD: '25',
      SIM_SEED: '42',
      SIM_MUTATION_CHANCE: '0.2',
    })
    expect(options).toEqual({
      fps: 30,
      maxTicks: 500,
      logEvery: 10,
      censusDirectory: '/tmp/census',
      render: false,
      columns: 80,
      rows: 40,
      world: { worldSize: 50, creatureCount: 12, foodCount: 25, rngSeed: 42, mutationChance: 0.2 },
    })
  })

  it('ignores unparseable numbers and clamps to the minimums', () => {
    const options = readRuntimeOptions({
      SIM_FPS: 'fast',
      SIM_MAX_TICKS: '-4',
      SIM_LOG_EVERY: '0',
      SIM_COLUMNS: '2',
      SIM_ROWS: '1',
      SIM_SEED: 'abc',
      SIM_RENDER: 'true',
    })
    expect(options.fps).toBe(60)
    expect(options.maxTicks).toBe(0)
    expect(options.logEvery).toBe(1)
    expect(options.columns).toBe(8)
    expect(options.rows).toBe(4)
    expect(options.render).toBe(true)
    expect(options.world).toEqual({})
  })
})
