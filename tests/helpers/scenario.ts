import {
  DEFAULT_WORLD_CONFIG,
  SNAPSHOT_VERSION,
  type CreatureState,
  type FoodState,
  type SimulationSnapshot,
  type Traits,
  type WorldConfig,
} from '../../src/types/sim'
import type { RNG } from '../../src/utils/rand'

export const scenarioConfig: WorldConfig = { ...DEFAULT_WORLD_CONFIG, rngSeed: 7 }

type CreatureOverrides = Partial<Omit<CreatureState, 'traits' | 'position'>> & {
  traits?: Partial<Traits>
  at?: { x: number; z: number }
}

export function creature(id: number, overrides: CreatureOverrides = {}): CreatureState {
  const { traits: traitPatch, at, ...rest } = overrides
  const traits: Traits = { speed: 0.1, size: 1, sight: 20, ...traitPatch }
  return {
    id,
    traits,
    position: { x: at?.x ?? 0, y: traits.size / 2, z: at?.z ?? 0 },
    heading: 0,
    energy: 100,
    target: null,
    mateId: null,
    offspring: [],
    parents: null,
    bornTick: 0,
    mutationMask: 0,
    ...rest,
  }
}

export function food(id: number, x: number, z: number, y = scenarioConfig.foodHeight): FoodState {
  return { id, position: { x, y, z }, consumed: false }
}

export function scenario(options: {
  creatures: CreatureState[]
  food: FoodState[]
  config?: Partial<WorldConfig>
  tick?: number
}): SimulationSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    config: { ...scenarioConfig, ...options.config },
    tick: options.tick ?? 0,
    creatures: options.creatures,
    food: options.food,
    stats: { totalBirths: 0, totalDeaths: 0, mutations: 0 },
  }
}

// Replays `values` in order, then repeats the last one.
export function scriptedRng(values: number[]): RNG {
  let index = 0
  return () => {
    const value = values[Math.min(index, values.length - 1)]
    index++
    return value
  }
}
