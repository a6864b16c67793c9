import type { IWorld } from 'bitecs'

import type { CensusRecord, Traits, WorldConfig } from '@/types/sim'
import type { RNG } from '@/utils/rand'
import type { EntityRegistry } from './registry'

export interface SimulationMetrics {
  births: number
  deaths: number
  mutations: number
}

export interface CensusSink {
  append(record: CensusRecord): void
}

// Historical entry for every creature ever spawned; survives the creature's death.
export interface LineageRecord {
  id: number
  traits: Traits
  parents: [number, number] | null
  bornTick: number
  diedTick: number | null
}

export interface SimulationContext {
  world: IWorld
  registry: EntityRegistry
  config: WorldConfig
  // Half of `config.worldSize`; every coordinate is clamped into [-half, half].
  half: number
  tick: number
  rng: RNG
  // id -> entity, in spawn order. Iteration order is the tie-break for equal distances.
  creatures: Map<number, number>
  food: Map<number, number>
  lineage: Map<number, LineageRecord>
  offspring: Map<number, number[]>
  nextCreatureId: number
  nextFoodId: number
  metrics: SimulationMetrics
  censusSink: CensusSink | null
}

export interface WorldOptions {
  rng?: RNG
  censusSink?: CensusSink
}
