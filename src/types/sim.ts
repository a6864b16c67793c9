export interface Vector3 {
  x: number
  // Vertical axis. Creatures rest at half their size, food at `foodHeight`.
  y: number
  z: number
}

export const SNAPSHOT_VERSION = 1

export type TraitKey = 'speed' | 'size' | 'sight'

export interface Traits {
  speed: number
  size: number
  sight: number
}

export interface TraitRange {
  min: number
  max: number
}

export type TraitRanges = Record<TraitKey, TraitRange>

export interface WorldConfig {
  // Edge length of the square arena; coordinates live in [-worldSize / 2, worldSize / 2].
  worldSize: number
  creatureCount: number
  foodCount: number
  rngSeed: number
  // Spawn ranges for the initial population. Mutations add a draw from the same range.
  traitRanges: TraitRanges
  mutationChance: number
  startEnergy: number
  foodEnergy: number
  // Energy a creature must exceed to go courting; also a newborn's energy. Each parent pays half.
  mateEnergy: number
  speedFactor: number
  sizeFactor: number
  sightFactor: number
  // Standard deviation (radians) of the random turn taken when nothing is in sight.
  wanderTurnStdDev: number
  foodHeight: number
}

export const DEFAULT_WORLD_CONFIG: WorldConfig = {
  worldSize: 100,
  creatureCount: 20,
  foodCount: 40,
  rngSeed: 1,
  traitRanges: {
    speed: { min: 0.05, max: 0.15 },
    size: { min: 1, max: 2 },
    sight: { min: 15, max: 25 },
  },
  mutationChance: 0.05,
  startEnergy: 100,
  foodEnergy: 50,
  mateEnergy: 100,
  speedFactor: 1,
  sizeFactor: 1,
  sightFactor: 0.01,
  wanderTurnStdDev: Math.PI / 16,
  foodHeight: 0.25,
}

export type TargetKind = 'food' | 'creature'

export interface TargetRef {
  kind: TargetKind
  id: number
}

export interface CreatureState {
  id: number
  traits: Traits
  position: Vector3
  heading: number
  energy: number
  target: TargetRef | null
  mateId: number | null
  offspring: number[]
  parents: [number, number] | null
  bornTick: number
  mutationMask: number
}

export interface FoodState {
  id: number
  position: Vector3
  consumed: boolean
}

export interface SimulationStats {
  totalBirths: number
  totalDeaths: number
  mutations: number
}

export interface SimulationSnapshot {
  version: number
  config: WorldConfig
  tick: number
  creatures: CreatureState[]
  food: FoodState[]
  stats: SimulationStats
}

export interface CensusEntry {
  speed: number
  size: number
  sight: number
  childrenCount: number
  hasMate: boolean
}

export interface CensusRecord {
  tick: number
  entries: CensusEntry[]
}

export interface TickReport {
  tick: number
  census: CensusRecord
  births: number[]
  deaths: number[]
  foodReplaced: number
  population: number
  food: number
}
