import { createWorld, removeEntity } from 'bitecs'

import { CreatureMeta, GenomeFlags, Traits } from './components'
import {
  createRegistry,
  serializeCreatureEntity,
  serializeFoodEntity,
  spawnCreatureEntity,
  spawnFoodEntity,
} from './registry'
import type { LineageRecord, SimulationContext, WorldOptions } from './types'
import { stepCreature } from './creature'
import { energyDrainFor } from './energy'
import { ExtinctionError } from './errors'
import { randomTraits } from './genetics'
import { reproductionSystem } from './systems/reproductionSystem'
import { foodSystem } from './systems/foodSystem'

import type {
  CensusEntry,
  CensusRecord,
  SimulationSnapshot,
  TickReport,
  Traits as TraitValues,
  WorldConfig,
} from '@/types/sim'
import { SNAPSHOT_VERSION } from '@/types/sim'
import { parseSnapshot, parseWorldConfig } from '@/config/worldConfigSchema'
import { mulberry32, randRange } from '@/utils/rand'

interface SpawnCreatureOptions {
  position?: { x: number; z: number }
  energy?: number
  parents?: [number, number]
  mutationMask?: number
}

function createContext(config: WorldConfig, options: WorldOptions): SimulationContext {
  const world = createWorld()
  return {
    world,
    registry: createRegistry(world),
    config,
    half: config.worldSize / 2,
    tick: 0,
    rng: options.rng ?? mulberry32(config.rngSeed),
    creatures: new Map(),
    food: new Map(),
    lineage: new Map(),
    offspring: new Map(),
    nextCreatureId: 1,
    nextFoodId: 1,
    metrics: { births: 0, deaths: 0, mutations: 0 },
    censusSink: options.censusSink ?? null,
  }
}

function cloneConfig(config: WorldConfig): WorldConfig {
  return {
    ...config,
    traitRanges: {
      speed: { ...config.traitRanges.speed },
      size: { ...config.traitRanges.size },
      sight: { ...config.traitRanges.sight },
    },
  }
}

export function initWorld(config: WorldConfig, options: WorldOptions = {}): SimulationContext {
  const ctx = createContext(parseWorldConfig(config), options)
  for (let i = 0; i < ctx.config.creatureCount; i++) {
    const position = randomPosition(ctx)
    spawnCreature(ctx, randomTraits(ctx.rng, ctx.config.traitRanges), { position })
  }
  for (let i = 0; i < ctx.config.foodCount; i++) {
    spawnFood(ctx)
  }
  return ctx
}

export function createWorldFromSnapshot(input: SimulationSnapshot, options: WorldOptions = {}): SimulationContext {
  const snapshot = parseSnapshot(input)
  const ctx = createContext(snapshot.config, options)
  ctx.tick = snapshot.tick

  snapshot.creatures.forEach((creature) => {
    const entity = spawnCreatureEntity(ctx.registry, creature, energyDrainFor(creature.traits, ctx.config))
    ctx.creatures.set(creature.id, entity)
    ctx.offspring.set(creature.id, [...creature.offspring])
    ctx.lineage.set(creature.id, {
      id: creature.id,
      traits: { ...creature.traits },
      parents: creature.parents,
      bornTick: creature.bornTick,
      diedTick: null,
    })
  })
  snapshot.food.forEach((food) => {
    ctx.food.set(food.id, spawnFoodEntity(ctx.registry, food))
  })

  // Ids referenced only through lineage must never be handed out again.
  const knownIds = snapshot.creatures.flatMap((creature) => [
    creature.id,
    ...creature.offspring,
    ...(creature.parents ?? []),
  ])
  ctx.nextCreatureId = Math.max(...knownIds, 0) + 1
  ctx.nextFoodId = Math.max(...snapshot.food.map((food) => food.id), 0) + 1
  ctx.metrics = {
    births: snapshot.stats.totalBirths,
    deaths: snapshot.stats.totalDeaths,
    mutations: snapshot.stats.mutations,
  }

  return ctx
}

/**
 * Advances the simulation by one tick: every living creature takes its turn in
 * spawn order, courting pairs in reach produce children, the dead are dropped, and
 * eaten food is replaced. The census for the tick goes to the context's sink.
 *
 * Children born this tick join the live set but are first stepped on the next tick.
 */
export function stepWorld(ctx: SimulationContext): TickReport {
  if (ctx.creatures.size === 0) {
    throw new ExtinctionError(ctx.tick)
  }

  const order = Array.from(ctx.creatures.entries())
  const entries: CensusEntry[] = []
  const eaten = new Set<number>()
  const deaths: number[] = []
  order.forEach(([id, entity]) => {
    if (CreatureMeta.alive[entity] === 0) return
    const result = stepCreature(ctx, entity)
    if (result.consumedFoodId !== null) eaten.add(result.consumedFoodId)
    if (result.died) deaths.push(id)
    entries.push(censusEntry(ctx, id, entity, result.mateId !== null))
  })

  const births = reproductionSystem(
    ctx,
    order.map(([id]) => id),
    {
      spawnOffspring: (traits, position, options) =>
        spawnCreature(ctx, traits, {
          position,
          energy: ctx.config.mateEnergy,
          parents: options.parents,
          mutationMask: options.mutationMask,
        }),
    },
  )

  deaths.forEach((id) => removeCreature(ctx, id))

  const foodReplaced = foodSystem(ctx, eaten, {
    removeFood: (id) => removeFood(ctx, id),
    spawnFood: () => spawnFood(ctx),
  })

  const census: CensusRecord = { tick: ctx.tick, entries }
  ctx.censusSink?.append(census)

  const report: TickReport = {
    tick: ctx.tick,
    census,
    births,
    deaths,
    foodReplaced,
    population: ctx.creatures.size,
    food: ctx.food.size,
  }
  ctx.tick++
  return report
}

export function snapshotWorld(ctx: SimulationContext): SimulationSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    config: cloneConfig(ctx.config),
    tick: ctx.tick,
    creatures: Array.from(ctx.creatures.entries()).map(([id, entity]) =>
      serializeCreatureEntity(entity, offspringOf(ctx, id), {
        parents: ctx.lineage.get(id)?.parents ?? null,
        bornTick: ctx.lineage.get(id)?.bornTick ?? ctx.tick,
      }),
    ),
    food: Array.from(ctx.food.values()).map((entity) => serializeFoodEntity(entity)),
    stats: {
      totalBirths: ctx.metrics.births,
      totalDeaths: ctx.metrics.deaths,
      mutations: ctx.metrics.mutations,
    },
  }
}

export function offspringOf(ctx: SimulationContext, id: number): readonly number[] {
  return ctx.offspring.get(id) ?? []
}

export function lineageOf(ctx: SimulationContext, id: number): LineageRecord | undefined {
  return ctx.lineage.get(id)
}

export function isExtinct(ctx: SimulationContext) {
  return ctx.creatures.size === 0
}

function censusEntry(ctx: SimulationContext, id: number, entity: number, hasMate: boolean): CensusEntry {
  return {
    speed: Traits.speed[entity],
    size: Traits.size[entity],
    sight: Traits.sight[entity],
    childrenCount: offspringOf(ctx, id).length,
    hasMate,
  }
}

function randomPosition(ctx: SimulationContext) {
  return {
    x: randRange(ctx.rng, -ctx.half, ctx.half),
    z: randRange(ctx.rng, -ctx.half, ctx.half),
  }
}

function spawnCreature(ctx: SimulationContext, traits: TraitValues, options: SpawnCreatureOptions = {}) {
  const id = ctx.nextCreatureId++
  const position = options.position ?? randomPosition(ctx)
  const entity = spawnCreatureEntity(
    ctx.registry,
    {
      id,
      traits,
      position: { x: position.x, y: traits.size / 2, z: position.z },
      heading: randRange(ctx.rng, 0, Math.PI * 2),
      energy: options.energy ?? ctx.config.startEnergy,
      target: null,
      mateId: null,
      offspring: [],
      parents: options.parents ?? null,
      bornTick: ctx.tick,
      mutationMask: options.mutationMask ?? 0,
    },
    energyDrainFor(traits, ctx.config),
  )
  ctx.creatures.set(id, entity)
  ctx.offspring.set(id, [])
  ctx.lineage.set(id, {
    id,
    traits: { ...traits },
    parents: options.parents ?? null,
    bornTick: ctx.tick,
    diedTick: null,
  })
  if (options.parents) {
    ctx.metrics.births++
    if (GenomeFlags.mutationMask[entity] !== 0) {
      ctx.metrics.mutations++
    }
  }
  return id
}

function spawnFood(ctx: SimulationContext) {
  const id = ctx.nextFoodId++
  const position = randomPosition(ctx)
  const entity = spawnFoodEntity(ctx.registry, {
    id,
    position: { x: position.x, y: ctx.config.foodHeight, z: position.z },
    consumed: false,
  })
  ctx.food.set(id, entity)
  return id
}

function removeFood(ctx: SimulationContext, id: number) {
  const entity = ctx.food.get(id)
  if (entity !== undefined) {
    removeEntity(ctx.world, entity)
  }
  ctx.food.delete(id)
}

function removeCreature(ctx: SimulationContext, id: number) {
  const entity = ctx.creatures.get(id)
  if (entity === undefined) return
  removeEntity(ctx.world, entity)
  ctx.creatures.delete(id)
  const record = ctx.lineage.get(id)
  if (record) {
    record.diedTick = ctx.tick
  }
  ctx.metrics.deaths++
}
