import { addComponent, addEntity } from 'bitecs'
import type { IWorld } from 'bitecs'

import {
  CreatureMeta,
  Energy,
  FoodMeta,
  GenomeFlags,
  Heading,
  Intent,
  Position,
  TargetCode,
  Traits,
} from './components'

import type { CreatureState, FoodState, TargetRef, Vector3 } from '@/types/sim'

export interface EntityRegistry {
  world: IWorld
}

export function createRegistry(world: IWorld): EntityRegistry {
  return {
    world,
  }
}

export function spawnCreatureEntity(registry: EntityRegistry, state: CreatureState, energyDrain: number): number {
  const entity = addEntity(registry.world)
  addComponent(registry.world, Position, entity)
  addComponent(registry.world, Heading, entity)
  addComponent(registry.world, CreatureMeta, entity)
  addComponent(registry.world, Traits, entity)
  addComponent(registry.world, Energy, entity)
  addComponent(registry.world, Intent, entity)
  addComponent(registry.world, GenomeFlags, entity)

  hydrateCreatureEntity(entity, state, energyDrain)
  return entity
}

export function hydrateCreatureEntity(entity: number, state: CreatureState, energyDrain: number) {
  Position.x[entity] = state.position.x
  Position.y[entity] = state.position.y
  Position.z[entity] = state.position.z
  Heading.angle[entity] = state.heading
  CreatureMeta.id[entity] = state.id
  CreatureMeta.alive[entity] = 1
  Traits.speed[entity] = state.traits.speed
  Traits.size[entity] = state.traits.size
  Traits.sight[entity] = state.traits.sight
  Energy.value[entity] = state.energy
  Energy.drain[entity] = energyDrain
  Intent.targetType[entity] = state.target ? encodeTarget(state.target.kind) : TargetCode.None
  Intent.targetId[entity] = state.target?.id ?? 0
  Intent.mateId[entity] = state.mateId ?? 0
  GenomeFlags.mutationMask[entity] = state.mutationMask
}

export function serializeCreatureEntity(
  entity: number,
  offspring: readonly number[],
  origin: { parents: [number, number] | null; bornTick: number },
): CreatureState {
  const { parents } = origin
  return {
    id: CreatureMeta.id[entity],
    traits: {
      speed: Traits.speed[entity],
      size: Traits.size[entity],
      sight: Traits.sight[entity],
    },
    position: readPosition(entity),
    heading: Heading.angle[entity],
    energy: Energy.value[entity],
    target: decodeTarget(Intent.targetType[entity], Intent.targetId[entity]),
    mateId: Intent.mateId[entity] || null,
    offspring: [...offspring],
    parents: parents ? [parents[0], parents[1]] : null,
    bornTick: origin.bornTick,
    mutationMask: GenomeFlags.mutationMask[entity],
  }
}

export function spawnFoodEntity(registry: EntityRegistry, food: FoodState): number {
  const entity = addEntity(registry.world)
  addComponent(registry.world, Position, entity)
  addComponent(registry.world, FoodMeta, entity)

  Position.x[entity] = food.position.x
  Position.y[entity] = food.position.y
  Position.z[entity] = food.position.z
  FoodMeta.id[entity] = food.id
  FoodMeta.consumed[entity] = food.consumed ? 1 : 0

  return entity
}

export function serializeFoodEntity(entity: number): FoodState {
  return {
    id: FoodMeta.id[entity],
    position: readPosition(entity),
    consumed: FoodMeta.consumed[entity] === 1,
  }
}

export function readPosition(entity: number): Vector3 {
  return {
    x: Position.x[entity],
    y: Position.y[entity],
    z: Position.z[entity],
  }
}

function encodeTarget(kind: TargetRef['kind']): TargetCode {
  return kind === 'food' ? TargetCode.Food : TargetCode.Creature
}

function decodeTarget(code: number, id: number): TargetRef | null {
  switch (code) {
    case TargetCode.Food:
      return { kind: 'food', id }
    case TargetCode.Creature:
      return { kind: 'creature', id }
    default:
      return null
  }
}
