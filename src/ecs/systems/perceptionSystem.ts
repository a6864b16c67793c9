import { CreatureMeta, Energy, Intent, TargetCode, Traits } from '../components'
import { readPosition } from '../registry'
import type { SimulationContext } from '../types'

import type { Vector3 } from '@/types/sim'
import { distance } from '@/utils/math'

export interface Sighting {
  id: number
  entity: number
  distance: number
}

export interface Perception {
  food: Sighting | null
  peer: Sighting | null
}

// Linear scan; a strict `<` keeps the earliest candidate on equal distances.
function nearest(
  origin: Vector3,
  candidates: Map<number, number>,
  accept: (entity: number) => boolean = () => true,
): Sighting | null {
  let best: Sighting | null = null
  for (const [id, entity] of candidates) {
    if (!accept(entity)) continue
    const d = distance(origin, readPosition(entity))
    if (best === null || d < best.distance) {
      best = { id, entity, distance: d }
    }
  }
  return best
}

// Food eaten earlier in the tick stays visible (and edible) until the world replaces it.
export function perceive(ctx: SimulationContext, entity: number): Perception {
  const origin = readPosition(entity)
  return {
    food: nearest(origin, ctx.food),
    peer: nearest(
      origin,
      ctx.creatures,
      (candidate) => candidate !== entity && CreatureMeta.alive[candidate] === 1,
    ),
  }
}

/**
 * Chooses this tick's target and writes it to `Intent`. Courtship wins only when a
 * peer is closer than the nearest food and the creature can afford a child;
 * otherwise anything in sight means heading for food. Nothing in sight clears both
 * the target and the mate candidate.
 */
export function selectTarget(ctx: SimulationContext, entity: number, perception: Perception): Sighting | null {
  const sight = Traits.sight[entity]
  const foodDistance = perception.food?.distance ?? Infinity
  const peerDistance = perception.peer?.distance ?? Infinity

  Intent.targetType[entity] = TargetCode.None
  Intent.targetId[entity] = 0
  Intent.mateId[entity] = 0

  if (foodDistance > sight && peerDistance > sight) return null

  if (perception.peer && foodDistance > peerDistance && Energy.value[entity] > ctx.config.mateEnergy) {
    Intent.targetType[entity] = TargetCode.Creature
    Intent.targetId[entity] = perception.peer.id
    Intent.mateId[entity] = perception.peer.id
    return perception.peer
  }

  if (!perception.food) return null
  Intent.targetType[entity] = TargetCode.Food
  Intent.targetId[entity] = perception.food.id
  return perception.food
}

