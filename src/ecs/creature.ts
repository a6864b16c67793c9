import { Intent } from './components'
import type { SimulationContext } from './types'
import { drainEnergy, resolveDeath } from './systems/metabolismSystem'
import { perceive, selectTarget } from './systems/perceptionSystem'
import { forage } from './systems/forageSystem'
import { advance, steer } from './systems/movementSystem'

export interface CreatureStepResult {
  consumedFoodId: number | null
  mateId: number | null
  died: boolean
}

/**
 * One creature's turn. Creatures act one after another, so a creature sees the
 * positions its predecessors moved to this tick and never sees food they already ate.
 */
export function stepCreature(ctx: SimulationContext, entity: number): CreatureStepResult {
  drainEnergy(entity)
  const perception = perceive(ctx, entity)
  const target = selectTarget(ctx, entity, perception)
  const consumedFoodId = forage(ctx, entity, perception.food)
  steer(ctx, entity, target)
  advance(ctx, entity)
  const died = resolveDeath(entity)
  return {
    consumedFoodId,
    mateId: Intent.mateId[entity] || null,
    died,
  }
}
