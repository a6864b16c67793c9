import { Energy, FoodMeta, Traits } from '../components'
import type { SimulationContext } from '../types'
import type { Sighting } from './perceptionSystem'

// Eats the nearest food when it lies within the creature's body radius.
// The item is only flagged here; the world swaps it for a fresh one at the end of the tick.
export function forage(ctx: SimulationContext, entity: number, food: Sighting | null): number | null {
  if (!food) return null
  if (food.distance > Traits.size[entity] / 2) return null
  Energy.value[entity] += ctx.config.foodEnergy
  FoodMeta.consumed[food.entity] = 1
  return food.id
}
