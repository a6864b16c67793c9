import type { SimulationContext } from '../types'

export interface FoodHooks {
  removeFood(id: number): void
  spawnFood(): number
}

// Swaps every item eaten this tick for a fresh one so the food count never changes between ticks.
export function foodSystem(ctx: SimulationContext, eaten: ReadonlySet<number>, hooks: FoodHooks): number {
  let replaced = 0
  eaten.forEach((id) => {
    if (!ctx.food.has(id)) return
    hooks.removeFood(id)
    hooks.spawnFood()
    replaced++
  })
  return replaced
}
