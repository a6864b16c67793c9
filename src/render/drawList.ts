import { CreatureMeta, Traits } from '@/ecs/components'
import { readPosition } from '@/ecs/registry'
import type { SimulationContext } from '@/ecs/types'
import type { DrawFrame, DrawRequest } from '@/types/render'

export const PALETTE = {
  ground: '#505050',
  creature: '#e62937',
  food: '#0079f1',
} as const

export const FOOD_RADIUS = 0.5
const GROUND_LEVEL = -0.5

export function buildDrawList(ctx: SimulationContext): DrawFrame {
  const requests: DrawRequest[] = [
    {
      kind: 'plane',
      center: { x: 0, y: GROUND_LEVEL, z: 0 },
      size: { x: ctx.config.worldSize, z: ctx.config.worldSize },
      color: PALETTE.ground,
    },
  ]

  ctx.creatures.forEach((entity) => {
    if (CreatureMeta.alive[entity] === 0) return
    requests.push({
      kind: 'cube',
      position: readPosition(entity),
      edge: Traits.size[entity],
      color: PALETTE.creature,
    })
  })

  ctx.food.forEach((entity) => {
    requests.push({
      kind: 'sphere',
      position: readPosition(entity),
      radius: FOOD_RADIUS,
      color: PALETTE.food,
    })
  })

  return {
    tick: ctx.tick,
    worldSize: ctx.config.worldSize,
    requests,
  }
}
