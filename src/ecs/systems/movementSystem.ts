import { Heading, Position, Traits } from '../components'
import type { SimulationContext } from '../types'
import type { Sighting } from './perceptionSystem'

import { clamp } from '@/utils/math'
import { gaussian } from '@/utils/rand'

// Heading is measured from +z toward +x, so a step is (sin, cos) on the horizontal plane.
export function steer(ctx: SimulationContext, entity: number, target: Sighting | null) {
  if (target) {
    const dx = Position.x[target.entity] - Position.x[entity]
    const dz = Position.z[target.entity] - Position.z[entity]
    Heading.angle[entity] = Math.atan2(dx, dz)
    return
  }
  Heading.angle[entity] += ctx.config.wanderTurnStdDev * gaussian(ctx.rng)
}

export function advance(ctx: SimulationContext, entity: number) {
  const speed = Traits.speed[entity]
  const angle = Heading.angle[entity]
  const half = ctx.half
  Position.x[entity] = clamp(Position.x[entity] + speed * Math.sin(angle), -half, half)
  Position.y[entity] = clamp(Traits.size[entity] / 2, -half, half)
  Position.z[entity] = clamp(Position.z[entity] + speed * Math.cos(angle), -half, half)
}
