import type { Traits, WorldConfig } from '@/types/sim'

type DrainFactors = Pick<WorldConfig, 'speedFactor' | 'sizeFactor' | 'sightFactor'>

// Kinetic-style upkeep: bigger and faster bodies pay steeply, sight costs linearly.
export function energyDrainFor(traits: Traits, factors: DrainFactors): number {
  const size = traits.size * factors.sizeFactor
  const speed = traits.speed * factors.speedFactor
  return 0.5 * size ** 3 * speed ** 2 + traits.sight * factors.sightFactor
}
