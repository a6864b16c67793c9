import { CreatureMeta, Energy, Intent, Position, Traits } from '../components'
import { inheritTraits } from '../genetics'
import { readPosition } from '../registry'
import type { SimulationContext } from '../types'

import type { Traits as TraitValues } from '@/types/sim'
import { distance } from '@/utils/math'

export interface ReproductionHooks {
  spawnOffspring(
    traits: TraitValues,
    position: { x: number; z: number },
    options: { parents: [number, number]; mutationMask: number },
  ): number
}

const readTraits = (entity: number): TraitValues => ({
  speed: Traits.speed[entity],
  size: Traits.size[entity],
  sight: Traits.sight[entity],
})

export function inMatingRange(entity: number, mateEntity: number) {
  const reach = (Traits.size[entity] + Traits.size[mateEntity]) / 2
  return distance(readPosition(entity), readPosition(mateEntity)) < reach
}

const pairKey = (a: number, b: number) => (a < b ? `${a}:${b}` : `${b}:${a}`)

/**
 * Resolves courtships chosen during the creature pass, in pass order. Every
 * creature whose chosen mate is alive and within reach produces a child, so a
 * popular creature can parent several in one tick. A pair that picked each
 * other produces a single child. Returns the ids of the newborns.
 */
export function reproductionSystem(
  ctx: SimulationContext,
  order: readonly number[],
  hooks: ReproductionHooks,
): number[] {
  const births: number[] = []
  const paired = new Set<string>()
  const cost = ctx.config.mateEnergy / 2

  order.forEach((id) => {
    const entity = ctx.creatures.get(id)
    if (entity === undefined || CreatureMeta.alive[entity] === 0) return
    const mateId = Intent.mateId[entity]
    if (!mateId || paired.has(pairKey(id, mateId))) return
    const mateEntity = ctx.creatures.get(mateId)
    if (mateEntity === undefined || CreatureMeta.alive[mateEntity] === 0) return
    if (!inMatingRange(entity, mateEntity)) return

    const { traits, mutationMask } = inheritTraits(
      [readTraits(entity), readTraits(mateEntity)],
      ctx.config.traitRanges,
      ctx.config.mutationChance,
      ctx.rng,
    )
    // Newborns appear where the initiating parent stands.
    const childId = hooks.spawnOffspring(
      traits,
      { x: Position.x[entity], z: Position.z[entity] },
      { parents: [id, mateId], mutationMask },
    )

    Energy.value[entity] -= cost
    Energy.value[mateEntity] -= cost
    recordOffspring(ctx, id, childId)
    recordOffspring(ctx, mateId, childId)
    paired.add(pairKey(id, mateId))
    births.push(childId)
  })

  return births
}

function recordOffspring(ctx: SimulationContext, parentId: number, childId: number) {
  const list = ctx.offspring.get(parentId)
  if (list) {
    list.push(childId)
  } else {
    ctx.offspring.set(parentId, [childId])
  }
}
