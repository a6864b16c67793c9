import { describe, expect, it } from 'vitest'

import { createWorldFromSnapshot, snapshotWorld, stepWorld } from '../src/ecs/world'
import { CreatureMeta, FoodMeta, Intent, TargetCode } from '../src/ecs/components'
import { perceive, selectTarget } from '../src/ecs/systems/perceptionSystem'
import type { SimulationContext } from '../src/ecs/types'
import { creature, food, scenario } from './helpers/scenario'

const entityOf = (ctx: SimulationContext, id: number) => {
  const entity = ctx.creatures.get(id)
  if (entity === undefined) throw new Error(`Creature ${id} missing`)
  return entity
}

const foodEntityOf = (ctx: SimulationContext, id: number) => {
  const entity = ctx.food.get(id)
  if (entity === undefined) throw new Error(`Food ${id} missing`)
  return entity
}

// Size 0.5 puts creatures at the same height as food, so distances are planar.
const small = { size: 0.5, sight: 10 }

describe('perceive', () => {
  it('finds the nearest food and never reports itself as a peer', () => {
    const ctx = createWorldFromSnapshot(
      scenario({ creatures: [creature(1, { traits: small })], food: [food(1, 7, 0), food(2, 3, 0)] }),
    )
    const perception = perceive(ctx, entityOf(ctx, 1))
    expect(perception.food?.id).toBe(2)
    expect(perception.food?.distance).toBe(3)
    expect(perception.peer).toBeNull()
  })

  it('keeps the first inserted candidate when distances tie', () => {
    const ctx = createWorldFromSnapshot(
      scenario({
        creatures: [
          creature(1, { traits: small }),
          creature(2, { traits: small, at: { x: 0, z: 4 } }),
          creature(3, { traits: small, at: { x: 0, z: -4 } }),
        ],
        food: [food(5, -3, 0), food(4, 3, 0)],
      }),
    )
    const perception = perceive(ctx, entityOf(ctx, 1))
    expect(perception.food?.id).toBe(5)
    expect(perception.peer?.id).toBe(2)
  })

  it('ignores dead creatures', () => {
    const ctx = createWorldFromSnapshot(
      scenario({
        creatures: [
          creature(1, { traits: small }),
          creature(2, { traits: small, at: { x: 0, z: 2 } }),
          creature(3, { traits: small, at: { x: 0, z: 6 } }),
        ],
        food: [food(1, 1, 0)],
      }),
    )
    CreatureMeta.alive[entityOf(ctx, 2)] = 0
    expect(perceive(ctx, entityOf(ctx, 1)).peer?.id).toBe(3)
  })

  it('still sees food eaten earlier in the tick', () => {
    const ctx = createWorldFromSnapshot(
      scenario({ creatures: [creature(1, { traits: small })], food: [food(1, 1, 0), food(2, 5, 0)] }),
    )
    FoodMeta.consumed[foodEntityOf(ctx, 1)] = 1
    expect(perceive(ctx, entityOf(ctx, 1)).food).toEqual({ id: 1, entity: foodEntityOf(ctx, 1), distance: 1 })
  })
})

describe('selectTarget', () => {
  it('heads for the nearer food and skips courtship when food is closer than the peer', () => {
    const ctx = createWorldFromSnapshot(
      scenario({
        creatures: [creature(1, { traits: small, energy: 150 }), creature(2, { traits: small, at: { x: 0, z: 5 } })],
        food: [food(1, 3, 0), food(2, 7, 0)],
      }),
    )
    const entity = entityOf(ctx, 1)
    const target = selectTarget(ctx, entity, perceive(ctx, entity))
    expect(target?.id).toBe(1)
    expect(Intent.targetType[entity]).toBe(TargetCode.Food)
    expect(Intent.mateId[entity]).toBe(0)
  })

  it('courts the nearer peer only with energy above the mating threshold', () => {
    const snapshot = (energy: number) =>
      scenario({
        creatures: [creature(1, { traits: small, energy }), creature(2, { traits: small, at: { x: 0, z: 2 } })],
        food: [food(1, 8, 0)],
      })

    const eager = createWorldFromSnapshot(snapshot(150))
    const eagerEntity = entityOf(eager, 1)
    expect(selectTarget(eager, eagerEntity, perceive(eager, eagerEntity))?.id).toBe(2)
    expect(Intent.mateId[eagerEntity]).toBe(2)
    expect(Intent.targetType[eagerEntity]).toBe(TargetCode.Creature)

    // Exactly the threshold is not enough.
    const tired = createWorldFromSnapshot(snapshot(100))
    const tiredEntity = entityOf(tired, 1)
    expect(selectTarget(tired, tiredEntity, perceive(tired, tiredEntity))?.id).toBe(1)
    expect(Intent.mateId[tiredEntity]).toBe(0)
  })

  it('clears target and mate when nothing is in sight', () => {
    const ctx = createWorldFromSnapshot(
      scenario({
        creatures: [
          creature(1, { traits: small, energy: 150, mateId: 2, target: { kind: 'creature', id: 2 } }),
          creature(2, { traits: small, at: { x: 0, z: 40 } }),
        ],
        food: [food(1, 30, 0)],
      }),
    )
    const entity = entityOf(ctx, 1)
    expect(Intent.mateId[entity]).toBe(2)
    expect(selectTarget(ctx, entity, perceive(ctx, entity))).toBeNull()
    expect(Intent.mateId[entity]).toBe(0)
    expect(Intent.targetType[entity]).toBe(TargetCode.None)
  })
})

describe('nearest-target scenario over a full tick', () => {
  it('steers toward the food three units away and records no mate', () => {
    const ctx = createWorldFromSnapshot(
      scenario({
        creatures: [
          creature(1, { traits: { ...small, speed: 0.1 }, energy: 150 }),
          creature(2, { traits: small, energy: 50, at: { x: 0, z: 5 } }),
        ],
        food: [food(1, 3, 0), food(2, 7, 0)],
      }),
    )
    const report = stepWorld(ctx)
    const seeker = snapshotWorld(ctx).creatures.find((c) => c.id === 1)
    if (!seeker) throw new Error('Creature missing')

    expect(seeker.target).toEqual({ kind: 'food', id: 1 })
    expect(seeker.mateId).toBeNull()
    expect(seeker.heading).toBeCloseTo(Math.PI / 2, 12)
    expect(seeker.position.x).toBeCloseTo(0.1, 12)
    expect(seeker.position.z).toBeCloseTo(0, 12)
    expect(report.census.entries[0].hasMate).toBe(false)
    expect(report.births).toEqual([])
  })
})
