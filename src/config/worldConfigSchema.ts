import { z } from 'zod'

import type { CensusRecord, SimulationSnapshot, WorldConfig } from '@/types/sim'
import { SNAPSHOT_VERSION } from '@/types/sim'
import { SimulationConfigError } from '@/ecs/errors'

const finite = z.number().finite()
const positive = finite.positive()

const traitRangeSchema = z
  .object({ min: positive, max: positive })
  .refine((range) => range.min <= range.max, { message: 'min must not exceed max' })

export const worldConfigSchema = z.object({
  worldSize: positive,
  creatureCount: z.number().int().min(1),
  foodCount: z.number().int().min(1),
  rngSeed: z.number().int(),
  traitRanges: z.object({
    speed: traitRangeSchema,
    size: traitRangeSchema,
    sight: traitRangeSchema,
  }),
  mutationChance: finite.min(0).max(1),
  startEnergy: positive,
  foodEnergy: finite.min(0),
  mateEnergy: positive,
  speedFactor: finite.min(0),
  sizeFactor: finite.min(0),
  sightFactor: finite.min(0),
  wanderTurnStdDev: finite.min(0),
  foodHeight: finite,
}) satisfies z.ZodType<WorldConfig>

const vector3Schema = z.object({ x: finite, y: finite, z: finite })

const creatureStateSchema = z.object({
  id: z.number().int().positive(),
  traits: z.object({ speed: positive, size: positive, sight: positive }),
  position: vector3Schema,
  heading: finite,
  energy: finite,
  target: z
    .object({ kind: z.enum(['food', 'creature']), id: z.number().int().positive() })
    .nullable(),
  mateId: z.number().int().positive().nullable(),
  offspring: z.array(z.number().int().positive()),
  parents: z.tuple([z.number().int().positive(), z.number().int().positive()]).nullable(),
  bornTick: z.number().int().min(0),
  mutationMask: z.number().int().min(0),
})

const foodStateSchema = z.object({
  id: z.number().int().positive(),
  position: vector3Schema,
  consumed: z.boolean(),
})

export const snapshotSchema = z
  .object({
    version: z.literal(SNAPSHOT_VERSION),
    config: worldConfigSchema,
    tick: z.number().int().min(0),
    creatures: z.array(creatureStateSchema).min(1),
    food: z.array(foodStateSchema).min(1),
    stats: z.object({
      totalBirths: z.number().int().min(0),
      totalDeaths: z.number().int().min(0),
      mutations: z.number().int().min(0),
    }),
  })
  .refine((snapshot) => new Set(snapshot.creatures.map((c) => c.id)).size === snapshot.creatures.length, {
    message: 'creature ids must be unique',
    path: ['creatures'],
  })
  .refine((snapshot) => new Set(snapshot.food.map((f) => f.id)).size === snapshot.food.length, {
    message: 'food ids must be unique',
    path: ['food'],
  }) satisfies z.ZodType<SimulationSnapshot>

export const censusRecordSchema = z.object({
  tick: z.number().int().min(0),
  entries: z.array(
    z.object({
      speed: finite,
      size: finite,
      sight: finite,
      childrenCount: z.number().int().min(0),
      hasMate: z.boolean(),
    }),
  ),
}) satisfies z.ZodType<CensusRecord>

export function parseWorldConfig(input: unknown): WorldConfig {
  const result = worldConfigSchema.safeParse(input)
  if (!result.success) {
    throw new SimulationConfigError('world config', result.error.issues)
  }
  return result.data
}

export function parseSnapshot(input: unknown): SimulationSnapshot {
  const result = snapshotSchema.safeParse(input)
  if (!result.success) {
    throw new SimulationConfigError('snapshot', result.error.issues)
  }
  return result.data
}

export function parseCensusRecord(input: unknown): CensusRecord {
  const result = censusRecordSchema.safeParse(input)
  if (!result.success) {
    throw new SimulationConfigError('census record', result.error.issues)
  }
  return result.data
}
