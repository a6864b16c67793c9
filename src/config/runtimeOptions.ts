import type { WorldConfig } from '@/types/sim'

export interface RuntimeOptions {
  fps: number
  // 0 means run until closed.
  maxTicks: number
  logEvery: number
  censusDirectory: string
  render: boolean
  columns: number
  rows: number
  world: Partial<Pick<WorldConfig, 'worldSize' | 'creatureCount' | 'foodCount' | 'rngSeed' | 'mutationChance'>>
}

type Env = Record<string, string | undefined>

const parseFlag = (value: string | undefined, fallback = false) =>
  value === undefined ? fallback : value === '1' || value === 'true'

const parseNumber = (value: string | undefined, fallback: number) => {
  if (value === undefined || value.trim() === '') return fallback
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : fallback
}

const optionalNumber = (value: string | undefined) => {
  if (value === undefined || value.trim() === '') return undefined
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : undefined
}

export function readRuntimeOptions(env: Env = process.env): RuntimeOptions {
  const world: RuntimeOptions['world'] = {}
  const worldSize = optionalNumber(env.SIM_WORLD_SIZE)
  const creatureCount = optionalNumber(env.SIM_CREATURES)
  const foodCount = optionalNumber(env.SIM_FOOD)
  const rngSeed = optionalNumber(env.SIM_SEED)
  const mutationChance = optionalNumber(env.SIM_MUTATION_CHANCE)
  if (worldSize !== undefined) world.worldSize = worldSize
  if (creatureCount !== undefined) world.creatureCount = creatureCount
  if (foodCount !== undefined) world.foodCount = foodCount
  if (rngSeed !== undefined) world.rngSeed = rngSeed
  if (mutationChance !== undefined) world.mutationChance = mutationChance

  return {
    fps: Math.max(1, parseNumber(env.SIM_FPS, 60)),
    maxTicks: Math.max(0, Math.floor(parseNumber(env.SIM_MAX_TICKS, 0))),
    logEvery: Math.max(1, Math.floor(parseNumber(env.SIM_LOG_EVERY, 60))),
    censusDirectory: env.SIM_CENSUS_DIR ?? '.',
    render: parseFlag(env.SIM_RENDER, true),
    columns: Math.max(8, Math.floor(parseNumber(env.SIM_COLUMNS, 60))),
    rows: Math.max(4, Math.floor(parseNumber(env.SIM_ROWS, 30))),
    world,
  }
}
