import { initWorld, stepWorld } from '../src/ecs/world'
import { createHistoryStore } from '../src/state/historyStore'
import { DEFAULT_WORLD_CONFIG, type WorldConfig } from '../src/types/sim'
import { get } from 'svelte/store'

type ProbeResult = {
  label: string
  ticks: number
  population: number
  avgSpeed: number
  avgSize: number
  avgSight: number
}

function runProbe(label: string, patch: Partial<WorldConfig>, steps = 20_000): ProbeResult {
  const ctx = initWorld({ ...DEFAULT_WORLD_CONFIG, rngSeed: 1337, ...patch })
  const history = createHistoryStore(1)

  for (let i = 0; i < steps; i++) {
    if (ctx.creatures.size === 0) break
    const report = stepWorld(ctx)
    history.record(report.census)
    if ((i + 1) % 2000 === 0) {
      console.log(`[${label}] tick=${report.tick} population=${report.population} births=${ctx.metrics.births} deaths=${ctx.metrics.deaths}`)
    }
  }

  const last = get(history).at(-1)
  return {
    label,
    ticks: ctx.tick,
    population: ctx.creatures.size,
    avgSpeed: last?.avgSpeed ?? 0,
    avgSize: last?.avgSize ?? 0,
    avgSight: last?.avgSight ?? 0,
  }
}

const results: ProbeResult[] = [
  runProbe('baseline', {}),
  runProbe('scarce-food', { foodCount: 15 }),
  runProbe('high-mutation', { mutationChance: 0.3 }),
]

for (const r of results) {
  console.log(
    [
      r.label.padEnd(14),
      `ticks=${r.ticks}`,
      `population=${r.population}`,
      `avgSpeed=${r.avgSpeed.toFixed(3)}`,
      `avgSize=${r.avgSize.toFixed(2)}`,
      `avgSight=${r.avgSight.toFixed(1)}`,
    ].join(' '),
  )
}
