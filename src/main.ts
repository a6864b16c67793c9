import { writeFileSync } from 'node:fs'
import { get } from 'svelte/store'

import { readRuntimeOptions } from '@/config/runtimeOptions'
import { initWorld } from '@/ecs/world'
import { createTerminalStage } from '@/render/terminalStage'
import { createSimulationLoop } from '@/runner'
import { createHistoryStore } from '@/state/historyStore'
import { createFileCensusSink } from '@/state/persistence'
import { createSimStore } from '@/state/simStore'
import { DEFAULT_WORLD_CONFIG, type WorldConfig } from '@/types/sim'

const CLEAR_SCREEN = '\x1b[H\x1b[2J'

async function main() {
  const options = readRuntimeOptions()
  const config: WorldConfig = {
    ...DEFAULT_WORLD_CONFIG,
    rngSeed: Date.now() % 2 ** 31,
    ...options.world,
  }

  const censusSink = createFileCensusSink({ directory: options.censusDirectory, startedAt: new Date() })
  const world = initWorld(config, { censusSink })
  const history = createHistoryStore()
  const sim = createSimStore()

  console.info(`[sim] seed ${config.rngSeed}, census -> ${censusSink.path}`)

  const loop = createSimulationLoop(world, {
    fps: options.fps,
    maxTicks: options.maxTicks,
    logEvery: options.logEvery,
    renderer: options.render
      ? createTerminalStage({
          columns: options.columns,
          rows: options.rows,
          write: (text) => process.stdout.write(CLEAR_SCREEN + text),
        })
      : null,
    onTick: (report) => {
      sim.record(report)
      history.record(report.census)
    },
  })

  const close = () => loop.stop()
  process.once('SIGINT', close)
  process.once('SIGTERM', close)

  const outcome = await loop.start()
  process.off('SIGINT', close)
  process.off('SIGTERM', close)

  const historyPath = censusSink.path.replace(/\.jsonl$/, '.history.csv')
  writeFileSync(historyPath, history.toCSV())
  const stats = get(sim.simStats)
  console.info(
    `[sim] stopped (${outcome.reason}) after ${outcome.ticks} ticks: population=${stats.population} births=${stats.births} deaths=${stats.deaths}`,
  )
  console.info(`[sim] trait history -> ${historyPath}`)
}

main().catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
