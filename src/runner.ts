import { ExtinctionError } from '@/ecs/errors'
import type { SimulationContext } from '@/ecs/types'
import { stepWorld } from '@/ecs/world'
import { buildDrawList } from '@/render/drawList'
import type { RenderSink } from '@/types/render'
import type { TickReport } from '@/types/sim'

export type StopReason = 'closed' | 'completed' | 'extinct'

export interface LoopOutcome {
  reason: StopReason
  ticks: number
}

export interface SimulationLoopOptions {
  fps: number
  // 0 or undefined runs until `stop()`.
  maxTicks?: number
  logEvery?: number
  renderer?: RenderSink | null
  onTick?: (report: TickReport) => void
  log?: (message: string) => void
}

export interface SimulationLoop {
  start(): Promise<LoopOutcome>
  stop(): void
  frame(): TickReport | null
  readonly running: boolean
}

export function tickAndRender(ctx: SimulationContext, renderer: RenderSink | null): TickReport {
  const report = stepWorld(ctx)
  renderer?.render(buildDrawList(ctx))
  return report
}

export function createSimulationLoop(ctx: SimulationContext, options: SimulationLoopOptions): SimulationLoop {
  const frameMs = 1000 / Math.max(1, options.fps)
  const logEvery = Math.max(1, options.logEvery ?? 60)
  const maxTicks = options.maxTicks ?? 0
  const renderer = options.renderer ?? null
  const log = options.log ?? ((message: string) => console.info(`[sim] ${message}`))

  let loopHandle: ReturnType<typeof setTimeout> | null = null
  let loopActive = false
  let ticks = 0
  let pending: { promise: Promise<LoopOutcome>; resolve: (outcome: LoopOutcome) => void; reject: (error: unknown) => void } | null =
    null

  function settle(reason: StopReason) {
    loopActive = false
    if (loopHandle !== null) {
      clearTimeout(loopHandle)
      loopHandle = null
    }
    const current = pending
    pending = null
    current?.resolve({ reason, ticks })
  }

  function frame(): TickReport | null {
    let report: TickReport
    try {
      report = tickAndRender(ctx, renderer)
    } catch (error) {
      if (error instanceof ExtinctionError) {
        log(`Population extinct at tick ${error.tick}`)
        settle('extinct')
        return null
      }
      throw error
    }
    ticks++
    options.onTick?.(report)
    if (ticks % logEvery === 0) {
      log(`Population Size: ${report.population} (tick ${report.tick})`)
    }
    if (report.population === 0) {
      log(`Population extinct at tick ${report.tick}`)
      settle('extinct')
    } else if (maxTicks > 0 && ticks >= maxTicks) {
      settle('completed')
    }
    return report
  }

  function scheduleLoop() {
    if (!loopActive) return
    loopHandle = setTimeout(() => {
      loopHandle = null
      try {
        frame()
      } catch (error) {
        const current = pending
        pending = null
        loopActive = false
        current?.reject(error)
        return
      }
      scheduleLoop()
    }, frameMs)
  }

  return {
    start() {
      if (pending) return pending.promise
      let resolve: (outcome: LoopOutcome) => void = () => {}
      let reject: (error: unknown) => void = () => {}
      const promise = new Promise<LoopOutcome>((res, rej) => {
        resolve = res
        reject = rej
      })
      pending = { promise, resolve, reject }
      loopActive = true
      scheduleLoop()
      return promise
    },
    stop() {
      settle('closed')
    },
    frame,
    get running() {
      return loopActive
    },
  }
}
