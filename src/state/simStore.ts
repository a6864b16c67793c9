import { derived, writable, type Readable } from 'svelte/store'

import type { TickReport } from '@/types/sim'

export interface SimStats {
  tick: number
  population: number
  food: number
  births: number
  deaths: number
  courting: number
}

export interface SimStore {
  latestReport: Readable<TickReport | null>
  simStats: Readable<SimStats>
  record(report: TickReport): void
  reset(): void
}

export function createSimStore(): SimStore {
  const latestReport = writable<TickReport | null>(null)
  const totals = writable({ births: 0, deaths: 0 })

  const simStats = derived([latestReport, totals], ([$report, $totals]): SimStats => {
    if (!$report) {
      return { tick: 0, population: 0, food: 0, births: $totals.births, deaths: $totals.deaths, courting: 0 }
    }
    return {
      tick: $report.tick,
      population: $report.population,
      food: $report.food,
      births: $totals.births,
      deaths: $totals.deaths,
      courting: $report.census.entries.filter((entry) => entry.hasMate).length,
    }
  })

  return {
    latestReport: { subscribe: latestReport.subscribe },
    simStats,
    record(report) {
      totals.update((current) => ({
        births: current.births + report.births.length,
        deaths: current.deaths + report.deaths.length,
      }))
      latestReport.set(report)
    },
    reset() {
      totals.set({ births: 0, deaths: 0 })
      latestReport.set(null)
    },
  }
}
