import { get, writable, type Readable } from 'svelte/store'

import type { CensusRecord } from '@/types/sim'

export interface TraitSample {
  tick: number
  population: number
  avgSpeed: number
  avgSize: number
  avgSight: number
  courting: number
  avgChildren: number
}

const MAX_POINTS = 400

export interface HistoryStore extends Readable<TraitSample[]> {
  record(census: CensusRecord): void
  reset(): void
  toCSV(): string
}

export function historyToCSV(samples: readonly TraitSample[]): string {
  const header = ['tick', 'population', 'avgSpeed', 'avgSize', 'avgSight', 'courting', 'avgChildren'].join(',')
  const rows = samples.map((sample) =>
    [
      sample.tick,
      sample.population,
      sample.avgSpeed.toFixed(4),
      sample.avgSize.toFixed(3),
      sample.avgSight.toFixed(2),
      sample.courting,
      sample.avgChildren.toFixed(2),
    ].join(','),
  )
  return [header, ...rows].join('\n')
}

export function summarizeCensus(census: CensusRecord): TraitSample | null {
  if (census.entries.length === 0) return null
  const totals = census.entries.reduce(
    (acc, entry) => {
      acc.speed += entry.speed
      acc.size += entry.size
      acc.sight += entry.sight
      acc.children += entry.childrenCount
      acc.courting += entry.hasMate ? 1 : 0
      return acc
    },
    { speed: 0, size: 0, sight: 0, children: 0, courting: 0 },
  )
  const count = census.entries.length
  return {
    tick: census.tick,
    population: count,
    avgSpeed: totals.speed / count,
    avgSize: totals.size / count,
    avgSight: totals.sight / count,
    courting: totals.courting,
    avgChildren: totals.children / count,
  }
}

export function createHistoryStore(maxPoints = MAX_POINTS): HistoryStore {
  const history = writable<TraitSample[]>([])
  return {
    subscribe: history.subscribe,
    record(census) {
      const next = summarizeCensus(census)
      if (!next) return
      history.update((current) => {
        const updated = [...current, next]
        if (updated.length > maxPoints) {
          updated.shift()
        }
        return updated
      })
    },
    reset() {
      history.set([])
    },
    toCSV() {
      return historyToCSV(get(history))
    },
  }
}
