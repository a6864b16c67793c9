import { appendFileSync, readFileSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'

import type { CensusSink } from '@/ecs/types'
import type { CensusRecord } from '@/types/sim'
import { parseCensusRecord } from '@/config/worldConfigSchema'

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat']
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec']

const pad = (value: number) => value.toString().padStart(2, '0')

// UTC, e.g. `Mon_19-Oct-2026_13-05-09`; dashes instead of colons keep the name portable.
export function formatSessionStamp(date: Date): string {
  return [
    WEEKDAYS[date.getUTCDay()],
    `${pad(date.getUTCDate())}-${MONTHS[date.getUTCMonth()]}-${date.getUTCFullYear()}`,
    `${pad(date.getUTCHours())}-${pad(date.getUTCMinutes())}-${pad(date.getUTCSeconds())}`,
  ].join('_')
}

export interface MemoryCensusSink extends CensusSink {
  readonly records: readonly CensusRecord[]
}

export function createMemoryCensusSink(): MemoryCensusSink {
  const records: CensusRecord[] = []
  return {
    records,
    append(record) {
      records.push(record)
    },
  }
}

export interface FileCensusSink extends CensusSink {
  readonly path: string
}

/**
 * Append-only JSON-lines census file, one record per tick. The file is created
 * (empty) as soon as the sink is, so a session leaves a file even if it never ticks.
 */
export function createFileCensusSink(options: { directory: string; startedAt: Date }): FileCensusSink {
  const path = join(options.directory, `census_${formatSessionStamp(options.startedAt)}.jsonl`)
  writeFileSync(path, '')
  return {
    path,
    append(record) {
      appendFileSync(path, `${JSON.stringify(record)}\n`)
    },
  }
}

export function readCensusFile(path: string): CensusRecord[] {
  return readFileSync(path, 'utf-8')
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .map((line, index) => {
      try {
        return parseCensusRecord(JSON.parse(line))
      } catch (error) {
        throw new Error(`Census file ${path} line ${index + 1}: ${error instanceof Error ? error.message : String(error)}`)
      }
    })
}
