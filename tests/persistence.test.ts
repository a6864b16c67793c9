import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import {
  createFileCensusSink,
  createMemoryCensusSink,
  formatSessionStamp,
  readCensusFile,
} from '../src/state/persistence'
import type { CensusRecord } from '../src/types/sim'

const records: CensusRecord[] = [
  { tick: 0, entries: [{ speed: 0.1, size: 1.5, sight: 20, childrenCount: 0, hasMate: false }] },
  {
    tick: 1,
    entries: [
      { speed: 0.1, size: 1.5, sight: 20, childrenCount: 1, hasMate: true },
      { speed: 0.12, size: 1.25, sight: 18, childrenCount: 0, hasMate: true },
    ],
  },
]

describe('formatSessionStamp', () => {
  it('formats the UTC start time with weekday, date and dashed clock', () => {
    expect(formatSessionStamp(new Date(Date.UTC(2026, 9, 19, 13, 5, 9)))).toBe('Mon_19-Oct-2026_13-05-09')
    expect(formatSessionStamp(new Date(Date.UTC(2024, 1, 29, 0, 0, 0)))).toBe('Thu_29-Feb-2024_00-00-00')
  })
})

describe('file census sink', () => {
  let directory = ''

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), 'census-'))
  })

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true })
  })

  it('creates an empty session file up front and appends one JSON line per record', () => {
    const sink = createFileCensusSink({ directory, startedAt: new Date(Date.UTC(2026, 9, 19, 13, 5, 9)) })
    expect(sink.path).toBe(join(directory, 'census_Mon_19-Oct-2026_13-05-09.jsonl'))
    expect(existsSync(sink.path)).toBe(true)
    expect(readFileSync(sink.path, 'utf-8')).toBe('')

    records.forEach((record) => sink.append(record))
    const lines = readFileSync(sink.path, 'utf-8').split('\n')
    expect(lines).toHaveLength(3)
    expect(lines[0]).toBe('{"tick":0,"entries":[{"speed":0.1,"size":1.5,"sight":20,"childrenCount":0,"hasMate":false}]}')
    expect(lines[2]).toBe('')
    expect(readCensusFile(sink.path)).toEqual(records)
  })

  it('names the offending line when a record is malformed', () => {
    const path = join(directory, 'broken.jsonl')
    writeFileSync(path, `${JSON.stringify(records[0])}\n{"tick":-1,"entries":[]}\n`)
    expect(() => readCensusFile(path)).toThrow(
      `Census file ${path} line 2: Invalid census record: tick: Number must be greater than or equal to 0`,
    )
  })
})

describe('memory census sink', () => {
  it('keeps records in append order', () => {
    const sink = createMemoryCensusSink()
    records.forEach((record) => sink.append(record))
    expect(sink.records).toEqual(records)
  })
})
