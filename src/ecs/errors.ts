import type { ZodIssue } from 'zod'

export class SimulationConfigError extends Error {
  readonly issues: ZodIssue[]

  constructor(subject: string, issues: ZodIssue[]) {
    const detail = issues
      .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ')
    super(`Invalid ${subject}: ${detail}`)
    this.name = 'SimulationConfigError'
    this.issues = issues
  }
}

// Thrown when a tick is requested for a world with no living creatures.
export class ExtinctionError extends Error {
  readonly tick: number

  constructor(tick: number) {
    super(`Population is extinct at tick ${tick}`)
    this.name = 'ExtinctionError'
    this.tick = tick
  }
}
