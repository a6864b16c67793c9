import type { Vector3 } from './sim'

export type DrawRequest =
  | { kind: 'plane'; center: Vector3; size: { x: number; z: number }; color: string }
  | { kind: 'cube'; position: Vector3; edge: number; color: string }
  | { kind: 'sphere'; position: Vector3; radius: number; color: string }

export interface DrawFrame {
  tick: number
  worldSize: number
  requests: DrawRequest[]
}

export interface RenderSink {
  render(frame: DrawFrame): void
}
