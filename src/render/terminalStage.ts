import type { DrawFrame, DrawRequest, RenderSink } from '@/types/render'
import { clamp } from '@/utils/math'

export interface TerminalStageOptions {
  columns: number
  rows: number
  write: (text: string) => void
}

const GLYPHS: Record<DrawRequest['kind'], { glyph: string; priority: number }> = {
  plane: { glyph: '.', priority: 0 },
  sphere: { glyph: 'o', priority: 1 },
  cube: { glyph: '#', priority: 2 },
}

/**
 * Top-down projection of a frame onto a character grid: x runs along columns,
 * z along rows, height is ignored. Creatures win over food in a shared cell.
 */
export function rasterize(frame: DrawFrame, columns: number, rows: number): string[] {
  const half = frame.worldSize / 2
  const grid: { glyph: string; priority: number }[][] = Array.from({ length: rows }, () =>
    Array.from({ length: columns }, () => ({ glyph: ' ', priority: -1 })),
  )
  const toCell = (value: number, cells: number) =>
    clamp(Math.floor(((value + half) / frame.worldSize) * cells), 0, cells - 1)

  frame.requests.forEach((request) => {
    const style = GLYPHS[request.kind]
    if (request.kind === 'plane') {
      grid.forEach((row) =>
        row.forEach((cell) => {
          if (cell.priority < style.priority) Object.assign(cell, style)
        }),
      )
      return
    }
    const cell = grid[toCell(request.position.z, rows)][toCell(request.position.x, columns)]
    if (cell.priority < style.priority) Object.assign(cell, style)
  })

  return grid.map((row) => row.map((cell) => cell.glyph).join(''))
}

export function createTerminalStage(options: TerminalStageOptions): RenderSink {
  return {
    render(frame) {
      const creatures = frame.requests.filter((request) => request.kind === 'cube').length
      const food = frame.requests.filter((request) => request.kind === 'sphere').length
      const header = `tick ${frame.tick} | creatures ${creatures} | food ${food}`
      options.write([header, ...rasterize(frame, options.columns, options.rows)].join('\n') + '\n')
    },
  }
}
