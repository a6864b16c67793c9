import type { Vector3 } from '@/types/sim'

export const distanceSquared = (a: Vector3, b: Vector3) => {
  const dx = a.x - b.x
  const dy = a.y - b.y
  const dz = a.z - b.z
  return dx * dx + dy * dy + dz * dz
}

export const distance = (a: Vector3, b: Vector3) => Math.sqrt(distanceSquared(a, b))

export const clamp = (value: number, min = 0, max = 1) => Math.min(max, Math.max(min, value))
