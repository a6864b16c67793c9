import { CreatureMeta, Energy } from '../components'

export function drainEnergy(entity: number) {
  Energy.value[entity] -= Energy.drain[entity]
}

// Marks the creature dead once its energy is spent. Returns true when it died this call.
export function resolveDeath(entity: number): boolean {
  if (CreatureMeta.alive[entity] === 0) return false
  if (Energy.value[entity] > 0) return false
  CreatureMeta.alive[entity] = 0
  return true
}

