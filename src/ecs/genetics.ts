import type { TraitKey, TraitRanges, Traits } from '@/types/sim'
import { randRange, type RNG } from '@/utils/rand'

export const TRAIT_KEYS: readonly TraitKey[] = ['speed', 'size', 'sight']

// Bit positions in a creature's mutation mask.
export const TRAIT_INDEX: Record<TraitKey, number> = {
  speed: 0,
  size: 1,
  sight: 2,
}

export function markTraitMutation(mask: number, trait: TraitKey): number {
  return mask | (1 << TRAIT_INDEX[trait])
}

export function randomTraits(rng: RNG, ranges: TraitRanges): Traits {
  return {
    speed: randRange(rng, ranges.speed.min, ranges.speed.max),
    size: randRange(rng, ranges.size.min, ranges.size.max),
    sight: randRange(rng, ranges.sight.min, ranges.sight.max),
  }
}

export interface Inheritance {
  traits: Traits
  mutationMask: number
}

/**
 * Builds a child's traits from two parents. Every trait independently comes from
 * either parent with equal odds, then with probability `mutationChance` gains an
 * additive bump drawn from that trait's spawn range. There is no upper cap, so a
 * lineage can keep drifting upward.
 *
 * Draw order per trait: parent pick, mutation roll, then the bump when it mutates.
 */
export function inheritTraits(
  parents: readonly [Traits, Traits],
  ranges: TraitRanges,
  mutationChance: number,
  rng: RNG,
): Inheritance {
  const traits: Traits = { speed: 0, size: 0, sight: 0 }
  let mutationMask = 0
  for (const trait of TRAIT_KEYS) {
    const donor = rng() < 0.5 ? parents[0] : parents[1]
    let value = donor[trait]
    if (rng() < mutationChance) {
      value += randRange(rng, ranges[trait].min, ranges[trait].max)
      mutationMask = markTraitMutation(mutationMask, trait)
    }
    traits[trait] = value
  }
  return { traits, mutationMask }
}
