import { Types, defineComponent } from 'bitecs'

export enum TargetCode {
  None = 0,
  Food = 1,
  Creature = 2,
}

// All scalar state is f64 so energy bookkeeping stays exact across ticks.
export const Position = defineComponent({
  x: Types.f64,
  y: Types.f64,
  z: Types.f64,
})

export const Heading = defineComponent({
  angle: Types.f64,
})

export const CreatureMeta = defineComponent({
  id: Types.ui32,
  alive: Types.ui8,
})

export const Traits = defineComponent({
  speed: Types.f64,
  size: Types.f64,
  sight: Types.f64,
})

export const Energy = defineComponent({
  value: Types.f64,
  // Per-tick cost, fixed at spawn from the traits.
  drain: Types.f64,
})

// Decision output for the current tick; cleared and recomputed every step.
export const Intent = defineComponent({
  targetType: Types.ui8,
  targetId: Types.ui32,
  mateId: Types.ui32,
})

export const GenomeFlags = defineComponent({
  mutationMask: Types.ui8,
})

export const FoodMeta = defineComponent({
  id: Types.ui32,
  consumed: Types.ui8,
})
