import type { RandomSource } from '@/lib/random'

/** Deterministic stand-in: every draw returns the same point of its range. */
export function stubRandom(z = 0, unit = 0.5): RandomSource {
  return {
    next: () => unit,
    uniform: (min, max) => min + (max - min) * unit,
    int: (min, max) => min + Math.floor(unit * (max - min + 1)),
    gaussian: (mean, sd) => mean + sd * z,
    pick: (items) => items[Math.floor(unit * items.length)],
  }
}
