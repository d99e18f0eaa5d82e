import seedrandom from 'seedrandom'

/**
 * A value-scoped pseudo-random stream. Every generator in the telemetry
 * engine receives one of these explicitly, so two evaluations never share
 * state and the same seed always replays the same sequence.
 */
export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number
  uniform(min: number, max: number): number
  /** Uniform integer in [min, max], both ends inclusive. */
  int(min: number, max: number): number
  gaussian(mean: number, sd: number): number
  pick<T>(items: readonly [T, ...T[]]): T
}

export function createRandomSource(seed: number | string): RandomSource {
  const prng = seedrandom(String(seed))

  const next = () => prng()

  return {
    next,
    uniform: (min, max) => min + (max - min) * next(),
    int: (min, max) => min + Math.floor(next() * (max - min + 1)),
    gaussian: (mean, sd) => {
      // Box-Muller
      let u = 0
      let v = 0
      while (u === 0) u = next()
      while (v === 0) v = next()
      return mean + sd * Math.sqrt(-2.0 * Math.log(u)) * Math.cos(2 * Math.PI * v)
    },
    pick: (items) => items[Math.floor(next() * items.length)],
  }
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits
  return Math.round(value * factor) / factor
}
