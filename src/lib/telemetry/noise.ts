import type { RandomSource } from '@/lib/random'

/** Adds proportional Gaussian jitter; metrics never go negative. */
export function addNoise(value: number, noisePercent: number, random: RandomSource): number {
  const noise = random.gaussian(0, value * noisePercent)
  return Math.max(0, value + noise)
}
