import { createRandomSource, roundTo, type RandomSource } from '@/lib/random'
import type { HistoricalPeriod, HistoricalStats } from '@/types/telemetry'

interface FactorRange {
  average: [number, number]
  peak: [number, number]
}

export const HISTORY_FACTORS: Readonly<Record<HistoricalPeriod, FactorRange>> = Object.freeze({
  month: { average: [0.92, 1.08], peak: [1.1, 1.35] },
  week: { average: [0.95, 1.05], peak: [1.05, 1.2] },
})

export const HISTORY_SEED = 100

const EMPTY_STATS: HistoricalStats = { average: 0, peak: 0 }

function meanAndMax(values: readonly number[]): { mean: number; max: number } {
  let sum = 0
  let max = Number.NEGATIVE_INFINITY
  for (const value of values) {
    sum += value
    if (value > max) max = value
  }
  return { mean: sum / values.length, max }
}

/** True average and peak of independently sourced history. */
export function computeHistoricalStats(values: readonly number[]): HistoricalStats {
  if (values.length === 0) return { ...EMPTY_STATS }
  const { mean, max } = meanAndMax(values)
  return { average: roundTo(mean, 2), peak: roundTo(max, 2) }
}

/**
 * Models reference lines from the current window when no history exists.
 * Both factors are drawn once per call from the period's range.
 */
export function estimateHistoricalStats(
  values: readonly number[],
  period: HistoricalPeriod,
  random: RandomSource
): HistoricalStats {
  if (values.length === 0) return { ...EMPTY_STATS }

  const { mean, max } = meanAndMax(values)
  const factors = HISTORY_FACTORS[period]
  const averageFactor = random.uniform(...factors.average)
  const peakFactor = random.uniform(...factors.peak)

  return {
    average: roundTo(mean * averageFactor, 2),
    peak: roundTo(max * peakFactor, 2),
  }
}

export interface HistoricalStatsOptions {
  history?: readonly number[]
  seed?: number
}

export function getHistoricalStats(
  values: readonly number[],
  period: HistoricalPeriod = 'month',
  { history, seed = HISTORY_SEED }: HistoricalStatsOptions = {}
): HistoricalStats {
  if (history && history.length > 0) {
    return computeHistoricalStats(history)
  }
  return estimateHistoricalStats(values, period, createRandomSource(seed))
}
