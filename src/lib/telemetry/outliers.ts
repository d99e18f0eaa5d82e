import type { RandomSource } from '@/lib/random'
import type { InjectedOutliers, MetricWindow, Outlier, ThresholdPair } from '@/types/telemetry'

/**
 * Multiplies a random subset of samples by `magnitude` to simulate spikes.
 * Only used when there is no real history to draw from. The input array is
 * left untouched.
 */
export function injectOutliers(
  values: readonly number[],
  chance: number,
  magnitude: number,
  random: RandomSource
): InjectedOutliers {
  const result = [...values]
  const indices: number[] = []
  for (let i = 0; i < result.length; i++) {
    if (random.next() < chance) {
      result[i] = result[i] * magnitude
      indices.push(i)
    }
  }
  return { values: result, indices }
}

export function detectOutliers(
  values: readonly number[],
  threshold: Partial<ThresholdPair> = {}
): Outlier[] {
  const critical = threshold.critical ?? Number.POSITIVE_INFINITY
  const warning = threshold.warning ?? Number.POSITIVE_INFINITY
  const outliers: Outlier[] = []

  values.forEach((value, index) => {
    if (value >= critical) {
      outliers.push({ index, value, severity: 'critical' })
    } else if (value >= warning) {
      outliers.push({ index, value, severity: 'warning' })
    }
  })

  return outliers
}

export function buildMetricWindow(
  values: readonly number[],
  threshold?: Partial<ThresholdPair>
): MetricWindow {
  return {
    values: [...values],
    outliers: threshold ? detectOutliers(values, threshold) : [],
  }
}
