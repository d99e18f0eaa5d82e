export type OutlierSeverity = 'warning' | 'critical'

export interface TimeSeries {
  timestamps: string[]
  values: number[]
}

export interface Outlier {
  readonly index: number
  readonly value: number
  readonly severity: OutlierSeverity
}

export interface MetricWindow {
  values: number[]
  outliers: Outlier[]
}

export interface ThresholdPair {
  warning: number
  critical: number
}

export type HistoricalPeriod = 'week' | 'month'

export interface HistoricalStats {
  average: number
  peak: number
}

export interface InjectedOutliers {
  values: number[]
  indices: number[]
}
