import type { MetricWindow, OutlierSeverity } from '@/types/telemetry'

export interface ChartPoint {
  timestamp: string
  value: number
}

export interface OutlierMarker {
  timestamp: string
  value: number
  severity: OutlierSeverity
}

export function toChartPoints(timestamps: readonly string[], window: MetricWindow): ChartPoint[] {
  const length = Math.min(timestamps.length, window.values.length)
  return timestamps.slice(0, length).map((timestamp, i) => ({ timestamp, value: window.values[i] }))
}

// Outliers can carry the uncapped sample, so the marker sits on the plotted value.
export function toOutlierMarkers(timestamps: readonly string[], window: MetricWindow): OutlierMarker[] {
  return window.outliers
    .filter((o) => o.index < timestamps.length && o.index < window.values.length)
    .map((o) => ({ timestamp: timestamps[o.index], value: window.values[o.index], severity: o.severity }))
}
