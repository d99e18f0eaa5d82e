import type { PlatformStatus } from './platforms'
import type { MetricWindow } from './telemetry'

export type MachineMetric = 'users' | 'memory_percent' | 'cpu_percent'

export interface MachineRecord {
  name: string
  metrics: Record<MachineMetric, number[]>
}

export type MachineSeries = Record<MachineMetric, number[]>

export interface MachineConfig {
  count: number
  prefix: string
}

export interface MachineOutliers {
  memory: MetricWindow['outliers']
  cpu: MetricWindow['outliers']
}

export interface AggregatedMetrics {
  users: MetricWindow
  memory_percent: MetricWindow
  load_time_sec: MetricWindow
  cpu_percent: MetricWindow
}

export interface MachineHealth {
  name: string
  status: PlatformStatus
  memoryPercent: number
  cpuPercent: number
}
