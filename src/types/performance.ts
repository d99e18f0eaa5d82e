import type { AggregatedMetrics, MachineOutliers, MachineSeries } from './machines'
import type { MetricWindow } from './telemetry'

export interface GenerationOptions {
  hours?: number
  intervalMinutes?: number
  now?: Date
  seed?: number
}

export interface DataLakePerformance {
  timestamps: string[]
  users: MetricWindow
  total_pipelines: MetricWindow
  failed_pipelines: MetricWindow
  delayed_pipelines: MetricWindow
  open_tickets: MetricWindow
  overdue_tickets: MetricWindow
}

export interface WarehousePerformance {
  timestamps: string[]
  users: MetricWindow
  memory_tb: MetricWindow
  memory_capacity: number
  load_time_sec: MetricWindow
  cpu_percent: MetricWindow
}

export interface MultiMachinePerformance {
  timestamps: string[]
  machines: Record<string, MachineSeries>
  machine_outliers: Record<string, MachineOutliers>
  aggregated: AggregatedMetrics
}

export type PerformanceData = DataLakePerformance | WarehousePerformance | MultiMachinePerformance

export interface TicketHistory {
  timestamps: string[]
  open_tickets: MetricWindow
  overdue_tickets: MetricWindow
  current_count: number
  breached_count: number
}

export interface PipelineSummary {
  successful: number
  delayed: number
  failed: number
  not_applicable: number
  total: number
}
