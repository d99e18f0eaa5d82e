import { getOutlierThreshold } from '@/config/settings'
import type { PerformanceData } from '@/types/performance'
import type { PlatformId } from '@/types/platforms'
import type { MetricWindow, ThresholdPair } from '@/types/telemetry'

export interface MetricPanel {
  key: string
  title: string
  unit: string
  window: MetricWindow
  threshold: Readonly<ThresholdPair>
  capacity?: number
}

type PanelSpec = [key: string, title: string, unit: string, window: MetricWindow]

/** Chart panels for a platform payload, in display order. */
export function describePanels(platform: PlatformId, data: PerformanceData): MetricPanel[] {
  let specs: PanelSpec[]
  let capacity: number | undefined

  if ('machines' in data) {
    specs = [
      ['users', 'Active Users', '', data.aggregated.users],
      ['memory_percent', 'Memory', '%', data.aggregated.memory_percent],
      ['cpu_percent', 'CPU', '%', data.aggregated.cpu_percent],
      ['load_time_sec', 'Load Time', 's', data.aggregated.load_time_sec],
    ]
  } else if ('memory_capacity' in data) {
    capacity = data.memory_capacity
    specs = [
      ['memory_tb', 'Memory Usage', ' TB', data.memory_tb],
      ['users', 'Active Users', '', data.users],
      ['cpu_percent', 'CPU', '%', data.cpu_percent],
      ['load_time_sec', 'Load Time', 's', data.load_time_sec],
    ]
  } else {
    specs = [
      ['users', 'Active Users', '', data.users],
      ['pipelines_failed', 'Failed Pipelines', '', data.failed_pipelines],
      ['pipelines_delayed', 'Delayed Pipelines', '', data.delayed_pipelines],
      ['tickets_overdue', 'Overdue Tickets', '', data.overdue_tickets],
    ]
  }

  return specs.map(([key, title, unit, window]) => ({
    key,
    title,
    unit,
    window,
    threshold: getOutlierThreshold(platform, key),
    ...(key === 'memory_tb' && capacity !== undefined ? { capacity } : {}),
  }))
}
