export type PlatformId = 'datalake' | 'warehouse' | 'analytics' | 'workflows'

export type MultiMachinePlatformId = Extract<PlatformId, 'analytics' | 'workflows'>

export type PlatformStatus = 'healthy' | 'attention' | 'critical'

export type PlatformTrend = 'rising' | 'stable' | 'falling'

export interface PlatformMetric {
  label: string
  value: string
  threshold?: string
}

export interface PlatformMetrics {
  primary: PlatformMetric
  secondary: PlatformMetric
  tertiary: PlatformMetric
}

export interface PlatformHealth {
  id: PlatformId
  name: string
  subtitle: string
  status: PlatformStatus
  statusLabel: string
  metrics: PlatformMetrics
  trend: PlatformTrend
}

export interface StatusLevel {
  healthy: number
  attention: number
}

export type StatusThresholds = Record<PlatformId, Record<string, StatusLevel>>

export interface ThreeTierRule {
  kind: 'three-tier'
  healthy: number
  attention: number
}

export interface TwoTierRule {
  kind: 'two-tier'
  limit: number
}

export type StatusRule = ThreeTierRule | TwoTierRule

export interface PlatformRules {
  datalake: { pipelineFailures: ThreeTierRule }
  warehouse: { memoryTb: ThreeTierRule }
  analytics: { openTickets: TwoTierRule }
  workflows: { openTickets: TwoTierRule }
}

export interface PlatformInputs {
  ticketCounts?: Partial<Record<PlatformId, number>>
  pipelineFailures?: number
  pipelineDelays?: number
  memoryTb?: number
  storageTb?: number
  memoryCapacityTb?: number
}

export interface StatusSummary {
  healthy: number
  attention: number
  critical: number
  totalTickets: number
}
