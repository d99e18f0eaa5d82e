import type { PlatformId } from './platforms'

export type TicketPriority = 'High' | 'Medium' | 'Low'

export type TicketStatus = 'Open' | 'In Progress' | 'Pending' | 'Resolved' | 'Closed'

export interface TicketRecord {
  id: string
  platform: PlatformId
  title: string
  priority: TicketPriority
  status: TicketStatus
  owner: string
  createdDate: string
  ageDays: number
  isActive: boolean
  isBreached: boolean
}

export type PipelineStatus =
  | 'successful'
  | 'delayed'
  | 'failed'
  | 'not_applicable'
  | 'running'
  | 'pending'

export interface PipelineRecord {
  platform: PlatformId
  pipelineId: string
  status: PipelineStatus
  delaySeconds: number
}

export interface CapacitySnapshot {
  snapshotTs: string
  storageUsageTb: number
  storageCapacityTb: number
  memoryUsageTb: number
  memoryCapacityTb: number
}

export interface TicketFilters {
  platform?: PlatformId
  priority?: TicketPriority
  breachedOnly?: boolean
}
