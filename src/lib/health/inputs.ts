import { getPipelineSummary } from '@/lib/performance/pipelines'
import { countOpenTickets } from '@/lib/performance/tickets'
import type { PlatformInputs } from '@/types/platforms'
import type { CapacitySnapshot, PipelineRecord, TicketRecord } from '@/types/records'

export interface PlatformRecords {
  tickets?: readonly TicketRecord[]
  pipelines?: readonly PipelineRecord[]
  snapshots?: readonly CapacitySnapshot[]
}

/**
 * Reduces raw records to the current values the classifier reads. Anything
 * that cannot be derived is left unset so the classifier's fallbacks apply.
 */
export function buildPlatformInputs({ tickets = [], pipelines = [], snapshots = [] }: PlatformRecords): PlatformInputs {
  const pipelineSummary = getPipelineSummary(pipelines, 'datalake')
  const latest = snapshots[snapshots.length - 1]

  return {
    ticketCounts: countOpenTickets(tickets),
    pipelineFailures: pipelineSummary.failed,
    pipelineDelays: pipelineSummary.delayed,
    memoryTb: latest?.memoryUsageTb,
    storageTb: latest?.storageUsageTb,
    memoryCapacityTb: latest && latest.memoryCapacityTb > 0 ? latest.memoryCapacityTb : undefined,
  }
}
