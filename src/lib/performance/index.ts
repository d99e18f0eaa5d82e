import type { GenerationOptions, PerformanceData } from '@/types/performance'
import type { PlatformId } from '@/types/platforms'
import type { CapacitySnapshot } from '@/types/records'
import { getDataLakePerformance } from './dataLake'
import { getMultiMachinePerformance } from './multiMachine'
import { getWarehousePerformance } from './warehouse'

export interface PerformanceRequest extends GenerationOptions {
  snapshots?: readonly CapacitySnapshot[]
}

export function getPerformanceData(platform: PlatformId, request: PerformanceRequest = {}): PerformanceData {
  const { snapshots, ...options } = request
  switch (platform) {
    case 'datalake':
      return getDataLakePerformance(options)
    case 'warehouse':
      return getWarehousePerformance(snapshots, options)
    case 'analytics':
    case 'workflows':
      return getMultiMachinePerformance(platform, options)
  }
}

export { getDataLakePerformance } from './dataLake'
export { buildTimeGrid, clamp, type TimeGrid } from './grid'
export { classifyMachines } from './machineHealth'
export {
  MACHINE_PROFILES,
  MACHINE_SEED_BASE,
  generateMachines,
  getMultiMachinePerformance,
  machineName,
  type MachineProfile,
} from './multiMachine'
export { getPipelineSummary, summarizePipelines } from './pipelines'
export {
  countOpenTickets,
  filterTickets,
  getTicketHistory,
  sortTickets,
  type TicketHistoryOptions,
} from './tickets'
export {
  WAREHOUSE_SEED,
  WAREHOUSE_WINDOW,
  getWarehousePerformance,
  getWarehouseMemoryStats,
  toMemoryHistory,
  type MemoryHistory,
} from './warehouse'
export { describePanels, type MetricPanel } from './panels'
