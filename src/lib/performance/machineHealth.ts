import { getOutlierThreshold } from '@/config/settings'
import type { MachineHealth, MachineSeries } from '@/types/machines'
import type { MultiMachinePlatformId, PlatformStatus } from '@/types/platforms'
import type { ThresholdPair } from '@/types/telemetry'

const levelOf = (value: number, threshold: Readonly<ThresholdPair>): PlatformStatus => {
  if (value >= threshold.critical) return 'critical'
  if (value >= threshold.warning) return 'attention'
  return 'healthy'
}

const RANK: Record<PlatformStatus, number> = { healthy: 0, attention: 1, critical: 2 }

/** Current health of each machine from its latest memory and CPU sample. */
export function classifyMachines(
  platform: MultiMachinePlatformId,
  machines: Readonly<Record<string, MachineSeries>>
): MachineHealth[] {
  const memoryThreshold = getOutlierThreshold(platform, 'memory_percent')
  const cpuThreshold = getOutlierThreshold(platform, 'cpu_percent')

  return Object.entries(machines).map(([name, series]) => {
    const memoryPercent = series.memory_percent[series.memory_percent.length - 1] ?? 0
    const cpuPercent = series.cpu_percent[series.cpu_percent.length - 1] ?? 0
    const memoryLevel = levelOf(memoryPercent, memoryThreshold)
    const cpuLevel = levelOf(cpuPercent, cpuThreshold)
    return {
      name,
      status: RANK[memoryLevel] >= RANK[cpuLevel] ? memoryLevel : cpuLevel,
      memoryPercent,
      cpuPercent,
    }
  })
}
