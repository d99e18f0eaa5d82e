import { describe, it, expect } from 'vitest'
import { getPerformanceData } from './index'
import { getMultiMachinePerformance } from './multiMachine'
import { describePanels } from './panels'

const options = { hours: 1, intervalMinutes: 5, now: new Date(2024, 5, 10, 9, 0) }

describe('describePanels', () => {
  it('lists data lake panels', () => {
    const panels = describePanels('datalake', getPerformanceData('datalake', options))

    expect(panels.map((p) => p.key)).toEqual(['users', 'pipelines_failed', 'pipelines_delayed', 'tickets_overdue'])
    expect(panels[1].threshold).toEqual({ warning: 5, critical: 10 })
  })

  it('puts warehouse memory first with its capacity', () => {
    const panels = describePanels('warehouse', getPerformanceData('warehouse', options))

    expect(panels.map((p) => p.key)).toEqual(['memory_tb', 'users', 'cpu_percent', 'load_time_sec'])
    expect(panels[0].capacity).toBe(24)
    expect(panels[0].unit).toBe(' TB')
    expect(panels[1].capacity).toBeUndefined()
  })

  it('uses the aggregated windows for multi-machine platforms', () => {
    const data = getMultiMachinePerformance('workflows', options)
    const panels = describePanels('workflows', data)

    expect(panels.map((p) => p.key)).toEqual(['users', 'memory_percent', 'cpu_percent', 'load_time_sec'])
    expect(panels[3].threshold).toEqual({ warning: 120, critical: 180 })
    expect(panels[0].window).toBe(data.aggregated.users)
  })
})

describe('getPerformanceData', () => {
  it('dispatches on the platform', () => {
    expect('failed_pipelines' in getPerformanceData('datalake', options)).toBe(true)
    expect('memory_capacity' in getPerformanceData('warehouse', options)).toBe(true)
    expect('machines' in getPerformanceData('analytics', options)).toBe(true)
  })

  it('passes snapshots to the warehouse', () => {
    const data = getPerformanceData('warehouse', {
      snapshots: [
        {
          snapshotTs: '2024-06-10T08:00:00',
          storageUsageTb: 50,
          storageCapacityTb: 64,
          memoryUsageTb: 19,
          memoryCapacityTb: 32,
        },
      ],
    })

    expect(data.timestamps).toEqual(['2024-06-10 08:00'])
    expect(data).toMatchObject({ memory_capacity: 32 })
  })
})
