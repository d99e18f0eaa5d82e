import { describe, it, expect } from 'vitest'
import { roundTo } from '@/lib/random'
import { getMultiMachinePerformance, machineName } from './multiMachine'

const options = { hours: 1, intervalMinutes: 5, now: new Date(2024, 5, 10, 11, 2) }

describe('machineName', () => {
  it('pads the machine number', () => {
    expect(machineName('ANA-SRV', 0)).toBe('ANA-SRV-01')
    expect(machineName('ANA-SRV', 9)).toBe('ANA-SRV-10')
  })
})

describe('getMultiMachinePerformance', () => {
  const analytics = getMultiMachinePerformance('analytics', options)

  it('generates one series per configured machine', () => {
    expect(Object.keys(analytics.machines)).toEqual([
      'ANA-SRV-01',
      'ANA-SRV-02',
      'ANA-SRV-03',
      'ANA-SRV-04',
      'ANA-SRV-05',
      'ANA-SRV-06',
      'ANA-SRV-07',
      'ANA-SRV-08',
    ])
    expect(Object.keys(analytics.machine_outliers)).toEqual(Object.keys(analytics.machines))
    for (const series of Object.values(analytics.machines)) {
      expect(series.users).toHaveLength(13)
      expect(series.memory_percent).toHaveLength(13)
      expect(series.cpu_percent).toHaveLength(13)
    }
  })

  it('names workflow machines with their own prefix', () => {
    const workflows = getMultiMachinePerformance('workflows', options)
    expect(Object.keys(workflows.machines)[0]).toBe('WFL-WRK-01')
  })

  it('sums users and averages percentages across machines', () => {
    const machines = Object.values(analytics.machines)
    for (let i = 0; i < analytics.timestamps.length; i++) {
      const users = machines.reduce((sum, m) => sum + m.users[i], 0)
      const memory = machines.reduce((sum, m) => sum + m.memory_percent[i], 0) / machines.length
      const cpu = machines.reduce((sum, m) => sum + m.cpu_percent[i], 0) / machines.length

      expect(analytics.aggregated.users.values[i]).toBe(users)
      expect(analytics.aggregated.memory_percent.values[i]).toBe(roundTo(memory, 1))
      expect(analytics.aggregated.cpu_percent.values[i]).toBe(roundTo(cpu, 1))
    }
  })

  it('keeps percentages at or below 100', () => {
    for (const series of Object.values(analytics.machines)) {
      expect(series.memory_percent.every((v) => v >= 0 && v <= 100)).toBe(true)
      expect(series.cpu_percent.every((v) => v >= 0 && v <= 100)).toBe(true)
    }
  })

  it('flags machine samples against the platform thresholds', () => {
    for (const [name, outliers] of Object.entries(analytics.machine_outliers)) {
      for (const outlier of outliers.memory) {
        expect(outlier.value).toBeGreaterThanOrEqual(75)
        expect(analytics.machines[name].memory_percent[outlier.index]).toBe(outlier.value)
      }
      for (const outlier of outliers.cpu) {
        expect(outlier.value).toBeGreaterThanOrEqual(70)
      }
    }
  })

  it('produces one load time per timestamp', () => {
    expect(analytics.aggregated.load_time_sec.values).toHaveLength(13)
    expect(analytics.aggregated.load_time_sec.values.every((v) => v >= 0)).toBe(true)
  })

  it('is reproducible', () => {
    expect(getMultiMachinePerformance('analytics', options)).toEqual(analytics)
  })

  it('changes with the seed base', () => {
    const reseeded = getMultiMachinePerformance('analytics', { ...options, seed: 1000 })
    expect(reseeded.machines).not.toEqual(analytics.machines)
  })
})
