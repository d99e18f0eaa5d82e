import { describe, it, expect } from 'vitest'
import { InMemorySink, logger } from '@/lib/logger'
import {
  MACHINE_CONFIG,
  OUTLIER_THRESHOLDS,
  STATUS_RULES,
  getOutlierThreshold,
  loadDashboardConfig,
} from './settings'

describe('getOutlierThreshold', () => {
  it('returns the configured pair', () => {
    expect(getOutlierThreshold('warehouse', 'memory_tb')).toEqual({ warning: 20, critical: 22 })
    expect(getOutlierThreshold('workflows', 'load_time_sec')).toEqual({ warning: 120, critical: 180 })
  })

  it('returns infinite bounds for unknown pairs', () => {
    for (const [platform, metric] of [
      ['warehouse', 'queue_depth'],
      ['mainframe', 'users'],
      ['datalake', 'toString'],
    ]) {
      const threshold = getOutlierThreshold(platform, metric)
      expect(threshold.warning).toBe(Number.POSITIVE_INFINITY)
      expect(threshold.critical).toBe(Number.POSITIVE_INFINITY)
    }
  })

  it('reads from a supplied table', () => {
    const table = { custom: { depth: { warning: 1, critical: 2 } } }
    expect(getOutlierThreshold('custom', 'depth', table)).toEqual({ warning: 1, critical: 2 })
    expect(getOutlierThreshold('warehouse', 'memory_tb', table).critical).toBe(Number.POSITIVE_INFINITY)
  })
})

describe('loadDashboardConfig', () => {
  it('applies defaults', () => {
    expect(loadDashboardConfig({})).toEqual({
      apiBaseUrl: '/api',
      defaultHours: 24,
      intervalMinutes: 5,
      demoSeed: 42,
    })
  })

  it('coerces string values from the environment', () => {
    expect(
      loadDashboardConfig({
        VITE_API_BASE_URL: 'http://localhost:9000/api',
        VITE_DEFAULT_HOURS: '48',
        VITE_INTERVAL_MINUTES: '15',
        VITE_DEMO_SEED: '7',
        MODE: 'test',
      })
    ).toEqual({
      apiBaseUrl: 'http://localhost:9000/api',
      defaultHours: 48,
      intervalMinutes: 15,
      demoSeed: 7,
    })
  })

  it('falls back to defaults and warns on invalid values', () => {
    const sink = new InMemorySink()
    const detach = logger.attach(sink)
    try {
      expect(loadDashboardConfig({ VITE_INTERVAL_MINUTES: '0' }).intervalMinutes).toBe(5)
    } finally {
      detach()
    }
    expect(sink.read()).toHaveLength(1)
    expect(sink.read()[0]).toMatchObject({ level: 'warn', message: 'Invalid dashboard environment, using defaults' })
  })
})

describe('threshold tables', () => {
  it('are frozen', () => {
    expect(Object.isFrozen(STATUS_RULES)).toBe(true)
    expect(Object.isFrozen(STATUS_RULES.datalake.pipelineFailures)).toBe(true)
    expect(Object.isFrozen(OUTLIER_THRESHOLDS.analytics.cpu_percent)).toBe(true)
  })

  it('describe eight machines per multi-machine platform', () => {
    expect(MACHINE_CONFIG.analytics).toEqual({ count: 8, prefix: 'ANA-SRV' })
    expect(MACHINE_CONFIG.workflows).toEqual({ count: 8, prefix: 'WFL-WRK' })
  })
})
