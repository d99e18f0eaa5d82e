import { z } from 'zod'
import { logger } from '@/lib/logger'
import type { MachineConfig } from '@/types/machines'
import type { MultiMachinePlatformId, PlatformId, PlatformRules, StatusThresholds } from '@/types/platforms'
import type { ThresholdPair } from '@/types/telemetry'

function deepFreeze<T extends object>(value: T): T {
  for (const nested of Object.values(value)) {
    if (typeof nested === 'object' && nested !== null && !Object.isFrozen(nested)) {
      deepFreeze(nested)
    }
  }
  Object.freeze(value)
  return value
}

const envSchema = z.object({
  VITE_API_BASE_URL: z.string().min(1).default('/api'),
  VITE_DEFAULT_HOURS: z.coerce.number().int().min(1).max(24 * 31).default(24),
  VITE_INTERVAL_MINUTES: z.coerce.number().int().min(1).max(60).default(5),
  VITE_DEMO_SEED: z.coerce.number().int().default(42),
})

export interface DashboardConfig {
  apiBaseUrl: string
  defaultHours: number
  intervalMinutes: number
  demoSeed: number
}

export function loadDashboardConfig(env: Record<string, unknown>): DashboardConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    logger.warn('Invalid dashboard environment, using defaults', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    })
  }
  const values = parsed.success ? parsed.data : envSchema.parse({})
  return {
    apiBaseUrl: values.VITE_API_BASE_URL,
    defaultHours: values.VITE_DEFAULT_HOURS,
    intervalMinutes: values.VITE_INTERVAL_MINUTES,
    demoSeed: values.VITE_DEMO_SEED,
  }
}

export const DASHBOARD_CONFIG = deepFreeze(loadDashboardConfig({ ...import.meta.env }))

// Cut-overs for the platform cards. Values at or above `attention` are critical.
export const STATUS_THRESHOLDS = deepFreeze({
  datalake: {
    pipeline_failures: { healthy: 5, attention: 10 },
    data_delays: { healthy: 15, attention: 30 },
  },
  warehouse: {
    memory_tb: { healthy: 20, attention: 22 },
    storage_tb: { healthy: 55, attention: 60 },
  },
  analytics: {
    load_time_sec: { healthy: 5, attention: 8 },
    cpu_percent: { healthy: 70, attention: 85 },
  },
  workflows: {
    job_failures: { healthy: 3, attention: 7 },
    queue_depth: { healthy: 10, attention: 20 },
  },
} as const satisfies StatusThresholds)

export const OPEN_TICKET_LIMIT = 15

export const STATUS_RULES = deepFreeze({
  datalake: {
    pipelineFailures: { kind: 'three-tier', ...STATUS_THRESHOLDS.datalake.pipeline_failures },
  },
  warehouse: {
    memoryTb: { kind: 'three-tier', ...STATUS_THRESHOLDS.warehouse.memory_tb },
  },
  analytics: {
    openTickets: { kind: 'two-tier', limit: OPEN_TICKET_LIMIT },
  },
  workflows: {
    openTickets: { kind: 'two-tier', limit: OPEN_TICKET_LIMIT },
  },
} as const satisfies PlatformRules)

export const OUTLIER_THRESHOLDS = deepFreeze({
  datalake: {
    users: { warning: 150, critical: 200 },
    pipelines_failed: { warning: 5, critical: 10 },
    pipelines_delayed: { warning: 8, critical: 15 },
    tickets_overdue: { warning: 5, critical: 10 },
  },
  warehouse: {
    users: { warning: 80, critical: 120 },
    memory_tb: { warning: 20, critical: 22 },
    load_time_sec: { warning: 8, critical: 12 },
    cpu_percent: { warning: 75, critical: 90 },
  },
  analytics: {
    users: { warning: 200, critical: 300 },
    memory_percent: { warning: 75, critical: 90 },
    load_time_sec: { warning: 5, critical: 8 },
    cpu_percent: { warning: 70, critical: 85 },
  },
  workflows: {
    users: { warning: 50, critical: 80 },
    memory_percent: { warning: 70, critical: 85 },
    load_time_sec: { warning: 120, critical: 180 },
    cpu_percent: { warning: 70, critical: 85 },
  },
} as const satisfies Record<PlatformId, Record<string, ThresholdPair>>)

export const MACHINE_CONFIG = deepFreeze({
  analytics: { count: 8, prefix: 'ANA-SRV' },
  workflows: { count: 8, prefix: 'WFL-WRK' },
} as const satisfies Record<MultiMachinePlatformId, MachineConfig>)

export const NO_ALERT_THRESHOLD: Readonly<ThresholdPair> = Object.freeze({
  warning: Number.POSITIVE_INFINITY,
  critical: Number.POSITIVE_INFINITY,
})

/**
 * Looks up the outlier thresholds for a platform/metric pair. Unconfigured
 * combinations get infinite bounds, which never flag a sample.
 */
export function getOutlierThreshold(
  platform: string,
  metric: string,
  table: Readonly<Record<string, Readonly<Record<string, Readonly<ThresholdPair>>>>> = OUTLIER_THRESHOLDS
): Readonly<ThresholdPair> {
  if (!Object.hasOwn(table, platform)) return NO_ALERT_THRESHOLD
  const metrics = table[platform]
  if (!Object.hasOwn(metrics, metric)) return NO_ALERT_THRESHOLD
  return metrics[metric]
}
