import { OUTLIER_THRESHOLDS } from '@/config/settings'
import { FALLBACK_INPUTS } from '@/lib/health/classifier'
import { logger } from '@/lib/logger'
import { createRandomSource, roundTo, type RandomSource } from '@/lib/random'
import {
  addNoise,
  applyDailyPattern,
  buildMetricWindow,
  computeHistoricalStats,
  detectOutliers,
  hourOfLabel,
  injectOutliers,
  recordedLabel,
} from '@/lib/telemetry'
import type { GenerationOptions, WarehousePerformance } from '@/types/performance'
import type { CapacitySnapshot } from '@/types/records'
import type { HistoricalStats, TimeSeries } from '@/types/telemetry'
import { buildTimeGrid } from './grid'

export const WAREHOUSE_SEED = 43

/** One day of five-minute snapshots plus the closing sample. */
export const WAREHOUSE_WINDOW = 289

const MEMORY_STATS_FALLBACK: HistoricalStats = { average: 19.5, peak: 21.9 }

const log = logger.child('warehouse')

const MINUTE_MS = 60 * 1000

const simulateUsers = (hours: readonly number[], random: RandomSource) =>
  hours.map((hour) => Math.max(3, Math.round(addNoise(applyDailyPattern(45, hour, 0.8), 0.12, random))))

const capCpu = (value: number) => Math.min(100, roundTo(value, 1))

interface TimedSnapshot {
  time: number
  snapshot: CapacitySnapshot
}

/** Readable snapshots, oldest first, one per minute. A later row for the same minute replaces an earlier one. */
function orderSnapshots(snapshots: readonly CapacitySnapshot[]): TimedSnapshot[] {
  const byMinute = new Map<number, TimedSnapshot>()
  for (const snapshot of snapshots) {
    const time = Date.parse(snapshot.snapshotTs)
    if (Number.isNaN(time)) {
      log.warn('Skipping snapshot with unparsable timestamp', { snapshotTs: snapshot.snapshotTs })
      continue
    }
    byMinute.set(Math.floor(time / MINUTE_MS), { time, snapshot })
  }
  return [...byMinute.values()].sort((a, b) => a.time - b.time)
}

export interface MemoryHistory {
  series: TimeSeries
  capacity: number
}

/** Memory readings of the most recent window, labelled in the clock they were recorded in. */
export function toMemoryHistory(snapshots: readonly CapacitySnapshot[]): MemoryHistory {
  const recent = orderSnapshots(snapshots).slice(-WAREHOUSE_WINDOW)
  return {
    series: {
      timestamps: recent.map(({ time, snapshot }) => recordedLabel(snapshot.snapshotTs, new Date(time))),
      values: recent.map(({ snapshot }) => snapshot.memoryUsageTb),
    },
    capacity: recent[recent.length - 1]?.snapshot.memoryCapacityTb ?? FALLBACK_INPUTS.memoryCapacityTb,
  }
}

function fromSnapshots(
  snapshots: readonly CapacitySnapshot[],
  random: RandomSource
): WarehousePerformance {
  const { series, capacity } = toMemoryHistory(snapshots)
  const memory = series.values
  const users = simulateUsers(
    series.timestamps.map((label) => hourOfLabel(label)),
    random
  )

  const loadTime = memory.map((tb) =>
    roundTo(addNoise(4.5 * (0.8 + 0.4 * (tb / 19)), 0.2, random), 2)
  )
  const cpu = memory.map((tb) => capCpu(addNoise(35 * (0.7 + 0.5 * (tb / 19)), 0.15, random)))

  const thresholds = OUTLIER_THRESHOLDS.warehouse
  return {
    timestamps: series.timestamps,
    users: buildMetricWindow(users, thresholds.users),
    memory_tb: {
      values: memory.map((tb) => Math.min(capacity, tb)),
      outliers: detectOutliers(memory, thresholds.memory_tb),
    },
    memory_capacity: capacity,
    load_time_sec: buildMetricWindow(loadTime, thresholds.load_time_sec),
    cpu_percent: buildMetricWindow(cpu, thresholds.cpu_percent),
  }
}

function simulate(options: GenerationOptions, random: RandomSource): WarehousePerformance {
  const { dates, labels } = buildTimeGrid(options)
  const capacity = FALLBACK_INPUTS.memoryCapacityTb
  const users = simulateUsers(
    dates.map((ts) => ts.getHours()),
    random
  )

  const memory = injectOutliers(
    dates.map((ts) => roundTo(addNoise(applyDailyPattern(18.2, ts.getHours(), 0.15), 0.03, random), 2)),
    0.02,
    1.15,
    random
  ).values.map((tb) => roundTo(tb, 2))

  const loadTime = injectOutliers(
    users.map((count) => roundTo(addNoise(4.5 * (1 + 0.3 * (count / 50)), 0.2, random), 2)),
    0.03,
    2.0,
    random
  ).values.map((sec) => roundTo(sec, 2))

  const cpu = injectOutliers(
    users.map((count, i) =>
      capCpu(addNoise(35 * (1 + 0.4 * (count / 50) + 0.3 * (memory[i] / 18)), 0.15, random))
    ),
    0.02,
    1.4,
    random
  ).values.map(capCpu)

  const thresholds = OUTLIER_THRESHOLDS.warehouse
  return {
    timestamps: labels,
    users: buildMetricWindow(users, thresholds.users),
    memory_tb: {
      values: memory.map((tb) => Math.min(capacity, tb)),
      outliers: detectOutliers(memory, thresholds.memory_tb),
    },
    memory_capacity: capacity,
    load_time_sec: buildMetricWindow(loadTime, thresholds.load_time_sec),
    cpu_percent: buildMetricWindow(cpu, thresholds.cpu_percent),
  }
}

/**
 * Warehouse telemetry. Memory comes from capacity snapshots when there are
 * any; otherwise the whole payload is simulated on the configured grid.
 * Users, load time and CPU are always derived.
 */
export function getWarehousePerformance(
  snapshots: readonly CapacitySnapshot[] = [],
  options: GenerationOptions = {}
): WarehousePerformance {
  const random = createRandomSource(options.seed ?? WAREHOUSE_SEED)
  if (snapshots.length > 0) {
    return fromSnapshots(snapshots, random)
  }
  log.debug('No capacity snapshots, simulating warehouse telemetry')
  return simulate(options, random)
}

/** Average and peak memory over the snapshot history. */
export function getWarehouseMemoryStats(snapshots: readonly CapacitySnapshot[]): HistoricalStats {
  const memory = snapshots.map((s) => s.memoryUsageTb).filter((tb) => tb > 0)
  if (memory.length === 0) return { ...MEMORY_STATS_FALLBACK }
  return computeHistoricalStats(memory)
}
