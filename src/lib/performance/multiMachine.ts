import { MACHINE_CONFIG, OUTLIER_THRESHOLDS } from '@/config/settings'
import { createRandomSource, roundTo } from '@/lib/random'
import {
  addNoise,
  aggregateMachines,
  applyDailyPattern,
  buildMetricWindow,
  detectOutliers,
  injectOutliers,
} from '@/lib/telemetry'
import type { MachineConfig, MachineOutliers, MachineRecord, MachineSeries } from '@/types/machines'
import type { GenerationOptions, MultiMachinePerformance } from '@/types/performance'
import type { MultiMachinePlatformId } from '@/types/platforms'
import { buildTimeGrid } from './grid'

export const MACHINE_SEED_BASE = 44

interface LoadModel {
  base: number
  userWeight: number
  cpuWeight: number
  cpuScale: number
  noise: number
  digits: number
  outlierChance: number
  outlierMagnitude: number
  seed: number
}

export interface MachineProfile {
  baseUsers: number
  baseMemory: number
  baseCpu: number
  load: LoadModel
}

export const MACHINE_PROFILES: Readonly<Record<MultiMachinePlatformId, MachineProfile>> = Object.freeze({
  analytics: {
    baseUsers: 180,
    baseMemory: 55,
    baseCpu: 45,
    load: {
      base: 3.8,
      userWeight: 0.2,
      cpuWeight: 0.1,
      cpuScale: 50,
      noise: 0.15,
      digits: 2,
      outlierChance: 0.04,
      outlierMagnitude: 2.5,
      seed: 48,
    },
  },
  workflows: {
    baseUsers: 40,
    baseMemory: 50,
    baseCpu: 40,
    load: {
      base: 85,
      userWeight: 0.15,
      cpuWeight: 0.05,
      cpuScale: 45,
      noise: 0.2,
      digits: 1,
      outlierChance: 0.02,
      outlierMagnitude: 1.8,
      seed: 52,
    },
  },
})

export const machineName = (prefix: string, index: number): string =>
  `${prefix}-${String(index + 1).padStart(2, '0')}`

const capPercent = (value: number) => Math.min(100, roundTo(value, 1))

/**
 * Generates one series per machine. Each machine draws from its own stream
 * seeded `seedBase + index`, and the first two carry 30% more users.
 */
export function generateMachines(
  dates: readonly Date[],
  config: MachineConfig,
  profile: MachineProfile,
  seedBase = MACHINE_SEED_BASE
): Record<string, MachineRecord> {
  const perMachine = profile.baseUsers / config.count
  const machines: Record<string, MachineRecord> = {}

  for (let m = 0; m < config.count; m++) {
    const random = createRandomSource(seedBase + m)
    const name = machineName(config.prefix, m)

    const users = dates.map((ts) => {
      let value = addNoise(applyDailyPattern(perMachine, ts.getHours(), 0.7), 0.2, random)
      if (m < 2) value *= 1.3
      return Math.max(0, Math.round(value))
    })

    const memory = injectOutliers(
      users.map((count) => capPercent(addNoise(profile.baseMemory * (0.7 + 0.3 * (count / perMachine)), 0.1, random))),
      0.02,
      1.2,
      random
    ).values.map(capPercent)

    const cpu = injectOutliers(
      users.map((count) => capPercent(addNoise(profile.baseCpu * (0.6 + 0.4 * (count / perMachine)), 0.15, random))),
      0.025,
      1.3,
      random
    ).values.map(capPercent)

    machines[name] = { name, metrics: { users, memory_percent: memory, cpu_percent: cpu } }
  }

  return machines
}

function platformLoadTime(aggregated: MachineSeries, profile: MachineProfile): number[] {
  const { load } = profile
  const random = createRandomSource(load.seed)
  const values = aggregated.users.map((users, i) => {
    const factor =
      1 - load.userWeight - load.cpuWeight +
      load.userWeight * (users / profile.baseUsers) +
      load.cpuWeight * (aggregated.cpu_percent[i] / load.cpuScale)
    return roundTo(addNoise(load.base * factor, load.noise, random), load.digits)
  })
  return injectOutliers(values, load.outlierChance, load.outlierMagnitude, random).values.map((v) =>
    roundTo(v, load.digits)
  )
}

/**
 * Per-machine and platform-wide telemetry for the multi-machine platforms.
 * `options.seed` replaces the base of the per-machine seeds.
 */
export function getMultiMachinePerformance(
  platform: MultiMachinePlatformId,
  options: GenerationOptions = {}
): MultiMachinePerformance {
  const { dates, labels } = buildTimeGrid(options)
  const profile = MACHINE_PROFILES[platform]
  const thresholds = OUTLIER_THRESHOLDS[platform]

  const records = generateMachines(dates, MACHINE_CONFIG[platform], profile, options.seed ?? MACHINE_SEED_BASE)

  const machines: Record<string, MachineSeries> = {}
  const machineOutliers: Record<string, MachineOutliers> = {}
  for (const [name, record] of Object.entries(records)) {
    machines[name] = record.metrics
    machineOutliers[name] = {
      memory: detectOutliers(record.metrics.memory_percent, thresholds.memory_percent),
      cpu: detectOutliers(record.metrics.cpu_percent, thresholds.cpu_percent),
    }
  }

  const totals = aggregateMachines(records, dates.length)
  const aggregated: MachineSeries = {
    users: totals.users,
    memory_percent: totals.memory_percent.map((v) => roundTo(v, 1)),
    cpu_percent: totals.cpu_percent.map((v) => roundTo(v, 1)),
  }

  return {
    timestamps: labels,
    machines,
    machine_outliers: machineOutliers,
    aggregated: {
      users: buildMetricWindow(aggregated.users, thresholds.users),
      memory_percent: buildMetricWindow(aggregated.memory_percent, thresholds.memory_percent),
      load_time_sec: buildMetricWindow(platformLoadTime(aggregated, profile), thresholds.load_time_sec),
      cpu_percent: buildMetricWindow(aggregated.cpu_percent, thresholds.cpu_percent),
    },
  }
}
