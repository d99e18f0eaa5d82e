import { DASHBOARD_CONFIG, OUTLIER_THRESHOLDS } from '@/config/settings'
import { createRandomSource } from '@/lib/random'
import { addNoise, applyDailyPattern, buildMetricWindow, injectOutliers } from '@/lib/telemetry'
import type { DataLakePerformance, GenerationOptions } from '@/types/performance'
import { buildTimeGrid, clamp } from './grid'

const TICKET_STEPS = [-1, 0, 0, 0, 1] as const

/**
 * Simulated data lake telemetry: active users, pipeline totals, failures and
 * delays, and the open/overdue ticket backlog.
 */
export function getDataLakePerformance(options: GenerationOptions = {}): DataLakePerformance {
  const { dates, labels } = buildTimeGrid(options)
  const random = createRandomSource(options.seed ?? DASHBOARD_CONFIG.demoSeed)
  const thresholds = OUTLIER_THRESHOLDS.datalake

  const baseUsers = dates.map((ts) => {
    const value = addNoise(applyDailyPattern(80, ts.getHours(), 0.6), 0.15, random)
    return Math.max(5, Math.round(value))
  })
  const users = injectOutliers(baseUsers, 0.01, 2.0, random).values

  const totalPipelines = dates.map(() => 245 + random.int(-5, 5))

  const failedPipelines = injectOutliers(
    dates.map(() => 2 + random.int(0, 3)),
    0.03,
    3.0,
    random
  ).values.map(Math.trunc)

  const delayedPipelines = injectOutliers(
    dates.map((ts) => {
      const value = addNoise(applyDailyPattern(5, ts.getHours(), 0.4), 0.2, random)
      return Math.max(0, Math.round(value))
    }),
    0.02,
    2.5,
    random
  ).values.map(Math.trunc)

  let backlog = 12
  const openTickets = dates.map(() => {
    backlog = clamp(backlog + random.pick(TICKET_STEPS), 5, 25)
    return backlog
  })

  const overdueTickets = openTickets.map((open) =>
    Math.max(0, Math.min(open - 5, Math.round(open * 0.2 + random.int(-1, 2))))
  )

  return {
    timestamps: labels,
    users: buildMetricWindow(users, thresholds.users),
    total_pipelines: buildMetricWindow(totalPipelines),
    failed_pipelines: buildMetricWindow(failedPipelines, thresholds.pipelines_failed),
    delayed_pipelines: buildMetricWindow(delayedPipelines, thresholds.pipelines_delayed),
    open_tickets: buildMetricWindow(openTickets),
    overdue_tickets: buildMetricWindow(overdueTickets, thresholds.tickets_overdue),
  }
}
