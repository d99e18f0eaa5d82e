import { DASHBOARD_CONFIG } from '@/config/settings'
import { formatTimestamp, generateTimeBase } from '@/lib/telemetry'
import type { GenerationOptions } from '@/types/performance'

export interface TimeGrid {
  dates: Date[]
  labels: string[]
}

export function buildTimeGrid({
  hours = DASHBOARD_CONFIG.defaultHours,
  intervalMinutes = DASHBOARD_CONFIG.intervalMinutes,
  now = new Date(),
}: GenerationOptions = {}): TimeGrid {
  const dates = generateTimeBase(hours, intervalMinutes, now)
  return { dates, labels: dates.map(formatTimestamp) }
}

export const clamp = (value: number, min: number, max: number): number =>
  Math.max(min, Math.min(max, value))
