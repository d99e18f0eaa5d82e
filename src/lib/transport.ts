import type { PlatformHealth, PlatformMetric, PlatformStatus, PlatformTrend, StatusSummary } from '@/types/platforms'
import type { TicketRecord } from '@/types/records'

export interface MetricPayload {
  label: string
  value: string
  threshold: string | null
}

export interface PlatformCardPayload {
  id: string
  name: string
  subtitle: string
  status: PlatformStatus
  status_label: string
  metrics: {
    primary: MetricPayload
    secondary: MetricPayload
    tertiary: MetricPayload
  }
  trend: PlatformTrend
}

export interface TicketRowPayload {
  id: string
  platform: string
  title: string
  priority: string
  status: string
  owner: string
  created_date: string
  age_days: number
  is_breached: boolean
}

export interface HealthSnapshotPayload {
  generated_at: string
  summary: {
    healthy: number
    attention: number
    critical: number
    total_tickets: number
  }
  platforms: PlatformCardPayload[]
  tickets: TicketRowPayload[]
}

const toMetric = ({ label, value, threshold }: PlatformMetric): MetricPayload => ({
  label,
  value,
  threshold: threshold ?? null,
})

export function toPlatformCard(health: PlatformHealth): PlatformCardPayload {
  return {
    id: health.id,
    name: health.name,
    subtitle: health.subtitle,
    status: health.status,
    status_label: health.statusLabel,
    metrics: {
      primary: toMetric(health.metrics.primary),
      secondary: toMetric(health.metrics.secondary),
      tertiary: toMetric(health.metrics.tertiary),
    },
    trend: health.trend,
  }
}

export function toTicketRow(ticket: TicketRecord): TicketRowPayload {
  return {
    id: ticket.id,
    platform: ticket.platform,
    title: ticket.title,
    priority: ticket.priority,
    status: ticket.status,
    owner: ticket.owner,
    created_date: ticket.createdDate,
    age_days: ticket.ageDays,
    is_breached: ticket.isBreached,
  }
}

export function toHealthSnapshot(
  platforms: readonly PlatformHealth[],
  summary: StatusSummary,
  tickets: readonly TicketRecord[],
  generatedAt: Date = new Date()
): HealthSnapshotPayload {
  return {
    generated_at: generatedAt.toISOString(),
    summary: {
      healthy: summary.healthy,
      attention: summary.attention,
      critical: summary.critical,
      total_tickets: summary.totalTickets,
    },
    platforms: platforms.map(toPlatformCard),
    tickets: tickets.map(toTicketRow),
  }
}

export function triggerJsonDownload(payload: unknown, filename: string) {
  const url = URL.createObjectURL(new Blob([JSON.stringify(payload, null, 2)], { type: 'application/json' }))
  const a = document.createElement('a')
  a.href = url
  a.download = filename
  document.body.appendChild(a)
  a.click()
  a.remove()
  URL.revokeObjectURL(url)
}
