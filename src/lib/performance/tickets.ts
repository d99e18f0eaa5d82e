import { createRandomSource } from '@/lib/random'
import { formatDate } from '@/lib/telemetry'
import type { TicketHistory } from '@/types/performance'
import type { PlatformId } from '@/types/platforms'
import type { TicketFilters, TicketPriority, TicketRecord } from '@/types/records'

const DAY_MS = 24 * 60 * 60 * 1000

const PRIORITY_ORDER: Record<TicketPriority, number> = { High: 0, Medium: 1, Low: 2 }

export interface TicketHistoryOptions {
  platform?: PlatformId
  days?: number
  now?: Date
}

/**
 * Daily open/overdue ticket series ending today. Earlier days are simulated
 * to trend up from 70% of the current backlog; the final point always
 * carries the real open and breached counts.
 */
export function getTicketHistory(
  tickets: readonly TicketRecord[],
  { platform, days = 30, now = new Date() }: TicketHistoryOptions = {}
): TicketHistory {
  const scoped = platform ? tickets.filter((t) => t.platform === platform) : tickets
  const active = scoped.filter((t) => t.isActive)
  const currentCount = active.length
  const breachedCount = active.filter((t) => t.isBreached).length

  const span = Number.isFinite(days) && days > 0 ? Math.floor(days) : 0
  const random = createRandomSource(`ticket-history:${platform ?? 'all'}`)
  const timestamps: string[] = []
  const open: number[] = []
  const overdue: number[] = []

  for (let i = span; i >= 0; i--) {
    const date = new Date(now.getTime() - i * DAY_MS)
    timestamps.push(formatDate(date))

    const progress = span > 0 ? (span - i) / span : 1
    const base = Math.trunc(currentCount * 0.7 + currentCount * 0.6 * progress)
    let count = Math.max(0, base + random.int(-3, 4))
    const weekday = date.getDay()
    if (weekday === 0 || weekday === 6) count = Math.trunc(count * 0.85)
    open.push(count)

    const overdueBase = Math.trunc(count * (0.15 + 0.2 * random.next()))
    const late = Math.max(0, Math.min(count, overdueBase + random.int(-1, 1)))
    overdue.push(i === 0 ? breachedCount : late)
  }

  open[open.length - 1] = currentCount

  return {
    timestamps,
    open_tickets: { values: open, outliers: [] },
    overdue_tickets: { values: overdue, outliers: [] },
    current_count: currentCount,
    breached_count: breachedCount,
  }
}

/** Active tickets, highest priority first, then oldest first. */
export function sortTickets(tickets: readonly TicketRecord[]): TicketRecord[] {
  return tickets
    .filter((t) => t.isActive)
    .sort((a, b) => PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority] || b.ageDays - a.ageDays)
}

export function countOpenTickets(tickets: readonly TicketRecord[]): Partial<Record<PlatformId, number>> {
  const counts: Partial<Record<PlatformId, number>> = {}
  for (const ticket of tickets) {
    if (!ticket.isActive) continue
    counts[ticket.platform] = (counts[ticket.platform] ?? 0) + 1
  }
  return counts
}

export function filterTickets(tickets: readonly TicketRecord[], filters: TicketFilters): TicketRecord[] {
  return tickets.filter(
    (t) =>
      (!filters.platform || t.platform === filters.platform) &&
      (!filters.priority || t.priority === filters.priority) &&
      (!filters.breachedOnly || t.isBreached)
  )
}
