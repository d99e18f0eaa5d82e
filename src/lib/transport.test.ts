import { describe, it, expect } from 'vitest'
import { makePlatform, makeTicket } from '@/test/utils'
import { toHealthSnapshot, toPlatformCard, toTicketRow } from './transport'

describe('toPlatformCard', () => {
  it('converts a health record to the card payload', () => {
    expect(toPlatformCard(makePlatform({ status: 'attention', statusLabel: 'Attention' }))).toEqual({
      id: 'datalake',
      name: 'Data Lake',
      subtitle: 'Enterprise Data Lake',
      status: 'attention',
      status_label: 'Attention',
      metrics: {
        primary: { label: 'Pipeline Failures', value: '2', threshold: '< 5' },
        secondary: { label: 'Data Delays', value: '8', threshold: '< 15' },
        tertiary: { label: 'Open Tickets', value: '4', threshold: null },
      },
      trend: 'stable',
    })
  })
})

describe('toTicketRow', () => {
  it('uses snake case keys', () => {
    expect(toTicketRow(makeTicket({ isBreached: true }))).toEqual({
      id: 'INC0001',
      platform: 'datalake',
      title: 'Nightly load stalled',
      priority: 'Medium',
      status: 'Open',
      owner: 'Data Ops',
      created_date: '2024-03-01',
      age_days: 3,
      is_breached: true,
    })
  })
})

describe('toHealthSnapshot', () => {
  it('bundles the summary, cards and tickets', () => {
    const snapshot = toHealthSnapshot(
      [makePlatform()],
      { healthy: 1, attention: 0, critical: 0, totalTickets: 1 },
      [makeTicket()],
      new Date('2024-06-10T12:00:00Z')
    )

    expect(snapshot.generated_at).toBe('2024-06-10T12:00:00.000Z')
    expect(snapshot.summary).toEqual({ healthy: 1, attention: 0, critical: 0, total_tickets: 1 })
    expect(snapshot.platforms).toHaveLength(1)
    expect(snapshot.tickets[0].id).toBe('INC0001')
  })
})
