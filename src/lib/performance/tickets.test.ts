import { describe, it, expect } from 'vitest'
import type { TicketRecord } from '@/types/records'
import { countOpenTickets, filterTickets, getTicketHistory, sortTickets } from './tickets'

const ticket = (id: string, overrides: Partial<TicketRecord> = {}): TicketRecord => ({
  id,
  platform: 'datalake',
  title: id,
  priority: 'Low',
  status: 'Open',
  owner: 'Ops',
  createdDate: '2024-06-01',
  ageDays: 1,
  isActive: true,
  isBreached: false,
  ...overrides,
})

const now = new Date(2024, 5, 10, 12, 0)

describe('getTicketHistory', () => {
  const tickets = [
    ticket('a', { isBreached: true }),
    ticket('b'),
    ticket('c', { isActive: false, isBreached: true }),
    ticket('d', { platform: 'analytics' }),
  ]

  it('ends on the current open and breached counts', () => {
    const history = getTicketHistory(tickets, { platform: 'datalake', days: 10, now })

    expect(history.timestamps).toHaveLength(11)
    expect(history.timestamps[0]).toBe('2024-05-31')
    expect(history.timestamps[10]).toBe('2024-06-10')
    expect(history.current_count).toBe(2)
    expect(history.breached_count).toBe(1)
    expect(history.open_tickets.values[10]).toBe(2)
    expect(history.overdue_tickets.values[10]).toBe(1)
  })

  it('reduces a negative or unbounded span to today alone', () => {
    for (const days of [-3, Number.NaN, Number.POSITIVE_INFINITY]) {
      const history = getTicketHistory(tickets, { platform: 'datalake', days, now })

      expect(history.timestamps).toEqual(['2024-06-10'])
      expect(history.open_tickets.values).toEqual([2])
      expect(history.overdue_tickets.values).toEqual([1])
    }
  })

  it('counts every platform without a filter', () => {
    const history = getTicketHistory(tickets, { days: 5, now })
    expect(history.current_count).toBe(3)
  })

  it('keeps overdue within open on simulated days', () => {
    const many = Array.from({ length: 30 }, (_, i) => ticket(`t${i}`))
    const history = getTicketHistory(many, { days: 30, now })

    history.open_tickets.values.forEach((open, i) => {
      expect(open).toBeGreaterThanOrEqual(0)
      expect(history.overdue_tickets.values[i]).toBeGreaterThanOrEqual(0)
      expect(history.overdue_tickets.values[i]).toBeLessThanOrEqual(open)
    })
  })

  it('returns a single point for zero days', () => {
    const history = getTicketHistory(tickets, { days: 0, now })
    expect(history.timestamps).toEqual(['2024-06-10'])
    expect(history.open_tickets.values).toEqual([3])
  })

  it('is reproducible per platform', () => {
    expect(getTicketHistory(tickets, { platform: 'analytics', now })).toEqual(
      getTicketHistory(tickets, { platform: 'analytics', now })
    )
  })
})

describe('sortTickets', () => {
  it('orders active tickets by priority then age', () => {
    const sorted = sortTickets([
      ticket('low-old', { priority: 'Low', ageDays: 10 }),
      ticket('high-new', { priority: 'High', ageDays: 2 }),
      ticket('high-old', { priority: 'High', ageDays: 5 }),
      ticket('medium', { priority: 'Medium', ageDays: 1 }),
      ticket('closed', { priority: 'High', ageDays: 30, isActive: false }),
    ])

    expect(sorted.map((t) => t.id)).toEqual(['high-old', 'high-new', 'medium', 'low-old'])
  })
})

describe('countOpenTickets', () => {
  it('counts active tickets per platform', () => {
    expect(
      countOpenTickets([
        ticket('a'),
        ticket('b', { platform: 'workflows' }),
        ticket('c', { platform: 'workflows' }),
        ticket('d', { isActive: false }),
      ])
    ).toEqual({ datalake: 1, workflows: 2 })
  })
})

describe('filterTickets', () => {
  const tickets = [
    ticket('a', { priority: 'High', isBreached: true }),
    ticket('b', { priority: 'High', platform: 'warehouse' }),
    ticket('c', { priority: 'Low' }),
  ]

  it('returns everything without filters', () => {
    expect(filterTickets(tickets, {})).toHaveLength(3)
  })

  it('combines filters', () => {
    expect(filterTickets(tickets, { priority: 'High' }).map((t) => t.id)).toEqual(['a', 'b'])
    expect(filterTickets(tickets, { platform: 'datalake', priority: 'High' }).map((t) => t.id)).toEqual(['a'])
    expect(filterTickets(tickets, { breachedOnly: true }).map((t) => t.id)).toEqual(['a'])
  })
})
