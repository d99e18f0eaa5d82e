import { describe, it, expect } from 'vitest'
import { makeTicket, renderWithProviders, screen, userEvent } from '@/test/utils'
import { Tickets } from './Tickets'

const tickets = [
  makeTicket({ id: 'INC1', priority: 'Low', ageDays: 9 }),
  makeTicket({ id: 'INC2', priority: 'High', platform: 'warehouse', title: 'Memory alarm' }),
  makeTicket({ id: 'INC3', priority: 'High', isActive: false }),
]

describe('Tickets page', () => {
  it('lists active tickets by priority', () => {
    renderWithProviders(<Tickets />, {
      preloadedState: { records: { tickets, pipelines: [], snapshots: [], filters: {} } },
    })

    const ids = screen.getAllByText(/^INC\d$/).map((el) => el.textContent)
    expect(ids).toEqual(['INC2', 'INC1'])
  })

  it('filters through the store', async () => {
    const user = userEvent.setup()
    const { store } = renderWithProviders(<Tickets />, {
      preloadedState: { records: { tickets, pipelines: [], snapshots: [], filters: {} } },
    })

    await user.selectOptions(screen.getByLabelText('Platform'), 'warehouse')

    expect(store.getState().records.filters).toEqual({ platform: 'warehouse' })
    expect(screen.getByText('Memory alarm')).toBeInTheDocument()
    expect(screen.queryByText('INC1')).not.toBeInTheDocument()
  })
})
