import { TicketFilters, TicketList } from '@/components/tickets'
import { filterTickets, sortTickets } from '@/lib/performance'
import { useAppDispatch, useAppSelector } from '@/store/hooks'
import { setFilters } from '@/store/slices/recordsSlice'

export function Tickets() {
  const dispatch = useAppDispatch()
  const tickets = useAppSelector((state) => state.records.tickets)
  const filters = useAppSelector((state) => state.records.filters)
  const visible = sortTickets(filterTickets(tickets, filters))

  return (
    <div className="p-6 space-y-6">
      <h1 className="text-2xl font-semibold text-gray-900">Tickets</h1>
      <TicketFilters filters={filters} onFilterChange={(next) => dispatch(setFilters(next))} />
      <TicketList tickets={visible} />
    </div>
  )
}
