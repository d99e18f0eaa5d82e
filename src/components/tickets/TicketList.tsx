import type { TicketPriority, TicketRecord } from '@/types/records'

interface TicketListProps {
  tickets: TicketRecord[]
  title?: string
}

const PRIORITY_STYLES: Record<TicketPriority, string> = {
  High: 'bg-red-100 text-red-700',
  Medium: 'bg-yellow-100 text-yellow-700',
  Low: 'bg-gray-100 text-gray-700',
}

export function TicketList({ tickets, title = 'Open Tickets' }: TicketListProps) {
  return (
    <div className="bg-white rounded-lg shadow-sm border border-gray-200">
      <div className="px-6 py-4 border-b border-gray-200 flex items-center justify-between">
        <h2 className="text-lg font-semibold text-gray-900">{title}</h2>
        <span className="text-sm text-gray-500">{tickets.length} total</span>
      </div>
      {tickets.length === 0 ? (
        <div className="p-6 text-center text-gray-500">No open tickets</div>
      ) : (
        <ul className="divide-y divide-gray-200">
          {tickets.map((ticket) => (
            <li key={ticket.id} className="px-6 py-4">
              <div className="flex items-center justify-between">
                <div className="min-w-0 flex-1">
                  <div className="flex items-center gap-2">
                    <p className="text-sm font-mono text-gray-500">{ticket.id}</p>
                    <span className={`px-1.5 py-0.5 text-xs font-medium rounded ${PRIORITY_STYLES[ticket.priority]}`}>
                      {ticket.priority}
                    </span>
                    {ticket.isBreached && (
                      <span className="px-1.5 py-0.5 text-xs font-medium rounded bg-red-600 text-white">Breached</span>
                    )}
                  </div>
                  <p className="text-sm font-medium text-gray-900 truncate">{ticket.title}</p>
                  <p className="text-sm text-gray-500">{ticket.owner}</p>
                </div>
                <div className="text-right">
                  <p className="text-xs text-gray-500">{ticket.createdDate}</p>
                  <p className="text-xs text-gray-700">
                    {ticket.ageDays} {ticket.ageDays === 1 ? 'day' : 'days'} · {ticket.status}
                  </p>
                </div>
              </div>
            </li>
          ))}
        </ul>
      )}
    </div>
  )
}
