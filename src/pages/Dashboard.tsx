import { Link, useNavigate } from 'react-router-dom'
import { PlatformHealthGrid } from '@/components/platforms'
import { TicketList } from '@/components/tickets'
import { usePlatformHealth } from '@/hooks/usePlatformHealth'
import { sortTickets } from '@/lib/performance'
import { toHealthSnapshot, triggerJsonDownload } from '@/lib/transport'
import { useAppSelector } from '@/store/hooks'

export function Dashboard() {
  const navigate = useNavigate()
  const { platforms, summary, loading, error, refresh } = usePlatformHealth()
  const tickets = useAppSelector((state) => state.records.tickets)
  const urgent = sortTickets(tickets).slice(0, 5)

  const handleExport = () => {
    if (!summary) return
    triggerJsonDownload(toHealthSnapshot(platforms, summary, sortTickets(tickets)), 'platform-health.json')
  }

  return (
    <div className="p-6 space-y-6">
      <div className="flex items-center justify-between">
        <h1 className="text-2xl font-semibold text-gray-900">Overview</h1>
        <div className="flex gap-2">
          <button
            onClick={handleExport}
            disabled={!summary}
            className="px-3 py-1.5 text-sm font-medium rounded-md border border-gray-300 text-gray-700 hover:bg-gray-50 disabled:opacity-50"
          >
            Export JSON
          </button>
          <button
            onClick={() => void refresh()}
            disabled={loading}
            className="px-3 py-1.5 text-sm font-medium rounded-md bg-blue-600 text-white hover:bg-blue-700 disabled:opacity-50"
          >
            {loading ? 'Refreshing…' : 'Refresh'}
          </button>
        </div>
      </div>

      {error && (
        <div className="bg-red-50 border border-red-200 rounded-lg p-4 text-red-700">
          <p className="font-medium">Some platform data could not be loaded</p>
          <p className="text-sm mt-1">{error}. Affected values fall back to defaults.</p>
          <button onClick={() => void refresh()} className="mt-3 text-sm underline hover:text-red-800">
            Try again
          </button>
        </div>
      )}

      {summary && (
        <div className="grid grid-cols-2 lg:grid-cols-4 gap-4">
          <SummaryCard title="Healthy" value={summary.healthy} color="green" />
          <SummaryCard title="Attention" value={summary.attention} color="yellow" />
          <SummaryCard title="Critical" value={summary.critical} color="red" />
          <SummaryCard title="Open Tickets" value={summary.totalTickets} color="blue" link="/tickets" />
        </div>
      )}

      <PlatformHealthGrid
        platforms={platforms}
        loading={loading}
        onSelectPlatform={(id) => navigate(`/platforms/${id}`)}
      />

      <TicketList tickets={urgent} title="Most Urgent Tickets" />
    </div>
  )
}

interface SummaryCardProps {
  title: string
  value: number
  color: 'green' | 'yellow' | 'red' | 'blue'
  link?: string
}

function SummaryCard({ title, value, color, link }: SummaryCardProps) {
  const textColors = {
    green: 'text-green-700',
    yellow: 'text-yellow-700',
    red: 'text-red-700',
    blue: 'text-blue-700',
  }

  const content = (
    <>
      <p className="text-sm font-medium text-gray-500">{title}</p>
      <p className={`mt-2 text-3xl font-semibold ${textColors[color]}`}>{value}</p>
    </>
  )

  const className = 'bg-white rounded-lg shadow-sm border border-gray-200 p-6'
  return link ? (
    <Link to={link} className={`${className} hover:shadow-md hover:border-gray-300 transition-all`}>
      {content}
    </Link>
  ) : (
    <div className={className}>{content}</div>
  )
}
