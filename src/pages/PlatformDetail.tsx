import { useMemo } from 'react'
import { Link, useParams } from 'react-router-dom'
import { MetricChart } from '@/components/charts'
import { MachineTable } from '@/components/platforms'
import { TicketList } from '@/components/tickets'
import {
  classifyMachines,
  describePanels,
  filterTickets,
  getPerformanceData,
  getPipelineSummary,
  getTicketHistory,
  getWarehouseMemoryStats,
  sortTickets,
  type MetricPanel,
} from '@/lib/performance'
import { parsePlatformId } from '@/lib/records'
import { getHistoricalStats } from '@/lib/telemetry'
import { useAppDispatch, useAppSelector } from '@/store/hooks'
import { setHours } from '@/store/slices/platformsSlice'
import type { PlatformId } from '@/types/platforms'
import type { CapacitySnapshot } from '@/types/records'
import type { HistoricalStats } from '@/types/telemetry'

const WINDOWS: { hours: number; label: string }[] = [
  { hours: 6, label: '6 Hours' },
  { hours: 24, label: '24 Hours' },
  { hours: 72, label: '3 Days' },
]

function statsFor(platform: PlatformId, panel: MetricPanel, snapshots: readonly CapacitySnapshot[]): HistoricalStats {
  if (platform === 'warehouse' && panel.key === 'memory_tb' && snapshots.length > 0) {
    return getWarehouseMemoryStats(snapshots)
  }
  return getHistoricalStats(panel.window.values, 'month')
}

export function PlatformDetail() {
  const { id = '' } = useParams()
  const platform = parsePlatformId(id)

  if (!platform) {
    return (
      <div className="p-6">
        <div className="bg-gray-50 border border-gray-200 rounded-lg p-8 text-center">
          <p className="text-gray-600 font-medium">Unknown platform "{id}"</p>
          <Link to="/" className="mt-2 inline-block text-sm text-blue-600 hover:text-blue-800">
            Back to overview
          </Link>
        </div>
      </div>
    )
  }

  return <PlatformPerformance platform={platform} />
}

function PlatformPerformance({ platform }: { platform: PlatformId }) {
  const dispatch = useAppDispatch()
  const hours = useAppSelector((state) => state.platforms.hours)
  const health = useAppSelector((state) => state.platforms.items.find((p) => p.id === platform))
  const snapshots = useAppSelector((state) => state.records.snapshots)
  const tickets = useAppSelector((state) => state.records.tickets)
  const pipelines = useAppSelector((state) => state.records.pipelines)

  const data = useMemo(() => getPerformanceData(platform, { hours, snapshots }), [platform, hours, snapshots])
  const panels = describePanels(platform, data)
  const machines =
    'machines' in data && (platform === 'analytics' || platform === 'workflows')
      ? classifyMachines(platform, data.machines)
      : null
  const history = useMemo(() => getTicketHistory(tickets, { platform }), [tickets, platform])
  const pipelineSummary = platform === 'datalake' ? getPipelineSummary(pipelines, platform) : null
  const platformTickets = sortTickets(filterTickets(tickets, { platform }))

  return (
    <div className="p-6 space-y-6">
      <div className="flex items-center justify-between">
        <div>
          <h1 className="text-2xl font-semibold text-gray-900">{health?.name ?? platform}</h1>
          {health && <p className="text-sm text-gray-500 mt-1">{health.subtitle} · {health.statusLabel}</p>}
        </div>
        <div className="flex gap-1 bg-gray-100 rounded-lg p-1">
          {WINDOWS.map((w) => (
            <button
              key={w.hours}
              onClick={() => dispatch(setHours(w.hours))}
              className={`px-3 py-1.5 text-sm font-medium rounded-md transition-colors ${
                hours === w.hours ? 'bg-white text-gray-900 shadow-sm' : 'text-gray-600 hover:text-gray-900'
              }`}
            >
              {w.label}
            </button>
          ))}
        </div>
      </div>

      {pipelineSummary && (
        <div className="grid grid-cols-2 lg:grid-cols-4 gap-4">
          <PipelineCount label="Successful" value={pipelineSummary.successful} total={pipelineSummary.total} />
          <PipelineCount label="Delayed" value={pipelineSummary.delayed} total={pipelineSummary.total} />
          <PipelineCount label="Failed" value={pipelineSummary.failed} total={pipelineSummary.total} />
          <PipelineCount label="Not Applicable" value={pipelineSummary.not_applicable} total={pipelineSummary.total} />
        </div>
      )}

      <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
        {panels.map((panel) => (
          <MetricChart
            key={panel.key}
            title={panel.title}
            timestamps={data.timestamps}
            window={panel.window}
            unit={panel.unit}
            threshold={panel.threshold}
            stats={statsFor(platform, panel, snapshots)}
            capacity={panel.capacity}
          />
        ))}
      </div>

      {machines && <MachineTable machines={machines} />}

      <MetricChart
        title="Open Tickets (30 days)"
        timestamps={history.timestamps}
        window={history.open_tickets}
        color="#8b5cf6"
      />

      <TicketList tickets={platformTickets} />
    </div>
  )
}

function PipelineCount({ label, value, total }: { label: string; value: number; total: number }) {
  return (
    <div className="bg-white rounded-lg shadow-sm border border-gray-200 p-4">
      <p className="text-sm font-medium text-gray-500">{label}</p>
      <p className="mt-1 text-2xl font-semibold text-gray-900">{value}</p>
      <p className="text-xs text-gray-500">{total > 0 ? `${((value / total) * 100).toFixed(1)}%` : '0%'} of {total}</p>
    </div>
  )
}
