import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ResponsiveContainer,
  ReferenceDot,
  ReferenceLine,
} from 'recharts'
import type { HistoricalStats, MetricWindow, OutlierSeverity, ThresholdPair } from '@/types/telemetry'
import { toChartPoints, toOutlierMarkers } from './chartData'

interface MetricChartProps {
  title: string
  timestamps: string[]
  window: MetricWindow
  unit?: string
  threshold?: Readonly<ThresholdPair>
  stats?: HistoricalStats
  capacity?: number
  color?: string
}

const SEVERITY_COLORS: Record<OutlierSeverity, string> = {
  warning: '#f59e0b',
  critical: '#ef4444',
}

export function MetricChart({
  title,
  timestamps,
  window,
  unit = '',
  threshold,
  stats,
  capacity,
  color = '#3b82f6',
}: MetricChartProps) {
  const chartData = toChartPoints(timestamps, window)
  const markers = toOutlierMarkers(timestamps, window)
  const latest = chartData[chartData.length - 1]
  const critical = markers.filter((m) => m.severity === 'critical').length

  const formatValue = (value: number) => `${value.toLocaleString()}${unit}`

  return (
    <div className="bg-white rounded-lg shadow-sm border border-gray-200 p-6">
      <div className="flex items-center justify-between mb-4">
        <div>
          <h2 className="text-lg font-semibold text-gray-900">{title}</h2>
          <p className="text-sm text-gray-500 mt-1">
            Current: {latest ? formatValue(latest.value) : 'n/a'}
          </p>
        </div>
        {markers.length > 0 && (
          <span
            className={`px-2.5 py-1 text-xs font-medium rounded-full ${
              critical > 0 ? 'bg-red-100 text-red-700' : 'bg-yellow-100 text-yellow-700'
            }`}
          >
            {markers.length} {markers.length === 1 ? 'outlier' : 'outliers'}
          </span>
        )}
      </div>

      {chartData.length === 0 ? (
        <div className="h-64 flex items-center justify-center text-sm text-gray-500">No data</div>
      ) : (
        <div className="h-64">
          <ResponsiveContainer width="100%" height="100%">
            <LineChart data={chartData} margin={{ top: 5, right: 30, left: 20, bottom: 5 }}>
              <CartesianGrid strokeDasharray="3 3" stroke="#e5e7eb" />
              <XAxis
                dataKey="timestamp"
                tick={{ fontSize: 12, fill: '#6b7280' }}
                tickFormatter={(label: string) => label.slice(11) || label}
                tickLine={false}
                axisLine={{ stroke: '#e5e7eb' }}
                minTickGap={32}
              />
              <YAxis
                tickFormatter={(v: number) => `${v}${unit}`}
                tick={{ fontSize: 12, fill: '#6b7280' }}
                tickLine={false}
                axisLine={{ stroke: '#e5e7eb' }}
              />
              <Tooltip
                formatter={(value) => [formatValue(Number(value)), title]}
                labelStyle={{ color: '#111827', fontWeight: 500 }}
                contentStyle={{
                  backgroundColor: 'white',
                  border: '1px solid #e5e7eb',
                  borderRadius: '8px',
                  boxShadow: '0 4px 6px -1px rgb(0 0 0 / 0.1)',
                }}
              />
              {stats && (
                <ReferenceLine
                  y={stats.average}
                  stroke="#6b7280"
                  strokeDasharray="4 4"
                  label={{ value: `Avg ${formatValue(stats.average)}`, fontSize: 11, fill: '#6b7280' }}
                />
              )}
              {stats && (
                <ReferenceLine
                  y={stats.peak}
                  stroke="#8b5cf6"
                  strokeDasharray="4 4"
                  label={{ value: `Peak ${formatValue(stats.peak)}`, fontSize: 11, fill: '#8b5cf6' }}
                />
              )}
              {threshold && Number.isFinite(threshold.critical) && (
                <ReferenceLine y={threshold.critical} stroke={SEVERITY_COLORS.critical} strokeDasharray="2 2" />
              )}
              {capacity !== undefined && (
                <ReferenceLine
                  y={capacity}
                  stroke="#111827"
                  label={{ value: `Capacity ${formatValue(capacity)}`, fontSize: 11, fill: '#111827' }}
                />
              )}
              <Line
                type="monotone"
                dataKey="value"
                stroke={color}
                strokeWidth={2}
                dot={false}
                activeDot={{ r: 6 }}
              />
              {markers.map((marker) => (
                <ReferenceDot
                  key={`${marker.timestamp}-${marker.severity}`}
                  x={marker.timestamp}
                  y={marker.value}
                  r={5}
                  fill={SEVERITY_COLORS[marker.severity]}
                  stroke="#fff"
                  strokeWidth={2}
                />
              ))}
            </LineChart>
          </ResponsiveContainer>
        </div>
      )}
    </div>
  )
}
