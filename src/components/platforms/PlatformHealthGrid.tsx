import type { PlatformHealth, PlatformId, PlatformMetric, PlatformStatus, PlatformTrend } from '@/types/platforms'

interface PlatformHealthGridProps {
  platforms: PlatformHealth[]
  loading?: boolean
  onSelectPlatform?: (platformId: PlatformId) => void
}

export const STATUS_CONFIG: Record<PlatformStatus, { color: string; bg: string; dot: string; border: string }> = {
  healthy: { color: 'text-green-700', bg: 'bg-green-100', dot: 'bg-green-500', border: '' },
  attention: { color: 'text-yellow-700', bg: 'bg-yellow-100', dot: 'bg-yellow-500', border: 'border-l-4 border-l-yellow-400' },
  critical: { color: 'text-red-700', bg: 'bg-red-100', dot: 'bg-red-500', border: 'border-l-4 border-l-red-500' },
}

const TREND_ICONS: Record<PlatformTrend, string> = {
  rising: '↑',
  stable: '→',
  falling: '↓',
}

function MetricRow({ metric }: { metric: PlatformMetric }) {
  return (
    <div className="flex items-center justify-between">
      <dt className="text-sm text-gray-500">{metric.label}</dt>
      <dd className="text-sm font-medium text-gray-900">
        {metric.value}
        {metric.threshold && <span className="ml-2 text-xs font-normal text-gray-400">{metric.threshold}</span>}
      </dd>
    </div>
  )
}

export function PlatformHealthGrid({ platforms, loading = false, onSelectPlatform }: PlatformHealthGridProps) {
  if (loading && platforms.length === 0) {
    return (
      <div className="grid grid-cols-1 md:grid-cols-2 lg:grid-cols-4 gap-4">
        {[1, 2, 3, 4].map((i) => (
          <div key={i} className="bg-white rounded-lg shadow-sm border border-gray-200 p-6 animate-pulse">
            <div className="h-4 bg-gray-200 rounded w-1/2 mb-4" />
            <div className="h-3 bg-gray-200 rounded w-1/4 mb-6" />
            <div className="space-y-3">
              <div className="h-3 bg-gray-200 rounded w-3/4" />
              <div className="h-3 bg-gray-200 rounded w-2/3" />
              <div className="h-3 bg-gray-200 rounded w-1/2" />
            </div>
          </div>
        ))}
      </div>
    )
  }

  if (platforms.length === 0) {
    return (
      <div className="bg-gray-50 border border-gray-200 rounded-lg p-8 text-center">
        <p className="text-gray-600 font-medium">No platform data</p>
        <p className="mt-1 text-sm text-gray-500">Refresh to evaluate platform health</p>
      </div>
    )
  }

  return (
    <div className="grid grid-cols-1 md:grid-cols-2 lg:grid-cols-4 gap-4">
      {platforms.map((platform) => {
        const config = STATUS_CONFIG[platform.status]
        return (
          <div
            key={platform.id}
            data-testid={`platform-card-${platform.id}`}
            onClick={() => onSelectPlatform?.(platform.id)}
            className={`bg-white rounded-lg shadow-sm border border-gray-200 p-6 transition-all ${
              onSelectPlatform ? 'cursor-pointer hover:shadow-md hover:border-blue-300' : ''
            } ${config.border}`}
          >
            <div className="flex items-start justify-between mb-4">
              <div>
                <h3 className="text-lg font-semibold text-gray-900">{platform.name}</h3>
                <p className="text-xs text-gray-500 mt-0.5">{platform.subtitle}</p>
              </div>
              <span
                className={`inline-flex items-center gap-1.5 px-2.5 py-1 text-xs font-medium rounded-full ${config.bg} ${config.color}`}
              >
                <span className={`w-2 h-2 rounded-full ${config.dot}`} />
                {platform.statusLabel}
              </span>
            </div>

            <dl className="space-y-3">
              <MetricRow metric={platform.metrics.primary} />
              <MetricRow metric={platform.metrics.secondary} />
              <MetricRow metric={platform.metrics.tertiary} />
            </dl>

            <div className="mt-4 pt-4 border-t border-gray-100 flex items-center justify-between text-xs">
              <span className="text-gray-500">Trend</span>
              <span className="font-mono text-gray-700" title={platform.trend}>
                {TREND_ICONS[platform.trend]} {platform.trend}
              </span>
            </div>
          </div>
        )
      })}
    </div>
  )
}
