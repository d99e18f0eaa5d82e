import { useAppSelector } from '@/store/hooks'

export function Header() {
  const lastUpdated = useAppSelector((state) => state.platforms.lastUpdated)
  const summary = useAppSelector((state) => state.platforms.summary)

  return (
    <header className="h-14 bg-white border-b border-gray-200 px-6 flex items-center justify-between">
      <span className="text-sm text-gray-500">
        {lastUpdated ? `Last updated: ${new Date(lastUpdated).toLocaleTimeString()}` : 'Not yet evaluated'}
      </span>
      {summary && (
        <div className="flex items-center gap-3 text-xs font-medium">
          <span className="text-green-700">{summary.healthy} healthy</span>
          <span className="text-yellow-700">{summary.attention} attention</span>
          <span className="text-red-700">{summary.critical} critical</span>
        </div>
      )}
    </header>
  )
}
