import type { PlatformId } from '@/types/platforms'
import type { TicketFilters as Filters, TicketPriority } from '@/types/records'

interface TicketFiltersProps {
  filters: Filters
  onFilterChange: (filters: Filters) => void
}

const PLATFORMS: { value: PlatformId; label: string }[] = [
  { value: 'datalake', label: 'Data Lake' },
  { value: 'warehouse', label: 'Warehouse' },
  { value: 'analytics', label: 'Analytics' },
  { value: 'workflows', label: 'Workflows' },
]

const PRIORITIES: { value: TicketPriority; label: string }[] = [
  { value: 'High', label: 'High' },
  { value: 'Medium', label: 'Medium' },
  { value: 'Low', label: 'Low' },
]

export function TicketFilters({ filters, onFilterChange }: TicketFiltersProps) {
  const handlePlatformChange = (e: React.ChangeEvent<HTMLSelectElement>) => {
    const platform = PLATFORMS.find((p) => p.value === e.target.value)?.value
    onFilterChange({ ...filters, platform })
  }

  const handlePriorityChange = (e: React.ChangeEvent<HTMLSelectElement>) => {
    const priority = PRIORITIES.find((p) => p.value === e.target.value)?.value
    onFilterChange({ ...filters, priority })
  }

  const handleBreachedChange = (e: React.ChangeEvent<HTMLInputElement>) => {
    onFilterChange({ ...filters, breachedOnly: e.target.checked || undefined })
  }

  const handleClearFilters = () => {
    onFilterChange({})
  }

  const hasActiveFilters = filters.platform || filters.priority || filters.breachedOnly

  return (
    <div className="flex flex-wrap items-end gap-4 p-4 bg-white rounded-lg shadow-sm border border-gray-200">
      <div className="flex flex-col gap-1">
        <label htmlFor="platform-filter" className="text-sm font-medium text-gray-700">
          Platform
        </label>
        <select
          id="platform-filter"
          value={filters.platform || ''}
          onChange={handlePlatformChange}
          className="rounded-md border border-gray-300 px-3 py-1.5 text-sm focus:border-blue-500 focus:ring-1 focus:ring-blue-500"
        >
          <option value="">All platforms</option>
          {PLATFORMS.map((p) => (
            <option key={p.value} value={p.value}>
              {p.label}
            </option>
          ))}
        </select>
      </div>

      <div className="flex flex-col gap-1">
        <label htmlFor="priority-filter" className="text-sm font-medium text-gray-700">
          Priority
        </label>
        <select
          id="priority-filter"
          value={filters.priority || ''}
          onChange={handlePriorityChange}
          className="rounded-md border border-gray-300 px-3 py-1.5 text-sm focus:border-blue-500 focus:ring-1 focus:ring-blue-500"
        >
          <option value="">All priorities</option>
          {PRIORITIES.map((p) => (
            <option key={p.value} value={p.value}>
              {p.label}
            </option>
          ))}
        </select>
      </div>

      <label htmlFor="breached-filter" className="flex items-center gap-2 pb-1.5 text-sm font-medium text-gray-700">
        <input
          type="checkbox"
          id="breached-filter"
          checked={filters.breachedOnly || false}
          onChange={handleBreachedChange}
          className="rounded border-gray-300"
        />
        Breached only
      </label>

      {hasActiveFilters && (
        <button
          onClick={handleClearFilters}
          className="text-sm text-blue-600 hover:text-blue-800 hover:underline pb-1.5"
        >
          Clear filters
        </button>
      )}
    </div>
  )
}
