import { NavLink } from 'react-router-dom'

const NAV_ITEMS = [
  { to: '/', label: 'Overview', end: true },
  { to: '/platforms/datalake', label: 'Data Lake' },
  { to: '/platforms/warehouse', label: 'Warehouse' },
  { to: '/platforms/analytics', label: 'Analytics' },
  { to: '/platforms/workflows', label: 'Workflows' },
  { to: '/tickets', label: 'Tickets' },
]

export function Sidebar() {
  return (
    <aside className="w-56 bg-gray-900 text-gray-300 flex flex-col">
      <div className="px-6 py-5 text-lg font-semibold text-white">Platform Health</div>
      <nav className="flex-1 px-3 space-y-1">
        {NAV_ITEMS.map((item) => (
          <NavLink
            key={item.to}
            to={item.to}
            end={item.end}
            className={({ isActive }) =>
              `block px-3 py-2 rounded-md text-sm font-medium transition-colors ${
                isActive ? 'bg-gray-800 text-white' : 'hover:bg-gray-800 hover:text-white'
              }`
            }
          >
            {item.label}
          </NavLink>
        ))}
      </nav>
    </aside>
  )
}
