import { Outlet } from 'react-router-dom'
import { usePlatformHealth } from '@/hooks/usePlatformHealth'
import { Sidebar } from './Sidebar'
import { Header } from './Header'

export function MainLayout() {
  usePlatformHealth({ autoLoad: true })

  return (
    <div className="flex h-screen bg-gray-50">
      <Sidebar />
      <div className="flex-1 flex flex-col overflow-hidden">
        <Header />
        <main className="flex-1 overflow-auto">
          <Outlet />
        </main>
      </div>
    </div>
  )
}
