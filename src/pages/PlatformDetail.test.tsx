import { describe, it, expect } from 'vitest'
import { Route, Routes } from 'react-router-dom'
import { makePlatform, makeTicket, renderWithProviders, screen } from '@/test/utils'
import { PlatformDetail } from './PlatformDetail'

function renderAt(path: string, options?: Parameters<typeof renderWithProviders>[1]) {
  return renderWithProviders(
    <Routes>
      <Route path="/platforms/:id" element={<PlatformDetail />} />
    </Routes>,
    { initialEntries: [path], ...options }
  )
}

describe('PlatformDetail', () => {
  it('reports unknown platforms', () => {
    renderAt('/platforms/mainframe')
    expect(screen.getByText('Unknown platform "mainframe"')).toBeInTheDocument()
  })

  it('renders the warehouse charts', () => {
    renderAt('/platforms/warehouse')

    for (const title of ['Memory Usage', 'Active Users', 'CPU', 'Load Time', 'Open Tickets (30 days)']) {
      expect(screen.getByRole('heading', { name: title })).toBeInTheDocument()
    }
    expect(screen.queryByRole('heading', { name: 'Machines' })).not.toBeInTheDocument()
  })

  it('shows machines for multi-machine platforms', () => {
    renderAt('/platforms/analytics')

    expect(screen.getByRole('heading', { name: 'Machines' })).toBeInTheDocument()
    expect(screen.getByText('ANA-SRV-08')).toBeInTheDocument()
  })

  it('shows the pipeline summary for the data lake', () => {
    renderAt('/platforms/datalake', {
      preloadedState: {
        records: {
          tickets: [makeTicket({ id: 'INC9', title: 'Lake ticket' })],
          pipelines: [
            { platform: 'datalake', pipelineId: 'p1', status: 'failed', delaySeconds: 0 },
            { platform: 'datalake', pipelineId: 'p2', status: 'successful', delaySeconds: 0 },
          ],
          snapshots: [],
          filters: {},
        },
      },
    })

    expect(screen.getByText('Failed')).toBeInTheDocument()
    expect(screen.getAllByText('50.0% of 2')).toHaveLength(2)
    expect(screen.getByText('Lake ticket')).toBeInTheDocument()
  })

  it('uses the evaluated platform name', () => {
    renderAt('/platforms/datalake', {
      preloadedState: {
        platforms: {
          items: [makePlatform({ statusLabel: 'Attention', status: 'attention' })],
          summary: null,
          hours: 6,
          lastUpdated: null,
          loading: false,
          error: null,
        },
      },
    })

    expect(screen.getByRole('heading', { level: 1, name: 'Data Lake' })).toBeInTheDocument()
    expect(screen.getByText('Enterprise Data Lake · Attention')).toBeInTheDocument()
  })
})
