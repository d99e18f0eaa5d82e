import type { ReactElement, ReactNode } from 'react'
import { render, type RenderOptions } from '@testing-library/react'
import { Provider } from 'react-redux'
import { MemoryRouter } from 'react-router-dom'
import { combineReducers, configureStore } from '@reduxjs/toolkit'
import { reducer } from '@/store'
import type { PlatformHealth } from '@/types/platforms'
import type { TicketRecord } from '@/types/records'

const rootReducer = combineReducers(reducer)

type TestState = ReturnType<typeof rootReducer>

interface ExtendedRenderOptions extends Omit<RenderOptions, 'queries'> {
  preloadedState?: Partial<TestState>
  withRouter?: boolean
  initialEntries?: string[]
}

export function createTestStore(preloadedState?: Partial<TestState>) {
  return configureStore({
    reducer: rootReducer,
    preloadedState,
  })
}

export function renderWithProviders(
  ui: ReactElement,
  {
    preloadedState,
    withRouter = true,
    initialEntries = ['/'],
    ...renderOptions
  }: ExtendedRenderOptions = {}
) {
  const store = createTestStore(preloadedState)

  function Wrapper({ children }: { children: ReactNode }) {
    const content = <Provider store={store}>{children}</Provider>
    return withRouter ? <MemoryRouter initialEntries={initialEntries}>{content}</MemoryRouter> : content
  }

  return { store, ...render(ui, { wrapper: Wrapper, ...renderOptions }) }
}

export function makeTicket(overrides: Partial<TicketRecord> = {}): TicketRecord {
  return {
    id: 'INC0001',
    platform: 'datalake',
    title: 'Nightly load stalled',
    priority: 'Medium',
    status: 'Open',
    owner: 'Data Ops',
    createdDate: '2024-03-01',
    ageDays: 3,
    isActive: true,
    isBreached: false,
    ...overrides,
  }
}

export function makePlatform(overrides: Partial<PlatformHealth> = {}): PlatformHealth {
  return {
    id: 'datalake',
    name: 'Data Lake',
    subtitle: 'Enterprise Data Lake',
    status: 'healthy',
    statusLabel: 'Healthy',
    metrics: {
      primary: { label: 'Pipeline Failures', value: '2', threshold: '< 5' },
      secondary: { label: 'Data Delays', value: '8', threshold: '< 15' },
      tertiary: { label: 'Open Tickets', value: '4' },
    },
    trend: 'stable',
    ...overrides,
  }
}

export * from '@testing-library/react'
export { default as userEvent } from '@testing-library/user-event'
