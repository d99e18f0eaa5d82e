import { createSlice, type PayloadAction } from '@reduxjs/toolkit'
import { DASHBOARD_CONFIG } from '@/config/settings'
import type { PlatformHealth, StatusSummary } from '@/types/platforms'

interface PlatformsState {
  items: PlatformHealth[]
  summary: StatusSummary | null
  hours: number
  lastUpdated: string | null
  loading: boolean
  error: string | null
}

const initialState: PlatformsState = {
  items: [],
  summary: null,
  hours: DASHBOARD_CONFIG.defaultHours,
  lastUpdated: null,
  loading: false,
  error: null,
}

const platformsSlice = createSlice({
  name: 'platforms',
  initialState,
  reducers: {
    setPlatforms: (state, action: PayloadAction<{ items: PlatformHealth[]; summary: StatusSummary; updatedAt: string }>) => {
      state.items = action.payload.items
      state.summary = action.payload.summary
      state.lastUpdated = action.payload.updatedAt
    },
    setHours: (state, action: PayloadAction<number>) => {
      state.hours = action.payload
    },
    setLoading: (state, action: PayloadAction<boolean>) => {
      state.loading = action.payload
    },
    setError: (state, action: PayloadAction<string | null>) => {
      state.error = action.payload
    },
  },
})

export const { setPlatforms, setHours, setLoading, setError } = platformsSlice.actions
export default platformsSlice.reducer
