import { createSlice, type PayloadAction } from '@reduxjs/toolkit'
import type { CapacitySnapshot, PipelineRecord, TicketFilters, TicketRecord } from '@/types/records'

interface RecordsState {
  tickets: TicketRecord[]
  pipelines: PipelineRecord[]
  snapshots: CapacitySnapshot[]
  filters: TicketFilters
}

const initialState: RecordsState = {
  tickets: [],
  pipelines: [],
  snapshots: [],
  filters: {},
}

const recordsSlice = createSlice({
  name: 'records',
  initialState,
  reducers: {
    setRecords: (
      state,
      action: PayloadAction<{ tickets: TicketRecord[]; pipelines: PipelineRecord[]; snapshots: CapacitySnapshot[] }>
    ) => {
      state.tickets = action.payload.tickets
      state.pipelines = action.payload.pipelines
      state.snapshots = action.payload.snapshots
    },
    setFilters: (state, action: PayloadAction<TicketFilters>) => {
      state.filters = action.payload
    },
  },
})

export const { setRecords, setFilters } = recordsSlice.actions
export default recordsSlice.reducer
