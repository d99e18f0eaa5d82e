import { configureStore } from '@reduxjs/toolkit'
import platformsReducer from './slices/platformsSlice'
import recordsReducer from './slices/recordsSlice'

export const reducer = {
  platforms: platformsReducer,
  records: recordsReducer,
}

export const store = configureStore({ reducer })

export type RootState = ReturnType<typeof store.getState>
export type AppDispatch = typeof store.dispatch
