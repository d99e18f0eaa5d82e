import { useCallback, useEffect } from 'react'
import { api } from '@/api'
import { buildPlatformInputs, evaluatePlatforms, summarizeStatuses } from '@/lib/health'
import { logger } from '@/lib/logger'
import { useAppDispatch, useAppSelector } from '@/store/hooks'
import { setError, setLoading, setPlatforms } from '@/store/slices/platformsSlice'
import { setRecords } from '@/store/slices/recordsSlice'

const log = logger.child('health')

const settledOr = <T,>(result: PromiseSettledResult<T[]>): T[] =>
  result.status === 'fulfilled' ? result.value : []

interface UsePlatformHealthOptions {
  autoLoad?: boolean
}

/**
 * Loads tickets, pipelines and capacity snapshots, then classifies every
 * platform. A failed source only drops its records: the classifier falls
 * back to defaults and the first failure is kept as `error`.
 */
export function usePlatformHealth({ autoLoad = false }: UsePlatformHealthOptions = {}) {
  const dispatch = useAppDispatch()
  const platforms = useAppSelector((state) => state.platforms.items)
  const summary = useAppSelector((state) => state.platforms.summary)
  const loading = useAppSelector((state) => state.platforms.loading)
  const lastUpdated = useAppSelector((state) => state.platforms.lastUpdated)
  const error = useAppSelector((state) => state.platforms.error)

  const refresh = useCallback(async () => {
    dispatch(setLoading(true))
    dispatch(setError(null))
    try {
      const results = await Promise.allSettled([api.getTickets(), api.getPipelines(), api.getCapacitySnapshots()])
      const [ticketsResult, pipelinesResult, snapshotsResult] = results
      const tickets = settledOr(ticketsResult)
      const pipelines = settledOr(pipelinesResult)
      const snapshots = settledOr(snapshotsResult)

      const failure = results.find((r): r is PromiseRejectedResult => r.status === 'rejected')
      if (failure) {
        dispatch(setError(failure.reason instanceof Error ? failure.reason.message : 'Failed to load platform data'))
      }

      const items = evaluatePlatforms(buildPlatformInputs({ tickets, pipelines, snapshots }))
      const openTickets = tickets.filter((t) => t.isActive).length
      dispatch(setRecords({ tickets, pipelines, snapshots }))
      dispatch(
        setPlatforms({ items, summary: summarizeStatuses(items, openTickets), updatedAt: new Date().toISOString() })
      )
      log.info('Platform health evaluated', {
        tickets: tickets.length,
        pipelines: pipelines.length,
        snapshots: snapshots.length,
      })
    } finally {
      dispatch(setLoading(false))
    }
  }, [dispatch])

  useEffect(() => {
    if (autoLoad) void refresh()
  }, [autoLoad, refresh])

  return { platforms, summary, loading, lastUpdated, error, refresh }
}

export default usePlatformHealth
