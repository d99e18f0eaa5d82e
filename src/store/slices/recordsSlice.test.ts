import { describe, it, expect } from 'vitest'
import { makeTicket } from '@/test/utils'
import reducer, { setFilters, setRecords } from './recordsSlice'

describe('recordsSlice', () => {
  const initial = reducer(undefined, { type: 'init' })

  it('replaces every record set at once', () => {
    const state = reducer(
      initial,
      setRecords({
        tickets: [makeTicket()],
        pipelines: [{ platform: 'datalake', pipelineId: 'p1', status: 'failed', delaySeconds: 0 }],
        snapshots: [],
      })
    )

    expect(state.tickets.map((t) => t.id)).toEqual(['INC0001'])
    expect(state.pipelines).toHaveLength(1)
    expect(state.snapshots).toEqual([])
  })

  it('keeps ticket filters', () => {
    const state = reducer(initial, setFilters({ platform: 'warehouse', breachedOnly: true }))
    expect(state.filters).toEqual({ platform: 'warehouse', breachedOnly: true })
  })
})
