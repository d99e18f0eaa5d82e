import { describe, it, expect } from 'vitest'
import { toChartPoints, toOutlierMarkers } from './chartData'

describe('toChartPoints', () => {
  it('pairs timestamps with values', () => {
    expect(toChartPoints(['10:00', '10:05'], { values: [1, 2], outliers: [] })).toEqual([
      { timestamp: '10:00', value: 1 },
      { timestamp: '10:05', value: 2 },
    ])
  })

  it('stops at the shorter series', () => {
    expect(toChartPoints(['a', 'b', 'c'], { values: [1], outliers: [] })).toHaveLength(1)
  })
})

describe('toOutlierMarkers', () => {
  it('places markers on the plotted value', () => {
    expect(
      toOutlierMarkers(['a', 'b'], {
        values: [19, 22],
        outliers: [{ index: 1, value: 23, severity: 'critical' }],
      })
    ).toEqual([{ timestamp: 'b', value: 22, severity: 'critical' }])
  })

  it('drops outliers outside the grid', () => {
    expect(
      toOutlierMarkers(['a'], { values: [1, 50], outliers: [{ index: 1, value: 50, severity: 'warning' }] })
    ).toEqual([])
  })
})
