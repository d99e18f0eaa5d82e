import { describe, it, expect } from 'vitest'
import { applyDailyPattern } from './dailyPattern'

describe('applyDailyPattern', () => {
  it('peaks on the morning bump', () => {
    const expected = 100 * (1 + 0.3 * (0.7 + 0.5 * Math.exp(-1.6)))
    expect(applyDailyPattern(100, 10.5)).toBeCloseTo(expected, 10)
  })

  it('leaves night-time values at base', () => {
    expect(applyDailyPattern(100, 0)).toBeCloseTo(100, 3)
  })

  it('is flat with zero amplitude', () => {
    expect(applyDailyPattern(42, 11, 0)).toBe(42)
  })

  it('scales with amplitude', () => {
    expect(applyDailyPattern(100, 14, 0.8)).toBeGreaterThan(applyDailyPattern(100, 14, 0.3))
    expect(applyDailyPattern(100, 11)).toBeGreaterThan(applyDailyPattern(100, 3))
  })
})
