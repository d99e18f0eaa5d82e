import { describe, it, expect } from 'vitest'
import { createRandomSource } from '@/lib/random'
import { stubRandom } from '@/test/random'
import { addNoise } from './noise'

describe('addNoise', () => {
  it('adds jitter proportional to the value', () => {
    expect(addNoise(10, 0.1, stubRandom(2))).toBeCloseTo(12, 10)
    expect(addNoise(200, 0.05, stubRandom(-1))).toBeCloseTo(190, 10)
  })

  it('never returns a negative value', () => {
    expect(addNoise(10, 0.1, stubRandom(-20))).toBe(0)
  })

  it('keeps zero at zero', () => {
    expect(addNoise(0, 0.5, createRandomSource(1))).toBe(0)
  })
})
