import { describe, it, expect } from 'vitest'
import { computeBulgeDeltas } from '../spiral/bulge.js'

const OPTS = { amplitude: 0.4, sigma: 0.04 }

describe('computeBulgeDeltas', () => {
  it('should handle empty and single-character texts', () => {
    expect(computeBulgeDeltas(0, 0.5, OPTS)).toEqual([])
    expect(computeBulgeDeltas(1, 0.5, OPTS)).toEqual([0])
  })

  it('should leave characters up to the anomaly untouched', () => {
    const deltas = computeBulgeDeltas(101, 0.5, OPTS)
    expect(deltas.slice(0, 51).every((d) => d === 0)).toBe(true)
    expect(deltas[51]).toBeGreaterThan(0)
  })

  it('should follow the half-Gaussian ramp past the anomaly', () => {
    const deltas = computeBulgeDeltas(101, 0.5, OPTS)
    // tChar = 0.6, d = 2.5 sigmas
    expect(deltas[60]).toBeCloseTo(0.4 * (1 - Math.exp(-3.125)), 10)
  })

  it('should never decrease and never exceed the amplitude', () => {
    for (const a of [0, 0.25, 0.5, 0.9]) {
      const deltas = computeBulgeDeltas(400, a, OPTS)
      for (let i = 1; i < deltas.length; i++) {
        expect(deltas[i]).toBeGreaterThanOrEqual(deltas[i - 1])
        expect(deltas[i]).toBeLessThanOrEqual(OPTS.amplitude)
      }
    }
  })

  it('should saturate near the amplitude far past the anomaly', () => {
    const deltas = computeBulgeDeltas(101, 0.5, OPTS)
    expect(deltas[100]).toBeCloseTo(0.4, 10)
  })

  it('should bulge every character after the first when the anomaly is at the start', () => {
    const deltas = computeBulgeDeltas(50, 0, OPTS)
    expect(deltas[0]).toBe(0)
    expect(deltas.slice(1).every((d) => d > 0)).toBe(true)
  })

  it('should not bulge at all when the anomaly is at the end', () => {
    expect(computeBulgeDeltas(50, 1, OPTS).every((d) => d === 0)).toBe(true)
  })

  it('should clamp the anomaly fraction', () => {
    expect(computeBulgeDeltas(20, 3, OPTS)).toEqual(computeBulgeDeltas(20, 1, OPTS))
    expect(computeBulgeDeltas(20, -1, OPTS)).toEqual(computeBulgeDeltas(20, 0, OPTS))
  })

  it('should step straight to the amplitude for a zero sigma', () => {
    expect(computeBulgeDeltas(3, 0.5, { amplitude: 0.4, sigma: 0 })).toEqual([0, 0, 0.4])
  })

  it('should keep deltas at zero for a negative amplitude', () => {
    expect(computeBulgeDeltas(5, 0, { amplitude: -0.4, sigma: 0.04 })).toEqual([0, 0, 0, 0, 0])
  })
})
