/**
 * Per-point direction of travel along the spiral, used to rotate glyphs so
 * their baseline follows the curve.
 */

import type { SpiralPoint } from './types.js'

const RAD_TO_DEG = 180 / Math.PI

/**
 * Tangent angle in degrees for every point.
 *
 * Central difference inside the sequence, one-sided at both ends. A single
 * point has no neighbour to measure against and gets 0.
 */
export function computeTangentAngles(points: readonly SpiralPoint[]): number[] {
  const n = points.length
  if (n === 0) return []
  if (n === 1) return [0]

  const angles: number[] = []
  for (let i = 0; i < n; i++) {
    const from = points[Math.max(0, i - 1)]
    const to = points[Math.min(n - 1, i + 1)]
    angles.push(Math.atan2(to.y - from.y, to.x - from.x) * RAD_TO_DEG)
  }
  return angles
}
