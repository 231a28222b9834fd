/**
 * Arc-length-uniform sampling of an Archimedean spiral.
 *
 * The spiral r(theta) = a + b * theta is walked in fixed angular steps while
 * the polyline length is accumulated. Each time the length crosses the next
 * multiple of `charSpacing`, a point is interpolated inside the current step,
 * so consecutive characters sit `charSpacing` apart along the curve (to within
 * the sampling error of one step).
 */

import type { SpiralPoint } from './types.js'

export interface SpiralPathOptions {
  initialRadius: number
  coilSpacing: number
  charSpacing: number
  stepTheta: number
}

/**
 * Place `numChars` points along the spiral, starting at its origin.
 *
 * Radius grows without bound, so arc length does too and the walk always
 * terminates for finite `numChars`.
 *
 * @throws RangeError when a spacing or the step is not positive (the walk
 *   would never advance).
 */
export function buildSpiralPath(
  numChars: number,
  options: SpiralPathOptions,
): SpiralPoint[] {
  const { initialRadius, coilSpacing, charSpacing, stepTheta } = options
  const points: SpiralPoint[] = []
  if (numChars <= 0) return points

  if (!(charSpacing > 0) || !(coilSpacing > 0) || !(stepTheta > 0)) {
    throw new RangeError(
      `spiral spacing must be positive (charSpacing=${charSpacing}, coilSpacing=${coilSpacing}, stepTheta=${stepTheta})`,
    )
  }

  const a = initialRadius
  const b = coilSpacing / (2 * Math.PI)

  let theta = 0
  let lastX = a
  let lastY = 0
  let accumulated = 0
  let targetLength = 0

  while (points.length < numChars) {
    const prevTheta = theta
    theta += stepTheta
    const r = a + b * theta
    const x = r * Math.cos(theta)
    const y = r * Math.sin(theta)

    const dx = x - lastX
    const dy = y - lastY
    const ds = Math.hypot(dx, dy)
    accumulated += ds

    // A long step can cover several characters.
    while (accumulated >= targetLength && points.length < numChars) {
      const excess = accumulated - targetLength
      const t = ds !== 0 ? 1 - excess / ds : 0
      points.push({
        x: lastX + t * dx,
        y: lastY + t * dy,
        theta: prevTheta + t * stepTheta,
      })
      targetLength += charSpacing
    }

    lastX = x
    lastY = y
  }

  return points
}
