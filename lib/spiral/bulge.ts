/**
 * One-sided geometric bulge.
 *
 * Characters at or before the anomaly keep their radius; past it the radius
 * grows by a half-Gaussian ramp that saturates at `amplitude`. The sequence
 * is then forced non-decreasing so an outer coil can never fall back onto
 * an inner one.
 */

export interface BulgeOptions {
  /** Maximum fractional radius expansion. */
  amplitude: number
  /** Ramp width, in normalized index units. */
  sigma: number
}

const MIN_SIGMA = 1e-9

/** Fractional radial expansion for each character index. */
export function computeBulgeDeltas(
  numChars: number,
  anomalyFraction: number,
  options: BulgeOptions,
): number[] {
  if (numChars <= 0) return []
  if (numChars === 1) return [0]

  const a = Math.max(0, Math.min(1, anomalyFraction))
  const sigma = Math.max(MIN_SIGMA, options.sigma)

  const deltas: number[] = []
  let maxSoFar = 0
  for (let i = 0; i < numChars; i++) {
    const tChar = i / (numChars - 1)
    let raw = 0
    if (tChar > a) {
      const d = (tChar - a) / sigma
      raw = options.amplitude * (1 - Math.exp(-0.5 * d * d))
    }
    // Running maximum keeps the sequence non-decreasing.
    if (raw > maxSoFar) maxSoFar = raw
    deltas.push(maxSoFar)
  }
  return deltas
}
