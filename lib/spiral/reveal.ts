/**
 * Temporal slowdown: how many characters are revealed at a given time.
 *
 * The reveal curve is piecewise linear in three segments. Around the anomaly
 * the text axis has a window of about `slowChars` characters and the time
 * axis a window of `slowSeconds`; each segment gets the slope that makes its
 * character span fit its time span exactly, so the curve meets itself at both
 * breakpoints.
 */

export interface RevealOptions {
  durationSeconds: number
  slowChars: number
  slowSeconds: number
}

/** Breakpoints of the slow window on the character and time axes. */
export interface RevealWindow {
  i1: number
  i2: number
  t1: number
  t2: number
}

function clamp(value: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, value))
}

/**
 * Locate the slow window for a text of `numChars` characters.
 *
 * Returns null when no window fits on the time axis (or the text is too
 * short to have one); the reveal is then uniform. A window pinned to the
 * start or end of the animation also starts at the first or ends past the
 * last character, so no characters are owed to a zero-length segment.
 */
export function revealWindow(
  numChars: number,
  anomalyFraction: number,
  options: RevealOptions,
): RevealWindow | null {
  const n = numChars
  if (n < 2) return null

  const d = options.durationSeconds
  const a = clamp(anomalyFraction, 0, 1)

  const i0 = a * (n - 1)
  const halfW = Math.min(options.slowChars, n) / 2
  let i1 = Math.max(0, i0 - halfW)
  let i2 = Math.min(n, i0 + halfW)

  const tCenter = a * d
  const halfT = options.slowSeconds / 2
  const t1 = Math.max(0, tCenter - halfT)
  const t2 = Math.min(d, tCenter + halfT)
  if (t2 <= t1) return null

  if (t1 === 0) i1 = 0
  if (t2 === d) i2 = n

  return { i1, i2, t1, t2 }
}

/**
 * Fractional number of characters revealed at time `t` (seconds).
 *
 * Continuous and non-decreasing on [0, durationSeconds]; 0 at t = 0 and
 * `numChars` from the end of the animation on. A single character is shown
 * as soon as rendering starts.
 */
export function revealedCount(
  t: number,
  numChars: number,
  anomalyFraction: number,
  options: RevealOptions,
): number {
  const n = numChars
  if (n <= 0) return 0
  if (n === 1) return t >= 0 ? 1 : 0

  const d = options.durationSeconds
  if (t <= 0) return 0
  if (t >= d) return n

  const window = revealWindow(n, anomalyFraction, options)
  if (!window) return n * clamp(t / d, 0, 1)

  const { i1, i2, t1, t2 } = window
  let c: number
  if (t < t1) {
    const preSlope = i1 / t1
    c = preSlope * t
  } else if (t <= t2) {
    const slowSlope = (i2 - i1) / (t2 - t1)
    c = i1 + slowSlope * (t - t1)
  } else {
    const postSlope = (n - i2) / (d - t2)
    c = i2 + postSlope * (t - t2)
  }

  return clamp(c, 0, n)
}

/**
 * Integer number of characters to draw for a reveal count.
 *
 * At least one character is on screen once rendering begins.
 */
export function visibleCount(revealed: number, numChars: number): number {
  if (numChars <= 0) return 0
  return Math.max(1, Math.min(numChars, Math.floor(revealed)))
}
