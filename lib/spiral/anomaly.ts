/**
 * Anomaly position input: percentage parsing and normalization.
 */

export const DEFAULT_ANOMALY_PCT = 70

function clamp(value: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, value))
}

/** Decimal real numbers only: no hex, binary or octal literals. */
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i
const INFINITY_PATTERN = /^([+-]?)inf(?:inity)?$/i

function parseDecimal(text: string): number {
  if (DECIMAL_PATTERN.test(text)) return Number(text)
  const inf = INFINITY_PATTERN.exec(text)
  if (inf) return inf[1] === '-' ? -Infinity : Infinity
  return Number.NaN
}

/**
 * Parse a user-supplied anomaly percentage.
 *
 * Accepts decimal numbers (with an optional exponent) and `inf`/`infinity`.
 * Anything else yields `fallback`; numbers outside [0, 100], infinities
 * included, are clamped, never rejected.
 */
export function parseAnomalyPercent(
  raw: string | undefined,
  fallback: number = DEFAULT_ANOMALY_PCT,
): number {
  const value = parseDecimal((raw ?? '').trim())
  if (Number.isNaN(value)) return clamp(fallback, 0, 100)
  return clamp(value, 0, 100)
}

/** Convert a percentage to the anomaly fraction used by every model. */
export function toAnomalyFraction(pct: number): number {
  if (Number.isNaN(pct)) return 0
  return clamp(pct / 100, 0, 1)
}
