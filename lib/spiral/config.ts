/**
 * Immutable animation configuration.
 *
 * Defaults reproduce the classic 800px / 30fps / 5s render. Every model
 * receives its parameters from a resolved SpiralConfig; there are no
 * process-wide settings.
 *
 * No side effects on import.
 */

import { SpiralConfigError } from './errors.js'
import type { Rgba } from './types.js'

// ---------------------------------------------------------------------------
// Shape
// ---------------------------------------------------------------------------

export interface SpiralConfig {
  /** Square canvas edge, in pixels. */
  readonly canvasSize: number
  /** Gap kept between the outermost glyph and the canvas edge. */
  readonly margin: number
  readonly fps: number
  readonly durationSeconds: number

  // Spiral geometry (world units)
  readonly initialRadius: number
  /** Radial distance between successive coils. */
  readonly coilSpacing: number
  /** Arc length between successive characters. */
  readonly charSpacing: number
  /** Angular sampling step used while measuring arc length. */
  readonly stepTheta: number

  // Text appearance
  readonly fontSize: number
  readonly fontFamily: string
  readonly textColor: Rgba
  readonly anomalyColor: Rgba
  readonly backgroundColor: Rgba

  // Temporal slowdown
  /** Nominal number of characters revealed during the slow window. */
  readonly slowChars: number
  readonly slowSeconds: number

  // Geometric bulge
  readonly bulgeAmplitude: number
  readonly bulgeSigma: number
  /** Half-width of the anomaly color band, in normalized index units. */
  readonly colorBandWidth: number

  /** Used when the anomaly percentage cannot be parsed. */
  readonly fallbackAnomalyPct: number
}

export type SpiralConfigOverrides = Partial<SpiralConfig>

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

const DEFAULT_BULGE_SIGMA = 0.04

/** Color band spans this many bulge sigmas on each side of the anomaly. */
export const COLOR_BAND_SIGMAS = 2.2

const DEFAULTS: SpiralConfig = {
  canvasSize: 800,
  margin: 40,
  fps: 30,
  durationSeconds: 5,
  initialRadius: 0,
  coilSpacing: 3,
  charSpacing: 1,
  stepTheta: 0.02,
  fontSize: 18,
  fontFamily: 'sans-serif',
  textColor: [0, 0, 0, 255],
  anomalyColor: [255, 0, 0, 255],
  backgroundColor: [255, 255, 255, 255],
  slowChars: 150,
  slowSeconds: 1.5,
  bulgeAmplitude: 0.4,
  bulgeSigma: DEFAULT_BULGE_SIGMA,
  colorBandWidth: DEFAULT_BULGE_SIGMA * COLOR_BAND_SIGMAS,
  fallbackAnomalyPct: 70,
}

export const DEFAULT_SPIRAL_CONFIG: SpiralConfig = Object.freeze(DEFAULTS)

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * `colorBandWidth` follows `bulgeSigma` unless it is overridden itself.
 *
 * @throws SpiralConfigError naming the first offending key.
 */
export function resolveConfig(overrides: SpiralConfigOverrides = {}): SpiralConfig {
  const bulgeSigma = overrides.bulgeSigma ?? DEFAULT_SPIRAL_CONFIG.bulgeSigma
  const config: SpiralConfig = {
    ...DEFAULT_SPIRAL_CONFIG,
    ...overrides,
    colorBandWidth: overrides.colorBandWidth ?? bulgeSigma * COLOR_BAND_SIGMAS,
  }
  validate(config)
  return Object.freeze(config)
}

function validate(config: SpiralConfig): void {
  const positive: (keyof SpiralConfig)[] = [
    'canvasSize',
    'fps',
    'durationSeconds',
    'coilSpacing',
    'charSpacing',
    'stepTheta',
    'fontSize',
    'bulgeSigma',
  ]
  for (const key of positive) {
    const value = config[key]
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
      throw new SpiralConfigError(key, `expected a positive number, got ${String(value)}`)
    }
  }

  const nonNegative: (keyof SpiralConfig)[] = [
    'margin',
    'initialRadius',
    'slowChars',
    'slowSeconds',
    'bulgeAmplitude',
    'colorBandWidth',
  ]
  for (const key of nonNegative) {
    const value = config[key]
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new SpiralConfigError(key, `expected a non-negative number, got ${String(value)}`)
    }
  }

  if (config.canvasSize <= 2 * config.margin) {
    throw new SpiralConfigError('margin', `must be less than half of canvasSize (${config.canvasSize})`)
  }
  if (config.fontFamily.trim() === '') {
    throw new SpiralConfigError('fontFamily', 'must not be empty')
  }
  if (config.fallbackAnomalyPct < 0 || config.fallbackAnomalyPct > 100) {
    throw new SpiralConfigError('fallbackAnomalyPct', 'expected a percentage between 0 and 100')
  }

  for (const key of ['textColor', 'anomalyColor', 'backgroundColor'] as const) {
    const color = config[key]
    if (color.length !== 4 || !color.every((c) => Number.isInteger(c) && c >= 0 && c <= 255)) {
      throw new SpiralConfigError(key, 'expected four integer channels between 0 and 255')
    }
  }
}

// ---------------------------------------------------------------------------
// Derived values
// ---------------------------------------------------------------------------

export function frameCount(config: SpiralConfig): number {
  return Math.round(config.fps * config.durationSeconds)
}

export function frameDurationMs(config: SpiralConfig): number {
  return Math.round(1000 / config.fps)
}
