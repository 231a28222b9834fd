/**
 * Frame composition.
 *
 * `prepareLayout` runs once per text and freezes every per-character value
 * (path point, tangent, base radius, bulge). `composeFrame` then derives one
 * frame from that layout and the frame index alone, so frames can be
 * produced in any order and never depend on each other.
 */

import { computeBulgeDeltas } from './bulge.js'
import { frameCount, type SpiralConfig } from './config.js'
import { buildSpiralPath } from './path.js'
import { revealedCount, visibleCount } from './reveal.js'
import { computeTangentAngles } from './tangent.js'
import type {
  CharacterRecord,
  DrawInstruction,
  Frame,
  SpiralLayout,
} from './types.js'
import { normalizeText, splitCharacters } from '../utils/text.js'

/** Floor for radii used as divisors (the first point sits on the origin). */
const MIN_RADIUS = 1e-6

// ---------------------------------------------------------------------------
// Per-text precomputation
// ---------------------------------------------------------------------------

export function prepareLayout(
  text: string,
  anomalyFraction: number,
  config: SpiralConfig,
): SpiralLayout {
  const normalized = normalizeText(text)
  const chars = splitCharacters(normalized)
  const n = chars.length
  const a = Math.max(0, Math.min(1, anomalyFraction))

  const points = buildSpiralPath(n, config)
  const tangents = computeTangentAngles(points)
  const deltas = computeBulgeDeltas(n, a, {
    amplitude: config.bulgeAmplitude,
    sigma: config.bulgeSigma,
  })

  const records: CharacterRecord[] = chars.map((char, i) => {
    const point = points[i]
    return Object.freeze({
      char,
      index: i,
      point,
      tangentDeg: tangents[i],
      baseRadius: Math.hypot(point.x, point.y),
      bulgeDelta: deltas[i],
      tChar: n > 1 ? i / (n - 1) : 0,
    })
  })

  return Object.freeze({
    text: normalized,
    anomalyFraction: a,
    records: Object.freeze(records),
  })
}

// ---------------------------------------------------------------------------
// Per-frame derivation
// ---------------------------------------------------------------------------

function bulgedRadius(record: CharacterRecord): number {
  return (record.baseRadius || MIN_RADIUS) * (1 + record.bulgeDelta)
}

/**
 * Compose frame `frameIndex` (time `frameIndex / fps`).
 *
 * The view is zoomed so the outermost visible, bulged character lands on
 * the margin. Spaces take part in the zoom but produce no draw.
 */
export function composeFrame(
  layout: SpiralLayout,
  frameIndex: number,
  config: SpiralConfig,
): Frame {
  const { records, anomalyFraction } = layout
  const n = records.length
  const t = frameIndex / config.fps

  const revealed = revealedCount(t, n, anomalyFraction, config)
  const visible = visibleCount(revealed, n)

  let currentMaxRadius = 0
  for (let i = 0; i < visible; i++) {
    currentMaxRadius = Math.max(currentMaxRadius, bulgedRadius(records[i]))
  }

  const center = Math.floor(config.canvasSize / 2)
  const maxCanvasRadius = center - config.margin
  const scale = currentMaxRadius > 0 ? maxCanvasRadius / currentMaxRadius : 1

  const draws: DrawInstruction[] = []
  for (let i = 0; i < visible; i++) {
    const record = records[i]
    if (record.char === ' ') continue

    const grow = 1 + record.bulgeDelta
    const x = record.point.x * grow
    const y = record.point.y * grow
    const inBand = Math.abs(record.tChar - anomalyFraction) <= config.colorBandWidth

    draws.push({
      index: record.index,
      char: record.char,
      x: center + Math.trunc(x * scale),
      // Image rows grow downwards.
      y: center - Math.trunc(y * scale),
      rotationDeg: record.tangentDeg,
      color: inBand ? config.anomalyColor : config.textColor,
    })
  }

  return {
    index: frameIndex,
    timeSeconds: t,
    revealed,
    visibleCount: visible,
    scale,
    draws,
  }
}

/**
 * Compose every frame of the animation in index order.
 *
 * `onFrame` is called after each frame, e.g. to report progress.
 */
export function composeFrames(
  layout: SpiralLayout,
  config: SpiralConfig,
  onFrame?: (frame: Frame, total: number) => void,
): Frame[] {
  const total = frameCount(config)
  const frames: Frame[] = []
  for (let f = 0; f < total; f++) {
    const frame = composeFrame(layout, f, config)
    frames.push(frame)
    onFrame?.(frame, total)
  }
  return frames
}
