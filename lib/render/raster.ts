/**
 * Down-samples a composed frame onto a braille-resolution pixel grid.
 *
 * Each draw instruction lights one sub-pixel, colored by whether the glyph
 * uses the text or the anomaly color. Later draws overwrite earlier ones.
 */

import type { Frame, Rgba } from '../spiral/types.js'
import { colorKey, PREVIEW_ANOMALY_INDEX, PREVIEW_TEXT_INDEX, type ColorGrid } from './grid.js'

export interface RasterTarget {
  /** Terminal columns; each holds 2 sub-pixels across. */
  cols: number
  /** Terminal rows; each holds 4 sub-pixels down. */
  rows: number
}

function sameColor(a: Rgba, b: Rgba): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2] && a[3] === b[3]
}

export function rasterizeFrame(
  frame: Frame,
  canvasSize: number,
  anomalyColor: Rgba,
  target: RasterTarget,
): ColorGrid {
  const grid: ColorGrid = new Map()
  const width = target.cols * 2
  const height = target.rows * 4
  if (width === 0 || height === 0 || canvasSize <= 0) return grid

  for (const draw of frame.draws) {
    const px = Math.floor((draw.x / canvasSize) * width)
    const py = Math.floor((draw.y / canvasSize) * height)
    if (px < 0 || px >= width || py < 0 || py >= height) continue
    grid.set(
      colorKey(px, py),
      sameColor(draw.color, anomalyColor) ? PREVIEW_ANOMALY_INDEX : PREVIEW_TEXT_INDEX,
    )
  }
  return grid
}
