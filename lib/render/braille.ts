/**
 * Braille-character encoding of a ColorGrid for terminal previews.
 *
 * Each terminal character cell represents a 2x4 sub-pixel block. The
 * dominant palette index within a cell determines the chalk color applied
 * to the whole braille character.
 */

import chalk from 'chalk'

import type { ColorGrid } from './grid.js'
import type { RasterTarget } from './raster.js'

// ---------------------------------------------------------------------------
// Braille encoding
// ---------------------------------------------------------------------------

/**
 * Braille dot layout per terminal character cell (2 columns x 4 rows):
 *
 *   [dot1][dot4]     (0,0) (1,0)
 *   [dot2][dot5]     (0,1) (1,1)
 *   [dot3][dot6]     (0,2) (1,2)
 *   [dot7][dot8]     (0,3) (1,3)
 *
 * Unicode: 0x2800 + bit pattern
 */
const DOT_BITS: number[][] = [
  // [x][y] -> bit value
  [0x01, 0x02, 0x04, 0x40], // x=0: dots 1,2,3,7
  [0x08, 0x10, 0x20, 0x80], // x=1: dots 4,5,6,8
]

/** Convert a 2x4 dot array to a single braille character. */
export function toBraille(dots: boolean[][]): string {
  let code = 0x2800
  for (let x = 0; x < 2; x++) {
    for (let y = 0; y < 4; y++) {
      if (dots[x]?.[y]) {
        code |= DOT_BITS[x][y]
      }
    }
  }
  return String.fromCharCode(code)
}

// ---------------------------------------------------------------------------
// Color resolution
// ---------------------------------------------------------------------------

/**
 * Find the dominant palette index among the 8 sub-pixels of a braille cell.
 *
 * The most frequent non-negative index wins; ties go to the index seen
 * first. Returns -1 when no active pixels exist in the cell.
 */
export function dominantColor(cellX: number, cellY: number, colorGrid: ColorGrid): number {
  const counts = new Map<number, number>()
  const pixelX = cellX * 2
  const pixelY = cellY * 4

  for (let dx = 0; dx < 2; dx++) {
    for (let dy = 0; dy < 4; dy++) {
      const idx = colorGrid.get(`${pixelX + dx},${pixelY + dy}`)
      if (idx !== undefined && idx >= 0) {
        counts.set(idx, (counts.get(idx) ?? 0) + 1)
      }
    }
  }

  let best = -1
  let bestCount = 0
  for (const [idx, count] of counts) {
    if (count > bestCount) {
      bestCount = count
      best = idx
    }
  }
  return best
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/**
 * Render the grid as `target.rows` lines of `target.cols` braille characters.
 *
 * `palette` holds hex colors indexed by the grid's palette indices; cells
 * whose index has no palette entry are dimmed.
 */
export function renderBraille(
  colorGrid: ColorGrid,
  target: RasterTarget,
  palette: readonly string[],
): string[] {
  const lines: string[] = []

  for (let cy = 0; cy < target.rows; cy++) {
    let line = ''
    for (let cx = 0; cx < target.cols; cx++) {
      const dots: boolean[][] = [
        [false, false, false, false],
        [false, false, false, false],
      ]
      for (let dx = 0; dx < 2; dx++) {
        for (let dy = 0; dy < 4; dy++) {
          const idx = colorGrid.get(`${cx * 2 + dx},${cy * 4 + dy}`)
          if (idx !== undefined && idx >= 0) {
            dots[dx][dy] = true
          }
        }
      }

      const brailleChar = toBraille(dots)
      const paletteIdx = dominantColor(cx, cy, colorGrid)
      if (paletteIdx < 0) {
        line += brailleChar
      } else if (paletteIdx < palette.length) {
        line += chalk.hex(palette[paletteIdx])(brailleChar)
      } else {
        line += chalk.dim(brailleChar)
      }
    }
    lines.push(line)
  }

  return lines
}
