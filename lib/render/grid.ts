/**
 * Sparse pixel grid used by the terminal preview.
 *
 * No side effects on import.
 */

/**
 * Maps pixel coordinates to palette indices.
 *
 * Key format: "x,y" (stringified for Map ergonomics).
 * Value: palette index, or -1 to clear the pixel.
 */
export type ColorGrid = Map<string, number>

export function colorKey(x: number, y: number): string {
  return `${x},${y}`
}

/** Palette slots written by the rasterizer. */
export const PREVIEW_TEXT_INDEX = 0
export const PREVIEW_ANOMALY_INDEX = 1
