import type { Rgba } from './types.js'

function channelHex(value: number): string {
  return Math.max(0, Math.min(255, Math.round(value))).toString(16).padStart(2, '0')
}

/** Convert an RGBA color to #rrggbb (alpha dropped). */
export function rgbaToHex(color: Rgba): string {
  return `#${channelHex(color[0])}${channelHex(color[1])}${channelHex(color[2])}`
}

/** Alpha channel as an opacity in [0, 1]. */
export function rgbaOpacity(color: Rgba): number {
  return color[3] / 255
}

/**
 * Parse #rgb or #rrggbb into an opaque RGBA color.
 *
 * Returns null for anything else.
 */
export function hexToRgba(hex: string): Rgba | null {
  const h = hex.trim().replace(/^#/, '')
  const full = h.length === 3 ? h.split('').map((c) => c + c).join('') : h
  if (!/^[0-9a-fA-F]{6}$/.test(full)) return null
  return [
    parseInt(full.slice(0, 2), 16),
    parseInt(full.slice(2, 4), 16),
    parseInt(full.slice(4, 6), 16),
    255,
  ]
}
