/**
 * Animated SVG encoder.
 *
 * Each frame becomes a group that a discrete SMIL animation shows for one
 * frame duration per cycle; the cycle repeats forever when `meta.loop` is 0.
 * Glyphs are real <text> elements, so font rendering is left to the viewer.
 */

import * as path from 'node:path'

import { rgbaOpacity, rgbaToHex } from '../spiral/color.js'
import type { AnimationMeta, DrawInstruction, Frame, FrameSink, Rgba } from '../spiral/types.js'
import { writeOutputFile } from './output-file.js'

export interface SvgStyle {
  fontFamily: string
  fontSize: number
}

// ---------------------------------------------------------------------------
// Formatting helpers
// ---------------------------------------------------------------------------

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
}

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch] ?? ch)
}

/** Compact decimal: at most `digits` places, no trailing zeros, no "-0". */
function num(value: number, digits: number = 4): string {
  const rounded = Number(value.toFixed(digits))
  return Object.is(rounded, -0) ? '0' : String(rounded)
}

function fillAttrs(color: Rgba): string {
  const fill = `fill="${rgbaToHex(color)}"`
  if (color[3] >= 255) return fill
  return `${fill} fill-opacity="${num(rgbaOpacity(color), 3)}"`
}

// ---------------------------------------------------------------------------
// Elements
// ---------------------------------------------------------------------------

function textElement(draw: DrawInstruction): string {
  // SVG rotates clockwise (y down); draw angles are counter-clockwise.
  const transform = `translate(${draw.x} ${draw.y}) rotate(${num(-draw.rotationDeg, 2)})`
  return `<text transform="${transform}" ${fillAttrs(draw.color)}>${escapeXml(draw.char)}</text>`
}

function frameVisibility(position: number, total: number, meta: AnimationMeta): string {
  const cycle = `${num((total * meta.frameDurationMs) / 1000)}s`
  const repeat = meta.loop === 0 ? 'indefinite' : String(meta.loop)
  const start = num(position / total)
  const end = num((position + 1) / total)
  const [values, keyTimes] =
    position === 0 ? ['inline;none', `0;${end}`] : ['none;inline;none', `0;${start};${end}`]
  return (
    `<animate attributeName="display" values="${values}" keyTimes="${keyTimes}" ` +
    `dur="${cycle}" calcMode="discrete" repeatCount="${repeat}"/>`
  )
}

// ---------------------------------------------------------------------------
// Encoder
// ---------------------------------------------------------------------------

export function encodeSvgAnimation(
  frames: readonly Frame[],
  meta: AnimationMeta,
  style: SvgStyle,
): string {
  const { width, height } = meta
  const total = frames.length
  const lines: string[] = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `  <rect width="${width}" height="${height}" ${fillAttrs(meta.background)}/>`,
    `  <g font-family="${escapeXml(style.fontFamily)}" font-size="${num(style.fontSize)}" text-anchor="middle" dominant-baseline="central">`,
  ]

  frames.forEach((frame, position) => {
    if (total === 1) {
      lines.push(`    <g id="frame-${frame.index}">`)
    } else {
      lines.push(`    <g id="frame-${frame.index}" display="none">`)
      lines.push(`      ${frameVisibility(position, total, meta)}`)
    }
    for (const draw of frame.draws) {
      lines.push(`      ${textElement(draw)}`)
    }
    lines.push('    </g>')
  })

  lines.push('  </g>', '</svg>', '')
  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// Sink
// ---------------------------------------------------------------------------

export class SvgFileSink implements FrameSink {
  readonly destination: string
  private readonly _style: SvgStyle

  constructor(filePath: string, style: SvgStyle) {
    this.destination = path.resolve(filePath)
    this._style = style
  }

  async write(frames: readonly Frame[], meta: AnimationMeta): Promise<void> {
    await writeOutputFile(this.destination, encodeSvgAnimation(frames, meta, this._style))
    console.debug(`[sink] SVG animation saved to ${this.destination}`)
  }
}
