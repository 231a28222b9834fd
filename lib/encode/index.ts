/**
 * Frame sink selection by output file extension.
 */

import * as path from 'node:path'

import type { SpiralConfig } from '../spiral/config.js'
import { UnsupportedOutputError } from '../spiral/errors.js'
import type { FrameSink } from '../spiral/types.js'
import { ManifestFileSink } from './manifest.js'
import { SvgFileSink } from './svg.js'

export { ManifestFileSink, buildFrameManifest, encodeFrameManifest } from './manifest.js'
export type { FrameManifest } from './manifest.js'
export { SvgFileSink, encodeSvgAnimation, escapeXml } from './svg.js'
export type { SvgStyle } from './svg.js'

export const DEFAULT_OUTPUT_PATH = 'spiral_growing.svg'

/**
 * @throws UnsupportedOutputError for extensions other than .svg and .json.
 */
export function createFrameSink(outputPath: string, config: SpiralConfig): FrameSink {
  switch (path.extname(outputPath).toLowerCase()) {
    case '.svg':
      return new SvgFileSink(outputPath, {
        fontFamily: config.fontFamily,
        fontSize: config.fontSize,
      })
    case '.json':
      return new ManifestFileSink(outputPath)
    default:
      throw new UnsupportedOutputError(outputPath)
  }
}
