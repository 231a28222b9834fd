/**
 * JSON frame manifest: the raw output contract (canvas, timing, per-frame
 * draw lists) for an external encoder to consume.
 */

import * as path from 'node:path'

import type { AnimationMeta, Frame, FrameSink } from '../spiral/types.js'
import { writeOutputFile } from './output-file.js'

export interface FrameManifest {
  width: number
  height: number
  background: number[]
  frameCount: number
  frameDurationMs: number
  loop: number
  frames: {
    index: number
    timeSeconds: number
    visibleCount: number
    scale: number
    draws: {
      char: string
      x: number
      y: number
      rotationDeg: number
      color: number[]
    }[]
  }[]
}

export function buildFrameManifest(frames: readonly Frame[], meta: AnimationMeta): FrameManifest {
  return {
    width: meta.width,
    height: meta.height,
    background: [...meta.background],
    frameCount: frames.length,
    frameDurationMs: meta.frameDurationMs,
    loop: meta.loop,
    frames: frames.map((frame) => ({
      index: frame.index,
      timeSeconds: frame.timeSeconds,
      visibleCount: frame.visibleCount,
      scale: frame.scale,
      draws: frame.draws.map((draw) => ({
        char: draw.char,
        x: draw.x,
        y: draw.y,
        rotationDeg: draw.rotationDeg,
        color: [...draw.color],
      })),
    })),
  }
}

export function encodeFrameManifest(frames: readonly Frame[], meta: AnimationMeta): string {
  return JSON.stringify(buildFrameManifest(frames, meta), null, 2) + '\n'
}

export class ManifestFileSink implements FrameSink {
  readonly destination: string

  constructor(filePath: string) {
    this.destination = path.resolve(filePath)
  }

  async write(frames: readonly Frame[], meta: AnimationMeta): Promise<void> {
    await writeOutputFile(this.destination, encodeFrameManifest(frames, meta))
    console.debug(`[sink] Frame manifest saved to ${this.destination}`)
  }
}
