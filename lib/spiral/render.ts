/**
 * End-to-end render: text and anomaly percentage in, frames handed to a sink.
 *
 * Each frame is composed synchronously, with a turn of the event loop after
 * it so progress listeners (the Ink view) can repaint between frames.
 */

import { setImmediate } from 'node:timers/promises'

import { toAnomalyFraction } from './anomaly.js'
import { composeFrame, prepareLayout } from './composer.js'
import { frameCount, frameDurationMs, type SpiralConfig } from './config.js'
import type { AnimationMeta, Frame, FrameSink } from './types.js'

export interface RenderRequest {
  text: string
  /** Anomaly position as a percentage; clamped to [0, 100]. */
  anomalyPct: number
  config: SpiralConfig
  sink: FrameSink
  /** Called after each composed frame, before yielding to the event loop. */
  onFrame?: (frame: Frame, total: number) => void
}

export type RenderResult =
  | { status: 'empty' }
  | {
      status: 'rendered'
      numChars: number
      frameCount: number
      anomalyFraction: number
      destination: string
      lastFrame: Frame | null
    }

export function animationMeta(config: SpiralConfig): AnimationMeta {
  return {
    width: config.canvasSize,
    height: config.canvasSize,
    background: config.backgroundColor,
    frameCount: frameCount(config),
    frameDurationMs: frameDurationMs(config),
    loop: 0,
  }
}

/**
 * Render the spiral animation for `text` into `sink`.
 *
 * Whitespace-only text produces no frames and leaves the sink untouched;
 * that outcome is returned as `{ status: 'empty' }`.
 */
export async function renderSpiralAnimation(request: RenderRequest): Promise<RenderResult> {
  const { text, anomalyPct, config, sink, onFrame } = request
  const anomalyFraction = toAnomalyFraction(anomalyPct)

  const layout = prepareLayout(text, anomalyFraction, config)
  const numChars = layout.records.length
  if (numChars === 0) {
    console.info('[render] No text entered, nothing to render')
    return { status: 'empty' }
  }

  console.debug(
    `[render] ${numChars} characters, anomaly at ${(anomalyFraction * 100).toFixed(1)}%`,
  )

  const total = frameCount(config)
  const frames: Frame[] = []
  for (let f = 0; f < total; f++) {
    const frame = composeFrame(layout, f, config)
    frames.push(frame)
    onFrame?.(frame, total)
    await setImmediate()
  }

  await sink.write(frames, animationMeta(config))

  console.debug(`[render] Wrote ${frames.length} frames to ${sink.destination}`)

  return {
    status: 'rendered',
    numChars,
    frameCount: frames.length,
    anomalyFraction,
    destination: sink.destination,
    lastFrame: frames.length > 0 ? frames[frames.length - 1] : null,
  }
}
