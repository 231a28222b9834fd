/**
 * Core type definitions for the spiral animation.
 *
 * Renderer-agnostic: shared between the frame sinks (SVG, JSON manifest)
 * and the terminal preview. No side effects on import.
 */

// ---------------------------------------------------------------------------
// Geometry
// ---------------------------------------------------------------------------

/** A sampled position on the spiral, in world units. */
export interface SpiralPoint {
  readonly x: number
  readonly y: number
  /** Cumulative spiral angle (radians) at this point. */
  readonly theta: number
}

/** Red, green, blue, alpha; each channel 0-255. */
export type Rgba = readonly [number, number, number, number]

// ---------------------------------------------------------------------------
// Per-text precomputation
// ---------------------------------------------------------------------------

/**
 * Everything known about one character before any frame is composed.
 *
 * Built once per text and never mutated afterwards.
 */
export interface CharacterRecord {
  readonly char: string
  /** Position in the text (also reveal order and spiral order). */
  readonly index: number
  readonly point: SpiralPoint
  /** Direction of travel along the spiral, in degrees. */
  readonly tangentDeg: number
  /** Distance from the spiral origin before the bulge is applied. */
  readonly baseRadius: number
  /** Fractional radial expansion (0 before the anomaly). */
  readonly bulgeDelta: number
  /** Normalized index, 0 for the first character and 1 for the last. */
  readonly tChar: number
}

export interface SpiralLayout {
  /** Whitespace-normalized text the layout was built from. */
  readonly text: string
  readonly anomalyFraction: number
  readonly records: readonly CharacterRecord[]
}

// ---------------------------------------------------------------------------
// Frames
// ---------------------------------------------------------------------------

/** One glyph to draw: canvas position, rotation and color. */
export interface DrawInstruction {
  readonly index: number
  readonly char: string
  /** Canvas pixel column (origin top-left). */
  readonly x: number
  /** Canvas pixel row (origin top-left, y grows downwards). */
  readonly y: number
  /** Counter-clockwise rotation of the glyph baseline, in degrees. */
  readonly rotationDeg: number
  readonly color: Rgba
}

export interface Frame {
  readonly index: number
  readonly timeSeconds: number
  /** Fractional reveal count at this frame's time. */
  readonly revealed: number
  /** Characters considered on screen (spaces included). */
  readonly visibleCount: number
  /** World-to-canvas zoom factor. */
  readonly scale: number
  readonly draws: readonly DrawInstruction[]
}

/** Sequence-level data a sink needs to encode frames. */
export interface AnimationMeta {
  readonly width: number
  readonly height: number
  readonly background: Rgba
  readonly frameCount: number
  readonly frameDurationMs: number
  /** Loop count; 0 repeats forever. */
  readonly loop: number
}

// ---------------------------------------------------------------------------
// Ports
// ---------------------------------------------------------------------------

/**
 * Receives the composed frame sequence (the encoding collaborator).
 *
 * Frames arrive in index order and are not retained by the core afterwards.
 */
export interface FrameSink {
  /** Human-readable destination, used in logs and the CLI summary. */
  readonly destination: string
  write(frames: readonly Frame[], meta: AnimationMeta): Promise<void>
}
