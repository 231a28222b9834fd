import { describe, it, expect } from 'vitest'
import {
  DEFAULT_SPIRAL_CONFIG,
  frameCount,
  frameDurationMs,
  resolveConfig,
} from '../spiral/config.js'
import { SpiralConfigError } from '../spiral/errors.js'

function configErrorKey(fn: () => unknown): string | null {
  try {
    fn()
  } catch (err) {
    if (err instanceof SpiralConfigError) return err.key
    throw err
  }
  return null
}

describe('resolveConfig', () => {
  it('should return the defaults when nothing is overridden', () => {
    const config = resolveConfig()
    expect(config).toEqual(DEFAULT_SPIRAL_CONFIG)
    expect(config.canvasSize).toBe(800)
    expect(config.margin).toBe(40)
    expect(config.fps).toBe(30)
    expect(config.durationSeconds).toBe(5)
    expect(config.colorBandWidth).toBeCloseTo(0.088, 12)
  })

  it('should freeze the resolved config', () => {
    expect(Object.isFrozen(resolveConfig({ fps: 12 }))).toBe(true)
  })

  it('should derive the color band from the bulge sigma', () => {
    expect(resolveConfig({ bulgeSigma: 0.1 }).colorBandWidth).toBeCloseTo(0.22, 12)
  })

  it('should keep an explicit color band width', () => {
    expect(resolveConfig({ bulgeSigma: 0.1, colorBandWidth: 0.5 }).colorBandWidth).toBe(0.5)
  })

  it('should reject non-positive rates and sizes', () => {
    expect(configErrorKey(() => resolveConfig({ fps: 0 }))).toBe('fps')
    expect(configErrorKey(() => resolveConfig({ charSpacing: -1 }))).toBe('charSpacing')
    expect(configErrorKey(() => resolveConfig({ durationSeconds: Number.NaN }))).toBe('durationSeconds')
  })

  it('should reject negative slowdown and bulge settings', () => {
    expect(configErrorKey(() => resolveConfig({ slowSeconds: -1 }))).toBe('slowSeconds')
    expect(configErrorKey(() => resolveConfig({ bulgeAmplitude: -0.1 }))).toBe('bulgeAmplitude')
  })

  it('should reject a margin that leaves no room to draw', () => {
    expect(configErrorKey(() => resolveConfig({ margin: 400 }))).toBe('margin')
    expect(configErrorKey(() => resolveConfig({ canvasSize: 60 }))).toBe('margin')
  })

  it('should reject malformed colors', () => {
    expect(configErrorKey(() => resolveConfig({ textColor: [0, 0, 0, 300] }))).toBe('textColor')
    expect(configErrorKey(() => resolveConfig({ anomalyColor: [1.5, 0, 0, 255] }))).toBe('anomalyColor')
  })

  it('should reject an empty font family and an out-of-range fallback', () => {
    expect(configErrorKey(() => resolveConfig({ fontFamily: ' ' }))).toBe('fontFamily')
    expect(configErrorKey(() => resolveConfig({ fallbackAnomalyPct: 101 }))).toBe('fallbackAnomalyPct')
  })

  it('should name the key in the error message', () => {
    expect(() => resolveConfig({ fps: 0 })).toThrow('Invalid fps: expected a positive number, got 0')
  })
})

describe('frame timing', () => {
  it('should produce 150 frames of 33ms by default', () => {
    expect(frameCount(DEFAULT_SPIRAL_CONFIG)).toBe(150)
    expect(frameDurationMs(DEFAULT_SPIRAL_CONFIG)).toBe(33)
  })

  it('should round frame counts and durations', () => {
    const config = resolveConfig({ fps: 24, durationSeconds: 2.51 })
    expect(frameCount(config)).toBe(60)
    expect(frameDurationMs(config)).toBe(42)
  })
})
