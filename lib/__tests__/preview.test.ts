import { afterEach, describe, it, expect } from 'vitest'

import { dominantColor, renderBraille, toBraille } from '../render/braille.js'
import { colorKey, type ColorGrid } from '../render/grid.js'
import { rasterizeFrame } from '../render/raster.js'
import type { Frame } from '../spiral/types.js'
import { previewPalette, resetThemeMode, setThemeMode, themeText } from '../theme/ink-colors.js'
import { THEME_TOKENS } from '../theme/tokens.js'

const TEXT = [0, 0, 0, 255] as const
const ANOMALY = [255, 0, 0, 255] as const

function frameWith(draws: Frame['draws']): Frame {
  return { index: 0, timeSeconds: 0, revealed: draws.length, visibleCount: draws.length, scale: 1, draws }
}

// ---------------------------------------------------------------------------
// Rasterization
// ---------------------------------------------------------------------------

describe('rasterizeFrame', () => {
  it('should map canvas pixels onto braille sub-pixels', () => {
    const frame = frameWith([
      { index: 0, char: 'a', x: 0, y: 0, rotationDeg: 0, color: TEXT },
      { index: 1, char: 'b', x: 799, y: 799, rotationDeg: 0, color: ANOMALY },
    ])
    const grid = rasterizeFrame(frame, 800, ANOMALY, { cols: 2, rows: 1 })
    expect([...grid.entries()]).toEqual([
      ['0,0', 0],
      ['3,3', 1],
    ])
  })

  it('should skip draws outside the canvas', () => {
    const frame = frameWith([
      { index: 0, char: 'a', x: -5, y: 10, rotationDeg: 0, color: TEXT },
      { index: 1, char: 'b', x: 800, y: 10, rotationDeg: 0, color: TEXT },
    ])
    expect(rasterizeFrame(frame, 800, ANOMALY, { cols: 2, rows: 1 }).size).toBe(0)
  })

  it('should return an empty grid for an empty target', () => {
    const frame = frameWith([{ index: 0, char: 'a', x: 1, y: 1, rotationDeg: 0, color: TEXT }])
    expect(rasterizeFrame(frame, 800, ANOMALY, { cols: 0, rows: 0 }).size).toBe(0)
  })
})

// ---------------------------------------------------------------------------
// Braille encoding
// ---------------------------------------------------------------------------

describe('toBraille', () => {
  it('should encode empty and full cells', () => {
    expect(toBraille([[false, false, false, false], [false, false, false, false]])).toBe('⠀')
    expect(toBraille([[true, true, true, true], [true, true, true, true]])).toBe('⣿')
  })

  it('should place the bottom dots on bits 7 and 8', () => {
    expect(toBraille([[false, false, false, true], [false, false, false, false]])).toBe('⡀')
    expect(toBraille([[false, false, false, false], [false, false, false, true]])).toBe('⢀')
  })
})

describe('dominantColor', () => {
  it('should pick the most frequent index in the cell', () => {
    const grid: ColorGrid = new Map([
      [colorKey(0, 0), 0],
      [colorKey(1, 0), 1],
      [colorKey(0, 1), 1],
    ])
    expect(dominantColor(0, 0, grid)).toBe(1)
  })

  it('should return -1 for an empty cell', () => {
    expect(dominantColor(3, 3, new Map())).toBe(-1)
  })
})

describe('renderBraille', () => {
  it('should render one line of braille per row', () => {
    const grid: ColorGrid = new Map([
      [colorKey(0, 0), 0],
      [colorKey(3, 3), 1],
    ])
    expect(renderBraille(grid, { cols: 2, rows: 2 }, ['#ffffff', '#ff0000'])).toEqual([
      '⠁⢀',
      '⠀⠀',
    ])
  })

  it('should still draw cells whose index has no palette entry', () => {
    const grid: ColorGrid = new Map([[colorKey(1, 1), 5]])
    expect(renderBraille(grid, { cols: 1, rows: 1 }, [])).toEqual(['⠐'])
  })
})

// ---------------------------------------------------------------------------
// Theme
// ---------------------------------------------------------------------------

describe('preview theme', () => {
  afterEach(() => {
    setThemeMode('dark')
  })

  it('should keep the anomaly color and swap the text color per mode', () => {
    expect(previewPalette('#ff0000')).toEqual(['#d0d0d0', '#ff0000'])
    setThemeMode('light')
    expect(previewPalette('#ff0000')).toEqual(['#303030', '#ff0000'])
  })

  it('should detect the mode again after a reset', () => {
    const saved = process.env.APPEARANCE_MODE
    process.env.APPEARANCE_MODE = 'light'
    resetThemeMode()
    expect(previewPalette('#00ff00')[0]).toBe('#303030')
    if (saved === undefined) delete process.env.APPEARANCE_MODE
    else process.env.APPEARANCE_MODE = saved
  })

  it('should format themed text as plain strings without color support', () => {
    expect(themeText('muted')('hello')).toBe('hello')
  })
})

describe('theme tokens', () => {
  it('should only carry the levels the terminal view uses', () => {
    for (const mode of ['dark', 'light'] as const) {
      expect(Object.keys(THEME_TOKENS[mode].text)).toEqual(['primary', 'muted'])
      expect(Object.keys(THEME_TOKENS[mode].status)).toEqual(['active', 'error', 'ready', 'warning'])
    }
  })
})
