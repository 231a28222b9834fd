/**
 * YAML configuration loading.
 *
 * Looks for the file given explicitly, then SPIRAL_CONFIG_PATH, then
 * ~/.anomaly-spiral/config.yml. Keys are snake_case (`canvas_size`,
 * `text_color`, ...); colors are `[r, g, b]`, `[r, g, b, a]` or `#rrggbb`.
 */

import { existsSync, readFileSync } from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import { parse } from 'yaml'

import { hexToRgba } from '../spiral/color.js'
import {
  resolveConfig,
  type SpiralConfig,
  type SpiralConfigOverrides,
} from '../spiral/config.js'
import type { Rgba } from '../spiral/types.js'

// ---------------------------------------------------------------------------
// Key tables
// ---------------------------------------------------------------------------

type NumericKey = {
  [K in keyof SpiralConfig]: SpiralConfig[K] extends number ? K : never
}[keyof SpiralConfig]

type ColorKey = 'textColor' | 'anomalyColor' | 'backgroundColor'

const NUMERIC_KEYS: Record<string, NumericKey> = {
  canvas_size: 'canvasSize',
  margin: 'margin',
  fps: 'fps',
  duration_seconds: 'durationSeconds',
  initial_radius: 'initialRadius',
  coil_spacing: 'coilSpacing',
  char_spacing: 'charSpacing',
  step_theta: 'stepTheta',
  font_size: 'fontSize',
  slow_chars: 'slowChars',
  slow_seconds: 'slowSeconds',
  bulge_amplitude: 'bulgeAmplitude',
  bulge_sigma: 'bulgeSigma',
  color_band_width: 'colorBandWidth',
  fallback_anomaly_pct: 'fallbackAnomalyPct',
}

const COLOR_KEYS: Record<string, ColorKey> = {
  text_color: 'textColor',
  anomaly_color: 'anomalyColor',
  background_color: 'backgroundColor',
}

export const CONFIG_PATH_ENV = 'SPIRAL_CONFIG_PATH'

export function defaultConfigPath(): string {
  return path.join(os.homedir(), '.anomaly-spiral', 'config.yml')
}

// ---------------------------------------------------------------------------
// Value extraction
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function extractColor(value: unknown): Rgba | null {
  if (typeof value === 'string') return hexToRgba(value)
  if (!Array.isArray(value) || (value.length !== 3 && value.length !== 4)) return null

  const channels = value.filter((c): c is number => typeof c === 'number')
  if (channels.length !== value.length) return null
  const [r, g, b, a = 255] = channels
  return [r, g, b, a]
}

/**
 * Convert parsed YAML into config overrides.
 *
 * Unknown keys and values of the wrong type are skipped with a warning;
 * range checks are left to resolveConfig.
 */
export function parseConfigOverrides(data: unknown): SpiralConfigOverrides {
  const overrides: { -readonly [K in keyof SpiralConfig]?: SpiralConfig[K] } = {}
  if (data === null || data === undefined) return overrides
  if (!isRecord(data)) {
    console.warn('[config] Expected a mapping at the top level, ignoring file contents')
    return overrides
  }

  for (const [rawKey, value] of Object.entries(data)) {
    const numericKey = NUMERIC_KEYS[rawKey]
    if (numericKey) {
      if (typeof value === 'number') {
        overrides[numericKey] = value
      } else {
        console.warn(`[config] Ignoring ${rawKey}: expected a number`)
      }
      continue
    }

    const colorKey = COLOR_KEYS[rawKey]
    if (colorKey) {
      const color = extractColor(value)
      if (color) {
        overrides[colorKey] = color
      } else {
        console.warn(`[config] Ignoring ${rawKey}: expected [r, g, b(, a)] or #rrggbb`)
      }
      continue
    }

    if (rawKey === 'font_family') {
      if (typeof value === 'string') {
        overrides.fontFamily = value
      } else {
        console.warn('[config] Ignoring font_family: expected a string')
      }
      continue
    }

    console.warn(`[config] Ignoring unknown key ${rawKey}`)
  }

  return overrides
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Load and resolve the spiral configuration.
 *
 * Without an explicit or environment path, a missing default file means
 * defaults. A path that was asked for must exist.
 *
 * @throws Error when a requested file is missing, or any file cannot be
 *   read or parsed.
 * @throws SpiralConfigError when a value is out of range.
 */
export function loadSpiralConfig(explicitPath?: string): SpiralConfig {
  const requested = explicitPath ?? process.env[CONFIG_PATH_ENV]
  const configPath = requested ?? defaultConfigPath()

  if (!existsSync(configPath)) {
    if (requested) {
      throw new Error(`Spiral config file not found at ${configPath}`)
    }
    console.debug(`[config] No config file at ${configPath}, using defaults`)
    return resolveConfig()
  }

  let data: unknown
  try {
    data = parse(readFileSync(configPath, 'utf-8'))
  } catch (err) {
    const error = err as NodeJS.ErrnoException
    console.error(`[config] Failed to load config from ${configPath}:`, error.message)
    if (error.code === 'EACCES') {
      throw new Error(`Permission denied reading config file at ${configPath}`)
    }
    throw new Error(`Failed to parse spiral config: ${error.message}`)
  }

  return resolveConfig(parseConfigOverrides(data))
}
