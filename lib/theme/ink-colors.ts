/**
 * Chalk-based color mappers for terminal (Ink) rendering.
 *
 * All functions are curried: `statusColor('error')('text')` returns a
 * red-colored string.
 *
 * Requires chalk@5+ (ESM). No side effects on import.
 */

import chalk from 'chalk'

import {
  type StatusLevel,
  type TextLevel,
  type ThemeMode,
  THEME_TOKENS,
  detectThemeMode,
} from './tokens.js'

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Lazy-resolved mode so callers don't need to pass it everywhere. */
let _resolvedMode: ThemeMode | null = null

function mode(): ThemeMode {
  if (_resolvedMode === null) {
    _resolvedMode = detectThemeMode()
  }
  return _resolvedMode
}

/** Force a mode refresh. */
export function resetThemeMode(): void {
  _resolvedMode = null
}

/** Set mode explicitly (useful for testing or forced overrides). */
export function setThemeMode(m: ThemeMode): void {
  _resolvedMode = m
}

// ---------------------------------------------------------------------------
// Formatters
// ---------------------------------------------------------------------------

/** Return a chalk formatter for themed text at a given emphasis level. */
export function themeText(level: TextLevel): (text: string) => string {
  const hex = THEME_TOKENS[mode()].text[level]
  return (text: string) => chalk.hex(hex)(text)
}

/** Return a chalk formatter for status-colored text. */
export function statusColor(status: StatusLevel): (text: string) => string {
  const hex = THEME_TOKENS[mode()].status[status]
  return (text: string) => chalk.hex(hex)(text)
}

/** Banner text (muted). */
export function bannerColor(): (text: string) => string {
  const hex = THEME_TOKENS[mode()].banner
  return (text: string) => chalk.hex(hex)(text)
}

/**
 * Preview palette: slot 0 for text-colored glyphs, slot 1 for the anomaly
 * band (kept as configured).
 */
export function previewPalette(anomalyHex: string): string[] {
  return [THEME_TOKENS[mode()].previewText, anomalyHex]
}
