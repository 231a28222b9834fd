/**
 * Design tokens for the terminal front end.
 *
 * Semantic hex colors for text, status lines and the braille preview, with
 * dark/light mode variants.
 *
 * No side effects on import.
 */

// ---------------------------------------------------------------------------
// Type definitions
// ---------------------------------------------------------------------------

export type ThemeMode = 'dark' | 'light'
export type TextLevel = 'primary' | 'muted'
export type StatusLevel = 'active' | 'error' | 'ready' | 'warning'

export interface ThemeTokens {
  readonly text: {
    readonly primary: string
    readonly muted: string
  }
  readonly status: {
    readonly active: string
    readonly error: string
    readonly ready: string
    readonly warning: string
  }
  readonly banner: string
  /** Preview color for glyphs drawn in the configured text color. */
  readonly previewText: string
}

// ---------------------------------------------------------------------------
// Token sets
// ---------------------------------------------------------------------------

/**
 * Dark mode token set.
 *
 * The preview swaps the (usually black) text color for a light gray so the
 * spiral stays visible on a dark terminal.
 */
const DARK_TOKENS: ThemeTokens = {
  text: {
    primary: '#e4e4e4',    // xterm 254
    muted: '#808080',      // xterm 244
  },
  status: {
    active: '#5faf5f',     // xterm 71
    error: '#ff5f5f',      // xterm 203
    ready: '#5faf5f',      // xterm 71
    warning: '#d7af00',    // xterm 178
  },
  banner: '#585858',       // xterm 240
  previewText: '#d0d0d0',  // xterm 252
}

/**
 * Light mode token set.
 */
const LIGHT_TOKENS: ThemeTokens = {
  text: {
    primary: '#1c1c1c',    // xterm 234
    muted: '#808080',      // xterm 244
  },
  status: {
    active: '#008700',     // xterm 28
    error: '#d70000',      // xterm 160
    ready: '#008700',      // xterm 28
    warning: '#af8700',    // xterm 136
  },
  banner: '#808080',       // xterm 244
  previewText: '#303030',  // xterm 236
}

/** Mode-resolved theme tokens. */
export const THEME_TOKENS: Record<ThemeMode, ThemeTokens> = {
  dark: DARK_TOKENS,
  light: LIGHT_TOKENS,
}

// ---------------------------------------------------------------------------
// Theme detection
// ---------------------------------------------------------------------------

/**
 * Detect the current theme mode at runtime.
 *
 * Precedence:
 *   1. APPEARANCE_MODE env var
 *   2. Dark mode default
 */
export function detectThemeMode(): ThemeMode {
  const env = process.env.APPEARANCE_MODE?.trim().toLowerCase()
  if (env === 'light') return 'light'
  return 'dark'
}
