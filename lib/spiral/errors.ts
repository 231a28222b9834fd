/**
 * Typed errors raised outside the numeric core.
 */

export class SpiralConfigError extends Error {
  readonly key: string

  constructor(key: string, message: string) {
    super(`Invalid ${key}: ${message}`)
    this.name = 'SpiralConfigError'
    this.key = key
  }
}

export class UnsupportedOutputError extends Error {
  readonly path: string

  constructor(path: string) {
    super(`Unsupported output file "${path}" (expected .svg or .json)`)
    this.name = 'UnsupportedOutputError'
    this.path = path
  }
}
