/**
 * Input-source port: where the spiral's text comes from.
 */

import { readFile } from 'node:fs/promises'

export interface TextSource {
  /** Label shown to the user (e.g. a file path). */
  readonly label: string
  read(): Promise<string>
}

/**
 * Decode file bytes as UTF-8, falling back to Latin-1 when they are not
 * valid UTF-8.
 */
export function decodeText(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes)
  } catch (err) {
    console.debug('[input] Not valid UTF-8, decoding as Latin-1:', (err as Error).message)
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1')
  }
}

export async function readTextSource(filePath: string): Promise<string> {
  const bytes = await readFile(filePath)
  return decodeText(bytes)
}

export function fileTextSource(filePath: string): TextSource {
  return {
    label: filePath,
    read: () => readTextSource(filePath),
  }
}
