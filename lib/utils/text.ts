/**
 * Text preparation shared by the layout builder and the CLI.
 */

/**
 * Collapse every run of whitespace (line breaks included) to a single space
 * and trim both ends.
 */
export function normalizeText(text: string): string {
  return text
    .replace(/\r/g, ' ')
    .replace(/\n/g, ' ')
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .join(' ')
}

/**
 * Split text into the characters placed on the spiral.
 *
 * Iterates by code point, so a character outside the BMP takes one slot.
 */
export function splitCharacters(text: string): string[] {
  return Array.from(text)
}
