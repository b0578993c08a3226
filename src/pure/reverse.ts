/**
 * Reverses a string by code point, so surrogate pairs stay intact.
 */
export function reverse(text: string): string {
  return Array.from(text).reduce((reversed, char) => char + reversed, "");
}
