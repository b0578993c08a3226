/**
 * Drops every repeated character, keeping first occurrences in order.
 * @example removeDuplicates("HelloWorld") // "HeloWrd"
 */
export function removeDuplicates(text: string): string {
  return Array.from(new Set(text)).join("");
}
