/**
 * Strips accents and lowercases: NFD decomposition, then nonspacing marks are removed.
 */
export function normalizeText(text: string): string {
  return text.normalize("NFD").replace(/\p{Mn}/gu, "").toLowerCase();
}
