const vowels: ReadonlySet<string> = new Set("aeiouAEIOU");

/**
 * Counts the ASCII vowels in a string, either case.
 */
export function countVowels(text: string): number {
  return Array.from(text).filter((char) => vowels.has(char)).length;
}
