/**
 * Converts snake_case to camelCase. The first segment is kept as written,
 * every later segment is title-cased.
 */
export function snakeToCamel(text: string): string {
  const [head = "", ...tail] = text.split("_");
  return head + tail.map(titleCase).join("");
}

// Uppercases a letter that starts the string or follows a non-letter, lowercases the rest.
function titleCase(word: string): string {
  return word
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, before: string, letter: string) => before + letter.toUpperCase());
}
