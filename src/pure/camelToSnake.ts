/**
 * Converts camelCase or PascalCase to snake_case.
 * A leading uppercase letter gets no separator.
 */
export function camelToSnake(text: string): string {
  return text.replace(/(?<!^)(?=[A-Z])/g, "_").toLowerCase();
}
