/**
 * Distinct items of `a` followed by the items of `b` not already present.
 */
export function union<T>(a: readonly T[], b: readonly T[]): readonly T[] {
  return Array.from(new Set([...a, ...b]));
}
