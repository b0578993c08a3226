/**
 * Items of `a` that do not appear in `b`, without duplicates, in the order first seen in `a`.
 */
export function difference<T>(a: readonly T[], b: readonly T[]): readonly T[] {
  const other: ReadonlySet<T> = new Set(b);
  return Array.from(new Set(a)).filter((item) => !other.has(item));
}
