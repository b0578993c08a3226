/**
 * Returns an integer in `[0, size)`.
 */
export type RandomIndex = (size: number) => number;
