/**
 * A coordinate pair in 2D space.
 */
export type Point = readonly [x: number, y: number];
