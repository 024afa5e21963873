/**
 * packages/core/src/layout/types.ts — Geometry primitive type definitions.
 *
 * Coordinates are logical units with the origin at the top-left and y growing
 * downwards. Values are plain readonly objects; helpers in rect.ts and
 * transform.ts never mutate their inputs.
 */

/** Position or translation. */
export type Point = Readonly<{ x: number; y: number }>;

/** Size dimensions (width and height). */
export type Size = Readonly<{ w: number; h: number }>;

/** Rectangle with position (x,y) and dimensions (w,h). */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/**
 * Affine transform mapping (x, y) to (a*x + c*y + tx, b*x + d*y + ty).
 * Composition follows the column-vector convention: `multiply(m, n)` applies
 * `n` first.
 */
export type Transform2D = Readonly<{
  a: number;
  b: number;
  c: number;
  d: number;
  tx: number;
  ty: number;
}>;

export const ZERO_POINT: Point = Object.freeze({ x: 0, y: 0 });
