/**
 * packages/core/src/layout/transform.ts — 2D affine transforms.
 *
 * Paint transforms between render nodes are composed from these. In practice
 * the tree only produces translations, but reveal geometry maps rectangles
 * through whatever the chain yields, so the general form is kept.
 */

import type { Point, Rect, Transform2D } from "./types.js";

export const IDENTITY_TRANSFORM: Transform2D = Object.freeze({
  a: 1,
  b: 0,
  c: 0,
  d: 1,
  tx: 0,
  ty: 0,
});

export function translationTransform(dx: number, dy: number): Transform2D {
  return { a: 1, b: 0, c: 0, d: 1, tx: dx, ty: dy };
}

export function scaleTransform(sx: number, sy: number = sx): Transform2D {
  return { a: sx, b: 0, c: 0, d: sy, tx: 0, ty: 0 };
}

/** `m * n`: the result applies `n` first, then `m`. */
export function multiplyTransforms(m: Transform2D, n: Transform2D): Transform2D {
  return {
    a: m.a * n.a + m.c * n.b,
    b: m.b * n.a + m.d * n.b,
    c: m.a * n.c + m.c * n.d,
    d: m.b * n.c + m.d * n.d,
    tx: m.a * n.tx + m.c * n.ty + m.tx,
    ty: m.b * n.tx + m.d * n.ty + m.ty,
  };
}

/** Post-multiply by a translation (translate in the local space of `m`). */
export function translateTransform(m: Transform2D, delta: Point): Transform2D {
  return multiplyTransforms(m, translationTransform(delta.x, delta.y));
}

export function invertTransform(m: Transform2D): Transform2D | null {
  const det = m.a * m.d - m.b * m.c;
  if (det === 0 || !Number.isFinite(det)) return null;
  return {
    a: m.d / det,
    b: -m.b / det,
    c: -m.c / det,
    d: m.a / det,
    tx: (m.c * m.ty - m.d * m.tx) / det,
    ty: (m.b * m.tx - m.a * m.ty) / det,
  };
}

export function transformPoint(m: Transform2D, p: Point): Point {
  return { x: m.a * p.x + m.c * p.y + m.tx, y: m.b * p.x + m.d * p.y + m.ty };
}

/** Axis-aligned bounding box of the four transformed corners. */
export function transformRect(m: Transform2D, rect: Rect): Rect {
  if (m.b === 0 && m.c === 0 && m.a === 1 && m.d === 1) {
    return { x: rect.x + m.tx, y: rect.y + m.ty, w: rect.w, h: rect.h };
  }
  const right = rect.x + rect.w;
  const bottom = rect.y + rect.h;
  const p0 = transformPoint(m, { x: rect.x, y: rect.y });
  const p1 = transformPoint(m, { x: right, y: rect.y });
  const p2 = transformPoint(m, { x: rect.x, y: bottom });
  const p3 = transformPoint(m, { x: right, y: bottom });
  const x0 = Math.min(p0.x, p1.x, p2.x, p3.x);
  const y0 = Math.min(p0.y, p1.y, p2.y, p3.y);
  const x1 = Math.max(p0.x, p1.x, p2.x, p3.x);
  const y1 = Math.max(p0.y, p1.y, p2.y, p3.y);
  return { x: x0, y: y0, w: x1 - x0, h: y1 - y0 };
}
