/**
 * packages/core/src/layout/rect.ts — Rectangle and point helpers.
 */

import type { Point, Rect, Size } from "./types.js";

export function rectFromLTRB(left: number, top: number, right: number, bottom: number): Rect {
  return { x: left, y: top, w: right - left, h: bottom - top };
}

export function rectRight(rect: Rect): number {
  return rect.x + rect.w;
}

export function rectBottom(rect: Rect): number {
  return rect.y + rect.h;
}

export function sizeToRect(size: Size, origin: Point = { x: 0, y: 0 }): Rect {
  return { x: origin.x, y: origin.y, w: size.w, h: size.h };
}

export function shiftRect(rect: Rect, delta: Point): Rect {
  return { x: rect.x + delta.x, y: rect.y + delta.y, w: rect.w, h: rect.h };
}

export function addPoints(a: Point, b: Point): Point {
  return { x: a.x + b.x, y: a.y + b.y };
}

/** Check if point is inside rect (inclusive of left/top, exclusive of right/bottom). */
export function rectContains(rect: Rect, point: Point): boolean {
  return (
    point.x >= rect.x && point.x < rect.x + rect.w && point.y >= rect.y && point.y < rect.y + rect.h
  );
}

/** Overlap of two rects, or null when they do not overlap with positive area. */
export function intersectRect(a: Rect, b: Rect): Rect | null {
  const x0 = Math.max(a.x, b.x);
  const y0 = Math.max(a.y, b.y);
  const x1 = Math.min(a.x + a.w, b.x + b.w);
  const y1 = Math.min(a.y + a.h, b.y + b.h);
  if (x1 <= x0 || y1 <= y0) return null;
  return { x: x0, y: y0, w: x1 - x0, h: y1 - y0 };
}

export function formatPoint(p: Point): string {
  return `(${String(p.x)}, ${String(p.y)})`;
}
