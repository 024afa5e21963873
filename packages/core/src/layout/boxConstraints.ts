/**
 * packages/core/src/layout/boxConstraints.ts — Box constraints for render layout.
 *
 * A parent hands each child a min/max range per dimension; the child picks a
 * size inside it. Maximums may be Infinity (unbounded), minimums never are.
 */

import { type LayoutResult, fail, ok } from "../errors.js";
import { type EdgeInsets, horizontalInsets, verticalInsets } from "./edgeInsets.js";
import type { Size } from "./types.js";

export type BoxConstraints = Readonly<{
  minW: number;
  maxW: number;
  minH: number;
  maxH: number;
}>;

function invalid(detail: string): LayoutResult<never> {
  return fail("UI_INVALID_CONSTRAINTS", detail);
}

function checkRange(name: string, min: number, max: number): string | null {
  if (typeof min !== "number" || Number.isNaN(min)) return `${name}: min must be a number`;
  if (typeof max !== "number" || Number.isNaN(max)) return `${name}: max must be a number`;
  if (!Number.isFinite(min)) return `${name}: min must be finite (got ${String(min)})`;
  if (min < 0) return `${name}: min must be >= 0 (got ${String(min)})`;
  if (min > max) return `${name}: min ${String(min)} exceeds max ${String(max)}`;
  return null;
}

export function normalizeBoxConstraints(c: BoxConstraints): LayoutResult<BoxConstraints> {
  const wErr = checkRange("width", c.minW, c.maxW);
  if (wErr !== null) return invalid(wErr);
  const hErr = checkRange("height", c.minH, c.maxH);
  if (hErr !== null) return invalid(hErr);
  return ok(c);
}

export function boxConstraints(
  opts: Readonly<{ minW?: number; maxW?: number; minH?: number; maxH?: number }> = {},
): BoxConstraints {
  return {
    minW: opts.minW ?? 0,
    maxW: opts.maxW ?? Number.POSITIVE_INFINITY,
    minH: opts.minH ?? 0,
    maxH: opts.maxH ?? Number.POSITIVE_INFINITY,
  };
}

export function tightConstraints(size: Size): BoxConstraints {
  return { minW: size.w, maxW: size.w, minH: size.h, maxH: size.h };
}

function clamp(value: number, min: number, max: number): number {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}

/** Clamp each dimension of `size` into the constraint range. */
export function constrainSize(c: BoxConstraints, size: Size): Size {
  return { w: clamp(size.w, c.minW, c.maxW), h: clamp(size.h, c.minH, c.maxH) };
}

export function smallestSize(c: BoxConstraints): Size {
  return { w: c.minW, h: c.minH };
}

/** Keep the width range; the height becomes unconstrained ([0, ∞)). */
export function widthConstraints(c: BoxConstraints): BoxConstraints {
  return { minW: c.minW, maxW: c.maxW, minH: 0, maxH: Number.POSITIVE_INFINITY };
}

/** Keep the height range; the width becomes unconstrained ([0, ∞)). */
export function heightConstraints(c: BoxConstraints): BoxConstraints {
  return { minW: 0, maxW: Number.POSITIVE_INFINITY, minH: c.minH, maxH: c.maxH };
}

export function deflateConstraints(c: BoxConstraints, insets: EdgeInsets): BoxConstraints {
  const h = horizontalInsets(insets);
  const v = verticalInsets(insets);
  const minW = Math.max(0, c.minW - h);
  const minH = Math.max(0, c.minH - v);
  return {
    minW,
    maxW: Math.max(minW, c.maxW - h),
    minH,
    maxH: Math.max(minH, c.maxH - v),
  };
}

export function constraintsEqual(a: BoxConstraints, b: BoxConstraints): boolean {
  return a.minW === b.minW && a.maxW === b.maxW && a.minH === b.minH && a.maxH === b.maxH;
}

export function isTight(c: BoxConstraints): boolean {
  return c.minW >= c.maxW && c.minH >= c.maxH;
}

export function constraintsKey(c: BoxConstraints): string {
  return `${String(c.minW)}:${String(c.maxW)}:${String(c.minH)}:${String(c.maxH)}`;
}
