/**
 * packages/core/src/layout/edgeInsets.ts — Padding insets.
 *
 * Directional insets name the horizontal sides by reading direction and are
 * resolved against the ambient text direction before layout.
 */

import type { TextDirection } from "./axis.js";

export type EdgeInsets = Readonly<{ top: number; right: number; bottom: number; left: number }>;

export type EdgeInsetsDirectional = Readonly<{
  top: number;
  bottom: number;
  start: number;
  end: number;
}>;

export type EdgeInsetsGeometry = EdgeInsets | EdgeInsetsDirectional;

export const EDGE_INSETS_ZERO: EdgeInsets = Object.freeze({ top: 0, right: 0, bottom: 0, left: 0 });

export function edgeInsetsAll(value: number): EdgeInsets {
  return { top: value, right: value, bottom: value, left: value };
}

export function isDirectionalInsets(insets: EdgeInsetsGeometry): insets is EdgeInsetsDirectional {
  return "start" in insets;
}

export function resolveEdgeInsets(
  insets: EdgeInsetsGeometry,
  textDirection: TextDirection,
): EdgeInsets {
  if (!isDirectionalInsets(insets)) return insets;
  return textDirection === "rtl"
    ? { top: insets.top, right: insets.start, bottom: insets.bottom, left: insets.end }
    : { top: insets.top, right: insets.end, bottom: insets.bottom, left: insets.start };
}

export function horizontalInsets(insets: EdgeInsets): number {
  return insets.left + insets.right;
}

export function verticalInsets(insets: EdgeInsets): number {
  return insets.top + insets.bottom;
}

/** Insets must be finite and non-negative on every side. */
export function isValidInsets(insets: EdgeInsetsGeometry): boolean {
  const sides = isDirectionalInsets(insets)
    ? [insets.top, insets.bottom, insets.start, insets.end]
    : [insets.top, insets.right, insets.bottom, insets.left];
  for (const side of sides) {
    if (typeof side !== "number" || !Number.isFinite(side) || side < 0) return false;
  }
  return true;
}
