/**
 * packages/core/src/render/viewport.ts — Viewport capability and reveal helpers.
 *
 * Ancestors that want to bring a descendant into view hold the Viewport
 * interface, never a concrete viewport class.
 */

import { transformRect } from "../layout/transform.js";
import type { Rect } from "../layout/types.js";
import type { ViewportOffset } from "../scroll/viewportOffset.js";
import type { RenderNode } from "./renderNode.js";

/** Scroll offset that reveals a target, and where the target then sits in the viewport. */
export type RevealedOffset = Readonly<{ offset: number; rect: Rect }>;

export interface Viewport {
  /**
   * Offset at which `rect` of `target` (default: its paint bounds) sits at
   * `alignment` along the scroll axis: 0 aligns leading edges, 1 trailing
   * edges, 0.5 centres it. Pure; the offset is not moved.
   */
  getOffsetToReveal(target: RenderNode, alignment: number, rect?: Rect | null): RevealedOffset;
}

export type ViewportNode = RenderNode & Viewport;

export function isViewport(node: RenderNode | null): node is ViewportNode {
  return (
    node !== null &&
    "getOffsetToReveal" in node &&
    typeof node.getOffsetToReveal === "function"
  );
}

/** Nearest ancestor of `node` that is a viewport. */
export function findEnclosingViewport(node: RenderNode): ViewportNode | null {
  let current = node.parent;
  while (current !== null) {
    if (isViewport(current)) return current;
    current = current.parent;
  }
  return null;
}

/**
 * Pick the edge offset the current position has to move to so the target
 * is fully visible, or null when it already is.
 *
 * `leading` and `trailing` are the reveal offsets at alignment 0 and 1. For
 * a target smaller than the viewport leading > trailing; for a larger one
 * they swap, and any position between them shows as much as fits.
 */
export function clampRevealedOffset(
  leading: RevealedOffset,
  trailing: RevealedOffset,
  currentOffset: number,
): RevealedOffset | null {
  const inverted = leading.offset < trailing.offset;
  const smaller = inverted ? leading : trailing;
  const larger = inverted ? trailing : leading;
  if (currentOffset > larger.offset) return larger;
  if (currentOffset < smaller.offset) return smaller;
  return null;
}

export type ShowInViewportOptions = Readonly<{
  descendant: RenderNode | null;
  viewport: ViewportNode;
  offset: ViewportOffset;
  rect: Rect | null;
}>;

/**
 * Move `offset` the least amount that makes `descendant` fully visible in
 * `viewport` and return the target rect in viewport coordinates. When no
 * descendant is given the rect is returned untouched.
 */
export function showInViewport(opts: ShowInViewportOptions): Rect | null {
  const { descendant, viewport, offset, rect } = opts;
  if (descendant === null) return rect;

  const leading = viewport.getOffsetToReveal(descendant, 0, rect);
  const trailing = viewport.getOffsetToReveal(descendant, 1, rect);
  const target = clampRevealedOffset(leading, trailing, offset.pixels);
  if (target === null) {
    return transformRect(descendant.getTransformTo(viewport), rect ?? descendant.paintBounds);
  }
  offset.moveTo(target.offset);
  return target.rect;
}
