/**
 * packages/core/src/render/semantics.ts — Accessibility bounds collection.
 *
 * Walks the render tree and reports every labelled node with its rectangle
 * in root coordinates. Two clips run alongside the walk:
 *
 *   - the semantics clip (describeSemanticsClip, falling back to the paint
 *     clip): nodes entirely outside it are dropped
 *   - the paint clip (describeApproximatePaintClip): nodes inside the
 *     semantics clip but outside the paint clip are reported as hidden,
 *     i.e. reachable by scrolling but not currently on screen
 */

import { intersectRect } from "../layout/rect.js";
import { IDENTITY_TRANSFORM, transformRect } from "../layout/transform.js";
import type { Rect, Transform2D } from "../layout/types.js";
import type { RenderNode } from "./renderNode.js";

export type SemanticsEntry = Readonly<{
  node: RenderNode;
  label: string;
  rect: Rect;
  hidden: boolean;
}>;

/** Null means unclipped; an empty clip collapses to a zero-area rect. */
function narrowClip(current: Rect | null, next: Rect | null): Rect | null {
  if (next === null) return current;
  if (current === null) return next;
  return intersectRect(current, next) ?? { x: next.x, y: next.y, w: 0, h: 0 };
}

function overlaps(rect: Rect, clip: Rect | null): boolean {
  return clip === null || intersectRect(rect, clip) !== null;
}

export function collectSemantics(root: RenderNode): readonly SemanticsEntry[] {
  const out: SemanticsEntry[] = [];

  const visit = (
    node: RenderNode,
    transform: Transform2D,
    semanticsClip: Rect | null,
    paintClip: Rect | null,
  ): void => {
    node.markSemanticsClean();
    const label = node.semanticsLabel;
    if (label !== null) {
      const rect = transformRect(transform, node.semanticBounds);
      if (overlaps(rect, semanticsClip)) {
        out.push({ node, label, rect, hidden: !overlaps(rect, paintClip) });
      }
    }

    node.visitChildren((child) => {
      const paintLocal = node.describeApproximatePaintClip(child);
      const semanticsLocal = node.describeSemanticsClip(child) ?? paintLocal;
      visit(
        child,
        node.applyPaintTransform(child, transform),
        narrowClip(
          semanticsClip,
          semanticsLocal === null ? null : transformRect(transform, semanticsLocal),
        ),
        narrowClip(paintClip, paintLocal === null ? null : transformRect(transform, paintLocal)),
      );
    });
  };

  visit(root, IDENTITY_TRANSFORM, null, null);
  return out;
}
