/**
 * packages/core/src/render/paintContext.ts — Painting context for render nodes.
 *
 * A context pairs the canvas with the container layer that currently
 * receives child layers. Repaint boundaries get their own OffsetLayer, kept
 * in the node's boundary handle so the same layer is reused every frame.
 */

import { shiftRect } from "../layout/rect.js";
import type { Point, Rect } from "../layout/types.js";
import type { PaintCanvas } from "./canvas.js";
import { type ClipBehavior, ClipRectLayer, type ContainerLayer, OffsetLayer } from "./layers.js";
import type { RenderNode } from "./renderNode.js";

export type PaintingFn = (context: PaintContext, offset: Point) => void;

export type PushClipRectOptions = Readonly<{
  clipBehavior?: ClipBehavior;
  /** Layer returned by the previous frame's call; reused when still alive. */
  oldLayer?: ClipRectLayer | null;
}>;

export class PaintContext {
  constructor(
    readonly canvas: PaintCanvas,
    private readonly container: ContainerLayer,
  ) {}

  get containerLayer(): ContainerLayer {
    return this.container;
  }

  paintChild(child: RenderNode, offset: Point): void {
    if (!child.isRepaintBoundary) {
      child.paintWithContext(this, offset);
      return;
    }
    const previous = child.boundaryLayer.layer;
    const layer = previous !== null && !previous.disposed ? previous : new OffsetLayer(offset);
    layer.offset = offset;
    layer.removeAllChildren();
    this.container.append(layer);
    child.boundaryLayer.layer = layer;
    child.paintWithContext(new PaintContext(this.canvas, layer), offset);
  }

  /**
   * Paint `painter` clipped to `clipRect` (relative to `offset`).
   *
   * With clipBehavior "none" nothing is clipped and null is returned. When
   * `needsCompositing` the clip is also recorded as a ClipRectLayer, reusing
   * `oldLayer` if it has not been disposed; the layer is returned so the
   * caller can keep it for the next frame. Without compositing the clip only
   * goes to the canvas and null is returned.
   */
  pushClipRect(
    needsCompositing: boolean,
    offset: Point,
    clipRect: Rect,
    painter: PaintingFn,
    opts: PushClipRectOptions = {},
  ): ClipRectLayer | null {
    const clipBehavior = opts.clipBehavior ?? "hardEdge";
    if (clipBehavior === "none") {
      painter(this, offset);
      return null;
    }

    const absolute = shiftRect(clipRect, offset);
    if (!needsCompositing) {
      this.withCanvasClip(absolute, () => painter(this, offset));
      return null;
    }

    const old = opts.oldLayer ?? null;
    const layer = old !== null && !old.disposed ? old : new ClipRectLayer(absolute, clipBehavior);
    layer.clipRect = absolute;
    layer.clipBehavior = clipBehavior;
    layer.removeAllChildren();
    this.container.append(layer);
    const childContext = new PaintContext(this.canvas, layer);
    this.withCanvasClip(absolute, () => painter(childContext, offset));
    return layer;
  }

  private withCanvasClip(rect: Rect, body: () => void): void {
    this.canvas.pushClip(rect.x, rect.y, rect.w, rect.h);
    try {
      body();
    } finally {
      this.canvas.popClip();
    }
  }
}
