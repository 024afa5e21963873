/**
 * packages/core/src/render/singleChildViewport.ts — Viewport over one scrollable child.
 *
 * The child is laid out with the incoming constraints on the cross axis and
 * no upper bound on the scroll axis; the viewport itself takes the incoming
 * constraints applied to the child's size. The difference along the scroll
 * axis is the scrollable range, reported to the ViewportOffset after every
 * layout.
 *
 * Scrolling does not relayout: an offset change only repaints (the child is
 * translated by the paint offset) and refreshes semantics.
 *
 * Paint offset per axis direction, for scroll position p:
 *
 *   down   (0, -p)
 *   up     (0, p - childHeight + viewportHeight)
 *   right  (-p, 0)
 *   left   (p - childWidth + viewportWidth, 0)
 *
 * Reversed directions anchor the content at the trailing edge, so p = 0
 * shows the bottom (up) or right end (left) of the child.
 */

import { warnDev } from "../debug/log.js";
import { UiError } from "../errors.js";
import { type AxisDirection, type ScrollAxis, axisDirectionToAxis, isAxisDirection } from "../layout/axis.js";
import {
  type BoxConstraints,
  constrainSize,
  heightConstraints,
  smallestSize,
  widthConstraints,
} from "../layout/boxConstraints.js";
import {
  addPoints,
  formatPoint,
  rectBottom,
  rectFromLTRB,
  rectRight,
  shiftRect,
  sizeToRect,
} from "../layout/rect.js";
import { transformRect, translateTransform } from "../layout/transform.js";
import { type Point, type Rect, type Size, type Transform2D, ZERO_POINT } from "../layout/types.js";
import type { SubscriptionToken, ViewportOffset } from "../scroll/viewportOffset.js";
import type { HitTestResult } from "./hitTestResult.js";
import { type ClipBehavior, type ClipRectLayer, LayerHandle, isClipBehavior } from "./layers.js";
import type { PaintContext, PaintingFn } from "./paintContext.js";
import { type RenderBox, RenderBoxWithChild, isRenderBox } from "./renderBox.js";
import type {
  DiagnosticProperties,
  RenderNode,
  RenderOwner,
  ShowOnScreenOptions,
} from "./renderNode.js";
import { type RevealedOffset, type Viewport, showInViewport } from "./viewport.js";

export type RenderSingleChildViewportOptions = Readonly<{
  axisDirection?: AxisDirection;
  offset: ViewportOffset;
  clipBehavior: ClipBehavior;
  child?: RenderBox | null;
}>;

export class RenderSingleChildViewport extends RenderBoxWithChild implements Viewport {
  private _axisDirection: AxisDirection;
  private _offset: ViewportOffset;
  private _clipBehavior: ClipBehavior;
  private scrollSubscription: SubscriptionToken | null = null;
  private readonly clipRectLayer = new LayerHandle<ClipRectLayer>();

  private readonly handleScroll = (): void => {
    this.markNeedsPaint();
    this.markNeedsSemanticsUpdate();
  };

  constructor(opts: RenderSingleChildViewportOptions) {
    super();
    this._axisDirection = opts.axisDirection ?? "down";
    this._offset = opts.offset;
    this._clipBehavior = opts.clipBehavior;
    this.child = opts.child ?? null;
  }

  get axisDirection(): AxisDirection {
    return this._axisDirection;
  }

  set axisDirection(value: AxisDirection) {
    if (!isAxisDirection(value)) {
      throw new UiError("UI_INVALID_PROPS", `invalid axisDirection ${String(value)}`);
    }
    if (value === this._axisDirection) return;
    this._axisDirection = value;
    this.markNeedsLayout();
  }

  get axis(): ScrollAxis {
    return axisDirectionToAxis(this._axisDirection);
  }

  get offset(): ViewportOffset {
    return this._offset;
  }

  /** Moves the scroll subscription from the old offset object to the new one. */
  set offset(value: ViewportOffset) {
    if (value === this._offset) return;
    if (this.attached) this.unsubscribeFromOffset();
    this._offset = value;
    if (this.attached) this.subscribeToOffset();
    this.markNeedsLayout();
  }

  get clipBehavior(): ClipBehavior {
    return this._clipBehavior;
  }

  set clipBehavior(value: ClipBehavior) {
    if (!isClipBehavior(value)) {
      throw new UiError("UI_INVALID_PROPS", `invalid clipBehavior ${String(value)}`);
    }
    if (value === this._clipBehavior) return;
    this._clipBehavior = value;
    this.markNeedsPaint();
    this.markNeedsSemanticsUpdate();
  }

  /** Clip layer kept from the last paint, if the child overflowed. */
  get debugClipLayer(): ClipRectLayer | null {
    return this.clipRectLayer.layer;
  }

  override attach(owner: RenderOwner): void {
    super.attach(owner);
    this.subscribeToOffset();
  }

  override detach(): void {
    this.unsubscribeFromOffset();
    super.detach();
  }

  private subscribeToOffset(): void {
    if (this.scrollSubscription !== null) return;
    this.scrollSubscription = this._offset.subscribe(this.handleScroll);
  }

  private unsubscribeFromOffset(): void {
    const token = this.scrollSubscription;
    if (token === null) return;
    this.scrollSubscription = null;
    this._offset.unsubscribe(token);
  }

  override get isRepaintBoundary(): boolean {
    return true;
  }

  private get viewportExtent(): number {
    const size = this.size;
    return this.axis === "horizontal" ? size.w : size.h;
  }

  private get maxScrollExtent(): number {
    const child = this.child;
    if (child === null) return 0;
    return this.axis === "horizontal"
      ? Math.max(0, child.size.w - this.size.w)
      : Math.max(0, child.size.h - this.size.h);
  }

  private innerConstraints(constraints: BoxConstraints): BoxConstraints {
    return this.axis === "horizontal"
      ? heightConstraints(constraints)
      : widthConstraints(constraints);
  }

  protected override computeMinIntrinsicWidth(height: number): number {
    return this.child?.getMinIntrinsicWidth(height) ?? 0;
  }

  protected override computeMaxIntrinsicWidth(height: number): number {
    return this.child?.getMaxIntrinsicWidth(height) ?? 0;
  }

  protected override computeMinIntrinsicHeight(width: number): number {
    return this.child?.getMinIntrinsicHeight(width) ?? 0;
  }

  protected override computeMaxIntrinsicHeight(width: number): number {
    return this.child?.getMaxIntrinsicHeight(width) ?? 0;
  }

  // computeDistanceToActualBaseline keeps the default (null): a baseline
  // that moved with the scroll position would shift baseline-aligned parents.

  protected override computeDryLayout(constraints: BoxConstraints): Size {
    const child = this.child;
    if (child === null) return smallestSize(constraints);
    return constrainSize(constraints, child.getDryLayout(this.innerConstraints(constraints)));
  }

  protected override performLayout(): void {
    const constraints = this.constraints;
    const child = this.child;
    if (child === null) {
      this.setSize(smallestSize(constraints));
    } else {
      child.layout(this.innerConstraints(constraints));
      this.setSize(constrainSize(constraints, child.size));
    }

    this._offset.applyViewportDimension(this.viewportExtent);
    this._offset.applyContentDimensions(0, this.maxScrollExtent);
  }

  /** Translation applied to the child for the offset's current position. */
  get paintOffset(): Point {
    return this.paintOffsetForPosition(this._offset.pixels);
  }

  private paintOffsetForPosition(position: number): Point {
    const child = this.child;
    if (child === null) return ZERO_POINT;
    const size = this.size;
    // 0 - p rather than -p: position 0 must not produce -0.
    switch (this._axisDirection) {
      case "up":
        return { x: 0, y: position - child.size.h + size.h };
      case "down":
        return { x: 0, y: 0 - position };
      case "left":
        return { x: position - child.size.w + size.w, y: 0 };
      case "right":
        return { x: 0 - position, y: 0 };
    }
  }

  /** True when the child, painted at `paintOffset`, reaches outside the viewport. */
  private shouldClipAtPaintOffset(paintOffset: Point): boolean {
    const child = this.child;
    if (child === null || this._clipBehavior === "none") return false;
    const size = this.size;
    return (
      paintOffset.x < 0 ||
      paintOffset.y < 0 ||
      paintOffset.x + child.size.w > size.w ||
      paintOffset.y + child.size.h > size.h
    );
  }

  override paint(context: PaintContext, offset: Point): void {
    const child = this.child;
    if (child === null) {
      this.clipRectLayer.layer = null;
      return;
    }
    const paintOffset = this.paintOffset;
    const paintContents: PaintingFn = (ctx, origin) => {
      ctx.paintChild(child, addPoints(origin, paintOffset));
    };

    if (this.shouldClipAtPaintOffset(paintOffset)) {
      this.clipRectLayer.layer = context.pushClipRect(
        this.needsCompositing,
        offset,
        sizeToRect(this.size),
        paintContents,
        { clipBehavior: this._clipBehavior, oldLayer: this.clipRectLayer.layer },
      );
    } else {
      this.clipRectLayer.layer = null;
      paintContents(context, offset);
    }
  }

  override applyPaintTransform(_child: RenderNode, transform: Transform2D): Transform2D {
    return translateTransform(transform, this.paintOffset);
  }

  override describeApproximatePaintClip(_child: RenderNode): Rect | null {
    return this.shouldClipAtPaintOffset(this.paintOffset) ? sizeToRect(this.size) : null;
  }

  protected override hitTestChildren(result: HitTestResult, position: Point): boolean {
    const child = this.child;
    if (child === null) return false;
    return result.addWithPaintOffset(this.paintOffset, position, (r, transformed) =>
      child.hitTest(r, transformed),
    );
  }

  getOffsetToReveal(target: RenderNode, alignment: number, rect?: Rect | null): RevealedOffset {
    const targetRect = rect ?? target.paintBounds;
    const child = this.child;
    if (!isRenderBox(target) || child === null) {
      if (!isRenderBox(target)) {
        warnDev(
          `RenderSingleChildViewport.getOffsetToReveal: ${target.constructor.name} is not a box; keeping the current offset`,
        );
      }
      return { offset: this._offset.pixels, rect: targetRect };
    }

    const bounds = transformRect(target.getTransformTo(child), targetRect);
    const contentSize = child.size;
    const size = this.size;

    let mainAxisExtent: number;
    let leadingScrollOffset: number;
    let targetMainAxisExtent: number;
    switch (this._axisDirection) {
      case "up":
        mainAxisExtent = size.h;
        leadingScrollOffset = contentSize.h - rectBottom(bounds);
        targetMainAxisExtent = bounds.h;
        break;
      case "right":
        mainAxisExtent = size.w;
        leadingScrollOffset = bounds.x;
        targetMainAxisExtent = bounds.w;
        break;
      case "down":
        mainAxisExtent = size.h;
        leadingScrollOffset = bounds.y;
        targetMainAxisExtent = bounds.h;
        break;
      case "left":
        mainAxisExtent = size.w;
        leadingScrollOffset = contentSize.w - rectRight(bounds);
        targetMainAxisExtent = bounds.w;
        break;
    }

    const targetOffset = leadingScrollOffset - (mainAxisExtent - targetMainAxisExtent) * alignment;
    return {
      offset: targetOffset,
      rect: shiftRect(bounds, this.paintOffsetForPosition(targetOffset)),
    };
  }

  /**
   * Scroll `descendant` into view when the offset allows implicit
   * scrolling, then continue the request up the tree with the revealed
   * rect. Otherwise the request is forwarded unchanged.
   */
  override showOnScreen(options: ShowOnScreenOptions = {}): void {
    if (!this._offset.allowImplicitScrolling) {
      super.showOnScreen(options);
      return;
    }
    const newRect = showInViewport({
      descendant: options.descendant ?? null,
      viewport: this,
      offset: this._offset,
      rect: options.rect ?? null,
    });
    super.showOnScreen({ rect: newRect ?? undefined });
  }

  /**
   * Semantics stay enumerable for content reachable by scrolling: the clip
   * extends past the leading edge by the scrolled distance and past the
   * trailing edge by the distance still left to scroll.
   */
  override describeSemanticsClip(_child: RenderNode): Rect {
    const bounds = this.semanticBounds;
    const pixels = this._offset.pixels;
    const remaining = this.maxScrollExtent - pixels;
    const left = bounds.x;
    const top = bounds.y;
    const right = rectRight(bounds);
    const bottom = rectBottom(bounds);
    switch (this._axisDirection) {
      case "up":
        return rectFromLTRB(left, top - remaining, right, bottom + pixels);
      case "right":
        return rectFromLTRB(left - pixels, top, right + remaining, bottom);
      case "down":
        return rectFromLTRB(left, top - pixels, right, bottom + remaining);
      case "left":
        return rectFromLTRB(left - remaining, top, right + pixels, bottom);
    }
  }

  override debugDescribe(): DiagnosticProperties {
    return {
      ...super.debugDescribe(),
      axisDirection: this._axisDirection,
      clipBehavior: this._clipBehavior,
      offset: this.hasSize ? formatPoint(this.paintOffset) : null,
    };
  }

  override dispose(): void {
    this.clipRectLayer.layer = null;
    this.unsubscribeFromOffset();
    super.dispose();
  }
}
