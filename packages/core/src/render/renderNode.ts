/**
 * packages/core/src/render/renderNode.ts — Base class of the render tree.
 *
 * A render node knows its parent and children, whether it is attached to an
 * owner (the pipeline that schedules layout, paint and semantics), and which
 * of those passes it needs. Setters on subclasses record the minimal work by
 * calling markNeedsLayout / markNeedsPaint / markNeedsSemanticsUpdate; the
 * owner runs the passes later.
 *
 * Layout dirtiness propagates to the root: the pipeline always relayouts
 * from the root, and clean subtrees with unchanged constraints are skipped.
 */

import { UiError } from "../errors.js";
import { IDENTITY_TRANSFORM } from "../layout/transform.js";
import type { Point, Rect, Transform2D } from "../layout/types.js";
import { LayerHandle, type OffsetLayer } from "./layers.js";
import type { PaintContext } from "./paintContext.js";

/** Scheduler the node reports to while attached. */
export interface RenderOwner {
  requestLayout(node: RenderNode): void;
  requestPaint(node: RenderNode): void;
  requestSemantics(node: RenderNode): void;
}

export type ShowOnScreenOptions = Readonly<{
  /** Node to reveal; defaults to the node the request started from. */
  descendant?: RenderNode | undefined;
  /** Area of `descendant` to reveal, in its local coordinates. Defaults to its paint bounds. */
  rect?: Rect | undefined;
}>;

export type DiagnosticValue = string | number | boolean | null;
export type DiagnosticProperties = Readonly<Record<string, DiagnosticValue>>;

export abstract class RenderNode {
  /** Label reported to the semantics tree; unlabelled nodes are skipped. */
  semanticsLabel: string | null = null;

  /** Layer reused across frames while this node is a repaint boundary. */
  readonly boundaryLayer = new LayerHandle<OffsetLayer>();

  private _parent: RenderNode | null = null;
  private _owner: RenderOwner | null = null;
  private _depth = 0;
  private _needsLayout = true;
  private _needsPaint = true;
  private _needsSemanticsUpdate = true;
  private _disposed = false;

  get parent(): RenderNode | null {
    return this._parent;
  }

  get owner(): RenderOwner | null {
    return this._owner;
  }

  get attached(): boolean {
    return this._owner !== null;
  }

  get depth(): number {
    return this._depth;
  }

  get needsLayout(): boolean {
    return this._needsLayout;
  }

  get needsPaint(): boolean {
    return this._needsPaint;
  }

  get needsSemanticsUpdate(): boolean {
    return this._needsSemanticsUpdate;
  }

  get disposed(): boolean {
    return this._disposed;
  }

  attach(owner: RenderOwner): void {
    this._owner = owner;
    if (this._needsLayout) owner.requestLayout(this);
    if (this._needsPaint) owner.requestPaint(this);
    if (this._needsSemanticsUpdate) owner.requestSemantics(this);
    this.visitChildren((child) => child.attach(owner));
  }

  detach(): void {
    this._owner = null;
    this.visitChildren((child) => child.detach());
  }

  visitChildren(_visitor: (child: RenderNode) => void): void {}

  protected adoptChild(child: RenderNode): void {
    if (child._parent !== null) {
      throw new UiError(
        "UI_INVALID_STATE",
        `${child.constructor.name} is already a child of ${child._parent.constructor.name}`,
      );
    }
    child._parent = this;
    child.redepth(this._depth + 1);
    if (this._owner !== null) child.attach(this._owner);
    this.markNeedsLayout();
    this.markNeedsSemanticsUpdate();
  }

  protected dropChild(child: RenderNode): void {
    if (child._parent !== this) return;
    child._parent = null;
    if (child.attached) child.detach();
    this.markNeedsLayout();
    this.markNeedsSemanticsUpdate();
  }

  private redepth(depth: number): void {
    this._depth = depth;
    this.visitChildren((child) => child.redepth(depth + 1));
  }

  markNeedsLayout(): void {
    this.onLayoutInvalidated();
    this._needsLayout = true;
    const parent = this._parent;
    if (parent !== null) {
      parent.markNeedsLayout();
      return;
    }
    this._owner?.requestLayout(this);
  }

  markNeedsPaint(): void {
    this._needsPaint = true;
    this._owner?.requestPaint(this);
  }

  markNeedsSemanticsUpdate(): void {
    this._needsSemanticsUpdate = true;
    this._owner?.requestSemantics(this);
  }

  /** Called whenever layout is invalidated; subclasses drop layout caches here. */
  protected onLayoutInvalidated(): void {}

  protected markLaidOut(): void {
    this._needsLayout = false;
  }

  /** @internal Called by the semantics walk once the node has been described. */
  markSemanticsClean(): void {
    this._needsSemanticsUpdate = false;
  }

  get isRepaintBoundary(): boolean {
    return false;
  }

  /** True when this node or a descendant paints into its own layer. */
  get needsCompositing(): boolean {
    if (this.isRepaintBoundary) return true;
    let composited = false;
    this.visitChildren((child) => {
      if (!composited && child.needsCompositing) composited = true;
    });
    return composited;
  }

  abstract paint(context: PaintContext, offset: Point): void;

  paintWithContext(context: PaintContext, offset: Point): void {
    this._needsPaint = false;
    this.paint(context, offset);
  }

  /** Bounds of what this node paints, in its own coordinates. */
  abstract get paintBounds(): Rect;

  get semanticBounds(): Rect {
    return this.paintBounds;
  }

  /** Compose the transform that maps `child` coordinates into this node's. */
  applyPaintTransform(_child: RenderNode, transform: Transform2D): Transform2D {
    return transform;
  }

  /**
   * Transform from this node's coordinates into `ancestor`'s (or the root's
   * when `ancestor` is null).
   */
  getTransformTo(ancestor: RenderNode | null): Transform2D {
    const chain: RenderNode[] = [];
    let node: RenderNode | null = this;
    while (node !== null) {
      chain.push(node);
      if (node === ancestor) break;
      node = node._parent;
    }
    if (ancestor !== null && chain[chain.length - 1] !== ancestor) {
      throw new UiError(
        "UI_INVALID_STATE",
        `${ancestor.constructor.name} is not an ancestor of ${this.constructor.name}`,
      );
    }
    let transform = IDENTITY_TRANSFORM;
    for (let i = chain.length - 1; i > 0; i--) {
      const parent = chain[i];
      const child = chain[i - 1];
      if (!parent || !child) continue;
      transform = parent.applyPaintTransform(child, transform);
    }
    return transform;
  }

  /** Clip applied to `child` while painting, in this node's coordinates. */
  describeApproximatePaintClip(_child: RenderNode): Rect | null {
    return null;
  }

  /**
   * Rectangle outside which `child`'s semantics are dropped, in this node's
   * coordinates. Null falls back to the paint clip.
   */
  describeSemanticsClip(_child: RenderNode): Rect | null {
    return null;
  }

  /** Ask ancestors to make `descendant` (default: this node) visible. */
  showOnScreen(options: ShowOnScreenOptions = {}): void {
    this._parent?.showOnScreen({ descendant: options.descendant ?? this, rect: options.rect });
  }

  debugDescribe(): DiagnosticProperties {
    return {
      type: this.constructor.name,
      depth: this._depth,
      needsLayout: this._needsLayout,
      needsPaint: this._needsPaint,
      label: this.semanticsLabel,
    };
  }

  dispose(): void {
    this.boundaryLayer.layer = null;
    this._disposed = true;
  }
}
