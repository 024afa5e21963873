/**
 * packages/core/src/render/renderBox.ts — Render nodes laid out with box constraints.
 *
 * A box receives BoxConstraints from its parent and settles on a size inside
 * them. Dry layout and intrinsic sizes answer "what would you do" questions
 * without side effects; both are cached until the next layout invalidation.
 */

import { UiError, unwrapResult } from "../errors.js";
import {
  type BoxConstraints,
  constraintsEqual,
  constraintsKey,
  normalizeBoxConstraints,
} from "../layout/boxConstraints.js";
import { rectContains, sizeToRect } from "../layout/rect.js";
import {
  invertTransform,
  transformPoint,
  translateTransform,
} from "../layout/transform.js";
import { type Point, type Rect, type Size, type Transform2D, ZERO_POINT } from "../layout/types.js";
import type { HitTestResult } from "./hitTestResult.js";
import { type DiagnosticProperties, RenderNode } from "./renderNode.js";

type IntrinsicDimension = "minWidth" | "maxWidth" | "minHeight" | "maxHeight";

export abstract class RenderBox extends RenderNode {
  /** Position assigned by the parent during its layout. */
  offsetInParent: Point = ZERO_POINT;

  private _size: Size | null = null;
  private _constraints: BoxConstraints | null = null;
  private _layoutCount = 0;
  private readonly dryLayoutCache = new Map<string, Size>();
  private readonly intrinsicCache = new Map<string, number>();

  get hasSize(): boolean {
    return this._size !== null;
  }

  get size(): Size {
    const size = this._size;
    if (size === null) {
      throw new UiError("UI_INVALID_STATE", `${this.constructor.name}: size read before layout`);
    }
    return size;
  }

  get constraints(): BoxConstraints {
    const constraints = this._constraints;
    if (constraints === null) {
      throw new UiError(
        "UI_INVALID_STATE",
        `${this.constructor.name}: constraints read before layout`,
      );
    }
    return constraints;
  }

  /** Number of times performLayout actually ran. */
  get debugLayoutCount(): number {
    return this._layoutCount;
  }

  protected setSize(size: Size): void {
    if (!Number.isFinite(size.w) || !Number.isFinite(size.h) || size.w < 0 || size.h < 0) {
      throw new UiError(
        "UI_INVALID_STATE",
        `${this.constructor.name}: layout produced invalid size ${String(size.w)}x${String(size.h)}`,
      );
    }
    this._size = size;
  }

  /**
   * Lay the box out against `constraints`. A clean box handed the same
   * constraints again keeps its size without re-running performLayout.
   */
  layout(constraints: BoxConstraints): void {
    const normalized = unwrapResult(normalizeBoxConstraints(constraints));
    const previous = this._constraints;
    if (!this.needsLayout && previous !== null && constraintsEqual(previous, normalized)) return;
    this._constraints = normalized;
    this._layoutCount++;
    this.performLayout();
    this.markLaidOut();
    this.markNeedsPaint();
  }

  protected abstract performLayout(): void;

  /** Size this box would pick under `constraints`. Must not touch any state. */
  protected abstract computeDryLayout(constraints: BoxConstraints): Size;

  getDryLayout(constraints: BoxConstraints): Size {
    const normalized = unwrapResult(normalizeBoxConstraints(constraints));
    const key = constraintsKey(normalized);
    const cached = this.dryLayoutCache.get(key);
    if (cached !== undefined) return cached;
    const size = this.computeDryLayout(normalized);
    this.dryLayoutCache.set(key, size);
    return size;
  }

  getMinIntrinsicWidth(height: number): number {
    return this.intrinsic("minWidth", height, (h) => this.computeMinIntrinsicWidth(h));
  }

  getMaxIntrinsicWidth(height: number): number {
    return this.intrinsic("maxWidth", height, (h) => this.computeMaxIntrinsicWidth(h));
  }

  getMinIntrinsicHeight(width: number): number {
    return this.intrinsic("minHeight", width, (w) => this.computeMinIntrinsicHeight(w));
  }

  getMaxIntrinsicHeight(width: number): number {
    return this.intrinsic("maxHeight", width, (w) => this.computeMaxIntrinsicHeight(w));
  }

  protected computeMinIntrinsicWidth(_height: number): number {
    return 0;
  }

  protected computeMaxIntrinsicWidth(_height: number): number {
    return 0;
  }

  protected computeMinIntrinsicHeight(_width: number): number {
    return 0;
  }

  protected computeMaxIntrinsicHeight(_width: number): number {
    return 0;
  }

  /** Distance from the top of the box to its first baseline, or null. */
  getDistanceToBaseline(): number | null {
    if (!this.hasSize) {
      throw new UiError(
        "UI_INVALID_STATE",
        `${this.constructor.name}: baseline requested before layout`,
      );
    }
    return this.computeDistanceToActualBaseline();
  }

  protected computeDistanceToActualBaseline(): number | null {
    return null;
  }

  protected override onLayoutInvalidated(): void {
    this.dryLayoutCache.clear();
    this.intrinsicCache.clear();
  }

  override get paintBounds(): Rect {
    return sizeToRect(this.size);
  }

  /**
   * Record this box (and whatever its children report) when `position`
   * lies inside its size.
   */
  hitTest(result: HitTestResult, position: Point): boolean {
    if (!this.hasSize || !rectContains(sizeToRect(this.size), position)) return false;
    if (this.hitTestChildren(result, position) || this.hitTestSelf(position)) {
      result.add(this, position);
      return true;
    }
    return false;
  }

  protected hitTestSelf(_position: Point): boolean {
    return false;
  }

  protected hitTestChildren(_result: HitTestResult, _position: Point): boolean {
    return false;
  }

  override applyPaintTransform(child: RenderNode, transform: Transform2D): Transform2D {
    if (child instanceof RenderBox) return translateTransform(transform, child.offsetInParent);
    return transform;
  }

  localToGlobal(point: Point): Point {
    return transformPoint(this.getTransformTo(null), point);
  }

  globalToLocal(point: Point): Point {
    const inverse = invertTransform(this.getTransformTo(null));
    if (inverse === null) {
      throw new UiError("UI_INVALID_STATE", `${this.constructor.name}: paint transform is singular`);
    }
    return transformPoint(inverse, point);
  }

  override debugDescribe(): DiagnosticProperties {
    const size = this._size;
    return {
      ...super.debugDescribe(),
      size: size === null ? null : `${String(size.w)}x${String(size.h)}`,
    };
  }

  private intrinsic(
    kind: IntrinsicDimension,
    extent: number,
    compute: (extent: number) => number,
  ): number {
    if (Number.isNaN(extent) || extent < 0) {
      throw new UiError(
        "UI_INVALID_CONSTRAINTS",
        `${this.constructor.name}: intrinsic ${kind} queried with extent ${String(extent)}`,
      );
    }
    const key = `${kind}:${String(extent)}`;
    const cached = this.intrinsicCache.get(key);
    if (cached !== undefined) return cached;
    const value = compute(extent);
    this.intrinsicCache.set(key, value);
    return value;
  }
}

export function isRenderBox(node: RenderNode | null | undefined): node is RenderBox {
  return node instanceof RenderBox;
}

/** Box with zero or one box child. */
export abstract class RenderBoxWithChild extends RenderBox {
  private _child: RenderBox | null = null;

  get child(): RenderBox | null {
    return this._child;
  }

  set child(value: RenderBox | null) {
    if (value === this._child) return;
    const previous = this._child;
    if (value !== null) this.adoptChild(value);
    if (previous !== null) this.dropChild(previous);
    this._child = value;
  }

  override visitChildren(visitor: (child: RenderNode) => void): void {
    if (this._child !== null) visitor(this._child);
  }
}
