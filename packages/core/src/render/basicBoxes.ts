/**
 * packages/core/src/render/basicBoxes.ts — Leaf, padding and column boxes.
 *
 * These are the plain boxes a scroll view wraps: fixed-size content, the
 * padding the widget inserts around its child, and a vertical run of boxes.
 */

import { UiError } from "../errors.js";
import {
  type BoxConstraints,
  constrainSize,
  deflateConstraints,
  widthConstraints,
} from "../layout/boxConstraints.js";
import {
  EDGE_INSETS_ZERO,
  type EdgeInsets,
  horizontalInsets,
  isValidInsets,
  verticalInsets,
} from "../layout/edgeInsets.js";
import { addPoints } from "../layout/rect.js";
import type { Point, Size } from "../layout/types.js";
import type { PaintStyle } from "./canvas.js";
import type { HitTestResult } from "./hitTestResult.js";
import type { PaintContext } from "./paintContext.js";
import { RenderBox, RenderBoxWithChild } from "./renderBox.js";
import type { DiagnosticProperties, RenderNode } from "./renderNode.js";

export type RenderFixedBoxOptions = Readonly<{
  size: Size;
  label?: string;
  style?: PaintStyle;
  /** Distance from the top to the baseline, when the content has one. */
  baseline?: number;
}>;

/** Leaf that asks for a preferred size and paints a filled rectangle. */
export class RenderFixedBox extends RenderBox {
  private _preferredSize: Size;
  private readonly style: PaintStyle | undefined;
  private readonly baseline: number | null;

  constructor(opts: RenderFixedBoxOptions) {
    super();
    this._preferredSize = opts.size;
    this.style = opts.style;
    this.baseline = opts.baseline ?? null;
    this.semanticsLabel = opts.label ?? null;
  }

  get preferredSize(): Size {
    return this._preferredSize;
  }

  set preferredSize(value: Size) {
    if (value.w === this._preferredSize.w && value.h === this._preferredSize.h) return;
    this._preferredSize = value;
    this.markNeedsLayout();
  }

  protected override computeDryLayout(constraints: BoxConstraints): Size {
    return constrainSize(constraints, this._preferredSize);
  }

  protected override performLayout(): void {
    this.setSize(constrainSize(this.constraints, this._preferredSize));
  }

  protected override computeMinIntrinsicWidth(_height: number): number {
    return this._preferredSize.w;
  }

  protected override computeMaxIntrinsicWidth(_height: number): number {
    return this._preferredSize.w;
  }

  protected override computeMinIntrinsicHeight(_width: number): number {
    return this._preferredSize.h;
  }

  protected override computeMaxIntrinsicHeight(_width: number): number {
    return this._preferredSize.h;
  }

  protected override computeDistanceToActualBaseline(): number | null {
    return this.baseline;
  }

  protected override hitTestSelf(_position: Point): boolean {
    return true;
  }

  override paint(context: PaintContext, offset: Point): void {
    const { w, h } = this.size;
    context.canvas.fillRect(offset.x, offset.y, w, h, this.style);
    if (this.semanticsLabel !== null) {
      context.canvas.drawText(offset.x, offset.y, this.semanticsLabel);
    }
  }
}

export type RenderPaddingOptions = Readonly<{
  padding: EdgeInsets;
  child?: RenderBox | null;
}>;

/** Insets its child by `padding` on every side. */
export class RenderPadding extends RenderBoxWithChild {
  private _padding: EdgeInsets = EDGE_INSETS_ZERO;

  constructor(opts: RenderPaddingOptions) {
    super();
    this.padding = opts.padding;
    this.child = opts.child ?? null;
  }

  get padding(): EdgeInsets {
    return this._padding;
  }

  set padding(value: EdgeInsets) {
    if (!isValidInsets(value)) {
      throw new UiError("UI_INVALID_PROPS", "RenderPadding: padding must be finite and >= 0");
    }
    const current = this._padding;
    if (
      value.top === current.top &&
      value.right === current.right &&
      value.bottom === current.bottom &&
      value.left === current.left
    ) {
      return;
    }
    this._padding = value;
    this.markNeedsLayout();
  }

  private paddedSize(inner: Size): Size {
    return {
      w: inner.w + horizontalInsets(this._padding),
      h: inner.h + verticalInsets(this._padding),
    };
  }

  protected override computeDryLayout(constraints: BoxConstraints): Size {
    const child = this.child;
    if (child === null) return constrainSize(constraints, this.paddedSize({ w: 0, h: 0 }));
    const inner = child.getDryLayout(deflateConstraints(constraints, this._padding));
    return constrainSize(constraints, this.paddedSize(inner));
  }

  protected override performLayout(): void {
    const constraints = this.constraints;
    const child = this.child;
    if (child === null) {
      this.setSize(constrainSize(constraints, this.paddedSize({ w: 0, h: 0 })));
      return;
    }
    child.layout(deflateConstraints(constraints, this._padding));
    child.offsetInParent = { x: this._padding.left, y: this._padding.top };
    this.setSize(constrainSize(constraints, this.paddedSize(child.size)));
  }

  protected override computeMinIntrinsicWidth(height: number): number {
    const inner = Math.max(0, height - verticalInsets(this._padding));
    return (this.child?.getMinIntrinsicWidth(inner) ?? 0) + horizontalInsets(this._padding);
  }

  protected override computeMaxIntrinsicWidth(height: number): number {
    const inner = Math.max(0, height - verticalInsets(this._padding));
    return (this.child?.getMaxIntrinsicWidth(inner) ?? 0) + horizontalInsets(this._padding);
  }

  protected override computeMinIntrinsicHeight(width: number): number {
    const inner = Math.max(0, width - horizontalInsets(this._padding));
    return (this.child?.getMinIntrinsicHeight(inner) ?? 0) + verticalInsets(this._padding);
  }

  protected override computeMaxIntrinsicHeight(width: number): number {
    const inner = Math.max(0, width - horizontalInsets(this._padding));
    return (this.child?.getMaxIntrinsicHeight(inner) ?? 0) + verticalInsets(this._padding);
  }

  protected override computeDistanceToActualBaseline(): number | null {
    const child = this.child;
    if (child === null) return null;
    const baseline = child.getDistanceToBaseline();
    return baseline === null ? null : baseline + child.offsetInParent.y;
  }

  protected override hitTestChildren(result: HitTestResult, position: Point): boolean {
    const child = this.child;
    if (child === null) return false;
    return result.addWithPaintOffset(child.offsetInParent, position, (r, transformed) =>
      child.hitTest(r, transformed),
    );
  }

  override paint(context: PaintContext, offset: Point): void {
    const child = this.child;
    if (child !== null) context.paintChild(child, addPoints(offset, child.offsetInParent));
  }

  override debugDescribe(): DiagnosticProperties {
    const p = this._padding;
    return {
      ...super.debugDescribe(),
      padding: `${String(p.top)},${String(p.right)},${String(p.bottom)},${String(p.left)}`,
    };
  }
}

export type RenderColumnStackOptions = Readonly<{
  children?: readonly RenderBox[];
}>;

/**
 * Stacks children top to bottom. Children get the incoming width range and
 * an unbounded height; the stack is as wide as its widest child.
 */
export class RenderColumnStack extends RenderBox {
  private readonly _children: RenderBox[] = [];

  constructor(opts: RenderColumnStackOptions = {}) {
    super();
    for (const child of opts.children ?? []) this.add(child);
  }

  get children(): readonly RenderBox[] {
    return this._children;
  }

  add(child: RenderBox): void {
    this.adoptChild(child);
    this._children.push(child);
  }

  remove(child: RenderBox): void {
    const index = this._children.indexOf(child);
    if (index < 0) return;
    this._children.splice(index, 1);
    this.dropChild(child);
  }

  override visitChildren(visitor: (child: RenderNode) => void): void {
    for (const child of this._children) visitor(child);
  }

  private childConstraints(constraints: BoxConstraints): BoxConstraints {
    return widthConstraints(constraints);
  }

  protected override computeDryLayout(constraints: BoxConstraints): Size {
    const inner = this.childConstraints(constraints);
    let w = 0;
    let h = 0;
    for (const child of this._children) {
      const size = child.getDryLayout(inner);
      w = Math.max(w, size.w);
      h += size.h;
    }
    return constrainSize(constraints, { w, h });
  }

  protected override performLayout(): void {
    const constraints = this.constraints;
    const inner = this.childConstraints(constraints);
    let w = 0;
    let y = 0;
    for (const child of this._children) {
      child.layout(inner);
      child.offsetInParent = { x: 0, y };
      w = Math.max(w, child.size.w);
      y += child.size.h;
    }
    this.setSize(constrainSize(constraints, { w, h: y }));
  }

  protected override computeMinIntrinsicWidth(height: number): number {
    let w = 0;
    for (const child of this._children) w = Math.max(w, child.getMinIntrinsicWidth(height));
    return w;
  }

  protected override computeMaxIntrinsicWidth(height: number): number {
    let w = 0;
    for (const child of this._children) w = Math.max(w, child.getMaxIntrinsicWidth(height));
    return w;
  }

  protected override computeMinIntrinsicHeight(width: number): number {
    let h = 0;
    for (const child of this._children) h += child.getMinIntrinsicHeight(width);
    return h;
  }

  protected override computeMaxIntrinsicHeight(width: number): number {
    let h = 0;
    for (const child of this._children) h += child.getMaxIntrinsicHeight(width);
    return h;
  }

  protected override hitTestChildren(result: HitTestResult, position: Point): boolean {
    for (let i = this._children.length - 1; i >= 0; i--) {
      const child = this._children[i];
      if (!child) continue;
      const hit = result.addWithPaintOffset(child.offsetInParent, position, (r, transformed) =>
        child.hitTest(r, transformed),
      );
      if (hit) return true;
    }
    return false;
  }

  override paint(context: PaintContext, offset: Point): void {
    for (const child of this._children) {
      context.paintChild(child, addPoints(offset, child.offsetInParent));
    }
  }
}
