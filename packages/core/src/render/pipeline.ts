/**
 * packages/core/src/render/pipeline.ts — Layout, paint and semantics scheduler.
 *
 * The pipeline owns the root box and its constraints. Render nodes report
 * what they need through the RenderOwner methods; the host calls the flush
 * methods (or drawFrame) to run the passes synchronously.
 */

import { UiError, unwrapResult } from "../errors.js";
import {
  type BoxConstraints,
  boxConstraints,
  constraintsEqual,
  normalizeBoxConstraints,
} from "../layout/boxConstraints.js";
import { type Point, ZERO_POINT } from "../layout/types.js";
import type { PaintCanvas } from "./canvas.js";
import { HitTestResult } from "./hitTestResult.js";
import { ContainerLayer } from "./layers.js";
import { PaintContext } from "./paintContext.js";
import type { RenderBox } from "./renderBox.js";
import type { RenderNode, RenderOwner } from "./renderNode.js";
import { type SemanticsEntry, collectSemantics } from "./semantics.js";

export type PipelineTraceKind = "layout" | "paint" | "semantics";

export type PipelineTrace = Readonly<{
  kind: PipelineTraceKind;
  /** 1-based count of passes of this kind. */
  pass: number;
  /** Nodes that requested the pass since the previous one. */
  requests: number;
}>;

export type PipelineTraceListener = (trace: PipelineTrace) => void;

export type FrameResult = Readonly<{
  layer: ContainerLayer | null;
  semantics: readonly SemanticsEntry[];
}>;

export class RenderPipeline implements RenderOwner {
  private _root: RenderBox | null = null;
  private _constraints: BoxConstraints;
  private readonly layoutRequests = new Set<RenderNode>();
  private readonly paintRequests = new Set<RenderNode>();
  private readonly semanticsRequests = new Set<RenderNode>();
  private readonly traceListeners = new Set<PipelineTraceListener>();
  private _layoutPasses = 0;
  private _paintPasses = 0;
  private _semanticsPasses = 0;

  constructor(constraints: BoxConstraints = boxConstraints()) {
    this._constraints = unwrapResult(normalizeBoxConstraints(constraints));
  }

  get root(): RenderBox | null {
    return this._root;
  }

  get rootConstraints(): BoxConstraints {
    return this._constraints;
  }

  get layoutPasses(): number {
    return this._layoutPasses;
  }

  get paintPasses(): number {
    return this._paintPasses;
  }

  get semanticsPasses(): number {
    return this._semanticsPasses;
  }

  get needsLayout(): boolean {
    return this.layoutRequests.size > 0;
  }

  get needsPaint(): boolean {
    return this.paintRequests.size > 0;
  }

  get needsSemantics(): boolean {
    return this.semanticsRequests.size > 0;
  }

  setRoot(root: RenderBox | null): void {
    if (root === this._root) return;
    if (root !== null && root.parent !== null) {
      throw new UiError("UI_INVALID_STATE", "RenderPipeline.setRoot: node already has a parent");
    }
    this._root?.detach();
    this._root = root;
    this.layoutRequests.clear();
    this.paintRequests.clear();
    this.semanticsRequests.clear();
    if (root === null) return;
    root.attach(this);
    root.markNeedsLayout();
  }

  setConstraints(constraints: BoxConstraints): void {
    const normalized = unwrapResult(normalizeBoxConstraints(constraints));
    if (constraintsEqual(normalized, this._constraints)) return;
    this._constraints = normalized;
    this._root?.markNeedsLayout();
  }

  requestLayout(node: RenderNode): void {
    this.layoutRequests.add(node);
  }

  requestPaint(node: RenderNode): void {
    this.paintRequests.add(node);
  }

  requestSemantics(node: RenderNode): void {
    this.semanticsRequests.add(node);
  }

  /** Relayout from the root if anything asked for it. Returns whether a pass ran. */
  flushLayout(): boolean {
    const root = this._root;
    if (root === null || this.layoutRequests.size === 0) return false;
    const requests = this.layoutRequests.size;
    this.layoutRequests.clear();
    root.layout(this._constraints);
    this._layoutPasses++;
    this.emit({ kind: "layout", pass: this._layoutPasses, requests });
    return true;
  }

  /** Paint the whole tree into `canvas` and return the frame's root layer. */
  flushPaint(canvas: PaintCanvas): ContainerLayer | null {
    const root = this._root;
    if (root === null) return null;
    if (root.needsLayout) {
      throw new UiError("UI_INVALID_STATE", "RenderPipeline.flushPaint: layout is pending");
    }
    const requests = this.paintRequests.size;
    this.paintRequests.clear();
    const layer = new ContainerLayer();
    new PaintContext(canvas, layer).paintChild(root, ZERO_POINT);
    this._paintPasses++;
    this.emit({ kind: "paint", pass: this._paintPasses, requests });
    return layer;
  }

  flushSemantics(): readonly SemanticsEntry[] {
    const root = this._root;
    if (root === null) return [];
    const requests = this.semanticsRequests.size;
    this.semanticsRequests.clear();
    const entries = collectSemantics(root);
    this._semanticsPasses++;
    this.emit({ kind: "semantics", pass: this._semanticsPasses, requests });
    return entries;
  }

  drawFrame(canvas: PaintCanvas): FrameResult {
    this.flushLayout();
    const layer = this.flushPaint(canvas);
    return { layer, semantics: this.flushSemantics() };
  }

  hitTest(position: Point): HitTestResult {
    const result = new HitTestResult();
    this._root?.hitTest(result, position);
    return result;
  }

  /** Subscribe to pass traces. Returns an unsubscribe function. */
  onTrace(listener: PipelineTraceListener): () => void {
    this.traceListeners.add(listener);
    return () => {
      this.traceListeners.delete(listener);
    };
  }

  dispose(): void {
    this.setRoot(null);
    this.traceListeners.clear();
  }

  private emit(trace: PipelineTrace): void {
    for (const listener of [...this.traceListeners]) listener(trace);
  }
}
