/**
 * packages/core/src/render/layers.ts — Compositing layers and layer handles.
 *
 * Layers are reference counted. A LayerHandle is a one-slot owner: assigning
 * a new layer retains it and releases the previous one, and a layer whose
 * last reference is released disposes itself. Render nodes keep the layers
 * they want to reuse across frames in handles, so identity survives repaints
 * until the node stops needing the layer.
 */

import { UiError } from "../errors.js";
import type { Point, Rect } from "../layout/types.js";

/** How overflowing content is cropped. "none" paints without clipping. */
export type ClipBehavior = "none" | "hardEdge" | "antiAlias" | "antiAliasWithSaveLayer";

export function isClipBehavior(v: unknown): v is ClipBehavior {
  return v === "none" || v === "hardEdge" || v === "antiAlias" || v === "antiAliasWithSaveLayer";
}

let nextLayerId = 1;

export abstract class Layer {
  readonly id = nextLayerId++;
  private _parent: ContainerLayer | null = null;
  private _refCount = 0;
  private _disposed = false;

  get parent(): ContainerLayer | null {
    return this._parent;
  }

  get refCount(): number {
    return this._refCount;
  }

  get disposed(): boolean {
    return this._disposed;
  }

  retain(): void {
    if (this._disposed) {
      throw new UiError("UI_INVALID_STATE", `Layer #${String(this.id)}: retain after dispose`);
    }
    this._refCount++;
  }

  release(): void {
    if (this._refCount === 0) return;
    this._refCount--;
    if (this._refCount === 0) this.dispose();
  }

  remove(): void {
    this._parent?.removeChild(this);
  }

  /** @internal Parent bookkeeping for ContainerLayer. */
  setParent(parent: ContainerLayer | null): void {
    this._parent = parent;
  }

  protected dispose(): void {
    this.remove();
    this._disposed = true;
  }
}

export class ContainerLayer extends Layer {
  private readonly _children: Layer[] = [];

  get children(): readonly Layer[] {
    return this._children;
  }

  append(child: Layer): void {
    if (child.disposed) {
      throw new UiError("UI_INVALID_STATE", `Layer #${String(child.id)}: append after dispose`);
    }
    child.remove();
    child.setParent(this);
    this._children.push(child);
  }

  removeChild(child: Layer): void {
    const index = this._children.indexOf(child);
    if (index < 0) return;
    this._children.splice(index, 1);
    child.setParent(null);
  }

  removeAllChildren(): void {
    for (const child of this._children) child.setParent(null);
    this._children.length = 0;
  }

  protected override dispose(): void {
    this.removeAllChildren();
    super.dispose();
  }
}

/** Layer owned by a repaint boundary; `offset` is where the boundary painted. */
export class OffsetLayer extends ContainerLayer {
  constructor(public offset: Point) {
    super();
  }
}

/** Clips its children to `clipRect` (absolute canvas coordinates). */
export class ClipRectLayer extends ContainerLayer {
  constructor(
    public clipRect: Rect,
    public clipBehavior: ClipBehavior,
  ) {
    super();
  }
}

export class LayerHandle<T extends Layer> {
  private _layer: T | null = null;

  get layer(): T | null {
    return this._layer;
  }

  set layer(next: T | null) {
    if (next === this._layer) return;
    const previous = this._layer;
    this._layer = next;
    next?.retain();
    previous?.release();
  }
}
