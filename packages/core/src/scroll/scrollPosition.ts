/**
 * packages/core/src/scroll/scrollPosition.ts — Mutable scroll offset with a range.
 *
 * The position is the ViewportOffset the scroll view hands to its viewport.
 * It learns its range from `applyContentDimensions` and keeps `pixels`
 * inside it from then on.
 */

import { DEFAULT_ALLOW_IMPLICIT_SCROLLING } from "../config.js";
import { UiError } from "../errors.js";
import type { AxisDirection } from "../layout/axis.js";
import type { ScrollPhysics } from "./types.js";
import {
  type ScrollListener,
  ScrollListenerRegistry,
  type SubscriptionToken,
  type ViewportOffset,
} from "./viewportOffset.js";

export type ScrollPositionOptions = Readonly<{
  physics?: ScrollPhysics | null | undefined;
  axisDirection?: AxisDirection | undefined;
  initialPixels?: number | undefined;
  debugLabel?: string | null | undefined;
}>;

function clamp(value: number, min: number, max: number): number {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}

export class ScrollPosition implements ViewportOffset {
  physics: ScrollPhysics | null;
  axisDirection: AxisDirection;
  readonly debugLabel: string | null;

  private _pixels: number;
  private _minScrollExtent: number | null = null;
  private _maxScrollExtent: number | null = null;
  private _viewportDimension: number | null = null;
  private _disposed = false;
  private readonly registry: ScrollListenerRegistry;

  constructor(opts: ScrollPositionOptions = {}) {
    const initial = opts.initialPixels ?? 0;
    if (!Number.isFinite(initial)) {
      throw new UiError("UI_INVALID_STATE", "ScrollPosition: initialPixels must be finite");
    }
    this._pixels = initial;
    this.physics = opts.physics ?? null;
    this.axisDirection = opts.axisDirection ?? "down";
    this.debugLabel = opts.debugLabel ?? null;
    this.registry = new ScrollListenerRegistry(this.debugLabel ?? "ScrollPosition");
  }

  get pixels(): number {
    return this._pixels;
  }

  get allowImplicitScrolling(): boolean {
    return this.physics?.allowImplicitScrolling ?? DEFAULT_ALLOW_IMPLICIT_SCROLLING;
  }

  get hasContentDimensions(): boolean {
    return this._minScrollExtent !== null && this._maxScrollExtent !== null;
  }

  get hasViewportDimension(): boolean {
    return this._viewportDimension !== null;
  }

  get minScrollExtent(): number {
    return this.requireExtent(this._minScrollExtent, "minScrollExtent");
  }

  get maxScrollExtent(): number {
    return this.requireExtent(this._maxScrollExtent, "maxScrollExtent");
  }

  get viewportDimension(): number {
    return this.requireExtent(this._viewportDimension, "viewportDimension");
  }

  /** Distance scrolled past the leading edge of the content. */
  get extentBefore(): number {
    return Math.max(this._pixels - this.minScrollExtent, 0);
  }

  /** Distance that can still be scrolled towards the trailing edge. */
  get extentAfter(): number {
    return Math.max(this.maxScrollExtent - this._pixels, 0);
  }

  get atEdge(): boolean {
    return this._pixels === this.minScrollExtent || this._pixels === this.maxScrollExtent;
  }

  get outOfRange(): boolean {
    return this._pixels < this.minScrollExtent || this._pixels > this.maxScrollExtent;
  }

  get listenerCount(): number {
    return this.registry.size;
  }

  get disposed(): boolean {
    return this._disposed;
  }

  applyViewportDimension(viewportDimension: number): boolean {
    if (!Number.isFinite(viewportDimension) || viewportDimension < 0) {
      throw new UiError(
        "UI_INVALID_STATE",
        `ScrollPosition: invalid viewport dimension ${String(viewportDimension)}`,
      );
    }
    this._viewportDimension = viewportDimension;
    return true;
  }

  applyContentDimensions(minScrollExtent: number, maxScrollExtent: number): boolean {
    if (
      !Number.isFinite(minScrollExtent) ||
      Number.isNaN(maxScrollExtent) ||
      minScrollExtent > maxScrollExtent
    ) {
      throw new UiError(
        "UI_INVALID_STATE",
        `ScrollPosition: invalid content range [${String(minScrollExtent)}, ${String(maxScrollExtent)}]`,
      );
    }
    this._minScrollExtent = minScrollExtent;
    this._maxScrollExtent = maxScrollExtent;
    this.setPixels(clamp(this._pixels, minScrollExtent, maxScrollExtent));
    return true;
  }

  /** Move to `value`, clamped into the range once one is known. */
  jumpTo(value: number): void {
    if (!Number.isFinite(value)) {
      throw new UiError("UI_INVALID_STATE", `ScrollPosition: cannot jump to ${String(value)}`);
    }
    const min = this._minScrollExtent;
    const max = this._maxScrollExtent;
    this.setPixels(min !== null && max !== null ? clamp(value, min, max) : value);
  }

  moveTo(to: number): void {
    this.jumpTo(to);
  }

  subscribe(listener: ScrollListener): SubscriptionToken {
    return this.registry.subscribe(listener);
  }

  unsubscribe(token: SubscriptionToken): boolean {
    return this.registry.unsubscribe(token);
  }

  dispose(): void {
    this._disposed = true;
    this.registry.close();
  }

  private setPixels(next: number): void {
    if (next === this._pixels) return;
    this._pixels = next;
    this.registry.notify();
  }

  private requireExtent(value: number | null, name: string): number {
    if (value === null) {
      throw new UiError("UI_INVALID_STATE", `ScrollPosition.${name} read before layout`);
    }
    return value;
  }
}
