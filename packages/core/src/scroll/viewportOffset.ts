/**
 * packages/core/src/scroll/viewportOffset.ts — The scroll offset contract.
 *
 * A viewport reads `pixels` when it paints and reports its dimensions back
 * after every layout. The offset object owns its value and its valid range;
 * the viewport never writes the position itself.
 */

import { warnDev } from "../debug/log.js";
import { UiError } from "../errors.js";

export type ScrollListener = () => void;

/** Opaque handle returned by `subscribe`; pass it back to `unsubscribe`. */
export type SubscriptionToken = Readonly<{ id: number }>;

export interface ViewportOffset {
  /** Current scroll position along the axis. */
  readonly pixels: number;
  /** Whether implicit requests (showOnScreen) may move this offset. */
  readonly allowImplicitScrolling: boolean;
  /** Report the visible extent along the scroll axis. */
  applyViewportDimension(viewportDimension: number): boolean;
  /**
   * Report the scrollable range. The offset clamps its own position into
   * [minScrollExtent, maxScrollExtent] and notifies listeners if it moved.
   */
  applyContentDimensions(minScrollExtent: number, maxScrollExtent: number): boolean;
  subscribe(listener: ScrollListener): SubscriptionToken;
  /** Returns false when the token was not (or no longer) subscribed. */
  unsubscribe(token: SubscriptionToken): boolean;
  /** Implicit scroll request. Jumps; animation is the caller's concern. */
  moveTo(to: number): void;
}

/**
 * Token-keyed listener set shared by the offset implementations.
 *
 * Dispatch iterates a snapshot, so a listener may unsubscribe itself (or
 * another listener) while being notified.
 */
export class ScrollListenerRegistry {
  private readonly listeners = new Map<SubscriptionToken, ScrollListener>();
  private nextId = 1;
  private closed = false;

  constructor(private readonly label: string) {}

  get size(): number {
    return this.listeners.size;
  }

  subscribe(listener: ScrollListener): SubscriptionToken {
    if (this.closed) {
      throw new UiError("UI_INVALID_STATE", `${this.label}: subscribe after dispose`);
    }
    const token: SubscriptionToken = Object.freeze({ id: this.nextId++ });
    this.listeners.set(token, listener);
    return token;
  }

  unsubscribe(token: SubscriptionToken): boolean {
    return this.listeners.delete(token);
  }

  /**
   * Call every listener. A throwing listener does not stop the others; the
   * first error is rethrown once all listeners ran.
   */
  notify(): void {
    if (this.listeners.size === 0) return;
    let firstError: unknown = null;
    let failed = false;
    for (const [token, listener] of [...this.listeners]) {
      if (!this.listeners.has(token)) continue;
      try {
        listener();
      } catch (err: unknown) {
        warnDev(`${this.label}: scroll listener #${String(token.id)} threw: ${String(err)}`);
        if (!failed) {
          failed = true;
          firstError = err;
        }
      }
    }
    if (failed) throw firstError;
  }

  close(): void {
    this.closed = true;
    this.listeners.clear();
  }
}

class FixedViewportOffset implements ViewportOffset {
  private readonly registry = new ScrollListenerRegistry("FixedViewportOffset");

  constructor(readonly pixels: number) {}

  get allowImplicitScrolling(): boolean {
    return false;
  }

  applyViewportDimension(_viewportDimension: number): boolean {
    return true;
  }

  applyContentDimensions(_minScrollExtent: number, _maxScrollExtent: number): boolean {
    return true;
  }

  subscribe(listener: ScrollListener): SubscriptionToken {
    return this.registry.subscribe(listener);
  }

  unsubscribe(token: SubscriptionToken): boolean {
    return this.registry.unsubscribe(token);
  }

  moveTo(_to: number): void {}
}

/**
 * An offset pinned at `pixels`: it ignores content dimensions and implicit
 * scroll requests. Useful for viewports that are laid out but not scrolled.
 */
export function fixedViewportOffset(pixels: number): ViewportOffset {
  if (!Number.isFinite(pixels)) {
    throw new UiError("UI_INVALID_STATE", `fixedViewportOffset: pixels must be finite`);
  }
  return new FixedViewportOffset(pixels);
}
