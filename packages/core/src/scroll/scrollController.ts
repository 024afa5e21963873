/**
 * packages/core/src/scroll/scrollController.ts — Controller shared by scroll views.
 *
 * A controller creates positions for the scroll views it is attached to and
 * forwards programmatic jumps to all of them. Reading `offset` requires
 * exactly one attached position.
 */

import { warnDev } from "../debug/log.js";
import { UiError } from "../errors.js";
import type { AxisDirection } from "../layout/axis.js";
import { ScrollPosition } from "./scrollPosition.js";
import type { ScrollPhysics } from "./types.js";

export type ScrollControllerOptions = Readonly<{
  initialScrollOffset?: number;
  /** Remember the offset of a detached position for the next one. Default true. */
  keepScrollOffset?: boolean;
  debugLabel?: string;
}>;

export class ScrollController {
  readonly initialScrollOffset: number;
  readonly keepScrollOffset: boolean;
  readonly debugLabel: string | null;

  private readonly _positions: ScrollPosition[] = [];
  private savedOffset: number | null = null;

  constructor(opts: ScrollControllerOptions = {}) {
    const initial = opts.initialScrollOffset ?? 0;
    if (!Number.isFinite(initial)) {
      throw new UiError("UI_INVALID_PROPS", "ScrollController: initialScrollOffset must be finite");
    }
    this.initialScrollOffset = initial;
    this.keepScrollOffset = opts.keepScrollOffset ?? true;
    this.debugLabel = opts.debugLabel ?? null;
  }

  get positions(): readonly ScrollPosition[] {
    return this._positions;
  }

  get hasClients(): boolean {
    return this._positions.length > 0;
  }

  get position(): ScrollPosition {
    const count = this._positions.length;
    if (count === 1) {
      const only = this._positions[0];
      if (only) return only;
    }
    if (count > 1) {
      warnDev(
        `ScrollController${this.label()}: attached to ${String(count)} scroll views; offset is ambiguous`,
      );
    }
    throw new UiError(
      "UI_INVALID_STATE",
      `ScrollController${this.label()}: expected one attached position, found ${String(count)}`,
    );
  }

  get offset(): number {
    return this.position.pixels;
  }

  createScrollPosition(
    physics: ScrollPhysics | null,
    axisDirection: AxisDirection,
  ): ScrollPosition {
    const initialPixels =
      this.keepScrollOffset && this.savedOffset !== null ? this.savedOffset : this.initialScrollOffset;
    return new ScrollPosition({
      physics,
      axisDirection,
      initialPixels,
      debugLabel: this.debugLabel,
    });
  }

  attach(position: ScrollPosition): void {
    if (this._positions.includes(position)) return;
    this._positions.push(position);
  }

  detach(position: ScrollPosition): void {
    const index = this._positions.indexOf(position);
    if (index < 0) return;
    if (this.keepScrollOffset) this.savedOffset = position.pixels;
    this._positions.splice(index, 1);
  }

  jumpTo(value: number): void {
    for (const position of [...this._positions]) {
      position.jumpTo(value);
    }
  }

  dispose(): void {
    this._positions.length = 0;
  }

  private label(): string {
    return this.debugLabel === null ? "" : `(${this.debugLabel})`;
  }
}
