/**
 * packages/core/src/scroll/types.ts — Scroll configuration and notification types.
 */

import type { Point } from "../layout/types.js";

/**
 * The subset of scroll physics this package consumes. Simulation, overscroll
 * and fling behaviour belong to the gesture layer.
 */
export type ScrollPhysics = Readonly<{
  /** Whether showOnScreen requests may move the offset. Default true. */
  allowImplicitScrolling?: boolean;
}>;

/** When a drag gesture is considered started: at the pointer-down or after slop. */
export type DragStartBehavior = "start" | "down";

export type KeyboardDismissBehavior = "manual" | "onDrag";

export type DragUpdateDetails = Readonly<{
  /** Movement along the scroll axis since the previous update. */
  primaryDelta: number;
  globalPosition: Point;
}>;

/**
 * Emitted by descendants while the offset changes. `dragDetails` is non-null
 * only when the change came from a user drag.
 */
export type ScrollUpdateNotification = Readonly<{
  kind: "scrollUpdate";
  scrollDelta: number;
  dragDetails: DragUpdateDetails | null;
}>;
