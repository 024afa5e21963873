/**
 * packages/core/src/config.ts — Defaults shared by the widget and render layers.
 */

import type { ScrollAxis } from "./layout/axis.js";
import type { ClipBehavior } from "./render/layers.js";
import type { DragStartBehavior, KeyboardDismissBehavior } from "./scroll/types.js";

export const DEFAULT_SCROLL_DIRECTION: ScrollAxis = "vertical";
export const DEFAULT_CLIP_BEHAVIOR: ClipBehavior = "hardEdge";
export const DEFAULT_DRAG_START_BEHAVIOR: DragStartBehavior = "start";
export const DEFAULT_KEYBOARD_DISMISS_BEHAVIOR: KeyboardDismissBehavior = "manual";

/** Axes along which a scroll view without an explicit controller adopts the primary one. */
export const DEFAULT_PRIMARY_AXES: readonly ScrollAxis[] = Object.freeze(["vertical"]);

/** Implicit scrolling (showOnScreen) is on unless the physics turn it off. */
export const DEFAULT_ALLOW_IMPLICIT_SCROLLING = true;

export function isDevMode(): boolean {
  return (process.env["NODE_ENV"] ?? "development") !== "production";
}
