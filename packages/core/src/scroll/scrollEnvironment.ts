/**
 * packages/core/src/scroll/scrollEnvironment.ts — Ambient inputs of a scroll view.
 *
 * What a widget tree would normally look up from its ancestors (reading
 * direction, the primary scroll controller, keyboard focus, saved scroll
 * offsets) is passed explicitly as a ScrollEnvironment.
 */

import { DEFAULT_PRIMARY_AXES } from "../config.js";
import type { ScrollAxis, TextDirection } from "../layout/axis.js";
import type { ScrollController } from "./scrollController.js";

export type PrimaryScrollContext = Readonly<{
  controller: ScrollController;
  /** Axes on which scroll views without a controller inherit this one. */
  automaticallyInheritForAxes: readonly ScrollAxis[];
}>;

/** Keyboard focus holder that a scroll view may release on drag. */
export interface FocusScope {
  readonly hasFocus: boolean;
  unfocus(): void;
}

/** Saved scroll offsets keyed by restoration id. */
export interface ScrollRestorationStore {
  read(restorationId: string): number | undefined;
  write(restorationId: string, pixels: number): void;
}

export type ScrollEnvironment = Readonly<{
  textDirection: TextDirection;
  primary: PrimaryScrollContext | null;
  focusScope?: FocusScope | undefined;
  restoration?: ScrollRestorationStore | undefined;
}>;

export function createScrollEnvironment(
  overrides: Partial<ScrollEnvironment> = {},
): ScrollEnvironment {
  return {
    textDirection: overrides.textDirection ?? "ltr",
    primary: overrides.primary ?? null,
    focusScope: overrides.focusScope,
    restoration: overrides.restoration,
  };
}

export function primaryScrollContext(
  controller: ScrollController,
  automaticallyInheritForAxes: readonly ScrollAxis[] = DEFAULT_PRIMARY_AXES,
): PrimaryScrollContext {
  return { controller, automaticallyInheritForAxes };
}

export function primaryControllerOf(env: ScrollEnvironment): ScrollController | null {
  return env.primary?.controller ?? null;
}

/** Whether a scroll view on `axis` without its own controller adopts the primary one. */
export function shouldInheritPrimary(env: ScrollEnvironment, axis: ScrollAxis): boolean {
  const primary = env.primary;
  if (primary === null) return false;
  return primary.automaticallyInheritForAxes.includes(axis);
}

/** Copy of `env` that publishes no primary controller to descendants. */
export function withoutPrimary(env: ScrollEnvironment): ScrollEnvironment {
  return { ...env, primary: null };
}

export function createScrollRestorationStore(): ScrollRestorationStore {
  const saved = new Map<string, number>();
  return {
    read: (restorationId) => saved.get(restorationId),
    write: (restorationId, pixels) => {
      saved.set(restorationId, pixels);
    },
  };
}
