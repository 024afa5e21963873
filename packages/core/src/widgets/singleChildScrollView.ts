/**
 * packages/core/src/widgets/singleChildScrollView.ts — Scroll view over one box child.
 *
 * The config is a frozen description; ScrollViewBinding turns it into a
 * RenderSingleChildViewport (optionally wrapping the child in a
 * RenderPadding) and keeps that node across updates, pushing changed
 * properties into it instead of rebuilding.
 */

import {
  DEFAULT_CLIP_BEHAVIOR,
  DEFAULT_DRAG_START_BEHAVIOR,
  DEFAULT_KEYBOARD_DISMISS_BEHAVIOR,
  DEFAULT_SCROLL_DIRECTION,
} from "../config.js";
import { type LayoutResult, fail, ok, unwrapResult } from "../errors.js";
import {
  type AxisDirection,
  type ScrollAxis,
  isScrollAxis,
  resolveAxisDirection,
} from "../layout/axis.js";
import {
  type EdgeInsets,
  type EdgeInsetsGeometry,
  isValidInsets,
  resolveEdgeInsets,
} from "../layout/edgeInsets.js";
import { RenderPadding } from "../render/basicBoxes.js";
import { type ClipBehavior, isClipBehavior } from "../render/layers.js";
import type { RenderBox } from "../render/renderBox.js";
import { RenderSingleChildViewport } from "../render/singleChildViewport.js";
import type { ScrollController } from "../scroll/scrollController.js";
import {
  type ScrollEnvironment,
  primaryControllerOf,
  shouldInheritPrimary,
  withoutPrimary,
} from "../scroll/scrollEnvironment.js";
import { ScrollPosition } from "../scroll/scrollPosition.js";
import type {
  DragStartBehavior,
  KeyboardDismissBehavior,
  ScrollPhysics,
  ScrollUpdateNotification,
} from "../scroll/types.js";

export type SingleChildScrollViewProps = Readonly<{
  scrollDirection?: ScrollAxis;
  reverse?: boolean;
  padding?: EdgeInsetsGeometry | null;
  /**
   * Use the environment's primary controller. Left undefined, a view
   * without a controller inherits it when the primary context accepts the
   * scroll axis.
   */
  primary?: boolean | undefined;
  physics?: ScrollPhysics | null;
  controller?: ScrollController | null;
  child?: RenderBox | null;
  dragStartBehavior?: DragStartBehavior;
  clipBehavior?: ClipBehavior;
  restorationId?: string | null;
  keyboardDismissBehavior?: KeyboardDismissBehavior;
}>;

export type SingleChildScrollViewConfig = Readonly<{
  kind: "singleChildScrollView";
  scrollDirection: ScrollAxis;
  reverse: boolean;
  padding: EdgeInsetsGeometry | null;
  primary: boolean | undefined;
  physics: ScrollPhysics | null;
  controller: ScrollController | null;
  child: RenderBox | null;
  dragStartBehavior: DragStartBehavior;
  clipBehavior: ClipBehavior;
  restorationId: string | null;
  keyboardDismissBehavior: KeyboardDismissBehavior;
}>;

export type ResolvedScrollView = Readonly<{
  axis: ScrollAxis;
  axisDirection: AxisDirection;
  /** Explicit controller, the inherited primary one, or null. */
  controller: ScrollController | null;
  effectivePrimary: boolean;
  padding: EdgeInsets | null;
  physics: ScrollPhysics | null;
  clipBehavior: ClipBehavior;
  dragStartBehavior: DragStartBehavior;
  dismissKeyboardOnDrag: boolean;
  restorationId: string | null;
  /** Environment handed to the child subtree. */
  childEnv: ScrollEnvironment;
}>;

const KIND = "singleChildScrollView" as const;

export function validateSingleChildScrollViewProps(
  props: SingleChildScrollViewProps,
): LayoutResult<SingleChildScrollViewConfig> {
  const scrollDirection = props.scrollDirection ?? DEFAULT_SCROLL_DIRECTION;
  if (!isScrollAxis(scrollDirection)) {
    return fail("UI_INVALID_PROPS", `${KIND}.scrollDirection must be "vertical" | "horizontal"`);
  }

  const reverse = props.reverse ?? false;
  if (typeof reverse !== "boolean") {
    return fail("UI_INVALID_PROPS", `${KIND}.reverse must be a boolean`);
  }

  const padding = props.padding ?? null;
  if (padding !== null && !isValidInsets(padding)) {
    return fail("UI_INVALID_PROPS", `${KIND}.padding must be finite and >= 0 on every side`);
  }

  const primary = props.primary;
  if (primary !== undefined && typeof primary !== "boolean") {
    return fail("UI_INVALID_PROPS", `${KIND}.primary must be a boolean`);
  }

  const controller = props.controller ?? null;
  if (controller !== null && primary === true) {
    return fail(
      "UI_INVALID_PROPS",
      `${KIND}: primary cannot be true when a controller is given (primary means the environment's controller is used)`,
    );
  }

  const dragStartBehavior = props.dragStartBehavior ?? DEFAULT_DRAG_START_BEHAVIOR;
  if (dragStartBehavior !== "start" && dragStartBehavior !== "down") {
    return fail("UI_INVALID_PROPS", `${KIND}.dragStartBehavior must be one of "start" | "down"`);
  }

  const clipBehavior = props.clipBehavior ?? DEFAULT_CLIP_BEHAVIOR;
  if (!isClipBehavior(clipBehavior)) {
    return fail(
      "UI_INVALID_PROPS",
      `${KIND}.clipBehavior must be one of "none" | "hardEdge" | "antiAlias" | "antiAliasWithSaveLayer"`,
    );
  }

  const keyboardDismissBehavior =
    props.keyboardDismissBehavior ?? DEFAULT_KEYBOARD_DISMISS_BEHAVIOR;
  if (keyboardDismissBehavior !== "manual" && keyboardDismissBehavior !== "onDrag") {
    return fail(
      "UI_INVALID_PROPS",
      `${KIND}.keyboardDismissBehavior must be one of "manual" | "onDrag"`,
    );
  }

  const restorationId = props.restorationId ?? null;
  if (restorationId !== null && (typeof restorationId !== "string" || restorationId.length === 0)) {
    return fail("UI_INVALID_PROPS", `${KIND}.restorationId must be a non-empty string`);
  }

  return ok({
    kind: KIND,
    scrollDirection,
    reverse,
    padding,
    primary,
    physics: props.physics ?? null,
    controller,
    child: props.child ?? null,
    dragStartBehavior,
    clipBehavior,
    restorationId,
    keyboardDismissBehavior,
  });
}

/** Build a scroll view config; throws UiError("UI_INVALID_PROPS") on bad props. */
export function singleChildScrollView(
  props: SingleChildScrollViewProps = {},
): SingleChildScrollViewConfig {
  return Object.freeze(unwrapResult(validateSingleChildScrollViewProps(props)));
}

export function resolveScrollView(
  config: SingleChildScrollViewConfig,
  env: ScrollEnvironment,
): ResolvedScrollView {
  const axis = config.scrollDirection;
  const effectivePrimary =
    config.primary ?? (config.controller === null && shouldInheritPrimary(env, axis));
  const controller = effectivePrimary ? primaryControllerOf(env) : config.controller;

  return {
    axis,
    axisDirection: resolveAxisDirection(axis, config.reverse, env.textDirection),
    controller,
    effectivePrimary,
    padding: config.padding === null ? null : resolveEdgeInsets(config.padding, env.textDirection),
    physics: config.physics,
    clipBehavior: config.clipBehavior,
    dragStartBehavior: config.dragStartBehavior,
    dismissKeyboardOnDrag: config.keyboardDismissBehavior === "onDrag",
    restorationId: config.restorationId,
    childEnv: effectivePrimary && controller !== null ? withoutPrimary(env) : env,
  };
}

/**
 * Keeps one scroll view's render nodes and scroll position alive across
 * config updates.
 */
export class ScrollViewBinding {
  private viewport: RenderSingleChildViewport | null = null;
  private paddingNode: RenderPadding | null = null;
  private position: ScrollPosition | null = null;
  private controller: ScrollController | null = null;
  private env: ScrollEnvironment | null = null;
  private resolved: ResolvedScrollView | null = null;

  get mounted(): boolean {
    return this.viewport !== null;
  }

  /** Viewport created by `mount`, or null before mounting / after dispose. */
  get renderObject(): RenderSingleChildViewport | null {
    return this.viewport;
  }

  get scrollPosition(): ScrollPosition | null {
    return this.position;
  }

  get resolution(): ResolvedScrollView | null {
    return this.resolved;
  }

  mount(config: SingleChildScrollViewConfig, env: ScrollEnvironment): RenderSingleChildViewport {
    if (this.viewport !== null) return this.viewport;
    const resolved = resolveScrollView(config, env);
    const position = this.createPosition(resolved, env);

    const viewport = new RenderSingleChildViewport({
      axisDirection: resolved.axisDirection,
      offset: position,
      clipBehavior: resolved.clipBehavior,
    });
    this.viewport = viewport;
    this.env = env;
    this.resolved = resolved;
    this.syncContents(viewport, resolved.padding, config.child);
    return viewport;
  }

  update(config: SingleChildScrollViewConfig, env: ScrollEnvironment): RenderSingleChildViewport {
    const viewport = this.viewport;
    if (viewport === null) return this.mount(config, env);
    const resolved = resolveScrollView(config, env);

    viewport.axisDirection = resolved.axisDirection;

    const previous = this.position;
    let position = previous;
    if (position === null || resolved.controller !== this.controller) {
      if (previous !== null) this.saveRestoration(previous);
      position = this.createPosition(resolved, env);
    } else {
      if (resolved.restorationId !== (this.resolved?.restorationId ?? null)) {
        this.saveRestoration(position);
      }
      position.physics = resolved.physics;
      position.axisDirection = resolved.axisDirection;
    }
    viewport.offset = position;
    if (previous !== null && previous !== position) this.releasePosition(previous);

    viewport.clipBehavior = resolved.clipBehavior;
    this.syncContents(viewport, resolved.padding, config.child);

    this.env = env;
    this.resolved = resolved;
    return viewport;
  }

  /**
   * Scroll-update notifications bubbling up from the viewport. Drags
   * release keyboard focus under `keyboardDismissBehavior: "onDrag"`.
   * Always returns false so the notification keeps bubbling.
   */
  handleScrollUpdate(notification: ScrollUpdateNotification): boolean {
    const resolved = this.resolved;
    const focusScope = this.env?.focusScope;
    if (
      resolved !== null &&
      resolved.dismissKeyboardOnDrag &&
      notification.dragDetails !== null &&
      focusScope !== undefined &&
      focusScope.hasFocus
    ) {
      focusScope.unfocus();
    }
    return false;
  }

  dispose(): void {
    const position = this.position;
    if (position !== null) {
      this.saveRestoration(position);
      this.releasePosition(position);
    }
    this.position = null;
    this.controller = null;
    this.paddingNode?.dispose();
    this.paddingNode = null;
    this.viewport?.dispose();
    this.viewport = null;
    this.env = null;
    this.resolved = null;
  }

  private createPosition(resolved: ResolvedScrollView, env: ScrollEnvironment): ScrollPosition {
    const controller = resolved.controller;
    const position =
      controller === null
        ? new ScrollPosition({ physics: resolved.physics, axisDirection: resolved.axisDirection })
        : controller.createScrollPosition(resolved.physics, resolved.axisDirection);
    const id = resolved.restorationId;
    if (id !== null && env.restoration !== undefined) {
      const restored = env.restoration.read(id);
      if (restored !== undefined) position.jumpTo(restored);
    }
    controller?.attach(position);
    this.position = position;
    this.controller = controller;
    return position;
  }

  private saveRestoration(position: ScrollPosition): void {
    const id = this.resolved?.restorationId ?? null;
    const store = this.env?.restoration;
    if (id !== null && store !== undefined) store.write(id, position.pixels);
  }

  /** Detach `position` from the controller that created it, then dispose it. */
  private releasePosition(position: ScrollPosition): void {
    const owner = position === this.position ? this.controller : this.findOwner(position);
    owner?.detach(position);
    position.dispose();
  }

  private findOwner(position: ScrollPosition): ScrollController | null {
    const previous = this.resolved?.controller ?? null;
    return previous !== null && previous.positions.includes(position) ? previous : null;
  }

  private syncContents(
    viewport: RenderSingleChildViewport,
    padding: EdgeInsets | null,
    child: RenderBox | null,
  ): void {
    if (padding === null) {
      const wrapper = this.paddingNode;
      if (wrapper !== null) {
        wrapper.child = null;
        viewport.child = child;
        wrapper.dispose();
        this.paddingNode = null;
      } else {
        viewport.child = child;
      }
      return;
    }

    let wrapper = this.paddingNode;
    if (wrapper === null) {
      wrapper = new RenderPadding({ padding });
      this.paddingNode = wrapper;
      viewport.child = wrapper;
    } else {
      wrapper.padding = padding;
    }
    wrapper.child = child;
  }
}
