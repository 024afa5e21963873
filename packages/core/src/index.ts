/**
 * @scrollport/core
 *
 * Retained render tree with a single-child scroll viewport: box layout,
 * layered painting, hit-testing, reveal requests and semantics, plus the
 * SingleChildScrollView config and binding that drive it.
 */

// =============================================================================
// Errors, configuration and diagnostics
// =============================================================================

export {
  UiError,
  fail,
  ok,
  unwrapResult,
  type LayoutResult,
  type UiErrorCode,
  type UiFatal,
} from "./errors.js";
export {
  DEFAULT_ALLOW_IMPLICIT_SCROLLING,
  DEFAULT_CLIP_BEHAVIOR,
  DEFAULT_DRAG_START_BEHAVIOR,
  DEFAULT_KEYBOARD_DISMISS_BEHAVIOR,
  DEFAULT_PRIMARY_AXES,
  DEFAULT_SCROLL_DIRECTION,
  isDevMode,
} from "./config.js";
export { warnDev } from "./debug/log.js";

// =============================================================================
// Geometry and constraints
// =============================================================================

export {
  ZERO_POINT,
  type Point,
  type Rect,
  type Size,
  type Transform2D,
} from "./layout/types.js";
export {
  addPoints,
  formatPoint,
  intersectRect,
  rectBottom,
  rectContains,
  rectFromLTRB,
  rectRight,
  shiftRect,
  sizeToRect,
} from "./layout/rect.js";
export {
  IDENTITY_TRANSFORM,
  invertTransform,
  multiplyTransforms,
  scaleTransform,
  transformPoint,
  transformRect,
  translateTransform,
  translationTransform,
} from "./layout/transform.js";
export {
  EDGE_INSETS_ZERO,
  edgeInsetsAll,
  horizontalInsets,
  isDirectionalInsets,
  isValidInsets,
  resolveEdgeInsets,
  verticalInsets,
  type EdgeInsets,
  type EdgeInsetsDirectional,
  type EdgeInsetsGeometry,
} from "./layout/edgeInsets.js";
export {
  axisDirectionIsReversed,
  axisDirectionToAxis,
  flipAxisDirection,
  isAxisDirection,
  isScrollAxis,
  resolveAxisDirection,
  textDirectionToAxisDirection,
  type AxisDirection,
  type ScrollAxis,
  type TextDirection,
} from "./layout/axis.js";
export {
  boxConstraints,
  constrainSize,
  constraintsEqual,
  constraintsKey,
  deflateConstraints,
  heightConstraints,
  isTight,
  normalizeBoxConstraints,
  smallestSize,
  tightConstraints,
  widthConstraints,
  type BoxConstraints,
} from "./layout/boxConstraints.js";

// =============================================================================
// Scroll offsets and controllers
// =============================================================================

export {
  ScrollListenerRegistry,
  fixedViewportOffset,
  type ScrollListener,
  type SubscriptionToken,
  type ViewportOffset,
} from "./scroll/viewportOffset.js";
export { ScrollPosition, type ScrollPositionOptions } from "./scroll/scrollPosition.js";
export { ScrollController, type ScrollControllerOptions } from "./scroll/scrollController.js";
export {
  createScrollEnvironment,
  createScrollRestorationStore,
  primaryControllerOf,
  primaryScrollContext,
  shouldInheritPrimary,
  withoutPrimary,
  type FocusScope,
  type PrimaryScrollContext,
  type ScrollEnvironment,
  type ScrollRestorationStore,
} from "./scroll/scrollEnvironment.js";
export type {
  DragStartBehavior,
  DragUpdateDetails,
  KeyboardDismissBehavior,
  ScrollPhysics,
  ScrollUpdateNotification,
} from "./scroll/types.js";

// =============================================================================
// Render tree
// =============================================================================

export {
  RenderNode,
  type DiagnosticProperties,
  type DiagnosticValue,
  type RenderOwner,
  type ShowOnScreenOptions,
} from "./render/renderNode.js";
export { RenderBox, RenderBoxWithChild, isRenderBox } from "./render/renderBox.js";
export {
  RenderColumnStack,
  RenderFixedBox,
  RenderPadding,
  type RenderColumnStackOptions,
  type RenderFixedBoxOptions,
  type RenderPaddingOptions,
} from "./render/basicBoxes.js";
export {
  ClipRectLayer,
  ContainerLayer,
  Layer,
  LayerHandle,
  OffsetLayer,
  isClipBehavior,
  type ClipBehavior,
} from "./render/layers.js";
export {
  RecordingCanvas,
  type PaintCanvas,
  type PaintOp,
  type PaintStyle,
} from "./render/canvas.js";
export { PaintContext, type PaintingFn, type PushClipRectOptions } from "./render/paintContext.js";
export { HitTestResult, type HitTestEntry, type HitTestFn } from "./render/hitTestResult.js";
export { collectSemantics, type SemanticsEntry } from "./render/semantics.js";
export {
  RenderPipeline,
  type FrameResult,
  type PipelineTrace,
  type PipelineTraceKind,
  type PipelineTraceListener,
} from "./render/pipeline.js";
export {
  clampRevealedOffset,
  findEnclosingViewport,
  isViewport,
  showInViewport,
  type RevealedOffset,
  type ShowInViewportOptions,
  type Viewport,
  type ViewportNode,
} from "./render/viewport.js";
export {
  RenderSingleChildViewport,
  type RenderSingleChildViewportOptions,
} from "./render/singleChildViewport.js";

// =============================================================================
// Widgets
// =============================================================================

export {
  ScrollViewBinding,
  resolveScrollView,
  singleChildScrollView,
  validateSingleChildScrollViewProps,
  type ResolvedScrollView,
  type SingleChildScrollViewConfig,
  type SingleChildScrollViewProps,
} from "./widgets/singleChildScrollView.js";
