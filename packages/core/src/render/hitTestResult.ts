/**
 * packages/core/src/render/hitTestResult.ts — Hit test path accumulation.
 *
 * Entries are recorded deepest first. Each entry carries the transform from
 * the hit test's root coordinates into the target's local coordinates.
 */

import {
  IDENTITY_TRANSFORM,
  multiplyTransforms,
  translationTransform,
} from "../layout/transform.js";
import type { Point, Transform2D } from "../layout/types.js";
import type { RenderNode } from "./renderNode.js";

export type HitTestEntry = Readonly<{
  target: RenderNode;
  localPosition: Point;
  transform: Transform2D;
}>;

export type HitTestFn = (result: HitTestResult, position: Point) => boolean;

export class HitTestResult {
  private readonly _path: HitTestEntry[] = [];
  private readonly transforms: Transform2D[] = [IDENTITY_TRANSFORM];

  get path(): readonly HitTestEntry[] {
    return this._path;
  }

  get targets(): readonly RenderNode[] {
    return this._path.map((entry) => entry.target);
  }

  add(target: RenderNode, localPosition: Point): void {
    this._path.push({ target, localPosition, transform: this.currentTransform() });
  }

  /**
   * Hit test a child painted at `paintOffset` relative to the caller. The
   * child sees `position - paintOffset`.
   */
  addWithPaintOffset(paintOffset: Point | null, position: Point, hitTest: HitTestFn): boolean {
    if (paintOffset === null) return hitTest(this, position);
    const transformed = { x: position.x - paintOffset.x, y: position.y - paintOffset.y };
    this.pushOffset(paintOffset);
    try {
      return hitTest(this, transformed);
    } finally {
      this.popTransform();
    }
  }

  private pushOffset(paintOffset: Point): void {
    const inverse = translationTransform(-paintOffset.x, -paintOffset.y);
    this.transforms.push(multiplyTransforms(inverse, this.currentTransform()));
  }

  private popTransform(): void {
    if (this.transforms.length > 1) this.transforms.pop();
  }

  private currentTransform(): Transform2D {
    return this.transforms[this.transforms.length - 1] ?? IDENTITY_TRANSFORM;
  }
}

