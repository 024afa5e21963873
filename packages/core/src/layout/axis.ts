/**
 * packages/core/src/layout/axis.ts — Scroll axes and axis directions.
 *
 * An axis direction names both the scroll axis and the direction in which
 * the scroll offset grows: "down" and "right" grow away from the origin,
 * "up" and "left" grow away from the far edge.
 */

export type ScrollAxis = "horizontal" | "vertical";

export type AxisDirection = "up" | "down" | "left" | "right";

export type TextDirection = "ltr" | "rtl";

export function isAxisDirection(v: unknown): v is AxisDirection {
  return v === "up" || v === "down" || v === "left" || v === "right";
}

export function isScrollAxis(v: unknown): v is ScrollAxis {
  return v === "horizontal" || v === "vertical";
}

export function axisDirectionToAxis(direction: AxisDirection): ScrollAxis {
  return direction === "up" || direction === "down" ? "vertical" : "horizontal";
}

/** True for directions whose content is anchored at the trailing edge. */
export function axisDirectionIsReversed(direction: AxisDirection): boolean {
  return direction === "up" || direction === "left";
}

export function flipAxisDirection(direction: AxisDirection): AxisDirection {
  switch (direction) {
    case "up":
      return "down";
    case "down":
      return "up";
    case "left":
      return "right";
    case "right":
      return "left";
  }
}

export function textDirectionToAxisDirection(textDirection: TextDirection): AxisDirection {
  return textDirection === "rtl" ? "left" : "right";
}

/**
 * Resolve the axis direction for a scroll view.
 *
 * Vertical scrolling ignores the reading direction. Horizontal scrolling
 * follows it, so `reverse` in an rtl context scrolls towards the right.
 */
export function resolveAxisDirection(
  axis: ScrollAxis,
  reverse: boolean,
  textDirection: TextDirection,
): AxisDirection {
  if (axis === "vertical") {
    return reverse ? "up" : "down";
  }
  const direction = textDirectionToAxisDirection(textDirection);
  return reverse ? flipAxisDirection(direction) : direction;
}
