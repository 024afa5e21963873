import { assert, describe, test } from "@scrollport/testkit";
import type { AxisDirection } from "../../layout/axis.js";
import { tightConstraints } from "../../layout/boxConstraints.js";
import type { Point, Rect } from "../../layout/types.js";
import { ScrollPosition } from "../../scroll/scrollPosition.js";
import { RenderColumnStack, RenderFixedBox, RenderPadding } from "../basicBoxes.js";
import type { PaintContext } from "../paintContext.js";
import { RenderNode } from "../renderNode.js";
import { RenderSingleChildViewport } from "../singleChildViewport.js";
import { findEnclosingViewport } from "../viewport.js";

const VIEWPORT = tightConstraints({ w: 100, h: 100 });

function verticalList(
  axisDirection: AxisDirection,
  heights: readonly number[],
  pixels = 0,
): { viewport: RenderSingleChildViewport; position: ScrollPosition; items: RenderFixedBox[] } {
  const items = heights.map((h) => new RenderFixedBox({ size: { w: 100, h } }));
  const position = new ScrollPosition({ initialPixels: pixels });
  const viewport = new RenderSingleChildViewport({
    axisDirection,
    offset: position,
    clipBehavior: "hardEdge",
    child: new RenderColumnStack({ children: items }),
  });
  viewport.layout(VIEWPORT);
  return { viewport, position, items };
}

/** 200-wide content with a 50-wide target at its right end. */
function horizontalTarget(axisDirection: AxisDirection): {
  viewport: RenderSingleChildViewport;
  target: RenderFixedBox;
} {
  const target = new RenderFixedBox({ size: { w: 50, h: 100 } });
  const viewport = new RenderSingleChildViewport({
    axisDirection,
    offset: new ScrollPosition(),
    clipBehavior: "hardEdge",
    child: new RenderPadding({ padding: { top: 0, right: 0, bottom: 0, left: 150 }, child: target }),
  });
  viewport.layout(VIEWPORT);
  return { viewport, target };
}

function item(items: readonly RenderFixedBox[], index: number): RenderFixedBox {
  const found = items[index];
  if (found === undefined) throw new Error(`no item ${String(index)}`);
  return found;
}

class BareNode extends RenderNode {
  override paint(_context: PaintContext, _offset: Point): void {}

  override get paintBounds(): Rect {
    return { x: 0, y: 0, w: 10, h: 10 };
  }
}

function captureWarnings(run: () => void): string[] {
  const warnings: string[] = [];
  const original = console.warn;
  console.warn = (msg: string) => {
    warnings.push(msg);
  };
  try {
    run();
  } finally {
    console.warn = original;
  }
  return warnings;
}

describe("getOffsetToReveal", () => {
  test("alignment 0, 1 and 0.5 in a downward viewport", () => {
    const { viewport, position, items } = verticalList("down", [120, 40, 140]);
    const target = item(items, 1);

    assert.deepEqual(viewport.getOffsetToReveal(target, 0), {
      offset: 120,
      rect: { x: 0, y: 0, w: 100, h: 40 },
    });
    assert.deepEqual(viewport.getOffsetToReveal(target, 1), {
      offset: 60,
      rect: { x: 0, y: 60, w: 100, h: 40 },
    });
    assert.deepEqual(viewport.getOffsetToReveal(target, 0.5), {
      offset: 90,
      rect: { x: 0, y: 30, w: 100, h: 40 },
    });
    assert.equal(position.pixels, 0);
  });

  test("a centred target reveals at the current offset", () => {
    const { viewport, position, items } = verticalList("down", [120, 40, 140], 90);
    const revealed = viewport.getOffsetToReveal(item(items, 1), 0.5);
    assert.equal(revealed.offset, position.pixels);
    assert.deepEqual(revealed.rect, { x: 0, y: 30, w: 100, h: 40 });
  });

  test("an explicit rect is mapped from the target's coordinates", () => {
    const { viewport, items } = verticalList("down", [120, 40, 140]);
    const revealed = viewport.getOffsetToReveal(item(items, 2), 0, { x: 0, y: 20, w: 100, h: 10 });
    assert.deepEqual(revealed, { offset: 180, rect: { x: 0, y: 0, w: 100, h: 10 } });
  });

  test("upward viewport measures from the bottom of the content", () => {
    const { viewport, items } = verticalList("up", [120, 40, 140]);
    const target = item(items, 1);
    assert.deepEqual(viewport.getOffsetToReveal(target, 0), {
      offset: 140,
      rect: { x: 0, y: 60, w: 100, h: 40 },
    });
    assert.deepEqual(viewport.getOffsetToReveal(target, 1), {
      offset: 80,
      rect: { x: 0, y: 0, w: 100, h: 40 },
    });
  });

  test("rightward viewport", () => {
    const { viewport, target } = horizontalTarget("right");
    assert.deepEqual(viewport.getOffsetToReveal(target, 0), {
      offset: 150,
      rect: { x: 0, y: 0, w: 50, h: 100 },
    });
    assert.deepEqual(viewport.getOffsetToReveal(target, 1), {
      offset: 100,
      rect: { x: 50, y: 0, w: 50, h: 100 },
    });
  });

  test("leftward viewport measures from the right end of the content", () => {
    const { viewport, target } = horizontalTarget("left");
    assert.deepEqual(viewport.getOffsetToReveal(target, 0), {
      offset: 0,
      rect: { x: 50, y: 0, w: 50, h: 100 },
    });
    assert.deepEqual(viewport.getOffsetToReveal(target, 1), {
      offset: -50,
      rect: { x: 0, y: 0, w: 50, h: 100 },
    });
  });

  test("a target that is not a box keeps the current offset and warns", () => {
    const { viewport } = verticalList("down", [300], 30);
    let revealed: ReturnType<RenderSingleChildViewport["getOffsetToReveal"]> | null = null;
    const warnings = captureWarnings(() => {
      revealed = viewport.getOffsetToReveal(new BareNode(), 0.5);
    });
    assert.deepEqual(revealed, { offset: 30, rect: { x: 0, y: 0, w: 10, h: 10 } });
    assert.deepEqual(warnings, [
      "RenderSingleChildViewport.getOffsetToReveal: BareNode is not a box; keeping the current offset",
    ]);
  });

  test("without a child the offset is kept", () => {
    const position = new ScrollPosition({ initialPixels: 12 });
    const viewport = new RenderSingleChildViewport({ offset: position, clipBehavior: "hardEdge" });
    const target = new RenderFixedBox({ size: { w: 5, h: 5 } });
    target.layout(VIEWPORT);
    const warnings = captureWarnings(() => {
      assert.deepEqual(viewport.getOffsetToReveal(target, 1), {
        offset: 12,
        rect: { x: 0, y: 0, w: 100, h: 100 },
      });
    });
    assert.deepEqual(warnings, []);
  });
});

describe("showOnScreen", () => {
  const heights = [50, 50, 50, 50, 50, 50, 50, 50];

  test("scrolls the least distance that shows the target", () => {
    const { position, items } = verticalList("down", heights);
    item(items, 4).showOnScreen();
    assert.equal(position.pixels, 150);

    item(items, 1).showOnScreen();
    assert.equal(position.pixels, 50);
  });

  test("a fully visible target does not scroll", () => {
    const { position, items } = verticalList("down", heights, 150);
    let notified = 0;
    position.subscribe(() => {
      notified++;
    });
    item(items, 3).showOnScreen();
    assert.equal(position.pixels, 150);
    assert.equal(notified, 0);
  });

  test("an explicit rect is revealed instead of the whole target", () => {
    const { position, items } = verticalList("down", heights);
    item(items, 7).showOnScreen({ rect: { x: 0, y: 0, w: 100, h: 10 } });
    assert.equal(position.pixels, 260);
  });

  test("physics can forbid implicit scrolling", () => {
    const { position, items } = verticalList("down", heights);
    position.physics = { allowImplicitScrolling: false };
    item(items, 4).showOnScreen();
    assert.equal(position.pixels, 0);
  });

  test("requests escalate through nested viewports", () => {
    const innerPosition = new ScrollPosition();
    const target = new RenderFixedBox({ size: { w: 50, h: 40 } });
    const inner = new RenderSingleChildViewport({
      axisDirection: "right",
      offset: innerPosition,
      clipBehavior: "hardEdge",
      child: new RenderPadding({ padding: { top: 0, right: 0, bottom: 0, left: 150 }, child: target }),
    });
    const outerPosition = new ScrollPosition();
    const outer = new RenderSingleChildViewport({
      offset: outerPosition,
      clipBehavior: "hardEdge",
      child: new RenderColumnStack({
        children: [new RenderFixedBox({ size: { w: 100, h: 150 } }), inner],
      }),
    });
    outer.layout(VIEWPORT);
    assert.deepEqual(inner.size, { w: 100, h: 40 });
    assert.equal(findEnclosingViewport(target), inner);
    assert.equal(findEnclosingViewport(inner), outer);

    target.showOnScreen();
    assert.equal(innerPosition.pixels, 100);
    assert.equal(outerPosition.pixels, 90);
  });
});
