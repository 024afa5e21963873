import { assert, describe, test } from "@scrollport/testkit";
import type { AxisDirection } from "../../layout/axis.js";
import { tightConstraints } from "../../layout/boxConstraints.js";
import type { Rect } from "../../layout/types.js";
import { ScrollPosition } from "../../scroll/scrollPosition.js";
import { RenderColumnStack, RenderFixedBox } from "../basicBoxes.js";
import { RecordingCanvas } from "../canvas.js";
import type { ClipBehavior } from "../layers.js";
import { RenderPipeline } from "../pipeline.js";
import { collectSemantics } from "../semantics.js";
import { RenderSingleChildViewport } from "../singleChildViewport.js";

function labelledColumn(
  axisDirection: AxisDirection,
  pixels: number,
  clipBehavior: ClipBehavior = "hardEdge",
): { pipeline: RenderPipeline; viewport: RenderSingleChildViewport; position: ScrollPosition } {
  const position = new ScrollPosition({ initialPixels: pixels });
  const viewport = new RenderSingleChildViewport({
    axisDirection,
    offset: position,
    clipBehavior,
    child: new RenderColumnStack({
      children: ["a", "b", "c", "d"].map(
        (label) => new RenderFixedBox({ size: { w: 100, h: 100 }, label }),
      ),
    }),
  });
  const pipeline = new RenderPipeline(tightConstraints({ w: 100, h: 100 }));
  pipeline.setRoot(viewport);
  return { pipeline, viewport, position };
}

function summary(viewport: RenderSingleChildViewport): Array<[string, number, boolean]> {
  return collectSemantics(viewport).map((entry): [string, number, boolean] => [
    entry.label,
    entry.rect.y,
    entry.hidden,
  ]);
}

describe("RenderSingleChildViewport - semantics", () => {
  test("content scrolled out of view stays reachable but hidden", () => {
    const { pipeline, viewport } = labelledColumn("down", 50);
    pipeline.flushLayout();
    assert.deepEqual(summary(viewport), [
      ["a", -50, false],
      ["b", 50, false],
      ["c", 150, true],
      ["d", 250, true],
    ]);
  });

  test("reversed viewport hides the leading children", () => {
    const { pipeline, viewport } = labelledColumn("up", 50);
    pipeline.flushLayout();
    assert.deepEqual(summary(viewport), [
      ["a", -250, true],
      ["b", -150, true],
      ["c", -50, false],
      ["d", 50, false],
    ]);
  });

  test("without a paint clip nothing is hidden", () => {
    const { pipeline, viewport } = labelledColumn("down", 50, "none");
    pipeline.flushLayout();
    assert.deepEqual(
      summary(viewport).map(([, , hidden]) => hidden),
      [false, false, false, false],
    );
  });

  test("semantics clip covers the scrollable range in each direction", () => {
    const cases: ReadonlyArray<readonly [AxisDirection, Rect]> = [
      ["down", { x: 0, y: -50, w: 100, h: 400 }],
      ["up", { x: 0, y: -250, w: 100, h: 400 }],
      ["right", { x: -50, y: 0, w: 400, h: 100 }],
      ["left", { x: -250, y: 0, w: 400, h: 100 }],
    ];
    for (const [direction, expected] of cases) {
      const position = new ScrollPosition({ initialPixels: 50 });
      const child = new RenderFixedBox({
        size: direction === "up" || direction === "down" ? { w: 100, h: 400 } : { w: 400, h: 100 },
      });
      const viewport = new RenderSingleChildViewport({
        axisDirection: direction,
        offset: position,
        clipBehavior: "hardEdge",
        child,
      });
      viewport.layout(tightConstraints({ w: 100, h: 100 }));
      assert.deepEqual(viewport.describeSemanticsClip(child), expected, direction);
    }
  });

  test("scrolling schedules a semantics update", () => {
    const { pipeline, viewport, position } = labelledColumn("down", 0);
    const frame = pipeline.drawFrame(new RecordingCanvas());
    assert.equal(frame.semantics.length, 4);
    assert.equal(pipeline.needsSemantics, false);

    position.jumpTo(250);
    assert.equal(pipeline.needsSemantics, true);
    assert.deepEqual(summary(viewport), [
      ["a", -250, true],
      ["b", -150, true],
      ["c", -50, false],
      ["d", 50, false],
    ]);
  });
});
