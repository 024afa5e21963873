import { assert, describe, test } from "@scrollport/testkit";
import { UiError } from "../../errors.js";
import { tightConstraints } from "../../layout/boxConstraints.js";
import { RenderColumnStack, RenderFixedBox, RenderPadding } from "../basicBoxes.js";
import { RecordingCanvas } from "../canvas.js";
import { type PipelineTrace, RenderPipeline } from "../pipeline.js";

function column(): { root: RenderColumnStack; a: RenderFixedBox; b: RenderFixedBox } {
  const a = new RenderFixedBox({ size: { w: 10, h: 5 }, label: "a", style: { fill: "red" } });
  const b = new RenderFixedBox({ size: { w: 10, h: 5 }, label: "b" });
  return { root: new RenderColumnStack({ children: [a, b] }), a, b };
}

describe("RenderPipeline", () => {
  test("drawFrame lays out, paints and collects semantics", () => {
    const pipeline = new RenderPipeline(tightConstraints({ w: 10, h: 10 }));
    const { root, a, b } = column();
    pipeline.setRoot(root);
    const canvas = new RecordingCanvas();

    const frame = pipeline.drawFrame(canvas);
    assert.deepEqual(root.size, { w: 10, h: 10 });
    assert.deepEqual(canvas.ops, [
      { kind: "fillRect", x: 0, y: 0, w: 10, h: 5, style: { fill: "red" } },
      { kind: "drawText", x: 0, y: 0, text: "a" },
      { kind: "fillRect", x: 0, y: 5, w: 10, h: 5 },
      { kind: "drawText", x: 0, y: 5, text: "b" },
    ]);
    assert.equal(frame.layer?.children.length, 0);
    assert.deepEqual(
      frame.semantics.map((entry) => [entry.label, entry.rect, entry.hidden]),
      [
        ["a", { x: 0, y: 0, w: 10, h: 5 }, false],
        ["b", { x: 0, y: 5, w: 10, h: 5 }, false],
      ],
    );
    assert.equal(frame.semantics[0]?.node, a);
    assert.equal(frame.semantics[1]?.node, b);
    assert.equal(pipeline.needsLayout, false);
    assert.equal(pipeline.needsPaint, false);
    assert.equal(pipeline.needsSemantics, false);
  });

  test("a second frame without changes does not relayout", () => {
    const pipeline = new RenderPipeline(tightConstraints({ w: 10, h: 10 }));
    const { root, b } = column();
    pipeline.setRoot(root);
    pipeline.drawFrame(new RecordingCanvas());
    assert.equal(pipeline.flushLayout(), false);

    b.preferredSize = { w: 10, h: 2 };
    assert.equal(pipeline.needsLayout, true);
    assert.equal(pipeline.flushLayout(), true);
    assert.equal(root.debugLayoutCount, 2);
    assert.equal(pipeline.layoutPasses, 2);
  });

  test("trace listeners see every pass until they unsubscribe", () => {
    const pipeline = new RenderPipeline(tightConstraints({ w: 10, h: 10 }));
    const { root } = column();
    const traces: PipelineTrace[] = [];
    const off = pipeline.onTrace((trace) => traces.push(trace));
    pipeline.setRoot(root);
    pipeline.drawFrame(new RecordingCanvas());
    off();
    pipeline.drawFrame(new RecordingCanvas());

    assert.deepEqual(
      traces.map((t) => [t.kind, t.pass]),
      [
        ["layout", 1],
        ["paint", 1],
        ["semantics", 1],
      ],
    );
  });

  test("painting with layout pending is an error", () => {
    const pipeline = new RenderPipeline();
    pipeline.setRoot(column().root);
    assert.throws(
      () => pipeline.flushPaint(new RecordingCanvas()),
      (err: unknown) => err instanceof UiError && err.code === "UI_INVALID_STATE",
    );
  });

  test("a node with a parent cannot become the root", () => {
    const pipeline = new RenderPipeline();
    const child = new RenderFixedBox({ size: { w: 1, h: 1 } });
    new RenderPadding({ padding: { top: 0, right: 0, bottom: 0, left: 0 }, child });
    assert.throws(() => pipeline.setRoot(child), UiError);
  });

  test("setRoot(null) detaches the previous root", () => {
    const pipeline = new RenderPipeline();
    const { root, a } = column();
    pipeline.setRoot(root);
    assert.equal(a.attached, true);
    pipeline.setRoot(null);
    assert.equal(root.attached, false);
    assert.equal(a.attached, false);
  });

  test("hit testing from the root", () => {
    const pipeline = new RenderPipeline(tightConstraints({ w: 10, h: 10 }));
    const { root, b } = column();
    pipeline.setRoot(root);
    pipeline.flushLayout();
    const result = pipeline.hitTest({ x: 2, y: 7 });
    assert.deepEqual(result.targets, [b, root]);
    assert.deepEqual(result.path[0]?.localPosition, { x: 2, y: 2 });
  });
});
