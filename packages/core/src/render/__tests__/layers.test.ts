import { assert, describe, test } from "@scrollport/testkit";
import { UiError } from "../../errors.js";
import { RecordingCanvas } from "../canvas.js";
import { ClipRectLayer, ContainerLayer, LayerHandle, OffsetLayer } from "../layers.js";
import { PaintContext } from "../paintContext.js";

const RECT = { x: 0, y: 0, w: 20, h: 10 };

describe("LayerHandle", () => {
  test("holding a layer retains it; replacing releases the old one", () => {
    const handle = new LayerHandle<ClipRectLayer>();
    const first = new ClipRectLayer(RECT, "hardEdge");
    const second = new ClipRectLayer(RECT, "hardEdge");

    handle.layer = first;
    assert.equal(first.refCount, 1);
    handle.layer = first;
    assert.equal(first.refCount, 1);

    handle.layer = second;
    assert.equal(first.disposed, true);
    assert.equal(second.refCount, 1);

    handle.layer = null;
    assert.equal(second.disposed, true);
    assert.equal(handle.layer, null);
  });

  test("a layer held twice survives one release", () => {
    const a = new LayerHandle<OffsetLayer>();
    const b = new LayerHandle<OffsetLayer>();
    const layer = new OffsetLayer({ x: 0, y: 0 });
    a.layer = layer;
    b.layer = layer;
    a.layer = null;
    assert.equal(layer.disposed, false);
    b.layer = null;
    assert.equal(layer.disposed, true);
  });

  test("a disposed layer cannot be retained or appended", () => {
    const handle = new LayerHandle<ClipRectLayer>();
    const layer = new ClipRectLayer(RECT, "hardEdge");
    handle.layer = layer;
    handle.layer = null;
    assert.throws(() => layer.retain(), UiError);
    assert.throws(() => new ContainerLayer().append(layer), UiError);
  });
});

describe("ContainerLayer", () => {
  test("appending moves a layer out of its previous parent", () => {
    const a = new ContainerLayer();
    const b = new ContainerLayer();
    const child = new OffsetLayer({ x: 1, y: 1 });
    a.append(child);
    b.append(child);
    assert.equal(a.children.length, 0);
    assert.deepEqual(b.children, [child]);
    assert.equal(child.parent, b);
  });

  test("disposing a held layer detaches it from its parent", () => {
    const root = new ContainerLayer();
    const handle = new LayerHandle<ClipRectLayer>();
    const clip = new ClipRectLayer(RECT, "antiAlias");
    handle.layer = clip;
    root.append(clip);
    handle.layer = null;
    assert.equal(root.children.length, 0);
    assert.equal(clip.parent, null);
  });
});

describe("PaintContext.pushClipRect", () => {
  test("clipBehavior none paints unclipped and records no layer", () => {
    const canvas = new RecordingCanvas();
    const context = new PaintContext(canvas, new ContainerLayer());
    const layer = context.pushClipRect(
      true,
      { x: 5, y: 5 },
      RECT,
      (ctx, offset) => ctx.canvas.fillRect(offset.x, offset.y, 1, 1),
      { clipBehavior: "none" },
    );
    assert.equal(layer, null);
    assert.deepEqual(canvas.ops, [{ kind: "fillRect", x: 5, y: 5, w: 1, h: 1 }]);
  });

  test("without compositing only the canvas is clipped", () => {
    const canvas = new RecordingCanvas();
    const root = new ContainerLayer();
    const layer = new PaintContext(canvas, root).pushClipRect(false, { x: 5, y: 6 }, RECT, () => {});
    assert.equal(layer, null);
    assert.equal(root.children.length, 0);
    assert.deepEqual(canvas.ops, [
      { kind: "pushClip", x: 5, y: 6, w: 20, h: 10 },
      { kind: "popClip" },
    ]);
    assert.equal(canvas.depth, 0);
  });

  test("with compositing the old layer is reused while it is alive", () => {
    const canvas = new RecordingCanvas();
    const root = new ContainerLayer();
    const context = new PaintContext(canvas, root);
    const handle = new LayerHandle<ClipRectLayer>();

    handle.layer = context.pushClipRect(true, { x: 0, y: 0 }, RECT, () => {});
    const first = handle.layer;
    assert.notEqual(first, null);
    assert.deepEqual(first?.clipRect, RECT);

    handle.layer = context.pushClipRect(true, { x: 3, y: 4 }, RECT, () => {}, {
      oldLayer: handle.layer,
    });
    assert.equal(handle.layer, first);
    assert.deepEqual(handle.layer?.clipRect, { x: 3, y: 4, w: 20, h: 10 });
    assert.deepEqual(root.children, [first]);
  });

  test("children painted inside a composited clip land in the clip layer", () => {
    const canvas = new RecordingCanvas();
    const root = new ContainerLayer();
    const layer = new PaintContext(canvas, root).pushClipRect(true, { x: 0, y: 0 }, RECT, (ctx) => {
      ctx.containerLayer.append(new OffsetLayer({ x: 0, y: 0 }));
    });
    assert.equal(layer?.children.length, 1);
    assert.equal(layer?.parent, root);
  });
});
