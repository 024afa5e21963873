import { assert, describe, test } from "@scrollport/testkit";
import { UiError } from "../../errors.js";
import { ScrollPosition } from "../scrollPosition.js";
import { fixedViewportOffset } from "../viewportOffset.js";

function isUiError(code: string): (err: unknown) => boolean {
  return (err) => err instanceof UiError && err.code === code;
}

describe("ScrollPosition", () => {
  test("extents are unavailable before layout reports them", () => {
    const position = new ScrollPosition();
    assert.equal(position.hasContentDimensions, false);
    assert.throws(() => position.maxScrollExtent, isUiError("UI_INVALID_STATE"));
    assert.throws(() => position.viewportDimension, isUiError("UI_INVALID_STATE"));
  });

  test("applyContentDimensions clamps and notifies only on change", () => {
    const position = new ScrollPosition({ initialPixels: 250 });
    let notified = 0;
    position.subscribe(() => {
      notified++;
    });

    position.applyViewportDimension(100);
    position.applyContentDimensions(0, 200);
    assert.equal(position.pixels, 200);
    assert.equal(notified, 1);

    position.applyContentDimensions(0, 300);
    assert.equal(position.pixels, 200);
    assert.equal(notified, 1);
    assert.equal(position.extentBefore, 200);
    assert.equal(position.extentAfter, 100);
  });

  test("jumpTo clamps once a range is known", () => {
    const position = new ScrollPosition();
    position.jumpTo(500);
    assert.equal(position.pixels, 500);
    position.applyContentDimensions(0, 120);
    assert.equal(position.pixels, 120);
    position.jumpTo(-20);
    assert.equal(position.pixels, 0);
    assert.equal(position.atEdge, true);
  });

  test("invalid ranges and dimensions throw", () => {
    const position = new ScrollPosition();
    assert.throws(() => position.applyContentDimensions(10, 0), isUiError("UI_INVALID_STATE"));
    assert.throws(() => position.applyViewportDimension(-1), isUiError("UI_INVALID_STATE"));
    assert.throws(() => position.jumpTo(Number.NaN), isUiError("UI_INVALID_STATE"));
  });

  test("unsubscribe removes exactly the given listener", () => {
    const position = new ScrollPosition();
    const calls: string[] = [];
    const a = position.subscribe(() => calls.push("a"));
    position.subscribe(() => calls.push("b"));
    assert.equal(position.listenerCount, 2);

    assert.equal(position.unsubscribe(a), true);
    assert.equal(position.unsubscribe(a), false);
    position.jumpTo(10);
    assert.deepEqual(calls, ["b"]);
  });

  test("a listener may unsubscribe itself during dispatch", () => {
    const position = new ScrollPosition();
    const calls: string[] = [];
    const token = position.subscribe(() => {
      calls.push("once");
      position.unsubscribe(token);
    });
    position.subscribe(() => calls.push("always"));
    position.jumpTo(1);
    position.jumpTo(2);
    assert.deepEqual(calls, ["once", "always", "always"]);
  });

  test("implicit scrolling follows the physics", () => {
    const position = new ScrollPosition();
    assert.equal(position.allowImplicitScrolling, true);
    position.physics = { allowImplicitScrolling: false };
    assert.equal(position.allowImplicitScrolling, false);
  });

  test("subscribe after dispose throws", () => {
    const position = new ScrollPosition();
    position.dispose();
    assert.equal(position.disposed, true);
    assert.throws(() => position.subscribe(() => {}), isUiError("UI_INVALID_STATE"));
  });
});

describe("fixedViewportOffset", () => {
  test("never moves and disallows implicit scrolling", () => {
    const offset = fixedViewportOffset(30);
    offset.applyContentDimensions(0, 10);
    offset.moveTo(5);
    assert.equal(offset.pixels, 30);
    assert.equal(offset.allowImplicitScrolling, false);
  });

  test("rejects non-finite positions", () => {
    assert.throws(() => fixedViewportOffset(Number.POSITIVE_INFINITY), isUiError("UI_INVALID_STATE"));
  });
});
