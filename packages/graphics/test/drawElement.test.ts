import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  blue,
  collage,
  croppedImage,
  drawElement,
  flow,
  image,
  layers,
  rect,
  red,
  spacer,
  topLeft,
  transformsEqual,
  translation,
  type Direction
} from "../src/index.js";
import { BasicSink, RecordingSink, only } from "./support/recordingSink.js";

function centers(sink: RecordingSink): { x: number; y: number }[] {
  return only(sink.commands, "polygon").map((c) => ({ x: c.transform.e, y: c.transform.f }));
}

describe("drawElement", () => {
  const a = spacer(10, 20).color(red());
  const b = spacer(30, 10).color(blue());

  it("places a container's child by its anchor", () => {
    const sink = new RecordingSink();
    drawElement(spacer(10, 10).color(red()).container(100, 50, topLeft()), sink);
    const [fill] = only(sink.commands, "polygon");
    assert.ok(fill);
    assert.ok(transformsEqual(fill.transform, translation(-45, 20)));
  });

  const placements: [Direction, { x: number; y: number }[]][] = [
    ["down", [{ x: 0, y: 5 }, { x: 0, y: -10 }]],
    ["up", [{ x: 0, y: -5 }, { x: 0, y: 10 }]],
    ["right", [{ x: -15, y: 0 }, { x: 5, y: 0 }]],
    ["left", [{ x: 15, y: 0 }, { x: -5, y: 0 }]]
  ];
  for (const [direction, expected] of placements) {
    it(`flows children ${direction}`, () => {
      const sink = new RecordingSink();
      drawElement(flow(direction, [a, b]), sink);
      const actual = centers(sink);
      assert.equal(actual.length, 2);
      actual.forEach((p, i) => {
        assert.ok(Math.abs(p.x - (expected[i]?.x ?? NaN)) < 1e-9, `${direction} x of child ${i}`);
        assert.ok(Math.abs(p.y - (expected[i]?.y ?? NaN)) < 1e-9, `${direction} y of child ${i}`);
      });
    });
  }

  it("stacks layers in order and `in` flows in reverse", () => {
    const out = new RecordingSink();
    drawElement(layers([a, b]), out);
    assert.deepEqual(
      only(out.commands, "polygon").map((c) => c.color.r),
      [204, 52],
    );
    const inward = new RecordingSink();
    drawElement(flow("in", [a, b]), inward);
    assert.deepEqual(
      only(inward.commands, "polygon").map((c) => c.color.r),
      [52, 204],
    );
  });

  it("multiplies opacity down the tree and into collages", () => {
    const sink = new RecordingSink();
    const inner = collage(10, 10, [rect(4, 4).filled(red()).alpha(0.5)]).opacity(0.5);
    drawElement(layers([inner]).opacity(0.5), sink);
    const [fill] = only(sink.commands, "polygon");
    assert.equal(fill?.color.a, 0.125);
  });

  it("fills the background before the content", () => {
    const sink = new RecordingSink();
    drawElement(collage(20, 10, [rect(4, 4).filled(red())]).color(blue()), sink);
    const fills = only(sink.commands, "polygon");
    assert.deepEqual(
      fills.map((c) => c.color.r),
      [52, 204],
    );
    assert.deepEqual(fills[0]?.points, [
      { x: -10, y: -5 },
      { x: -10, y: 5 },
      { x: 10, y: 5 },
      { x: 10, y: -5 }
    ]);
  });

  it("clears then draws the child", () => {
    const sink = new RecordingSink();
    const diagnostics = drawElement(spacer(10, 10).color(blue()).clear(red()).opacity(0.5), sink);
    assert.deepEqual(sink.kinds(), ["clear", "polygon"]);
    assert.deepEqual(sink.commands[0], { kind: "clear", color: { r: 204, g: 0, b: 0, a: 0.5 }, scissor: null });
    assert.equal(diagnostics.commandCount, 2);
  });

  it("draws images at the element size", () => {
    const sink = new RecordingSink();
    drawElement(layers([image(100, 50, "a.png").width(50), croppedImage(5, 6, 20, 10, "s.png")]), sink);
    const [plain, cropped] = only(sink.commands, "image");
    assert.ok(plain && cropped);
    assert.equal(plain.fit, "plain");
    assert.equal(plain.width, 50);
    assert.equal(plain.height, 25);
    assert.equal(plain.source, null);
    assert.equal(cropped.fit, "cropped");
    assert.deepEqual(cropped.source, { x: 5, y: 6, width: 20, height: 10 });
  });

  it("requires an image-capable sink for images", () => {
    assert.throws(() => drawElement(image(1, 1, "a.png"), new BasicSink()), { name: "UnsupportedPrimitiveError" });
  });

  it("draws nothing for spacers", () => {
    const sink = new RecordingSink();
    assert.deepEqual(drawElement(spacer(5, 5), sink), { commandCount: 0, culledElements: 0, skippedTexts: 0 });
  });
});
