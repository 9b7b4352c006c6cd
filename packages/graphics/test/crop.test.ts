import test from "node:test";
import assert from "node:assert/strict";
import { identity, layers, red, spacer, translation, drawElement, type DrawWarning } from "../src/index.js";
import { resolveScissor } from "../src/render/crop.js";
import { RecordingSink } from "./support/recordingSink.js";

const square10 = { x: 0, y: 0, width: 10, height: 10 };

test("resolveScissor: maps the crop into surface pixels", () => {
  assert.deepEqual(resolveScissor(square10, identity(), { width: 100, height: 100 }, null), {
    x: 45,
    y: 45,
    width: 10,
    height: 10
  });
  assert.deepEqual(resolveScissor(square10, identity(), { width: 100, height: 100, pixelRatio: 2 }, null), {
    x: 90,
    y: 90,
    width: 20,
    height: 20
  });
});

test("resolveScissor: follows the transform and flips y", () => {
  assert.deepEqual(resolveScissor(square10, translation(10, 20), { width: 100, height: 100 }, null), {
    x: 55,
    y: 25,
    width: 10,
    height: 10
  });
});

test("resolveScissor: rounds outward", () => {
  const crop = { x: 0.5, y: 0, width: 3, height: 3 };
  assert.deepEqual(resolveScissor(crop, identity(), { width: 10, height: 10 }, null), {
    x: 4,
    y: 3,
    width: 3,
    height: 4
  });
});

test("resolveScissor: clamps to the surface and the current scissor", () => {
  const crop = { x: 48, y: 0, width: 10, height: 10 };
  assert.deepEqual(resolveScissor(crop, identity(), { width: 100, height: 100 }, null), {
    x: 93,
    y: 45,
    width: 7,
    height: 10
  });
  assert.deepEqual(
    resolveScissor(square10, identity(), { width: 100, height: 100 }, { x: 0, y: 0, width: 50, height: 50 }),
    { x: 45, y: 45, width: 5, height: 5 },
  );
});

test("resolveScissor: a zero viewport does not clamp", () => {
  assert.deepEqual(resolveScissor(square10, identity(), { width: 0, height: 0 }, null), {
    x: -5,
    y: -5,
    width: 10,
    height: 10
  });
});

test("drawElement: commands carry the crop scissor", () => {
  const sink = new RecordingSink();
  drawElement(spacer(20, 20).color(red()).crop(0, 0, 10, 10), sink);
  assert.equal(sink.commands.length, 1);
  assert.deepEqual(sink.commands[0]?.scissor, { x: 5, y: 5, width: 10, height: 10 });
});

test("drawElement: a crop outside the surface draws nothing", () => {
  const sink = new RecordingSink();
  const warnings: DrawWarning[] = [];
  const diagnostics = drawElement(spacer(10, 10).color(red()).crop(100, 100, 5, 5), sink, {
    onWarning: (w) => warnings.push(w)
  });
  assert.equal(sink.commands.length, 0);
  assert.equal(diagnostics.culledElements, 1);
  assert.equal(warnings[0]?.code, "crop-empty");
});

test("drawElement: a crop outside the parent's crop draws nothing", () => {
  const sink = new RecordingSink();
  const inner = spacer(60, 20).color(red()).crop(20, 0, 10, 10);
  const diagnostics = drawElement(layers([inner]).crop(-20, 0, 10, 10), sink);
  assert.equal(sink.commands.length, 0);
  assert.deepEqual(diagnostics, { commandCount: 0, culledElements: 1, skippedTexts: 0 });
});
