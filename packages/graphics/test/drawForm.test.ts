import test from "node:test";
import assert from "node:assert/strict";
import {
  Text,
  UnsupportedPrimitiveError,
  applyTransform,
  blue,
  circle,
  dashed,
  drawForm,
  drawForms,
  group,
  groupTransform,
  linear,
  multiply,
  outlinedText,
  polygon,
  rect,
  red,
  rotation,
  solid,
  spacer,
  sprite,
  text,
  toForm,
  traced,
  transformsEqual,
  translation,
  white,
  type DrawWarning
} from "../src/index.js";
import { BasicSink, FixedWidthMeasurer, RecordingSink, approx, only } from "./support/recordingSink.js";

const IDENTITY = { a: 1, b: 0, c: 0, d: 1, e: 0, f: 0 };

test("drawForm: group of a rotated rectangle and an outlined circle", () => {
  const sink = new RecordingSink();
  const scene = group([
    rect(60, 40).filled(blue()).shift(10, 0).rotate(Math.PI / 4),
    circle(5).outlined(solid(red()))
  ]);

  const diagnostics = drawForm(scene, sink);

  assert.equal(sink.commands.length, 2);
  assert.equal(diagnostics.commandCount, 2);
  const [fill, outline] = sink.commands;
  assert.ok(fill?.kind === "polygon");
  assert.ok(outline?.kind === "stroke");
  assert.ok(transformsEqual(fill.transform, multiply(translation(10, 0), rotation(Math.PI / 4))));
  assert.ok(transformsEqual(outline.transform, IDENTITY));
  assert.deepEqual(fill.color, { r: 52, g: 101, b: 164, a: 1 });
  assert.deepEqual(outline.color, { r: 204, g: 0, b: 0, a: 1 });
  assert.equal(outline.closed, true);
  assert.equal(outline.points.length, 49);
});

test("drawForm: translate, then scale, then rotate", () => {
  const sink = new RecordingSink();
  drawForm(rect(2, 2).filled(red()).shift(10, 0).scale(2).rotate(Math.PI / 2), sink);
  const [fill] = only(sink.commands, "polygon");
  assert.ok(fill);
  const p = applyTransform(fill.transform, { x: 1, y: 0 });
  assert.ok(approx(p.x, 10));
  assert.ok(approx(p.y, 2));
});

test("drawForm: group matrix is applied after the group's own transform", () => {
  const sink = new RecordingSink();
  drawForm(groupTransform(translation(5, 0), [rect(2, 2).filled(red())]).shift(0, 3), sink);
  const [fill] = only(sink.commands, "polygon");
  assert.ok(fill);
  assert.ok(transformsEqual(fill.transform, translation(5, 3)));
});

test("drawForm: alpha multiplies through groups", () => {
  const sink = new RecordingSink();
  drawForm(group([rect(2, 2).filled(red()).alpha(0.5)]).alpha(0.5), sink);
  const [fill] = only(sink.commands, "polygon");
  assert.equal(fill?.color.a, 0.25);
});

test("drawForm: degenerate geometry draws nothing", () => {
  const sink = new RecordingSink();
  const diagnostics = drawForms(
    [
      traced(solid(red()), [{ x: 0, y: 0 }]),
      polygon([{ x: 0, y: 0 }, { x: 1, y: 1 }]).filled(red()),
      polygon([]).outlined(solid(red()))
    ],
    sink,
  );
  assert.equal(sink.commands.length, 0);
  assert.equal(diagnostics.commandCount, 0);
});

test("drawForm: a two-point outline is an open stroke", () => {
  const sink = new RecordingSink();
  drawForm(polygon([{ x: 0, y: 0 }, { x: 1, y: 1 }]).outlined(solid(red())), sink);
  const [stroke] = only(sink.commands, "stroke");
  assert.equal(stroke?.closed, false);
});

test("drawForm: dashed paths become one stroke per dash", () => {
  const sink = new RecordingSink();
  drawForm(traced(dashed(blue()), [{ x: 0, y: 0 }, { x: 16, y: 0 }]), sink);
  const strokes = only(sink.commands, "stroke");
  assert.deepEqual(
    strokes.map((s) => s.points),
    [
      [{ x: 0, y: 0 }, { x: 8, y: 0 }],
      [{ x: 12, y: 0 }, { x: 16, y: 0 }]
    ],
  );
  assert.ok(strokes.every((s) => !s.closed));
});

test("drawForm: line style maps onto the stroke", () => {
  const sink = new RecordingSink();
  const style = { ...solid(red()), width: 3, cap: "padded" as const, join: { kind: "smooth" as const } };
  drawForm(traced(style, [{ x: 0, y: 0 }, { x: 1, y: 0 }]), sink);
  const [stroke] = only(sink.commands, "stroke");
  assert.ok(stroke);
  assert.equal(stroke.width, 3);
  assert.equal(stroke.cap, "padded");
  assert.equal(stroke.join, "smooth");
  assert.equal(stroke.miterLimit, 10);
});

test("drawForm: sprites cut the sheet", () => {
  const sink = new RecordingSink();
  drawForm(sprite(16, 8, [32, 4], "sheet.png").alpha(0.5), sink);
  const [image] = only(sink.commands, "image");
  assert.deepEqual(image, {
    kind: "image",
    path: "sheet.png",
    width: 16,
    height: 8,
    fit: "cropped",
    source: { x: 32, y: 4, width: 16, height: 8 },
    alpha: 0.5,
    transform: image?.transform,
    scissor: null
  });
});

test("drawForm: gradients resolve stop colors with alpha", () => {
  const sink = new RecordingSink();
  const gradient = linear({ x: 0, y: 0 }, { x: 10, y: 0 }, [
    [0, red()],
    [1, blue()]
  ]);
  drawForm(rect(10, 10).gradient(gradient).alpha(0.5), sink);
  const [fill] = only(sink.commands, "gradientPolygon");
  assert.deepEqual(fill?.gradient, {
    kind: "linear",
    start: { x: 0, y: 0 },
    end: { x: 10, y: 0 },
    stops: [
      { offset: 0, color: { r: 204, g: 0, b: 0, a: 0.5 } },
      { offset: 1, color: { r: 52, g: 101, b: 164, a: 0.5 } }
    ]
  });
});

test("drawForm: missing capabilities throw UnsupportedPrimitiveError", () => {
  const sink = new BasicSink();
  assert.throws(
    () => drawForm(rect(10, 10).textured("brick.png"), sink),
    (err: unknown) => err instanceof UnsupportedPrimitiveError && err.primitive === "texturedPolygon",
  );
  assert.throws(
    () => drawForm(sprite(1, 1, [0, 0], "a.png"), sink),
    (err: unknown) => err instanceof UnsupportedPrimitiveError && err.primitive === "image",
  );
  assert.throws(
    () => drawForm(outlinedText(solid(red()), Text.fromString("x")), sink, {
      measurer: { textWidth: () => 1, fillText: () => undefined }
    }),
    /Backend does not support "outlinedText" primitives/,
  );
});

test("drawForm: text is laid out around the origin", () => {
  const sink = new RecordingSink();
  const measurer = new FixedWidthMeasurer();
  const t = Text.concat([Text.fromString("a").height(20), Text.fromString("bc").height(10)]).color(white());

  const diagnostics = drawForm(text(t), sink, { measurer });

  assert.equal(diagnostics.commandCount, 2);
  assert.equal(sink.commands.length, 0);
  const [first, second] = measurer.commands;
  assert.ok(first && second);
  assert.equal(first.text, "a");
  assert.equal(second.text, "bc");
  assert.deepEqual(first.color, { r: 255, g: 255, b: 255, a: 1 });
  assert.equal(first.style.height, 20);
  assert.equal(first.outline, null);
  assert.ok(transformsEqual(first.transform, { a: 1, b: 0, c: 0, d: -1, e: -10, f: -20 / 3 }));
  assert.ok(transformsEqual(second.transform, { a: 1, b: 0, c: 0, d: -1, e: 0, f: -20 / 3 }));
});

test("drawForm: text alignment and default height", () => {
  const measurer = new FixedWidthMeasurer();
  drawForm(text(Text.fromString("abcd").withPosition("toLeft")), new RecordingSink(), { measurer });
  drawForm(text(Text.fromString("abcd").withPosition("toRight")), new RecordingSink(), { measurer });
  const [left, right] = measurer.commands;
  assert.equal(left?.style.height, 16);
  assert.ok(left && approx(left.transform.e, -32));
  assert.ok(right && approx(right.transform.e, 0));
});

test("drawForm: empty units are measured but not drawn", () => {
  const measurer = new FixedWidthMeasurer();
  const diagnostics = drawForm(text(Text.concat([Text.empty(), Text.fromString("x")])), new RecordingSink(), {
    measurer
  });
  assert.equal(diagnostics.commandCount, 1);
  assert.deepEqual(
    measurer.commands.map((c) => c.text),
    ["x"],
  );
});

test("drawForm: outlined text carries the line style", () => {
  const measurer = new FixedWidthMeasurer();
  drawForm(outlinedText(solid(red()), Text.fromString("x")), new RecordingSink(), { measurer });
  const [command] = measurer.commands;
  assert.deepEqual(command?.outline, { width: 1, cap: "flat", join: "sharp", miterLimit: 10 });
  assert.deepEqual(command?.color, { r: 204, g: 0, b: 0, a: 1 });
});

test("drawForm: text without a measurer is skipped with a warning", () => {
  const sink = new RecordingSink();
  const warnings: DrawWarning[] = [];
  const diagnostics = drawForm(text(Text.fromString("hi")), sink, { onWarning: (w) => warnings.push(w) });
  assert.equal(sink.commands.length, 0);
  assert.deepEqual(diagnostics, { commandCount: 0, culledElements: 0, skippedTexts: 1 });
  assert.deepEqual(warnings, [{ code: "text-skipped", message: 'No text measurer supplied, skipped "hi"' }]);
});

test("drawForm: embedded elements are drawn at the form's transform", () => {
  const sink = new RecordingSink();
  drawForm(toForm(spacer(4, 2).color(red())).shift(3, 0), sink);
  const [fill] = only(sink.commands, "polygon");
  assert.ok(fill);
  assert.ok(transformsEqual(fill.transform, translation(3, 0)));
  assert.deepEqual(fill.points, [
    { x: -2, y: -1 },
    { x: -2, y: 1 },
    { x: 2, y: 1 },
    { x: 2, y: -1 }
  ]);
});
