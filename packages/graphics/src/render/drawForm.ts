import type { DrawDiagnostics, Point, PrimitiveSink, StrokeStyle } from "@collage/rendering-core";
import { toRgba8 } from "../color/color.js";
import { resolveGradient } from "../color/gradient.js";
import type { Form, ShapeStyle } from "../form/form.js";
import type { LineStyle } from "../form/lineStyle.js";
import type { Shape } from "../form/shape.js";
import { multiply, rotation, scale, scaleY, translation } from "../math/transform.js";
import { DEFAULT_TEXT_HEIGHT, type Text } from "../text/text.js";
import { RenderContext, initialState, type DrawOptions, type DrawState } from "./context.js";
import { dashPolyline } from "./dashing.js";
import { renderElement } from "./drawElement.js";

const DEFAULT_MITER_LIMIT = 10;

/**
 * Draws a form starting from the identity transform. Bare forms have no
 * viewport unless one is given, so crops inside them are not clamped to a
 * surface.
 */
export function drawForm(form: Form, sink: PrimitiveSink, options: DrawOptions = {}): DrawDiagnostics {
  return drawForms([form], sink, options);
}

export function drawForms(forms: readonly Form[], sink: PrimitiveSink, options: DrawOptions = {}): DrawDiagnostics {
  const ctx = new RenderContext(sink, options.viewport ?? { width: 0, height: 0 }, options);
  const state = initialState();
  for (const form of forms) {
    renderForm(form, state, ctx);
  }
  return ctx.diagnostics();
}

/**
 * Appends the form's own translate, scale and rotate (in that order) to the
 * inherited matrix and multiplies its alpha into the inherited one.
 */
export function renderForm(form: Form, inherited: DrawState, ctx: RenderContext): void {
  const { theta, scale: s, x, y, alpha } = form.props;
  const matrix = multiply(multiply(multiply(inherited.matrix, translation(x, y)), scale(s)), rotation(theta));
  const state: DrawState = { matrix, alpha: inherited.alpha * alpha, scissor: inherited.scissor };
  const basic = form.basic;

  switch (basic.kind) {
    case "path":
      emitStroke(basic.style, basic.points, false, state, ctx);
      return;
    case "shape":
      drawShape(basic.style, basic.shape, state, ctx);
      return;
    case "text":
      drawText(basic.text, null, state, ctx);
      return;
    case "outlinedText":
      drawText(basic.text, basic.style, state, ctx);
      return;
    case "image":
      ctx.drawImage({
        kind: "image",
        path: basic.path,
        width: basic.width,
        height: basic.height,
        fit: "cropped",
        source: { x: basic.srcX, y: basic.srcY, width: basic.width, height: basic.height },
        alpha: state.alpha,
        transform: state.matrix,
        scissor: state.scissor
      });
      return;
    case "group": {
      const groupState: DrawState = { ...state, matrix: multiply(state.matrix, basic.matrix) };
      for (const child of basic.forms) {
        renderForm(child, groupState, ctx);
      }
      return;
    }
    case "element":
      renderElement(basic.element, state, ctx);
      return;
  }
}

function strokeStyle(line: LineStyle): StrokeStyle {
  return {
    width: line.width,
    cap: line.cap,
    join: line.join.kind,
    miterLimit: line.join.kind === "sharp" ? line.join.limit : DEFAULT_MITER_LIMIT
  };
}

function emitStroke(line: LineStyle, points: readonly Point[], closed: boolean, state: DrawState, ctx: RenderContext): void {
  if (points.length < 2) return;
  const close = closed && points.length > 2;
  const base = {
    ...strokeStyle(line),
    color: toRgba8(line.color, state.alpha),
    transform: state.matrix,
    scissor: state.scissor
  };

  if (line.dashing.length === 0) {
    ctx.stroke({ kind: "stroke", points: [...points], closed: close, ...base });
    return;
  }
  for (const dash of dashPolyline(points, close, line.dashing, line.dashOffset)) {
    ctx.stroke({ kind: "stroke", points: dash, closed: false, ...base });
  }
}

function drawShape(style: ShapeStyle, shape: Shape, state: DrawState, ctx: RenderContext): void {
  if (style.kind === "line") {
    emitStroke(style.line, shape.points, true, state, ctx);
    return;
  }
  if (shape.points.length < 3) return;

  const points = [...shape.points];
  const placement = { transform: state.matrix, scissor: state.scissor };
  const fill = style.fill;
  switch (fill.kind) {
    case "solid":
      ctx.fillPolygon({ kind: "polygon", points, color: toRgba8(fill.color, state.alpha), ...placement });
      return;
    case "texture":
      ctx.fillTexture({ kind: "texturedPolygon", points, path: fill.path, alpha: state.alpha, ...placement });
      return;
    case "gradient":
      ctx.fillGradient({
        kind: "gradientPolygon",
        points,
        gradient: resolveGradient(fill.gradient, state.alpha),
        ...placement
      });
      return;
  }
}

/**
 * Lays the units out left to right on one baseline. Glyphs are drawn y-down, so
 * the run is flipped, then moved by its alignment offset and a third of the
 * tallest unit to sit roughly centered on the origin.
 */
function drawText(text: Text, outline: LineStyle | null, state: DrawState, ctx: RenderContext): void {
  const measurer = ctx.measurer;
  const preview = text.sequence.map((unit) => unit.string).join("");
  if (!measurer) {
    ctx.skipText(preview);
    return;
  }

  const runs = text.sequence.map((unit) => {
    const style = {
      typeface: unit.style.typeface,
      height: unit.style.height ?? DEFAULT_TEXT_HEIGHT,
      bold: unit.style.bold,
      italic: unit.style.italic,
      monospace: unit.style.monospace,
      line: unit.style.line
    };
    return { unit, style, width: measurer.textWidth(unit.string, style) };
  });

  let totalWidth = 0;
  let maxHeight = 0;
  for (const run of runs) {
    totalWidth += run.width;
    maxHeight = Math.max(maxHeight, run.style.height);
  }

  const dx = text.position === "center" ? -totalWidth / 2 : text.position === "toLeft" ? -totalWidth : 0;
  let matrix = multiply(multiply(state.matrix, scaleY(-1)), translation(dx, maxHeight / 3));

  for (const run of runs) {
    if (run.unit.string.length > 0) {
      const command = {
        kind: "text" as const,
        text: run.unit.string,
        style: run.style,
        color: toRgba8(outline ? outline.color : run.unit.style.color, state.alpha),
        outline: outline ? strokeStyle(outline) : null,
        transform: matrix,
        scissor: state.scissor
      };
      if (outline) ctx.strokeText(measurer, command);
      else ctx.fillText(measurer, command);
    }
    matrix = multiply(matrix, translation(run.width, 0));
  }
}
