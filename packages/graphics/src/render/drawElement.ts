import type { DrawDiagnostics, PrimitiveSink } from "@collage/rendering-core";
import { toRgba8 } from "../color/color.js";
import type { Direction, Element } from "../element/element.js";
import { resolveAxis } from "../element/position.js";
import { rect } from "../form/shape.js";
import { isEmptyRect } from "../math/rect.js";
import { multiply, translation } from "../math/transform.js";
import { RenderContext, initialState, type DrawOptions, type DrawState } from "./context.js";
import { resolveScissor } from "./crop.js";
import { renderForm } from "./drawForm.js";

/**
 * Draws an element with its center at the origin of the view. The viewport
 * defaults to the element's own size.
 */
export function drawElement(element: Element, sink: PrimitiveSink, options: DrawOptions = {}): DrawDiagnostics {
  const viewport = options.viewport ?? { width: element.props.width, height: element.props.height };
  const ctx = new RenderContext(sink, viewport, options);
  renderElement(element, initialState(), ctx);
  return ctx.diagnostics();
}

export function renderElement(element: Element, inherited: DrawState, ctx: RenderContext): void {
  const { width, height, opacity, color, crop } = element.props;
  const alpha = inherited.alpha * opacity;
  let scissor = inherited.scissor;

  if (crop) {
    scissor = resolveScissor(crop, inherited.matrix, ctx.viewport, scissor);
    if (isEmptyRect(scissor)) {
      ctx.cull(`Crop of ${width}x${height} element is outside the visible area`);
      return;
    }
  }

  const state: DrawState = { matrix: inherited.matrix, alpha, scissor };

  if (color) {
    ctx.fillPolygon({
      kind: "polygon",
      points: [...rect(width, height).points],
      color: toRgba8(color, alpha),
      transform: state.matrix,
      scissor
    });
  }

  const prim = element.prim;
  switch (prim.kind) {
    case "spacer":
      return;
    case "image":
      ctx.drawImage({
        kind: "image",
        path: prim.path,
        width,
        height,
        fit: prim.style.kind,
        source:
          prim.style.kind === "cropped"
            ? { x: prim.style.x, y: prim.style.y, width: prim.width, height: prim.height }
            : null,
        alpha,
        transform: state.matrix,
        scissor
      });
      return;
    case "container": {
      const { position, child } = prim;
      const dx = resolveAxis(position.horizontal, position.x, width, child.props.width);
      const dy = resolveAxis(position.vertical, position.y, height, child.props.height);
      renderElement(child, { ...state, matrix: multiply(state.matrix, translation(dx, dy)) }, ctx);
      return;
    }
    case "flow":
      drawFlow(prim.direction, prim.children, state, ctx);
      return;
    case "collage":
      for (const form of prim.forms) {
        renderForm(form, state, ctx);
      }
      return;
    case "cleared":
      ctx.clear({ kind: "clear", color: toRgba8(prim.color, alpha), scissor });
      renderElement(prim.child, state, ctx);
      return;
  }
}

/** Unit vector of the main axis; `in` and `out` have none. */
function axisOf(direction: Direction): { x: number; y: number } | null {
  switch (direction) {
    case "up":
      return { x: 0, y: 1 };
    case "down":
      return { x: 0, y: -1 };
    case "right":
      return { x: 1, y: 0 };
    case "left":
      return { x: -1, y: 0 };
    case "in":
    case "out":
      return null;
  }
}

function drawFlow(direction: Direction, children: readonly Element[], state: DrawState, ctx: RenderContext): void {
  const axis = axisOf(direction);
  if (!axis) {
    const ordered = direction === "in" ? [...children].reverse() : children;
    for (const child of ordered) {
      renderElement(child, state, ctx);
    }
    return;
  }

  const extent = (e: Element): number => (axis.x !== 0 ? e.props.width : e.props.height);
  const total = children.reduce((sum, child) => sum + extent(child), 0);

  let matrix = multiply(state.matrix, translation((-axis.x * total) / 2, (-axis.y * total) / 2));
  let previousHalf = 0;
  for (const child of children) {
    const half = extent(child) / 2;
    const step = previousHalf + half;
    matrix = multiply(matrix, translation(axis.x * step, axis.y * step));
    renderElement(child, { ...state, matrix }, ctx);
    previousHalf = half;
  }
}
