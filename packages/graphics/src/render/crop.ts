import type { Point, Rect, Transform2D, Viewport } from "@collage/rendering-core";
import type { CropRect } from "../element/element.js";
import { boundsOfPoints, rectIntersection } from "../math/rect.js";
import { applyTransform } from "../math/transform.js";

/** View coordinates (center origin, y up) to surface pixels (top-left origin, y down). */
export function viewToSurface(p: Point, viewport: Viewport): Point {
  const ratio = viewport.pixelRatio ?? 1;
  return {
    x: (p.x + viewport.width / 2) * ratio,
    y: (viewport.height / 2 - p.y) * ratio
  };
}

export function surfaceRect(viewport: Viewport): Rect | null {
  if (viewport.width <= 0 || viewport.height <= 0) return null;
  const ratio = viewport.pixelRatio ?? 1;
  return { x: 0, y: 0, width: viewport.width * ratio, height: viewport.height * ratio };
}

/**
 * Converts an element-local crop rectangle into a pixel scissor, clamped to the
 * surface and intersected with the scissor already in effect.
 */
export function resolveScissor(crop: CropRect, matrix: Transform2D, viewport: Viewport, current: Rect | null): Rect {
  const hw = crop.width / 2;
  const hh = crop.height / 2;
  const corners = [
    { x: crop.x - hw, y: crop.y - hh },
    { x: crop.x - hw, y: crop.y + hh },
    { x: crop.x + hw, y: crop.y + hh },
    { x: crop.x + hw, y: crop.y - hh }
  ].map((p) => viewToSurface(applyTransform(matrix, p), viewport));

  const bounds = boundsOfPoints(corners);
  const x1 = Math.floor(bounds.x);
  const y1 = Math.floor(bounds.y);
  let scissor: Rect = {
    x: x1,
    y: y1,
    width: Math.ceil(bounds.x + bounds.width) - x1,
    height: Math.ceil(bounds.y + bounds.height) - y1
  };

  const surface = surfaceRect(viewport);
  if (surface) scissor = rectIntersection(scissor, surface);
  if (current) scissor = rectIntersection(scissor, current);
  return scissor;
}
