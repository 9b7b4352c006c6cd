import type { GradientFill, Point } from "@collage/rendering-core";
import { toRgba8, type Color } from "./color.js";

export type ColorStop = [offset: number, color: Color];

/** Stops are used in the order given; offsets are not validated. */
export type Gradient =
  | { kind: "linear"; start: Point; end: Point; stops: readonly ColorStop[] }
  | {
      kind: "radial";
      start: Point;
      startRadius: number;
      end: Point;
      endRadius: number;
      stops: readonly ColorStop[];
    };

export function linear(start: Point, end: Point, stops: readonly ColorStop[]): Gradient {
  return { kind: "linear", start, end, stops };
}

/**
 * Interpolates between the circle at `start` with `startRadius` and the circle
 * at `end` with `endRadius`.
 */
export function radial(
  start: Point,
  startRadius: number,
  end: Point,
  endRadius: number,
  stops: readonly ColorStop[],
): Gradient {
  return { kind: "radial", start, startRadius, end, endRadius, stops };
}

export function resolveGradient(gradient: Gradient, opacity: number): GradientFill {
  const stops = gradient.stops.map(([offset, color]) => ({ offset, color: toRgba8(color, opacity) }));
  if (gradient.kind === "linear") {
    return { kind: "linear", start: gradient.start, end: gradient.end, stops };
  }
  return {
    kind: "radial",
    start: gradient.start,
    startRadius: gradient.startRadius,
    end: gradient.end,
    endRadius: gradient.endRadius,
    stops
  };
}
