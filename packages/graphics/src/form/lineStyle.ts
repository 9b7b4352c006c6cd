import type { LineCap } from "@collage/rendering-core";
import type { Color } from "../color/color.js";
import { black } from "../color/palette.js";

export type { LineCap };

export type LineJoin =
  | { kind: "smooth" }
  | { kind: "sharp"; limit: number }
  | { kind: "clipped" };

export type LineStyle = {
  color: Color;
  width: number;
  cap: LineCap;
  join: LineJoin;
  /** Alternating on/off lengths; empty for a solid line. */
  dashing: readonly number[];
  dashOffset: number;
};

export function defaultLineStyle(): LineStyle {
  return {
    color: black(),
    width: 1,
    cap: "flat",
    join: { kind: "sharp", limit: 10 },
    dashing: [],
    dashOffset: 0
  };
}

export function solid(color: Color): LineStyle {
  return { ...defaultLineStyle(), color };
}

export function dashed(color: Color): LineStyle {
  return { ...defaultLineStyle(), color, dashing: [8, 4] };
}

export function dotted(color: Color): LineStyle {
  return { ...defaultLineStyle(), color, dashing: [3, 3] };
}

export function withWidth(style: LineStyle, width: number): LineStyle {
  return { ...style, width };
}
