import type { Point } from "@collage/rendering-core";
import type { Color } from "../color/color.js";
import type { Gradient } from "../color/gradient.js";
import { Form, type FillStyle } from "./form.js";
import type { LineStyle } from "./lineStyle.js";

/** Vertex count of ovals and circles. */
export const OVAL_POINTS = 49;
const OVAL_STEPS = OVAL_POINTS + 1;

/**
 * A closed polygon; the last vertex connects back to the first.
 */
export class Shape {
  constructor(readonly points: readonly Point[]) {}

  filled(color: Color): Form {
    return this.fill({ kind: "solid", color });
  }

  /** Tiles the texture at `path` over the shape. */
  textured(path: string): Form {
    return this.fill({ kind: "texture", path });
  }

  gradient(gradient: Gradient): Form {
    return this.fill({ kind: "gradient", gradient });
  }

  outlined(style: LineStyle): Form {
    return new Form({ kind: "shape", style: { kind: "line", line: style }, shape: this });
  }

  private fill(fill: FillStyle): Form {
    return new Form({ kind: "shape", style: { kind: "fill", fill }, shape: this });
  }
}

export function polygon(points: readonly Point[]): Shape {
  return new Shape([...points]);
}

export function rect(w: number, h: number): Shape {
  const hw = w / 2;
  const hh = h / 2;
  return new Shape([
    { x: -hw, y: -hh },
    { x: -hw, y: hh },
    { x: hw, y: hh },
    { x: hw, y: -hh }
  ]);
}

export function square(n: number): Shape {
  return rect(n, n);
}

export function oval(w: number, h: number): Shape {
  const t = (2 * Math.PI) / OVAL_STEPS;
  const hw = w / 2;
  const hh = h / 2;
  const points: Point[] = [];
  for (let i = 0; i < OVAL_POINTS; i++) {
    points.push({ x: hw * Math.cos(t * i), y: hh * Math.sin(t * i) });
  }
  return new Shape(points);
}

export function circle(r: number): Shape {
  const d = 2 * r;
  return oval(d, d);
}

/** A regular polygon: `ngon(5, 30)` is a pentagon with radius 30. */
export function ngon(n: number, r: number): Shape {
  const t = (2 * Math.PI) / n;
  const points: Point[] = [];
  for (let i = 0; i < n; i++) {
    points.push({ x: r * Math.cos(t * i), y: r * Math.sin(t * i) });
  }
  return new Shape(points);
}
