import type { Point, Transform2D } from "@collage/rendering-core";
import type { Color } from "../color/color.js";
import type { Gradient } from "../color/gradient.js";
import type { Element } from "../element/element.js";
import { identity } from "../math/transform.js";
import type { Text } from "../text/text.js";
import type { LineStyle } from "./lineStyle.js";
import type { Shape } from "./shape.js";

export type FillStyle =
  | { kind: "solid"; color: Color }
  | { kind: "texture"; path: string }
  | { kind: "gradient"; gradient: Gradient };

export type ShapeStyle = { kind: "line"; line: LineStyle } | { kind: "fill"; fill: FillStyle };

export type BasicForm =
  | { kind: "path"; style: LineStyle; points: readonly Point[] }
  | { kind: "shape"; style: ShapeStyle; shape: Shape }
  | { kind: "text"; text: Text }
  | { kind: "outlinedText"; style: LineStyle; text: Text }
  | { kind: "image"; width: number; height: number; srcX: number; srcY: number; path: string }
  | { kind: "element"; element: Element }
  | { kind: "group"; matrix: Transform2D; forms: readonly Form[] };

export type FormProps = {
  /** Counter-clockwise rotation in radians. */
  theta: number;
  scale: number;
  x: number;
  y: number;
  /** 0 is fully transparent; not clamped. */
  alpha: number;
};

const DEFAULT_PROPS: FormProps = { theta: 0, scale: 1, x: 0, y: 0, alpha: 1 };

/**
 * A freeform graphic. Collage coordinates put the origin at the center with the
 * y-axis pointing up. Every builder returns a new form, so forms can be shared
 * between parents.
 */
export class Form {
  readonly props: FormProps;

  constructor(
    readonly basic: BasicForm,
    props: Partial<FormProps> = {},
  ) {
    this.props = { ...DEFAULT_PROPS, ...props };
  }

  /** Relative move: `shift(10, 10)` moves ten up and ten to the right. */
  shift(x: number, y: number): Form {
    return this.with({ x: this.props.x + x, y: this.props.y + y });
  }

  shiftX(x: number): Form {
    return this.with({ x: this.props.x + x });
  }

  shiftY(y: number): Form {
    return this.with({ y: this.props.y + y });
  }

  /** Scaling by 2 doubles both dimensions. */
  scale(factor: number): Form {
    return this.with({ scale: this.props.scale * factor });
  }

  /** Adds `theta` radians of counter-clockwise rotation. */
  rotate(theta: number): Form {
    return this.with({ theta: this.props.theta + theta });
  }

  alpha(alpha: number): Form {
    return this.with({ alpha });
  }

  private with(patch: Partial<FormProps>): Form {
    return new Form(this.basic, { ...this.props, ...patch });
  }
}

/** Lets an element be moved, rotated and scaled like any other form. */
export function toForm(element: Element): Form {
  return new Form({ kind: "element", element });
}

/** Flattens forms into one so they transform as a unit. */
export function group(forms: readonly Form[]): Form {
  return new Form({ kind: "group", matrix: identity(), forms });
}

/** A group with an extra matrix applied to its children. */
export function groupTransform(matrix: Transform2D, forms: readonly Form[]): Form {
  return new Form({ kind: "group", matrix, forms });
}

export function pointPath(points: readonly Point[]): Point[] {
  return [...points];
}

export function segment(a: Point, b: Point): Point[] {
  return [a, b];
}

export function traced(style: LineStyle, path: readonly Point[]): Form {
  return new Form({ kind: "path", style, points: path });
}

export function line(style: LineStyle, x1: number, y1: number, x2: number, y2: number): Form {
  return traced(style, segment({ x: x1, y: y1 }, { x: x2, y: y2 }));
}

/** Cuts a `width` by `height` rectangle out of a sprite sheet at `[srcX, srcY]`. */
export function sprite(width: number, height: number, [srcX, srcY]: [number, number], path: string): Form {
  return new Form({ kind: "image", width, height, srcX, srcY, path });
}

export function text(t: Text): Form {
  return new Form({ kind: "text", text: t });
}

export function outlinedText(style: LineStyle, t: Text): Form {
  return new Form({ kind: "outlinedText", style, text: t });
}
