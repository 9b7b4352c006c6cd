import type { Color } from "../color/color.js";
import type { Form } from "../form/form.js";
import type { Position } from "./position.js";

export type ImageStyle =
  | { kind: "plain" }
  | { kind: "fitted" }
  | { kind: "cropped"; x: number; y: number }
  | { kind: "tiled" };

export type Direction = "up" | "down" | "left" | "right" | "in" | "out";

/** Crop rectangle centered on `(x, y)` in the element's own coordinates. */
export type CropRect = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type Prim =
  | { kind: "spacer" }
  | { kind: "image"; style: ImageStyle; width: number; height: number; path: string }
  | { kind: "container"; position: Position; child: Element }
  | { kind: "flow"; direction: Direction; children: readonly Element[] }
  | { kind: "collage"; width: number; height: number; forms: readonly Form[] }
  | { kind: "cleared"; color: Color; child: Element };

export type Properties = {
  width: number;
  height: number;
  opacity: number;
  color: Color | null;
  crop: CropRect | null;
};

/**
 * A rectangle with a known width and height, easy to combine and position.
 */
export class Element {
  constructor(
    readonly props: Properties,
    readonly prim: Prim,
  ) {}

  /**
   * Images and collages keep their aspect ratio, so the height follows.
   */
  width(newWidth: number): Element {
    const w = Math.round(newWidth);
    const natural = naturalSize(this.prim);
    const height = natural && natural.width !== 0 ? Math.round((natural.height / natural.width) * w) : this.props.height;
    return this.with({ width: w, height });
  }

  height(newHeight: number): Element {
    const h = Math.round(newHeight);
    const natural = naturalSize(this.prim);
    const width = natural && natural.height !== 0 ? Math.round((natural.width / natural.height) * h) : this.props.width;
    return this.with({ width, height: h });
  }

  size(w: number, h: number): Element {
    return this.with({ width: Math.round(w), height: Math.round(h) });
  }

  opacity(opacity: number): Element {
    return this.with({ opacity });
  }

  /** Background color. */
  color(color: Color): Element {
    return this.with({ color });
  }

  /** Only the part inside the rectangle centered at `(x, y)` is drawn. */
  crop(x: number, y: number, w: number, h: number): Element {
    return this.with({ crop: { x, y, width: w, height: h } });
  }

  /** Clears the whole drawing surface to `color` before drawing this element. */
  clear(color: Color): Element {
    return newElement(this.props.width, this.props.height, { kind: "cleared", color, child: this });
  }

  container(w: number, h: number, position: Position): Element {
    return newElement(w, h, { kind: "container", position, child: this });
  }

  /** `a.above(b)` puts `a` on top of `b`. */
  above(other: Element): Element {
    return flow("down", [this, other]);
  }

  below(other: Element): Element {
    return other.above(this);
  }

  /** `a.beside(b)` puts `b` to the right of `a`. */
  beside(other: Element): Element {
    return flow("right", [this, other]);
  }

  private with(patch: Partial<Properties>): Element {
    return new Element({ ...this.props, ...patch }, this.prim);
  }
}

function naturalSize(prim: Prim): { width: number; height: number } | null {
  if (prim.kind === "image" || prim.kind === "collage") return { width: prim.width, height: prim.height };
  return null;
}

export function newElement(w: number, h: number, prim: Prim): Element {
  return new Element({ width: Math.round(w), height: Math.round(h), opacity: 1, color: null, crop: null }, prim);
}

export function widthOf(e: Element): number {
  return e.props.width;
}

export function heightOf(e: Element): number {
  return e.props.height;
}

export function sizeOf(e: Element): [number, number] {
  return [e.props.width, e.props.height];
}

export function spacer(w: number, h: number): Element {
  return newElement(w, h, { kind: "spacer" });
}

/** Takes up no space. */
export function empty(): Element {
  return spacer(0, 0);
}

export function image(w: number, h: number, path: string): Element {
  return newElement(w, h, { kind: "image", style: { kind: "plain" }, width: w, height: h, path });
}

/** Scales and crops the picture to fill the box. */
export function fittedImage(w: number, h: number, path: string): Element {
  return newElement(w, h, { kind: "image", style: { kind: "fitted" }, width: w, height: h, path });
}

/** Takes a `w` by `h` rectangle out of the picture starting at its top-left `(x, y)`. */
export function croppedImage(x: number, y: number, w: number, h: number, path: string): Element {
  return newElement(w, h, { kind: "image", style: { kind: "cropped", x, y }, width: w, height: h, path });
}

export function tiledImage(w: number, h: number, path: string): Element {
  return newElement(w, h, { kind: "image", style: { kind: "tiled" }, width: w, height: h, path });
}

/** A fixed-size canvas for freeform graphics. */
export function collage(w: number, h: number, forms: readonly Form[]): Element {
  return newElement(w, h, { kind: "collage", width: w, height: h, forms });
}

/**
 * Lays elements out in a direction, starting from the first one.
 */
export function flow(direction: Direction, elements: readonly Element[]): Element {
  if (elements.length === 0) return empty();
  let maxW = 0;
  let maxH = 0;
  let sumW = 0;
  let sumH = 0;
  for (const e of elements) {
    maxW = Math.max(maxW, e.props.width);
    maxH = Math.max(maxH, e.props.height);
    sumW += e.props.width;
    sumH += e.props.height;
  }
  const prim: Prim = { kind: "flow", direction, children: [...elements] };
  switch (direction) {
    case "up":
    case "down":
      return newElement(maxW, sumH, prim);
    case "left":
    case "right":
      return newElement(sumW, maxH, prim);
    case "in":
    case "out":
      return newElement(maxW, maxH, prim);
  }
}

/** Stacks elements, the first one at the bottom. */
export function layers(elements: readonly Element[]): Element {
  return flow("out", elements);
}
