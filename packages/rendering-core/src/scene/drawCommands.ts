import type { Point, Rect, Transform2D } from "../math/types.js";

/** Backend color: channels 0-255, alpha 0-1 with opacity already applied. */
export type Rgba8 = {
  r: number;
  g: number;
  b: number;
  a: number;
};

export type LineCap = "flat" | "round" | "padded";

export type LineJoin = "smooth" | "sharp" | "clipped";

export type DrawCommandBase = {
  transform: Transform2D;
  /** Active clip region in surface pixels, `null` when nothing is cropped. */
  scissor: Rect | null;
};

export type StrokeStyle = {
  width: number;
  cap: LineCap;
  join: LineJoin;
  miterLimit: number;
};

export type StrokeCommand = DrawCommandBase &
  StrokeStyle & {
    kind: "stroke";
    points: Point[];
    closed: boolean;
    color: Rgba8;
  };

export type PolygonCommand = DrawCommandBase & {
  kind: "polygon";
  points: Point[];
  color: Rgba8;
};

export type TexturedPolygonCommand = DrawCommandBase & {
  kind: "texturedPolygon";
  points: Point[];
  path: string;
  alpha: number;
};

export type GradientStop = {
  offset: number;
  color: Rgba8;
};

export type GradientFill =
  | { kind: "linear"; start: Point; end: Point; stops: GradientStop[] }
  | {
      kind: "radial";
      start: Point;
      startRadius: number;
      end: Point;
      endRadius: number;
      stops: GradientStop[];
    };

export type GradientPolygonCommand = DrawCommandBase & {
  kind: "gradientPolygon";
  points: Point[];
  gradient: GradientFill;
};

export type ImageFit = "plain" | "fitted" | "cropped" | "tiled";

/**
 * An image centered on the local origin. `source` cuts a rectangle out of the
 * image (sprite sheets, cropped images).
 */
export type ImageCommand = DrawCommandBase & {
  kind: "image";
  path: string;
  width: number;
  height: number;
  fit: ImageFit;
  source: Rect | null;
  alpha: number;
};

export type ClearCommand = {
  kind: "clear";
  color: Rgba8;
  scissor: Rect | null;
};

export type TextLine = "under" | "over" | "through";

export type GlyphStyle = {
  typeface: string | null;
  height: number;
  bold: boolean;
  italic: boolean;
  monospace: boolean;
  line: TextLine | null;
};

/**
 * A single run of glyphs. The transform places the run's baseline origin in a
 * y-down space.
 */
export type TextCommand = DrawCommandBase & {
  kind: "text";
  text: string;
  style: GlyphStyle;
  color: Rgba8;
  outline: StrokeStyle | null;
};

export type DrawCommand =
  | StrokeCommand
  | PolygonCommand
  | TexturedPolygonCommand
  | GradientPolygonCommand
  | ImageCommand
  | ClearCommand
  | TextCommand;
