import type {
  ClearCommand,
  GlyphStyle,
  GradientPolygonCommand,
  ImageCommand,
  PolygonCommand,
  StrokeCommand,
  TexturedPolygonCommand,
  TextCommand
} from "../scene/drawCommands.js";

/**
 * Receives the primitives produced by a traversal. The optional members are
 * extension capabilities; drawing a primitive whose capability is missing fails.
 */
export interface PrimitiveSink {
  stroke(command: StrokeCommand): void;
  fillPolygon(command: PolygonCommand): void;
  clear(command: ClearCommand): void;

  fillTexture?(command: TexturedPolygonCommand): void;
  fillGradient?(command: GradientPolygonCommand): void;
  drawImage?(command: ImageCommand): void;
}

/** Character metrics and glyph drawing. */
export interface TextMeasurer {
  textWidth(text: string, style: GlyphStyle): number;
  fillText(command: TextCommand): void;
  strokeText?(command: TextCommand): void;
}
