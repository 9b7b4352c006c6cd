export type {
  ClearCommand,
  DrawCommand,
  DrawCommandBase,
  GlyphStyle,
  GradientFill,
  GradientPolygonCommand,
  GradientStop,
  ImageCommand,
  ImageFit,
  LineCap,
  LineJoin,
  PolygonCommand,
  Rgba8,
  StrokeCommand,
  StrokeStyle,
  TextCommand,
  TextLine,
  TexturedPolygonCommand
} from "./scene/drawCommands.js";

export type { Point, Rect, Transform2D } from "./math/types.js";

export type {
  DrawDiagnostics,
  FrameInfo,
  ImageSource,
  RenderTarget,
  RendererDiagnostics,
  RendererError,
  RendererOptions,
  SceneRenderer,
  Viewport
} from "./renderer/types.js";

export type { PrimitiveSink, TextMeasurer } from "./renderer/PrimitiveSink.js";
export type { IRenderer2D } from "./renderer/IRenderer2D.js";
