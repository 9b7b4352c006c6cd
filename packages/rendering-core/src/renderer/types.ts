import type { DrawCommand } from "../scene/drawCommands.js";
import type { PrimitiveSink, TextMeasurer } from "./PrimitiveSink.js";

export type RendererError = {
  message: string;
  commandKind?: DrawCommand["kind"];
  commandIndex?: number;
  cause?: unknown;
};

export type RendererDiagnostics = {
  lastFrameMs: number;
  lastCommandCount: number;
  lastDrawCalls: number;
  lastCulledElements: number;
  lastRenderedAt: number;
};

export type ImageSource = HTMLImageElement | HTMLCanvasElement | ImageBitmap;

export type RendererOptions = {
  backgroundColor?: string;
  devicePixelRatio?: number;
  /** Resolves texture and image paths to something drawable. */
  resolveImage?: (path: string) => ImageSource | null;
  onError?: (error: RendererError) => void;
  onFrame?: (diagnostics: RendererDiagnostics) => void;
};

/** The virtual drawing surface, in view units, centered on the origin. */
export type Viewport = {
  width: number;
  height: number;
  pixelRatio?: number;
};

export type DrawDiagnostics = {
  commandCount: number;
  culledElements: number;
  skippedTexts: number;
};

export type FrameInfo = {
  /** Seconds of animation time since the loop started. */
  seconds: number;
  viewport: Viewport;
};

export type RenderTarget = {
  sink: PrimitiveSink;
  measurer: TextMeasurer;
  viewport: Viewport;
};

export type SceneRenderer = (target: RenderTarget, frame: FrameInfo) => DrawDiagnostics;
