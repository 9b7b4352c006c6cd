import type {
  ClearCommand,
  DrawDiagnostics,
  GradientPolygonCommand,
  ImageCommand,
  PolygonCommand,
  PrimitiveSink,
  Rect,
  StrokeCommand,
  TextCommand,
  TextMeasurer,
  TexturedPolygonCommand,
  Transform2D,
  Viewport
} from "@collage/rendering-core";
import { identity } from "../math/transform.js";
import { UnsupportedPrimitiveError } from "./errors.js";

export type DrawWarningCode = "text-skipped" | "crop-empty";

export type DrawWarning = {
  code: DrawWarningCode;
  message: string;
};

export type DrawOptions = {
  /** Without one, text is skipped. */
  measurer?: TextMeasurer;
  /** Defaults to the size of the drawn element. */
  viewport?: Viewport;
  onWarning?: (warning: DrawWarning) => void;
};

/** What a node inherits from its ancestors. */
export type DrawState = {
  matrix: Transform2D;
  alpha: number;
  scissor: Rect | null;
};

export function initialState(): DrawState {
  return { matrix: identity(), alpha: 1, scissor: null };
}

/**
 * Wraps the sink and measurer for one draw call and counts what was emitted.
 */
export class RenderContext {
  readonly measurer: TextMeasurer | null;
  private readonly stats: DrawDiagnostics = { commandCount: 0, culledElements: 0, skippedTexts: 0 };

  constructor(
    private readonly sink: PrimitiveSink,
    readonly viewport: Viewport,
    private readonly options: DrawOptions,
  ) {
    this.measurer = options.measurer ?? null;
  }

  diagnostics(): DrawDiagnostics {
    return { ...this.stats };
  }

  stroke(command: StrokeCommand): void {
    this.sink.stroke(command);
    this.stats.commandCount++;
  }

  fillPolygon(command: PolygonCommand): void {
    this.sink.fillPolygon(command);
    this.stats.commandCount++;
  }

  clear(command: ClearCommand): void {
    this.sink.clear(command);
    this.stats.commandCount++;
  }

  fillTexture(command: TexturedPolygonCommand): void {
    const sink = this.sink;
    if (!sink.fillTexture) throw new UnsupportedPrimitiveError("texturedPolygon");
    sink.fillTexture(command);
    this.stats.commandCount++;
  }

  fillGradient(command: GradientPolygonCommand): void {
    const sink = this.sink;
    if (!sink.fillGradient) throw new UnsupportedPrimitiveError("gradientPolygon");
    sink.fillGradient(command);
    this.stats.commandCount++;
  }

  drawImage(command: ImageCommand): void {
    const sink = this.sink;
    if (!sink.drawImage) throw new UnsupportedPrimitiveError("image");
    sink.drawImage(command);
    this.stats.commandCount++;
  }

  fillText(measurer: TextMeasurer, command: TextCommand): void {
    measurer.fillText(command);
    this.stats.commandCount++;
  }

  strokeText(measurer: TextMeasurer, command: TextCommand): void {
    if (!measurer.strokeText) throw new UnsupportedPrimitiveError("outlinedText");
    measurer.strokeText(command);
    this.stats.commandCount++;
  }

  skipText(preview: string): void {
    this.stats.skippedTexts++;
    this.options.onWarning?.({
      code: "text-skipped",
      message: `No text measurer supplied, skipped "${preview}"`
    });
  }

  cull(reason: string): void {
    this.stats.culledElements++;
    this.options.onWarning?.({ code: "crop-empty", message: reason });
  }
}
