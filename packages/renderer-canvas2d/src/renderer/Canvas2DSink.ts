import type {
  ClearCommand,
  DrawCommand,
  GlyphStyle,
  GradientPolygonCommand,
  ImageCommand,
  ImageSource,
  LineCap,
  LineJoin,
  Point,
  PolygonCommand,
  PrimitiveSink,
  Rect,
  RendererOptions,
  Rgba8,
  StrokeCommand,
  StrokeStyle,
  TextCommand,
  TextMeasurer,
  TexturedPolygonCommand,
  Transform2D,
  Viewport
} from "@collage/rendering-core";

const LINE_CAPS: Record<LineCap, CanvasLineCap> = {
  flat: "butt",
  round: "round",
  padded: "square"
};

const LINE_JOINS: Record<LineJoin, CanvasLineJoin> = {
  smooth: "round",
  sharp: "miter",
  clipped: "bevel"
};

export function rgbaString(color: Rgba8): string {
  const a = Math.min(1, Math.max(0, color.a));
  return `rgba(${color.r}, ${color.g}, ${color.b}, ${a})`;
}

export function fontString(style: GlyphStyle): string {
  const family = style.monospace ? "monospace" : (style.typeface ?? "sans-serif");
  const parts = [style.italic ? "italic" : null, style.bold ? "bold" : null, `${style.height}px`, family];
  return parts.filter((p) => p != null).join(" ");
}

/** Maps view space (center origin, y up) onto device pixels. */
export function viewTransform(viewport: Viewport): Transform2D {
  const r = viewport.pixelRatio ?? 1;
  return { a: r, b: 0, c: 0, d: -r, e: (viewport.width / 2) * r, f: (viewport.height / 2) * r };
}

function compose(m: Transform2D, n: Transform2D): Transform2D {
  return {
    a: m.a * n.a + m.c * n.b,
    b: m.b * n.a + m.d * n.b,
    c: m.a * n.c + m.c * n.d,
    d: m.b * n.c + m.d * n.d,
    e: m.a * n.e + m.c * n.f + m.e,
    f: m.b * n.e + m.d * n.f + m.f
  };
}

function imageSize(image: ImageSource): { width: number; height: number } {
  if ("naturalWidth" in image) return { width: image.naturalWidth, height: image.naturalHeight };
  return { width: image.width, height: image.height };
}

/**
 * Draws primitives on a 2D context and measures text with it. A command that
 * fails is reported through `onError` and skipped; the context state is
 * restored either way.
 */
export class Canvas2DSink implements PrimitiveSink, TextMeasurer {
  private readonly view: Transform2D;
  private commandIndex = 0;
  private calls = 0;

  constructor(
    private readonly ctx: CanvasRenderingContext2D,
    private readonly viewport: Viewport,
    private readonly options: RendererOptions = {},
  ) {
    this.view = viewTransform(viewport);
  }

  get commandCount(): number {
    return this.commandIndex;
  }

  get drawCalls(): number {
    return this.calls;
  }

  stroke(command: StrokeCommand): void {
    this.run(command, (ctx) => {
      this.place(ctx, command.transform);
      this.applyStroke(ctx, command);
      this.tracePath(ctx, command.points, command.closed);
      ctx.strokeStyle = rgbaString(command.color);
      ctx.stroke();
      this.calls++;
    });
  }

  fillPolygon(command: PolygonCommand): void {
    this.run(command, (ctx) => {
      this.place(ctx, command.transform);
      this.tracePath(ctx, command.points, true);
      ctx.fillStyle = rgbaString(command.color);
      ctx.fill();
      this.calls++;
    });
  }

  clear(command: ClearCommand): void {
    this.run(command, (ctx) => {
      const { width, height } = this.surfaceSize();
      ctx.setTransform(1, 0, 0, 1, 0, 0);
      ctx.clearRect(0, 0, width, height);
      ctx.fillStyle = rgbaString(command.color);
      ctx.fillRect(0, 0, width, height);
      this.calls++;
    });
  }

  fillTexture(command: TexturedPolygonCommand): void {
    this.run(command, (ctx) => {
      const pattern = ctx.createPattern(this.image(command.path), "repeat");
      if (!pattern) throw new Error(`Could not create a pattern for "${command.path}"`);
      this.place(ctx, command.transform);
      this.tracePath(ctx, command.points, true);
      ctx.globalAlpha = command.alpha;
      ctx.fillStyle = pattern;
      ctx.fill();
      this.calls++;
    });
  }

  fillGradient(command: GradientPolygonCommand): void {
    this.run(command, (ctx) => {
      this.place(ctx, command.transform);
      const g = command.gradient;
      const gradient =
        g.kind === "linear"
          ? ctx.createLinearGradient(g.start.x, g.start.y, g.end.x, g.end.y)
          : ctx.createRadialGradient(g.start.x, g.start.y, g.startRadius, g.end.x, g.end.y, g.endRadius);
      for (const stop of g.stops) {
        gradient.addColorStop(Math.min(1, Math.max(0, stop.offset)), rgbaString(stop.color));
      }
      this.tracePath(ctx, command.points, true);
      ctx.fillStyle = gradient;
      ctx.fill();
      this.calls++;
    });
  }

  drawImage(command: ImageCommand): void {
    this.run(command, (ctx) => {
      const image = this.image(command.path);
      const { width: w, height: h } = command;
      this.place(ctx, command.transform);
      // Pictures are stored y-down.
      ctx.scale(1, -1);
      ctx.globalAlpha = command.alpha;

      switch (command.fit) {
        case "plain":
          ctx.drawImage(image, -w / 2, -h / 2, w, h);
          break;
        case "cropped": {
          const s = command.source ?? { x: 0, y: 0, ...imageSize(image) };
          ctx.drawImage(image, s.x, s.y, s.width, s.height, -w / 2, -h / 2, w, h);
          break;
        }
        case "fitted": {
          const natural = imageSize(image);
          const scale = Math.max(w / natural.width, h / natural.height);
          const sw = w / scale;
          const sh = h / scale;
          ctx.drawImage(image, (natural.width - sw) / 2, (natural.height - sh) / 2, sw, sh, -w / 2, -h / 2, w, h);
          break;
        }
        case "tiled": {
          const pattern = ctx.createPattern(image, "repeat");
          if (!pattern) throw new Error(`Could not create a pattern for "${command.path}"`);
          ctx.translate(-w / 2, -h / 2);
          ctx.fillStyle = pattern;
          ctx.fillRect(0, 0, w, h);
          break;
        }
      }
      this.calls++;
    });
  }

  textWidth(text: string, style: GlyphStyle): number {
    const ctx = this.ctx;
    const prevFont = ctx.font;
    ctx.font = fontString(style);
    try {
      return ctx.measureText(text).width;
    } finally {
      ctx.font = prevFont;
    }
  }

  fillText(command: TextCommand): void {
    this.run(command, (ctx) => {
      this.placeText(ctx, command);
      ctx.fillStyle = rgbaString(command.color);
      ctx.fillText(command.text, 0, 0);
      this.calls++;
      this.drawTextLine(ctx, command);
    });
  }

  strokeText(command: TextCommand): void {
    this.run(command, (ctx) => {
      this.placeText(ctx, command);
      if (command.outline) this.applyStroke(ctx, command.outline);
      ctx.strokeStyle = rgbaString(command.color);
      ctx.strokeText(command.text, 0, 0);
      this.calls++;
      this.drawTextLine(ctx, command);
    });
  }

  private run(command: DrawCommand, draw: (ctx: CanvasRenderingContext2D) => void): void {
    const index = this.commandIndex++;
    const ctx = this.ctx;
    ctx.save();
    try {
      this.applyScissor(ctx, command.scissor);
      draw(ctx);
    } catch (cause) {
      this.options.onError?.({
        message: `Failed to draw ${command.kind} command`,
        commandKind: command.kind,
        commandIndex: index,
        cause
      });
    } finally {
      ctx.restore();
    }
  }

  private surfaceSize(): { width: number; height: number } {
    const r = this.viewport.pixelRatio ?? 1;
    return { width: this.viewport.width * r, height: this.viewport.height * r };
  }

  private applyScissor(ctx: CanvasRenderingContext2D, scissor: Rect | null): void {
    if (!scissor) return;
    ctx.setTransform(1, 0, 0, 1, 0, 0);
    ctx.beginPath();
    ctx.rect(scissor.x, scissor.y, scissor.width, scissor.height);
    ctx.clip();
  }

  private place(ctx: CanvasRenderingContext2D, transform: Transform2D): void {
    const m = compose(this.view, transform);
    ctx.setTransform(m.a, m.b, m.c, m.d, m.e, m.f);
  }

  private applyStroke(ctx: CanvasRenderingContext2D, style: StrokeStyle): void {
    ctx.lineWidth = style.width;
    ctx.lineCap = LINE_CAPS[style.cap];
    ctx.lineJoin = LINE_JOINS[style.join];
    ctx.miterLimit = style.miterLimit;
    ctx.setLineDash([]);
  }

  private tracePath(ctx: CanvasRenderingContext2D, points: readonly Point[], closed: boolean): void {
    ctx.beginPath();
    points.forEach((p, i) => {
      if (i === 0) ctx.moveTo(p.x, p.y);
      else ctx.lineTo(p.x, p.y);
    });
    if (closed) ctx.closePath();
  }

  private placeText(ctx: CanvasRenderingContext2D, command: TextCommand): void {
    this.place(ctx, command.transform);
    ctx.font = fontString(command.style);
    ctx.textAlign = "left";
    ctx.textBaseline = "alphabetic";
  }

  private drawTextLine(ctx: CanvasRenderingContext2D, command: TextCommand): void {
    const line = command.style.line;
    if (!line) return;
    const size = command.style.height;
    const thickness = Math.max(1, size / 15);
    const y = line === "under" ? size * 0.1 : line === "over" ? -size * 0.9 : -size * 0.3;
    const width = ctx.measureText(command.text).width;
    ctx.fillStyle = rgbaString(command.color);
    ctx.fillRect(0, y, width, thickness);
    this.calls++;
  }

  private image(path: string): ImageSource {
    const image = this.options.resolveImage?.(path) ?? null;
    if (!image) throw new Error(`Image "${path}" is not available`);
    return image;
  }
}
