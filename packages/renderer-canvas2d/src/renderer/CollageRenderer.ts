import type {
  IRenderer2D,
  RendererDiagnostics,
  RendererOptions,
  SceneRenderer,
  Viewport
} from "@collage/rendering-core";
import { Canvas2DSink } from "./Canvas2DSink.js";

type FrameHandle = { kind: "raf"; id: number } | { kind: "timeout"; id: ReturnType<typeof setTimeout> };

const FALLBACK_FRAME_MS = 16;

function nowMs(): number {
  return typeof performance !== "undefined" && typeof performance.now === "function"
    ? performance.now()
    : Date.now();
}

function getDevicePixelRatio(options: RendererOptions | undefined): number {
  if (options?.devicePixelRatio != null) return Math.max(1, options.devicePixelRatio);
  const dpr =
    typeof window !== "undefined" && typeof window.devicePixelRatio === "number"
      ? window.devicePixelRatio
      : 1;
  return Math.max(1, dpr);
}

/**
 * Owns a canvas and redraws a scene on it, once per `render()` or every frame
 * while the loop runs. Scene time only advances while the loop is running.
 */
export class CollageRenderer implements IRenderer2D {
  private canvas: HTMLCanvasElement | null = null;
  private ctx: CanvasRenderingContext2D | null = null;
  private options: RendererOptions = {};
  private dpr = 1;
  private width = 0;
  private height = 0;

  private scene: SceneRenderer | null = null;
  private frame: FrameHandle | null = null;
  private running = false;

  private seconds = 0;
  private lastTick: number | null = null;
  private timeScale = 1;

  private diagnostics: RendererDiagnostics = {
    lastFrameMs: 0,
    lastCommandCount: 0,
    lastDrawCalls: 0,
    lastCulledElements: 0,
    lastRenderedAt: 0
  };

  init(canvas: HTMLCanvasElement, options?: RendererOptions): void {
    this.canvas = canvas;
    this.options = options ?? {};
    this.dpr = getDevicePixelRatio(this.options);

    const ctx = canvas.getContext("2d");
    if (!ctx) {
      this.options.onError?.({ message: "Canvas2D context not available" });
      this.ctx = null;
      return;
    }
    this.ctx = ctx;
    this.resize(canvas.clientWidth || canvas.width, canvas.clientHeight || canvas.height);
  }

  setScene(scene: SceneRenderer): void {
    this.scene = scene;
  }

  /** Scales how fast scene time passes; 0 freezes it. */
  setTimeScale(scale: number): void {
    this.timeScale = Math.max(0, scale);
  }

  resetClock(): void {
    this.seconds = 0;
    this.lastTick = this.running ? nowMs() : null;
  }

  get viewport(): Viewport {
    return { width: this.width, height: this.height, pixelRatio: this.dpr };
  }

  render(): void {
    const ctx = this.ctx;
    if (!ctx) return;

    const start = nowMs();
    const viewport = this.viewport;
    this.clearSurface(ctx);

    const sink = new Canvas2DSink(ctx, viewport, this.options);
    let culled = 0;
    if (this.scene) {
      try {
        culled = this.scene({ sink, measurer: sink, viewport }, { seconds: this.seconds, viewport }).culledElements;
      } catch (cause) {
        this.options.onError?.({ message: "Scene render failed", cause });
      }
    }

    const end = nowMs();
    this.diagnostics = {
      lastFrameMs: end - start,
      lastCommandCount: sink.commandCount,
      lastDrawCalls: sink.drawCalls,
      lastCulledElements: culled,
      lastRenderedAt: Date.now()
    };
    this.options.onFrame?.(this.diagnostics);
  }

  startLoop(): void {
    if (this.running) return;
    this.running = true;
    this.lastTick = nowMs();
    const loop = (): void => {
      if (!this.running) return;
      this.tick();
      this.render();
      this.frame = this.requestFrame(loop);
    };
    this.frame = this.requestFrame(loop);
  }

  stopLoop(): void {
    this.running = false;
    this.lastTick = null;
    if (this.frame != null) {
      this.cancelFrame(this.frame);
      this.frame = null;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  resize(width: number, height: number): void {
    if (!this.canvas || !this.ctx) return;

    const w = Math.max(0, Math.floor(width));
    const h = Math.max(0, Math.floor(height));
    this.width = w;
    this.height = h;

    this.canvas.style.width = `${w}px`;
    this.canvas.style.height = `${h}px`;

    const pixelW = Math.max(1, Math.floor(w * this.dpr));
    const pixelH = Math.max(1, Math.floor(h * this.dpr));
    if (this.canvas.width !== pixelW) this.canvas.width = pixelW;
    if (this.canvas.height !== pixelH) this.canvas.height = pixelH;

    this.ctx.setTransform(this.dpr, 0, 0, this.dpr, 0, 0);
  }

  destroy(): void {
    this.stopLoop();
    this.canvas = null;
    this.ctx = null;
    this.scene = null;
  }

  getDiagnostics(): RendererDiagnostics {
    return this.diagnostics;
  }

  private tick(): void {
    const now = nowMs();
    if (this.lastTick != null) this.seconds += ((now - this.lastTick) / 1000) * this.timeScale;
    this.lastTick = now;
  }

  private clearSurface(ctx: CanvasRenderingContext2D): void {
    const pixelW = this.width * this.dpr;
    const pixelH = this.height * this.dpr;
    ctx.setTransform(1, 0, 0, 1, 0, 0);
    ctx.clearRect(0, 0, pixelW, pixelH);
    const bg = this.options.backgroundColor;
    if (bg) {
      ctx.save();
      ctx.globalAlpha = 1;
      ctx.fillStyle = bg;
      ctx.fillRect(0, 0, pixelW, pixelH);
      ctx.restore();
    }
  }

  private requestFrame(cb: () => void): FrameHandle {
    if (typeof requestAnimationFrame === "function") return { kind: "raf", id: requestAnimationFrame(cb) };
    return { kind: "timeout", id: setTimeout(cb, FALLBACK_FRAME_MS) };
  }

  private cancelFrame(handle: FrameHandle): void {
    if (handle.kind === "raf") cancelAnimationFrame(handle.id);
    else clearTimeout(handle.id);
  }
}
