import type { RendererDiagnostics, RendererOptions, SceneRenderer } from "./types.js";

export interface IRenderer2D {
  init(canvas: HTMLCanvasElement, options?: RendererOptions): void;
  setScene(scene: SceneRenderer): void;
  render(): void;
  startLoop(): void;
  stopLoop(): void;
  resize(width: number, height: number): void;
  destroy(): void;
  getDiagnostics(): RendererDiagnostics;
}
