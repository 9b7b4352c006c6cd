import { useEffect, useRef } from "react";
import { Topics, type EventBus } from "@collage/event-bus";
import { CollageRenderer } from "@collage/renderer-canvas2d";
import { createDemoScene } from "../scenes/demoScene.js";

export type CanvasContainerProps = {
  bus: EventBus;
};

export function CanvasContainer({ bus }: CanvasContainerProps) {
  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const containerRef = useRef<HTMLDivElement | null>(null);

  useEffect(() => {
    const canvas = canvasRef.current;
    const container = containerRef.current;
    if (!canvas || !container) return;

    let lastFrameAt: number | null = null;
    const renderer = new CollageRenderer();
    renderer.init(canvas, {
      backgroundColor: "#111",
      onError: (error) => {
        bus.publish(Topics.RENDER_ERROR, {
          message: error.message,
          commandKind: error.commandKind,
          commandIndex: error.commandIndex
        });
      },
      onFrame: (diagnostics) => {
        const fps = lastFrameAt != null && diagnostics.lastRenderedAt > lastFrameAt
          ? 1000 / (diagnostics.lastRenderedAt - lastFrameAt)
          : 0;
        lastFrameAt = diagnostics.lastRenderedAt;
        bus.publish(Topics.FRAME_RENDERED, {
          frameMs: diagnostics.lastFrameMs,
          fps,
          commandCount: diagnostics.lastCommandCount,
          drawCalls: diagnostics.lastDrawCalls,
          culledElements: diagnostics.lastCulledElements
        });
      }
    });
    renderer.setScene(createDemoScene((warning) => bus.publish(Topics.DRAW_WARNING, warning)));

    const redrawIfPaused = () => {
      if (!renderer.isRunning()) renderer.render();
    };

    const unsubResize = bus.subscribe(Topics.CANVAS_RESIZED, (payload) => {
      renderer.resize(payload.width, payload.height);
      redrawIfPaused();
    });

    const unsubSpeed = bus.subscribe(Topics.ANIMATION_SPEED_CHANGED, (payload) => {
      renderer.setTimeScale(payload.speed);
    });

    const unsubCommand = bus.subscribe(Topics.UI_COMMAND, (payload) => {
      if (payload.command === "toggle-animation") {
        if (renderer.isRunning()) renderer.stopLoop();
        else renderer.startLoop();
        bus.publish(Topics.ANIMATION_TOGGLED, { running: renderer.isRunning() });
      }

      if (payload.command === "reset-clock") {
        renderer.resetClock();
        redrawIfPaused();
      }
    });

    const publishSize = () => {
      const rect = container.getBoundingClientRect();
      if (rect.width <= 0 || rect.height <= 0) return;
      bus.publish(Topics.CANVAS_RESIZED, {
        width: rect.width,
        height: rect.height,
        devicePixelRatio: window.devicePixelRatio || 1
      });
    };

    const observer = new ResizeObserver(() => {
      publishSize();
    });
    observer.observe(container);
    publishSize();

    renderer.startLoop();
    bus.publish(Topics.ANIMATION_TOGGLED, { running: true });

    return () => {
      observer.disconnect();
      unsubResize();
      unsubSpeed();
      unsubCommand();
      renderer.destroy();
    };
  }, [bus]);

  return (
    <div ref={containerRef} style={{ width: "100%", height: "100%", position: "relative", overflow: "hidden" }}>
      <canvas ref={canvasRef} style={{ display: "block", position: "absolute", inset: 0 }} />
    </div>
  );
}
