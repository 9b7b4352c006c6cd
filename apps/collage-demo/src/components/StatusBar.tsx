import { Tag } from "antd";
import { Topics, type EventBus, type FrameRenderedPayload } from "@collage/event-bus";
import { useEffect, useState } from "react";

export type StatusBarProps = {
  bus: EventBus;
};

export function StatusBar({ bus }: StatusBarProps) {
  const [frame, setFrame] = useState<FrameRenderedPayload | null>(null);
  const [size, setSize] = useState<{ width: number; height: number }>({ width: 0, height: 0 });

  useEffect(() => {
    // Frames arrive at display rate; keep React updates near 4 per second.
    let lastTime = 0;
    return bus.subscribe(Topics.FRAME_RENDERED, (payload) => {
      const now = Date.now();
      if (now - lastTime > 250) {
        setFrame(payload);
        lastTime = now;
      }
    });
  }, [bus]);

  useEffect(() => {
    return bus.subscribe(Topics.CANVAS_RESIZED, (payload) => {
      setSize({ width: payload.width, height: payload.height });
    });
  }, [bus]);

  return (
    <div
      style={{
        height: 28,
        display: "flex",
        alignItems: "center",
        justifyContent: "space-between",
        padding: "0 10px",
        background: "rgba(15, 17, 21, 0.85)",
        borderTop: "1px solid rgba(255,255,255,0.08)"
      }}
    >
      <div style={{ display: "flex", gap: 8, alignItems: "center" }}>
        <Tag color="blue">FPS: {frame ? Math.round(frame.fps) : "-"}</Tag>
        <Tag color="default">Frame: {frame ? `${frame.frameMs.toFixed(1)} ms` : "-"}</Tag>
      </div>
      <div style={{ display: "flex", gap: 8, alignItems: "center" }}>
        <Tag color="default">Commands: {frame?.commandCount ?? 0}</Tag>
        <Tag color="default">Draw calls: {frame?.drawCalls ?? 0}</Tag>
        <Tag color={frame && frame.culledElements > 0 ? "orange" : "default"}>Culled: {frame?.culledElements ?? 0}</Tag>
        <Tag color="default">
          Size: {Math.round(size.width)} x {Math.round(size.height)}
        </Tag>
      </div>
    </div>
  );
}
