import type { EventBus } from "@collage/event-bus";
import { CanvasContainer } from "./CanvasContainer.js";
import { ControlPanel } from "./ControlPanel.js";
import { LogPanel } from "./LogPanel.js";
import { StatusBar } from "./StatusBar.js";

export type DemoLayoutProps = {
  bus: EventBus;
};

export function DemoLayout({ bus }: DemoLayoutProps) {
  return (
    <div style={{ height: "100%", display: "flex", flexDirection: "column" }}>
      <div style={{ height: 44, borderBottom: "1px solid #303030" }}>
        <ControlPanel bus={bus} />
      </div>
      <div style={{ flex: 1, minHeight: 0 }}>
        <CanvasContainer bus={bus} />
      </div>
      <LogPanel bus={bus} />
      <StatusBar bus={bus} />
    </div>
  );
}
