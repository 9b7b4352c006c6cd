import { Button, Slider, Space, Typography } from "antd";
import { CaretRightOutlined, PauseOutlined, ReloadOutlined } from "@ant-design/icons";
import { Topics, type EventBus } from "@collage/event-bus";
import { useEffect, useState } from "react";

export type ControlPanelProps = {
  bus: EventBus;
};

export function ControlPanel({ bus }: ControlPanelProps) {
  const [running, setRunning] = useState<boolean>(true);
  const [speed, setSpeed] = useState<number>(1);

  useEffect(() => {
    return bus.subscribe(Topics.ANIMATION_TOGGLED, (payload) => {
      setRunning(payload.running);
    });
  }, [bus]);

  const onSpeedChange = (value: number) => {
    setSpeed(value);
    bus.publish(Topics.ANIMATION_SPEED_CHANGED, { speed: value });
  };

  return (
    <div style={{ height: "100%", display: "flex", alignItems: "center", padding: "0 12px" }}>
      <Space size="middle">
        <Button
          type="primary"
          icon={running ? <PauseOutlined /> : <CaretRightOutlined />}
          onClick={() => bus.publish(Topics.UI_COMMAND, { command: "toggle-animation" })}
        >
          {running ? "Pause" : "Play"}
        </Button>
        <Button icon={<ReloadOutlined />} onClick={() => bus.publish(Topics.UI_COMMAND, { command: "reset-clock" })}>
          Reset clock
        </Button>
        <Typography.Text style={{ color: "rgba(255,255,255,0.65)" }}>Speed</Typography.Text>
        <Slider min={0} max={4} step={0.25} value={speed} onChange={onSpeedChange} style={{ width: 160 }} />
        <Typography.Text style={{ color: "rgba(255,255,255,0.65)" }}>{speed.toFixed(2)}x</Typography.Text>
      </Space>
    </div>
  );
}
