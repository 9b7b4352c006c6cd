export type UICommand = "toggle-animation" | "reset-clock" | "clear-log";

export type UICommandPayload = {
  command: UICommand;
  params?: Record<string, unknown>;
};

export type AnimationToggledPayload = {
  running: boolean;
};

export type AnimationSpeedChangedPayload = {
  speed: number;
};

export type CanvasResizedPayload = {
  width: number;
  height: number;
  devicePixelRatio: number;
};

export type FrameRenderedPayload = {
  frameMs: number;
  fps: number;
  commandCount: number;
  drawCalls: number;
  culledElements: number;
};

export type DrawWarningPayload = {
  code: string;
  message: string;
};

export type RenderErrorPayload = {
  message: string;
  commandKind?: string;
  commandIndex?: number;
};

export type LogEventPayload = {
  topic: string;
  payload: unknown;
};

type TopicsConst = typeof import("./topics.js").Topics;

export type TopicPayloadMap = {
  [K in TopicsConst["UI_COMMAND"]]: UICommandPayload;
} & {
  [K in TopicsConst["ANIMATION_TOGGLED"]]: AnimationToggledPayload;
} & {
  [K in TopicsConst["ANIMATION_SPEED_CHANGED"]]: AnimationSpeedChangedPayload;
} & {
  [K in TopicsConst["CANVAS_RESIZED"]]: CanvasResizedPayload;
} & {
  [K in TopicsConst["FRAME_RENDERED"]]: FrameRenderedPayload;
} & {
  [K in TopicsConst["DRAW_WARNING"]]: DrawWarningPayload;
} & {
  [K in TopicsConst["RENDER_ERROR"]]: RenderErrorPayload;
} & {
  [K in TopicsConst["LOG_EVENT"]]: LogEventPayload;
};

export type KnownTopic = keyof TopicPayloadMap;
