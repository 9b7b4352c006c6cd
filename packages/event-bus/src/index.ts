export type {
  AnimationSpeedChangedPayload,
  AnimationToggledPayload,
  CanvasResizedPayload,
  DrawWarningPayload,
  FrameRenderedPayload,
  KnownTopic,
  LogEventPayload,
  RenderErrorPayload,
  TopicPayloadMap,
  UICommand,
  UICommandPayload
} from "./payloads.js";
export type { EventBusHandler, EventBusMiddleware, EventBusTopic, Unsubscribe } from "./eventBus.js";
export { EventBus, createEventBus, createEventLoggerMiddleware } from "./eventBus.js";
export { Topics } from "./topics.js";
