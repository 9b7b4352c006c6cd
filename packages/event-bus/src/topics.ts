export const Topics = {
  UI_COMMAND: "ui:command",
  ANIMATION_TOGGLED: "animation:toggled",
  ANIMATION_SPEED_CHANGED: "animation:speed-changed",
  CANVAS_RESIZED: "canvas:resized",
  FRAME_RENDERED: "render:frame",
  DRAW_WARNING: "render:warning",
  RENDER_ERROR: "render:error",
  LOG_EVENT: "log:event"
} as const;
