import { Topics, createEventBus, createEventLoggerMiddleware } from "@collage/event-bus";

export const bus = createEventBus({
  middlewares: [
    createEventLoggerMiddleware({
      ignoreTopics: [Topics.FRAME_RENDERED, Topics.CANVAS_RESIZED],
      logTopic: Topics.LOG_EVENT
    })
  ]
});
