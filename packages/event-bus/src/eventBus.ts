import type { KnownTopic, TopicPayloadMap } from "./payloads.js";

export type EventBusTopic = KnownTopic | (string & {});

export type EventBusHandler<TPayload = unknown> = (payload: TPayload) => void;

export type Unsubscribe = () => void;

export type EventBusMiddleware = (
  event: {
    topic: EventBusTopic;
    payload: unknown;
  },
  next: () => void,
  bus: EventBus,
) => void;

export class EventBus {
  private handlersByTopic = new Map<EventBusTopic, Set<EventBusHandler>>();
  private middlewares: EventBusMiddleware[] = [];

  constructor(options?: { middlewares?: EventBusMiddleware[] }) {
    this.middlewares = options?.middlewares ?? [];
  }

  use(middleware: EventBusMiddleware): void {
    this.middlewares.push(middleware);
  }

  subscribe<TTopic extends KnownTopic>(
    topic: TTopic,
    handler: EventBusHandler<TopicPayloadMap[TTopic]>,
  ): Unsubscribe;
  subscribe<TPayload>(topic: EventBusTopic, handler: EventBusHandler<TPayload>): Unsubscribe;
  subscribe(topic: EventBusTopic, handler: EventBusHandler): Unsubscribe {
    const set = this.handlersByTopic.get(topic) ?? new Set<EventBusHandler>();
    set.add(handler);
    this.handlersByTopic.set(topic, set);

    return () => {
      this.unsubscribe(topic, handler);
    };
  }

  unsubscribe<TTopic extends KnownTopic>(
    topic: TTopic,
    handler: EventBusHandler<TopicPayloadMap[TTopic]>,
  ): void;
  unsubscribe<TPayload>(topic: EventBusTopic, handler: EventBusHandler<TPayload>): void;
  unsubscribe(topic: EventBusTopic, handler: EventBusHandler): void {
    const set = this.handlersByTopic.get(topic);
    if (!set) return;
    set.delete(handler);
    if (set.size === 0) this.handlersByTopic.delete(topic);
  }

  publish<TTopic extends KnownTopic>(topic: TTopic, payload: TopicPayloadMap[TTopic]): void;
  publish<TPayload>(topic: EventBusTopic, payload: TPayload): void;
  publish(topic: EventBusTopic, payload: unknown): void {
    const event = { topic, payload };

    const dispatch = () => {
      const set = this.handlersByTopic.get(topic);
      if (!set) return;
      for (const handler of [...set]) {
        handler(payload);
      }
    };

    if (this.middlewares.length === 0) {
      dispatch();
      return;
    }

    let index = -1;
    const run = (i: number) => {
      if (i <= index) return;
      index = i;
      const middleware = this.middlewares[i];
      if (!middleware) {
        dispatch();
        return;
      }
      middleware(event, () => run(i + 1), this);
    };

    run(0);
  }

  destroy(): void {
    this.handlersByTopic.clear();
    this.middlewares = [];
  }
}

export function createEventBus(options?: { middlewares?: EventBusMiddleware[] }): EventBus {
  return new EventBus(options);
}

/**
 * Republishes every event on `logTopic` after it has been dispatched. Events on
 * `logTopic` itself are never logged.
 */
export function createEventLoggerMiddleware(options: {
  ignoreTopics?: EventBusTopic[];
  logTopic: EventBusTopic;
}): EventBusMiddleware {
  const ignore = new Set(options.ignoreTopics ?? []);

  return (event, next, bus) => {
    next();

    if (event.topic === options.logTopic || ignore.has(event.topic)) return;

    bus.publish(options.logTopic, { topic: event.topic, payload: event.payload });
  };
}
