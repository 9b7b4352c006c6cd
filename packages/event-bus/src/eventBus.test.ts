import { test, describe } from 'node:test';
import assert from 'node:assert';
import { EventBus, createEventLoggerMiddleware, type EventBusMiddleware } from './eventBus.js';
import type { LogEventPayload } from './payloads.js';
import { Topics } from './topics.js';

describe('EventBus', () => {
  test('delivers payloads to every subscriber of a topic', () => {
    const bus = new EventBus();
    const received: number[] = [];

    bus.subscribe(Topics.ANIMATION_SPEED_CHANGED, (p) => received.push(p.speed));
    bus.subscribe(Topics.ANIMATION_SPEED_CHANGED, (p) => received.push(p.speed * 10));
    bus.publish(Topics.ANIMATION_SPEED_CHANGED, { speed: 2 });
    bus.publish(Topics.ANIMATION_TOGGLED, { running: false });

    assert.deepStrictEqual(received, [2, 20]);
  });

  test('unsubscribe stops delivery', () => {
    const bus = new EventBus();
    let calls = 0;
    const off = bus.subscribe(Topics.ANIMATION_TOGGLED, () => calls++);

    bus.publish(Topics.ANIMATION_TOGGLED, { running: true });
    off();
    bus.publish(Topics.ANIMATION_TOGGLED, { running: false });

    assert.strictEqual(calls, 1);
  });

  test('a handler may unsubscribe itself while dispatching', () => {
    const bus = new EventBus();
    const order: string[] = [];
    const first = () => {
      order.push('first');
      bus.unsubscribe(Topics.UI_COMMAND, first);
    };
    bus.subscribe(Topics.UI_COMMAND, first);
    bus.subscribe(Topics.UI_COMMAND, () => order.push('second'));

    bus.publish(Topics.UI_COMMAND, { command: 'reset-clock' });
    bus.publish(Topics.UI_COMMAND, { command: 'reset-clock' });

    assert.deepStrictEqual(order, ['first', 'second', 'second']);
  });

  test('middlewares run in order and can stop an event', () => {
    const order: string[] = [];
    const outer: EventBusMiddleware = (event, next) => {
      order.push(`outer:${event.topic}`);
      next();
    };
    const gate: EventBusMiddleware = (event, next) => {
      order.push(`gate:${event.topic}`);
      if (event.topic !== Topics.RENDER_ERROR) next();
    };
    const bus = new EventBus({ middlewares: [outer, gate] });
    bus.subscribe(Topics.DRAW_WARNING, (p) => order.push(`handler:${p.code}`));
    bus.subscribe(Topics.RENDER_ERROR, () => order.push('handler:error'));

    bus.publish(Topics.DRAW_WARNING, { code: 'crop-empty', message: 'culled' });
    bus.publish(Topics.RENDER_ERROR, { message: 'failed' });

    assert.deepStrictEqual(order, [
      'outer:render:warning',
      'gate:render:warning',
      'handler:crop-empty',
      'outer:render:error',
      'gate:render:error'
    ]);
  });

  test('logger middleware republishes events after dispatch', () => {
    const bus = new EventBus({
      middlewares: [
        createEventLoggerMiddleware({ logTopic: Topics.LOG_EVENT, ignoreTopics: [Topics.FRAME_RENDERED] })
      ]
    });
    const order: string[] = [];
    const logged: LogEventPayload[] = [];
    bus.subscribe(Topics.ANIMATION_TOGGLED, () => order.push('handler'));
    bus.subscribe(Topics.LOG_EVENT, (p) => {
      order.push('log');
      logged.push(p);
    });

    bus.publish(Topics.ANIMATION_TOGGLED, { running: true });
    bus.publish(Topics.FRAME_RENDERED, { frameMs: 1, fps: 60, commandCount: 3, drawCalls: 3, culledElements: 0 });

    assert.deepStrictEqual(order, ['handler', 'log']);
    assert.deepStrictEqual(logged, [{ topic: 'animation:toggled', payload: { running: true } }]);
  });

  test('use() appends a middleware', () => {
    const bus = new EventBus();
    const seen: string[] = [];
    bus.use((event, next) => {
      seen.push(event.topic);
      next();
    });
    bus.publish(Topics.CANVAS_RESIZED, { width: 10, height: 10, devicePixelRatio: 1 });
    assert.deepStrictEqual(seen, ['canvas:resized']);
  });

  test('destroy removes handlers and middlewares', () => {
    let calls = 0;
    const bus = new EventBus({ middlewares: [(_e, next) => { calls++; next(); }] });
    bus.subscribe(Topics.ANIMATION_TOGGLED, () => calls++);
    bus.destroy();
    bus.publish(Topics.ANIMATION_TOGGLED, { running: true });
    assert.strictEqual(calls, 0);
  });
});
