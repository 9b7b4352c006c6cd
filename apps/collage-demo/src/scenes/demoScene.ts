import {
  Text,
  charcoal,
  circle,
  collage,
  darkCharcoal,
  dashed,
  drawElement,
  flow,
  gray,
  group,
  lightBlue,
  lightGreen,
  linear,
  middle,
  ngon,
  orange,
  outlinedText,
  rect,
  solid,
  text,
  traced,
  white,
  withWidth,
  yellow,
  type DrawWarning,
  type Element
} from "@collage/graphics";
import type { FrameInfo, SceneRenderer } from "@collage/rendering-core";

const TITLE_HEIGHT = 56;
const CAPTION_HEIGHT = 32;

function title(width: number): Element {
  const label = Text.fromString("collage").height(28).bold().color(white());
  return collage(width, TITLE_HEIGHT, [text(label)]);
}

function stage(width: number, height: number, seconds: number): Element {
  const background = rect(width, height).gradient(
    linear({ x: 0, y: -height / 2 }, { x: 0, y: height / 2 }, [
      [0, darkCharcoal()],
      [1, charcoal()]
    ]),
  );

  const hexagon = group([
    ngon(6, 60).filled(orange()),
    ngon(6, 60).outlined(withWidth(solid(white()), 2))
  ]).rotate(seconds);

  const orbit = Math.min(width, height) / 3;
  const moon = circle(14)
    .filled(lightBlue())
    .shift(Math.cos(seconds * 1.5) * orbit, Math.sin(seconds * 1.5) * orbit);

  const ring = traced(dashed(lightGreen()), [
    { x: -orbit, y: 0 },
    { x: 0, y: orbit },
    { x: orbit, y: 0 },
    { x: 0, y: -orbit },
    { x: -orbit, y: 0 }
  ]);

  const label = outlinedText(solid(yellow()), Text.fromString("outlined").height(20))
    .shiftY(-orbit - 24)
    .alpha(0.5 + Math.sin(seconds * 2) / 2);

  return collage(width, height, [background, ring, hexagon, moon, label]).crop(0, 0, width - 16, height - 16);
}

function caption(width: number, seconds: number): Element {
  const label = Text.fromString(`t = ${seconds.toFixed(1)}s`).monospace().height(14).color(gray());
  return collage(width, CAPTION_HEIGHT, [text(label)]);
}

export function buildDemoPage(frame: FrameInfo): Element {
  const { width, height } = frame.viewport;
  const stageHeight = Math.max(0, height - TITLE_HEIGHT - CAPTION_HEIGHT);
  return flow("down", [title(width), stage(width, stageHeight, frame.seconds), caption(width, frame.seconds)])
    .container(width, height, middle())
    .color(darkCharcoal());
}

export function createDemoScene(onWarning: (warning: DrawWarning) => void): SceneRenderer {
  return (target, frame) =>
    drawElement(buildDemoPage(frame), target.sink, {
      measurer: target.measurer,
      viewport: target.viewport,
      onWarning
    });
}
