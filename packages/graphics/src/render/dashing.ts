import type { Point } from "@collage/rendering-core";

const EPSILON = 1e-9;

function lerp(a: Point, b: Point, t: number): Point {
  return { x: a.x + (b.x - a.x) * t, y: a.y + (b.y - a.y) * t };
}

/**
 * Splits a polyline into the "on" runs of a dash pattern. Even entries of the
 * pattern are drawn, odd entries are gaps; an odd-length pattern is repeated
 * once so that on and off keep alternating. The walk starts `offset` units into
 * the pattern and runs across corners, so a dash may bend.
 */
export function dashPolyline(
  points: readonly Point[],
  closed: boolean,
  pattern: readonly number[],
  offset: number,
): Point[][] {
  const path = closed && points.length > 2 && points[0] ? [...points, points[0]] : [...points];
  const clean = pattern.map((n) => Math.max(0, n));
  const lengths = clean.length % 2 === 1 ? [...clean, ...clean] : clean;
  const total = lengths.reduce((sum, n) => sum + n, 0);
  if (path.length < 2) return [];
  if (lengths.length === 0 || total <= 0) return [path];

  let index = 0;
  let remaining = lengths[0] ?? 0;
  let phase = ((offset % total) + total) % total;
  while (phase > EPSILON) {
    const step = Math.min(phase, remaining);
    phase -= step;
    remaining -= step;
    if (remaining <= EPSILON) {
      index = (index + 1) % lengths.length;
      remaining = lengths[index] ?? 0;
    }
  }

  const dashes: Point[][] = [];
  let current: Point[] | null = null;

  for (let i = 1; i < path.length; i++) {
    const a = path[i - 1];
    const b = path[i];
    if (!a || !b) continue;
    const length = Math.hypot(b.x - a.x, b.y - a.y);
    if (length <= EPSILON) continue;

    let t = 0;
    while (length - t > EPSILON) {
      const on = index % 2 === 0;
      const step = Math.min(remaining, length - t);
      if (on && step > 0) {
        if (!current) current = [lerp(a, b, t / length)];
        current.push(lerp(a, b, (t + step) / length));
      }
      t += step;
      remaining -= step;
      if (remaining <= EPSILON) {
        if (current && current.length > 1) dashes.push(current);
        current = null;
        index = (index + 1) % lengths.length;
        remaining = lengths[index] ?? 0;
      }
    }
  }

  if (current && current.length > 1) dashes.push(current);
  return dashes;
}
