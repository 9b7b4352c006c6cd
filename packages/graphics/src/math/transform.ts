import type { Point, Transform2D } from "@collage/rendering-core";
import { nearlyEqual } from "./scalar.js";

/**
 * Affine transforms. The builders take the row-major layout
 *
 *     / a b x \
 *     \ c d y /
 *
 * and store it in 2D-context order (see `Transform2D`).
 */

export function identity(): Transform2D {
  return { a: 1, b: 0, c: 0, d: 1, e: 0, f: 0 };
}

export function matrix(a: number, b: number, c: number, d: number, x: number, y: number): Transform2D {
  return { a, b: c, c: b, d, e: x, f: y };
}

/** Counter-clockwise rotation by `t` radians. */
export function rotation(t: number): Transform2D {
  const cos = Math.cos(t);
  const sin = Math.sin(t);
  return matrix(cos, -sin, sin, cos, 0, 0);
}

export function translation(x: number, y: number): Transform2D {
  return matrix(1, 0, 0, 1, x, y);
}

export function scale(s: number): Transform2D {
  return matrix(s, 0, 0, s, 0, 0);
}

export function scaleX(s: number): Transform2D {
  return matrix(s, 0, 0, 1, 0, 0);
}

export function scaleY(s: number): Transform2D {
  return matrix(1, 0, 0, s, 0, 0);
}

/**
 * The product `m * n`. `m` is established first and `n` is appended to it, so a
 * point is mapped by `n` and then by `m`.
 */
export function multiply(m: Transform2D, n: Transform2D): Transform2D {
  return {
    a: m.a * n.a + m.c * n.b,
    b: m.b * n.a + m.d * n.b,
    c: m.a * n.c + m.c * n.d,
    d: m.b * n.c + m.d * n.d,
    e: m.a * n.e + m.c * n.f + m.e,
    f: m.b * n.e + m.d * n.f + m.f
  };
}

export function applyTransform(m: Transform2D, p: Point): Point {
  return {
    x: m.a * p.x + m.c * p.y + m.e,
    y: m.b * p.x + m.d * p.y + m.f
  };
}

export function transformsEqual(m: Transform2D, n: Transform2D, epsilon = 1e-9): boolean {
  return (
    nearlyEqual(m.a, n.a, epsilon) &&
    nearlyEqual(m.b, n.b, epsilon) &&
    nearlyEqual(m.c, n.c, epsilon) &&
    nearlyEqual(m.d, n.d, epsilon) &&
    nearlyEqual(m.e, n.e, epsilon) &&
    nearlyEqual(m.f, n.f, epsilon)
  );
}
