export type Point = {
  x: number;
  y: number;
};

export type Rect = {
  x: number;
  y: number;
  width: number;
  height: number;
};

/**
 * Affine map in 2D-context order: `(x, y) -> (a*x + c*y + e, b*x + d*y + f)`.
 */
export type Transform2D = {
  a: number;
  b: number;
  c: number;
  d: number;
  e: number;
  f: number;
};
