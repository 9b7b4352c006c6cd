export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function clamp01(value: number): number {
  return clamp(value, 0, 1);
}

export function nearlyEqual(a: number, b: number, epsilon = 1e-9): boolean {
  return Math.abs(a - b) <= epsilon;
}

/** Degrees to radians. */
export function degrees(d: number): number {
  return (d * Math.PI) / 180;
}

/** Turns to radians. */
export function turns(t: number): number {
  return 2 * Math.PI * t;
}

/**
 * Integer modulo whose result takes the sign of the divisor, so
 * `modulo(-1, 6) === 5`.
 */
export function modulo(a: number, b: number): number {
  const r = a % b;
  if ((r > 0 && b < 0) || (r < 0 && b > 0)) return r + b;
  return r;
}

/** Float modulo by an integer, keeping the fractional part of `f`. */
export function fmod(f: number, n: number): number {
  const i = Math.floor(f);
  return modulo(i, n) + f - i;
}

/** Maps `value` from `[inMin, inMax]` onto `[outMin, outMax]`. */
export function mapRange(value: number, inMin: number, inMax: number, outMin: number, outMax: number): number {
  if (inMax === inMin) return outMin;
  return ((value - inMin) / (inMax - inMin)) * (outMax - outMin) + outMin;
}
