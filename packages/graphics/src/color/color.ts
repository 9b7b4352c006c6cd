import type { Rgba8 } from "@collage/rendering-core";
import { degrees, fmod, turns } from "../math/scalar.js";

/**
 * RGB and HSL colors. RGB channels are bytes, alpha is 0-1 and HSL hue is in
 * radians, kept within `[0, 2π)`.
 */
export type Color =
  | { kind: "rgba"; red: number; green: number; blue: number; alpha: number }
  | { kind: "hsla"; hue: number; saturation: number; lightness: number; alpha: number };

export type Rgba = {
  red: number;
  green: number;
  blue: number;
  alpha: number;
};

export type Hsla = {
  hue: number;
  saturation: number;
  lightness: number;
  alpha: number;
};

function toByte(value: number): number {
  return Math.min(255, Math.max(0, Math.round(value)));
}

export function rgba(red: number, green: number, blue: number, alpha: number): Color {
  return { kind: "rgba", red: toByte(red), green: toByte(green), blue: toByte(blue), alpha };
}

export function rgb(red: number, green: number, blue: number): Color {
  return rgba(red, green, blue, 1);
}

export function hsla(hue: number, saturation: number, lightness: number, alpha: number): Color {
  return {
    kind: "hsla",
    hue: hue - turns(Math.floor(hue / (2 * Math.PI))),
    saturation,
    lightness,
    alpha
  };
}

/**
 * A color on the color wheel: `hsl(degrees(120), 1, 0.5)` is green.
 */
export function hsl(hue: number, saturation: number, lightness: number): Color {
  return hsla(hue, saturation, lightness, 1);
}

/** A gray; 0 is white and 1 is black. */
export function grayscale(p: number): Color {
  return { kind: "hsla", hue: 0, saturation: 0, lightness: 1 - p, alpha: 1 };
}

export const greyscale = grayscale;

export function rgbToHsl(red: number, green: number, blue: number): [number, number, number] {
  const r = red / 255;
  const g = green / 255;
  const b = blue / 255;
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const chroma = max - min;
  const lightness = (max + min) / 2;
  if (chroma === 0) return [0, 0, lightness];

  let sector: number;
  if (max === r) sector = fmod((g - b) / chroma, 6);
  else if (max === g) sector = (b - r) / chroma + 2;
  else sector = (r - g) / chroma + 4;

  const hue = degrees(60) * sector;
  const saturation = lightness === 0 ? 0 : chroma / (1 - Math.abs(2 * lightness - 1));
  return [hue, saturation, lightness];
}

/** HSL to RGB with channels in `[0, 1]`. */
export function hslToRgb(hue: number, saturation: number, lightness: number): [number, number, number] {
  const chroma = (1 - Math.abs(2 * lightness - 1)) * saturation;
  const h = hue / degrees(60);
  const x = chroma * (1 - Math.abs(fmod(h, 2) - 1));
  const m = lightness - chroma / 2;

  let rgb: [number, number, number];
  switch (Math.floor(fmod(h, 6))) {
    case 0:
      rgb = [chroma, x, 0];
      break;
    case 1:
      rgb = [x, chroma, 0];
      break;
    case 2:
      rgb = [0, chroma, x];
      break;
    case 3:
      rgb = [0, x, chroma];
      break;
    case 4:
      rgb = [x, 0, chroma];
      break;
    default:
      rgb = [chroma, 0, x];
      break;
  }
  return [rgb[0] + m, rgb[1] + m, rgb[2] + m];
}

export function toHsl(color: Color): Hsla {
  if (color.kind === "hsla") {
    return { hue: color.hue, saturation: color.saturation, lightness: color.lightness, alpha: color.alpha };
  }
  const [hue, saturation, lightness] = rgbToHsl(color.red, color.green, color.blue);
  return { hue, saturation, lightness, alpha: color.alpha };
}

export function toRgb(color: Color): Rgba {
  if (color.kind === "rgba") {
    return { red: color.red, green: color.green, blue: color.blue, alpha: color.alpha };
  }
  const [r, g, b] = hslToRgb(color.hue, color.saturation, color.lightness);
  return { red: toByte(255 * r), green: toByte(255 * g), blue: toByte(255 * b), alpha: color.alpha };
}

/** The color on the opposite side of the color wheel. */
export function complement(color: Color): Color {
  const { hue, saturation, lightness, alpha } = toHsl(color);
  return hsla(hue + degrees(180), saturation, lightness, alpha);
}

/** Backend color with the accumulated opacity folded into alpha. */
export function toRgba8(color: Color, opacity: number): Rgba8 {
  const { red, green, blue, alpha } = toRgb(color);
  return { r: red, g: green, b: blue, a: alpha * opacity };
}
