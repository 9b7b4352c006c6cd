export { clamp, clamp01, degrees, fmod, mapRange, modulo, nearlyEqual, turns } from "./math/scalar.js";
export {
  applyTransform,
  identity,
  matrix,
  multiply,
  rotation,
  scale,
  scaleX,
  scaleY,
  transformsEqual,
  translation
} from "./math/transform.js";
export { boundsOfPoints, isEmptyRect, rectIntersection } from "./math/rect.js";

export {
  complement,
  grayscale,
  greyscale,
  hsl,
  hslToRgb,
  hsla,
  rgb,
  rgbToHsl,
  rgba,
  toHsl,
  toRgb,
  toRgba8,
  type Color,
  type Hsla,
  type Rgba
} from "./color/color.js";
export * from "./color/palette.js";
export { linear, radial, resolveGradient, type ColorStop, type Gradient } from "./color/gradient.js";

export {
  DEFAULT_TEXT_HEIGHT,
  Text,
  defaultTextStyle,
  type TextLine,
  type TextPosition,
  type TextStyle,
  type TextUnit
} from "./text/text.js";

export {
  dashed,
  defaultLineStyle,
  dotted,
  solid,
  withWidth,
  type LineCap,
  type LineJoin,
  type LineStyle
} from "./form/lineStyle.js";
export {
  Form,
  group,
  groupTransform,
  line,
  outlinedText,
  pointPath,
  segment,
  sprite,
  text,
  toForm,
  traced,
  type BasicForm,
  type FillStyle,
  type FormProps,
  type ShapeStyle
} from "./form/form.js";
export { OVAL_POINTS, Shape, circle, ngon, oval, polygon, rect, square } from "./form/shape.js";

export {
  Element,
  collage,
  croppedImage,
  empty,
  fittedImage,
  flow,
  heightOf,
  image,
  layers,
  newElement,
  sizeOf,
  spacer,
  tiledImage,
  widthOf,
  type CropRect,
  type Direction,
  type ImageStyle,
  type Prim,
  type Properties
} from "./element/element.js";
export * from "./element/position.js";

export { drawForm, drawForms } from "./render/drawForm.js";
export { drawElement } from "./render/drawElement.js";
export { dashPolyline } from "./render/dashing.js";
export { UnsupportedPrimitiveError, type ExtensionPrimitive } from "./render/errors.js";
export type { DrawOptions, DrawWarning, DrawWarningCode } from "./render/context.js";
