export { Canvas2DSink, fontString, rgbaString, viewTransform } from "./renderer/Canvas2DSink.js";
export { CollageRenderer } from "./renderer/CollageRenderer.js";
