export type ExtensionPrimitive = "texturedPolygon" | "gradientPolygon" | "image" | "outlinedText";

/**
 * Thrown when a form or element needs a capability the sink or text measurer
 * does not provide.
 */
export class UnsupportedPrimitiveError extends Error {
  readonly primitive: ExtensionPrimitive;

  constructor(primitive: ExtensionPrimitive) {
    super(`Backend does not support "${primitive}" primitives`);
    this.name = "UnsupportedPrimitiveError";
    this.primitive = primitive;
  }
}
