/** Near is left or bottom, far is right or top. */
export type Anchor = "near" | "center" | "far";

export type Pos = { kind: "absolute"; value: number } | { kind: "relative"; value: number };

export type Position = {
  horizontal: Anchor;
  vertical: Anchor;
  x: Pos;
  y: Pos;
};

/** An offset in pixels. */
export function absolute(value: number): Pos {
  return { kind: "absolute", value: Math.round(value) };
}

/** An offset as a fraction of the free space around the child. */
export function relative(value: number): Pos {
  return { kind: "relative", value };
}

function position(horizontal: Anchor, vertical: Anchor, x: Pos, y: Pos): Position {
  return { horizontal, vertical, x, y };
}

export const middle = (): Position => position("center", "center", relative(0.5), relative(0.5));
export const topLeft = (): Position => position("near", "far", absolute(0), absolute(0));
export const topRight = (): Position => position("far", "far", absolute(0), absolute(0));
export const bottomLeft = (): Position => position("near", "near", absolute(0), absolute(0));
export const bottomRight = (): Position => position("far", "near", absolute(0), absolute(0));
export const midLeft = (): Position => position("near", "center", absolute(0), relative(0.5));
export const midRight = (): Position => position("far", "center", absolute(0), relative(0.5));
export const midTop = (): Position => position("center", "far", relative(0.5), absolute(0));
export const midBottom = (): Position => position("center", "near", relative(0.5), absolute(0));

export const middleAt = (x: Pos, y: Pos): Position => position("center", "center", x, y);
export const topLeftAt = (x: Pos, y: Pos): Position => position("near", "far", x, y);
export const topRightAt = (x: Pos, y: Pos): Position => position("far", "far", x, y);
export const bottomLeftAt = (x: Pos, y: Pos): Position => position("near", "near", x, y);
export const bottomRightAt = (x: Pos, y: Pos): Position => position("far", "near", x, y);
export const midLeftAt = (x: Pos, y: Pos): Position => position("near", "center", x, y);
export const midRightAt = (x: Pos, y: Pos): Position => position("far", "center", x, y);
export const midTopAt = (x: Pos, y: Pos): Position => position("center", "far", x, y);
export const midBottomAt = (x: Pos, y: Pos): Position => position("center", "near", x, y);

/**
 * Center of a child of size `child` inside a parent of size `parent` along one
 * axis, relative to the parent's center.
 */
export function resolveAxis(anchor: Anchor, pos: Pos, parent: number, child: number): number {
  const slack = parent - child;
  const offset = pos.kind === "absolute" ? pos.value : pos.value * slack;
  switch (anchor) {
    case "near":
      return -slack / 2 + offset;
    case "far":
      return slack / 2 - offset;
    case "center":
      return pos.kind === "absolute" ? pos.value : (pos.value - 0.5) * slack;
  }
}
