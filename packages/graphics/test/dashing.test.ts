import test from "node:test";
import assert from "node:assert/strict";
import { dashPolyline } from "../src/index.js";

test("dashPolyline: alternates on and off", () => {
  const dashes = dashPolyline([{ x: 0, y: 0 }, { x: 16, y: 0 }], false, [8, 4], 0);
  assert.deepEqual(dashes, [
    [{ x: 0, y: 0 }, { x: 8, y: 0 }],
    [{ x: 12, y: 0 }, { x: 16, y: 0 }]
  ]);
});

test("dashPolyline: a dash bends around a corner", () => {
  const dashes = dashPolyline([{ x: 0, y: 0 }, { x: 5, y: 0 }, { x: 5, y: 5 }], false, [8, 4], 0);
  assert.deepEqual(dashes, [[{ x: 0, y: 0 }, { x: 5, y: 0 }, { x: 5, y: 3 }]]);
});

test("dashPolyline: offset starts inside the pattern", () => {
  const dashes = dashPolyline([{ x: 0, y: 0 }, { x: 16, y: 0 }], false, [4, 2], 3);
  assert.deepEqual(dashes, [
    [{ x: 0, y: 0 }, { x: 1, y: 0 }],
    [{ x: 3, y: 0 }, { x: 7, y: 0 }],
    [{ x: 9, y: 0 }, { x: 13, y: 0 }],
    [{ x: 15, y: 0 }, { x: 16, y: 0 }]
  ]);
});

test("dashPolyline: odd patterns repeat", () => {
  const dashes = dashPolyline([{ x: 0, y: 0 }, { x: 12, y: 0 }], false, [3], 0);
  assert.deepEqual(dashes, [
    [{ x: 0, y: 0 }, { x: 3, y: 0 }],
    [{ x: 6, y: 0 }, { x: 9, y: 0 }]
  ]);
});

test("dashPolyline: closed paths walk back to the start", () => {
  const square = [{ x: 0, y: 0 }, { x: 4, y: 0 }, { x: 4, y: 4 }, { x: 0, y: 4 }];
  const dashes = dashPolyline(square, true, [2, 2], 0);
  assert.equal(dashes.length, 4);
  assert.deepEqual(dashes[3], [{ x: 0, y: 4 }, { x: 0, y: 2 }]);
});

test("dashPolyline: empty or zero pattern keeps the whole path", () => {
  const path = [{ x: 0, y: 0 }, { x: 3, y: 4 }];
  assert.deepEqual(dashPolyline(path, false, [], 0), [path]);
  assert.deepEqual(dashPolyline(path, false, [0, -2], 0), [path]);
  assert.deepEqual(dashPolyline([{ x: 1, y: 1 }], false, [2, 2], 0), []);
});
