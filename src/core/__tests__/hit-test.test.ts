import { describe, expect, it } from "vitest";
import { discBounds, intersects, strokeBounds } from "../hit-test";
import { makeStroke } from "./pointers";

describe("intersects", () => {
  const stroke = makeStroke(1, [
    [0, 0],
    [10, 0],
  ]);

  it("counts a point exactly on the radius as a hit", () => {
    // (13, 4) is 5 away from (10, 0)
    expect(intersects(stroke, { x: 13, y: 4 }, 5)).toBe(true);
  });

  it("misses when every point is outside the radius", () => {
    expect(intersects(stroke, { x: 13, y: 4 }, 4.9)).toBe(false);
  });

  it("tests points only, not the segments between them", () => {
    const sparse = makeStroke(2, [
      [0, 0],
      [100, 0],
    ]);
    expect(intersects(sparse, { x: 50, y: 0 }, 10)).toBe(false);
  });

  it("uses a radius of 20 by default", () => {
    const dot = makeStroke(3, [[0, 0]]);
    expect(intersects(dot, { x: 15, y: 0 })).toBe(true);
    expect(intersects(dot, { x: 25, y: 0 })).toBe(false);
  });
});

describe("strokeBounds", () => {
  it("spans every point of the stroke", () => {
    const stroke = makeStroke(1, [
      [1, 5],
      [-3, 2],
      [4, -1],
    ]);
    expect(strokeBounds(stroke)).toEqual({ minX: -3, minY: -1, maxX: 4, maxY: 5 });
  });
});

describe("discBounds", () => {
  it("is the square around the disc", () => {
    expect(discBounds({ x: 10, y: -5 }, 3)).toEqual({ minX: 7, minY: -8, maxX: 13, maxY: -2 });
  });
});
