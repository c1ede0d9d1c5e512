/**
 * Stroke hit testing for the eraser.
 *
 * Per-point test only: a disc that falls between two widely spaced
 * points of a straight segment misses it. Point density is bounded by
 * the draw handler's minimum spacing.
 */
import type { Point, Stroke } from "./types";

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export const DEFAULT_HIT_RADIUS = 20;

export function intersects(stroke: Stroke, point: Point, radius = DEFAULT_HIT_RADIUS): boolean {
  const r2 = radius * radius;
  return stroke.points.some((p) => {
    const dx = p.x - point.x;
    const dy = p.y - point.y;
    return dx * dx + dy * dy <= r2;
  });
}

export function strokeBounds(stroke: Stroke): Bounds {
  let minX = Infinity,
    minY = Infinity,
    maxX = -Infinity,
    maxY = -Infinity;

  for (const p of stroke.points) {
    minX = Math.min(minX, p.x);
    minY = Math.min(minY, p.y);
    maxX = Math.max(maxX, p.x);
    maxY = Math.max(maxY, p.y);
  }

  return { minX, minY, maxX, maxY };
}

/**
 * Square bounds of a disc, for spatial index queries
 */
export function discBounds(center: Point, radius: number): Bounds {
  return {
    minX: center.x - radius,
    minY: center.y - radius,
    maxX: center.x + radius,
    maxY: center.y + radius,
  };
}
