import { describe, expect, it } from "vitest";
import { EventBus, Events, type WhiteboardEvents } from "../event-bus";
import { StrokeStore } from "../stroke-store";
import type { Stroke } from "../types";
import { makeStroke } from "./pointers";

const style = { color: "#000000", width: 4 };

function ids(strokes: readonly Stroke[]): number[] {
  return strokes.map((s) => s.id);
}

describe("StrokeStore", () => {
  it("appends in order", () => {
    const store = new StrokeStore(style);
    store.append(makeStroke(1, [[0, 0]]));
    store.append(makeStroke(2, [[5, 5]]));
    store.append(makeStroke(3, [[9, 9]]));

    expect(ids(store.snapshot())).toEqual([1, 2, 3]);
    expect(store.size).toBe(3);
    expect(store.get(2)?.points).toEqual([{ x: 5, y: 5 }]);
  });

  it("hands out frozen snapshots that later mutations do not touch", () => {
    const store = new StrokeStore(style);
    store.append(makeStroke(1, [[0, 0]]));

    const before = store.snapshot();
    expect(store.snapshot()).toBe(before);
    expect(Object.isFrozen(before)).toBe(true);

    store.append(makeStroke(2, [[1, 1]]));
    expect(ids(before)).toEqual([1]);
    expect(ids(store.snapshot())).toEqual([1, 2]);
  });

  it("removes matching strokes and keeps the order of the rest", () => {
    const store = new StrokeStore(style);
    for (const id of [1, 2, 3, 4]) store.append(makeStroke(id, [[id, id]]));

    const removed = store.removeWhere((s) => s.id % 2 === 0);

    expect(ids(removed)).toEqual([2, 4]);
    expect(ids(store.snapshot())).toEqual([1, 3]);
    expect(store.get(2)).toBeUndefined();
  });

  it("commits the in-progress buffer with the default style", () => {
    const store = new StrokeStore(style);
    store.beginStroke({ x: 1, y: 1 });
    store.extendStroke({ x: 4, y: 1 });
    expect(store.currentStroke()).toEqual([
      { x: 1, y: 1 },
      { x: 4, y: 1 },
    ]);

    const stroke = store.commitStroke();

    expect(stroke).toEqual({
      id: 1,
      points: [
        { x: 1, y: 1 },
        { x: 4, y: 1 },
      ],
      color: "#000000",
      width: 4,
    });
    expect(store.currentStroke()).toEqual([]);
    expect(store.snapshot()).toEqual([stroke]);
  });

  it("applies a style override on commit", () => {
    const store = new StrokeStore(style);
    store.beginStroke({ x: 0, y: 0 });
    const stroke = store.commitStroke({ color: "#ff0000" });
    expect(stroke?.color).toBe("#ff0000");
    expect(stroke?.width).toBe(4);
  });

  it("never commits an empty buffer", () => {
    const store = new StrokeStore(style);
    expect(store.commitStroke()).toBeNull();

    store.beginStroke({ x: 0, y: 0 });
    store.discardStroke();
    expect(store.commitStroke()).toBeNull();
    expect(store.size).toBe(0);
  });

  it("rejects a second stroke with an id already in the store", () => {
    const store = new StrokeStore(style);
    store.append(makeStroke(1, [[0, 0]]));

    expect(() => store.append(makeStroke(1, [[500, 500]]))).toThrow(
      new RangeError("Stroke id 1 is already in the store"),
    );
    expect(ids(store.eraseAt({ x: 500, y: 500 }, 5))).toEqual([]);
    expect(ids(store.snapshot())).toEqual([1]);
  });

  it("stores a frozen copy that later caller edits do not reach", () => {
    const store = new StrokeStore(style);
    const points = [{ x: 0, y: 0 }];
    const stored = store.append({ id: 1, points, color: "#000000", width: 4 });

    points[0].x = 300;
    points[0].y = 300;
    points.push({ x: 301, y: 300 });

    expect(stored.points).toEqual([{ x: 0, y: 0 }]);
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(stored.points[0])).toBe(true);
    expect(store.eraseAt({ x: 300, y: 300 }, 5)).toEqual([]);
    expect(ids(store.eraseAt({ x: 1, y: 1 }, 5))).toEqual([1]);
  });

  it("exposes the live buffer without copying it", () => {
    const store = new StrokeStore(style);
    store.beginStroke({ x: 0, y: 0 });
    const view = store.currentStroke();

    store.extendStroke({ x: 5, y: 0 });
    expect(store.currentStroke()).toBe(view);
    expect(view).toHaveLength(2);

    const stroke = store.commitStroke();
    store.beginStroke({ x: 9, y: 9 });
    expect(view).toEqual([
      { x: 0, y: 0 },
      { x: 5, y: 0 },
    ]);
    expect(stroke?.points).not.toBe(view);
  });

  it("assigns ids after the highest appended id", () => {
    const store = new StrokeStore(style);
    store.append(makeStroke(10, [[0, 0]]));
    store.beginStroke({ x: 1, y: 1 });
    expect(store.commitStroke()?.id).toBe(11);
  });

  describe("eraseAt", () => {
    function twoStrokes() {
      const store = new StrokeStore(style);
      store.append(
        makeStroke(1, [
          [0, 0],
          [5, 0],
        ]),
      );
      store.append(
        makeStroke(2, [
          [100, 100],
          [105, 100],
        ]),
      );
      return store;
    }

    it("removes exactly the stroke under the disc", () => {
      const store = twoStrokes();
      const removed = store.eraseAt({ x: 2, y: 1 }, 3);

      expect(ids(removed)).toEqual([1]);
      expect(ids(store.snapshot())).toEqual([2]);
    });

    it("leaves the store unchanged when the disc touches no point", () => {
      const store = twoStrokes();
      const before = store.snapshot();

      expect(store.eraseAt({ x: 50, y: 50 }, 10)).toEqual([]);
      expect(store.snapshot()).toBe(before);
      expect(store.size).toBe(2);
    });

    it("does not erase when only the bounding box overlaps", () => {
      const store = new StrokeStore(style);
      store.append(
        makeStroke(1, [
          [0, 0],
          [100, 0],
        ]),
      );
      expect(store.eraseAt({ x: 50, y: 0 }, 10)).toEqual([]);
      expect(store.size).toBe(1);
    });

    it("keeps the spatial index in step with removals", () => {
      const store = twoStrokes();
      store.eraseAt({ x: 2, y: 1 }, 3);
      expect(store.eraseAt({ x: 2, y: 1 }, 3)).toEqual([]);
      expect(ids(store.eraseAt({ x: 104, y: 101 }, 2))).toEqual([2]);
      expect(store.size).toBe(0);
    });

    it("agrees with removeWhere over the hit test", () => {
      const a = twoStrokes();
      const b = twoStrokes();
      a.eraseAt({ x: 103, y: 98 }, 4);
      b.removeWhere((s) => s.points.some((p) => Math.hypot(p.x - 103, p.y - 98) <= 4));
      expect(ids(a.snapshot())).toEqual(ids(b.snapshot()));
    });
  });

  it("emits strokes:change for every mutation and none for no-ops", () => {
    const bus = new EventBus<WhiteboardEvents>();
    const seen: number[][] = [];
    bus.on(Events.STROKES_CHANGE, ({ strokes }) => seen.push(ids(strokes)));

    const store = new StrokeStore(style, bus);
    store.append(makeStroke(1, [[0, 0]]));
    store.beginStroke({ x: 50, y: 50 });
    store.commitStroke();
    store.removeWhere(() => false);
    store.eraseAt({ x: 0, y: 0 }, 1);
    store.clear();
    store.clear();

    expect(seen).toEqual([[1], [1, 2], [2], []]);
  });
});
