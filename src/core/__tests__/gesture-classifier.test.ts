import { describe, expect, it } from "vitest";
import { GestureClassifier } from "../gesture-classifier";
import { pen, penPrimary, touch } from "./pointers";

describe("GestureClassifier", () => {
  describe("stylus", () => {
    it("routes to erase when the next event holds the primary button", () => {
      const down = penPrimary("down", 1, 50, 50, 0);
      const next = penPrimary("move", 1, 51, 50, 8);
      const classifier = new GestureClassifier(down, 100);

      expect(classifier.feed(next)).toEqual({
        status: "resolved",
        kind: "erase",
        pointers: [down],
        replay: [next],
      });
    });

    it("routes to draw without the primary button", () => {
      const classifier = new GestureClassifier(pen("down", 1, 50, 50, 0), 100);
      const step = classifier.feed(pen("move", 1, 55, 50, 8));
      expect(step.status === "resolved" && step.kind).toBe("draw");
    });

    it("decides from the next event, not the down event", () => {
      const classifier = new GestureClassifier(penPrimary("down", 1, 50, 50, 0), 100);
      const step = classifier.feed(pen("move", 1, 55, 50, 8));
      expect(step.status === "resolved" && step.kind).toBe("draw");
    });

    it("ignores other pointers while waiting", () => {
      const classifier = new GestureClassifier(pen("down", 1, 50, 50, 0), 100);
      expect(classifier.feed(touch("down", 2, 10, 10, 5))).toEqual({ status: "pending" });
    });

    it("has no window to expire", () => {
      const classifier = new GestureClassifier(pen("down", 1, 50, 50, 0), 100);
      expect(classifier.isTimed).toBe(false);
      expect(classifier.expire()).toEqual({ status: "pending" });
    });
  });

  describe("touch", () => {
    it("routes to panZoom when a second pointer lands inside the window", () => {
      const first = touch("down", 1, 100, 100, 0);
      const second = touch("down", 2, 200, 100, 50);
      const classifier = new GestureClassifier(first, 100);

      expect(classifier.feed(second)).toEqual({
        status: "resolved",
        kind: "panZoom",
        pointers: [first, second],
        replay: [],
      });
    });

    it("seeds panZoom with the first pointer's latest position", () => {
      const classifier = new GestureClassifier(touch("down", 1, 100, 100, 0), 100);
      const moved = touch("move", 1, 112, 100, 10);
      classifier.feed(moved);

      const step = classifier.feed(touch("down", 2, 200, 100, 20));
      expect(step.status === "resolved" && step.pointers[0]).toBe(moved);
    });

    it("routes to pan on expiry and replays the buffered moves", () => {
      const first = touch("down", 1, 100, 100, 0);
      const m1 = touch("move", 1, 101, 100, 20);
      const m2 = touch("move", 1, 103, 100, 40);
      const classifier = new GestureClassifier(first, 100);

      expect(classifier.feed(m1)).toEqual({ status: "pending" });
      expect(classifier.feed(m2)).toEqual({ status: "pending" });
      expect(classifier.expire()).toEqual({
        status: "resolved",
        kind: "pan",
        pointers: [first],
        replay: [m1, m2],
      });
    });

    it("closes the window on an event stamped at the deadline", () => {
      const first = touch("down", 1, 100, 100, 0);
      const late = touch("down", 2, 200, 100, 100);
      const classifier = new GestureClassifier(first, 100);

      expect(classifier.feed(late)).toEqual({
        status: "resolved",
        kind: "pan",
        pointers: [first],
        replay: [late],
      });
    });

    it("routes to pan when the first pointer lifts inside the window", () => {
      const first = touch("down", 1, 100, 100, 0);
      const up = touch("up", 1, 100, 100, 30);
      const classifier = new GestureClassifier(first, 100);

      const step = classifier.feed(up);
      expect(step).toEqual({ status: "resolved", kind: "pan", pointers: [first], replay: [up] });
    });

    it("ignores non-down events from other pointers", () => {
      const classifier = new GestureClassifier(touch("down", 1, 100, 100, 0), 100);
      expect(classifier.feed(touch("move", 7, 5, 5, 10))).toEqual({ status: "pending" });
    });

    it("treats mouse like touch", () => {
      const classifier = new GestureClassifier(
        { id: 1, phase: "down", device: "mouse", position: { x: 0, y: 0 }, buttons: 1, time: 0 },
        100,
      );
      expect(classifier.isTimed).toBe(true);
      const step = classifier.expire();
      expect(step.status === "resolved" && step.kind).toBe("pan");
    });

    it("classifies once", () => {
      const classifier = new GestureClassifier(touch("down", 1, 100, 100, 0), 100);
      const resolved = classifier.expire();
      expect(classifier.feed(touch("down", 2, 200, 100, 10))).toBe(resolved);
      expect(classifier.result).toBe(resolved);
    });
  });
});
