/**
 * Gesture Classifier
 *
 * Decides, once per gesture, which handler owns a new pointer sequence:
 * - Stylus: the next event of the same pointer decides. Primary button
 *   held => erase, otherwise draw. The secondary button is not read.
 * - Touch / mouse: wait up to `windowMs` for a second distinct pointer.
 *   Second pointer => panZoom, otherwise pan.
 *
 * The classifier never waits by itself. The dispatcher feeds it events
 * and calls expire() when the window timer fires; an event stamped at or
 * after the deadline also closes the window.
 */
import { PointerButtons, isPressed, type GestureKind, type PointerInput } from "./types";

export type ClassifierStep =
  | { status: "pending" }
  | {
      status: "resolved";
      kind: GestureKind;
      /** Seed sample of every pointer the handler starts with */
      pointers: PointerInput[];
      /** Events received during classification that the handler must see */
      replay: PointerInput[];
    };

const PENDING: ClassifierStep = { status: "pending" };

export class GestureClassifier {
  private readonly first: PointerInput;
  private latestFirst: PointerInput;
  private readonly deadline: number;
  private buffered: PointerInput[] = [];
  private resolved: ClassifierStep | null = null;

  constructor(first: PointerInput, windowMs: number) {
    this.first = first;
    this.latestFirst = first;
    this.deadline = first.time + windowMs;
  }

  /**
   * Whether this classification waits on a timer
   */
  get isTimed(): boolean {
    return this.first.device !== "stylus";
  }

  get result(): ClassifierStep {
    return this.resolved ?? PENDING;
  }

  feed(input: PointerInput): ClassifierStep {
    if (this.resolved) return this.resolved;
    return this.first.device === "stylus" ? this.feedStylus(input) : this.feedTouch(input);
  }

  /**
   * Close the touch window with no second pointer seen
   */
  expire(): ClassifierStep {
    if (this.resolved || !this.isTimed) return this.result;
    return this.resolve("pan", [this.first], this.buffered);
  }

  private feedStylus(input: PointerInput): ClassifierStep {
    if (input.id !== this.first.id) return PENDING;

    const erase = (input.buttons & PointerButtons.Primary) !== 0;
    return this.resolve(erase ? "erase" : "draw", [this.first], [input]);
  }

  private feedTouch(input: PointerInput): ClassifierStep {
    if (input.time >= this.deadline) {
      return this.resolve("pan", [this.first], [...this.buffered, input]);
    }

    if (input.id === this.first.id) {
      if (!isPressed(input)) {
        return this.resolve("pan", [this.first], [...this.buffered, input]);
      }
      this.latestFirst = input;
      this.buffered.push(input);
      return PENDING;
    }

    if (input.phase === "down") {
      return this.resolve("panZoom", [this.latestFirst, input], []);
    }

    // Stray events from pointers that were already down
    return PENDING;
  }

  private resolve(
    kind: GestureKind,
    pointers: PointerInput[],
    replay: PointerInput[],
  ): ClassifierStep {
    this.resolved = { status: "resolved", kind, pointers, replay };
    this.buffered = [];
    return this.resolved;
  }
}
