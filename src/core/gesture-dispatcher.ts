/**
 * Gesture Dispatcher
 *
 * Routes normalized pointer events through a single gesture session:
 * - idle: waiting for a pointer-down
 * - classifying: first pointer captured, classifier deciding
 * - active: one handler owns the gesture until it reports done
 *
 * Events are processed one at a time. The touch classification window is
 * a scheduled timer, so other pointers keep flowing while it is open.
 */
import { Events } from "./event-bus";
import { GestureClassifier, type ClassifierStep } from "./gesture-classifier";
import { createHandler, type GestureContext, type GestureHandler } from "./gesture-handlers";
import type { GestureKind, PointerInput } from "./types";

export type GestureState = "idle" | "classifying" | GestureKind;

/**
 * Timer abstraction for the classification window
 */
export interface Scheduler {
  /** @returns Cancel function */
  schedule(callback: () => void, delayMs: number): () => void;
}

export const timerScheduler: Scheduler = {
  schedule(callback, delayMs) {
    const handle = setTimeout(callback, delayMs);
    return () => clearTimeout(handle);
  },
};

export class GestureDispatcher {
  private readonly ctx: GestureContext;
  private readonly scheduler: Scheduler;

  private classifier: GestureClassifier | null = null;
  private handler: GestureHandler | null = null;
  private cancelTimer: (() => void) | null = null;

  constructor(ctx: GestureContext, scheduler: Scheduler = timerScheduler) {
    this.ctx = ctx;
    this.scheduler = scheduler;
  }

  getGestureState(): GestureState {
    if (this.handler) return this.handler.kind;
    if (this.classifier) return "classifying";
    return "idle";
  }

  /**
   * Process one pointer event
   * @returns true when the event was consumed by the active gesture
   */
  handlePointer(input: PointerInput): boolean {
    if (this.handler) {
      return this.forward(input);
    }

    if (this.classifier) {
      return this.advance(this.classifier.feed(input));
    }

    // Only a pointer-down opens a session; anything else is untracked
    if (input.phase !== "down") return false;

    const classifier = new GestureClassifier(input, this.ctx.config.classifierWindowMs);
    this.classifier = classifier;

    if (classifier.isTimed) {
      this.cancelTimer = this.scheduler.schedule(() => {
        this.cancelTimer = null;
        if (this.classifier === classifier) this.advance(classifier.expire());
      }, this.ctx.config.classifierWindowMs);
    }
    return true;
  }

  /**
   * Process a batch of pointer events in order
   */
  onPointerSequence(inputs: Iterable<PointerInput>): void {
    for (const input of inputs) this.handlePointer(input);
  }

  /**
   * Abort the current session. An active gesture ends as if released.
   */
  cancel(): void {
    this.clearTimer();
    this.classifier = null;

    const handler = this.handler;
    if (handler) {
      handler.cancel();
      this.endGesture(handler);
    }
  }

  private advance(step: ClassifierStep): boolean {
    if (step.status === "pending") return true;

    this.clearTimer();
    this.classifier = null;

    if (this.ctx.config.debug) {
      console.debug(`[gesture] classified as ${step.kind}`);
    }

    const handler = createHandler(step.kind, this.ctx);
    this.handler = handler;
    handler.begin(step.pointers);
    this.ctx.bus.emit(Events.GESTURE_START, { kind: handler.kind, pointerIds: handler.pointerIds });

    for (const input of step.replay) {
      if (this.handler !== handler) break;
      this.forward(input);
    }
    if (this.handler === handler && handler.state === "done") this.endGesture(handler);
    return true;
  }

  private forward(input: PointerInput): boolean {
    const handler = this.handler;
    if (!handler) return false;

    const consumed = handler.handle(input);
    if (handler.state === "done") this.endGesture(handler);
    return consumed;
  }

  private endGesture(handler: GestureHandler): void {
    if (this.handler !== handler) return;
    this.handler = null;
    this.ctx.bus.emit(Events.GESTURE_END, { kind: handler.kind });
  }

  private clearTimer(): void {
    this.cancelTimer?.();
    this.cancelTimer = null;
  }
}
