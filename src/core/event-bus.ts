/**
 * Event Bus
 *
 * A typed publish-subscribe channel for decoupling the gesture pipeline
 * from its consumers (renderer, preview state, host UI). One bus is
 * created per whiteboard session.
 */
import type { GestureKind, Point, Stroke, TransformState } from "./types";

type Handler<T> = (data: T) => void;

export class EventBus<EventMap extends Record<string, unknown>> {
  private handlers: { [K in keyof EventMap]?: Set<Handler<EventMap[K]>> } = {};

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends keyof EventMap>(event: K, handler: Handler<EventMap[K]>): () => void {
    const set = this.handlers[event] ?? new Set<Handler<EventMap[K]>>();
    this.handlers[event] = set;
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  /**
   * Emit an event with data. A throwing subscriber is reported and the
   * remaining subscribers still run.
   */
  emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
    this.handlers[event]?.forEach((h) => {
      try {
        h(data);
      } catch (error) {
        console.error(`Event handler for "${String(event)}" failed:`, error);
      }
    });
  }

  /**
   * Remove all handlers for an event
   */
  off<K extends keyof EventMap>(event: K): void {
    delete this.handlers[event];
  }

  /**
   * Remove all handlers for all events
   */
  clear(): void {
    this.handlers = {};
  }
}

// Event name constants
export const Events = {
  // Gesture lifecycle
  GESTURE_START: "gesture:start",
  GESTURE_END: "gesture:end",

  // Live preview signals
  DRAW_START: "draw:start",
  DRAW_UPDATE: "draw:update",
  DRAW_END: "draw:end",
  ERASE_START: "erase:start",
  ERASE_END: "erase:end",

  // Shared state mutations
  TRANSFORM_CHANGE: "transform:change",
  STROKES_CHANGE: "strokes:change",
} as const;

export type WhiteboardEvents = {
  "gesture:start": { kind: GestureKind; pointerIds: number[] };
  "gesture:end": { kind: GestureKind };
  "draw:start": { point: Point };
  "draw:update": { point: Point; points: readonly Point[] };
  "draw:end": { stroke: Stroke | null };
  "erase:start": { point: Point };
  "erase:end": { removed: number };
  "transform:change": TransformState;
  "strokes:change": { strokes: readonly Stroke[] };
};

export type WhiteboardBus = EventBus<WhiteboardEvents>;
