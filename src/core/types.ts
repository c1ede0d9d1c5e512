/**
 * Type Definitions
 *
 * Shared TypeScript interfaces used across all modules:
 * - Point: x, y coordinates (device space or canvas space, never mixed)
 * - Stroke: committed polyline plus its fixed color and width
 * - PointerInput: one host pointer event, already normalized
 * - GestureKind: the four gestures the classifier can route to
 */
export interface Point {
  x: number;
  y: number;
}

export interface Stroke {
  readonly id: number;
  readonly points: readonly Point[];
  readonly color: string;
  readonly width: number;
}

export interface StrokeStyle {
  color: string;
  width: number;
}

export type PointerDevice = "stylus" | "touch" | "mouse";

/**
 * down/move = pressed, up/cancel = released (cancel is pointer loss)
 */
export type PointerPhase = "down" | "move" | "up" | "cancel";

/**
 * Button mask bits as seen by the core. Hosts translate their own
 * button reporting into these (see pointer-binding.ts).
 */
export const PointerButtons = {
  Primary: 1,
} as const;

export interface PointerInput {
  id: number;
  phase: PointerPhase;
  device: PointerDevice;
  position: Point; // device space
  buttons: number;
  time: number; // ms
}

export type GestureKind = "draw" | "erase" | "pan" | "panZoom";

export interface TransformState {
  scale: number;
  offset: Point;
}

export function isPressed(input: PointerInput): boolean {
  return input.phase === "down" || input.phase === "move";
}

export function distance(a: Point, b: Point): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  return Math.sqrt(dx * dx + dy * dy);
}
