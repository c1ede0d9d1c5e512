import { PointerButtons, type PointerInput, type PointerPhase, type Stroke } from "../types";

export function touch(phase: PointerPhase, id: number, x: number, y: number, time: number): PointerInput {
  return { id, phase, device: "touch", position: { x, y }, buttons: 0, time };
}

export function pen(
  phase: PointerPhase,
  id: number,
  x: number,
  y: number,
  time: number,
  buttons = 0,
): PointerInput {
  return { id, phase, device: "stylus", position: { x, y }, buttons, time };
}

export function penPrimary(phase: PointerPhase, id: number, x: number, y: number, time: number): PointerInput {
  return pen(phase, id, x, y, time, PointerButtons.Primary);
}

export function makeStroke(id: number, points: Array<[number, number]>): Stroke {
  return { id, points: points.map(([x, y]) => ({ x, y })), color: "#000000", width: 4 };
}
