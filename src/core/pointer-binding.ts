/**
 * DOM Pointer Binding
 *
 * Translates DOM pointer events on a surface into PointerInput for a
 * whiteboard session:
 * - pointerType "pen" => stylus, "touch" => touch, anything else => mouse
 * - Pen barrel (2) or eraser (32) button bits => primary button
 * - Position relative to the surface's bounding rect
 * - Consumed events get preventDefault() (no scrolling / page zoom)
 * - A consumed pointer-down captures the pointer until up/cancel, so a
 *   release outside the surface still arrives
 * - A mouse move with no button held is a release (the up was missed)
 */
import { PointerButtons, type PointerDevice, type PointerInput, type PointerPhase } from "./types";

/**
 * The subset of PointerEvent the binding reads
 */
export interface PointerEventLike {
  pointerId: number;
  pointerType: string;
  clientX: number;
  clientY: number;
  buttons: number;
  timeStamp: number;
  preventDefault(): void;
}

export type PointerEventType = "pointerdown" | "pointermove" | "pointerup" | "pointercancel";

export interface PointerSurface {
  addEventListener(type: PointerEventType, listener: (e: PointerEventLike) => void): void;
  removeEventListener(type: PointerEventType, listener: (e: PointerEventLike) => void): void;
  getBoundingClientRect(): { left: number; top: number };
  setPointerCapture(pointerId: number): void;
  releasePointerCapture(pointerId: number): void;
  hasPointerCapture(pointerId: number): boolean;
}

export interface PointerSink {
  handlePointer(input: PointerInput): boolean;
}

// DOM button bits a pen reports for its barrel and eraser-end buttons
const PEN_BARREL_BUTTON = 2;
const PEN_ERASER_BUTTON = 32;

const eventTypes: PointerEventType[] = ["pointerdown", "pointermove", "pointerup", "pointercancel"];

const phases: Record<PointerEventType, PointerPhase> = {
  pointerdown: "down",
  pointermove: "move",
  pointerup: "up",
  pointercancel: "cancel",
};

export function toPointerDevice(pointerType: string): PointerDevice {
  switch (pointerType) {
    case "pen":
      return "stylus";
    case "touch":
      return "touch";
    default:
      return "mouse";
  }
}

export function toCoreButtons(device: PointerDevice, domButtons: number): number {
  if (device !== "stylus") return domButtons;
  return domButtons & (PEN_BARREL_BUTTON | PEN_ERASER_BUTTON) ? PointerButtons.Primary : 0;
}

export function toPhase(type: PointerEventType, device: PointerDevice, domButtons: number): PointerPhase {
  if (type === "pointermove" && device === "mouse" && domButtons === 0) return "up";
  return phases[type];
}

export class PointerBinding {
  private surface: PointerSurface;
  private sink: PointerSink;
  private listeners = new Map<PointerEventType, (e: PointerEventLike) => void>();

  constructor(surface: PointerSurface, sink: PointerSink) {
    this.surface = surface;
    this.sink = sink;

    for (const type of eventTypes) {
      const listener = (e: PointerEventLike) => this.dispatch(type, e);
      this.listeners.set(type, listener);
      this.surface.addEventListener(type, listener);
    }
  }

  private dispatch(type: PointerEventType, e: PointerEventLike) {
    const rect = this.surface.getBoundingClientRect();
    const device = toPointerDevice(e.pointerType);
    const phase = toPhase(type, device, e.buttons);

    const consumed = this.sink.handlePointer({
      id: e.pointerId,
      phase,
      device,
      position: { x: e.clientX - rect.left, y: e.clientY - rect.top },
      buttons: toCoreButtons(device, e.buttons),
      time: e.timeStamp,
    });

    if (consumed) e.preventDefault();

    if (phase === "down" && consumed) {
      this.surface.setPointerCapture(e.pointerId);
    } else if (phase === "up" || phase === "cancel") {
      this.releaseCapture(e.pointerId);
    }
  }

  private releaseCapture(pointerId: number) {
    // Capture may never have been set, or the browser already dropped it
    if (this.surface.hasPointerCapture(pointerId)) {
      this.surface.releasePointerCapture(pointerId);
    }
  }

  destroy() {
    for (const [type, listener] of this.listeners) {
      this.surface.removeEventListener(type, listener);
    }
    this.listeners.clear();
  }
}
