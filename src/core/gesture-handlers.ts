/**
 * Gesture Handlers
 *
 * One state machine per gesture kind. The dispatcher creates a handler
 * once the classifier has resolved, calls begin() with the seed pointers
 * and then feeds it every event until the handler reports "done".
 *
 * States: idle -> tracking -> committing -> done
 *
 * - Draw: captures canvas-space points into the in-progress buffer
 * - Erase: removes strokes under the eraser disc
 * - Pan: translates the transform by pointer deltas
 * - PanZoom: scales by the change in mean finger spread, pans by centroid motion
 *
 * Release and pointer loss (cancel) end every gesture the same way.
 */
import { Events, type WhiteboardBus } from "./event-bus";
import type { WhiteboardConfig } from "./config";
import type { StrokeStore } from "./stroke-store";
import type { CanvasTransform } from "./transform";
import { distance, isPressed, type GestureKind, type Point, type PointerInput } from "./types";

export type HandlerState = "idle" | "tracking" | "committing" | "done";

/**
 * Shared session state handed to every handler
 */
export interface GestureContext {
  transform: CanvasTransform;
  strokes: StrokeStore;
  bus: WhiteboardBus;
  config: WhiteboardConfig;
}

export interface GestureHandler {
  readonly kind: GestureKind;
  readonly state: HandlerState;
  readonly pointerIds: number[];
  begin(pointers: readonly PointerInput[]): void;
  /** @returns true when the event was consumed */
  handle(input: PointerInput): boolean;
  /** End the gesture as if every tracked pointer was released */
  cancel(): void;
}

// ============================================================
// Single-pointer base
// ============================================================

abstract class SinglePointerHandler implements GestureHandler {
  abstract readonly kind: GestureKind;

  protected readonly ctx: GestureContext;
  private _state: HandlerState = "idle";
  private pointerId: number | null = null;

  constructor(ctx: GestureContext) {
    this.ctx = ctx;
  }

  get state(): HandlerState {
    return this._state;
  }

  get pointerIds(): number[] {
    return this.pointerId === null ? [] : [this.pointerId];
  }

  begin(pointers: readonly PointerInput[]): void {
    if (this._state !== "idle") return;

    const start = pointers[0];
    if (!start) {
      this._state = "done";
      return;
    }

    this.pointerId = start.id;
    this._state = "tracking";
    this.onBegin(start);
  }

  handle(input: PointerInput): boolean {
    if (this._state !== "tracking" || input.id !== this.pointerId) return false;

    if (isPressed(input)) {
      this.onMove(input);
    } else {
      this.finish();
    }
    return true;
  }

  cancel(): void {
    if (this._state === "tracking") this.finish();
  }

  protected abstract onBegin(start: PointerInput): void;
  protected abstract onMove(input: PointerInput): void;
  protected abstract onEnd(): void;

  private finish(): void {
    this._state = "committing";
    this.onEnd();
    this._state = "done";
  }
}

// ============================================================
// Draw
// ============================================================

export class DrawHandler extends SinglePointerHandler {
  readonly kind = "draw";
  private lastAccepted: Point = { x: 0, y: 0 };

  protected onBegin(start: PointerInput): void {
    const point = this.ctx.transform.toCanvas(start.position);
    this.ctx.strokes.beginStroke(point);
    this.lastAccepted = point;
    this.ctx.bus.emit(Events.DRAW_START, { point });
  }

  protected onMove(input: PointerInput): void {
    const point = this.ctx.transform.toCanvas(input.position);

    // Jitter suppression: drop points too close to the last accepted one
    if (distance(this.lastAccepted, point) <= this.ctx.config.minPointSpacing) return;

    this.ctx.strokes.extendStroke(point);
    this.lastAccepted = point;
    this.ctx.bus.emit(Events.DRAW_UPDATE, { point, points: this.ctx.strokes.currentStroke() });
  }

  protected onEnd(): void {
    const stroke = this.ctx.strokes.commitStroke();
    this.ctx.bus.emit(Events.DRAW_END, { stroke });
  }
}

// ============================================================
// Erase
// ============================================================

export class EraseHandler extends SinglePointerHandler {
  readonly kind = "erase";
  private removed = 0;

  protected onBegin(start: PointerInput): void {
    this.removed = 0;
    this.ctx.bus.emit(Events.ERASE_START, {
      point: this.ctx.transform.toCanvas(start.position),
    });
  }

  protected onMove(input: PointerInput): void {
    const { transform, strokes, config } = this.ctx;
    const point = transform.toCanvas(input.position);
    // Constant on-screen size regardless of zoom
    const radius = config.eraserRadius / transform.scale;
    this.removed += strokes.eraseAt(point, radius).length;
  }

  protected onEnd(): void {
    this.ctx.bus.emit(Events.ERASE_END, { removed: this.removed });
  }
}

// ============================================================
// Pan
// ============================================================

export class PanHandler extends SinglePointerHandler {
  readonly kind = "pan";
  private lastPosition: Point = { x: 0, y: 0 };

  protected onBegin(start: PointerInput): void {
    this.lastPosition = start.position;
  }

  protected onMove(input: PointerInput): void {
    const delta = {
      x: input.position.x - this.lastPosition.x,
      y: input.position.y - this.lastPosition.y,
    };
    this.lastPosition = input.position;
    if (delta.x === 0 && delta.y === 0) return;

    this.ctx.transform.applyPan(delta);
    this.ctx.bus.emit(Events.TRANSFORM_CHANGE, this.ctx.transform.getState());
  }

  protected onEnd(): void {}
}

// ============================================================
// Pan + Zoom (multitouch)
// ============================================================

interface PinchSample {
  centroid: Point;
  spread: number;
}

export class PanZoomHandler implements GestureHandler {
  readonly kind = "panZoom";

  private readonly ctx: GestureContext;
  private _state: HandlerState = "idle";
  private positions = new Map<number, Point>();
  private last: PinchSample | null = null;

  constructor(ctx: GestureContext) {
    this.ctx = ctx;
  }

  get state(): HandlerState {
    return this._state;
  }

  get pointerIds(): number[] {
    return [...this.positions.keys()];
  }

  begin(pointers: readonly PointerInput[]): void {
    if (this._state !== "idle") return;

    for (const p of pointers) {
      if (isPressed(p)) this.positions.set(p.id, p.position);
    }
    this._state = "tracking";

    if (this.positions.size < 2) {
      this.finish();
      return;
    }
    this.last = this.sample();
  }

  handle(input: PointerInput): boolean {
    if (this._state !== "tracking") return false;

    if (!this.positions.has(input.id)) {
      // Another finger joining the pinch
      if (input.phase !== "down" || input.device === "stylus") return false;
      this.positions.set(input.id, input.position);
      this.last = this.sample();
      return true;
    }

    if (!isPressed(input)) {
      this.positions.delete(input.id);
      if (this.positions.size < 2) {
        this.finish();
      } else {
        this.last = this.sample();
      }
      return true;
    }

    this.positions.set(input.id, input.position);
    const current = this.sample();

    if (this.last) {
      const { transform, config } = this.ctx;
      // Skip the zoom step on a degenerate previous spread (fingers on top of each other)
      if (this.last.spread > config.zoomDistanceEpsilon) {
        transform.applyZoom(current.spread / this.last.spread);
      }
      transform.applyPan({
        x: current.centroid.x - this.last.centroid.x,
        y: current.centroid.y - this.last.centroid.y,
      });
      this.ctx.bus.emit(Events.TRANSFORM_CHANGE, transform.getState());
    }

    this.last = current;
    return true;
  }

  cancel(): void {
    if (this._state === "tracking") this.finish();
  }

  private finish(): void {
    this._state = "committing";
    this.positions.clear();
    this.last = null;
    this._state = "done";
  }

  /**
   * Centroid and mean pairwise distance of all pressed tracked pointers
   */
  private sample(): PinchSample {
    const points = [...this.positions.values()];
    return { centroid: centroid(points), spread: meanPairwiseDistance(points) };
  }
}

export function centroid(points: readonly Point[]): Point {
  if (points.length === 0) return { x: 0, y: 0 };
  let x = 0,
    y = 0;
  for (const p of points) {
    x += p.x;
    y += p.y;
  }
  return { x: x / points.length, y: y / points.length };
}

export function meanPairwiseDistance(points: readonly Point[]): number {
  let total = 0;
  let pairs = 0;
  for (let i = 0; i < points.length; i++) {
    for (let j = i + 1; j < points.length; j++) {
      total += distance(points[i], points[j]);
      pairs++;
    }
  }
  return pairs === 0 ? 0 : total / pairs;
}

// ============================================================
// Handler Registry
// ============================================================

export function createHandler(kind: GestureKind, ctx: GestureContext): GestureHandler {
  switch (kind) {
    case "draw":
      return new DrawHandler(ctx);
    case "erase":
      return new EraseHandler(ctx);
    case "pan":
      return new PanHandler(ctx);
    case "panZoom":
      return new PanZoomHandler(ctx);
    default: {
      const unknown: never = kind;
      throw new Error(`Unknown gesture kind: ${String(unknown)}`);
    }
  }
}
