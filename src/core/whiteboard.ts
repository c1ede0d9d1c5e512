/**
 * Whiteboard Session
 *
 * Owns the shared state of one canvas session and wires it together:
 * - CanvasTransform (pan/zoom), written only by the pan handlers
 * - StrokeStore (committed strokes + in-progress buffer)
 * - Per-session EventBus carrying gesture and mutation signals
 * - Preview store for live drawing / erasing feedback
 * - GestureDispatcher consuming host pointer events
 *
 * Hosts feed events through handlePointer()/onPointerSequence() and read
 * getRenderState() on their own frame cadence.
 */
import { resolveConfig, type WhiteboardConfig } from "./config";
import { EventBus, Events, type WhiteboardEvents } from "./event-bus";
import { GestureDispatcher, type GestureState, type Scheduler } from "./gesture-dispatcher";
import { Store } from "./stores";
import { StrokeStore } from "./stroke-store";
import { CanvasTransform } from "./transform";
import type { Point, PointerInput, Stroke, StrokeStyle, TransformState } from "./types";

export type PreviewMode = "idle" | "drawing" | "erasing";

export interface PreviewState {
  mode: PreviewMode;
  /** In-progress stroke points (canvas space), empty unless drawing */
  points: readonly Point[];
}

export interface RenderState {
  strokes: readonly Stroke[];
  inProgress: readonly Point[] | null;
  previewStyle: StrokeStyle;
  transform: TransformState;
}

export interface WhiteboardOptions {
  config?: Partial<WhiteboardConfig>;
  scheduler?: Scheduler;
}

const IDLE_PREVIEW: PreviewState = { mode: "idle", points: [] };

export class Whiteboard {
  readonly config: WhiteboardConfig;
  readonly bus = new EventBus<WhiteboardEvents>();
  readonly transform: CanvasTransform;
  readonly strokes: StrokeStore;
  readonly preview = new Store<PreviewState>(IDLE_PREVIEW);

  private dispatcher: GestureDispatcher;
  private unsubscribers: Array<() => void> = [];

  constructor(options: WhiteboardOptions = {}) {
    this.config = resolveConfig(options.config);
    this.transform = new CanvasTransform(this.config);
    this.strokes = new StrokeStore(
      { color: this.config.strokeColor, width: this.config.strokeWidth },
      this.bus,
    );
    this.dispatcher = new GestureDispatcher(
      { transform: this.transform, strokes: this.strokes, bus: this.bus, config: this.config },
      options.scheduler,
    );
    this.subscribeToPreviewSignals();
  }

  /**
   * Process one host pointer event
   * @returns true when the event was consumed
   */
  handlePointer(input: PointerInput): boolean {
    return this.dispatcher.handlePointer(input);
  }

  onPointerSequence(inputs: Iterable<PointerInput>): void {
    this.dispatcher.onPointerSequence(inputs);
  }

  getGestureState(): GestureState {
    return this.dispatcher.getGestureState();
  }

  getRenderState(): RenderState {
    const preview = this.preview.get();
    return {
      strokes: this.strokes.snapshot(),
      inProgress: preview.mode === "drawing" ? preview.points : null,
      previewStyle: { color: this.config.strokeColor, width: this.config.strokeWidth },
      transform: this.transform.getState(),
    };
  }

  /**
   * Remove every stroke (not a gesture; host command)
   */
  clear(): void {
    this.strokes.clear();
  }

  /**
   * Back to scale 1 and no offset
   */
  resetView(): void {
    this.transform.reset();
    this.bus.emit(Events.TRANSFORM_CHANGE, this.transform.getState());
  }

  /**
   * End any gesture in progress as if released and stop the classifier timer
   */
  cancelGesture(): void {
    this.dispatcher.cancel();
  }

  /**
   * Cancel the current gesture and drop every subscriber
   */
  dispose(): void {
    this.cancelGesture();
    this.unsubscribers.forEach((off) => off());
    this.unsubscribers = [];
    this.bus.clear();
  }

  private subscribeToPreviewSignals() {
    this.unsubscribers.push(
      this.bus.on(Events.DRAW_START, ({ point }) => {
        this.preview.set({ mode: "drawing", points: [point] });
      }),
      this.bus.on(Events.DRAW_UPDATE, ({ points }) => {
        this.preview.set({ mode: "drawing", points });
      }),
      this.bus.on(Events.DRAW_END, () => this.preview.set(IDLE_PREVIEW)),
      this.bus.on(Events.ERASE_START, () => this.preview.set({ mode: "erasing", points: [] })),
      this.bus.on(Events.ERASE_END, () => this.preview.set(IDLE_PREVIEW)),
    );
  }
}
