/**
 * <gesture-whiteboard> host element
 *
 * Owns one whiteboard session and its host collaborators:
 * - PointerBinding: DOM pointer events => session
 * - PaperRenderer: session render state => canvas, once per animation frame
 * - Status badge: preview mode and zoom level
 */
import { LitElement, html, css } from "lit";
import { customElement } from "lit/decorators.js";
import { PaperRenderer } from "../core/paper-renderer";
import { PointerBinding } from "../core/pointer-binding";
import { StoreController } from "../core/stores";
import { Whiteboard } from "../core/whiteboard";
import { Events } from "../core/event-bus";

@customElement("gesture-whiteboard")
export class GestureWhiteboard extends LitElement {
  static styles = css`
    :host {
      display: block;
      position: relative;
      width: 100%;
      height: 100%;
      overflow: hidden;
      background: white;
    }

    canvas {
      display: block;
      width: 100%;
      height: 100%;
      touch-action: none;
    }

    .status {
      position: absolute;
      right: 8px;
      bottom: 8px;
      padding: 2px 6px;
      border-radius: 4px;
      font: 12px/1.4 system-ui, sans-serif;
      color: #444;
      background: rgba(255, 255, 255, 0.85);
      pointer-events: none;
    }
  `;

  private readonly board = new Whiteboard();
  private readonly preview = new StoreController(this, this.board.preview);
  private renderer: PaperRenderer | null = null;
  private binding: PointerBinding | null = null;
  private resizeObserver: ResizeObserver | null = null;
  private frameRequested = false;
  private unsubscribers: Array<() => void> = [];

  connectedCallback() {
    super.connectedCallback();
    // Re-attach after a move in the DOM; the first attach waits for the canvas
    if (this.renderer) this.attach();
  }

  firstUpdated() {
    const canvas = this.canvas();
    this.renderer = new PaperRenderer(canvas);
    this.attach();
    console.log("Whiteboard initialized");
  }

  disconnectedCallback() {
    super.disconnectedCallback();
    this.detach();
  }

  private canvas(): HTMLCanvasElement {
    const canvas = this.renderRoot.querySelector("canvas");
    if (!(canvas instanceof HTMLCanvasElement)) {
      throw new Error("Whiteboard canvas not found");
    }
    return canvas;
  }

  private attach() {
    const canvas = this.canvas();
    this.binding = new PointerBinding(canvas, this.board);

    this.resizeObserver = new ResizeObserver(() => {
      this.renderer?.resize(canvas.clientWidth, canvas.clientHeight);
      this.requestFrame();
    });
    this.resizeObserver.observe(canvas);

    const { bus } = this.board;
    this.unsubscribers.push(
      bus.on(Events.STROKES_CHANGE, () => this.requestFrame()),
      bus.on(Events.DRAW_UPDATE, () => this.requestFrame()),
      bus.on(Events.DRAW_END, () => this.requestFrame()),
      bus.on(Events.TRANSFORM_CHANGE, () => {
        this.requestUpdate(); // zoom badge
        this.requestFrame();
      }),
    );

    this.requestFrame();
  }

  /**
   * Stop listening while out of the document. The session and its strokes
   * survive so the element can be inserted again.
   */
  private detach() {
    this.board.cancelGesture();
    this.unsubscribers.forEach((off) => off());
    this.unsubscribers = [];
    this.resizeObserver?.disconnect();
    this.resizeObserver = null;
    this.binding?.destroy();
    this.binding = null;
  }

  /**
   * Remove every stroke
   */
  clear() {
    this.board.clear();
  }

  /**
   * Back to 100% zoom and no pan
   */
  resetView() {
    this.board.resetView();
  }

  private requestFrame() {
    if (this.frameRequested) return;
    this.frameRequested = true;
    requestAnimationFrame(() => {
      this.frameRequested = false;
      this.renderer?.render(this.board.getRenderState());
    });
  }

  render() {
    const { mode } = this.preview.value;
    return html`
      <canvas @contextmenu=${(e: Event) => e.preventDefault()}></canvas>
      <div class="status">${mode} · ${this.board.transform.getZoomPercent()}%</div>
    `;
  }
}

declare global {
  interface HTMLElementTagNameMap {
    "gesture-whiteboard": GestureWhiteboard;
  }
}
