/**
 * Canvas Transform - Pan/Zoom State
 *
 * Holds the scale + translation pair shared by every coordinate
 * conversion and by the renderer:
 * - Scale (zoom factor, clamped to [minScale, maxScale])
 * - Offset (translation in device pixels, unclamped)
 *
 * Coordinate Spaces:
 * - Device Space: raw pointer coordinates relative to the surface
 * - Canvas Space: where strokes are stored (pan/zoom removed)
 *
 * Transformation (device to canvas):
 * 1. Translate by -offset
 * 2. Scale by 1/scale
 */
import type { Point, TransformState } from "./types";

export interface ScaleBounds {
  minScale: number;
  maxScale: number;
}

export class CanvasTransform {
  // Translation in device pixels
  private offsetX = 0;
  private offsetY = 0;

  private _scale = 1;

  private readonly minScale: number;
  private readonly maxScale: number;

  constructor(bounds: ScaleBounds = { minScale: 0.2, maxScale: 10 }) {
    this.minScale = bounds.minScale;
    this.maxScale = bounds.maxScale;
  }

  get scale(): number {
    return this._scale;
  }

  get offset(): Point {
    return { x: this.offsetX, y: this.offsetY };
  }

  getState(): TransformState {
    return { scale: this._scale, offset: this.offset };
  }

  /**
   * Restore transform state (scale is clamped)
   */
  setState(state: TransformState): void {
    this.offsetX = state.offset.x;
    this.offsetY = state.offset.y;
    this._scale = this.clampScale(state.scale);
  }

  /**
   * Convert device coordinates to canvas coordinates
   */
  toCanvas(device: Point): Point {
    return {
      x: (device.x - this.offsetX) / this._scale,
      y: (device.y - this.offsetY) / this._scale,
    };
  }

  /**
   * Convert canvas coordinates to device coordinates
   */
  toDevice(canvas: Point): Point {
    return {
      x: canvas.x * this._scale + this.offsetX,
      y: canvas.y * this._scale + this.offsetY,
    };
  }

  /**
   * Multiply scale by factor, clamped to the configured bounds.
   * Non-finite or non-positive factors leave the scale untouched.
   */
  applyZoom(factor: number): void {
    if (!Number.isFinite(factor) || factor <= 0) return;
    this._scale = this.clampScale(this._scale * factor);
  }

  /**
   * Add a device-space delta to the offset
   */
  applyPan(delta: Point): void {
    this.offsetX += delta.x;
    this.offsetY += delta.y;
  }

  /**
   * Reset to identity (scale 1, no offset)
   */
  reset(): void {
    this.offsetX = 0;
    this.offsetY = 0;
    this._scale = 1;
  }

  /**
   * Get the transformation matrix for canvas rendering
   * Returns [a, b, c, d, e, f] for ctx.setTransform(a, b, c, d, e, f)
   *
   * This matrix transforms canvas coordinates to device coordinates.
   */
  getTransformMatrix(): [number, number, number, number, number, number] {
    const s = this._scale;
    return [s, 0, 0, s, this.offsetX, this.offsetY];
  }

  /**
   * Get zoom percentage for display
   */
  getZoomPercent(): number {
    return Math.round(this._scale * 100);
  }

  private clampScale(value: number): number {
    return Math.max(this.minScale, Math.min(this.maxScale, value));
  }
}
