/**
 * Stroke Store
 *
 * Ordered collection of committed strokes plus the single in-progress
 * point buffer of the active draw gesture.
 *
 * - Rendering order is insertion order
 * - snapshot() hands out an immutable array; a snapshot taken before a
 *   mutation never observes it
 * - A spatial index (R-tree of stroke bounds) narrows eraser candidates
 *   before the exact per-point hit test
 */
import RBush from "rbush";
import { Events, type WhiteboardBus } from "./event-bus";
import { discBounds, intersects, strokeBounds } from "./hit-test";
import type { Point, Stroke, StrokeStyle } from "./types";

interface SpatialIndexEntry {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
  id: number;
}

export class StrokeStore {
  private strokes: Stroke[] = [];
  private byId = new Map<number, Stroke>();
  private cachedSnapshot: readonly Stroke[] | null = null;
  private nextId = 1;

  // Spatial index of committed strokes
  private spatialIndex = new RBush<SpatialIndexEntry>();
  private indexEntries = new Map<number, SpatialIndexEntry>();

  // In-progress stroke buffer
  private buffer: Point[] = [];

  private readonly defaultStyle: StrokeStyle;
  private readonly bus: WhiteboardBus | null;

  constructor(defaultStyle: StrokeStyle, bus: WhiteboardBus | null = null) {
    this.defaultStyle = defaultStyle;
    this.bus = bus;
  }

  get size(): number {
    return this.strokes.length;
  }

  get(id: number): Stroke | undefined {
    return this.byId.get(id);
  }

  /**
   * Current ordered strokes, frozen. Rebuilt lazily after a mutation.
   */
  snapshot(): readonly Stroke[] {
    if (!this.cachedSnapshot) {
      this.cachedSnapshot = Object.freeze([...this.strokes]);
    }
    return this.cachedSnapshot;
  }

  /**
   * Add a frozen copy of the stroke to the end of the collection
   * @returns The stored copy
   * @throws RangeError when a stroke with the same id is already stored
   */
  append(stroke: Stroke): Stroke {
    if (this.byId.has(stroke.id)) {
      throw new RangeError(`Stroke id ${stroke.id} is already in the store`);
    }

    const stored: Stroke = Object.freeze({
      id: stroke.id,
      points: Object.freeze(stroke.points.map((p) => Object.freeze({ x: p.x, y: p.y }))),
      color: stroke.color,
      width: stroke.width,
    });
    this.strokes.push(stored);
    this.byId.set(stored.id, stored);
    this.nextId = Math.max(this.nextId, stored.id + 1);
    this.indexInsert(stored);
    this.changed();
    return stored;
  }

  /**
   * Remove every stroke matching the predicate, keeping the order of the rest
   * @returns The removed strokes
   */
  removeWhere(predicate: (stroke: Stroke) => boolean): Stroke[] {
    const kept: Stroke[] = [];
    const removed: Stroke[] = [];
    for (const stroke of this.strokes) {
      (predicate(stroke) ? removed : kept).push(stroke);
    }
    if (removed.length === 0) return removed;

    this.strokes = kept;
    for (const stroke of removed) {
      this.byId.delete(stroke.id);
      this.indexRemove(stroke.id);
    }
    this.changed();
    return removed;
  }

  /**
   * Remove every stroke with a point inside the disc.
   * Equivalent to removeWhere(s => intersects(s, point, radius)).
   */
  eraseAt(point: Point, radius: number): Stroke[] {
    const hits = new Set<number>();
    for (const entry of this.spatialIndex.search(discBounds(point, radius))) {
      const stroke = this.get(entry.id);
      if (stroke && intersects(stroke, point, radius)) hits.add(stroke.id);
    }
    if (hits.size === 0) return [];
    return this.removeWhere((s) => hits.has(s.id));
  }

  clear(): void {
    if (this.strokes.length === 0) return;
    this.strokes = [];
    this.byId.clear();
    this.spatialIndex.clear();
    this.indexEntries.clear();
    this.changed();
  }

  // ============================================================
  // In-progress buffer
  // ============================================================

  /**
   * Start a new buffer at the given canvas point (discards any previous one)
   */
  beginStroke(point: Point): void {
    this.buffer = [point];
  }

  extendStroke(point: Point): void {
    this.buffer.push(point);
  }

  /**
   * Read-only view of the live buffer. It grows with extendStroke() and is
   * left as it was once the buffer is committed, discarded or restarted.
   */
  currentStroke(): readonly Point[] {
    return this.buffer;
  }

  /**
   * Commit the buffer as a stroke and clear it
   * @returns The committed stroke, or null when the buffer was empty
   */
  commitStroke(style: Partial<StrokeStyle> = {}): Stroke | null {
    const points = this.buffer;
    this.buffer = [];
    if (points.length === 0) return null;

    return this.append({
      id: this.nextId,
      points,
      color: style.color ?? this.defaultStyle.color,
      width: style.width ?? this.defaultStyle.width,
    });
  }

  discardStroke(): void {
    this.buffer = [];
  }

  // ============================================================
  // Spatial index
  // ============================================================

  private indexInsert(stroke: Stroke): void {
    const entry: SpatialIndexEntry = { ...strokeBounds(stroke), id: stroke.id };
    this.spatialIndex.insert(entry);
    this.indexEntries.set(stroke.id, entry);
  }

  private indexRemove(id: number): void {
    const entry = this.indexEntries.get(id);
    if (entry) {
      this.spatialIndex.remove(entry);
      this.indexEntries.delete(id);
    }
  }

  private changed(): void {
    this.cachedSnapshot = null;
    this.bus?.emit(Events.STROKES_CHANGE, { strokes: this.snapshot() });
  }
}
