/**
 * Paper Renderer - Stroke Rendering
 *
 * Layer model:
 * - Background layer: white rectangle covering the visible view
 * - Strokes layer: one open path per committed stroke, in store order
 * - Preview layer: the in-progress stroke while drawing
 *
 * Transform support:
 * - Applies the canvas transform to the Paper.js view matrix
 * - Stroke widths are divided by scale so lines keep their on-screen width
 */
import paper from "paper";
import type { RenderState } from "./whiteboard";
import type { Point, Stroke, StrokeStyle, TransformState } from "./types";

export class PaperRenderer {
  private backgroundLayer: paper.Layer;
  private strokesLayer: paper.Layer;
  private previewLayer: paper.Layer;

  // Paths of committed strokes, by stroke id
  private strokePaths = new Map<number, paper.Path>();
  private lastStrokes: readonly Stroke[] | null = null;
  private lastScale = 1;

  constructor(canvas: HTMLCanvasElement) {
    paper.setup(canvas);
    this.backgroundLayer = paper.project.activeLayer;
    this.strokesLayer = new paper.Layer();
    this.previewLayer = new paper.Layer();
  }

  resize(width: number, height: number): void {
    paper.view.viewSize = new paper.Size(width, height);
  }

  render(state: RenderState): void {
    this.applyTransform(state.transform);
    this.paintBackground();
    this.syncStrokes(state.strokes, state.transform.scale);
    this.syncPreview(state.inProgress, state.previewStyle, state.transform.scale);
    paper.view.update();
  }

  /**
   * Apply the canvas transform to the Paper.js view
   */
  private applyTransform(transform: TransformState): void {
    const { scale, offset } = transform;
    paper.view.matrix.set(scale, 0, 0, scale, offset.x, offset.y);
  }

  private paintBackground(): void {
    this.backgroundLayer.removeChildren();
    const rect = new paper.Path.Rectangle(paper.view.bounds);
    rect.fillColor = new paper.Color("white");
    this.backgroundLayer.addChild(rect);
  }

  private syncStrokes(strokes: readonly Stroke[], scale: number): void {
    if (strokes === this.lastStrokes && scale === this.lastScale) return;

    const seen = new Set<number>();
    this.strokesLayer.removeChildren();
    for (const stroke of strokes) {
      seen.add(stroke.id);
      let path = this.strokePaths.get(stroke.id);
      if (!path) {
        path = createPolyline(stroke.points, stroke.color);
        this.strokePaths.set(stroke.id, path);
      }
      path.strokeWidth = stroke.width / scale;
      this.strokesLayer.addChild(path);
    }

    for (const id of [...this.strokePaths.keys()]) {
      if (!seen.has(id)) this.strokePaths.delete(id);
    }

    this.lastStrokes = strokes;
    this.lastScale = scale;
  }

  private syncPreview(points: readonly Point[] | null, style: StrokeStyle, scale: number): void {
    this.previewLayer.removeChildren();
    // A single point has no visible segment yet
    if (!points || points.length < 2) return;

    const path = createPolyline(points, style.color);
    path.strokeWidth = style.width / scale;
    this.previewLayer.addChild(path);
  }
}

function createPolyline(points: readonly Point[], color: string): paper.Path {
  // Not inserted; callers place it in a layer
  const path = new paper.Path({ insert: false });
  for (const p of points) {
    path.add(new paper.Point(p.x, p.y));
  }
  path.strokeColor = new paper.Color(color);
  path.strokeCap = "round";
  path.strokeJoin = "round";
  return path;
}
