/**
 * Whiteboard configuration
 *
 * All tunables for classification, drawing, erasing and zoom live here so
 * a session can be created with overrides (tests use a shorter window,
 * hosts may widen the eraser).
 */

export interface WhiteboardConfig {
  /** How long a single touch waits for a second finger before panning */
  classifierWindowMs: number;
  /** Canvas-space distance a move must exceed to be added to a stroke */
  minPointSpacing: number;
  /** Eraser radius in device pixels; divided by scale at use */
  eraserRadius: number;
  minScale: number;
  maxScale: number;
  /** Previous pinch distances below this skip the zoom step */
  zoomDistanceEpsilon: number;
  strokeColor: string;
  strokeWidth: number;
  debug: boolean;
}

export const DEFAULT_CONFIG: Readonly<WhiteboardConfig> = Object.freeze({
  classifierWindowMs: 100,
  minPointSpacing: 2,
  eraserRadius: 30,
  minScale: 0.2,
  maxScale: 10,
  zoomDistanceEpsilon: 1e-6,
  strokeColor: "#000000",
  strokeWidth: 4,
  debug: false,
});

const nonNegativeKeys = [
  "classifierWindowMs",
  "minPointSpacing",
  "zoomDistanceEpsilon",
] as const;

const positiveKeys = ["eraserRadius", "minScale", "maxScale", "strokeWidth"] as const;

/**
 * Merge overrides onto the defaults and validate the result.
 * @throws RangeError naming the first invalid key
 */
export function resolveConfig(overrides: Partial<WhiteboardConfig> = {}): WhiteboardConfig {
  const config: WhiteboardConfig = { ...DEFAULT_CONFIG, ...overrides };

  for (const key of nonNegativeKeys) {
    const value = config[key];
    if (!Number.isFinite(value) || value < 0) {
      throw new RangeError(`${key} must be a finite number >= 0, got ${value}`);
    }
  }

  for (const key of positiveKeys) {
    const value = config[key];
    if (!Number.isFinite(value) || value <= 0) {
      throw new RangeError(`${key} must be a finite number > 0, got ${value}`);
    }
  }

  if (config.minScale > config.maxScale) {
    throw new RangeError(
      `minScale (${config.minScale}) must not exceed maxScale (${config.maxScale})`,
    );
  }

  return config;
}
