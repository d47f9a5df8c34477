/**
 * Plain 2D value types shared by the scale, path, label and cursor modules.
 *
 * @module geometry
 */

export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface Size {
  readonly width: number;
  readonly height: number;
}

/** Axis-aligned rectangle; origin is the top-left corner. */
export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export const EMPTY_RECT: Rect = { x: 0, y: 0, width: 0, height: 0 };

export const rectMaxX = (r: Rect): number => r.x + r.width;
export const rectMaxY = (r: Rect): number => r.y + r.height;

export const clamp = (v: number, min: number, max: number): number => Math.min(Math.max(v, min), max);

export const clamp01 = (v: number): number => clamp(v, 0, 1);

export const lerp = (a: number, b: number, t01: number): number => a + (b - a) * clamp01(t01);

/**
 * Shrinks a rect by `dx`/`dy` on each side. Never produces a negative size: an over-inset rect
 * collapses onto its center line.
 */
export const insetRect = (r: Rect, dx: number, dy: number): Rect => {
  const width = r.width - 2 * dx;
  const height = r.height - 2 * dy;
  return {
    x: width >= 0 ? r.x + dx : r.x + r.width / 2,
    y: height >= 0 ? r.y + dy : r.y + r.height / 2,
    width: Math.max(0, width),
    height: Math.max(0, height),
  };
};

/** Component-wise clamp of a point into `rect`. */
export const clampPoint = (p: Point, rect: Rect): Point => ({
  x: clamp(p.x, rect.x, rectMaxX(rect)),
  y: clamp(p.y, rect.y, rectMaxY(rect)),
});
