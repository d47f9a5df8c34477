/**
 * Inverse mapping from a plot-local x coordinate to a point on a rendered path.
 *
 * Segments are scanned in path order and the first one whose x-extent contains the target
 * wins; there is no search for a globally best match. Curves are inverted with a fixed-step
 * bisection on their x component, which assumes x is monotonic in `t` (true for the curves the
 * smooth-path builder emits from left-to-right points).
 *
 * @module findPathIntersection
 */

import type { ChartPath } from '../core/path/chartPath';
import type { Point } from '../utils/geometry';
import { clamp01 } from '../utils/geometry';

export const INTERSECTION_TOLERANCE_CSS_PX = 0.5;
export const BISECTION_ITERATIONS = 12;
export const MAX_EXTRAPOLATION_DISTANCE_CSS_PX = 100;

const EPSILON = 1e-9;

type PathSegment =
  | Readonly<{ kind: 'line'; start: Point; end: Point }>
  | Readonly<{ kind: 'quad'; start: Point; control: Point; end: Point }>
  | Readonly<{ kind: 'cubic'; start: Point; control1: Point; control2: Point; end: Point }>;

export interface PathIntersectionOptions {
  readonly tolerance?: number;
  readonly iterations?: number;
  readonly maxExtrapolationDistance?: number;
}

export function cubicBezierPoint(t: number, p0: Point, p1: Point, p2: Point, p3: Point): Point {
  const mt = 1 - t;
  const mt2 = mt * mt;
  const mt3 = mt2 * mt;
  const t2 = t * t;
  const t3 = t2 * t;
  return {
    x: mt3 * p0.x + 3 * mt2 * t * p1.x + 3 * mt * t2 * p2.x + t3 * p3.x,
    y: mt3 * p0.y + 3 * mt2 * t * p1.y + 3 * mt * t2 * p2.y + t3 * p3.y,
  };
}

export function quadraticBezierPoint(t: number, p0: Point, p1: Point, p2: Point): Point {
  const mt = 1 - t;
  return {
    x: mt * mt * p0.x + 2 * mt * t * p1.x + t * t * p2.x,
    y: mt * mt * p0.y + 2 * mt * t * p1.y + t * t * p2.y,
  };
}

/**
 * Bisection on `t` in [0, 1] for `evaluate(t).x === targetX`. Stops early once within
 * `tolerance`; otherwise returns the midpoint of the final interval.
 */
const bisectX = (
  evaluate: (t: number) => Point,
  targetX: number,
  tolerance: number,
  iterations: number
): Point => {
  let lower = 0;
  let upper = 1;
  for (let i = 0; i < iterations; i++) {
    const mid = (lower + upper) / 2;
    const point = evaluate(mid);
    if (Math.abs(point.x - targetX) < tolerance) return point;
    if (point.x < targetX) {
      lower = mid;
    } else {
      upper = mid;
    }
  }
  return evaluate((lower + upper) / 2);
};

export function findLineIntersection(start: Point, end: Point, targetX: number, tolerance: number): Point | null {
  const minX = Math.min(start.x, end.x) - tolerance;
  const maxX = Math.max(start.x, end.x) + tolerance;
  if (targetX < minX || targetX > maxX) return null;

  const rawDx = end.x - start.x;
  const dx = Math.abs(rawDx) < EPSILON ? (rawDx < 0 ? -EPSILON : EPSILON) : rawDx;
  const t = clamp01((targetX - start.x) / dx);
  return { x: targetX, y: start.y + t * (end.y - start.y) };
}

export function findQuadraticBezierIntersection(
  targetX: number,
  p0: Point,
  p1: Point,
  p2: Point,
  tolerance: number,
  iterations: number = BISECTION_ITERATIONS
): Point | null {
  const minX = Math.min(p0.x, p1.x, p2.x) - tolerance;
  const maxX = Math.max(p0.x, p1.x, p2.x) + tolerance;
  if (targetX < minX || targetX > maxX) return null;
  return bisectX((t) => quadraticBezierPoint(t, p0, p1, p2), targetX, tolerance, iterations);
}

export function findCubicBezierIntersection(
  targetX: number,
  p0: Point,
  p1: Point,
  p2: Point,
  p3: Point,
  tolerance: number,
  iterations: number = BISECTION_ITERATIONS
): Point | null {
  const minX = Math.min(p0.x, p1.x, p2.x, p3.x) - tolerance;
  const maxX = Math.max(p0.x, p1.x, p2.x, p3.x) + tolerance;
  if (targetX < minX || targetX > maxX) return null;
  return bisectX((t) => cubicBezierPoint(t, p0, p1, p2, p3), targetX, tolerance, iterations);
}

/**
 * Direction of travel at the end of a segment: the curve's derivative at `t = 1`.
 */
export function segmentExitTangent(segment: PathSegment): Point {
  switch (segment.kind) {
    case 'line':
      return { x: segment.end.x - segment.start.x, y: segment.end.y - segment.start.y };
    case 'quad':
      return { x: 2 * (segment.end.x - segment.control.x), y: 2 * (segment.end.y - segment.control.y) };
    case 'cubic':
      return { x: 3 * (segment.end.x - segment.control2.x), y: 3 * (segment.end.y - segment.control2.y) };
  }
}

const intersectSegment = (
  segment: PathSegment,
  targetX: number,
  tolerance: number,
  iterations: number
): Point | null => {
  switch (segment.kind) {
    case 'line':
      return findLineIntersection(segment.start, segment.end, targetX, tolerance);
    case 'quad':
      if (targetX > segment.end.x) return null;
      return findQuadraticBezierIntersection(targetX, segment.start, segment.control, segment.end, tolerance, iterations);
    case 'cubic':
      if (targetX > segment.end.x) return null;
      return findCubicBezierIntersection(
        targetX,
        segment.start,
        segment.control1,
        segment.control2,
        segment.end,
        tolerance,
        iterations
      );
  }
};

/**
 * Point where the vertical line `x = targetX` meets `path`, or null.
 *
 * When no segment contains `targetX` but it lies past the end of the last segment (by at most
 * `maxExtrapolationDistance`), the result is extrapolated along that segment's exit tangent.
 * A vertical exit tangent yields null.
 */
export function findPathIntersection(
  path: ChartPath,
  targetX: number,
  options: PathIntersectionOptions = {}
): Point | null {
  if (!Number.isFinite(targetX)) return null;

  const tolerance = options.tolerance ?? INTERSECTION_TOLERANCE_CSS_PX;
  const iterations = options.iterations ?? BISECTION_ITERATIONS;
  const maxExtrapolation = options.maxExtrapolationDistance ?? MAX_EXTRAPOLATION_DISTANCE_CSS_PX;

  let current: Point | null = null;
  let subpathStart: Point | null = null;
  let lastSegment: PathSegment | null = null;

  for (const cmd of path) {
    let segment: PathSegment | null = null;
    switch (cmd.type) {
      case 'moveTo':
        current = cmd.to;
        subpathStart = cmd.to;
        continue;
      case 'lineTo':
        if (current) segment = { kind: 'line', start: current, end: cmd.to };
        current = cmd.to;
        break;
      case 'quadTo':
        if (current) segment = { kind: 'quad', start: current, control: cmd.control, end: cmd.to };
        current = cmd.to;
        break;
      case 'cubicTo':
        if (current) {
          segment = { kind: 'cubic', start: current, control1: cmd.control1, control2: cmd.control2, end: cmd.to };
        }
        current = cmd.to;
        break;
      case 'arc':
        // Arcs only appear in single-point dots, which are never searched.
        current = {
          x: cmd.center.x + cmd.radius * Math.cos(cmd.endAngle),
          y: cmd.center.y + cmd.radius * Math.sin(cmd.endAngle),
        };
        continue;
      case 'close':
        current = subpathStart;
        continue;
    }

    if (!segment) continue;
    lastSegment = segment;
    const hit = intersectSegment(segment, targetX, tolerance, iterations);
    if (hit) return hit;
  }

  if (!lastSegment || targetX <= lastSegment.end.x) return null;
  if (targetX - lastSegment.end.x > maxExtrapolation) return null;

  const tangent = segmentExitTangent(lastSegment);
  if (tangent.x === 0) return null;
  const slope = tangent.y / tangent.x;
  return { x: targetX, y: lastSegment.end.y + slope * (targetX - lastSegment.end.x) };
}
