import type { Point, Rect, Size } from '../../utils/geometry';
import { clampPoint } from '../../utils/geometry';
import type { ChartPath, PathCommand } from './chartPath';

const MAX_DOT_RADIUS_CSS_PX = 4;
const DOT_RADIUS_FRACTION = 0.4;

/**
 * Smooth curve through `points` (Catmull-Rom converted to cubic Béziers).
 *
 * For each pair `(p1, p2)` with neighbours `p0` (or `p1` at the start) and `p3` (or `p2` at the
 * end): `cp1 = p1 + (p2 - p0) / 6`, `cp2 = p2 - (p3 - p1) / 6`.
 *
 * Every emitted point, control points included, is clamped into `clampRect` component-wise.
 * This keeps the endpoints and hull inside the rect but does not guarantee the curve itself
 * stays inside; consumers (the cursor engine in particular) depend on exactly this geometry.
 *
 * Emits `moveTo` + `points.length - 1` `cubicTo` commands, or an empty path for fewer than 2
 * points.
 */
export function buildSmoothPath(points: ReadonlyArray<Point>, clampRect: Rect): ChartPath {
  if (points.length < 2) return [];

  const commands: PathCommand[] = [{ type: 'moveTo', to: clampPoint(points[0], clampRect) }];

  for (let i = 0; i < points.length - 1; i++) {
    const p0 = i > 0 ? points[i - 1] : points[i];
    const p1 = points[i];
    const p2 = points[i + 1];
    const p3 = i + 2 < points.length ? points[i + 2] : points[i + 1];

    const cp1: Point = {
      x: p1.x + (p2.x - p0.x) / 6,
      y: p1.y + (p2.y - p0.y) / 6,
    };
    const cp2: Point = {
      x: p2.x - (p3.x - p1.x) / 6,
      y: p2.y - (p3.y - p1.y) / 6,
    };

    commands.push({
      type: 'cubicTo',
      control1: clampPoint(cp1, clampRect),
      control2: clampPoint(cp2, clampRect),
      to: clampPoint(p2, clampRect),
    });
  }

  return commands;
}

export function computeDotRadius(plotSize: Size): number {
  return Math.min(MAX_DOT_RADIUS_CSS_PX, DOT_RADIUS_FRACTION * Math.min(plotSize.width, plotSize.height));
}

/**
 * Full circle used to draw a single-point series: `moveTo` the arc start, a clockwise arc from 0
 * to 2π, then `close`.
 */
export function buildDotPath(center: Point, plotSize: Size): ChartPath {
  const radius = Math.max(0, computeDotRadius(plotSize));
  return [
    { type: 'moveTo', to: { x: center.x + radius, y: center.y } },
    { type: 'arc', center, radius, startAngle: 0, endAngle: Math.PI * 2, clockwise: true },
    { type: 'close' },
  ];
}
