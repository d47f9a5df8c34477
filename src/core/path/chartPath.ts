/**
 * Vector path model exchanged with the render surface.
 *
 * A `ChartPath` is a flat list of drawing commands in plot-local CSS pixels. The curve builder
 * only emits `moveTo`, `cubicTo` and (for single points) `arc`/`close`; `lineTo` and `quadTo` are
 * accepted everywhere paths are consumed so that surfaces and the cursor engine can work on any
 * path a caller hands them.
 *
 * @module chartPath
 */

import type { Point } from '../../utils/geometry';
import { lerp } from '../../utils/geometry';

export type MoveToCommand = Readonly<{ type: 'moveTo'; to: Point }>;
export type LineToCommand = Readonly<{ type: 'lineTo'; to: Point }>;
export type QuadToCommand = Readonly<{ type: 'quadTo'; control: Point; to: Point }>;
export type CubicToCommand = Readonly<{ type: 'cubicTo'; control1: Point; control2: Point; to: Point }>;
export type ArcCommand = Readonly<{
  type: 'arc';
  center: Point;
  radius: number;
  /** Radians, measured from the +x axis. */
  startAngle: number;
  endAngle: number;
  /** Clockwise on screen (y grows downward). */
  clockwise: boolean;
}>;
export type CloseCommand = Readonly<{ type: 'close' }>;

export type PathCommand =
  | MoveToCommand
  | LineToCommand
  | QuadToCommand
  | CubicToCommand
  | ArcCommand
  | CloseCommand;

export type ChartPath = ReadonlyArray<PathCommand>;

export const EMPTY_PATH: ChartPath = [];

const TAU = Math.PI * 2;

const arcPointAt = (c: Point, r: number, angle: number): Point => ({
  x: c.x + r * Math.cos(angle),
  y: c.y + r * Math.sin(angle),
});

/**
 * Returns the current point after the last command, or null for an empty path.
 */
export function getPathEndPoint(path: ChartPath): Point | null {
  let current: Point | null = null;
  let subpathStart: Point | null = null;
  for (const cmd of path) {
    switch (cmd.type) {
      case 'moveTo':
        current = cmd.to;
        subpathStart = cmd.to;
        break;
      case 'lineTo':
      case 'quadTo':
      case 'cubicTo':
        current = cmd.to;
        break;
      case 'arc':
        current = arcPointAt(cmd.center, cmd.radius, cmd.endAngle);
        break;
      case 'close':
        current = subpathStart;
        break;
    }
  }
  return current;
}

const fmt = (n: number): string => {
  const rounded = Number(n.toFixed(3));
  return Object.is(rounded, -0) ? '0' : String(rounded);
};

const fmtPoint = (p: Point): string => `${fmt(p.x)} ${fmt(p.y)}`;

const arcToSvg = (cmd: ArcCommand, hasCurrentPoint: boolean): string => {
  const { center, radius, startAngle, endAngle, clockwise } = cmd;
  const start = arcPointAt(center, radius, startAngle);
  const lead = hasCurrentPoint ? `L ${fmtPoint(start)}` : `M ${fmtPoint(start)}`;
  if (radius <= 0) return lead;

  let sweepAngle = clockwise ? endAngle - startAngle : startAngle - endAngle;
  if (sweepAngle < 0) sweepAngle = (sweepAngle % TAU) + TAU;
  const sweepFlag = clockwise ? 1 : 0;
  const r = fmt(radius);

  if (sweepAngle >= TAU - 1e-9) {
    // A single SVG arc cannot draw a full circle; go through the opposite point.
    const mid = arcPointAt(center, radius, startAngle + (clockwise ? Math.PI : -Math.PI));
    return `${lead} A ${r} ${r} 0 1 ${sweepFlag} ${fmtPoint(mid)} A ${r} ${r} 0 1 ${sweepFlag} ${fmtPoint(start)}`;
  }

  const end = arcPointAt(center, radius, endAngle);
  const largeArc = sweepAngle > Math.PI ? 1 : 0;
  return `${lead} A ${r} ${r} 0 ${largeArc} ${sweepFlag} ${fmtPoint(end)}`;
};

/**
 * Serializes a path to an SVG `d` attribute (absolute commands, 3 decimal places).
 */
export function pathToSvgData(path: ChartPath): string {
  const parts: string[] = [];
  let hasCurrentPoint = false;
  for (const cmd of path) {
    switch (cmd.type) {
      case 'moveTo':
        parts.push(`M ${fmtPoint(cmd.to)}`);
        break;
      case 'lineTo':
        parts.push(`L ${fmtPoint(cmd.to)}`);
        break;
      case 'quadTo':
        parts.push(`Q ${fmtPoint(cmd.control)} ${fmtPoint(cmd.to)}`);
        break;
      case 'cubicTo':
        parts.push(`C ${fmtPoint(cmd.control1)} ${fmtPoint(cmd.control2)} ${fmtPoint(cmd.to)}`);
        break;
      case 'arc':
        parts.push(arcToSvg(cmd, hasCurrentPoint));
        break;
      case 'close':
        parts.push('Z');
        break;
    }
    hasCurrentPoint = cmd.type !== 'close';
  }
  return parts.join(' ');
}

const lerpPoint = (a: Point, b: Point, t: number): Point => ({ x: lerp(a.x, b.x, t), y: lerp(a.y, b.y, t) });

/**
 * True when two paths have the same command sequence, so they can be interpolated pointwise.
 */
export function isSamePathShape(a: ChartPath, b: ChartPath): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    const ca = a[i];
    const cb = b[i];
    if (ca.type !== cb.type) return false;
    if (ca.type === 'arc' && cb.type === 'arc' && ca.clockwise !== cb.clockwise) return false;
  }
  return true;
}

const interpolateCommand = (from: PathCommand, to: PathCommand, t: number): PathCommand => {
  switch (to.type) {
    case 'moveTo':
      return from.type === 'moveTo' ? { type: 'moveTo', to: lerpPoint(from.to, to.to, t) } : to;
    case 'lineTo':
      return from.type === 'lineTo' ? { type: 'lineTo', to: lerpPoint(from.to, to.to, t) } : to;
    case 'quadTo':
      return from.type === 'quadTo'
        ? { type: 'quadTo', control: lerpPoint(from.control, to.control, t), to: lerpPoint(from.to, to.to, t) }
        : to;
    case 'cubicTo':
      return from.type === 'cubicTo'
        ? {
            type: 'cubicTo',
            control1: lerpPoint(from.control1, to.control1, t),
            control2: lerpPoint(from.control2, to.control2, t),
            to: lerpPoint(from.to, to.to, t),
          }
        : to;
    case 'arc':
      return from.type === 'arc'
        ? {
            type: 'arc',
            center: lerpPoint(from.center, to.center, t),
            radius: lerp(from.radius, to.radius, t),
            startAngle: lerp(from.startAngle, to.startAngle, t),
            endAngle: lerp(from.endAngle, to.endAngle, t),
            clockwise: to.clockwise,
          }
        : to;
    case 'close':
      return to;
  }
};

/**
 * Intermediate frame of a path animation.
 *
 * Paths of the same shape are interpolated command by command. Paths of different shape cannot
 * be morphed meaningfully and jump to `to` on the first frame past `t = 0`.
 */
export function interpolatePath(from: ChartPath, to: ChartPath, t01: number): ChartPath {
  if (t01 >= 1) return to;
  if (!isSamePathShape(from, to)) return t01 <= 0 ? from : to;
  if (t01 <= 0) return from;
  return to.map((cmd, i) => interpolateCommand(from[i], cmd, t01));
}
