import { describe, it, expect } from 'vitest';
import { getPathEndPoint, interpolatePath, isSamePathShape, pathToSvgData } from '../chartPath';
import type { ChartPath } from '../chartPath';
import { buildDotPath } from '../buildSmoothPath';

const line = (x0: number, y0: number, x1: number, y1: number): ChartPath => [
  { type: 'moveTo', to: { x: x0, y: y0 } },
  { type: 'lineTo', to: { x: x1, y: y1 } },
];

describe('getPathEndPoint', () => {
  it('returns null for an empty path', () => {
    expect(getPathEndPoint([])).toBeNull();
  });

  it('returns the last drawn point', () => {
    expect(getPathEndPoint(line(0, 0, 10, 5))).toEqual({ x: 10, y: 5 });
  });

  it('returns to the subpath start after close', () => {
    expect(getPathEndPoint(buildDotPath({ x: 50, y: 40 }, { width: 200, height: 100 }))).toEqual({ x: 54, y: 40 });
  });
});

describe('pathToSvgData', () => {
  it('serializes lines and curves with three decimals', () => {
    const path: ChartPath = [
      { type: 'moveTo', to: { x: 0, y: 0 } },
      { type: 'lineTo', to: { x: 1.23456, y: -0.0001 } },
      { type: 'quadTo', control: { x: 2, y: 2 }, to: { x: 3, y: 0 } },
      { type: 'cubicTo', control1: { x: 4, y: 1 }, control2: { x: 5, y: 1 }, to: { x: 6, y: 0 } },
    ];
    expect(pathToSvgData(path)).toBe('M 0 0 L 1.235 0 Q 2 2 3 0 C 4 1 5 1 6 0');
  });

  it('draws a full circle as two half arcs', () => {
    const dot = buildDotPath({ x: 50, y: 40 }, { width: 200, height: 100 });
    expect(pathToSvgData(dot)).toBe('M 54 40 L 54 40 A 4 4 0 1 1 46 40 A 4 4 0 1 1 54 40 Z');
  });
});

describe('interpolatePath', () => {
  it('interpolates paths of the same shape pointwise', () => {
    expect(interpolatePath(line(0, 0, 10, 10), line(10, 0, 20, 20), 0.5)).toEqual(line(5, 0, 15, 15));
  });

  it('returns the end points at t = 0 and t = 1', () => {
    const from = line(0, 0, 10, 10);
    const to = line(10, 0, 20, 20);
    expect(interpolatePath(from, to, 0)).toBe(from);
    expect(interpolatePath(from, to, 1)).toBe(to);
  });

  it('jumps between paths of different shape', () => {
    const from = line(0, 0, 10, 10);
    const to = buildDotPath({ x: 5, y: 5 }, { width: 100, height: 100 });
    expect(isSamePathShape(from, to)).toBe(false);
    expect(interpolatePath(from, to, 0)).toBe(from);
    expect(interpolatePath(from, to, 0.3)).toBe(to);
  });
});
