import { describe, it, expect } from 'vitest';
import { computeChartScale, computeMultiValueDomain, computeSingleValueDomain } from '../computeChartScale';
import { createChartPoint } from '../../../data/chartPoint';
import type { DataSeries } from '../../../data/chartPoint';

const seriesOf = (...values: number[]): DataSeries => values.map((v, i) => createChartPoint(v, i * 86_400_000));

describe('computeSingleValueDomain', () => {
  it('pads by 20% of the value', () => {
    expect(computeSingleValueDomain(50)).toEqual({ min: 40, max: 60 });
  });

  it('uses the magnitude for negative values', () => {
    expect(computeSingleValueDomain(-10)).toEqual({ min: -12, max: -8 });
  });

  it('falls back to an absolute padding of 1 for zero', () => {
    expect(computeSingleValueDomain(0)).toEqual({ min: -1, max: 1 });
  });
});

describe('computeMultiValueDomain', () => {
  it('pads by 5% of the range', () => {
    expect(computeMultiValueDomain(10, 30)).toEqual({ min: 9, max: 31 });
  });

  it('treats a flat range like a single value', () => {
    expect(computeMultiValueDomain(5, 5)).toEqual({ min: 4, max: 6 });
  });

  it('falls back to [0, 1] for non-finite input', () => {
    expect(computeMultiValueDomain(Number.NaN, 3)).toEqual({ min: 0, max: 1 });
  });
});

describe('computeChartScale', () => {
  it('returns null for an empty series', () => {
    expect(computeChartScale([], { width: 300, height: 100 }, 3.5)).toBeNull();
  });

  it('maps three points into a 300x100 plot', () => {
    const scale = computeChartScale(seriesOf(10, 20, 30), { width: 300, height: 100 }, 3.5);
    expect(scale).not.toBeNull();
    if (!scale) return;

    expect(scale.kind).toBe('multi');
    expect(scale.yDomain).toEqual({ min: 9, max: 31 });
    expect(scale.points.map((p) => p.x)).toEqual([3, 150, 297]);
    expect(scale.points[0].y).toBeCloseTo(95.4545, 3);
    expect(scale.points[1].y).toBeCloseTo(50, 10);
    expect(scale.points[2].y).toBeCloseTo(4.5455, 3);
    expect(scale.clampRect).toEqual({ x: 1.75, y: 1.75, width: 296.5, height: 96.5 });
  });

  it('inverts the y axis: smaller values sit lower', () => {
    const scale = computeChartScale(seriesOf(3, -7, 12, 0, 5), { width: 200, height: 80 }, 2);
    if (!scale) throw new Error('expected a scale');
    const yMin = scale.yAt(-7);
    const yMax = scale.yAt(12);
    expect(yMin).toBeGreaterThanOrEqual(yMax);
    for (const p of scale.points) {
      expect(p.y).toBeGreaterThanOrEqual(scale.clampRect.y);
      expect(p.y).toBeLessThanOrEqual(scale.clampRect.y + scale.clampRect.height);
    }
  });

  it('clamps projected y into the inset plot for thick lines', () => {
    const scale = computeChartScale(seriesOf(10, 30), { width: 100, height: 100 }, 20);
    if (!scale) throw new Error('expected a scale');
    expect(scale.points[0].y).toBe(90);
    expect(scale.points[1].y).toBe(10);
  });

  it('centres a single point horizontally and vertically', () => {
    const scale = computeChartScale(seriesOf(50), { width: 200, height: 100 }, 3.5);
    if (!scale) throw new Error('expected a scale');
    expect(scale.kind).toBe('single');
    expect(scale.yDomain).toEqual({ min: 40, max: 60 });
    expect(scale.points).toEqual([{ x: 100, y: 50 }]);
  });

  it('does not clamp the single-point y transform', () => {
    const scale = computeChartScale(seriesOf(50), { width: 200, height: 100 }, 3.5);
    if (!scale) throw new Error('expected a scale');
    expect(scale.yAt(70)).toBe(-50);
  });

  it('maps a zero single value without dividing by zero', () => {
    const scale = computeChartScale(seriesOf(0), { width: 200, height: 100 }, 3.5);
    if (!scale) throw new Error('expected a scale');
    expect(scale.points).toEqual([{ x: 100, y: 50 }]);
  });

  it('places a flat series on the vertical middle', () => {
    const scale = computeChartScale(seriesOf(5, 5, 5), { width: 200, height: 100 }, 3.5);
    if (!scale) throw new Error('expected a scale');
    expect(scale.points.map((p) => p.y)).toEqual([50, 50, 50]);
  });
});
