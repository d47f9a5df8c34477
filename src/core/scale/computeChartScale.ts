/**
 * Data-to-screen mapping for a single line series.
 *
 * x is driven by the point's index (points are evenly spaced regardless of timestamps); y by its
 * value, with the axis inverted so larger values sit higher on screen.
 *
 * @module computeChartScale
 */

import type { DataSeries } from '../../data/chartPoint';
import { extentOfValues } from '../../data/chartPoint';
import type { Point, Rect, Size } from '../../utils/geometry';
import { clamp, insetRect } from '../../utils/geometry';
import { createLinearScale } from '../../utils/scales';

/** Horizontal inset of the first/last point, as a fraction of plot width. */
export const X_PADDING_FRACTION = 0.01;
/** Headroom above max and below min, as a fraction of the value range. */
export const MULTI_POINT_Y_PADDING_FRACTION = 0.05;
/** Half-height of the domain around a lone value, as a fraction of that value. */
export const SINGLE_POINT_Y_PADDING_FRACTION = 0.2;
/** Absolute half-height used when the fractional padding would be zero (value 0). */
export const MIN_SINGLE_POINT_Y_PADDING = 1;

export type ValueDomain = Readonly<{ min: number; max: number }>;

export interface ChartScale {
  readonly kind: 'single' | 'multi';
  readonly plotSize: Size;
  /** Value range mapped onto the full plot height. */
  readonly yDomain: ValueDomain;
  /** Plot rect inset by half the line width; path geometry is clamped into it. */
  readonly clampRect: Rect;
  /** Index -> plot-local x. */
  xAt(index: number): number;
  /** Value -> plot-local y (inverted). Clamped into `clampRect` for multi-point series. */
  yAt(value: number): number;
  /** Every series point projected into plot-local coordinates. */
  readonly points: ReadonlyArray<Point>;
}

/**
 * `value ± 20%`, widened to `value ± 1` when the value is 0.
 * Uses the magnitude so that negative values still yield `min < max`.
 */
export function computeSingleValueDomain(value: number): ValueDomain {
  const fractional = Math.abs(value) * SINGLE_POINT_Y_PADDING_FRACTION;
  const padding = fractional > 0 && Number.isFinite(fractional) ? fractional : MIN_SINGLE_POINT_Y_PADDING;
  const center = Number.isFinite(value) ? value : 0;
  return { min: center - padding, max: center + padding };
}

/**
 * Padded y-domain for a multi-point series. A flat series has no range to pad and falls back to
 * the single-value domain.
 */
export function computeMultiValueDomain(min: number, max: number): ValueDomain {
  if (!Number.isFinite(min) || !Number.isFinite(max)) return { min: 0, max: 1 };
  const range = max - min;
  if (range <= 0) return computeSingleValueDomain(min);
  const padding = range * MULTI_POINT_Y_PADDING_FRACTION;
  return { min: min - padding, max: max + padding };
}

/**
 * Builds the transforms for `series` drawn into a plot of `plotSize`.
 * Returns null for an empty series: there is nothing to map.
 */
export function computeChartScale(series: DataSeries, plotSize: Size, lineWidth: number): ChartScale | null {
  const extent = extentOfValues(series);
  if (extent === null) return null;

  const width = Math.max(0, plotSize.width);
  const height = Math.max(0, plotSize.height);
  const size: Size = { width, height };
  const halfLine = Math.max(0, lineWidth) / 2;
  const clampRect = insetRect({ x: 0, y: 0, width, height }, halfLine, halfLine);

  if (series.length === 1) {
    const yDomain = computeSingleValueDomain(series[0].value);
    const yScale = createLinearScale().domain(yDomain.min, yDomain.max).range(height, 0);
    const xAt = (): number => width / 2;
    const yAt = (value: number): number => yScale.scale(value);
    return {
      kind: 'single',
      plotSize: size,
      yDomain,
      clampRect,
      xAt,
      yAt,
      points: [{ x: xAt(), y: yAt(series[0].value) }],
    };
  }

  const xPadding = width * X_PADDING_FRACTION;
  const xScale = createLinearScale()
    .domain(0, series.length - 1)
    .range(xPadding, width - xPadding);
  const yDomain = computeMultiValueDomain(extent.min, extent.max);
  const yScale = createLinearScale().domain(yDomain.min, yDomain.max).range(height, 0);

  const xAt = (index: number): number => xScale.scale(index);
  const yAt = (value: number): number =>
    clamp(yScale.scale(value), clampRect.y, clampRect.y + clampRect.height);

  return {
    kind: 'multi',
    plotSize: size,
    yDomain,
    clampRect,
    xAt,
    yAt,
    points: series.map((p, i) => ({ x: xAt(i), y: yAt(p.value) })),
  };
}
