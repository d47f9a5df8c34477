/**
 * Axis label layout.
 *
 * Y labels show evenly spaced values between the series' min and max; x labels show the
 * formatted timestamps of a subset of points chosen so that the labels fit side by side.
 * Everything here is pure: text measurement is injected and the results are plain rects in
 * chart-view coordinates.
 *
 * @module computeAxisLabels
 */

import type { EdgeInsets, FontSpec } from '../../config/types';
import type { DataSeries } from '../../data/chartPoint';
import { extentOfValues } from '../../data/chartPoint';
import type { Rect, Size } from '../../utils/geometry';
import { formatDate } from '../../utils/formatDate';
import { computeSingleValueDomain } from '../scale/computeChartScale';

export type LabelAxis = 'x' | 'y';

export interface AxisLabel {
  readonly text: string;
  readonly isVertical: boolean;
  readonly frame: Rect;
}

export type TextMeasurer = (text: string, font: FontSpec) => Size;

/** Extra room reserved next to each x label when deciding how many fit. */
export const X_LABEL_MIN_SPACING_CSS_PX = 20;
/** The thinning pass budgets this many gutter widths, not one. */
export const X_LABEL_GUTTER_FACTOR = 1.5;

const GUTTER_STEPS: ReadonlyArray<readonly [limit: number, width: number]> = [
  [100, 40], // XX.X
  [1_000, 48], // XXX.X
  [10_000, 56], // X,XXX.X
  [100_000, 64], // XX,XXX.X
  [1_000_000, 72], // XXX,XXX.X
];
const MAX_GUTTER_WIDTH_CSS_PX = 80;

/**
 * Width reserved on the left for y labels, stepped by the magnitude of the largest value.
 */
export function computeVerticalLabelsWidth(series: DataSeries): number {
  const extent = extentOfValues(series);
  if (extent === null) return GUTTER_STEPS[0][1];
  const magnitude = Math.max(Math.abs(extent.min), Math.abs(extent.max));
  for (const [limit, width] of GUTTER_STEPS) {
    if (magnitude < limit) return width;
  }
  return MAX_GUTTER_WIDTH_CSS_PX;
}

/**
 * `divisions` values from max down to min. Single-point and flat series use `value ± 20%`.
 */
export function computeYAxisValues(series: DataSeries, divisions: number): number[] {
  const extent = extentOfValues(series);
  if (extent === null) return [];

  const domain =
    series.length === 1 || extent.min === extent.max ? computeSingleValueDomain(series[0].value) : extent;

  const count = Math.max(2, Math.floor(divisions));
  const step = (domain.max - domain.min) / (count - 1);
  const values: number[] = new Array(count);
  for (let i = 0; i < count; i++) {
    values[i] = domain.max - step * i;
  }
  return values;
}

export function formatYAxisValue(value: number): string {
  const text = value.toFixed(1);
  return text === '-0.0' ? '0.0' : text;
}

/**
 * Chooses which labels to keep so that they fit into `availableWidth`.
 *
 * All fit: every index. Otherwise every `step`-th index from 0 (stopping before the last), plus
 * the last index, where `step = max(2, ceil(n / maxLabels))` and `maxLabels` is how many labels
 * of average width fit.
 */
export function selectLabelIndices(labelWidths: ReadonlyArray<number>, availableWidth: number): number[] {
  const n = labelWidths.length;
  if (n === 0) return [];

  let totalWidth = 0;
  for (const w of labelWidths) totalWidth += w;
  if (totalWidth <= availableWidth) return labelWidths.map((_, i) => i);

  const averageWidth = totalWidth / n;
  const maxLabels = Math.max(1, Math.floor(Math.max(0, availableWidth) / averageWidth));
  const step = Math.max(Math.ceil(n / maxLabels), 2);

  const indices: number[] = [];
  for (let i = 0; i < n - 1; i += step) indices.push(i);
  if (indices.length === 0 || indices[indices.length - 1] !== n - 1) indices.push(n - 1);
  return indices;
}

export interface XLabelLayoutInput {
  readonly texts: ReadonlyArray<string>;
  readonly sizes: ReadonlyArray<Size>;
  readonly bounds: Size;
  readonly padding: EdgeInsets;
  readonly gutterWidth: number;
}

/**
 * Spreads x labels across the width right of the y-label gutter. The last label is right-aligned
 * to the content edge; the others start at `index * spacing`. Widths are truncated to the
 * spacing so neighbours never overlap.
 */
export function layoutXLabels(input: XLabelLayoutInput): AxisLabel[] {
  const { texts, sizes, bounds, padding, gutterWidth } = input;
  const count = texts.length;
  if (count === 0) return [];

  const availableWidth = bounds.width - padding.left - padding.right - gutterWidth;
  const left = gutterWidth + padding.left;
  const yFor = (height: number): number => bounds.height - padding.bottom - height;

  if (count === 1) {
    const size = sizes[0];
    const width = Math.max(0, Math.min(availableWidth, size.width));
    return [
      {
        text: texts[0],
        isVertical: false,
        frame: { x: left + availableWidth / 2 - width / 2, y: yFor(size.height), width, height: size.height },
      },
    ];
  }

  const totalSpacing = availableWidth - sizes[count - 1].width;
  const spacing = totalSpacing / (count - 1);

  return texts.map((text, index) => {
    const size = sizes[index];
    const width = Math.max(0, Math.min(spacing, size.width));
    const x = index === count - 1 ? bounds.width - width - padding.right : left + index * spacing;
    return { text, isVertical: false, frame: { x, y: yFor(size.height), width, height: size.height } };
  });
}

/**
 * Stacks y labels (given top-to-bottom) so each is vertically centred on its division line of the
 * plot frame.
 */
export function layoutYLabels(
  texts: ReadonlyArray<string>,
  sizes: ReadonlyArray<Size>,
  plotFrame: Rect,
  padding: EdgeInsets
): AxisLabel[] {
  const count = texts.length;
  if (count === 0) return [];
  const step = count === 1 ? 0 : plotFrame.height / (count - 1);
  const firstCenter = count === 1 ? plotFrame.y + plotFrame.height / 2 : plotFrame.y;

  return texts.map((text, index) => {
    const size = sizes[index];
    const centerY = firstCenter + index * step;
    return {
      text,
      isVertical: true,
      frame: { x: padding.left, y: centerY - size.height / 2, width: size.width, height: size.height },
    };
  });
}

export interface AxisLabelsInput {
  readonly series: DataSeries;
  readonly bounds: Size;
  readonly plotFrame: Rect;
  readonly padding: EdgeInsets;
  readonly divisions: number;
  readonly dateFormat: string;
  readonly xFont: FontSpec;
  readonly yFont: FontSpec;
  readonly measureText: TextMeasurer;
}

export interface AxisLabels {
  readonly x: ReadonlyArray<AxisLabel>;
  /** Top-to-bottom, highest value first. */
  readonly y: ReadonlyArray<AxisLabel>;
}

export function computeAxisLabels(input: AxisLabelsInput): AxisLabels {
  const { series, bounds, plotFrame, padding, divisions, dateFormat, xFont, yFont, measureText } = input;
  if (series.length === 0) return { x: [], y: [] };

  const gutterWidth = computeVerticalLabelsWidth(series);

  const yTexts = computeYAxisValues(series, divisions).map(formatYAxisValue);
  const y = layoutYLabels(
    yTexts,
    yTexts.map((t) => measureText(t, yFont)),
    plotFrame,
    padding
  );

  const allXTexts = series.map((p) => formatDate(p.timestamp, dateFormat));
  const allXSizes = allXTexts.map((t) => measureText(t, xFont));
  const thinningWidth = bounds.width - padding.left - padding.right - gutterWidth * X_LABEL_GUTTER_FACTOR;
  const kept = selectLabelIndices(
    allXSizes.map((s) => s.width + X_LABEL_MIN_SPACING_CSS_PX),
    thinningWidth
  );
  const x = layoutXLabels({
    texts: kept.map((i) => allXTexts[i]),
    sizes: kept.map((i) => allXSizes[i]),
    bounds,
    padding,
    gutterWidth,
  });

  return { x, y };
}
