/**
 * Cursor resolution: from a pointer x to the marker on the curve, the data point shown in the
 * tooltip, and the visuals for the render surface.
 *
 * Two independent lookups happen here. The marker comes from intersecting the rendered path;
 * the tooltip point comes from the nearest evenly spaced slot. Between two points the marker can
 * sit on one side of the curve's midpoint while the slot rounds to the other; each drives its own
 * visual.
 *
 * @module resolveCursor
 */

import type { ResolvedLineChartOptions } from '../config/OptionResolver';
import type { ChartPath } from '../core/path/chartPath';
import type { ChartScale } from '../core/scale/computeChartScale';
import type { TextMeasurer } from '../core/labels/computeAxisLabels';
import type { ChartPoint, DataSeries } from '../data/chartPoint';
import type { Point, Rect } from '../utils/geometry';
import { clamp, rectMaxX, rectMaxY } from '../utils/geometry';
import type { CursorVisuals, TooltipVisual } from '../render/types';
import { findNearestPointIndex } from './findNearestIndex';
import { findPathIntersection } from './findPathIntersection';

export type CursorLabelProvider = (point: ChartPoint) => string | null | undefined;

export const TOOLTIP_HORIZONTAL_INSET_CSS_PX = 5;
export const CURSOR_LINE_WIDTH_CSS_PX = 1;
export const CURSOR_LINE_DASH: ReadonlyArray<number> = [2, 4];

export interface CursorResolutionInput {
  readonly series: DataSeries;
  readonly scale: ChartScale;
  readonly path: ChartPath;
  /** Plot frame in chart-view coordinates. */
  readonly plotFrame: Rect;
  /** Pointer x in chart-view coordinates. Clamped to the plot frame here. */
  readonly pointerX: number;
  readonly options: ResolvedLineChartOptions;
  readonly cursorLabelProvider: CursorLabelProvider | null;
  readonly measureText: TextMeasurer;
  /** Marker from the previous resolution; kept when the path is missed. */
  readonly previousMarker: Point | null;
}

export interface CursorResolution {
  /** Data point for the tooltip and the `moved` event. */
  readonly point: ChartPoint | null;
  readonly index: number | null;
  /** Tracking dot center in chart-view coordinates. */
  readonly marker: Point | null;
  readonly visuals: CursorVisuals;
}

const buildTooltip = (
  text: string | null | undefined,
  anchorX: number,
  plotFrame: Rect,
  options: ResolvedLineChartOptions,
  measureText: TextMeasurer
): TooltipVisual | null => {
  if (text == null || text.length === 0) return null;
  const { font, backgroundColor, foregroundColor } = options.cursorLabel;
  const size = measureText(text, font);
  const width = size.width + TOOLTIP_HORIZONTAL_INSET_CSS_PX * 2;
  const height = size.height;
  const x = clamp(anchorX - width / 2, plotFrame.x, rectMaxX(plotFrame) - width);
  return {
    text,
    frame: { x, y: 0, width, height },
    cornerRadius: height / 2,
    font,
    backgroundColor,
    foregroundColor,
  };
};

export function resolveCursor(input: CursorResolutionInput): CursorResolution {
  const { series, scale, path, plotFrame, pointerX, options, cursorLabelProvider, measureText, previousMarker } = input;

  const lineAt = (x: number): CursorVisuals['line'] =>
    options.showsCursor
      ? {
          from: { x, y: plotFrame.y },
          to: { x, y: rectMaxY(plotFrame) },
          color: options.cursorColor,
          lineWidth: CURSOR_LINE_WIDTH_CSS_PX,
          dashPattern: CURSOR_LINE_DASH,
        }
      : null;

  const dotAt = (center: Point | null): CursorVisuals['dot'] =>
    center
      ? {
          center,
          size: options.dot.size,
          color: options.dot.color,
          strokeColor: options.dot.strokeColor,
          strokeWidth: options.dot.strokeWidth,
        }
      : null;

  if (scale.kind === 'single' || series.length === 1) {
    const point = series[0] ?? null;
    const centerX = plotFrame.x + plotFrame.width / 2;
    const projected = scale.points[0];
    const marker: Point | null = projected ? { x: centerX, y: plotFrame.y + projected.y } : null;
    const text = point && cursorLabelProvider ? cursorLabelProvider(point) : null;
    return {
      point,
      index: point ? 0 : null,
      marker,
      visuals: {
        line: lineAt(centerX),
        dot: dotAt(marker),
        hover: null,
        tooltip: buildTooltip(text, centerX, plotFrame, options, measureText),
      },
    };
  }

  const xOffset = clamp(pointerX, plotFrame.x, rectMaxX(plotFrame));
  const relativeX = xOffset - plotFrame.x;

  const intersection = findPathIntersection(path, relativeX);
  const marker = intersection ? { x: xOffset, y: intersection.y + plotFrame.y } : previousMarker;

  const index = findNearestPointIndex(relativeX, plotFrame.width, series.length);
  const point = index === null ? null : (series[index] ?? null);
  const text = point && cursorLabelProvider ? cursorLabelProvider(point) : null;

  return {
    point,
    index,
    marker,
    visuals: {
      line: lineAt(xOffset),
      dot: dotAt(marker),
      hover: {
        path,
        maskRect: { x: relativeX, y: 0, width: plotFrame.width - relativeX, height: plotFrame.height },
        color: options.hoverLineColor,
        lineWidth: options.lineWidth,
      },
      tooltip: buildTooltip(text, xOffset, plotFrame, options, measureText),
    },
  };
}
