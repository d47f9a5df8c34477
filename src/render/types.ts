/**
 * Contract between the chart and whatever actually draws it.
 *
 * The chart computes geometry and hands finished paths, label rects and cursor visuals to a
 * `RenderSurface`. Paths are in plot-local coordinates (origin at the plot frame's top-left);
 * labels, cursor line, dot and tooltip are in chart-view coordinates.
 */

import type { EasingName, FontSpec } from '../config/types';
import type { ChartPath } from '../core/path/chartPath';
import type { AxisLabel, LabelAxis } from '../core/labels/computeAxisLabels';
import type { LabelTransition } from '../core/labels/labelTransitions';
import type { Point, Rect, Size } from '../utils/geometry';

export type PathLayer = 'horizontalGrid' | 'verticalGrid' | 'graph';

export interface PathStyle {
  readonly strokeColor: string;
  readonly lineWidth: number;
  readonly visible: boolean;
}

export interface PathAnimation {
  readonly durationMs: number;
  readonly easing: EasingName;
  /**
   * Must be called exactly once: when the animation finishes or is superseded by a later
   * `setPath` on the same layer.
   */
  readonly onComplete: () => void;
}

export interface LabelStyle {
  readonly font: FontSpec;
  readonly color: string;
}

export interface CursorLineVisual {
  readonly from: Point;
  readonly to: Point;
  readonly color: string;
  readonly lineWidth: number;
  readonly dashPattern: ReadonlyArray<number>;
}

export interface TrackingDotVisual {
  readonly center: Point;
  /** Diameter. */
  readonly size: number;
  readonly color: string;
  readonly strokeColor: string;
  readonly strokeWidth: number;
}

/**
 * Copy of the graph path restyled in the hover color, visible only inside `maskRect`
 * (plot-local): the part of the curve right of the cursor.
 */
export interface HoverOverlayVisual {
  readonly path: ChartPath;
  readonly maskRect: Rect;
  readonly color: string;
  readonly lineWidth: number;
}

export interface TooltipVisual {
  readonly text: string;
  readonly frame: Rect;
  readonly cornerRadius: number;
  readonly font: FontSpec;
  readonly backgroundColor: string;
  readonly foregroundColor: string;
}

export interface CursorVisuals {
  /** Null when the cursor line is disabled. */
  readonly line: CursorLineVisual | null;
  /** Null until the curve has been hit at least once. */
  readonly dot: TrackingDotVisual | null;
  /** Null for single-point series. */
  readonly hover: HoverOverlayVisual | null;
  /** Null when no label text is available for the resolved point. */
  readonly tooltip: TooltipVisual | null;
}

export interface RenderSurface {
  measureText(text: string, font: FontSpec): Size;
  setPlotFrame(frame: Rect): void;
  setPath(layer: PathLayer, path: ChartPath, style: PathStyle, animation?: PathAnimation): void;
  setLabels(
    axis: LabelAxis,
    labels: ReadonlyArray<AxisLabel>,
    style: LabelStyle,
    transition: LabelTransition | null
  ): void;
  /** `null` hides every cursor visual. */
  setCursor(visuals: CursorVisuals | null): void;
}
