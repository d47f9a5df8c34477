import { resolveOptions } from './config/OptionResolver';
import type { ResolvedLineChartOptions } from './config/OptionResolver';
import type { LineChartOptions } from './config/types';
import { computeAxisLabels, computeVerticalLabelsWidth, formatYAxisValue } from './core/labels/computeAxisLabels';
import type { AxisLabel, AxisLabels, LabelAxis } from './core/labels/computeAxisLabels';
import { planLabelTransition } from './core/labels/labelTransitions';
import { EMPTY_PATH } from './core/path/chartPath';
import type { ChartPath } from './core/path/chartPath';
import { buildDotPath, buildSmoothPath } from './core/path/buildSmoothPath';
import { createHorizontalGridPath, createVerticalGridPath } from './core/path/createGridPaths';
import { computeChartScale } from './core/scale/computeChartScale';
import type { ChartScale } from './core/scale/computeChartScale';
import type { ChartPoint, DataSeries } from './data/chartPoint';
import {
  createCursorEventStream,
  cursorBegin,
  cursorEndMoved,
  cursorMoved,
} from './interaction/createCursorEventStream';
import type { CursorEventCallback } from './interaction/createCursorEventStream';
import { transitionCursor } from './interaction/pointerTracking';
import type { ChartPointerEvent, CursorPhase } from './interaction/pointerTracking';
import { resolveCursor } from './interaction/resolveCursor';
import type { CursorLabelProvider } from './interaction/resolveCursor';
import type { LabelStyle, PathStyle, RenderSurface } from './render/types';
import { formatDate } from './utils/formatDate';
import type { Point, Rect, Size } from './utils/geometry';
import { EMPTY_RECT } from './utils/geometry';

/**
 * Minimal chart contract: accepts data, publishes cursor events.
 */
export interface Chart {
  /**
   * Replaces the whole series. `completion` runs once the axis labels reflect the new data:
   * after the curve animation when `animated`, otherwise before this call returns.
   */
  updateChart(points: ReadonlyArray<ChartPoint>, animated?: boolean, completion?: () => void): void;
  /** Returns an unsubscribe function. */
  onCursorEvent(callback: CursorEventCallback): () => void;
}

export interface LineChartInstance extends Chart {
  readonly options: ResolvedLineChartOptions;
  readonly disposed: boolean;
  /** Layout pass for new view bounds (CSS pixels). */
  resize(width: number, height: number): void;
  handlePointer(event: ChartPointerEvent): void;
  /** Final geometry of the graph path, in plot-local coordinates. */
  getRenderedPath(): ChartPath;
  getLabels(): AxisLabels;
  getPlotFrame(): Rect;
  getDataPoints(): DataSeries;
  dispose(): void;
}

const sanitizeDimension = (v: number): number => (Number.isFinite(v) && v > 0 ? v : 0);

const AXES: ReadonlyArray<LabelAxis> = ['x', 'y'];

const EMPTY_LABELS: AxisLabels = { x: [], y: [] };

export function createLineChart(
  surface: RenderSurface,
  options: LineChartOptions = {},
  cursorLabelProvider?: CursorLabelProvider
): LineChartInstance {
  if (surface == null) {
    throw new Error('LineChart: surface is required.');
  }

  const resolved = resolveOptions(options);
  const events = createCursorEventStream();
  const measureText = surface.measureText.bind(surface);

  let disposed = false;
  let bounds: Size = { width: 0, height: 0 };
  let series: DataSeries = [];
  // Last non-empty series: what the graph, grid gutter and labels are laid out for.
  let drawn: DataSeries = [];
  // Bumped by every update that draws; a completion from an older update skips the label rebuild.
  let drawToken = 0;
  let plotFrame: Rect = EMPTY_RECT;
  let scale: ChartScale | null = null;
  let renderedPath: ChartPath = EMPTY_PATH;
  let labels: AxisLabels = EMPTY_LABELS;
  let cursorPhase: CursorPhase = 'idle';
  let marker: Point | null = null;

  const labelStyles: Readonly<Record<LabelAxis, LabelStyle>> = {
    x: { font: resolved.horizontalLabels.font, color: resolved.horizontalLabels.textColor },
    y: { font: resolved.verticalLabels.font, color: resolved.verticalLabels.textColor },
  };

  const graphStyle: PathStyle = { strokeColor: resolved.tintColor, lineWidth: resolved.lineWidth, visible: true };

  // Plot area: right of the y-label gutter, above the x labels.
  const computePlotFrame = (): Rect => {
    const { padding, horizontalLabels, horizontalLabelsToTopPadding, dateFormat } = resolved;
    const gutter = computeVerticalLabelsWidth(drawn);
    const sample = drawn.length > 0 ? formatDate(drawn[0].timestamp, dateFormat) : formatYAxisValue(0);
    const xLabelHeight = measureText(sample, horizontalLabels.font).height;
    const x = padding.left + gutter;
    const y = padding.top;
    return {
      x,
      y,
      width: Math.max(0, bounds.width - x - padding.right),
      height: Math.max(0, bounds.height - y - padding.bottom - xLabelHeight - horizontalLabelsToTopPadding),
    };
  };

  const relayout = (): void => {
    plotFrame = computePlotFrame();
    surface.setPlotFrame(plotFrame);

    const plotSize: Size = { width: plotFrame.width, height: plotFrame.height };
    surface.setPath('horizontalGrid', createHorizontalGridPath(plotSize, resolved.numberOfVerticalDivisions), {
      strokeColor: resolved.horizontalGrid.color,
      lineWidth: resolved.horizontalGrid.lineWidth,
      visible: resolved.showsHorizontalGridLines,
    });
    surface.setPath('verticalGrid', createVerticalGridPath(plotSize, resolved.widthBetweenVerticalDivisions), {
      strokeColor: resolved.verticalGrid.color,
      lineWidth: resolved.verticalGrid.lineWidth,
      visible: resolved.showsVerticalGridLines,
    });
  };

  // Recomputes scale and graph path for the drawn series; null when there is nothing to draw.
  const buildGraph = (): ChartScale | null => {
    const plotSize: Size = { width: plotFrame.width, height: plotFrame.height };
    const next = computeChartScale(drawn, plotSize, resolved.lineWidth);
    if (!next) return null;
    scale = next;
    renderedPath =
      next.kind === 'single' ? buildDotPath(next.points[0], plotSize) : buildSmoothPath(next.points, next.clampRect);
    return next;
  };

  const rebuildLabels = (withTransition: boolean): void => {
    if (drawn.length === 0) return;
    const next = computeAxisLabels({
      series: drawn,
      bounds,
      plotFrame,
      padding: resolved.padding,
      divisions: resolved.numberOfVerticalDivisions,
      dateFormat: resolved.dateFormat,
      xFont: resolved.horizontalLabels.font,
      yFont: resolved.verticalLabels.font,
      measureText,
    });
    for (const axis of AXES) {
      const incoming: ReadonlyArray<AxisLabel> = next[axis];
      const transition = withTransition
        ? planLabelTransition(axis, labels[axis], incoming.length, resolved.animation)
        : null;
      surface.setLabels(axis, incoming, labelStyles[axis], transition);
    }
    labels = next;
  };

  const runCompletion = (completion: (() => void) | undefined): void => {
    if (!completion) return;
    try {
      completion();
    } catch (error) {
      console.error('LineChart: error in updateChart completion callback:', error);
    }
  };

  const settle = (token: number, completion: (() => void) | undefined): void => {
    // Labels follow the latest curve only; a disposed chart still owes the caller its completion.
    if (!disposed && token === drawToken) rebuildLabels(true);
    runCompletion(completion);
  };

  const hideCursorVisuals = (): void => {
    marker = null;
    surface.setCursor(null);
  };

  const updateChart: Chart['updateChart'] = (points, animated = true, completion) => {
    if (disposed) return;
    series = Array.from(points);
    hideCursorVisuals();

    if (series.length === 0) {
      scale = null;
      runCompletion(completion);
      return;
    }

    drawn = series;
    const token = ++drawToken;
    relayout();
    const next = buildGraph();
    if (!next) {
      runCompletion(completion);
      return;
    }

    // Singletons swap shape (curve <-> dot) and are never morphed.
    if (animated && next.kind === 'multi') {
      surface.setPath('graph', renderedPath, graphStyle, {
        durationMs: resolved.animation.durationMs,
        easing: resolved.animation.easing,
        onComplete: () => settle(token, completion),
      });
    } else {
      surface.setPath('graph', renderedPath, graphStyle);
      settle(token, completion);
    }
  };

  const resize = (width: number, height: number): void => {
    if (disposed) return;
    bounds = { width: sanitizeDimension(width), height: sanitizeDimension(height) };
    hideCursorVisuals();
    relayout();
    if (drawn.length === 0) return;
    if (buildGraph()) surface.setPath('graph', renderedPath, graphStyle);
    rebuildLabels(false);
  };

  const updateCursor = (pointerX: number): void => {
    if (!scale || series.length === 0) return;
    const resolution = resolveCursor({
      series,
      scale,
      path: renderedPath,
      plotFrame,
      pointerX,
      options: resolved,
      cursorLabelProvider: cursorLabelProvider ?? null,
      measureText,
      previousMarker: marker,
    });
    marker = resolution.marker;
    surface.setCursor(resolution.visuals);
    if (resolution.point) events.emit(cursorMoved(resolution.point));
  };

  const handlePointer = (event: ChartPointerEvent): void => {
    if (disposed) return;
    const { next, action } = transitionCursor(cursorPhase, event.phase);
    cursorPhase = next;
    switch (action) {
      case 'begin':
        events.emit(cursorBegin);
        return;
      case 'move':
        updateCursor(event.x);
        return;
      case 'end':
        hideCursorVisuals();
        events.emit(cursorEndMoved);
        return;
      case 'ignore':
        return;
    }
  };

  const dispose = (): void => {
    if (disposed) return;
    disposed = true;
    events.destroy();
    cursorPhase = 'idle';
    marker = null;
  };

  relayout();

  return {
    get options() {
      return resolved;
    },
    get disposed() {
      return disposed;
    },
    updateChart,
    onCursorEvent(callback) {
      if (disposed) return () => {};
      return events.subscribe(callback);
    },
    resize,
    handlePointer,
    getRenderedPath: () => renderedPath,
    getLabels: () => labels,
    getPlotFrame: () => plotFrame,
    getDataPoints: () => series,
    dispose,
  };
}
