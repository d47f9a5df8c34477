/**
 * Animated single-series line chart: smooth curve, axis labels and an interactive cursor, drawn
 * through a pluggable render surface.
 */

export const version = '1.0.0';

// Chart API
export { createLineChart } from './LineChart';
export type { Chart, LineChartInstance } from './LineChart';

// Options
export type {
  AnimationConfig,
  AxisLabelStyleConfig,
  CursorLabelConfig,
  DotConfig,
  EasingName,
  EdgeInsets,
  FontSpec,
  GridLineStyleConfig,
  LineChartOptions,
} from './config/types';
export { resolveOptions } from './config/OptionResolver';
export type { ResolvedLineChartOptions } from './config/OptionResolver';
export { compactLineChartOptions, defaultLineChartOptions } from './config/defaults';

// Data
export { chartPointKey, createChartPoint, isSameChartPoint } from './data/chartPoint';
export type { ChartPoint, DataSeries } from './data/chartPoint';

// Geometry
export { computeChartScale } from './core/scale/computeChartScale';
export type { ChartScale, ValueDomain } from './core/scale/computeChartScale';
export { buildDotPath, buildSmoothPath } from './core/path/buildSmoothPath';
export { getPathEndPoint, interpolatePath, pathToSvgData } from './core/path/chartPath';
export type { ChartPath, PathCommand } from './core/path/chartPath';
export { computeAxisLabels, selectLabelIndices } from './core/labels/computeAxisLabels';
export type { AxisLabel, AxisLabels, LabelAxis, TextMeasurer } from './core/labels/computeAxisLabels';
export type { LabelTransition, LabelTransitionDirection } from './core/labels/labelTransitions';

// Cursor
export { isSameCursorEvent } from './interaction/createCursorEventStream';
export type { CursorEvent, CursorEventCallback } from './interaction/createCursorEventStream';
export { findPathIntersection } from './interaction/findPathIntersection';
export { findNearestPointIndex } from './interaction/findNearestIndex';
export type { CursorLabelProvider } from './interaction/resolveCursor';
export type { ChartPointerEvent, PointerPhase } from './interaction/pointerTracking';

// Rendering
export { createHeadlessSurface, approximateTextMeasure } from './render/createHeadlessSurface';
export type { HeadlessSurface, HeadlessSurfaceOptions } from './render/createHeadlessSurface';
export type {
  CursorVisuals,
  LabelStyle,
  PathAnimation,
  PathLayer,
  PathStyle,
  RenderSurface,
} from './render/types';

// Utilities
export { formatDate } from './utils/formatDate';
export { createLinearScale } from './utils/scales';
export type { LinearScale } from './utils/scales';
export { getEasing } from './utils/easing';
export type { EasingFunction } from './utils/easing';
