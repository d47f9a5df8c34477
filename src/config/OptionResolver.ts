import type {
  AxisLabelStyleConfig,
  EasingName,
  EdgeInsets,
  FontSpec,
  GridLineStyleConfig,
  LineChartOptions,
} from './types';
import { defaultLineChartOptions } from './defaults';
import { isEasingName } from '../utils/easing';

export type ResolvedGridLineStyle = Readonly<Required<GridLineStyleConfig>>;

export type ResolvedAxisLabelStyle = Readonly<{
  font: FontSpec;
  textColor: string;
}>;

export type ResolvedDotConfig = Readonly<{
  size: number;
  color: string;
  strokeColor: string;
  strokeWidth: number;
}>;

export type ResolvedCursorLabelConfig = Readonly<{
  font: FontSpec;
  backgroundColor: string;
  foregroundColor: string;
}>;

export type ResolvedAnimationConfig = Readonly<{
  durationMs: number;
  easing: EasingName;
}>;

export interface ResolvedLineChartOptions {
  readonly lineWidth: number;
  readonly tintColor: string;
  readonly hoverLineColor: string;
  readonly padding: EdgeInsets;
  readonly horizontalLabelsToTopPadding: number;
  readonly numberOfVerticalDivisions: number;
  readonly widthBetweenVerticalDivisions: number;
  readonly showsHorizontalGridLines: boolean;
  readonly showsVerticalGridLines: boolean;
  readonly showsCursor: boolean;
  readonly cursorColor: string;
  readonly horizontalGrid: ResolvedGridLineStyle;
  readonly verticalGrid: ResolvedGridLineStyle;
  readonly horizontalLabels: ResolvedAxisLabelStyle;
  readonly verticalLabels: ResolvedAxisLabelStyle;
  readonly dot: ResolvedDotConfig;
  readonly cursorLabel: ResolvedCursorLabelConfig;
  readonly dateFormat: string;
  readonly animation: ResolvedAnimationConfig;
}

const takeString = (v: unknown, fallback: string): string => {
  if (typeof v !== 'string') return fallback;
  const trimmed = v.trim();
  return trimmed.length > 0 ? trimmed : fallback;
};

const takeNonNegative = (v: unknown, fallback: number): number =>
  typeof v === 'number' && Number.isFinite(v) && v >= 0 ? v : fallback;

const takePositive = (v: unknown, fallback: number): number =>
  typeof v === 'number' && Number.isFinite(v) && v > 0 ? v : fallback;

const takeBoolean = (v: unknown, fallback: boolean): boolean => (typeof v === 'boolean' ? v : fallback);

const resolveFont = (input: Partial<FontSpec> | undefined, base: FontSpec): FontSpec => ({
  family: takeString(input?.family, base.family),
  size: takePositive(input?.size, base.size),
  weight: takePositive(input?.weight, base.weight),
});

const resolvePadding = (input: Partial<EdgeInsets> | undefined, base: EdgeInsets): EdgeInsets => ({
  top: takeNonNegative(input?.top, base.top),
  left: takeNonNegative(input?.left, base.left),
  bottom: takeNonNegative(input?.bottom, base.bottom),
  right: takeNonNegative(input?.right, base.right),
});

const resolveGridLineStyle = (
  input: GridLineStyleConfig | undefined,
  base: ResolvedGridLineStyle
): ResolvedGridLineStyle => ({
  color: takeString(input?.color, base.color),
  lineWidth: takeNonNegative(input?.lineWidth, base.lineWidth),
});

const resolveAxisLabelStyle = (
  input: AxisLabelStyleConfig | undefined,
  base: ResolvedAxisLabelStyle
): ResolvedAxisLabelStyle => ({
  font: resolveFont(input?.font, base.font),
  textColor: takeString(input?.textColor, base.textColor),
});

/**
 * Merges user options over an optional base (defaults when omitted) and sanitizes every field.
 *
 * Invalid values (non-finite numbers, blank colors, unknown easing names) fall back to the base
 * rather than throwing; JS callers routinely pass partially-typed objects.
 */
export function resolveOptions(
  userOptions: LineChartOptions = {},
  base: ResolvedLineChartOptions = defaultLineChartOptions
): ResolvedLineChartOptions {
  const divisionsRaw = userOptions.numberOfVerticalDivisions;
  const numberOfVerticalDivisions =
    typeof divisionsRaw === 'number' && Number.isFinite(divisionsRaw)
      ? Math.max(2, Math.floor(divisionsRaw))
      : base.numberOfVerticalDivisions;
  const easingRaw = userOptions.animation?.easing;

  return {
    lineWidth: takeNonNegative(userOptions.lineWidth, base.lineWidth),
    tintColor: takeString(userOptions.tintColor, base.tintColor),
    hoverLineColor: takeString(userOptions.hoverLineColor, base.hoverLineColor),
    padding: resolvePadding(userOptions.padding, base.padding),
    horizontalLabelsToTopPadding: takeNonNegative(
      userOptions.horizontalLabelsToTopPadding,
      base.horizontalLabelsToTopPadding
    ),
    numberOfVerticalDivisions,
    widthBetweenVerticalDivisions: takePositive(
      userOptions.widthBetweenVerticalDivisions,
      base.widthBetweenVerticalDivisions
    ),
    showsHorizontalGridLines: takeBoolean(userOptions.showsHorizontalGridLines, base.showsHorizontalGridLines),
    showsVerticalGridLines: takeBoolean(userOptions.showsVerticalGridLines, base.showsVerticalGridLines),
    showsCursor: takeBoolean(userOptions.showsCursor, base.showsCursor),
    cursorColor: takeString(userOptions.cursorColor, base.cursorColor),
    horizontalGrid: resolveGridLineStyle(userOptions.horizontalGrid, base.horizontalGrid),
    verticalGrid: resolveGridLineStyle(userOptions.verticalGrid, base.verticalGrid),
    horizontalLabels: resolveAxisLabelStyle(userOptions.horizontalLabels, base.horizontalLabels),
    verticalLabels: resolveAxisLabelStyle(userOptions.verticalLabels, base.verticalLabels),
    dot: {
      size: takeNonNegative(userOptions.dot?.size, base.dot.size),
      color: takeString(userOptions.dot?.color, base.dot.color),
      strokeColor: takeString(userOptions.dot?.strokeColor, base.dot.strokeColor),
      strokeWidth: takeNonNegative(userOptions.dot?.strokeWidth, base.dot.strokeWidth),
    },
    cursorLabel: {
      font: resolveFont(userOptions.cursorLabel?.font, base.cursorLabel.font),
      backgroundColor: takeString(userOptions.cursorLabel?.backgroundColor, base.cursorLabel.backgroundColor),
      foregroundColor: takeString(userOptions.cursorLabel?.foregroundColor, base.cursorLabel.foregroundColor),
    },
    dateFormat: takeString(userOptions.dateFormat, base.dateFormat),
    animation: {
      durationMs: takeNonNegative(userOptions.animation?.durationMs, base.animation.durationMs),
      easing: isEasingName(easingRaw) ? easingRaw : base.animation.easing,
    },
  };
}
