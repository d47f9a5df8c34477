/**
 * Line chart configuration types.
 */

export type EasingName = 'linear' | 'cubicInOut';

/**
 * Font description handed to the render surface for drawing and text measurement.
 */
export interface FontSpec {
  readonly family: string;
  /** Font size in CSS pixels. */
  readonly size: number;
  readonly weight: number;
}

/**
 * Padding around the chart content, in CSS pixels.
 */
export interface EdgeInsets {
  readonly top: number;
  readonly left: number;
  readonly bottom: number;
  readonly right: number;
}

export interface GridLineStyleConfig {
  readonly color?: string;
  readonly lineWidth?: number;
}

export interface AxisLabelStyleConfig {
  readonly font?: Partial<FontSpec>;
  readonly textColor?: string;
}

/**
 * Tracking dot drawn on the curve while the cursor is active.
 */
export interface DotConfig {
  /** Diameter in CSS pixels. */
  readonly size?: number;
  readonly color?: string;
  readonly strokeColor?: string;
  readonly strokeWidth?: number;
}

export interface CursorLabelConfig {
  readonly font?: Partial<FontSpec>;
  readonly backgroundColor?: string;
  readonly foregroundColor?: string;
}

export interface AnimationConfig {
  /** Duration of the curve animation on data updates (default: 300). */
  readonly durationMs?: number;
  readonly easing?: EasingName;
}

export interface LineChartOptions {
  readonly lineWidth?: number;
  readonly tintColor?: string;
  readonly hoverLineColor?: string;
  readonly padding?: Partial<EdgeInsets>;
  /** Gap between the plot bottom and the top of the x-axis labels. */
  readonly horizontalLabelsToTopPadding?: number;
  /** Number of y-axis labels and horizontal grid lines (min 2). */
  readonly numberOfVerticalDivisions?: number;
  /** Desired spacing between vertical grid lines. */
  readonly widthBetweenVerticalDivisions?: number;
  readonly showsHorizontalGridLines?: boolean;
  readonly showsVerticalGridLines?: boolean;
  /** Draw the vertical cursor line while tracking. Dot and tooltip are unaffected. */
  readonly showsCursor?: boolean;
  readonly cursorColor?: string;
  readonly horizontalGrid?: GridLineStyleConfig;
  readonly verticalGrid?: GridLineStyleConfig;
  readonly horizontalLabels?: AxisLabelStyleConfig;
  readonly verticalLabels?: AxisLabelStyleConfig;
  readonly dot?: DotConfig;
  readonly cursorLabel?: CursorLabelConfig;
  /**
   * Pattern for x-axis labels, e.g. `'MMM dd'` or `'HH:mm'`.
   * See `formatDate` for the supported tokens.
   */
  readonly dateFormat?: string;
  readonly animation?: AnimationConfig;
}
