import type { EdgeInsets, FontSpec, LineChartOptions } from './types';

export const defaultFontFamily =
  'system-ui, -apple-system, "Segoe UI", Roboto, "Helvetica Neue", Arial, sans-serif';

export const defaultLabelFont = {
  family: defaultFontFamily,
  size: 13,
  weight: 400,
} as const satisfies FontSpec;

export const defaultPadding = {
  top: 20,
  left: 0,
  bottom: 0,
  right: 20,
} as const satisfies EdgeInsets;

export const defaultGridLineStyle = {
  color: 'rgba(142, 142, 147, 0.5)',
  lineWidth: 0.5,
} as const;

const secondaryTextColor = 'rgba(60, 60, 67, 0.6)';

export const defaultLineChartOptions = {
  lineWidth: 3.5,
  tintColor: '#5856D6',
  hoverLineColor: '#8E8E93',
  padding: defaultPadding,
  horizontalLabelsToTopPadding: 16,
  numberOfVerticalDivisions: 5,
  widthBetweenVerticalDivisions: 50,
  showsHorizontalGridLines: true,
  showsVerticalGridLines: true,
  showsCursor: true,
  cursorColor: '#FF3B30',
  horizontalGrid: defaultGridLineStyle,
  verticalGrid: defaultGridLineStyle,
  horizontalLabels: { font: defaultLabelFont, textColor: secondaryTextColor },
  verticalLabels: { font: defaultLabelFont, textColor: secondaryTextColor },
  dot: {
    size: 10,
    color: '#5856D6',
    strokeColor: '#FFFFFF',
    strokeWidth: 2.5,
  },
  cursorLabel: {
    font: defaultLabelFont,
    backgroundColor: '#F2F2F7',
    foregroundColor: secondaryTextColor,
  },
  dateFormat: 'MMM dd',
  animation: { durationMs: 300, easing: 'cubicInOut' },
} as const satisfies LineChartOptions;

/**
 * Denser preset: no vertical grid, no padding, heavier grey labels.
 */
export const compactLineChartOptions = {
  showsVerticalGridLines: false,
  padding: { top: 0, left: 0, bottom: 0, right: 0 },
  horizontalLabels: { font: { size: 13, weight: 500 }, textColor: '#AEAEB2' },
  verticalLabels: { font: { size: 14, weight: 600 }, textColor: '#AEAEB2' },
  lineWidth: 3.5,
  hoverLineColor: '#48484A',
} as const satisfies LineChartOptions;
