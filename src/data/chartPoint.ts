/**
 * A single sample on the chart: a scalar value observed at a point in time.
 */
export type ChartPoint = Readonly<{
  value: number;
  timestamp: Date;
}>;

/**
 * Ordered (chronological) sequence of points. Replaced as a whole on every update.
 */
export type DataSeries = ReadonlyArray<ChartPoint>;

export function createChartPoint(value: number, timestamp: Date | number): ChartPoint {
  const time = typeof timestamp === 'number' ? timestamp : timestamp.getTime();
  // Own copy so later mutation of the caller's Date cannot change the point.
  return Object.freeze({ value, timestamp: new Date(time) });
}

/** Equality by value and timestamp. `NaN` values compare equal to each other. */
export function isSameChartPoint(a: ChartPoint, b: ChartPoint): boolean {
  if (a === b) return true;
  const sameValue = a.value === b.value || (Number.isNaN(a.value) && Number.isNaN(b.value));
  return sameValue && a.timestamp.getTime() === b.timestamp.getTime();
}

/** Stable hash key consistent with `isSameChartPoint`. */
export function chartPointKey(p: ChartPoint): string {
  return `${p.timestamp.getTime()}:${Object.is(p.value, -0) ? '0' : String(p.value)}`;
}

export function extentOfValues(series: DataSeries): { readonly min: number; readonly max: number } | null {
  if (series.length === 0) return null;
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (let i = 0; i < series.length; i++) {
    const v = series[i].value;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return { min, max };
}
