import { X_PADDING_FRACTION } from '../core/scale/computeChartScale';
import { createLinearScale } from '../utils/scales';

/**
 * Index of the data point whose evenly spaced slot is closest to `relativeX`.
 *
 * Slots sit where the scale mapper places the points (inset by 1% of the width on each side),
 * so a pointer exactly at a point's x resolves to that point. Only the index and count are
 * used; the curve itself is never consulted.
 *
 * Returns null for an empty series.
 */
export function findNearestPointIndex(relativeX: number, plotWidth: number, count: number): number | null {
  if (count <= 0) return null;
  if (!(plotWidth > 0) || !Number.isFinite(relativeX) || count === 1) return 0;
  const inset = plotWidth * X_PADDING_FRACTION;
  const slots = createLinearScale()
    .domain(0, count - 1)
    .range(inset, plotWidth - inset);
  const index = Math.round(slots.invert(relativeX));
  return Math.max(0, Math.min(index, count - 1));
}
