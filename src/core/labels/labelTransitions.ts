import type { ResolvedAnimationConfig } from '../../config/OptionResolver';
import type { EasingName } from '../../config/types';
import type { Point } from '../../utils/geometry';
import type { AxisLabel, LabelAxis } from './computeAxisLabels';

export const LABEL_SLIDE_DISTANCE_CSS_PX = 10;

export type LabelTransitionDirection = 'expand' | 'shrink' | 'steady';

/**
 * Cross-fade between the previous label set and a freshly laid out one.
 *
 * Labels are never matched one to one: every outgoing label fades to 0 while sliding by
 * `outgoingOffset`; every incoming label starts at `incomingOffset` with opacity 0 and settles at
 * its frame with opacity 1.
 */
export interface LabelTransition {
  readonly axis: LabelAxis;
  readonly direction: LabelTransitionDirection;
  readonly durationMs: number;
  readonly easing: EasingName;
  readonly outgoing: ReadonlyArray<AxisLabel>;
  readonly outgoingOffset: Point;
  readonly incomingOffset: Point;
}

const ZERO: Point = { x: 0, y: 0 };

export function getTransitionDirection(previousCount: number, nextCount: number): LabelTransitionDirection {
  if (nextCount > previousCount) return 'expand';
  if (nextCount < previousCount) return 'shrink';
  return 'steady';
}

/**
 * Returns null on the first build (nothing to fade out). Only an expanding set slides: y labels
 * rise (in from below, out upward), x labels move right (in from the left, out to the right).
 */
export function planLabelTransition(
  axis: LabelAxis,
  previous: ReadonlyArray<AxisLabel>,
  nextCount: number,
  animation: ResolvedAnimationConfig
): LabelTransition | null {
  if (previous.length === 0) return null;

  const direction = getTransitionDirection(previous.length, nextCount);
  const d = direction === 'expand' ? LABEL_SLIDE_DISTANCE_CSS_PX : 0;

  return {
    axis,
    direction,
    durationMs: animation.durationMs,
    easing: animation.easing,
    outgoing: previous,
    outgoingOffset: d === 0 ? ZERO : axis === 'y' ? { x: 0, y: -d } : { x: d, y: 0 },
    incomingOffset: d === 0 ? ZERO : axis === 'y' ? { x: 0, y: d } : { x: -d, y: 0 },
  };
}
