/**
 * Timing curves for curve morphs and label cross-fades. Both map animation progress in [0, 1] to
 * eased progress in [0, 1]; out-of-range and NaN input is pinned to the nearest end (NaN to 0).
 */

import type { EasingName } from '../config/types';

export type EasingFunction = (progress: number) => number;

export const EASING_NAMES: ReadonlyArray<EasingName> = ['linear', 'cubicInOut'];

export const isEasingName = (v: unknown): v is EasingName => EASING_NAMES.some((name) => name === v);

const toProgress = (t: number): number => (t > 0 ? Math.min(t, 1) : 0);

export const easeLinear: EasingFunction = (t) => toProgress(t);

/** Slow start and slow finish, symmetric around (0.5, 0.5). */
export const easeCubicInOut: EasingFunction = (t) => {
  const p = toProgress(t);
  return p < 0.5 ? 4 * p ** 3 : 1 - (2 - 2 * p) ** 3 / 2;
};

const EASINGS: Readonly<Record<EasingName, EasingFunction>> = {
  linear: easeLinear,
  cubicInOut: easeCubicInOut,
};

/** Unknown or missing names fall back to linear. */
export function getEasing(name: EasingName | null | undefined): EasingFunction {
  return isEasingName(name) ? EASINGS[name] : easeLinear;
}
