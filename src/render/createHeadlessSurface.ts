/**
 * In-memory `RenderSurface` for Node: keeps the current frame as data, runs path and label
 * animations on timers, and can serialize the frame to SVG.
 *
 * Animations are driven by wall-clock time (`Date.now()`) sampled on a fixed timer tick, so
 * tests can step them deterministically with fake timers or finish them with
 * `flushAnimations()`.
 *
 * @module createHeadlessSurface
 */

import type { FontSpec } from '../config/types';
import type { ChartPath } from '../core/path/chartPath';
import { EMPTY_PATH, interpolatePath } from '../core/path/chartPath';
import type { AxisLabel, LabelAxis, TextMeasurer } from '../core/labels/computeAxisLabels';
import type { LabelTransition } from '../core/labels/labelTransitions';
import type { EasingFunction } from '../utils/easing';
import { getEasing } from '../utils/easing';
import type { Rect, Size } from '../utils/geometry';
import { EMPTY_RECT, clamp01 } from '../utils/geometry';
import type { FrameLabel, FramePath, SurfaceFrame } from './renderFrameSvg';
import { renderFrameSvg } from './renderFrameSvg';
import type { CursorVisuals, LabelStyle, PathAnimation, PathLayer, PathStyle, RenderSurface } from './types';

/** Average glyph advance as a fraction of the font size. */
export const APPROX_CHAR_WIDTH_FACTOR = 0.6;
export const APPROX_LINE_HEIGHT_FACTOR = 1.2;
/** Timer interval between animation ticks (~60fps). */
export const DEFAULT_FRAME_INTERVAL_MS = 16;

const MAX_FLUSH_ROUNDS = 32;

const LAYERS: ReadonlyArray<PathLayer> = ['horizontalGrid', 'verticalGrid', 'graph'];

/**
 * Fixed-pitch text metrics: every character is `0.6 * size` wide, a line is
 * `ceil(1.2 * size)` tall.
 */
export const approximateTextMeasure: TextMeasurer = (text: string, font: FontSpec): Size => ({
  width: Array.from(text).length * font.size * APPROX_CHAR_WIDTH_FACTOR,
  height: Math.ceil(font.size * APPROX_LINE_HEIGHT_FACTOR),
});

export interface HeadlessSurfaceOptions {
  readonly measureText?: TextMeasurer;
  readonly frameIntervalMs?: number;
}

export interface HeadlessSurface extends RenderSurface {
  getPlotFrame(): Rect;
  /** Path as currently displayed: mid-animation this is the interpolated frame. */
  getPath(layer: PathLayer): ChartPath;
  /** Final path of the layer, regardless of animation progress. */
  getTargetPath(layer: PathLayer): ChartPath;
  getPathStyle(layer: PathLayer): PathStyle | null;
  getLabels(axis: LabelAxis): ReadonlyArray<AxisLabel>;
  /** The running label transition for `axis`, or null once it has finished. */
  getLabelTransition(axis: LabelAxis): LabelTransition | null;
  getCursor(): CursorVisuals | null;
  isAnimating(): boolean;
  /** Runs every pending animation (and any animation started by their completions) to its end. */
  flushAnimations(): void;
  getFrame(): SurfaceFrame;
  toSvg(size: Size): string;
  /** Completes pending animations and stops the timer. Later calls are ignored. */
  dispose(): void;
}

type RunningAnimation = {
  readonly from: ChartPath;
  readonly startedAt: number;
  readonly durationMs: number;
  readonly ease: EasingFunction;
  readonly onComplete: () => void;
};

type PathSlot = {
  path: ChartPath;
  style: PathStyle;
  animation: RunningAnimation | null;
};

type LabelSlot = {
  labels: ReadonlyArray<AxisLabel>;
  style: LabelStyle | null;
  transition: LabelTransition | null;
  transitionStartedAt: number;
};

const invokeCompletion = (onComplete: () => void): void => {
  try {
    onComplete();
  } catch (error) {
    console.error('LineChart: error in animation completion callback:', error);
  }
};

export function createHeadlessSurface(options: HeadlessSurfaceOptions = {}): HeadlessSurface {
  const measureText = options.measureText ?? approximateTextMeasure;
  const frameIntervalMs =
    typeof options.frameIntervalMs === 'number' && options.frameIntervalMs > 0
      ? options.frameIntervalMs
      : DEFAULT_FRAME_INTERVAL_MS;

  let plotFrame: Rect = EMPTY_RECT;
  let cursor: CursorVisuals | null = null;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let disposed = false;

  const paths = new Map<PathLayer, PathSlot>();
  const labels: Record<LabelAxis, LabelSlot> = {
    x: { labels: [], style: null, transition: null, transitionStartedAt: 0 },
    y: { labels: [], style: null, transition: null, transitionStartedAt: 0 },
  };

  const progressOf = (startedAt: number, durationMs: number, now: number): number =>
    durationMs > 0 ? clamp01((now - startedAt) / durationMs) : 1;

  const displayedPath = (slot: PathSlot, now: number): ChartPath => {
    const anim = slot.animation;
    if (!anim) return slot.path;
    const t = anim.ease(progressOf(anim.startedAt, anim.durationMs, now));
    return interpolatePath(anim.from, slot.path, t);
  };

  const finishPath = (slot: PathSlot): void => {
    const anim = slot.animation;
    if (!anim) return;
    slot.animation = null;
    invokeCompletion(anim.onComplete);
  };

  const hasRunningAnimations = (): boolean => {
    for (const slot of paths.values()) {
      if (slot.animation) return true;
    }
    return labels.x.transition !== null || labels.y.transition !== null;
  };

  const advance = (now: number): void => {
    for (const slot of Array.from(paths.values())) {
      const anim = slot.animation;
      if (anim && now - anim.startedAt >= anim.durationMs) finishPath(slot);
    }
    for (const axis of ['x', 'y'] as const) {
      const slot = labels[axis];
      if (slot.transition && now - slot.transitionStartedAt >= slot.transition.durationMs) {
        slot.transition = null;
      }
    }
  };

  const tick = (): void => {
    timer = null;
    if (disposed) return;
    advance(Date.now());
    scheduleTick();
  };

  function scheduleTick(): void {
    if (disposed || timer !== null || !hasRunningAnimations()) return;
    timer = setTimeout(tick, frameIntervalMs);
  }

  const cancelTick = (): void => {
    if (timer !== null) {
      clearTimeout(timer);
      timer = null;
    }
  };

  const setPath: RenderSurface['setPath'] = (layer, path, style, animation?: PathAnimation) => {
    if (disposed) {
      // Keep the completion contract even after disposal.
      if (animation) invokeCompletion(animation.onComplete);
      return;
    }
    const now = Date.now();
    const previous = paths.get(layer);
    const from = previous ? displayedPath(previous, now) : EMPTY_PATH;
    const slot: PathSlot = { path, style, animation: null };
    paths.set(layer, slot);

    if (previous) finishPath(previous);

    if (animation) {
      slot.animation = {
        from,
        startedAt: now,
        durationMs: Math.max(0, animation.durationMs),
        ease: getEasing(animation.easing),
        onComplete: animation.onComplete,
      };
      scheduleTick();
    }
  };

  const setLabels: RenderSurface['setLabels'] = (axis, next, style, transition) => {
    if (disposed) return;
    const slot = labels[axis];
    slot.labels = next;
    slot.style = style;
    if (transition && transition.durationMs > 0) {
      slot.transition = transition;
      slot.transitionStartedAt = Date.now();
      scheduleTick();
    } else {
      slot.transition = null;
    }
  };

  const frameLabels = (axis: LabelAxis, now: number): FrameLabel[] => {
    const slot = labels[axis];
    const style = slot.style;
    if (!style) return [];
    const transition = slot.transition;
    if (!transition) return slot.labels.map((l) => ({ text: l.text, frame: l.frame, style, opacity: 1 }));

    const p = getEasing(transition.easing)(progressOf(slot.transitionStartedAt, transition.durationMs, now));
    const { outgoingOffset: out, incomingOffset: inc } = transition;
    const outgoing = transition.outgoing.map((l) => ({
      text: l.text,
      frame: { ...l.frame, x: l.frame.x + out.x * p, y: l.frame.y + out.y * p },
      style,
      opacity: 1 - p,
    }));
    const incoming = slot.labels.map((l) => ({
      text: l.text,
      frame: { ...l.frame, x: l.frame.x + inc.x * (1 - p), y: l.frame.y + inc.y * (1 - p) },
      style,
      opacity: p,
    }));
    return [...outgoing, ...incoming];
  };

  const getFrame = (): SurfaceFrame => {
    const now = Date.now();
    const framePaths: FramePath[] = [];
    for (const layer of LAYERS) {
      const slot = paths.get(layer);
      if (slot) framePaths.push({ layer, path: displayedPath(slot, now), style: slot.style });
    }
    return {
      plotFrame,
      paths: framePaths,
      labels: [...frameLabels('y', now), ...frameLabels('x', now)],
      cursor,
    };
  };

  const flushAnimations = (): void => {
    for (let round = 0; round < MAX_FLUSH_ROUNDS && hasRunningAnimations(); round++) {
      for (const slot of Array.from(paths.values())) finishPath(slot);
      labels.x.transition = null;
      labels.y.transition = null;
    }
    if (!hasRunningAnimations()) cancelTick();
  };

  const dispose = (): void => {
    if (disposed) return;
    flushAnimations();
    disposed = true;
    cancelTick();
  };

  return {
    measureText,
    setPlotFrame(frame) {
      if (disposed) return;
      plotFrame = frame;
    },
    setPath,
    setLabels,
    setCursor(visuals) {
      if (disposed) return;
      cursor = visuals;
    },
    getPlotFrame: () => plotFrame,
    getPath(layer) {
      const slot = paths.get(layer);
      return slot ? displayedPath(slot, Date.now()) : EMPTY_PATH;
    },
    getTargetPath: (layer) => paths.get(layer)?.path ?? EMPTY_PATH,
    getPathStyle: (layer) => paths.get(layer)?.style ?? null,
    getLabels: (axis) => labels[axis].labels,
    getLabelTransition: (axis) => labels[axis].transition,
    getCursor: () => cursor,
    isAnimating: hasRunningAnimations,
    flushAnimations,
    getFrame,
    toSvg: (size) => renderFrameSvg(getFrame(), size),
    dispose,
  };
}
