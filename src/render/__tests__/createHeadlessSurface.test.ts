import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { approximateTextMeasure, createHeadlessSurface } from '../createHeadlessSurface';
import type { ChartPath } from '../../core/path/chartPath';
import type { AxisLabel } from '../../core/labels/computeAxisLabels';
import type { LabelTransition } from '../../core/labels/labelTransitions';

const line = (x0: number, y0: number, x1: number, y1: number): ChartPath => [
  { type: 'moveTo', to: { x: x0, y: y0 } },
  { type: 'lineTo', to: { x: x1, y: y1 } },
];

const graphStyle = { strokeColor: '#5856D6', lineWidth: 2, visible: true };
const labelStyle = { font: { family: 'sans-serif', size: 10, weight: 400 }, color: '#333' };

const label = (text: string, y: number): AxisLabel => ({
  text,
  isVertical: true,
  frame: { x: 0, y, width: 24, height: 12 },
});

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe('approximateTextMeasure', () => {
  it('uses a fixed advance per character and a rounded-up line height', () => {
    expect(approximateTextMeasure('abcde', labelStyle.font)).toEqual({ width: 30, height: 12 });
    expect(approximateTextMeasure('', { family: 'serif', size: 13, weight: 400 })).toEqual({ width: 0, height: 16 });
  });
});

describe('createHeadlessSurface - paths', () => {
  it('shows an unanimated path immediately', () => {
    const surface = createHeadlessSurface();
    const path = line(0, 0, 10, 10);
    surface.setPath('graph', path, graphStyle);
    expect(surface.getPath('graph')).toBe(path);
    expect(surface.getPathStyle('graph')).toEqual(graphStyle);
    expect(surface.isAnimating()).toBe(false);
  });

  it('interpolates an animated path over time and completes once', () => {
    const surface = createHeadlessSurface();
    const from = line(0, 0, 10, 10);
    const to = line(10, 0, 20, 20);
    const onComplete = vi.fn();

    surface.setPath('graph', from, graphStyle);
    surface.setPath('graph', to, graphStyle, { durationMs: 100, easing: 'linear', onComplete });

    expect(surface.getPath('graph')).toBe(from);
    expect(surface.getTargetPath('graph')).toBe(to);

    vi.advanceTimersByTime(50);
    expect(surface.getPath('graph')).toEqual(line(5, 0, 15, 15));
    expect(onComplete).not.toHaveBeenCalled();

    vi.advanceTimersByTime(100);
    expect(onComplete).toHaveBeenCalledTimes(1);
    expect(surface.getPath('graph')).toBe(to);
    expect(surface.isAnimating()).toBe(false);
  });

  it('completes a superseded animation immediately', () => {
    const surface = createHeadlessSurface();
    const first = vi.fn();
    const second = vi.fn();

    surface.setPath('graph', line(0, 0, 1, 1), graphStyle, { durationMs: 300, easing: 'linear', onComplete: first });
    surface.setPath('graph', line(0, 0, 2, 2), graphStyle, { durationMs: 300, easing: 'linear', onComplete: second });

    expect(first).toHaveBeenCalledTimes(1);
    expect(second).not.toHaveBeenCalled();

    surface.flushAnimations();
    expect(first).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('completes zero-duration animations on the next tick', () => {
    const surface = createHeadlessSurface();
    const onComplete = vi.fn();
    surface.setPath('graph', line(0, 0, 1, 1), graphStyle, { durationMs: 0, easing: 'linear', onComplete });
    expect(onComplete).not.toHaveBeenCalled();
    vi.advanceTimersByTime(16);
    expect(onComplete).toHaveBeenCalledTimes(1);
  });

  it('flushes animations started by completion callbacks', () => {
    const surface = createHeadlessSurface();
    const last = vi.fn();
    surface.setPath('graph', line(0, 0, 1, 1), graphStyle, {
      durationMs: 300,
      easing: 'linear',
      onComplete: () => {
        surface.setPath('horizontalGrid', line(0, 0, 5, 0), graphStyle, {
          durationMs: 300,
          easing: 'linear',
          onComplete: last,
        });
      },
    });

    surface.flushAnimations();

    expect(last).toHaveBeenCalledTimes(1);
    expect(surface.isAnimating()).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('reports a throwing completion callback', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const surface = createHeadlessSurface();
    const failure = new Error('boom');
    surface.setPath('graph', line(0, 0, 1, 1), graphStyle, {
      durationMs: 10,
      easing: 'linear',
      onComplete: () => {
        throw failure;
      },
    });

    surface.flushAnimations();

    expect(errorSpy).toHaveBeenCalledWith('LineChart: error in animation completion callback:', failure);
  });
});

describe('createHeadlessSurface - labels', () => {
  const transition = (outgoing: ReadonlyArray<AxisLabel>): LabelTransition => ({
    axis: 'y',
    direction: 'expand',
    durationMs: 100,
    easing: 'linear',
    outgoing,
    outgoingOffset: { x: 0, y: -10 },
    incomingOffset: { x: 0, y: 10 },
  });

  it('cross-fades outgoing and incoming labels', () => {
    const surface = createHeadlessSurface();
    const old = [label('1.0', 0)];
    surface.setLabels('y', old, labelStyle, null);
    surface.setLabels('y', [label('2.0', 0)], labelStyle, transition(old));

    vi.advanceTimersByTime(50);
    const frame = surface.getFrame();
    expect(frame.labels.map((l) => [l.text, l.frame.y, l.opacity])).toEqual([
      ['1.0', -5, 0.5],
      ['2.0', 5, 0.5],
    ]);
  });

  it('drops the transition once it has run', () => {
    const surface = createHeadlessSurface();
    const old = [label('1.0', 0)];
    surface.setLabels('y', [label('2.0', 0)], labelStyle, transition(old));
    expect(surface.getLabelTransition('y')).not.toBeNull();

    vi.advanceTimersByTime(112);
    expect(surface.getLabelTransition('y')).toBeNull();
    expect(surface.getFrame().labels.map((l) => [l.text, l.opacity])).toEqual([['2.0', 1]]);
  });
});

describe('createHeadlessSurface - svg', () => {
  it('serializes the current frame', () => {
    const surface = createHeadlessSurface();
    surface.setPlotFrame({ x: 40, y: 20, width: 100, height: 50 });
    surface.setPath('horizontalGrid', line(0, 0, 100, 0), { strokeColor: '#ccc', lineWidth: 0.5, visible: false });
    surface.setPath('graph', line(0, 0, 100, 50), graphStyle);
    surface.setLabels('y', [label('10.0', 14)], labelStyle, null);

    expect(surface.toSvg({ width: 200, height: 100 })).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" width="200" height="100" viewBox="0 0 200 100">' +
        '<g transform="translate(40 20)">' +
        '<path d="M 0 0 L 100 50" fill="none" stroke="#5856D6" stroke-width="2"/>' +
        '</g>' +
        '<text x="0" y="14" font-family="sans-serif" font-size="10" font-weight="400" fill="#333"' +
        ' dominant-baseline="hanging">10.0</text>' +
        '</svg>'
    );
  });
});

describe('createHeadlessSurface - dispose', () => {
  it('completes pending animations and ignores later calls', () => {
    const surface = createHeadlessSurface();
    const pending = vi.fn();
    surface.setPath('graph', line(0, 0, 1, 1), graphStyle, { durationMs: 300, easing: 'linear', onComplete: pending });

    surface.dispose();
    expect(pending).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);

    const late = vi.fn();
    surface.setPath('graph', line(0, 0, 9, 9), graphStyle, { durationMs: 300, easing: 'linear', onComplete: late });
    expect(late).toHaveBeenCalledTimes(1);
    expect(surface.getTargetPath('graph')).toEqual(line(0, 0, 1, 1));
  });
});
