import { describe, it, expect } from 'vitest';
import { resolveCursor } from '../resolveCursor';
import type { CursorResolutionInput } from '../resolveCursor';
import { resolveOptions } from '../../config/OptionResolver';
import { buildDotPath, buildSmoothPath } from '../../core/path/buildSmoothPath';
import type { TextMeasurer } from '../../core/labels/computeAxisLabels';
import { computeChartScale } from '../../core/scale/computeChartScale';
import { createChartPoint } from '../../data/chartPoint';

const measureText: TextMeasurer = (text, font) => ({
  width: text.length * font.size * 0.6,
  height: Math.ceil(font.size * 1.2),
});

const options = resolveOptions();
const series = [10, 20, 30].map((v, i) => createChartPoint(v, new Date(2024, 0, 1 + i)));
const plotFrame = { x: 40, y: 20, width: 300, height: 100 };

const multiInput = (overrides: Partial<CursorResolutionInput> = {}): CursorResolutionInput => {
  const scale = computeChartScale(series, { width: 300, height: 100 }, options.lineWidth);
  if (!scale) throw new Error('expected a scale');
  return {
    series,
    scale,
    path: buildSmoothPath(scale.points, scale.clampRect),
    plotFrame,
    pointerX: 190,
    options,
    cursorLabelProvider: (p) => String(p.value),
    measureText,
    previousMarker: null,
    ...overrides,
  };
};

describe('resolveCursor - multi-point series', () => {
  it('resolves the marker on the curve and the nearest data point', () => {
    const result = resolveCursor(multiInput());

    expect(result.index).toBe(1);
    expect(result.point?.value).toBe(20);
    expect(result.marker?.x).toBe(190);
    expect(result.marker?.y).toBeCloseTo(70, 0);
  });

  it('builds the cursor line, dot and hover overlay', () => {
    const input = multiInput();
    const { visuals, marker } = resolveCursor(input);

    expect(visuals.line).toEqual({
      from: { x: 190, y: 20 },
      to: { x: 190, y: 120 },
      color: '#FF3B30',
      lineWidth: 1,
      dashPattern: [2, 4],
    });
    expect(visuals.dot).toEqual({
      center: marker,
      size: 10,
      color: '#5856D6',
      strokeColor: '#FFFFFF',
      strokeWidth: 2.5,
    });
    expect(visuals.hover?.path).toBe(input.path);
    expect(visuals.hover?.maskRect).toEqual({ x: 150, y: 0, width: 150, height: 100 });
    expect(visuals.hover?.color).toBe('#8E8E93');
  });

  it('pads the tooltip and centres it on the cursor', () => {
    const tooltip = resolveCursor(multiInput()).visuals.tooltip;
    expect(tooltip?.text).toBe('20');
    // '20' at 13px: 2 * 7.8 wide, plus 5px on each side; line height ceil(15.6).
    expect(tooltip?.frame.width).toBeCloseTo(25.6, 10);
    expect(tooltip?.frame.height).toBe(16);
    expect(tooltip?.frame.x).toBeCloseTo(177.2, 10);
    expect(tooltip?.frame.y).toBe(0);
    expect(tooltip?.cornerRadius).toBe(8);
  });

  it('clamps the pointer and the tooltip to the plot frame', () => {
    const result = resolveCursor(multiInput({ pointerX: 10 }));
    expect(result.visuals.line?.from.x).toBe(40);
    expect(result.visuals.hover?.maskRect.x).toBe(0);
    expect(result.index).toBe(0);
    expect(result.visuals.tooltip?.frame.x).toBe(40);
  });

  it('keeps the previous marker when the path is missed', () => {
    const missed = resolveCursor(multiInput({ pointerX: 10 }));
    expect(missed.marker).toBeNull();
    expect(missed.visuals.dot).toBeNull();

    const kept = resolveCursor(multiInput({ pointerX: 10, previousMarker: { x: 100, y: 50 } }));
    expect(kept.marker).toEqual({ x: 100, y: 50 });
  });

  it('suppresses only the tooltip when there is no label', () => {
    const result = resolveCursor(multiInput({ cursorLabelProvider: () => null }));
    expect(result.visuals.tooltip).toBeNull();
    expect(result.point?.value).toBe(20);
    expect(result.visuals.dot).not.toBeNull();
  });

  it('hides only the cursor line when the cursor is disabled', () => {
    const result = resolveCursor(multiInput({ options: resolveOptions({ showsCursor: false }) }));
    expect(result.visuals.line).toBeNull();
    expect(result.visuals.dot).not.toBeNull();
    expect(result.visuals.tooltip).not.toBeNull();
  });
});

describe('resolveCursor - single point', () => {
  it('pins the cursor to the point regardless of the pointer', () => {
    const single = [createChartPoint(50, new Date(2024, 0, 1))];
    const scale = computeChartScale(single, { width: 200, height: 100 }, options.lineWidth);
    if (!scale) throw new Error('expected a scale');
    const frame = { x: 40, y: 20, width: 200, height: 100 };

    const result = resolveCursor({
      series: single,
      scale,
      path: buildDotPath(scale.points[0], { width: 200, height: 100 }),
      plotFrame: frame,
      pointerX: 60,
      options,
      cursorLabelProvider: null,
      measureText,
      previousMarker: null,
    });

    expect(result.index).toBe(0);
    expect(result.point?.value).toBe(50);
    expect(result.marker).toEqual({ x: 140, y: 70 });
    expect(result.visuals.line?.from).toEqual({ x: 140, y: 20 });
    expect(result.visuals.hover).toBeNull();
    expect(result.visuals.tooltip).toBeNull();
  });
});
