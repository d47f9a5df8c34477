import type { Size } from '../../utils/geometry';
import type { ChartPath, PathCommand } from './chartPath';

/**
 * Horizontal grid: one line per vertical division, top edge to bottom edge inclusive.
 */
export function createHorizontalGridPath(plotSize: Size, divisions: number): ChartPath {
  const { width, height } = plotSize;
  if (!(width > 0) || !(height > 0)) return [];

  const steps = Math.max(2, Math.floor(divisions));
  const stepSize = height / (steps - 1);
  const commands: PathCommand[] = [];
  for (let i = 0; i < steps; i++) {
    const y = i * stepSize;
    commands.push({ type: 'moveTo', to: { x: 0, y } });
    commands.push({ type: 'lineTo', to: { x: width, y } });
  }
  return commands;
}

/**
 * Vertical grid: `max(2, floor(width / desiredSpacing))` lines spread evenly from the left edge to
 * the right edge inclusive.
 */
export function createVerticalGridPath(plotSize: Size, desiredSpacing: number): ChartPath {
  const { width, height } = plotSize;
  if (!(width > 0) || !(height > 0) || !(desiredSpacing > 0)) return [];

  const lineCount = Math.max(2, Math.floor(width / desiredSpacing));
  const stepSize = width / (lineCount - 1);
  const commands: PathCommand[] = [];
  for (let i = 0; i < lineCount; i++) {
    const x = i * stepSize;
    commands.push({ type: 'moveTo', to: { x, y: 0 } });
    commands.push({ type: 'lineTo', to: { x, y: height } });
  }
  return commands;
}
