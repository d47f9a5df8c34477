/**
 * Serializes one frame of a render surface to a standalone SVG document.
 *
 * Draw order, back to front: grid paths, graph, hover overlay, axis labels, cursor line,
 * tracking dot, tooltip. Paths are translated into the plot frame; everything else is already in
 * chart-view coordinates.
 *
 * @module renderFrameSvg
 */

import type { FontSpec } from '../config/types';
import type { ChartPath } from '../core/path/chartPath';
import { pathToSvgData } from '../core/path/chartPath';
import type { Rect, Size } from '../utils/geometry';
import type { CursorVisuals, LabelStyle, PathLayer, PathStyle } from './types';

export interface FramePath {
  readonly layer: PathLayer;
  readonly path: ChartPath;
  readonly style: PathStyle;
}

export interface FrameLabel {
  readonly text: string;
  readonly frame: Rect;
  readonly style: LabelStyle;
  readonly opacity: number;
}

export interface SurfaceFrame {
  readonly plotFrame: Rect;
  readonly paths: ReadonlyArray<FramePath>;
  readonly labels: ReadonlyArray<FrameLabel>;
  readonly cursor: CursorVisuals | null;
}

const HOVER_CLIP_ID = 'line-chart-hover-mask';

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

const num = (n: number): string => {
  const rounded = Number(n.toFixed(3));
  return Object.is(rounded, -0) ? '0' : String(rounded);
};

const fontAttrs = (font: FontSpec): string =>
  `font-family="${escapeXml(font.family)}" font-size="${num(font.size)}" font-weight="${num(font.weight)}"`;

const renderPath = (path: ChartPath, stroke: string, lineWidth: number, extra = ''): string =>
  `<path d="${pathToSvgData(path)}" fill="none" stroke="${escapeXml(stroke)}" stroke-width="${num(lineWidth)}"${extra}/>`;

const renderLabel = (label: FrameLabel): string => {
  const { text, frame, style, opacity } = label;
  const opacityAttr = opacity < 1 ? ` opacity="${num(opacity)}"` : '';
  return (
    `<text x="${num(frame.x)}" y="${num(frame.y)}" ${fontAttrs(style.font)} fill="${escapeXml(style.color)}"` +
    ` dominant-baseline="hanging"${opacityAttr}>${escapeXml(text)}</text>`
  );
};

const renderCursor = (cursor: CursorVisuals, parts: string[]): void => {
  if (cursor.line) {
    const { from, to, color, lineWidth, dashPattern } = cursor.line;
    const dash = dashPattern.length > 0 ? ` stroke-dasharray="${dashPattern.map(num).join(' ')}"` : '';
    parts.push(
      `<line x1="${num(from.x)}" y1="${num(from.y)}" x2="${num(to.x)}" y2="${num(to.y)}"` +
        ` stroke="${escapeXml(color)}" stroke-width="${num(lineWidth)}"${dash}/>`
    );
  }
  if (cursor.dot) {
    const { center, size, color, strokeColor, strokeWidth } = cursor.dot;
    parts.push(
      `<circle cx="${num(center.x)}" cy="${num(center.y)}" r="${num(size / 2)}" fill="${escapeXml(color)}"` +
        ` stroke="${escapeXml(strokeColor)}" stroke-width="${num(strokeWidth)}"/>`
    );
  }
  if (cursor.tooltip) {
    const { text, frame, cornerRadius, font, backgroundColor, foregroundColor } = cursor.tooltip;
    parts.push(
      `<rect x="${num(frame.x)}" y="${num(frame.y)}" width="${num(frame.width)}" height="${num(frame.height)}"` +
        ` rx="${num(cornerRadius)}" fill="${escapeXml(backgroundColor)}"/>`
    );
    parts.push(
      `<text x="${num(frame.x + frame.width / 2)}" y="${num(frame.y + frame.height / 2)}" ${fontAttrs(font)}` +
        ` fill="${escapeXml(foregroundColor)}" text-anchor="middle" dominant-baseline="central">${escapeXml(text)}</text>`
    );
  }
};

export function renderFrameSvg(frame: SurfaceFrame, size: Size): string {
  const { plotFrame, paths, labels, cursor } = frame;
  const parts: string[] = [];
  const w = num(Math.max(0, size.width));
  const h = num(Math.max(0, size.height));
  parts.push(`<svg xmlns="http://www.w3.org/2000/svg" width="${w}" height="${h}" viewBox="0 0 ${w} ${h}">`);

  const hover = cursor?.hover ?? null;
  if (hover) {
    const m = hover.maskRect;
    parts.push(
      `<defs><clipPath id="${HOVER_CLIP_ID}"><rect x="${num(m.x)}" y="${num(m.y)}" width="${num(m.width)}"` +
        ` height="${num(m.height)}"/></clipPath></defs>`
    );
  }

  parts.push(`<g transform="translate(${num(plotFrame.x)} ${num(plotFrame.y)})">`);
  for (const { path, style } of paths) {
    if (!style.visible || path.length === 0) continue;
    parts.push(renderPath(path, style.strokeColor, style.lineWidth));
  }
  if (hover && hover.path.length > 0) {
    parts.push(renderPath(hover.path, hover.color, hover.lineWidth, ` clip-path="url(#${HOVER_CLIP_ID})"`));
  }
  parts.push('</g>');

  for (const label of labels) {
    if (label.opacity <= 0) continue;
    parts.push(renderLabel(label));
  }

  if (cursor) renderCursor(cursor, parts);

  parts.push('</svg>');
  return parts.join('');
}
