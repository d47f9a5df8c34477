import { describe, it, expect } from 'vitest';
import { escapeXml, renderFrameSvg } from '../renderFrameSvg';
import type { SurfaceFrame } from '../renderFrameSvg';

describe('escapeXml', () => {
  it('escapes markup characters', () => {
    expect(escapeXml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;'
    );
  });
});

describe('renderFrameSvg', () => {
  it('draws the hover overlay, cursor line, dot and tooltip', () => {
    const frame: SurfaceFrame = {
      plotFrame: { x: 40, y: 20, width: 100, height: 100 },
      paths: [],
      labels: [],
      cursor: {
        line: { from: { x: 50, y: 20 }, to: { x: 50, y: 120 }, color: '#FF3B30', lineWidth: 1, dashPattern: [2, 4] },
        dot: { center: { x: 50, y: 70 }, size: 10, color: '#5856D6', strokeColor: '#FFFFFF', strokeWidth: 2.5 },
        hover: {
          path: [
            { type: 'moveTo', to: { x: 0, y: 0 } },
            { type: 'lineTo', to: { x: 100, y: 50 } },
          ],
          maskRect: { x: 10, y: 0, width: 90, height: 100 },
          color: '#8E8E93',
          lineWidth: 3.5,
        },
        tooltip: {
          text: 'A&B',
          frame: { x: 30, y: 0, width: 40, height: 16 },
          cornerRadius: 8,
          font: { family: 'x', size: 13, weight: 400 },
          backgroundColor: '#F2F2F7',
          foregroundColor: '#111',
        },
      },
    };

    expect(renderFrameSvg(frame, { width: 300, height: 150 })).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" width="300" height="150" viewBox="0 0 300 150">' +
        '<defs><clipPath id="line-chart-hover-mask"><rect x="10" y="0" width="90" height="100"/></clipPath></defs>' +
        '<g transform="translate(40 20)">' +
        '<path d="M 0 0 L 100 50" fill="none" stroke="#8E8E93" stroke-width="3.5" clip-path="url(#line-chart-hover-mask)"/>' +
        '</g>' +
        '<line x1="50" y1="20" x2="50" y2="120" stroke="#FF3B30" stroke-width="1" stroke-dasharray="2 4"/>' +
        '<circle cx="50" cy="70" r="5" fill="#5856D6" stroke="#FFFFFF" stroke-width="2.5"/>' +
        '<rect x="30" y="0" width="40" height="16" rx="8" fill="#F2F2F7"/>' +
        '<text x="50" y="8" font-family="x" font-size="13" font-weight="400" fill="#111" text-anchor="middle"' +
        ' dominant-baseline="central">A&amp;B</text>' +
        '</svg>'
    );
  });

  it('skips invisible paths and fully faded labels, and marks partial opacity', () => {
    const style = { font: { family: 'x', size: 10, weight: 400 }, color: '#000' };
    const frame: SurfaceFrame = {
      plotFrame: { x: 0, y: 0, width: 10, height: 10 },
      paths: [
        {
          layer: 'verticalGrid',
          path: [
            { type: 'moveTo', to: { x: 0, y: 0 } },
            { type: 'lineTo', to: { x: 0, y: 10 } },
          ],
          style: { strokeColor: '#ccc', lineWidth: 0.5, visible: false },
        },
      ],
      labels: [
        { text: 'gone', frame: { x: 0, y: 0, width: 10, height: 10 }, style, opacity: 0 },
        { text: 'half', frame: { x: 1, y: 2, width: 10, height: 10 }, style, opacity: 0.25 },
      ],
      cursor: null,
    };

    expect(renderFrameSvg(frame, { width: 10, height: 10 })).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" width="10" height="10" viewBox="0 0 10 10">' +
        '<g transform="translate(0 0)"></g>' +
        '<text x="1" y="2" font-family="x" font-size="10" font-weight="400" fill="#000" dominant-baseline="hanging"' +
        ' opacity="0.25">half</text>' +
        '</svg>'
    );
  });
});
