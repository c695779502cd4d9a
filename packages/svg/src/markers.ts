import type { SymbolName } from '@scenesync/core';
import { SvgElement } from './element';
import { formatNumber } from './format';

/** Marker symbols the SVG backend can draw. */
export const SVG_MARKERS = [
  'disc',
  'ring',
  'square',
  'diamond',
  'x',
  'cross',
  'triangle_up',
  'triangle_down',
  'star',
] as const satisfies readonly SymbolName[];

export type SvgMarker = (typeof SVG_MARKERS)[number];

export function isSvgMarker(symbol: string): symbol is SvgMarker {
  return SVG_MARKERS.some((m) => m === symbol);
}

type Pt = readonly [number, number];

function polyStr(pts: readonly Pt[], precision: number): string {
  return pts
    .map(([x, y]) => `${formatNumber(x, precision)},${formatNumber(y, precision)}`)
    .join(' ');
}

function diamondPoints(x: number, y: number, size: number): Pt[] {
  const h = size / 2;
  return [
    [x, y - h],
    [x + h, y],
    [x, y + h],
    [x - h, y],
  ];
}

function crossPoints(x: number, y: number, size: number): Pt[] {
  const hs = size / 2;
  const bw = size / 6;
  // 12-vertex plus sign, CW from top-left of vertical bar
  return [
    [x - bw, y - hs],
    [x + bw, y - hs],
    [x + bw, y - bw],
    [x + hs, y - bw],
    [x + hs, y + bw],
    [x + bw, y + bw],
    [x + bw, y + hs],
    [x - bw, y + hs],
    [x - bw, y + bw],
    [x - hs, y + bw],
    [x - hs, y - bw],
    [x - bw, y - bw],
  ];
}

function trianglePoints(x: number, y: number, size: number, up: boolean): Pt[] {
  const h = size / 2;
  return up
    ? [
        [x, y - h],
        [x + h, y + h],
        [x - h, y + h],
      ]
    : [
        [x, y + h],
        [x - h, y - h],
        [x + h, y - h],
      ];
}

function starPoints(x: number, y: number, size: number, n = 5): Pt[] {
  const outer = size / 2;
  const inner = outer * 0.4;
  const verts: Pt[] = [];
  for (let i = 0; i < n * 2; i++) {
    const r = i % 2 === 0 ? outer : inner;
    const angle = (Math.PI * i) / n - Math.PI / 2;
    verts.push([x + r * Math.cos(angle), y + r * Math.sin(angle)]);
  }
  return verts;
}

/** One marker of diameter `size` centred on `(x, y)`. */
export function markerElement(
  symbol: SvgMarker,
  x: number,
  y: number,
  size: number,
  precision: number
): SvgElement {
  const h = size / 2;
  switch (symbol) {
    case 'disc':
      return new SvgElement('circle', { cx: x, cy: y, r: h });
    case 'ring':
      return new SvgElement('circle', { cx: x, cy: y, r: h, fill: 'none' });
    case 'square':
      return new SvgElement('rect', {
        x: x - h,
        y: y - h,
        width: size,
        height: size,
      });
    case 'diamond':
      return new SvgElement('polygon', {
        points: polyStr(diamondPoints(x, y, size), precision),
      });
    case 'x': {
      const f = (n: number) => formatNumber(n, precision);
      return new SvgElement('path', {
        d: `M${f(x - h)},${f(y - h)} L${f(x + h)},${f(y + h)} M${f(x + h)},${f(y - h)} L${f(x - h)},${f(y + h)}`,
      });
    }
    case 'cross':
      return new SvgElement('polygon', {
        points: polyStr(crossPoints(x, y, size), precision),
      });
    case 'triangle_up':
    case 'triangle_down':
      return new SvgElement('polygon', {
        points: polyStr(
          trianglePoints(x, y, size, symbol === 'triangle_up'),
          precision
        ),
      });
    case 'star':
      return new SvgElement('polygon', {
        points: polyStr(starPoints(x, y, size), precision),
      });
  }
}
