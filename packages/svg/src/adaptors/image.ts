import {
  UnsupportedCapabilityError,
  type Image,
  type ImageAdaptor,
  type ImageArray,
  type Interpolation,
} from '@scenesync/core';
import { hasColormap, sampleColormap } from '../colormaps';
import { SvgElement } from '../element';
import type { SvgAdaptorOptions } from './options';
import { SvgNodeAdaptor } from './node';

function isPlane(data: ImageArray): data is number[][] {
  const rows: readonly (readonly unknown[])[] = data;
  return rows.every((row) => row.every((v) => typeof v === 'number'));
}

/** Lowest and highest sample, `[0, 0]` when there is none. */
export function dataRange(plane: readonly (readonly number[])[]): [number, number] {
  let lo = Infinity;
  let hi = -Infinity;
  for (const row of plane) {
    for (const v of row) {
      lo = Math.min(lo, v);
      hi = Math.max(hi, v);
    }
  }
  return lo <= hi ? [lo, hi] : [0, 0];
}

/**
 * 2-D image drawn as one unit `<rect>` per pixel, pixel `(row, col)`
 * covering `[col, col + 1] x [row, row + 1]`.
 */
export class SvgImageAdaptor
  extends SvgNodeAdaptor<Image>
  implements ImageAdaptor<SvgElement>
{
  private readonly _content: SvgElement;
  private _plane: number[][] = [];
  private _cmap = 'gray';
  private _clims: readonly [number, number] | null = null;
  private _gamma = 1;

  constructor(model: Image, options: SvgAdaptorOptions) {
    super(model, options);
    this._content = this.createContent();
  }

  setData(data: ImageArray): void {
    if (!isPlane(data)) {
      throw new UnsupportedCapabilityError(
        'image.volume',
        'only 2-D images can be drawn as SVG'
      );
    }
    this._plane = data;
    this.invalidate();
  }

  setCmap(cmap: string): void {
    if (!hasColormap(cmap)) {
      throw new UnsupportedCapabilityError(
        'image.cmap',
        `unknown colormap "${cmap}"`
      );
    }
    this._cmap = cmap;
    this.invalidate();
  }

  setClims(clims: readonly [number, number] | null): void {
    this._clims = clims;
    this.invalidate();
  }

  setGamma(gamma: number): void {
    this._gamma = gamma;
    this.invalidate();
  }

  setInterpolation(interpolation: Interpolation): void {
    if (interpolation === 'bicubic') {
      this.options.logger.warn(
        'SvgImageAdaptor.setInterpolation: bicubic is not available, using linear'
      );
    }
    this._content.setAttr(
      'shape-rendering',
      interpolation === 'nearest' ? 'crispEdges' : null
    );
  }

  /** Contrast limits in effect: `clims`, or the data range when unset. */
  get limits(): readonly [number, number] {
    return this._clims ?? dataRange(this._plane);
  }

  /** Fill colour of one sample under the current colour settings. */
  colorOf(value: number, limits = this.limits): string {
    const [lo, hi] = limits;
    const t = hi === lo ? 0 : Math.min(1, Math.max(0, (value - lo) / (hi - lo)));
    return sampleColormap(this._cmap, t ** this._gamma);
  }

  protected override redraw(): void {
    this._content.clear();
    const rows = this._plane.length;
    const cols = rows > 0 ? this._plane[0].length : 0;
    const limits = this.limits;
    this._plane.forEach((row, y) => {
      row.forEach((value, x) => {
        this._content.appendChild(
          new SvgElement('rect', {
            x,
            y,
            width: 1,
            height: 1,
            fill: this.colorOf(value, limits),
          })
        );
      });
    });
    this._content.localBounds =
      rows > 0 && cols > 0 ? { minX: 0, minY: 0, maxX: cols, maxY: rows } : null;
  }
}
