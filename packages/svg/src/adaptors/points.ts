import {
  UnsupportedCapabilityError,
  type Coord,
  type Points,
  type PointsAdaptor,
  type ScalingMode,
  type SymbolName,
} from '@scenesync/core';
import { SvgElement, unionBounds, type Bounds } from '../element';
import { isSvgMarker, markerElement, type SvgMarker } from '../markers';
import type { SvgAdaptorOptions } from './options';
import { SvgNodeAdaptor } from './node';

/**
 * Markers drawn in a shared content group; colours and stroke width are
 * attributes of the group, so changing them does not redraw.
 */
export class SvgPointsAdaptor
  extends SvgNodeAdaptor<Points>
  implements PointsAdaptor<SvgElement>
{
  private readonly _content: SvgElement;
  private _coords: readonly Coord[] = [];
  private _size = 10;
  private _symbol: SvgMarker = 'disc';

  constructor(model: Points, options: SvgAdaptorOptions) {
    super(model, options);
    this._content = this.createContent();
  }

  setCoords(coords: readonly Coord[]): void {
    this._coords = coords;
    this.invalidate();
  }

  setSize(size: number): void {
    this._size = size;
    this.invalidate();
  }

  setFaceColor(color: string): void {
    this._content.setAttr('fill', color);
  }

  setEdgeColor(color: string): void {
    this._content.setAttr('stroke', color);
  }

  setEdgeWidth(width: number): void {
    this._content.setAttr('stroke-width', width);
  }

  setSymbol(symbol: SymbolName): void {
    if (!isSvgMarker(symbol)) {
      throw new UnsupportedCapabilityError(
        'points.symbol',
        `"${symbol}" markers cannot be drawn as SVG`
      );
    }
    this._symbol = symbol;
    this.invalidate();
  }

  setScaling(scaling: ScalingMode): void {
    this._content.setAttr(
      'vector-effect',
      scaling === 'fixed' ? 'non-scaling-stroke' : null
    );
  }

  setAntialias(antialias: number): void {
    this._content.setAttr('shape-rendering', antialias === 0 ? 'crispEdges' : null);
  }

  protected override redraw(): void {
    this._content.clear();
    const h = this._size / 2;
    let bounds: Bounds | null = null;
    for (const [x, y] of this._coords) {
      this._content.appendChild(
        markerElement(this._symbol, x, y, this._size, this.options.precision)
      );
      bounds = unionBounds(bounds, {
        minX: x - h,
        minY: y - h,
        maxX: x + h,
        maxY: y + h,
      });
    }
    this._content.localBounds = bounds;
  }
}
