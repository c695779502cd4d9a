import {
  UnsupportedCapabilityError,
  type Camera,
  type CameraAdaptor,
  type CameraType,
} from '@scenesync/core';
import { SvgElement } from '../element';
import { SvgNodeAdaptor } from './node';

export interface CameraFrame {
  center: readonly [number, number, number];
  zoom: number;
  /** Side of the square fitted around the scene, or null before any fit. */
  extent: number | null;
}

/**
 * Pan/zoom camera. Draws nothing; views read its frame to compute their
 * `viewBox`. Setting `range` fits the parent scene's bounds, margin included,
 * on the next redraw and writes the fitted centre back into the model. A
 * centre set afterwards is kept until `range` is set again.
 */
export class SvgCameraAdaptor
  extends SvgNodeAdaptor<Camera>
  implements CameraAdaptor<SvgElement>
{
  private _zoom = 1;
  private _center: [number, number, number] = [0, 0, 0];
  private _range = 0.1;
  private _extent: number | null = null;
  private _fitPending = false;

  get frame(): CameraFrame {
    return { center: this._center, zoom: this._zoom, extent: this._extent };
  }

  setType(type: CameraType): void {
    if (type !== 'panzoom') {
      throw new UnsupportedCapabilityError(
        'camera.type',
        `${type} cameras cannot be drawn as SVG`
      );
    }
  }

  setZoom(zoom: number): void {
    this._zoom = zoom;
  }

  setCenter(center: readonly [number, number, number]): void {
    this._center = [center[0], center[1], center[2]];
  }

  setRange(range: number): void {
    this._range = range;
    this._fitPending = true;
    this.invalidate();
  }

  /** Frame whatever the parent scene currently draws. */
  fit(): void {
    const scene = this.element.parent;
    const bounds = scene?.contentBounds();
    if (!bounds) return;
    const width = bounds.maxX - bounds.minX;
    const height = bounds.maxY - bounds.minY;
    this._extent = (Math.max(width, height) || 1) * (1 + this._range);
    const cx = (bounds.minX + bounds.maxX) / 2;
    const cy = (bounds.minY + bounds.maxY) / 2;
    this._center = [cx, cy, this._center[2]];
    this.model.center = [cx, cy, this._center[2]];
  }

  protected override redraw(): void {
    if (!this._fitPending) return;
    this._fitPending = false;
    this.fit();
  }
}
