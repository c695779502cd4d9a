import {
  CANVAS_DEFAULTS,
  type Blending,
  type CameraAdaptor,
  type SceneAdaptor,
  type View,
  type ViewAdaptor,
} from '@scenesync/core';
import { SvgElement, SvgSlot } from '../element';
import { formatNumber } from '../format';
import { SvgCameraAdaptor } from './camera';
import type { SvgAdaptorOptions } from './options';

const BLEND_MODES: Record<Blending, string | null> = {
  default: null,
  opaque: 'normal',
  alpha: 'normal',
  additive: 'plus-lighter',
};

export interface Viewport {
  width: number;
  height: number;
}

/**
 * A nested `<svg>` placed on the canvas by the view's layout:
 *
 * ```
 * <svg data-kind="view" x y width height>   layout.position + margin
 *   <rect/>                                 background
 *   <svg data-role="viewport" viewBox>      inset by padding
 *     ...scene...
 *   </svg>
 *   <rect/>                                 border
 * </svg>
 * ```
 *
 * The scene is drawn through a slot, so several views may share it.
 */
export class SvgViewAdaptor implements ViewAdaptor<SvgElement> {
  private readonly _element: SvgElement;
  private readonly _background: SvgElement;
  private readonly _viewport: SvgElement;
  private readonly _border: SvgElement;
  private readonly _options: SvgAdaptorOptions;

  private _scene: SceneAdaptor<SvgElement> | null = null;
  private _camera: SvgCameraAdaptor | null = null;
  private _position: readonly [number, number] = [0, 0];
  private _size: readonly [number, number] | null = null;
  private _borderWidth = 0;
  private _borderColor: string | null = null;
  private _padding = 0;
  private _margin = 0;

  constructor(model: View, options: SvgAdaptorOptions) {
    this._options = options;
    this._element = new SvgElement('svg', {
      'data-kind': 'view',
      'data-id': model.modelId,
      x: () => this._position[0] + this._margin,
      y: () => this._position[1] + this._margin,
      width: () => this.outerSize().width,
      height: () => this.outerSize().height,
    });
    this._background = new SvgElement('rect', { width: '100%', height: '100%' });
    this._background.order = -1;
    this._viewport = new SvgElement('svg', {
      'data-role': 'viewport',
      x: () => this._padding,
      y: () => this._padding,
      width: () => this.viewport().width,
      height: () => this.viewport().height,
      viewBox: () => this.viewBox(),
    });
    this._viewport.appendChild(new SvgSlot(() => this._scene?.getNative() ?? null));
    this._element.appendChild(this._viewport);
    this._border = new SvgElement('rect', {
      x: () => this._borderWidth / 2,
      y: () => this._borderWidth / 2,
      width: () => Math.max(0, this.outerSize().width - this._borderWidth),
      height: () => Math.max(0, this.outerSize().height - this._borderWidth),
      fill: 'none',
      stroke: () => this._borderColor,
      'stroke-width': () => this._borderWidth,
    });
    this._border.order = 1;
  }

  getNative(): SvgElement {
    return this._element;
  }

  setVisible(visible: boolean): void {
    this._element.setAttr('display', visible ? null : 'none');
  }

  setBlending(blending: Blending): void {
    const mode = BLEND_MODES[blending];
    this._element.setAttr('style', mode === null ? null : `mix-blend-mode: ${mode}`);
  }

  setCamera(camera: CameraAdaptor<SvgElement>): void {
    this._camera = camera instanceof SvgCameraAdaptor ? camera : null;
  }

  setScene(scene: SceneAdaptor<SvgElement>): void {
    this._scene = scene;
  }

  setPosition(position: readonly [number, number]): void {
    this._position = position;
  }

  setSize(size: readonly [number, number] | null): void {
    this._size = size;
  }

  setBackgroundColor(color: string | null): void {
    if (color === null) {
      this._background.remove();
      return;
    }
    this._background.setAttr('fill', color);
    this._element.appendChild(this._background);
  }

  setBorderWidth(width: number): void {
    this._borderWidth = width;
    this._syncBorder();
  }

  setBorderColor(color: string | null): void {
    this._borderColor = color;
    this._syncBorder();
  }

  setPadding(padding: number): void {
    this._padding = padding;
  }

  setMargin(margin: number): void {
    this._margin = margin;
  }

  /** Size of the view box on the canvas, margins removed. */
  outerSize(): Viewport {
    const [width, height] = this._size ?? this._fillSize();
    return {
      width: Math.max(0, width - 2 * this._margin),
      height: Math.max(0, height - 2 * this._margin),
    };
  }

  /** Drawable area inside the padding. */
  viewport(): Viewport {
    const outer = this.outerSize();
    return {
      width: Math.max(0, outer.width - 2 * this._padding),
      height: Math.max(0, outer.height - 2 * this._padding),
    };
  }

  /**
   * Scene-space rectangle shown by the camera. A fitted camera shows its
   * extent along the viewport's shorter side; an unfitted one maps one
   * scene unit to one pixel.
   */
  viewBox(): string | null {
    if (!this._camera) return null;
    const { center, zoom, extent } = this._camera.frame;
    const { width, height } = this.viewport();
    if (width === 0 || height === 0) return null;
    let w = width / zoom;
    let h = height / zoom;
    if (extent !== null) {
      const base = extent / zoom;
      if (width >= height) {
        h = base;
        w = (base * width) / height;
      } else {
        w = base;
        h = (base * height) / width;
      }
    }
    const f = (n: number) => formatNumber(n, this._options.precision);
    return `${f(center[0] - w / 2)} ${f(center[1] - h / 2)} ${f(w)} ${f(h)}`;
  }

  /** Without an explicit size a view runs to the canvas's far edges. */
  private _fillSize(): [number, number] {
    const canvas = this._element.parent;
    const width = canvas?.getAttr('width');
    const height = canvas?.getAttr('height');
    return [
      (typeof width === 'number' ? width : CANVAS_DEFAULTS.width) - this._position[0],
      (typeof height === 'number' ? height : CANVAS_DEFAULTS.height) -
        this._position[1],
    ];
  }

  private _syncBorder(): void {
    if (this._borderWidth > 0 && this._borderColor !== null) {
      this._element.appendChild(this._border);
    } else {
      this._border.remove();
    }
  }
}
