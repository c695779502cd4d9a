import type { Canvas, CanvasAdaptor, ViewAdaptor } from '@scenesync/core';
import { SvgElement } from '../element';
import type { SvgAdaptorOptions } from './options';

export const SVG_NS = 'http://www.w3.org/2000/svg';

/** Root `<svg>` document; `render()` returns its markup. */
export class SvgCanvasAdaptor implements CanvasAdaptor<SvgElement> {
  private readonly _element: SvgElement;
  private readonly _title: SvgElement;
  private readonly _background: SvgElement;
  private readonly _options: SvgAdaptorOptions;
  private _views: ViewAdaptor<SvgElement>[] = [];
  private _visible = false;
  private _closed = false;

  constructor(model: Canvas, options: SvgAdaptorOptions) {
    this._options = options;
    this._element = new SvgElement('svg', {
      xmlns: SVG_NS,
      'data-id': model.modelId,
      width: model.width,
      height: model.height,
      viewBox: () =>
        `0 0 ${this._element.getAttr('width')} ${this._element.getAttr('height')}`,
    });
    this._title = new SvgElement('title');
    this._title.order = -2;
    this._element.appendChild(this._title);
    this._background = new SvgElement('rect', { width: '100%', height: '100%' });
    this._background.order = -1;
  }

  getNative(): SvgElement {
    return this._element;
  }

  get visible(): boolean {
    return this._visible;
  }

  get closed(): boolean {
    return this._closed;
  }

  get views(): readonly ViewAdaptor<SvgElement>[] {
    return this._views;
  }

  setVisible(visible: boolean): void {
    this._visible = visible;
  }

  setWidth(width: number): void {
    this._element.setAttr('width', width);
  }

  setHeight(height: number): void {
    this._element.setAttr('height', height);
  }

  setBackgroundColor(color: string | null): void {
    if (color === null) {
      this._background.remove();
      return;
    }
    this._background.setAttr('fill', color);
    this._element.appendChild(this._background);
  }

  setTitle(title: string): void {
    this._title.text = title;
  }

  addView(view: ViewAdaptor<SvgElement>): void {
    if (!this._views.includes(view)) this._views.push(view);
    this._element.appendChild(view.getNative());
  }

  setViews(views: readonly ViewAdaptor<SvgElement>[]): void {
    for (const old of this._views) {
      if (!views.includes(old)) old.getNative().remove();
    }
    this._views = [];
    for (const view of views) this.addView(view);
  }

  render(): string {
    if (this._closed) {
      throw new Error('SvgCanvasAdaptor.render: canvas has been closed');
    }
    return this._element.markup(this._options.precision);
  }

  close(): void {
    this._closed = true;
    this._visible = false;
    this.setViews([]);
  }

  dispose(): void {
    this._element.clear();
  }
}
