import { z } from 'zod';
import { EventedModel, resolveFields, type FieldSchemas } from './evented';
import { View } from './view';

export interface CanvasState {
  width: number;
  height: number;
  title: string;
  backgroundColor: string | null;
  visible: boolean;
  views: readonly View[];
}

export type CanvasValues = Omit<CanvasState, 'views'>;

export interface CanvasInit extends Partial<CanvasValues> {
  views?: readonly View[];
}

export const CANVAS_DEFAULTS: Readonly<CanvasValues> = {
  width: 500,
  height: 500,
  title: 'scenesync',
  backgroundColor: null,
  visible: false,
};

export const canvasSchemas: FieldSchemas<CanvasState> = {
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  title: z.string(),
  backgroundColor: z.string().min(1).nullable(),
  visible: z.boolean(),
  views: z.custom<readonly View[]>(
    (v) => Array.isArray(v) && v.every((item) => item instanceof View),
    { message: 'expected an array of views' }
  ),
};

/** A drawing surface holding an ordered list of views. */
export class Canvas extends EventedModel<CanvasState> {
  get kind(): 'canvas' {
    return 'canvas';
  }

  constructor(init: CanvasInit = {}) {
    const { views = [], ...values } = init;
    super(
      canvasSchemas,
      resolveFields(
        'Canvas',
        canvasSchemas,
        { ...CANVAS_DEFAULTS, views: [] },
        values
      )
    );
    for (const view of views) this.addView(view);
  }

  get width(): number {
    return this._get('width');
  }
  set width(value: number) {
    this._assign('width', value);
  }

  get height(): number {
    return this._get('height');
  }
  set height(value: number) {
    this._assign('height', value);
  }

  /** `[width, height]` in pixels. */
  get size(): [number, number] {
    return [this.width, this.height];
  }
  set size([width, height]: [number, number]) {
    this.batch(() => {
      this.width = width;
      this.height = height;
    });
  }

  get title(): string {
    return this._get('title');
  }
  set title(value: string) {
    this._assign('title', value);
  }

  get backgroundColor(): string | null {
    return this._get('backgroundColor');
  }
  set backgroundColor(value: string | null) {
    this._assign('backgroundColor', value);
  }

  get visible(): boolean {
    return this._get('visible');
  }
  set visible(value: boolean) {
    this._assign('visible', value);
  }

  get views(): readonly View[] {
    return this._get('views');
  }

  /** Append `view`, moving it off any other canvas first. */
  addView(view: View): void {
    if (this.views.includes(view)) return;
    const previous = view.attachedCanvas;
    if (previous && previous !== this) previous.removeView(view);
    this._assign('views', [...this.views, view]);
    view._setCanvas(this);
  }

  removeView(view: View): void {
    if (!this.views.includes(view)) return;
    this._assign(
      'views',
      this.views.filter((v) => v !== view)
    );
    view._setCanvas(null);
  }

  show(): void {
    this.visible = true;
  }

  close(): void {
    this.visible = false;
  }
}
