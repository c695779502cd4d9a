import { z } from 'zod';
import { Canvas } from './canvas';
import { Camera } from './camera';
import { EventedModel, resolveFields, type FieldSchemas } from './evented';
import { Layout, type LayoutValues } from './layout';
import { Scene } from './scene';

export type Blending = 'default' | 'opaque' | 'alpha' | 'additive';

export interface ViewState {
  scene: Scene;
  camera: Camera;
  layout: Layout;
  blending: Blending;
  visible: boolean;
}

export interface ViewInit {
  scene?: Scene;
  camera?: Camera;
  layout?: Layout | Partial<LayoutValues>;
  blending?: Blending;
  visible?: boolean;
}

export const viewSchemas: FieldSchemas<ViewState> = {
  scene: z.instanceof(Scene),
  camera: z.instanceof(Camera),
  layout: z.instanceof(Layout),
  blending: z.enum(['default', 'opaque', 'alpha', 'additive']),
  visible: z.boolean(),
};

/**
 * A rectangular region of a canvas showing one scene through one camera.
 *
 * The camera is kept parented to the scene: on construction and whenever
 * either is replaced.
 */
export class View extends EventedModel<ViewState> {
  private _canvas: Canvas | null = null;

  get kind(): 'view' {
    return 'view';
  }

  constructor(init: ViewInit = {}) {
    const scene = init.scene ?? new Scene();
    const camera = init.camera ?? new Camera();
    const layout =
      init.layout instanceof Layout ? init.layout : new Layout(init.layout);
    const state = resolveFields<ViewState>(
      'View',
      viewSchemas,
      { scene, camera, layout, blending: 'default', visible: true },
      { scene, camera, blending: init.blending, visible: init.visible }
    );
    super(viewSchemas, state);
    state.camera.parent = state.scene;
  }

  get scene(): Scene {
    return this._get('scene');
  }
  set scene(value: Scene) {
    this._assign('scene', value);
    this.camera.parent = this.scene;
  }

  get camera(): Camera {
    return this._get('camera');
  }
  set camera(value: Camera) {
    this._assign('camera', value);
    this.camera.parent = this.scene;
  }

  get layout(): Layout {
    return this._get('layout');
  }

  get blending(): Blending {
    return this._get('blending');
  }
  set blending(value: Blending) {
    this._assign('blending', value);
  }

  get visible(): boolean {
    return this._get('visible');
  }
  set visible(value: boolean) {
    this._assign('visible', value);
  }

  /** The canvas showing this view, created on first access. */
  get canvas(): Canvas {
    let canvas = this._canvas;
    if (!canvas) {
      canvas = new Canvas();
      canvas.addView(this);
    }
    return canvas;
  }
  set canvas(canvas: Canvas) {
    canvas.addView(this);
  }

  /** The canvas this view belongs to, without creating one. */
  get attachedCanvas(): Canvas | null {
    return this._canvas;
  }

  /** Make the owning canvas visible and return it. */
  show(): Canvas {
    const canvas = this.canvas;
    canvas.show();
    return canvas;
  }

  /** @internal Called by `Canvas` when the view is added or removed. */
  _setCanvas(canvas: Canvas | null): void {
    this._canvas = canvas;
  }
}
