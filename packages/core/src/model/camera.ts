import { z } from 'zod';
import { resolveFields, type FieldSchemas } from './evented';
import {
  NODE_DEFAULTS,
  NodeBase,
  nodeSchemas,
  type Node,
  type NodeInit,
  type NodeState,
} from './node';

export type CameraType = 'panzoom' | 'perspective';

export interface CameraState extends NodeState {
  type: CameraType;
  zoom: number;
  /** Point in the parent's frame the camera looks at. */
  center: [number, number, number];
  /** Margin kept around the scene when the camera frames it, in [0, 1). */
  range: number;
}

export type CameraValues = Omit<CameraState, 'parent' | 'children'>;

export interface CameraInit extends NodeInit, Partial<CameraValues> {}

export const CAMERA_DEFAULTS: Readonly<CameraValues> = {
  ...NODE_DEFAULTS,
  interactive: true,
  type: 'panzoom',
  zoom: 1,
  center: [0, 0, 0],
  range: 0.1,
};

export const cameraSchemas: FieldSchemas<CameraState> = {
  ...nodeSchemas,
  type: z.enum(['panzoom', 'perspective']),
  zoom: z.number().positive(),
  center: z.tuple([z.number(), z.number(), z.number()]),
  range: z.number().min(0).lt(1),
};

export class Camera extends NodeBase<CameraState> {
  get kind(): 'camera' {
    return 'camera';
  }

  constructor(init: CameraInit = {}) {
    const { parent = null, children = [], ...values } = init;
    super(
      cameraSchemas,
      resolveFields(
        'Camera',
        cameraSchemas,
        { ...CAMERA_DEFAULTS, parent: null, children: [] },
        values
      ),
      parent,
      children
    );
  }

  protected _self(): Node {
    return this;
  }

  get type(): CameraType {
    return this._get('type');
  }
  set type(value: CameraType) {
    this._assign('type', value);
  }

  get zoom(): number {
    return this._get('zoom');
  }
  set zoom(value: number) {
    this._assign('zoom', value);
  }

  get center(): [number, number, number] {
    return this._get('center');
  }
  set center(value: [number, number, number]) {
    this._assign('center', value);
  }

  get range(): number {
    return this._get('range');
  }
  set range(value: number) {
    this._assign('range', value);
  }
}
