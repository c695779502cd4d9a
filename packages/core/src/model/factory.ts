import { ValidationError } from '../errors';
import { Camera, type CameraInit } from './camera';
import { Image, type ImageInit } from './image';
import type { NodeKind } from './node';
import { Points, type PointsInit } from './points';
import { Scene, type SceneInit } from './scene';

export interface NodeInitMap {
  scene: SceneInit;
  camera: CameraInit;
  image: ImageInit;
  points: PointsInit;
}

export interface NodeTypeMap {
  scene: Scene;
  camera: Camera;
  image: Image;
  points: Points;
}

type NodeConstructors = {
  [K in NodeKind]: new (init: NodeInitMap[K]) => NodeTypeMap[K];
};

const constructors: NodeConstructors = {
  scene: Scene,
  camera: Camera,
  image: Image,
  points: Points,
};

export const NODE_KINDS: readonly NodeKind[] = ['scene', 'camera', 'image', 'points'];

/** Construct a concrete node by kind name. */
export function createNode<K extends NodeKind>(
  kind: K,
  init: NodeInitMap[K]
): NodeTypeMap[K] {
  if (!Object.prototype.hasOwnProperty.call(constructors, kind)) {
    throw new ValidationError(
      `createNode: unknown node kind "${String(kind)}" (expected ${NODE_KINDS.join(', ')})`
    );
  }
  const ctor = constructors[kind];
  return new ctor(init);
}
