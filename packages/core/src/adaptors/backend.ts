import type { Logger } from '../logger';
import type { Camera } from '../model/camera';
import type { Canvas } from '../model/canvas';
import type { Image } from '../model/image';
import type { Node } from '../model/node';
import type { Points } from '../model/points';
import type { Scene } from '../model/scene';
import type { View } from '../model/view';
import type {
  Adaptor,
  CameraAdaptor,
  CanvasAdaptor,
  ImageAdaptor,
  NodeAdaptor,
  PointsAdaptor,
  SceneAdaptor,
  ViewAdaptor,
} from './contracts';

/** Any model object the registry can synchronize. */
export type SyncModel = Node | View | Canvas;

/** Adaptor lookup by model identity, typed per model kind. */
export interface AdaptorSource<N = unknown> {
  getAdaptor(model: Scene, create?: boolean): SceneAdaptor<N>;
  getAdaptor(model: Camera, create?: boolean): CameraAdaptor<N>;
  getAdaptor(model: Image, create?: boolean): ImageAdaptor<N>;
  getAdaptor(model: Points, create?: boolean): PointsAdaptor<N>;
  getAdaptor(model: Node, create?: boolean): NodeAdaptor<N>;
  getAdaptor(model: View, create?: boolean): ViewAdaptor<N>;
  getAdaptor(model: Canvas, create?: boolean): CanvasAdaptor<N>;
  getAdaptor(model: SyncModel, create?: boolean): Adaptor<N>;
  has(model: SyncModel): boolean;
}

/** Handed to adaptor factories and setters. */
export interface SyncContext<N = unknown> {
  readonly registry: AdaptorSource<N>;
  readonly logger: Logger;
}

/**
 * A rendering backend: one adaptor factory per model kind. A kind without a
 * factory cannot be synchronized with this backend.
 */
export interface Backend<N = unknown> {
  readonly name: string;
  createScene?(model: Scene, ctx: SyncContext<N>): SceneAdaptor<N>;
  createCamera?(model: Camera, ctx: SyncContext<N>): CameraAdaptor<N>;
  createImage?(model: Image, ctx: SyncContext<N>): ImageAdaptor<N>;
  createPoints?(model: Points, ctx: SyncContext<N>): PointsAdaptor<N>;
  createView?(model: View, ctx: SyncContext<N>): ViewAdaptor<N>;
  createCanvas?(model: Canvas, ctx: SyncContext<N>): CanvasAdaptor<N>;
}
