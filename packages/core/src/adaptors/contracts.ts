import { MissingCapabilityError } from '../errors';
import type { ModelKind } from '../model/evented';
import type { CameraType } from '../model/camera';
import type { ImageArray, Interpolation } from '../model/image';
import type { Layout } from '../model/layout';
import type { Coord, ScalingMode, SymbolName } from '../model/points';
import type { Blending } from '../model/view';
import type { Transform } from '../transform';

/**
 * Backend-side counterpart of one model object.
 *
 * `N` is the backend's native handle type. Setters receive already validated
 * values; a backend that cannot honour a value throws
 * `UnsupportedCapabilityError`.
 */
export interface Adaptor<N = unknown> {
  getNative(): N;
  /** Called once when the registry lets go of this adaptor. */
  dispose?(): void;
}

/** Redraw control used around multi-field updates. */
export interface Updatable {
  blockUpdates(): void;
  unblockUpdates(): void;
  forceUpdate(): void;
}

export interface NodeAdaptor<N = unknown> extends Adaptor<N>, Updatable {
  setVisible(visible: boolean): void;
  setName(name: string | null): void;
  setParent(parent: NodeAdaptor<N> | null): void;
  /** Replace the native child list; `addNode` is used when absent. */
  setChildren?(children: readonly NodeAdaptor<N>[]): void;
  setOpacity(opacity: number): void;
  setOrder(order: number): void;
  setInteractive(interactive: boolean): void;
  setTransform(transform: Transform): void;
  addNode(child: NodeAdaptor<N>): void;
}

export type SceneAdaptor<N = unknown> = NodeAdaptor<N>;

export interface CameraAdaptor<N = unknown> extends NodeAdaptor<N> {
  setType(type: CameraType): void;
  setZoom(zoom: number): void;
  setCenter(center: readonly [number, number, number]): void;
  setRange(range: number): void;
}

export interface ImageAdaptor<N = unknown> extends NodeAdaptor<N> {
  setData(data: ImageArray): void;
  setCmap(cmap: string): void;
  setClims(clims: readonly [number, number] | null): void;
  setGamma(gamma: number): void;
  setInterpolation(interpolation: Interpolation): void;
}

export interface PointsAdaptor<N = unknown> extends NodeAdaptor<N> {
  setCoords(coords: readonly Coord[]): void;
  setSize(size: number): void;
  setFaceColor(color: string): void;
  setEdgeColor(color: string): void;
  setEdgeWidth(width: number): void;
  setSymbol(symbol: SymbolName): void;
  setScaling(scaling: ScalingMode): void;
  setAntialias(antialias: number): void;
}

export interface ViewAdaptor<N = unknown> extends Adaptor<N>, Partial<Updatable> {
  setVisible(visible: boolean): void;
  setBlending(blending: Blending): void;
  setCamera(camera: CameraAdaptor<N>): void;
  setScene(scene: SceneAdaptor<N>): void;
  setPosition(position: readonly [number, number]): void;
  setSize(size: readonly [number, number] | null): void;
  setBackgroundColor(color: string | null): void;
  setBorderWidth(width: number): void;
  setBorderColor(color: string | null): void;
  setPadding(padding: number): void;
  setMargin(margin: number): void;
  /** Apply a whole layout at once instead of the per-value setters. */
  setLayout?(layout: Layout): void;
}

export interface CanvasAdaptor<N = unknown> extends Adaptor<N>, Partial<Updatable> {
  setVisible(visible: boolean): void;
  setWidth(width: number): void;
  setHeight(height: number): void;
  setBackgroundColor(color: string | null): void;
  setTitle(title: string): void;
  close(): void;
  /** Produce the backend's output for the current state. */
  render(): unknown;
  /** Must tolerate a view that is already present. */
  addView(view: ViewAdaptor<N>): void;
  setViews?(views: readonly ViewAdaptor<N>[]): void;
}

export interface AdaptorTypeMap<N = unknown> {
  scene: SceneAdaptor<N>;
  camera: CameraAdaptor<N>;
  image: ImageAdaptor<N>;
  points: PointsAdaptor<N>;
  view: ViewAdaptor<N>;
  canvas: CanvasAdaptor<N>;
}

const NODE_METHODS = [
  'getNative',
  'setVisible',
  'setName',
  'setParent',
  'setOpacity',
  'setOrder',
  'setInteractive',
  'setTransform',
  'addNode',
  'blockUpdates',
  'unblockUpdates',
  'forceUpdate',
] as const satisfies readonly (keyof NodeAdaptor)[];

/** Methods every adaptor of a kind must provide. */
export const REQUIRED_CAPABILITIES: {
  readonly [K in ModelKind]: readonly (keyof AdaptorTypeMap[K])[];
} = {
  scene: NODE_METHODS,
  camera: [...NODE_METHODS, 'setType', 'setZoom', 'setCenter', 'setRange'],
  image: [
    ...NODE_METHODS,
    'setData',
    'setCmap',
    'setClims',
    'setGamma',
    'setInterpolation',
  ],
  points: [
    ...NODE_METHODS,
    'setCoords',
    'setSize',
    'setFaceColor',
    'setEdgeColor',
    'setEdgeWidth',
    'setSymbol',
    'setScaling',
    'setAntialias',
  ],
  view: [
    'getNative',
    'setVisible',
    'setBlending',
    'setCamera',
    'setScene',
    'setPosition',
    'setSize',
    'setBackgroundColor',
    'setBorderWidth',
    'setBorderColor',
    'setPadding',
    'setMargin',
  ],
  canvas: [
    'getNative',
    'setVisible',
    'setWidth',
    'setHeight',
    'setBackgroundColor',
    'setTitle',
    'close',
    'render',
    'addView',
  ],
};

/** Throw `MissingCapabilityError` naming every required method `adaptor` lacks. */
export function assertCapabilities(kind: ModelKind, adaptor: object): void {
  const methods: readonly PropertyKey[] = REQUIRED_CAPABILITIES[kind];
  const missing = methods.filter(
    (method) => typeof Reflect.get(adaptor, method) !== 'function'
  );
  if (missing.length > 0) {
    throw new MissingCapabilityError(kind, missing.map(String));
  }
}
