import type { CameraState } from '../model/camera';
import type { CanvasState } from '../model/canvas';
import type { ImageState } from '../model/image';
import type { NodeState } from '../model/node';
import type { PointsState } from '../model/points';
import type { ViewState } from '../model/view';
import type { SyncContext } from './backend';
import type {
  CameraAdaptor,
  CanvasAdaptor,
  ImageAdaptor,
  NodeAdaptor,
  PointsAdaptor,
  ViewAdaptor,
} from './contracts';

/**
 * One of several adaptor calls that together apply a single field. Each part
 * succeeds or fails on its own, reported as `<field>.<name>`.
 */
export interface SetterPart {
  readonly name: string;
  readonly apply: () => void;
}

/** Applies the value, or hands back parts to be applied one by one. */
export type Setter<V, A, N = unknown> = (
  adaptor: A,
  value: V,
  ctx: SyncContext<N>
) => void | readonly SetterPart[];

/** Field name to setter; `null` marks a field the backend never receives. */
export type SetterTable<F, A, N = unknown> = {
  readonly [K in keyof F]: Setter<F[K], A, N> | null;
};

export type SetterOutcome = 'applied' | 'unsupported' | readonly SetterPart[];

function isParts(value: void | readonly SetterPart[]): value is readonly SetterPart[] {
  return Array.isArray(value);
}

/** Route one field value through `table`. */
export function applySetter<F, A, N, K extends keyof F>(
  table: SetterTable<F, A, N>,
  adaptor: A,
  field: K,
  value: F[K],
  ctx: SyncContext<N>
): SetterOutcome {
  const setter = table[field];
  if (setter === null) return 'unsupported';
  const parts = setter(adaptor, value, ctx);
  return isParts(parts) ? parts : 'applied';
}

function nodeSetters<N, A extends NodeAdaptor<N>>(): SetterTable<
  NodeState,
  A,
  N
> {
  return {
    name: (a, v) => a.setName(v),
    visible: (a, v) => a.setVisible(v),
    interactive: (a, v) => a.setInteractive(v),
    opacity: (a, v) => a.setOpacity(v),
    order: (a, v) => a.setOrder(v),
    transform: (a, v) => a.setTransform(v),
    parent: (a, parent, ctx) =>
      a.setParent(parent ? ctx.registry.getAdaptor(parent) : null),
    children: (a, children, ctx) => {
      const adaptors = children.map((child) => ctx.registry.getAdaptor(child));
      if (a.setChildren) {
        a.setChildren(adaptors);
        return;
      }
      for (const child of adaptors) a.addNode(child);
    },
  };
}

export interface SetterTables<N = unknown> {
  scene: SetterTable<NodeState, NodeAdaptor<N>, N>;
  camera: SetterTable<CameraState, CameraAdaptor<N>, N>;
  image: SetterTable<ImageState, ImageAdaptor<N>, N>;
  points: SetterTable<PointsState, PointsAdaptor<N>, N>;
  view: SetterTable<ViewState, ViewAdaptor<N>, N>;
  canvas: SetterTable<CanvasState, CanvasAdaptor<N>, N>;
}

/** Build the per-kind setter tables for one registry. */
export function createSetterTables<N>(): SetterTables<N> {
  return {
    scene: nodeSetters<N, NodeAdaptor<N>>(),
    camera: {
      ...nodeSetters<N, CameraAdaptor<N>>(),
      type: (a, v) => a.setType(v),
      zoom: (a, v) => a.setZoom(v),
      center: (a, v) => a.setCenter(v),
      range: (a, v) => a.setRange(v),
    },
    image: {
      ...nodeSetters<N, ImageAdaptor<N>>(),
      data: (a, v) => a.setData(v),
      cmap: (a, v) => a.setCmap(v),
      clims: (a, v) => a.setClims(v),
      gamma: (a, v) => a.setGamma(v),
      interpolation: (a, v) => a.setInterpolation(v),
    },
    points: {
      ...nodeSetters<N, PointsAdaptor<N>>(),
      coords: (a, v) => a.setCoords(v),
      size: (a, v) => a.setSize(v),
      faceColor: (a, v) => a.setFaceColor(v),
      edgeColor: (a, v) => a.setEdgeColor(v),
      edgeWidth: (a, v) => a.setEdgeWidth(v),
      symbol: (a, v) => a.setSymbol(v),
      scaling: (a, v) => a.setScaling(v),
      antialias: (a, v) => a.setAntialias(v),
    },
    view: {
      scene: (a, scene, ctx) => a.setScene(ctx.registry.getAdaptor(scene)),
      camera: (a, camera, ctx) => a.setCamera(ctx.registry.getAdaptor(camera)),
      layout: (a, layout) => {
        if (a.setLayout) {
          a.setLayout(layout);
          return;
        }
        return [
          { name: 'position', apply: () => a.setPosition(layout.position) },
          { name: 'size', apply: () => a.setSize(layout.size) },
          {
            name: 'backgroundColor',
            apply: () => a.setBackgroundColor(layout.backgroundColor),
          },
          { name: 'borderWidth', apply: () => a.setBorderWidth(layout.borderWidth) },
          { name: 'borderColor', apply: () => a.setBorderColor(layout.borderColor) },
          { name: 'padding', apply: () => a.setPadding(layout.padding) },
          { name: 'margin', apply: () => a.setMargin(layout.margin) },
        ];
      },
      blending: (a, v) => a.setBlending(v),
      visible: (a, v) => a.setVisible(v),
    },
    canvas: {
      width: (a, v) => a.setWidth(v),
      height: (a, v) => a.setHeight(v),
      title: (a, v) => a.setTitle(v),
      backgroundColor: (a, v) => a.setBackgroundColor(v),
      visible: (a, v) => a.setVisible(v),
      views: (a, views, ctx) => {
        const adaptors = views.map((view) => ctx.registry.getAdaptor(view));
        if (a.setViews) {
          a.setViews(adaptors);
          return;
        }
        for (const view of adaptors) a.addView(view);
      },
    },
  };
}
