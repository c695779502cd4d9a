import { z } from 'zod';
import { isEqual } from './equality';
import { SerializationError, ValidationError } from './errors';
import { Camera, CAMERA_DEFAULTS, type CameraType } from './model/camera';
import { Canvas, CANVAS_DEFAULTS } from './model/canvas';
import { Image, IMAGE_DEFAULTS, type ImageArray, type Interpolation } from './model/image';
import { LAYOUT_DEFAULTS, layoutSchema, type LayoutValues } from './model/layout';
import { NODE_DEFAULTS, type Node, type NodeValues } from './model/node';
import {
  Points,
  POINTS_DEFAULTS,
  SYMBOLS,
  type Coord,
  type ScalingMode,
  type SymbolName,
} from './model/points';
import { Scene } from './model/scene';
import { View, type Blending } from './model/view';
import { Transform } from './transform';

/** Schema version of serialized canvas documents. */
export const SERIALIZATION_VERSION = 'scenesync/1';

export interface SerializeOptions {
  /** Leave out values equal to their defaults. Defaults to `false`. */
  excludeDefaults?: boolean;
}

interface SerializedNodeFields {
  name?: string | null;
  visible?: boolean;
  interactive?: boolean;
  opacity?: number;
  order?: number;
  /** 4x4 row-major matrix. */
  transform?: number[][];
  children?: SerializedNode[];
}

export interface SerializedScene extends SerializedNodeFields {
  nodeType: 'scene';
}

export interface SerializedCamera extends SerializedNodeFields {
  nodeType: 'camera';
  type?: CameraType;
  zoom?: number;
  center?: [number, number, number];
  range?: number;
}

export interface SerializedImage extends SerializedNodeFields {
  nodeType: 'image';
  data: ImageArray;
  cmap?: string;
  clims?: [number, number] | null;
  gamma?: number;
  interpolation?: Interpolation;
}

export interface SerializedPoints extends SerializedNodeFields {
  nodeType: 'points';
  coords?: Coord[];
  size?: number;
  faceColor?: string;
  edgeColor?: string;
  edgeWidth?: number;
  symbol?: SymbolName;
  scaling?: ScalingMode;
  antialias?: number;
}

export type SerializedNode =
  | SerializedScene
  | SerializedCamera
  | SerializedImage
  | SerializedPoints;

export interface SerializedView {
  scene: SerializedScene;
  camera: SerializedCamera;
  layout?: Partial<LayoutValues>;
  blending?: Blending;
  visible?: boolean;
}

export interface SerializedCanvas {
  version: typeof SERIALIZATION_VERSION;
  width?: number;
  height?: number;
  title?: string;
  backgroundColor?: string | null;
  visible?: boolean;
  views: SerializedView[];
}

const nodeShape = {
  name: z.string().nullable().optional(),
  visible: z.boolean().optional(),
  interactive: z.boolean().optional(),
  opacity: z.number().optional(),
  order: z.number().optional(),
  transform: z.array(z.array(z.number())).optional(),
  children: z.lazy(() => z.array(serializedNodeSchema)).optional(),
};

const sceneNodeSchema = z.object({
  nodeType: z.literal('scene'),
  ...nodeShape,
});

const cameraNodeSchema = z.object({
  nodeType: z.literal('camera'),
  ...nodeShape,
  type: z.enum(['panzoom', 'perspective']).optional(),
  zoom: z.number().optional(),
  center: z.tuple([z.number(), z.number(), z.number()]).optional(),
  range: z.number().optional(),
});

const imageNodeSchema = z.object({
  nodeType: z.literal('image'),
  ...nodeShape,
  data: z.union([
    z.array(z.array(z.number())),
    z.array(z.array(z.array(z.number()))),
  ]),
  cmap: z.string().optional(),
  clims: z.tuple([z.number(), z.number()]).nullable().optional(),
  gamma: z.number().optional(),
  interpolation: z.enum(['nearest', 'linear', 'bicubic']).optional(),
});

const pointsNodeSchema = z.object({
  nodeType: z.literal('points'),
  ...nodeShape,
  coords: z
    .array(
      z.union([
        z.tuple([z.number(), z.number()]),
        z.tuple([z.number(), z.number(), z.number()]),
      ])
    )
    .optional(),
  size: z.number().optional(),
  faceColor: z.string().optional(),
  edgeColor: z.string().optional(),
  edgeWidth: z.number().optional(),
  symbol: z.enum(SYMBOLS).optional(),
  scaling: z.enum(['fixed', 'scene', 'visual']).optional(),
  antialias: z.number().optional(),
});

export const serializedNodeSchema: z.ZodType<SerializedNode> = z.lazy(() =>
  z.discriminatedUnion('nodeType', [
    sceneNodeSchema,
    cameraNodeSchema,
    imageNodeSchema,
    pointsNodeSchema,
  ])
);

const serializedViewSchema = z.object({
  scene: sceneNodeSchema,
  camera: cameraNodeSchema,
  layout: layoutSchema.partial().optional(),
  blending: z.enum(['default', 'opaque', 'alpha', 'additive']).optional(),
  visible: z.boolean().optional(),
});

const serializedCanvasSchema = z.object({
  version: z.literal(SERIALIZATION_VERSION),
  width: z.number().optional(),
  height: z.number().optional(),
  title: z.string().optional(),
  backgroundColor: z.string().nullable().optional(),
  visible: z.boolean().optional(),
  views: z.array(serializedViewSchema),
});

/** Copy `values`, dropping entries equal to `defaults` when `exclude` is set. */
function pruneDefaults<T extends object>(
  values: T,
  defaults: Partial<T>,
  exclude: boolean
): Partial<T> {
  const out: Partial<T> = {};
  for (const key in values) {
    if (exclude && key in defaults && isEqual(values[key], defaults[key])) {
      continue;
    }
    out[key] = values[key];
  }
  return out;
}

type CommonFields = Required<Omit<SerializedNodeFields, 'children'>>;

function commonDefaults(defaults: Readonly<NodeValues>): CommonFields {
  return { ...defaults, transform: defaults.transform.toJSON() };
}

function commonValues(node: Node): CommonFields {
  return {
    name: node.name,
    visible: node.visible,
    interactive: node.interactive,
    opacity: node.opacity,
    order: node.order,
    transform: node.transform.toJSON(),
  };
}

function childrenOf(
  node: Node,
  exclude: boolean,
  skip: ReadonlySet<Node>
): Pick<SerializedNodeFields, 'children'> {
  const kept = node.children.filter((child) => !skip.has(child));
  if (exclude && kept.length === 0) return {};
  return { children: kept.map((child) => dumpNode(child, exclude, skip)) };
}

function dumpScene(
  scene: Scene,
  exclude: boolean,
  skip: ReadonlySet<Node>
): SerializedScene {
  return {
    nodeType: 'scene',
    ...pruneDefaults(
      commonValues(scene),
      commonDefaults(NODE_DEFAULTS),
      exclude
    ),
    ...childrenOf(scene, exclude, skip),
  };
}

function dumpCamera(
  camera: Camera,
  exclude: boolean,
  skip: ReadonlySet<Node>
): SerializedCamera {
  return {
    nodeType: 'camera',
    ...pruneDefaults(
      {
        ...commonValues(camera),
        type: camera.type,
        zoom: camera.zoom,
        center: camera.center,
        range: camera.range,
      },
      { ...CAMERA_DEFAULTS, ...commonDefaults(CAMERA_DEFAULTS) },
      exclude
    ),
    ...childrenOf(camera, exclude, skip),
  };
}

function dumpNode(
  node: Node,
  exclude: boolean,
  skip: ReadonlySet<Node>
): SerializedNode {
  switch (node.kind) {
    case 'scene':
      return dumpScene(node, exclude, skip);
    case 'camera':
      return dumpCamera(node, exclude, skip);
    case 'image':
      return {
        nodeType: 'image',
        data: node.data,
        ...pruneDefaults(
          {
            ...commonValues(node),
            cmap: node.cmap,
            clims: node.clims,
            gamma: node.gamma,
            interpolation: node.interpolation,
          },
          { ...IMAGE_DEFAULTS, ...commonDefaults(IMAGE_DEFAULTS) },
          exclude
        ),
        ...childrenOf(node, exclude, skip),
      };
    case 'points':
      return {
        nodeType: 'points',
        ...pruneDefaults(
          {
            ...commonValues(node),
            coords: node.coords,
            size: node.size,
            faceColor: node.faceColor,
            edgeColor: node.edgeColor,
            edgeWidth: node.edgeWidth,
            symbol: node.symbol,
            scaling: node.scaling,
            antialias: node.antialias,
          },
          { ...POINTS_DEFAULTS, ...commonDefaults(POINTS_DEFAULTS) },
          exclude
        ),
        ...childrenOf(node, exclude, skip),
      };
  }
}

/**
 * Serialize `node` and its subtree into plain JSON data. `parent` is never
 * written; the tree is rebuilt from `children`.
 */
export function serializeNode(
  node: Node,
  opts: SerializeOptions = {}
): SerializedNode {
  return structuredClone(
    dumpNode(node, opts.excludeDefaults ?? false, new Set())
  );
}

/** Serialize a view. Its camera is written once, under `camera`. */
export function serializeView(
  view: View,
  opts: SerializeOptions = {}
): SerializedView {
  const exclude = opts.excludeDefaults ?? false;
  const skip = new Set<Node>([view.camera]);
  return structuredClone({
    scene: dumpScene(view.scene, exclude, skip),
    camera: dumpCamera(view.camera, exclude, skip),
    ...pruneDefaults(
      {
        layout: pruneDefaults(view.layout.toJSON(), LAYOUT_DEFAULTS, exclude),
        blending: view.blending,
        visible: view.visible,
      },
      { layout: {}, blending: 'default', visible: true },
      exclude
    ),
  });
}

export function serializeCanvas(
  canvas: Canvas,
  opts: SerializeOptions = {}
): SerializedCanvas {
  const exclude = opts.excludeDefaults ?? false;
  return {
    version: SERIALIZATION_VERSION,
    ...pruneDefaults(
      {
        width: canvas.width,
        height: canvas.height,
        title: canvas.title,
        backgroundColor: canvas.backgroundColor,
        visible: canvas.visible,
      },
      CANVAS_DEFAULTS,
      exclude
    ),
    views: canvas.views.map((view) => serializeView(view, opts)),
  };
}

function buildFields(data: SerializedNode) {
  return {
    name: data.name,
    visible: data.visible,
    interactive: data.interactive,
    opacity: data.opacity,
    order: data.order,
    transform: data.transform ? Transform.fromJSON(data.transform) : undefined,
    children: (data.children ?? []).map(buildNode),
  };
}

function buildScene(data: SerializedScene): Scene {
  return new Scene(buildFields(data));
}

function buildCamera(data: SerializedCamera): Camera {
  return new Camera({
    ...buildFields(data),
    type: data.type,
    zoom: data.zoom,
    center: data.center,
    range: data.range,
  });
}

function buildNode(data: SerializedNode): Node {
  switch (data.nodeType) {
    case 'scene':
      return buildScene(data);
    case 'camera':
      return buildCamera(data);
    case 'image':
      return new Image({
        ...buildFields(data),
        data: data.data,
        cmap: data.cmap,
        clims: data.clims,
        gamma: data.gamma,
        interpolation: data.interpolation,
      });
    case 'points':
      return new Points({
        ...buildFields(data),
        coords: data.coords,
        size: data.size,
        faceColor: data.faceColor,
        edgeColor: data.edgeColor,
        edgeWidth: data.edgeWidth,
        symbol: data.symbol,
        scaling: data.scaling,
        antialias: data.antialias,
      });
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`)
    .join('; ');
}

/** Turn model validation failures into `SerializationError`s. */
function rebuild<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof ValidationError) {
      throw new SerializationError(`${operation}: ${err.message}`, {
        cause: err,
      });
    }
    throw err;
  }
}

/** Rebuild a node tree from `serializeNode` output. */
export function deserializeNode(payload: unknown): Node {
  const parsed = serializedNodeSchema.safeParse(payload);
  if (!parsed.success) {
    throw new SerializationError(
      `deserializeNode: invalid payload: ${describeIssues(parsed.error)}`
    );
  }
  const data = parsed.data;
  return rebuild('deserializeNode', () => buildNode(data));
}

function buildView(data: SerializedView): View {
  return new View({
    scene: buildScene(data.scene),
    camera: buildCamera(data.camera),
    layout: data.layout,
    blending: data.blending,
    visible: data.visible,
  });
}

export function deserializeView(payload: unknown): View {
  const parsed = serializedViewSchema.safeParse(payload);
  if (!parsed.success) {
    throw new SerializationError(
      `deserializeView: invalid payload: ${describeIssues(parsed.error)}`
    );
  }
  const data = parsed.data;
  return rebuild('deserializeView', () => buildView(data));
}

export function deserializeCanvas(payload: unknown): Canvas {
  const header = z.object({ version: z.string() }).safeParse(payload);
  if (!header.success) {
    throw new SerializationError('deserializeCanvas: missing "version" field');
  }
  if (header.data.version !== SERIALIZATION_VERSION) {
    throw new SerializationError(
      `deserializeCanvas: unsupported version "${header.data.version}" (expected "${SERIALIZATION_VERSION}")`
    );
  }
  const parsed = serializedCanvasSchema.safeParse(payload);
  if (!parsed.success) {
    throw new SerializationError(
      `deserializeCanvas: invalid payload: ${describeIssues(parsed.error)}`
    );
  }
  const data = parsed.data;
  return rebuild(
    'deserializeCanvas',
    () =>
      new Canvas({
        width: data.width,
        height: data.height,
        title: data.title,
        backgroundColor: data.backgroundColor,
        visible: data.visible,
        views: data.views.map(buildView),
      })
  );
}
