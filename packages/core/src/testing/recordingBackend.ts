import type { Backend } from '../adaptors/backend';
import type {
  CameraAdaptor,
  CanvasAdaptor,
  ImageAdaptor,
  NodeAdaptor,
  PointsAdaptor,
  ViewAdaptor,
} from '../adaptors/contracts';
import { UnsupportedCapabilityError } from '../errors';
import type { ModelKind } from '../model/evented';
import type { Node } from '../model/node';

export interface RecordedCall {
  target: string;
  method: string;
  args: unknown[];
}

/** Native stand-in: a labelled tree node holding the last value per setter. */
export interface RecordingNative {
  label: string;
  parent: RecordingNative | null;
  children: RecordingNative[];
  values: Record<string, unknown>;
  redraws: number;
}

export interface RecordingBackendOptions {
  /** Methods that throw `UnsupportedCapabilityError`. */
  unsupported?: readonly string[];
  /** Methods that throw a plain `Error`. */
  failing?: readonly string[];
  /** Kinds the backend has no factory for. */
  missingFactories?: readonly ModelKind[];
}

export interface RecordingBackend extends Backend<RecordingNative> {
  readonly calls: RecordedCall[];
  /** Calls made against the adaptor labelled `target`. */
  callsFor(target: string): RecordedCall[];
}

function createNative(label: string): RecordingNative {
  return { label, parent: null, children: [], values: {}, redraws: 0 };
}

function detachNative(native: RecordingNative): void {
  const parent = native.parent;
  if (!parent) return;
  parent.children = parent.children.filter((c) => c !== native);
  native.parent = null;
}

function appendNative(parent: RecordingNative, child: RecordingNative): void {
  if (child.parent === parent) return;
  detachNative(child);
  parent.children.push(child);
  child.parent = parent;
}

class Recorder {
  protected readonly native: RecordingNative;
  private _blocked = 0;

  constructor(
    label: string,
    private readonly _log: RecordedCall[],
    private readonly _opts: RecordingBackendOptions
  ) {
    this.native = createNative(label);
  }

  getNative(): RecordingNative {
    return this.native;
  }

  protected record(method: string, ...args: unknown[]): void {
    this._log.push({ target: this.native.label, method, args });
    if (this._opts.unsupported?.includes(method)) {
      throw new UnsupportedCapabilityError(method, 'not in this backend');
    }
    if (this._opts.failing?.includes(method)) {
      throw new Error(`${method} exploded`);
    }
  }

  protected store(method: string, key: string, value: unknown): void {
    this.record(method, value);
    this.native.values[key] = value;
  }

  blockUpdates(): void {
    this.record('blockUpdates');
    this._blocked++;
  }

  unblockUpdates(): void {
    this.record('unblockUpdates');
    this._blocked = Math.max(0, this._blocked - 1);
  }

  forceUpdate(): void {
    this.record('forceUpdate');
    if (this._blocked === 0) this.native.redraws++;
  }

  dispose(): void {
    this.record('dispose');
    detachNative(this.native);
  }
}

class RecordingNodeAdaptor
  extends Recorder
  implements
    CameraAdaptor<RecordingNative>,
    ImageAdaptor<RecordingNative>,
    PointsAdaptor<RecordingNative>
{
  setVisible(v: boolean): void {
    this.store('setVisible', 'visible', v);
  }
  setName(v: string | null): void {
    this.store('setName', 'name', v);
  }
  setOpacity(v: number): void {
    this.store('setOpacity', 'opacity', v);
  }
  setOrder(v: number): void {
    this.store('setOrder', 'order', v);
  }
  setInteractive(v: boolean): void {
    this.store('setInteractive', 'interactive', v);
  }
  setTransform(v: unknown): void {
    this.store('setTransform', 'transform', v);
  }
  setParent(parent: NodeAdaptor<RecordingNative> | null): void {
    this.record('setParent', parent ? parent.getNative().label : null);
    if (parent) appendNative(parent.getNative(), this.native);
    else detachNative(this.native);
  }
  setChildren(children: readonly NodeAdaptor<RecordingNative>[]): void {
    const natives = children.map((c) => c.getNative());
    this.record('setChildren', natives.map((n) => n.label));
    for (const old of [...this.native.children]) {
      if (!natives.includes(old)) detachNative(old);
    }
    for (const child of natives) appendNative(this.native, child);
  }
  addNode(child: NodeAdaptor<RecordingNative>): void {
    this.record('addNode', child.getNative().label);
    appendNative(this.native, child.getNative());
  }

  setType(v: string): void {
    this.store('setType', 'type', v);
  }
  setZoom(v: number): void {
    this.store('setZoom', 'zoom', v);
  }
  setCenter(v: readonly number[]): void {
    this.store('setCenter', 'center', v);
  }
  setRange(v: number): void {
    this.store('setRange', 'range', v);
  }

  setData(v: unknown): void {
    this.store('setData', 'data', v);
  }
  setCmap(v: string): void {
    this.store('setCmap', 'cmap', v);
  }
  setClims(v: readonly number[] | null): void {
    this.store('setClims', 'clims', v);
  }
  setGamma(v: number): void {
    this.store('setGamma', 'gamma', v);
  }
  setInterpolation(v: string): void {
    this.store('setInterpolation', 'interpolation', v);
  }

  setCoords(v: unknown): void {
    this.store('setCoords', 'coords', v);
  }
  setSize(v: number): void {
    this.store('setSize', 'size', v);
  }
  setFaceColor(v: string): void {
    this.store('setFaceColor', 'faceColor', v);
  }
  setEdgeColor(v: string): void {
    this.store('setEdgeColor', 'edgeColor', v);
  }
  setEdgeWidth(v: number): void {
    this.store('setEdgeWidth', 'edgeWidth', v);
  }
  setSymbol(v: string): void {
    this.store('setSymbol', 'symbol', v);
  }
  setScaling(v: string): void {
    this.store('setScaling', 'scaling', v);
  }
  setAntialias(v: number): void {
    this.store('setAntialias', 'antialias', v);
  }
}

class RecordingViewAdaptor
  extends Recorder
  implements ViewAdaptor<RecordingNative>
{
  setVisible(v: boolean): void {
    this.store('setVisible', 'visible', v);
  }
  setBlending(v: string): void {
    this.store('setBlending', 'blending', v);
  }
  setCamera(camera: CameraAdaptor<RecordingNative>): void {
    this.store('setCamera', 'camera', camera.getNative().label);
  }
  setScene(scene: NodeAdaptor<RecordingNative>): void {
    this.store('setScene', 'scene', scene.getNative().label);
  }
  setPosition(v: readonly number[]): void {
    this.store('setPosition', 'position', v);
  }
  setSize(v: readonly number[] | null): void {
    this.store('setSize', 'size', v);
  }
  setBackgroundColor(v: string | null): void {
    this.store('setBackgroundColor', 'backgroundColor', v);
  }
  setBorderWidth(v: number): void {
    this.store('setBorderWidth', 'borderWidth', v);
  }
  setBorderColor(v: string | null): void {
    this.store('setBorderColor', 'borderColor', v);
  }
  setPadding(v: number): void {
    this.store('setPadding', 'padding', v);
  }
  setMargin(v: number): void {
    this.store('setMargin', 'margin', v);
  }
}

class RecordingCanvasAdaptor
  extends Recorder
  implements CanvasAdaptor<RecordingNative>
{
  setVisible(v: boolean): void {
    this.store('setVisible', 'visible', v);
  }
  setWidth(v: number): void {
    this.store('setWidth', 'width', v);
  }
  setHeight(v: number): void {
    this.store('setHeight', 'height', v);
  }
  setBackgroundColor(v: string | null): void {
    this.store('setBackgroundColor', 'backgroundColor', v);
  }
  setTitle(v: string): void {
    this.store('setTitle', 'title', v);
  }
  close(): void {
    this.record('close');
  }
  render(): string {
    this.record('render');
    return `frame:${this.native.label}`;
  }
  addView(view: ViewAdaptor<RecordingNative>): void {
    this.record('addView', view.getNative().label);
    appendNative(this.native, view.getNative());
  }
}

/**
 * In-process backend for tests. Every adaptor call is appended to `calls`;
 * adaptors are labelled `<kind>#<modelId>`.
 */
export function createRecordingBackend(
  opts: RecordingBackendOptions = {}
): RecordingBackend {
  const calls: RecordedCall[] = [];
  const label = (m: { kind: ModelKind; modelId: number }) =>
    `${m.kind}#${m.modelId}`;
  const node = (m: Node) => new RecordingNodeAdaptor(label(m), calls, opts);
  const backend: RecordingBackend = {
    name: 'recording',
    calls,
    callsFor: (target) => calls.filter((c) => c.target === target),
    createScene: node,
    createCamera: node,
    createImage: node,
    createPoints: node,
    createView: (m) => new RecordingViewAdaptor(label(m), calls, opts),
    createCanvas: (m) => new RecordingCanvasAdaptor(label(m), calls, opts),
  };
  for (const kind of opts.missingFactories ?? []) {
    switch (kind) {
      case 'scene':
        delete backend.createScene;
        break;
      case 'camera':
        delete backend.createCamera;
        break;
      case 'image':
        delete backend.createImage;
        break;
      case 'points':
        delete backend.createPoints;
        break;
      case 'view':
        delete backend.createView;
        break;
      case 'canvas':
        delete backend.createCanvas;
        break;
    }
  }
  return backend;
}
