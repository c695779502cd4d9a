import {
  AdaptorNotFoundError,
  BackendSyncError,
  MissingCapabilityError,
  UnsupportedCapabilityError,
} from '../errors';
import { createConsoleLogger, type Logger } from '../logger';
import type { Camera } from '../model/camera';
import type { Canvas } from '../model/canvas';
import type {
  BatchPhase,
  EventedModel,
  ModelId,
  ModelKind,
} from '../model/evented';
import type { Image } from '../model/image';
import type { Node } from '../model/node';
import type { Points } from '../model/points';
import type { Scene } from '../model/scene';
import type { View } from '../model/view';
import type {
  AdaptorSource,
  Backend,
  SyncContext,
  SyncModel,
} from './backend';
import {
  assertCapabilities,
  type Adaptor,
  type CameraAdaptor,
  type CanvasAdaptor,
  type ImageAdaptor,
  type NodeAdaptor,
  type PointsAdaptor,
  type SceneAdaptor,
  type Updatable,
  type ViewAdaptor,
} from './contracts';
import {
  applySetter,
  createSetterTables,
  type SetterOutcome,
  type SetterTable,
  type SetterTables,
} from './setters';

export type SyncStatus = 'applied' | 'unsupported' | 'failed';

export type SyncResult =
  | { readonly field: string; readonly status: 'applied' }
  | {
      readonly field: string;
      readonly status: 'unsupported';
      readonly reason: string;
    }
  | {
      readonly field: string;
      readonly status: 'failed';
      readonly error: BackendSyncError;
    };

/** Outcome of the initial synchronization of one adaptor. */
export interface SyncReport {
  readonly kind: ModelKind;
  readonly modelId: ModelId;
  readonly results: readonly SyncResult[];
}

export function summarizeReport(
  report: SyncReport
): Record<SyncStatus, number> {
  const counts: Record<SyncStatus, number> = {
    applied: 0,
    unsupported: 0,
    failed: 0,
  };
  for (const result of report.results) counts[result.status]++;
  return counts;
}

export interface AdaptorRegistryOptions {
  /** Defaults to a console logger. */
  logger?: Logger;
  /** Receives the report of every adaptor's initial synchronization. */
  onReport?: (report: SyncReport) => void;
  /** Reject adaptors lacking required methods. Defaults to `true`. */
  validateCapabilities?: boolean;
}

type SyncAdaptor<N> = Adaptor<N> & Partial<Updatable>;

interface Entry<N> {
  readonly model: SyncModel;
  readonly adaptor: Adaptor<N>;
  readonly unsubscribe: (() => void)[];
  readonly onRelease: (() => void)[];
}

/**
 * Owns the model-to-adaptor mapping for one backend and keeps every adaptor
 * in step with its model.
 *
 * @example
 * ```ts
 * const registry = new AdaptorRegistry(createSvgBackend());
 * const view = new View();
 * registry.show(view);
 * const markup = registry.render(view.canvas);
 * ```
 */
export class AdaptorRegistry<N = unknown> implements AdaptorSource<N> {
  private readonly _backend: Backend<N>;
  private readonly _entries = new Map<ModelId, Entry<N>>();
  private readonly _setters: SetterTables<N> = createSetterTables<N>();
  private readonly _logger: Logger;
  private readonly _onReport: ((report: SyncReport) => void) | null;
  private readonly _validate: boolean;
  private readonly _context: SyncContext<N>;

  constructor(backend: Backend<N>, opts: AdaptorRegistryOptions = {}) {
    this._backend = backend;
    this._logger = opts.logger ?? createConsoleLogger();
    this._onReport = opts.onReport ?? null;
    this._validate = opts.validateCapabilities ?? true;
    this._context = { registry: this, logger: this._logger };
  }

  get backend(): Backend<N> {
    return this._backend;
  }

  get logger(): Logger {
    return this._logger;
  }

  /** Number of live adaptors. */
  get size(): number {
    return this._entries.size;
  }

  /**
   * The adaptor for `model`, creating, synchronizing and subscribing it (and
   * its dependents) on first use unless `create` is `false`.
   */
  getAdaptor(model: Scene, create?: boolean): SceneAdaptor<N>;
  getAdaptor(model: Camera, create?: boolean): CameraAdaptor<N>;
  getAdaptor(model: Image, create?: boolean): ImageAdaptor<N>;
  getAdaptor(model: Points, create?: boolean): PointsAdaptor<N>;
  getAdaptor(model: Node, create?: boolean): NodeAdaptor<N>;
  getAdaptor(model: View, create?: boolean): ViewAdaptor<N>;
  getAdaptor(model: Canvas, create?: boolean): CanvasAdaptor<N>;
  getAdaptor(model: SyncModel, create?: boolean): Adaptor<N>;
  getAdaptor(model: SyncModel, create = true): Adaptor<N> {
    const entry = this._entries.get(model.modelId);
    if (entry) return entry.adaptor;
    if (!create) throw new AdaptorNotFoundError(model.kind, model.modelId);
    return this._create(model);
  }

  has(model: SyncModel): boolean {
    return this._entries.has(model.modelId);
  }

  /** Every live adaptor, in creation order. */
  all(): Adaptor<N>[] {
    return [...this._entries.values()].map((e) => e.adaptor);
  }

  /** Every model with a live adaptor, in creation order. */
  models(): SyncModel[] {
    return [...this._entries.values()].map((e) => e.model);
  }

  /**
   * Drop the adaptor of `model` and of everything it owns: unsubscribe, close
   * canvases and dispose. Returns `false` when `model` had no adaptor.
   */
  release(model: SyncModel): boolean {
    const entry = this._entries.get(model.modelId);
    if (!entry) return false;
    this._entries.delete(model.modelId);
    for (const off of entry.unsubscribe) off();
    for (const dependent of this._owned(model)) this.release(dependent);
    for (const hook of entry.onRelease) {
      this._guard(model, 'close', hook);
    }
    const adaptor = entry.adaptor;
    if (adaptor.dispose) {
      this._guard(model, 'dispose', () => adaptor.dispose?.());
    }
    this._logger.debug(
      `AdaptorRegistry.release: released ${model.kind} #${model.modelId}`
    );
    return true;
  }

  /** Unlink `node` from its parent, then release its subtree. */
  detach(node: Node): void {
    node.parent = null;
    this.release(node);
  }

  clear(): void {
    for (const entry of [...this._entries.values()]) this.release(entry.model);
  }

  render(canvas: Canvas): unknown {
    return this.getAdaptor(canvas).render();
  }

  /** Make the canvas of `target` visible and materialize its adaptor tree. */
  show(target: View | Canvas): Canvas {
    const canvas = target.kind === 'view' ? target.canvas : target;
    canvas.show();
    this.getAdaptor(canvas);
    return canvas;
  }

  private _create(model: SyncModel): Adaptor<N> {
    const backend = this._backend;
    const ctx = this._context;
    switch (model.kind) {
      case 'scene':
        if (!backend.createScene) throw this._missingFactory(model);
        return this._attach(
          model,
          backend.createScene(model, ctx),
          this._setters.scene
        );
      case 'camera':
        if (!backend.createCamera) throw this._missingFactory(model);
        return this._attach(
          model,
          backend.createCamera(model, ctx),
          this._setters.camera
        );
      case 'image':
        if (!backend.createImage) throw this._missingFactory(model);
        return this._attach(
          model,
          backend.createImage(model, ctx),
          this._setters.image
        );
      case 'points':
        if (!backend.createPoints) throw this._missingFactory(model);
        return this._attach(
          model,
          backend.createPoints(model, ctx),
          this._setters.points
        );
      case 'view':
        if (!backend.createView) throw this._missingFactory(model);
        return this._attach(
          model,
          backend.createView(model, ctx),
          this._setters.view
        );
      case 'canvas': {
        if (!backend.createCanvas) throw this._missingFactory(model);
        const adaptor = backend.createCanvas(model, ctx);
        return this._attach(model, adaptor, this._setters.canvas, () =>
          adaptor.close()
        );
      }
    }
  }

  private _missingFactory(model: SyncModel): MissingCapabilityError {
    const factory = `create${model.kind[0].toUpperCase()}${model.kind.slice(1)}`;
    return new MissingCapabilityError(`backend "${this._backend.name}"`, [
      factory,
    ]);
  }

  /**
   * Store, synchronize and subscribe a freshly built adaptor. The entry is
   * stored before synchronization so that lookups made by structural setters
   * (a child asking for its parent) find it.
   */
  private _attach<F extends object, A extends SyncAdaptor<N>>(
    model: EventedModel<F> & SyncModel,
    adaptor: A,
    table: SetterTable<F, A, N>,
    onRelease?: () => void
  ): A {
    if (this._validate) assertCapabilities(model.kind, adaptor);
    const entry: Entry<N> = {
      model,
      adaptor,
      unsubscribe: [],
      onRelease: onRelease ? [onRelease] : [],
    };
    this._entries.set(model.modelId, entry);

    this._publishReport({
      kind: model.kind,
      modelId: model.modelId,
      results: this._syncAll<F, A>(model, adaptor, table),
    });

    entry.unsubscribe.push(
      model.subscribe((event) => {
        const results = this._apply(
          model,
          adaptor,
          table,
          event.field,
          event.value
        );
        for (const result of results) {
          if (result.status !== 'unsupported') continue;
          this._logger.warn(
            `AdaptorRegistry: dropped ${model.kind} #${model.modelId}.${result.field}: ${result.reason}`
          );
        }
      }),
      model.onBatch((phase) => this._onBatch(model, adaptor, phase))
    );

    this._ensureDependents(model);
    return adaptor;
  }

  private _syncAll<F extends object, A extends SyncAdaptor<N>>(
    model: EventedModel<F> & SyncModel,
    adaptor: A,
    table: SetterTable<F, A, N>
  ): SyncResult[] {
    const state = model.snapshot();
    const results: SyncResult[] = [];
    this._guard(model, 'blockUpdates', () => adaptor.blockUpdates?.());
    for (const field of model.fieldNames) {
      results.push(...this._apply(model, adaptor, table, field, state[field]));
    }
    this._guard(model, 'unblockUpdates', () => adaptor.unblockUpdates?.());
    this._guard(model, 'forceUpdate', () => adaptor.forceUpdate?.());
    return results;
  }

  private _apply<F extends object, A, K extends keyof F>(
    model: SyncModel,
    adaptor: A,
    table: SetterTable<F, A, N>,
    field: K,
    value: F[K]
  ): SyncResult[] {
    const name = String(field);
    let outcome: SetterOutcome;
    try {
      outcome = applySetter(table, adaptor, field, value, this._context);
    } catch (err) {
      return [this._failure(model, name, err)];
    }
    if (outcome === 'unsupported') {
      return [
        {
          field: name,
          status: 'unsupported',
          reason: `${model.kind}.${name} has no setter`,
        },
      ];
    }
    if (outcome === 'applied') return [{ field: name, status: 'applied' }];
    return outcome.map((part): SyncResult => {
      const partName = `${name}.${part.name}`;
      try {
        part.apply();
        return { field: partName, status: 'applied' };
      } catch (err) {
        return this._failure(model, partName, err);
      }
    });
  }

  private _failure(model: SyncModel, field: string, err: unknown): SyncResult {
    if (err instanceof UnsupportedCapabilityError) {
      return { field, status: 'unsupported', reason: err.message };
    }
    const error = new BackendSyncError(model.kind, model.modelId, field, err);
    this._logger.error(`AdaptorRegistry: ${error.message}`, err);
    return { field, status: 'failed', error };
  }

  private _onBatch(
    model: SyncModel,
    adaptor: SyncAdaptor<N>,
    phase: BatchPhase
  ): void {
    if (phase === 'begin') {
      this._guard(model, 'blockUpdates', () => adaptor.blockUpdates?.());
      return;
    }
    this._guard(model, 'unblockUpdates', () => adaptor.unblockUpdates?.());
    this._guard(model, 'forceUpdate', () => adaptor.forceUpdate?.());
  }

  /** Run a non-field adaptor call, logging instead of throwing. */
  private _guard(model: SyncModel, step: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      const error = new BackendSyncError(model.kind, model.modelId, step, err);
      this._logger.error(`AdaptorRegistry: ${error.message}`, err);
    }
  }

  private _publishReport(report: SyncReport): void {
    const counts = summarizeReport(report);
    const label = `${report.kind} #${report.modelId}`;
    if (counts.unsupported > 0 || counts.failed > 0) {
      const skipped = report.results
        .filter((r) => r.status !== 'applied')
        .map((r) => `${r.field} (${r.status})`);
      this._logger.warn(
        `AdaptorRegistry.getAdaptor: ${label} synced with ${counts.applied} applied, ${counts.unsupported} unsupported, ${counts.failed} failed: ${skipped.join(', ')}`
      );
    } else {
      this._logger.debug(
        `AdaptorRegistry.getAdaptor: created ${label} (${counts.applied} fields)`
      );
    }
    this._onReport?.(report);
  }

  private _ensureDependents(model: SyncModel): void {
    for (const dependent of dependentsOf(model)) {
      try {
        this.getAdaptor(dependent);
      } catch (err) {
        this._logger.error(
          `AdaptorRegistry.getAdaptor: could not create ${dependent.kind} #${dependent.modelId} for ${model.kind} #${model.modelId}`,
          err
        );
      }
    }
  }

  /** Dependents released together with `model`. */
  private _owned(model: SyncModel): readonly SyncModel[] {
    if (model.kind !== 'view') return dependentsOf(model);
    // a scene shown by another live view stays
    const shared = new Set<SyncModel>();
    for (const entry of this._entries.values()) {
      if (entry.model.kind === 'view') {
        shared.add(entry.model.scene);
        shared.add(entry.model.camera);
      }
    }
    return dependentsOf(model).filter((d) => !shared.has(d));
  }
}

/** Models that must have adaptors whenever `model` has one. */
export function dependentsOf(model: SyncModel): readonly SyncModel[] {
  switch (model.kind) {
    case 'canvas':
      return model.views;
    case 'view':
      return [model.scene, model.camera];
    default:
      return model.children;
  }
}
