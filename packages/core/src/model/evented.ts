import { createStore, type StoreApi } from 'zustand/vanilla';
import type { z } from 'zod';
import { ValidationError } from '../errors';
import { isEqual } from '../equality';

export type ModelId = number;

export type ModelKind =
  | 'scene'
  | 'camera'
  | 'image'
  | 'points'
  | 'view'
  | 'canvas';

/** One zod schema per field; parsing yields the stored value. */
export type FieldSchemas<F> = {
  readonly [K in keyof F]: z.ZodType<F[K], z.ZodTypeDef, unknown>;
};

export interface FieldEvent<F, K extends keyof F = keyof F> {
  readonly field: K;
  readonly value: F[K];
}

export type FieldListener<F> = (event: FieldEvent<F>) => void;

export type BatchPhase = 'begin' | 'end';
export type BatchListener = (phase: BatchPhase) => void;

let nextModelId = 1;

export function validateField<V>(
  owner: string,
  field: PropertyKey,
  schema: z.ZodType<V, z.ZodTypeDef, unknown>,
  value: unknown
): V {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues.map((i) => i.message).join('; ');
    throw new ValidationError(
      `${owner}.${String(field)}: ${detail}`,
      result.error.issues
    );
  }
  return result.data;
}

/** Merge validated overrides from `init` onto `defaults`. */
export function resolveFields<F>(
  owner: string,
  schemas: FieldSchemas<F>,
  defaults: F,
  init: Partial<F>
): F {
  const resolved = { ...defaults };
  for (const key in init) {
    const value = init[key];
    if (value === undefined) continue;
    resolved[key] = validateField(owner, key, schemas[key], value);
  }
  return resolved;
}

/**
 * Observable base for every model object.
 *
 * Field values live in a zustand vanilla store; each accepted assignment is
 * published to subscribers as a `{ field, value }` event.
 */
export abstract class EventedModel<F extends object> {
  abstract readonly kind: ModelKind;
  readonly modelId: ModelId = nextModelId++;

  private readonly _schemas: FieldSchemas<F>;
  private readonly _store: StoreApi<F>;
  private _listeners: FieldListener<F>[] = [];
  private _batchListeners: BatchListener[] = [];
  private _dirty: (keyof F)[] = [];
  private _batchDepth = 0;

  protected constructor(schemas: FieldSchemas<F>, initial: F) {
    this._schemas = schemas;
    this._store = createStore<F>()(() => initial);
    this._store.subscribe((state) => this._publish(state));
  }

  /** Field names in declaration order. */
  get fieldNames(): (keyof F)[] {
    const names: (keyof F)[] = [];
    for (const key in this._schemas) names.push(key);
    return names;
  }

  subscribe(listener: FieldListener<F>): () => void {
    this._listeners = [...this._listeners, listener];
    return () => {
      this._listeners = this._listeners.filter((l) => l !== listener);
    };
  }

  onBatch(listener: BatchListener): () => void {
    this._batchListeners = [...this._batchListeners, listener];
    return () => {
      this._batchListeners = this._batchListeners.filter((l) => l !== listener);
    };
  }

  get listenerCount(): number {
    return this._listeners.length;
  }

  /**
   * Run `fn` as one batch. Field events are delivered as usual; batch
   * listeners see `'begin'` before the outermost batch and `'end'` after it.
   */
  batch<T>(fn: () => T): T {
    if (this._batchDepth++ === 0) this._emitBatch('begin');
    try {
      return fn();
    } finally {
      if (--this._batchDepth === 0) this._emitBatch('end');
    }
  }

  get inBatch(): boolean {
    return this._batchDepth > 0;
  }

  snapshot(): F {
    return { ...this._store.getState() };
  }

  protected _get<K extends keyof F>(field: K): F[K] {
    return this._store.getState()[field];
  }

  /** Validate and assign one field; equal values are dropped silently. */
  protected _assign<K extends keyof F>(field: K, value: unknown): void {
    const next = validateField(
      this._owner,
      field,
      this._schemas[field],
      value
    );
    this._write(field, next);
  }

  private _write<K extends keyof F>(field: K, next: F[K]): void {
    if (isEqual(this._store.getState()[field], next)) return;
    this._dirty.push(field);
    this._store.setState((state) => ({ ...state, [field]: next }));
  }

  private get _owner(): string {
    return this.constructor.name;
  }

  private _publish(state: F): void {
    const fields = this._dirty;
    this._dirty = [];
    for (const field of fields) {
      const event: FieldEvent<F> = { field, value: state[field] };
      // iterate a snapshot: listeners may unsubscribe while being notified
      for (const listener of this._listeners) listener(event);
    }
  }

  private _emitBatch(phase: BatchPhase): void {
    for (const listener of this._batchListeners) listener(phase);
  }
}
