import type { ZodIssue } from 'zod';

/** Base class for every error raised by scenesync. */
export class SceneSyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A field value was rejected before it reached the model. */
export class ValidationError extends SceneSyncError {
  readonly issues: readonly ZodIssue[];

  constructor(message: string, issues: readonly ZodIssue[] = []) {
    super(message);
    this.issues = issues;
  }
}

/** The requested operation would break (or cannot be answered by) the tree. */
export class StructuralError extends SceneSyncError {}

export class NoCommonAncestorError extends StructuralError {}

export class CycleError extends StructuralError {}

export class SingularTransformError extends SceneSyncError {}

export class AdaptorNotFoundError extends SceneSyncError {
  readonly modelId: number;

  constructor(kind: string, modelId: number) {
    super(
      `AdaptorRegistry.getAdaptor: no adaptor for ${kind} #${modelId} and create=false`
    );
    this.modelId = modelId;
  }
}

/**
 * Thrown by a backend setter that cannot express a value. The registry records
 * it as unsupported and keeps synchronizing the other fields.
 */
export class UnsupportedCapabilityError extends SceneSyncError {
  readonly capability: string;

  constructor(capability: string, detail?: string) {
    super(
      detail
        ? `unsupported capability "${capability}": ${detail}`
        : `unsupported capability "${capability}"`
    );
    this.capability = capability;
  }
}

export class MissingCapabilityError extends SceneSyncError {
  readonly kind: string;
  readonly missing: readonly string[];

  constructor(kind: string, missing: readonly string[]) {
    super(
      `${kind} adaptor is missing required capabilities: ${missing.join(', ')}`
    );
    this.kind = kind;
    this.missing = missing;
  }
}

/** A setter raised while applying a model value to its native object. */
export class BackendSyncError extends SceneSyncError {
  readonly kind: string;
  readonly modelId: number;
  readonly field: string;

  constructor(kind: string, modelId: number, field: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`failed to apply ${kind} #${modelId}.${field}: ${reason}`, {
      cause,
    });
    this.kind = kind;
    this.modelId = modelId;
    this.field = field;
  }
}

export class SerializationError extends SceneSyncError {}
