/**
 * Custom Error Classes
 *
 * Provides structured error handling with error codes, context, and recovery hints.
 */

export type ErrorCode =
  | 'NOT_FOUND'
  | 'CLOUD_NOT_CONFIGURED'
  | 'CLOUD_SYNC_FAILED'
  | 'COMPRESSION_FAILED'
  | 'DECOMPRESSION_FAILED'
  | 'INVALID_REFERENCE'
  | 'VERSION_NOT_FOUND'
  | 'RECONSTRUCTION_FAILED'
  | 'EVENT_LOG_CORRUPTED'
  | 'VALIDATION_ERROR'
  | 'CONFIG_INVALID'
  | 'INTERNAL_ERROR';

export interface ErrorContext {
  code: ErrorCode;
  component: string;
  operation: string;
  details?: Record<string, unknown>;
  recoveryHint?: string;
  retryable?: boolean;
}

export type RecordKind = 'space' | 'anchor' | 'event';

/**
 * Base error class for all storage errors
 */
export class StorageError extends Error {
  public readonly code: ErrorCode;
  public readonly component: string;
  public readonly operation: string;
  public readonly details: Record<string, unknown>;
  public readonly recoveryHint?: string;
  public readonly retryable: boolean;
  public readonly timestamp: Date;

  constructor(message: string, context: ErrorContext, cause?: Error) {
    super(message, { cause });
    this.name = 'StorageError';
    this.code = context.code;
    this.component = context.component;
    this.operation = context.operation;
    this.details = context.details ?? {};
    this.recoveryHint = context.recoveryHint;
    this.retryable = context.retryable ?? false;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StorageError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      component: this.component,
      operation: this.operation,
      details: this.details,
      recoveryHint: this.recoveryHint,
      retryable: this.retryable,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.component}.${this.operation}: ${this.message}`;
  }
}

/**
 * A space, anchor or event that does not exist
 */
export class NotFoundError extends StorageError {
  public readonly kind: RecordKind;
  public readonly id: string;

  constructor(kind: RecordKind, id: string, options: { component: string; operation: string }) {
    super(`${kind.charAt(0).toUpperCase()}${kind.slice(1)} not found: ${id}`, {
      code: 'NOT_FOUND',
      component: options.component,
      operation: options.operation,
      details: { kind, id },
      recoveryHint: `Verify the ${kind} exists`,
      retryable: false,
    });
    this.name = 'NotFoundError';
    this.kind = kind;
    this.id = id;
  }
}

/**
 * Remote operation requested without a remote adapter
 */
export class CloudNotConfiguredError extends StorageError {
  constructor(operation: string) {
    super('Cloud sync is not configured', {
      code: 'CLOUD_NOT_CONFIGURED',
      component: 'AnchorStorage',
      operation,
      recoveryHint: "Use backend 'remote' and pass a remote adapter to enable sync",
      retryable: false,
    });
    this.name = 'CloudNotConfiguredError';
  }
}

/**
 * Remote replication failed. The local write it belongs to has succeeded and
 * the operation is queued for the next sync.
 */
export class CloudSyncFailedError extends StorageError {
  constructor(
    message: string,
    options: { operation: string; details?: Record<string, unknown>; cause?: Error }
  ) {
    super(message, {
      code: 'CLOUD_SYNC_FAILED',
      component: 'AnchorStorage',
      operation: options.operation,
      details: options.details,
      recoveryHint: 'Saved locally; call sync() when connectivity returns',
      retryable: true,
    }, options.cause);
    this.name = 'CloudSyncFailedError';
  }
}

/**
 * Encoder failure
 */
export class CompressionFailedError extends StorageError {
  constructor(message: string, options: { details?: Record<string, unknown>; cause?: Error } = {}) {
    super(message, {
      code: 'COMPRESSION_FAILED',
      component: 'Compression',
      operation: 'compress',
      details: options.details,
      retryable: false,
    }, options.cause);
    this.name = 'CompressionFailedError';
  }
}

/**
 * Invalid or oversized compressed input
 */
export class DecompressionFailedError extends StorageError {
  constructor(message: string, options: { details?: Record<string, unknown>; cause?: Error } = {}) {
    super(message, {
      code: 'DECOMPRESSION_FAILED',
      component: 'Compression',
      operation: 'decompress',
      details: options.details,
      recoveryHint: 'The stored payload may be damaged or larger than maxDecompressedBytes',
      retryable: false,
    }, options.cause);
    this.name = 'DecompressionFailedError';
  }
}

/**
 * A record points at the wrong parent
 */
export class InvalidReferenceError extends StorageError {
  constructor(
    message: string,
    options: { component: string; operation: string; details?: Record<string, unknown> }
  ) {
    super(message, {
      code: 'INVALID_REFERENCE',
      component: options.component,
      operation: options.operation,
      details: options.details,
      recoveryHint: 'An anchor cannot move to another space; create a new anchor instead',
      retryable: false,
    });
    this.name = 'InvalidReferenceError';
  }
}

export class VersionNotFoundError extends StorageError {
  public readonly anchorId: string;
  public readonly version: number;

  constructor(anchorId: string, version: number) {
    super(`Version ${version} not found for anchor ${anchorId}`, {
      code: 'VERSION_NOT_FOUND',
      component: 'AnchorStorage',
      operation: 'rollback',
      details: { anchorId, version },
      recoveryHint: 'Call history() to list the available versions',
      retryable: false,
    });
    this.name = 'VersionNotFoundError';
    this.anchorId = anchorId;
    this.version = version;
  }
}

export class ReconstructionFailedError extends StorageError {
  public readonly anchorId: string;

  constructor(anchorId: string, reason: string) {
    super(`Failed to reconstruct anchor ${anchorId}: ${reason}`, {
      code: 'RECONSTRUCTION_FAILED',
      component: 'Timeline',
      operation: 'reconstructAnchor',
      details: { anchorId, reason },
      retryable: false,
    });
    this.name = 'ReconstructionFailedError';
    this.anchorId = anchorId;
  }
}

export class EventLogCorruptedError extends StorageError {
  public readonly spaceId: string;

  constructor(spaceId: string, reason: string, cause?: Error) {
    super(`Event log corrupted for space ${spaceId}: ${reason}`, {
      code: 'EVENT_LOG_CORRUPTED',
      component: 'LocalStore',
      operation: 'loadEvents',
      details: { spaceId, reason },
      recoveryHint: 'Restore the events file from a backup or a remote replica',
      retryable: false,
    }, cause);
    this.name = 'EventLogCorruptedError';
    this.spaceId = spaceId;
  }
}

/**
 * Validation error for invalid inputs or unreadable records
 */
export class ValidationError extends StorageError {
  public readonly field?: string;
  public readonly constraints?: string[];

  constructor(
    message: string,
    options: {
      component: string;
      operation: string;
      field?: string;
      constraints?: string[];
      recoveryHint?: string;
    }
  ) {
    super(message, {
      code: 'VALIDATION_ERROR',
      component: options.component,
      operation: options.operation,
      details: { field: options.field, constraints: options.constraints },
      recoveryHint: options.recoveryHint ?? `Check the ${options.field ?? 'input'} value`,
      retryable: false,
    });
    this.name = 'ValidationError';
    this.field = options.field;
    this.constraints = options.constraints;
  }
}

/**
 * Configuration error
 */
export class ConfigError extends StorageError {
  public readonly configKey?: string;

  constructor(
    message: string,
    options: {
      component: string;
      configKey?: string;
      recoveryHint?: string;
    }
  ) {
    super(message, {
      code: 'CONFIG_INVALID',
      component: options.component,
      operation: 'configure',
      details: { configKey: options.configKey },
      recoveryHint: options.recoveryHint ?? 'Check configuration values',
      retryable: false,
    });
    this.name = 'ConfigError';
    this.configKey = options.configKey;
  }
}

/**
 * Check if an error is a StorageError
 */
export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

/**
 * Wrap unknown errors in a StorageError
 */
export function wrapError(
  error: unknown,
  context: { component: string; operation: string }
): StorageError {
  if (isStorageError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new StorageError(message, {
    code: 'INTERNAL_ERROR',
    component: context.component,
    operation: context.operation,
    retryable: false,
  }, cause);
}

/**
 * Normalize a thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Assert a condition and throw if false
 */
export function assertCondition(
  condition: boolean,
  message: string,
  context: { component: string; operation: string; code?: ErrorCode }
): asserts condition {
  if (!condition) {
    throw new StorageError(message, {
      code: context.code ?? 'VALIDATION_ERROR',
      component: context.component,
      operation: context.operation,
    });
  }
}
