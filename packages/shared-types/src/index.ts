/**
 * Shared data model for the anchorlog packages
 *
 * This module provides:
 * - Type definitions for spaces, anchors and their event log
 * - The tagged metadata value union
 * - Pending sync operation records
 * - Runtime type guards for values read from disk or from a remote replica
 */

// ============================================================================
// Transform Types
// ============================================================================

/** Number of elements in a column-major 4x4 transform */
export const TRANSFORM_LENGTH = 16;

/**
 * Column-major 4x4 matrix flattened to 16 numbers.
 * Indices 12..14 hold the translation.
 */
export type Transform = readonly number[];

// ============================================================================
// Metadata Types
// ============================================================================

export const METADATA_KINDS = ['string', 'int', 'double', 'bool', 'array', 'map', 'null'] as const;
export type MetadataKind = (typeof METADATA_KINDS)[number];

export type MetadataValue =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'int'; readonly value: number }
  | { readonly kind: 'double'; readonly value: number }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'array'; readonly value: readonly MetadataValue[] }
  | { readonly kind: 'map'; readonly value: Readonly<Record<string, MetadataValue>> }
  | { readonly kind: 'null' };

export type Metadata = Readonly<Record<string, MetadataValue>>;

// ============================================================================
// Space Types
// ============================================================================

export interface Space {
  readonly id: string;
  readonly name?: string;
  /** Opaque spatial map payload, never interpreted by the engine */
  readonly payload: Uint8Array;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/**
 * A space as persisted locally and replicated remotely.
 * `payload` holds compressed bytes when `isCompressed` is set.
 */
export interface StoredSpace extends Space {
  readonly isCompressed: boolean;
}

// ============================================================================
// Anchor Types
// ============================================================================

export interface Anchor {
  readonly id: string;
  readonly spaceId: string;
  readonly transform: Transform;
  readonly metadata: Metadata;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  /** Soft-delete marker */
  readonly deletedAt?: Date;
}

// ============================================================================
// Event Types
// ============================================================================

export const ANCHOR_EVENT_TYPES = ['created', 'moved', 'updated', 'deleted', 'restored'] as const;
export type AnchorEventType = (typeof ANCHOR_EVENT_TYPES)[number];

export interface AnchorEvent {
  readonly id: string;
  readonly anchorId: string;
  readonly spaceId: string;
  readonly type: AnchorEventType;
  readonly timestamp: Date;
  /** Per-anchor position in the log, starting at 1 */
  readonly version: number;
  readonly transform?: Transform;
  readonly metadata?: Metadata;
  readonly actorId?: string;
}

// ============================================================================
// Sync Types
// ============================================================================

export const OPERATION_KINDS = ['saveSpace', 'deleteSpace', 'saveAnchor'] as const;
export type OperationKind = (typeof OPERATION_KINDS)[number];

export interface PendingOperation {
  readonly id: string;
  readonly kind: OperationKind;
  /** Space or anchor id the operation targets */
  readonly targetId: string;
  readonly retryCount: number;
  readonly createdAt: Date;
}

/** Minimum shape of any record crossing the remote boundary */
export interface RemoteRecord {
  readonly id: string;
  readonly updatedAt: Date;
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if a value is a transform of 16 finite numbers
 */
export function isTransform(value: unknown): value is Transform {
  return (
    Array.isArray(value) &&
    value.length === TRANSFORM_LENGTH &&
    value.every((n) => typeof n === 'number' && Number.isFinite(n))
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check if a value is a well-formed tagged metadata value
 */
export function isMetadataValue(value: unknown): value is MetadataValue {
  if (!isRecord(value)) return false;

  switch (value.kind) {
    case 'string':
      return typeof value.value === 'string';
    case 'int':
      return typeof value.value === 'number' && Number.isSafeInteger(value.value);
    case 'double':
      return typeof value.value === 'number' && Number.isFinite(value.value);
    case 'bool':
      return typeof value.value === 'boolean';
    case 'array':
      return Array.isArray(value.value) && value.value.every(isMetadataValue);
    case 'map':
      return isRecord(value.value) && Object.values(value.value).every(isMetadataValue);
    case 'null':
      return true;
    default:
      return false;
  }
}
