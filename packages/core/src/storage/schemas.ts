/**
 * Persisted Record Schemas
 *
 * On-disk JSON forms of anchors, events, space headers, the pending queue
 * and the sync state. Dates are ISO-8601 strings; metadata keeps its tags
 * so `int` and `double` survive a round trip.
 */

import { z } from 'zod';
import {
  ANCHOR_EVENT_TYPES,
  OPERATION_KINDS,
  TRANSFORM_LENGTH,
  type Anchor,
  type AnchorEvent,
  type MetadataValue,
  type PendingOperation,
} from '@anchorlog/shared-types';
import { ValidationError } from '../utils/errors.js';

// ============================================================================
// Building blocks
// ============================================================================

export const isoDateSchema = z
  .string()
  .datetime()
  .transform((value) => new Date(value));

export const transformSchema = z.array(z.number().finite()).length(TRANSFORM_LENGTH);

export const metadataValueSchema: z.ZodType<MetadataValue> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('string'), value: z.string() }),
    z.object({ kind: z.literal('int'), value: z.number().int() }),
    z.object({ kind: z.literal('double'), value: z.number().finite() }),
    z.object({ kind: z.literal('bool'), value: z.boolean() }),
    z.object({ kind: z.literal('array'), value: z.array(metadataValueSchema) }),
    z.object({ kind: z.literal('map'), value: z.record(metadataValueSchema) }),
    z.object({ kind: z.literal('null') }),
  ])
);

export const metadataSchema = z.record(metadataValueSchema);

// ============================================================================
// Records
// ============================================================================

export const anchorRecordSchema = z.object({
  id: z.string().min(1),
  spaceId: z.string().min(1),
  transform: transformSchema,
  metadata: metadataSchema,
  createdAt: isoDateSchema,
  updatedAt: isoDateSchema,
  deletedAt: isoDateSchema.optional(),
});

export const eventRecordSchema = z.object({
  id: z.string().min(1),
  anchorId: z.string().min(1),
  spaceId: z.string().min(1),
  type: z.enum(ANCHOR_EVENT_TYPES),
  timestamp: isoDateSchema,
  version: z.number().int().positive(),
  transform: transformSchema.optional(),
  metadata: metadataSchema.optional(),
  actorId: z.string().optional(),
});

export const spaceHeaderSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  createdAt: isoDateSchema,
  updatedAt: isoDateSchema,
  isCompressed: z.boolean(),
});

export const pendingOperationSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(OPERATION_KINDS),
  targetId: z.string().min(1),
  retryCount: z.number().int().nonnegative(),
  createdAt: isoDateSchema,
});

export const pendingQueueSchema = z.array(pendingOperationSchema);

export const syncStateSchema = z.object({
  lastSyncDate: isoDateSchema.nullable(),
});

export type SpaceHeader = z.infer<typeof spaceHeaderSchema>;

// ============================================================================
// Decoding
// ============================================================================

/**
 * Validate a parsed JSON value, naming the source file on failure
 */
export function decodeRecord<T extends z.ZodTypeAny>(
  schema: T,
  raw: unknown,
  source: { file: string; operation: string }
): z.output<T> {
  const result = schema.safeParse(raw);

  if (!result.success) {
    const constraints = result.error.errors.map((e) => `${e.path.join('.') || 'root'}: ${e.message}`);
    throw new ValidationError(`Invalid record in ${source.file}`, {
      component: 'LocalStore',
      operation: source.operation,
      field: source.file,
      constraints,
      recoveryHint: 'The file may have been edited or written by an incompatible version',
    });
  }

  return result.data;
}

// ============================================================================
// Encoding
// ============================================================================

export function encodeAnchor(anchor: Anchor): Record<string, unknown> {
  return {
    id: anchor.id,
    spaceId: anchor.spaceId,
    transform: [...anchor.transform],
    metadata: anchor.metadata,
    createdAt: anchor.createdAt.toISOString(),
    updatedAt: anchor.updatedAt.toISOString(),
    ...(anchor.deletedAt ? { deletedAt: anchor.deletedAt.toISOString() } : {}),
  };
}

export function encodeEvent(event: AnchorEvent): Record<string, unknown> {
  return {
    id: event.id,
    anchorId: event.anchorId,
    spaceId: event.spaceId,
    type: event.type,
    timestamp: event.timestamp.toISOString(),
    version: event.version,
    ...(event.transform ? { transform: [...event.transform] } : {}),
    ...(event.metadata ? { metadata: event.metadata } : {}),
    ...(event.actorId !== undefined ? { actorId: event.actorId } : {}),
  };
}

export function encodePendingOperation(operation: PendingOperation): Record<string, unknown> {
  return {
    id: operation.id,
    kind: operation.kind,
    targetId: operation.targetId,
    retryCount: operation.retryCount,
    createdAt: operation.createdAt.toISOString(),
  };
}

/**
 * Decoded anchors carry no `deletedAt` key when the record has none
 */
export function toAnchor(record: z.output<typeof anchorRecordSchema>): Anchor {
  const { deletedAt, ...rest } = record;
  return deletedAt ? { ...rest, deletedAt } : rest;
}

export function toEvent(record: z.output<typeof eventRecordSchema>): AnchorEvent {
  const event: AnchorEvent = {
    id: record.id,
    anchorId: record.anchorId,
    spaceId: record.spaceId,
    type: record.type,
    timestamp: record.timestamp,
    version: record.version,
    ...(record.transform ? { transform: record.transform } : {}),
    ...(record.metadata ? { metadata: record.metadata } : {}),
    ...(record.actorId !== undefined ? { actorId: record.actorId } : {}),
  };
  return event;
}
