/**
 * Anchor helpers
 *
 * Anchors are immutable values. Every mutation returns a new anchor with a
 * fresh `updatedAt` and leaves its input untouched.
 */

import { randomUUID } from 'node:crypto';
import {
  TRANSFORM_LENGTH,
  isMetadataValue,
  isTransform,
  type Anchor,
  type Metadata,
  type MetadataValue,
  type Transform,
} from '@anchorlog/shared-types';
import { ValidationError } from '../utils/errors.js';
import { asBool, asInt, asString, metadataEquals } from './metadata.js';

export const IDENTITY_TRANSFORM: Transform = Object.freeze([
  1, 0, 0, 0,
  0, 1, 0, 0,
  0, 0, 1, 0,
  0, 0, 0, 1,
]);

export interface Position {
  x: number;
  y: number;
  z: number;
}

export interface CreateAnchorInput {
  id?: string;
  spaceId: string;
  transform?: Transform;
  metadata?: Metadata;
}

export function createAnchor(input: CreateAnchorInput): Anchor {
  const now = new Date();
  return {
    id: input.id ?? randomUUID(),
    spaceId: input.spaceId,
    transform: input.transform ?? IDENTITY_TRANSFORM,
    metadata: input.metadata ?? {},
    createdAt: now,
    updatedAt: now,
  };
}

/**
 * Translation component of a column-major 4x4 transform
 */
export function translation(x: number, y: number, z: number): Transform {
  return [
    1, 0, 0, 0,
    0, 1, 0, 0,
    0, 0, 1, 0,
    x, y, z, 1,
  ];
}

export function withTransform(anchor: Anchor, transform: Transform): Anchor {
  return { ...anchor, transform, updatedAt: new Date() };
}

export function withMetadata(anchor: Anchor, metadata: Metadata): Anchor {
  return { ...anchor, metadata, updatedAt: new Date() };
}

/**
 * Set one metadata key; `undefined` removes it
 */
export function withMetadataValue(
  anchor: Anchor,
  key: string,
  value: MetadataValue | undefined
): Anchor {
  const metadata: Record<string, MetadataValue> = {};
  for (const [existingKey, existing] of Object.entries(anchor.metadata)) {
    if (existingKey !== key) {
      metadata[existingKey] = existing;
    }
  }
  if (value !== undefined) {
    metadata[key] = value;
  }
  return withMetadata(anchor, metadata);
}

export function markDeleted(anchor: Anchor): Anchor {
  const now = new Date();
  return { ...anchor, deletedAt: now, updatedAt: now };
}

export function restoreAnchor(anchor: Anchor): Anchor {
  return {
    id: anchor.id,
    spaceId: anchor.spaceId,
    transform: anchor.transform,
    metadata: anchor.metadata,
    createdAt: anchor.createdAt,
    updatedAt: new Date(),
  };
}

export function isDeleted(anchor: Anchor): boolean {
  return anchor.deletedAt !== undefined;
}

export function anchorPosition(anchor: Anchor): Position {
  return transformPosition(anchor.transform);
}

/** Indices 12..14 hold the translation */
export function transformPosition(transform: Transform): Position {
  return {
    x: transform[12] ?? 0,
    y: transform[13] ?? 0,
    z: transform[14] ?? 0,
  };
}

export function distanceBetween(a: Position, b: Position): number {
  return Math.hypot(b.x - a.x, b.y - a.y, b.z - a.z);
}

export function transformsEqual(a: Transform, b: Transform): boolean {
  return a.length === b.length && a.every((value, index) => value === b[index]);
}

/**
 * True when transform, metadata and delete state all match
 */
export function anchorStateEquals(a: Anchor, b: Anchor): boolean {
  return (
    transformsEqual(a.transform, b.transform) &&
    metadataEquals(a.metadata, b.metadata) &&
    isDeleted(a) === isDeleted(b)
  );
}

/**
 * Throws a ValidationError unless the anchor has an id, a space, a
 * transform of exactly 16 finite numbers and well-formed metadata
 */
export function validateAnchor(anchor: Anchor, operation = 'validateAnchor'): void {
  if (!anchor.id) {
    throw new ValidationError('Anchor id is required', { component: 'Anchor', operation, field: 'id' });
  }
  if (!anchor.spaceId) {
    throw new ValidationError('Anchor spaceId is required', {
      component: 'Anchor',
      operation,
      field: 'spaceId',
    });
  }
  const transformLength = anchor.transform.length;
  if (!isTransform(anchor.transform)) {
    throw new ValidationError(
      `Invalid transform: expected ${TRANSFORM_LENGTH} finite numbers, got ${transformLength}`,
      { component: 'Anchor', operation, field: 'transform' }
    );
  }

  const invalidKeys = Object.entries(anchor.metadata)
    .filter(([, value]) => !isMetadataValue(value))
    .map(([key]) => key);
  if (invalidKeys.length > 0) {
    throw new ValidationError(`Invalid metadata values for keys: ${invalidKeys.join(', ')}`, {
      component: 'Anchor',
      operation,
      field: 'metadata',
      constraints: ['doubles must be finite', 'ints must be safe integers'],
    });
  }
}

export function stringMetadata(anchor: Anchor, key: string): string | undefined {
  return asString(anchor.metadata[key]);
}

export function intMetadata(anchor: Anchor, key: string): number | undefined {
  return asInt(anchor.metadata[key]);
}

export function boolMetadata(anchor: Anchor, key: string): boolean | undefined {
  return asBool(anchor.metadata[key]);
}
