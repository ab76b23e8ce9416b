/**
 * Space helpers
 */

import { randomUUID } from 'node:crypto';
import type { Space } from '@anchorlog/shared-types';

export interface CreateSpaceInput {
  id?: string;
  name?: string;
  payload: Uint8Array;
}

export function createSpace(input: CreateSpaceInput): Space {
  const now = new Date();
  return {
    id: input.id ?? randomUUID(),
    name: input.name,
    payload: input.payload,
    createdAt: now,
    updatedAt: now,
  };
}

export function withPayload(space: Space, payload: Uint8Array): Space {
  return { ...space, payload, updatedAt: new Date() };
}

export function withName(space: Space, name: string | undefined): Space {
  return { ...space, name, updatedAt: new Date() };
}

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';

  const units = ['B', 'KB', 'MB', 'GB'];
  const k = 1024;
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), units.length - 1);

  return `${(bytes / Math.pow(k, i)).toFixed(1)} ${units[i]}`;
}
