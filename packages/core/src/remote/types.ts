/**
 * Remote Store Adapter
 *
 * Boundary to a remote replica. The engine ships no transport; callers
 * provide an adapter for their backend, or use the in-memory replica.
 */

import type { Anchor, AnchorEvent, RemoteRecord, StoredSpace } from '@anchorlog/shared-types';

/** Events cross the remote boundary with `updatedAt = timestamp` */
export type RemoteEvent = AnchorEvent & RemoteRecord;

export interface RemoteCollection<T extends RemoteRecord> {
  /** Idempotent upsert by id */
  upload(record: T): Promise<void>;
  download(id: string): Promise<T | undefined>;
  /** Records with `updatedAt` strictly after `since` */
  listModifiedSince(since: Date): Promise<T[]>;
  delete(id: string): Promise<void>;
  /**
   * Remove records older than the cutoff and return how many were removed.
   * For anchors the cutoff applies to `deletedAt`; live anchors are kept.
   */
  deleteWhere(olderThan: Date): Promise<number>;
}

export interface RemoteAdapter {
  /** Deleting a space also deletes its anchors */
  readonly spaces: RemoteCollection<StoredSpace>;
  readonly anchors: RemoteCollection<Anchor>;
  readonly events: RemoteCollection<RemoteEvent>;
}

export function toRemoteEvent(event: AnchorEvent): RemoteEvent {
  return { ...event, updatedAt: event.timestamp };
}
