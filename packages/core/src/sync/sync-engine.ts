/**
 * Sync Engine
 *
 * Replicates local writes to a remote store and reconciles the two.
 *
 * A full sync runs three phases:
 *   1. retry every queued operation
 *   2. upload records changed since the last sync, plus the full history
 *      of each changed anchor
 *   3. download remote changes, last write wins
 *
 * @module sync/sync-engine
 */

import type { Anchor, AnchorEvent, OperationKind, PendingOperation, StoredSpace } from '@anchorlog/shared-types';
import type { RemoteAdapter } from '../remote/types.js';
import { toRemoteEvent } from '../remote/types.js';
import type { LocalStore } from '../storage/local-store.js';
import { CloudSyncFailedError, toError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import type { PendingQueue } from './pending-queue.js';

export interface SyncEngineOptions {
  store: LocalStore;
  remote: RemoteAdapter;
  queue: PendingQueue;
  logger?: Logger;
}

export interface SyncReport {
  /** Queued operations attempted in phase 1 */
  retried: number;
  /** Queued operations that succeeded in phase 1 */
  succeeded: number;
  /** Operations dropped after exhausting their retries */
  dropped: PendingOperation[];
  /** Operations still queued after phase 1 */
  pending: number;
  uploaded: { spaces: number; anchors: number; events: number };
  downloaded: { spaces: number; anchors: number };
  /** Remote records not adopted because the local copy was as new or newer */
  keptLocal: number;
  /** Watermark persisted for the next sync */
  lastSyncDate: Date;
}

const EPOCH = new Date(0);

function isNewer(remote: { updatedAt: Date }, local: { updatedAt: Date }): boolean {
  return remote.updatedAt.getTime() > local.updatedAt.getTime();
}

export class SyncEngine {
  private readonly store: LocalStore;
  private readonly remote: RemoteAdapter;
  private readonly queue: PendingQueue;
  private readonly logger: Logger;

  constructor(options: SyncEngineOptions) {
    this.store = options.store;
    this.remote = options.remote;
    this.queue = options.queue;
    this.logger = options.logger ?? getLogger('sync');
  }

  // ==========================================================================
  // Write-through replication
  // ==========================================================================

  /**
   * Run a remote write for a local change that already succeeded. On
   * failure the change is queued for the next sync and reported as
   * CloudSyncFailed.
   */
  async replicate(kind: OperationKind, targetId: string, upload: () => Promise<void>): Promise<void> {
    try {
      await upload();
    } catch (error) {
      const cause = toError(error);
      this.logger.warn('Remote write failed, queued for retry', { kind, targetId, reason: cause.message });
      await this.queue.enqueue(kind, targetId);
      throw new CloudSyncFailedError(`Remote ${kind} failed for ${targetId}: ${cause.message}`, {
        operation: kind,
        details: { kind, targetId, queueSize: this.queue.size },
        cause,
      });
    }
  }

  async uploadSpace(space: StoredSpace): Promise<void> {
    await this.remote.spaces.upload(space);
  }

  async uploadAnchor(anchor: Anchor, events: readonly AnchorEvent[]): Promise<void> {
    await this.remote.anchors.upload(anchor);
    for (const event of events) {
      await this.remote.events.upload(toRemoteEvent(event));
    }
  }

  /**
   * Replay one queued operation from current local state. A target that no
   * longer exists locally has nothing left to send.
   */
  async execute(operation: PendingOperation): Promise<void> {
    switch (operation.kind) {
      case 'saveSpace': {
        const space = await this.store.loadSpace(operation.targetId);
        if (space) {
          await this.uploadSpace(space);
        }
        return;
      }
      case 'deleteSpace':
        await this.remote.spaces.delete(operation.targetId);
        return;
      case 'saveAnchor': {
        const anchor = await this.store.loadAnchor(operation.targetId);
        if (anchor) {
          const events = await this.store.loadAnchorEvents(anchor.id, anchor.spaceId);
          await this.uploadAnchor(anchor, events);
        }
        return;
      }
    }
  }

  // ==========================================================================
  // Full sync
  // ==========================================================================

  async sync(): Promise<SyncReport> {
    const group = this.logger.group('sync');
    const previousSync = (await this.store.getLastSyncDate()) ?? EPOCH;

    try {
      // Phase 1: retry queue
      const drained = await group.step(
        'retry-queue',
        () => this.queue.drain((operation) => this.execute(operation)),
        (result) => result.dropped.length === 0
      );

      // Phase 2: upload local changes
      const uploadStartedAt = new Date();
      const uploaded = await group.step('upload', async () => {
        const counts = await this.uploadChangesSince(previousSync);
        await this.store.setLastSyncDate(uploadStartedAt);
        return counts;
      });

      // Phase 3: download remote changes since the watermark read before phase 2
      const downloaded = await group.step('download', () => this.downloadChangesSince(previousSync));

      const report: SyncReport = {
        retried: drained.attempted,
        succeeded: drained.succeeded,
        dropped: drained.dropped,
        pending: drained.remaining,
        uploaded,
        downloaded: { spaces: downloaded.spaces, anchors: downloaded.anchors },
        keptLocal: downloaded.keptLocal,
        lastSyncDate: uploadStartedAt,
      };
      this.logger.info('Sync finished', {
        retried: report.retried,
        dropped: report.dropped.length,
        uploaded: report.uploaded,
        downloaded: report.downloaded,
        keptLocal: report.keptLocal,
      });
      return report;
    } finally {
      group.end();
    }
  }

  /**
   * Remote failures during a full sync surface as CloudSyncFailed; local
   * failures propagate unchanged
   */
  private async callRemote<T>(step: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      const cause = toError(error);
      throw new CloudSyncFailedError(`Sync failed during ${step}: ${cause.message}`, {
        operation: 'sync',
        details: { step },
        cause,
      });
    }
  }

  private async uploadChangesSince(since: Date): Promise<SyncReport['uploaded']> {
    const spaces = await this.store.loadSpacesModifiedSince(since);
    for (const space of spaces) {
      await this.callRemote('upload', () => this.uploadSpace(space));
    }

    const anchors = await this.store.loadAnchorsModifiedSince(since);
    for (const anchor of anchors) {
      await this.callRemote('upload', () => this.remote.anchors.upload(anchor));
    }

    // Full history of every changed anchor, including backdated seed events
    const changedAnchorIds = new Set(anchors.map((anchor) => anchor.id));
    let events = 0;
    for (const spaceId of await this.store.listEventLogSpaceIds()) {
      const changed = (await this.store.loadEvents(spaceId)).filter(
        (event) => event.timestamp.getTime() > since.getTime() || changedAnchorIds.has(event.anchorId)
      );
      for (const event of changed) {
        await this.callRemote('upload', () => this.remote.events.upload(toRemoteEvent(event)));
      }
      events += changed.length;
    }

    return { spaces: spaces.length, anchors: anchors.length, events };
  }

  private async downloadChangesSince(
    since: Date
  ): Promise<{ spaces: number; anchors: number; keptLocal: number }> {
    let spaces = 0;
    let anchors = 0;
    let keptLocal = 0;

    const remoteSpaces = await this.callRemote('download', () => this.remote.spaces.listModifiedSince(since));
    for (const remoteSpace of remoteSpaces) {
      const local = await this.store.loadSpace(remoteSpace.id);
      if (!local || isNewer(remoteSpace, local)) {
        await this.store.saveSpace(remoteSpace);
        spaces++;
      } else {
        keptLocal++;
      }
    }

    const remoteAnchors = await this.callRemote('download', () => this.remote.anchors.listModifiedSince(since));
    for (const remoteAnchor of remoteAnchors) {
      const local = await this.store.loadAnchor(remoteAnchor.id);
      if (!local || isNewer(remoteAnchor, local)) {
        await this.store.saveAnchor(remoteAnchor);
        anchors++;
      } else {
        keptLocal++;
      }
    }

    return { spaces, anchors, keptLocal };
  }
}
