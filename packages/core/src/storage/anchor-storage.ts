/**
 * Anchor Storage
 *
 * Entry point of the engine. Every write lands in the local store first,
 * appends at most one event to the anchor's history, and is then replicated
 * to the remote store when the sync strategy asks for it.
 *
 * @module storage/anchor-storage
 */

import * as path from 'node:path';
import { loadConfig, type StorageConfig } from '@anchorlog/shared-config';
import type { Anchor, AnchorEvent, Space, StoredSpace } from '@anchorlog/shared-types';
import { compress, decompress } from '../compression/codec.js';
import {
  isDeleted,
  markDeleted,
  transformsEqual,
  validateAnchor,
} from '../models/anchor.js';
import {
  createdEvent,
  deletedEvent,
  movedEvent,
  restoredEvent,
  sortByVersion,
  updatedEvent,
  type EventOptions,
} from '../models/event.js';
import { metadataEquals } from '../models/metadata.js';
import { OpaquePayloadCodec, type PayloadCodec } from '../models/payload-codec.js';
import type { RemoteAdapter } from '../remote/types.js';
import { PendingQueue } from '../sync/pending-queue.js';
import { SyncEngine, type SyncReport } from '../sync/sync-engine.js';
import type { AnchorDiff } from '../timeline/diff.js';
import { reconstructAnchor } from '../timeline/reconstruct.js';
import { Timeline } from '../timeline/timeline.js';
import {
  CloudNotConfiguredError,
  CloudSyncFailedError,
  ConfigError,
  EventLogCorruptedError,
  InvalidReferenceError,
  NotFoundError,
  ValidationError,
  VersionNotFoundError,
  toError,
} from '../utils/errors.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { Logger } from '../utils/logger.js';
import { LocalStore } from './local-store.js';

// ============================================================================
// Types
// ============================================================================

export interface AnchorStorageOptions {
  /** Resolved configuration (default: loadConfig()) */
  config?: StorageConfig;
  /** Remote replica; required when `config.backend` is 'remote' */
  remote?: RemoteAdapter;
  payloadCodec?: PayloadCodec;
  logger?: Logger;
  /** Recorded on every event this instance appends */
  actorId?: string;
}

export interface LoadAnchorsOptions {
  includeDeleted?: boolean;
}

export interface EventLogSummary {
  spaceId: string;
  anchors: number;
  events: number;
}

const COMPONENT = 'AnchorStorage';
const SYNC_LOCK = '\u0000sync';

// ============================================================================
// Anchor Storage
// ============================================================================

export class AnchorStorage {
  readonly config: StorageConfig;

  private readonly store: LocalStore;
  private readonly queue: PendingQueue;
  private readonly syncEngine: SyncEngine | null;
  private readonly remote: RemoteAdapter | null;
  private readonly codec: PayloadCodec;
  private readonly logger: Logger;
  private readonly actorId?: string;
  private readonly locks = new KeyedMutex();
  private initialization: Promise<void> | null = null;

  constructor(options: AnchorStorageOptions = {}) {
    this.config = options.config ?? loadConfig();
    this.logger = options.logger ?? new Logger({ level: this.config.logLevel }).child('storage');
    this.codec = options.payloadCodec ?? new OpaquePayloadCodec();
    this.actorId = options.actorId;

    this.store = new LocalStore({
      baseDir: path.resolve(this.config.dataDir),
      logger: this.logger.child('local-store'),
    });
    this.queue = new PendingQueue({
      store: this.store,
      maxRetryAttempts: this.config.maxRetryAttempts,
      logger: this.logger.child('pending-queue'),
    });

    if (this.config.backend === 'remote') {
      if (!options.remote) {
        throw new ConfigError("Backend 'remote' requires a remote adapter", {
          component: COMPONENT,
          configKey: 'backend',
          recoveryHint: "Pass a remote adapter or use backend 'local-only'",
        });
      }
      this.remote = options.remote;
      this.syncEngine = new SyncEngine({
        store: this.store,
        remote: options.remote,
        queue: this.queue,
        logger: this.logger.child('sync'),
      });
    } else {
      if (options.remote) {
        this.logger.warn("Remote adapter ignored because backend is 'local-only'");
      }
      this.remote = null;
      this.syncEngine = null;
    }
  }

  // ==========================================================================
  // Status
  // ==========================================================================

  get isRemoteEnabled(): boolean {
    return this.syncEngine !== null;
  }

  /** Operations waiting for the next sync */
  get pendingOperationCount(): number {
    return this.queue.size;
  }

  get dataDir(): string {
    return this.store.baseDir;
  }

  // ==========================================================================
  // Spaces
  // ==========================================================================

  async saveSpace(space: Space): Promise<void> {
    await this.ensureInitialized();

    if (!this.codec.validate(space.payload)) {
      throw new ValidationError(`Payload rejected for space ${space.id}`, {
        component: COMPONENT,
        operation: 'saveSpace',
        field: 'payload',
        recoveryHint: 'Provide a non-empty payload the configured codec accepts',
      });
    }

    const stored: StoredSpace = {
      id: space.id,
      name: space.name,
      payload: await compress(space.payload, this.config.compression),
      createdAt: space.createdAt,
      updatedAt: space.updatedAt,
      isCompressed: this.config.compression !== 'none',
    };

    await this.store.saveSpace(stored);
    this.logger.debug('Space saved', {
      spaceId: space.id,
      payloadBytes: this.codec.size(space.payload),
      storedBytes: stored.payload.byteLength,
    });

    const engine = this.onSaveEngine();
    if (engine) {
      await engine.replicate('saveSpace', space.id, () => engine.uploadSpace(stored));
    }
  }

  /**
   * Load a space, falling back to the remote replica on a local miss. A
   * space found remotely is cached locally.
   */
  async loadSpace(id: string): Promise<Space | undefined> {
    await this.ensureInitialized();

    const local = await this.store.loadSpace(id);
    if (local) {
      return this.expand(local);
    }

    const remote = this.remote;
    if (!remote || !this.syncEngine) {
      return undefined;
    }

    let downloaded: StoredSpace | undefined;
    try {
      downloaded = await remote.spaces.download(id);
    } catch (error) {
      const cause = toError(error);
      throw new CloudSyncFailedError(`Remote lookup failed for space ${id}: ${cause.message}`, {
        operation: 'loadSpace',
        details: { spaceId: id },
        cause,
      });
    }

    if (!downloaded) {
      return undefined;
    }

    await this.store.saveSpace(downloaded);
    this.logger.debug('Space cached from remote', { spaceId: id });
    return this.expand(downloaded);
  }

  async loadAllSpaces(): Promise<Space[]> {
    await this.ensureInitialized();
    const stored = await this.store.loadAllSpaces();
    return Promise.all(stored.map((space) => this.expand(space)));
  }

  /**
   * Hard delete a space and its anchor records. Event history is kept.
   */
  async deleteSpace(id: string): Promise<void> {
    await this.ensureInitialized();
    await this.store.deleteSpace(id);

    const engine = this.onSaveEngine();
    const remote = this.remote;
    if (engine && remote) {
      await engine.replicate('deleteSpace', id, () => remote.spaces.delete(id));
    }
  }

  // ==========================================================================
  // Anchors
  // ==========================================================================

  /**
   * Persist an anchor and append the event describing the change, if any.
   * Saves of the same anchor are serialized so versions stay gapless.
   *
   * @returns the appended event, or undefined when nothing changed
   */
  async saveAnchor(anchor: Anchor): Promise<AnchorEvent | undefined> {
    await this.ensureInitialized();
    validateAnchor(anchor, 'saveAnchor');

    return this.locks.runExclusive(anchor.id, async () => {
      const existing = await this.store.loadAnchor(anchor.id);
      return this.persistAnchor(anchor, existing);
    });
  }

  async loadAnchor(id: string): Promise<Anchor | undefined> {
    await this.ensureInitialized();
    return this.store.loadAnchor(id);
  }

  async loadAnchors(spaceId: string, options: LoadAnchorsOptions = {}): Promise<Anchor[]> {
    await this.ensureInitialized();
    const anchors = await this.store.loadAnchors(spaceId);
    return options.includeDeleted ? anchors : anchors.filter((anchor) => !isDeleted(anchor));
  }

  /**
   * Soft delete through the save path, producing one `deleted` event.
   * Deleting an already deleted anchor changes nothing.
   */
  async deleteAnchor(id: string): Promise<AnchorEvent | undefined> {
    await this.ensureInitialized();

    return this.locks.runExclusive(id, async () => {
      const existing = await this.store.loadAnchor(id);
      if (!existing) {
        throw new NotFoundError('anchor', id, { component: COMPONENT, operation: 'deleteAnchor' });
      }
      if (isDeleted(existing)) {
        this.logger.debug('Anchor already deleted', { anchorId: id });
        return undefined;
      }
      return this.persistAnchor(markDeleted(existing), existing);
    });
  }

  /**
   * Remove anchor records soft-deleted before the cutoff, locally and on the
   * remote replica. No event is appended.
   */
  async purgeDeletedAnchors(before: Date): Promise<number> {
    await this.ensureInitialized();
    const purged = await this.store.purgeDeletedAnchors(before);

    const remote = this.remote;
    if (remote && this.syncEngine) {
      try {
        await remote.anchors.deleteWhere(before);
      } catch (error) {
        const cause = toError(error);
        throw new CloudSyncFailedError(`Remote purge failed: ${cause.message}`, {
          operation: 'purgeDeletedAnchors',
          details: { before: before.toISOString(), purgedLocally: purged },
          cause,
        });
      }
    }

    return purged;
  }

  // ==========================================================================
  // History
  // ==========================================================================

  async timeline(spaceId: string): Promise<Timeline> {
    await this.ensureInitialized();
    return new Timeline(spaceId, await this.store.loadEvents(spaceId));
  }

  /** The anchor's events ordered by version */
  async history(anchorId: string): Promise<AnchorEvent[]> {
    await this.ensureInitialized();
    const anchor = await this.store.loadAnchor(anchorId);
    if (!anchor) {
      throw new NotFoundError('anchor', anchorId, { component: COMPONENT, operation: 'history' });
    }
    return sortByVersion(await this.store.loadAnchorEvents(anchorId, anchor.spaceId));
  }

  async anchorsAt(spaceId: string, date: Date): Promise<Anchor[]> {
    return (await this.timeline(spaceId)).state(date);
  }

  async diff(spaceId: string, from: Date, to: Date): Promise<AnchorDiff> {
    return (await this.timeline(spaceId)).diff(from, to);
  }

  /**
   * Restore an anchor to the state it had at `toVersion`. The restoration is
   * appended as a new `restored` event; history is never truncated.
   */
  async rollback(anchorId: string, toVersion: number): Promise<Anchor> {
    await this.ensureInitialized();

    return this.locks.runExclusive(anchorId, async () => {
      const existing = await this.store.loadAnchor(anchorId);
      if (!existing) {
        throw new NotFoundError('anchor', anchorId, { component: COMPONENT, operation: 'rollback' });
      }

      const events = await this.store.loadAnchorEvents(anchorId, existing.spaceId);
      if (!events.some((event) => event.version === toVersion)) {
        throw new VersionNotFoundError(anchorId, toVersion);
      }

      const target = reconstructAnchor(
        anchorId,
        events.filter((event) => event.version <= toVersion)
      );
      const latestVersion = events.reduce((max, event) => Math.max(max, event.version), 0);

      const restored: Anchor = {
        id: anchorId,
        spaceId: existing.spaceId,
        transform: target.transform,
        metadata: target.metadata,
        createdAt: existing.createdAt,
        updatedAt: new Date(),
      };

      const event = restoredEvent(restored, latestVersion, this.eventOptions());
      await this.store.appendEvent(event);
      await this.store.saveAnchor(restored);
      this.logger.info('Anchor rolled back', { anchorId, toVersion, version: event.version });

      await this.replicateAnchor(restored, [event]);
      return restored;
    });
  }

  /**
   * Check that every anchor in the space has versions exactly 1..N starting
   * with `created`
   */
  async verifyEventLog(spaceId: string): Promise<EventLogSummary> {
    await this.ensureInitialized();
    const events = await this.store.loadEvents(spaceId);

    const byAnchor = new Map<string, AnchorEvent[]>();
    for (const event of events) {
      byAnchor.set(event.anchorId, [...(byAnchor.get(event.anchorId) ?? []), event]);
    }

    for (const [anchorId, anchorEvents] of byAnchor) {
      const ordered = sortByVersion(anchorEvents);
      ordered.forEach((event, index) => {
        if (event.version !== index + 1) {
          throw new EventLogCorruptedError(
            spaceId,
            `anchor ${anchorId} has version ${event.version} at position ${index + 1}`
          );
        }
      });
      if (ordered[0]?.type !== 'created') {
        throw new EventLogCorruptedError(spaceId, `anchor ${anchorId} does not start with a created event`);
      }
    }

    return { spaceId, anchors: byAnchor.size, events: events.length };
  }

  // ==========================================================================
  // Sync
  // ==========================================================================

  async sync(): Promise<SyncReport> {
    await this.ensureInitialized();
    const engine = this.syncEngine;
    if (!engine) {
      throw new CloudNotConfiguredError('sync');
    }
    return this.locks.runExclusive(SYNC_LOCK, () => engine.sync());
  }

  // ==========================================================================
  // Data management
  // ==========================================================================

  /** Delete every local record and forget queued operations */
  async clearLocalStorage(): Promise<void> {
    await this.ensureInitialized();
    await this.store.clearAll();
    this.queue.reset();
  }

  async localStorageSize(): Promise<number> {
    await this.ensureInitialized();
    return this.store.totalSize();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private ensureInitialized(): Promise<void> {
    if (!this.initialization) {
      this.initialization = this.queue.load().catch((error: unknown) => {
        this.initialization = null;
        throw error;
      });
    }
    return this.initialization;
  }

  private onSaveEngine(): SyncEngine | null {
    return this.config.syncStrategy === 'on-save' ? this.syncEngine : null;
  }

  private eventOptions(): EventOptions {
    return this.actorId !== undefined ? { actorId: this.actorId } : {};
  }

  private async expand(stored: StoredSpace): Promise<Space> {
    const payload = stored.isCompressed
      ? await decompress(stored.payload, { maxOutputBytes: this.config.maxDecompressedBytes })
      : stored.payload;

    return {
      id: stored.id,
      name: stored.name,
      payload,
      createdAt: stored.createdAt,
      updatedAt: stored.updatedAt,
    };
  }

  /**
   * Classify the change, append its event, persist the snapshot, replicate.
   * Must run under the anchor's lock.
   */
  private async persistAnchor(anchor: Anchor, existing: Anchor | undefined): Promise<AnchorEvent | undefined> {
    if (existing && existing.spaceId !== anchor.spaceId) {
      throw new InvalidReferenceError(
        `Anchor ${anchor.id} belongs to space ${existing.spaceId} and cannot move to ${anchor.spaceId}`,
        {
          component: COMPONENT,
          operation: 'saveAnchor',
          details: { anchorId: anchor.id, from: existing.spaceId, to: anchor.spaceId },
        }
      );
    }

    const appended: AnchorEvent[] = [];
    const options = this.eventOptions();
    let previousVersion = await this.store.currentVersion(anchor.id, anchor.spaceId);

    if (existing && previousVersion === 0) {
      const seed = createdEvent(existing, { ...options, timestamp: existing.createdAt });
      await this.store.appendEvent(seed);
      appended.push(seed);
      previousVersion = 1;
      this.logger.info('Seeded history for anchor saved before versioning', { anchorId: anchor.id });
    }

    const event = existing
      ? this.classifyChange(existing, anchor, previousVersion, options)
      : createdEvent(anchor, options);

    if (event) {
      await this.store.appendEvent(event);
      appended.push(event);
    }
    await this.store.saveAnchor(anchor);

    this.logger.debug('Anchor saved', {
      anchorId: anchor.id,
      event: event?.type ?? 'none',
      version: event?.version ?? previousVersion,
    });

    await this.replicateAnchor(anchor, appended);
    return event;
  }

  private classifyChange(
    existing: Anchor,
    incoming: Anchor,
    previousVersion: number,
    options: EventOptions
  ): AnchorEvent | undefined {
    const wasDeleted = isDeleted(existing);
    const nowDeleted = isDeleted(incoming);

    if (!wasDeleted && nowDeleted) return deletedEvent(incoming, previousVersion, options);
    if (wasDeleted && !nowDeleted) return restoredEvent(incoming, previousVersion, options);
    if (!transformsEqual(existing.transform, incoming.transform)) {
      return movedEvent(incoming, previousVersion, options);
    }
    if (!metadataEquals(existing.metadata, incoming.metadata)) {
      return updatedEvent(incoming, previousVersion, options);
    }
    return undefined;
  }

  private async replicateAnchor(anchor: Anchor, events: readonly AnchorEvent[]): Promise<void> {
    const engine = this.onSaveEngine();
    if (engine) {
      await engine.replicate('saveAnchor', anchor.id, () => engine.uploadAnchor(anchor, events));
    }
  }
}
