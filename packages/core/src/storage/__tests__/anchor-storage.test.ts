/**
 * Anchor Storage Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { localOnlyConfig, remoteConfig, type StorageConfigInput, type SyncStrategy } from '@anchorlog/shared-config';
import type { Anchor } from '@anchorlog/shared-types';
import { AnchorStorage } from '../anchor-storage.js';
import { LocalStore } from '../local-store.js';
import { InMemoryRemoteAdapter } from '../../remote/in-memory.js';
import {
  IDENTITY_TRANSFORM,
  createAnchor,
  markDeleted,
  restoreAnchor,
  translation,
  withMetadataValue,
  withTransform,
} from '../../models/anchor.js';
import { createSpace } from '../../models/space.js';
import { fromPlainMetadata, metadataValue } from '../../models/metadata.js';
import {
  CloudNotConfiguredError,
  CloudSyncFailedError,
  ConfigError,
  EventLogCorruptedError,
  InvalidReferenceError,
  NotFoundError,
  ValidationError,
  VersionNotFoundError,
} from '../../utils/errors.js';
import { Logger } from '../../utils/logger.js';

const SPACE = 'space-1';
const T1 = '2025-06-01T08:00:00.000Z';
const T2 = '2025-06-01T09:00:00.000Z';
const T3 = '2025-06-01T10:00:00.000Z';
const T4 = '2025-06-01T11:00:00.000Z';
const T5 = '2025-06-01T12:00:00.000Z';

describe('AnchorStorage', () => {
  let tempDir: string;
  let logger: Logger;
  let remote: InMemoryRemoteAdapter;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date(T1));
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'anchorlog-storage-'));
    logger = new Logger({ level: 'error', enableConsole: false });
    remote = new InMemoryRemoteAdapter();
  });

  afterEach(() => {
    vi.useRealTimers();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function localStorage(overrides: StorageConfigInput = {}): AnchorStorage {
    return new AnchorStorage({ config: localOnlyConfig({ dataDir: tempDir, ...overrides }), logger });
  }

  function remoteStorage(strategy: SyncStrategy = 'on-save', overrides: StorageConfigInput = {}): AnchorStorage {
    return new AnchorStorage({
      config: remoteConfig(strategy, { dataDir: tempDir, ...overrides }),
      remote,
      logger,
    });
  }

  function desk(): Anchor {
    return createAnchor({ id: 'a1', spaceId: SPACE, metadata: fromPlainMetadata({ label: 'desk' }) });
  }

  // ==========================================================================
  // Configuration
  // ==========================================================================

  describe('configuration', () => {
    it('should require an adapter for the remote backend', () => {
      expect(
        () => new AnchorStorage({ config: remoteConfig('on-save', { dataDir: tempDir }), logger })
      ).toThrow(ConfigError);
    });

    it('should ignore an adapter when the backend is local-only', async () => {
      const storage = new AnchorStorage({ config: localOnlyConfig({ dataDir: tempDir }), remote, logger });

      await storage.saveAnchor(desk());

      expect(storage.isRemoteEnabled).toBe(false);
      expect(remote.calls).toEqual([]);
    });

    it('should refuse to sync without a remote', async () => {
      await expect(localStorage().sync()).rejects.toBeInstanceOf(CloudNotConfiguredError);
    });
  });

  // ==========================================================================
  // Event log
  // ==========================================================================

  describe('saveAnchor', () => {
    it('should record a created event for a new anchor', async () => {
      const storage = localStorage();

      const event = await storage.saveAnchor(desk());

      expect(event?.type).toBe('created');
      expect(event?.version).toBe(1);
      expect(event?.timestamp).toEqual(new Date(T1));
      expect(await storage.loadAnchor('a1')).toEqual(desk());
    });

    it('should version a full lifecycle and roll back by appending', async () => {
      const storage = localStorage();
      const anchor = desk();
      await storage.saveAnchor(anchor);

      vi.setSystemTime(new Date(T2));
      const moved = withTransform(anchor, translation(1, 0, 0));
      await storage.saveAnchor(moved);

      vi.setSystemTime(new Date(T3));
      await storage.saveAnchor(withMetadataValue(moved, 'label', metadataValue.string('shelf')));

      vi.setSystemTime(new Date(T4));
      await storage.deleteAnchor('a1');

      vi.setSystemTime(new Date(T5));
      const restored = await storage.rollback('a1', 1);

      expect(restored.transform).toEqual(IDENTITY_TRANSFORM);
      expect(restored.metadata).toEqual(fromPlainMetadata({ label: 'desk' }));
      expect(restored.deletedAt).toBeUndefined();
      expect(restored.updatedAt).toEqual(new Date(T5));

      const history = await storage.history('a1');
      expect(history.map((event) => [event.version, event.type])).toEqual([
        [1, 'created'],
        [2, 'moved'],
        [3, 'updated'],
        [4, 'deleted'],
        [5, 'restored'],
      ]);
      expect(history[4]?.transform).toEqual(history[0]?.transform);
      expect(history[4]?.metadata).toEqual(history[0]?.metadata);
      expect(history[4]?.transform).toEqual(IDENTITY_TRANSFORM);
      expect(history[4]?.metadata).toEqual(fromPlainMetadata({ label: 'desk' }));
      expect(await storage.loadAnchor('a1')).toEqual(restored);
      expect(await storage.verifyEventLog(SPACE)).toEqual({ spaceId: SPACE, anchors: 1, events: 5 });
    });

    it('should not append an event when nothing changed', async () => {
      const storage = localStorage();
      await storage.saveAnchor(desk());

      const event = await storage.saveAnchor(desk());

      expect(event).toBeUndefined();
      expect(await storage.history('a1')).toHaveLength(1);
    });

    it('should record only the deletion when a save also moves the anchor', async () => {
      const storage = localStorage();
      const anchor = desk();
      await storage.saveAnchor(anchor);

      const event = await storage.saveAnchor(markDeleted(withTransform(anchor, translation(1, 2, 3))));

      expect(event?.type).toBe('deleted');
      expect(event?.version).toBe(2);
    });

    it('should record a restoration when a deleted anchor is saved undeleted', async () => {
      const storage = localStorage();
      const deleted = markDeleted(desk());
      await storage.saveAnchor(desk());
      await storage.saveAnchor(deleted);

      const event = await storage.saveAnchor(restoreAnchor(deleted));

      expect(event?.type).toBe('restored');
      expect(event?.version).toBe(3);
    });

    it('should record a metadata change as updated', async () => {
      const storage = localStorage();
      await storage.saveAnchor(desk());

      const event = await storage.saveAnchor(withMetadataValue(desk(), 'count', metadataValue.int(3)));

      expect(event?.type).toBe('updated');
      expect(event?.metadata).toEqual(fromPlainMetadata({ label: 'desk', count: 3 }));
    });

    it('should keep versions gapless under concurrent saves', async () => {
      const storage = localStorage();
      const anchor = desk();
      await storage.saveAnchor(anchor);

      await Promise.all(
        [1, 2, 3, 4, 5].map((x) => storage.saveAnchor(withTransform(anchor, translation(x, 0, 0))))
      );

      const history = await storage.history('a1');
      expect(history.map((event) => event.version)).toEqual([1, 2, 3, 4, 5, 6]);
      expect(history.slice(1).every((event) => event.type === 'moved')).toBe(true);
    });

    it('should seed history for an anchor stored before versioning', async () => {
      const legacy: Anchor = {
        ...desk(),
        createdAt: new Date('2025-01-01T00:00:00.000Z'),
        updatedAt: new Date('2025-01-01T00:00:00.000Z'),
      };
      await new LocalStore({ baseDir: tempDir, logger }).saveAnchor(legacy);
      const storage = localStorage();

      vi.setSystemTime(new Date(T2));
      await storage.saveAnchor(withMetadataValue(legacy, 'label', metadataValue.string('lamp')));

      const history = await storage.history('a1');
      expect(history.map((event) => [event.version, event.type, event.timestamp.toISOString()])).toEqual([
        [1, 'created', '2025-01-01T00:00:00.000Z'],
        [2, 'updated', T2],
      ]);
      expect(history[0]?.metadata).toEqual(fromPlainMetadata({ label: 'desk' }));
    });

    it('should reject moving an anchor to another space', async () => {
      const storage = localStorage();
      await storage.saveAnchor(desk());

      await expect(storage.saveAnchor({ ...desk(), spaceId: 'space-2' })).rejects.toBeInstanceOf(
        InvalidReferenceError
      );
    });

    it('should reject a malformed transform', async () => {
      const storage = localStorage();

      await expect(storage.saveAnchor({ ...desk(), transform: [1, 0, 0] })).rejects.toBeInstanceOf(ValidationError);
      expect(await storage.loadAnchor('a1')).toBeUndefined();
    });

    it('should refuse metadata that cannot be stored and leave the space usable', async () => {
      const storage = localStorage();
      await storage.saveAnchor(desk());
      const bad = createAnchor({
        id: 'bad',
        spaceId: SPACE,
        metadata: { w: { kind: 'double', value: Number.POSITIVE_INFINITY } },
      });

      await expect(storage.saveAnchor(bad)).rejects.toBeInstanceOf(ValidationError);

      expect(await storage.loadAnchor('bad')).toBeUndefined();
      expect((await storage.timeline(SPACE)).events).toHaveLength(1);
      const event = await storage.saveAnchor(createAnchor({ id: 'ok', spaceId: SPACE }));
      expect(event?.type).toBe('created');
    });

    it('should continue versioning after a final event lost its newline', async () => {
      const storage = localStorage();
      const anchor = desk();
      await storage.saveAnchor(anchor);
      await storage.saveAnchor(withTransform(anchor, translation(1, 0, 0)));
      const eventsFile = path.join(tempDir, 'events', `${SPACE}.jsonl`);
      fs.writeFileSync(eventsFile, fs.readFileSync(eventsFile, 'utf-8').slice(0, -1));

      await storage.saveAnchor(withTransform(anchor, translation(2, 0, 0)));

      expect((await storage.history('a1')).map((event) => event.version)).toEqual([1, 2, 3]);
      expect(await storage.verifyEventLog(SPACE)).toEqual({ spaceId: SPACE, anchors: 1, events: 3 });
    });

    it('should record the actor on every event', async () => {
      const storage = new AnchorStorage({
        config: localOnlyConfig({ dataDir: tempDir }),
        logger,
        actorId: 'device-7',
      });

      const event = await storage.saveAnchor(desk());

      expect(event?.actorId).toBe('device-7');
    });
  });

  describe('deleteAnchor', () => {
    it('should fail for an unknown anchor', async () => {
      await expect(localStorage().deleteAnchor('missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should do nothing when the anchor is already deleted', async () => {
      const storage = localStorage();
      await storage.saveAnchor(desk());
      await storage.deleteAnchor('a1');

      const second = await storage.deleteAnchor('a1');

      expect(second).toBeUndefined();
      expect(await storage.history('a1')).toHaveLength(2);
    });

    it('should hide deleted anchors unless asked for them', async () => {
      const storage = localStorage();
      await storage.saveAnchor(desk());
      await storage.saveAnchor(createAnchor({ id: 'a2', spaceId: SPACE }));
      await storage.deleteAnchor('a1');

      expect((await storage.loadAnchors(SPACE)).map((anchor) => anchor.id)).toEqual(['a2']);
      expect((await storage.loadAnchors(SPACE, { includeDeleted: true })).map((anchor) => anchor.id)).toEqual([
        'a1',
        'a2',
      ]);
    });
  });

  describe('rollback', () => {
    it('should fail for an unknown anchor', async () => {
      await expect(localStorage().rollback('missing', 1)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should fail for a version that was never recorded', async () => {
      const storage = localStorage();
      await storage.saveAnchor(desk());

      await expect(storage.rollback('a1', 7)).rejects.toBeInstanceOf(VersionNotFoundError);
    });
  });

  describe('history', () => {
    it('should fail for an unknown anchor', async () => {
      await expect(localStorage().history('missing')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('purgeDeletedAnchors', () => {
    it('should remove records deleted before the cutoff and keep their events', async () => {
      const storage = localStorage();
      await storage.saveAnchor(desk());
      await storage.deleteAnchor('a1');

      const purged = await storage.purgeDeletedAnchors(new Date(T2));

      expect(purged).toBe(1);
      expect(await storage.loadAnchor('a1')).toBeUndefined();
      expect((await storage.timeline(SPACE)).events).toHaveLength(2);
    });
  });

  describe('verifyEventLog', () => {
    it('should report a gap in an anchor history', async () => {
      const store = new LocalStore({ baseDir: tempDir, logger });
      const anchor = desk();
      await store.saveAnchor(anchor);
      await store.appendEvent({
        id: 'e1',
        anchorId: 'a1',
        spaceId: SPACE,
        type: 'created',
        timestamp: new Date(T1),
        version: 1,
        transform: anchor.transform,
        metadata: anchor.metadata,
      });
      await store.appendEvent({
        id: 'e3',
        anchorId: 'a1',
        spaceId: SPACE,
        type: 'moved',
        timestamp: new Date(T2),
        version: 3,
        transform: translation(1, 0, 0),
      });

      await expect(localStorage().verifyEventLog(SPACE)).rejects.toBeInstanceOf(EventLogCorruptedError);
    });
  });

  // ==========================================================================
  // Timeline queries
  // ==========================================================================

  describe('timeline queries', () => {
    it('should answer state-at-date and diff questions', async () => {
      const storage = localStorage();
      const first = desk();
      await storage.saveAnchor(first);
      vi.setSystemTime(new Date(T2));
      await storage.saveAnchor(createAnchor({ id: 'a2', spaceId: SPACE }));
      vi.setSystemTime(new Date(T3));
      await storage.saveAnchor(withTransform(first, translation(3, 4, 0)));

      expect((await storage.anchorsAt(SPACE, new Date(T1))).map((anchor) => anchor.id)).toEqual(['a1']);
      expect((await storage.anchorsAt(SPACE, new Date(T3))).map((anchor) => anchor.id)).toEqual(['a1', 'a2']);

      const diff = await storage.diff(SPACE, new Date(T1), new Date(T3));
      expect(diff.added.map((anchor) => anchor.id)).toEqual(['a2']);
      expect(diff.moved.map((entry) => entry.anchor.id)).toEqual(['a1']);
      expect(diff.moved[0]?.distanceMoved).toBe(5);
      expect(diff.summary).toBe('1 added, 1 moved');
    });
  });

  // ==========================================================================
  // Spaces
  // ==========================================================================

  describe('spaces', () => {
    it('should compress payloads on disk and return the original bytes', async () => {
      const storage = localStorage({ compression: 'balanced' });
      const payload = new Uint8Array(4096).fill(7);
      await storage.saveSpace(createSpace({ id: 's1', name: 'Office', payload }));

      const raw = await new LocalStore({ baseDir: tempDir, logger }).loadSpace('s1');
      expect(raw?.isCompressed).toBe(true);
      expect(raw?.payload.byteLength).toBeLessThan(4096);

      const loaded = await storage.loadSpace('s1');
      expect(loaded?.name).toBe('Office');
      expect(Array.from(loaded?.payload ?? [])).toEqual(Array.from(payload));
    });

    it('should store payloads as-is with compression off', async () => {
      const storage = localStorage({ compression: 'none' });
      await storage.saveSpace(createSpace({ id: 's1', payload: new Uint8Array([1, 2, 3]) }));

      const raw = await new LocalStore({ baseDir: tempDir, logger }).loadSpace('s1');
      expect(raw?.isCompressed).toBe(false);
      expect(Array.from(raw?.payload ?? [])).toEqual([1, 2, 3]);
    });

    it('should reject an empty payload', async () => {
      await expect(
        localStorage().saveSpace(createSpace({ id: 's1', payload: new Uint8Array(0) }))
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('should delete a space with its anchors but keep the event log', async () => {
      const storage = localStorage();
      await storage.saveSpace(createSpace({ id: SPACE, payload: new Uint8Array([1]) }));
      await storage.saveAnchor(desk());

      await storage.deleteSpace(SPACE);

      expect(await storage.loadSpace(SPACE)).toBeUndefined();
      expect(await storage.loadAnchors(SPACE, { includeDeleted: true })).toEqual([]);
      expect((await storage.timeline(SPACE)).events).toHaveLength(1);
    });

    it('should list every saved space', async () => {
      const storage = localStorage();
      await storage.saveSpace(createSpace({ id: 's1', payload: new Uint8Array([1]) }));
      await storage.saveSpace(createSpace({ id: 's2', payload: new Uint8Array([2]) }));

      expect((await storage.loadAllSpaces()).map((space) => space.id)).toEqual(['s1', 's2']);
    });
  });

  // ==========================================================================
  // Remote replication
  // ==========================================================================

  describe('remote replication', () => {
    it('should replicate the snapshot and its event on save', async () => {
      const storage = remoteStorage();

      const event = await storage.saveAnchor(desk());

      expect(remote.anchors.records.get('a1')).toEqual(desk());
      expect(remote.events.records.get(event?.id ?? '')?.version).toBe(1);
      expect(storage.pendingOperationCount).toBe(0);
    });

    it('should keep an offline save locally and queue it', async () => {
      const storage = remoteStorage();
      remote.setOffline(true);

      await expect(storage.saveAnchor(desk())).rejects.toBeInstanceOf(CloudSyncFailedError);

      expect(await storage.loadAnchor('a1')).toEqual(desk());
      expect(storage.pendingOperationCount).toBe(1);

      remote.setOffline(false);
      vi.setSystemTime(new Date(T2));
      const report = await storage.sync();

      expect(report.retried).toBe(1);
      expect(report.succeeded).toBe(1);
      expect(storage.pendingOperationCount).toBe(0);
      expect(remote.anchors.records.has('a1')).toBe(true);
    });

    it('should restore the queue in a new session', async () => {
      remote.setOffline(true);
      await expect(remoteStorage().saveAnchor(desk())).rejects.toBeInstanceOf(CloudSyncFailedError);

      const reopened = remoteStorage();
      await reopened.loadAnchor('a1');

      expect(reopened.pendingOperationCount).toBe(1);
    });

    it('should not touch the remote on save with the manual strategy', async () => {
      const storage = remoteStorage('manual');
      await storage.saveAnchor(desk());

      expect(remote.calls).toEqual([]);

      vi.setSystemTime(new Date(T2));
      const report = await storage.sync();
      expect(report.uploaded).toEqual({ spaces: 0, anchors: 1, events: 1 });
    });

    it('should sync the seeded history of an anchor stored before versioning', async () => {
      const legacy: Anchor = {
        ...desk(),
        createdAt: new Date('2025-01-01T00:00:00.000Z'),
        updatedAt: new Date('2025-01-01T00:00:00.000Z'),
      };
      await new LocalStore({ baseDir: tempDir, logger }).saveAnchor(legacy);
      const storage = remoteStorage('manual');
      await storage.sync();

      vi.setSystemTime(new Date(T2));
      await storage.saveAnchor(withMetadataValue(legacy, 'label', metadataValue.string('lamp')));
      vi.setSystemTime(new Date(T3));
      const report = await storage.sync();

      expect(report.uploaded.events).toBe(2);
      expect([...remote.events.records.values()].map((event) => [event.version, event.type])).toEqual([
        [1, 'created'],
        [2, 'updated'],
      ]);
    });

    it('should fall back to the remote copy of a space and cache it', async () => {
      const storage = remoteStorage();
      remote.spaces.records.set('s9', {
        id: 's9',
        payload: new Uint8Array([7, 7]),
        createdAt: new Date(T1),
        updatedAt: new Date(T1),
        isCompressed: false,
      });

      const loaded = await storage.loadSpace('s9');

      expect(Array.from(loaded?.payload ?? [])).toEqual([7, 7]);
      expect(await new LocalStore({ baseDir: tempDir, logger }).loadSpace('s9')).toBeDefined();
    });

    it('should purge soft-deleted anchors remotely as well', async () => {
      const storage = remoteStorage();
      await storage.saveAnchor(desk());
      await storage.deleteAnchor('a1');

      await storage.purgeDeletedAnchors(new Date(T2));

      expect(remote.anchors.records.has('a1')).toBe(false);
    });

    it('should replicate space deletions', async () => {
      const storage = remoteStorage();
      await storage.saveSpace(createSpace({ id: 's1', payload: new Uint8Array([1]) }));

      await storage.deleteSpace('s1');

      expect(remote.spaces.records.has('s1')).toBe(false);
    });
  });

  // ==========================================================================
  // Data management
  // ==========================================================================

  describe('data management', () => {
    it('should report usage and clear everything', async () => {
      const storage = localStorage();
      await storage.saveAnchor(desk());
      expect(await storage.localStorageSize()).toBeGreaterThan(0);

      await storage.clearLocalStorage();

      expect(await storage.localStorageSize()).toBe(0);
      expect(await storage.loadAnchor('a1')).toBeUndefined();
    });
  });
});
