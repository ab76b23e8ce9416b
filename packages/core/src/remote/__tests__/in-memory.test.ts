/**
 * In-memory Remote Adapter Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Anchor, StoredSpace } from '@anchorlog/shared-types';
import { InMemoryRemoteAdapter, RemoteUnavailableError } from '../in-memory.js';
import { toRemoteEvent } from '../types.js';
import { IDENTITY_TRANSFORM } from '../../models/anchor.js';

function anchor(id: string, spaceId: string, updatedAt: string, deletedAt?: string): Anchor {
  return {
    id,
    spaceId,
    transform: IDENTITY_TRANSFORM,
    metadata: {},
    createdAt: new Date('2025-01-01T00:00:00.000Z'),
    updatedAt: new Date(updatedAt),
    ...(deletedAt ? { deletedAt: new Date(deletedAt) } : {}),
  };
}

function space(id: string): StoredSpace {
  return {
    id,
    payload: new Uint8Array([1, 2, 3]),
    createdAt: new Date('2025-01-01T00:00:00.000Z'),
    updatedAt: new Date('2025-01-02T00:00:00.000Z'),
    isCompressed: false,
  };
}

describe('InMemoryRemoteAdapter', () => {
  let remote: InMemoryRemoteAdapter;

  beforeEach(() => {
    remote = new InMemoryRemoteAdapter();
  });

  it('should store copies rather than references', async () => {
    const original = space('s1');
    await remote.spaces.upload(original);
    original.payload[0] = 42;

    const downloaded = await remote.spaces.download('s1');

    expect(Array.from(downloaded?.payload ?? [])).toEqual([1, 2, 3]);
  });

  it('should return undefined for an unknown id', async () => {
    expect(await remote.anchors.download('missing')).toBeUndefined();
  });

  it('should list records modified strictly after a date', async () => {
    await remote.anchors.upload(anchor('a1', 's1', '2025-02-01T00:00:00.000Z'));
    await remote.anchors.upload(anchor('a2', 's1', '2025-03-01T00:00:00.000Z'));

    const changed = await remote.anchors.listModifiedSince(new Date('2025-02-01T00:00:00.000Z'));

    expect(changed.map((record) => record.id)).toEqual(['a2']);
  });

  it('should remove a space together with its anchors', async () => {
    await remote.spaces.upload(space('s1'));
    await remote.anchors.upload(anchor('a1', 's1', '2025-02-01T00:00:00.000Z'));
    await remote.anchors.upload(anchor('a2', 's2', '2025-02-01T00:00:00.000Z'));

    await remote.spaces.delete('s1');

    expect([...remote.anchors.records.keys()]).toEqual(['a2']);
  });

  it('should purge anchors soft-deleted before a cutoff', async () => {
    await remote.anchors.upload(anchor('a1', 's1', '2025-02-01T00:00:00.000Z', '2025-02-01T00:00:00.000Z'));
    await remote.anchors.upload(anchor('a2', 's1', '2025-02-01T00:00:00.000Z', '2025-04-01T00:00:00.000Z'));
    await remote.anchors.upload(anchor('a3', 's1', '2025-02-01T00:00:00.000Z'));

    const removed = await remote.anchors.deleteWhere(new Date('2025-03-01T00:00:00.000Z'));

    expect(removed).toBe(1);
    expect([...remote.anchors.records.keys()]).toEqual(['a2', 'a3']);
  });

  it('should purge events older than a cutoff', async () => {
    await remote.events.upload(
      toRemoteEvent({
        id: 'e1',
        anchorId: 'a1',
        spaceId: 's1',
        type: 'deleted',
        timestamp: new Date('2025-02-01T00:00:00.000Z'),
        version: 2,
      })
    );

    expect(await remote.events.deleteWhere(new Date('2025-03-01T00:00:00.000Z'))).toBe(1);
  });

  it('should fail only the requested number of calls', async () => {
    remote.failNext(1);

    await expect(remote.spaces.upload(space('s1'))).rejects.toBeInstanceOf(RemoteUnavailableError);
    await remote.spaces.upload(space('s1'));

    expect(remote.spaces.records.has('s1')).toBe(true);
  });

  it('should fail every call while offline', async () => {
    remote.setOffline(true);

    await expect(remote.anchors.listModifiedSince(new Date(0))).rejects.toThrow(
      'Remote unavailable: anchors.listModifiedSince'
    );
    expect(remote.isOffline).toBe(true);

    remote.setOffline(false);
    expect(await remote.anchors.listModifiedSince(new Date(0))).toEqual([]);
  });

  it('should record every call in order', async () => {
    await remote.spaces.upload(space('s1'));
    await remote.spaces.download('s1');
    await remote.anchors.deleteWhere(new Date(0));

    expect(remote.calls).toEqual(['spaces.upload', 'spaces.download', 'anchors.deleteWhere']);
  });
});
