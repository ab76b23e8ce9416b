/**
 * In-memory remote replica
 *
 * A process-local RemoteAdapter for tests and local-first development.
 * Network failures are simulated with `setOffline` or `failNext`.
 */

import type { Anchor, RemoteRecord, StoredSpace } from '@anchorlog/shared-types';
import type { RemoteAdapter, RemoteCollection, RemoteEvent } from './types.js';

export type RemoteCollectionName = 'spaces' | 'anchors' | 'events';
export type RemoteOperationName = 'upload' | 'download' | 'listModifiedSince' | 'delete' | 'deleteWhere';

export class RemoteUnavailableError extends Error {
  constructor(collection: RemoteCollectionName, operation: RemoteOperationName) {
    super(`Remote unavailable: ${collection}.${operation}`);
    this.name = 'RemoteUnavailableError';
  }
}

export interface FailureSource {
  check(collection: RemoteCollectionName, operation: RemoteOperationName): void;
}

export class InMemoryCollection<T extends RemoteRecord> implements RemoteCollection<T> {
  readonly records = new Map<string, T>();

  constructor(
    private readonly name: RemoteCollectionName,
    private readonly failures: FailureSource,
    private readonly isExpired: (record: T, olderThan: Date) => boolean,
    private readonly onDelete: (id: string) => void = () => undefined
  ) {}

  async upload(record: T): Promise<void> {
    this.failures.check(this.name, 'upload');
    this.records.set(record.id, structuredClone(record));
  }

  async download(id: string): Promise<T | undefined> {
    this.failures.check(this.name, 'download');
    const record = this.records.get(id);
    return record ? structuredClone(record) : undefined;
  }

  async listModifiedSince(since: Date): Promise<T[]> {
    this.failures.check(this.name, 'listModifiedSince');
    return [...this.records.values()]
      .filter((record) => record.updatedAt.getTime() > since.getTime())
      .map((record) => structuredClone(record));
  }

  async delete(id: string): Promise<void> {
    this.failures.check(this.name, 'delete');
    this.records.delete(id);
    this.onDelete(id);
  }

  async deleteWhere(olderThan: Date): Promise<number> {
    this.failures.check(this.name, 'deleteWhere');
    let removed = 0;
    for (const [id, record] of this.records) {
      if (this.isExpired(record, olderThan)) {
        this.records.delete(id);
        removed++;
      }
    }
    return removed;
  }
}

export class InMemoryRemoteAdapter implements RemoteAdapter {
  readonly spaces: InMemoryCollection<StoredSpace>;
  readonly anchors: InMemoryCollection<Anchor>;
  readonly events: InMemoryCollection<RemoteEvent>;

  /** Every call in order, as `collection.operation` */
  readonly calls: string[] = [];

  private offline = false;
  private pendingFailures = 0;

  constructor() {
    const failures: FailureSource = {
      check: (collection, operation) => {
        this.calls.push(`${collection}.${operation}`);
        if (this.offline) {
          throw new RemoteUnavailableError(collection, operation);
        }
        if (this.pendingFailures > 0) {
          this.pendingFailures--;
          throw new RemoteUnavailableError(collection, operation);
        }
      },
    };

    this.anchors = new InMemoryCollection<Anchor>(
      'anchors',
      failures,
      (anchor, olderThan) => anchor.deletedAt !== undefined && anchor.deletedAt.getTime() < olderThan.getTime()
    );
    this.events = new InMemoryCollection<RemoteEvent>(
      'events',
      failures,
      (event, olderThan) => event.timestamp.getTime() < olderThan.getTime()
    );
    this.spaces = new InMemoryCollection<StoredSpace>(
      'spaces',
      failures,
      (space, olderThan) => space.updatedAt.getTime() < olderThan.getTime(),
      (spaceId) => {
        for (const [id, anchor] of this.anchors.records) {
          if (anchor.spaceId === spaceId) {
            this.anchors.records.delete(id);
          }
        }
      }
    );
  }

  /** Fail every call until set back to false */
  setOffline(offline: boolean): void {
    this.offline = offline;
  }

  /** Fail the next `count` calls */
  failNext(count = 1): void {
    this.pendingFailures += count;
  }

  get isOffline(): boolean {
    return this.offline;
  }
}
