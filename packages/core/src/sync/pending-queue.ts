/**
 * Pending Operation Queue
 *
 * Remote operations that failed, waiting for the next sync. The whole queue
 * is persisted through the local store after every change.
 *
 * @module sync/pending-queue
 */

import { randomUUID } from 'node:crypto';
import type { OperationKind, PendingOperation } from '@anchorlog/shared-types';
import type { LocalStore } from '../storage/local-store.js';
import { toError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';

export const DEFAULT_MAX_RETRY_ATTEMPTS = 5;

export interface PendingQueueOptions {
  store: LocalStore;
  /** An operation is dropped once its retry count reaches this (default: 5) */
  maxRetryAttempts?: number;
  logger?: Logger;
}

export interface DrainResult {
  /** Operations attempted */
  attempted: number;
  succeeded: number;
  /** Operations that exhausted their retries */
  dropped: PendingOperation[];
  /** Operations still queued */
  remaining: number;
}

export class PendingQueue {
  private readonly store: LocalStore;
  private readonly maxRetryAttempts: number;
  private readonly logger: Logger;
  private queue: PendingOperation[] = [];

  constructor(options: PendingQueueOptions) {
    this.store = options.store;
    this.maxRetryAttempts = options.maxRetryAttempts ?? DEFAULT_MAX_RETRY_ATTEMPTS;
    this.logger = options.logger ?? getLogger('pending-queue');
  }

  /** Restore the queue persisted by a previous session */
  async load(): Promise<void> {
    this.queue = await this.store.loadPendingOperations();
    if (this.queue.length > 0) {
      this.logger.info('Loaded pending operations', { count: this.queue.length });
    }
  }

  get size(): number {
    return this.queue.length;
  }

  get operations(): readonly PendingOperation[] {
    return this.queue;
  }

  /**
   * Queue an operation and persist the queue. A persistence failure is
   * logged and rethrown; the operation stays queued in memory.
   */
  async enqueue(kind: OperationKind, targetId: string): Promise<PendingOperation> {
    const operation: PendingOperation = {
      id: randomUUID(),
      kind,
      targetId,
      retryCount: 0,
      createdAt: new Date(),
    };

    this.queue = [...this.queue, operation];
    this.logger.debug('Operation queued', { kind, targetId, queueSize: this.queue.length });

    await this.persist();
    return operation;
  }

  /**
   * Run every queued operation once, in order. A failure increments the
   * operation's retry count; it stays queued while the count is below
   * `maxRetryAttempts` and is dropped otherwise.
   */
  async drain(execute: (operation: PendingOperation) => Promise<void>): Promise<DrainResult> {
    const pending = this.queue;
    const remaining: PendingOperation[] = [];
    const dropped: PendingOperation[] = [];
    let succeeded = 0;

    for (const operation of pending) {
      try {
        await execute(operation);
        succeeded++;
      } catch (error) {
        const retried: PendingOperation = { ...operation, retryCount: operation.retryCount + 1 };

        if (retried.retryCount < this.maxRetryAttempts) {
          remaining.push(retried);
          this.logger.debug('Operation failed, will retry', {
            kind: retried.kind,
            targetId: retried.targetId,
            retryCount: retried.retryCount,
            reason: toError(error).message,
          });
        } else {
          dropped.push(retried);
          this.logger.warn('Dropping operation after repeated failures', {
            kind: retried.kind,
            targetId: retried.targetId,
            retryCount: retried.retryCount,
            reason: toError(error).message,
          });
        }
      }
    }

    // Operations queued while draining stay behind the retried ones
    const queuedDuringDrain = this.queue.slice(pending.length);
    this.queue = [...remaining, ...queuedDuringDrain];
    await this.persist();

    return {
      attempted: pending.length,
      succeeded,
      dropped,
      remaining: this.queue.length,
    };
  }

  /** Forget every queued operation without touching the store */
  reset(): void {
    this.queue = [];
  }

  private async persist(): Promise<void> {
    try {
      await this.store.savePendingOperations(this.queue);
    } catch (error) {
      this.logger.error('Failed to persist pending operations', toError(error), {
        queueSize: this.queue.length,
      });
      throw error;
    }
  }
}
