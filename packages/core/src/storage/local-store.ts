/**
 * Local Durable Store
 *
 * File-system persistence for spaces, anchors, the append-only event log,
 * the pending sync queue and the last-sync timestamp.
 *
 * Layout under the base directory:
 *   spaces/<id>.space        4-byte header length, JSON header, payload bytes
 *   anchors/<id>.json        one record per anchor
 *   events/<spaceId>.jsonl   one JSON event per line
 *   pending-operations.json  whole queue
 *   sync-state.json          { lastSyncDate }
 *
 * A single logical writer is assumed; there is no multi-process locking.
 *
 * @module storage/local-store
 */

import { appendFile, open, readFile, readdir, rm, truncate, type FileHandle } from 'node:fs/promises';
import * as path from 'node:path';
import type { Anchor, AnchorEvent, PendingOperation, StoredSpace } from '@anchorlog/shared-types';
import {
  appendLine,
  getDirectorySize,
  isNotFound,
  isTempPath,
  writeFileAtomic,
} from '../utils/atomic-write.js';
import { EventLogCorruptedError, InvalidReferenceError, ValidationError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import {
  anchorRecordSchema,
  decodeRecord,
  encodeAnchor,
  encodeEvent,
  encodePendingOperation,
  eventRecordSchema,
  pendingQueueSchema,
  spaceHeaderSchema,
  syncStateSchema,
  toAnchor,
  toEvent,
} from './schemas.js';

// ============================================================================
// Constants
// ============================================================================

const SPACES_DIR = 'spaces';
const ANCHORS_DIR = 'anchors';
const EVENTS_DIR = 'events';
const PENDING_FILE = 'pending-operations.json';
const SYNC_STATE_FILE = 'sync-state.json';

const SPACE_EXT = '.space';
const ANCHOR_EXT = '.json';
const EVENTS_EXT = '.jsonl';

const HEADER_LENGTH_BYTES = 4;
const NEWLINE = 0x0a;

export interface LocalStoreOptions {
  /** Directory holding every record */
  baseDir: string;
  logger?: Logger;
}

// ============================================================================
// Local Store
// ============================================================================

export class LocalStore {
  readonly baseDir: string;
  private readonly logger: Logger;

  constructor(options: LocalStoreOptions) {
    this.baseDir = path.resolve(options.baseDir);
    this.logger = options.logger ?? getLogger('local-store');
  }

  // ==========================================================================
  // Spaces
  // ==========================================================================

  async saveSpace(space: StoredSpace): Promise<void> {
    const header = Buffer.from(
      JSON.stringify({
        id: space.id,
        ...(space.name !== undefined ? { name: space.name } : {}),
        createdAt: space.createdAt.toISOString(),
        updatedAt: space.updatedAt.toISOString(),
        isCompressed: space.isCompressed,
      }),
      'utf-8'
    );

    const length = Buffer.alloc(HEADER_LENGTH_BYTES);
    length.writeUInt32BE(header.byteLength, 0);

    await writeFileAtomic(
      this.spacePath(space.id),
      Buffer.concat([length, header, space.payload]),
      this.logger
    );
    this.logger.debug('Space saved', { spaceId: space.id, payloadBytes: space.payload.byteLength });
  }

  async loadSpace(id: string): Promise<StoredSpace | undefined> {
    const file = this.spacePath(id);
    const content = await this.readOptional(file);
    if (!content) {
      return undefined;
    }
    return this.decodeSpace(content, file);
  }

  async loadAllSpaces(): Promise<StoredSpace[]> {
    const ids = await this.listIds(SPACES_DIR, SPACE_EXT);
    const spaces: StoredSpace[] = [];

    for (const id of ids) {
      const space = await this.loadSpace(id);
      if (space) {
        spaces.push(space);
      }
    }

    return spaces;
  }

  /** Spaces with `updatedAt` strictly after `since` */
  async loadSpacesModifiedSince(since: Date): Promise<StoredSpace[]> {
    const spaces = await this.loadAllSpaces();
    return spaces.filter((space) => space.updatedAt.getTime() > since.getTime());
  }

  /**
   * Remove a space and its anchor records. The space's event log is kept.
   */
  async deleteSpace(id: string): Promise<void> {
    await rm(this.spacePath(id), { force: true });

    const anchors = await this.loadAnchors(id);
    for (const anchor of anchors) {
      await this.deleteAnchorRecord(anchor.id);
    }

    this.logger.debug('Space deleted', { spaceId: id, anchorsRemoved: anchors.length });
  }

  // ==========================================================================
  // Anchors
  // ==========================================================================

  async saveAnchor(anchor: Anchor): Promise<void> {
    await writeFileAtomic(this.anchorPath(anchor.id), JSON.stringify(encodeAnchor(anchor)), this.logger);
  }

  async loadAnchor(id: string): Promise<Anchor | undefined> {
    const file = this.anchorPath(id);
    const content = await this.readOptional(file);
    if (!content) {
      return undefined;
    }
    return toAnchor(decodeRecord(anchorRecordSchema, this.parseJson(content, file, 'loadAnchor'), {
      file,
      operation: 'loadAnchor',
    }));
  }

  /** Every anchor record of a space, deleted ones included, oldest first */
  async loadAnchors(spaceId: string): Promise<Anchor[]> {
    const anchors = await this.loadAllAnchors();
    return anchors.filter((anchor) => anchor.spaceId === spaceId);
  }

  /** Anchors with `updatedAt` strictly after `since` */
  async loadAnchorsModifiedSince(since: Date): Promise<Anchor[]> {
    const anchors = await this.loadAllAnchors();
    return anchors.filter((anchor) => anchor.updatedAt.getTime() > since.getTime());
  }

  async deleteAnchorRecord(id: string): Promise<void> {
    await rm(this.anchorPath(id), { force: true });
  }

  /**
   * Remove anchor records soft-deleted before `before`. Event history is untouched.
   */
  async purgeDeletedAnchors(before: Date): Promise<number> {
    const anchors = await this.loadAllAnchors();
    let purged = 0;

    for (const anchor of anchors) {
      if (anchor.deletedAt && anchor.deletedAt.getTime() < before.getTime()) {
        await this.deleteAnchorRecord(anchor.id);
        purged++;
      }
    }

    if (purged > 0) {
      this.logger.info('Purged deleted anchors', { count: purged, before: before.toISOString() });
    }
    return purged;
  }

  // ==========================================================================
  // Events
  // ==========================================================================

  /**
   * Append one event as a complete line. A torn tail left by an interrupted
   * append is cut off first.
   */
  async appendEvent(event: AnchorEvent): Promise<void> {
    const owner = await this.loadAnchor(event.anchorId);
    if (owner && owner.spaceId !== event.spaceId) {
      throw new InvalidReferenceError(
        `Event for anchor ${event.anchorId} names space ${event.spaceId}, but the anchor belongs to ${owner.spaceId}`,
        {
          component: 'LocalStore',
          operation: 'appendEvent',
          details: { anchorId: event.anchorId, eventSpaceId: event.spaceId, anchorSpaceId: owner.spaceId },
        }
      );
    }

    const file = this.eventsPath(event.spaceId);
    await this.repairTornTail(file, event.spaceId);
    await appendLine(file, JSON.stringify(encodeEvent(event)));
  }

  /**
   * Events of a space in insertion order
   */
  async loadEvents(spaceId: string): Promise<AnchorEvent[]> {
    const file = this.eventsPath(spaceId);
    const content = await this.readOptional(file);
    if (!content) {
      return [];
    }

    const text = content.toString('utf-8');
    const lines = text.split('\n');
    const endsCleanly = text.endsWith('\n');
    const events: AnchorEvent[] = [];

    for (let index = 0; index < lines.length; index++) {
      const line = lines[index];
      if (line === undefined || line.trim() === '') {
        continue;
      }

      const isTornTail = index === lines.length - 1 && !endsCleanly;
      const event = this.decodeEventLine(line, spaceId, isTornTail, index + 1, file);
      if (event) {
        events.push(event);
      }
    }

    return events;
  }

  async loadAnchorEvents(anchorId: string, spaceId: string): Promise<AnchorEvent[]> {
    const events = await this.loadEvents(spaceId);
    return events.filter((event) => event.anchorId === anchorId);
  }

  /** Highest version recorded for the anchor, 0 when it has no events */
  async currentVersion(anchorId: string, spaceId: string): Promise<number> {
    const events = await this.loadAnchorEvents(anchorId, spaceId);
    return events.reduce((max, event) => Math.max(max, event.version), 0);
  }

  /** Ids of every space with an event log */
  async listEventLogSpaceIds(): Promise<string[]> {
    return this.listIds(EVENTS_DIR, EVENTS_EXT);
  }

  // ==========================================================================
  // Pending queue & sync state
  // ==========================================================================

  async savePendingOperations(operations: readonly PendingOperation[]): Promise<void> {
    await writeFileAtomic(
      path.join(this.baseDir, PENDING_FILE),
      JSON.stringify(operations.map(encodePendingOperation), null, 2),
      this.logger
    );
  }

  async loadPendingOperations(): Promise<PendingOperation[]> {
    const file = path.join(this.baseDir, PENDING_FILE);
    const content = await this.readOptional(file);
    if (!content) {
      return [];
    }
    return decodeRecord(pendingQueueSchema, this.parseJson(content, file, 'loadPendingOperations'), {
      file,
      operation: 'loadPendingOperations',
    });
  }

  async getLastSyncDate(): Promise<Date | undefined> {
    const file = path.join(this.baseDir, SYNC_STATE_FILE);
    const content = await this.readOptional(file);
    if (!content) {
      return undefined;
    }
    const state = decodeRecord(syncStateSchema, this.parseJson(content, file, 'getLastSyncDate'), {
      file,
      operation: 'getLastSyncDate',
    });
    return state.lastSyncDate ?? undefined;
  }

  async setLastSyncDate(date: Date): Promise<void> {
    await writeFileAtomic(
      path.join(this.baseDir, SYNC_STATE_FILE),
      JSON.stringify({ lastSyncDate: date.toISOString() }),
      this.logger
    );
  }

  // ==========================================================================
  // Maintenance
  // ==========================================================================

  /** Bytes used by every file under the base directory */
  async totalSize(): Promise<number> {
    return getDirectorySize(this.baseDir);
  }

  async clearAll(): Promise<void> {
    await rm(this.baseDir, { recursive: true, force: true });
    this.logger.info('Local storage cleared', { baseDir: this.baseDir });
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private spacePath(id: string): string {
    return path.join(this.baseDir, SPACES_DIR, `${safeFileName(id)}${SPACE_EXT}`);
  }

  private anchorPath(id: string): string {
    return path.join(this.baseDir, ANCHORS_DIR, `${safeFileName(id)}${ANCHOR_EXT}`);
  }

  private eventsPath(spaceId: string): string {
    return path.join(this.baseDir, EVENTS_DIR, `${safeFileName(spaceId)}${EVENTS_EXT}`);
  }

  private async readOptional(file: string): Promise<Buffer | undefined> {
    try {
      return await readFile(file);
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  }

  private async listIds(dir: string, extension: string): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(path.join(this.baseDir, dir));
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    return names
      .filter((name) => name.endsWith(extension) && !isTempPath(name))
      .map((name) => name.slice(0, -extension.length))
      .sort();
  }

  private async loadAllAnchors(): Promise<Anchor[]> {
    const ids = await this.listIds(ANCHORS_DIR, ANCHOR_EXT);
    const anchors: Anchor[] = [];

    for (const id of ids) {
      const anchor = await this.loadAnchor(id);
      if (anchor) {
        anchors.push(anchor);
      }
    }

    return anchors.sort(
      (a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id.localeCompare(b.id)
    );
  }

  private parseJson(content: Buffer, file: string, operation: string): unknown {
    try {
      return JSON.parse(content.toString('utf-8'));
    } catch (error) {
      throw new ValidationError(`Unreadable JSON in ${file}: ${error instanceof Error ? error.message : String(error)}`, {
        component: 'LocalStore',
        operation,
        field: file,
      });
    }
  }

  private decodeSpace(content: Buffer, file: string): StoredSpace {
    if (content.byteLength < HEADER_LENGTH_BYTES) {
      throw new ValidationError(`Truncated space record in ${file}`, {
        component: 'LocalStore',
        operation: 'loadSpace',
        field: file,
      });
    }

    const headerLength = content.readUInt32BE(0);
    const headerEnd = HEADER_LENGTH_BYTES + headerLength;
    if (headerEnd > content.byteLength) {
      throw new ValidationError(`Space header overruns ${file}`, {
        component: 'LocalStore',
        operation: 'loadSpace',
        field: file,
      });
    }

    const header = decodeRecord(
      spaceHeaderSchema,
      this.parseJson(content.subarray(HEADER_LENGTH_BYTES, headerEnd), file, 'loadSpace'),
      { file, operation: 'loadSpace' }
    );

    return {
      ...header,
      payload: new Uint8Array(content.subarray(headerEnd)),
    };
  }

  private decodeEventLine(
    line: string,
    spaceId: string,
    isTornTail: boolean,
    lineNumber: number,
    file: string
  ): AnchorEvent | undefined {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (error) {
      if (isTornTail) {
        this.logger.warn('Skipping torn final line in event log', { spaceId, lineNumber });
        return undefined;
      }
      throw new EventLogCorruptedError(
        spaceId,
        `line ${lineNumber} is not valid JSON`,
        error instanceof Error ? error : undefined
      );
    }

    const result = eventRecordSchema.safeParse(raw);
    if (!result.success) {
      if (isTornTail) {
        this.logger.warn('Skipping torn final line in event log', { spaceId, lineNumber });
        return undefined;
      }
      throw new EventLogCorruptedError(
        spaceId,
        `line ${lineNumber} of ${path.basename(file)} is not a valid event: ${result.error.errors
          .map((e) => `${e.path.join('.') || 'root'}: ${e.message}`)
          .join('; ')}`
      );
    }

    return toEvent(result.data);
  }

  /**
   * Make sure the next append starts on a fresh line. An unterminated last
   * line that decodes as an event is kept and terminated; anything else is
   * cut off.
   */
  private async repairTornTail(file: string, spaceId: string): Promise<void> {
    let handle: FileHandle;
    try {
      handle = await open(file, 'r');
    } catch (error) {
      if (isNotFound(error)) {
        return;
      }
      throw error;
    }

    let size: number;
    let lastByte: number | undefined;
    try {
      size = (await handle.stat()).size;
      if (size === 0) {
        return;
      }
      const buffer = Buffer.alloc(1);
      await handle.read(buffer, 0, 1, size - 1);
      lastByte = buffer[0];
    } finally {
      await handle.close();
    }

    if (lastByte === NEWLINE) {
      return;
    }

    const content = await readFile(file);
    const keep = content.lastIndexOf(NEWLINE) + 1;

    if (isCompleteEvent(content.subarray(keep).toString('utf-8'))) {
      await appendFile(file, '\n', 'utf-8');
      this.logger.warn('Terminated unterminated final line in event log', { spaceId });
      return;
    }

    await truncate(file, keep);
    this.logger.warn('Removed torn final line from event log', {
      spaceId,
      bytesRemoved: size - keep,
    });
  }
}

/**
 * True when a line decodes as a stored event, the same test loadEvents applies
 */
function isCompleteEvent(line: string): boolean {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return false;
  }
  return eventRecordSchema.safeParse(raw).success;
}

/**
 * Keep ids usable as file names
 */
function safeFileName(id: string): string {
  if (id.length === 0 || id.includes('/') || id.includes('\\') || id === '.' || id === '..' || id.includes('\0')) {
    throw new ValidationError(`Id cannot be used as a file name: ${JSON.stringify(id)}`, {
      component: 'LocalStore',
      operation: 'resolvePath',
      field: 'id',
    });
  }
  return id;
}
