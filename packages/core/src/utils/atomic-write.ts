/**
 * Crash-safe file writes
 *
 * Every record write goes to a temp file beside the target, is flushed with
 * fsync, then renamed over the target. Readers never observe a partially
 * written record.
 */

import { open, rename, unlink, appendFile, mkdir, readdir, stat } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import * as path from 'node:path';
import { getLogger, type Logger } from './logger.js';

const TEMP_MARKER = '.tmp-';

/**
 * Unique temp path in the target's directory, so the rename never crosses devices
 */
export function tempPathFor(finalPath: string): string {
  return `${finalPath}${TEMP_MARKER}${process.pid}-${Date.now()}-${Math.random().toString(36).slice(2)}`;
}

export function isTempPath(filePath: string): boolean {
  return path.basename(filePath).includes(TEMP_MARKER);
}

/**
 * Write data to a file atomically: write temp, fsync, rename
 */
export async function writeFileAtomic(
  filePath: string,
  data: Uint8Array | string,
  logger: Logger = getLogger('fs')
): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });

  const tempPath = tempPathFor(filePath);
  try {
    const handle = await open(tempPath, 'w');
    try {
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      logger.debug('Temp file cleanup skipped', { tempPath, reason: String(cleanupError) });
    });
    throw error;
  }
}

/**
 * Append one complete line to a file, creating it when missing
 */
export async function appendLine(filePath: string, line: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await appendFile(filePath, `${line}\n`, 'utf-8');
}

/**
 * Total size of all files under a directory (0 when it does not exist)
 */
export async function getDirectorySize(dir: string): Promise<number> {
  let total = 0;

  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isNotFound(error)) {
      return 0;
    }
    throw error;
  }

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      total += await getDirectorySize(entryPath);
    } else if (entry.isFile()) {
      total += (await stat(entryPath)).size;
    }
  }

  return total;
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
