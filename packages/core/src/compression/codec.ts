/**
 * Payload Compression
 *
 * Deflate-based codec for space payloads. The decompressed size is not
 * stored, so inflate starts from an estimated output bound and grows it
 * until the stream fits or the configured ceiling is reached.
 */

import { promisify } from 'node:util';
import { deflate, inflate, constants } from 'node:zlib';
import type { CompressionLevel } from '@anchorlog/shared-config';
import { DEFAULT_MAX_DECOMPRESSED_BYTES } from '@anchorlog/shared-config';
import { CompressionFailedError, DecompressionFailedError, toError } from '../utils/errors.js';

const deflateAsync = promisify(deflate);
const inflateAsync = promisify(inflate);

/** Smallest output bound tried on the first inflate attempt */
export const MIN_OUTPUT_BOUND = 64 * 1024;

export interface DecompressOptions {
  /** Ceiling for the decompressed size (default: 512 MiB) */
  maxOutputBytes?: number;
}

const ZLIB_LEVELS: Record<Exclude<CompressionLevel, 'none'>, number> = {
  balanced: constants.Z_DEFAULT_COMPRESSION,
};

function toBytes(buffer: Buffer): Uint8Array {
  return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}

function isOutputTooLarge(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ERR_BUFFER_TOO_LARGE';
}

/**
 * Compress bytes at the given level. `none` returns the input unchanged.
 */
export async function compress(data: Uint8Array, level: CompressionLevel): Promise<Uint8Array> {
  if (level === 'none' || data.byteLength === 0) {
    return data;
  }

  let output: Buffer;
  try {
    output = await deflateAsync(data, { level: ZLIB_LEVELS[level] });
  } catch (error) {
    throw new CompressionFailedError('Deflate failed', {
      details: { inputBytes: data.byteLength, level },
      cause: toError(error),
    });
  }

  if (output.byteLength === 0) {
    throw new CompressionFailedError('Deflate produced no output', {
      details: { inputBytes: data.byteLength, level },
    });
  }

  return toBytes(output);
}

/**
 * Decompress bytes produced by `compress` at a non-`none` level
 */
export async function decompress(
  data: Uint8Array,
  options: DecompressOptions = {}
): Promise<Uint8Array> {
  if (data.byteLength === 0) {
    return data;
  }

  const maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_DECOMPRESSED_BYTES;
  let bound = Math.min(Math.max(data.byteLength * 4, MIN_OUTPUT_BOUND), maxOutputBytes);

  for (;;) {
    try {
      return toBytes(await inflateAsync(data, { maxOutputLength: bound }));
    } catch (error) {
      if (isOutputTooLarge(error) && bound < maxOutputBytes) {
        bound = Math.min(bound * 2, maxOutputBytes);
        continue;
      }

      const exhausted = isOutputTooLarge(error);
      throw new DecompressionFailedError(
        exhausted
          ? `Decompressed payload exceeds ${maxOutputBytes} bytes`
          : 'Payload is not a valid deflate stream',
        {
          details: { inputBytes: data.byteLength, maxOutputBytes },
          cause: toError(error),
        }
      );
    }
  }
}
